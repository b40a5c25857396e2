import { ConversionStage } from "../../domain/entities/conversion-job";
import { ConversionContext } from "./conversion.context";

export interface IConversionStep {
    readonly stage: ConversionStage;
    execute(context: ConversionContext): Promise<ConversionContext>;
}
