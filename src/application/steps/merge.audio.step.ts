import { MergeError } from "../../domain/errors/conversion.errors";
import { ConversionContext } from "../pipeline/conversion.context";
import { IConversionStep } from "../pipeline/conversion.step";
import { AudioAssembler } from "../services/audio-assembler.service";

export class MergeAudioStep implements IConversionStep {
    readonly stage = "merging" as const;

    constructor(private assembler: AudioAssembler) {}

    async execute(context: ConversionContext): Promise<ConversionContext> {
      const segments = context.segments ?? [];
      const workspace = context.workspace;
      if (!workspace) {
        throw new MergeError("No workspace holds the synthesized audio");
      }

      context.reportProgress({
        stage: this.stage,
        currentChunk: segments.length,
        totalChunks: segments.length,
        message: `Merging ${segments.length} audio chunks...`,
      });

      let resultPath: string;
      try {
        resultPath = await this.assembler.merge({
          segments,
          outputPath: context.outputPath,
          workDir: workspace.path,
          signal: context.signal,
        });
      } catch (error) {
        workspace.retain();
        throw error;
      }

      try {
        await workspace.release();
      } catch (error) {
        console.warn(`[MergeAudioStep] Job ${context.jobId}: failed to remove temporary directory ${workspace.path}:`, error);
      }
      return { ...context, resultPath };
    }
}
