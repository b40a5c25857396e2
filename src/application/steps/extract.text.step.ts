import { extname } from "path";
import { ITextExtractor } from "../../domain/interfaces/itext.extractor";
import { ConversionError, ParseError, errorMessage } from "../../domain/errors/conversion.errors";
import { ConversionContext } from "../pipeline/conversion.context";
import { IConversionStep } from "../pipeline/conversion.step";

export class ExtractTextStep implements IConversionStep {
    readonly stage = "extracting" as const;

    constructor(private textExtractor: ITextExtractor) {}

    async execute(context: ConversionContext): Promise<ConversionContext> {
      const extension = extname(context.sourcePath).toLowerCase();
      context.reportProgress({
        stage: this.stage,
        currentChunk: 0,
        totalChunks: 0,
        message: `Extracting text from ${extension}...`,
      });

      let text: string;
      try {
        text = await this.textExtractor.extractText(context.sourcePath);
      } catch (error) {
        if (error instanceof ConversionError) {
          throw error;
        }
        throw new ParseError(`Text extraction failed: ${errorMessage(error)}`, { cause: error });
      }

      if (!text.trim()) {
        throw new ParseError("Text extraction resulted in empty content");
      }

      console.log(`[ExtractTextStep] Job ${context.jobId}: extracted ${text.length} characters`);
      return { ...context, text };
    }
}
