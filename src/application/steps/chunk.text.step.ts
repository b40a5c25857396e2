import { ChunkLimitError } from "../../domain/errors/conversion.errors";
import { ConversionContext } from "../pipeline/conversion.context";
import { IConversionStep } from "../pipeline/conversion.step";
import { chunkText, singleChunk } from "../services/text-chunker.service";

export class ChunkTextStep implements IConversionStep {
    readonly stage = "chunking" as const;

    constructor(private maxChunkChars: number) {}

    async execute(context: ConversionContext): Promise<ConversionContext> {
      const text = context.text ?? "";
      context.reportProgress({
        stage: this.stage,
        currentChunk: 0,
        totalChunks: 0,
        message: "Splitting text into chunks...",
      });

      const chunks = context.chunkingEnabled
        ? chunkText(text, this.maxChunkChars, context.voice)
        : singleChunk(text, context.voice);

      if (chunks.length === 0 || !chunks[0].text.trim()) {
        throw new ChunkLimitError("No text chunks generated after splitting.");
      }

      console.log(`[ChunkTextStep] Job ${context.jobId}: ${chunks.length} chunk(s)`);
      return { ...context, chunks };
    }
}
