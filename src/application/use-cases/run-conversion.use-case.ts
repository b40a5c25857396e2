import { join } from "path";
import { rm, unlink } from "fs/promises";
import { ConversionErrorDetail, ConversionProgress } from "../../domain/entities/conversion-job";
import { ITextExtractor } from "../../domain/interfaces/itext.extractor";
import {
  ConversionError,
  InvalidStateTransitionError,
  JobCancelledError,
  SynthesisError,
  errorMessage,
} from "../../domain/errors/conversion.errors";
import { ConversionPipeline } from "../pipeline/conversion.pipeline";
import { JobTracker } from "../services/job-tracker.service";
import { ChunkSequencer } from "../services/chunk-sequencer.service";
import { AudioAssembler } from "../services/audio-assembler.service";
import { ExtractTextStep } from "../steps/extract.text.step";
import { ChunkTextStep } from "../steps/chunk.text.step";
import { SynthesizeChunksStep } from "../steps/synthesize.chunks.step";
import { MergeAudioStep } from "../steps/merge.audio.step";

export interface RunConversionOptions {
  maxChunkChars: number;
  workDir: string; // Parent of per-job temp directories
  outputDir: string;
}

/**
 * Drives one job through extract → chunk → synthesize → merge and records the
 * outcome on the tracker. Only an unknown job id rejects; every other failure
 * ends as an "error" state.
 */
export class RunConversionUseCase {
  constructor(
    private jobTracker: JobTracker,
    private textExtractor: ITextExtractor,
    private sequencer: ChunkSequencer,
    private assembler: AudioAssembler,
    private options: RunConversionOptions
  ) {}

  async execute(jobId: string, signal: AbortSignal): Promise<void> {
    const job = this.jobTracker.getStatus(jobId);
    console.log(`[RunConversion] Job ${jobId}: starting conversion of ${job.sourcePath} with voice ${job.voice}`);

    try {
      this.jobTracker.markProcessing(jobId, {
        currentChunk: 0,
        totalChunks: 0,
        message: "Starting conversion...",
      });
    } catch (error) {
      // Cancelled while still queued
      console.warn(`[RunConversion] Job ${jobId}: not started: ${errorMessage(error)}`);
      await this.removeSource(jobId, job.sourcePath);
      return;
    }

    const pipeline = new ConversionPipeline([
      new ExtractTextStep(this.textExtractor),
      new ChunkTextStep(this.options.maxChunkChars),
      new SynthesizeChunksStep(this.sequencer, this.options.workDir),
      new MergeAudioStep(this.assembler),
    ]);

    const outputPath = join(this.options.outputDir, job.outputFilename);
    try {
      const result = await pipeline.run({
        jobId,
        sourcePath: job.sourcePath,
        outputPath,
        voice: job.voice,
        chunkingEnabled: job.chunkingEnabled,
        signal,
        reportProgress: (progress: ConversionProgress) => {
          this.jobTracker.updateProgress(jobId, progress);
        },
      });

      if (signal.aborted || !result.resultPath) {
        throw new JobCancelledError(jobId, "merging");
      }
      this.jobTracker.markComplete(jobId, result.resultPath);
    } catch (error) {
      this.recordFailure(jobId, error);
    } finally {
      // A cancelled job has no resultPath, so nothing else would ever delete its output
      if (signal.aborted) {
        await this.discardOutput(jobId, outputPath);
      }
      await this.removeSource(jobId, job.sourcePath);
      console.log(`[RunConversion] Job ${jobId}: finished`);
    }
  }

  private recordFailure(jobId: string, error: unknown): void {
    const detail = toErrorDetail(error);
    if (detail.retainedPath) {
      console.error(`[RunConversion] Job ${jobId}: temporary files kept in: ${detail.retainedPath}`);
    }
    try {
      this.jobTracker.markError(jobId, detail);
    } catch (transitionError) {
      if (transitionError instanceof InvalidStateTransitionError) {
        // Already terminal, e.g. cancelled through the tracker while running
        console.warn(`[RunConversion] Job ${jobId}: ${transitionError.message}; keeping existing outcome`);
        return;
      }
      console.error(`[RunConversion] Job ${jobId}: could not record failure:`, transitionError);
    }
  }

  private async discardOutput(jobId: string, outputPath: string): Promise<void> {
    try {
      await rm(outputPath, { force: true });
      console.log(`[RunConversion] Job ${jobId}: cancelled; discarded output ${outputPath}`);
    } catch (error) {
      console.warn(`[RunConversion] Job ${jobId}: could not remove output ${outputPath}: ${errorMessage(error)}`);
    }
  }

  private async removeSource(jobId: string, sourcePath: string): Promise<void> {
    try {
      await unlink(sourcePath);
      console.log(`[RunConversion] Job ${jobId}: cleaned up uploaded file ${sourcePath}`);
    } catch (error) {
      console.warn(`[RunConversion] Job ${jobId}: could not remove uploaded file ${sourcePath}: ${errorMessage(error)}`);
    }
  }
}

export function toErrorDetail(error: unknown): ConversionErrorDetail {
  if (error instanceof SynthesisError) {
    return {
      message: error.message,
      reason: error.kind === "cancelled" ? "cancelled" : "failed",
      stage: error.stage,
      chunkIndex: error.chunkIndex,
      failedChunkIndices: error.failedChunkIndices,
      retainedPath: error.retainedPath,
    };
  }
  if (error instanceof ConversionError) {
    return {
      message: error.message,
      reason: error instanceof JobCancelledError ? "cancelled" : "failed",
      stage: error.stage,
      retainedPath: error.retainedPath,
    };
  }
  return { message: errorMessage(error) || "Unknown error", reason: "failed" };
}
