import { JobCancelledError, SynthesisError } from "../../domain/errors/conversion.errors";
import { JobWorkspace } from "../../infrastructure/storage/job-workspace";
import { ConversionContext } from "../pipeline/conversion.context";
import { IConversionStep } from "../pipeline/conversion.step";
import { ChunkSequencer } from "../services/chunk-sequencer.service";

export class SynthesizeChunksStep implements IConversionStep {
    readonly stage = "synthesizing" as const;

    constructor(
      private sequencer: ChunkSequencer,
      private workDir: string
    ) {}

    async execute(context: ConversionContext): Promise<ConversionContext> {
      const chunks = context.chunks ?? [];
      const workspace = context.workspace ?? (await JobWorkspace.create(this.workDir, context.jobId));

      const result = await this.sequencer.run({
        chunks,
        audioPathFor: (index) => workspace.segmentPath(index),
        signal: context.signal,
        onProgress: (completed, total) => {
          const current = Math.min(completed + 1, total);
          context.reportProgress({
            stage: this.stage,
            currentChunk: completed,
            totalChunks: total,
            message:
              completed < total
                ? `Converting chunk ${current}/${total} to audio...`
                : `Converted ${total}/${total} chunks to audio`,
          });
        },
      });

      if (result.ok) {
        return { ...context, workspace, segments: result.segments };
      }

      if (result.cancelled) {
        throw new JobCancelledError(context.jobId, this.stage, { retainedPath: workspace.retain() });
      }

      const indices = result.failures.map((failure) => failure.sequenceIndex);
      const first = result.failures[0];
      // Messages count chunks from 1, like the progress lines
      const message =
        result.failures.length === 1
          ? `Failed to convert chunk ${first.sequenceIndex + 1} to speech (${first.failureKind}): ${first.reason}`
          : `Failed to convert chunks ${indices.map((index) => index + 1).join(", ")} to speech. First failure (chunk ${first.sequenceIndex + 1}, ${first.failureKind}): ${first.reason}`;

      throw new SynthesisError(indices, first.failureKind, message, { retainedPath: workspace.retain() });
    }
}
