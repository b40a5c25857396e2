import { TextChunk } from "../../domain/entities/text-chunk";
import { FailedSegment, SucceededSegment } from "../../domain/entities/synthesized-segment";
import { SynthesisInvoker } from "./synthesis-invoker.service";

export type FailurePolicy = "fail-fast" | "fail-complete";

export interface ChunkSequencerOptions {
  concurrency: number; // 1 = strictly serial
  failurePolicy: FailurePolicy;
}

export interface SequenceRunParams {
  chunks: TextChunk[];
  audioPathFor: (sequenceIndex: number) => string;
  signal?: AbortSignal;
  /**
   * Called with 0 before any work, then each time the run of consecutive
   * succeeded segments starting at index 0 grows.
   */
  onProgress?: (completed: number, total: number) => void;
}

export type SequenceResult =
  | { ok: true; segments: SucceededSegment[] }
  | { ok: false; failures: FailedSegment[]; succeeded: SucceededSegment[]; cancelled: boolean };

/**
 * Drives every chunk of a job through the invoker and hands back segments in
 * ascending sequenceIndex order, whatever order the calls complete in.
 */
export class ChunkSequencer {
  constructor(
    private invoker: SynthesisInvoker,
    private options: ChunkSequencerOptions
  ) {}

  async run(params: SequenceRunParams): Promise<SequenceResult> {
    const { chunks, audioPathFor, signal, onProgress } = params;
    const total = chunks.length;
    const results: Array<SucceededSegment | FailedSegment | undefined> = new Array(total);

    // Aborted by the caller (job cancellation) or by us on the first failure under fail-fast.
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let nextToStart = 0;
    let inOrderCompleted = 0;
    let stopped = false;

    const advanceCursor = () => {
      const before = inOrderCompleted;
      while (inOrderCompleted < total && results[inOrderCompleted]?.status === "succeeded") {
        inOrderCompleted++;
      }
      if (inOrderCompleted > before) {
        onProgress?.(inOrderCompleted, total);
      }
    };

    const worker = async () => {
      while (!stopped && !controller.signal.aborted && nextToStart < total) {
        const chunk = chunks[nextToStart++];
        const segment = await this.invoker.synthesizeChunk({
          chunk,
          audioPath: audioPathFor(chunk.sequenceIndex),
          signal: controller.signal,
        });
        results[chunk.sequenceIndex] = segment;

        if (segment.status === "failed" && segment.failureKind !== "cancelled") {
          console.error(
            `[ChunkSequencer] Chunk ${segment.sequenceIndex + 1}/${total} failed: ${segment.reason}`
          );
          if (this.options.failurePolicy === "fail-fast") {
            stopped = true;
            controller.abort();
          }
        }
        advanceCursor();
      }
    };

    onProgress?.(0, total);
    const workerCount = Math.max(1, Math.min(this.options.concurrency, total));
    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    const settled = results.filter((r): r is SucceededSegment | FailedSegment => r !== undefined);
    const succeeded = settled.filter((r): r is SucceededSegment => r.status === "succeeded");
    const failures = settled.filter(
      (r): r is FailedSegment => r.status === "failed" && r.failureKind !== "cancelled"
    );
    const cancelled = signal?.aborted === true;

    if (!cancelled && failures.length === 0 && succeeded.length === total) {
      console.log(`[ChunkSequencer] All ${total} chunks synthesized`);
      return { ok: true, segments: succeeded };
    }

    if (cancelled) {
      console.warn(`[ChunkSequencer] Run cancelled after ${succeeded.length}/${total} chunks`);
    }
    return { ok: false, failures, succeeded, cancelled };
  }
}
