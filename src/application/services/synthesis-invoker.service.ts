import { writeFile } from "fs/promises";
import { TextChunk } from "../../domain/entities/text-chunk";
import {
  FailedSegment,
  SucceededSegment,
  SynthesisFailureKind,
} from "../../domain/entities/synthesized-segment";
import { ISpeechSynthesizer } from "../../domain/interfaces/ispeech.synthesizer";
import { errorMessage } from "../../domain/errors/conversion.errors";

export interface SynthesisInvokerOptions {
  timeoutMs: number;
  maxAttempts: number; // 1 = single attempt, no retry
  retryBackoffMs: number; // Doubles after every failed attempt
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>; // Resolves early on abort
}

export interface SynthesizeChunkParams {
  chunk: TextChunk;
  audioPath: string; // Where the chunk's audio is written
  signal?: AbortSignal;
}

class SynthesisAttemptError extends Error {
  constructor(readonly kind: SynthesisFailureKind, message: string) {
    super(message);
  }
}

const defaultSleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Calls the speech service for one chunk. Failures are classified and returned
 * as a failed segment; this method never rejects.
 */
export class SynthesisInvoker {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private synthesizer: ISpeechSynthesizer,
    private options: SynthesisInvokerOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async synthesizeChunk(params: SynthesizeChunkParams): Promise<SucceededSegment | FailedSegment> {
    const { chunk, audioPath, signal } = params;
    const label = `chunk ${chunk.sequenceIndex}`;

    if (!chunk.text.trim()) {
      console.warn(`[SynthesisInvoker] Skipping empty text for ${label}`);
      return this.failed(chunk, "empty-audio", "Chunk text is empty", 0);
    }

    let attempt = 0;
    let lastError = new SynthesisAttemptError("service", "Synthesis was not attempted");

    while (attempt < this.options.maxAttempts) {
      attempt++;
      if (signal?.aborted) {
        return this.failed(chunk, "cancelled", "Synthesis cancelled", attempt - 1);
      }

      try {
        console.log(
          `[SynthesisInvoker] Starting TTS for ${label} (attempt ${attempt}/${this.options.maxAttempts}, voice: ${chunk.voice}, ${chunk.text.length} chars)`
        );
        const audio = await this.callWithTimeout(chunk, signal);
        if (audio.length === 0) {
          throw new SynthesisAttemptError("empty-audio", "Speech service returned no audio");
        }
        await writeFile(audioPath, audio);
        console.log(`[SynthesisInvoker] Saved audio for ${label} to ${audioPath} (${audio.length} bytes)`);
        return { sequenceIndex: chunk.sequenceIndex, status: "succeeded", audioPath, attempts: attempt };
      } catch (error) {
        lastError =
          error instanceof SynthesisAttemptError
            ? error
            : new SynthesisAttemptError(signal?.aborted ? "cancelled" : "service", errorMessage(error));
        console.error(`[SynthesisInvoker] Attempt ${attempt} for ${label} failed (${lastError.kind}): ${lastError.message}`);

        if (lastError.kind === "cancelled") {
          break;
        }
        if (attempt < this.options.maxAttempts) {
          const delay = this.options.retryBackoffMs * 2 ** (attempt - 1);
          console.log(`[SynthesisInvoker] Retrying ${label} in ${delay}ms`);
          await this.sleep(delay, signal);
        }
      }
    }

    return this.failed(chunk, lastError.kind, lastError.message, attempt);
  }

  private async callWithTimeout(chunk: TextChunk, signal?: AbortSignal): Promise<Buffer> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle the race as a timeout before the abort can reject the call itself
        reject(new SynthesisAttemptError("timeout", `Synthesis timed out after ${this.options.timeoutMs}ms`));
        controller.abort();
      }, this.options.timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => {
          if (signal?.aborted) {
            reject(new SynthesisAttemptError("cancelled", "Synthesis cancelled"));
          }
        },
        { once: true }
      );
    });
    // Only one of these settles the race; the others must not surface as unhandled.
    timeout.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      return await Promise.race([
        this.synthesizer.synthesize(chunk.text, chunk.voice, { signal: controller.signal }),
        timeout,
        cancelled,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private failed(chunk: TextChunk, failureKind: SynthesisFailureKind, reason: string, attempts: number): FailedSegment {
    return { sequenceIndex: chunk.sequenceIndex, status: "failed", reason, failureKind, attempts };
  }
}
