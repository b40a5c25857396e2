import { ConversionJobState, ConversionStage } from "../entities/conversion-job";
import { SynthesisFailureKind } from "../entities/synthesized-segment";

export interface ConversionErrorOptions {
  retainedPath?: string;
  cause?: unknown;
}

/**
 * Base class for every failure a conversion stage can record on a job.
 */
export class ConversionError extends Error {
  readonly retainedPath?: string;

  constructor(
    message: string,
    readonly stage: ConversionStage | undefined,
    readonly retryable: boolean,
    options?: ConversionErrorOptions
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.retainedPath = options?.retainedPath;
  }
}

export class ParseError extends ConversionError {
  constructor(message: string, options?: ConversionErrorOptions) {
    super(message, "extracting", false, options);
  }
}

export class UnsupportedFileTypeError extends ParseError {
  constructor(readonly extension: string) {
    super(`Unsupported file type '${extension}'. Only '.pdf' and '.epub' are supported.`);
  }
}

export class ChunkLimitError extends ConversionError {
  constructor(message: string) {
    super(message, "chunking", false);
  }
}

export class SynthesisError extends ConversionError {
  readonly chunkIndex: number;

  constructor(
    readonly failedChunkIndices: number[],
    readonly kind: SynthesisFailureKind,
    message: string,
    options?: ConversionErrorOptions
  ) {
    super(message, "synthesizing", kind !== "cancelled", options);
    this.chunkIndex = failedChunkIndices.length > 0 ? Math.min(...failedChunkIndices) : -1;
  }
}

export class MergeError extends ConversionError {
  constructor(message: string, options?: ConversionErrorOptions) {
    super(message, "merging", false, options);
  }
}

export class JobCancelledError extends ConversionError {
  constructor(jobId: string, stage?: ConversionStage, options?: ConversionErrorOptions) {
    super(`Conversion job ${jobId} was cancelled`, stage, false, options);
  }
}

/**
 * Raised by the external concatenation tool wrapper (missing binary, nonzero exit).
 */
export class ToolError extends Error {
  constructor(message: string, readonly exitCode?: number, readonly stderr?: string) {
    super(message);
    this.name = "ToolError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }

  static forJob(jobId: string): NotFoundError {
    return new NotFoundError(`Conversion job ${jobId} not found`);
  }
}

export class JobNotCompleteError extends Error {
  constructor(readonly jobId: string, readonly state: ConversionJobState) {
    super(`Conversion job ${jobId} is not complete (current state: ${state})`);
    this.name = "JobNotCompleteError";
  }
}

export class InvalidStateTransitionError extends Error {
  constructor(readonly jobId: string, readonly from: ConversionJobState, readonly to: ConversionJobState) {
    super(`Conversion job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidStateTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
