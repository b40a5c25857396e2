export const ConversionJobStates = ["queued", "processing", "complete", "error"] as const;

export type ConversionJobState = typeof ConversionJobStates[number];

export type ConversionStage = "extracting" | "chunking" | "synthesizing" | "merging";

export interface ConversionProgress {
  stage?: ConversionStage;
  currentChunk: number; // Chunks synthesized so far, counted in document order
  totalChunks: number;
  message: string; // Human-readable status line, e.g. "Converting chunk 2/5 to audio..."
}

export interface ConversionErrorDetail {
  message: string;
  reason: "failed" | "cancelled";
  stage?: ConversionStage;
  chunkIndex?: number; // First failing chunk (zero-based)
  failedChunkIndices?: number[];
  retainedPath?: string; // Temp directory kept on disk for diagnosis
}

export interface ConversionJob {
  id: string;
  state: ConversionJobState;
  progress: ConversionProgress;
  version: number; // Incremented on every published snapshot
  voice: string;
  chunkingEnabled: boolean;
  sourcePath: string; // Uploaded document on disk
  originalFilename: string;
  outputFilename: string;
  resultPath?: string; // Only set in "complete"
  errorDetail?: ConversionErrorDetail; // Only set in "error"
  startedAt?: Date;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export function isTerminalState(state: ConversionJobState): boolean {
  return state === "complete" || state === "error";
}
