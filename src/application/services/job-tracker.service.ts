import { randomUUID } from "crypto";
import {
  ConversionErrorDetail,
  ConversionJob,
  ConversionJobState,
  ConversionProgress,
  isTerminalState,
} from "../../domain/entities/conversion-job";
import { IConversionJobRepository } from "../../domain/interfaces/iconversion-job.repository";
import { InvalidStateTransitionError, NotFoundError } from "../../domain/errors/conversion.errors";

export interface CreateConversionJobParams {
  voice: string;
  chunkingEnabled: boolean;
  sourcePath: string;
  originalFilename: string;
  outputFilename: (jobId: string) => string;
}

const ALLOWED_TRANSITIONS: Record<ConversionJobState, ConversionJobState[]> = {
  queued: ["processing", "error"],
  processing: ["processing", "complete", "error"],
  complete: [],
  error: [],
};

/**
 * Owns the id → job mapping and the job state machine:
 * queued → processing → (complete | error). Terminal states are final.
 *
 * Every change publishes a new snapshot with an incremented version; readers
 * always get a whole, consistent record.
 */
export class JobTracker {
  constructor(private repository: IConversionJobRepository) {}

  create(params: CreateConversionJobParams): ConversionJob {
    const id = randomUUID();
    const now = new Date();
    const job: ConversionJob = {
      id,
      state: "queued",
      progress: { currentChunk: 0, totalChunks: 0, message: "Waiting to start..." },
      version: 1,
      voice: params.voice,
      chunkingEnabled: params.chunkingEnabled,
      sourcePath: params.sourcePath,
      originalFilename: params.originalFilename,
      outputFilename: params.outputFilename(id),
      createdAt: now,
      updatedAt: now,
    };
    this.repository.save(job);
    console.log(`[JobTracker] Job ${id} created for ${params.originalFilename}`);
    return job;
  }

  getStatus(jobId: string): ConversionJob {
    const job = this.repository.findById(jobId);
    if (!job) {
      throw NotFoundError.forJob(jobId);
    }
    return job;
  }

  find(jobId: string): ConversionJob | null {
    return this.repository.findById(jobId);
  }

  list(): ConversionJob[] {
    return this.repository.findAll();
  }

  markProcessing(jobId: string, progress: ConversionProgress): ConversionJob {
    return this.transition(jobId, "processing", (job) => ({
      ...job,
      progress,
      startedAt: job.startedAt ?? new Date(),
    }));
  }

  /**
   * Publishes new progress for a processing job. Returns false, without
   * changing anything, once the job is terminal (e.g. cancelled meanwhile).
   */
  updateProgress(jobId: string, progress: ConversionProgress): boolean {
    const job = this.getStatus(jobId);
    if (job.state !== "processing") {
      return false;
    }
    this.transition(jobId, "processing", (current) => ({ ...current, progress }));
    return true;
  }

  markComplete(jobId: string, resultPath: string): ConversionJob {
    const job = this.transition(jobId, "complete", (current) => ({
      ...current,
      resultPath,
      progress: {
        ...current.progress,
        currentChunk: current.progress.totalChunks,
        message: "Conversion successful!",
      },
      completedAt: new Date(),
    }));
    console.log(`[JobTracker] Job ${jobId} complete. Output: ${resultPath}`);
    return job;
  }

  markError(jobId: string, errorDetail: ConversionErrorDetail): ConversionJob {
    const job = this.transition(jobId, "error", (current) => ({
      ...current,
      errorDetail,
      progress: { ...current.progress, message: `Error: ${errorDetail.message}` },
      completedAt: new Date(),
    }));
    console.error(`[JobTracker] Job ${jobId} failed: ${errorDetail.message}`);
    return job;
  }

  cancel(jobId: string): ConversionJob {
    return this.markError(jobId, { message: "Conversion cancelled", reason: "cancelled" });
  }

  /**
   * Removes terminal jobs whose completion is older than retentionMs.
   * Returns the removed snapshots so their artifacts can be cleaned up.
   */
  evictExpired(retentionMs: number, now: Date = new Date()): ConversionJob[] {
    const evicted: ConversionJob[] = [];
    for (const job of this.repository.findAll()) {
      if (!isTerminalState(job.state) || !job.completedAt) continue;
      if (now.getTime() - job.completedAt.getTime() < retentionMs) continue;
      if (this.repository.delete(job.id)) {
        evicted.push(job);
      }
    }
    if (evicted.length > 0) {
      console.log(`[JobTracker] Evicted ${evicted.length} expired jobs: ${evicted.map((j) => j.id).join(", ")}`);
    }
    return evicted;
  }

  private transition(
    jobId: string,
    to: ConversionJobState,
    apply: (job: ConversionJob) => ConversionJob
  ): ConversionJob {
    const job = this.getStatus(jobId);
    if (!ALLOWED_TRANSITIONS[job.state].includes(to)) {
      throw new InvalidStateTransitionError(jobId, job.state, to);
    }
    const next: ConversionJob = {
      ...apply(job),
      id: job.id,
      state: to,
      version: job.version + 1,
      updatedAt: new Date(),
    };
    this.repository.save(next);
    return next;
  }
}
