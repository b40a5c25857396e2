import { rm } from "fs/promises";
import { JobTracker } from "../services/job-tracker.service";
import { errorMessage } from "../../domain/errors/conversion.errors";

export interface CleanupExpiredJobsUseCaseParams {
  retentionMinutes: number;
  now?: Date;
}

export interface CleanupExpiredJobsResult {
  evicted: number;
  filesRemoved: number;
}

export class CleanupExpiredJobsUseCase {
  constructor(private jobTracker: JobTracker) {}

  /**
   * Evicts terminal jobs past the retention window and deletes their output
   * audio. Retained temp directories of failed jobs are left for operators.
   */
  async execute(params: CleanupExpiredJobsUseCaseParams): Promise<CleanupExpiredJobsResult> {
    const evicted = this.jobTracker.evictExpired(params.retentionMinutes * 60 * 1000, params.now);

    let filesRemoved = 0;
    for (const job of evicted) {
      if (!job.resultPath) continue;
      try {
        await rm(job.resultPath, { force: true });
        filesRemoved++;
      } catch (error) {
        console.warn(`[CleanupExpiredJobs] Could not remove ${job.resultPath} for job ${job.id}: ${errorMessage(error)}`);
      }
    }

    return { evicted: evicted.length, filesRemoved };
  }
}
