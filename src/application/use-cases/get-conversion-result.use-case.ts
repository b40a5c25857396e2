import { access } from "fs/promises";
import { basename } from "path";
import { JobTracker } from "../services/job-tracker.service";
import { JobNotCompleteError, NotFoundError } from "../../domain/errors/conversion.errors";

export interface GetConversionResultUseCaseParams {
  jobId: string;
}

export interface ConversionResult {
  jobId: string;
  path: string;
  filename: string;
}

export class GetConversionResultUseCase {
  constructor(private jobTracker: JobTracker) {}

  async execute(params: GetConversionResultUseCaseParams): Promise<ConversionResult> {
    const { jobId } = params;
    const job = this.jobTracker.getStatus(jobId);

    if (job.state !== "complete" || !job.resultPath) {
      throw new JobNotCompleteError(jobId, job.state);
    }

    try {
      await access(job.resultPath);
    } catch {
      console.error(`[GetConversionResult] Output file missing for job ${jobId}: ${job.resultPath}`);
      throw new NotFoundError(`Output file for conversion job ${jobId} not found`);
    }

    return { jobId, path: job.resultPath, filename: basename(job.resultPath) };
  }
}
