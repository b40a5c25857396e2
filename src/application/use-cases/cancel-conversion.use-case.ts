import { rm } from "fs/promises";
import { ConversionJob } from "../../domain/entities/conversion-job";
import { errorMessage } from "../../domain/errors/conversion.errors";
import { JobTracker } from "../services/job-tracker.service";
import { ConversionJobRunner } from "../services/conversion-job-runner.service";

export interface CancelConversionUseCaseParams {
  jobId: string;
}

export class CancelConversionUseCase {
  constructor(
    private jobTracker: JobTracker,
    private jobRunner: ConversionJobRunner
  ) {}

  async execute(params: CancelConversionUseCaseParams): Promise<ConversionJob> {
    const { jobId } = params;
    const before = this.jobTracker.getStatus(jobId);
    this.jobRunner.cancel(jobId);

    // A queued job never reaches the runner, so its upload is removed here
    if (before.state === "queued") {
      try {
        await rm(before.sourcePath, { force: true });
      } catch (error) {
        console.warn(`[CancelConversion] Could not remove upload for job ${jobId}: ${errorMessage(error)}`);
      }
    }
    return this.jobTracker.getStatus(jobId);
  }
}
