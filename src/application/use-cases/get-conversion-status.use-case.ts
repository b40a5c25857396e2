import { ConversionJob } from "../../domain/entities/conversion-job";
import { JobTracker } from "../services/job-tracker.service";

export interface GetConversionStatusUseCaseParams {
  jobId: string;
}

export class GetConversionStatusUseCase {
  constructor(private jobTracker: JobTracker) {}

  /**
   * Side-effect free read of the latest snapshot. Throws NotFoundError for
   * unknown or evicted ids.
   */
  execute(params: GetConversionStatusUseCaseParams): ConversionJob {
    return this.jobTracker.getStatus(params.jobId);
  }
}
