import { ConversionJob } from "../../domain/entities/conversion-job";
import { JobTracker } from "../services/job-tracker.service";

export class ListConversionJobsUseCase {
  constructor(private jobTracker: JobTracker) {}

  /**
   * All jobs still held by this process, most recent first
   */
  execute(): ConversionJob[] {
    return this.jobTracker.list();
  }
}
