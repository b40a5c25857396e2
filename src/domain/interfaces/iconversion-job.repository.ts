import { ConversionJob } from "../entities/conversion-job";

/**
 * Keyed store of job snapshots. save() replaces the whole record; readers never
 * observe a partially updated job.
 */
export interface IConversionJobRepository {
  findById(id: string): ConversionJob | null;
  findAll(): ConversionJob[];
  save(job: ConversionJob): void;
  delete(id: string): boolean;
}
