import { ConversionJob } from "../../domain/entities/conversion-job";
import { IConversionJobRepository } from "../../domain/interfaces/iconversion-job.repository";

/**
 * Process-local job store. Jobs do not survive a restart.
 *
 * Records are cloned on the way in and on the way out, so a caller holding a
 * snapshot can never see it change underneath it and a writer can only publish
 * a new version through save().
 */
export class InMemoryConversionJobRepository implements IConversionJobRepository {
  private readonly jobs = new Map<string, ConversionJob>();

  findById(id: string): ConversionJob | null {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  findAll(): ConversionJob[] {
    return Array.from(this.jobs.values())
      .map((job) => structuredClone(job))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  save(job: ConversionJob): void {
    this.jobs.set(job.id, structuredClone(job));
  }

  delete(id: string): boolean {
    return this.jobs.delete(id);
  }
}
