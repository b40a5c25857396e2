import { mkdtemp, rm } from "fs/promises";
import { join } from "path";

/**
 * Job-scoped temporary directory for per-chunk audio and merge scratch files.
 * Deleted on success, retained on failure.
 */
export class JobWorkspace {
  private released = false;

  private constructor(readonly path: string, private readonly jobId: string) {}

  static async create(parentDir: string, jobId: string): Promise<JobWorkspace> {
    const path = await mkdtemp(join(parentDir, `tts_chunks_${jobId.slice(0, 8)}_`));
    console.log(`[JobWorkspace] Created temporary directory for job ${jobId}: ${path}`);
    return new JobWorkspace(path, jobId);
  }

  /**
   * File name for a chunk's audio; numbered from 1 in document order.
   */
  segmentPath(sequenceIndex: number): string {
    return join(this.path, `chunk_${String(sequenceIndex + 1).padStart(3, "0")}.mp3`);
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    await rm(this.path, { recursive: true, force: true });
    this.released = true;
    console.log(`[JobWorkspace] Removed temporary directory for job ${this.jobId}: ${this.path}`);
  }

  retain(): string {
    console.error(`[JobWorkspace] Temporary files for job ${this.jobId} kept in: ${this.path}`);
    return this.path;
  }
}
