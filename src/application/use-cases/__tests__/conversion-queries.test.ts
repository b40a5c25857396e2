import { beforeEach, describe, expect, it } from "vitest";
import { access, writeFile } from "fs/promises";
import { join } from "path";
import { GetConversionResultUseCase } from "../get-conversion-result.use-case";
import { GetConversionStatusUseCase } from "../get-conversion-status.use-case";
import { ListConversionJobsUseCase } from "../list-conversion-jobs.use-case";
import { CancelConversionUseCase } from "../cancel-conversion.use-case";
import { CleanupExpiredJobsUseCase } from "../cleanup-expired-jobs.use-case";
import { JobTracker } from "../../services/job-tracker.service";
import { ConversionJobRunner } from "../../services/conversion-job-runner.service";
import { InMemoryConversionJobRepository } from "../../../infrastructure/jobs/in-memory.conversion-job.repository";
import { makeTempDir } from "../../../__tests__/support/fakes";
import {
  InvalidStateTransitionError,
  JobNotCompleteError,
  NotFoundError,
} from "../../../domain/errors/conversion.errors";

describe("conversion queries and commands", () => {
  let dir: string;
  let tracker: JobTracker;

  const createJob = (sourcePath = join(dir, "upload.pdf")) =>
    tracker.create({
      voice: "alloy",
      chunkingEnabled: true,
      sourcePath,
      originalFilename: "upload.pdf",
      outputFilename: () => "upload.mp3",
    });

  const complete = async (jobId: string) => {
    const resultPath = join(dir, "upload.mp3");
    await writeFile(resultPath, "audio");
    tracker.markProcessing(jobId, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });
    tracker.markComplete(jobId, resultPath);
    return resultPath;
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    tracker = new JobTracker(new InMemoryConversionJobRepository());
  });

  describe("GetConversionStatusUseCase", () => {
    it("returns the latest snapshot", () => {
      const job = createJob();
      expect(new GetConversionStatusUseCase(tracker).execute({ jobId: job.id })).toEqual(job);
    });

    it("throws NotFoundError for unknown ids", () => {
      expect(() => new GetConversionStatusUseCase(tracker).execute({ jobId: "nope" })).toThrow(NotFoundError);
    });
  });

  describe("GetConversionResultUseCase", () => {
    it("returns the audio path of a complete job", async () => {
      const job = createJob();
      const resultPath = await complete(job.id);

      const result = await new GetConversionResultUseCase(tracker).execute({ jobId: job.id });

      expect(result).toEqual({ jobId: job.id, path: resultPath, filename: "upload.mp3" });
    });

    it("refuses a job that is not complete", async () => {
      const job = createJob();
      await expect(new GetConversionResultUseCase(tracker).execute({ jobId: job.id })).rejects.toThrow(JobNotCompleteError);
    });

    it("reports a missing output file as not found", async () => {
      const job = createJob();
      tracker.markProcessing(job.id, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });
      tracker.markComplete(job.id, join(dir, "gone.mp3"));

      await expect(new GetConversionResultUseCase(tracker).execute({ jobId: job.id })).rejects.toThrow(
        `Output file for conversion job ${job.id} not found`
      );
    });
  });

  describe("ListConversionJobsUseCase", () => {
    it("lists all jobs", () => {
      createJob();
      createJob();
      expect(new ListConversionJobsUseCase(tracker).execute()).toHaveLength(2);
    });
  });

  describe("CancelConversionUseCase", () => {
    const idleRunner = () => new ConversionJobRunner({ execute: async () => undefined }, tracker, 1);

    it("cancels a queued job and removes its upload", async () => {
      const sourcePath = join(dir, "queued.pdf");
      await writeFile(sourcePath, "%PDF-placeholder");
      const job = createJob(sourcePath);

      const cancelled = await new CancelConversionUseCase(tracker, idleRunner()).execute({ jobId: job.id });

      expect(cancelled.state).toBe("error");
      expect(cancelled.errorDetail?.reason).toBe("cancelled");
      await expect(access(sourcePath)).rejects.toThrow();
    });

    it("refuses to cancel a finished job", async () => {
      const job = createJob();
      await complete(job.id);

      await expect(new CancelConversionUseCase(tracker, idleRunner()).execute({ jobId: job.id })).rejects.toThrow(
        InvalidStateTransitionError
      );
    });
  });

  describe("CleanupExpiredJobsUseCase", () => {
    it("evicts expired jobs and deletes their audio", async () => {
      const job = createJob();
      const resultPath = await complete(job.id);
      const completedAt = tracker.getStatus(job.id).completedAt ?? new Date();

      const result = await new CleanupExpiredJobsUseCase(tracker).execute({
        retentionMinutes: 60,
        now: new Date(completedAt.getTime() + 61 * 60 * 1000),
      });

      expect(result).toEqual({ evicted: 1, filesRemoved: 1 });
      expect(tracker.find(job.id)).toBeNull();
      await expect(access(resultPath)).rejects.toThrow();
    });

    it("keeps jobs inside the retention window", async () => {
      const job = createJob();
      await complete(job.id);

      const result = await new CleanupExpiredJobsUseCase(tracker).execute({ retentionMinutes: 60 });

      expect(result).toEqual({ evicted: 0, filesRemoved: 0 });
      expect(tracker.find(job.id)?.state).toBe("complete");
    });
  });
});
