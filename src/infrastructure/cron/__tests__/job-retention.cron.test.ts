import { describe, expect, it } from "vitest";
import { JobRetentionCron } from "../job-retention.cron";
import { CleanupExpiredJobsUseCase } from "../../../application/use-cases/cleanup-expired-jobs.use-case";
import { JobTracker } from "../../../application/services/job-tracker.service";
import { InMemoryConversionJobRepository } from "../../jobs/in-memory.conversion-job.repository";

describe("JobRetentionCron", () => {
  it("evicts expired jobs on each cycle", async () => {
    const tracker = new JobTracker(new InMemoryConversionJobRepository());
    const job = tracker.create({
      voice: "alloy",
      chunkingEnabled: true,
      sourcePath: "/uploads/a.pdf",
      originalFilename: "a.pdf",
      outputFilename: () => "a.mp3",
    });
    tracker.cancel(job.id);
    const cron = new JobRetentionCron(new CleanupExpiredJobsUseCase(tracker), 5);

    await cron.runCycle(new Date(Date.now() + 4 * 60 * 1000));
    expect(tracker.find(job.id)).not.toBeNull();

    await cron.runCycle(new Date(Date.now() + 6 * 60 * 1000));
    expect(tracker.find(job.id)).toBeNull();
  });

  it("starts and stops its schedule", () => {
    const cron = new JobRetentionCron(
      new CleanupExpiredJobsUseCase(new JobTracker(new InMemoryConversionJobRepository())),
      60
    );

    cron.start();
    expect(cron.isActive()).toBe(true);
    cron.stop();
    expect(cron.isActive()).toBe(false);
  });
});
