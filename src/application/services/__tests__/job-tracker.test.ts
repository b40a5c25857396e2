import { beforeEach, describe, expect, it } from "vitest";
import { JobTracker } from "../job-tracker.service";
import { InMemoryConversionJobRepository } from "../../../infrastructure/jobs/in-memory.conversion-job.repository";
import { InvalidStateTransitionError, NotFoundError } from "../../../domain/errors/conversion.errors";

describe("JobTracker", () => {
  let tracker: JobTracker;

  const createJob = () =>
    tracker.create({
      voice: "alloy",
      chunkingEnabled: true,
      sourcePath: "/uploads/book.epub",
      originalFilename: "book.epub",
      outputFilename: (id) => `book_${id.slice(0, 8)}.mp3`,
    });

  beforeEach(() => {
    tracker = new JobTracker(new InMemoryConversionJobRepository());
  });

  it("creates a queued job at version 1", () => {
    const job = createJob();

    expect(job.state).toBe("queued");
    expect(job.version).toBe(1);
    expect(job.progress).toEqual({ currentChunk: 0, totalChunks: 0, message: "Waiting to start..." });
    expect(job.outputFilename).toBe(`book_${job.id.slice(0, 8)}.mp3`);
    expect(tracker.getStatus(job.id)).toEqual(job);
  });

  it("gives every job a distinct id", () => {
    const ids = new Set([createJob().id, createJob().id, createJob().id]);
    expect(ids.size).toBe(3);
  });

  it("throws NotFoundError for an unknown id", () => {
    expect(() => tracker.getStatus("missing")).toThrow(NotFoundError);
    expect(() => tracker.getStatus("missing")).toThrow("Conversion job missing not found");
    expect(tracker.find("missing")).toBeNull();
  });

  it("walks queued → processing → complete, bumping the version each time", () => {
    const { id } = createJob();

    tracker.markProcessing(id, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });
    tracker.updateProgress(id, { stage: "synthesizing", currentChunk: 1, totalChunks: 3, message: "Converting chunk 2/3 to audio..." });
    const done = tracker.markComplete(id, "/out/book.mp3");

    expect(done.state).toBe("complete");
    expect(done.version).toBe(4);
    expect(done.resultPath).toBe("/out/book.mp3");
    expect(done.progress).toEqual({
      stage: "synthesizing",
      currentChunk: 3,
      totalChunks: 3,
      message: "Conversion successful!",
    });
    expect(done.startedAt).toBeInstanceOf(Date);
    expect(done.completedAt).toBeInstanceOf(Date);
  });

  it("records the error detail and message on failure", () => {
    const { id } = createJob();
    tracker.markProcessing(id, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });

    const failed = tracker.markError(id, { message: "Merging audio chunks failed: disk full", reason: "failed", stage: "merging" });

    expect(failed.state).toBe("error");
    expect(failed.progress.message).toBe("Error: Merging audio chunks failed: disk full");
    expect(failed.errorDetail).toEqual({ message: "Merging audio chunks failed: disk full", reason: "failed", stage: "merging" });
  });

  it("never leaves a terminal state", () => {
    const { id } = createJob();
    tracker.markProcessing(id, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });
    tracker.markComplete(id, "/out/book.mp3");

    expect(() => tracker.markError(id, { message: "late", reason: "failed" })).toThrow(InvalidStateTransitionError);
    expect(() => tracker.markProcessing(id, { currentChunk: 0, totalChunks: 0, message: "again" })).toThrow(
      InvalidStateTransitionError
    );
    expect(tracker.updateProgress(id, { currentChunk: 9, totalChunks: 9, message: "late progress" })).toBe(false);
    expect(tracker.getStatus(id).version).toBe(3);
  });

  it("cannot complete a job that never started", () => {
    const { id } = createJob();
    expect(() => tracker.markComplete(id, "/out/x.mp3")).toThrow("cannot move from queued to complete");
  });

  it("cancels a queued job into the error state", () => {
    const { id } = createJob();

    const cancelled = tracker.cancel(id);

    expect(cancelled.state).toBe("error");
    expect(cancelled.errorDetail).toEqual({ message: "Conversion cancelled", reason: "cancelled" });
  });

  it("hands out snapshots that later updates do not change", () => {
    const { id } = createJob();
    const before = tracker.getStatus(id);

    tracker.markProcessing(id, { currentChunk: 0, totalChunks: 0, message: "Starting conversion..." });

    expect(before.state).toBe("queued");
    expect(before.version).toBe(1);
  });

  it("evicts only terminal jobs past the retention window", () => {
    const finished = createJob();
    tracker.cancel(finished.id);
    const pending = createJob();
    const completedAt = tracker.getStatus(finished.id).completedAt ?? new Date();

    expect(tracker.evictExpired(60_000, new Date(completedAt.getTime() + 30_000))).toEqual([]);

    const evicted = tracker.evictExpired(60_000, new Date(completedAt.getTime() + 60_000));

    expect(evicted.map((job) => job.id)).toEqual([finished.id]);
    expect(tracker.find(finished.id)).toBeNull();
    expect(tracker.find(pending.id)?.state).toBe("queued");
  });

  it("lists every known job", () => {
    const first = createJob();
    const second = createJob();
    const listed = tracker.list().map((job) => job.id);
    expect(listed).toHaveLength(2);
    expect(new Set(listed)).toEqual(new Set([first.id, second.id]));
  });
});
