import { JobTracker } from "./job-tracker.service";
import { isTerminalState } from "../../domain/entities/conversion-job";

export interface ConversionTask {
  execute(jobId: string, signal: AbortSignal): Promise<void>;
}

interface RunningJob {
  controller: AbortController;
  promise: Promise<void>;
}

/**
 * Runs queued jobs in the background, at most maxConcurrentJobs at a time, in
 * submission order. enqueue() returns immediately.
 */
export class ConversionJobRunner {
  private readonly queue: string[] = [];
  private readonly running = new Map<string, RunningJob>();
  private idleWaiters: Array<() => void> = [];

  constructor(
    private task: ConversionTask,
    private jobTracker: JobTracker,
    private maxConcurrentJobs: number
  ) {}

  enqueue(jobId: string): void {
    this.queue.push(jobId);
    console.log(`[ConversionJobRunner] Job ${jobId} queued (${this.queue.length} waiting, ${this.running.size} running)`);
    this.pump();
  }

  /**
   * Marks the job as cancelled and stops any work in flight for it.
   * Throws NotFoundError / InvalidStateTransitionError from the tracker.
   */
  cancel(jobId: string): void {
    this.jobTracker.cancel(jobId);

    const position = this.queue.indexOf(jobId);
    if (position >= 0) {
      this.queue.splice(position, 1);
    }
    this.running.get(jobId)?.controller.abort();
    console.log(`[ConversionJobRunner] Job ${jobId} cancelled`);
  }

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Resolves once nothing is queued or running.
   */
  whenIdle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Aborts everything in flight and waits for it to wind down.
   */
  async shutdown(): Promise<void> {
    this.queue.length = 0;
    for (const job of this.running.values()) {
      job.controller.abort();
    }
    await Promise.all(Array.from(this.running.values(), (job) => job.promise));
  }

  private pump(): void {
    while (this.running.size < this.maxConcurrentJobs && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;
      this.start(jobId);
    }
    this.notifyIfIdle();
  }

  private start(jobId: string): void {
    const job = this.jobTracker.find(jobId);
    if (!job || isTerminalState(job.state)) {
      console.log(`[ConversionJobRunner] Skipping job ${jobId} (no longer pending)`);
      return;
    }

    const controller = new AbortController();
    const promise = this.task
      .execute(jobId, controller.signal)
      .catch((error) => {
        console.error(`[ConversionJobRunner] Job ${jobId} crashed:`, error);
      })
      .finally(() => {
        this.running.delete(jobId);
        this.pump();
      });
    this.running.set(jobId, { controller, promise });
  }

  private notifyIfIdle(): void {
    if (this.running.size > 0 || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
