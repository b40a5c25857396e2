import * as cron from "node-cron";
import { CleanupExpiredJobsUseCase } from "../../application/use-cases/cleanup-expired-jobs.use-case";

export class JobRetentionCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private cleanupExpiredJobsUseCase: CleanupExpiredJobsUseCase,
    private retentionMinutes: number
  ) {}

  /**
   * Start the cron job to run every minute
   */
  start(): void {
    if (this.task) {
      console.log("[JobRetentionCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("* * * * *", () => this.runCycle());

    console.log(
      `[JobRetentionCron] Started cron job to evict finished jobs older than ${this.retentionMinutes} minutes (runs every minute)`
    );
  }

  async runCycle(now?: Date): Promise<void> {
    if (this.isRunning) {
      console.log("[JobRetentionCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const result = await this.cleanupExpiredJobsUseCase.execute({
        retentionMinutes: this.retentionMinutes,
        now,
      });
      if (result.evicted > 0) {
        const duration = Date.now() - startTime;
        console.log(
          `[JobRetentionCron] Cleanup cycle completed in ${duration}ms: ` +
          `${result.evicted} jobs evicted, ${result.filesRemoved} files removed`
        );
      }
    } catch (error) {
      const duration = Date.now() - startTime;
      console.error(`[JobRetentionCron] Error in cleanup cycle (${duration}ms):`, error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[JobRetentionCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
