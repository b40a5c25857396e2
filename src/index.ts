import { mkdirSync } from "fs";
import { Server } from "http";
import { config } from "./infrastructure/config/app.config";
import { createConversionServices } from "./container";
import { JobRetentionCron } from "./infrastructure/cron/job-retention.cron";
import { ConversionController } from "./presentation/controllers/conversion.controller";
import { createApp } from "./app";
import { ConversionJobRunner } from "./application/services/conversion-job-runner.service";

let server: Server | null = null;
let jobRetentionCron: JobRetentionCron | null = null;
let jobRunner: ConversionJobRunner | null = null;

async function main() {
  try {
    mkdirSync(config.uploadDir, { recursive: true });
    mkdirSync(config.outputDir, { recursive: true });

    const services = createConversionServices(config);
    jobRunner = services.jobRunner;

    // Without ffmpeg every multi-chunk merge fails with a MergeError
    if (!(await services.concatenator.isAvailable())) {
      console.error(
        `CRITICAL WARNING: ffmpeg ('${config.ffmpegPath}') was not found. Audio merging will fail. ` +
        "Install ffmpeg or set FFMPEG_PATH."
      );
    }

    const conversionController = new ConversionController(
      services.submitConversionUseCase,
      services.getConversionStatusUseCase,
      services.getConversionResultUseCase,
      services.listConversionJobsUseCase,
      services.cancelConversionUseCase,
      config.synthesis.defaultVoice
    );

    const app = createApp(conversionController, {
      uploadDir: config.uploadDir,
      maxUploadBytes: config.maxUploadBytes,
    });

    jobRetentionCron = new JobRetentionCron(services.cleanupExpiredJobsUseCase, config.jobRetentionMinutes);
    jobRetentionCron.start();

    server = app.listen(config.port, config.host, () => {
      console.log(`Document narration service running on ${config.host}:${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/health`);
      console.log(`API endpoints: http://localhost:${config.port}/api/conversions`);
      console.log(
        `Max concurrent jobs: ${config.maxConcurrentJobs}, chunking: ${config.chunking.enabled} ` +
        `(max ${config.chunking.maxChunkChars} chars), default voice: ${config.synthesis.defaultVoice}`
      );
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  jobRetentionCron?.stop();
  server?.close();
  if (jobRunner) {
    await jobRunner.shutdown();
  }
  process.exit(0);
}

// Handle graceful shutdown
process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error) => {
    console.error("Error during shutdown:", error);
    process.exit(1);
  });
});

process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error) => {
    console.error("Error during shutdown:", error);
    process.exit(1);
  });
});

void main();
