import { AppConfig } from "./infrastructure/config/app.config";
import { ISpeechSynthesizer } from "./domain/interfaces/ispeech.synthesizer";
import { ITextExtractor } from "./domain/interfaces/itext.extractor";
import { IAudioConcatenator } from "./domain/interfaces/iaudio.concatenator";
import { InMemoryConversionJobRepository } from "./infrastructure/jobs/in-memory.conversion-job.repository";
import { OpenAISpeechSynthesizer } from "./infrastructure/openai/openai.speech.synthesizer";
import { FfmpegAudioConcatenator } from "./infrastructure/audio/ffmpeg.audio.concatenator";
import { DocumentTextExtractor } from "./infrastructure/extraction/document.text.extractor";
import { PdfTextExtractor } from "./infrastructure/extraction/pdf.text.extractor";
import { EpubTextExtractor } from "./infrastructure/extraction/epub.text.extractor";
import { JobTracker } from "./application/services/job-tracker.service";
import { SynthesisInvoker } from "./application/services/synthesis-invoker.service";
import { ChunkSequencer } from "./application/services/chunk-sequencer.service";
import { AudioAssembler } from "./application/services/audio-assembler.service";
import { ConversionJobRunner } from "./application/services/conversion-job-runner.service";
import { RunConversionUseCase } from "./application/use-cases/run-conversion.use-case";
import { SubmitConversionUseCase } from "./application/use-cases/submit-conversion.use-case";
import { GetConversionStatusUseCase } from "./application/use-cases/get-conversion-status.use-case";
import { GetConversionResultUseCase } from "./application/use-cases/get-conversion-result.use-case";
import { ListConversionJobsUseCase } from "./application/use-cases/list-conversion-jobs.use-case";
import { CancelConversionUseCase } from "./application/use-cases/cancel-conversion.use-case";
import { CleanupExpiredJobsUseCase } from "./application/use-cases/cleanup-expired-jobs.use-case";

export interface ConversionServices {
  jobTracker: JobTracker;
  jobRunner: ConversionJobRunner;
  concatenator: FfmpegAudioConcatenator;
  submitConversionUseCase: SubmitConversionUseCase;
  getConversionStatusUseCase: GetConversionStatusUseCase;
  getConversionResultUseCase: GetConversionResultUseCase;
  listConversionJobsUseCase: ListConversionJobsUseCase;
  cancelConversionUseCase: CancelConversionUseCase;
  cleanupExpiredJobsUseCase: CleanupExpiredJobsUseCase;
}

export function createTextExtractor(): ITextExtractor {
  return new DocumentTextExtractor({
    ".pdf": new PdfTextExtractor(),
    ".epub": new EpubTextExtractor(),
  });
}

/**
 * Wires the conversion service. Throws when no speech API key is configured.
 */
export function createConversionServices(config: AppConfig): ConversionServices {
  const apiKey = config.synthesis.apiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is required for speech synthesis");
  }

  const synthesizer: ISpeechSynthesizer = new OpenAISpeechSynthesizer({
    apiKey,
    model: config.synthesis.model,
  });
  const concatenator = new FfmpegAudioConcatenator(config.ffmpegPath);
  const audioConcatenator: IAudioConcatenator = concatenator;

  const jobTracker = new JobTracker(new InMemoryConversionJobRepository());
  const invoker = new SynthesisInvoker(synthesizer, {
    timeoutMs: config.synthesis.timeoutMs,
    maxAttempts: config.synthesis.maxAttempts,
    retryBackoffMs: config.synthesis.retryBackoffMs,
  });
  const sequencer = new ChunkSequencer(invoker, {
    concurrency: config.synthesis.concurrency,
    failurePolicy: config.synthesis.failurePolicy,
  });

  const runConversionUseCase = new RunConversionUseCase(
    jobTracker,
    createTextExtractor(),
    sequencer,
    new AudioAssembler(audioConcatenator),
    {
      maxChunkChars: config.chunking.maxChunkChars,
      workDir: config.workDir,
      outputDir: config.outputDir,
    }
  );
  const jobRunner = new ConversionJobRunner(runConversionUseCase, jobTracker, config.maxConcurrentJobs);

  return {
    jobTracker,
    jobRunner,
    concatenator,
    submitConversionUseCase: new SubmitConversionUseCase(jobTracker, jobRunner, {
      voice: config.synthesis.defaultVoice,
      chunkingEnabled: config.chunking.enabled,
    }),
    getConversionStatusUseCase: new GetConversionStatusUseCase(jobTracker),
    getConversionResultUseCase: new GetConversionResultUseCase(jobTracker),
    listConversionJobsUseCase: new ListConversionJobsUseCase(jobTracker),
    cancelConversionUseCase: new CancelConversionUseCase(jobTracker, jobRunner),
    cleanupExpiredJobsUseCase: new CleanupExpiredJobsUseCase(jobTracker),
  };
}
