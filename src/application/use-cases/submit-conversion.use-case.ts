import { extname, basename } from "path";
import { ConversionJob } from "../../domain/entities/conversion-job";
import { SpeechVoiceId, resolveSpeechVoice } from "../../domain/enums/speech.voices";
import { UnsupportedFileTypeError } from "../../domain/errors/conversion.errors";
import { JobTracker } from "../services/job-tracker.service";
import { ConversionJobRunner } from "../services/conversion-job-runner.service";

export const SUPPORTED_DOCUMENT_EXTENSIONS = [".pdf", ".epub"] as const;

export interface SubmitConversionUseCaseParams {
  sourcePath: string; // Document already written to disk
  originalFilename: string;
  voice?: string;
  chunkingEnabled?: boolean;
}

export interface SubmitConversionDefaults {
  voice: SpeechVoiceId;
  chunkingEnabled: boolean;
}

export function isSupportedDocument(filename: string): boolean {
  const extension = extname(filename).toLowerCase();
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * "My Book (final).epub" + job id → "My_Book_final_1a2b3c4d.mp3"
 */
export function buildOutputFilename(originalFilename: string, jobId: string): string {
  const base = basename(originalFilename, extname(originalFilename))
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[._]+|_+$/g, "");
  return `${base || "audio"}_${jobId.slice(0, 8)}.mp3`;
}

export class SubmitConversionUseCase {
  constructor(
    private jobTracker: JobTracker,
    private jobRunner: ConversionJobRunner,
    private defaults: SubmitConversionDefaults
  ) {}

  /**
   * Registers the job and hands it to the background runner. Returns the
   * queued job without waiting for any conversion work.
   */
  execute(params: SubmitConversionUseCaseParams): ConversionJob {
    const { sourcePath, originalFilename } = params;

    if (!isSupportedDocument(originalFilename)) {
      throw new UnsupportedFileTypeError(extname(originalFilename).toLowerCase() || originalFilename);
    }

    const voice = resolveSpeechVoice(params.voice, this.defaults.voice);
    const chunkingEnabled = params.chunkingEnabled ?? this.defaults.chunkingEnabled;

    const job = this.jobTracker.create({
      voice,
      chunkingEnabled,
      sourcePath,
      originalFilename,
      outputFilename: (jobId) => buildOutputFilename(originalFilename, jobId),
    });

    this.jobRunner.enqueue(job.id);
    console.log(`[SubmitConversion] Task ${job.id} submitted (voice: ${voice}, chunking: ${chunkingEnabled})`);
    return job;
  }
}
