import { Request, Response } from "express";
import { rm } from "fs/promises";
import { SubmitConversionUseCase } from "../../application/use-cases/submit-conversion.use-case";
import { GetConversionStatusUseCase } from "../../application/use-cases/get-conversion-status.use-case";
import { GetConversionResultUseCase } from "../../application/use-cases/get-conversion-result.use-case";
import { ListConversionJobsUseCase } from "../../application/use-cases/list-conversion-jobs.use-case";
import { CancelConversionUseCase } from "../../application/use-cases/cancel-conversion.use-case";
import { DEFAULT_SPEECH_VOICE, SpeechVoiceId, SpeechVoices } from "../../domain/enums/speech.voices";
import { errorMessage } from "../../domain/errors/conversion.errors";
import {
  ConversionListResponse,
  ConversionStatusResponse,
  SubmitConversionResponse,
  toConversionStatusResponse,
} from "../dto/conversion.dto";
import { sendError } from "../middleware/error.middleware";

export interface VoicesResponse {
  defaultVoice: SpeechVoiceId;
  voices: ReadonlyArray<{ id: string; name: string }>;
}

export class ConversionController {
  constructor(
    private submitConversionUseCase: SubmitConversionUseCase,
    private getConversionStatusUseCase: GetConversionStatusUseCase,
    private getConversionResultUseCase: GetConversionResultUseCase,
    private listConversionJobsUseCase: ListConversionJobsUseCase,
    private cancelConversionUseCase: CancelConversionUseCase,
    private defaultVoice: SpeechVoiceId = DEFAULT_SPEECH_VOICE
  ) {}

  async submitConversion(req: Request, res: Response): Promise<void> {
    const file = req.file;
    try {
      if (!file) {
        res.status(400).json({ error: "No file part" });
        return;
      }

      const chunking = parseChunkingFlag(req.body?.chunking);
      if (chunking === null) {
        await discardUpload(file.path);
        res.status(400).json({ error: "chunking must be 'true' or 'false'" });
        return;
      }

      const job = this.submitConversionUseCase.execute({
        sourcePath: file.path,
        originalFilename: file.originalname,
        voice: typeof req.body?.voice === "string" ? req.body.voice : undefined,
        chunkingEnabled: chunking,
      });

      const response: SubmitConversionResponse = {
        jobId: job.id,
        status: "queued",
        message: "File uploaded and conversion started.",
      };
      res.status(202).json(response);
    } catch (error) {
      if (file) {
        await discardUpload(file.path);
      }
      sendError(res, error, "Failed to start conversion");
    }
  }

  async getStatus(req: Request, res: Response): Promise<void> {
    try {
      const job = this.getConversionStatusUseCase.execute({ jobId: req.params.jobId });
      const response: ConversionStatusResponse = toConversionStatusResponse(job);
      res.json(response);
    } catch (error) {
      sendError(res, error, "Failed to get conversion status");
    }
  }

  async download(req: Request, res: Response): Promise<void> {
    try {
      const result = await this.getConversionResultUseCase.execute({ jobId: req.params.jobId });
      console.log(`[ConversionController] Sending file: ${result.path}`);
      res.download(result.path, result.filename, (error) => {
        if (error && !res.headersSent) {
          sendError(res, error, "Failed to send audio file");
        } else if (error) {
          console.error(`[ConversionController] Download of ${result.path} interrupted:`, error);
        }
      });
    } catch (error) {
      sendError(res, error, "Failed to download audio");
    }
  }

  async listJobs(_req: Request, res: Response): Promise<void> {
    try {
      const response: ConversionListResponse = {
        jobs: this.listConversionJobsUseCase.execute().map(toConversionStatusResponse),
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, "Failed to list conversions");
    }
  }

  async cancel(req: Request, res: Response): Promise<void> {
    try {
      const job = await this.cancelConversionUseCase.execute({ jobId: req.params.jobId });
      res.json(toConversionStatusResponse(job));
    } catch (error) {
      sendError(res, error, "Failed to cancel conversion");
    }
  }

  async getVoices(_req: Request, res: Response): Promise<void> {
    const response: VoicesResponse = { defaultVoice: this.defaultVoice, voices: SpeechVoices };
    res.json(response);
  }
}

/**
 * Multipart form values arrive as strings. undefined means "use the default",
 * null means the value is not a boolean.
 */
export function parseChunkingFlag(value: unknown): boolean | undefined | null {
  if (value === undefined || value === "") return undefined;
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return null;
}

async function discardUpload(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    console.warn(`[ConversionController] Could not remove rejected upload ${path}: ${errorMessage(error)}`);
  }
}
