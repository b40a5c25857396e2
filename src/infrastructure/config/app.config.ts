/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { tmpdir } from "os";
import { DEFAULT_SPEECH_VOICE, SpeechVoiceId, isSpeechVoice } from "../../domain/enums/speech.voices";
import type { FailurePolicy } from "../../application/services/chunk-sequencer.service";

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  // Server
  host: string;
  port: number;
  maxConcurrentJobs: number; // Jobs running at once; the rest wait queued

  // Storage
  uploadDir: string;
  outputDir: string;
  workDir: string; // Parent of per-job temp directories
  maxUploadBytes: number;

  // Chunking
  chunking: {
    enabled: boolean;
    maxChunkChars: number;
  };

  // Speech synthesis
  synthesis: {
    apiKey?: string;
    model: string;
    defaultVoice: SpeechVoiceId;
    timeoutMs: number;
    maxAttempts: number; // 1 = no retry
    retryBackoffMs: number;
    concurrency: number; // Chunks in flight per job
    failurePolicy: FailurePolicy;
  };

  // Merging
  ffmpegPath: string;

  // Retention
  jobRetentionMinutes: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be "true" or "false" (got "${env[name]}")`);
}

function readFailurePolicy(env: Env): FailurePolicy {
  const raw = env.FAILURE_POLICY?.trim() || "fail-fast";
  if (raw !== "fail-fast" && raw !== "fail-complete") {
    throw new Error(`FAILURE_POLICY must be "fail-fast" or "fail-complete" (got "${raw}")`);
  }
  return raw;
}

function readVoice(env: Env): SpeechVoiceId {
  const raw = env.DEFAULT_VOICE?.trim();
  if (!raw) {
    return DEFAULT_SPEECH_VOICE;
  }
  if (!isSpeechVoice(raw)) {
    throw new Error(`DEFAULT_VOICE "${raw}" is not a supported voice`);
  }
  return raw;
}

export function getConfig(env: Env = process.env): AppConfig {
  return {
    host: env.HOST || "0.0.0.0",
    port: readInt(env, "PORT", 5000, 0),
    maxConcurrentJobs: readInt(env, "MAX_CONCURRENT_JOBS", 2, 1),

    uploadDir: env.UPLOAD_DIR || "uploads",
    outputDir: env.OUTPUT_DIR || "output_audio",
    workDir: env.WORK_DIR || tmpdir(),
    maxUploadBytes: readInt(env, "MAX_UPLOAD_BYTES", 50 * 1024 * 1024, 1),

    chunking: {
      enabled: readBool(env, "CHUNKING_ENABLED", true),
      maxChunkChars: readInt(env, "MAX_CHUNK_SIZE", 4000, 1),
    },

    synthesis: {
      apiKey: env.OPENAI_API_KEY,
      model: env.SYNTHESIS_MODEL || "tts-1",
      defaultVoice: readVoice(env),
      timeoutMs: readInt(env, "SYNTHESIS_TIMEOUT_MS", 120_000, 1),
      maxAttempts: readInt(env, "SYNTHESIS_MAX_ATTEMPTS", 1, 1),
      retryBackoffMs: readInt(env, "SYNTHESIS_RETRY_BACKOFF_MS", 1000, 0),
      concurrency: readInt(env, "SYNTHESIS_CONCURRENCY", 1, 1),
      failurePolicy: readFailurePolicy(env),
    },

    ffmpegPath: env.FFMPEG_PATH || "ffmpeg",

    jobRetentionMinutes: readInt(env, "JOB_RETENTION_MINUTES", 60, 1),
  };
}

export const config = getConfig();
