import { ConversionErrorDetail, ConversionJob, ConversionJobState, ConversionProgress } from "../../domain/entities/conversion-job";

export interface SubmitConversionResponse {
  jobId: string;
  status: "queued";
  message: string;
}

export interface ConversionStatusResponse {
  jobId: string;
  status: ConversionJobState;
  message: string;
  progress: ConversionProgress;
  version: number;
  voice: string;
  originalFilename: string;
  downloadUrl?: string; // Only when status is "complete"
  filename?: string;
  errorDetail?: ConversionErrorDetail;
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
}

export interface ConversionListResponse {
  jobs: ConversionStatusResponse[];
}

export function downloadUrlFor(jobId: string): string {
  return `/api/conversions/${jobId}/download`;
}

export function toConversionStatusResponse(job: ConversionJob): ConversionStatusResponse {
  return {
    jobId: job.id,
    status: job.state,
    message: job.progress.message,
    progress: job.progress,
    version: job.version,
    voice: job.voice,
    originalFilename: job.originalFilename,
    ...(job.state === "complete" && {
      downloadUrl: downloadUrlFor(job.id),
      filename: job.outputFilename,
    }),
    ...(job.errorDetail && { errorDetail: job.errorDetail }),
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    completedAt: job.completedAt,
  };
}
