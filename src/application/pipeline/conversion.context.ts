import { ConversionProgress } from "../../domain/entities/conversion-job";
import { TextChunk } from "../../domain/entities/text-chunk";
import { SucceededSegment } from "../../domain/entities/synthesized-segment";
import { JobWorkspace } from "../../infrastructure/storage/job-workspace";

export interface ConversionContext {
    jobId: string;
    sourcePath: string;
    outputPath: string;
    voice: string;
    chunkingEnabled: boolean;
    signal: AbortSignal;
    reportProgress: (progress: ConversionProgress) => void;
    text?: string;
    chunks?: TextChunk[];
    workspace?: JobWorkspace;
    segments?: SucceededSegment[]; // Ascending sequenceIndex
    resultPath?: string;
}
