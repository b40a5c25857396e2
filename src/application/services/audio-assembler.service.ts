import { copyFile, mkdir, rename, unlink } from "fs/promises";
import { dirname } from "path";
import { SucceededSegment } from "../../domain/entities/synthesized-segment";
import { IAudioConcatenator } from "../../domain/interfaces/iaudio.concatenator";
import { MergeError, errorMessage } from "../../domain/errors/conversion.errors";

export interface MergeParams {
  segments: SucceededSegment[];
  outputPath: string;
  workDir: string; // Scratch space; reported as the retained path on failure
  signal?: AbortSignal;
}

/**
 * Produces the final audio file from a complete, ordered set of segments.
 */
export class AudioAssembler {
  constructor(private concatenator: IAudioConcatenator) {}

  async merge(params: MergeParams): Promise<string> {
    const { outputPath, workDir, signal } = params;
    const segments = [...params.segments].sort((a, b) => a.sequenceIndex - b.sequenceIndex);

    if (segments.length === 0) {
      throw new MergeError("No audio segments to merge", { retainedPath: workDir });
    }
    segments.forEach((segment, position) => {
      if (segment.sequenceIndex !== position) {
        throw new MergeError(
          `Audio segments are not contiguous: expected chunk ${position}, found chunk ${segment.sequenceIndex}`,
          { retainedPath: workDir }
        );
      }
    });

    try {
      await mkdir(dirname(outputPath), { recursive: true });

      if (segments.length === 1) {
        console.log("[AudioAssembler] Only one segment found, no merging needed. Moving file into place");
        await moveFile(segments[0].audioPath, outputPath);
      } else {
        console.log(`[AudioAssembler] Merging ${segments.length} audio segments into ${outputPath}`);
        await this.concatenator.concat(
          segments.map((segment) => segment.audioPath),
          outputPath,
          workDir,
          signal
        );
      }
    } catch (error) {
      throw new MergeError(`Merging audio chunks failed: ${errorMessage(error)}`, {
        retainedPath: workDir,
        cause: error,
      });
    }

    console.log(`[AudioAssembler] Final audio saved to: ${outputPath}`);
    return outputPath;
  }
}

/**
 * rename, falling back to copy and delete across filesystems.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      await copyFile(from, to);
      await unlink(from);
      return;
    }
    throw error;
  }
}
