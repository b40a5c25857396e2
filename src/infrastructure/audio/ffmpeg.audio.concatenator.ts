import { execFile } from "child_process";
import { promisify } from "util";
import { writeFile, unlink } from "fs/promises";
import { join } from "path";
import { IAudioConcatenator } from "../../domain/interfaces/iaudio.concatenator";
import { ToolError } from "../../domain/errors/conversion.errors";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  signal?: AbortSignal; // Kills the process when aborted
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    maxBuffer: 10 * 1024 * 1024,
    signal: options?.signal,
  });
  return { stdout: String(stdout), stderr: String(stderr) };
};

/**
 * Joins MP3 segments with ffmpeg's concat demuxer (stream copy, no re-encode).
 */
export class FfmpegAudioConcatenator implements IAudioConcatenator {
  constructor(
    private ffmpegPath: string = "ffmpeg",
    private run: CommandRunner = runCommand
  ) {}

  /**
   * Check if ffmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.run(this.ffmpegPath, ["-version"]);
      return true;
    } catch (error) {
      console.error(`[FfmpegAudioConcatenator] '${this.ffmpegPath}' not found or not runnable:`, error);
      return false;
    }
  }

  async concat(
    orderedSegmentPaths: string[],
    outputPath: string,
    workDir: string,
    signal?: AbortSignal
  ): Promise<string> {
    const listFilePath = join(workDir, "concat_list.txt");
    const listing = orderedSegmentPaths.map((path) => `file '${escapeConcatPath(path)}'`).join("\n") + "\n";

    try {
      await writeFile(listFilePath, listing, "utf-8");

      const args = ["-y", "-f", "concat", "-safe", "0", "-i", listFilePath, "-c", "copy", outputPath];
      console.log(`[FfmpegAudioConcatenator] Running ffmpeg command: ${this.ffmpegPath} ${args.join(" ")}`);

      try {
        await this.run(this.ffmpegPath, args, { signal });
      } catch (error) {
        throw toToolError(this.ffmpegPath, error);
      }

      console.log(`[FfmpegAudioConcatenator] Successfully merged ${orderedSegmentPaths.length} audio chunks`);
      return outputPath;
    } finally {
      await unlink(listFilePath).catch((error) => {
        console.warn(`[FfmpegAudioConcatenator] Failed to remove temporary list file ${listFilePath}:`, error);
      });
    }
  }
}

/**
 * Paths go inside single quotes in the concat list; a quote is written as '\''
 */
export function escapeConcatPath(path: string): string {
  return path.replace(/\\/g, "/").replace(/'/g, "'\\''");
}

function toToolError(ffmpegPath: string, error: unknown): ToolError {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : undefined;
    if (code === "ENOENT") {
      return new ToolError(`'${ffmpegPath}' command not found in system PATH`);
    }
    if (code === "ABORT_ERR") {
      return new ToolError("ffmpeg was stopped before the merge finished");
    }
    const exitCode = typeof code === "number" ? code : undefined;
    const tail = stderr ? `: ${stderr.trim().split("\n").slice(-5).join(" | ")}` : "";
    return new ToolError(`ffmpeg failed with return code ${exitCode ?? "unknown"}${tail}`, exitCode, stderr);
  }
  return new ToolError(`ffmpeg failed: ${String(error)}`);
}
