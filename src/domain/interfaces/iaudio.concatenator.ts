export interface IAudioConcatenator {
  /**
   * Joins the given audio files, in the order given, into outputPath.
   * workDir is a scratch directory owned by the caller.
   * Rejects with a ToolError when the underlying tool is missing or fails, or
   * is stopped through signal.
   */
  concat(orderedSegmentPaths: string[], outputPath: string, workDir: string, signal?: AbortSignal): Promise<string>;
}
