export interface SpeechSynthesisOptions {
  signal?: AbortSignal;
}

export interface ISpeechSynthesizer {
  /**
   * Synthesizes one span of text and resolves with the encoded audio bytes (MP3).
   */
  synthesize(text: string, voice: string, options?: SpeechSynthesisOptions): Promise<Buffer>;
}
