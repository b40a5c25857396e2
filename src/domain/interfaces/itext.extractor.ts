export interface ITextExtractor {
  /**
   * Reads a document and returns its plain text.
   * Rejects with a ParseError on malformed or unsupported content.
   */
  extractText(filePath: string): Promise<string>;
}
