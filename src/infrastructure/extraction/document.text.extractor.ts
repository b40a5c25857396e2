import { extname } from "path";
import { ITextExtractor } from "../../domain/interfaces/itext.extractor";
import { UnsupportedFileTypeError } from "../../domain/errors/conversion.errors";

/**
 * Routes a document to the extractor registered for its extension
 * (case-insensitive, including the dot).
 */
export class DocumentTextExtractor implements ITextExtractor {
  private extractors: Map<string, ITextExtractor>;

  constructor(extractors: Record<string, ITextExtractor>) {
    this.extractors = new Map(
      Object.entries(extractors).map(([extension, extractor]) => [extension.toLowerCase(), extractor])
    );
  }

  supports(filePath: string): boolean {
    return this.extractors.has(extname(filePath).toLowerCase());
  }

  async extractText(filePath: string): Promise<string> {
    const extension = extname(filePath).toLowerCase();
    const extractor = this.extractors.get(extension);
    if (!extractor) {
      throw new UnsupportedFileTypeError(extension);
    }
    return extractor.extractText(filePath);
  }
}
