import { readFile } from "fs/promises";
import pdfParse from "pdf-parse";
import { ITextExtractor } from "../../domain/interfaces/itext.extractor";
import { ParseError, errorMessage } from "../../domain/errors/conversion.errors";

export class PdfTextExtractor implements ITextExtractor {
  async extractText(filePath: string): Promise<string> {
    console.log(`[PdfTextExtractor] Opening PDF: ${filePath}`);
    try {
      // pdf-parse separates pages with a blank line
      const data = await pdfParse(await readFile(filePath));
      const text = data.text.trim();
      console.log(
        `[PdfTextExtractor] Extracted ~${text.length} characters from ${data.numpages} pages`
      );
      return text;
    } catch (error) {
      console.error(`[PdfTextExtractor] Error reading PDF ${filePath}:`, error);
      throw new ParseError(`Failed to process PDF file: ${errorMessage(error)}`, { cause: error });
    }
  }
}
