/**
 * Normalizes whitespace in extracted text while keeping paragraph breaks:
 * spaces and tabs collapse to one space, blank-line runs become "\n\n", and a
 * lone line break inside a paragraph becomes a space.
 */
export function cleanExtractedText(text: string): string {
  return text
    .trim()
    .replace(/[ \t]+/g, " ")
    .replace(/(\r?\n[ \t]*){2,}/g, "\n\n")
    .replace(/(?<!\n)\r?\n(?!\n)/g, " ")
    .replace(/ +/g, " ")
    .trim();
}
