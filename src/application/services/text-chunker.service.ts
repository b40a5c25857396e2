import { TextChunk } from "../../domain/entities/text-chunk";
import { ChunkLimitError } from "../../domain/errors/conversion.errors";

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

/**
 * Splits extracted text into ordered chunks no longer than maxChunkChars.
 *
 * Boundaries are tried in order: paragraph breaks, then sentence breaks, then
 * hard character cuts. Paragraphs are packed together (joined by a blank line)
 * while they fit; sentences of an oversized paragraph are packed together
 * (joined by a space) the same way. Every chunk is trimmed and empty chunks are
 * dropped. Text that is empty after trimming yields a single empty chunk.
 *
 * Pure: the same (text, maxChunkChars, voice) always yields the same chunks.
 */
export function chunkText(text: string, maxChunkChars: number, voice: string): TextChunk[] {
  if (!Number.isInteger(maxChunkChars) || maxChunkChars < 1) {
    throw new ChunkLimitError(`Chunk size limit must be a positive integer (got ${maxChunkChars})`);
  }

  const spans: string[] = [];
  let current = "";

  const flush = (span: string): void => {
    const trimmed = span.trim();
    if (trimmed) {
      spans.push(trimmed);
    }
  };

  for (const rawParagraph of text.split(PARAGRAPH_BREAK)) {
    const paragraph = rawParagraph.trim();
    if (!paragraph) continue;

    const candidate = current ? `${current}\n\n${paragraph}` : paragraph;
    if (candidate.length <= maxChunkChars) {
      current = candidate;
      continue;
    }

    flush(current);
    current = "";

    if (paragraph.length <= maxChunkChars) {
      current = paragraph;
    } else {
      for (const span of splitParagraph(paragraph, maxChunkChars)) {
        flush(span);
      }
    }
  }
  flush(current);

  if (spans.length === 0) {
    return [{ sequenceIndex: 0, text: "", voice }];
  }

  console.log(`[TextChunker] Split text into ${spans.length} chunks for processing`);
  return spans.map((span, sequenceIndex) => ({ sequenceIndex, text: span, voice }));
}

/**
 * Single-chunk mode: the whole text is passed through verbatim. If the speech
 * service enforces its own input limit the synthesis call fails and that
 * failure is reported, not hidden.
 */
export function singleChunk(text: string, voice: string): TextChunk[] {
  console.log("[TextChunker] Chunking disabled. Processing text as a single block");
  return [{ sequenceIndex: 0, text, voice }];
}

function splitParagraph(paragraph: string, maxChunkChars: number): string[] {
  const spans: string[] = [];
  let current = "";

  for (const rawSentence of paragraph.split(SENTENCE_BREAK)) {
    const sentence = rawSentence.trim();
    if (!sentence) continue;

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= maxChunkChars) {
      current = candidate;
      continue;
    }

    if (current) {
      spans.push(current);
      current = "";
    }

    if (sentence.length <= maxChunkChars) {
      current = sentence;
    } else {
      console.warn(`[TextChunker] Sentence exceeds max chunk size (${maxChunkChars}). Splitting arbitrarily`);
      spans.push(...hardCut(sentence, maxChunkChars));
    }
  }

  if (current) {
    spans.push(current);
  }
  return spans;
}

/**
 * Fixed-size cuts that never separate a surrogate pair. A lone astral character
 * is kept whole even when maxChunkChars is 1.
 */
function hardCut(sentence: string, maxChunkChars: number): string[] {
  const spans: string[] = [];
  let start = 0;
  while (start < sentence.length) {
    let end = Math.min(start + maxChunkChars, sentence.length);
    if (end < sentence.length && splitsSurrogatePair(sentence, end)) {
      end = end - 1 > start ? end - 1 : end + 1;
    }
    spans.push(sentence.slice(start, end));
    start = end;
  }
  return spans;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}
