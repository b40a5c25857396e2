export interface TextChunk {
  sequenceIndex: number; // Zero-based position in document order
  text: string;
  voice: string;
}
