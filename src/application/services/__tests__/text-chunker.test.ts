import { describe, expect, it } from "vitest";
import { chunkText, singleChunk } from "../text-chunker.service";
import { ChunkLimitError } from "../../../domain/errors/conversion.errors";

describe("chunkText", () => {
  it("splits a 12,000 character document into three chunks at paragraph breaks", () => {
    const paragraphs = ["x".repeat(3998), "y".repeat(3999), "z".repeat(3999)];
    const text = paragraphs.join("\n\n");
    expect(text.length).toBe(12000);

    const chunks = chunkText(text, 5000, "alloy");

    expect(chunks.map((c) => c.text)).toEqual(paragraphs);
    expect(chunkText(text, 4000, "alloy").map((c) => c.text)).toEqual(paragraphs);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.voice === "alloy")).toBe(true);
  });

  it("packs short paragraphs together while they fit", () => {
    const chunks = chunkText("aa\n\nbb\n\ncc", 6, "alloy");
    expect(chunks.map((c) => c.text)).toEqual(["aa\n\nbb", "cc"]);
  });

  it("treats blank lines containing whitespace as paragraph breaks", () => {
    const chunks = chunkText("first\n  \t\nsecond", 6, "alloy");
    expect(chunks.map((c) => c.text)).toEqual(["first", "second"]);
  });

  it("falls back to sentence boundaries for an oversized paragraph", () => {
    const chunks = chunkText("One two three. Four five six. Seven.", 20, "alloy");
    expect(chunks.map((c) => c.text)).toEqual(["One two three.", "Four five six.", "Seven."]);
  });

  it("hard-cuts a sentence longer than the limit", () => {
    const chunks = chunkText("abcdefghij", 4, "alloy");
    expect(chunks.map((c) => c.text)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("never hard-cuts through a surrogate pair", () => {
    const loneSurrogate = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

    const emoji = chunkText("😀😀😀", 3, "alloy").map((c) => c.text);
    expect(emoji).toEqual(["😀", "😀", "😀"]);
    expect(emoji.some((text) => loneSurrogate.test(text))).toBe(false);

    expect(chunkText("ab😀cd", 3, "alloy").map((c) => c.text)).toEqual(["ab", "😀c", "d"]);
    expect(chunkText("𠀀𠀁 tail", 3, "alloy").map((c) => c.text).join("")).toBe("𠀀𠀁 tail".replace(" ", ""));
  });

  it("keeps a lone astral character whole when the limit is one", () => {
    expect(chunkText("a😀b", 1, "alloy").map((c) => c.text)).toEqual(["a", "😀", "b"]);
  });

  it("keeps every chunk within the limit, non-empty and contiguously indexed", () => {
    const sentence = "The quick brown fox jumps over the lazy dog. ";
    const text = [sentence.repeat(3), sentence.repeat(12), "tiny", sentence.repeat(40)].join("\n\n");

    const chunks = chunkText(text, 120, "nova");

    expect(chunks.length).toBeGreaterThan(1);
    chunks.forEach((chunk, position) => {
      expect(chunk.sequenceIndex).toBe(position);
      expect(chunk.text.length).toBeLessThanOrEqual(120);
      expect(chunk.text.trim()).toBe(chunk.text);
      expect(chunk.text.length).toBeGreaterThan(0);
    });
    // Only whitespace at the boundaries is lost
    const withoutWhitespace = (value: string) => value.replace(/\s+/g, "");
    expect(withoutWhitespace(chunks.map((c) => c.text).join(""))).toBe(withoutWhitespace(text));
  });

  it("is deterministic for the same input", () => {
    const text = "Alpha beta. Gamma delta.\n\nEpsilon zeta eta. Theta.";
    expect(chunkText(text, 15, "echo")).toEqual(chunkText(text, 15, "echo"));
  });

  it("returns a single empty chunk for whitespace-only text", () => {
    expect(chunkText("   \n\n \t", 100, "alloy")).toEqual([{ sequenceIndex: 0, text: "", voice: "alloy" }]);
  });

  it("rejects a limit that is not a positive integer", () => {
    expect(() => chunkText("text", 0, "alloy")).toThrow(ChunkLimitError);
    expect(() => chunkText("text", 2.5, "alloy")).toThrow(ChunkLimitError);
  });
});

describe("singleChunk", () => {
  it("passes the text through verbatim", () => {
    const text = "  Para one.\n\nPara two.  ";
    expect(singleChunk(text, "onyx")).toEqual([{ sequenceIndex: 0, text, voice: "onyx" }]);
  });
});
