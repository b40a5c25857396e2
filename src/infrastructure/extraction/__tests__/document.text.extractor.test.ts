import { describe, expect, it } from "vitest";
import { DocumentTextExtractor } from "../document.text.extractor";
import { FakeTextExtractor } from "../../../__tests__/support/fakes";
import { UnsupportedFileTypeError } from "../../../domain/errors/conversion.errors";

describe("DocumentTextExtractor", () => {
  const pdf = new FakeTextExtractor("pdf text");
  const epub = new FakeTextExtractor("epub text");
  const extractor = new DocumentTextExtractor({ ".pdf": pdf, ".EPUB": epub });

  it("dispatches on the extension, ignoring case", async () => {
    expect(await extractor.extractText("/uploads/Report.PDF")).toBe("pdf text");
    expect(await extractor.extractText("/uploads/novel.epub")).toBe("epub text");
    expect(pdf.calls).toEqual(["/uploads/Report.PDF"]);
  });

  it("rejects other extensions", async () => {
    await expect(extractor.extractText("/uploads/notes.txt")).rejects.toThrow(UnsupportedFileTypeError);
    await expect(extractor.extractText("/uploads/notes.txt")).rejects.toThrow(
      "Unsupported file type '.txt'. Only '.pdf' and '.epub' are supported."
    );
  });

  it("reports what it supports", () => {
    expect(extractor.supports("a.epub")).toBe(true);
    expect(extractor.supports("a")).toBe(false);
  });
});
