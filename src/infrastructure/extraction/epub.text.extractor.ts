import { readFile } from "fs/promises";
import { posix } from "path";
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { ITextExtractor } from "../../domain/interfaces/itext.extractor";
import { ParseError, errorMessage } from "../../domain/errors/conversion.errors";
import { ZipArchive } from "./zip.archive";
import { cleanExtractedText } from "./text-cleaner";

// Body children that never carry narratable prose
const SKIPPED_BLOCKS = "script, style, nav, header, footer, aside, figure, img, br, hr";

const DOCUMENT_MEDIA_TYPES = new Set([
  "application/xhtml+xml",
  "text/html",
  "text/x-oeb1-document",
]);

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

interface ManifestItem {
  href: string;
  mediaType: string;
}

/**
 * Extracts narratable text from an EPUB: follows META-INF/container.xml to the
 * package document, walks the spine in reading order and emits one paragraph
 * per block-level child of each document's body.
 */
export class EpubTextExtractor implements ITextExtractor {
  async extractText(filePath: string): Promise<string> {
    console.log(`[EpubTextExtractor] Opening EPUB: ${filePath}`);
    try {
      const archive = ZipArchive.fromBuffer(await readFile(filePath));
      const opfPath = await this.findPackageDocument(archive);
      const documents = await this.readSpine(archive, opfPath);
      console.log(`[EpubTextExtractor] Found ${documents.length} document items`);

      let fullText = "";
      const seen = new Set<string>();
      for (const { id, href } of documents) {
        if (seen.has(id)) {
          console.warn(`[EpubTextExtractor] Skipping duplicate item ID: ${id}`);
          continue;
        }
        seen.add(id);

        if (!archive.has(href)) {
          console.warn(`[EpubTextExtractor] Spine item ${id} points at missing entry ${href}`);
          continue;
        }
        const itemText = extractDocumentText(await archive.readText(href), id).trim();
        if (itemText) {
          fullText += itemText + "\n\n";
        }
      }

      return cleanExtractedText(fullText);
    } catch (error) {
      console.error(`[EpubTextExtractor] Error reading EPUB ${filePath}:`, error);
      throw new ParseError(`Failed to process EPUB file: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async findPackageDocument(archive: ZipArchive): Promise<string> {
    const containerPath = "META-INF/container.xml";
    if (!archive.has(containerPath)) {
      throw new Error("META-INF/container.xml not found");
    }
    const $ = cheerio.load(await archive.readText(containerPath), { xmlMode: true });
    const fullPath = $("rootfile").first().attr("full-path");
    if (!fullPath) {
      throw new Error("No rootfile found in container.xml");
    }
    return fullPath;
  }

  private async readSpine(
    archive: ZipArchive,
    opfPath: string
  ): Promise<Array<{ id: string; href: string }>> {
    if (!archive.has(opfPath)) {
      throw new Error(`Package document not found: ${opfPath}`);
    }
    const $ = cheerio.load(await archive.readText(opfPath), { xmlMode: true });
    const rootDir = posix.dirname(opfPath);

    const manifest = new Map<string, ManifestItem>();
    $("item").each((_, el) => {
      const id = $(el).attr("id");
      const href = $(el).attr("href");
      if (id && href) {
        manifest.set(id, { href, mediaType: $(el).attr("media-type") ?? "" });
      }
    });

    const documents: Array<{ id: string; href: string }> = [];
    $("itemref").each((_, el) => {
      const id = $(el).attr("idref");
      const item = id ? manifest.get(id) : undefined;
      if (!id || !item || !DOCUMENT_MEDIA_TYPES.has(item.mediaType)) {
        return;
      }
      const href = decodeURIComponent(item.href.split("#")[0]);
      documents.push({ id, href: rootDir === "." ? href : posix.join(rootDir, href) });
    });
    return documents;
  }
}

/**
 * Text of one XHTML content document. Each element directly under <body>
 * becomes a paragraph; bare text directly under <body> is kept when longer
 * than one character.
 */
export function extractDocumentText(xhtml: string, itemId = "document"): string {
  const $ = cheerio.load(xhtml, { xmlMode: true });
  const body = $("body").first();

  if (body.length === 0) {
    console.warn(`[EpubTextExtractor] No <body> tag found in item ${itemId}. Extracting all text.`);
    return collectText($, $.root()).join("\n\n");
  }

  let itemText = "";
  body.contents().each((_, node) => {
    if (node.nodeType === TEXT_NODE) {
      const stripped = $(node).text().trim();
      if (stripped.length > 1) {
        itemText += stripped + " ";
      }
      return;
    }
    if (node.nodeType !== ELEMENT_NODE || $(node).is(SKIPPED_BLOCKS)) {
      return;
    }
    const blockText = collectText($, $(node)).join(" ");
    if (blockText) {
      itemText += blockText + "\n\n";
    }
  });
  return itemText;
}

// Non-empty, trimmed text nodes below the selection, in document order
function collectText<T extends AnyNode>(
  $: cheerio.CheerioAPI,
  selection: cheerio.Cheerio<T>
): string[] {
  const parts: string[] = [];
  selection.contents().each((_, node) => {
    if (node.nodeType === TEXT_NODE) {
      const text = $(node).text().trim();
      if (text) {
        parts.push(text);
      }
    } else if (node.nodeType === ELEMENT_NODE && !$(node).is("script, style")) {
      parts.push(...collectText($, $(node)));
    }
  });
  return parts;
}
