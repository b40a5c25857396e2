import { inflateRaw } from "zlib";
import { promisify } from "util";

const inflateRawAsync = promisify(inflateRaw);

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;

interface ZipEntry {
  name: string;
  compressionMethod: number;
  compressedSize: number;
  localHeaderOffset: number;
}

/**
 * Read-only view of a ZIP archive held in memory. Supports the two methods
 * EPUB containers use: stored (0) and deflate (8).
 */
export class ZipArchive {
  private constructor(
    private buffer: Buffer,
    private entries: Map<string, ZipEntry>
  ) {}

  static fromBuffer(buffer: Buffer): ZipArchive {
    return new ZipArchive(buffer, readCentralDirectory(buffer));
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  async readText(name: string): Promise<string> {
    return (await this.read(name)).toString("utf8");
  }

  async read(name: string): Promise<Buffer> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Entry not found: ${name}`);
    }

    const offset = entry.localHeaderOffset;
    if (this.buffer.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
      throw new Error(`Invalid local file header for ${name}`);
    }
    const fileNameLength = this.buffer.readUInt16LE(offset + 26);
    const extraFieldLength = this.buffer.readUInt16LE(offset + 28);
    const dataStart = offset + 30 + fileNameLength + extraFieldLength;
    const data = this.buffer.subarray(dataStart, dataStart + entry.compressedSize);

    if (entry.compressionMethod === 0) {
      return data;
    }
    if (entry.compressionMethod === 8) {
      return inflateRawAsync(data);
    }
    throw new Error(`Unsupported compression method ${entry.compressionMethod} for ${name}`);
  }
}

function readCentralDirectory(buffer: Buffer): Map<string, ZipEntry> {
  // End of central directory record: search backwards past a possible comment
  let eocd = -1;
  for (let i = buffer.length - 22; i >= Math.max(0, buffer.length - 65557); i--) {
    if (buffer.readUInt32LE(i) === EOCD_SIGNATURE) {
      eocd = i;
      break;
    }
  }
  if (eocd === -1) {
    throw new Error("Not a ZIP archive: end of central directory not found");
  }

  const entryCount = buffer.readUInt16LE(eocd + 10);
  let offset = buffer.readUInt32LE(eocd + 16);
  const entries = new Map<string, ZipEntry>();

  for (let i = 0; i < entryCount; i++) {
    if (buffer.readUInt32LE(offset) !== CENTRAL_DIRECTORY_SIGNATURE) {
      throw new Error("Invalid central directory entry");
    }
    const compressionMethod = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const fileNameLength = buffer.readUInt16LE(offset + 28);
    const extraFieldLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const localHeaderOffset = buffer.readUInt32LE(offset + 42);
    const name = buffer.toString("utf8", offset + 46, offset + 46 + fileNameLength);

    entries.set(name, { name, compressionMethod, compressedSize, localHeaderOffset });
    offset += 46 + fileNameLength + extraFieldLength + commentLength;
  }

  return entries;
}
