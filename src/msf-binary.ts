/**
 * MSF header and table codec.
 */
import {
  ENTRY_FIXED_SIZE,
  HEADER_SIZE,
  MAX_NAME_LENGTH,
  MAX_UINT32,
  MSF_MAGIC
} from './constants/msf-format.js';
import type { MsfArchive, MsfTableLayout } from './types/msf-archive.js';
import type { MsfEntry } from './types/msf-entry.js';
import { MsfFormatError, MsfIoError, reportWarning, type MsfWarning } from './types/diagnostics.js';
import { BinaryReader, BinaryWriter } from './utils/msf-binary-serializer.js';
import { displayPath, pathBytes, type BytePath } from './utils/byte-path.js';
import { allocate } from './utils/copy-buffer.js';
import { openFile, readFully } from './utils/file-io.js';

/**
 * A name cut down to fit the one-byte length prefix.
 */
export interface FittedName {
  readonly name: string;
  readonly nameBytes: Buffer;
  readonly truncated: boolean;
  /** Byte length before truncation. */
  readonly originalLength: number;
}

/** Anything that can be laid out in a table: a name and a data length. */
export interface TableInput {
  readonly name: string;
  readonly nameBytes: Buffer;
  readonly length: number;
}

/**
 * Truncates a name to 255 bytes. Strings are encoded as UTF-8 first; byte
 * names are kept as they are, so a multi-byte character at the cut is split
 * and `name` only approximates the stored bytes.
 */
export function fitName(name: BytePath): FittedName {
  const encoded = pathBytes(name);
  if (encoded.length <= MAX_NAME_LENGTH) {
    return { name: displayPath(name), nameBytes: encoded, truncated: false, originalLength: encoded.length };
  }
  const nameBytes = encoded.subarray(0, MAX_NAME_LENGTH);
  return { name: nameBytes.toString('utf8'), nameBytes, truncated: true, originalLength: encoded.length };
}

/**
 * Size of one table entry on disk.
 */
export function entrySize(nameBytes: Uint8Array): number {
  return ENTRY_FIXED_SIZE + Math.min(nameBytes.length, MAX_NAME_LENGTH);
}

/**
 * Assigns offsets to files in table order.
 * Arithmetic is done on plain numbers, which stay exact far beyond 32 bits,
 * and any offset or length that cannot be stored raises instead of wrapping.
 *
 * @throws {MsfFormatError} If an offset or length does not fit in 32 bits
 */
export function layoutTable(files: readonly TableInput[]): MsfTableLayout {
  const dataStart = files.reduce((size, file) => size + entrySize(file.nameBytes), HEADER_SIZE);

  const entries: MsfEntry[] = [];
  let offset = dataStart;
  for (const file of files) {
    if (file.length > MAX_UINT32) {
      throw new MsfFormatError('field-overflow', `File "${file.name}" is ${file.length} bytes; the format limit is ${MAX_UINT32}`);
    }
    if (offset > MAX_UINT32) {
      throw new MsfFormatError('field-overflow', `Offset ${offset} of "${file.name}" exceeds the 32-bit offset field`);
    }
    entries.push({ name: file.name, nameBytes: file.nameBytes, offset, length: file.length });
    offset += file.length;
  }

  return { dataStart, totalSize: offset, entries };
}

/**
 * Encodes magic and file count.
 */
export function encodeHeader(fileCount: number): Buffer {
  const writer = new BinaryWriter(HEADER_SIZE);
  writer.writeBytes(MSF_MAGIC);
  writer.writeUint32(fileCount);
  return writer.toBuffer();
}

/**
 * Encodes the table entries that follow the header.
 * Names longer than 255 bytes are clamped with a warning.
 */
export function encodeTable(entries: readonly MsfEntry[], warnings: MsfWarning[] = []): Buffer {
  const writer = new BinaryWriter(entries.reduce((size, entry) => size + entrySize(entry.nameBytes), 0));

  for (const entry of entries) {
    let nameBytes = entry.nameBytes;
    if (nameBytes.length > MAX_NAME_LENGTH) {
      nameBytes = nameBytes.subarray(0, MAX_NAME_LENGTH);
      reportWarning(warnings, { kind: 'name-truncated', name: nameBytes.toString('utf8'), originalLength: entry.nameBytes.length });
    }
    writer.writeUint32(entry.offset);
    writer.writeUint32(entry.length);
    writer.writeUint8(nameBytes.length);
    writer.writeBytes(nameBytes);
  }

  return writer.toBuffer();
}

/**
 * Encodes header and table for a laid-out archive.
 */
export function encodeHeaderAndTable(layout: MsfTableLayout, warnings: MsfWarning[] = []): Buffer {
  return Buffer.concat([encodeHeader(layout.entries.length), encodeTable(layout.entries, warnings)]);
}

/**
 * Validates the archive magic number.
 * @throws {MsfFormatError} If the first eight bytes are not the MSF magic
 */
export function ensureMagic(buffer: Buffer, archivePath: string): void {
  if (buffer.length < MSF_MAGIC.length || !buffer.subarray(0, MSF_MAGIC.length).equals(MSF_MAGIC)) {
    throw new MsfFormatError('bad-magic', `Invalid MSF magic in ${archivePath}`);
  }
}

/**
 * Caps a decoded name length at 255, warning when it had to be reduced.
 */
export function clampNameLength(length: number, index: number, warnings: MsfWarning[]): number {
  if (length <= MAX_NAME_LENGTH) {
    return length;
  }
  reportWarning(warnings, { kind: 'name-truncated', name: `entry ${index}`, originalLength: length });
  return MAX_NAME_LENGTH;
}

function parseEntry(reader: BinaryReader, index: number, warnings: MsfWarning[]): MsfEntry {
  const offset = reader.readUint32();
  const length = reader.readUint32();
  const nameLength = clampNameLength(reader.readUint8(), index, warnings);
  const nameBytes = reader.readBytes(nameLength);
  return { name: nameBytes.toString('utf8'), nameBytes, offset, length };
}

/**
 * Parses header and table from the leading bytes of an archive and checks
 * every entry against the archive size.
 *
 * @param buffer - At least the header and table bytes of the archive
 * @param totalSize - Size of the whole archive file
 * @throws {MsfFormatError} On bad magic, a truncated table or an entry past the end of the archive
 */
export function parseArchive(buffer: Buffer, archivePath: string, totalSize: number, warnings: MsfWarning[] = []): MsfArchive {
  ensureMagic(buffer, archivePath);
  const reader = new BinaryReader(buffer.subarray(MSF_MAGIC.length));
  const fileCount = reader.readUint32();

  const entries: MsfEntry[] = [];
  for (let index = 0; index < fileCount; index++) {
    const entry = parseEntry(reader, index, warnings);
    // Bounds checking - ensure file data doesn't extend past archive end
    if (entry.offset + entry.length > totalSize) {
      throw new MsfFormatError(
        'out-of-bounds',
        `Entry "${entry.name}" extends beyond archive bounds: offset=${entry.offset}, length=${entry.length}, archiveSize=${totalSize}`
      );
    }
    entries.push(entry);
  }

  return {
    archivePath,
    fileCount,
    dataStart: MSF_MAGIC.length + reader.position,
    totalSize,
    entries
  };
}

/**
 * MSF archive codec entry points that touch the filesystem.
 */
export class MsfBinary {
  /**
   * Reads and validates the header and full table of an archive without touching file data.
   *
   * @param archivePath - Path to the archive
   * @param warnings - Collects non-fatal conditions found while decoding
   * @returns Header fields and all entries in table order
   * @throws {MsfFormatError} If the archive is not a valid MSF archive
   * @throws {MsfIoError} If the archive cannot be opened or read
   * @throws {MsfAllocationError} If a corrupt count asks for a table larger than memory allows
   */
  static async readTable({ archivePath, warnings = [] }: { readonly archivePath: string; readonly warnings?: MsfWarning[] }): Promise<MsfArchive> {
    const handle = await openFile(archivePath, 'r');
    try {
      let totalSize: number;
      try {
        totalSize = (await handle.stat()).size;
      } catch (error) {
        throw new MsfIoError('stat', archivePath, error);
      }

      const header = Buffer.alloc(Math.min(HEADER_SIZE, totalSize));
      await readFully(handle, header, 0, archivePath);
      ensureMagic(header, archivePath);
      if (header.length < HEADER_SIZE) {
        throw new MsfFormatError('truncated-table', `Archive ${archivePath} ends inside the header`);
      }

      // The table can be no longer than the archive, nor than count maximum-size entries
      const fileCount = header.readUInt32BE(MSF_MAGIC.length);
      const tableLimit = Math.min(totalSize - HEADER_SIZE, fileCount * (ENTRY_FIXED_SIZE + MAX_NAME_LENGTH));
      const table = allocate(tableLimit);
      const tableRead = await readFully(handle, table, HEADER_SIZE, archivePath);

      return parseArchive(Buffer.concat([header, table.subarray(0, tableRead)]), archivePath, totalSize, warnings);
    } finally {
      await handle.close();
    }
  }
}
