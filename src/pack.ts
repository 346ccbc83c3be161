/**
 * Packs a directory tree into a single MSF archive.
 */

import { resolve } from 'node:path';
import { encodeHeaderAndTable, layoutTable } from './msf-binary.js';
import { scanDirectory } from './scanner.js';
import type { MsfEntry } from './types/msf-entry.js';
import { MsfCodecError, MsfIoError, reportWarning, type MsfWarning } from './types/diagnostics.js';
import { displayPath } from './utils/byte-path.js';
import { CopyBuffer } from './utils/copy-buffer.js';
import { openFile, readFully, writeFully } from './utils/file-io.js';

/**
 * Options for packing a directory.
 */
export interface PackOptions {
  /** Directory whose regular files are archived. */
  inputDir: string;
  /** Archive file to create or overwrite. */
  archivePath: string;
}

export interface PackSummary {
  readonly fileCount: number;
  readonly dataStart: number;
  readonly totalSize: number;
  readonly entries: readonly MsfEntry[];
  readonly warnings: readonly MsfWarning[];
}

/**
 * Scans `inputDir` and writes header, table and file contents to `archivePath`.
 * The directory is scanned before the archive is opened. A failure while copying
 * file data leaves a partial archive behind.
 *
 * @throws {MsfIoError} If a directory, source file or the archive cannot be accessed
 * @throws {MsfFormatError} If a file size or offset does not fit the 32-bit fields
 * @throws {MsfAllocationError} If the copy buffer cannot be grown
 */
export async function packDirectory(options: PackOptions): Promise<PackSummary> {
  const inputDir = resolve(options.inputDir);
  const archivePath = resolve(options.archivePath);
  const warnings: MsfWarning[] = [];

  const files = await scanDirectory(inputDir, { exclude: new Set([archivePath]), warnings });
  if (files.length === 0) {
    reportWarning(warnings, { kind: 'empty-archive', path: inputDir });
  }

  const layout = layoutTable(files);
  const headerAndTable = encodeHeaderAndTable(layout, warnings);

  console.log(`\nWriting archive: ${archivePath}`);
  const archive = await openFile(archivePath, 'w');
  try {
    await writeFully(archive, headerAndTable, archivePath);
    if (headerAndTable.length !== layout.dataStart) {
      throw new MsfCodecError(`Table ends at ${headerAndTable.length}, expected data to start at ${layout.dataStart}`);
    }

    const copyBuffer = new CopyBuffer();
    for (let index = 0; index < layout.entries.length; index++) {
      const entry = layout.entries[index];
      const { sourcePath } = files[index];
      console.log(`... ${entry.name}`);

      const data = copyBuffer.acquire(entry.length);
      const source = await openFile(sourcePath, 'r');
      try {
        const bytesRead = await readFully(source, data, 0, sourcePath);
        if (bytesRead !== entry.length) {
          throw new MsfIoError('read', displayPath(sourcePath), new Error(`expected ${entry.length} bytes, got ${bytesRead}; the file changed while packing`));
        }
      } finally {
        await source.close();
      }

      await writeFully(archive, data, archivePath);
    }
  } finally {
    await archive.close();
  }

  console.log(`Packed ${layout.entries.length} files (${layout.totalSize} bytes)`);

  return {
    fileCount: layout.entries.length,
    dataStart: layout.dataStart,
    totalSize: layout.totalSize,
    entries: layout.entries,
    warnings
  };
}
