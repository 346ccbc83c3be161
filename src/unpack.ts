/**
 * Unpacks an MSF archive into a directory tree.
 *
 * The whole table is read and validated before any output is written, so a
 * malformed archive leaves the output directory untouched. Once copying has
 * started, files already written stay on disk if a later entry fails.
 */

import type { FileHandle } from 'node:fs/promises';
import { isAbsolute, resolve, sep } from 'node:path';
import { MsfBinary } from './msf-binary.js';
import { ensureParentDirs } from './path-builder.js';
import type { MsfEntry } from './types/msf-entry.js';
import { MsfFormatError, MsfIoError, type MsfWarning } from './types/diagnostics.js';
import { absoluteView, displayPath, fromView, toView, type BytePath } from './utils/byte-path.js';
import { CopyBuffer } from './utils/copy-buffer.js';
import { openFile, readFully, writeFully } from './utils/file-io.js';

/**
 * Options for unpacking an archive.
 */
export interface UnpackOptions {
  /** Archive to read. */
  archivePath: string;
  /** Root under which entry names are recreated. */
  outputDir: string;
}

export interface UnpackSummary {
  readonly fileCount: number;
  readonly entries: readonly MsfEntry[];
  readonly warnings: readonly MsfWarning[];
}

/**
 * Resolves where an entry is written, rejecting names that would land outside `outputDir`.
 * The result keeps the entry name's bytes exactly as given.
 * @throws {MsfFormatError} If the name is absolute or escapes the output directory
 */
export function resolveEntryPath(outputDir: string, name: BytePath): Buffer {
  const root = absoluteView(outputDir);
  const nameView = toView(name);
  if (isAbsolute(nameView) || nameView.split(/[/\\]/).includes('..')) {
    throw new MsfFormatError('unsafe-name', `Entry "${displayPath(name)}" points outside the output directory`);
  }
  const target = resolve(root, nameView);
  if (target !== root && !target.startsWith(root + sep)) {
    throw new MsfFormatError('unsafe-name', `Entry "${displayPath(name)}" points outside the output directory`);
  }
  return fromView(target);
}

async function copyEntry(source: FileHandle, archivePath: string, entry: MsfEntry, data: Buffer, destination: Buffer): Promise<void> {
  const bytesRead = await readFully(source, data, entry.offset, archivePath);
  if (bytesRead !== entry.length) {
    throw new MsfIoError('read', archivePath, new Error(`expected ${entry.length} bytes at offset ${entry.offset}, got ${bytesRead}`));
  }

  const output = await openFile(destination, 'w');
  try {
    await writeFully(output, data, destination);
  } finally {
    await output.close();
  }
}

/**
 * Recreates every archived file under `outputDir`, in table order.
 * An existing file with the same name is truncated and overwritten.
 *
 * @throws {MsfFormatError} If the archive is malformed or an entry name is unsafe
 * @throws {MsfIoError} If the archive cannot be read or a destination file cannot be written
 * @throws {MsfAllocationError} If the copy buffer cannot be grown
 */
export async function unpackArchive(options: UnpackOptions): Promise<UnpackSummary> {
  const archivePath = resolve(options.archivePath);
  const outputDir = resolve(options.outputDir);
  const warnings: MsfWarning[] = [];

  const archive = await MsfBinary.readTable({ archivePath, warnings });
  const destinations = archive.entries.map(entry => resolveEntryPath(outputDir, entry.nameBytes));

  console.log(`Unpacking ${archive.fileCount} files:`);

  const source = await openFile(archivePath, 'r');
  try {
    const copyBuffer = new CopyBuffer();
    for (let index = 0; index < archive.entries.length; index++) {
      const entry = archive.entries[index];
      const destination = destinations[index];
      console.log(`... ${entry.name}`);

      const built = await ensureParentDirs(destination);
      warnings.push(...built.warnings);

      await copyEntry(source, archivePath, entry, copyBuffer.acquire(entry.length), destination);
    }
  } finally {
    await source.close();
  }

  return {
    fileCount: archive.fileCount,
    entries: archive.entries,
    warnings
  };
}
