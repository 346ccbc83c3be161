/**
 * Directory scanner for the pack path.
 * Produces the files to archive, in directory-listing order, with sizes but no offsets.
 */

import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { fitName } from './msf-binary.js';
import type { ScannedFile } from './types/msf-entry.js';
import { MsfIoError, reportWarning, type MsfWarning } from './types/diagnostics.js';
import { absoluteView, displayView, fromView, toView } from './utils/byte-path.js';

const DOT = 0x2e;

export interface ScanOptions {
  /** Absolute paths to leave out of the scan, such as the archive being written. */
  readonly exclude?: ReadonlySet<string>;
  /** Collects truncation and duplicate-name warnings. */
  readonly warnings?: MsfWarning[];
}

/**
 * Recursively lists every regular file under `root`.
 * Names starting with a dot are skipped at every level. Symlinks are followed.
 * Entry names are read as raw bytes, so names that are not valid UTF-8 are
 * archived unchanged. Relative paths longer than 255 bytes are truncated and
 * reported as warnings.
 *
 * @throws {MsfIoError} If a directory cannot be listed or an entry cannot be stat'ed
 */
export async function scanDirectory(root: string, options: ScanOptions = {}): Promise<ScannedFile[]> {
  const { exclude = new Set<string>(), warnings = [] } = options;

  console.log(`Scanning directory: ${root}`);
  const excludedViews = new Set([...exclude].map(path => absoluteView(path)));
  const files = await walk(absoluteView(root), '', excludedViews);

  const seen = new Set<string>();
  for (const file of files) {
    if (file.truncated) {
      reportWarning(warnings, { kind: 'name-truncated', name: file.name, originalLength: file.originalNameLength });
    }
    const key = file.nameBytes.toString('hex');
    if (seen.has(key)) {
      reportWarning(warnings, { kind: 'duplicate-name', name: file.name });
    }
    seen.add(key);
  }

  return files;
}

// Paths below are latin1 views of the raw bytes (see utils/byte-path.ts)
async function walk(directoryView: string, relativePrefix: string, exclude: ReadonlySet<string>): Promise<ScannedFile[]> {
  let names: Buffer[];
  try {
    names = await readdir(fromView(directoryView), { encoding: 'buffer' });
  } catch (error) {
    throw new MsfIoError('readdir', displayView(directoryView), error);
  }

  const files: ScannedFile[] = [];
  for (const entryName of names) {
    if (entryName[0] === DOT) continue;

    const entryView = toView(entryName);
    const fullView = join(directoryView, entryView);
    if (exclude.has(fullView)) continue;

    const fullPath = fromView(fullView);
    let stats: Stats;
    try {
      stats = await stat(fullPath);
    } catch (error) {
      throw new MsfIoError('stat', displayView(fullView), error);
    }

    const relativeView = relativePrefix + entryView;
    if (stats.isDirectory()) {
      for (const nested of await walk(fullView, `${relativeView}/`, exclude)) {
        files.push(nested);
      }
    } else if (stats.isFile()) {
      const fitted = fitName(fromView(relativeView));
      files.push({
        sourcePath: fullPath,
        name: fitted.name,
        nameBytes: fitted.nameBytes,
        length: stats.size,
        truncated: fitted.truncated,
        originalNameLength: fitted.originalLength
      });
    }
  }

  return files;
}
