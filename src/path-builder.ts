/**
 * Best-effort creation of the directories leading up to a destination file.
 *
 * Directory creation never fails the operation: an existing path is accepted
 * silently and any other failure is returned as a warning. Whether the
 * directories are usable is decided when the file itself is opened.
 */

import { mkdir, stat } from 'node:fs/promises';
import { dirname, parse, resolve } from 'node:path';
import { reportWarning, type MsfWarning } from './types/diagnostics.js';
import { absoluteView, displayView, fromView, type BytePath } from './utils/byte-path.js';

export interface PathBuildResult {
  /** Directories that were newly created, outermost first. */
  readonly created: readonly string[];
  readonly warnings: readonly MsfWarning[];
}

/**
 * Lists the ancestors of `filePath`, outermost first, excluding the filesystem root.
 */
export function ancestorsOf(filePath: string): string[] {
  const { root } = parse(resolve(filePath));
  const ancestors: string[] = [];
  let current = dirname(resolve(filePath));
  while (current !== root) {
    ancestors.unshift(current);
    current = dirname(current);
  }
  return ancestors;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function isDirectory(path: Buffer): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Creates every missing ancestor directory of `filePath`, one segment at a time.
 * Byte paths are created exactly as given; `created` and warnings show them decoded as UTF-8.
 */
export async function ensureParentDirs(filePath: BytePath): Promise<PathBuildResult> {
  const created: string[] = [];
  const warnings: MsfWarning[] = [];

  for (const directoryView of ancestorsOf(absoluteView(filePath))) {
    const directory = fromView(directoryView);
    try {
      await mkdir(directory, 0o755);
      created.push(displayView(directoryView));
    } catch (error) {
      // Read-only mounts report EROFS even for directories that already exist
      if (errorCode(error) === 'EEXIST' || (await isDirectory(directory))) continue;
      reportWarning(warnings, {
        kind: 'mkdir-failed',
        path: displayView(directoryView),
        message: error instanceof Error ? error.message : String(error)
      });
    }
  }

  return { created, warnings };
}
