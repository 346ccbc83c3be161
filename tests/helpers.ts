import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import { encodeHeaderAndTable, fitName, layoutTable } from '../src/msf-binary.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'msftool-test-'));
}

/**
 * Writes files given as relative path -> contents, creating parent directories.
 */
export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, contents);
  }
}

/**
 * Reads every regular file under `root` into relative path -> base64 contents.
 */
export async function readTree(root: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  const visit = async (directory: string, prefix: string): Promise<void> => {
    for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await visit(fullPath, `${prefix}${entry.name}/`);
      } else if (entry.isFile()) {
        result[`${prefix}${entry.name}`] = (await fs.readFile(fullPath)).toString('base64');
      }
    }
  };
  await visit(root, '');
  return result;
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Builds archive bytes directly from names and contents, bypassing the scanner.
 */
export function buildArchive(files: ReadonlyArray<{ name: string; data: Buffer }>): Buffer {
  const layout = layoutTable(files.map(file => ({ ...fitName(file.name), length: file.data.length })));
  return Buffer.concat([encodeHeaderAndTable(layout), ...files.map(file => file.data)]);
}

/**
 * Silences console output for the current test.
 */
export function muteConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}
