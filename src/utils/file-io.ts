/**
 * Positional file reads and writes that report failures as MsfIoError.
 */
import { open, type FileHandle } from 'node:fs/promises';
import { MsfIoError } from '../types/diagnostics.js';
import { displayPath, type BytePath } from './byte-path.js';

/**
 * Opens a file, wrapping failures with the path that could not be opened.
 */
export async function openFile(path: BytePath, flags: 'r' | 'w'): Promise<FileHandle> {
  try {
    return await open(path, flags);
  } catch (error) {
    throw new MsfIoError('open', displayPath(path), error);
  }
}

/**
 * Reads into `target` starting at `position` until it is full or the file ends.
 * @returns Number of bytes actually read
 */
export async function readFully(handle: FileHandle, target: Buffer, position: number, path: BytePath): Promise<number> {
  let filled = 0;
  while (filled < target.length) {
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(target, filled, target.length - filled, position + filled));
    } catch (error) {
      throw new MsfIoError('read', displayPath(path), error);
    }
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled;
}

/**
 * Writes all of `source` at the handle's current position.
 */
export async function writeFully(handle: FileHandle, source: Buffer, path: BytePath): Promise<void> {
  try {
    let written = 0;
    while (written < source.length) {
      const { bytesWritten } = await handle.write(source, written, source.length - written);
      written += bytesWritten;
    }
  } catch (error) {
    throw new MsfIoError('write', displayPath(path), error);
  }
}
