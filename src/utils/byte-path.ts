/**
 * Filesystem paths kept as raw bytes.
 *
 * Names from directory listings and archive tables need not be valid UTF-8,
 * so they travel as Buffers and are decoded only for messages. Path arithmetic
 * runs on a latin1 view of the bytes, where every byte is one character.
 * Separators and dots are ASCII, so `node:path` reads the view exactly as it
 * would read the bytes.
 */
import { resolve } from 'node:path';

export type BytePath = string | Buffer;

/** Bytes of a path; strings are encoded as UTF-8. */
export function pathBytes(path: BytePath): Buffer {
  return typeof path === 'string' ? Buffer.from(path, 'utf8') : path;
}

/** Latin1 view of a path, for use with `node:path`. */
export function toView(path: BytePath): string {
  return pathBytes(path).toString('latin1');
}

/** Bytes of a latin1 view. */
export function fromView(view: string): Buffer {
  return Buffer.from(view, 'latin1');
}

/** Absolute latin1 view of a path, resolved against the working directory. */
export function absoluteView(path: BytePath): string {
  return resolve(toView(process.cwd()), toView(path));
}

/** UTF-8 text of a path for log lines and error messages. */
export function displayPath(path: BytePath): string {
  return typeof path === 'string' ? path : path.toString('utf8');
}

/** UTF-8 text of a latin1 view. */
export function displayView(view: string): string {
  return fromView(view).toString('utf8');
}
