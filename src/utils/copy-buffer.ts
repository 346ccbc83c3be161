/**
 * Reusable buffer for moving file contents in and out of an archive.
 */

import { COPY_BUFFER_SLACK } from '../constants/msf-format.js';
import { MsfAllocationError } from '../types/diagnostics.js';

/**
 * Allocates an uninitialised buffer, reporting failure as MsfAllocationError.
 */
export function allocate(size: number): Buffer {
  try {
    return Buffer.allocUnsafe(size);
  } catch (error) {
    throw new MsfAllocationError(size, error);
  }
}

export class CopyBuffer {
  private buffer: Buffer;

  constructor(private readonly slack: number = COPY_BUFFER_SLACK) {
    this.buffer = Buffer.alloc(0);
  }

  /** Current capacity in bytes. */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Returns a view of exactly `length` bytes, growing the backing buffer to
   * `length + slack` when it is too small. Contents of the view are unspecified.
   *
   * @throws {MsfAllocationError} If the buffer cannot be grown
   */
  acquire(length: number): Buffer {
    if (length > this.buffer.length) {
      this.buffer = allocate(length + this.slack);
    }
    return this.buffer.subarray(0, length);
  }
}
