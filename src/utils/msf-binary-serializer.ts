/**
 * Big-endian binary writer and reader used for MSF headers and tables.
 * Byte order is fixed by the format and independent of the host.
 */

import { MAX_UINT32 } from '../constants/msf-format.js';
import { MsfFormatError } from '../types/diagnostics.js';

/**
 * Appends fixed-width big-endian fields to a buffer that grows as needed.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialSize = 1024) {
    this.buffer = Buffer.alloc(initialSize);
    this.offset = 0;
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this.offset;
  }

  writeUint8(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new MsfFormatError('field-overflow', `Value ${value} does not fit in an 8-bit field`);
    }
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
      throw new MsfFormatError('field-overflow', `Value ${value} does not fit in a 32-bit field`);
    }
    this.ensureCapacity(4);
    this.buffer.writeUInt32BE(value, this.offset);
    this.offset += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /** Returns a view of the bytes written so far. */
  toBuffer(): Buffer {
    return this.buffer.subarray(0, this.offset);
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer, 0, 0, this.offset);
      this.buffer = newBuffer;
    }
  }
}

/**
 * Reads fixed-width big-endian fields from a buffer with a moving cursor.
 * Running past the end raises a truncated-table format error.
 */
export class BinaryReader {
  private readonly buffer: Buffer;
  private offset: number;

  constructor(buffer: Buffer) {
    this.buffer = buffer;
    this.offset = 0;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUint8(): number {
    this.require(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  /** Returns a copy so the result does not pin the source buffer. */
  readBytes(length: number): Buffer {
    this.require(length);
    const bytes = Buffer.from(this.buffer.subarray(this.offset, this.offset + length));
    this.offset += length;
    return bytes;
  }

  private require(length: number): void {
    if (this.offset + length > this.buffer.length) {
      throw new MsfFormatError(
        'truncated-table',
        `Unexpected end of data: needed ${length} bytes at offset ${this.offset}, ${this.remaining} available`
      );
    }
  }
}
