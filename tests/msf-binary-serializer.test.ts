import { describe, expect, it } from 'vitest';
import { BinaryReader, BinaryWriter } from '../src/utils/msf-binary-serializer.js';
import { MsfFormatError } from '../src/types/diagnostics.js';

describe('BinaryWriter', () => {
  it('writes 32-bit values big-endian', () => {
    const writer = new BinaryWriter();
    writer.writeUint32(0x01020304);
    writer.writeUint32(999);

    expect([...writer.toBuffer()]).toEqual([0x01, 0x02, 0x03, 0x04, 0x00, 0x00, 0x03, 0xe7]);
  });

  it('writes bytes and single-byte fields in order', () => {
    const writer = new BinaryWriter();
    writer.writeUint8(255);
    writer.writeBytes(Buffer.from('ab'));

    expect([...writer.toBuffer()]).toEqual([0xff, 0x61, 0x62]);
    expect(writer.length).toBe(3);
  });

  it('grows past its initial size without losing data', () => {
    const writer = new BinaryWriter(2);
    writer.writeUint32(1);
    writer.writeUint32(2);
    writer.writeUint32(3);

    expect(writer.length).toBe(12);
    expect([...writer.toBuffer()]).toEqual([0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3]);
  });

  it('rejects values that do not fit their field', () => {
    const writer = new BinaryWriter();

    expect(() => writer.writeUint32(0x100000000)).toThrow(MsfFormatError);
    expect(() => writer.writeUint32(-1)).toThrow(MsfFormatError);
    expect(() => writer.writeUint8(256)).toThrow(/8-bit field/);
    expect(writer.length).toBe(0);
  });

  it('accepts the largest 32-bit value', () => {
    const writer = new BinaryWriter();
    writer.writeUint32(0xffffffff);

    expect([...writer.toBuffer()]).toEqual([0xff, 0xff, 0xff, 0xff]);
  });
});

describe('BinaryReader', () => {
  it('reads fields big-endian and tracks its position', () => {
    const reader = new BinaryReader(Buffer.from([0x00, 0x00, 0x03, 0xe7, 0x7f, 0xaa, 0xbb]));

    expect(reader.readUint32()).toBe(999);
    expect(reader.readUint8()).toBe(0x7f);
    expect(reader.position).toBe(5);
    expect([...reader.readBytes(2)]).toEqual([0xaa, 0xbb]);
    expect(reader.remaining).toBe(0);
  });

  it('raises a truncated-table error when reading past the end', () => {
    const reader = new BinaryReader(Buffer.from([0x01, 0x02]));

    expect(() => reader.readUint32()).toThrow(MsfFormatError);
    expect(() => reader.readUint32()).toThrow(/needed 4 bytes at offset 0, 2 available/);
  });

  it('returns copies from readBytes', () => {
    const source = Buffer.from([1, 2, 3]);
    const bytes = new BinaryReader(source).readBytes(3);
    source[0] = 9;

    expect(bytes[0]).toBe(1);
  });
});
