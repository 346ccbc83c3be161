/**
 * Layout constants for MSF archives.
 * All multi-byte fields in the format are big-endian.
 */

/** Eight-byte signature at the start of every archive. */
export const MSF_MAGIC: Buffer = Buffer.from([0x00, 0x00, 0x03, 0xe7, 0x00, 0x00, 0x00, 0x02]);

/** Magic plus the 32-bit file count. */
export const HEADER_SIZE = MSF_MAGIC.length + 4;

/** Fixed part of a table entry: offset, length and the name-length byte. */
export const ENTRY_FIXED_SIZE = 4 + 4 + 1;

/** Names are prefixed by a single length byte. */
export const MAX_NAME_LENGTH = 255;

/** Largest value an offset or length field can hold. */
export const MAX_UINT32 = 0xffffffff;

/** Extra room added whenever the copy buffer grows. */
export const COPY_BUFFER_SLACK = 1024 * 1024;
