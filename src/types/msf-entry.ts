/**
 * One file record in an MSF table.
 */
export interface MsfEntry {
  /** Name decoded as UTF-8, for display. Invalid sequences show as U+FFFD. */
  readonly name: string;
  /** Name exactly as stored in the table, at most 255 bytes. */
  readonly nameBytes: Buffer;
  /** Absolute byte position of the file data within the archive. */
  readonly offset: number;
  /** Size of the file data in bytes. */
  readonly length: number;
}

/**
 * A regular file found by the scanner, before offsets are assigned.
 */
export interface ScannedFile {
  /** Absolute path the contents are read from, as raw bytes. */
  readonly sourcePath: Buffer;
  /** Path relative to the scanned root, `/`-separated, possibly truncated. */
  readonly name: string;
  readonly nameBytes: Buffer;
  readonly length: number;
  /** Whether the relative path was cut down to fit the name field. */
  readonly truncated: boolean;
  /** Byte length of the relative path before truncation. */
  readonly originalNameLength: number;
}
