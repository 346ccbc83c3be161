/**
 * Header and table of an MSF archive as read back from disk.
 */
import { MsfEntry } from './msf-entry.js';

export interface MsfArchive {
  readonly archivePath: string;
  readonly fileCount: number;
  /** Offset of the first data byte, right after the table. */
  readonly dataStart: number;
  /** Size of the archive file in bytes. */
  readonly totalSize: number;
  readonly entries: readonly MsfEntry[];
}

/**
 * Entries with offsets assigned, ready to be written.
 */
export interface MsfTableLayout {
  readonly dataStart: number;
  /** Size the finished archive will have. */
  readonly totalSize: number;
  readonly entries: readonly MsfEntry[];
}
