/**
 * msftool - Main entry point
 *
 * Packs directory trees into flat MSF archives and unpacks them again.
 */

// Re-export pack/unpack functionality
export { packDirectory, type PackOptions, type PackSummary } from './pack.js';
export { unpackArchive, resolveEntryPath, type UnpackOptions, type UnpackSummary } from './unpack.js';
export { scanDirectory, type ScanOptions } from './scanner.js';
export { ensureParentDirs, type PathBuildResult } from './path-builder.js';

// Re-export codec utilities
export {
  MsfBinary,
  fitName,
  layoutTable,
  encodeHeader,
  encodeTable,
  encodeHeaderAndTable,
  parseArchive,
  ensureMagic
} from './msf-binary.js';
export { BinaryReader, BinaryWriter } from './utils/msf-binary-serializer.js';
export * from './constants/msf-format.js';

// Re-export types and diagnostics
export type { MsfEntry, ScannedFile } from './types/msf-entry.js';
export type { MsfArchive, MsfTableLayout } from './types/msf-archive.js';
export {
  MsfError,
  MsfFormatError,
  MsfIoError,
  MsfAllocationError,
  MsfCodecError,
  describeWarning,
  type MsfWarning,
  type MsfFormatErrorReason
} from './types/diagnostics.js';
