/**
 * Errors and warnings raised while packing or unpacking MSF archives.
 */

/**
 * Base class for every fatal MSF failure.
 */
export class MsfError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'MsfError';
  }
}

export type MsfFormatErrorReason =
  | 'bad-magic'
  | 'truncated-table'
  | 'out-of-bounds'
  | 'unsafe-name'
  | 'field-overflow';

/**
 * The archive bytes do not describe a valid MSF archive, or a value does not fit the format.
 */
export class MsfFormatError extends MsfError {
  constructor(public readonly reason: MsfFormatErrorReason, message: string) {
    super(message);
    this.name = 'MsfFormatError';
  }
}

export type MsfIoOperation = 'open' | 'read' | 'write' | 'stat' | 'readdir';

/**
 * A file or directory could not be opened, read, written or listed.
 */
export class MsfIoError extends MsfError {
  constructor(
    public readonly operation: MsfIoOperation,
    public readonly path: string,
    cause: unknown
  ) {
    super(`Could not ${operation} "${path}": ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    this.name = 'MsfIoError';
  }
}

/**
 * The copy buffer could not be grown to hold a file.
 */
export class MsfAllocationError extends MsfError {
  constructor(public readonly requestedBytes: number, cause: unknown) {
    super(`Out of memory allocating ${requestedBytes} bytes`, cause);
    this.name = 'MsfAllocationError';
  }
}

/**
 * An internal invariant of the encoder did not hold.
 */
export class MsfCodecError extends MsfError {
  constructor(message: string) {
    super(message);
    this.name = 'MsfCodecError';
  }
}

/**
 * Non-fatal conditions. Each one is printed when it happens and collected in the operation summary.
 */
export type MsfWarning =
  | { readonly kind: 'name-truncated'; readonly name: string; readonly originalLength: number }
  | { readonly kind: 'duplicate-name'; readonly name: string }
  | { readonly kind: 'mkdir-failed'; readonly path: string; readonly message: string }
  | { readonly kind: 'empty-archive'; readonly path: string };

/**
 * Human-readable text for a warning.
 */
export function describeWarning(warning: MsfWarning): string {
  switch (warning.kind) {
    case 'name-truncated':
      return `Name of ${warning.originalLength} bytes truncated to "${warning.name}"`;
    case 'duplicate-name':
      return `Duplicate name "${warning.name}"; the later entry overwrites the earlier one on unpack`;
    case 'mkdir-failed':
      return `Could not create directory "${warning.path}": ${warning.message}`;
    case 'empty-archive':
      return `No files found in "${warning.path}"; writing an empty archive`;
  }
}

/**
 * Prints a warning and appends it to the collected list.
 */
export function reportWarning(warnings: MsfWarning[], warning: MsfWarning): void {
  console.warn(`⚠️  ${describeWarning(warning)}`);
  warnings.push(warning);
}
