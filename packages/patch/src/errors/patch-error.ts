import { formatCrc32 } from "@binpatch/utils";

/**
 * Failure categories a caller can act on.
 *
 * - `format`: the bytes are not a patch of the detected format
 * - `capacity`: the change cannot be expressed in the format's fixed-width fields
 * - `source-mismatch`: the patch was built for a different source image
 * - `corrupt`: the patch or its reconstruction fails a checksum
 */
export type PatchErrorKind = "format" | "capacity" | "source-mismatch" | "corrupt";

/**
 * Base class for all patch engine errors.
 */
export class PatchError extends Error {
  readonly kind: PatchErrorKind;

  constructor(kind: PatchErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PatchError";
    this.kind = kind;
  }
}

/**
 * Thrown when patch bytes are malformed: bad magic, truncated header or
 * record, or a varint whose continuation bit never clears.
 */
export class PatchFormatError extends PatchError {
  readonly format?: string;

  constructor(message: string, format?: string, options?: ErrorOptions) {
    super("format", format ? `${format.toUpperCase()}: ${message}` : message, options);
    this.name = "PatchFormatError";
    this.format = format;
  }
}

/**
 * Thrown when an offset or length does not fit the format's fields.
 */
export class CapacityExceededError extends PatchError {
  readonly value: number;
  readonly limit: number;

  constructor(what: string, value: number, limit: number) {
    super(
      "capacity",
      `${what} 0x${value.toString(16).toUpperCase()} exceeds the format limit of 0x${limit.toString(16).toUpperCase()}`,
    );
    this.name = "CapacityExceededError";
    this.value = value;
    this.limit = limit;
  }
}

/**
 * Thrown when the buffer being patched is not the one the patch was built for.
 */
export class SourceMismatchError extends PatchError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, message?: string) {
    super(
      "source-mismatch",
      message ??
        `Source checksum mismatch: patch expects ${formatCrc32(expected)}, got ${formatCrc32(actual)}`,
    );
    this.name = "SourceMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when the patch bytes or the reconstructed output fail verification.
 */
export class CorruptPatchError extends PatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("corrupt", message, options);
    this.name = "CorruptPatchError";
  }
}

export function isPatchError(error: unknown): error is PatchError {
  return error instanceof PatchError;
}

