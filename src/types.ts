/**
 * Common types for the fops file-operation engine
 *
 * This module defines the error taxonomy and the error classes thrown by the
 * engine and the command-line front end.
 */

/**
 * Error codes for every failure the engine can report
 *
 * The first nine codes are the core taxonomy; the rest refine failures that
 * would otherwise surface as a generic I/O error.
 */
export enum ErrorCode {
  SOURCE_NOT_FOUND = "SOURCE_NOT_FOUND",
  TARGET_NOT_DIRECTORY = "TARGET_NOT_DIRECTORY",
  RECURSIVE_CONFLICT = "RECURSIVE_CONFLICT",
  MISSING_TARGET_DIRECTORY = "MISSING_TARGET_DIRECTORY",
  INSUFFICIENT_SPACE = "INSUFFICIENT_SPACE",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  CROSS_DEVICE = "CROSS_DEVICE",
  TRASH_UNAVAILABLE = "TRASH_UNAVAILABLE",
  ABORTED = "ABORTED",

  SAME_FILE = "SAME_FILE",
  INVALID_NAME = "INVALID_NAME",
  TARGET_TYPE_MISMATCH = "TARGET_TYPE_MISMATCH",
  VERIFICATION_FAILED = "VERIFICATION_FAILED",
  IO_ERROR = "IO_ERROR",
  INVALID_REQUEST = "INVALID_REQUEST",
}

/**
 * Validation error - thrown when an invocation is invalid
 *
 * Validation errors are raised before the engine starts (conflicting flags,
 * empty source list, malformed rename). The CLI exits with code 3.
 *
 * @example
 * ```typescript
 * throw new ValidationError("--force and --no-clobber cannot be used together");
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Filesystem error - thrown when a filesystem operation fails
 *
 * Carries the error code and, where one is known, the offending path so the
 * batch summary can report it verbatim.
 *
 * @example
 * ```typescript
 * throw new FileSystemError(
 *   "Insufficient disk space",
 *   ErrorCode.INSUFFICIENT_SPACE,
 *   "/mnt/backup"
 * );
 * ```
 */
export class FileSystemError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;

  constructor(message: string, code: ErrorCode = ErrorCode.IO_ERROR, path?: string) {
    super(message);
    this.name = "FileSystemError";
    this.code = code;
    this.path = path;
  }
}

/**
 * Structured failure attached to a failed entry
 */
export interface OperationFailure {
  /** Error code */
  code: ErrorCode;
  /** Human-readable message, OS messages kept verbatim */
  message: string;
  /** Offending path, when known */
  path?: string;
}
