/**
 * Error handler for fops
 * Converts thrown errors into structured failures and exit codes
 */

import { ErrorCode, FileSystemError, OperationFailure, ValidationError } from "../types";
import { ExitCode } from "../interfaces/IBatchOrchestrator";
import { OutcomeCounts } from "../interfaces/ITransferExecutor";
import { AuditLogger } from "./AuditLogger";

/**
 * Message table key for each error code
 */
const MESSAGE_KEYS: Record<ErrorCode, string> = {
  [ErrorCode.SOURCE_NOT_FOUND]: "error_file_not_found",
  [ErrorCode.TARGET_NOT_DIRECTORY]: "error_target_is_file",
  [ErrorCode.RECURSIVE_CONFLICT]: "error_target_in_source",
  [ErrorCode.MISSING_TARGET_DIRECTORY]: "error_missing_dir",
  [ErrorCode.INSUFFICIENT_SPACE]: "error_disk_full",
  [ErrorCode.PERMISSION_DENIED]: "error_permission_denied",
  [ErrorCode.CROSS_DEVICE]: "error_cross_device",
  [ErrorCode.TRASH_UNAVAILABLE]: "error_trash_unavailable",
  [ErrorCode.ABORTED]: "operation_cancelled",
  [ErrorCode.SAME_FILE]: "error_same_file",
  [ErrorCode.INVALID_NAME]: "error_invalid_name",
  [ErrorCode.TARGET_TYPE_MISMATCH]: "error_type_mismatch",
  [ErrorCode.VERIFICATION_FAILED]: "error_verification",
  [ErrorCode.IO_ERROR]: "error_io",
  [ErrorCode.INVALID_REQUEST]: "error_io",
};

export class ErrorHandler {
  /**
   * Convert an error to a structured failure
   * @param error - Anything thrown by a filesystem call or by the engine
   * @param fallbackPath - Path to report when the error carries none
   */
  static toFailure(error: unknown, fallbackPath?: string): OperationFailure {
    if (error instanceof FileSystemError) {
      return {
        code: error.code,
        message: error.message,
        path: error.path ?? fallbackPath,
      };
    }

    if (error instanceof ValidationError) {
      return {
        code: ErrorCode.INVALID_REQUEST,
        message: error.message,
        path: fallbackPath,
      };
    }

    if (this.isNodeError(error)) {
      return this.handleNodeError(error, fallbackPath);
    }

    return {
      code: ErrorCode.IO_ERROR,
      message: this.describe(error) || "An unexpected error occurred",
      path: fallbackPath,
    };
  }

  /**
   * Handle Node.js system errors (ENOENT, EACCES, etc.)
   */
  private static handleNodeError(
    error: NodeJS.ErrnoException,
    fallbackPath?: string
  ): OperationFailure {
    let code = ErrorCode.IO_ERROR;

    switch (error.code) {
      case "ENOENT":
        code = ErrorCode.SOURCE_NOT_FOUND;
        break;
      case "EACCES":
      case "EPERM":
      case "EROFS":
        code = ErrorCode.PERMISSION_DENIED;
        break;
      case "ENOSPC":
      case "EDQUOT":
        code = ErrorCode.INSUFFICIENT_SPACE;
        break;
      case "EXDEV":
        code = ErrorCode.CROSS_DEVICE;
        break;
      case "EISDIR":
        code = ErrorCode.TARGET_TYPE_MISMATCH;
        break;
      case "ENOTDIR":
        code = ErrorCode.TARGET_NOT_DIRECTORY;
        break;
    }

    return {
      code,
      message: this.describe(error),
      path: error.path ?? fallbackPath,
    };
  }

  /**
   * Check if error is a Node.js system error
   */
  static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    // Duck-typed: errors raised by fs may come from another realm
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E")
    );
  }

  /**
   * Message of anything thrown
   */
  static describe(error: unknown): string {
    if (
      typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string"
    ) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Check for a specific errno code
   */
  static hasCode(error: unknown, code: string): boolean {
    return this.isNodeError(error) && error.code === code;
  }

  /**
   * Message table key used to label a failure
   */
  static messageKey(code: ErrorCode): string {
    return MESSAGE_KEYS[code];
  }

  /**
   * Exit code for a finished batch: aborted wins over failed
   */
  static exitCodeFor(counts: OutcomeCounts, aborted: boolean): ExitCode {
    if (aborted) {
      return ExitCode.ABORTED;
    }
    if (counts.failed > 0) {
      return ExitCode.FAILURE;
    }
    return ExitCode.SUCCESS;
  }

  /**
   * Exit code for an error raised outside of a batch
   */
  static exitCodeForError(error: unknown): ExitCode {
    return error instanceof ValidationError
      ? ExitCode.INVALID_INVOCATION
      : ExitCode.FAILURE;
  }

  /**
   * Log error for debugging
   */
  static logError(
    logger: AuditLogger,
    operation: string,
    error: unknown,
    paths: string[] = []
  ): void {
    logger.error(
      operation,
      paths,
      error instanceof Error || this.isNodeError(error)
        ? `${error.name}: ${this.describe(error)}`
        : this.describe(error)
    );
  }
}
