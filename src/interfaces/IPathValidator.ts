/**
 * Path validator interface
 */

import { ErrorCode } from "../types";
import { OperationOptions, Verb } from "./IOperationRequest";

export type ValidationResult =
  | { valid: true }
  | {
      valid: false;
      code: ErrorCode;
      message: string;
      path: string;
    };

export interface IPathValidator {
  /**
   * Check one source against the destination for a verb
   *
   * Pure check, no side effects. `MISSING_TARGET_DIRECTORY` is reported, not
   * fatal: the caller decides whether to create the directory and retry.
   * @param source - Absolute source path
   * @param destination - Destination directory (move, copy), new name (rename),
   *   trash location (remove) or undefined (backup)
   * @param verb - Operation verb
   * @param options - Operation options (auto-mkdir is consulted)
   */
  validate(
    source: string,
    destination: string | undefined,
    verb: Verb,
    options: Pick<OperationOptions, "autoMkdir">
  ): ValidationResult;

  /**
   * Destination-only checks, run once per batch
   */
  validateDestination(
    destination: string,
    verb: Verb,
    options: Pick<OperationOptions, "autoMkdir">
  ): ValidationResult;
}
