/**
 * Path validator implementation
 * Pure checks run before any entry is planned or transferred
 */

import * as fs from "fs";
import * as path from "path";
import { OperationOptions, Verb } from "../interfaces/IOperationRequest";
import { IPathValidator, ValidationResult } from "../interfaces/IPathValidator";
import { ErrorCode } from "../types";

const VALID: ValidationResult = { valid: true };

function invalid(code: ErrorCode, message: string, path: string): ValidationResult {
  return { valid: false, code, message, path };
}

export class PathValidator implements IPathValidator {
  validate(
    source: string,
    destination: string | undefined,
    verb: Verb,
    options: Pick<OperationOptions, "autoMkdir">
  ): ValidationResult {
    const sourcePath = path.resolve(source);

    // lstat so that a dangling symlink still counts as an existing source
    const sourceStats = fs.lstatSync(sourcePath, { throwIfNoEntry: false });
    if (!sourceStats) {
      return invalid(
        ErrorCode.SOURCE_NOT_FOUND,
        `Source does not exist: ${source}`,
        source
      );
    }

    switch (verb) {
      case "move":
      case "copy":
        return this.validateTransfer(
          sourcePath,
          sourceStats.isDirectory(),
          destination,
          verb,
          options
        );

      case "rename":
        return this.validateRename(sourcePath, destination);

      case "remove":
        // Never send the trash into itself
        if (
          destination &&
          this.contains(this.realPath(sourcePath), this.realPath(path.resolve(destination)))
        ) {
          return invalid(
            ErrorCode.RECURSIVE_CONFLICT,
            `Cannot remove a directory that contains the trash: ${source}`,
            source
          );
        }
        return VALID;

      case "backup":
        return VALID;
    }
  }

  validateDestination(
    destination: string,
    verb: Verb,
    options: Pick<OperationOptions, "autoMkdir">
  ): ValidationResult {
    if (verb !== "move" && verb !== "copy") {
      return VALID;
    }

    // stat follows symlinks: a link to a directory is a valid destination
    const stats = fs.statSync(destination, { throwIfNoEntry: false });
    if (stats && !stats.isDirectory()) {
      return invalid(
        ErrorCode.TARGET_NOT_DIRECTORY,
        `Target must be directory: ${destination}`,
        destination
      );
    }

    if (!stats && !options.autoMkdir) {
      return invalid(
        ErrorCode.MISSING_TARGET_DIRECTORY,
        `Target directory does not exist: ${destination}`,
        destination
      );
    }

    return VALID;
  }

  private validateTransfer(
    sourcePath: string,
    sourceIsDirectory: boolean,
    destination: string | undefined,
    verb: Verb,
    options: Pick<OperationOptions, "autoMkdir">
  ): ValidationResult {
    if (destination === undefined) {
      return invalid(
        ErrorCode.INVALID_REQUEST,
        `Destination required for ${verb} operation`,
        sourcePath
      );
    }
    const destPath = path.resolve(destination);

    const destStats = fs.statSync(destPath, { throwIfNoEntry: false });
    if (destStats && !destStats.isDirectory()) {
      return invalid(
        ErrorCode.TARGET_NOT_DIRECTORY,
        `Target must be directory: ${destination}`,
        destination
      );
    }

    if (
      sourceIsDirectory &&
      this.contains(this.realPath(sourcePath), this.realPath(destPath))
    ) {
      return invalid(
        ErrorCode.RECURSIVE_CONFLICT,
        `Target directory is inside source: ${destination}`,
        destination
      );
    }

    if (path.join(destPath, path.basename(sourcePath)) === sourcePath) {
      return invalid(
        ErrorCode.SAME_FILE,
        `Source and target are the same: ${sourcePath}`,
        sourcePath
      );
    }

    return this.validateDestination(destPath, verb, options);
  }

  private validateRename(
    sourcePath: string,
    newName: string | undefined
  ): ValidationResult {
    if (
      newName === undefined ||
      newName.trim() === "" ||
      newName === "." ||
      newName === ".." ||
      /[\\/]/.test(newName)
    ) {
      return invalid(
        ErrorCode.INVALID_NAME,
        `New name must be a plain file name: ${newName ?? ""}`,
        newName ?? ""
      );
    }

    if (path.join(path.dirname(sourcePath), newName) === sourcePath) {
      return invalid(
        ErrorCode.SAME_FILE,
        `Source and target are the same: ${sourcePath}`,
        sourcePath
      );
    }

    return VALID;
  }

  /**
   * Path with every symlink resolved. Missing trailing components are
   * appended to the real path of the nearest existing ancestor.
   */
  private realPath(target: string): string {
    const missing: string[] = [];
    let existing = target;
    while (!fs.existsSync(existing)) {
      const parent = path.dirname(existing);
      if (parent === existing) {
        return target;
      }
      missing.unshift(path.basename(existing));
      existing = parent;
    }
    return path.join(fs.realpathSync(existing), ...missing);
  }

  /**
   * Whether `descendant` is `ancestor` or lies inside it
   */
  private contains(ancestor: string, descendant: string): boolean {
    const relative = path.relative(ancestor, descendant);
    return (
      relative === "" ||
      (relative !== ".." &&
        !relative.startsWith(`..${path.sep}`) &&
        !path.isAbsolute(relative))
    );
  }
}
