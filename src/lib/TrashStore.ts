/**
 * Recoverable delete store
 *
 * Lays entries out like a FreeDesktop trash directory: the entry itself under
 * `files/` and a `.trashinfo` record under `info/` holding the original path
 * and the deletion date, so desktop file managers can restore it.
 */

import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import {
  IRecoverableDeleteStore,
  TrashReceipt,
} from "../interfaces/IRecoverableDeleteStore";
import { ErrorCode, FileSystemError } from "../types";
import { AuditLogger, silentLogger } from "./AuditLogger";
import { ErrorHandler } from "./ErrorHandler";

export class TrashStore implements IRecoverableDeleteStore {
  readonly location: string;

  constructor(location: string, private logger: AuditLogger = silentLogger) {
    this.location = path.resolve(location);
  }

  async send(targetPath: string): Promise<TrashReceipt> {
    const filesDir = path.join(this.location, "files");
    const infoDir = path.join(this.location, "info");

    try {
      await fs.promises.mkdir(filesDir, { recursive: true });
      await fs.promises.mkdir(infoDir, { recursive: true });
    } catch (error) {
      throw new FileSystemError(
        `Trash is not reachable: ${ErrorHandler.describe(error)}`,
        ErrorCode.TRASH_UNAVAILABLE,
        this.location
      );
    }

    const deletedAt = new Date();
    const { name, infoPath } = await this.reserveName(
      path.basename(targetPath),
      filesDir,
      infoDir,
      targetPath,
      deletedAt
    );
    const storedPath = path.join(filesDir, name);

    try {
      await fs.promises.rename(targetPath, storedPath);
    } catch (error) {
      await this.releaseName(infoPath);
      if (ErrorHandler.hasCode(error, "EXDEV")) {
        throw new FileSystemError(
          `Trash ${this.location} is on a different device than ${targetPath}`,
          ErrorCode.TRASH_UNAVAILABLE,
          targetPath
        );
      }
      throw error;
    }

    this.logger.auditOperation("trash", [targetPath, storedPath], "success");

    return { originalPath: targetPath, storedPath, deletedAt };
  }

  /**
   * Claim a free name by creating its info record exclusively. A name whose
   * `files/` entry exists without a record is taken as well.
   */
  private async reserveName(
    baseName: string,
    filesDir: string,
    infoDir: string,
    originalPath: string,
    deletedAt: Date
  ): Promise<{ name: string; infoPath: string }> {
    const record = [
      "[Trash Info]",
      `Path=${encodeURI(originalPath)}`,
      `DeletionDate=${formatDeletionDate(deletedAt)}`,
      "",
    ].join("\n");

    let name = baseName;
    for (;;) {
      const infoPath = path.join(infoDir, `${name}.trashinfo`);
      try {
        await fs.promises.writeFile(infoPath, record, { flag: "wx" });
        if (!(await this.isOccupied(path.join(filesDir, name)))) {
          return { name, infoPath };
        }
        await this.releaseName(infoPath);
      } catch (error) {
        if (!ErrorHandler.hasCode(error, "EEXIST")) {
          throw new FileSystemError(
            `Trash is not writable: ${ErrorHandler.describe(error)}`,
            ErrorCode.TRASH_UNAVAILABLE,
            this.location
          );
        }
      }
      name = `${baseName}.${uuidv4().slice(0, 8)}`;
    }
  }

  private async isOccupied(storedPath: string): Promise<boolean> {
    try {
      await fs.promises.lstat(storedPath);
      return true;
    } catch (error) {
      if (ErrorHandler.hasCode(error, "ENOENT")) {
        return false;
      }
      throw error;
    }
  }

  private async releaseName(infoPath: string): Promise<void> {
    try {
      await fs.promises.unlink(infoPath);
    } catch (error) {
      ErrorHandler.logError(this.logger, "trash_release", error, [infoPath]);
    }
  }
}

/**
 * Local time as YYYY-MM-DDThh:mm:ss
 */
function formatDeletionDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
