/**
 * Filesystem inspector implementation
 */

import * as fs from "fs";
import * as path from "path";
import {
  DiskSpaceInfo,
  IFilesystemInspector,
} from "../interfaces/IFilesystemInspector";
import { ErrorCode, FileSystemError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export class FilesystemInspector implements IFilesystemInspector {
  async getDeviceId(targetPath: string): Promise<number> {
    const existing = await this.nearestExisting(targetPath);
    const stats = await fs.promises.lstat(existing);
    return stats.dev;
  }

  async getDiskSpace(targetPath: string): Promise<DiskSpaceInfo> {
    const checkPath = await this.nearestExisting(targetPath);

    let stats: fs.StatsFs;
    try {
      stats = await fs.promises.statfs(checkPath);
    } catch (error) {
      throw new FileSystemError(
        `Failed to get disk space: ${ErrorHandler.describe(error)}`,
        ErrorCode.IO_ERROR,
        checkPath
      );
    }

    return { available: stats.bavail * stats.bsize };
  }

  async calculateSize(targetPath: string): Promise<number> {
    const stats = await fs.promises.lstat(targetPath);
    if (!stats.isDirectory()) {
      return stats.size;
    }
    return this.calculateSizeRecursive(targetPath);
  }

  async countFiles(targetPath: string): Promise<number> {
    const stats = await fs.promises.lstat(targetPath);
    if (!stats.isDirectory()) {
      return 1;
    }

    let count = 0;
    const entries = await fs.promises.readdir(targetPath, {
      withFileTypes: true,
    });
    for (const entry of entries) {
      const fullPath = path.join(targetPath, entry.name);
      count += entry.isDirectory() ? await this.countFiles(fullPath) : 1;
    }
    return count;
  }

  /**
   * Recursively sum file sizes; unreadable entries count as zero
   */
  private async calculateSizeRecursive(dirPath: string): Promise<number> {
    let totalSize = 0;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (ErrorHandler.hasCode(error, "EACCES")) {
        return 0;
      }
      throw error;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        totalSize += await this.calculateSizeRecursive(fullPath);
      } else {
        // Symlinks count as the link itself, not the target
        const stats = await fs.promises.lstat(fullPath);
        totalSize += stats.size;
      }
    }

    return totalSize;
  }

  /**
   * The path itself if it exists, otherwise its closest existing ancestor
   */
  private async nearestExisting(targetPath: string): Promise<string> {
    let current = path.resolve(targetPath);
    for (;;) {
      try {
        await fs.promises.lstat(current);
        return current;
      } catch (error) {
        if (!ErrorHandler.hasCode(error, "ENOENT")) {
          throw error;
        }
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return current;
      }
      current = parent;
    }
  }
}
