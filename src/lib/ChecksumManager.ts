/**
 * Checksum manager implementation
 * Used to verify copies when the configured verification mode is sha256
 */

import * as crypto from "crypto";
import * as fs from "fs";
import {
  ChecksumAlgorithm,
  ChecksumResult,
  IChecksumManager,
  VerificationResult,
} from "../interfaces/IChecksumManager";
import { ErrorCode, FileSystemError } from "../types";

export class ChecksumManager implements IChecksumManager {
  /**
   * Compute checksum for a file by streaming its content
   */
  async computeChecksum(
    filePath: string,
    algorithm: ChecksumAlgorithm
  ): Promise<ChecksumResult> {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      throw new FileSystemError(
        `Path is not a file: ${filePath}`,
        ErrorCode.TARGET_TYPE_MISMATCH,
        filePath
      );
    }

    const hash = crypto.createHash(algorithm);
    for await (const chunk of fs.createReadStream(filePath)) {
      hash.update(chunk);
    }

    // A writer touching the file mid-hash makes the result meaningless
    const after = await fs.promises.stat(filePath);
    if (after.mtimeMs !== stats.mtimeMs || after.size !== stats.size) {
      throw new FileSystemError(
        `File was modified during checksum computation: ${filePath}`,
        ErrorCode.VERIFICATION_FAILED,
        filePath
      );
    }

    return {
      path: filePath,
      algorithm,
      checksum: hash.digest("hex"),
    };
  }

  /**
   * Verify file checksum by computing and comparing (case-insensitive)
   */
  async verifyChecksum(
    filePath: string,
    expectedChecksum: string,
    algorithm: ChecksumAlgorithm
  ): Promise<VerificationResult> {
    const result = await this.computeChecksum(filePath, algorithm);
    const expected = expectedChecksum.toLowerCase();

    return {
      path: filePath,
      algorithm,
      expected,
      actual: result.checksum,
      match: result.checksum === expected,
    };
  }
}
