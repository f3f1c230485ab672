/**
 * Filesystem inspector interface
 *
 * Metadata queries used to choose strategies and enforce the disk-space
 * precondition. Injectable so tests can simulate other devices or full disks.
 */

export interface DiskSpaceInfo {
  /** Bytes available to unprivileged writers */
  available: number;
}

export interface IFilesystemInspector {
  /**
   * Device id of a path, or of its nearest existing ancestor
   * @param targetPath - Absolute path, which may not exist yet
   */
  getDeviceId(targetPath: string): Promise<number>;

  /**
   * Free space on the device holding a path (or its nearest existing ancestor)
   */
  getDiskSpace(targetPath: string): Promise<DiskSpaceInfo>;

  /**
   * Size in bytes: file size, link size, or the recursive sum for directories
   */
  calculateSize(targetPath: string): Promise<number>;

  /**
   * Number of non-directory entries under a path (1 for a file)
   */
  countFiles(targetPath: string): Promise<number>;
}
