/**
 * Recoverable delete store (trash) interface
 */

export interface TrashReceipt {
  /** Where the entry used to live */
  originalPath: string;
  /** Where the entry is kept now */
  storedPath: string;
  deletedAt: Date;
}

export interface IRecoverableDeleteStore {
  /** Root directory of the store */
  readonly location: string;

  /**
   * Move an entry into the store
   *
   * Never deletes permanently.
   * @throws FileSystemError with TRASH_UNAVAILABLE if the store cannot be reached
   */
  send(targetPath: string): Promise<TrashReceipt>;
}
