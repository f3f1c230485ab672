/**
 * Transfer strategy selector interface
 */

import { Verb } from "./IOperationRequest";

/**
 * How an entry is transferred
 *
 * - atomic-rename: single rename call, same device only
 * - buffered-copy: chunked copy, source kept
 * - copy-then-delete: chunked copy, source removed after verification
 * - copy-only: chunked copy to a backup name next to the source
 * - soft-delete: sent to the recoverable delete store
 */
export type TransferStrategy =
  | "atomic-rename"
  | "buffered-copy"
  | "copy-then-delete"
  | "copy-only"
  | "soft-delete";

/**
 * Plan for transferring one entry (file, symlink or directory)
 *
 * Consumed once by the executor and not retained afterwards.
 */
export interface TransferPlan {
  verb: Verb;
  sourcePath: string;
  /** Absolute target path */
  resolvedTargetPath: string;
  strategy: TransferStrategy;
  isDirectory: boolean;
  /** Best-effort size; directories are the recursive sum */
  sizeBytes: number;
  /** Whether per-chunk progress events are emitted */
  reportProgress: boolean;
}

export interface PlanInput {
  verb: Verb;
  /** Absolute source path */
  source: string;
  /** Destination directory (move, copy) or new name (rename) */
  destination?: string;
  /** Number of entries in the batch */
  totalEntries: number;
}

export interface ITransferStrategySelector {
  /**
   * Build the plan for a top-level entry
   */
  select(input: PlanInput): Promise<TransferPlan>;

  /**
   * Build the plan for a descendant of a directory being transferred
   * @param parent - Plan of the directory being transferred
   * @param source - Absolute path of the descendant
   * @param target - Absolute target path of the descendant
   */
  selectChild(
    parent: TransferPlan,
    source: string,
    target: string
  ): Promise<TransferPlan>;

  /**
   * Backup name for a source: `<name>.bak`, then `<name>.bak2`, `<name>.bak3`, …
   */
  nextBackupPath(source: string): string;
}
