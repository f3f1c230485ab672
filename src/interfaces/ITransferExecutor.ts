/**
 * Transfer executor interface and the events and results it produces
 */

import { ErrorCode, OperationFailure } from "../types";
import { IOverwriteResolver } from "./IOverwriteResolver";
import { TransferPlan } from "./ITransferStrategySelector";

/**
 * Byte-level progress of the current entry
 */
export interface ProgressEvent {
  /** 1-based index of the entry in the batch */
  entryIndex: number;
  totalEntries: number;
  bytesDone: number;
  bytesTotal: number;
  /** File currently being transferred */
  currentPath: string;
}

/**
 * Entry-level progress of a batch
 */
export interface BatchProgressEvent {
  entryIndex: number;
  totalEntries: number;
  currentPath: string;
}

export type StatusLevel = "info" | "success" | "warning" | "error";

/**
 * Localized, human-readable status line (verbose mode)
 */
export interface StatusEvent {
  level: StatusLevel;
  message: string;
}

/**
 * Consumer of engine events. Every callback is optional.
 */
export interface ProgressSink {
  onProgress?(event: ProgressEvent): void;
  onBatchProgress?(event: BatchProgressEvent): void;
  onStatus?(event: StatusEvent): void;
}

/**
 * Where an entry sits in its batch, plus the request flags the executor needs
 */
export interface ExecutionContext {
  /** 1-based index of the entry in the batch */
  entryIndex: number;
  totalEntries: number;
  /** Glob patterns for descendants to leave out */
  exclude: string[];
  /** Emit status lines for skips and warnings */
  verbose: boolean;
  /** Cancels the entry between chunks and between descendants */
  signal?: AbortSignal;
}

/**
 * Non-fatal problem recorded on a successful entry
 */
export interface TransferWarning {
  code: "SOURCE_RETAINED";
  path: string;
  message: string;
}

/**
 * Leaf-level counts by outcome
 */
export interface OutcomeCounts {
  succeeded: number;
  skipped: number;
  failed: number;
  aborted: number;
}

export type EntryOutcome =
  | { status: "succeeded"; warnings: TransferWarning[] }
  | { status: "skipped" }
  | { status: "failed"; error: OperationFailure }
  | { status: "aborted"; reason: ErrorCode };

/**
 * Final record for one entry of the batch
 */
export interface OperationResult {
  path: string;
  targetPath?: string;
  outcome: EntryOutcome;
  /** Counts of the files (leaves) processed for this entry */
  tally: OutcomeCounts;
  bytesTransferred: number;
}

export interface ITransferExecutor {
  /**
   * Execute a plan
   *
   * Never throws for filesystem failures; they are reported in the result.
   * @param plan - Plan built by the strategy selector
   * @param resolver - Overwrite resolver of the current batch
   * @param sink - Event consumer
   * @param context - Position of the entry and request flags
   */
  execute(
    plan: TransferPlan,
    resolver: IOverwriteResolver,
    sink: ProgressSink,
    context: ExecutionContext
  ): Promise<OperationResult>;
}
