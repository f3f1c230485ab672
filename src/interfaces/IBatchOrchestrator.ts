/**
 * Batch orchestrator interface
 */

import { OperationRequest } from "./IOperationRequest";
import { OperationResult, OutcomeCounts } from "./ITransferExecutor";

/**
 * Process exit codes
 *
 * 0 = every entry succeeded or was skipped, 1 = one or more failed,
 * 2 = aborted by the user, 3 = invalid invocation.
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  ABORTED = 2,
  INVALID_INVOCATION = 3,
}

export interface BatchSummary {
  /** One result per source, in request order */
  results: OperationResult[];
  /** Sum of the per-entry tallies */
  counts: OutcomeCounts;
  /** Whether the user stopped the batch */
  aborted: boolean;
  exitCode: ExitCode;
}

export interface IBatchOrchestrator {
  /**
   * Run every entry of a request sequentially
   *
   * Aborting `signal` stops the batch after the current chunk; the partial
   * copy is removed and the remaining entries are reported as aborted.
   *
   * @example
   * ```typescript
   * const summary = await orchestrator.run({
   *   verb: "copy",
   *   sources: ["/data/report.txt"],
   *   destination: "/backup",
   *   options: { ...DEFAULT_OPTIONS, autoMkdir: true },
   * });
   * console.log(summary.counts.succeeded);
   * ```
   */
  run(request: OperationRequest, signal?: AbortSignal): Promise<BatchSummary>;
}
