/**
 * Batch orchestrator implementation
 *
 * Runs the entries of one request in order: validate, plan, execute. The
 * destination directory is checked once up front, and one overwrite resolver
 * is shared by every entry so "all", "skip all" and "quit" carry across the
 * batch.
 */

import * as fs from "fs";
import { BatchSummary, IBatchOrchestrator } from "../interfaces/IBatchOrchestrator";
import { IMessageProvider, MessageParams } from "../interfaces/IMessageProvider";
import {
  OperationRequest,
  TransferRequest,
  Verb,
} from "../interfaces/IOperationRequest";
import { InteractivePrompt } from "../interfaces/IOverwriteResolver";
import { IPathValidator } from "../interfaces/IPathValidator";
import { IRecoverableDeleteStore } from "../interfaces/IRecoverableDeleteStore";
import {
  ITransferExecutor,
  OperationResult,
  OutcomeCounts,
  ProgressSink,
  StatusLevel,
} from "../interfaces/ITransferExecutor";
import {
  ITransferStrategySelector,
  TransferPlan,
} from "../interfaces/ITransferStrategySelector";
import { ErrorCode, OperationFailure } from "../types";
import { AuditLogger } from "./AuditLogger";
import { EngineConfig } from "./ConfigLoader";
import { ErrorHandler } from "./ErrorHandler";
import { OverwriteResolver, parseAnswer } from "./OverwriteResolver";

export type OrchestratorSettings = Pick<
  EngineConfig,
  "locale" | "multiEntryThreshold"
>;

export interface OrchestratorDependencies {
  validator: IPathValidator;
  selector: ITransferStrategySelector;
  executor: ITransferExecutor;
  trash: IRecoverableDeleteStore;
  prompt: InteractivePrompt;
  messages: IMessageProvider;
  logger: AuditLogger;
  sink: ProgressSink;
}

/**
 * Message keys for the action line and the completion line of each verb
 */
const VERB_MESSAGES: Record<Verb, { action: string; complete: string }> = {
  move: { action: "moving", complete: "move_complete" },
  copy: { action: "copying", complete: "copy_complete" },
  rename: { action: "renaming", complete: "rename_complete" },
  remove: { action: "removing", complete: "remove_complete" },
  backup: { action: "backing_up", complete: "backup_complete" },
};

/**
 * Result of the one-time destination check
 */
type DestinationCheck =
  | { ready: true }
  | { ready: false; declined: true }
  | { ready: false; declined: false; failure: OperationFailure };

function emptyCounts(): OutcomeCounts {
  return { succeeded: 0, skipped: 0, failed: 0, aborted: 0 };
}

function failedResult(path: string, error: OperationFailure): OperationResult {
  return {
    path,
    outcome: { status: "failed", error },
    tally: { ...emptyCounts(), failed: 1 },
    bytesTransferred: 0,
  };
}

function abortedResult(path: string, reason: ErrorCode): OperationResult {
  return {
    path,
    outcome: { status: "aborted", reason },
    tally: { ...emptyCounts(), aborted: 1 },
    bytesTransferred: 0,
  };
}

export class BatchOrchestrator implements IBatchOrchestrator {
  constructor(
    private deps: OrchestratorDependencies,
    private settings: OrchestratorSettings
  ) {}

  async run(request: OperationRequest, signal?: AbortSignal): Promise<BatchSummary> {
    const resolver = OverwriteResolver.forOptions(
      request.options,
      this.deps.prompt
    );

    if (request.verb === "move" || request.verb === "copy") {
      const check = await this.prepareDestination(request);
      if (!check.ready) {
        const results = request.sources.map((source) =>
          check.declined
            ? abortedResult(source, ErrorCode.MISSING_TARGET_DIRECTORY)
            : failedResult(source, check.failure)
        );
        if (check.declined) {
          this.status(request, "warning", "operation_cancelled");
          this.deps.logger.auditOperation(
            "abort",
            [request.destination],
            ErrorCode.MISSING_TARGET_DIRECTORY
          );
        } else {
          this.status(request, "error", ErrorHandler.messageKey(check.failure.code), {
            path: check.failure.path ?? request.destination,
            message: check.failure.message,
          });
        }
        return this.summarize(results, check.declined);
      }
    }

    const results: OperationResult[] = [];
    const totalEntries = request.sources.length;

    for (const [index, source] of request.sources.entries()) {
      if (resolver.state === "aborted" || signal?.aborted) {
        results.push(abortedResult(source, ErrorCode.ABORTED));
        continue;
      }

      if (totalEntries >= this.settings.multiEntryThreshold) {
        this.deps.sink.onBatchProgress?.({
          entryIndex: index + 1,
          totalEntries,
          currentPath: source,
        });
      }

      results.push(
        await this.runEntry(request, source, index + 1, totalEntries, resolver, signal)
      );
    }

    const aborted =
      resolver.state === "aborted" ||
      results.some((result) => result.outcome.status === "aborted");
    if (aborted) {
      this.status(request, "warning", "operation_cancelled");
      this.deps.logger.auditOperation("abort", request.sources, ErrorCode.ABORTED);
    }

    return this.summarize(results, aborted);
  }

  private async runEntry(
    request: OperationRequest,
    source: string,
    entryIndex: number,
    totalEntries: number,
    resolver: OverwriteResolver,
    signal: AbortSignal | undefined
  ): Promise<OperationResult> {
    const destination = this.destinationFor(request);
    const prefix =
      totalEntries > 1
        ? this.deps.messages.format("entry_prefix", this.settings.locale, {
            current: entryIndex,
            total: totalEntries,
          })
        : "";

    const validation = this.deps.validator.validate(
      source,
      destination,
      request.verb,
      request.options
    );
    if (!validation.valid) {
      const failure: OperationFailure = {
        code: validation.code,
        message: validation.message,
        path: validation.path,
      };
      this.reportFailure(request, prefix, failure);
      return failedResult(source, failure);
    }

    let plan: TransferPlan;
    try {
      plan = await this.deps.selector.select({
        verb: request.verb,
        source,
        destination: request.verb === "remove" ? undefined : destination,
        totalEntries,
      });
    } catch (error) {
      const failure = ErrorHandler.toFailure(error, source);
      ErrorHandler.logError(this.deps.logger, request.verb, error, [source]);
      this.reportFailure(request, prefix, failure);
      return failedResult(source, failure);
    }

    const labels = VERB_MESSAGES[request.verb];
    this.status(request, "info", labels.action, {
      source: plan.sourcePath,
      target: plan.resolvedTargetPath,
    }, prefix);

    const result = await this.deps.executor.execute(plan, resolver, this.deps.sink, {
      entryIndex,
      totalEntries,
      exclude: request.options.exclude,
      verbose: request.options.verbose,
      signal,
    });

    switch (result.outcome.status) {
      case "succeeded":
        this.status(request, "success", labels.complete, {}, prefix);
        break;
      case "failed":
        this.reportFailure(request, prefix, result.outcome.error);
        break;
      case "skipped":
      case "aborted":
        break;
    }

    return result;
  }

  /**
   * Check the destination directory once, creating it when allowed
   */
  private async prepareDestination(
    request: TransferRequest
  ): Promise<DestinationCheck> {
    const { destination, options } = request;
    const check = this.deps.validator.validateDestination(
      destination,
      request.verb,
      options
    );

    if (!check.valid) {
      if (check.code !== ErrorCode.MISSING_TARGET_DIRECTORY) {
        return {
          ready: false,
          declined: false,
          failure: { code: check.code, message: check.message, path: check.path },
        };
      }
      if (!(await this.confirmCreate(destination))) {
        return { ready: false, declined: true };
      }
    } else if (fs.existsSync(destination)) {
      return { ready: true };
    }

    this.status(request, "info", "creating_dirs", { path: destination });
    try {
      await fs.promises.mkdir(destination, { recursive: true });
    } catch (error) {
      ErrorHandler.logError(this.deps.logger, "mkdir", error, [destination]);
      return {
        ready: false,
        declined: false,
        failure: ErrorHandler.toFailure(error, destination),
      };
    }
    this.deps.logger.auditOperation("mkdir", [destination], "success");
    this.status(request, "success", "dir_created", { path: destination });

    return { ready: true };
  }

  private async confirmCreate(destination: string): Promise<boolean> {
    for (;;) {
      const answer = parseAnswer(
        await this.deps.prompt.ask("create-directory", { path: destination })
      );
      switch (answer) {
        case "yes":
          return true;
        case "no":
        case "quit":
          return false;
        default:
          continue;
      }
    }
  }

  private destinationFor(request: OperationRequest): string | undefined {
    switch (request.verb) {
      case "move":
      case "copy":
      case "rename":
        return request.destination;
      case "remove":
        return this.deps.trash.location;
      case "backup":
        return undefined;
    }
  }

  private summarize(results: OperationResult[], aborted: boolean): BatchSummary {
    const counts = emptyCounts();
    for (const { tally } of results) {
      counts.succeeded += tally.succeeded;
      counts.skipped += tally.skipped;
      counts.failed += tally.failed;
      counts.aborted += tally.aborted;
    }

    return {
      results,
      counts,
      aborted,
      exitCode: ErrorHandler.exitCodeFor(counts, aborted),
    };
  }

  private reportFailure(
    request: OperationRequest,
    prefix: string,
    failure: OperationFailure
  ): void {
    this.status(
      request,
      "error",
      ErrorHandler.messageKey(failure.code),
      { path: failure.path ?? "", message: failure.message },
      prefix
    );
  }

  private status(
    request: OperationRequest,
    level: StatusLevel,
    key: string,
    params: MessageParams = {},
    prefix = ""
  ): void {
    if (!request.options.verbose) {
      return;
    }
    this.deps.sink.onStatus?.({
      level,
      message: prefix + this.deps.messages.format(key, this.settings.locale, params),
    });
  }
}
