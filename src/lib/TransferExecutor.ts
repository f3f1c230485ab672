/**
 * Transfer executor implementation
 *
 * Carries out one plan at a time. Copies stream fixed-size chunks into a
 * hidden temporary sibling of the target, are verified, then renamed into
 * place, so an interrupted copy never leaves a partial target behind.
 * Directory trees are walked depth-first; a failing descendant is recorded
 * and its siblings continue.
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import { v4 as uuidv4 } from "uuid";
import { IChecksumManager } from "../interfaces/IChecksumManager";
import { IFilesystemInspector } from "../interfaces/IFilesystemInspector";
import { IMessageProvider, MessageParams } from "../interfaces/IMessageProvider";
import { IOverwriteResolver } from "../interfaces/IOverwriteResolver";
import { IRecoverableDeleteStore } from "../interfaces/IRecoverableDeleteStore";
import {
  EntryOutcome,
  ExecutionContext,
  ITransferExecutor,
  OperationResult,
  OutcomeCounts,
  ProgressSink,
  StatusLevel,
  TransferWarning,
} from "../interfaces/ITransferExecutor";
import {
  ITransferStrategySelector,
  TransferPlan,
  TransferStrategy,
} from "../interfaces/ITransferStrategySelector";
import { ErrorCode, FileSystemError, OperationFailure } from "../types";
import { AuditLogger } from "./AuditLogger";
import { EngineConfig } from "./ConfigLoader";
import { ErrorHandler } from "./ErrorHandler";

export type ExecutorSettings = Pick<
  EngineConfig,
  "chunkSize" | "verification" | "locale"
>;

export interface ExecutorDependencies {
  selector: ITransferStrategySelector;
  inspector: IFilesystemInspector;
  trash: IRecoverableDeleteStore;
  checksums: IChecksumManager;
  messages: IMessageProvider;
  logger: AuditLogger;
}

type Step = "done" | "skipped" | "aborted";

/**
 * Mutable state of one top-level entry while it runs
 */
interface EntryRun {
  root: TransferPlan;
  resolver: IOverwriteResolver;
  sink: ProgressSink;
  context: ExecutionContext;
  tally: OutcomeCounts;
  warnings: TransferWarning[];
  firstError?: OperationFailure;
  aborted: boolean;
  bytesDone: number;
}

const COPY_STRATEGIES: ReadonlySet<TransferStrategy> = new Set<TransferStrategy>([
  "buffered-copy",
  "copy-then-delete",
  "copy-only",
]);

function isCancellation(error: unknown): boolean {
  return error instanceof FileSystemError && error.code === ErrorCode.ABORTED;
}

export class TransferExecutor implements ITransferExecutor {
  constructor(
    private deps: ExecutorDependencies,
    private settings: ExecutorSettings
  ) {}

  async execute(
    plan: TransferPlan,
    resolver: IOverwriteResolver,
    sink: ProgressSink,
    context: ExecutionContext
  ): Promise<OperationResult> {
    const run: EntryRun = {
      root: plan,
      resolver,
      sink,
      context,
      tally: { succeeded: 0, skipped: 0, failed: 0, aborted: 0 },
      warnings: [],
      aborted: false,
      bytesDone: 0,
    };

    let step: Step = "done";
    try {
      if (plan.strategy === "soft-delete") {
        await this.softDelete(plan, run);
      } else {
        if (COPY_STRATEGIES.has(plan.strategy)) {
          await this.ensureSpace(plan);
        }
        step = await this.transferEntry(plan, run);
      }
    } catch (error) {
      if (isCancellation(error)) {
        this.cancel(run);
      } else {
        run.firstError ??= ErrorHandler.toFailure(error, plan.sourcePath);
        run.tally.failed += 1;
      }
    }

    const outcome = this.outcomeOf(run, step);
    this.deps.logger.auditOperation(
      plan.verb,
      [plan.sourcePath, plan.resolvedTargetPath],
      outcome.status
    );

    return {
      path: plan.sourcePath,
      targetPath: plan.resolvedTargetPath,
      outcome,
      tally: run.tally,
      bytesTransferred: run.bytesDone,
    };
  }

  private outcomeOf(run: EntryRun, step: Step): EntryOutcome {
    if (run.aborted) {
      return { status: "aborted", reason: ErrorCode.ABORTED };
    }
    if (run.firstError) {
      return { status: "failed", error: run.firstError };
    }
    if (step === "skipped") {
      return { status: "skipped" };
    }
    return { status: "succeeded", warnings: run.warnings };
  }

  private async softDelete(plan: TransferPlan, run: EntryRun): Promise<void> {
    const files = await this.deps.inspector.countFiles(plan.sourcePath);
    await this.deps.trash.send(plan.sourcePath);
    run.tally.succeeded += files;
    run.bytesDone += plan.sizeBytes;
    this.emitProgress(plan, run);
  }

  /**
   * Resolve a conflict at the target, then transfer the entry
   */
  private async transferEntry(plan: TransferPlan, run: EntryRun): Promise<Step> {
    const target = plan.resolvedTargetPath;
    const existing = await fs.promises
      .lstat(target)
      .catch((error: unknown) => {
        if (ErrorHandler.hasCode(error, "ENOENT")) {
          return undefined;
        }
        throw error;
      });

    if (existing) {
      if (plan.isDirectory && existing.isDirectory()) {
        // Merge: conflicts are resolved per descendant
        await this.transferChildren(plan, run);
        await this.removeSourceDirectory(plan, run);
        return "done";
      }

      if (existing.isDirectory()) {
        throw new FileSystemError(
          `Cannot overwrite directory with non-directory: ${target}`,
          ErrorCode.TARGET_TYPE_MISMATCH,
          target
        );
      }

      const decision = await run.resolver.resolve(target);
      if (decision === "skip") {
        run.tally.skipped += plan.isDirectory
          ? await this.deps.inspector.countFiles(plan.sourcePath)
          : 1;
        this.status(run, "warning", "skipped", { path: target });
        return "skipped";
      }
      if (decision === "abort") {
        this.cancel(run);
        return "aborted";
      }

      if (plan.isDirectory) {
        // A directory cannot be renamed over a file
        await fs.promises.rm(target, { force: true });
      }
    }

    if (plan.isDirectory) {
      await this.transferDirectory(plan, run);
    } else {
      await this.transferLeaf(plan, run);
    }
    return "done";
  }

  private async transferDirectory(plan: TransferPlan, run: EntryRun): Promise<void> {
    if (plan.strategy === "atomic-rename") {
      const files = await this.deps.inspector.countFiles(plan.sourcePath);
      try {
        await fs.promises.rename(plan.sourcePath, plan.resolvedTargetPath);
      } catch (error) {
        if (!ErrorHandler.hasCode(error, "EXDEV")) {
          throw error;
        }
        const fallback = this.crossDeviceFallback(plan);
        await this.ensureSpace(fallback);
        return this.transferDirectory(fallback, run);
      }
      run.tally.succeeded += files;
      run.bytesDone += plan.sizeBytes;
      this.emitProgress(plan, run);
      return;
    }

    const stats = await fs.promises.stat(plan.sourcePath);
    await fs.promises.mkdir(plan.resolvedTargetPath);
    await this.transferChildren(plan, run);
    // Applied last so a read-only source directory still receives its children
    await fs.promises.chmod(plan.resolvedTargetPath, stats.mode);
    await this.removeSourceDirectory(plan, run);
  }

  private async transferChildren(plan: TransferPlan, run: EntryRun): Promise<void> {
    const entries = await fs.promises.readdir(plan.sourcePath);
    entries.sort();

    for (const name of entries) {
      if (run.aborted) {
        return;
      }
      if (run.context.signal?.aborted) {
        this.cancel(run);
        return;
      }

      const source = path.join(plan.sourcePath, name);
      if (this.isExcluded(run, source)) {
        continue;
      }

      try {
        const child = await this.deps.selector.selectChild(
          plan,
          source,
          path.join(plan.resolvedTargetPath, name)
        );
        await this.transferEntry(child, run);
      } catch (error) {
        if (isCancellation(error)) {
          this.cancel(run);
          return;
        }
        const failure = ErrorHandler.toFailure(error, source);
        run.firstError ??= failure;
        run.tally.failed += 1;
        ErrorHandler.logError(this.deps.logger, plan.verb, error, [source]);
        this.status(run, "error", ErrorHandler.messageKey(failure.code), {
          path: failure.path ?? source,
          message: failure.message,
        });
      }
    }
  }

  private async transferLeaf(plan: TransferPlan, run: EntryRun): Promise<void> {
    switch (plan.strategy) {
      case "atomic-rename":
        try {
          await fs.promises.rename(plan.sourcePath, plan.resolvedTargetPath);
        } catch (error) {
          if (!ErrorHandler.hasCode(error, "EXDEV")) {
            throw error;
          }
          const fallback = this.crossDeviceFallback(plan);
          await this.ensureSpace(fallback);
          return this.transferLeaf(fallback, run);
        }
        run.bytesDone += plan.sizeBytes;
        this.emitProgress(plan, run);
        break;

      case "buffered-copy":
      case "copy-only":
        await this.copyLeaf(plan, run);
        break;

      case "copy-then-delete":
        await this.copyLeaf(plan, run);
        try {
          await fs.promises.unlink(plan.sourcePath);
        } catch (error) {
          this.retainSource(plan.sourcePath, error, run);
        }
        break;

      case "soft-delete":
        await this.deps.trash.send(plan.sourcePath);
        run.bytesDone += plan.sizeBytes;
        break;
    }
    run.tally.succeeded += 1;
  }

  /**
   * Copy a file or symlink to its target through a temporary sibling
   */
  private async copyLeaf(plan: TransferPlan, run: EntryRun): Promise<void> {
    const source = plan.sourcePath;
    const target = plan.resolvedTargetPath;
    const stats = await fs.promises.lstat(source);

    if (stats.isSymbolicLink()) {
      const link = await fs.promises.readlink(source);
      await fs.promises.rm(target, { force: true });
      await fs.promises.symlink(link, target);
      run.bytesDone += stats.size;
      this.emitProgress(plan, run);
      return;
    }

    const tempPath = path.join(
      path.dirname(target),
      `.${path.basename(target)}.fops-partial-${uuidv4()}`
    );

    try {
      await this.copyChunks(source, tempPath, plan, run);
      await this.verifyCopy(source, tempPath, target);
      await fs.promises.chmod(tempPath, stats.mode);
      await fs.promises.utimes(tempPath, stats.atime, stats.mtime);
      await fs.promises.rename(tempPath, target);
    } catch (error) {
      await this.discardPartial(tempPath);
      throw error;
    }
  }

  private async copyChunks(
    source: string,
    tempPath: string,
    plan: TransferPlan,
    run: EntryRun
  ): Promise<void> {
    const input = await fs.promises.open(source, "r");
    try {
      const output = await fs.promises.open(tempPath, "wx");
      try {
        const buffer = Buffer.alloc(this.settings.chunkSize);
        for (;;) {
          this.throwIfCancelled(run, source);
          const { bytesRead } = await input.read(buffer, 0, buffer.length, null);
          if (bytesRead === 0) {
            break;
          }

          let offset = 0;
          while (offset < bytesRead) {
            const { bytesWritten } = await output.write(
              buffer,
              offset,
              bytesRead - offset
            );
            offset += bytesWritten;
          }

          run.bytesDone += bytesRead;
          this.emitProgress(plan, run);
        }
      } finally {
        await output.close();
      }
    } finally {
      await input.close();
    }
  }

  /**
   * Check the temporary copy against the source before it replaces the target
   */
  private async verifyCopy(
    source: string,
    tempPath: string,
    target: string
  ): Promise<void> {
    const expected = (await fs.promises.stat(source)).size;
    const written = (await fs.promises.stat(tempPath)).size;
    if (written !== expected) {
      throw new FileSystemError(
        `Copy incomplete: expected ${expected} bytes, wrote ${written}`,
        ErrorCode.VERIFICATION_FAILED,
        target
      );
    }

    if (this.settings.verification === "sha256") {
      const original = await this.deps.checksums.computeChecksum(source, "sha256");
      const copy = await this.deps.checksums.verifyChecksum(
        tempPath,
        original.checksum,
        "sha256"
      );
      if (!copy.match) {
        throw new FileSystemError(
          `Checksum mismatch: expected ${copy.expected}, got ${copy.actual}`,
          ErrorCode.VERIFICATION_FAILED,
          target
        );
      }
    }
  }

  private async discardPartial(tempPath: string): Promise<void> {
    try {
      await fs.promises.rm(tempPath, { force: true });
    } catch (error) {
      ErrorHandler.logError(this.deps.logger, "discard_partial", error, [tempPath]);
    }
  }

  /**
   * Remove the source directory of a move once its contents are gone
   */
  private async removeSourceDirectory(
    plan: TransferPlan,
    run: EntryRun
  ): Promise<void> {
    if (plan.strategy !== "atomic-rename" && plan.strategy !== "copy-then-delete") {
      return;
    }

    try {
      await fs.promises.rmdir(plan.sourcePath);
    } catch (error) {
      // Skipped, excluded or failed descendants stay where they are
      if (
        ErrorHandler.hasCode(error, "ENOTEMPTY") ||
        ErrorHandler.hasCode(error, "EEXIST")
      ) {
        return;
      }
      this.retainSource(plan.sourcePath, error, run);
    }
  }

  private retainSource(source: string, error: unknown, run: EntryRun): void {
    run.warnings.push({
      code: "SOURCE_RETAINED",
      path: source,
      message: ErrorHandler.describe(error),
    });
    this.deps.logger.warn("source_retained", [source], String(error));
    this.status(run, "warning", "source_retained", { path: source });
  }

  private throwIfCancelled(run: EntryRun, currentPath: string): void {
    if (run.context.signal?.aborted) {
      throw new FileSystemError("Operation cancelled", ErrorCode.ABORTED, currentPath);
    }
  }

  private cancel(run: EntryRun): void {
    run.aborted = true;
    run.tally.aborted += 1;
  }

  private crossDeviceFallback(plan: TransferPlan): TransferPlan {
    this.deps.logger.warn(
      "cross_device_fallback",
      [plan.sourcePath, plan.resolvedTargetPath],
      "EXDEV"
    );
    return { ...plan, strategy: "copy-then-delete" };
  }

  private async ensureSpace(plan: TransferPlan): Promise<void> {
    const targetDir = path.dirname(plan.resolvedTargetPath);
    const space = await this.deps.inspector.getDiskSpace(targetDir);
    if (space.available < plan.sizeBytes) {
      throw new FileSystemError(
        `Insufficient disk space: ${plan.sizeBytes} bytes required, ${space.available} available`,
        ErrorCode.INSUFFICIENT_SPACE,
        targetDir
      );
    }
  }

  private isExcluded(run: EntryRun, source: string): boolean {
    const relative = path.relative(run.root.sourcePath, source);
    return run.context.exclude.some((pattern) =>
      minimatch(relative, pattern, { dot: true, matchBase: true })
    );
  }

  private emitProgress(plan: TransferPlan, run: EntryRun): void {
    if (!run.root.reportProgress || !run.sink.onProgress) {
      return;
    }
    run.sink.onProgress({
      entryIndex: run.context.entryIndex,
      totalEntries: run.context.totalEntries,
      bytesDone: run.bytesDone,
      bytesTotal: run.root.sizeBytes,
      currentPath: plan.sourcePath,
    });
  }

  private status(
    run: EntryRun,
    level: StatusLevel,
    key: string,
    params: MessageParams
  ): void {
    if (!run.context.verbose || !run.sink.onStatus) {
      return;
    }
    run.sink.onStatus({
      level,
      message: this.deps.messages.format(key, this.settings.locale, params),
    });
  }
}
