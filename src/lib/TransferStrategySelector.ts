/**
 * Transfer strategy selector implementation
 *
 * Decision table, in order:
 * 1. remove            -> soft-delete
 * 2. backup            -> copy-only, target named by nextBackupPath
 * 3. move / rename     -> atomic-rename on the same device, copy-then-delete across devices
 *    copy              -> buffered-copy on either device
 */

import * as fs from "fs";
import * as path from "path";
import { Verb } from "../interfaces/IOperationRequest";
import { IFilesystemInspector } from "../interfaces/IFilesystemInspector";
import { IRecoverableDeleteStore } from "../interfaces/IRecoverableDeleteStore";
import {
  ITransferStrategySelector,
  PlanInput,
  TransferPlan,
  TransferStrategy,
} from "../interfaces/ITransferStrategySelector";
import { ErrorCode, FileSystemError } from "../types";
import { EngineConfig } from "./ConfigLoader";

export type SelectorSettings = Pick<
  EngineConfig,
  "largeFileThreshold" | "multiEntryThreshold"
>;

export class TransferStrategySelector implements ITransferStrategySelector {
  constructor(
    private inspector: IFilesystemInspector,
    private trash: IRecoverableDeleteStore,
    private settings: SelectorSettings
  ) {}

  async select(input: PlanInput): Promise<TransferPlan> {
    const sourcePath = path.resolve(input.source);
    const stats = await fs.promises.lstat(sourcePath);
    const sizeBytes = await this.inspector.calculateSize(sourcePath);

    const base = {
      verb: input.verb,
      sourcePath,
      isDirectory: stats.isDirectory(),
      sizeBytes,
      reportProgress:
        sizeBytes >= this.settings.largeFileThreshold ||
        input.totalEntries >= this.settings.multiEntryThreshold,
    };

    switch (input.verb) {
      case "remove":
        return {
          ...base,
          resolvedTargetPath: this.trash.location,
          strategy: "soft-delete",
        };

      case "backup":
        return {
          ...base,
          resolvedTargetPath: this.nextBackupPath(sourcePath),
          strategy: "copy-only",
        };

      case "move":
      case "copy":
      case "rename": {
        const resolvedTargetPath = this.resolveTarget(
          sourcePath,
          input.verb,
          input.destination
        );
        return {
          ...base,
          resolvedTargetPath,
          strategy: await this.chooseStrategy(
            input.verb,
            sourcePath,
            resolvedTargetPath
          ),
        };
      }
    }
  }

  async selectChild(
    parent: TransferPlan,
    source: string,
    target: string
  ): Promise<TransferPlan> {
    const stats = await fs.promises.lstat(source);
    const isDirectory = stats.isDirectory();

    // Only a rename into an existing directory can meet a mount point below it
    const strategy: TransferStrategy =
      parent.strategy === "atomic-rename"
        ? await this.chooseStrategy(parent.verb, source, target)
        : parent.strategy;

    return {
      verb: parent.verb,
      sourcePath: source,
      resolvedTargetPath: target,
      strategy,
      isDirectory,
      sizeBytes: isDirectory
        ? await this.inspector.calculateSize(source)
        : stats.size,
      reportProgress: parent.reportProgress,
    };
  }

  nextBackupPath(source: string): string {
    const first = `${source}.bak`;
    if (!this.exists(first)) {
      return first;
    }

    for (let counter = 2; ; counter++) {
      const candidate = `${source}.bak${counter}`;
      if (!this.exists(candidate)) {
        return candidate;
      }
    }
  }

  private resolveTarget(
    sourcePath: string,
    verb: "move" | "copy" | "rename",
    destination: string | undefined
  ): string {
    if (destination === undefined) {
      throw new FileSystemError(
        `Destination required for ${verb} operation`,
        ErrorCode.INVALID_REQUEST,
        sourcePath
      );
    }

    return verb === "rename"
      ? path.join(path.dirname(sourcePath), destination)
      : path.join(path.resolve(destination), path.basename(sourcePath));
  }

  private async chooseStrategy(
    verb: Verb,
    source: string,
    target: string
  ): Promise<TransferStrategy> {
    if (verb === "copy") {
      return "buffered-copy";
    }

    const sourceDevice = await this.inspector.getDeviceId(source);
    const targetDevice = await this.inspector.getDeviceId(path.dirname(target));
    return sourceDevice === targetDevice ? "atomic-rename" : "copy-then-delete";
  }

  private exists(candidate: string): boolean {
    return fs.lstatSync(candidate, { throwIfNoEntry: false }) !== undefined;
  }
}
