/**
 * Console progress sink
 *
 * Status lines go to stdout, colored by level. Byte progress redraws a single
 * line and is only drawn on a terminal.
 */

import chalk from "chalk";
import prettyBytes from "pretty-bytes";
import { BatchSummary } from "../interfaces/IBatchOrchestrator";
import { IMessageProvider, Locale } from "../interfaces/IMessageProvider";
import {
  BatchProgressEvent,
  ProgressEvent,
  ProgressSink,
  StatusEvent,
  StatusLevel,
} from "../interfaces/ITransferExecutor";
import { ErrorHandler } from "./ErrorHandler";

const COLORS: Record<StatusLevel, (text: string) => string> = {
  info: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
};

export interface OutputStream {
  write(text: string): unknown;
  isTTY?: boolean;
}

export interface ReporterStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

export class ConsoleReporter implements ProgressSink {
  private progressDrawn = false;

  constructor(
    private messages: IMessageProvider,
    private locale: Locale,
    private streams: ReporterStreams = {
      stdout: process.stdout,
      stderr: process.stderr,
    }
  ) {}

  onProgress(event: ProgressEvent): void {
    if (!this.streams.stdout.isTTY) {
      return;
    }
    const percent =
      event.bytesTotal > 0
        ? Math.min(100, Math.floor((event.bytesDone / event.bytesTotal) * 100))
        : 100;
    const line =
      `[${event.entryIndex}/${event.totalEntries}] ` +
      `${prettyBytes(event.bytesDone)} / ${prettyBytes(event.bytesTotal)} ` +
      `(${percent}%) ${event.currentPath}`;
    this.streams.stdout.write(`\r\x1b[K${chalk.dim(line)}`);
    this.progressDrawn = true;
  }

  onBatchProgress(event: BatchProgressEvent): void {
    this.writeLine(
      chalk.blue(
        this.messages.format("progress_files", this.locale, {
          current: event.entryIndex,
          total: event.totalEntries,
        })
      )
    );
  }

  onStatus(event: StatusEvent): void {
    this.writeLine(COLORS[event.level](event.message));
  }

  /**
   * Print failed entries and the outcome counts of a finished batch
   */
  printSummary(summary: BatchSummary): void {
    this.endProgress();

    for (const result of summary.results) {
      if (result.outcome.status !== "failed") {
        continue;
      }
      const { error } = result.outcome;
      this.streams.stderr.write(
        `${chalk.red(
          this.messages.format(ErrorHandler.messageKey(error.code), this.locale, {
            path: error.path ?? result.path,
            message: error.message,
          })
        )}\n`
      );
    }

    const line = this.messages.format("summary", this.locale, {
      succeeded: summary.counts.succeeded,
      skipped: summary.counts.skipped,
      failed: summary.counts.failed,
      aborted: summary.counts.aborted,
    });
    this.streams.stdout.write(
      `${summary.counts.failed > 0 || summary.aborted ? chalk.yellow(line) : chalk.green(line)}\n`
    );
  }

  /**
   * Tell the user an interrupt stopped the batch
   */
  printCancelled(): void {
    this.endProgress();
    this.streams.stderr.write(
      `${chalk.yellow(this.messages.format("operation_cancelled", this.locale))}\n`
    );
  }

  /**
   * Print an error raised outside of a batch
   */
  printError(error: unknown): void {
    this.endProgress();
    this.streams.stderr.write(
      `${chalk.red(ErrorHandler.describe(error))}\n`
    );
  }

  private writeLine(text: string): void {
    this.endProgress();
    this.streams.stdout.write(`${text}\n`);
  }

  private endProgress(): void {
    if (this.progressDrawn) {
      this.streams.stdout.write("\n");
      this.progressDrawn = false;
    }
  }
}
