/**
 * Unit tests for ConsoleReporter
 */

import { ConsoleReporter } from "./ConsoleReporter";
import { MessageProvider } from "./MessageProvider";
import { BatchSummary, ExitCode } from "../interfaces/IBatchOrchestrator";
import { ErrorCode } from "../types";

const ANSI = /\u001b\[[0-9;]*[A-Za-z]/g;

function captureStream(isTTY: boolean) {
  const chunks: string[] = [];
  return {
    stream: {
      isTTY,
      write: (text: string) => {
        chunks.push(text);
        return true;
      },
    },
    text: () => chunks.join("").replace(ANSI, ""),
  };
}

describe("ConsoleReporter", () => {
  const messages = new MessageProvider();

  function reporter(locale: "en" | "zh" = "en", isTTY = false) {
    const stdout = captureStream(isTTY);
    const stderr = captureStream(isTTY);
    return {
      stdout,
      stderr,
      reporter: new ConsoleReporter(messages, locale, {
        stdout: stdout.stream,
        stderr: stderr.stream,
      }),
    };
  }

  const summary: BatchSummary = {
    results: [
      {
        path: "/a",
        outcome: { status: "succeeded", warnings: [] },
        tally: { succeeded: 1, skipped: 0, failed: 0, aborted: 0 },
        bytesTransferred: 3,
      },
      {
        path: "/b",
        outcome: {
          status: "failed",
          error: { code: ErrorCode.SOURCE_NOT_FOUND, message: "ENOENT", path: "/b" },
        },
        tally: { succeeded: 0, skipped: 0, failed: 1, aborted: 0 },
        bytesTransferred: 0,
      },
      {
        path: "/c",
        outcome: {
          status: "failed",
          error: { code: ErrorCode.IO_ERROR, message: "device not ready" },
        },
        tally: { succeeded: 0, skipped: 0, failed: 1, aborted: 0 },
        bytesTransferred: 0,
      },
    ],
    counts: { succeeded: 1, skipped: 0, failed: 2, aborted: 0 },
    aborted: false,
    exitCode: ExitCode.FAILURE,
  };

  it("should print failures to stderr and the counts to stdout", () => {
    const { stdout, stderr, reporter: sink } = reporter();

    sink.printSummary(summary);

    expect(stderr.text()).toBe("Error: File not found: /b\nError: device not ready\n");
    expect(stdout.text()).toBe("1 succeeded, 0 skipped, 2 failed, 0 aborted\n");
  });

  it("should print the summary in the configured locale", () => {
    const { stdout, stderr, reporter: sink } = reporter("zh");

    sink.printSummary(summary);

    expect(stderr.text().split("\n")[0]).toBe("错误：文件不存在：/b");
    expect(stdout.text()).toBe("成功 1，跳过 0，失败 2，中止 0\n");
  });

  it("should print status lines and batch progress", () => {
    const { stdout, reporter: sink } = reporter();

    sink.onBatchProgress({ entryIndex: 2, totalEntries: 7, currentPath: "/x" });
    sink.onStatus({ level: "success", message: "Copy completed successfully" });

    expect(stdout.text()).toBe("Processing 2/7 items\nCopy completed successfully\n");
  });

  it("should not draw byte progress when stdout is not a terminal", () => {
    const { stdout, reporter: sink } = reporter();

    sink.onProgress({
      entryIndex: 1,
      totalEntries: 1,
      bytesDone: 10,
      bytesTotal: 20,
      currentPath: "/big.bin",
    });

    expect(stdout.text()).toBe("");
  });

  it("should redraw byte progress on a terminal and end the line before other output", () => {
    const { stdout, reporter: sink } = reporter("en", true);

    sink.onProgress({
      entryIndex: 1,
      totalEntries: 3,
      bytesDone: 512,
      bytesTotal: 1024,
      currentPath: "/src/big.bin",
    });
    sink.onStatus({ level: "info", message: "Done" });

    expect(stdout.text()).toBe("\r[1/3] 512 B / 1.02 kB (50%) /src/big.bin\nDone\n");
  });

  it("should end the progress line before reporting a cancellation", () => {
    const { stdout, stderr, reporter: sink } = reporter("en", true);

    sink.onProgress({
      entryIndex: 1,
      totalEntries: 1,
      bytesDone: 4,
      bytesTotal: 8,
      currentPath: "/src/a.bin",
    });
    sink.printCancelled();

    expect(stdout.text()).toBe("\r[1/1] 4 B / 8 B (50%) /src/a.bin\n");
    expect(stderr.text()).toBe("Operation cancelled\n");
  });

  it("should print errors raised outside a batch", () => {
    const { stderr, reporter: sink } = reporter();

    sink.printError(new Error("Invalid name: a/b"));
    sink.printError("plain");

    expect(stderr.text()).toBe("Invalid name: a/b\nplain\n");
  });
});
