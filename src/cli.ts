#!/usr/bin/env node

/**
 * CLI entry point for fops
 */

import { runCli } from "./lib/CommandLine";

async function main() {
  // First Ctrl+C cancels after the current chunk, a second one kills
  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once("SIGINT", interrupt);

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      env: process.env,
      stdout: process.stdout,
      stderr: process.stderr,
      signal: controller.signal,
    });
  } catch (error) {
    console.error("Unexpected failure:", error);
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", interrupt);
  }
}

void main();
