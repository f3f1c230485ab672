/**
 * Command-line front end
 *
 * Parses arguments with commander, validates them into an OperationRequest,
 * runs the batch and reports it. Returns the process exit code instead of
 * exiting so it can run inside tests.
 */

import * as fs from "fs";
import * as path from "path";
import { Command, CommanderError } from "commander";
import { ExitCode } from "../interfaces/IBatchOrchestrator";
import { Verb } from "../interfaces/IOperationRequest";
import { InteractivePrompt } from "../interfaces/IOverwriteResolver";
import { AuditLogger } from "./AuditLogger";
import { ConfigLoader } from "./ConfigLoader";
import { ConsoleReporter, OutputStream } from "./ConsoleReporter";
import { createEngine } from "./createEngine";
import { ErrorHandler } from "./ErrorHandler";
import { MessageProvider } from "./MessageProvider";
import { parseRequest } from "./RequestSchema";
import { TerminalPrompt } from "./TerminalPrompt";

export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  stdout: OutputStream;
  stderr: OutputStream;
  /** Answers prompts; a terminal prompt on stdin when omitted */
  prompt?: InteractivePrompt;
  /** Interrupt: stops the batch after the current chunk */
  signal?: AbortSignal;
}

export interface VerbFlags {
  mkdir?: boolean;
  force?: boolean;
  clobber?: boolean;
  verbose?: boolean;
  exclude?: string[];
}

/**
 * Arguments captured by a verb's action, validated afterwards
 */
export interface RawInvocation {
  verb: Verb;
  sources: string[];
  destination?: string;
  flags: VerbFlags;
}

function readVersion(): string {
  // Two levels up from both src/lib and dist/lib
  const packagePath = path.resolve(__dirname, "..", "..", "package.json");
  const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

/**
 * One value per flag, so `-x` never swallows the paths after it
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonFlags(command: Command): Command {
  return command
    .option("-f, --force", "overwrite existing targets without asking")
    .option("-n, --no-clobber", "never overwrite existing targets")
    .option("-v, --verbose", "print a status line for every entry");
}

/**
 * Build the `f` program; the verb actions hand their arguments to `capture`
 */
export function buildProgram(
  capture: (invocation: RawInvocation) => void,
  streams: Pick<CliEnvironment, "stdout" | "stderr">
): Command {
  const program = new Command();

  program
    .name("f")
    .description("Move, copy, rename, remove and back up files safely")
    .version(readVersion(), "-V, --version")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => streams.stdout.write(text),
      writeErr: (text) => streams.stderr.write(text),
    });

  const splitTarget = (verb: Verb) => (paths: string[], _options: unknown, command: Command) => {
    capture({
      verb,
      sources: paths.length > 1 ? paths.slice(0, -1) : paths,
      destination: paths.length > 1 ? paths[paths.length - 1] : undefined,
      flags: command.opts<VerbFlags>(),
    });
  };

  const inPlace = (verb: Verb) => (paths: string[], _options: unknown, command: Command) => {
    capture({ verb, sources: paths, flags: command.opts<VerbFlags>() });
  };

  withCommonFlags(
    program
      .command("move")
      .alias("mv")
      .description("move sources into a target directory")
      .argument("<paths...>", "sources followed by the target directory")
      .option("-p, --mkdir", "create the target directory without asking")
      .option(
        "-x, --exclude <glob>",
        "leave matching descendants out (repeatable)",
        collect,
        []
      )
  ).action(splitTarget("move"));

  withCommonFlags(
    program
      .command("copy")
      .alias("cp")
      .description("copy sources into a target directory")
      .argument("<paths...>", "sources followed by the target directory")
      .option("-p, --mkdir", "create the target directory without asking")
      .option(
        "-x, --exclude <glob>",
        "leave matching descendants out (repeatable)",
        collect,
        []
      )
  ).action(splitTarget("copy"));

  withCommonFlags(
    program
      .command("rename")
      .alias("ren")
      .description("rename an entry in place")
      .argument("<path>", "entry to rename")
      .argument("<new-name>", "new name, without any directory")
  ).action((source: string, newName: string, _options: unknown, command: Command) => {
    capture({
      verb: "rename",
      sources: [source],
      destination: newName,
      flags: command.opts<VerbFlags>(),
    });
  });

  withCommonFlags(
    program
      .command("remove")
      .alias("rm")
      .description("move sources to the trash")
      .argument("<paths...>", "entries to remove")
  ).action(inPlace("remove"));

  withCommonFlags(
    program
      .command("backup")
      .alias("bak")
      .description("copy sources to a .bak sibling")
      .argument("<paths...>", "entries to back up")
      .option(
        "-x, --exclude <glob>",
        "leave matching descendants out (repeatable)",
        collect,
        []
      )
  ).action(inPlace("backup"));

  return program;
}

function toRequestInput(invocation: RawInvocation): unknown {
  const { verb, sources, destination, flags } = invocation;
  const options = {
    autoMkdir: flags.mkdir === true,
    force: flags.force === true,
    noClobber: flags.clobber === false,
    verbose: flags.verbose === true,
    exclude: flags.exclude ?? [],
  };
  return verb === "remove" || verb === "backup"
    ? { verb, sources, options }
    : { verb, sources, destination, options };
}

/**
 * Run one invocation
 * @param argv - Arguments after the program name
 */
export async function runCli(
  argv: string[],
  environment: CliEnvironment = {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
  }
): Promise<ExitCode> {
  const messages = new MessageProvider();
  const streams = { stdout: environment.stdout, stderr: environment.stderr };

  const parsed: { invocation?: RawInvocation } = {};
  const program = buildProgram((invocation) => {
    parsed.invocation = invocation;
  }, streams);

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INVOCATION;
    }
    throw error;
  }

  const { invocation } = parsed;
  if (!invocation) {
    return ExitCode.INVALID_INVOCATION;
  }

  let reporter = new ConsoleReporter(messages, "en", streams);
  let terminal: TerminalPrompt | undefined;
  // A pending question would otherwise keep the batch waiting after an interrupt
  const closeTerminal = () => terminal?.close();
  environment.signal?.addEventListener("abort", closeTerminal, { once: true });
  try {
    const config = await ConfigLoader.loadConfig(environment.env);
    reporter = new ConsoleReporter(messages, config.locale, streams);
    const request = parseRequest(toRequestInput(invocation));

    let prompt = environment.prompt;
    if (!prompt) {
      terminal = new TerminalPrompt(messages, config.locale);
      prompt = terminal;
    }

    const engine = createEngine(config, {
      prompt,
      sink: reporter,
      messages,
      logger: new AuditLogger(config.enableAuditLog),
    });
    const summary = await engine.run(request, environment.signal);
    if (summary.aborted && environment.signal?.aborted) {
      reporter.printCancelled();
    }
    reporter.printSummary(summary);
    return summary.exitCode;
  } catch (error) {
    reporter.printError(error);
    return ErrorHandler.exitCodeForError(error);
  } finally {
    environment.signal?.removeEventListener("abort", closeTerminal);
    terminal?.close();
  }
}
