/**
 * Interactive prompt on the controlling terminal
 *
 * One readline interface serves every question of a run. Lines are read
 * through its async iterator, which buffers them, so answers piped in ahead
 * of the questions are consumed in order. End of input, or a closed prompt,
 * answers "quit" to overwrite prompts and "no" to directory prompts.
 */

import * as readline from "readline";
import { IMessageProvider, Locale } from "../interfaces/IMessageProvider";
import {
  InteractivePrompt,
  PromptContext,
  PromptKind,
} from "../interfaces/IOverwriteResolver";

const END_OF_INPUT: Record<PromptKind, string> = {
  overwrite: "q",
  "create-directory": "n",
};

export class TerminalPrompt implements InteractivePrompt {
  private rl?: readline.Interface;
  private lines?: AsyncIterableIterator<string>;
  private closed = false;

  constructor(
    private messages: IMessageProvider,
    private locale: Locale,
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(kind: PromptKind, context: PromptContext): Promise<string> {
    const query =
      kind === "overwrite"
        ? `${this.messages.format("file_exists", this.locale, { path: context.path })}\n` +
          this.messages.format("overwrite_prompt", this.locale)
        : this.messages.format("dir_not_exist", this.locale, { path: context.path });

    if (this.closed) {
      return END_OF_INPUT[kind];
    }

    this.output.write(query);
    const next = await this.open().next();
    return next.done ? END_OF_INPUT[kind] : next.value;
  }

  close(): void {
    this.closed = true;
    this.rl?.close();
  }

  private open(): AsyncIterableIterator<string> {
    if (!this.lines) {
      this.rl = readline.createInterface({
        input: this.input,
        crlfDelay: Infinity,
      });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}
