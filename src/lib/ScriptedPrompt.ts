/**
 * Prompt that answers from a fixed script
 *
 * Lets callers run the engine without a terminal. Every question is recorded
 * so tests can assert how often, and about what, the engine asked.
 */

import {
  InteractivePrompt,
  PromptContext,
  PromptKind,
} from "../interfaces/IOverwriteResolver";

export interface AskedQuestion {
  kind: PromptKind;
  path: string;
}

export class ScriptedPrompt implements InteractivePrompt {
  readonly asked: AskedQuestion[] = [];
  private remaining: string[];

  /**
   * @param answers - Answers handed out in order
   * @param fallback - Answer once the script is exhausted
   */
  constructor(answers: string[] = [], private fallback = "q") {
    this.remaining = [...answers];
  }

  async ask(kind: PromptKind, context: PromptContext): Promise<string> {
    this.asked.push({ kind, path: context.path });
    return this.remaining.shift() ?? this.fallback;
  }
}
