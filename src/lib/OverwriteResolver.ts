/**
 * Overwrite resolver implementation
 *
 * One instance per batch. `force` and `noClobber` seed the state so the
 * prompt is never consulted.
 */

import { OperationOptions } from "../interfaces/IOperationRequest";
import {
  InteractivePrompt,
  IOverwriteResolver,
  OverwriteDecision,
  OverwriteState,
} from "../interfaces/IOverwriteResolver";

export type Answer = "yes" | "no" | "all" | "skip" | "quit";

/**
 * Accepted spellings for each answer, English and Chinese
 */
const ANSWERS: Array<[Answer, string[]]> = [
  ["yes", ["", "y", "yes", "是"]],
  ["no", ["n", "no", "否"]],
  ["all", ["a", "all", "全部"]],
  ["skip", ["s", "skip", "跳过"]],
  ["quit", ["q", "quit", "退出"]],
];

export function parseAnswer(raw: string): Answer | undefined {
  const normalized = raw.trim().toLowerCase();
  const match = ANSWERS.find(([, spellings]) => spellings.includes(normalized));
  return match?.[0];
}

export class OverwriteResolver implements IOverwriteResolver {
  private currentState: OverwriteState;

  constructor(
    private prompt: InteractivePrompt,
    initialState: OverwriteState = "ask"
  ) {
    this.currentState = initialState;
  }

  /**
   * Resolver seeded from the request flags
   */
  static forOptions(
    options: Pick<OperationOptions, "force" | "noClobber">,
    prompt: InteractivePrompt
  ): OverwriteResolver {
    if (options.force) {
      return new OverwriteResolver(prompt, "always-overwrite");
    }
    if (options.noClobber) {
      return new OverwriteResolver(prompt, "always-skip");
    }
    return new OverwriteResolver(prompt);
  }

  get state(): OverwriteState {
    return this.currentState;
  }

  async resolve(targetPath: string): Promise<OverwriteDecision> {
    switch (this.currentState) {
      case "always-overwrite":
        return "overwrite";
      case "always-skip":
        return "skip";
      case "aborted":
        return "abort";
      case "ask":
        break;
    }

    // Unrecognized input asks again
    for (;;) {
      const answer = parseAnswer(
        await this.prompt.ask("overwrite", { path: targetPath })
      );

      switch (answer) {
        case "yes":
          return "overwrite";
        case "no":
          return "skip";
        case "all":
          this.currentState = "always-overwrite";
          return "overwrite";
        case "skip":
          this.currentState = "always-skip";
          return "skip";
        case "quit":
          this.currentState = "aborted";
          return "abort";
        case undefined:
          continue;
      }
    }
  }
}
