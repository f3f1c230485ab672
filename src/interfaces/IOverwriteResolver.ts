/**
 * Overwrite resolver interface
 *
 * Tracks the user's overwrite policy across one batch and answers, for each
 * conflicting target, whether it should be overwritten, skipped, or whether
 * the whole batch should stop.
 */

/**
 * Resolver state. `aborted` is terminal.
 */
export type OverwriteState = "ask" | "always-overwrite" | "always-skip" | "aborted";

/**
 * Decision for a single conflicting target
 */
export type OverwriteDecision = "overwrite" | "skip" | "abort";

/**
 * Kinds of question the engine may ask
 */
export type PromptKind = "overwrite" | "create-directory";

export interface PromptContext {
  /** Path the question is about (conflicting target or missing directory) */
  path: string;
}

/**
 * Interactive prompt capability
 *
 * Returns the raw answer typed by the user. Implementations block until an
 * answer is available; there is no timeout.
 */
export interface InteractivePrompt {
  ask(kind: PromptKind, context: PromptContext): Promise<string>;
}

export interface IOverwriteResolver {
  /** Current state */
  readonly state: OverwriteState;

  /**
   * Decide what to do with an existing target
   *
   * Prompts only while the state is `ask`.
   * @param targetPath - Existing target that would be overwritten
   */
  resolve(targetPath: string): Promise<OverwriteDecision>;
}
