/**
 * fops
 *
 * Safe file operations: move, copy, rename, remove to trash and backup, with
 * overwrite prompts, cross-device fallback and progress reporting.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";
