/**
 * Operation request types
 *
 * An operation request is the fully validated input of one invocation. It is
 * immutable and owned by the caller; the engine never mutates it.
 */

/**
 * Verbs supported by the engine
 */
export type Verb = "move" | "copy" | "rename" | "remove" | "backup";

/** Verbs that transfer entries into a destination directory */
export type TransferVerb = "move" | "copy";

/** Verbs that act on entries where they are */
export type InPlaceVerb = "remove" | "backup";

/**
 * Flags shared by all verbs
 */
export interface OperationOptions {
  /** Create the destination directory (and its parents) without asking */
  autoMkdir: boolean;
  /** Overwrite existing targets without asking */
  force: boolean;
  /** Never overwrite existing targets */
  noClobber: boolean;
  /** Emit human-readable status lines */
  verbose: boolean;
  /** Glob patterns for descendants to leave out of directory transfers */
  exclude: string[];
}

export interface TransferRequest {
  verb: TransferVerb;
  /** Absolute source paths, in processing order */
  sources: string[];
  /** Absolute path of the destination directory */
  destination: string;
  options: OperationOptions;
}

export interface RenameRequest {
  verb: "rename";
  /** Exactly one absolute source path */
  sources: string[];
  /** New name, without any path separator */
  destination: string;
  options: OperationOptions;
}

export interface InPlaceRequest {
  verb: InPlaceVerb;
  /** Absolute source paths, in processing order */
  sources: string[];
  options: OperationOptions;
}

/**
 * Validated request for one invocation
 *
 * @example
 * ```typescript
 * const request: OperationRequest = {
 *   verb: "move",
 *   sources: ["/tmp/a.txt"],
 *   destination: "/tmp/outdir",
 *   options: { autoMkdir: true, force: false, noClobber: false, verbose: false, exclude: [] },
 * };
 * ```
 */
export type OperationRequest = TransferRequest | RenameRequest | InPlaceRequest;

export const DEFAULT_OPTIONS: Readonly<OperationOptions> = {
  autoMkdir: false,
  force: false,
  noClobber: false,
  verbose: false,
  exclude: [],
};
