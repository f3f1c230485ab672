/**
 * Operation request validation
 *
 * Turns loosely typed input (parsed command-line arguments, JSON) into an
 * immutable OperationRequest, or throws a ValidationError.
 */

import * as path from "path";
import { z } from "zod";
import { OperationRequest } from "../interfaces/IOperationRequest";
import { ValidationError } from "../types";

const OptionsSchema = z
  .object({
    autoMkdir: z.boolean().default(false),
    force: z.boolean().default(false),
    noClobber: z.boolean().default(false),
    verbose: z.boolean().default(false),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .refine((options) => !(options.force && options.noClobber), {
    message: "--force and --no-clobber cannot be used together",
  })
  .default({});

const SourcesSchema = z
  .array(z.string().min(1), { required_error: "At least one source is required" })
  .min(1, "At least one source is required")
  .transform((sources) => sources.map((source) => path.resolve(source)));

const TransferRequestSchema = z.object({
  verb: z.enum(["move", "copy"]),
  sources: SourcesSchema,
  destination: z
    .string({ required_error: "A target directory is required" })
    .min(1, "A target directory is required")
    .transform((destination) => path.resolve(destination)),
  options: OptionsSchema,
});

const RenameRequestSchema = z.object({
  verb: z.literal("rename"),
  sources: SourcesSchema.refine((sources) => sources.length === 1, {
    message: "Rename takes exactly one source",
  }),
  destination: z.string({ required_error: "A new name is required" }),
  options: OptionsSchema,
});

const InPlaceRequestSchema = z.object({
  verb: z.enum(["remove", "backup"]),
  sources: SourcesSchema,
  options: OptionsSchema,
});

export const OperationRequestSchema = z.discriminatedUnion("verb", [
  TransferRequestSchema,
  RenameRequestSchema,
  InPlaceRequestSchema,
]);

/**
 * Validate a request
 * @throws ValidationError describing every problem found
 */
export function parseRequest(input: unknown): OperationRequest {
  const parsed = OperationRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message
        )
        .join("; ")
    );
  }
  return parsed.data;
}
