import { z } from "zod";
import { CustomError } from "./errors";

/** Default maximum nesting depth. */
export const DEFAULT_MAX_DEPTH = 128;

/** Largest accepted `maxDepth`; deeper recursion can exhaust the call stack. */
export const MAX_DEPTH_LIMIT = 1_000;

/**
 * Schema for the options accepted by the encoder, decoder, binary codec and
 * facade functions.
 */
export const valueOptionsSchema = z.strictObject({
  /** Maximum number of nested containers. Default: 128 */
  maxDepth: z.number().int().min(1).max(MAX_DEPTH_LIMIT).default(DEFAULT_MAX_DEPTH),
  /** Order of object keys produced by the encoder. Default: "insertion" */
  keyOrder: z.enum(["insertion", "sorted"]).default("insertion"),
});

/**
 * Fully resolved options.
 */
export type ValueOptions = z.output<typeof valueOptionsSchema>;

/**
 * Options as callers pass them; every field is optional.
 */
export type ValueOptionsInput = z.input<typeof valueOptionsSchema>;

export type KeyOrder = ValueOptions["keyOrder"];

/**
 * Validates options and fills in defaults.
 * @throws CustomError listing every invalid field
 */
export function resolveOptions(input: ValueOptionsInput = {}): ValueOptions {
  const result = valueOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new CustomError(`invalid options:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Options used when none are given.
 */
export const defaultOptions: ValueOptions = resolveOptions();
