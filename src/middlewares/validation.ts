/**
 * Validation Helpers
 * Validates request query strings against Zod schemas.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../utils/errors.js";

/**
 * Parses a query string with a Zod schema.
 * Throws ValidationError (400) carrying the first issue's message.
 */
export function parseQuery<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  query: unknown
): Output {
  const result = schema.safeParse(query);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ValidationError(issue?.message ?? "Invalid query parameters");
  }
  return result.data;
}
