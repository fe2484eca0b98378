/**
 * Zod validation middleware.
 *
 * Thin wrappers over hono's validator: the parsed value is read back in
 * the handler with `c.req.valid("json")` / `c.req.valid("query")`.
 * Failures answer 400 with the list of zod issues.
 */

import { validator } from "hono/validator";
import type { z, ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate the JSON request body. A request without a JSON content type
 * is validated as an empty object.
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S) {
  return validator("json", (value, c) => {
    const result: z.SafeParseReturnType<z.input<S>, z.output<S>> = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

/**
 * Validate the query string.
 */
export function validateQuery<S extends z.ZodTypeAny>(schema: S) {
  return validator("query", (value, c) => {
    const result: z.SafeParseReturnType<z.input<S>, z.output<S>> = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
