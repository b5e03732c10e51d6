/**
 * Zod validation middleware.
 *
 * Wraps Hono's validator so handlers read the parsed, typed value with
 * `c.req.valid(target)`. Failures return 400 VALIDATION_ERROR with one
 * issue per offending path.
 */

import { validator } from "hono/validator";
import type { z, ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate the JSON request body against a Zod schema.
 */
export function validateBody<Out, In>(schema: z.ZodType<Out, z.ZodTypeDef, In>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
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
 * Validate query parameters against a Zod schema.
 */
export function validateQuery<Out, In>(schema: z.ZodType<Out, z.ZodTypeDef, In>) {
  return validator("query", (value, c) => {
    const result = schema.safeParse(value);
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
