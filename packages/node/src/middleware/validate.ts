/**
 * Request validation helpers.
 *
 * Parse bodies, path params and query strings with Zod schemas. Failures
 * throw ApiError("VALIDATION_ERROR") carrying the Zod issues, which the
 * error handler renders as a 400.
 */

import type { Context } from "hono";
import type { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

function validationError(where: string, error: z.ZodError): ApiError {
  return new ApiError("VALIDATION_ERROR", 400, `Invalid ${where}`, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

/** Parse `value` with `schema`, naming `where` in the error message. */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  where: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw validationError(where, result.error);
  }
  return result.data;
}

export async function readBody<S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }
  return parseWith(schema, body, "request body");
}
