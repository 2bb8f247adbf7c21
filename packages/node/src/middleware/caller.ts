/**
 * Caller identity.
 *
 * Authentication happens upstream; the gateway forwards the authenticated
 * account in X-Caller. Mutating routes read it through `requireCaller`.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export const CALLER_HEADER = "X-Caller";

/**
 * Return the trimmed caller identity.
 *
 * @throws {ApiError} UNAUTHORIZED when the header is missing or blank
 */
export function requireCaller(c: Context<AppEnv>): string {
  const caller = c.req.header(CALLER_HEADER)?.trim() ?? "";
  if (caller === "") {
    throw new ApiError("UNAUTHORIZED", 401, `Missing ${CALLER_HEADER} header`);
  }
  return caller;
}
