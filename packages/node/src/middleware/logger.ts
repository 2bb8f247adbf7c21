/**
 * Request logging middleware.
 *
 * Emits one structured entry per request. The sink is injected so the
 * entry point can hand it to pino and tests can collect entries.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CALLER_HEADER } from "./caller.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller: string | null;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
      requestId: c.get("requestId"),
      caller: c.req.header(CALLER_HEADER) ?? null,
    });
  };
}
