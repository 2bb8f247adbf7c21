/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if the server is running)
 * GET /ready  — Readiness probe with ledger counts and the pause flag
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const stats = ledger.getStats();
    return c.json({
      status: "ready",
      paused: stats.paused,
      snippets: stats.snippetCount,
      hints: stats.hintCount,
      events: stats.eventCount,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
