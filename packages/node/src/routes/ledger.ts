/**
 * Ledger-wide reads.
 *
 * GET /api/v1/ledger/config                — Limits and role identities
 * GET /api/v1/ledger/stats                 — Totals and counts
 * GET /api/v1/ledger/events                — Event log page (?from, ?limit, ?type)
 * GET /api/v1/ledger/state-hash            — SHA-256 of the canonical snapshot
 * GET /api/v1/ledger/languages/:languageId — Registry lookup
 */

import { Hono } from "hono";
import { computeLedgerStateHash, type SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  Digest,
  EventQuerySchema,
  toConfigView,
  toEventView,
  toStatsView,
} from "../types/dto.js";
import { parseWith } from "../middleware/validate.js";

export function createLedgerRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", (c) => c.json({ data: toConfigView(ledger.getConfig()) }));

  routes.get("/stats", (c) => c.json({ data: toStatsView(ledger.getStats()) }));

  routes.get("/events", (c) => {
    const query = parseWith(EventQuerySchema, c.req.query(), "query");
    const events = ledger.getEvents({
      fromSequence: query.from,
      maxCount: query.limit,
      type: query.type,
    });
    const last = events.at(-1);
    return c.json({
      data: events.map(toEventView),
      pagination: {
        from: query.from,
        limit: query.limit,
        next: last === undefined ? null : last.sequence + 1,
      },
    });
  });

  routes.get("/state-hash", (c) => {
    return c.json({ data: computeLedgerStateHash(ledger.snapshot()) });
  });

  routes.get("/languages/:languageId", (c) => {
    const languageId = parseWith(Digest, c.req.param("languageId"), "language id");
    return c.json({
      data: {
        languageId,
        registered: ledger.isLanguageRegistered(languageId),
        snippetCount: ledger.getLanguageCount(languageId),
      },
    });
  });

  return routes;
}
