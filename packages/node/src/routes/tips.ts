/**
 * Batch tipping.
 *
 * POST /api/v1/tips/batch — Tip several snippets in order. The first
 * failing tip fails the request; earlier tips stay applied.
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { TipBatchSchema, toTipReceiptView } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { readBody } from "../middleware/validate.js";

export function createTipRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/batch", async (c) => {
    const body = await readBody(c, TipBatchSchema);
    const receipts = ledger.tipSnippetBatch(
      requireCaller(c),
      body.tips.map((t) => t.snippetId),
      body.tips.map((t) => t.amount),
    );
    return c.json({ data: receipts.map(toTipReceiptView) });
  });

  return routes;
}
