/**
 * Privileged routes. The engine checks the caller against the configured
 * curator and treasury identities.
 *
 * POST /api/v1/admin/languages         — Register a language (curator)
 * POST /api/v1/admin/pause             — Pause or resume (curator)
 * POST /api/v1/admin/badges            — Award a badge slot (curator)
 * POST /api/v1/admin/treasury/withdraw — Withdraw pending fees (treasury)
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { AwardBadgeSchema, PauseSchema, RegisterLanguageSchema } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { readBody } from "../middleware/validate.js";
import { resolveLanguageId } from "./language.js";

export function createAdminRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/languages", async (c) => {
    const body = await readBody(c, RegisterLanguageSchema);
    const languageId = resolveLanguageId(ledger, body);
    ledger.registerLanguage(languageId, requireCaller(c));
    return c.json({ data: { languageId, registered: true } }, 201);
  });

  routes.post("/pause", async (c) => {
    const body = await readBody(c, PauseSchema);
    ledger.setPaused(body.paused, requireCaller(c));
    return c.json({ data: { paused: ledger.isPaused() } });
  });

  routes.post("/badges", async (c) => {
    const body = await readBody(c, AwardBadgeSchema);
    ledger.awardBadge(body.account, body.slot, requireCaller(c));
    return c.json({
      data: { account: body.account, badges: ledger.getBadges(body.account) },
    });
  });

  routes.post("/treasury/withdraw", (c) => {
    const amount = ledger.withdrawTreasuryFees(requireCaller(c));
    return c.json({ data: { amount: amount.toString() } });
  });

  return routes;
}
