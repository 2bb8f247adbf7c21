/**
 * Author routes.
 *
 * POST /api/v1/authors/withdraw — Withdraw the caller's tip balance
 * GET  /api/v1/authors/:author  — Balance, reputation, badges, snippets, open hints
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/caller.js";

export function createAuthorRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/withdraw", (c) => {
    const caller = requireCaller(c);
    const amount = ledger.withdrawTips(caller);
    return c.json({ data: { author: caller, amount: amount.toString() } });
  });

  routes.get("/:author", (c) => {
    const author = c.req.param("author");
    return c.json({
      data: {
        author,
        tipBalance: ledger.getTipBalance(author).toString(),
        reputation: ledger.getAuthorReputation(author),
        badges: ledger.getBadges(author),
        snippets: ledger.getSnippetsByAuthor(author),
        openHints: ledger.getOpenHints(author),
      },
    });
  });

  return routes;
}
