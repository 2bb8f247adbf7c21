/**
 * Hint routes.
 *
 * POST /api/v1/hints             — Request a hint (201)
 * GET  /api/v1/hints/:id         — Get a hint request
 * POST /api/v1/hints/:id/fulfill — Fulfil a request (fulfiller only)
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";
import { Id, RequestHintSchema, toHintView } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { parseWith, readBody } from "../middleware/validate.js";

export function createHintRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await readBody(c, RequestHintSchema);
    const id = ledger.requestHint(requireCaller(c), body.topic, body.snippetId);
    const hint = ledger.getHint(id);
    if (hint === undefined) {
      throw new ApiError("NOT_FOUND", 404, `Hint ${id} not found`);
    }
    return c.json({ data: toHintView(hint) }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseWith(Id, c.req.param("id"), "hint id");
    const hint = ledger.getHint(id);
    if (hint === undefined) {
      throw new ApiError("NOT_FOUND", 404, `Hint ${id} not found`);
    }
    return c.json({ data: toHintView(hint) });
  });

  routes.post("/:id/fulfill", (c) => {
    const id = parseWith(Id, c.req.param("id"), "hint id");
    const hint = ledger.fulfillHint(id, requireCaller(c));
    return c.json({ data: toHintView(hint) });
  });

  return routes;
}
