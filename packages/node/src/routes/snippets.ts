/**
 * Snippet routes.
 *
 * POST   /api/v1/snippets               — Submit a snippet (201)
 * POST   /api/v1/snippets/batch         — Submit up to maxSubmitBatch snippets
 * GET    /api/v1/snippets/recent        — Newest snippet ids first
 * GET    /api/v1/snippets/by-hash/:hash — Look up by content hash
 * GET    /api/v1/snippets/:id           — Get a snippet with its tags
 * PUT    /api/v1/snippets/:id           — Replace the content (author only)
 * DELETE /api/v1/snippets/:id           — Soft-delete (author only)
 * POST   /api/v1/snippets/:id/tips      — Tip a snippet
 * POST   /api/v1/snippets/:id/upvote    — Upvote
 * POST   /api/v1/snippets/:id/downvote  — Downvote
 * POST   /api/v1/snippets/:id/tags      — Add a tag (author only)
 */

import { Hono } from "hono";
import type { SnippetLedger } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";
import {
  Digest,
  Id,
  SubmitSnippetBatchSchema,
  SubmitSnippetSchema,
  TagSchema,
  TipSchema,
  UpdateSnippetSchema,
  toSnippetView,
  toTipReceiptView,
  type SnippetView,
} from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { parseWith, readBody } from "../middleware/validate.js";
import { resolveLanguageId } from "./language.js";

export function snippetView(ledger: SnippetLedger, id: number): SnippetView {
  const snippet = ledger.getSnippet(id);
  if (snippet === undefined) {
    throw new ApiError("NOT_FOUND", 404, `Snippet ${id} not found`);
  }
  return toSnippetView(snippet, ledger.getSnippetTags(id));
}

export function createSnippetRoutes(ledger: SnippetLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const idParam = (raw: string): number => parseWith(Id, raw, "snippet id");

  // ─── Submit ─────────────────────────────────────────────────────

  routes.post("/", async (c) => {
    const body = await readBody(c, SubmitSnippetSchema);
    const caller = requireCaller(c);
    const id = ledger.submitSnippet(
      caller,
      body.content,
      resolveLanguageId(ledger, body),
      body.title,
    );
    return c.json({ data: snippetView(ledger, id) }, 201);
  });

  routes.post("/batch", async (c) => {
    const body = await readBody(c, SubmitSnippetBatchSchema);
    const caller = requireCaller(c);
    const titles = body.titles ?? body.contents.map(() => null);
    const result = ledger.submitSnippetBatch(
      caller,
      body.contents,
      resolveLanguageId(ledger, body),
      titles,
    );
    const failure =
      result.failure === undefined
        ? null
        : {
            index: result.failure.index,
            code: result.failure.error.code,
            message: result.failure.error.message,
          };
    return c.json({ data: { ids: result.ids, failure } });
  });

  // ─── Reads (static paths before /:id) ──────────────────────────

  routes.get("/recent", (c) => {
    return c.json({ data: ledger.getRecentSnippetIds() });
  });

  routes.get("/by-hash/:hash", (c) => {
    const hash = parseWith(Digest, c.req.param("hash"), "content hash");
    const snippet = ledger.findSnippetByContentHash(hash);
    if (snippet === undefined) {
      throw new ApiError("NOT_FOUND", 404, "No snippet with that content hash");
    }
    return c.json({ data: toSnippetView(snippet, ledger.getSnippetTags(snippet.id)) });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: snippetView(ledger, idParam(c.req.param("id"))) });
  });

  // ─── Author Mutations ───────────────────────────────────────────

  routes.put("/:id", async (c) => {
    const id = idParam(c.req.param("id"));
    const body = await readBody(c, UpdateSnippetSchema);
    const caller = requireCaller(c);
    const updated = ledger.updateSnippet(id, caller, body.content);
    return c.json({ data: toSnippetView(updated, ledger.getSnippetTags(id)) });
  });

  routes.delete("/:id", (c) => {
    const id = idParam(c.req.param("id"));
    ledger.deleteSnippet(id, requireCaller(c));
    return c.json({ data: snippetView(ledger, id) });
  });

  routes.post("/:id/tags", async (c) => {
    const id = idParam(c.req.param("id"));
    const body = await readBody(c, TagSchema);
    const added = ledger.addSnippetTag(id, body.tag, requireCaller(c));
    return c.json({ data: { added, tags: ledger.getSnippetTags(id) } });
  });

  // ─── Tips and Votes ─────────────────────────────────────────────

  routes.post("/:id/tips", async (c) => {
    const id = idParam(c.req.param("id"));
    const body = await readBody(c, TipSchema);
    const receipt = ledger.tipSnippet(id, requireCaller(c), body.amount);
    return c.json({ data: toTipReceiptView(receipt) });
  });

  routes.post("/:id/upvote", (c) => {
    const id = idParam(c.req.param("id"));
    const reputation = ledger.upvoteSnippet(id, requireCaller(c));
    return c.json({ data: { snippetId: id, reputation } });
  });

  routes.post("/:id/downvote", (c) => {
    const id = idParam(c.req.param("id"));
    const reputation = ledger.downvoteSnippet(id, requireCaller(c));
    return c.json({ data: { snippetId: id, reputation } });
  });

  return routes;
}
