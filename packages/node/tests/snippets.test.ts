/**
 * Tests for snippet routes.
 *
 * Covers: submit, batch submit, reads, update, delete, tags, tips, votes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { sha256Hex } from "@snipledger/ledger";
import type { AppInstance } from "../src/app.js";
import type { DataEnvelope } from "../src/types/api-contract.js";
import type { SnippetView } from "../src/types/dto.js";
import {
  ALICE,
  BOB,
  CURATOR,
  TYPESCRIPT,
  createTestApp,
  jsonRequest,
  readJson,
  submit,
  type ErrorBody,
} from "./setup.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

// =============================================================================
// POST /api/v1/snippets — Submit
// =============================================================================

describe("POST /api/v1/snippets", () => {
  it("submits a snippet and returns 201 with its view", async () => {
    const res = await submit(instance, ALICE, "const a = 1;");

    expect(res.status).toBe(201);
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data).toEqual({
      id: 1,
      author: ALICE,
      contentHash: sha256Hex("const a = 1;"),
      languageId: TYPESCRIPT,
      createdAt: 1_700_000_000_000,
      updatedAt: 1_700_000_000_000,
      tipBalance: "0",
      reputation: 0,
      deleted: false,
      tags: [],
    });
  });

  it("resolves a language by name", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets", "POST", { content: "x = 1", language: "python" }, ALICE),
    );
    expect(res.status).toBe(201);
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data.languageId).toBe(sha256Hex("python"));
  });

  it("returns 401 without a caller", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets", "POST", { content: "a", languageId: TYPESCRIPT }),
    );
    expect(res.status).toBe(401);
    const body = await readJson<ErrorBody>(res);
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Missing X-Caller header" });
  });

  it("returns 400 with issues for an invalid body", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets", "POST", { languageId: TYPESCRIPT }, ALICE),
    );
    expect(res.status).toBe(400);
    const body = await readJson<ErrorBody>(res);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "content", message: "Required" }],
    });
  });

  it("returns 400 when both language forms are given", async () => {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/snippets",
        "POST",
        { content: "a", languageId: TYPESCRIPT, language: "typescript" },
        ALICE,
      ),
    );
    expect(res.status).toBe(400);
  });

  it("maps engine errors to their status", async () => {
    const unregistered = await instance.app.request(
      jsonRequest("/api/v1/snippets", "POST", { content: "a", language: "cobol" }, ALICE),
    );
    expect(unregistered.status).toBe(422);
    expect((await readJson<ErrorBody>(unregistered)).error.code).toBe("LANGUAGE_NOT_REGISTERED");

    const tooLong = await submit(instance, ALICE, "x".repeat(2049));
    expect(tooLong.status).toBe(422);
    expect((await readJson<ErrorBody>(tooLong)).error.code).toBe("SNIPPET_TOO_LONG");
  });

  it("returns 423 while paused", async () => {
    await instance.app.request(jsonRequest("/api/v1/admin/pause", "POST", { paused: true }, CURATOR));
    const res = await submit(instance, ALICE, "a");
    expect(res.status).toBe(423);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("PAUSED");
  });
});

// =============================================================================
// POST /api/v1/snippets/batch
// =============================================================================

describe("POST /api/v1/snippets/batch", () => {
  it("returns ids and no failure when every item succeeds", async () => {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/snippets/batch",
        "POST",
        { contents: ["a", "b"], titles: ["A", null], languageId: TYPESCRIPT },
        ALICE,
      ),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { ids: [1, 2], failure: null } });
  });

  it("reports the first failure and keeps earlier items", async () => {
    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/snippets/batch",
        "POST",
        { contents: ["a", "x".repeat(2049), "c"], languageId: TYPESCRIPT },
        ALICE,
      ),
    );
    const body = await readJson<{ data: { ids: number[]; failure: { index: number; code: string } } }>(res);
    expect(body.data.ids).toEqual([1]);
    expect(body.data.failure.index).toBe(1);
    expect(body.data.failure.code).toBe("SNIPPET_TOO_LONG");
  });

  it("rejects an oversized batch with 400 INVALID_BATCH", async () => {
    const contents = Array.from({ length: 13 }, (_, i) => `s${i}`);
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets/batch", "POST", { contents, languageId: TYPESCRIPT }, ALICE),
    );
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_BATCH");
  });
});

// =============================================================================
// Reads
// =============================================================================

describe("snippet reads", () => {
  beforeEach(async () => {
    await submit(instance, ALICE, "first");
    await submit(instance, BOB, "second");
  });

  it("GET /recent lists newest first", async () => {
    const res = await instance.app.request("/api/v1/snippets/recent");
    expect(await res.json()).toEqual({ data: [2, 1] });
  });

  it("GET /:id returns the snippet", async () => {
    const res = await instance.app.request("/api/v1/snippets/2");
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data.author).toBe(BOB);
  });

  it("GET /:id returns 404 for an unknown id", async () => {
    const res = await instance.app.request("/api/v1/snippets/99");
    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("NOT_FOUND");
  });

  it("GET /:id returns 400 for a non-numeric id", async () => {
    const res = await instance.app.request("/api/v1/snippets/abc");
    expect(res.status).toBe(400);
  });

  it("GET /:id accepts only plain decimal ids", async () => {
    for (const raw of ["1e0", "%201", "1.0", "01", "0x1"]) {
      const res = await instance.app.request(`/api/v1/snippets/${raw}`);
      expect(res.status).toBe(400);
      expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
    }
    expect((await instance.app.request("/api/v1/snippets/1")).status).toBe(200);
  });

  it("GET /by-hash/:hash finds by content hash", async () => {
    const res = await instance.app.request(`/api/v1/snippets/by-hash/${sha256Hex("first")}`);
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data.id).toBe(1);

    const missing = await instance.app.request(`/api/v1/snippets/by-hash/${sha256Hex("none")}`);
    expect(missing.status).toBe(404);
  });
});

// =============================================================================
// Author Mutations
// =============================================================================

describe("author mutations", () => {
  beforeEach(async () => {
    await submit(instance, ALICE, "first");
  });

  it("PUT /:id updates the content hash for the author", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets/1", "PUT", { content: "second" }, ALICE),
    );
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data.contentHash).toBe(sha256Hex("second"));
  });

  it("PUT /:id returns 403 for another caller", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets/1", "PUT", { content: "second" }, BOB),
    );
    expect(res.status).toBe(403);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("NOT_AUTHOR");
  });

  it("DELETE /:id soft-deletes, then answers 409", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/snippets/1", "DELETE", undefined, ALICE));
    const body = await readJson<DataEnvelope<SnippetView>>(res);
    expect(body.data.deleted).toBe(true);

    const again = await instance.app.request(jsonRequest("/api/v1/snippets/1", "DELETE", undefined, ALICE));
    expect(again.status).toBe(409);
    expect((await readJson<ErrorBody>(again)).error.code).toBe("SNIPPET_DELETED");
  });

  it("POST /:id/tags adds a tag once", async () => {
    const tag = sha256Hex("tag");
    const first = await instance.app.request(jsonRequest("/api/v1/snippets/1/tags", "POST", { tag }, ALICE));
    expect(await first.json()).toEqual({ data: { added: true, tags: [tag] } });

    const second = await instance.app.request(jsonRequest("/api/v1/snippets/1/tags", "POST", { tag }, ALICE));
    expect(await second.json()).toEqual({ data: { added: false, tags: [tag] } });
  });
});

// =============================================================================
// Tips and Votes
// =============================================================================

describe("tips and votes", () => {
  beforeEach(async () => {
    await submit(instance, ALICE, "first");
  });

  it("POST /:id/tips splits the amount", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "1000" }, BOB),
    );
    expect(await res.json()).toEqual({
      data: { snippetId: 1, amount: "1000", fee: "2", toAuthor: "998" },
    });
  });

  it("POST /:id/tips carries amounts beyond 2^53", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "100000000000000000000" }, BOB),
    );
    const body = await readJson<{ data: { fee: string; toAuthor: string } }>(res);
    expect(body.data.fee).toBe("250000000000000000");
    expect(body.data.toAuthor).toBe("99750000000000000000");
  });

  it("POST /:id/tips rejects tips under the minimum and non-numeric amounts", async () => {
    const small = await instance.app.request(
      jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "9" }, BOB),
    );
    expect(small.status).toBe(422);
    expect((await readJson<ErrorBody>(small)).error.code).toBe("TIP_TOO_SMALL");

    const bad = await instance.app.request(
      jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: 1000 }, BOB),
    );
    expect(bad.status).toBe(400);
  });

  it("answers 200 for an applied tip when an event subscriber throws", async () => {
    const failures: string[] = [];
    const observed = createTestApp({
      onSubscriberError: (_error, event) => failures.push(event.type),
    });
    observed.ledger.subscribe(() => {
      throw new Error("subscriber down");
    });
    await submit(observed, ALICE, "first");

    const res = await observed.app.request(
      jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "1000" }, BOB),
    );

    expect(res.status).toBe(200);
    expect(observed.ledger.getTipBalance(ALICE)).toBe(998n);
    expect(failures).toEqual(["SnippetSubmitted", "SnippetTipped"]);
  });

  it("votes return the new score", async () => {
    const up = await instance.app.request(jsonRequest("/api/v1/snippets/1/upvote", "POST", undefined, BOB));
    expect(await up.json()).toEqual({ data: { snippetId: 1, reputation: 1 } });

    const twice = await instance.app.request(jsonRequest("/api/v1/snippets/1/upvote", "POST", undefined, BOB));
    expect(twice.status).toBe(409);

    const down = await instance.app.request(jsonRequest("/api/v1/snippets/1/downvote", "POST", undefined, BOB));
    expect(await down.json()).toEqual({ data: { snippetId: 1, reputation: 0 } });

    const own = await instance.app.request(jsonRequest("/api/v1/snippets/1/upvote", "POST", undefined, ALICE));
    expect(own.status).toBe(403);
    expect((await readJson<ErrorBody>(own)).error.code).toBe("CANNOT_VOTE_OWN");
  });
});

// =============================================================================
// POST /api/v1/tips/batch
// =============================================================================

describe("POST /api/v1/tips/batch", () => {
  it("tips several snippets in order", async () => {
    await submit(instance, ALICE, "first");
    await submit(instance, ALICE, "second");

    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/tips/batch",
        "POST",
        { tips: [{ snippetId: 1, amount: "1000" }, { snippetId: 2, amount: "10000" }] },
        BOB,
      ),
    );
    expect(await res.json()).toEqual({
      data: [
        { snippetId: 1, amount: "1000", fee: "2", toAuthor: "998" },
        { snippetId: 2, amount: "10000", fee: "25", toAuthor: "9975" },
      ],
    });
  });

  it("fails on the first bad tip and keeps earlier ones", async () => {
    await submit(instance, ALICE, "first");

    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/tips/batch",
        "POST",
        { tips: [{ snippetId: 1, amount: "1000" }, { snippetId: 7, amount: "1000" }] },
        BOB,
      ),
    );
    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_SNIPPET_ID");
    expect(instance.ledger.getTipBalance(ALICE)).toBe(998n);
  });
});
