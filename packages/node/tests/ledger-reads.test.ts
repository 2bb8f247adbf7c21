/**
 * Tests for ledger-wide reads and health routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { hashLedgerSnapshot, sha256Hex } from "@snipledger/ledger";
import type { AppInstance } from "../src/app.js";
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

beforeEach(async () => {
  instance = createTestApp();
  await submit(instance, ALICE, "first");
  await instance.app.request(jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "1000" }, BOB));
});

describe("GET /api/v1/ledger/config", () => {
  it("returns limits with bigints as strings", async () => {
    const res = await instance.app.request("/api/v1/ledger/config");
    const body = await readJson<{ data: Record<string, unknown> }>(res);
    expect(body.data).toMatchObject({
      curator: CURATOR,
      maxSnippetBytes: 2048,
      minTipUnit: "10",
      treasuryFeeBps: "25",
      bpsDenominator: "10000",
      schemaVersion: 1,
    });
  });
});

describe("GET /api/v1/ledger/stats", () => {
  it("reports totals", async () => {
    const res = await instance.app.request("/api/v1/ledger/stats");
    const body = await readJson<{ data: Record<string, unknown> }>(res);
    expect(body.data).toMatchObject({
      totalTipsReceived: "1000",
      totalTreasuryFees: "2",
      pendingTreasuryFees: "2",
      snippetCount: 1,
      activeSnippetCount: 1,
      eventCount: 2,
      paused: false,
    });
  });
});

describe("GET /api/v1/ledger/events", () => {
  it("filters by type and serializes amounts", async () => {
    const res = await instance.app.request("/api/v1/ledger/events?type=SnippetTipped");
    expect(await res.json()).toEqual({
      data: [
        {
          type: "SnippetTipped",
          sequence: 2,
          snippetId: 1,
          tipper: BOB,
          author: ALICE,
          amount: "1000",
          toAuthor: "998",
          fee: "2",
          tippedAt: 1_700_000_000_001,
        },
      ],
      pagination: { from: 1, limit: 100, next: 3 },
    });
  });

  it("pages from a sequence", async () => {
    const res = await instance.app.request("/api/v1/ledger/events?from=2&limit=1");
    const body = await readJson<{ data: { sequence: number }[]; pagination: { next: number | null } }>(res);
    expect(body.data.map((e) => e.sequence)).toEqual([2]);
    expect(body.pagination.next).toBe(3);

    const end = await instance.app.request("/api/v1/ledger/events?from=3");
    expect(await end.json()).toEqual({ data: [], pagination: { from: 3, limit: 100, next: null } });
  });

  it("rejects an unknown event type", async () => {
    const res = await instance.app.request("/api/v1/ledger/events?type=Bogus");
    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/ledger/state-hash", () => {
  it("hashes the current snapshot", async () => {
    const res = await instance.app.request("/api/v1/ledger/state-hash");
    const body = await readJson<{ data: { hash: string; eventCount: number } }>(res);
    expect(body.data.hash).toBe(hashLedgerSnapshot(instance.ledger.snapshot()));
    expect(body.data.eventCount).toBe(2);
  });
});

describe("GET /api/v1/ledger/languages/:languageId", () => {
  it("reports registration and active count", async () => {
    const ts = await instance.app.request(`/api/v1/ledger/languages/${TYPESCRIPT}`);
    expect(await ts.json()).toEqual({
      data: { languageId: TYPESCRIPT, registered: true, snippetCount: 1 },
    });

    const go = sha256Hex("go");
    const unknown = await instance.app.request(`/api/v1/ledger/languages/${go}`);
    expect(await unknown.json()).toEqual({
      data: { languageId: go, registered: false, snippetCount: 0 },
    });
  });
});

describe("health routes", () => {
  it("GET /health answers ok", async () => {
    const res = await instance.app.request("/health");
    expect(res.status).toBe(200);
    expect((await readJson<{ status: string }>(res)).status).toBe("ok");
  });

  it("GET /ready reports ledger counts", async () => {
    const res = await instance.app.request("/ready");
    expect(await res.json()).toMatchObject({
      status: "ready",
      paused: false,
      snippets: 1,
      hints: 0,
      events: 2,
    });
  });
});
