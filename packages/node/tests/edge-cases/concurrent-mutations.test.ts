/**
 * Edge case: concurrent requests against one ledger.
 *
 * Each handler makes one synchronous ledger call, so concurrent requests
 * cannot bypass caps or withdraw the same balance twice.
 */

import { describe, it, expect } from "vitest";
import { ALICE, BOB, TREASURY, createTestApp, jsonRequest, submit } from "../setup.js";

describe("concurrent mutations", () => {
  it("does not exceed the per-author snippet cap", async () => {
    const instance = createTestApp({ limits: { maxSnippetsPerAuthor: 2 } });

    const responses = await Promise.all(
      Array.from({ length: 5 }, (_, i) => submit(instance, ALICE, `snippet ${i}`)),
    );
    const statuses = responses.map((r) => r.status).sort();

    expect(statuses).toEqual([201, 201, 422, 422, 422]);
    expect(instance.ledger.getSnippetsByAuthor(ALICE)).toEqual([1, 2]);
  });

  it("pays out a tip balance only once", async () => {
    const instance = createTestApp();
    await submit(instance, ALICE, "first");
    await instance.app.request(jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "1000" }, BOB));

    const responses = await Promise.all(
      Array.from({ length: 3 }, () =>
        instance.app.request(jsonRequest("/api/v1/authors/withdraw", "POST", undefined, ALICE)),
      ),
    );

    expect(responses.map((r) => r.status).sort()).toEqual([200, 422, 422]);
    expect(instance.ledger.getStats().totalTipsWithdrawn).toBe(998n);
  });

  it("pays out treasury fees only once", async () => {
    const instance = createTestApp();
    await submit(instance, ALICE, "first");
    await instance.app.request(jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "10000" }, BOB));

    const responses = await Promise.all(
      Array.from({ length: 2 }, () =>
        instance.app.request(jsonRequest("/api/v1/admin/treasury/withdraw", "POST", undefined, TREASURY)),
      ),
    );

    expect(responses.map((r) => r.status).sort()).toEqual([200, 422]);
    expect(instance.ledger.getStats().pendingTreasuryFees).toBe(0n);
  });

  it("keeps every concurrent tip", async () => {
    const instance = createTestApp();
    await submit(instance, ALICE, "first");

    await Promise.all(
      Array.from({ length: 10 }, () =>
        instance.app.request(jsonRequest("/api/v1/snippets/1/tips", "POST", { amount: "1000" }, BOB)),
      ),
    );

    expect(instance.ledger.getTipBalance(ALICE)).toBe(9980n);
    expect(instance.ledger.getStats().totalTreasuryFees).toBe(20n);
  });
});
