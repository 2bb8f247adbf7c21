/**
 * @snipledger/ledger — Ledger state hash.
 *
 * Canonicalizes a snapshot (RFC 8785 / JCS) and SHA-256 hashes it, so
 * two ledgers in the same state produce the same hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { LedgerSnapshot } from "./types.js";

export interface LedgerStateHash {
  readonly hash: string;
  readonly eventCount: number;
  readonly computedAt: string;
}

export function hashLedgerSnapshot(snapshot: LedgerSnapshot): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

export function computeLedgerStateHash(
  snapshot: LedgerSnapshot,
  computedAt: string = new Date().toISOString(),
): LedgerStateHash {
  return {
    hash: hashLedgerSnapshot(snapshot),
    eventCount: snapshot.eventCount,
    computedAt,
  };
}
