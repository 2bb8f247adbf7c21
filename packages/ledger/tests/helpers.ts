/**
 * Shared fixtures for ledger tests.
 */

import { SnippetLedger } from "../src/ledger.js";
import { isLedgerError } from "../src/types.js";
import type { Clock, LedgerErrorCode, LedgerOptions } from "../src/types.js";

export const CURATOR = "curator-1";
export const TREASURY = "treasury-1";
export const FULFILLER = "fulfiller-1";

export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";

/** A clock that advances by one millisecond on every read. */
export class TickingClock implements Clock {
  constructor(private _now = 1_700_000_000_000) {}

  now(): number {
    return this._now++;
  }
}

export function createLedger(options: LedgerOptions = {}): SnippetLedger {
  return new SnippetLedger({
    curator: CURATOR,
    treasury: TREASURY,
    fulfiller: FULFILLER,
    clock: new TickingClock(),
    ...options,
  });
}

/** Run `fn` and return the LedgerError code it throws. */
export function errorCode(fn: () => unknown): LedgerErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (isLedgerError(err)) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
