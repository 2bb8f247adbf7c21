/**
 * @snipledger/ledger — Types for the snippet ledger engine.
 *
 * Rules:
 * - All exposed records are readonly; the engine replaces records, never mutates them
 * - Amounts are bigint (tips have no upper bound)
 * - Fail-closed: every rejected operation throws a LedgerError before touching state
 */

import type { LedgerEvent } from "./events.js";

// ─── Ports ───────────────────────────────────────────────────────────────

/** Source of time. Must be monotonically non-decreasing. */
export interface Clock {
  /** Milliseconds since epoch. */
  now(): number;
}

/**
 * Content-addressing oracle. Deterministic; returns a fixed-length
 * lowercase hex digest.
 */
export type DigestFn = (data: string | Uint8Array) => string;

// ─── Entities ────────────────────────────────────────────────────────────

export interface Snippet {
  readonly id: number;
  readonly author: string;
  /** Digest of the UTF-8 snippet body. */
  readonly contentHash: string;
  /** Digest of the language name. */
  readonly languageId: string;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly tipBalance: bigint;
  readonly reputation: number;
  readonly deleted: boolean;
}

export interface HintRequest {
  readonly id: number;
  readonly requester: string;
  readonly topic: string;
  /** Linked snippet, or 0 for none. */
  readonly snippetId: number;
  readonly createdAt: number;
  readonly fulfilled: boolean;
  readonly fulfiller?: string | undefined;
  /** 0 until fulfilled. */
  readonly fulfilledAt: number;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface LedgerLimits {
  readonly maxSnippetBytes: number;
  readonly maxTitleBytes: number;
  readonly minTipUnit: bigint;
  readonly maxSnippetsPerAuthor: number;
  readonly maxOpenHintsPerUser: number;
  readonly treasuryFeeBps: bigint;
  readonly bpsDenominator: bigint;
  readonly badgeSlots: number;
  readonly recentQueueSize: number;
  readonly maxTagsPerSnippet: number;
  readonly maxSubmitBatch: number;
  readonly maxTipBatch: number;
}

export interface LedgerRoles {
  readonly curator: string;
  readonly treasury: string;
  readonly fulfiller: string;
}

/** Read-only configuration snapshot. Fixed at construction. */
export interface LedgerConfig extends LedgerLimits, LedgerRoles {
  readonly schemaVersion: number;
}

export interface LedgerOptions {
  readonly curator?: string | undefined;
  readonly treasury?: string | undefined;
  readonly fulfiller?: string | undefined;
  readonly limits?: Partial<LedgerLimits> | undefined;
  readonly clock?: Clock | undefined;
  readonly digest?: DigestFn | undefined;
  /** Receives errors thrown by event subscribers. Default: console.error */
  readonly onSubscriberError?: ((error: unknown, event: LedgerEvent) => void) | undefined;
}

// ─── Results ─────────────────────────────────────────────────────────────

/** How a tip was split between author and treasury. */
export interface TipReceipt {
  readonly snippetId: number;
  readonly amount: bigint;
  readonly fee: bigint;
  readonly toAuthor: bigint;
}

export interface BatchFailure {
  /** Index into the input lists of the item that failed. */
  readonly index: number;
  readonly error: LedgerError;
}

/**
 * Outcome of a submit batch. Items before the failure stay submitted.
 */
export interface SubmitBatchResult {
  readonly ids: readonly number[];
  readonly failure?: BatchFailure | undefined;
}

export interface LedgerStats {
  readonly totalTipsReceived: bigint;
  readonly totalTipsWithdrawn: bigint;
  readonly totalTreasuryFees: bigint;
  readonly totalTreasuryFeesWithdrawn: bigint;
  readonly pendingTreasuryFees: bigint;
  readonly snippetCount: number;
  readonly activeSnippetCount: number;
  readonly hintCount: number;
  readonly openHintCount: number;
  readonly languageCount: number;
  readonly eventCount: number;
  readonly paused: boolean;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

/**
 * Serializable view of the ledger state. Amounts are decimal strings so
 * the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly paused: boolean;
  readonly roles: LedgerRoles;
  readonly snippets: readonly SnippetSnapshot[];
  readonly hints: readonly HintSnapshot[];
  readonly authors: readonly AuthorSnapshot[];
  readonly languages: readonly { readonly languageId: string; readonly count: number }[];
  readonly recent: readonly number[];
  readonly totals: {
    readonly tipsReceived: string;
    readonly tipsWithdrawn: string;
    readonly treasuryFees: string;
    readonly treasuryFeesWithdrawn: string;
  };
  readonly eventCount: number;
}

export interface SnippetSnapshot {
  readonly id: number;
  readonly author: string;
  readonly contentHash: string;
  readonly languageId: string;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly tipBalance: string;
  readonly reputation: number;
  readonly deleted: boolean;
  readonly tags: readonly string[];
}

export interface HintSnapshot {
  readonly id: number;
  readonly requester: string;
  readonly topic: string;
  readonly snippetId: number;
  readonly createdAt: number;
  readonly fulfilled: boolean;
  readonly fulfiller: string | null;
  readonly fulfilledAt: number;
}

export interface AuthorSnapshot {
  readonly account: string;
  readonly tipBalance: string;
  readonly reputation: number;
  readonly badges: number;
  readonly upvoted: readonly number[];
  readonly downvoted: readonly number[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. One code per failure kind. */
export type LedgerErrorCode =
  // Authorization
  | "CURATOR_ONLY"
  | "TREASURY_ONLY"
  | "FULFILLER_ONLY"
  // Lifecycle
  | "PAUSED"
  | "SNIPPET_DELETED"
  | "HINT_ALREADY_FULFILLED"
  // Input bounds
  | "SNIPPET_TOO_LONG"
  | "TITLE_TOO_LONG"
  | "TIP_TOO_SMALL"
  | "AUTHOR_SNIPPET_CAP"
  | "HINT_REQUEST_CAP"
  | "INVALID_BATCH"
  // Not found
  | "INVALID_SNIPPET_ID"
  | "INVALID_HINT_ID"
  // Identity
  | "NOT_AUTHOR"
  | "CANNOT_VOTE_OWN"
  | "ALREADY_UPVOTED"
  | "ALREADY_DOWNVOTED"
  // Resource
  | "INSUFFICIENT_BALANCE"
  // Configuration
  | "ZERO_ADDRESS"
  | "LANGUAGE_ALREADY_REGISTERED"
  | "LANGUAGE_NOT_REGISTERED";

/**
 * Structured error from the ledger engine.
 * Always thrown — callers match on `code`, never on the message.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

export function isLedgerError(value: unknown): value is LedgerError {
  return value instanceof LedgerError;
}
