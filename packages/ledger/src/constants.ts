/**
 * @snipledger/ledger — Built-in limits, roles and languages.
 */

import type { LedgerLimits, LedgerRoles } from "./types.js";

export const SCHEMA_VERSION = 1;

export const DEFAULT_LIMITS: LedgerLimits = {
  maxSnippetBytes: 2048,
  maxTitleBytes: 64,
  minTipUnit: 10n,
  maxSnippetsPerAuthor: 64,
  maxOpenHintsPerUser: 24,
  treasuryFeeBps: 25n,
  bpsDenominator: 10_000n,
  badgeSlots: 8,
  recentQueueSize: 64,
  maxTagsPerSnippet: 4,
  maxSubmitBatch: 12,
  maxTipBatch: 16,
};

export const DEFAULT_ROLES: LedgerRoles = {
  curator: "0x2F5a8C1e4B7d0A3f6C9b2E5d8a1F4c7B0e3A6d9F",
  treasury: "0x8D1f4A7c0B3e6D9a2F5c8E1b4A7d0C3f6E9a2B5",
  fulfiller: "0xE3b6D9a2C5f8E1b4A7d0C3f6E9a2B5d8F1c4A7",
};

/** Languages registered (by digest of the name) on every new ledger. */
export const BUILTIN_LANGUAGES = ["typescript", "python", "rust", "solidity"] as const;
