/**
 * @snipledger/ledger — In-memory snippet ledger engine.
 *
 * Tracks code snippets, tips, hint requests, votes, tags and badges.
 * Enforces the ledger invariants:
 * - Snippet and hint ids are dense, start at 1 and are never reused
 * - Snippet reputation never goes negative
 * - Author tip balance = tips credited − tips withdrawn
 * - A voter never holds both an upvote and a downvote on one snippet
 * - All amounts use bigint (no floating point, no upper bound)
 *
 * Design rules:
 * - All exposed records are readonly
 * - Fail-closed: invalid operations throw LedgerError before mutating
 * - Every mutation appends exactly one typed event
 */

// Core engine
export { SnippetLedger } from "./ledger.js";

// Event log
export { LedgerEventLog } from "./event-log.js";
export type {
  EventQuery,
  LedgerEventHandler,
  SubscriberErrorSink,
  Subscription,
} from "./event-log.js";
export { LEDGER_EVENT_TYPES } from "./events.js";
export type {
  LedgerEvent,
  LedgerEventBody,
  LedgerEventType,
  SnippetSubmitted,
  SnippetUpdated,
  SnippetDeleted,
  SnippetTipped,
  TipsWithdrawn,
  TreasuryFeesWithdrawn,
  HintRequested,
  HintFulfilled,
  LanguageRegistered,
  ReputationUpvote,
  ReputationDownvote,
  PauseToggled,
  BadgeAwarded,
  SnippetTagAdded,
} from "./events.js";

// Helpers
export { RecentQueue } from "./recent-queue.js";
export { sha256Hex, systemClock, utf8Length } from "./digest.js";
export { computeLedgerStateHash, hashLedgerSnapshot } from "./state-hash.js";
export type { LedgerStateHash } from "./state-hash.js";
export {
  BUILTIN_LANGUAGES,
  DEFAULT_LIMITS,
  DEFAULT_ROLES,
  SCHEMA_VERSION,
} from "./constants.js";

// Types
export type {
  Clock,
  DigestFn,
  Snippet,
  HintRequest,
  LedgerLimits,
  LedgerRoles,
  LedgerConfig,
  LedgerOptions,
  TipReceipt,
  BatchFailure,
  SubmitBatchResult,
  LedgerStats,
  LedgerSnapshot,
  SnippetSnapshot,
  HintSnapshot,
  AuthorSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, isLedgerError } from "./types.js";
