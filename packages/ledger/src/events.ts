/**
 * @snipledger/ledger — Ledger event records.
 *
 * One variant per mutating operation, discriminated on `type`.
 * Events are audit records only; the engine never reads them back.
 */

export interface SnippetSubmitted {
  readonly type: "SnippetSubmitted";
  readonly snippetId: number;
  readonly author: string;
  readonly contentHash: string;
  readonly languageId: string;
  readonly createdAt: number;
}

export interface SnippetUpdated {
  readonly type: "SnippetUpdated";
  readonly snippetId: number;
  readonly author: string;
  readonly contentHash: string;
  readonly updatedAt: number;
}

export interface SnippetDeleted {
  readonly type: "SnippetDeleted";
  readonly snippetId: number;
  readonly author: string;
  readonly deletedAt: number;
}

export interface SnippetTipped {
  readonly type: "SnippetTipped";
  readonly snippetId: number;
  readonly tipper: string;
  readonly author: string;
  readonly amount: bigint;
  readonly toAuthor: bigint;
  readonly fee: bigint;
  readonly tippedAt: number;
}

export interface TipsWithdrawn {
  readonly type: "TipsWithdrawn";
  readonly author: string;
  readonly amount: bigint;
  readonly withdrawnAt: number;
}

export interface TreasuryFeesWithdrawn {
  readonly type: "TreasuryFeesWithdrawn";
  readonly treasury: string;
  readonly amount: bigint;
  readonly withdrawnAt: number;
}

export interface HintRequested {
  readonly type: "HintRequested";
  readonly hintId: number;
  readonly requester: string;
  readonly topic: string;
  readonly snippetId: number;
  readonly createdAt: number;
}

export interface HintFulfilled {
  readonly type: "HintFulfilled";
  readonly hintId: number;
  readonly fulfiller: string;
  readonly fulfilledAt: number;
}

export interface LanguageRegistered {
  readonly type: "LanguageRegistered";
  readonly languageId: string;
  readonly registeredBy: string;
  readonly registeredAt: number;
}

export interface ReputationUpvote {
  readonly type: "ReputationUpvote";
  readonly snippetId: number;
  readonly voter: string;
  readonly newScore: number;
  readonly votedAt: number;
}

export interface ReputationDownvote {
  readonly type: "ReputationDownvote";
  readonly snippetId: number;
  readonly voter: string;
  readonly newScore: number;
  readonly votedAt: number;
}

export interface PauseToggled {
  readonly type: "PauseToggled";
  readonly paused: boolean;
  readonly toggledBy: string;
  readonly toggledAt: number;
}

export interface BadgeAwarded {
  readonly type: "BadgeAwarded";
  readonly account: string;
  readonly slot: number;
  /** Bitset after the award. */
  readonly badges: number;
  readonly awardedAt: number;
}

export interface SnippetTagAdded {
  readonly type: "SnippetTagAdded";
  readonly snippetId: number;
  readonly tag: string;
  readonly taggedAt: number;
}

/** Event payload as produced by an operation, before it is sequenced. */
export type LedgerEventBody =
  | SnippetSubmitted
  | SnippetUpdated
  | SnippetDeleted
  | SnippetTipped
  | TipsWithdrawn
  | TreasuryFeesWithdrawn
  | HintRequested
  | HintFulfilled
  | LanguageRegistered
  | ReputationUpvote
  | ReputationDownvote
  | PauseToggled
  | BadgeAwarded
  | SnippetTagAdded;

export type LedgerEventType = LedgerEventBody["type"];

/** An event as stored in the log. `sequence` is 1-based and gap-free. */
export type LedgerEvent = LedgerEventBody & { readonly sequence: number };

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
  "SnippetSubmitted",
  "SnippetUpdated",
  "SnippetDeleted",
  "SnippetTipped",
  "TipsWithdrawn",
  "TreasuryFeesWithdrawn",
  "HintRequested",
  "HintFulfilled",
  "LanguageRegistered",
  "ReputationUpvote",
  "ReputationDownvote",
  "PauseToggled",
  "BadgeAwarded",
  "SnippetTagAdded",
];
