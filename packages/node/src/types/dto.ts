/**
 * Request schemas and response views.
 *
 * Bodies are validated with Zod. Amounts travel as decimal strings in both
 * directions, since JSON has no bigint.
 */

import { z } from "zod";
import {
  LEDGER_EVENT_TYPES,
  type HintRequest,
  type LedgerConfig,
  type LedgerEvent,
  type LedgerEventType,
  type LedgerStats,
  type Snippet,
  type TipReceipt,
} from "@snipledger/ledger";

// =============================================================================
// Primitives
// =============================================================================

export const Digest = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "Expected a lowercase hex SHA-256 digest");

export const Amount = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer as a decimal string")
  .transform((v) => BigInt(v));

export const Id = z
  .string()
  .regex(/^[1-9]\d*$/, "Expected a positive integer")
  .transform((v) => Number(v));

const LanguageRef = {
  languageId: Digest.optional(),
  language: z.string().min(1).optional(),
};

// =============================================================================
// Request Bodies
// =============================================================================

export const SubmitSnippetSchema = z.object({
  content: z.string(),
  title: z.string().nullable().default(null),
  ...LanguageRef,
});

export const SubmitSnippetBatchSchema = z.object({
  contents: z.array(z.string()),
  titles: z.array(z.string().nullable()).optional(),
  ...LanguageRef,
});

export const UpdateSnippetSchema = z.object({
  content: z.string(),
});

export const TipSchema = z.object({
  amount: Amount,
});

export const TipBatchSchema = z.object({
  tips: z.array(z.object({ snippetId: z.number().int().positive(), amount: Amount })),
});

export const TagSchema = z.object({
  tag: Digest,
});

export const RequestHintSchema = z.object({
  topic: Digest,
  snippetId: z.number().int().min(0).default(0),
});

export const RegisterLanguageSchema = z.object(LanguageRef);

export const PauseSchema = z.object({
  paused: z.boolean(),
});

export const AwardBadgeSchema = z.object({
  account: z.string().min(1),
  slot: z.number().int(),
});

export const EventQuerySchema = z.object({
  from: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  type: z
    .custom<LedgerEventType>(
      (v) => LEDGER_EVENT_TYPES.some((t) => t === v),
      "Unknown event type",
    )
    .optional(),
});

// =============================================================================
// Response Views
// =============================================================================

export interface SnippetView {
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

export function toSnippetView(snippet: Snippet, tags: readonly string[]): SnippetView {
  return {
    id: snippet.id,
    author: snippet.author,
    contentHash: snippet.contentHash,
    languageId: snippet.languageId,
    createdAt: snippet.createdAt,
    updatedAt: snippet.updatedAt,
    tipBalance: snippet.tipBalance.toString(),
    reputation: snippet.reputation,
    deleted: snippet.deleted,
    tags,
  };
}

export interface HintView {
  readonly id: number;
  readonly requester: string;
  readonly topic: string;
  readonly snippetId: number;
  readonly createdAt: number;
  readonly fulfilled: boolean;
  readonly fulfiller: string | null;
  readonly fulfilledAt: number;
}

export function toHintView(hint: HintRequest): HintView {
  return {
    id: hint.id,
    requester: hint.requester,
    topic: hint.topic,
    snippetId: hint.snippetId,
    createdAt: hint.createdAt,
    fulfilled: hint.fulfilled,
    fulfiller: hint.fulfiller ?? null,
    fulfilledAt: hint.fulfilledAt,
  };
}

export interface TipReceiptView {
  readonly snippetId: number;
  readonly amount: string;
  readonly fee: string;
  readonly toAuthor: string;
}

export function toTipReceiptView(receipt: TipReceipt): TipReceiptView {
  return {
    snippetId: receipt.snippetId,
    amount: receipt.amount.toString(),
    fee: receipt.fee.toString(),
    toAuthor: receipt.toAuthor.toString(),
  };
}

type Stringified<T> = { readonly [K in keyof T]: T[K] extends bigint ? string : T[K] };

export type LedgerStatsView = Stringified<LedgerStats>;

export function toStatsView(stats: LedgerStats): LedgerStatsView {
  return {
    ...stats,
    totalTipsReceived: stats.totalTipsReceived.toString(),
    totalTipsWithdrawn: stats.totalTipsWithdrawn.toString(),
    totalTreasuryFees: stats.totalTreasuryFees.toString(),
    totalTreasuryFeesWithdrawn: stats.totalTreasuryFeesWithdrawn.toString(),
    pendingTreasuryFees: stats.pendingTreasuryFees.toString(),
  };
}

export type LedgerConfigView = Stringified<LedgerConfig>;

export function toConfigView(config: LedgerConfig): LedgerConfigView {
  return {
    ...config,
    minTipUnit: config.minTipUnit.toString(),
    treasuryFeeBps: config.treasuryFeeBps.toString(),
    bpsDenominator: config.bpsDenominator.toString(),
  };
}

type StringifiedEach<E> = E extends unknown ? Stringified<E> : never;

export type LedgerEventView = StringifiedEach<LedgerEvent>;

export function toEventView(event: LedgerEvent): LedgerEventView {
  switch (event.type) {
    case "SnippetTipped":
      return {
        ...event,
        amount: event.amount.toString(),
        toAuthor: event.toAuthor.toString(),
        fee: event.fee.toString(),
      };
    case "TipsWithdrawn":
      return { ...event, amount: event.amount.toString() };
    case "TreasuryFeesWithdrawn":
      return { ...event, amount: event.amount.toString() };
    default:
      return event;
  }
}
