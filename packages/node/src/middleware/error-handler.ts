/**
 * Global error handler.
 *
 * Registered as Hono's onError handler. Renders every failure as an error
 * envelope: engine errors keep their code and get a mapped status, request
 * errors carry their own status, anything else is a 500 without its message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { LedgerError, type LedgerErrorCode } from "@snipledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Ledger Error → HTTP Status Mapping
// =============================================================================

export const LEDGER_STATUS_MAP: Readonly<Record<LedgerErrorCode, ContentfulStatusCode>> = {
  // Roles and ownership
  CURATOR_ONLY: 403,
  TREASURY_ONLY: 403,
  FULFILLER_ONLY: 403,
  NOT_AUTHOR: 403,
  CANNOT_VOTE_OWN: 403,

  // Unknown ids
  INVALID_SNIPPET_ID: 404,
  INVALID_HINT_ID: 404,

  // State conflicts
  SNIPPET_DELETED: 409,
  HINT_ALREADY_FULFILLED: 409,
  ALREADY_UPVOTED: 409,
  ALREADY_DOWNVOTED: 409,
  LANGUAGE_ALREADY_REGISTERED: 409,

  // Bounds, caps and balances
  SNIPPET_TOO_LONG: 422,
  TITLE_TOO_LONG: 422,
  TIP_TOO_SMALL: 422,
  AUTHOR_SNIPPET_CAP: 422,
  HINT_REQUEST_CAP: 422,
  INSUFFICIENT_BALANCE: 422,
  LANGUAGE_NOT_REGISTERED: 422,

  // Input
  INVALID_BATCH: 400,
  ZERO_ADDRESS: 400,

  PAUSED: 423,
};

// =============================================================================
// Handler
// =============================================================================

export type UnexpectedErrorSink = (err: Error, requestId: string | undefined) => void;

/**
 * Build the onError handler. `onUnexpected` receives errors that end as a
 * 500 so the entry point can log them.
 */
export function createErrorHandler(
  onUnexpected?: UnexpectedErrorSink,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof LedgerError) {
      return c.json(createErrorEnvelope(err.code, err.message), LEDGER_STATUS_MAP[err.code]);
    }

    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    onUnexpected?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
