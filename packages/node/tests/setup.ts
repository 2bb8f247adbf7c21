/**
 * Test helpers for @snipledger/node.
 *
 * Builds the app around a ledger with fixed role identities and a ticking
 * clock, without starting an HTTP server.
 */

import { sha256Hex, type LedgerOptions } from "@snipledger/ledger";
import { createApp, type CreateAppOptions } from "../src/app.js";
import type { AppInstance } from "../src/app.js";

export const CURATOR = "curator-1";
export const TREASURY = "treasury-1";
export const FULFILLER = "fulfiller-1";
export const ALICE = "alice";
export const BOB = "bob";

export const TYPESCRIPT = sha256Hex("typescript");
export const TOPIC = sha256Hex("topic");

export function createTestApp(
  ledgerOptions: LedgerOptions = {},
  options: Omit<CreateAppOptions, "ledgerOptions" | "ledger"> = {},
): AppInstance {
  let tick = 1_700_000_000_000;
  return createApp({
    ...options,
    ledgerOptions: {
      curator: CURATOR,
      treasury: TREASURY,
      fulfiller: FULFILLER,
      clock: { now: () => tick++ },
      ...ledgerOptions,
    },
  });
}

/**
 * JSON request helper. `caller` becomes the X-Caller header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  caller?: string,
): Request {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (caller !== undefined) {
    headers["X-Caller"] = caller;
  }

  const init: RequestInit = { method, headers };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  readonly error: { readonly code: string; readonly message: string; readonly details?: Record<string, unknown> };
}

export async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

/** Submit a TypeScript snippet as `author`; returns the response. */
export function submit(
  instance: AppInstance,
  author: string,
  content: string,
): Promise<Response> {
  return Promise.resolve(
    instance.app.request(
      jsonRequest("/api/v1/snippets", "POST", { content, languageId: TYPESCRIPT }, author),
    ),
  );
}
