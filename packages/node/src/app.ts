/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one ledger.
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import { SnippetLedger, type LedgerOptions } from "@snipledger/ledger";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler, type UnexpectedErrorSink } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware, type RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSnippetRoutes } from "./routes/snippets.js";
import { createTipRoutes } from "./routes/tips.js";
import { createHintRoutes } from "./routes/hints.js";
import { createAuthorRoutes } from "./routes/authors.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createLedgerRoutes } from "./routes/ledger.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Serve an existing ledger instead of building one from ledgerOptions. */
  readonly ledger?: SnippetLedger;
  readonly ledgerOptions?: LedgerOptions;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly onUnexpectedError?: UnexpectedErrorSink;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly ledger: SnippetLedger;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * Each handler makes one synchronous ledger call after its body is read,
 * so concurrent requests cannot interleave inside an operation.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const ledger = options.ledger ?? new SnippetLedger(options.ledgerOptions);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(ledger));
  app.route("/api/v1/snippets", createSnippetRoutes(ledger));
  app.route("/api/v1/tips", createTipRoutes(ledger));
  app.route("/api/v1/hints", createHintRoutes(ledger));
  app.route("/api/v1/authors", createAuthorRoutes(ledger));
  app.route("/api/v1/admin", createAdminRoutes(ledger));
  app.route("/api/v1/ledger", createLedgerRoutes(ledger));

  return { app, ledger };
}
