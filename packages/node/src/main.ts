/**
 * @snipledger/node — Entry point.
 *
 * Loads config, builds the ledger and app, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { SnippetLedger } from "@snipledger/ledger";
import { loadConfig, toLedgerOptions } from "./config.js";
import { createApp } from "./app.js";
import { toEventView } from "./types/dto.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const ledger = new SnippetLedger({
    ...toLedgerOptions(config),
    onSubscriberError: (err, event) => {
      logger.error({ err, type: event.type, sequence: event.sequence }, "Ledger event subscriber failed");
    },
  });
  const { curator, treasury, fulfiller } = ledger.getConfig();
  logger.info({ curator, treasury, fulfiller }, "Ledger roles configured");

  const subscription = ledger.subscribe((event) => {
    logger.debug({ event: toEventView(event) }, `ledger ${event.type}`);
  });

  const { app } = createApp({
    ledger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Snippet ledger node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
