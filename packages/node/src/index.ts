/**
 * @snipledger/node — HTTP API for the snippet ledger.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { ConfigSchema, loadConfig, toLedgerOptions } from "./config.js";
export type { AppConfig } from "./config.js";
export { LEDGER_STATUS_MAP, createErrorHandler } from "./middleware/error-handler.js";
export type { UnexpectedErrorSink } from "./middleware/error-handler.js";
export { CALLER_HEADER, requireCaller } from "./middleware/caller.js";
export { REQUEST_ID_HEADER } from "./middleware/request-id.js";
export type { RequestLogEntry } from "./middleware/logger.js";
export * from "./types/dto.js";
export { ApiError, createErrorEnvelope } from "./types/error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./types/error.js";
export type { AppEnv, DataEnvelope } from "./types/api-contract.js";
