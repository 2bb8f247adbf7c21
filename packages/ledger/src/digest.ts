/**
 * @snipledger/ledger — Default content-addressing and byte helpers.
 */

import { createHash } from "node:crypto";
import type { Clock, DigestFn } from "./types.js";

/** SHA-256, 64 lowercase hex characters. */
export const sha256Hex: DigestFn = (data) =>
  createHash("sha256").update(data).digest("hex");

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** UTF-8 byte length of a string. */
export function utf8Length(value: string): number {
  return Buffer.byteLength(value, "utf8");
}
