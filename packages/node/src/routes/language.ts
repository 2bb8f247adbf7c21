/**
 * Resolve a `{ languageId }` or `{ language }` reference to a digest.
 */

import type { SnippetLedger } from "@snipledger/ledger";
import { ApiError } from "../types/error.js";

export interface LanguageRef {
  readonly languageId?: string | undefined;
  readonly language?: string | undefined;
}

export function resolveLanguageId(ledger: SnippetLedger, ref: LanguageRef): string {
  if (ref.languageId !== undefined && ref.language !== undefined) {
    throw new ApiError("VALIDATION_ERROR", 400, "Provide languageId or language, not both");
  }
  if (ref.languageId !== undefined) {
    return ref.languageId;
  }
  if (ref.language !== undefined) {
    return ledger.languageIdOf(ref.language);
  }
  throw new ApiError("VALIDATION_ERROR", 400, "Provide languageId or language");
}
