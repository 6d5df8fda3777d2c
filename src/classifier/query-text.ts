/**
 * Shared per-query text view used by every classifier stage.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { normalizeQuery, splitWords } from "../utils.js";

/**
 * A question prepared once per classification and shared by every stage.
 * `original` keeps the caller's casing for the capitalised-name check.
 */
export interface QueryText {
  readonly original: string;
  readonly normalized: string;
  readonly words: readonly string[];
}

export function toQueryText(query: string): QueryText {
  const normalized = normalizeQuery(query);
  return {
    original: query.trim(),
    normalized,
    words: splitWords(normalized),
  };
}
