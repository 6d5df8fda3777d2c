/**
 * 📏 Metadata Estimators - HoopsRouter-MCP
 *
 * Retrieval tuning derived from the question text alone. None of these
 * look at the routing verdict, so the classifier computes them before the
 * pre-filter chain runs.
 *
 * - complexity depth: top_k for the contextual search (3, 5, 7 or 9)
 * - style category: noisy, complex, conversational or simple
 * - expansion count: paraphrases for the query-expansion step (1..5)
 *
 * @module classifier/estimators
 * @see tests/estimators.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ComplexityDepth, QueryStyleCategory } from "../types.js";
import { countOccurrences } from "../utils.js";
import type { QueryText } from "./query-text.js";

// ============================================================================
// Complexity Depth
// ============================================================================

/** Ranking and comparison vocabulary, +1 each (substring match) */
export const MODERATE_MARKERS: readonly string[] = [
  "top ", "best ", "compare", "versus", "most", "least",
  "ranking", "average", "leaders", "leaders in",
];

/** Explanatory, strategic and analytical vocabulary, +2 each (substring match) */
export const COMPLEX_MARKERS: readonly string[] = [
  "explain", "analyze", "impact", "effect", "why", "how does",
  "strategy", "style", "strengths", "weakness", "capability",
  "tendency", "pattern", "role", "system", "philosophy",
  "efficient", "effectiveness", "defense", "offense",
];

/**
 * Raw complexity score before it is bucketed into a depth.
 */
export function complexityScore(text: QueryText): number {
  const { normalized, words } = text;
  let score = 0;

  if (words.length < 5) {
    score += 1;
  } else if (words.length > 15) {
    score += 2;
  }

  for (const marker of MODERATE_MARKERS) {
    if (normalized.includes(marker)) score += 1;
  }
  for (const marker of COMPLEX_MARKERS) {
    if (normalized.includes(marker)) score += 2;
  }

  if (normalized.includes(" and ")) score += 1;
  if (normalized.includes(",")) score += 1;

  return score;
}

export function depthForScore(score: number): ComplexityDepth {
  if (score <= 1) return 3;
  if (score <= 3) return 5;
  if (score <= 5) return 7;
  return 9;
}

export function estimateComplexityDepth(text: QueryText): ComplexityDepth {
  return depthForScore(complexityScore(text));
}

// ============================================================================
// Style Category
// ============================================================================

const SLANG_MARKERS = /\b(lmao|bro|fr|imho|tbh|yo|lol|bruh|fam|ain't|plz|pls)\b/;
const CHAT_ABBREVIATIONS = /\b(n|2|da|u|r)\s+\b/;
const TYPO_MARKERS = /\b(plzzz|szn|whos|whats|dont|cant|isnt|wont|shouldnt)\b/;
const EXCESSIVE_PUNCTUATION = /(\?\?+|!!+|\.\.\.+)/;
const OUT_OF_SCOPE = /\b(weather|recipe|cook|bake|baking|politics|stock|finance|video\s*game|computer|tech|restaurant)\b/;
const INJECTION_MARKERS = /(<script|drop\s+table|union\s+select|'\s*or\s+1\s*=\s*1|\.\.[/\\]|\{\{|<%=|\$\{)/;
const SINGLE_WORD_GREETING = /^(hi|hello|hey|thanks|bye|goodbye)$/;

const SYNTHESIS_TERMS = /\b(analyze|synthesize|patterns|evolution|trend|sentiment|consensus)\b/;
const MULTIPART_CONNECTORS = /\b(and explain|and why|what does this reveal|what makes)\b/;
const CROSS_REFERENCE = /\b(compare opinions|how do .* differ from)\b/;
const STRATEGIC_TERMS = /\b(strategy|historically|future|generational|correlation)\b/;

const PRONOUNS = /\b(his|her|their|them|he|she|they)\b/;
const FOLLOW_UPS = /\b(what about|how about|tell me more|and what|what else)\b/;
const CORRECTIONS = /\b(actually|i meant|no i mean|sorry i meant)\b/;
const TOPIC_SWITCHES = /\b(going back to|returning to|back to)\b/;
const PROGRESSIVE_FILTERS = /\b(only from|sort them|just the|filter)\b/;
const STANDALONE_INTENT = /\b(top|most|best|who|what|how many|how much|count|average|total)\b/;

function isKeywordStuffed(words: readonly string[]): boolean {
  const counts = new Map<string, number>();
  for (const word of words) {
    const seen = (counts.get(word) ?? 0) + 1;
    if (seen >= 3) return true;
    counts.set(word, seen);
  }
  return false;
}

type StyleSignal = (text: QueryText) => boolean;

interface StyleRule {
  category: QueryStyleCategory;
  signals: readonly StyleSignal[];
}

/**
 * Priority ladder; the first category with any firing signal wins.
 * Simple is the fallthrough and has no rule.
 */
export const STYLE_LADDER: readonly StyleRule[] = [
  {
    category: "noisy",
    signals: [
      ({ normalized }) => SLANG_MARKERS.test(normalized),
      ({ normalized }) => CHAT_ABBREVIATIONS.test(normalized),
      ({ normalized }) => TYPO_MARKERS.test(normalized),
      ({ normalized }) => EXCESSIVE_PUNCTUATION.test(normalized),
      ({ normalized }) => OUT_OF_SCOPE.test(normalized),
      ({ normalized }) => INJECTION_MARKERS.test(normalized),
      ({ normalized, words }) => words.length === 1 && !SINGLE_WORD_GREETING.test(normalized),
      ({ words }) => isKeywordStuffed(words),
    ],
  },
  {
    category: "complex",
    signals: [
      ({ normalized }) => SYNTHESIS_TERMS.test(normalized),
      ({ normalized }) => MULTIPART_CONNECTORS.test(normalized),
      ({ normalized }) => CROSS_REFERENCE.test(normalized),
      ({ words }) => words.length > 15,
      ({ normalized }) => STRATEGIC_TERMS.test(normalized),
      ({ normalized }) => countOccurrences(normalized, " and ") >= 2 || countOccurrences(normalized, ",") >= 2,
    ],
  },
  {
    category: "conversational",
    signals: [
      ({ normalized }) => PRONOUNS.test(normalized),
      ({ normalized }) => FOLLOW_UPS.test(normalized),
      ({ normalized }) => CORRECTIONS.test(normalized),
      ({ normalized }) => TOPIC_SWITCHES.test(normalized),
      ({ normalized }) => PROGRESSIVE_FILTERS.test(normalized),
      ({ normalized, words }) => words.length < 5 && !STANDALONE_INTENT.test(normalized),
    ],
  },
];

export function classifyStyle(text: QueryText): QueryStyleCategory {
  const rule = STYLE_LADDER.find(candidate => candidate.signals.some(signal => signal(text)));
  return rule ? rule.category : "simple";
}

// ============================================================================
// Expansion Count
// ============================================================================

export const EXPANSION_BASE: Readonly<Record<QueryStyleCategory, number>> = {
  noisy: 1,
  complex: 2,
  simple: 4,
  conversational: 5,
};

export const MIN_EXPANSIONS = 1;
export const MAX_EXPANSIONS = 5;

export function estimateMaxExpansions(text: QueryText, style: QueryStyleCategory): number {
  const wordCount = text.words.length;
  const adjustment = wordCount < 5 ? 1 : wordCount > 15 ? -1 : 0;
  return Math.max(MIN_EXPANSIONS, Math.min(MAX_EXPANSIONS, EXPANSION_BASE[style] + adjustment));
}
