/**
 * 🚦 Pre-filter Chain - HoopsRouter-MCP
 *
 * Semantic checks that settle a verdict before weighted scoring runs.
 * The chain is an ordered list; the first entry whose test passes decides.
 *
 * Order:
 * 1. opinion_quality   → contextual  ("most exciting team", bare "best player")
 * 2. biographical      → hybrid      ("Who is LeBron James?")
 * 3. debate_discussion → hybrid      ("do fans debate about...", "consensus views on...")
 * 4. definitional      → contextual  ("Define TS%", "What is a triple-double?")
 * 5. glossary_term     → contextual  (glossary term without statistical intent)
 *
 * @module classifier/prefilters
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { PrefilterName, QueryType } from "../types.js";
import type { QueryText } from "./query-text.js";
import { GLOSSARY_TERMS } from "./vocabulary.js";

// ============================================================================
// Pattern Definitions
// ============================================================================

const OPINION_ADJECTIVES = "exciting|fun|interesting|dramatic|impressive|thrilling|boring|memorable|legendary|iconic|entertaining|wild|crazy|insane|clutch";

/**
 * Subjective superlatives and colloquial intensity without a measurable stat.
 */
export const OPINION_QUALITY_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\b(most|best|worst|greatest|coolest|most\s+\w+ful)\b.*\b(${OPINION_ADJECTIVES})\b`),
  /\b(which|who)\b.*\b(most|best|worst)\b.*\b(exciting|fun|interesting|impressive|thrilling|iconic|memorable|entertaining|wild|surprising|disappointing)\b/,
  /\b(most|best|worst)\s+(exciting|fun|interesting|impressive|thrilling|memorable|entertaining|dramatic|boring|wild|surprising|disappointing|clutch)\b/,
  // bare "best player" unless a stat role follows
  /\b(who|which)\b.*\b(best|most)\b.*\b(player|team|athlete|star)\b(?!.*\b(scorer|rebounder|passer|defender|shooter|blocker|handler)\b)/,
  /\b(wild|crazy|insane|nuts)\s+(this\s+year|this\s+season|right\s+now)\b/,
];

/**
 * Social-opinion subject + discussion verb + topic connector.
 */
export const DEBATE_DISCUSSION_PATTERNS: readonly RegExp[] = [
  /\b(do\s+)?(fans?|people|reddit|community|experts?|analysts?)\b.*\b(debate|discuss)\s+(about|on)\b/,
  /\b(authoritative|expert|verified|official)\s+(voices?|perspectives?|views?|opinions?).*\b(say|about|on)\b/,
  /\b(consensus|popular|common)\s+(views?|opinions?|perspectives?)\s+(on|about)\b/,
  /\bcompare\s+(opinions?|views?|perspectives?)\s+(on|about|from)\b/,
];

/**
 * Requests for a meaning. "explain" only counts when it asks for the
 * definition, meaning, concept or difference, never "explain why".
 */
export const DEFINITIONAL_PATTERNS: readonly RegExp[] = [
  /\b(define|definition)\b/,
  /\bwhat\s+(is|does|means?|do)\b\s+[a-z]{0,20}(\s+[a-z]{0,20})?$/,
  /\bwhat\s+(is|does)\s+\S+(\s+\S+)?\s+mean\??$/,
  /\bwhat\s+is\s+a\b/,
  /\b(meaning\s+of|refers\s+to)\b|\bwhat\b.*\brefers?\b/,
  /\bexplain\s+(the\s+)?(definition|meaning|concept|difference)\b/,
];

/** Superlative, threshold, listing or numeric intent next to a glossary term */
export const STATISTICAL_INTENT = /\b(who\s+has|top|highest|lowest|most|fewest|how\s+many|over|above|below|under|find|list|show|get|compare|averaging)\b|\d+/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const GLOSSARY_PATTERN = new RegExp(
  String.raw`\b(${GLOSSARY_TERMS.map(escapeRegExp).join("|")})\b`
);

// ============================================================================
// Detectors
// ============================================================================

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => pattern.test(text));
}

export function isOpinionQuality(normalized: string): boolean {
  return matchesAny(normalized, OPINION_QUALITY_PATTERNS);
}

export function isDebateDiscussion(normalized: string): boolean {
  return matchesAny(normalized, DEBATE_DISCUSSION_PATTERNS);
}

export function isDefinitional(normalized: string): boolean {
  return matchesAny(normalized, DEFINITIONAL_PATTERNS);
}

export function hasGlossaryTerm(normalized: string): boolean {
  return GLOSSARY_PATTERN.test(normalized);
}

export function hasStatisticalIntent(normalized: string): boolean {
  return STATISTICAL_INTENT.test(normalized);
}

// ============================================================================
// Chain
// ============================================================================

/**
 * What a pre-filter sees. `is_biographical` is computed once by the
 * metadata estimators and reused here.
 */
export interface PrefilterInput {
  text: QueryText;
  is_biographical: boolean;
}

export interface Prefilter {
  name: PrefilterName;
  verdict: QueryType;
  test: (input: PrefilterInput) => boolean;
}

export const PREFILTER_CHAIN: readonly Prefilter[] = Object.freeze([
  {
    name: "opinion_quality",
    verdict: "contextual",
    test: ({ text }) => isOpinionQuality(text.normalized),
  },
  {
    name: "biographical",
    verdict: "hybrid",
    test: ({ is_biographical }) => is_biographical,
  },
  {
    name: "debate_discussion",
    verdict: "hybrid",
    test: ({ text }) => isDebateDiscussion(text.normalized),
  },
  {
    name: "definitional",
    verdict: "contextual",
    test: ({ text }) => isDefinitional(text.normalized),
  },
  {
    // a glossary term asked about with statistical intent falls through to scoring
    name: "glossary_term",
    verdict: "contextual",
    test: ({ text }) => hasGlossaryTerm(text.normalized) && !hasStatisticalIntent(text.normalized),
  },
] satisfies Prefilter[]);

/**
 * Run the chain in order and return the first filter that fires, if any.
 */
export function runPrefilters(
  input: PrefilterInput,
  chain: readonly Prefilter[] = PREFILTER_CHAIN
): Prefilter | undefined {
  return chain.find(prefilter => prefilter.test(input));
}
