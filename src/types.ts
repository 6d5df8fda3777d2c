/**
 * HoopsRouter-MCP: Canonical Data Types
 *
 * These types define the core data structures shared by the classifier,
 * its estimators and the MCP tools that expose it.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// Routing Verdicts
// ============================================================================

/**
 * Retrieval strategy a question is routed to.
 * - statistical: structured lookup against the stats database
 * - contextual: unstructured search over discussions and articles
 * - hybrid: both, merged later by the synthesis step
 */
export type QueryType = "statistical" | "contextual" | "hybrid";

export const QUERY_TYPES: readonly QueryType[] = ["statistical", "contextual", "hybrid"];

/**
 * Query style used to tune expansion aggressiveness.
 * Evaluated noisy > complex > conversational > simple.
 */
export type QueryStyleCategory = "noisy" | "complex" | "conversational" | "simple";

/** Retrieval depths the contextual search accepts */
export type ComplexityDepth = 3 | 5 | 7 | 9;

/**
 * The single output of a classification call.
 * Created fresh and frozen on every call.
 */
export interface ClassificationResult {
  query_type: QueryType;
  is_biographical: boolean;
  complexity_depth: ComplexityDepth;   // top_k for the contextual search
  style_category: QueryStyleCategory;
  max_expansions: number;              // paraphrases to generate, 1..5
}

// ============================================================================
// Pattern Groups
// ============================================================================

export type SignalFamily = "statistical" | "contextual";

/**
 * Uncompiled group definition. `source` is a single alternation so that
 * "did this group fire" is one boolean test.
 */
export interface PatternGroupDefinition {
  name: string;
  weight: number;
  source: string;
}

export interface PatternGroup {
  readonly name: string;
  readonly weight: number;
  readonly matcher: RegExp;
}

export interface PatternRegistry {
  readonly statistical: readonly PatternGroup[];
  readonly contextual: readonly PatternGroup[];
}

export interface SignalScore {
  total: number;
  matched_groups: string[];
}

// ============================================================================
// Decision Trace
// ============================================================================

export type PrefilterName =
  | "opinion_quality"
  | "biographical"
  | "debate_discussion"
  | "definitional"
  | "glossary_term";

export type LadderTier = "connector" | "ratio" | "auto_promote";

export type DecisionSource = PrefilterName | LadderTier | "winner_take_all" | "default_tie";

/**
 * Debug view of one classification: which stage decided and on what evidence.
 * `scores` is absent when a pre-filter short-circuited before scoring.
 */
export interface ClassificationTrace {
  query: string;
  normalized_query: string;
  decided_by: DecisionSource;
  scores?: {
    statistical: SignalScore;
    contextual: SignalScore;
  };
  connector_found?: boolean;
  ratio?: number;
  result: ClassificationResult;
}

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface HybridThresholds {
  ratio_floor: number;               // both scores must reach this for the ratio tier
  ratio_min: number;                 // min/max score ratio that counts as balanced
  auto_promote_statistical: number;
  auto_promote_contextual: number;
}

export interface RouterConfig {
  version: string;

  thresholds: HybridThresholds;

  logging: {
    level: LogLevel;
  };

  fallback: {
    base_url: string;
    model: string;
    api_key?: string;
    timeout_ms: number;
  };
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "CONFIG_INVALID"
  | "INVALID_INPUT"
  | "CLASSIFY_FAILED";

export interface ToolError {
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: LogLevel;
  phase: string;
  tool: string;
  message: string;
  data?: unknown;
}
