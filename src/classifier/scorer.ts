/**
 * ⚖️ Weighted Scorer & Hybrid Decision Ladder - HoopsRouter-MCP
 *
 * Scores the normalized question against both signal families, then walks
 * the ladder: connector → ratio → auto-promote → winner-take-all.
 *
 * @module classifier/scorer
 * @see tests/pattern-registry.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { DecisionSource, HybridThresholds, PatternGroup, QueryType, SignalScore } from "../types.js";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_THRESHOLDS: Readonly<HybridThresholds> = Object.freeze({
  ratio_floor: 1.5,
  ratio_min: 0.4,
  auto_promote_statistical: 4.0,
  auto_promote_contextual: 2.0,
});

/**
 * Bridge phrase joining a data clause to an explanation clause.
 * Dashes are already folded into " - " by normalization.
 */
export const HYBRID_CONNECTOR = /\b(and\s+explain|and\s+why|and\s+what\s+makes|then\s+explain|but\s+why|and\s+how)\b|\s+-\s+(explain|why|how|what\s+makes)\b/;

// ============================================================================
// Scoring
// ============================================================================

/**
 * Sum the weights of the groups that fire. A group is tested once, so it
 * counts once however often it matches.
 */
export function scoreFamily(normalized: string, groups: readonly PatternGroup[]): SignalScore {
  let total = 0;
  const matched_groups: string[] = [];

  for (const group of groups) {
    if (group.matcher.test(normalized)) {
      total += group.weight;
      matched_groups.push(group.name);
    }
  }

  return { total, matched_groups };
}

export function hasHybridConnector(normalized: string): boolean {
  return HYBRID_CONNECTOR.test(normalized);
}

// ============================================================================
// Decision Ladder
// ============================================================================

export interface LadderDecision {
  query_type: QueryType;
  decided_by: DecisionSource;
  connector_found: boolean;
  /** min/max score ratio, present when both scores reached the ratio floor */
  ratio?: number;
}

export function decideRoute(
  normalized: string,
  statistical: number,
  contextual: number,
  thresholds: HybridThresholds = DEFAULT_THRESHOLDS
): LadderDecision {
  const connector_found = hasHybridConnector(normalized);

  if (connector_found && statistical > 0 && contextual > 0) {
    return { query_type: "hybrid", decided_by: "connector", connector_found };
  }

  let ratio: number | undefined;
  if (statistical >= thresholds.ratio_floor && contextual >= thresholds.ratio_floor) {
    ratio = Math.min(statistical, contextual) / Math.max(statistical, contextual);
    if (ratio >= thresholds.ratio_min) {
      return { query_type: "hybrid", decided_by: "ratio", connector_found, ratio };
    }
  }

  if (statistical >= thresholds.auto_promote_statistical && contextual >= thresholds.auto_promote_contextual) {
    return { query_type: "hybrid", decided_by: "auto_promote", connector_found, ratio };
  }

  if (statistical > contextual) {
    return { query_type: "statistical", decided_by: "winner_take_all", connector_found, ratio };
  }
  if (contextual > statistical) {
    return { query_type: "contextual", decided_by: "winner_take_all", connector_found, ratio };
  }

  return { query_type: "contextual", decided_by: "default_tie", connector_found, ratio };
}
