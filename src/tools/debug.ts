/**
 * 🔍 Classification Debugging Tool
 *
 * Shows why a question was routed the way it was: the deciding stage, the
 * per-family scores with their matched groups, and plain-language
 * diagnostics for near misses.
 *
 * Features:
 * - Decision trace (pre-filter, ladder tier or winner-take-all)
 * - Matched pattern groups per signal family
 * - Diagnostics for skipped hybrid tiers and default ties
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ClassificationTrace, HybridThresholds } from "../types.js";
import type { ExplainClassificationInput } from "../schemas.js";
import type { QueryClassifier } from "../classifier/classifier.js";
import { createToolError } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

export interface ExplainClassificationResult extends ClassificationTrace {
  /** Human-readable notes on how the verdict was reached */
  diagnostics: string[];
}

// ============================================================================
// Diagnostics
// ============================================================================

function formatScore(score: number): string {
  return score.toFixed(1);
}

/**
 * Generate diagnostic notes from a trace
 */
export function diagnoseTrace(trace: ClassificationTrace, thresholds: HybridThresholds): string[] {
  const notes: string[] = [];

  if (!trace.scores) {
    notes.push(`Decided by the ${trace.decided_by} pre-filter; weighted scoring did not run`);
    return notes;
  }

  const stat = trace.scores.statistical.total;
  const ctx = trace.scores.contextual.total;

  if (trace.connector_found && trace.decided_by !== "connector") {
    notes.push("Connector phrase found but only one signal family scored, so the connector tier was skipped");
  }

  if (trace.ratio !== undefined && trace.decided_by !== "ratio") {
    notes.push(`Score ratio ${trace.ratio.toFixed(2)} is below ${thresholds.ratio_min}; one family dominates`);
  }

  switch (trace.decided_by) {
    case "connector":
    case "ratio":
    case "auto_promote":
      notes.push(`Hybrid via the ${trace.decided_by} tier (statistical ${formatScore(stat)}, contextual ${formatScore(ctx)})`);
      break;
    case "winner_take_all":
      notes.push(
        `${trace.result.query_type} won ${formatScore(Math.max(stat, ctx))} to ${formatScore(Math.min(stat, ctx))}`
      );
      break;
    case "default_tie":
      notes.push(
        stat === 0
          ? "No pattern group fired; routed to contextual by default"
          : `Scores tied at ${formatScore(stat)}; ties route to contextual`
      );
      break;
    default:
      break;
  }

  return notes;
}

// ============================================================================
// Main Debug Function
// ============================================================================

/**
 * Explain one classification.
 *
 * @throws {ToolError} INVALID_INPUT when the query is whitespace only
 */
export function explainClassification(
  classifier: QueryClassifier,
  input: ExplainClassificationInput
): ExplainClassificationResult {
  if (input.query.trim().length === 0) {
    throw createToolError("INVALID_INPUT", "Query cannot be empty or whitespace-only", {
      suggestion: "Provide a non-empty query string",
    });
  }

  const trace = classifier.explain(input.query);
  return {
    ...trace,
    diagnostics: diagnoseTrace(trace, classifier.thresholds),
  };
}
