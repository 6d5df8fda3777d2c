/**
 * 📊 Classifier Evaluation Tool - HoopsRouter-MCP
 *
 * Scores the router against labelled questions and reports accuracy, the
 * distribution of predicted routes, a confusion matrix and every miss.
 *
 * @module tools/evaluate
 * @see tests/evaluate.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ClassificationResult, QueryType } from "../types.js";
import { QUERY_TYPES } from "../types.js";
import type { EvaluationCase } from "../schemas.js";

// ============================================================================
// Type Definitions
// ============================================================================

/** Anything that can route a question; QueryClassifier satisfies it */
export interface RoutingClassifier {
  classify(query: string): ClassificationResult;
}

export interface Misclassification {
  query: string;
  expected: QueryType;
  actual: QueryType;
}

export interface EvaluationReport {
  total_cases: number;
  correct: number;
  /** Percentage, one decimal place */
  accuracy: number;
  /** Count of predictions per route */
  routing_stats: Record<QueryType, number>;
  /** expected → predicted → count */
  confusion: Record<QueryType, Record<QueryType, number>>;
  misclassifications: Misclassification[];
}

// ============================================================================
// Evaluation
// ============================================================================

function emptyCounts(): Record<QueryType, number> {
  return { statistical: 0, contextual: 0, hybrid: 0 };
}

export function toPercent(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

/**
 * Run every case through the classifier and tally the outcome.
 */
export function evaluateClassifier(
  classifier: RoutingClassifier,
  cases: readonly EvaluationCase[]
): EvaluationReport {
  const routing_stats = emptyCounts();
  const confusion: Record<QueryType, Record<QueryType, number>> = {
    statistical: emptyCounts(),
    contextual: emptyCounts(),
    hybrid: emptyCounts(),
  };
  const misclassifications: Misclassification[] = [];
  let correct = 0;

  for (const { query, expected } of cases) {
    const actual = classifier.classify(query).query_type;
    routing_stats[actual]++;
    confusion[expected][actual]++;

    if (actual === expected) {
      correct++;
    } else {
      misclassifications.push({ query, expected, actual });
    }
  }

  return {
    total_cases: cases.length,
    correct,
    accuracy: toPercent(correct, cases.length),
    routing_stats,
    confusion,
    misclassifications,
  };
}

/**
 * One-line-per-route summary for humans, in QUERY_TYPES order.
 */
export function formatEvaluationSummary(report: EvaluationReport): string {
  const lines = [
    `Accuracy: ${report.accuracy}% (${report.correct}/${report.total_cases})`,
    ...QUERY_TYPES.map(type => `  ${type}: ${report.routing_stats[type]} predicted`),
  ];
  if (report.misclassifications.length > 0) {
    lines.push(`Misclassified: ${report.misclassifications.length}`);
  }
  return lines.join("\n");
}
