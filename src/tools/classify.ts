/**
 * 🔍 Query Classification Tool - HoopsRouter-MCP
 *
 * Routes a basketball question and turns the verdict into a retrieval plan
 * for the orchestrator. Pure greetings are answered here and never reach
 * the classifier.
 *
 * Features:
 * - Route detection (statistical, contextual, hybrid)
 * - Biographical flag and narrative answer shape
 * - Retrieval hints (tools to call, search top_k, expansion count)
 *
 * @module tools/classify
 * @see tests/classify-tool.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ClassificationResult, QueryType } from "../types.js";
import type { ClassifyQueryInput } from "../schemas.js";
import type { QueryClassifier } from "../classifier/classifier.js";
import { isPureGreeting } from "../classifier/greeting.js";
import { createToolError } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Downstream retrieval tools
 * - structured_lookup: query against the stats database
 * - contextual_search: top_k search over discussions and articles
 */
export type RetrievalTool = "structured_lookup" | "contextual_search";

/**
 * How the synthesis step should shape the answer
 * - narrative_with_facts: biography with the numbers woven in
 * - direct: answer the question as asked
 */
export type AnswerShape = "narrative_with_facts" | "direct";

export interface RetrievalPlan {
  route: QueryType;
  tools: RetrievalTool[];
  /** Results to request from contextual_search */
  search_top_k: number;
  /** Paraphrases to generate before retrieval */
  max_expansions: number;
  answer_shape: AnswerShape;
}

export interface ClassifyQueryResult {
  /** The original query text */
  query: string;
  /** True when the query is a standalone greeting and was not classified */
  greeting: boolean;
  classification?: ClassificationResult;
  retrieval_plan?: RetrievalPlan;
}

// ============================================================================
// Retrieval Plan
// ============================================================================

const ROUTE_TOOLS: Readonly<Record<QueryType, readonly RetrievalTool[]>> = {
  statistical: ["structured_lookup"],
  contextual: ["contextual_search"],
  hybrid: ["structured_lookup", "contextual_search"],
};

/**
 * Translate a classification into the calls the orchestrator makes.
 *
 * @example
 * ```typescript
 * buildRetrievalPlan(classifier.classify("Who is LeBron James?"));
 * // { route: "hybrid", tools: ["structured_lookup", "contextual_search"],
 * //   search_top_k: 3, max_expansions: 5, answer_shape: "narrative_with_facts" }
 * ```
 */
export function buildRetrievalPlan(result: ClassificationResult): RetrievalPlan {
  return {
    route: result.query_type,
    tools: [...ROUTE_TOOLS[result.query_type]],
    search_top_k: result.complexity_depth,
    max_expansions: result.max_expansions,
    answer_shape: result.is_biographical ? "narrative_with_facts" : "direct",
  };
}

// ============================================================================
// Main Classification Function
// ============================================================================

/**
 * Classify a question for retrieval routing.
 *
 * @throws {ToolError} INVALID_INPUT when the query is whitespace only
 */
export function classifyQuery(classifier: QueryClassifier, input: ClassifyQueryInput): ClassifyQueryResult {
  const { query, options } = input;

  if (query.trim().length === 0) {
    throw createToolError("INVALID_INPUT", "Query cannot be empty or whitespace-only", {
      suggestion: "Provide a non-empty query string",
      recoverable: false,
    });
  }

  if (isPureGreeting(query)) {
    return { query, greeting: true };
  }

  const classification = classifier.classify(query);
  const includePlan = options?.include_plan ?? true;

  return {
    query,
    greeting: false,
    classification,
    retrieval_plan: includePlan ? buildRetrievalPlan(classification) : undefined,
  };
}
