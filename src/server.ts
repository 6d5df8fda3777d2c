/**
 * HoopsRouter-MCP: Tool Registration
 *
 * Builds the MCP server and registers every tool against the shared
 * classifier, configuration and fallback. Handlers stay thin: they call the
 * tool function and format its output as JSON text.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RouterConfig } from "./types.js";
import {
  type EvaluateClassifierInput,
  type FallbackClassifyInput,
  ClassifyQueryInputSchema,
  EvaluateClassifierInputSchema,
  ExplainClassificationInputSchema,
  FallbackClassifyInputSchema,
  ServerInfoInputSchema,
} from "./schemas.js";
import { EventLogger, createToolError, formatErrorResponse, isToolError } from "./utils.js";
import type { QueryClassifier } from "./classifier/classifier.js";
import { classifyQuery } from "./tools/classify.js";
import { explainClassification } from "./tools/debug.js";
import { evaluateClassifier, formatEvaluationSummary } from "./tools/evaluate.js";
import type { FallbackClassifier } from "./tools/fallback.js";
import { SERVER_NAME, SERVER_VERSION, getServerInfo } from "./tools/server-info.js";

export interface RouterServerDeps {
  classifier: QueryClassifier;
  config: RouterConfig;
  fallback: FallbackClassifier;
  logger: EventLogger;
}

function jsonResponse(result: unknown): { content: Array<{ type: "text"; text: string }> } {
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Run a tool body and turn any thrown error into an MCP error response.
 * ToolErrors pass through as-is; anything else is logged and wrapped.
 */
async function runTool(
  logger: EventLogger,
  tool: string,
  body: () => unknown
): Promise<{ content: Array<{ type: "text"; text: string }>; isError?: true }> {
  try {
    return jsonResponse(await body());
  } catch (error) {
    if (isToolError(error)) {
      logger.warn("tool", tool, error.message, { code: error.code });
      return formatErrorResponse(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error("tool", tool, "Unexpected tool failure", { error: message });
    return formatErrorResponse(createToolError("CLASSIFY_FAILED", `${tool} failed: ${message}`, {
      recoverable: true,
    }));
  }
}

export function createRouterServer(deps: RouterServerDeps): McpServer {
  const { classifier, config, fallback, logger } = deps;

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // ============================================================================
  // ROUTING TOOLS
  // ============================================================================

  server.tool(
    "hoopsrouter_classify_query",
    `🏀 Route a basketball question to statistical, contextual or hybrid retrieval.

WHAT THIS RETURNS:
- classification: query_type, is_biographical, complexity_depth, style_category, max_expansions
- retrieval_plan: tools to call, search top_k, paraphrase count, answer shape

Pure greetings ("hi", "thanks") come back with greeting: true and no classification.

USE WHEN: Deciding which retrieval tools to call for a user question`,
    ClassifyQueryInputSchema.shape,
    async (args) => runTool(logger, "hoopsrouter_classify_query", () => classifyQuery(classifier, args))
  );

  server.tool(
    "hoopsrouter_explain_classification",
    `🔍 Explain how a question was routed.

Returns the deciding stage (pre-filter, ladder tier or winner-take-all), the
statistical and contextual scores with their matched pattern groups, and
diagnostics for near misses.

USE WHEN: A question was routed somewhere unexpected`,
    ExplainClassificationInputSchema.shape,
    async (args) => runTool(logger, "hoopsrouter_explain_classification", () => explainClassification(classifier, args))
  );

  server.tool(
    "hoopsrouter_evaluate_classifier",
    `📊 Score the router against labelled questions.

RETURNS: { total_cases, correct, accuracy (percent), routing_stats, confusion, misclassifications[], summary }`,
    EvaluateClassifierInputSchema.shape,
    async (args: EvaluateClassifierInput) => runTool(logger, "hoopsrouter_evaluate_classifier", () => {
      const report = evaluateClassifier(classifier, args.cases);
      return { ...report, summary: formatEvaluationSummary(report) };
    })
  );

  server.tool(
    "hoopsrouter_fallback_classify",
    `🤖 Ask the configured language model to route a question.

Returns sql_only, vector_only or hybrid. Falls back to sql_only when no API
key is configured or the model call fails.`,
    FallbackClassifyInputSchema.shape,
    async (args: FallbackClassifyInput) => runTool(logger, "hoopsrouter_fallback_classify", async () => ({
      query: args.query,
      route: await fallback.classify(args.query),
    }))
  );

  // ============================================================================
  // SERVER INFO
  // ============================================================================

  server.tool(
    "hoopsrouter_get_server_info",
    `ℹ️ Get the active router configuration: version, hybrid thresholds, pattern
groups with their weights, pre-filter order and fallback model.`,
    ServerInfoInputSchema.shape,
    async () => runTool(logger, "hoopsrouter_get_server_info", () => getServerInfo(classifier, config))
  );

  return server;
}
