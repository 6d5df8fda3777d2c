#!/usr/bin/env node
/**
 * HoopsRouter-MCP: Main Server Entry Point
 *
 * Routes basketball questions to statistical, contextual or hybrid
 * retrieval over MCP stdio.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 *
 * This source code is the property of vario.automation and is protected
 * by trade secret and copyright law. Unauthorized copying, modification,
 * distribution, or use of this software is strictly prohibited.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadRouterConfig } from "./config.js";
import { buildPatternRegistry } from "./classifier/patterns.js";
import { QueryClassifier } from "./classifier/classifier.js";
import { LlmFallbackClassifier } from "./tools/fallback.js";
import { createRouterServer } from "./server.js";
import { EventLogger, formatErrorResponse, isToolError } from "./utils.js";
import { SERVER_VERSION } from "./tools/server-info.js";

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function main() {
  // Config and pattern table are validated here; a bad group or value aborts startup
  const config = await loadRouterConfig();
  const logger = new EventLogger(config.logging.level);
  const registry = buildPatternRegistry();

  const classifier = new QueryClassifier({
    registry,
    thresholds: config.thresholds,
    logger,
  });
  const fallback = new LlmFallbackClassifier(config.fallback, logger);

  const server = createRouterServer({ classifier, config, fallback, logger });

  // Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("startup", "server", "HoopsRouter-MCP server started", {
    version: SERVER_VERSION,
    statistical_groups: registry.statistical.length,
    contextual_groups: registry.contextual.length,
    log_level: config.logging.level,
  });
}

main().catch((error: unknown) => {
  if (isToolError(error)) {
    console.error(formatErrorResponse(error).content[0]?.text);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
