/**
 * HoopsRouter-MCP: Configuration Loading
 *
 * Precedence: built-in defaults < JSON file named by HOOPS_ROUTER_CONFIG <
 * environment overrides. The merged result is validated once by
 * RouterConfigSchema; anything invalid aborts startup with CONFIG_INVALID.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs/promises";
import type { ZodIssue } from "zod";
import type { RouterConfig } from "./types.js";
import { RouterConfigSchema } from "./schemas.js";
import { createToolError } from "./utils.js";

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_ROUTER_CONFIG: RouterConfig = RouterConfigSchema.parse({});

// ============================================================================
// Loading
// ============================================================================

function describeIssues(issues: ZodIssue[]): Array<{ path: string; message: string }> {
  return issues.map(issue => ({ path: issue.path.join("."), message: issue.message }));
}

function validateConfig(value: unknown, source: string): RouterConfig {
  const parsed = RouterConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw createToolError("CONFIG_INVALID", `Invalid router configuration from ${source}`, {
      details: describeIssues(parsed.error.issues),
      suggestion: "Check the configuration keys and value ranges",
    });
  }
  return parsed.data;
}

async function readConfigFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw createToolError("CONFIG_INVALID", `Cannot read configuration file ${filePath}`, {
      details: { cause: error instanceof Error ? error.message : String(error) },
      suggestion: "Point HOOPS_ROUTER_CONFIG at a readable JSON file or unset it",
    });
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw createToolError("CONFIG_INVALID", `Configuration file ${filePath} is not valid JSON`, {
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}

/**
 * Load the router configuration for this process.
 *
 * Environment overrides:
 * - HOOPS_ROUTER_CONFIG     path to a JSON file with any subset of the config
 * - HOOPS_ROUTER_LOG_LEVEL  debug | info | warn | error
 * - OPENAI_API_KEY          fallback classifier credentials
 * - OPENAI_BASE_URL         OpenAI-compatible API root
 * - OPENAI_MODEL            fallback classifier model
 *
 * @throws {ToolError} CONFIG_INVALID
 */
export async function loadRouterConfig(env: NodeJS.ProcessEnv = process.env): Promise<RouterConfig> {
  const configPath = env.HOOPS_ROUTER_CONFIG;
  const fromFile = configPath
    ? validateConfig(await readConfigFile(configPath), configPath)
    : DEFAULT_ROUTER_CONFIG;

  const withEnv = {
    ...fromFile,
    logging: {
      ...fromFile.logging,
      ...(env.HOOPS_ROUTER_LOG_LEVEL ? { level: env.HOOPS_ROUTER_LOG_LEVEL } : {}),
    },
    fallback: {
      ...fromFile.fallback,
      ...(env.OPENAI_API_KEY ? { api_key: env.OPENAI_API_KEY } : {}),
      ...(env.OPENAI_BASE_URL ? { base_url: env.OPENAI_BASE_URL } : {}),
      ...(env.OPENAI_MODEL ? { model: env.OPENAI_MODEL } : {}),
    },
  };

  return validateConfig(withEnv, "environment");
}
