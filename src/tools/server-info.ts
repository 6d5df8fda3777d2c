/**
 * ℹ️ Server Info Tool - HoopsRouter-MCP
 *
 * Reports the active router configuration: thresholds, the compiled
 * pattern groups and the pre-filter order. Credentials are reported as
 * present or absent, never echoed.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { HybridThresholds, PatternGroup, PrefilterName, RouterConfig } from "../types.js";
import type { QueryClassifier } from "../classifier/classifier.js";
import { GLOSSARY_TERMS } from "../classifier/vocabulary.js";

export const SERVER_NAME = "hoops-router-mcp";
export const SERVER_VERSION = "1.0.0";

export interface ServerInfo {
  name: string;
  version: string;
  config_version: string;
  thresholds: HybridThresholds;
  pattern_groups: {
    statistical: Array<{ name: string; weight: number }>;
    contextual: Array<{ name: string; weight: number }>;
  };
  prefilter_order: PrefilterName[];
  glossary_terms: number;
  fallback: {
    base_url: string;
    model: string;
    api_key_configured: boolean;
  };
}

function describeGroups(groups: readonly PatternGroup[]): Array<{ name: string; weight: number }> {
  return groups.map(({ name, weight }) => ({ name, weight }));
}

export function getServerInfo(classifier: QueryClassifier, config: RouterConfig): ServerInfo {
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    config_version: config.version,
    thresholds: { ...classifier.thresholds },
    pattern_groups: {
      statistical: describeGroups(classifier.registry.statistical),
      contextual: describeGroups(classifier.registry.contextual),
    },
    prefilter_order: classifier.prefilters.map(prefilter => prefilter.name),
    glossary_terms: GLOSSARY_TERMS.length,
    fallback: {
      base_url: config.fallback.base_url,
      model: config.fallback.model,
      api_key_configured: Boolean(config.fallback.api_key),
    },
  };
}
