/**
 * HoopsRouter-MCP: Zod Schemas for Configuration and Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const QuerySchema = z.string().min(1, "Query cannot be empty")
  .describe("🏀 The basketball question to route");

export const QueryTypeSchema = z.enum(["statistical", "contextual", "hybrid"])
  .describe("Retrieval route: statistical, contextual or hybrid");

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

// ============================================================================
// Router Configuration
// ============================================================================

export const HybridThresholdsSchema = z.object({
  ratio_floor: z.number().positive().default(1.5)
    .describe("Both family scores must reach this for the ratio tier"),
  ratio_min: z.number().positive().max(1).default(0.4)
    .describe("min/max score ratio that counts as balanced"),
  auto_promote_statistical: z.number().positive().default(4.0),
  auto_promote_contextual: z.number().positive().default(2.0),
}).strict();

export const RouterConfigSchema = z.object({
  version: z.string().default("1.0.0"),
  thresholds: HybridThresholdsSchema.default({}),
  logging: z.object({
    level: LogLevelSchema.default("info"),
  }).strict().default({}),
  fallback: z.object({
    base_url: z.string().url().default("https://api.openai.com/v1")
      .describe("OpenAI-compatible API root; /chat/completions is appended"),
    model: z.string().min(1).default("gpt-4o-mini"),
    api_key: z.string().min(1).optional(),
    timeout_ms: z.number().int().min(100).max(60000).default(10000),
  }).strict().default({}),
}).strict();

// ============================================================================
// Tool Input Schemas
// ============================================================================

export const ClassifyQueryInputSchema = z.object({
  query: QuerySchema,
  options: z.object({
    include_plan: z.boolean().default(true)
      .describe("🧭 Include the retrieval plan derived from the classification"),
  }).optional()
    .describe("⚙️ Output options"),
}).strict();

export const ExplainClassificationInputSchema = z.object({
  query: QuerySchema,
}).strict();

export const EvaluationCaseSchema = z.object({
  query: QuerySchema,
  expected: QueryTypeSchema.describe("Route the question should take"),
}).strict();

export const EvaluateClassifierInputSchema = z.object({
  cases: z.array(EvaluationCaseSchema).min(1).max(500)
    .describe("📋 Labelled questions to score the classifier against"),
}).strict();

export const FallbackClassifyInputSchema = z.object({
  query: QuerySchema,
}).strict();

export const ServerInfoInputSchema = z.object({}).strict();

// ============================================================================
// Type Exports
// ============================================================================

export type ClassifyQueryInput = z.infer<typeof ClassifyQueryInputSchema>;
export type ExplainClassificationInput = z.infer<typeof ExplainClassificationInputSchema>;
export type EvaluationCase = z.infer<typeof EvaluationCaseSchema>;
export type EvaluateClassifierInput = z.infer<typeof EvaluateClassifierInputSchema>;
export type FallbackClassifyInput = z.infer<typeof FallbackClassifyInputSchema>;
