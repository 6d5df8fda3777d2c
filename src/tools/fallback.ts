/**
 * 🤖 Fallback Classifier - HoopsRouter-MCP
 *
 * A generative-model classifier the orchestrator may call instead of the
 * pattern router. It speaks the route-label enumeration (sql_only,
 * vector_only, hybrid) and answers sql_only whenever anything goes wrong:
 * no API key, a transport error, a non-2xx status, a timeout or a reply
 * that is not exactly one label.
 *
 * @module tools/fallback
 * @see tests/fallback.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { QueryType, RouterConfig } from "../types.js";
import { EventLogger, hashQuery } from "../utils.js";

// ============================================================================
// Route Labels
// ============================================================================

export type RouteLabel = "sql_only" | "vector_only" | "hybrid";

export const ROUTE_LABELS: readonly RouteLabel[] = ["sql_only", "vector_only", "hybrid"];

export const DEFAULT_ROUTE_LABEL: RouteLabel = "sql_only";

const LABEL_BY_TYPE: Readonly<Record<QueryType, RouteLabel>> = {
  statistical: "sql_only",
  contextual: "vector_only",
  hybrid: "hybrid",
};

const TYPE_BY_LABEL: Readonly<Record<RouteLabel, QueryType>> = {
  sql_only: "statistical",
  vector_only: "contextual",
  hybrid: "hybrid",
};

export function toRouteLabel(type: QueryType): RouteLabel {
  return LABEL_BY_TYPE[type];
}

export function fromRouteLabel(label: RouteLabel): QueryType {
  return TYPE_BY_LABEL[label];
}

function isRouteLabel(value: string): value is RouteLabel {
  return ROUTE_LABELS.some(label => label === value);
}

/**
 * Parse a model reply into a label. Surrounding whitespace, case and
 * backticks or quotes are tolerated; anything else is rejected.
 */
export function parseRouteVerdict(reply: string): RouteLabel | undefined {
  const verdict = reply.trim().toLowerCase().replace(/^[`'"]+|[`'".]+$/g, "");
  return isRouteLabel(verdict) ? verdict : undefined;
}

// ============================================================================
// Fallback Classifier
// ============================================================================

export interface FallbackClassifier {
  classify(query: string): Promise<RouteLabel>;
}

export const FALLBACK_SYSTEM_PROMPT = `You route basketball questions. Answer with exactly one label:

sql_only: the answer is numbers from a stats table (stats, rankings, totals, numeric comparisons).
  e.g. "Top 5 scorers", "Compare Jokic and Embiid rebounds"

vector_only: the answer comes from discussion and analysis (opinions, explanations, playing style).
  e.g. "Why is LeBron the GOAT?", "What do fans think about the trade?"

hybrid: the answer needs both (biographies, stats together with an explanation).
  e.g. "Who is Nikola Jokic?", "What makes Giannis so valuable?"

Reply with the label only: sql_only, vector_only or hybrid.`;

export function buildUserPrompt(query: string): string {
  return `Classify this basketball question:\n\n${query}\n\nLabel:`;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })).min(1),
});

export type FallbackSettings = RouterConfig["fallback"];

/**
 * Fallback backed by an OpenAI-compatible /chat/completions endpoint.
 */
export class LlmFallbackClassifier implements FallbackClassifier {
  private settings: FallbackSettings;
  private logger: EventLogger;

  constructor(settings: FallbackSettings, logger: EventLogger = new EventLogger()) {
    this.settings = settings;
    this.logger = logger;
  }

  async classify(query: string): Promise<RouteLabel> {
    const query_hash = hashQuery(query);

    if (!this.settings.api_key) {
      this.logger.warn("fallback", "llm_fallback", "No API key configured; using default route", { query_hash });
      return DEFAULT_ROUTE_LABEL;
    }

    try {
      const reply = await this.complete(this.settings.api_key, query);
      const label = parseRouteVerdict(reply);
      if (!label) {
        this.logger.warn("fallback", "llm_fallback", "Invalid verdict from model; using default route", {
          query_hash,
          reply: reply.slice(0, 40),
        });
        return DEFAULT_ROUTE_LABEL;
      }
      this.logger.debug("fallback", "llm_fallback", `Model routed to ${label}`, { query_hash });
      return label;
    } catch (error) {
      this.logger.warn("fallback", "llm_fallback", "Fallback request failed; using default route", {
        query_hash,
        error: error instanceof Error ? error.message : String(error),
      });
      return DEFAULT_ROUTE_LABEL;
    }
  }

  private async complete(apiKey: string, query: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.timeout_ms);

    try {
      const response = await fetch(`${this.settings.base_url.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.settings.model,
          temperature: 0,
          messages: [
            { role: "system", content: FALLBACK_SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(query) },
          ],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Completion API error ${response.status}: ${errorText.slice(0, 200)}`);
      }

      const body: unknown = await response.json();
      const parsed = ChatCompletionResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error("Completion API returned an unexpected body");
      }
      return parsed.data.choices[0]?.message.content ?? "";
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
