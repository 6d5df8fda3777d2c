/**
 * 🏀 Query Classifier - HoopsRouter-MCP
 *
 * Routes a basketball question to statistical, contextual or hybrid
 * retrieval and attaches the tuning metadata retrieval consumes.
 *
 * Pipeline:
 *   normalize → metadata estimators → pre-filter chain (may decide)
 *   → weighted scorer → decision ladder → frozen result → log line
 *
 * `classify` is total: every string, empty or adversarial, gets a result.
 *
 * @module classifier/classifier
 * @see tests/query-classifier.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type {
  ClassificationResult,
  ClassificationTrace,
  HybridThresholds,
  PatternRegistry,
  QueryType,
} from "../types.js";
import { EventLogger, generateRequestId, hashQuery } from "../utils.js";
import { buildPatternRegistry } from "./patterns.js";
import { PREFILTER_CHAIN, runPrefilters, type Prefilter } from "./prefilters.js";
import { isBiographical } from "./biographical.js";
import { classifyStyle, estimateComplexityDepth, estimateMaxExpansions } from "./estimators.js";
import { DEFAULT_THRESHOLDS, decideRoute, scoreFamily } from "./scorer.js";
import { toQueryText, type QueryText } from "./query-text.js";

export interface QueryClassifierOptions {
  registry?: PatternRegistry;
  thresholds?: HybridThresholds;
  prefilters?: readonly Prefilter[];
  logger?: EventLogger;
}

type Metadata = Omit<ClassificationResult, "query_type">;

export class QueryClassifier {
  readonly registry: PatternRegistry;
  readonly thresholds: Readonly<HybridThresholds>;
  readonly prefilters: readonly Prefilter[];
  private readonly logger: EventLogger;

  constructor(options: QueryClassifierOptions = {}) {
    this.registry = options.registry ?? buildPatternRegistry();
    this.thresholds = Object.freeze({ ...(options.thresholds ?? DEFAULT_THRESHOLDS) });
    this.prefilters = options.prefilters ?? PREFILTER_CHAIN;
    this.logger = options.logger ?? new EventLogger("info");
  }

  /**
   * Classify a question. Never throws.
   */
  classify(query: string): ClassificationResult {
    return this.explain(query).result;
  }

  /**
   * Classify and report which stage decided, with the evidence it used.
   * `result` is the same value `classify` returns.
   */
  explain(query: string): ClassificationTrace {
    const text = toQueryText(query);
    const metadata = this.estimateMetadata(text);

    const prefilter = runPrefilters({ text, is_biographical: metadata.is_biographical }, this.prefilters);
    if (prefilter) {
      const trace: ClassificationTrace = {
        query,
        normalized_query: text.normalized,
        decided_by: prefilter.name,
        result: this.assemble(prefilter.verdict, metadata),
      };
      this.logVerdict(trace);
      return trace;
    }

    const statistical = scoreFamily(text.normalized, this.registry.statistical);
    const contextual = scoreFamily(text.normalized, this.registry.contextual);
    const decision = decideRoute(text.normalized, statistical.total, contextual.total, this.thresholds);

    const trace: ClassificationTrace = {
      query,
      normalized_query: text.normalized,
      decided_by: decision.decided_by,
      scores: { statistical, contextual },
      connector_found: decision.connector_found,
      result: this.assemble(decision.query_type, metadata),
    };
    if (decision.ratio !== undefined) {
      trace.ratio = decision.ratio;
    }

    this.logVerdict(trace);
    return trace;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private estimateMetadata(text: QueryText): Metadata {
    const style_category = classifyStyle(text);
    return {
      is_biographical: isBiographical(text),
      complexity_depth: estimateComplexityDepth(text),
      style_category,
      max_expansions: estimateMaxExpansions(text, style_category),
    };
  }

  private assemble(query_type: QueryType, metadata: Metadata): ClassificationResult {
    return Object.freeze({ query_type, ...metadata });
  }

  private logVerdict(trace: ClassificationTrace): void {
    // raw query text stays out of the log; the hash correlates repeats
    this.logger.info("classify", "query_classifier", `Routed to ${trace.result.query_type}`, {
      request_id: generateRequestId(),
      query_hash: hashQuery(trace.normalized_query),
      decided_by: trace.decided_by,
      statistical: trace.scores?.statistical,
      contextual: trace.scores?.contextual,
      ratio: trace.ratio,
    });
  }
}
