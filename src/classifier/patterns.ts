/**
 * 🧩 Pattern Group Table - HoopsRouter-MCP
 *
 * Named, weighted pattern groups for the two signal families. Each group is a
 * single compiled alternation, so a group contributes its weight at most once
 * however many of its branches match.
 *
 * The table is compiled once by `buildPatternRegistry`, frozen, and injected
 * into the classifier. A group that fails to compile aborts startup.
 *
 * @module classifier/patterns
 * @see tests/pattern-registry.test.ts
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { PatternGroup, PatternGroupDefinition, PatternRegistry, SignalFamily } from "../types.js";
import { createToolError } from "../utils.js";
import {
  STAT_ABBREVIATIONS,
  PERCENT_ABBREVIATIONS,
  ADVANCED_ABBREVIATIONS,
  STAT_WORDS,
  DICTIONARY_NAMES,
  ADVANCED_WORDS,
  TEAM_NAMES,
} from "./vocabulary.js";

// ============================================================================
// Statistical Evidence (13 groups)
// ============================================================================

/** Stat terms the slang group requires nearby before it fires */
const SLANG_STAT_TERMS = String.raw`stats?|points?|assists?|rebounds?|avg|pct|score|scorer|top\s+\d|record`;
const SLANG_MARKERS = String.raw`plz|pls|lol|yo|bruh|bro|fam`;

export const STATISTICAL_GROUP_DEFINITIONS: readonly PatternGroupDefinition[] = [
  {
    name: "S1_db_abbreviations",
    weight: 3.0,
    source: [
      String.raw`\b(${STAT_ABBREVIATIONS})\b`,
      String.raw`(?<!\w)(${PERCENT_ABBREVIATIONS})`,
      String.raw`\b(${ADVANCED_ABBREVIATIONS})\b`,
    ].join("|"),
  },
  {
    name: "S2_full_stat_words_and_db_descriptions",
    weight: 3.0,
    source: [
      String.raw`\b(${STAT_WORDS})\b`,
      String.raw`(${DICTIONARY_NAMES})`,
      String.raw`(${ADVANCED_WORDS})`,
    ].join("|"),
  },
  {
    name: "S3_superlatives_numbers",
    weight: 2.0,
    source: [
      String.raw`\b(top|bottom)\s+\d+`,
      String.raw`\b(most|fewest|highest|lowest|best|worst|leading|leader)\s+\d+`,
      String.raw`\b(who|which)\b.*\b(most|fewest|highest|lowest|best|worst)\b`,
    ].join("|"),
  },
  {
    name: "S4_aggregations",
    weight: 2.0,
    source: [
      String.raw`\b(average|mean|total|sum|count|how many|maximum|minimum|median)\b`,
      String.raw`\bwhat\s+(is|are)\b.*\b(percentage|average|total|rating|ratio)\b`,
      String.raw`\bwhat\s+percentage\b`,
      String.raw`\bper\s+game\b`,
    ].join("|"),
  },
  {
    name: "S5_numeric_comparisons",
    weight: 1.5,
    source: [
      String.raw`\b(better|worse|higher|lower|greater|fewer|more|less)\s+than\s+\d+`,
      String.raw`\b(over|under|above|below|exceeds?|at\s+least|at\s+most)\s+\d+`,
      String.raw`\bcompare\b`,
      String.raw`\b(who has more|who has fewer|who has less|which player has more|who recorded more)\b`,
      String.raw`\b(with|having)\b.*\d+\+?\s*(points|rebounds|assists|games|wins|steals|blocks)`,
      String.raw`\d+\+?\s*(points|rebounds|assists|steals|blocks|wins|games|percent)`,
    ].join("|"),
  },
  {
    name: "S6_player_team_stat_queries",
    weight: 1.5,
    source: [
      String.raw`\b(who\s+is|who.?s|which)\b.*\b(best|better|worst|worse)\b.*\b(scorer|rebounder|passer|defender|shooter|blocker|player)\b`,
      String.raw`\b(best|better|worst|worse)\b.*\b(at|in|for)\b.*\b(scoring|rebounding|assists|defense|shooting|blocking|stealing)\b`,
      String.raw`\b(who has|which player has)\b.*\b(best|worst|highest|lowest|top|better)\b.*\b(percentage|pct|efficiency|rating)\b`,
      String.raw`\b(show|list|find|get)\b.*\b(assist|rebound|point|steal|block|score|stat).*(leader|top|best|worst)\b`,
      String.raw`\b(show|list|find|get)\b.*\s(top|bottom|best|worst|leading|leader)`,
      String.raw`\b(show|list|find|get)\b.*\b(stats|statistics|averages?|numbers)\b`,
      String.raw`\b(who\s+is|who.?s)\b.*\b(leading|top|number one|#1|the\s+best|the\s+worst|the\s+mvp)\b`,
      String.raw`\b(tell me about|gimme|give me)\b.*\b(stats|statistics|numbers|leaders?|scoring|averages?)\b`,
      String.raw`\bleaders?\b`,
    ].join("|"),
  },
  {
    name: "S7_team_names",
    weight: 1.0,
    source: [
      String.raw`\b(list|show|find|get)\b.*\bplayers?\b`,
      String.raw`\bplays?\s+(for|on)\b`,
      String.raw`\b(${TEAM_NAMES})\b`,
    ].join("|"),
  },
  {
    name: "S8_stat_verbs_numbers",
    weight: 1.0,
    source: [
      String.raw`\b(scored|averaging|shooting|recording|ranked|ranking)\b.*\d+`,
      String.raw`\b(ranks|ranking|ranked)\b.*\b(by|in)\b`,
      String.raw`\b(scored|averaging|scoring|recording)\b`,
    ].join("|"),
  },
  {
    name: "S9_possessive_stats",
    weight: 1.5,
    source: [
      String.raw`\bwhat is\b.*'s?\s+(\d-point|three.point|free.throw|field.goal|scoring|shooting|rebound|assist|block|steal)`,
      String.raw`\b(his|her|their|its)\s+(assists?|rebounds?|points?|steals?|blocks?|stats?|scoring|shooting|games?|wins?|losses?|minutes?|turnovers?|fouls?|rating|efficiency|percentage)\b`,
      String.raw`\w+'s\s+(stats|points|rebounds|assists|steals|blocks|shooting|scoring|efficiency|averages?|numbers|percentage|pct|record)\b`,
    ].join("|"),
  },
  {
    name: "S10_3point_references",
    weight: 1.0,
    source: [
      String.raw`\bfrom\s+(3|three|downtown)\b`,
      String.raw`\b(shoots?|shooting)\b.*\b(better|worse|best|worst|from\s+\d|from\s+three)\b`,
      String.raw`\b3\s*-?\s*pt\b`,
    ].join("|"),
  },
  {
    name: "S11_filter_find",
    weight: 1.5,
    source: [
      String.raw`\b(find|which|who are)\b.*\b(players?|teams?)\b.*\b(with|having|that)\b`,
      String.raw`\b(who are|list|show me)\b.*\b(top|bottom|players with|scorers|leaders)\b`,
      String.raw`\bhow many\b`,
    ].join("|"),
  },
  {
    name: "S12_efficiency_roles",
    weight: 1.0,
    source: [
      String.raw`\b(efficient|effective|productive)\s+(goal\s*maker|scorer|shooter|rebounder|passer|blocker|playmaker|player)\b`,
      String.raw`\b(who\s+is|who.?s)\b.*\b(more|most|less|least)\b.*\b(efficient|effective|productive)\b`,
    ].join("|"),
  },
  {
    name: "S13_slang_stats",
    weight: 0.5,
    source: [
      String.raw`\b(whats?|wuts|wat)\b.*\b(avg|average|stats?|pct|record|points?|assists?|rebounds?)\b`,
      String.raw`\bda\s+(league|nba)\b`,
      String.raw`\b(${SLANG_MARKERS})\b.*\b(${SLANG_STAT_TERMS})\b`,
      String.raw`\b(${SLANG_STAT_TERMS})\b.*\b(${SLANG_MARKERS})\b`,
    ].join("|"),
  },
];

// ============================================================================
// Contextual Evidence (10 groups)
// ============================================================================

export const CONTEXTUAL_GROUP_DEFINITIONS: readonly PatternGroupDefinition[] = [
  {
    // "how many" / "how much" / "how does X compare" ask for numbers, not reasons
    name: "C1_why_how_questions",
    weight: 3.0,
    source: [
      String.raw`\b(why|explain|what makes|what caused)\b`,
      String.raw`\bhow\b(?!.*\b(many|much)\b)(?!.*\bcompare\b)`,
    ].join("|"),
  },
  {
    name: "C2_opinion_discussion",
    weight: 2.5,
    source: [
      String.raw`\b(think|believe|opinion|discussion|debate|argue)\b`,
      String.raw`\b(fans?|community|reddit|people)\b.*\b(think|say|discuss|about|love|hate|view|feel|consider|debate)\b`,
      String.raw`\b(according\s+to|what\s+do)\b.*\b(fans?|reddit|people|community)\b`,
      String.raw`\b(popular|discussed|controversial|trending)\s+(opinions?|topics?|debates?|discussions?)\b`,
    ].join("|"),
  },
  {
    name: "C3_subjective_qualifiers",
    weight: 2.0,
    source: String.raw`\b(underrated|overrated|surprising|disappointing|impressive|controversial|valuable|worth)\b`,
  },
  {
    name: "C4_strategy_style",
    weight: 2.0,
    source: String.raw`\b(strategy|style|approach|technique|tactics)\b`,
  },
  {
    name: "C5_historical_context",
    weight: 1.5,
    source: String.raw`\b(history|evolution|changed|transformation)\b`,
  },
  {
    // "better than 20" and "better shooter" are statistical, not judgement
    name: "C6_qualitative_assessments",
    weight: 2.0,
    source: [
      String.raw`\b(greatest|goat|best ever|all.time)\b(?!.*\bstats\b)`,
      String.raw`\b(better|worse)\b(?!.*\bstats\b)(?!.*\bthan\s+\d)(?!.*\bcompare\b)(?!.*\b(from\s+3|from\s+three|shooting|scorer|scoring|field\s+goal|free\s+throw)\b)`,
    ].join("|"),
  },
  {
    name: "C7_impact_influence",
    weight: 2.0,
    source: String.raw`\b(impact|influence|effect|significance)\b`,
  },
  {
    name: "C8_analysis_interpretation",
    weight: 1.5,
    source: String.raw`\b(analy[sz]e|analysis|interpret|understand|insight|correlation)\b`,
  },
  {
    name: "C9_opinion_verbs",
    weight: 1.0,
    source: String.raw`\b(view|feel|consider|regard|perceive|expected?|surprising?|chances?|hopes?)\b`,
  },
  {
    name: "C10_quoted_reference",
    weight: 1.0,
    source: String.raw`\b(quote|direct\s+quote|excerpt|what\s+did\s+\w+\s+say)\b`,
  },
];

// ============================================================================
// Registry Construction
// ============================================================================

/**
 * Compile one group definition. Every matcher is case-insensitive and
 * non-global, so `test()` carries no `lastIndex` state between calls.
 */
function compileGroup(definition: PatternGroupDefinition, family: SignalFamily): PatternGroup {
  if (!Number.isFinite(definition.weight) || definition.weight <= 0) {
    throw createToolError("CONFIG_INVALID", `Pattern group "${definition.name}" has invalid weight ${definition.weight}`, {
      details: { family, group: definition.name },
      suggestion: "Group weights must be positive numbers",
    });
  }

  let matcher: RegExp;
  try {
    matcher = new RegExp(definition.source, "i");
  } catch (error) {
    throw createToolError("CONFIG_INVALID", `Pattern group "${definition.name}" failed to compile`, {
      details: { family, group: definition.name, cause: error instanceof Error ? error.message : String(error) },
      suggestion: "Fix the group's regular expression source",
    });
  }

  return Object.freeze({ name: definition.name, weight: definition.weight, matcher });
}

function compileFamily(definitions: readonly PatternGroupDefinition[], family: SignalFamily): readonly PatternGroup[] {
  const seen = new Set<string>();
  const groups = definitions.map(definition => {
    if (seen.has(definition.name)) {
      throw createToolError("CONFIG_INVALID", `Duplicate pattern group name "${definition.name}"`, {
        details: { family },
      });
    }
    seen.add(definition.name);
    return compileGroup(definition, family);
  });
  return Object.freeze(groups);
}

/**
 * Build the process-wide pattern registry.
 *
 * @throws {ToolError} CONFIG_INVALID - a group does not compile, repeats a name or has a non-positive weight
 */
export function buildPatternRegistry(
  definitions: {
    statistical: readonly PatternGroupDefinition[];
    contextual: readonly PatternGroupDefinition[];
  } = { statistical: STATISTICAL_GROUP_DEFINITIONS, contextual: CONTEXTUAL_GROUP_DEFINITIONS }
): PatternRegistry {
  return Object.freeze({
    statistical: compileFamily(definitions.statistical, "statistical"),
    contextual: compileFamily(definitions.contextual, "contextual"),
  });
}
