/**
 * Biographical query detection.
 *
 * "Who is LeBron?" needs the stats row and the narrative around it, so a
 * positive result routes to hybrid. Questions about discussions or topics
 * ("what do fans say about...") are never biographical, even when a name
 * appears in them.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { QueryText } from "./query-text.js";
import { COMMON_PROPER_NAMES, BIOGRAPHICAL_TEAMS } from "./vocabulary.js";

const TOPIC_EXCLUSIONS: readonly RegExp[] = [
  /\b(most\s+)?(discussed|popular|controversial|trending)\s+(topic|debate|discussion|issue|question|opinion|view)/,
  /\b(topic|debate|discussion|opinions?|views?|perspectives?)\s+(about|on|regarding)\b/,
  /\b(what\s+do|do)\s+(fans?|people|reddit|community)\b/,
  /\b(authoritative|expert|verified|official)\s+(voices?|perspectives?|views?|opinions?)\b/,
  /\b(consensus|popular|common)\s+(views?|opinions?|perspectives?)\b/,
];

/** Lead-in followed anywhere later by a known player or team */
const KNOWN_SUBJECT = new RegExp(
  String.raw`\b(who is|who'?s|who are|tell me about|gimme the scoop on|info on)\b.*\b(${COMMON_PROPER_NAMES}|${BIOGRAPHICAL_TEAMS})(?!\w)`
);

const BACKGROUND_OF_PERSON = /\b(background|history|biography|bio|career|rise of|story of)\b.*\b(player|athlete|team)\b/;

/** Lead-in whose next token is checked for a capital letter in the original text */
const NAME_LEAD_IN = /\b(?:who is|who'?s|tell me about)\s+(\S+)/gi;

const CAPITALISED_NAME = /^[A-Z]\w+/;

/** Title-cased words that follow "Who is" without naming anyone */
const NOT_A_NAME = new Set([
  "the", "their", "a", "an", "more", "most", "less", "least", "your", "my", "our", "this", "that",
  "leading", "playing", "scoring", "shooting", "winning", "averaging", "starting", "going", "coming",
  "currently", "still", "really", "better", "best", "worst", "top", "number", "considered", "known",
  "called", "ranked",
]);

function isTopicDiscussion(normalized: string): boolean {
  return TOPIC_EXCLUSIONS.some(pattern => pattern.test(normalized));
}

function hasCapitalisedName(original: string): boolean {
  for (const match of original.matchAll(NAME_LEAD_IN)) {
    const token = match[1] ?? "";
    if (CAPITALISED_NAME.test(token) && !NOT_A_NAME.has(token.toLowerCase())) {
      return true;
    }
  }
  return false;
}

/**
 * Detect a question about a specific player or team.
 *
 * Positive on a known name after "who is / tell me about / info on", a
 * capitalised name directly after "who is / tell me about" ("Who is DeRozan"),
 * or "background / career / story of" paired with player, athlete or team.
 * The topic-discussion exclusions always win.
 */
export function isBiographical(text: QueryText): boolean {
  if (isTopicDiscussion(text.normalized)) {
    return false;
  }

  return (
    KNOWN_SUBJECT.test(text.normalized) ||
    hasCapitalisedName(text.original) ||
    BACKGROUND_OF_PERSON.test(text.normalized)
  );
}
