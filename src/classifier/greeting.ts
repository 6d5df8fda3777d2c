/**
 * Pure-greeting filter, run before the classifier.
 *
 * Only a standalone greeting passes. Anything that could carry a question
 * ("hi, who are the top 5 scorers?", "thanks for the stats") is left for
 * the classifier.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { splitWords } from "../utils.js";

const ALLOWED_QUESTION = /^(how\s+(are|r)\s+you|what's\s+up)\??$/;
const SPORTS_KEYWORDS = /\b(player|team|stat|score|point|rebound|assist|game|nba|basketball|lakers|lebron|curry|jordan)\b/;
const ACTION_REQUESTS = /\b(can\s+you|could\s+you|please|show\s+me|tell\s+me|give\s+me|find|search|look\s+up|help\s+me\s+with)\b/;
const MAX_GREETING_WORDS = 6;

const PURE_GREETINGS: readonly RegExp[] = [
  /^(hi|hello|hey|howdy|greetings|sup|yo|thanks?|thank you|goodbye|bye|see you|farewell|welcome)!?$/,
  /^(hi|hello|hey)\s+(there|everyone|all|guys|friends?|folks)!?$/,
  /^(how\s+(are|r)\s+you|how's\s+it\s+going|what's\s+up|wassup|watsup)\??$/,
  /^(good\s+(morning|afternoon|evening|night)|good\s+day)!?$/,
];

export function isPureGreeting(query: string): boolean {
  const q = query.trim().toLowerCase();

  if (q.includes(",")) return false;
  if (q.includes("?") && !ALLOWED_QUESTION.test(q)) return false;
  if (SPORTS_KEYWORDS.test(q)) return false;
  if (ACTION_REQUESTS.test(q)) return false;
  if (/\d/.test(q)) return false;
  if (splitWords(q).length > MAX_GREETING_WORDS) return false;

  return PURE_GREETINGS.some(pattern => pattern.test(q));
}
