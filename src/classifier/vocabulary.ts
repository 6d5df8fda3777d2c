/**
 * Basketball vocabulary shared by the pattern table, the pre-filters and
 * the biographical detector. Values are regex alternation fragments unless
 * noted otherwise; all are matched against lower-cased text.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// Stats Database Column Vocabulary
// ============================================================================

/** Column abbreviations of the player stats table (word-bounded) */
export const STAT_ABBREVIATIONS = String.raw`pts|reb|ast|stl|blk|tov|pf|gp|fgm|fga|ftm|fta|3pm|3pa|oreb|dreb|fp|dd2|td3|pie|pace|poss|ppg|rpg|apg|spg|bpg|mpg|avg|pct`;

/** Percentage columns; "%" is not a word character so these take no trailing \b */
export const PERCENT_ABBREVIATIONS = String.raw`fg%|ft%|3p%|efg%|ts%|usg%|oreb%|dreb%|reb%|ast%`;

export const ADVANCED_ABBREVIATIONS = String.raw`offrtg|defrtg|netrtg|ast/to|to\s*ratio|ast\s*ratio`;

/** Natural-language equivalents of the column headers */
export const STAT_WORDS = [
  String.raw`points|rebounds|assists|steals|blocks|turnovers|fouls`,
  String.raw`wins|losses|games\s*played|minutes`,
  String.raw`free\s*throws?|field\s*goals?|three.pointers?`,
  String.raw`double.doubles?|triple.doubles?`,
  String.raw`possessions?|personal\s+fouls?`,
  String.raw`stats|statistics|averages?|numbers`,
  String.raw`attempts?|makes?|percentage|pct|efficiency`,
  String.raw`record|season|roster`,
  String.raw`mvp|all.star|all.nba|rookie|veteran|starter|bench`,
  String.raw`scorer|rebounder|passer|shooter|blocker|playmaker`,
].join("|");

/** Full names from the data dictionary, the way people type them */
export const DICTIONARY_NAMES = [
  String.raw`plus.minus|fantasy\s+points?`,
  String.raw`3.point\s+(percentage|shots?\s*(attempted|made))`,
  String.raw`assist.to.turnover\s+ratio|assist\s+percentage|assist\s+ratio`,
  String.raw`(defensive|offensive|total)\s+rebounds?|(defensive|offensive|total)\s+rebound\s*%`,
  String.raw`field\s+goals?\s+(percentage|attempted|made)`,
  String.raw`free\s+throws?\s+(percentage|attempted|made)`,
  String.raw`effective\s+field\s+goal\s*%?|true\s+shooting\s*%?`,
  String.raw`games\s+played|minutes\s+per\s+game`,
].join("|");

export const ADVANCED_WORDS = [
  String.raw`offensive\s+rating|defensive\s+rating|net\s+rating`,
  String.raw`usage\s+rate|player\s+impact(\s+estimate)?`,
  String.raw`assist\s+ratio|turnover\s+ratio`,
  String.raw`rebound\s+percentage|assist\s+percentage`,
].join("|");

// ============================================================================
// Teams and People
// ============================================================================

/** Team nicknames, singular and plural */
export const TEAM_NAMES = [
  String.raw`lakers?|celtics?|warriors?|nets?|knicks?|bulls?|heat|suns?|nuggets?|bucks?`,
  String.raw`76ers|sixers|cavaliers?|cavs|hawks?|rockets?|clippers?|mavericks?|mavs|grizzlies`,
  String.raw`thunder|pelicans?|kings?|pistons?|hornets?|wizards?|pacers?|raptors?|blazers?|spurs?`,
  String.raw`wolves|timberwolves|magic|jazz`,
].join("|");

/**
 * Proper names common enough in questions to identify a person on sight.
 * "ć" is not a word character, so callers close this with (?!\w), not \b.
 */
export const COMMON_PROPER_NAMES = [
  String.raw`lebron|jordan|kobe|curry|james|durant|harden`,
  String.raw`jokic|jokić|embiid|luka|doncic|giannis|wembanyama|tatum`,
  String.raw`bird|wilt|chamberlain|shaq|kareem|duncan`,
].join("|");

/** Teams the biographical detector treats as a subject in their own right */
export const BIOGRAPHICAL_TEAMS = String.raw`lakers|celtics|heat|warriors|mavericks|bulls|cavaliers`;

// ============================================================================
// Glossary
// ============================================================================

/**
 * Reference terms whose questions are about meaning, not data.
 * Plain strings, matched with word boundaries.
 */
export const GLOSSARY_TERMS: readonly string[] = [
  "triple-double", "double-double", "triple double", "double double",
  "first option", "second option", "third option",
  "iso", "isolation", "pick and roll", "pick-and-roll", "pnr",
  "zone defense", "man-to-man defense", "man to man",
  "variance", "true shooting", "effective field goal",
  "player impact estimate", "plus-minus",
];
