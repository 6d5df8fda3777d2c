/**
 * Pattern Registry Tests
 *
 * Contract for the weighted pattern-group table:
 * - 13 statistical and 10 contextual groups with their published weights
 * - Each group counts once, however many of its branches match
 * - Misconfigured tables fail at build time with CONFIG_INVALID
 *
 * The implementation lives in: src/classifier/patterns.ts, src/classifier/scorer.ts
 */

import { describe, it, expect } from 'vitest';
import {
  buildPatternRegistry,
  STATISTICAL_GROUP_DEFINITIONS,
  CONTEXTUAL_GROUP_DEFINITIONS,
} from '../src/classifier/patterns.js';
import { scoreFamily, decideRoute, hasHybridConnector, DEFAULT_THRESHOLDS } from '../src/classifier/scorer.js';
import { isToolError } from '../src/utils.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Pattern Registry', () => {
  const registry = buildPatternRegistry();

  describe('Group table', () => {
    it('should build 13 statistical and 10 contextual groups', () => {
      expect(registry.statistical).toHaveLength(13);
      expect(registry.contextual).toHaveLength(10);
    });

    it('should carry the statistical weights in table order', () => {
      expect(registry.statistical.map(group => group.weight)).toEqual([
        3, 3, 2, 2, 1.5, 1.5, 1, 1, 1.5, 1, 1.5, 1, 0.5,
      ]);
    });

    it('should carry the contextual weights in table order', () => {
      expect(registry.contextual.map(group => group.weight)).toEqual([
        3, 2.5, 2, 2, 1.5, 2, 2, 1.5, 1, 1,
      ]);
    });

    it('should keep weights inside the documented ranges', () => {
      for (const group of registry.statistical) {
        expect(group.weight).toBeGreaterThanOrEqual(0.5);
        expect(group.weight).toBeLessThanOrEqual(3);
      }
      for (const group of registry.contextual) {
        expect(group.weight).toBeGreaterThanOrEqual(1);
        expect(group.weight).toBeLessThanOrEqual(3);
      }
    });

    it('should freeze the registry and its groups', () => {
      expect(Object.isFrozen(registry)).toBe(true);
      expect(Object.isFrozen(registry.statistical)).toBe(true);
      expect(Object.isFrozen(registry.statistical[0])).toBe(true);
    });

    it('should compile every matcher case-insensitive and non-global', () => {
      for (const group of [...registry.statistical, ...registry.contextual]) {
        expect(group.matcher.flags).toBe('i');
      }
    });
  });

  describe('Weighted scoring', () => {
    it('should count a group once when several of its branches match', () => {
      // "pts", "reb" and "ast" are all S1 branches
      const score = scoreFamily('pts reb ast', registry.statistical);

      expect(score.matched_groups).toEqual(['S1_db_abbreviations']);
      expect(score.total).toBe(3);
    });

    it('should sum the weights of distinct groups in table order', () => {
      const score = scoreFamily('who are the top 5 scorers?', registry.statistical);

      expect(score).toEqual({ total: 3.5, matched_groups: ['S3_superlatives_numbers', 'S11_filter_find'] });
    });

    it('should match percentage columns that end in %', () => {
      expect(scoreFamily('ts% leaders', registry.statistical).matched_groups).toContain('S1_db_abbreviations');
    });

    it('should not treat "how many" as an explanatory how', () => {
      const score = scoreFamily('how many points did he score', registry.contextual);

      expect(score.matched_groups).not.toContain('C1_why_how_questions');
    });

    it('should not treat "better than 20" as a qualitative judgement', () => {
      const score = scoreFamily('who shot better than 40 percent', registry.contextual);

      expect(score.matched_groups).toEqual([]);
    });

    it('should return an empty score for text with no signals', () => {
      expect(scoreFamily('', registry.statistical)).toEqual({ total: 0, matched_groups: [] });
    });
  });

  describe('Connector detection', () => {
    it.each([
      'compare their stats and explain the gap',
      'who scores more and why',
      'top 5 scorers - what makes them elite',
      'list the leaders but why them',
    ])('should find a connector in "%s"', text => {
      expect(hasHybridConnector(text)).toBe(true);
    });

    it.each([
      'where and when',
      'points and rebounds',
      'pick-and-roll usage',
    ])('should find no connector in "%s"', text => {
      expect(hasHybridConnector(text)).toBe(false);
    });
  });

  describe('Decision ladder', () => {
    it('should return contextual on a 0/0 tie', () => {
      expect(decideRoute('', 0, 0)).toEqual({
        query_type: 'contextual',
        decided_by: 'default_tie',
        connector_found: false,
        ratio: undefined,
      });
    });

    it('should return contextual on a non-zero tie', () => {
      const decision = decideRoute('plain text', 1, 1);

      expect(decision.query_type).toBe('contextual');
      expect(decision.decided_by).toBe('default_tie');
    });

    it('should require both scores at the ratio floor', () => {
      const decision = decideRoute('plain text', 1.5, 1.0);

      expect(decision.ratio).toBeUndefined();
      expect(decision.query_type).toBe('statistical');
    });

    it('should treat a ratio exactly at the minimum as balanced', () => {
      const decision = decideRoute('plain text', 5, 2);

      expect(decision.ratio).toBe(0.4);
      expect(decision.decided_by).toBe('ratio');
    });

    it('should rank the connector tier above the ratio tier', () => {
      expect(decideRoute('stats and why', 3, 3).decided_by).toBe('connector');
    });

    it('should expose the default thresholds', () => {
      expect(DEFAULT_THRESHOLDS).toEqual({
        ratio_floor: 1.5,
        ratio_min: 0.4,
        auto_promote_statistical: 4.0,
        auto_promote_contextual: 2.0,
      });
    });
  });

  describe('Startup validation', () => {
    it('should reject a group that does not compile', () => {
      const error = captureError(() => buildPatternRegistry({
        statistical: [{ name: 'broken', weight: 1, source: '(unclosed' }],
        contextual: CONTEXTUAL_GROUP_DEFINITIONS,
      }));

      expect(isToolError(error)).toBe(true);
      expect(error).toMatchObject({ code: 'CONFIG_INVALID', details: { family: 'statistical', group: 'broken' } });
    });

    it('should reject a duplicate group name', () => {
      const error = captureError(() => buildPatternRegistry({
        statistical: STATISTICAL_GROUP_DEFINITIONS,
        contextual: [
          { name: 'dup', weight: 1, source: 'a' },
          { name: 'dup', weight: 2, source: 'b' },
        ],
      }));

      expect(error).toMatchObject({ code: 'CONFIG_INVALID', message: 'Duplicate pattern group name "dup"' });
    });

    it.each([0, -1, Number.NaN])('should reject weight %s', weight => {
      const error = captureError(() => buildPatternRegistry({
        statistical: [{ name: 'bad_weight', weight, source: 'a' }],
        contextual: [],
      }));

      expect(error).toMatchObject({ code: 'CONFIG_INVALID' });
    });
  });
});
