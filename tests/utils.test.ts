/**
 * Core Utility Tests
 *
 * Contract for normalization, hashing, error shaping and the JSON-lines logger.
 *
 * The implementation lives in: src/utils.ts
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeQuery,
  splitWords,
  countOccurrences,
  hashQuery,
  generateRequestId,
  createToolError,
  isToolError,
  formatErrorResponse,
  EventLogger,
} from '../src/utils.js';

describe('Text Utilities', () => {
  it('should lower-case, trim and collapse whitespace', () => {
    expect(normalizeQuery('  Who   has\tthe MOST  assists?  ')).toBe('who has the most assists?');
  });

  it('should turn em and en dashes into a spaced hyphen', () => {
    expect(normalizeQuery('Top scorers—why?')).toBe('top scorers - why?');
    expect(normalizeQuery('Top scorers – why?')).toBe('top scorers - why?');
  });

  it('should keep in-word hyphens', () => {
    expect(normalizeQuery('Pick-and-roll   usage')).toBe('pick-and-roll usage');
  });

  it('should split on whitespace and drop empty words', () => {
    expect(splitWords('')).toEqual([]);
    expect(splitWords(' a  b ')).toEqual(['a', 'b']);
  });

  it('should count literal occurrences', () => {
    expect(countOccurrences('a and b and c', ' and ')).toBe(2);
    expect(countOccurrences('a, b', ',')).toBe(1);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});

describe('Hashing and IDs', () => {
  it('should produce a stable 12-character hex fingerprint', () => {
    const hash = hashQuery('who is lebron');

    expect(hash).toMatch(/^[0-9a-f]{12}$/);
    expect(hashQuery('who is lebron')).toBe(hash);
    expect(hashQuery('who is curry')).not.toBe(hash);
  });

  it('should generate version 7 request IDs', () => {
    expect(generateRequestId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('Error Handling', () => {
  it('should default recoverable to false', () => {
    expect(createToolError('INVALID_INPUT', 'bad')).toEqual({
      isError: true,
      code: 'INVALID_INPUT',
      message: 'bad',
      details: undefined,
      recoverable: false,
      suggestion: undefined,
    });
  });

  it('should recognise tool errors only', () => {
    expect(isToolError(createToolError('CONFIG_INVALID', 'bad'))).toBe(true);
    expect(isToolError(new Error('bad'))).toBe(false);
    expect(isToolError(null)).toBe(false);
    expect(isToolError({ isError: true, code: 'X' })).toBe(false);
  });

  it('should format an MCP error response', () => {
    const error = createToolError('INVALID_INPUT', 'Query is empty', {
      suggestion: 'Send a question',
      details: { length: 0 },
    });

    expect(formatErrorResponse(error)).toEqual({
      isError: true,
      content: [{
        type: 'text',
        text: 'Error: INVALID_INPUT\nQuery is empty\nSuggestion: Send a question\nDetails: {"length":0}',
      }],
    });
  });
});

describe('EventLogger', () => {
  it('should write one JSON object per entry', () => {
    const lines: string[] = [];
    const logger = new EventLogger('debug', line => lines.push(line));

    logger.debug('startup', 'server', 'ready', { tools: 5 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'debug',
      phase: 'startup',
      tool: 'server',
      message: 'ready',
      data: { tools: 5 },
    });
  });

  it('should drop entries below the configured level', () => {
    const lines: string[] = [];
    const logger = new EventLogger('warn', line => lines.push(line));

    logger.info('classify', 'query_classifier', 'skipped');
    logger.warn('classify', 'query_classifier', 'kept');
    logger.error('classify', 'query_classifier', 'kept');

    expect(lines).toHaveLength(2);
    expect(logger.isEnabled('debug')).toBe(false);
  });

  it('should count data that cannot be serialized', () => {
    const logger = new EventLogger('info', () => {});

    logger.info('classify', 'query_classifier', 'big', { value: BigInt(1) });

    expect(logger.droppedEntries).toBe(1);
  });
});
