/**
 * Fallback Classifier Tests
 *
 * Contract for the language-model fallback:
 * - Speaks sql_only, vector_only and hybrid
 * - Answers sql_only with no API key, on transport errors, non-2xx
 *   statuses, malformed bodies and replies that are not a label
 *
 * The implementation lives in: src/tools/fallback.ts
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  LlmFallbackClassifier,
  parseRouteVerdict,
  toRouteLabel,
  fromRouteLabel,
  buildUserPrompt,
  FALLBACK_SYSTEM_PROMPT,
  type FallbackSettings,
} from '../src/tools/fallback.js';
import { EventLogger } from '../src/utils.js';

interface CapturedRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

const SETTINGS: FallbackSettings = {
  base_url: 'http://localhost:9999/v1/',
  model: 'test-model',
  api_key: 'test-secret',
  timeout_ms: 1000,
};

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(respond: () => Response | Promise<Response>): CapturedRequest[] {
  const requests: CapturedRequest[] = [];
  vi.stubGlobal('fetch', vi.fn(async (url: string, init: { headers: Record<string, string>; body: string }) => {
    requests.push({ url, headers: init.headers, body: init.body });
    return respond();
  }));
  return requests;
}

function createFallback(settings: FallbackSettings = SETTINGS): { fallback: LlmFallbackClassifier; lines: string[] } {
  const lines: string[] = [];
  const fallback = new LlmFallbackClassifier(settings, new EventLogger('debug', line => lines.push(line)));
  return { fallback, lines };
}

describe('Fallback Classifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ==========================================================================
  // Labels
  // ==========================================================================

  describe('Route labels', () => {
    it('should map query types to labels and back', () => {
      expect(toRouteLabel('statistical')).toBe('sql_only');
      expect(toRouteLabel('contextual')).toBe('vector_only');
      expect(toRouteLabel('hybrid')).toBe('hybrid');
      expect(fromRouteLabel('vector_only')).toBe('contextual');
    });

    it.each([
      ['sql_only', 'sql_only'],
      ['  Vector_Only\n', 'vector_only'],
      ['`hybrid`', 'hybrid'],
      ['"sql_only".', 'sql_only'],
    ])('should parse %j as %s', (reply, label) => {
      expect(parseRouteVerdict(reply)).toBe(label);
    });

    it.each(['', 'maybe', 'sql_only or hybrid', 'statistical'])('should reject %j', reply => {
      expect(parseRouteVerdict(reply)).toBeUndefined();
    });
  });

  // ==========================================================================
  // Requests
  // ==========================================================================

  describe('Completion request', () => {
    it('should post the prompts to /chat/completions with bearer auth', async () => {
      const requests = stubFetch(() => completion('vector_only'));
      const { fallback } = createFallback();

      await expect(fallback.classify('Why is Curry so good?')).resolves.toBe('vector_only');

      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe('http://localhost:9999/v1/chat/completions');
      expect(requests[0].headers.Authorization).toBe('Bearer test-secret');
      expect(JSON.parse(requests[0].body)).toEqual({
        model: 'test-model',
        temperature: 0,
        messages: [
          { role: 'system', content: FALLBACK_SYSTEM_PROMPT },
          { role: 'user', content: 'Classify this basketball question:\n\nWhy is Curry so good?\n\nLabel:' },
        ],
      });
    });

    it('should build the user prompt around the raw question', () => {
      expect(buildUserPrompt('Top 5 scorers')).toBe('Classify this basketball question:\n\nTop 5 scorers\n\nLabel:');
    });
  });

  // ==========================================================================
  // Degradation
  // ==========================================================================

  describe('Default route', () => {
    it('should skip the request without an API key', async () => {
      const requests = stubFetch(() => completion('hybrid'));
      const { fallback, lines } = createFallback({ ...SETTINGS, api_key: undefined });

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');

      expect(requests).toHaveLength(0);
      expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'No API key configured; using default route' });
    });

    it('should fall back on a non-2xx status', async () => {
      stubFetch(() => new Response('rate limited', { status: 429 }));
      const { fallback, lines } = createFallback();

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');

      expect(JSON.parse(lines[0])).toMatchObject({
        level: 'warn',
        message: 'Fallback request failed; using default route',
        data: { error: 'Completion API error 429: rate limited' },
      });
    });

    it('should fall back on a transport error', async () => {
      stubFetch(() => Promise.reject(new Error('connect ECONNREFUSED')));
      const { fallback } = createFallback();

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');
    });

    it('should fall back on a body without choices', async () => {
      stubFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
      const { fallback, lines } = createFallback();

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');
      expect(JSON.parse(lines[0])).toMatchObject({ data: { error: 'Completion API returned an unexpected body' } });
    });

    it('should fall back on a reply that is not a label', async () => {
      stubFetch(() => completion('I think this is a hybrid question'));
      const { fallback, lines } = createFallback();

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');
      expect(JSON.parse(lines[0])).toMatchObject({ message: 'Invalid verdict from model; using default route' });
    });

    it('should fall back on a null reply', async () => {
      stubFetch(() => completion(null));
      const { fallback } = createFallback();

      await expect(fallback.classify('Who is LeBron?')).resolves.toBe('sql_only');
    });

    it('should never log the raw question', async () => {
      stubFetch(() => completion('maybe'));
      const { fallback, lines } = createFallback();

      await fallback.classify('Who is LeBron?');

      expect(lines.join('\n')).not.toContain('LeBron');
    });
  });
});
