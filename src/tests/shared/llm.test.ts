/**
 * Tests for the shared LLM module
 *
 * Covers the oracle cache, client configuration, JSON recovery from model
 * output and the prompt helpers.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  LLMClient,
  OracleCache,
  DEFAULT_LLM_CONFIG,
  buildStructuredPrompt,
  cacheKey,
  escapePromptText,
  formatList,
  normalizeCacheInput,
  parseJsonResponse,
  supportsJsonMode,
  truncateText
} from '../../shared/llm';

describe('Oracle Cache', () => {
  let clock: number;
  let cache: OracleCache;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new OracleCache({ enabled: true, ttlSeconds: 60, maxEntries: 10, now: () => clock });
  });

  it('should cache and retrieve responses', () => {
    expect(cache.get('resume_profile', 'Hello')).toBeNull();

    cache.set('resume_profile', 'Hello', '{"name": "Ada"}');

    expect(cache.get('resume_profile', 'Hello')).toBe('{"name": "Ada"}');
  });

  it('should key on the prompt kind as well as the input', () => {
    cache.set('resume_profile', 'Hello', 'profile');

    expect(cache.get('work_history', 'Hello')).toBeNull();
    expect(cache.get('resume_profile', 'Goodbye')).toBeNull();
  });

  it('should treat whitespace differences as the same input', () => {
    cache.set('job_requirements', 'Python  and\n\nSQL ', 'cached');

    expect(cache.get('job_requirements', ' Python and SQL')).toBe('cached');
    expect(normalizeCacheInput(' a \t b\n')).toBe('a b');
    expect(cacheKey('k', 'a  b')).toBe(cacheKey('k', 'a b'));
    expect(cacheKey('k', 'a b')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should expire entries older than the TTL', () => {
    cache.set('resume_profile', 'Hello', 'value');

    clock += 60_000;
    expect(cache.get('resume_profile', 'Hello')).toBe('value');

    clock += 1;
    expect(cache.get('resume_profile', 'Hello')).toBeNull();
    expect(cache.getStats().size).toBe(0);
  });

  it('should enforce max entries limit with FIFO eviction', () => {
    const small = new OracleCache({ maxEntries: 2, now: () => clock });

    small.set('kind', 'a', '1');
    small.set('kind', 'b', '2');
    // Re-inserting moves "a" behind "b"
    small.set('kind', 'a', '1');
    small.set('kind', 'c', '3');

    expect(small.get('kind', 'b')).toBeNull();
    expect(small.get('kind', 'a')).toBe('1');
    expect(small.get('kind', 'c')).toBe('3');
  });

  it('should count hits and misses', () => {
    cache.set('kind', 'x', 'y');
    cache.get('kind', 'x');
    cache.get('kind', 'x');
    cache.get('kind', 'z');

    expect(cache.getStats()).toEqual({ size: 1, maxEntries: 10, enabled: true, hits: 2, misses: 1 });

    cache.clear();
    expect(cache.getStats()).toEqual({ size: 0, maxEntries: 10, enabled: true, hits: 0, misses: 0 });
  });

  it('should remove expired entries on cleanup', () => {
    cache.set('kind', 'old', '1');
    clock += 30_000;
    cache.set('kind', 'new', '2');
    clock += 45_000;

    expect(cache.cleanup()).toBe(1);
    expect(cache.get('kind', 'new')).toBe('2');
  });

  it('should do nothing when disabled', () => {
    const disabled = new OracleCache({ enabled: false });
    disabled.set('kind', 'x', 'y');

    expect(disabled.get('kind', 'x')).toBeNull();
    expect(disabled.getStats()).toMatchObject({ size: 0, enabled: false, misses: 0 });
  });
});

describe('LLM Client Configuration', () => {
  it('should have default configurations for both providers', () => {
    expect(DEFAULT_LLM_CONFIG.anthropic.provider).toBe('anthropic');
    expect(DEFAULT_LLM_CONFIG.openai.provider).toBe('openai');
    expect(DEFAULT_LLM_CONFIG.anthropic.temperature).toBe(0);
    expect(DEFAULT_LLM_CONFIG.openai.temperature).toBe(0);
  });

  it('should create client with custom configuration', () => {
    const client = new LLMClient({
      apiKey: 'test-key',
      provider: 'anthropic',
      model: 'custom-model',
      temperature: 0.5,
      maxTokens: 2000,
      timeout: 15000
    });

    expect(client.getConfig()).toEqual({
      apiKey: 'test-key',
      provider: 'anthropic',
      model: 'custom-model',
      temperature: 0.5,
      maxTokens: 2000,
      timeout: 15000
    });
  });

  it('should merge with defaults when partial config provided', () => {
    const config = new LLMClient({ apiKey: 'test-key', provider: 'openai' }).getConfig();

    expect(config.provider).toBe('openai');
    expect(config.model).toBe(DEFAULT_LLM_CONFIG.openai.model);
    expect(config.timeout).toBe(DEFAULT_LLM_CONFIG.openai.timeout);
  });

  it('should forward oracle calls as JSON-seeking completions', async () => {
    const client = new LLMClient({ apiKey: 'test-key', provider: 'anthropic' });
    const complete = vi.spyOn(client, 'complete').mockResolvedValue({ content: '{"ok": true}', model: 'test-model' });

    const text = await client.invoke('Extract things', 512, { timeoutMs: 2500 });

    expect(text).toBe('{"ok": true}');
    expect(complete).toHaveBeenCalledWith({ prompt: 'Extract things', maxTokens: 512, timeoutMs: 2500, json: true });
  });

  it('should know which models offer a JSON mode', () => {
    expect(supportsJsonMode('gpt-4o-mini')).toBe(true);
    expect(supportsJsonMode('gpt-4-turbo-preview')).toBe(true);
    expect(supportsJsonMode('gpt-4')).toBe(false);
  });
});

describe('LLM JSON Parsing', () => {
  it('should parse clean JSON', () => {
    expect(parseJsonResponse('{"key": "value"}')).toEqual({ key: 'value' });
  });

  it('should parse JSON with markdown code blocks', () => {
    expect(parseJsonResponse('```json\n{"key": "value"}\n```')).toEqual({ key: 'value' });
    expect(parseJsonResponse('```json {"key": "value"}```')).toEqual({ key: 'value' });
  });

  it('should extract JSON from surrounding text', () => {
    expect(parseJsonResponse('Here is the result: {"key": "value"} and some more text')).toEqual({ key: 'value' });
  });

  it('should prefer an array that starts before any object', () => {
    expect(parseJsonResponse('Skills: [{"id": 1}, {"id": 2}] done')).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('should repair a trailing comma', () => {
    expect(parseJsonResponse('{"a": 1, "b": [2, 3],}')).toEqual({ a: 1, b: [2, 3] });
  });

  it('should keep escape sequences and unicode', () => {
    expect(parseJsonResponse('{"text": "Line 1\\nLine 2", "city": "Zürich"}')).toEqual({
      text: 'Line 1\nLine 2',
      city: 'Zürich'
    });
  });

  it('should throw for an empty response', () => {
    expect(() => parseJsonResponse('')).toThrow('Failed to parse LLM response as JSON');
  });
});

describe('Prompt helpers', () => {
  it('should build a structured prompt', () => {
    const prompt = buildStructuredPrompt(
      'Grade the excerpt.',
      ['Be strict', 'Answer in JSON'],
      [{ title: 'Excerpt', body: 'Built Python tools' }],
      '{ "ok": true }'
    );

    expect(prompt).toBe(
      'Grade the excerpt.\n\n' +
      'INSTRUCTIONS:\n1. Be strict\n2. Answer in JSON\n\n' +
      'EXCERPT:\nBuilt Python tools\n\n' +
      'OUTPUT FORMAT:\n{ "ok": true }'
    );
  });

  it('should omit empty parts', () => {
    expect(buildStructuredPrompt('Just the task.', [])).toBe('Just the task.');
  });

  it('should escape caller text', () => {
    expect(escapePromptText('  a\r\nb\rc ```x``` ')).toBe("a\nb\nc '''x'''");
  });

  it('should truncate at a word boundary', () => {
    expect(truncateText('alpha beta gamma', 12)).toBe('alpha beta...');
    expect(truncateText('abcdefgh', 4)).toBe('abcd...');
    expect(truncateText('short', 10)).toBe('short');
  });

  it('should format lists', () => {
    expect(formatList(['Python', 'SQL'])).toBe('- Python\n- SQL');
    expect(formatList(['Python', 'SQL'], true)).toBe('1. Python\n2. SQL');
  });
});
