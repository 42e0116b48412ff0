// Tests for option layering
import { validateAppConfig } from '@pipeline-llm/shared';
import { describe, expect, it } from 'vitest';
import { LLMValidationError } from './errors.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  mergeOptions,
  resolveApiKey,
  resolveSystemPrompt,
  validateMergedOptions,
} from './options.js';

describe('mergeOptions', () => {
  it('should fill fallbacks when no layer sets them', () => {
    expect(mergeOptions({}, {}, {})).toEqual({
      model: 'claude-3-5-sonnet-20240620',
      temperature: 0.6,
      max_tokens: 256,
    });
  });

  it('should expose the fallback constants', () => {
    expect(DEFAULT_MODEL).toBe('claude-3-5-sonnet-20240620');
    expect(DEFAULT_TEMPERATURE).toBe(0.6);
    expect(DEFAULT_MAX_TOKENS).toBe(256);
  });

  it('should let later layers win key by key', () => {
    const merged = mergeOptions(
      { api_key: 'k1', temperature: 0.2 },
      { model: 'm1' },
      { temperature: 0.9 },
    );
    expect(merged).toEqual({
      api_key: 'k1',
      temperature: 0.9,
      model: 'm1',
      max_tokens: 256,
    });
  });

  it('should let pipeline defaults override provider defaults', () => {
    const merged = mergeOptions({ model: 'provider' }, { model: 'pipeline' });
    expect(merged.model).toBe('pipeline');
  });

  it('should let runtime options override pipeline defaults', () => {
    const merged = mergeOptions(
      {},
      { max_tokens: 512 },
      { max_tokens: 1024 },
    );
    expect(merged.max_tokens).toBe(1024);
  });

  it('should not merge nested values', () => {
    const merged = mergeOptions(
      { metadata: { a: 1, b: 2 } },
      {},
      { metadata: { b: 3 } },
    );
    expect(merged.metadata).toEqual({ b: 3 });
  });

  it('should treat undefined values as unset for fallbacks', () => {
    const merged = mergeOptions({ model: 'm1' }, {}, { model: undefined });
    expect(merged.model).toBe('claude-3-5-sonnet-20240620');
  });

  it('should not mutate any input layer', () => {
    const provider = { api_key: 'k1' };
    const pipeline = { model: 'm1' };
    const runtime = { temperature: 0.1 };

    const merged = mergeOptions(provider, pipeline, runtime);

    expect(provider).toEqual({ api_key: 'k1' });
    expect(pipeline).toEqual({ model: 'm1' });
    expect(runtime).toEqual({ temperature: 0.1 });
    expect(merged).not.toBe(runtime);
  });

  it('should default runtime options to an empty layer', () => {
    expect(mergeOptions({ model: 'm1' }, {}).model).toBe('m1');
  });
});

describe('validateMergedOptions', () => {
  it('should return the typed options', () => {
    const options = validateMergedOptions(
      mergeOptions({}, {}, { system: 'Be brief.' }),
    );
    expect(options.model).toBe('claude-3-5-sonnet-20240620');
    expect(options.system).toBe('Be brief.');
  });

  it('should throw LLMValidationError for out-of-range temperature', () => {
    expect(() =>
      validateMergedOptions(mergeOptions({}, {}, { temperature: 2 })),
    ).toThrow(LLMValidationError);
  });

  it('should name the offending field', () => {
    try {
      validateMergedOptions(mergeOptions({}, {}, { max_tokens: 1.5 }));
      expect.unreachable('validateMergedOptions should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(LLMValidationError);
      if (error instanceof LLMValidationError) {
        expect(error.field).toBe('max_tokens');
        expect(error.message).toBe(
          'Invalid LLM options: max_tokens: max_tokens must be a positive integer',
        );
      }
    }
  });

  it('should accept null system and api_key', () => {
    const options = validateMergedOptions(
      mergeOptions({}, {}, { system: null, api_key: null }),
    );
    expect(options.system).toBeNull();
    expect(options.api_key).toBeNull();
  });

  it('should throw for a non-string api_key', () => {
    expect(() =>
      validateMergedOptions(mergeOptions({ api_key: 42 }, {}, {})),
    ).toThrow(LLMValidationError);
  });
});

describe('resolveApiKey', () => {
  it('should prefer the merged api_key', () => {
    const merged = validateMergedOptions(
      mergeOptions({ api_key: 'k1' }, {}, { api_key: 'k2' }),
    );
    expect(resolveApiKey(merged, { api_key: 'k1' })).toBe('k2');
  });

  it('should fall back to provider defaults when the merged key is empty', () => {
    const merged = validateMergedOptions(
      mergeOptions({ api_key: 'k1' }, {}, { api_key: '' }),
    );
    expect(resolveApiKey(merged, { api_key: 'k1' })).toBe('k1');
  });

  it('should fall back to provider defaults when the merged key is null', () => {
    const merged = mergeOptions({ api_key: 'k1' }, { api_key: null }, {});
    expect(resolveApiKey(merged, { api_key: 'k1' })).toBe('k1');
  });

  it('should resolve from an unvalidated merge', () => {
    const merged = mergeOptions({}, { api_key: 'k2' }, { temperature: 5 });
    expect(resolveApiKey(merged, {})).toBe('k2');
  });

  it('should ignore a non-string key', () => {
    expect(resolveApiKey({ api_key: 42 }, {})).toBeUndefined();
  });

  it('should return undefined when no layer has a key', () => {
    const merged = validateMergedOptions(mergeOptions({}, {}, {}));
    expect(resolveApiKey(merged, {})).toBeUndefined();
  });
});

describe('resolveSystemPrompt', () => {
  const appConfig = validateAppConfig({ llm: { prompt: 'Global prompt' } });

  it('should prefer the system option', () => {
    const merged = validateMergedOptions(
      mergeOptions({}, {}, { system: 'Call prompt' }),
    );
    expect(resolveSystemPrompt(merged, appConfig)).toBe('Call prompt');
  });

  it('should fall back to the global prompt', () => {
    const merged = validateMergedOptions(mergeOptions({}, {}, {}));
    expect(resolveSystemPrompt(merged, appConfig)).toBe('Global prompt');
  });

  it('should fall back to the global prompt when system is null', () => {
    const merged = validateMergedOptions(
      mergeOptions({ system: 'Provider prompt' }, {}, { system: null }),
    );
    expect(merged.system).toBeNull();
    expect(resolveSystemPrompt(merged, appConfig)).toBe('Global prompt');
  });

  it('should return undefined when neither is set', () => {
    const merged = validateMergedOptions(mergeOptions({}, {}, {}));
    expect(resolveSystemPrompt(merged, validateAppConfig({}))).toBeUndefined();
  });
});
