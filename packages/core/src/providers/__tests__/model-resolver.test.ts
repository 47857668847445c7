import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors.js';
import { ModelResolver } from '../model-resolver.js';
import { PROVIDER_CATALOG, createProviderCatalog } from '../provider-catalog.js';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('ModelResolver', () => {
  const resolver = new ModelResolver();

  describe('resolve', () => {
    it('uses the provider default when no model is requested', () => {
      expect(resolver.resolve('openai')).toBe('gpt-4o-mini');
      expect(resolver.resolve('gemini', '')).toBe('gemini-1.5-flash');
      expect(resolver.resolve('anthropic', '   ')).toBe('claude-3-5-sonnet-20241022');
    });

    it('returns every catalog model id unchanged through validation', () => {
      for (const entry of PROVIDER_CATALOG.entries()) {
        expect(resolver.resolveAndValidate(entry.provider, entry.modelId).entry.modelId).toBe(
          entry.modelId
        );
      }
    });

    it('returns a known model id unchanged', () => {
      expect(resolver.resolve('openai', 'gpt-4o')).toBe('gpt-4o');
    });

    it('passes unknown names through for validate to reject', () => {
      expect(resolver.resolve('openai', 'gpt-9')).toBe('gpt-9');
    });

    it('rejects unknown providers', () => {
      expect(errorOf(() => resolver.resolve('cohere'))).toMatchObject({
        code: ErrorCode.CONFIG_UNKNOWN_PROVIDER,
      });
    });
  });

  describe('validate', () => {
    it('returns the catalog entry', () => {
      const { provider, entry } = resolver.validate('Anthropic', 'claude-3-opus-20240229');
      expect(provider).toBe('anthropic');
      expect(entry.endpointPath).toBe('messages');
      expect(entry.costPer1kTokens).toBe(0.15);
    });

    it('rejects a model from another provider', () => {
      expect(errorOf(() => resolver.validate('openai', 'claude-3-opus-20240229'))).toMatchObject({
        code: ErrorCode.CONFIG_UNSUPPORTED_MODEL,
        message: "Unsupported model 'claude-3-opus-20240229' for provider 'openai'",
      });
    });
  });

  describe('aliases', () => {
    const catalog = createProviderCatalog(
      [
        {
          provider: 'openai',
          modelId: 'gpt-4o-2024-11-20',
          endpointPath: 'chat/completions',
          maxOutputTokens: 16000,
          costPer1kTokens: 0.0025,
          aliases: ['gpt-4o-latest'],
        },
        {
          provider: 'anthropic',
          modelId: 'claude-test',
          endpointPath: 'messages',
          maxOutputTokens: 4096,
          costPer1kTokens: 0.01,
        },
        {
          provider: 'gemini',
          modelId: 'gemini-test',
          endpointPath: 'generateContent',
          maxOutputTokens: 8192,
          costPer1kTokens: 0.001,
        },
      ],
      { openai: 'gpt-4o-2024-11-20', anthropic: 'claude-test', gemini: 'gemini-test' }
    );
    const aliasResolver = new ModelResolver(catalog);

    it('maps an alias onto its canonical id', () => {
      expect(aliasResolver.resolve('openai', 'gpt-4o-latest')).toBe('gpt-4o-2024-11-20');
    });

    it('does not accept an alias in validate', () => {
      expect(errorOf(() => aliasResolver.validate('openai', 'gpt-4o-latest'))).toMatchObject({
        code: ErrorCode.CONFIG_UNSUPPORTED_MODEL,
      });
    });

    it('resolves and validates in one step', () => {
      expect(aliasResolver.resolveAndValidate('openai', 'gpt-4o-latest').entry.modelId).toBe(
        'gpt-4o-2024-11-20'
      );
    });
  });
});
