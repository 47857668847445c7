import type { ProviderModelEntry } from '../provider-types.js';

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

export const ANTHROPIC_MODELS: readonly ProviderModelEntry[] = [
  {
    provider: 'anthropic',
    modelId: 'claude-opus-4-20250514',
    endpointPath: 'messages',
    maxOutputTokens: 4096,
    costPer1kTokens: 0.15,
  },
  {
    provider: 'anthropic',
    modelId: 'claude-sonnet-4-20250514',
    endpointPath: 'messages',
    maxOutputTokens: 4096,
    costPer1kTokens: 0.03,
  },
  {
    provider: 'anthropic',
    modelId: 'claude-3-opus-20240229',
    endpointPath: 'messages',
    maxOutputTokens: 4096,
    costPer1kTokens: 0.15,
  },
  {
    provider: 'anthropic',
    modelId: 'claude-3-5-sonnet-20241022',
    endpointPath: 'messages',
    maxOutputTokens: 8192,
    costPer1kTokens: 0.03,
  },
  {
    provider: 'anthropic',
    modelId: 'claude-3-5-haiku-20241022',
    endpointPath: 'messages',
    maxOutputTokens: 8192,
    costPer1kTokens: 0.0025,
  },
];
