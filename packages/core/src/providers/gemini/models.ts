import type { ProviderModelEntry } from '../provider-types.js';

export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';

export const GEMINI_MODELS: readonly ProviderModelEntry[] = [
  {
    provider: 'gemini',
    modelId: 'gemini-2.0-flash',
    endpointPath: 'generateContent',
    maxOutputTokens: 1000000,
    costPer1kTokens: 0.0005,
  },
  {
    provider: 'gemini',
    modelId: 'gemini-2.0-pro-exp',
    endpointPath: 'generateContent',
    maxOutputTokens: 2000000,
    costPer1kTokens: 0.002,
  },
  {
    provider: 'gemini',
    modelId: 'gemini-1.5-pro',
    endpointPath: 'generateContent',
    maxOutputTokens: 2000000,
    costPer1kTokens: 0.002,
  },
  {
    provider: 'gemini',
    modelId: 'gemini-1.5-flash',
    endpointPath: 'generateContent',
    maxOutputTokens: 1000000,
    costPer1kTokens: 0.0005,
  },
];
