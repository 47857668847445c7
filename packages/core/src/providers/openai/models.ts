import type { ProviderModelEntry } from '../provider-types.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

const chat = (modelId: string, costPer1kTokens: number): ProviderModelEntry => ({
  provider: 'openai',
  modelId,
  endpointPath: 'chat/completions',
  maxOutputTokens: 128000,
  costPer1kTokens,
});

export const OPENAI_MODELS: readonly ProviderModelEntry[] = [
  chat('gpt-4o', 0.005),
  chat('gpt-4o-mini', 0.00015),
  chat('gpt-4o-2024-11-20', 0.0025),
  chat('gpt-4o-2024-08-06', 0.0025),
  chat('gpt-4o-mini-2024-07-18', 0.00015),
  chat('o1-preview', 0.015),
  chat('o1-preview-2024-09-12', 0.015),
  chat('o1-mini', 0.003),
  chat('o1-mini-2024-09-12', 0.003),
  chat('gpt-4-turbo', 0.01),
  chat('gpt-4-turbo-2024-04-09', 0.01),
];
