import { parseProviderId } from './provider-catalog.js';
import { ModelResolver } from './model-resolver.js';
import type { ProviderClient, ProviderClientConfig, ProviderId } from './provider-types.js';
import { OpenAIClient } from './openai/client.js';
import { AnthropicClient } from './anthropic/client.js';
import { GeminiClient } from './gemini/client.js';

type ClientConstructor = (config: ProviderClientConfig, resolver: ModelResolver) => ProviderClient;

const CLIENTS: Record<ProviderId, ClientConstructor> = {
  openai: (config, resolver) => new OpenAIClient(config, resolver),
  anthropic: (config, resolver) => new AnthropicClient(config, resolver),
  gemini: (config, resolver) => new GeminiClient(config, resolver),
};

/**
 * Select the client variant for a provider tag. Each call returns a fresh
 * client, so concurrent analyses never share request state.
 */
export function createProviderClient(
  provider: string,
  config: ProviderClientConfig,
  resolver: ModelResolver = new ModelResolver()
): ProviderClient {
  return CLIENTS[parseProviderId(provider)](config, resolver);
}
