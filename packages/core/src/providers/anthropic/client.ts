import { AnthropicEnvelopeSchema } from '../../schemas/provider-envelope.schema.js';
import { assertHttps } from '../http-transport.js';
import { ModelResolver } from '../model-resolver.js';
import type {
  ProviderClient,
  ProviderClientConfig,
  ProviderHttpRequest,
  ProviderReply,
} from '../provider-types.js';
import {
  capOutputTokens,
  joinUrl,
  parseEnvelope,
  requireApiKey,
  toTokenCount,
} from '../request-utils.js';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
export const ANTHROPIC_API_VERSION = '2023-06-01';

export class AnthropicClient implements ProviderClient {
  readonly provider = 'anthropic';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    config: ProviderClientConfig,
    private readonly resolver: ModelResolver = new ModelResolver()
  ) {
    requireApiKey(this.provider, config.apiKey, 'ANTHROPIC_API_KEY');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? ANTHROPIC_BASE_URL;
  }

  buildRequest(modelId: string, prompt: string, maxTokens: number): ProviderHttpRequest {
    const { entry } = this.resolver.validate(this.provider, modelId);
    const url = joinUrl(this.baseUrl, entry.endpointPath);
    assertHttps(url, this.provider);

    return {
      url,
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
        'Content-Type': 'application/json',
      },
      body: {
        model: entry.modelId,
        max_tokens: capOutputTokens(maxTokens, entry),
        messages: [{ role: 'user', content: prompt }],
      },
    };
  }

  extractReply(envelope: unknown): ProviderReply {
    const parsed = parseEnvelope(AnthropicEnvelopeSchema, envelope, this.provider, 'content[0].text');
    return {
      rawText: parsed.content[0].text,
      tokensUsed: toTokenCount(parsed.usage?.output_tokens),
    };
  }
}
