import { OpenAIEnvelopeSchema } from '../../schemas/provider-envelope.schema.js';
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

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const OPENAI_SYSTEM_MESSAGE = 'You are an expert DevOps engineer analyzing CI/CD failures.';

export class OpenAIClient implements ProviderClient {
  readonly provider = 'openai';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    config: ProviderClientConfig,
    private readonly resolver: ModelResolver = new ModelResolver()
  ) {
    requireApiKey(this.provider, config.apiKey, 'OPENAI_API_KEY');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? OPENAI_BASE_URL;
  }

  buildRequest(modelId: string, prompt: string, maxTokens: number): ProviderHttpRequest {
    const { entry } = this.resolver.validate(this.provider, modelId);
    const url = joinUrl(this.baseUrl, entry.endpointPath);
    assertHttps(url, this.provider);

    return {
      url,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: {
        model: entry.modelId,
        messages: [
          { role: 'system', content: OPENAI_SYSTEM_MESSAGE },
          { role: 'user', content: prompt },
        ],
        max_tokens: capOutputTokens(maxTokens, entry),
        temperature: 0.1,
      },
    };
  }

  extractReply(envelope: unknown): ProviderReply {
    const parsed = parseEnvelope(
      OpenAIEnvelopeSchema,
      envelope,
      this.provider,
      'choices[0].message.content'
    );
    return {
      rawText: parsed.choices[0].message.content,
      tokensUsed: toTokenCount(parsed.usage?.total_tokens),
    };
  }
}
