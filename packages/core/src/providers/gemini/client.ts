import { GeminiEnvelopeSchema } from '../../schemas/provider-envelope.schema.js';
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

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export class GeminiClient implements ProviderClient {
  readonly provider = 'gemini';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    config: ProviderClientConfig,
    private readonly resolver: ModelResolver = new ModelResolver()
  ) {
    requireApiKey(this.provider, config.apiKey, 'GEMINI_API_KEY');
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? GEMINI_BASE_URL;
  }

  buildRequest(modelId: string, prompt: string, maxTokens: number): ProviderHttpRequest {
    const { entry } = this.resolver.validate(this.provider, modelId);
    // The key travels as a query parameter; there is no Authorization header.
    const url =
      joinUrl(this.baseUrl, `models/${entry.modelId}:${entry.endpointPath}`) +
      `?key=${encodeURIComponent(this.apiKey)}`;
    assertHttps(url, this.provider);

    return {
      url,
      headers: { 'Content-Type': 'application/json' },
      body: {
        contents: [{ parts: [{ text: prompt }] }],
        generationConfig: {
          maxOutputTokens: capOutputTokens(maxTokens, entry),
          temperature: 0.1,
        },
      },
    };
  }

  extractReply(envelope: unknown): ProviderReply {
    const parsed = parseEnvelope(
      GeminiEnvelopeSchema,
      envelope,
      this.provider,
      'candidates[0].content.parts[0].text'
    );
    return {
      rawText: parsed.candidates[0].content.parts[0].text,
      tokensUsed: toTokenCount(parsed.usageMetadata?.totalTokenCount),
    };
  }
}
