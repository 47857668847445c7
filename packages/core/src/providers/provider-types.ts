/**
 * Provider-agnostic types shared by the catalog, the resolver and the clients.
 */

export const PROVIDER_IDS = ['openai', 'anthropic', 'gemini'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

/** One supported provider/model combination. Keyed by (provider, modelId). */
export interface ProviderModelEntry {
  readonly provider: ProviderId;
  readonly modelId: string;
  /** Path segment appended to the provider base URL (or the Gemini method name). */
  readonly endpointPath: string;
  readonly maxOutputTokens: number;
  readonly costPer1kTokens: number;
  /** Legacy names that resolve to this entry. */
  readonly aliases?: readonly string[];
}

/** Everything needed to issue one provider call. Built per call, never shared. */
export interface ProviderHttpRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/** Text and usage pulled out of a provider's JSON envelope. */
export interface ProviderReply {
  rawText: string;
  tokensUsed: number;
}

/** One variant per provider; selected by {@link ProviderClient.provider}. */
export interface ProviderClient {
  readonly provider: ProviderId;

  /**
   * Build the provider-specific request.
   * The token cap sent is `min(maxTokens, entry.maxOutputTokens)`.
   * @throws FailscopeError NET_INSECURE_TRANSPORT when the URL is not https
   */
  buildRequest(modelId: string, prompt: string, maxTokens: number): ProviderHttpRequest;

  /**
   * Pull the reply text and token usage out of the provider's envelope.
   * @throws FailscopeError PROVIDER_MALFORMED_ENVELOPE when the reply path is absent
   */
  extractReply(envelope: unknown): ProviderReply;
}

/** Settings every client variant takes. */
export interface ProviderClientConfig {
  apiKey: string;
  baseUrl?: string;
}
