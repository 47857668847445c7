import type { z } from 'zod';
import { FailscopeError, ErrorCode } from '../errors.js';
import type { ProviderId, ProviderModelEntry } from './provider-types.js';

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/** Never ask for more output than the catalog allows for the model. */
export function capOutputTokens(maxTokens: number, entry: ProviderModelEntry): number {
  return Math.min(maxTokens, entry.maxOutputTokens);
}

export function requireApiKey(provider: ProviderId, apiKey: string, envVar: string): void {
  if (!apiKey) {
    throw new FailscopeError(
      `An API key is needed for ${provider}`,
      ErrorCode.AUTH_KEY_MISSING,
      `No ${provider} API key found. Set ${envVar} in your environment.`,
      { provider }
    );
  }
}

/**
 * Validate a provider envelope against the schema for its reply path.
 * @throws FailscopeError PROVIDER_MALFORMED_ENVELOPE
 */
export function parseEnvelope<T>(
  schema: z.ZodType<T>,
  envelope: unknown,
  provider: ProviderId,
  replyPath: string
): T {
  const result = schema.safeParse(envelope);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const where = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
  throw new FailscopeError(
    `Invalid response format: ${where}: ${issue?.message ?? 'unexpected shape'}`,
    ErrorCode.PROVIDER_MALFORMED_ENVELOPE,
    `The ${provider} response did not contain ${replyPath}`,
    { provider, path: where }
  );
}

export function toTokenCount(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
}
