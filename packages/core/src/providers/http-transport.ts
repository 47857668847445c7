import { ApiError, ErrorCode, FailscopeError, NetworkError, redactCredentials } from '../errors.js';
import type { ProviderHttpRequest, ProviderId } from './provider-types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

/**
 * Reject anything but an https:// URL. Runs before any socket is opened.
 * @throws FailscopeError NET_INSECURE_TRANSPORT
 */
export function assertHttps(url: string, provider: ProviderId): void {
  if (!/^https:\/\//i.test(url)) {
    const safeUrl = redactCredentials(url);
    throw new FailscopeError(
      `Only HTTPS URLs allowed: ${safeUrl}`,
      ErrorCode.NET_INSECURE_TRANSPORT,
      `Refusing to send a request over an insecure transport (${safeUrl}). Provider base URLs must use https://.`,
      { provider, url: safeUrl }
    );
  }
}

/**
 * Issue one POST with a JSON body and return the decoded JSON reply.
 *
 * Failures are classified uniformly across providers: non-2xx as
 * {@link ApiError}, transport problems and timeouts as {@link NetworkError},
 * a non-JSON body as PROVIDER_INVALID_ENCODING. Nothing is retried.
 */
export async function postJson(
  provider: ProviderId,
  request: ProviderHttpRequest,
  timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS
): Promise<unknown> {
  assertHttps(request.url, provider);

  let response: Response;
  let text: string;
  try {
    response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    text = await response.text();
  } catch (error) {
    throw new NetworkError(provider, error, timeoutMs);
  }

  if (!response.ok) {
    throw new ApiError(provider, response.status, text);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new FailscopeError(
      `Invalid JSON response: ${detail}`,
      ErrorCode.PROVIDER_INVALID_ENCODING,
      `The ${provider} API returned a response that is not valid JSON`,
      { provider, statusCode: response.status }
    );
  }
}
