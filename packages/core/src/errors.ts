export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_UNKNOWN_PROVIDER = 'CONFIG_UNKNOWN_PROVIDER',
  CONFIG_UNSUPPORTED_MODEL = 'CONFIG_UNSUPPORTED_MODEL',
  AUTH_KEY_MISSING = 'AUTH_KEY_MISSING',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_WRITE_FAILED = 'IO_WRITE_FAILED',
  NET_ERROR = 'NET_ERROR',
  NET_TIMEOUT = 'NET_TIMEOUT',
  NET_INSECURE_TRANSPORT = 'NET_INSECURE_TRANSPORT',
  PROVIDER_HTTP_ERROR = 'PROVIDER_HTTP_ERROR',
  PROVIDER_RATE_LIMITED = 'PROVIDER_RATE_LIMITED',
  PROVIDER_INVALID_ENCODING = 'PROVIDER_INVALID_ENCODING',
  PROVIDER_MALFORMED_ENVELOPE = 'PROVIDER_MALFORMED_ENVELOPE',
  /** Degraded-quality signal; reported, never thrown. */
  EXTRACTION_FALLBACK_USED = 'EXTRACTION_FALLBACK_USED',
  INPUT_INVALID = 'INPUT_INVALID',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class FailscopeError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'FailscopeError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, FailscopeError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): FailscopeError {
    if (error instanceof FailscopeError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new FailscopeError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends FailscopeError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}

/** Longest slice of a provider error body that is kept on the error. */
export const MAX_ERROR_BODY_CHARS = 200;

const CREDENTIAL_PATTERNS: RegExp[] = [
  /([?&]key=)[^&\s"]+/gi,
  /(Bearer\s+)[A-Za-z0-9._~+/=-]+/g,
  /("?(?:api[_-]?key|x-api-key|authorization)"?\s*[:=]\s*"?)[^"\s,}]+/gi,
];

/** Strip anything that looks like a credential from text bound for logs. */
export function redactCredentials(text: string): string {
  return CREDENTIAL_PATTERNS.reduce(
    (acc, pattern) => acc.replace(pattern, '$1***REDACTED***'),
    text
  );
}

export class ApiError extends FailscopeError {
  public readonly statusCode: number;
  public readonly truncatedBody: string;
  public readonly isRateLimited: boolean;
  constructor(provider: string, statusCode: number, body: string) {
    const truncatedBody = redactCredentials(body.slice(0, MAX_ERROR_BODY_CHARS));
    const isRateLimited = statusCode === 429;
    const message = `HTTP ${String(statusCode)}: ${truncatedBody}${
      body.length > MAX_ERROR_BODY_CHARS ? '...' : ''
    }`;
    super(
      message,
      isRateLimited ? ErrorCode.PROVIDER_RATE_LIMITED : ErrorCode.PROVIDER_HTTP_ERROR,
      `Provider request failed: ${message}`,
      { provider, statusCode },
      isRateLimited
    );
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.truncatedBody = truncatedBody;
    this.isRateLimited = isRateLimited;
  }
}

/** Node's fetch reports every transport failure as "fetch failed"; the reason sits on `cause`. */
function describeCause(cause: unknown): string {
  if (!(cause instanceof Error)) return String(cause);
  const nested = cause.cause instanceof Error ? cause.cause.message : undefined;
  return nested && nested !== cause.message ? `${cause.message} (${nested})` : cause.message;
}

export class NetworkError extends FailscopeError {
  public readonly isTimeout: boolean;
  constructor(provider: string, cause: unknown, timeoutMs?: number) {
    const isTimeout =
      cause instanceof Error && (cause.name === 'TimeoutError' || cause.name === 'AbortError');
    const message = isTimeout
      ? `Network error: request timed out after ${String(timeoutMs ?? 0)}ms`
      : `Network error: ${redactCredentials(describeCause(cause))}`;
    super(
      message,
      isTimeout ? ErrorCode.NET_TIMEOUT : ErrorCode.NET_ERROR,
      message,
      {
        provider,
        timeoutMs,
        originalError: cause instanceof Error ? cause.name : undefined,
      },
      false,
      { cause }
    );
    this.name = 'NetworkError';
    this.isTimeout = isTimeout;
  }
}
