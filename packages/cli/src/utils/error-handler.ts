import { FailscopeError, ApiError, ErrorCode } from '@failscope/core';
import { Logger } from './cli-helpers.js';

function provideSuggestions(error: FailscopeError): void {
  const suggestions: Partial<Record<ErrorCode, string[]>> = {
    [ErrorCode.AUTH_KEY_MISSING]: [
      'Provide a key for the selected provider: OPENAI_API_KEY, ANTHROPIC_API_KEY or GEMINI_API_KEY',
      'AI_ERROR_ANALYSIS_API_KEY works for any provider',
      'Store the key in a .env file',
    ],
    [ErrorCode.CONFIG_UNKNOWN_PROVIDER]: [
      'Supported providers: openai, anthropic, gemini',
      'Run `failscope models` to list every provider and model',
    ],
    [ErrorCode.CONFIG_UNSUPPORTED_MODEL]: [
      'Run `failscope models --provider <id>` to list the supported models',
      'Omit --model to use the provider default',
    ],
    [ErrorCode.NET_INSECURE_TRANSPORT]: [
      'Provider base URLs must start with https://',
      'Check OPENAI_BASE_URL, ANTHROPIC_BASE_URL and GEMINI_BASE_URL',
    ],
    [ErrorCode.IO_FILE_NOT_FOUND]: [
      'Double-check the --input path',
      'Confirm file permissions allow reading',
    ],
    [ErrorCode.NET_ERROR]: [
      'Verify your network connection',
      'Review firewall or proxy rules',
      'Retry after a short wait',
    ],
    [ErrorCode.NET_TIMEOUT]: [
      'The provider did not answer in time',
      'Raise PROVIDER_TIMEOUT or reduce LOG_EXCERPT_CHARS',
    ],
    [ErrorCode.PROVIDER_RATE_LIMITED]: [
      'Pause for a few minutes, then retry',
      'Upgrading your API tier may help',
    ],
    [ErrorCode.PROVIDER_MALFORMED_ENVELOPE]: [
      'The provider answered with an unexpected response shape',
      'Check that the base URL points at the provider API itself',
    ],
  };
  let errorSuggestions = suggestions[error.code];
  if (error instanceof ApiError && (error.statusCode === 401 || error.statusCode === 403)) {
    errorSuggestions = [
      'The provider rejected the API key',
      'Regenerate the key and make sure it belongs to the selected provider',
    ];
  }
  if (errorSuggestions && errorSuggestions.length > 0) {
    console.error('\n💡 Hints:');
    errorSuggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

const SENSITIVE_KEYS = new Set([
  'token',
  'apikey',
  'api_key',
  'secret',
  'password',
  'authorization',
  'credential',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof FailscopeError) {
      Logger.fail(error.userMessage);
      if (Object.keys(error.context).length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of Object.entries(error.context)) {
          if (value !== undefined && value !== null) {
            console.error(`   ${key}: ${isSensitiveKey(key) ? '***REDACTED***' : String(value)}`);
          }
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof FailscopeError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.CONFIG_UNKNOWN_PROVIDER:
        case ErrorCode.CONFIG_UNSUPPORTED_MODEL:
        case ErrorCode.AUTH_KEY_MISSING:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_WRITE_FAILED:
          return 3;
        case ErrorCode.NET_ERROR:
        case ErrorCode.NET_TIMEOUT:
        case ErrorCode.NET_INSECURE_TRANSPORT:
        case ErrorCode.PROVIDER_HTTP_ERROR:
        case ErrorCode.PROVIDER_RATE_LIMITED:
        case ErrorCode.PROVIDER_INVALID_ENCODING:
        case ErrorCode.PROVIDER_MALFORMED_ENVELOPE:
          return 4;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
