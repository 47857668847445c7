import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, ErrorCode, FailscopeError } from '../errors.js';
import type { ProviderId } from '../providers/provider-types.js';
dotenv.config();
const ConfigSchema = z.object({
  ai: z.object({
    provider: z.string().optional(),
    model: z.string().optional(),
    apiKey: z.string().optional(),
    maxTokens: z.number().int().min(1).max(100000).default(1000),
  }),
  constraints: z.object({
    logExcerptChars: z.number().int().min(100).max(100000).default(5000),
  }),
  transport: z.object({
    timeout: z.number().int().min(1000).max(600000).default(120000),
  }),
  openai: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.url().default('https://api.openai.com/v1'),
  }),
  anthropic: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.url().default('https://api.anthropic.com/v1'),
  }),
  gemini: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.url().default('https://generativelanguage.googleapis.com/v1beta'),
  }),
  debug: z.object({
    enabled: z.boolean().default(false),
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('failscope'),
    version: z.string().default('0.1.0'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  AI_PROVIDER: 'ai.provider',
  AI_MODEL: 'ai.model',
  AI_MAX_TOKENS: 'ai.maxTokens',
  AI_ERROR_ANALYSIS_API_KEY: 'ai.apiKey',
  LOG_EXCERPT_CHARS: 'constraints.logExcerptChars',
  PROVIDER_TIMEOUT: 'transport.timeout',
  OPENAI_API_KEY: 'openai.apiKey',
  OPENAI_BASE_URL: 'openai.baseUrl',
  ANTHROPIC_API_KEY: 'anthropic.apiKey',
  ANTHROPIC_BASE_URL: 'anthropic.baseUrl',
  GEMINI_API_KEY: 'gemini.apiKey',
  GEMINI_BASE_URL: 'gemini.baseUrl',
  DEBUG_MODE: 'debug.enabled',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'ai.maxTokens': toNumber,
  'constraints.logExcerptChars': toNumber,
  'transport.timeout': toNumber,
  'debug.enabled': toBoolean,
  'debug.verbose': toBoolean,
};

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const [section, key] = dotPath.split('.');
  if (!section || !key) return;
  const target = obj[section];
  if (typeof target === 'object' && target !== null) {
    Reflect.set(target, key, value);
  }
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {
    ai: {},
    constraints: {},
    transport: {},
    openai: {},
    anthropic: {},
    gemini: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();

const PROVIDER_KEY_ENV: Record<ProviderId, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

/**
 * Look up the credential for a provider.
 *
 * Order: the env var named by `envVarOverride`, the provider's own key, then
 * the provider-agnostic `AI_ERROR_ANALYSIS_API_KEY`.
 */
export function resolveApiKey(
  provider: ProviderId,
  envVarOverride?: string,
  config: Config = CONFIG,
  env: NodeJS.ProcessEnv = process.env
): string {
  const overridden = envVarOverride ? env[envVarOverride] : undefined;
  const apiKey = overridden || config[provider].apiKey || config.ai.apiKey;
  if (!apiKey) {
    const hint = envVarOverride ?? PROVIDER_KEY_ENV[provider];
    throw new FailscopeError(
      `API key not found for ${provider}`,
      ErrorCode.AUTH_KEY_MISSING,
      `No ${provider} API key found. Set ${hint} (or AI_ERROR_ANALYSIS_API_KEY) in your environment or .env file.`,
      { provider, envVar: hint }
    );
  }
  return apiKey;
}
