// Providers
export { PROVIDER_IDS } from './providers/provider-types.js';
export type {
  ProviderId,
  ProviderModelEntry,
  ProviderClient,
  ProviderClientConfig,
  ProviderHttpRequest,
  ProviderReply,
} from './providers/provider-types.js';
export {
  PROVIDER_CATALOG,
  createProviderCatalog,
  parseProviderId,
} from './providers/provider-catalog.js';
export type { ProviderCatalog } from './providers/provider-catalog.js';
export { ModelResolver } from './providers/model-resolver.js';
export type { ResolvedModel } from './providers/model-resolver.js';
export { createProviderClient } from './providers/client-factory.js';
export { OpenAIClient } from './providers/openai/client.js';
export { AnthropicClient } from './providers/anthropic/client.js';
export { GeminiClient } from './providers/gemini/client.js';
export { postJson, assertHttps, DEFAULT_REQUEST_TIMEOUT_MS } from './providers/http-transport.js';

// Analysis
export { SEVERITIES } from './analysis/analysis-types.js';
export type {
  AnalysisRequest,
  AnalysisResult,
  BuildContext,
  ExtractedAnalysis,
  ExtractionMode,
  Severity,
} from './analysis/analysis-types.js';
export { PromptBuilder, DEFAULT_LOG_CHAR_BUDGET } from './analysis/prompt-builder.js';
export {
  ResponseExtractor,
  DEFAULT_FALLBACK_FIXES,
  UNPARSEABLE_ROOT_CAUSE,
} from './analysis/response-extractor.js';
export type { ExtractorOptions } from './analysis/response-extractor.js';

// Schemas
export { BuildContextFileSchema, parseBuildContext } from './schemas/build-context.schema.js';
export type { BuildContextFile } from './schemas/build-context.schema.js';

// Pipelines (headless orchestration functions)
export { runAnalyze, prepareAnalysis, estimateCost } from './pipelines/analyze.js';
export type { AnalyzeOptions, PreparedAnalysis } from './pipelines/analyze.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';

// Output
export {
  buildStructuredOutput,
  buildErrorOutput,
  formatAnalysisAsMarkdown,
  writeOutputToFile,
  DEFAULT_FAILURE_FIXES,
  OUTPUT_VERSION,
} from './output.js';
export type { StructuredAnalysisOutput } from './output/structured-output.js';

// Config
export { CONFIG, createConfig, resolveApiKey } from './utils/config.js';
export type { Config } from './utils/config.js';

// Errors
export {
  FailscopeError,
  ConfigurationError,
  ApiError,
  NetworkError,
  ErrorCode,
  redactCredentials,
  MAX_ERROR_BODY_CHARS,
} from './errors.js';

// Validation (core utilities only)
export { validate, validateFilePath } from './utils/validation.js';
