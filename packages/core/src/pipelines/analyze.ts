import { performance } from 'node:perf_hooks';
import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import type { AnalysisRequest, AnalysisResult, BuildContext } from '../analysis/analysis-types.js';
import { PromptBuilder, DEFAULT_LOG_CHAR_BUDGET } from '../analysis/prompt-builder.js';
import { ResponseExtractor } from '../analysis/response-extractor.js';
import { createProviderClient } from '../providers/client-factory.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, postJson } from '../providers/http-transport.js';
import { ModelResolver } from '../providers/model-resolver.js';
import type { ProviderCatalog } from '../providers/provider-catalog.js';
import type { ProviderClient, ProviderModelEntry } from '../providers/provider-types.js';
import { FailscopeError, ErrorCode } from '../errors.js';
import { CONFIG } from '../utils/config.js';

function debugLog(msg: string, data?: unknown): void {
  if (CONFIG.debug.verbose) {
    console.error(`[AI] ${msg}`, data !== undefined ? JSON.stringify(data) : '');
  }
}

export interface AnalyzeOptions {
  provider: string;
  /** Model id or alias; the provider default when omitted. */
  model?: string;
  maxTokens: number;
  context: BuildContext;
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  logCharBudget?: number;
  /** Replaces the generic fixes used when the reply cannot be parsed. */
  fallbackFixes?: readonly string[];
  catalog?: ProviderCatalog;
}

export interface PreparedAnalysis {
  request: AnalysisRequest;
  entry: ProviderModelEntry;
  client: ProviderClient;
}

/**
 * Resolve the model, pick the client and render the prompt. Every
 * configuration error surfaces here, before any network activity.
 */
export function prepareAnalysis(options: AnalyzeOptions): PreparedAnalysis {
  if (!Number.isInteger(options.maxTokens) || options.maxTokens < 1) {
    throw new FailscopeError(
      `max tokens must be a positive integer, got ${String(options.maxTokens)}`,
      ErrorCode.INPUT_INVALID,
      'The max-tokens bound must be a positive integer',
      { maxTokens: options.maxTokens }
    );
  }

  const resolver = new ModelResolver(options.catalog);
  const { provider, entry } = resolver.resolveAndValidate(options.provider, options.model);
  const client = createProviderClient(
    provider,
    { apiKey: options.apiKey, baseUrl: options.baseUrl },
    resolver
  );
  const renderedPrompt = PromptBuilder.buildAnalysisPrompt(
    options.context,
    options.logCharBudget ?? DEFAULT_LOG_CHAR_BUDGET
  );

  return {
    request: { provider, modelId: entry.modelId, maxTokens: options.maxTokens, renderedPrompt },
    entry,
    client,
  };
}

/**
 * Analyze one build failure: resolve, prompt, call the provider once, extract.
 *
 * Errors from resolution or the provider call propagate unchanged; nothing is
 * retried or cached. A reply that cannot be parsed still yields a result, with
 * `extraction: 'fallback'`.
 */
export async function runAnalyze(
  options: AnalyzeOptions,
  progress?: ProgressReporter
): Promise<AnalysisResult> {
  const p = progress ?? new SilentProgress();

  p.section('Build Failure Analysis');
  p.start('Resolving provider configuration');
  const { request, entry, client } = prepareAnalysis(options);
  p.succeed(`Using ${request.provider} model ${request.modelId}`);

  const httpRequest = client.buildRequest(request.modelId, request.renderedPrompt, request.maxTokens);
  debugLog('request', {
    provider: request.provider,
    model: request.modelId,
    maxTokens: request.maxTokens,
    promptChars: request.renderedPrompt.length,
  });

  p.start(`Waiting for ${request.provider}`);
  const startedAt = performance.now();
  let envelope: unknown;
  try {
    envelope = await postJson(
      request.provider,
      httpRequest,
      options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    );
  } catch (error) {
    p.fail(`${request.provider} request failed`);
    throw error;
  }
  const analysisTimeMs = performance.now() - startedAt;
  const reply = client.extractReply(envelope);
  p.succeed(`Reply received (${String(reply.tokensUsed)} tokens)`);
  debugLog('raw reply (first 500 chars)', reply.rawText.slice(0, 500));

  const extracted = ResponseExtractor.extract(reply.rawText, reply.tokensUsed, {
    fallbackFixes: options.fallbackFixes,
  });
  if (extracted.extraction === 'fallback') {
    p.warn(
      `Reply did not follow the expected format; generic fixes were used (${ErrorCode.EXTRACTION_FALLBACK_USED})`
    );
  }

  const result: AnalysisResult = {
    provider: request.provider,
    model: request.modelId,
    rootCause: extracted.rootCause,
    suggestedFixes: Object.freeze([...extracted.suggestedFixes]),
    confidence: extracted.confidence,
    severity: extracted.severity,
    analysisTimeMs,
    tokensUsed: extracted.tokensUsed,
    estimatedCostUsd: estimateCost(extracted.tokensUsed, entry),
    cached: false,
    extraction: extracted.extraction,
  };
  return Object.freeze(result);
}

export function estimateCost(tokensUsed: number, entry: ProviderModelEntry): number {
  return Math.round((tokensUsed / 1000) * entry.costPer1kTokens * 1e6) / 1e6;
}
