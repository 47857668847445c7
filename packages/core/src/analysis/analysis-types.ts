import type { ProviderId } from '../providers/provider-types.js';

export const SEVERITIES = ['low', 'medium', 'high'] as const;
export type Severity = (typeof SEVERITIES)[number];

/**
 * Build metadata and log text supplied by the caller. Read-only to the core.
 * Absent metadata renders as "unknown" in the prompt.
 */
export interface BuildContext {
  readonly pipeline?: string;
  readonly branch?: string;
  readonly command?: string;
  readonly exitStatus?: string | number;
  readonly phase?: string;
  readonly logExcerpt: string;
}

/** One prepared provider call. */
export interface AnalysisRequest {
  provider: ProviderId;
  modelId: string;
  maxTokens: number;
  renderedPrompt: string;
}

/** How the structured fields were obtained from the reply. */
export type ExtractionMode = 'template' | 'fallback';

/** Fields the extractor pulls out of a free-text reply. */
export interface ExtractedAnalysis {
  rootCause: string;
  suggestedFixes: string[];
  /** Integer in [0, 100]. */
  confidence: number;
  severity: Severity;
  tokensUsed: number;
  extraction: ExtractionMode;
}

/**
 * Durable output of one analysis.
 */
export interface AnalysisResult {
  readonly provider: ProviderId;
  readonly model: string;
  readonly rootCause: string;
  readonly suggestedFixes: readonly string[];
  readonly confidence: number;
  readonly severity: Severity;
  /** Wall-clock time spent on the provider call. */
  readonly analysisTimeMs: number;
  readonly tokensUsed: number;
  readonly estimatedCostUsd: number;
  /** Reserved; always false. */
  readonly cached: false;
  readonly extraction: ExtractionMode;
}
