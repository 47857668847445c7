import type { ExtractionMode, Severity } from '../analysis/analysis-types.js';

/**
 * Wire format written for CI consumers. Success and failure share one shape
 * so the persistence step never branches on the outcome.
 */
export interface StructuredAnalysisOutput {
  version: string; // Schema version
  status: 'success' | 'error';
  provider: string;
  model: string;
  analysis: {
    root_cause: string;
    suggested_fixes: string[];
    confidence: number; // 0-100
    severity: Severity;
  };
  metadata: {
    analysis_time: string; // e.g. "1.42s"
    tokens_used: number;
    estimated_cost_usd: number;
    cached: boolean;
    extraction?: ExtractionMode;
    timestamp: string; // ISO 8601
    error?: string;
    error_code?: string;
  };
}
