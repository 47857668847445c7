import { writeFileSync } from 'fs';
import type { AnalysisResult } from './analysis/analysis-types.js';
import type { StructuredAnalysisOutput } from './output/structured-output.js';
import { FailscopeError, ErrorCode, redactCredentials } from './errors.js';

export const OUTPUT_VERSION = '1.0.0';

/** Fixes reported when the analysis itself could not run. */
export const DEFAULT_FAILURE_FIXES: readonly string[] = [
  'Check AI provider configuration',
  'Verify API key and network connectivity',
  'Review error logs manually',
  'Contact DevOps team for assistance',
];

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Build the structured JSON record for a completed analysis. */
export function buildStructuredOutput(
  result: AnalysisResult,
  now: Date = new Date()
): StructuredAnalysisOutput {
  return {
    version: OUTPUT_VERSION,
    status: 'success',
    provider: result.provider,
    model: result.model,
    analysis: {
      root_cause: result.rootCause,
      suggested_fixes: [...result.suggestedFixes],
      confidence: result.confidence,
      severity: result.severity,
    },
    metadata: {
      analysis_time: formatSeconds(result.analysisTimeMs),
      tokens_used: result.tokensUsed,
      estimated_cost_usd: result.estimatedCostUsd,
      cached: result.cached,
      extraction: result.extraction,
      timestamp: now.toISOString(),
    },
  };
}

/**
 * Build the error-shaped record: confidence 0, severity high, the failure in
 * the root cause and a generic fixes list.
 */
export function buildErrorOutput(
  error: unknown,
  target: { provider: string; model?: string },
  options: { fixes?: readonly string[]; now?: Date } = {}
): StructuredAnalysisOutput {
  const failure = FailscopeError.fromError(error);
  const message = redactCredentials(failure.message);
  return {
    version: OUTPUT_VERSION,
    status: 'error',
    provider: target.provider,
    model: target.model ?? 'unknown',
    analysis: {
      root_cause: `AI analysis failed: ${message}`,
      suggested_fixes: [...(options.fixes ?? DEFAULT_FAILURE_FIXES)],
      confidence: 0,
      severity: 'high',
    },
    metadata: {
      analysis_time: formatSeconds(0),
      tokens_used: 0,
      estimated_cost_usd: 0,
      cached: false,
      timestamp: (options.now ?? new Date()).toISOString(),
      error: message,
      error_code: failure.code,
    },
  };
}

/** Render a markdown annotation for the CI build page. */
export function formatAnalysisAsMarkdown(output: StructuredAnalysisOutput): string {
  const lines: string[] = [];
  const { analysis, metadata } = output;

  lines.push(output.status === 'success' ? '### AI Error Analysis' : '### AI Error Analysis Failed');
  lines.push('');
  lines.push(`**Provider:** ${output.provider} (\`${output.model}\`)`);
  lines.push('');
  lines.push(`**Root cause:** ${analysis.root_cause}`);
  lines.push('');

  if (analysis.suggested_fixes.length > 0) {
    lines.push('**Suggested fixes:**');
    lines.push('');
    analysis.suggested_fixes.forEach((fix, i) => {
      lines.push(`${String(i + 1)}. ${fix}`);
    });
    lines.push('');
  }

  lines.push(
    `**Confidence:** ${String(analysis.confidence)}% | **Severity:** ${analysis.severity} | **Time:** ${metadata.analysis_time} | **Tokens:** ${String(metadata.tokens_used)}`
  );

  if (metadata.extraction === 'fallback') {
    lines.push('');
    lines.push('_The model reply did not follow the expected format; fixes above are generic._');
  }

  return lines.join('\n') + '\n';
}

export function writeOutputToFile(output: StructuredAnalysisOutput, filePath: string): void {
  try {
    writeFileSync(filePath, JSON.stringify(output, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new FailscopeError(
      `Failed to write output to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.IO_WRITE_FAILED,
      `Could not write the analysis result to ${filePath}`,
      { path: filePath }
    );
  }
}
