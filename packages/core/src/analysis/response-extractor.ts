import { SEVERITIES } from './analysis-types.js';
import type { ExtractedAnalysis, Severity } from './analysis-types.js';

export const DEFAULT_CONFIDENCE = 50;
export const DEFAULT_SEVERITY: Severity = 'medium';
export const UNPARSEABLE_ROOT_CAUSE = 'Failed to parse AI response. Please check the logs.';

/** Used when a reply carries neither a root cause nor any fixes. */
export const DEFAULT_FALLBACK_FIXES: readonly string[] = [
  'Review the build log around the first reported error',
  'Re-run the failing step locally with verbose output enabled',
  'Check recent changes to dependencies, configuration and credentials',
  'Retry the analysis with a larger log excerpt or a different model',
];

export interface ExtractorOptions {
  fallbackFixes?: readonly string[];
}

// Labels match case-insensitively and tolerate markdown emphasis around the
// name, e.g. "**Root Cause:**" or "ROOT CAUSE**:". Without a colon a label
// only counts as a heading alone on its own line, e.g. "## Suggested Fixes".
const ROOT_CAUSE = 'ROOT\\s+CAUSE';
const FIXES = 'SUGGESTED\\s+FIX(?:ES)?';
const CONFIDENCE = 'CONFIDENCE';
const SEVERITY = 'SEVERITY';

const inlineLabel = (name: string): string => `${name}[*_]*\\s*:`;
const headingLabel = (name: string): string =>
  `[ \\t#*_]*${name}[*_]*[ \\t]*(?=\\r?\\n|$)`;
const label = (name: string): string =>
  `(?:${inlineLabel(name)}[*_]*|(?<=^|\\n)${headingLabel(name)})`;
const until = (...names: string[]): string =>
  `(?=${names.map((name) => `${inlineLabel(name)}|\\n${headingLabel(name)}`).join('|')}|$)`;

const ROOT_CAUSE_PATTERN = new RegExp(
  `${label(ROOT_CAUSE)}([\\s\\S]*?)${until(FIXES, CONFIDENCE, SEVERITY)}`,
  'i'
);
const FIXES_PATTERN = new RegExp(
  `${label(FIXES)}([\\s\\S]*?)${until(CONFIDENCE, SEVERITY, ROOT_CAUSE)}`,
  'i'
);
const CONFIDENCE_PATTERN = new RegExp(`${label(CONFIDENCE)}[\\s*_]*(-?\\d+)\\s*%?`, 'i');
const SEVERITY_PATTERN = new RegExp(`${label(SEVERITY)}[\\s*_]*(low|medium|high)\\b`, 'i');
const BULLET_PATTERN = /^[ \t]*(?:\d+[.)]|[-*])[ \t]*(.+)$/gm;

function stripDecoration(text: string): string {
  return text.replace(/^[\s*_#]+|[\s*_#]+$/g, '');
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export const ResponseExtractor = {
  /** Text after `ROOT CAUSE:` on one line, ending in a sentence terminator. Empty when absent. */
  extractRootCause(rawText: string): string {
    const match = ROOT_CAUSE_PATTERN.exec(rawText);
    if (!match?.[1]) return '';
    const rootCause = stripDecoration(match[1].replace(/\s+/g, ' '));
    if (!rootCause) return '';
    return /[.!?]$/.test(rootCause) ? rootCause : `${rootCause}.`;
  },

  /** Bulleted or numbered items under `SUGGESTED FIXES:`, in order. */
  extractFixes(rawText: string): string[] {
    const section = FIXES_PATTERN.exec(rawText)?.[1];
    if (!section) return [];
    return [...section.matchAll(BULLET_PATTERN)]
      .map((m) => (m[1] ?? '').trim())
      .filter((fix) => /[a-z0-9]/i.test(fix));
  },

  /** Integer after `CONFIDENCE:`, clamped to [0, 100]; 50 when absent. */
  extractConfidence(rawText: string): number {
    const digits = CONFIDENCE_PATTERN.exec(rawText)?.[1];
    if (digits === undefined) return DEFAULT_CONFIDENCE;
    return Math.min(100, Math.max(0, parseInt(digits, 10)));
  },

  /** low/medium/high after `SEVERITY:`; medium when absent. */
  extractSeverity(rawText: string): Severity {
    const value = SEVERITY_PATTERN.exec(rawText)?.[1]?.toLowerCase();
    return value !== undefined && isSeverity(value) ? value : DEFAULT_SEVERITY;
  },

  /**
   * Parse a free-text reply into the structured schema.
   *
   * Each field is scanned independently, so a missing or malformed section
   * never costs the others. Never throws: when neither a root cause nor a fix
   * is found, the first substantial line becomes the root cause and the
   * fallback fixes are used (`extraction: 'fallback'`).
   */
  extract(rawText: string, tokensUsed: number, options: ExtractorOptions = {}): ExtractedAnalysis {
    const rootCause = ResponseExtractor.extractRootCause(rawText);
    const suggestedFixes = ResponseExtractor.extractFixes(rawText);
    const confidence = ResponseExtractor.extractConfidence(rawText);
    const severity = ResponseExtractor.extractSeverity(rawText);

    if (!rootCause && suggestedFixes.length === 0) {
      const firstLine = rawText
        .split('\n')
        .map((line) => line.trim())
        .find((line) => [...line].length > 10);
      return {
        rootCause: firstLine ?? UNPARSEABLE_ROOT_CAUSE,
        suggestedFixes: [...(options.fallbackFixes ?? DEFAULT_FALLBACK_FIXES)],
        confidence,
        severity,
        tokensUsed,
        extraction: 'fallback',
      };
    }

    return {
      // Fixes alone are enough to skip the fallback, but the root cause is never left empty.
      rootCause: rootCause || UNPARSEABLE_ROOT_CAUSE,
      suggestedFixes,
      confidence,
      severity,
      tokensUsed,
      extraction: 'template',
    };
  },
} as const;
