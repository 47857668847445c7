import { describe, it, expect } from 'vitest';
import {
  ResponseExtractor,
  DEFAULT_FALLBACK_FIXES,
  UNPARSEABLE_ROOT_CAUSE,
} from '../response-extractor.js';

const WELL_FORMED = [
  'ROOT CAUSE: The install step failed because package-lock.json is out of sync with package.json',
  '',
  'SUGGESTED FIXES:',
  '- Run npm install locally and commit the updated lock file',
  '- Switch the pipeline to npm ci once the lock file is in sync',
  '',
  'CONFIDENCE: 85%',
  'SEVERITY: high',
].join('\n');

describe('ResponseExtractor', () => {
  it('extracts every field of a well-formed reply', () => {
    expect(ResponseExtractor.extract(WELL_FORMED, 321)).toEqual({
      rootCause:
        'The install step failed because package-lock.json is out of sync with package.json.',
      suggestedFixes: [
        'Run npm install locally and commit the updated lock file',
        'Switch the pipeline to npm ci once the lock file is in sync',
      ],
      confidence: 85,
      severity: 'high',
      tokensUsed: 321,
      extraction: 'template',
    });
  });

  it('reads a compact reply whose root cause already ends a sentence', () => {
    const text =
      'ROOT CAUSE: Token expired.\nSUGGESTED FIXES:\n- Regenerate token\n- Check expiry\nCONFIDENCE: 85%\nSEVERITY: high';
    const result = ResponseExtractor.extract(text, 0);

    expect(result.rootCause).toBe('Token expired.');
    expect(result.suggestedFixes).toEqual(['Regenerate token', 'Check expiry']);
    expect(result.confidence).toBe(85);
    expect(result.severity).toBe('high');
  });

  it('joins a root cause that spans several lines', () => {
    const text = 'ROOT CAUSE: The test runner ran out\nof memory!\nSUGGESTED FIXES:\n- Raise the heap size';
    expect(ResponseExtractor.extractRootCause(text)).toBe('The test runner ran out of memory!');
  });

  it('accepts markdown decorated labels and numbered items', () => {
    const text = [
      '**Root Cause:** Docker daemon is not reachable from the build container',
      '**Suggested Fixes:**',
      '1. Start the Docker service on the agent',
      '2) Export DOCKER_HOST before the build step',
      '**Confidence:** 70%',
      '**Severity:** Medium',
    ].join('\n');

    const result = ResponseExtractor.extract(text, 0);

    expect(result.rootCause).toBe('Docker daemon is not reachable from the build container.');
    expect(result.suggestedFixes).toEqual([
      'Start the Docker service on the agent',
      'Export DOCKER_HOST before the build step',
    ]);
    expect(result.confidence).toBe(70);
    expect(result.severity).toBe('medium');
  });

  it('reads sections in any order', () => {
    const text = [
      'SEVERITY: low',
      'CONFIDENCE: 40%',
      'SUGGESTED FIXES:',
      '* Pin the Node.js version in the pipeline',
      'ROOT CAUSE: Node 22 removed an API the build script relies on.',
    ].join('\n');

    const result = ResponseExtractor.extract(text, 5);

    expect(result.rootCause).toBe('Node 22 removed an API the build script relies on.');
    expect(result.suggestedFixes).toEqual(['Pin the Node.js version in the pipeline']);
    expect(result.confidence).toBe(40);
    expect(result.severity).toBe('low');
    expect(result.extraction).toBe('template');
  });

  it('reads heading-style labels that stand on their own line', () => {
    const text = [
      'Root Cause',
      'The deploy token expired.',
      '',
      'Suggested Fixes',
      '- Rotate the token',
      '',
      'Confidence: 80%',
      'Severity: high',
    ].join('\n');

    expect(ResponseExtractor.extract(text, 0)).toEqual({
      rootCause: 'The deploy token expired.',
      suggestedFixes: ['Rotate the token'],
      confidence: 80,
      severity: 'high',
      tokensUsed: 0,
      extraction: 'template',
    });
  });

  it('reads markdown headings as labels', () => {
    const text = '## Root Cause\nThe runner disk is full\n\n## Suggested Fixes\n1. Prune old images\n';

    expect(ResponseExtractor.extractRootCause(text)).toBe('The runner disk is full.');
    expect(ResponseExtractor.extractFixes(text)).toEqual(['Prune old images']);
  });

  it('does not treat label words without a colon as labels', () => {
    const text = 'ROOT CAUSE: The severity of the outage is unclear\nSUGGESTED FIXES:\n- Re-run';
    expect(ResponseExtractor.extractRootCause(text)).toBe('The severity of the outage is unclear.');
  });

  describe('confidence', () => {
    it('clamps values above 100', () => {
      expect(ResponseExtractor.extractConfidence('CONFIDENCE: 150%')).toBe(100);
    });

    it('clamps negative values to 0', () => {
      expect(ResponseExtractor.extractConfidence('CONFIDENCE: -20%')).toBe(0);
    });

    it('defaults to 50 when missing or not numeric', () => {
      expect(ResponseExtractor.extractConfidence('no label here')).toBe(50);
      expect(ResponseExtractor.extractConfidence('CONFIDENCE: high')).toBe(50);
    });
  });

  describe('severity', () => {
    it('lowercases the value', () => {
      expect(ResponseExtractor.extractSeverity('SEVERITY: HIGH')).toBe('high');
    });

    it('defaults to medium for unknown values', () => {
      expect(ResponseExtractor.extractSeverity('SEVERITY: critical')).toBe('medium');
      expect(ResponseExtractor.extractSeverity('')).toBe('medium');
    });
  });

  describe('fixes', () => {
    it('skips items without any letters or digits', () => {
      expect(ResponseExtractor.extractFixes('SUGGESTED FIXES:\n- Clear the cache\n- ---\n-  ')).toEqual([
        'Clear the cache',
      ]);
    });

    it('returns an empty list when the section is missing', () => {
      expect(ResponseExtractor.extractFixes('ROOT CAUSE: x')).toEqual([]);
    });
  });

  describe('fallback', () => {
    it('uses the first substantial line and the generic fixes', () => {
      const result = ResponseExtractor.extract(
        'Hmm.\nThe compiler crashed while building the api module.\nSorry.',
        12
      );

      expect(result).toEqual({
        rootCause: 'The compiler crashed while building the api module.',
        suggestedFixes: [...DEFAULT_FALLBACK_FIXES],
        confidence: 50,
        severity: 'medium',
        tokensUsed: 12,
        extraction: 'fallback',
      });
    });

    it('counts characters rather than code units when picking the line', () => {
      const result = ResponseExtractor.extract('😀😀😀😀😀😀\nThe cache volume filled up.', 0);
      expect(result.rootCause).toBe('The cache volume filled up.');
    });

    it('reports an unparseable reply when no line is long enough', () => {
      const result = ResponseExtractor.extract('ok\nshort\n', 0);
      expect(result.rootCause).toBe(UNPARSEABLE_ROOT_CAUSE);
      expect(result.extraction).toBe('fallback');
    });

    it('uses caller supplied fallback fixes', () => {
      const result = ResponseExtractor.extract('', 0, { fallbackFixes: ['Ask the on-call engineer'] });
      expect(result.suggestedFixes).toEqual(['Ask the on-call engineer']);
    });

    it('keeps the extracted fixes when only the root cause is missing', () => {
      const result = ResponseExtractor.extract('SUGGESTED FIXES:\n- Clear the build cache', 0);
      expect(result.rootCause).toBe(UNPARSEABLE_ROOT_CAUSE);
      expect(result.suggestedFixes).toEqual(['Clear the build cache']);
      expect(result.extraction).toBe('template');
    });
  });
});
