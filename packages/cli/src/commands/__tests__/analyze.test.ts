import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ErrorCode, SilentProgress } from '@failscope/core';
import type { StructuredAnalysisOutput } from '@failscope/core';
import { createAnalyzeCommand, executeAnalyze } from '../analyze.js';
import type { AnalyzeCommandOptions } from '../../utils/command-schemas.js';

const REPLY = [
  'ROOT CAUSE: The git checkout failed because the deploy token has expired',
  'SUGGESTED FIXES:',
  '- Rotate the deploy token',
  '- Update the CI secret with the new token',
  'CONFIDENCE: 95%',
  'SEVERITY: high',
].join('\n');

function mockFetchResponse(body: string, status = 200) {
  return vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(body, { status }));
}

function readOutput(path: string): StructuredAnalysisOutput {
  const parsed: StructuredAnalysisOutput = JSON.parse(readFileSync(path, 'utf-8'));
  return parsed;
}

describe('executeAnalyze', () => {
  let dir: string;
  let options: AnalyzeCommandOptions;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'analyze-command-'));
    writeFileSync(
      join(dir, 'context.json'),
      JSON.stringify({
        build_info: { pipeline: 'deploy', branch: 'main', command: 'git fetch', exit_status: 128 },
        log_excerpt: 'fatal: unable to access repository: The requested URL returned error: 403',
      })
    );
    vi.stubEnv('CI_ANALYSIS_KEY', 'test-key');
    options = {
      provider: 'openai',
      maxTokens: 1000,
      input: join(dir, 'context.json'),
      output: join(dir, 'analysis.json'),
      apiKeyEnv: 'CI_ANALYSIS_KEY',
      format: 'console',
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the analysis and the annotation', async () => {
    const fetchSpy = mockFetchResponse(
      JSON.stringify({ choices: [{ message: { content: REPLY } }], usage: { total_tokens: 400 } })
    );
    const annotation = join(dir, 'annotation.md');

    const output = await executeAnalyze({ ...options, annotation }, new SilentProgress());

    expect(fetchSpy).toHaveBeenCalledWith(
      expect.stringMatching(/\/chat\/completions$/),
      expect.objectContaining({
        headers: { Authorization: 'Bearer test-key', 'Content-Type': 'application/json' },
      })
    );
    expect(output.status).toBe('success');
    expect(readOutput(options.output)).toEqual(output);
    expect(output.analysis).toEqual({
      root_cause: 'The git checkout failed because the deploy token has expired.',
      suggested_fixes: ['Rotate the deploy token', 'Update the CI secret with the new token'],
      confidence: 95,
      severity: 'high',
    });
    expect(output.metadata.tokens_used).toBe(400);
    expect(readFileSync(annotation, 'utf-8').split('\n')[0]).toBe('### AI Error Analysis');
  });

  it('writes an error record when the model is not supported', async () => {
    const fetchSpy = mockFetchResponse('{}');

    await expect(executeAnalyze({ ...options, model: 'gpt-1' }, new SilentProgress())).rejects.toMatchObject({
      code: ErrorCode.CONFIG_UNSUPPORTED_MODEL,
    });

    expect(fetchSpy).not.toHaveBeenCalled();
    const written = readOutput(options.output);
    expect(written.status).toBe('error');
    expect(written.model).toBe('gpt-1');
    expect(written.analysis.root_cause).toBe(
      "AI analysis failed: Unsupported model 'gpt-1' for provider 'openai'"
    );
    expect(written.metadata.error_code).toBe(ErrorCode.CONFIG_UNSUPPORTED_MODEL);
  });

  it('writes an error record when the provider rejects the key', async () => {
    mockFetchResponse('{"error":"invalid key"}', 401);

    await expect(executeAnalyze(options, new SilentProgress())).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_HTTP_ERROR,
    });

    expect(readOutput(options.output).metadata.error).toBe('HTTP 401: {"error":"invalid key"}');
  });

  it('rejects an input file that is not JSON', async () => {
    writeFileSync(options.input, 'not json');

    await expect(executeAnalyze(options, new SilentProgress())).rejects.toMatchObject({
      code: ErrorCode.INPUT_INVALID,
    });
    expect(readOutput(options.output).metadata.error_code).toBe(ErrorCode.INPUT_INVALID);
  });

  it('reports a missing input file', async () => {
    await expect(
      executeAnalyze({ ...options, input: join(dir, 'missing.json') }, new SilentProgress())
    ).rejects.toMatchObject({ code: ErrorCode.IO_FILE_NOT_FOUND });
  });
});

describe('analyze command', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'analyze-cli-'));
    writeFileSync(join(dir, 'context.json'), JSON.stringify({ log_excerpt: 'exit 1' }));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes an error record and exits 2 when the options are invalid', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const fetchSpy = vi.spyOn(globalThis, 'fetch');
    const output = join(dir, 'analysis.json');

    await expect(
      createAnalyzeCommand().parseAsync(
        ['--provider', 'openai', '--max-tokens', '0', '--input', join(dir, 'context.json'), '--output', output],
        { from: 'user' }
      )
    ).rejects.toThrow('process.exit');

    expect(exitSpy).toHaveBeenCalledWith(2);
    expect(fetchSpy).not.toHaveBeenCalled();
    const written = readOutput(output);
    expect(written.status).toBe('error');
    expect(written.provider).toBe('openai');
    expect(written.analysis.confidence).toBe(0);
    expect(written.analysis.severity).toBe('high');
    expect(written.metadata.error_code).toBe(ErrorCode.INPUT_INVALID);
    expect(written.analysis.root_cause).toMatch(
      /^AI analysis failed: Validation failed for command options:\n {2}1\. \[maxTokens\] /
    );
  });
});
