import { readFileSync, writeFileSync } from 'fs';
import { Command } from 'commander';
import {
  CONFIG,
  ErrorCode,
  FailscopeError,
  buildErrorOutput,
  buildStructuredOutput,
  formatAnalysisAsMarkdown,
  parseBuildContext,
  parseProviderId,
  resolveApiKey,
  runAnalyze,
  validate,
  validateFilePath,
  writeOutputToFile,
} from '@failscope/core';
import type { ProgressReporter, StructuredAnalysisOutput } from '@failscope/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { AnalyzeOptionsSchema, FailureTargetSchema } from '../utils/command-schemas.js';
import type { AnalyzeCommandOptions } from '../utils/command-schemas.js';
import { Logger, OutputFormatter, createProgress } from '../utils/cli-helpers.js';

function readContextFile(path: string): unknown {
  validateFilePath(path);
  const raw = readFileSync(path, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new FailscopeError(
      `Input context is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INPUT_INVALID,
      `Could not read ${path}: the file is not valid JSON`,
      { path }
    );
  }
}

function persist(
  output: StructuredAnalysisOutput,
  options: { output: string; annotation?: string }
): void {
  writeOutputToFile(output, options.output);
  if (options.annotation) {
    try {
      writeFileSync(options.annotation, formatAnalysisAsMarkdown(output), 'utf-8');
    } catch (error) {
      throw FailscopeError.fromError(
        error,
        ErrorCode.IO_WRITE_FAILED,
        `Could not write the annotation to ${options.annotation}`
      );
    }
  }
}

/**
 * Validate the raw commander options. When they are unusable but still name
 * an output file, the error-shaped record is written there before rethrowing.
 */
export function parseAnalyzeOptions(raw: unknown, progress: ProgressReporter): AnalyzeCommandOptions {
  try {
    return validate(AnalyzeOptionsSchema, raw, 'command options');
  } catch (error) {
    const target = FailureTargetSchema.safeParse(raw);
    if (target.success) {
      try {
        persist(
          buildErrorOutput(error, {
            provider: target.data.provider ?? 'unknown',
            model: target.data.model,
          }),
          target.data
        );
      } catch (writeError) {
        progress.fail(
          `Could not write the error record: ${writeError instanceof Error ? writeError.message : String(writeError)}`
        );
      }
    }
    throw error;
  }
}

/**
 * Read the context file, run one analysis and write its result. On failure the
 * error-shaped record is written to the same output path before rethrowing.
 */
export async function executeAnalyze(
  options: AnalyzeCommandOptions,
  progress: ProgressReporter
): Promise<StructuredAnalysisOutput> {
  try {
    const context = parseBuildContext(readContextFile(options.input));
    const provider = parseProviderId(options.provider);
    const apiKey = resolveApiKey(provider, options.apiKeyEnv);
    const result = await runAnalyze(
      {
        provider,
        model: options.model,
        maxTokens: options.maxTokens,
        context,
        apiKey,
        baseUrl: CONFIG[provider].baseUrl,
        timeoutMs: CONFIG.transport.timeout,
        logCharBudget: CONFIG.constraints.logExcerptChars,
      },
      progress
    );
    const output = buildStructuredOutput(result);
    persist(output, options);
    return output;
  } catch (error) {
    const output = buildErrorOutput(error, { provider: options.provider, model: options.model });
    try {
      persist(output, options);
    } catch (writeError) {
      progress.fail(
        `Could not write the error record: ${writeError instanceof Error ? writeError.message : String(writeError)}`
      );
    }
    throw error;
  }
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze a CI build failure with an AI provider')
    .option('--provider <id>', 'AI provider (openai, anthropic, gemini)', CONFIG.ai.provider)
    .option('--model <id>', 'Model to use (defaults to the provider default)', CONFIG.ai.model)
    .option('--max-tokens <n>', 'Upper bound on response tokens', String(CONFIG.ai.maxTokens))
    .requiredOption('--input <path>', 'Build context JSON file')
    .requiredOption('--output <path>', 'Where to write the analysis JSON')
    .option('--api-key-env <name>', 'Environment variable holding the API key')
    .option('--annotation <path>', 'Also write a markdown annotation to this file')
    .option('--format <format>', 'Result format (console, json)', 'console')
    .action(async (options: unknown) => {
      try {
        const validated = parseAnalyzeOptions(options, createProgress(false));
        const json = validated.format === 'json';
        const output = await executeAnalyze(validated, createProgress(json));

        if (json) {
          console.log(OutputFormatter.format(output, 'json'));
          return;
        }
        Logger.success(`Analysis completed using ${output.provider} ${output.model}`);
        Logger.info(
          `Confidence: ${String(output.analysis.confidence)}% | Severity: ${output.analysis.severity}`
        );
        Logger.info(
          `Analysis time: ${output.metadata.analysis_time} | Tokens: ${String(output.metadata.tokens_used)}`
        );
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
