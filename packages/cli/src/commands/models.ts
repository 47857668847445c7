import { Command } from 'commander';
import { PROVIDER_CATALOG, parseProviderId, validate } from '@failscope/core';
import type { ProviderModelEntry } from '@failscope/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ModelsOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter } from '../utils/cli-helpers.js';

export interface ModelRow {
  provider: string;
  model: string;
  endpoint: string;
  maxOutputTokens: number;
  costPer1k: number;
  default: boolean;
}

export function listModels(provider?: string): ModelRow[] {
  const entries: readonly ProviderModelEntry[] = provider
    ? PROVIDER_CATALOG.lookup(parseProviderId(provider))
    : PROVIDER_CATALOG.entries();
  return entries.map((entry) => ({
    provider: entry.provider,
    model: entry.modelId,
    endpoint: entry.endpointPath,
    maxOutputTokens: entry.maxOutputTokens,
    costPer1k: entry.costPer1kTokens,
    default: PROVIDER_CATALOG.defaultModel(entry.provider) === entry.modelId,
  }));
}

export function createModelsCommand(): Command {
  return new Command('models')
    .description('List the supported providers and models')
    .option('--provider <id>', 'Only list models for this provider')
    .option('--format <format>', 'Result format (table, json)', 'table')
    .action((options: unknown) => {
      try {
        const validated = validate(ModelsOptionsSchema, options, 'command options');
        console.log(OutputFormatter.format(listModels(validated.provider), validated.format));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
