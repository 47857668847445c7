#!/usr/bin/env node
import { Command } from 'commander';
import { CONFIG } from '@failscope/core';
import { Logger } from './utils/cli-helpers.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createModelsCommand } from './commands/models.js';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down gracefully...`);
    process.exit(0);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

setupSignalHandlers();

const program = new Command();
program
  .name(CONFIG.app.name)
  .description('AI-assisted root-cause analysis for CI build failures')
  .version(CONFIG.app.version);

program.addCommand(createAnalyzeCommand());
program.addCommand(createModelsCommand());

await program.parseAsync();
