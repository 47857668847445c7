import chalk from 'chalk';
import { SilentProgress } from '@failscope/core';
import type { ProgressReporter } from '@failscope/core';

export type OutputFormat = 'table' | 'json';

class ConsoleProgress implements ProgressReporter {
  section(title: string): void {
    console.log('\n' + chalk.bold.cyan(`── ${title} ──`));
  }
  start(message: string): void {
    console.log(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  }
}

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

function cellText(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '[object]';
}

export const OutputFormatter = {
  format(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    if (Array.isArray(data)) {
      return OutputFormatter.formatTable(
        data.filter((item): item is object => typeof item === 'object' && item !== null)
      );
    }
    return cellText(data);
  },
  formatTable(data: object[]): string {
    const firstRow = data[0];
    if (!firstRow) {
      return chalk.gray('No data to display');
    }
    const keys = Object.keys(firstRow);
    const headers = keys.map((key) => key.charAt(0).toUpperCase() + key.slice(1));
    const rows = data.map((row) => keys.map((key) => cellText(Reflect.get(row, key))));
    const widths = keys.map((_, i) =>
      Math.max(headers[i]?.length ?? 0, ...rows.map((cells) => cells[i]?.length ?? 0))
    );
    const header = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
    const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
    const body = rows.map((cells) => cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join(' | '));
    return [chalk.bold(header), chalk.gray(separator), ...body].join('\n');
  },
} as const;

export function createProgress(silent = false): ProgressReporter {
  return silent ? new SilentProgress() : new ConsoleProgress();
}
