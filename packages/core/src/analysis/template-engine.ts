import { readFileSync } from 'fs';
import type { BuildFailurePromptVars } from './prompt-variables.js';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const templateCache = new Map<string, string>();

function loadTemplate(templateName: string): string {
  const cached = templateCache.get(templateName);
  if (cached !== undefined) return cached;
  const templatePath = join(__dirname, 'prompts', `${templateName}.md`);
  const template = readFileSync(templatePath, 'utf-8');
  templateCache.set(templateName, template);
  return template;
}

function resolveVariable(variables: object, path: string): unknown {
  return path
    .trim()
    .split('.')
    .reduce<unknown>(
      (obj, key) =>
        obj != null && typeof obj === 'object' && !Array.isArray(obj) && key in obj
          ? Reflect.get(obj, key)
          : undefined,
      variables
    );
}

function formatValue(value: unknown): string {
  switch (true) {
    case value === null || value === undefined:
      return '';
    case typeof value === 'string':
    case typeof value === 'number':
    case typeof value === 'boolean':
      return String(value);
    default:
      return JSON.stringify(value);
  }
}

function replaceVariables(template: string, variables: object): string {
  return template.replace(/\{\{([^}]+)\}\}/g, (_match: string, path: string) => {
    const value = resolveVariable(variables, path);
    return value === undefined ? '' : formatValue(value);
  });
}

/**
 * Simple template engine for replacing {{variable}} placeholders in markdown templates
 */
export const TemplateEngine = {
  loadBuildFailurePrompt(variables: BuildFailurePromptVars): string {
    const template = loadTemplate('build-failure-analysis');
    return replaceVariables(template, variables);
  },
} as const;
