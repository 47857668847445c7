import type { BuildContext } from './analysis-types.js';
import { TemplateEngine } from './template-engine.js';

export const DEFAULT_LOG_CHAR_BUDGET = 5000;

const UNKNOWN = 'unknown';

function orUnknown(value: string | number | undefined): string {
  if (value === undefined) return UNKNOWN;
  const text = String(value).trim();
  return text === '' ? UNKNOWN : text;
}

export const PromptBuilder = {
  /**
   * First `budget` characters (code points, so surrogate pairs stay whole) of
   * the log. Applied even if the caller already truncated.
   */
  truncateLog(logExcerpt: string, budget = DEFAULT_LOG_CHAR_BUDGET): string {
    if (logExcerpt.length <= budget) return logExcerpt;
    return Array.from(logExcerpt).slice(0, Math.max(0, budget)).join('');
  },
  /**
   * Render the build-failure prompt. Output is a pure function of the inputs.
   */
  buildAnalysisPrompt(context: BuildContext, logCharBudget = DEFAULT_LOG_CHAR_BUDGET): string {
    return TemplateEngine.loadBuildFailurePrompt({
      build: {
        pipeline: orUnknown(context.pipeline),
        branch: orUnknown(context.branch),
        command: orUnknown(context.command),
        exitStatus: orUnknown(context.exitStatus),
        phase: orUnknown(context.phase),
      },
      logExcerpt: PromptBuilder.truncateLog(context.logExcerpt, logCharBudget),
      logCharBudget,
    });
  },
} as const;
