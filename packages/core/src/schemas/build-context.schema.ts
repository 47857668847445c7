import { z } from 'zod';
import type { BuildContext } from '../analysis/analysis-types.js';
import { validate } from '../utils/validation.js';

/** The context file a CI step hands to the analyzer. */
export const BuildContextFileSchema = z
  .object({
    build_info: z
      .object({
        pipeline: z.string().optional(),
        branch: z.string().optional(),
        command: z.string().optional(),
        exit_status: z.union([z.number(), z.string()]).optional(),
        phase: z.string().default('command'),
      })
      .loose()
      .default({ phase: 'command' }),
    log_excerpt: z.string().default(''),
  })
  .loose();

export type BuildContextFile = z.infer<typeof BuildContextFileSchema>;

/**
 * Validate a decoded context file and map it onto {@link BuildContext}.
 * @throws FailscopeError INPUT_INVALID
 */
export function parseBuildContext(data: unknown): BuildContext {
  const file = validate(BuildContextFileSchema, data, 'BuildContext');
  return {
    pipeline: file.build_info.pipeline,
    branch: file.build_info.branch,
    command: file.build_info.command,
    exitStatus: file.build_info.exit_status,
    phase: file.build_info.phase,
    logExcerpt: file.log_excerpt,
  };
}
