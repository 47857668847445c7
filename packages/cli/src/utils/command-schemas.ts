import { z } from 'zod';

const OutputFormatSchema = z.enum(['table', 'json']);

export const AnalyzeOptionsSchema = z.object({
  provider: z.string({ error: 'Provide --provider or set AI_PROVIDER' }).min(1),
  model: z.string().min(1).optional(),
  maxTokens: z.coerce.number().int().min(1).max(100000),
  input: z.string().min(1),
  output: z.string().min(1),
  apiKeyEnv: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be an environment variable name')
    .optional(),
  annotation: z.string().min(1).optional(),
  format: z.enum(['console', 'json']).default('console'),
});
export type AnalyzeCommandOptions = z.infer<typeof AnalyzeOptionsSchema>;

/** The fields needed to record a failure when the full option set is invalid. */
export const FailureTargetSchema = z
  .object({
    output: z.string().min(1),
    annotation: z.string().min(1).optional(),
    provider: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
  })
  .loose();

export const ModelsOptionsSchema = z.object({
  provider: z.string().min(1).optional(),
  format: OutputFormatSchema.default('table'),
});
