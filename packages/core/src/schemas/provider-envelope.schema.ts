import { z } from 'zod';

// Only the reply path and the usage field are checked; everything else passes through.

export const OpenAIEnvelopeSchema = z
  .object({
    choices: z.tuple(
      [z.object({ message: z.object({ content: z.string() }).loose() }).loose()],
      z.unknown()
    ),
    usage: z.object({ total_tokens: z.number().optional() }).loose().optional(),
  })
  .loose();

export const AnthropicEnvelopeSchema = z
  .object({
    content: z.tuple([z.object({ text: z.string() }).loose()], z.unknown()),
    usage: z.object({ output_tokens: z.number().optional() }).loose().optional(),
  })
  .loose();

export const GeminiEnvelopeSchema = z
  .object({
    candidates: z.tuple(
      [
        z
          .object({
            content: z
              .object({
                parts: z.tuple([z.object({ text: z.string() }).loose()], z.unknown()),
              })
              .loose(),
          })
          .loose(),
      ],
      z.unknown()
    ),
    usageMetadata: z.object({ totalTokenCount: z.number().optional() }).loose().optional(),
  })
  .loose();
