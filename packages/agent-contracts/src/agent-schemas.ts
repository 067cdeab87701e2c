/**
 * Zod schemas for agent loop configuration and the tool-response protocol.
 *
 * Provides runtime validation for configs loaded from YAML and for the JSON
 * blocks tools print between <tool-response> tags.
 */

import { z } from 'zod';

/**
 * Decay parameters of the chunk score
 */
export const DecayConfigSchema = z.object({
  alpha: z.number().min(0).default(1),
  beta: z.number().min(0).default(0.5),
  gamma: z.number().min(0).lt(1, 'gamma must be in [0, 1)').default(0.9),
});

/**
 * Complete agent loop configuration schema
 */
export const AgentLoopConfigSchema = z.object({
  decay: DecayConfigSchema.default({}),
  scoreThreshold: z.number().min(0).default(0.05),
  maxConsecutiveInvalid: z.number().int().positive().default(3),
  stepLimit: z.number().int().nonnegative().default(50),
  modelTimeoutMs: z.number().int().positive().default(120_000),
  actionTimeoutMs: z.number().int().positive().default(120_000),
  propertyVocabulary: z.enum(['determinism', 'exploration']).default('determinism'),
  observationMaxLength: z.number().int().positive().default(5_000),
  nearbyWindowSize: z.number().int().positive().default(100),
});

export type AgentLoopConfig = z.infer<typeof AgentLoopConfigSchema>;
export type AgentLoopConfigInput = z.input<typeof AgentLoopConfigSchema>;

/**
 * A code location a tool asks to bring into the code context
 */
export const ToolCodeContextSchema = z.object({
  file_path: z.string().min(1),
  line_number: z.coerce.number().int().positive(),
});

/**
 * One <tool-response> block
 */
export const ToolResponseSchema = z.object({
  package_name: z.string().nullish(),
  output: z.string().nullish(),
  returncode: z.number().int().nullish(),
  code_context: z.array(z.unknown()).nullish(),
  status: z.string().nullish(),
});

export type ToolCodeContext = z.infer<typeof ToolCodeContextSchema>;
export type ToolResponse = z.infer<typeof ToolResponseSchema>;
