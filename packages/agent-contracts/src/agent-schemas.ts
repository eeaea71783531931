/**
 * Zod Schemas for Agent Configuration Validation
 *
 * Provides runtime validation for agent configs loaded from YAML,
 * environment variables, or passed in code.
 */

import { z } from 'zod';

/**
 * Log level schema
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Memory size schema: capacity in turns (one turn = question + answer)
 */
export const MemorySizeSchema = z
  .number()
  .int('memorySize must be an integer')
  .positive('memorySize must be at least 1');

/**
 * Complete agent configuration schema
 */
export const AgentConfigSchema = z.object({
  memorySize: MemorySizeSchema.default(1),
  logLevel: LogLevelSchema.default('info'),
});

/**
 * Clarification payload schema: the model must answer with a JSON array of strings
 */
export const ClarificationQuestionsSchema = z.array(z.string());

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
