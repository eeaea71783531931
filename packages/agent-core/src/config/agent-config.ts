/**
 * Agent configuration loading.
 *
 * Sources, highest precedence first:
 *   1. values passed in code
 *   2. TABLETALK_MEMORY_SIZE / TABLETALK_LOG_LEVEL
 *   3. schema defaults
 *
 * `loadAgentConfig` reads the same shape from a YAML file.
 */

import { promises as fs } from 'node:fs';
import { parse as parseYAML } from 'yaml';
import { AgentConfigSchema, type AgentConfig, type AgentConfigInput } from '@tabletalk/agent-contracts';
import { AGENT_ENV } from '../constants.js';
import { AgentConfigError } from '../errors.js';

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Raw values from the environment. Validated only after explicit values are
 * merged over them, so an override can replace a bad environment value.
 */
function fromEnv(env: ConfigEnv): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  const memorySize = env[AGENT_ENV.memorySize];
  if (memorySize !== undefined && memorySize.trim() !== '') {
    // Number('abc') is NaN and fails validation below
    input.memorySize = Number(memorySize);
  }

  const logLevel = env[AGENT_ENV.logLevel];
  if (logLevel !== undefined && logLevel.trim() !== '') {
    input.logLevel = logLevel.trim().toLowerCase();
  }

  return input;
}

function validate(source: string, data: unknown): AgentConfig {
  const result = AgentConfigSchema.safeParse(data);
  if (!result.success) {
    throw AgentConfigError.fromIssues(source, result.error.issues);
  }
  return result.data;
}

/**
 * Merge explicit values over environment over defaults, then validate.
 */
export function resolveAgentConfig(
  overrides: AgentConfigInput = {},
  env: ConfigEnv = process.env,
): AgentConfig {
  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return validate('options', { ...fromEnv(env), ...explicit });
}

/**
 * Read and validate a YAML config file.
 */
export async function loadAgentConfig(path: string): Promise<AgentConfig> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new AgentConfigError(
      `Failed to read agent config ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let data: unknown;
  try {
    data = parseYAML(content);
  } catch (error) {
    throw new AgentConfigError(
      `Failed to parse agent config ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  // An empty file parses to null: treat it as "all defaults"
  return validate(path, data ?? {});
}
