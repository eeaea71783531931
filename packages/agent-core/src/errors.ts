/**
 * Errors raised by agent-core itself.
 *
 * Backend failures are never wrapped: they reach the caller as thrown.
 */

import type { ZodIssue } from 'zod';

/**
 * Invalid agent options or configuration file.
 */
export class AgentConfigError extends Error {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.name = 'AgentConfigError';
    this.issues = issues;
  }

  static fromIssues(source: string, issues: readonly ZodIssue[]): AgentConfigError {
    const details = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return new AgentConfigError(`Invalid agent config (${source}): ${details}`, issues);
  }
}

/**
 * Normalize anything thrown into an Error value.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {return value;}
  if (typeof value === 'string') {return new Error(value);}
  try {
    return new Error(JSON.stringify(value) ?? String(value));
  } catch {
    return new Error(String(value));
  }
}
