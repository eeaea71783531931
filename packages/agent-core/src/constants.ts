/**
 * Agent core constants: single source of truth for tunable values.
 */

export const AGENT_MEMORY = {
  /** Turns kept when no memorySize is configured */
  defaultMemorySize: 1,
} as const;

export const AGENT_CLARIFICATION = {
  /**
   * Questions exposed to the caller. The model may return more; the raw text
   * in `message` is never truncated.
   */
  maxQuestions: 3,
} as const;

export const AGENT_ENV = {
  memorySize: 'TABLETALK_MEMORY_SIZE',
  logLevel: 'TABLETALK_LOG_LEVEL',
} as const;
