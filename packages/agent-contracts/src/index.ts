// ============================================
// tabletalk - Type Contracts
// ============================================

// Conversation memory
export type { MemoryRole, MemoryEntry, ConversationTurn } from './memory.js';

// Clarification
export type { ClarificationResponse } from './clarification.js';

// Collaborators
export type {
  OutputType,
  ModelResult,
  QueryContext,
  IQueryBackend,
  ILLM,
} from './collaborators.js';

// Logging
export type { LogLevel, LogMeta, ILogger } from './logger.js';

// Configuration schemas
export {
  LogLevelSchema,
  MemorySizeSchema,
  AgentConfigSchema,
  ClarificationQuestionsSchema,
  type AgentConfig,
  type AgentConfigInput,
} from './agent-schemas.js';
