/**
 * @tabletalk/agent-core
 *
 * Conversational session layer: bounded memory, transcript rendering,
 * model output parsing, and the Agent that ties them together.
 */

export { Agent, type AgentOptions, type ChatOptions } from './agent.js';
export * from './constants.js';
export { AgentConfigError, toError } from './errors.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Memory
export * from './memory/index.js';

// Prompt construction
export * from './prompt/index.js';

// Model output parsing
export * from './output-processors/index.js';
