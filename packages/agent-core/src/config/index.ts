export { resolveAgentConfig, loadAgentConfig, type ConfigEnv } from './agent-config.js';
