export { ConversationMemory } from './conversation-memory.js';
