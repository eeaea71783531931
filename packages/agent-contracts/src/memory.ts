/**
 * @module @tabletalk/agent-contracts/memory
 * Conversation memory contracts.
 *
 * Memory is kept at turn granularity: one user message paired with the
 * assistant reply it produced. Eviction always removes a whole turn.
 */

/**
 * Who authored a memory entry.
 */
export type MemoryRole = 'user' | 'assistant';

/**
 * A single message held in conversation memory. Frozen once created.
 */
export interface MemoryEntry {
  readonly role: MemoryRole;
  readonly message: string;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}

/**
 * One question/answer exchange.
 *
 * `assistant` is missing while the turn is still open (user asked, no answer
 * recorded yet). `user` is missing only for an answer recorded with no
 * preceding question.
 */
export interface ConversationTurn {
  readonly user?: MemoryEntry;
  readonly assistant?: MemoryEntry;
}
