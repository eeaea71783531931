/**
 * ConversationMemory — fixed-capacity rolling log of question/answer turns.
 *
 * Capacity is counted in turns, not entries. A user entry opens a turn, the
 * next assistant entry closes it. When a new turn would push the count past
 * `memorySize`, the oldest turn is dropped as a whole, so the buffer never
 * holds a stray half of an evicted exchange.
 *
 * Invariant: `all().length <= 2 * memorySize` after every call.
 */

import type { ConversationTurn, MemoryEntry, MemoryRole } from '@tabletalk/agent-contracts';
import { MemorySizeSchema } from '@tabletalk/agent-contracts';
import { AGENT_MEMORY } from '../constants.js';
import { AgentConfigError } from '../errors.js';

interface MutableTurn {
  user?: MemoryEntry;
  assistant?: MemoryEntry;
}

export class ConversationMemory {
  readonly size: number;
  private turnsBuffer: MutableTurn[] = [];

  constructor(memorySize: number = AGENT_MEMORY.defaultMemorySize) {
    const parsed = MemorySizeSchema.safeParse(memorySize);
    if (!parsed.success) {
      throw AgentConfigError.fromIssues('memorySize', parsed.error.issues);
    }
    this.size = parsed.data;
  }

  /**
   * Record a message. Never fails.
   */
  append(role: MemoryRole, message: string): MemoryEntry {
    const entry: MemoryEntry = Object.freeze({
      role,
      message,
      timestamp: new Date().toISOString(),
    });

    const open = this.openTurn();
    if (role === 'assistant' && open) {
      open.assistant = entry;
      return entry;
    }

    // user entry, or an answer with no open question: starts a new turn
    this.turnsBuffer.push(role === 'user' ? { user: entry } : { assistant: entry });
    while (this.turnsBuffer.length > this.size) {
      this.turnsBuffer.shift();
    }
    return entry;
  }

  /**
   * Point-in-time snapshot of every entry, oldest first.
   */
  all(): readonly MemoryEntry[] {
    const entries: MemoryEntry[] = [];
    for (const turn of this.turnsBuffer) {
      if (turn.user) {entries.push(turn.user);}
      if (turn.assistant) {entries.push(turn.assistant);}
    }
    return entries;
  }

  /**
   * Point-in-time snapshot of turns, oldest first.
   */
  turns(): readonly ConversationTurn[] {
    return this.turnsBuffer.map((turn) => Object.freeze({ ...turn }));
  }

  last(): MemoryEntry | undefined {
    const turn = this.turnsBuffer[this.turnsBuffer.length - 1];
    return turn?.assistant ?? turn?.user;
  }

  count(): number {
    return this.all().length;
  }

  isEmpty(): boolean {
    return this.turnsBuffer.length === 0;
  }

  clear(): void {
    this.turnsBuffer = [];
  }

  private openTurn(): MutableTurn | undefined {
    const turn = this.turnsBuffer[this.turnsBuffer.length - 1];
    return turn && turn.user && !turn.assistant ? turn : undefined;
  }
}
