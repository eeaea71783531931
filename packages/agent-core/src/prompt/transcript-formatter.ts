/**
 * Renders conversation memory as the Question/Answer transcript that prompts
 * and the backend read.
 *
 * Layout is fixed: one `Question: ...` or `Answer: ...` line per entry,
 * joined by a single newline, nothing before or after.
 */

import type { MemoryEntry, MemoryRole } from '@tabletalk/agent-contracts';

const LINE_PREFIX: Record<MemoryRole, string> = {
  user: 'Question',
  assistant: 'Answer',
};

export function renderTranscript(entries: readonly MemoryEntry[]): string {
  return entries.map((entry) => `${LINE_PREFIX[entry.role]}: ${entry.message}`).join('\n');
}

export class TranscriptFormatter {
  render(entries: readonly MemoryEntry[]): string {
    return renderTranscript(entries);
  }
}
