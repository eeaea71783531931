import { describe, it, expect } from 'vitest';
import { renderTranscript, TranscriptFormatter } from '../transcript-formatter.js';
import { ConversationMemory } from '../../memory/index.js';

describe('renderTranscript', () => {
  it('should render empty memory as an empty string', () => {
    expect(renderTranscript(new ConversationMemory(3).all())).toBe('');
  });

  it('should render one turn as a Question/Answer pair', () => {
    const memory = new ConversationMemory(3);
    memory.append('user', 'Q1');
    memory.append('assistant', 'A1');

    expect(renderTranscript(memory.all())).toBe('Question: Q1\nAnswer: A1');
  });

  it('should join turns with a single newline', () => {
    const memory = new ConversationMemory(3);
    memory.append('user', 'Q1');
    memory.append('assistant', 'A1');
    memory.append('user', 'Q2');
    memory.append('assistant', 'A2');

    expect(new TranscriptFormatter().render(memory.all())).toBe(
      'Question: Q1\nAnswer: A1\nQuestion: Q2\nAnswer: A2',
    );
  });

  it('should render an open turn without an answer line', () => {
    const memory = new ConversationMemory(3);
    memory.append('user', 'Q1');

    expect(renderTranscript(memory.all())).toBe('Question: Q1');
  });
});
