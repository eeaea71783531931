import { describe, it, expect } from 'vitest';
import {
  parseClarification,
  parseExplanation,
  MAX_CLARIFICATION_QUESTIONS,
} from '../response-parser.js';

describe('parseClarification', () => {
  it('should decode a JSON array of strings', () => {
    const response = parseClarification('["a","b"]');

    expect(response.success).toBe(true);
    expect(response.questions).toEqual(['a', 'b']);
    expect(response.message).toBe('["a","b"]');
  });

  it('should cap questions at 3 but keep the raw message whole', () => {
    const raw = '["a","b","c","d"]';
    const response = parseClarification(raw);

    expect(MAX_CLARIFICATION_QUESTIONS).toBe(3);
    expect(response.success).toBe(true);
    expect(response.questions).toEqual(['a', 'b', 'c']);
    expect(response.message).toBe(raw);
  });

  it('should accept an empty array', () => {
    expect(parseClarification('[]')).toEqual({ success: true, questions: [], message: '[]' });
  });

  it.each([
    'not json',
    '{"question":"a"}',
    '[1, 2]',
    '["a", null]',
    '"a"',
    '',
    '["a", "b"',
  ])('should fail without throwing on %j', (raw) => {
    expect(parseClarification(raw)).toEqual({ success: false, questions: [], message: raw });
  });

  it('should turn an error value into a failed response', () => {
    const response = parseClarification(new Error('rate limited'));

    expect(response).toEqual({ success: false, questions: [], message: 'rate limited' });
  });

  it('should return a frozen response', () => {
    const response = parseClarification('["a"]');
    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.questions)).toBe(true);
  });
});

describe('parseExplanation', () => {
  it('should pass text through unchanged', () => {
    const text = '\n  First I matched names to salaries.\n  Then I picked the largest.  \n';
    expect(parseExplanation(text)).toBe(text);
  });

  it('should rethrow the same error value', () => {
    const error = new Error('model unavailable');
    expect(() => parseExplanation(error)).toThrow(error);
  });
});
