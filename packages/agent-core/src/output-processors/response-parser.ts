/**
 * ResponseParser — turns raw model output into typed results.
 *
 * Model output may be malformed, truncated, or carry more items than asked
 * for. Clarification parsing never throws: every failure becomes
 * `{ success: false }`.
 *
 * Explanation text is passed through untouched.
 */

import type { ClarificationResponse, ModelResult } from '@tabletalk/agent-contracts';
import { ClarificationQuestionsSchema } from '@tabletalk/agent-contracts';
import { AGENT_CLARIFICATION } from '../constants.js';

export const MAX_CLARIFICATION_QUESTIONS = AGENT_CLARIFICATION.maxQuestions;

function clarification(
  success: boolean,
  questions: readonly string[],
  message: string,
): ClarificationResponse {
  return Object.freeze({
    success,
    questions: Object.freeze([...questions]),
    message,
  });
}

function decodeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Decode a JSON array of strings. `message` keeps the raw text even when the
 * exposed list is cut to {@link MAX_CLARIFICATION_QUESTIONS}.
 */
export function parseClarification(raw: ModelResult): ClarificationResponse {
  if (raw instanceof Error) {
    return clarification(false, [], raw.message);
  }

  const decoded = ClarificationQuestionsSchema.safeParse(decodeJson(raw));
  if (!decoded.success) {
    return clarification(false, [], raw);
  }

  return clarification(true, decoded.data.slice(0, MAX_CLARIFICATION_QUESTIONS), raw);
}

/**
 * Pass-through: text comes back unchanged, an error value is re-thrown as is.
 */
export function parseExplanation(raw: ModelResult): string {
  if (raw instanceof Error) {
    throw raw;
  }
  return raw;
}

export class ResponseParser {
  parseClarification(raw: ModelResult): ClarificationResponse {
    return parseClarification(raw);
  }

  parseExplanation(raw: ModelResult): string {
    return parseExplanation(raw);
  }
}
