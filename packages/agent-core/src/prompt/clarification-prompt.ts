/**
 * Builds the prompt that asks the model for clarification questions.
 *
 * Pure string assembly. The model is told to answer with a bare JSON array
 * so the response parser can decode it without extraction heuristics.
 */

import { AGENT_CLARIFICATION } from '../constants.js';

export interface ClarificationPromptInput {
  /** Rendered transcript (may be empty) */
  conversation: string;
  /** Query to clarify; defaults to the latest question in the transcript */
  query?: string;
  /** Description of the loaded tables, if the backend provides one */
  dataDescription?: string;
}

export function buildClarificationPrompt(input: ClarificationPromptInput): string {
  let prompt =
    'You help a user ask questions about tabular data. Before the question is answered, ' +
    'decide whether it is ambiguous and what a senior data analyst would ask to clear it up.';

  if (input.dataDescription) {
    prompt += `\n\n<data>\n${input.dataDescription}\n</data>`;
  }

  if (input.conversation) {
    prompt += `\n\n<conversation>\n${input.conversation}\n</conversation>`;
  }

  const target = input.query
    ? `the query: ${input.query}`
    : 'the latest question in the conversation';

  prompt +=
    `\n\nFind the clarification questions worth asking about ${target}\n` +
    '- Only ask questions when the query is unclear or ambiguous.\n' +
    `- Return at most ${AGENT_CLARIFICATION.maxQuestions} questions.\n` +
    '- If nothing needs clarifying, return an empty array.\n' +
    '- Respond with a JSON array of strings and nothing else, e.g. ["question 1", "question 2"]';

  return prompt;
}
