/**
 * Builds the prompt that asks the model to explain how the last answer was
 * produced, in terms a non-technical reader can follow.
 */

export interface ExplainPromptInput {
  conversation: string;
  /** Code the backend ran for the last answer */
  lastCode?: string;
}

export function buildExplainPrompt(input: ExplainPromptInput): string {
  let prompt = 'This is the conversation so far:';
  prompt += `\n<conversation>\n${input.conversation}\n</conversation>`;

  if (input.lastCode) {
    prompt += `\n\nTo answer the last question, the following code was run:\n<code>\n${input.lastCode}\n</code>`;
  }

  prompt +=
    '\n\nExplain step by step how the last answer was obtained, for someone without a technical ' +
    'background. Do not mention code, libraries or other implementation details.';

  return prompt;
}
