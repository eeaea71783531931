export { renderTranscript, TranscriptFormatter } from './transcript-formatter.js';
export {
  buildClarificationPrompt,
  type ClarificationPromptInput,
} from './clarification-prompt.js';
export { buildExplainPrompt, type ExplainPromptInput } from './explain-prompt.js';
