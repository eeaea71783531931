export {
  ResponseParser,
  parseClarification,
  parseExplanation,
  MAX_CLARIFICATION_QUESTIONS,
} from './response-parser.js';
