/**
 * @module @tabletalk/agent-contracts/clarification
 */

/**
 * Result of asking the model for clarification questions.
 *
 * `questions` is capped for display; `message` always carries the model's
 * untruncated text (or the error text on failure) for logging.
 */
export interface ClarificationResponse {
  readonly success: boolean;
  readonly questions: readonly string[];
  readonly message: string;
}
