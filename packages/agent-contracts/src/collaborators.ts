/**
 * @module @tabletalk/agent-contracts/collaborators
 * Narrow interfaces the agent talks to.
 *
 * The backend turns a natural-language query into an answer about the data.
 * The LLM turns a prompt into raw text. Neither is implemented here.
 */

/**
 * Shape the caller would like the backend answer in.
 */
export type OutputType = 'string' | 'number' | 'dataframe' | 'plot';

/**
 * What the model collaborator hands back: raw text, or an error value when the
 * call itself failed.
 */
export type ModelResult = string | Error;

export interface QueryContext {
  /** Transcript of the conversation so far (before the current query) */
  conversation: string;
  outputType?: OutputType;
}

/**
 * Executes queries against the tabular data.
 */
export interface IQueryBackend {
  /**
   * Answer a query. Rejects with a domain error when analysis or execution
   * fails; the agent surfaces that error unchanged.
   */
  execute(query: string, context: QueryContext): Promise<string>;

  /** Code that produced the most recent answer, if the backend keeps it */
  lastCodeExecuted?(): string | undefined;

  /** Short description of the loaded tables, used to ground clarification prompts */
  describeData?(): string | undefined;
}

/**
 * Sends a prompt to a language model.
 */
export interface ILLM {
  /**
   * May resolve to an `Error` value or reject; the agent treats both the same.
   */
  complete(prompt: string): Promise<ModelResult>;
}
