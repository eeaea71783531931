/**
 * Conversational agent over tabular data.
 *
 * Owns one ConversationMemory for its lifetime. Queries go to the backend
 * collaborator; clarification and explanation requests go straight to the
 * LLM and through the response parser.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ backend, llm, memorySize: 5 });
 *
 * const answer = await agent.chat('Which country has the highest gdp?');
 * const { success, questions } = await agent.clarificationQuestions();
 * const explanation = await agent.explain();
 * ```
 */

import type {
  AgentConfigInput,
  ClarificationResponse,
  ILLM,
  ILogger,
  IQueryBackend,
  ModelResult,
  OutputType,
} from '@tabletalk/agent-contracts';
import { resolveAgentConfig, type ConfigEnv } from './config/index.js';
import { toError } from './errors.js';
import { ConsoleLogger } from './logging/index.js';
import { ConversationMemory } from './memory/index.js';
import { ResponseParser } from './output-processors/index.js';
import { TranscriptFormatter, buildClarificationPrompt, buildExplainPrompt } from './prompt/index.js';

export interface AgentOptions extends AgentConfigInput {
  backend: IQueryBackend;
  llm: ILLM;
  /** Defaults to a ConsoleLogger at the resolved log level */
  logger?: ILogger;
  /** Environment consulted for unset config values (default: process.env) */
  env?: ConfigEnv;
}

export interface ChatOptions {
  outputType?: OutputType;
}

export class Agent {
  private readonly backend: IQueryBackend;
  private readonly llm: ILLM;
  private readonly logger: ILogger;
  private readonly memory: ConversationMemory;
  private readonly formatter = new TranscriptFormatter();
  private readonly parser = new ResponseParser();

  constructor(options: AgentOptions) {
    const config = resolveAgentConfig(
      { memorySize: options.memorySize, logLevel: options.logLevel },
      options.env,
    );

    this.backend = options.backend;
    this.llm = options.llm;
    this.logger =
      options.logger ?? new ConsoleLogger({ minLevel: config.logLevel, component: 'tabletalk.agent' });
    this.memory = new ConversationMemory(config.memorySize);
  }

  /**
   * Answer a query and record the turn.
   *
   * Backend errors propagate unchanged and leave memory untouched.
   */
  async chat(query: string, options: ChatOptions = {}): Promise<string> {
    let answer: string;
    try {
      answer = await this.backend.execute(query, {
        conversation: this.getConversation(),
        outputType: options.outputType,
      });
    } catch (error) {
      this.logger.warn('Backend failed to answer query', { query, error: toError(error) });
      throw error;
    }

    // Both appends run in the same tick: no other call can observe half a turn
    this.memory.append('user', query);
    this.memory.append('assistant', answer);
    this.logger.debug('Turn recorded', { entries: this.memory.count() });

    return answer;
  }

  startNewConversation(): void {
    this.memory.clear();
    this.logger.debug('Conversation reset');
  }

  getConversation(): string {
    return this.formatter.render(this.memory.all());
  }

  getMemory(): ConversationMemory {
    return this.memory;
  }

  /**
   * Ask the model what it would need clarified. Never rejects: a failed call
   * or unusable output comes back as `success: false`.
   */
  async clarificationQuestions(query?: string): Promise<ClarificationResponse> {
    let result: ModelResult;
    try {
      const prompt = buildClarificationPrompt({
        conversation: this.getConversation(),
        query,
        dataDescription: this.backend.describeData?.(),
      });
      result = await this.callModel(prompt);
    } catch (error) {
      result = toError(error);
      this.logger.warn('Failed to build clarification prompt', { error: result });
    }

    const response = this.parser.parseClarification(result);
    this.logger.debug('Clarification questions', {
      success: response.success,
      raw: response.message,
    });
    return response;
  }

  /**
   * Explain how the last answer was produced. A model error rejects with the
   * same error value.
   */
  async explain(): Promise<string> {
    const prompt = buildExplainPrompt({
      conversation: this.getConversation(),
      lastCode: this.backend.lastCodeExecuted?.(),
    });

    const explanation = this.parser.parseExplanation(await this.callModel(prompt));
    this.logger.debug('Explanation', { explanation });
    return explanation;
  }

  private async callModel(prompt: string): Promise<ModelResult> {
    let result: ModelResult;
    try {
      result = await this.llm.complete(prompt);
    } catch (error) {
      result = toError(error);
    }

    if (result instanceof Error) {
      this.logger.warn('Model call failed', { error: result });
    }
    return result;
  }
}
