/**
 * @tabletalk/agent-core/testing
 *
 * Mock collaborators for tests. Import from this sub-path, never from the main index.
 *
 * All helpers use vitest's `vi.fn()`, so vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type { ILLM, ILogger, IQueryBackend, ModelResult } from '@tabletalk/agent-contracts';

// ─── Logger mock ──────────────────────────────────────────────────────────────

export function makeLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─── LLM mock ─────────────────────────────────────────────────────────────────

/**
 * LLM that resolves every call to `output`. Override per call with
 * `llm.complete.mockResolvedValueOnce(...)`.
 */
export function makeLLM(output: ModelResult = '') {
  return {
    complete: vi.fn<(prompt: string) => Promise<ModelResult>>(async () => output),
  } satisfies ILLM;
}

// ─── Backend mock ─────────────────────────────────────────────────────────────

export interface MockBackendOptions {
  answer?: string;
  lastCode?: string;
  dataDescription?: string;
}

export function makeBackend(options: MockBackendOptions = {}) {
  return {
    execute: vi.fn<IQueryBackend['execute']>(async () => options.answer ?? ''),
    lastCodeExecuted: vi.fn(() => options.lastCode),
    describeData: vi.fn(() => options.dataDescription),
  } satisfies IQueryBackend;
}
