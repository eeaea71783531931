import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveAgentConfig, loadAgentConfig } from '../agent-config.js';
import { AgentConfigError } from '../../errors.js';

describe('resolveAgentConfig', () => {
  it('should apply defaults', () => {
    expect(resolveAgentConfig({}, {})).toEqual({ memorySize: 1, logLevel: 'info' });
  });

  it('should read environment variables', () => {
    const config = resolveAgentConfig(
      {},
      { TABLETALK_MEMORY_SIZE: '4', TABLETALK_LOG_LEVEL: 'DEBUG' },
    );
    expect(config).toEqual({ memorySize: 4, logLevel: 'debug' });
  });

  it('should prefer explicit values over the environment', () => {
    const config = resolveAgentConfig(
      { memorySize: 2, logLevel: undefined },
      { TABLETALK_MEMORY_SIZE: '4', TABLETALK_LOG_LEVEL: 'warn' },
    );
    expect(config).toEqual({ memorySize: 2, logLevel: 'warn' });
  });

  it('should reject a non-numeric memory size from the environment', () => {
    expect(() => resolveAgentConfig({}, { TABLETALK_MEMORY_SIZE: 'lots' })).toThrow(
      AgentConfigError,
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => resolveAgentConfig({}, { TABLETALK_LOG_LEVEL: 'verbose' })).toThrow(
      AgentConfigError,
    );
  });

  it('should let an explicit log level override an invalid environment value', () => {
    const config = resolveAgentConfig({ logLevel: 'debug' }, { TABLETALK_LOG_LEVEL: 'verbose' });
    expect(config).toEqual({ memorySize: 1, logLevel: 'debug' });
  });

  it('should name the log level field when the environment value is invalid', () => {
    expect(() => resolveAgentConfig({}, { TABLETALK_LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid agent config (options): logLevel: ',
    );
  });

  it('should list the failing field in the message', () => {
    expect(() => resolveAgentConfig({ memorySize: 0 }, {})).toThrow(
      'Invalid agent config (options): memorySize: memorySize must be at least 1',
    );
  });
});

describe('loadAgentConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  function writeConfig(content: string): string {
    dir = mkdtempSync(join(tmpdir(), 'tabletalk-config-'));
    const file = join(dir, 'agent.yml');
    writeFileSync(file, content);
    return file;
  }

  it('should load a YAML file', async () => {
    const file = writeConfig('memorySize: 3\nlogLevel: warn\n');
    await expect(loadAgentConfig(file)).resolves.toEqual({ memorySize: 3, logLevel: 'warn' });
  });

  it('should treat an empty file as defaults', async () => {
    const file = writeConfig('');
    await expect(loadAgentConfig(file)).resolves.toEqual({ memorySize: 1, logLevel: 'info' });
  });

  it('should reject an invalid memory size', async () => {
    const file = writeConfig('memorySize: -2\n');
    await expect(loadAgentConfig(file)).rejects.toBeInstanceOf(AgentConfigError);
  });

  it('should reject a missing file', async () => {
    await expect(loadAgentConfig('/nonexistent/tabletalk/agent.yml')).rejects.toBeInstanceOf(
      AgentConfigError,
    );
  });
});
