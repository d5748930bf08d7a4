import { describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG, resolveConfig } from '../src/config.js';
import { ConfigError, ScrawlError, isScrawlError } from '../src/errors.js';
import { envInteger, flag } from '../src/util/env.js';

describe('resolveConfig', () => {
  it('starts from the defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      agentId: 0,
      instructionTimeoutMs: 50,
      maxSteps: 1_000_000,
      maxCallDepth: 256,
      registers: { general: 16, tensor: 16, context: 8 },
      traceStdout: false,
    });
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads the environment', () => {
    const config = resolveConfig(
      {},
      {
        SCRAWL_AGENT_ID: '4',
        SCRAWL_INSTRUCTION_TIMEOUT_MS: '20',
        SCRAWL_MAX_STEPS: '100',
        SCRAWL_TRACE_STDOUT: 'true',
      },
    );
    expect(config).toMatchObject({ agentId: 4, instructionTimeoutMs: 20, maxSteps: 100, traceStdout: true });
  });

  it('lets explicit overrides win over the environment', () => {
    expect(resolveConfig({ agentId: 9 }, { SCRAWL_AGENT_ID: '4' }).agentId).toBe(9);
    expect(resolveConfig({ registers: { general: 32 } }, {}).registers).toEqual({ general: 32, tensor: 16, context: 8 });
  });

  it('names the offending field', () => {
    expect(() => resolveConfig({ maxSteps: 0 }, {})).toThrowError('E_CONFIG: config/maxSteps must be >= 1');
    expect(() => resolveConfig({ registers: { context: 300 } }, {})).toThrowError('config/registers/context must be <= 256');
  });

  it('rejects malformed environment values', () => {
    expect(() => resolveConfig({}, { SCRAWL_MAX_STEPS: 'lots' })).toThrowError(ConfigError);
  });
});

describe('env helpers', () => {
  it('parses flags', () => {
    expect(flag('1')).toBe(true);
    expect(flag('TRUE')).toBe(true);
    expect(flag('yes')).toBe(false);
    expect(flag(undefined)).toBe(false);
  });

  it('parses integers', () => {
    expect(envInteger({ N: '12' }, 'N')).toBe(12);
    expect(envInteger({ N: ' ' }, 'N')).toBeUndefined();
    expect(envInteger({}, 'N')).toBeUndefined();
    expect(envInteger({ N: '1.5' }, 'N')).toBeNaN();
  });
});

describe('errors', () => {
  it('prefix messages with their code', () => {
    const error = new ConfigError('bad');
    expect(error.message).toBe('E_CONFIG: bad');
    expect(error).toBeInstanceOf(ScrawlError);
    expect(isScrawlError(error)).toBe(true);
    expect(isScrawlError(new Error('bad'))).toBe(false);
  });
});
