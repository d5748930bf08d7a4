import AjvModule from 'ajv';
import type { JSONSchemaType } from 'ajv';

import { ConfigError } from './errors.js';
import { envInteger, flag } from './util/env.js';

const Ajv = AjvModule.default;

export interface RegisterSizes {
  general: number;
  tensor: number;
  context: number;
}

export interface SessionConfig {
  agentId: number;
  /** Wall-clock budget per instruction handler, in milliseconds. */
  instructionTimeoutMs: number;
  /** Instruction budget for a single execute/resume call. */
  maxSteps: number;
  maxCallDepth: number;
  registers: RegisterSizes;
  traceStdout: boolean;
}

export type ConfigOverrides = Partial<Omit<SessionConfig, 'registers'>> & {
  registers?: Partial<RegisterSizes>;
};

export const DEFAULT_CONFIG: Readonly<SessionConfig> = Object.freeze({
  agentId: 0,
  instructionTimeoutMs: 50,
  maxSteps: 1_000_000,
  maxCallDepth: 256,
  registers: Object.freeze({ general: 16, tensor: 16, context: 8 }),
  traceStdout: false,
});

const bankSize = { type: 'integer', minimum: 1, maximum: 256 } as const;

export const sessionConfigSchema: JSONSchemaType<SessionConfig> = {
  $id: 'https://scrawl.dev/schema/session-config.json',
  type: 'object',
  additionalProperties: false,
  required: ['agentId', 'instructionTimeoutMs', 'maxSteps', 'maxCallDepth', 'registers', 'traceStdout'],
  properties: {
    agentId: { type: 'integer', minimum: 0, maximum: 0x7fffffff },
    instructionTimeoutMs: { type: 'number', exclusiveMinimum: 0 },
    maxSteps: { type: 'integer', minimum: 1 },
    maxCallDepth: { type: 'integer', minimum: 1 },
    registers: {
      type: 'object',
      additionalProperties: false,
      required: ['general', 'tensor', 'context'],
      properties: {
        general: bankSize,
        tensor: bankSize,
        context: bankSize,
      },
    },
    traceStdout: { type: 'boolean' },
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile(sessionConfigSchema);

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  const agentId = envInteger(env, 'SCRAWL_AGENT_ID');
  if (agentId !== undefined) out.agentId = agentId;
  const timeout = envInteger(env, 'SCRAWL_INSTRUCTION_TIMEOUT_MS');
  if (timeout !== undefined) out.instructionTimeoutMs = timeout;
  const maxSteps = envInteger(env, 'SCRAWL_MAX_STEPS');
  if (maxSteps !== undefined) out.maxSteps = maxSteps;
  if (env.SCRAWL_TRACE_STDOUT !== undefined) out.traceStdout = flag(env.SCRAWL_TRACE_STDOUT);
  return out;
}

/**
 * Resolves the effective session configuration: defaults, then environment, then explicit
 * overrides. Throws ConfigError when the merged result fails the schema.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const envOverrides = fromEnv(env);
  const merged: SessionConfig = {
    ...DEFAULT_CONFIG,
    ...envOverrides,
    ...overrides,
    registers: { ...DEFAULT_CONFIG.registers, ...overrides.registers },
  };
  if (!validate(merged)) {
    throw new ConfigError(ajv.errorsText(validate.errors, { dataVar: 'config' }));
  }
  return merged;
}
