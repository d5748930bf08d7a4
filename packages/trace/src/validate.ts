import { isSeverity } from './events.js';
import type { TraceContext, TraceEvent, TraceValue } from './events.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult =
  | { ok: true; event: TraceEvent }
  | { ok: false; issues: ValidationIssue[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isTraceValue(value: unknown): value is TraceValue {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

function validateContext(value: unknown, issues: ValidationIssue[]): TraceContext | undefined {
  if (!isRecord(value)) {
    issues.push({ path: '.context', message: 'context must be an object' });
    return undefined;
  }
  const before = issues.length;
  for (const key of ['pc', 'contextId', 'tick'] as const) {
    if (!isIndex(value[key])) {
      issues.push({ path: `.context.${key}`, message: `${key} must be a non-negative integer` });
    }
  }
  if ('opcode' in value && !isIndex(value.opcode)) {
    issues.push({ path: '.context.opcode', message: 'opcode must be a non-negative integer' });
  }
  if ('mnemonic' in value && !isNonEmptyString(value.mnemonic)) {
    issues.push({ path: '.context.mnemonic', message: 'mnemonic must be a non-empty string' });
  }
  if (issues.length > before) return undefined;

  const context: { -readonly [K in keyof TraceContext]: TraceContext[K] } = {
    pc: Number(value.pc),
    contextId: Number(value.contextId),
    tick: Number(value.tick),
  };
  if (isIndex(value.opcode)) context.opcode = value.opcode;
  if (isNonEmptyString(value.mnemonic)) context.mnemonic = value.mnemonic;
  return context;
}

export function validateTraceEvent(value: unknown): ValidationResult {
  if (!isRecord(value)) {
    return { ok: false, issues: [{ path: '', message: 'event must be an object' }] };
  }

  const issues: ValidationIssue[] = [];
  const { index, type, severity, domain, message } = value;

  if (!isIndex(index)) issues.push({ path: '.index', message: 'index must be a non-negative integer' });
  if (!isNonEmptyString(type)) issues.push({ path: '.type', message: 'type must be a non-empty string' });
  if (!isSeverity(severity)) issues.push({ path: '.severity', message: 'severity must be debug, info, warn or error' });
  if (!isNonEmptyString(domain)) issues.push({ path: '.domain', message: 'domain must be a non-empty string' });
  if (typeof message !== 'string') issues.push({ path: '.message', message: 'message must be a string' });

  const context = validateContext(value.context, issues);

  let data: Record<string, TraceValue> | undefined;
  if ('data' in value) {
    if (!isRecord(value.data)) {
      issues.push({ path: '.data', message: 'data must be an object when provided' });
    } else {
      data = {};
      for (const [key, entry] of Object.entries(value.data)) {
        if (isTraceValue(entry)) data[key] = entry;
        else issues.push({ path: `.data.${key}`, message: 'data values must be strings, finite numbers or booleans' });
      }
    }
  }

  const allowedKeys = new Set(['index', 'type', 'severity', 'domain', 'message', 'context', 'data']);
  for (const key of Object.keys(value)) {
    if (!allowedKeys.has(key)) {
      issues.push({ path: `.${key}`, message: 'unexpected property' });
    }
  }

  if (
    issues.length > 0 ||
    !context ||
    !isIndex(index) ||
    !isNonEmptyString(type) ||
    !isSeverity(severity) ||
    !isNonEmptyString(domain) ||
    typeof message !== 'string'
  ) {
    return { ok: false, issues };
  }

  const event: TraceEvent = data
    ? { index, type, severity, domain, message, context, data }
    : { index, type, severity, domain, message, context };
  return { ok: true, event };
}
