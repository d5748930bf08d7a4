import { readFile } from 'node:fs/promises';

import type { TraceEvent } from './events.js';
import { validateTraceEvent } from './validate.js';
import type { ValidationIssue } from './validate.js';

export interface TraceIngestError {
  line: number;
  message: string;
  issues?: ValidationIssue[];
  raw?: string;
}

export interface TraceIngestResult {
  events: TraceEvent[];
  errors: TraceIngestError[];
}

function parseLine(line: string, lineNumber: number): { ok: true; event: TraceEvent } | { ok: false; error: TraceIngestError } {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    return {
      ok: false,
      error: {
        line: lineNumber,
        message: error instanceof Error ? error.message : 'invalid JSON',
        raw: line,
      },
    };
  }

  const result = validateTraceEvent(value);
  if (!result.ok) {
    return {
      ok: false,
      error: { line: lineNumber, message: 'validation failed', issues: result.issues, raw: line },
    };
  }
  return { ok: true, event: result.event };
}

export function ingestTraceText(content: string): TraceIngestResult {
  const lines = content.split(/\r?\n/);
  const events: TraceEvent[] = [];
  const errors: TraceIngestError[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === '') continue;
    const outcome = parseLine(line, i + 1);
    if (outcome.ok) {
      events.push(outcome.event);
    } else {
      errors.push(outcome.error);
    }
  }

  return { events, errors };
}

export async function ingestTraceFile(path: string): Promise<TraceIngestResult> {
  const content = await readFile(path, 'utf8');
  return ingestTraceText(content);
}
