export type TraceSeverity = 'debug' | 'info' | 'warn' | 'error';

export const SEVERITY_ORDER: Readonly<Record<TraceSeverity, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const TRACE_SEVERITIES: readonly TraceSeverity[] = ['debug', 'info', 'warn', 'error'];

export type TraceValue = string | number | boolean;

/** Where in the program an event was raised. */
export interface TraceContext {
  readonly pc: number;
  readonly contextId: number;
  readonly tick: number;
  readonly opcode?: number;
  readonly mnemonic?: string;
}

export interface TraceEvent {
  /** Monotonic ordering index within the emitting session. */
  readonly index: number;
  readonly type: string;
  readonly severity: TraceSeverity;
  readonly domain: string;
  readonly message: string;
  readonly context: TraceContext;
  readonly data?: Readonly<Record<string, TraceValue>>;
}

export type TraceSink = (event: TraceEvent) => void;

export function isSeverity(value: unknown): value is TraceSeverity {
  return typeof value === 'string' && TRACE_SEVERITIES.some((s) => s === value);
}

export function atLeast(event: Pick<TraceEvent, 'severity'>, min: TraceSeverity): boolean {
  return SEVERITY_ORDER[event.severity] >= SEVERITY_ORDER[min];
}
