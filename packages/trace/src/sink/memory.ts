import { atLeast } from '../events.js';
import type { TraceEvent, TraceSeverity, TraceSink } from '../events.js';

export interface MemorySink {
  readonly sink: TraceSink;
  readonly size: number;
  /** Returns the buffered events and clears the buffer. */
  take(): TraceEvent[];
  peek(min?: TraceSeverity): TraceEvent[];
}

export function createMemorySink(limit = Number.POSITIVE_INFINITY): MemorySink {
  const log: TraceEvent[] = [];
  return {
    sink: (event) => {
      log.push(event);
      if (log.length > limit) log.shift();
    },
    get size() {
      return log.length;
    },
    take() {
      return log.splice(0, log.length);
    },
    peek(min) {
      return min === undefined ? log.slice() : log.filter((event) => atLeast(event, min));
    },
  };
}
