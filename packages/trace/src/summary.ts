import type { TraceEvent, TraceSeverity } from './events.js';

export interface TraceSummary {
  total: number;
  by_severity: Record<TraceSeverity, number>;
  by_domain: Record<string, number>;
  by_type: Record<string, number>;
  contexts: number;
}

function toSortedObject(map: Map<string, number>): Record<string, number> {
  const entries = Array.from(map.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const output: Record<string, number> = {};
  for (const [key, value] of entries) {
    output[key] = value;
  }
  return output;
}

export function summarizeTrace(events: readonly TraceEvent[]): TraceSummary {
  const bySeverity: Record<TraceSeverity, number> = { debug: 0, info: 0, warn: 0, error: 0 };
  const byDomain = new Map<string, number>();
  const byType = new Map<string, number>();
  const contexts = new Set<number>();

  for (const event of events) {
    bySeverity[event.severity] += 1;
    byDomain.set(event.domain, (byDomain.get(event.domain) ?? 0) + 1);
    byType.set(event.type, (byType.get(event.type) ?? 0) + 1);
    contexts.add(event.context.contextId);
  }

  return {
    total: events.length,
    by_severity: bySeverity,
    by_domain: toSortedObject(byDomain),
    by_type: toSortedObject(byType),
    contexts: contexts.size,
  };
}
