import { atLeast, isSeverity } from './events.js';
import type { TraceEvent } from './events.js';

export type Predicate = (event: TraceEvent) => boolean;

const TRUE: Predicate = () => true;

function matches(field: string, values: string[]): boolean {
  const positive = values.filter((val) => !val.startsWith('!'));
  const negative = values.filter((val) => val.startsWith('!')).map((val) => val.slice(1));
  const hit = (val: string): boolean => {
    if (val.endsWith('.*')) {
      return field.startsWith(val.slice(0, -1));
    }
    return field === val;
  };
  if (negative.some(hit)) return false;
  return positive.length === 0 || positive.some(hit);
}

/**
 * Builds a predicate from `key=value` filters. Keys: `severity`, `domain`, `type`, `mnemonic`,
 * and `min` (minimum severity). Values accept `a|b` alternatives, a `!` prefix for negation and
 * a trailing `.*` for prefix matches. Filters combine with AND.
 */
export function parseFilters(filters: readonly string[]): Predicate {
  const tests: Predicate[] = [];
  for (const raw of filters) {
    const [key, value] = raw.split('=', 2);
    if (!key || value == null) continue;
    const values = value.split('|');
    if (key === 'min') {
      const min = values[0];
      if (!isSeverity(min)) {
        throw new Error(`unknown severity in filter: ${raw}`);
      }
      tests.push((event) => atLeast(event, min));
    } else if (key === 'severity') {
      tests.push((event) => matches(event.severity, values));
    } else if (key === 'domain') {
      tests.push((event) => matches(event.domain, values));
    } else if (key === 'type') {
      tests.push((event) => matches(event.type, values));
    } else if (key === 'mnemonic') {
      tests.push((event) => matches(event.context.mnemonic ?? '', values));
    } else {
      throw new Error(`unknown filter key: ${key}`);
    }
  }
  if (tests.length === 0) {
    return TRUE;
  }
  return (event) => tests.every((test) => test(event));
}

export function filterEvents(events: readonly TraceEvent[], filters: readonly string[]): TraceEvent[] {
  const predicate = parseFilters(filters);
  return events.filter(predicate);
}
