import { createWriteStream, mkdirSync } from 'node:fs';
import path from 'node:path';

import type { TraceEvent, TraceSink } from '../events.js';
import type { Predicate } from '../filters.js';

export type JsonlSink = {
  sink: TraceSink;
  close: () => Promise<void>;
};

export function stdoutSink(predicate?: Predicate): TraceSink {
  return (event: TraceEvent) => {
    if (predicate && !predicate(event)) return;
    process.stdout.write(`${JSON.stringify(event)}\n`);
  };
}

/** Opens a JSONL trace file; `-` or an empty path writes to stdout. */
export async function openJsonlSink(targetPath: string, predicate?: Predicate): Promise<JsonlSink> {
  if (targetPath === '-' || targetPath === '') {
    return {
      sink: stdoutSink(predicate),
      close: async () => {},
    };
  }
  const target = path.resolve(targetPath);
  mkdirSync(path.dirname(target), { recursive: true });
  const stream = createWriteStream(target, { flags: 'w' });
  await new Promise<void>((resolve, reject) => {
    stream.once('open', () => resolve());
    stream.once('error', reject);
  });
  let failure: Error | undefined;
  stream.on('error', (error: Error) => {
    failure = error;
  });
  return {
    sink: (event: TraceEvent) => {
      if (failure) throw failure;
      if (predicate && !predicate(event)) return;
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (failure) {
          reject(failure);
          return;
        }
        stream.once('error', reject);
        stream.end(() => resolve());
      }),
  };
}
