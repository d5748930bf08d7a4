import { DecodeError, RLECorruptionError } from '../errors.js';

// Stream: tag u8, decoded length u32 LE, then tokens when tag is RUNS.
// Token control byte c: c < 0x80 → literal run of c+1 bytes; c ≥ 0x80 → next byte repeated c-0x80+3 times.
export const TAG_ZERO = 0x00;
export const TAG_RUNS = 0x01;
export const HEADER_BYTES = 5;

const MAX_LITERAL = 0x80;
const MIN_REPEAT = 3;
const MAX_REPEAT = 0x7f + MIN_REPEAT;

/** Longest stream either side accepts; encoding refuses what decoding would reject. */
export const MAX_DECODED_BYTES = 64 * 1024 * 1024;

function header(tag: number, length: number): number[] {
  return [tag, length & 0xff, (length >>> 8) & 0xff, (length >>> 16) & 0xff, (length >>> 24) & 0xff];
}

function runLength(bytes: Uint8Array, at: number): number {
  let n = 1;
  while (at + n < bytes.length && bytes[at + n] === bytes[at] && n < MAX_REPEAT) n++;
  return n;
}

export function rleEncode(bytes: Uint8Array, maxLength = MAX_DECODED_BYTES): Uint8Array {
  if (bytes.length > maxLength) {
    throw new DecodeError(`cannot encode ${bytes.length} bytes, limit is ${maxLength}`, { length: bytes.length, limit: maxLength });
  }
  if (bytes.every((b) => b === 0)) return Uint8Array.from(header(TAG_ZERO, bytes.length));

  const out = header(TAG_RUNS, bytes.length);
  let literal: number[] = [];
  const flush = (): void => {
    if (literal.length) {
      out.push(literal.length - 1, ...literal);
      literal = [];
    }
  };

  let i = 0;
  while (i < bytes.length) {
    const run = runLength(bytes, i);
    if (run >= MIN_REPEAT) {
      flush();
      out.push(0x80 + run - MIN_REPEAT, bytes[i]);
      i += run;
      continue;
    }
    literal.push(bytes[i]);
    i++;
    if (literal.length === MAX_LITERAL) flush();
  }
  flush();
  return Uint8Array.from(out);
}

export function rleDecode(stream: Uint8Array, maxLength = MAX_DECODED_BYTES): Uint8Array {
  if (stream.length < HEADER_BYTES) {
    throw new RLECorruptionError(`stream of ${stream.length} bytes is shorter than its header`);
  }
  const tag = stream[0];
  const length = (stream[1] | (stream[2] << 8) | (stream[3] << 16) | (stream[4] << 24)) >>> 0;
  if (length > maxLength) {
    throw new RLECorruptionError(`declared length ${length} exceeds limit ${maxLength}`, { length, maxLength });
  }
  if (tag === TAG_ZERO) {
    if (stream.length !== HEADER_BYTES) {
      throw new RLECorruptionError('zero marker carries trailing bytes', { extra: stream.length - HEADER_BYTES });
    }
    return new Uint8Array(length);
  }
  if (tag !== TAG_RUNS) throw new RLECorruptionError(`unknown stream tag 0x${tag.toString(16)}`, { tag });

  const out = new Uint8Array(length);
  let written = 0;
  let i = HEADER_BYTES;
  while (i < stream.length) {
    const control = stream[i++];
    if (control < 0x80) {
      const count = control + 1;
      if (i + count > stream.length) throw new RLECorruptionError('literal run truncated', { at: i - 1 });
      if (written + count > length) throw new RLECorruptionError('literal run overflows declared length', { at: i - 1 });
      out.set(stream.subarray(i, i + count), written);
      written += count;
      i += count;
    } else {
      const count = control - 0x80 + MIN_REPEAT;
      if (i >= stream.length) throw new RLECorruptionError('repeat run missing its value byte', { at: i - 1 });
      if (written + count > length) throw new RLECorruptionError('repeat run overflows declared length', { at: i - 1 });
      out.fill(stream[i], written, written + count);
      written += count;
      i++;
    }
  }
  if (written !== length) {
    throw new RLECorruptionError(`decoded ${written} bytes, header declares ${length}`, { written, length });
  }
  return out;
}
