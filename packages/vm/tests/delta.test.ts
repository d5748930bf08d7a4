import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { IdentityBaseline } from '../src/identity/baseline.js';
import { DeltaChannel, DeltaCompressor, compress, decompress, isZeroMarker } from '../src/identity/delta.js';
import { rleDecode, rleEncode } from '../src/identity/rle.js';

const u8 = (bytes: Uint8Array): number[] => Array.from(bytes);
const text = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('rle', () => {
  it('encodes repeats and literals', () => {
    expect(u8(rleEncode(Uint8Array.of(5, 5, 5, 5, 1, 2)))).toEqual([1, 6, 0, 0, 0, 0x81, 5, 1, 1, 2]);
    expect(u8(rleEncode(Uint8Array.of(9, 9)))).toEqual([1, 2, 0, 0, 0, 1, 9, 9]);
  });

  it('collapses all-zero input to a marker', () => {
    expect(u8(rleEncode(new Uint8Array(300)))).toEqual([0, 0x2c, 1, 0, 0]);
    expect(u8(rleEncode(new Uint8Array(0)))).toEqual([0, 0, 0, 0, 0]);
    expect(rleDecode(Uint8Array.of(0, 3, 0, 0, 0))).toEqual(new Uint8Array(3));
  });

  it('splits long repeats and literal runs at their limits', () => {
    expect(u8(rleEncode(new Uint8Array(300).fill(7)))).toEqual([1, 0x2c, 1, 0, 0, 0xff, 7, 0xff, 7, 0xa5, 7]);

    const distinct = Uint8Array.from({ length: 200 }, (_, i) => i);
    const encoded = rleEncode(distinct);
    expect(encoded).toHaveLength(5 + 1 + 128 + 1 + 72);
    expect(encoded[5]).toBe(127);
    expect(encoded[134]).toBe(71);
    expect(rleDecode(encoded)).toEqual(distinct);
  });

  it('round-trips any byte string', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 600 }), (bytes) => {
        expect(rleDecode(rleEncode(bytes))).toEqual(bytes);
      }),
    );
  });

  it('rejects malformed streams', () => {
    expect(() => rleDecode(Uint8Array.of(1, 0))).toThrowError('E_RLE_CORRUPTION: stream of 2 bytes is shorter than its header');
    expect(() => rleDecode(Uint8Array.of(2, 0, 0, 0, 0))).toThrowError('unknown stream tag 0x2');
    expect(() => rleDecode(Uint8Array.of(0, 1, 0, 0, 0, 0))).toThrowError('zero marker carries trailing bytes');
    expect(() => rleDecode(Uint8Array.of(1, 3, 0, 0, 0, 2, 1))).toThrowError('literal run truncated');
    expect(() => rleDecode(Uint8Array.of(1, 1, 0, 0, 0, 1, 1, 2))).toThrowError('literal run overflows declared length');
    expect(() => rleDecode(Uint8Array.of(1, 3, 0, 0, 0, 0x80))).toThrowError('repeat run missing its value byte');
    expect(() => rleDecode(Uint8Array.of(1, 2, 0, 0, 0, 0x80, 1))).toThrowError('repeat run overflows declared length');
    expect(() => rleDecode(Uint8Array.of(1, 4, 0, 0, 0, 0, 1))).toThrowError('decoded 1 bytes, header declares 4');
    expect(() => rleDecode(Uint8Array.of(0, 0xff, 0xff, 0xff, 0xff))).toThrowError('exceeds limit');
    expect(() => rleDecode(Uint8Array.of(0, 9, 0, 0, 0), 8)).toThrowError('declared length 9 exceeds limit 8');
  });

  it('refuses to encode what decoding would reject', () => {
    expect(() => rleEncode(new Uint8Array(9), 8)).toThrowError('E_DECODE: cannot encode 9 bytes, limit is 8');
    const full = new Uint8Array(8).fill(3);
    expect(rleDecode(rleEncode(full, 8), 8)).toEqual(full);
  });
});

describe('delta compression', () => {
  const baseline = IdentityBaseline.derive(0xbeef, 16);

  it('restores an agent state payload', () => {
    const payload = text('agent_position: x=100, y=200, health=95');
    const stream = compress(payload, baseline);
    expect(stream[0]).toBe(1);
    expect(decompress(stream, baseline)).toEqual(payload);
  });

  it('sends a zero marker when the payload equals the keystream', () => {
    const payload = baseline.keystream(12);
    const stream = compress(payload, baseline);
    expect(u8(stream)).toEqual([0, 12, 0, 0, 0]);
    expect(isZeroMarker(stream)).toBe(true);
    expect(decompress(stream, baseline)).toEqual(payload);
  });

  it('masks from the configured keystream offset', () => {
    const codec = new DeltaCompressor(baseline, { offset: 3 });
    expect(isZeroMarker(codec.compress(baseline.keystream(8, 3)))).toBe(true);
    expect(isZeroMarker(compress(baseline.keystream(8, 3), baseline))).toBe(false);
    expect(() => new DeltaCompressor(baseline, { offset: -1 })).toThrowError('keystream offset must be a non-negative integer');
  });

  it('needs the same baseline on both ends', () => {
    const payload = text('agent_position: x=100, y=200, health=95');
    const other = IdentityBaseline.derive(0xbeee, 16);
    expect(decompress(compress(payload, baseline), other)).not.toEqual(payload);
  });

  it('inverts for any payload, baseline and offset', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ maxLength: 256 }),
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.integer({ min: 1, max: 16 }),
        fc.nat({ max: 100 }),
        (payload, seed, depth, offset) => {
          const b = IdentityBaseline.derive(seed, depth);
          expect(decompress(compress(payload, b, { offset }), b, { offset })).toEqual(payload);
        },
      ),
    );
  });

  it('compresses the same payload to the same bytes', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ maxLength: 256 }),
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.integer({ min: 1, max: 16 }),
        fc.nat({ max: 100 }),
        (payload, seed, depth, offset) => {
          const first = compress(payload, IdentityBaseline.derive(seed, depth), { offset });
          const second = compress(payload, IdentityBaseline.derive(seed, depth), { offset });
          expect(second).toEqual(first);
        },
      ),
    );
  });

  it('propagates stream corruption', () => {
    expect(() => decompress(Uint8Array.of(7, 0, 0, 0, 0), baseline)).toThrowError('E_RLE_CORRUPTION');
  });
});

describe('DeltaChannel', () => {
  const baseline = IdentityBaseline.derive(42, 16);

  it('resends unchanged state as a 5-byte marker', () => {
    const sender = new DeltaChannel(baseline);
    const receiver = new DeltaChannel(baseline);
    const state = text('agent_position: x=100, y=200, health=95');

    expect(receiver.receive(sender.send(state))).toEqual(state);
    const again = sender.send(state);
    expect(u8(again)).toEqual([0, state.length, 0, 0, 0]);
    expect(receiver.receive(again)).toEqual(state);
  });

  it('follows payloads that change length', () => {
    const sender = new DeltaChannel(baseline);
    const receiver = new DeltaChannel(baseline);
    const updates = ['health=95', 'health=90, shield=10', 'dead'].map(text);
    for (const update of updates) expect(receiver.receive(sender.send(update))).toEqual(update);
  });

  it('starts over from the keystream after a reset', () => {
    const sender = new DeltaChannel(baseline);
    const state = baseline.keystream(8);
    expect(isZeroMarker(sender.send(state))).toBe(true);
    expect(isZeroMarker(sender.send(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8)))).toBe(false);
    sender.reset();
    expect(isZeroMarker(sender.send(state))).toBe(true);
  });
});
