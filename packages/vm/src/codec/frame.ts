import { CorruptFrameError, DecodeError, UnsupportedVersionError } from '../errors.js';
import type { IdentityBaseline } from '../identity/baseline.js';
import { DeltaCompressor } from '../identity/delta.js';
import type { DeltaOptions } from '../identity/delta.js';
import type { Instruction } from '../model/instruction.js';
import { CORE_TABLE } from '../opcodes/table.js';
import type { OpcodeTable } from '../opcodes/table.js';
import { crc32 } from './crc32.js';
import { decodePayload, encodePayload } from './payload.js';

export const MAGIC = Uint8Array.of(0x53, 0x43, 0x52, 0x57); // "SCRW"
export const FRAME_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 1;
export const HEADER_BYTES = 14;
export const CHECKSUM_BYTES = 4;
export const FRAME_OVERHEAD = HEADER_BYTES + CHECKSUM_BYTES;

export const FLAG_COMPRESSED = 0x01;

export interface FrameHeader {
  readonly version: number;
  readonly flags: number;
  readonly sequence: number;
  readonly payloadLength: number;
}

export interface RawFrame extends FrameHeader {
  readonly payload: Uint8Array;
  readonly checksum: number;
}

export interface DecodedFrame {
  readonly header: FrameHeader;
  readonly checksum: number;
  readonly compressed: boolean;
  readonly instructions: Instruction[];
}

export interface FrameCodecOptions extends DeltaOptions {
  table?: OpcodeTable;
  /** Compress on encode; required to decode a compressed frame. */
  baseline?: IdentityBaseline;
}

export interface EncodeFrameOptions extends FrameCodecOptions {
  sequence?: number;
}

/** Wraps raw payload bytes in a header and trailing checksum. */
export function writeFrame(payload: Uint8Array, sequence: number, flags = 0): Uint8Array {
  const frame = new Uint8Array(FRAME_OVERHEAD + payload.length);
  const view = new DataView(frame.buffer);
  frame.set(MAGIC, 0);
  frame[4] = FRAME_VERSION;
  frame[5] = flags & 0xff;
  view.setUint32(6, sequence >>> 0, true);
  view.setUint32(10, payload.length, true);
  frame.set(payload, HEADER_BYTES);
  view.setUint32(HEADER_BYTES + payload.length, crc32(frame, 0, HEADER_BYTES + payload.length), true);
  return frame;
}

/** Validates framing and checksum without touching the payload. */
export function readFrame(bytes: Uint8Array): RawFrame {
  if (bytes.length < FRAME_OVERHEAD) {
    throw new DecodeError(`frame of ${bytes.length} bytes is shorter than the ${FRAME_OVERHEAD}-byte minimum`, {
      length: bytes.length,
    });
  }
  for (let i = 0; i < MAGIC.length; i++) {
    if (bytes[i] !== MAGIC[i]) throw new DecodeError('bad frame magic', { offset: i });
  }
  const version = bytes[4];
  if (version === 0) throw new DecodeError('frame version 0 is invalid');
  if (version > MAX_SUPPORTED_VERSION) throw new UnsupportedVersionError(version, MAX_SUPPORTED_VERSION);

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const payloadLength = view.getUint32(10, true);
  if (payloadLength !== bytes.length - FRAME_OVERHEAD) {
    throw new DecodeError(`frame declares ${payloadLength} payload bytes, carries ${bytes.length - FRAME_OVERHEAD}`, {
      declared: payloadLength,
      actual: bytes.length - FRAME_OVERHEAD,
    });
  }
  const end = HEADER_BYTES + payloadLength;
  const checksum = view.getUint32(end, true);
  const actual = crc32(bytes, 0, end);
  if (checksum !== actual) throw new CorruptFrameError(checksum, actual);

  return {
    version,
    flags: bytes[5],
    sequence: view.getUint32(6, true),
    payloadLength,
    payload: bytes.slice(HEADER_BYTES, end),
    checksum,
  };
}

export function encodeFrame(instructions: readonly Instruction[], options: EncodeFrameOptions = {}): Uint8Array {
  let payload = encodePayload(instructions, options.table ?? CORE_TABLE);
  let flags = 0;
  if (options.baseline) {
    payload = new DeltaCompressor(options.baseline, options).compress(payload);
    flags |= FLAG_COMPRESSED;
  }
  return writeFrame(payload, options.sequence ?? 0, flags);
}

export function decodeFrame(bytes: Uint8Array, options: FrameCodecOptions = {}): DecodedFrame {
  const raw = readFrame(bytes);
  const compressed = (raw.flags & FLAG_COMPRESSED) !== 0;
  let payload = raw.payload;
  if (compressed) {
    if (!options.baseline) throw new DecodeError('frame is compressed but no baseline was supplied');
    payload = new DeltaCompressor(options.baseline, options).decompress(payload);
  }
  const { version, flags, sequence, payloadLength } = raw;
  return {
    header: { version, flags, sequence, payloadLength },
    checksum: raw.checksum,
    compressed,
    instructions: decodePayload(payload, options.table ?? CORE_TABLE),
  };
}

/** Cuts a concatenation of frames at the declared lengths. Each piece still needs decoding. */
export function splitFrames(stream: Uint8Array): Uint8Array[] {
  const out: Uint8Array[] = [];
  const view = new DataView(stream.buffer, stream.byteOffset, stream.byteLength);
  let at = 0;
  while (at < stream.length) {
    if (stream.length - at < HEADER_BYTES) {
      throw new DecodeError(`trailing ${stream.length - at} bytes do not hold a frame header`, { offset: at });
    }
    const size = FRAME_OVERHEAD + view.getUint32(at + 10, true);
    if (at + size > stream.length) {
      throw new DecodeError(`frame at offset ${at} runs past the end of the stream`, { offset: at, size });
    }
    out.push(stream.slice(at, at + size));
    at += size;
  }
  return out;
}

/** Stamps consecutive frames with an increasing u32 sequence id. */
export class FrameEncoder {
  private next: number;

  constructor(private readonly options: FrameCodecOptions & { startSequence?: number } = {}) {
    this.next = (options.startSequence ?? 0) >>> 0;
  }

  get sequence(): number {
    return this.next;
  }

  encode(instructions: readonly Instruction[]): Uint8Array {
    const frame = encodeFrame(instructions, { ...this.options, sequence: this.next });
    this.next = (this.next + 1) >>> 0;
    return frame;
  }
}

export class FrameDecoder {
  private last: number | null = null;

  constructor(private readonly options: FrameCodecOptions = {}) {}

  /** Sequence id of the last frame decoded, or null before the first. */
  get lastSequence(): number | null {
    return this.last;
  }

  decode(bytes: Uint8Array): DecodedFrame {
    const frame = decodeFrame(bytes, this.options);
    this.last = frame.header.sequence;
    return frame;
  }

  decodeStream(stream: Uint8Array): DecodedFrame[] {
    return splitFrames(stream).map((frame) => this.decode(frame));
  }
}
