export * from './errors.js';
export { DEFAULT_CONFIG, resolveConfig, sessionConfigSchema } from './config.js';
export type { ConfigOverrides, RegisterSizes, SessionConfig } from './config.js';

export * from './opcodes/index.js';
export { formatInstruction, ins, validateOperands } from './model/instruction.js';
export type { Instruction } from './model/instruction.js';

export { DTYPES, Tensor, broadcastIndex, shapeSize } from './registers/tensor.js';
export type { DType, TensorData } from './registers/tensor.js';
export { attend, matmul, scores, softmaxRows, transpose } from './registers/linalg.js';
export { RegisterFile } from './registers/file.js';
export type { ContextSnapshot, ContextValue, RegisterSnapshot, TensorSnapshot } from './registers/file.js';

export { crc32 } from './codec/crc32.js';
export { hash32 } from './canon/hash.js';
export { decodePayload, encodePayload, instructionSize } from './codec/payload.js';
export { decodeTensor, encodeTensor } from './codec/tensor.js';
export {
  FLAG_COMPRESSED,
  FRAME_OVERHEAD,
  FRAME_VERSION,
  FrameDecoder,
  FrameEncoder,
  MAGIC,
  MAX_SUPPORTED_VERSION,
  decodeFrame,
  encodeFrame,
  readFrame,
  splitFrames,
  writeFrame,
} from './codec/frame.js';
export type { DecodedFrame, EncodeFrameOptions, FrameCodecOptions, FrameHeader, RawFrame } from './codec/frame.js';

export { gnomonStep, identityHolds, mlIdentity } from './identity/algebra.js';
export type { MlIdentity } from './identity/algebra.js';
export { IdentityBaseline, MAX_DEPTH } from './identity/baseline.js';
export { DeltaChannel, DeltaCompressor, compress, decompress, isZeroMarker } from './identity/delta.js';
export type { DeltaOptions } from './identity/delta.js';
export { rleDecode, rleEncode } from './identity/rle.js';
export { IdentityHandshake } from './identity/handshake.js';

export { Session } from './vm/session.js';
export type {
  ExecutionResult,
  ExtensionOp,
  SessionOptions,
  SessionState,
  TraceSinkHandle,
  TrapInfo,
} from './vm/session.js';
export { ROUND_STATE_CODES } from './vm/consensus.js';
export type { ConsensusRound, RejectReason, RoundState, Vote } from './vm/consensus.js';
export type { ContextStatus, ContextView } from './vm/scheduler.js';
export type { StoredValue } from './vm/store.js';
export type { Handler, HandlerContext } from './vm/capabilities.js';
export type { PendingEvent, Stage } from './vm/stage.js';
