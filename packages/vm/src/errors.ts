export type ErrorCode =
  | 'E_DECODE'
  | 'E_UNKNOWN_OPCODE'
  | 'E_REGISTER_RANGE'
  | 'E_SHAPE_MISMATCH'
  | 'E_CORRUPT_FRAME'
  | 'E_UNSUPPORTED_VERSION'
  | 'E_INSTRUCTION_TIMEOUT'
  | 'E_INVALID_TRANSITION'
  | 'E_RLE_CORRUPTION'
  | 'E_STACK_OVERFLOW'
  | 'E_CONFIG';

export type ErrorDetails = Readonly<Record<string, string | number | boolean>>;

/**
 * Base class for every error the runtime raises. The message is prefixed with the code so
 * `toThrowError('E_CORRUPT_FRAME')` style matching works on the text alone.
 */
export class ScrawlError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly explain: string,
    public readonly details?: ErrorDetails,
  ) {
    super(`${code}: ${explain}`);
    this.name = 'ScrawlError';
  }
}

export class DecodeError extends ScrawlError {
  constructor(explain: string, details?: ErrorDetails) {
    super('E_DECODE', explain, details);
    this.name = 'DecodeError';
  }
}

export class UnknownOpcodeError extends ScrawlError {
  constructor(public readonly opcode: number) {
    super('E_UNKNOWN_OPCODE', `unknown opcode 0x${opcode.toString(16).padStart(2, '0')}`, { opcode });
    this.name = 'UnknownOpcodeError';
  }
}

export class RegisterOutOfRangeError extends ScrawlError {
  constructor(bank: string, index: number, size: number) {
    super('E_REGISTER_RANGE', `${bank}${index} out of range (bank size ${size})`, { bank, index, size });
    this.name = 'RegisterOutOfRangeError';
  }
}

export class ShapeMismatchError extends ScrawlError {
  constructor(explain: string, details?: ErrorDetails) {
    super('E_SHAPE_MISMATCH', explain, details);
    this.name = 'ShapeMismatchError';
  }
}

export class CorruptFrameError extends ScrawlError {
  constructor(expected: number, actual: number) {
    super('E_CORRUPT_FRAME', `checksum mismatch: frame carries 0x${expected.toString(16)}, payload hashes to 0x${actual.toString(16)}`, { expected, actual });
    this.name = 'CorruptFrameError';
  }
}

export class UnsupportedVersionError extends ScrawlError {
  constructor(version: number, max: number) {
    super('E_UNSUPPORTED_VERSION', `frame version ${version} exceeds supported maximum ${max}`, { version, max });
    this.name = 'UnsupportedVersionError';
  }
}

export class InstructionTimeoutError extends ScrawlError {
  constructor(explain: string, details?: ErrorDetails) {
    super('E_INSTRUCTION_TIMEOUT', explain, details);
    this.name = 'InstructionTimeoutError';
  }
}

export class InvalidTransitionError extends ScrawlError {
  constructor(explain: string, details?: ErrorDetails) {
    super('E_INVALID_TRANSITION', explain, details);
    this.name = 'InvalidTransitionError';
  }
}

export class RLECorruptionError extends ScrawlError {
  constructor(explain: string, details?: ErrorDetails) {
    super('E_RLE_CORRUPTION', explain, details);
    this.name = 'RLECorruptionError';
  }
}

export class StackOverflowError extends ScrawlError {
  constructor(depth: number) {
    super('E_STACK_OVERFLOW', `call depth limit ${depth} exceeded`, { depth });
    this.name = 'StackOverflowError';
  }
}

export class ConfigError extends ScrawlError {
  constructor(explain: string) {
    super('E_CONFIG', explain);
    this.name = 'ConfigError';
  }
}

export function isScrawlError(error: unknown): error is ScrawlError {
  return error instanceof ScrawlError;
}
