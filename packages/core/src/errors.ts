import {
  COMPILE_TIME_ERROR_CODES,
  type ErrorLocation,
  NETQ_ERROR_CODES,
  type NetqErrorCode,
} from '@netq/types'

export abstract class NetqError extends Error {
  abstract readonly code: NetqErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }

  /** Compile-time errors describe an invalid program and are never retried */
  get isCompileTime(): boolean {
    return COMPILE_TIME_ERROR_CODES.includes(this.code)
  }
}

/** Malformed bytes or text, or an instruction whose operands do not fit its shape */
export class EncodingError extends NetqError {
  readonly code = NETQ_ERROR_CODES.INVALID_ENCODING
}

/** Register, array or label budget / uniqueness violation */
export class LayoutError extends NetqError {
  readonly code = NETQ_ERROR_CODES.LAYOUT
}

/** Invalid operation sequence, e.g. use of a freed qubit */
export class CompileError extends NetqError {
  readonly code = NETQ_ERROR_CODES.COMPILE
}

export class UnsupportedOperationError extends NetqError {
  readonly code = NETQ_ERROR_CODES.UNSUPPORTED_OPERATION
}

/**
 * Runtime fault. Handlers throw it without a location; the engine fills in
 * the instruction index and host line before reporting it.
 */
export class ExecutionError extends NetqError {
  readonly code: NetqErrorCode = NETQ_ERROR_CODES.EXECUTION
  instructionIndex: number | null = null
  hostLine: number | null = null

  locate(location: ErrorLocation): this {
    this.instructionIndex = location.instructionIndex
    this.hostLine = location.hostLine
    return this
  }

  get location(): ErrorLocation | null {
    if (this.instructionIndex === null) return null
    return { instructionIndex: this.instructionIndex, hostLine: this.hostLine }
  }
}

/** Register, array or qubit access outside its bounds */
export class AddressError extends ExecutionError {
  override readonly code: NetqErrorCode = NETQ_ERROR_CODES.ADDRESS
}

/** Cancelled through an abort signal while running */
export class AbortedError extends NetqError {
  readonly code = NETQ_ERROR_CODES.ABORTED
}

/** A future was read before its subroutine completed */
export class NotYetAvailableError extends NetqError {
  readonly code = NETQ_ERROR_CODES.NOT_YET_AVAILABLE
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
