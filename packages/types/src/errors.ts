/**
 * Error codes
 *
 * One code per failure category. Compile-time categories indicate an invalid
 * program and are never retried; execution-time categories are surfaced to
 * the host with the failing instruction index.
 */
export const NETQ_ERROR_CODES = {
  INVALID_ENCODING: 'invalid_encoding',
  LAYOUT: 'layout',
  COMPILE: 'compile',
  UNSUPPORTED_OPERATION: 'unsupported_operation',
  EXECUTION: 'execution',
  ADDRESS: 'address',
  ABORTED: 'aborted',
  NOT_YET_AVAILABLE: 'not_yet_available',
} as const

export type NetqErrorCode =
  (typeof NETQ_ERROR_CODES)[keyof typeof NETQ_ERROR_CODES]

/** Codes raised before a subroutine ever reaches the execution engine */
export const COMPILE_TIME_ERROR_CODES: readonly NetqErrorCode[] = [
  NETQ_ERROR_CODES.INVALID_ENCODING,
  NETQ_ERROR_CODES.LAYOUT,
  NETQ_ERROR_CODES.COMPILE,
  NETQ_ERROR_CODES.UNSUPPORTED_OPERATION,
]

/** Where in a subroutine an execution error happened */
export interface ErrorLocation {
  instructionIndex: number
  hostLine: number | null
}
