import type { Instruction, Register } from './isa'
import type { EntanglementPair, QuantumProcessor, QubitHandle } from './processor'
import type { SafePromise } from './safe'
import type { Subroutine, SubroutineResult } from './subroutine'

export type ArrayValue = number | undefined

export interface RegisterStore {
  get(register: Register): number
  set(register: Register, value: number): void
  snapshot(): Map<string, number>
}

export interface ArrayMemory {
  init(address: number, length: number): void
  has(address: number): boolean
  length(address: number): number
  get(address: number, index: number): ArrayValue
  set(address: number, index: number, value: ArrayValue): void
  /** Entries `[start, stop)` */
  slice(address: number, start: number, stop: number): ArrayValue[]
  snapshot(): Map<number, ArrayValue[]>
}

export interface QubitTable {
  /** Throws unless `virtualId` is in range and not bound */
  assertFree(virtualId: number): void
  bind(virtualId: number, handle: QubitHandle): void
  resolve(virtualId: number): QubitHandle
  release(virtualId: number): QubitHandle
  isBound(virtualId: number): boolean
}

/** A pair of a consecutive request not yet handed to the routine */
export interface HeldPair {
  /** Position within its request */
  readonly index: number
  readonly pair: EntanglementPair
  /** Array naming the virtual id of each kept half */
  readonly qubitArray: number
}

/** Pairs of consecutive requests, released as their result entries are awaited */
export interface HeldPairs {
  hold(resultArray: number, pairs: readonly HeldPair[]): void
  /** Remove and return, in order, the held pairs of `resultArray` whose fields start before `stop` */
  take(resultArray: number, stop: number): HeldPair[]
  /** Remove and return everything still held */
  drain(): HeldPair[]
}

/** How a subroutine run ended */
export const RESULT_CODES = {
  HALT: 0, // ret instruction or end of instruction stream
  FAULT: 1, // execution error
  ABORTED: 2, // cancelled through the abort signal
} as const

export type ResultCode = (typeof RESULT_CODES)[keyof typeof RESULT_CODES]

/**
 * Instruction execution context (mutable)
 * `pc` starts as the index of the next instruction; jumps overwrite it.
 */
export interface InstructionContext {
  readonly instruction: Instruction
  readonly index: number
  pc: number
  readonly registers: RegisterStore
  readonly arrays: ArrayMemory
  readonly qubits: QubitTable
  readonly heldPairs: HeldPairs
  readonly processor: QuantumProcessor
  readonly returnedRegisters: Map<string, number>
  readonly returnedArrays: Map<number, ArrayValue[]>
  readonly signal: AbortSignal
  log(message: string, data?: Record<string, unknown>): void
}

export interface InstructionResult {
  resultCode: ResultCode | null // null = continue execution
}

export interface VMOptions {
  maxSteps?: number
  qubitCapacity?: number
}

export interface VMState {
  programCounter: number
  resultCode: ResultCode | null
  steps: number
  subroutine: Subroutine | null
}

export interface ExecutionLogEntry {
  step: number
  pc: number
  instruction: string
}

export interface ExecuteOptions {
  signal?: AbortSignal
}

/** Consumes encoded subroutines; implemented locally by @netq/vm */
export interface SubroutineExecutor {
  execute(payload: Uint8Array, options?: ExecuteOptions): SafePromise<SubroutineResult>
}
