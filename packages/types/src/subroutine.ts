import type { Instruction } from './isa'

export interface SubroutineMetadata {
  readonly netqasmVersion: readonly [number, number]
  readonly appId: number
}

/**
 * A finalized, linear instruction sequence. Branch targets are immediate
 * instruction indices; `labels` is kept for printing and diagnostics only.
 */
export interface Subroutine {
  readonly id: number
  readonly metadata: SubroutineMetadata
  readonly instructions: readonly Instruction[]
  readonly labels: ReadonlyMap<string, number>
  /** instruction index → host source line */
  readonly debugLines: ReadonlyMap<number, number>
}

/** A builder entry: an instruction or a label marker before the next one */
export type Command =
  | { readonly type: 'instruction'; readonly instruction: Instruction; readonly hostLine?: number }
  | { readonly type: 'label'; readonly name: string }

/** Register and array values published by a completed subroutine */
export interface SubroutineResult {
  readonly subroutineId: number
  /** Final register file, keyed by register name (`R0`, `M3`, ...) */
  readonly registers: ReadonlyMap<string, number>
  /** Final array store; `undefined` marks entries never written */
  readonly arrays: ReadonlyMap<number, readonly (number | undefined)[]>
  /** Values published with ret_reg */
  readonly returnedRegisters: ReadonlyMap<string, number>
  /** Arrays published with ret_arr */
  readonly returnedArrays: ReadonlyMap<number, readonly (number | undefined)[]>
  readonly steps: number
}
