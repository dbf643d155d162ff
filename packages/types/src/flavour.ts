import type { GateName, Mnemonic } from './isa'

export type FlavourName = 'vanilla' | 'nv'

/**
 * One step of a gate decomposition. `qubits` index into the operands of the
 * gate being replaced (0 = first qubit, 1 = second qubit).
 */
export interface DecompositionStep {
  readonly gate: GateName
  readonly qubits: readonly number[]
  readonly n?: number
  readonly d?: number
}

/**
 * Immutable capability descriptor for an execution target.
 * Selected once per session and applied to compilation and execution alike.
 */
export interface Flavour {
  readonly name: FlavourName
  /** Legal mnemonics and their binary opcode ids */
  readonly opcodes: ReadonlyMap<Mnemonic, number>
  /** Gates the target executes natively */
  readonly nativeGates: ReadonlySet<GateName>
  /** Gate → native sequence for gates outside nativeGates */
  readonly decompositions: ReadonlyMap<GateName, readonly DecompositionStep[]>
  readonly registersPerBank: number
  readonly maxArrayAddress: number
  /** Fixed angle denominator exponent, or null for lowest terms */
  readonly angleExponent: number | null
  readonly maxAngleExponent: number
}
