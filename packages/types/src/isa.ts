/**
 * Instruction Set Types
 *
 * Instructions are tagged records: a mnemonic plus an ordered operand list
 * whose kinds are fixed per mnemonic (see OPERAND_SHAPES in @netq/isa).
 */

export type RegisterBank = 'R' | 'C' | 'Q' | 'M'

export interface Register {
  readonly bank: RegisterBank
  readonly index: number
}

export interface RegisterOperand {
  readonly kind: 'register'
  readonly register: Register
}

export interface ImmediateOperand {
  readonly kind: 'immediate'
  readonly value: number
}

export interface AddressOperand {
  readonly kind: 'address'
  readonly address: number
}

export interface ArrayEntryOperand {
  readonly kind: 'entry'
  readonly address: number
  readonly index: Register
}

/** Half-open range `[start, stop)` of an array */
export interface ArraySliceOperand {
  readonly kind: 'slice'
  readonly address: number
  readonly start: Register
  readonly stop: Register
}

/** Symbolic branch target, resolved to an immediate by finalize() */
export interface LabelOperand {
  readonly kind: 'label'
  readonly name: string
}

export type Operand =
  | RegisterOperand
  | ImmediateOperand
  | AddressOperand
  | ArrayEntryOperand
  | ArraySliceOperand
  | LabelOperand

export type OperandKind = Operand['kind']

/**
 * Slot kinds in an instruction's operand shape.
 * `imm8` is an unsigned byte (angles, breakpoint codes), `target` a branch
 * target (label before finalize, immediate after).
 */
export type OperandShape =
  | 'reg'
  | 'imm'
  | 'imm8'
  | 'addr'
  | 'entry'
  | 'slice'
  | 'target'

export const SINGLE_QUBIT_GATES = ['x', 'y', 'z', 'h', 's', 'k', 't'] as const
export const ROTATION_GATES = ['rot_x', 'rot_y', 'rot_z'] as const
export const CONTROLLED_ROTATION_GATES = ['crot_x', 'crot_y'] as const
export const TWO_QUBIT_GATES = ['cnot', 'cphase'] as const

export type SingleQubitGate = (typeof SINGLE_QUBIT_GATES)[number]
export type RotationGate = (typeof ROTATION_GATES)[number]
export type ControlledRotationGate = (typeof CONTROLLED_ROTATION_GATES)[number]
export type TwoQubitGate = (typeof TWO_QUBIT_GATES)[number]

export type GateName =
  | SingleQubitGate
  | RotationGate
  | ControlledRotationGate
  | TwoQubitGate

export const GATE_NAMES: readonly GateName[] = [
  ...SINGLE_QUBIT_GATES,
  ...ROTATION_GATES,
  ...CONTROLLED_ROTATION_GATES,
  ...TWO_QUBIT_GATES,
]

export type BranchMnemonic =
  | 'jmp'
  | 'bez'
  | 'bnz'
  | 'beq'
  | 'bne'
  | 'blt'
  | 'bge'

export type Mnemonic =
  | 'qalloc'
  | 'init'
  | 'array'
  | 'set'
  | 'store'
  | 'load'
  | 'undef'
  | 'lea'
  | BranchMnemonic
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'rem'
  | 'addm'
  | 'subm'
  | GateName
  | 'meas'
  | 'create_epr'
  | 'recv_epr'
  | 'wait_all'
  | 'wait_any'
  | 'wait_single'
  | 'qfree'
  | 'ret_reg'
  | 'ret_arr'
  | 'mov'
  | 'send'
  | 'recv'
  | 'ret'
  | 'breakpoint'

export interface Instruction {
  readonly mnemonic: Mnemonic
  readonly operands: readonly Operand[]
}

/** Rotation angle n·π/2^d */
export interface AngleSpec {
  readonly n: number
  readonly d: number
}
