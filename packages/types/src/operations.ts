/**
 * Operation Tree
 *
 * What a program builder records before compilation: flat operation records
 * plus block nodes (if, loop, foreach, loopUntil) holding their bodies. Registers and arrays are
 * still symbolic here (numbered per subroutine); qubits are virtual ids.
 */

import type { AngleSpec, GateName } from './isa'
import type { EntanglementParams, EprType } from './processor'
import type { ArrayValue } from './vm'

/** Where a pending future will be read from once its subroutine completes */
export type FutureSlot =
  | { readonly kind: 'register'; readonly variable: number; readonly epoch: number }
  | {
      readonly kind: 'entry'
      readonly array: number
      readonly index: number
      readonly epoch: number
    }
  | { readonly kind: 'array'; readonly array: number; readonly epoch: number }

export type FutureState<T> =
  | { readonly status: 'pending'; readonly slot: FutureSlot }
  | { readonly status: 'resolved'; readonly value: T }

/** A scalar future as seen by the compiler */
export interface FutureSource {
  readonly state: FutureState<ArrayValue>
}

/** Operand value of a classical operation */
export type ValueRef =
  | { readonly kind: 'literal'; readonly value: number }
  | { readonly kind: 'variable'; readonly variable: number }
  | { readonly kind: 'entry'; readonly array: number; readonly index: number }
  /** Pending future of an earlier subroutine, read when compiling */
  | { readonly kind: 'future'; readonly future: FutureSource }

export type ConditionOperator = 'eq' | 'ne' | 'lt' | 'ge' | 'gt' | 'le'

export interface Condition {
  readonly operator: ConditionOperator
  readonly left: ValueRef
  readonly right: ValueRef
}

/** Counter runs start, start+step, ... while it differs from stop */
export interface LoopRange {
  readonly start: number
  readonly stop: number
  readonly step: number
}

export type ArithmeticOperator = 'add' | 'sub' | 'mul' | 'div' | 'rem'
export type ModularOperator = 'addm' | 'subm'

/** Angle as n·π/2^d, or in radians to be simplified for the flavour */
export type AngleInput = AngleSpec | number

interface OperationBase {
  readonly hostLine?: number
}

export interface AllocOperation extends OperationBase {
  readonly type: 'alloc'
  readonly qubit: number
}

export interface InitOperation extends OperationBase {
  readonly type: 'init'
  readonly qubit: number
}

export interface FreeOperation extends OperationBase {
  readonly type: 'free'
  readonly qubit: number
}

export interface GateOperation extends OperationBase {
  readonly type: 'gate'
  readonly gate: GateName
  readonly qubits: readonly number[]
  readonly angle?: AngleInput
}

export interface MeasureOperation extends OperationBase {
  readonly type: 'measure'
  readonly qubit: number
  readonly variable: number
}

export interface SetOperation extends OperationBase {
  readonly type: 'set'
  readonly variable: number
  readonly value: ValueRef
}

export interface ArithmeticOperation extends OperationBase {
  readonly type: 'arithmetic'
  readonly operator: ArithmeticOperator | ModularOperator
  readonly variable: number
  readonly left: ValueRef
  readonly right: ValueRef
  /** Present exactly for addm and subm */
  readonly modulus?: ValueRef
}

export interface ArrayOperation extends OperationBase {
  readonly type: 'array'
  readonly array: number
  readonly length: number
}

export interface StoreOperation extends OperationBase {
  readonly type: 'store'
  readonly array: number
  readonly index: number
  readonly value: ValueRef
}

/** Body run once per pair, after that pair's result entries are in */
export interface PairRoutine {
  /** Receives the index of the current pair */
  readonly counter: number
  readonly body: readonly Operation[]
}

export interface CreateEprOperation extends OperationBase {
  readonly type: 'create_epr'
  readonly remoteNodeId: number
  readonly eprSocketId: number
  readonly eprType: EprType
  readonly number: number
  readonly params: Partial<EntanglementParams>
  /** Virtual ids bound to the kept halves; empty unless create-keep */
  readonly qubits: readonly number[]
  readonly argumentArray: number
  readonly qubitArray: number
  readonly resultArray: number
  /** Replaces the single wait for every pair when present */
  readonly postRoutine: PairRoutine | null
}

export interface RecvEprOperation extends OperationBase {
  readonly type: 'recv_epr'
  readonly remoteNodeId: number
  readonly eprSocketId: number
  readonly number: number
  readonly qubits: readonly number[]
  readonly qubitArray: number
  readonly resultArray: number
}

export interface SendOperation extends OperationBase {
  readonly type: 'send'
  readonly peer: ValueRef
  readonly array: number
}

export interface ReceiveOperation extends OperationBase {
  readonly type: 'receive'
  readonly peer: ValueRef
  readonly array: number
  readonly length: number
}

export interface ReturnRegisterOperation extends OperationBase {
  readonly type: 'return_register'
  readonly variable: number
}

export interface ReturnArrayOperation extends OperationBase {
  readonly type: 'return_array'
  readonly array: number
}

export interface BreakpointOperation extends OperationBase {
  readonly type: 'breakpoint'
  readonly action: number
  readonly role: number
}

export interface IfOperation extends OperationBase {
  readonly type: 'if'
  readonly condition: Condition
  readonly then: readonly Operation[]
  readonly otherwise: readonly Operation[] | null
}

export interface LoopOperation extends OperationBase {
  readonly type: 'loop'
  readonly range: LoopRange
  readonly counter: number
  readonly body: readonly Operation[]
}

/** Visits the entries of an array in order */
export interface ForeachOperation extends OperationBase {
  readonly type: 'foreach'
  readonly array: number
  readonly length: number
  /** Receives the index of the current entry */
  readonly counter: number
  /** Receives the current entry before the body runs */
  readonly element: number
  readonly body: readonly Operation[]
}

/** Repeats its body until `exit` holds after an iteration, at most `maxIterations` times */
export interface LoopUntilOperation extends OperationBase {
  readonly type: 'loop_until'
  readonly maxIterations: number
  /** Counts finished iterations */
  readonly counter: number
  readonly exit: Condition
  readonly body: readonly Operation[]
}

export type Operation =
  | AllocOperation
  | InitOperation
  | FreeOperation
  | GateOperation
  | MeasureOperation
  | SetOperation
  | ArithmeticOperation
  | ArrayOperation
  | StoreOperation
  | CreateEprOperation
  | RecvEprOperation
  | SendOperation
  | ReceiveOperation
  | ReturnRegisterOperation
  | ReturnArrayOperation
  | BreakpointOperation
  | IfOperation
  | LoopOperation
  | ForeachOperation
  | LoopUntilOperation

export type OperationType = Operation['type']

/** Operations of one flush, ready for compilation */
export interface OperationProgram {
  readonly epoch: number
  readonly operations: readonly Operation[]
  /** Variables read back through register futures; live to the end */
  readonly futureVariables: ReadonlySet<number>
}
