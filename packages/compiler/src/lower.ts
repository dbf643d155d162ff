/**
 * Lowering
 *
 * Flattens an operation tree into a linear command list over virtual
 * registers. Blocks become labels and branches; literals headed for register
 * slots are `set` into temporaries; qubit ids are loaded into Q registers,
 * skipping the `set` when a register is already known to hold the id.
 */

import { CompileError, LayoutError, UnsupportedOperationError } from '@netq/core'
import {
  EPR_CREATE_FIELDS,
  EPR_RESULT_FIELDS,
  addr,
  angleFromRadians,
  imm,
  label,
  reexpressAngle,
  register,
} from '@netq/isa'
import {
  type AddressOperand,
  type AngleSpec,
  type Condition,
  EPR_TYPE_CODES,
  type Flavour,
  type FutureSource,
  type GateOperation,
  type ImmediateOperand,
  type Instruction,
  type LabelOperand,
  type LoopRange,
  type Mnemonic,
  type Operation,
  type OperationProgram,
  type Register,
  type ValueRef,
} from '@netq/types'
import { gateInstructions, isRotationGate } from './transpile'

export interface VirtualRegister {
  readonly kind: 'virtual'
  readonly id: number
}

export type VirtualSlot = VirtualRegister | { readonly kind: 'fixed'; readonly register: Register }

export type LoweredOperand =
  | { readonly kind: 'register'; readonly slot: VirtualSlot }
  | { readonly kind: 'entry'; readonly address: number; readonly index: VirtualSlot }
  | {
      readonly kind: 'slice'
      readonly address: number
      readonly start: VirtualSlot
      readonly stop: VirtualSlot
    }
  | ImmediateOperand
  | AddressOperand
  | LabelOperand

export interface LoweredInstruction {
  readonly mnemonic: Mnemonic
  readonly operands: readonly LoweredOperand[]
}

export type LoweredCommand =
  | { readonly type: 'instruction'; readonly instruction: LoweredInstruction; readonly hostLine?: number }
  | { readonly type: 'label'; readonly name: string }

export interface LoweredProgram {
  readonly commands: readonly LoweredCommand[]
  /** Builder variable → virtual register id */
  readonly variables: ReadonlyMap<number, number>
  /** Virtual ids read back through futures after the run */
  readonly pinned: ReadonlySet<number>
}

const rs = (slot: VirtualSlot): LoweredOperand => ({ kind: 'register', slot })
const fixed = (value: Register): VirtualSlot => ({ kind: 'fixed', register: value })

function fromInstruction(instruction: Instruction): LoweredInstruction {
  return {
    mnemonic: instruction.mnemonic,
    operands: instruction.operands.map((operand): LoweredOperand => {
      switch (operand.kind) {
        case 'register':
          return rs(fixed(operand.register))
        case 'entry':
          return { kind: 'entry', address: operand.address, index: fixed(operand.index) }
        case 'slice':
          return {
            kind: 'slice',
            address: operand.address,
            start: fixed(operand.start),
            stop: fixed(operand.stop),
          }
        default:
          return operand
      }
    }),
  }
}

/** Branch mnemonic taken when `operator` does NOT hold, with swapped operands where needed */
const NEGATED = {
  eq: { mnemonic: 'bne', swap: false },
  ne: { mnemonic: 'beq', swap: false },
  lt: { mnemonic: 'bge', swap: false },
  ge: { mnemonic: 'blt', swap: false },
  gt: { mnemonic: 'bge', swap: true },
  le: { mnemonic: 'blt', swap: true },
} as const satisfies Record<Condition['operator'], { mnemonic: Mnemonic; swap: boolean }>

const OPPOSITE = {
  eq: 'ne',
  ne: 'eq',
  lt: 'ge',
  ge: 'lt',
  gt: 'le',
  le: 'gt',
} as const satisfies Record<Condition['operator'], Condition['operator']>

class Lowerer {
  readonly commands: LoweredCommand[] = []
  readonly variables = new Map<number, number>()
  private nextVirtual = 0
  private nextBlock = 0
  private hostLine: number | undefined
  /** Known contents of Q0..Qn; undefined once unknown */
  private readonly qubitRegisters: Array<number | undefined>

  constructor(private readonly flavour: Flavour) {
    this.qubitRegisters = Array.from({ length: flavour.registersPerBank }, () => 0)
  }

  private emit(mnemonic: Mnemonic, ...operands: LoweredOperand[]): void {
    this.commands.push({
      type: 'instruction',
      instruction: { mnemonic, operands },
      ...(this.hostLine === undefined ? {} : { hostLine: this.hostLine }),
    })
  }

  private mark(name: string): void {
    this.commands.push({ type: 'label', name })
    this.qubitRegisters.fill(undefined)
  }

  private temp(): VirtualRegister {
    return { kind: 'virtual', id: this.nextVirtual++ }
  }

  variable(variable: number): VirtualRegister {
    let id = this.variables.get(variable)
    if (id === undefined) {
      id = this.nextVirtual++
      this.variables.set(variable, id)
    }
    return { kind: 'virtual', id }
  }

  private constant(value: number): VirtualRegister {
    const slot = this.temp()
    this.emit('set', rs(slot), imm(value))
    return slot
  }

  private address(array: number): number {
    if (array > this.flavour.maxArrayAddress) {
      throw new LayoutError(
        `Array address ${array} exceeds the ${this.flavour.name} limit of ${this.flavour.maxArrayAddress}`,
      )
    }
    return array
  }

  private futureValue(future: FutureSource): number {
    const state = future.state
    if (state.status === 'pending') {
      throw new CompileError('Value of an earlier subroutine used before that subroutine ran')
    }
    if (state.value === undefined) {
      throw new CompileError('Value of an earlier subroutine is an undefined array entry')
    }
    return state.value
  }

  /** Register holding `ref`, loading it when it is not one already */
  private read(ref: ValueRef): VirtualSlot {
    switch (ref.kind) {
      case 'literal':
        return this.constant(ref.value)
      case 'future':
        return this.constant(this.futureValue(ref.future))
      case 'variable':
        return this.variable(ref.variable)
      case 'entry': {
        const index = this.constant(ref.index)
        const slot = this.temp()
        this.emit('load', rs(slot), { kind: 'entry', address: this.address(ref.array), index })
        return slot
      }
    }
  }

  /** Q register holding qubit `id`, avoiding the indices in `avoid` */
  private qubit(id: number, avoid: readonly number[] = []): Register {
    const known = this.qubitRegisters.findIndex(
      (value, index) => value === id && !avoid.includes(index),
    )
    if (known >= 0) return register('Q', known)

    const perBank = this.qubitRegisters.length
    for (let offset = 0; offset < perBank; offset++) {
      const index = ((id % perBank) + offset) % perBank
      if (avoid.includes(index)) continue
      const target = register('Q', index)
      this.emit('set', rs(fixed(target)), imm(id))
      this.qubitRegisters[index] = id
      return target
    }
    throw new LayoutError(`No Q register left for qubit ${id}`)
  }

  private qubits(ids: readonly number[]): Register[] {
    const registers: Register[] = []
    for (const id of ids) {
      registers.push(this.qubit(id, registers.map((value) => value.index)))
    }
    return registers
  }

  private angle(operation: GateOperation): AngleSpec | undefined {
    const { gate, angle } = operation
    if (!isRotationGate(gate)) {
      if (angle !== undefined) throw new CompileError(`${gate} takes no angle`)
      return undefined
    }
    if (angle === undefined) throw new CompileError(`${gate} needs an angle`)
    if (typeof angle === 'number') {
      if (!Number.isFinite(angle)) throw new CompileError(`Invalid angle ${angle}`)
      return angleFromRadians(angle, this.flavour)
    }
    if (!Number.isInteger(angle.n) || !Number.isInteger(angle.d) || angle.d < 0) {
      throw new CompileError(`Invalid angle ${angle.n}·π/2^${angle.d}`)
    }
    return angle.d > this.flavour.maxAngleExponent
      ? reexpressAngle(angle, this.flavour.maxAngleExponent)
      : angle
  }

  private declare(array: number, length: number): number {
    const address = this.address(array)
    this.emit('array', rs(this.constant(length)), addr(address))
    return address
  }

  private storeConstant(address: number, index: number, value: number): void {
    const slot = this.constant(value)
    this.emit('store', rs(slot), { kind: 'entry', address, index: this.constant(index) })
  }

  private lea(address: number): VirtualRegister {
    const slot = this.temp()
    this.emit('lea', rs(slot), addr(address))
    return slot
  }

  private waitAll(address: number, length: number): void {
    const start = this.constant(0)
    const stop = this.constant(length)
    this.emit('wait_all', { kind: 'slice', address, start, stop })
  }

  /** Jump to `target` unless `condition` holds */
  private branchUnless(condition: Condition, target: string): void {
    const { operator, left, right } = condition
    if ((operator === 'eq' || operator === 'ne') && right.kind === 'literal' && right.value === 0) {
      this.emit(operator === 'eq' ? 'bnz' : 'bez', rs(this.read(left)), label(target))
      return
    }
    const a = this.read(left)
    const b = this.read(right)
    const { mnemonic, swap } = NEGATED[operator]
    this.emit(mnemonic, rs(swap ? b : a), rs(swap ? a : b), label(target))
  }

  /** Counter runs through `range`; `body` lowers one iteration */
  private countedLoop(
    variable: number,
    range: LoopRange,
    hostLine: number | undefined,
    body: () => void,
  ): void {
    const k = this.nextBlock++
    const head = `LOOP_${k}`
    const exit = `LOOP_EXIT_${k}`
    const counter = this.variable(variable)
    this.emit('set', rs(counter), imm(range.start))
    this.mark(head)
    this.emit('beq', rs(counter), rs(this.constant(range.stop)), label(exit))
    body()
    this.hostLine = hostLine
    this.emit('add', rs(counter), rs(counter), rs(this.constant(range.step)))
    this.emit('jmp', label(head))
    this.mark(exit)
  }

  /** Wait for the result entries of the pair whose index `pair` holds */
  private waitPair(address: number, pair: VirtualSlot): void {
    const fields = this.constant(EPR_RESULT_FIELDS)
    const start = this.temp()
    const stop = this.temp()
    this.emit('mul', rs(start), rs(pair), rs(fields))
    this.emit('add', rs(stop), rs(start), rs(fields))
    this.emit('wait_all', { kind: 'slice', address, start, stop })
  }

  lowerAll(operations: readonly Operation[]): void {
    for (const operation of operations) this.lower(operation)
  }

  private lower(operation: Operation): void {
    this.hostLine = operation.hostLine
    switch (operation.type) {
      case 'alloc':
        this.emit('qalloc', rs(fixed(this.qubit(operation.qubit))))
        break
      case 'init':
        this.emit('init', rs(fixed(this.qubit(operation.qubit))))
        break
      case 'free':
        this.emit('qfree', rs(fixed(this.qubit(operation.qubit))))
        break
      case 'gate': {
        const registers = this.qubits(operation.qubits)
        const instructions = gateInstructions(
          operation.gate,
          registers,
          this.angle(operation),
          this.flavour,
        )
        if (!instructions) {
          throw new UnsupportedOperationError(
            `${operation.gate} is not available on the ${this.flavour.name} flavour`,
          )
        }
        for (const instruction of instructions) {
          this.commands.push({
            type: 'instruction',
            instruction: fromInstruction(instruction),
            ...(this.hostLine === undefined ? {} : { hostLine: this.hostLine }),
          })
        }
        break
      }
      case 'measure': {
        const qubit = this.qubit(operation.qubit)
        this.emit('meas', rs(fixed(qubit)), rs(this.variable(operation.variable)))
        break
      }
      case 'set': {
        const target = this.variable(operation.variable)
        const { value } = operation
        if (value.kind === 'literal') {
          this.emit('set', rs(target), imm(value.value))
        } else if (value.kind === 'future') {
          this.emit('set', rs(target), imm(this.futureValue(value.future)))
        } else if (value.kind === 'variable') {
          const source = this.variable(value.variable)
          if (source.id !== target.id) this.emit('mov', rs(target), rs(source))
        } else {
          const index = this.constant(value.index)
          this.emit('load', rs(target), {
            kind: 'entry',
            address: this.address(value.array),
            index,
          })
        }
        break
      }
      case 'arithmetic': {
        const left = this.read(operation.left)
        const right = this.read(operation.right)
        const operands = [rs(this.variable(operation.variable)), rs(left), rs(right)]
        if (operation.modulus !== undefined) operands.push(rs(this.read(operation.modulus)))
        this.emit(operation.operator, ...operands)
        break
      }
      case 'array':
        this.declare(operation.array, operation.length)
        break
      case 'store': {
        const value = this.read(operation.value)
        const index = this.constant(operation.index)
        this.emit('store', rs(value), {
          kind: 'entry',
          address: this.address(operation.array),
          index,
        })
        break
      }
      case 'create_epr': {
        const args = this.declare(operation.argumentArray, EPR_CREATE_FIELDS.length)
        const qubits = this.declare(operation.qubitArray, operation.number)
        const results = this.declare(operation.resultArray, operation.number * EPR_RESULT_FIELDS)
        EPR_CREATE_FIELDS.forEach((field, index) => {
          if (field === 'type') {
            this.storeConstant(args, index, EPR_TYPE_CODES[operation.eprType])
          } else if (field === 'number') {
            this.storeConstant(args, index, operation.number)
          } else {
            const value = operation.params[field]
            if (value !== undefined && value !== 0) this.storeConstant(args, index, value)
          }
        })
        operation.qubits.forEach((id, index) => this.storeConstant(qubits, index, id))

        this.emit(
          'create_epr',
          rs(this.constant(operation.remoteNodeId)),
          rs(this.constant(operation.eprSocketId)),
          rs(this.lea(qubits)),
          rs(this.lea(args)),
          rs(this.lea(results)),
        )
        const { postRoutine } = operation
        if (!postRoutine) {
          this.waitAll(results, operation.number * EPR_RESULT_FIELDS)
          break
        }
        const range = { start: 0, stop: operation.number, step: 1 }
        this.countedLoop(postRoutine.counter, range, operation.hostLine, () => {
          this.waitPair(results, this.variable(postRoutine.counter))
          this.lowerAll(postRoutine.body)
        })
        break
      }
      case 'recv_epr': {
        const qubits = this.declare(operation.qubitArray, operation.number)
        const results = this.declare(operation.resultArray, operation.number * EPR_RESULT_FIELDS)
        operation.qubits.forEach((id, index) => this.storeConstant(qubits, index, id))

        this.emit(
          'recv_epr',
          rs(this.constant(operation.remoteNodeId)),
          rs(this.constant(operation.eprSocketId)),
          rs(this.lea(qubits)),
          rs(this.lea(results)),
        )
        this.waitAll(results, operation.number * EPR_RESULT_FIELDS)
        break
      }
      case 'send': {
        const peer = this.read(operation.peer)
        this.emit('send', rs(peer), addr(this.address(operation.array)))
        break
      }
      case 'receive': {
        const address = this.declare(operation.array, operation.length)
        this.emit('recv', rs(this.read(operation.peer)), addr(address))
        break
      }
      case 'return_register':
        this.emit('ret_reg', rs(this.variable(operation.variable)))
        break
      case 'return_array':
        this.emit('ret_arr', addr(this.address(operation.array)))
        break
      case 'breakpoint':
        this.emit('breakpoint', imm(operation.action), imm(operation.role))
        break
      case 'if': {
        const k = this.nextBlock++
        const otherwise = operation.otherwise ?? []
        const end = `IF_END_${k}`
        const elseLabel = `IF_ELSE_${k}`
        this.branchUnless(operation.condition, otherwise.length > 0 ? elseLabel : end)
        this.lowerAll(operation.then)
        if (otherwise.length > 0) {
          this.hostLine = operation.hostLine
          this.emit('jmp', label(end))
          this.mark(elseLabel)
          this.lowerAll(otherwise)
        }
        this.mark(end)
        break
      }
      case 'loop':
        this.countedLoop(operation.counter, operation.range, operation.hostLine, () =>
          this.lowerAll(operation.body),
        )
        break
      case 'foreach': {
        const address = this.address(operation.array)
        const range = { start: 0, stop: operation.length, step: 1 }
        this.countedLoop(operation.counter, range, operation.hostLine, () => {
          this.emit('load', rs(this.variable(operation.element)), {
            kind: 'entry',
            address,
            index: this.variable(operation.counter),
          })
          this.lowerAll(operation.body)
        })
        break
      }
      case 'loop_until': {
        const k = this.nextBlock++
        const head = `LOOP_${k}`
        const exit = `LOOP_EXIT_${k}`
        const counter = this.variable(operation.counter)
        this.emit('set', rs(counter), imm(0))
        this.mark(head)
        this.lowerAll(operation.body)
        this.hostLine = operation.hostLine
        this.emit('add', rs(counter), rs(counter), rs(this.constant(1)))
        const { exit: condition } = operation
        this.branchUnless({ ...condition, operator: OPPOSITE[condition.operator] }, exit)
        this.emit('blt', rs(counter), rs(this.constant(operation.maxIterations)), label(head))
        this.mark(exit)
        break
      }
    }
  }

  finish(): void {
    this.hostLine = undefined
    this.emit('ret')
  }
}

/**
 * Flatten `program` for `flavour`.
 * @throws CompileError, LayoutError or UnsupportedOperationError
 */
export function lowerProgram(program: OperationProgram, flavour: Flavour): LoweredProgram {
  const lowerer = new Lowerer(flavour)
  lowerer.lowerAll(program.operations)
  lowerer.finish()

  const pinned = new Set<number>()
  for (const variable of program.futureVariables) pinned.add(lowerer.variable(variable).id)
  return { commands: lowerer.commands, variables: lowerer.variables, pinned }
}
