/**
 * Program Builder
 *
 * Records host operations into an operation tree. Blocks are explicit: the
 * builder keeps a stack of open scopes, appends every operation to the
 * scope on top, and on end() pops the scope into a block node of the scope
 * below. flush() hands over the finished top-level list.
 *
 * Numbering of variables and arrays restarts with every flush; qubit ids
 * persist, as the engine's qubit table does.
 */

import { CompileError } from '@netq/core'
import {
  BREAKPOINT_ACTIONS,
  BREAKPOINT_ROLES,
  ENCODING_CONFIG,
  EPR_CREATE_FIELDS,
  EPR_RESULT_FIELDS,
} from '@netq/isa'
import type {
  AngleInput,
  ArithmeticOperator,
  Condition,
  ConditionOperator,
  EntanglementParams,
  EprType,
  GateName,
  LoopRange,
  ModularOperator,
  Operation,
  OperationProgram,
  PairRoutine,
  Safe,
  ValueRef,
} from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { type AnyFuture, ArrayFuture, type EntryFuture, RegisterFuture } from './futures'

/** Operand accepted wherever a classical value is read */
export type Value = number | RegisterFuture | EntryFuture

export class Qubit {
  constructor(readonly id: number) {}
}

export interface CreateEprOptions {
  remoteNodeId: number
  eprSocketId?: number
  /** Number of pairs, default 1 */
  number?: number
  type?: EprType
  /** Minimum fidelity in percent */
  minimumFidelity?: number
  /**
   * Deliver the pairs one after the other into a single qubit id. With more
   * than one pair a post routine has to consume each pair and free its qubit.
   */
  sequential?: boolean
  /** Recorded once, run for every pair as soon as its results are in */
  postRoutine?: (pair: EprPair) => void
  params?: Partial<EntanglementParams>
}

/** What a post routine sees of the pair it runs for */
export interface EprPair {
  /** Kept half of a sequential create-keep request, otherwise null */
  qubit: Qubit | null
  /** Index of the pair within the request */
  index: RegisterFuture
}

export interface RecvEprOptions {
  remoteNodeId: number
  eprSocketId?: number
  number?: number
  /** Type the peer requests; only create-keep and remote-state-prep leave a qubit here */
  type?: EprType
}

export interface EprResult {
  /** Local halves, when the protocol keeps them */
  qubits: Qubit[]
  /** EPR_RESULT_FIELDS entries of generation info per pair */
  info: ArrayFuture
}

export interface LoopOptions {
  start?: number
  stop: number
  step?: number
}

/** Everything flush() hands to the compiler and the session */
export interface BuiltProgram {
  program: OperationProgram
  futures: AnyFuture[]
}

type PairsScope = { kind: 'pairs'; counter: number; body: Operation[] }

type Scope =
  | { kind: 'root'; operations: Operation[] }
  | {
      kind: 'if'
      condition: Condition
      then: Operation[]
      otherwise: Operation[] | null
      hostLine?: number
    }
  | { kind: 'loop'; range: LoopRange; counter: number; body: Operation[]; hostLine?: number }
  | {
      kind: 'foreach'
      array: number
      length: number
      counter: number
      element: number
      body: Operation[]
      hostLine?: number
    }
  | {
      kind: 'loop_until'
      maxIterations: number
      counter: number
      exit: Condition | null
      body: Operation[]
      hostLine?: number
    }
  | PairsScope

export class ProgramBuilder {
  private scopes: Scope[] = [{ kind: 'root', operations: [] }]
  private epoch = 0
  private nextVariable = 0
  private nextArray = 0
  private futures: AnyFuture[] = []
  private futureVariables = new Set<number>()
  private readonly liveQubits = new Map<number, Qubit>()
  private hostLine: number | undefined

  get currentEpoch(): number {
    return this.epoch
  }

  /** Open blocks, innermost last */
  get depth(): number {
    return this.scopes.length - 1
  }

  /** Host source line recorded on the operations that follow */
  atLine(line: number | undefined): this {
    this.hostLine = line
    return this
  }

  private append(operation: Operation): void {
    const scope = this.scopes[this.scopes.length - 1]
    switch (scope?.kind) {
      case 'root':
        scope.operations.push(operation)
        break
      case 'if':
        ;(scope.otherwise ?? scope.then).push(operation)
        break
      case 'loop':
      case 'foreach':
      case 'loop_until':
      case 'pairs':
        scope.body.push(operation)
        break
      default:
        throw new CompileError('Builder has no open scope')
    }
  }

  private line(): { hostLine?: number } {
    return this.hostLine === undefined ? {} : { hostLine: this.hostLine }
  }

  // Qubits

  private checkLive(qubit: Qubit): number {
    if (this.liveQubits.get(qubit.id) !== qubit) {
      throw new CompileError(`Qubit ${qubit.id} is not allocated`)
    }
    return qubit.id
  }

  private takeQubitId(id?: number): Qubit {
    if (id !== undefined) {
      if (!Number.isInteger(id) || id < 0) {
        throw new CompileError(`Invalid qubit id ${id}`)
      }
      if (this.liveQubits.has(id)) {
        throw new CompileError(`Qubit ${id} is already allocated`)
      }
    }
    let next = id ?? 0
    while (id === undefined && this.liveQubits.has(next)) next++
    const qubit = new Qubit(next)
    this.liveQubits.set(next, qubit)
    return qubit
  }

  /** Allocate a qubit in |0⟩, under the smallest free id unless one is given */
  allocQubit(id?: number): Qubit {
    const qubit = this.takeQubitId(id)
    this.append({ type: 'alloc', qubit: qubit.id, ...this.line() })
    return qubit
  }

  initQubit(qubit: Qubit): this {
    this.append({ type: 'init', qubit: this.checkLive(qubit), ...this.line() })
    return this
  }

  freeQubit(qubit: Qubit): this {
    const id = this.checkLive(qubit)
    if (this.scopes.some((scope) => scope.kind === 'if')) {
      throw new CompileError(`Qubit ${id} cannot be freed inside an if block`)
    }
    this.liveQubits.delete(id)
    this.append({ type: 'free', qubit: id, ...this.line() })
    return this
  }

  gate(gate: GateName, qubits: readonly Qubit[], angle?: AngleInput): this {
    const ids = qubits.map((qubit) => this.checkLive(qubit))
    if (new Set(ids).size !== ids.length) {
      throw new CompileError(`${gate} applied twice to the same qubit`)
    }
    this.append({
      type: 'gate',
      gate,
      qubits: ids,
      ...(angle === undefined ? {} : { angle }),
      ...this.line(),
    })
    return this
  }

  measure(qubit: Qubit): RegisterFuture {
    const id = this.checkLive(qubit)
    const future = this.registerFuture()
    this.append({ type: 'measure', qubit: id, variable: this.variableOf(future), ...this.line() })
    return future
  }

  // Classical registers and arrays

  private registerFuture(): RegisterFuture {
    const variable = this.nextVariable++
    const future = new RegisterFuture({
      status: 'pending',
      slot: { kind: 'register', variable, epoch: this.epoch },
    })
    this.futures.push(future)
    this.futureVariables.add(variable)
    return future
  }

  private variableOf(future: RegisterFuture): number {
    const state = future.state
    if (state.status === 'resolved' || state.slot.epoch !== this.epoch) {
      throw new CompileError('Only registers of the subroutine being built can be written')
    }
    if (state.slot.kind !== 'register') {
      throw new CompileError('Register future without a register slot')
    }
    return state.slot.variable
  }

  private arrayOf(future: ArrayFuture): number {
    const state = future.state
    if (state.status === 'resolved' || state.slot.epoch !== this.epoch) {
      throw new CompileError('Only arrays of the subroutine being built can be used')
    }
    if (state.slot.kind !== 'array') {
      throw new CompileError('Array future without an array slot')
    }
    return state.slot.array
  }

  private toRef(value: Value): ValueRef {
    if (typeof value === 'number') {
      if (
        !Number.isInteger(value) ||
        value < ENCODING_CONFIG.INT32_MIN ||
        value > ENCODING_CONFIG.INT32_MAX
      ) {
        throw new CompileError(`Value ${value} is not a 32-bit integer`)
      }
      return { kind: 'literal', value }
    }

    const state = value.state
    if (state.status === 'resolved') {
      if (state.value === undefined) {
        throw new CompileError('Future resolved to an undefined array entry')
      }
      return { kind: 'literal', value: state.value }
    }
    const slot = state.slot
    if (slot.epoch !== this.epoch) return { kind: 'future', future: value }
    switch (slot.kind) {
      case 'register':
        return { kind: 'variable', variable: slot.variable }
      case 'entry':
        return { kind: 'entry', array: slot.array, index: slot.index }
      case 'array':
        throw new CompileError('An array cannot be used as a scalar value')
    }
  }

  /** New register holding `initial`; its final value resolves the future */
  register(initial: Value = 0): RegisterFuture {
    const value = this.toRef(initial)
    const future = this.registerFuture()
    this.append({ type: 'set', variable: this.variableOf(future), value, ...this.line() })
    return future
  }

  set(target: RegisterFuture, value: Value): this {
    this.append({
      type: 'set',
      variable: this.variableOf(target),
      value: this.toRef(value),
      ...this.line(),
    })
    return this
  }

  private arithmetic(
    operator: ArithmeticOperator | ModularOperator,
    target: RegisterFuture,
    left: Value,
    right: Value,
    modulus?: Value,
  ): this {
    this.append({
      type: 'arithmetic',
      operator,
      variable: this.variableOf(target),
      left: this.toRef(left),
      right: this.toRef(right),
      ...(modulus === undefined ? {} : { modulus: this.toRef(modulus) }),
      ...this.line(),
    })
    return this
  }

  add(target: RegisterFuture, left: Value, right: Value): this {
    return this.arithmetic('add', target, left, right)
  }

  sub(target: RegisterFuture, left: Value, right: Value): this {
    return this.arithmetic('sub', target, left, right)
  }

  mul(target: RegisterFuture, left: Value, right: Value): this {
    return this.arithmetic('mul', target, left, right)
  }

  div(target: RegisterFuture, left: Value, right: Value): this {
    return this.arithmetic('div', target, left, right)
  }

  rem(target: RegisterFuture, left: Value, right: Value): this {
    return this.arithmetic('rem', target, left, right)
  }

  addm(target: RegisterFuture, left: Value, right: Value, modulus: Value): this {
    return this.arithmetic('addm', target, left, right, modulus)
  }

  subm(target: RegisterFuture, left: Value, right: Value, modulus: Value): this {
    return this.arithmetic('subm', target, left, right, modulus)
  }

  private newArray(length: number): ArrayFuture {
    if (!Number.isInteger(length) || length < 1) {
      throw new CompileError(`Invalid array length ${length}`)
    }
    const future = new ArrayFuture(
      { status: 'pending', slot: { kind: 'array', array: this.nextArray++, epoch: this.epoch } },
      length,
    )
    this.futures.push(future)
    return future
  }

  /** Declare an array, optionally filled with initial values */
  array(length: number, initial: readonly Value[] = []): ArrayFuture {
    if (initial.length > length) {
      throw new CompileError(`${initial.length} initial values do not fit length ${length}`)
    }
    const future = this.newArray(length)
    this.append({ type: 'array', array: this.arrayOf(future), length, ...this.line() })
    initial.forEach((value, index) => this.store(future, index, value))
    return future
  }

  store(array: ArrayFuture, index: number, value: Value): this {
    if (!Number.isInteger(index) || index < 0 || index >= array.length) {
      throw new CompileError(`Index ${index} is outside an array of length ${array.length}`)
    }
    this.append({
      type: 'store',
      array: this.arrayOf(array),
      index,
      value: this.toRef(value),
      ...this.line(),
    })
    return this
  }

  // Entanglement and messages

  createEpr(options: CreateEprOptions): EprResult {
    const number = options.number ?? 1
    if (!Number.isInteger(number) || number < 1) {
      throw new CompileError(`Cannot request ${number} pairs`)
    }
    const sequential = options.sequential ?? false
    if (sequential && number > 1 && !options.postRoutine) {
      throw new CompileError('A sequential request for more than one pair needs a post routine')
    }
    const eprType = options.type ?? 'create-keep'
    const params: Partial<EntanglementParams> = {
      ...options.params,
      ...(options.minimumFidelity === undefined
        ? {}
        : { minimumFidelity: options.minimumFidelity }),
      ...(options.sequential === undefined ? {} : { consecutive: sequential ? 1 : 0 }),
    }
    const keep = eprType === 'create-keep'
    const kept = !keep
      ? []
      : sequential
        ? [this.takeQubitId()]
        : Array.from({ length: number }, () => this.takeQubitId())
    const argumentArray = this.newArray(EPR_CREATE_FIELDS.length)
    const qubitArray = this.newArray(number)
    const info = this.newArray(number * EPR_RESULT_FIELDS)
    const hostLine = this.line()

    const shared = sequential ? (kept[0] ?? null) : null
    const postRoutine = options.postRoutine
      ? this.recordPairs(options.postRoutine, shared)
      : null
    if (shared && number > 1 && this.liveQubits.get(shared.id) === shared) {
      throw new CompileError(`The post routine has to free qubit ${shared.id} for the next pair`)
    }

    this.append({
      type: 'create_epr',
      remoteNodeId: options.remoteNodeId,
      eprSocketId: options.eprSocketId ?? 0,
      eprType,
      number,
      params,
      qubits: shared
        ? Array.from({ length: number }, () => shared.id)
        : kept.map((qubit) => qubit.id),
      argumentArray: this.arrayOf(argumentArray),
      qubitArray: this.arrayOf(qubitArray),
      resultArray: this.arrayOf(info),
      postRoutine,
      ...hostLine,
    })
    return {
      qubits: kept.filter((qubit) => this.liveQubits.get(qubit.id) === qubit),
      info,
    }
  }

  /** Record `routine` in a scope of its own */
  private recordPairs(routine: (pair: EprPair) => void, qubit: Qubit | null): PairRoutine {
    const index = this.registerFuture()
    const scope: PairsScope = { kind: 'pairs', counter: this.variableOf(index), body: [] }
    this.scopes.push(scope)
    routine({ qubit, index })
    if (this.scopes[this.scopes.length - 1] !== scope) {
      throw new CompileError('Post routine left a block open')
    }
    this.scopes.pop()
    return { counter: scope.counter, body: scope.body }
  }

  recvEpr(options: RecvEprOptions): EprResult {
    const number = options.number ?? 1
    if (!Number.isInteger(number) || number < 1) {
      throw new CompileError(`Cannot receive ${number} pairs`)
    }
    const keep = (options.type ?? 'create-keep') !== 'measure-directly'
    const qubits = keep ? Array.from({ length: number }, () => this.takeQubitId()) : []
    const qubitArray = this.newArray(number)
    const info = this.newArray(number * EPR_RESULT_FIELDS)

    this.append({
      type: 'recv_epr',
      remoteNodeId: options.remoteNodeId,
      eprSocketId: options.eprSocketId ?? 0,
      number,
      qubits: qubits.map((qubit) => qubit.id),
      qubitArray: this.arrayOf(qubitArray),
      resultArray: this.arrayOf(info),
      ...this.line(),
    })
    return { qubits, info }
  }

  send(peer: Value, array: ArrayFuture): this {
    this.append({
      type: 'send',
      peer: this.toRef(peer),
      array: this.arrayOf(array),
      ...this.line(),
    })
    return this
  }

  /** Receive up to `length` words from `peer` */
  receive(peer: Value, length: number): ArrayFuture {
    const peerRef = this.toRef(peer)
    const future = this.newArray(length)
    this.append({
      type: 'receive',
      peer: peerRef,
      array: this.arrayOf(future),
      length,
      ...this.line(),
    })
    return future
  }

  returnRegister(register: RegisterFuture): this {
    this.append({ type: 'return_register', variable: this.variableOf(register), ...this.line() })
    return this
  }

  returnArray(array: ArrayFuture): this {
    this.append({ type: 'return_array', array: this.arrayOf(array), ...this.line() })
    return this
  }

  breakpoint(
    action: number = BREAKPOINT_ACTIONS.DUMP_LOCAL_STATE,
    role: number = BREAKPOINT_ROLES.CREATE,
  ): this {
    this.append({ type: 'breakpoint', action, role, ...this.line() })
    return this
  }

  // Blocks

  beginIf(left: Value, operator: ConditionOperator, right: Value): this {
    this.scopes.push({
      kind: 'if',
      condition: { operator, left: this.toRef(left), right: this.toRef(right) },
      then: [],
      otherwise: null,
      ...this.line(),
    })
    return this
  }

  beginElse(): this {
    const scope = this.scopes[this.scopes.length - 1]
    if (scope?.kind !== 'if' || scope.otherwise !== null) {
      throw new CompileError('else without an open if block')
    }
    scope.otherwise = []
    return this
  }

  /** Open a loop; the returned counter can be read inside and after the body */
  beginLoop(options: LoopOptions): RegisterFuture {
    const range: LoopRange = {
      start: options.start ?? 0,
      stop: options.stop,
      step: options.step ?? 1,
    }
    const span = range.stop - range.start
    if (
      ![range.start, range.stop, range.step].every(Number.isInteger) ||
      range.step === 0 ||
      span % range.step !== 0 ||
      span / range.step < 0
    ) {
      throw new CompileError(
        `Loop from ${range.start} to ${range.stop} by ${range.step} never reaches its end`,
      )
    }
    const counter = this.registerFuture()
    this.scopes.push({
      kind: 'loop',
      range,
      counter: this.variableOf(counter),
      body: [],
      ...this.line(),
    })
    return counter
  }

  /**
   * Open a block run once per entry of `array`. `element` holds the entry
   * and `index` its position; after the block they keep the last values.
   * Every entry has to be defined by the time it is visited.
   */
  beginForeach(array: ArrayFuture): { element: RegisterFuture; index: RegisterFuture } {
    const source = this.arrayOf(array)
    const index = this.registerFuture()
    const element = this.registerFuture()
    this.scopes.push({
      kind: 'foreach',
      array: source,
      length: array.length,
      counter: this.variableOf(index),
      element: this.variableOf(element),
      body: [],
      ...this.line(),
    })
    return { element, index }
  }

  /**
   * Open a block repeated until its exit condition holds after an iteration,
   * or `maxIterations` iterations have run. The returned future counts them.
   */
  beginLoopUntil(maxIterations: number): RegisterFuture {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new CompileError(`Cannot loop at most ${maxIterations} times`)
    }
    const counter = this.registerFuture()
    this.scopes.push({
      kind: 'loop_until',
      maxIterations,
      counter: this.variableOf(counter),
      exit: null,
      body: [],
      ...this.line(),
    })
    return counter
  }

  /** Exit condition of the innermost loopUntil block, checked after each iteration */
  exitWhen(left: Value, operator: ConditionOperator, right: Value): this {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i]
      if (scope?.kind !== 'loop_until') continue
      if (scope.exit) throw new CompileError('loopUntil block already has an exit condition')
      scope.exit = { operator, left: this.toRef(left), right: this.toRef(right) }
      return this
    }
    throw new CompileError('exitWhen() outside a loopUntil block')
  }

  end(): this {
    const scope = this.scopes.pop()
    if (!scope || scope.kind === 'root' || scope.kind === 'pairs') {
      if (scope) this.scopes.push(scope)
      throw new CompileError('end() without an open block')
    }
    const hostLine = scope.hostLine === undefined ? {} : { hostLine: scope.hostLine }
    switch (scope.kind) {
      case 'if':
        this.append({
          type: 'if',
          condition: scope.condition,
          then: scope.then,
          otherwise: scope.otherwise,
          ...hostLine,
        })
        break
      case 'loop':
        this.append({
          type: 'loop',
          range: scope.range,
          counter: scope.counter,
          body: scope.body,
          ...hostLine,
        })
        break
      case 'foreach':
        this.append({
          type: 'foreach',
          array: scope.array,
          length: scope.length,
          counter: scope.counter,
          element: scope.element,
          body: scope.body,
          ...hostLine,
        })
        break
      case 'loop_until':
        if (!scope.exit) {
          this.scopes.push(scope)
          throw new CompileError('loopUntil block closed without an exit condition')
        }
        this.append({
          type: 'loop_until',
          maxIterations: scope.maxIterations,
          counter: scope.counter,
          exit: scope.exit,
          body: scope.body,
          ...hostLine,
        })
        break
    }
    return this
  }

  ifThen(
    left: Value,
    operator: ConditionOperator,
    right: Value,
    then: () => void,
    otherwise?: () => void,
  ): this {
    this.beginIf(left, operator, right)
    then()
    if (otherwise) {
      this.beginElse()
      otherwise()
    }
    return this.end()
  }

  loop(options: LoopOptions, body: (counter: RegisterFuture) => void): this {
    body(this.beginLoop(options))
    return this.end()
  }

  foreach(array: ArrayFuture, body: (element: RegisterFuture, index: RegisterFuture) => void): this {
    const { element, index } = this.beginForeach(array)
    body(element, index)
    return this.end()
  }

  /** `body` runs once per iteration and sets the exit condition through exitWhen() */
  loopUntil(maxIterations: number, body: (iteration: RegisterFuture) => void): this {
    body(this.beginLoopUntil(maxIterations))
    return this.end()
  }

  /**
   * Take the operations recorded since the last flush.
   * Fails while a block is still open.
   */
  flush(): Safe<BuiltProgram, CompileError> {
    const [root, ...open] = this.scopes
    if (root?.kind !== 'root' || open.length > 0) {
      return safeError(new CompileError(`${open.length} block(s) still open at flush`))
    }

    const built: BuiltProgram = {
      program: {
        epoch: this.epoch,
        operations: root.operations,
        futureVariables: this.futureVariables,
      },
      futures: this.futures,
    }

    this.scopes = [{ kind: 'root', operations: [] }]
    this.epoch++
    this.nextVariable = 0
    this.nextArray = 0
    this.futures = []
    this.futureVariables = new Set()
    return safeResult(built)
  }
}
