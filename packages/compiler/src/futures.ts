/**
 * Futures
 *
 * Placeholders for values a subroutine produces. A future is pending, with a
 * slot naming where its value will appear, until the session resolves it
 * from the result of the subroutine that produced it. Resolution happens
 * once.
 */

import { CompileError, NotYetAvailableError } from '@netq/core'
import { registerName } from '@netq/isa'
import type {
  ArrayValue,
  FutureSlot,
  FutureState,
  SubroutineResult,
} from '@netq/types'
import type { CompiledSubroutine } from './compiler'

export class Future<T> {
  private current: FutureState<T>

  constructor(state: FutureState<T>) {
    this.current = state
  }

  get state(): FutureState<T> {
    return this.current
  }

  get isResolved(): boolean {
    return this.current.status === 'resolved'
  }

  /**
   * The resolved value
   * @throws NotYetAvailableError while the producing subroutine has not completed
   */
  get value(): T {
    if (this.current.status === 'pending') {
      throw new NotYetAvailableError(
        `${describeSlot(this.current.slot)} is not available before its subroutine completes`,
      )
    }
    return this.current.value
  }

  resolve(value: T): void {
    if (this.current.status === 'resolved') {
      throw new Error(`Future already resolved to ${String(this.current.value)}`)
    }
    this.current = { status: 'resolved', value }
  }
}

/** Final value of a register: measurement outcomes, host variables, loop counters */
export class RegisterFuture extends Future<number> {}

/** One entry of an array; undefined when never written */
export class EntryFuture extends Future<ArrayValue> {}

export class ArrayFuture extends Future<ArrayValue[]> {
  private readonly entries = new Map<number, EntryFuture>()

  constructor(
    state: FutureState<ArrayValue[]>,
    readonly length: number,
  ) {
    super(state)
  }

  /** Future of entry `index`, usable as an operand value */
  get(index: number): EntryFuture {
    const existing = this.entries.get(index)
    if (existing) return existing
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new CompileError(`Index ${index} is outside an array of length ${this.length}`)
    }

    let entry: EntryFuture
    const state = this.state
    if (state.status === 'resolved') {
      entry = new EntryFuture({ status: 'resolved', value: state.value[index] })
    } else if (state.slot.kind === 'array') {
      const { array, epoch } = state.slot
      entry = new EntryFuture({
        status: 'pending',
        slot: { kind: 'entry', array, index, epoch },
      })
    } else {
      throw new CompileError(`${describeSlot(state.slot)} does not hold an array`)
    }
    this.entries.set(index, entry)
    return entry
  }

  override resolve(value: ArrayValue[]): void {
    super.resolve(value)
    for (const [index, entry] of this.entries) {
      if (!entry.isResolved) entry.resolve(value[index])
    }
  }
}

export type AnyFuture = RegisterFuture | EntryFuture | ArrayFuture

function describeSlot(slot: FutureSlot): string {
  switch (slot.kind) {
    case 'register':
      return `Register future v${slot.variable}`
    case 'entry':
      return `Array entry future @${slot.array}[${slot.index}]`
    case 'array':
      return `Array future @${slot.array}`
  }
}

/**
 * Resolve the pending futures of a completed subroutine from its result.
 * Arrays never created on the executed path resolve to [] and their entries
 * to undefined.
 */
export function resolveFutures(
  futures: readonly AnyFuture[],
  compiled: CompiledSubroutine,
  result: SubroutineResult,
): CompileError | null {
  for (const future of futures) {
    const state = future.state
    if (state.status === 'resolved') continue
    const slot = state.slot

    if (future instanceof ArrayFuture) {
      if (slot.kind !== 'array') return new CompileError(`${describeSlot(slot)} is not an array`)
      future.resolve([...(result.arrays.get(slot.array) ?? [])])
      continue
    }

    switch (slot.kind) {
      case 'register': {
        const register = compiled.registers.get(slot.variable)
        const value = register ? result.registers.get(registerName(register)) : undefined
        if (value === undefined) {
          return new CompileError(`${describeSlot(slot)} has no register in the result`)
        }
        future.resolve(value)
        break
      }
      case 'entry':
        if (future instanceof RegisterFuture) {
          return new CompileError(`${describeSlot(slot)} cannot back a register future`)
        }
        future.resolve(result.arrays.get(slot.array)?.[slot.index])
        break
      case 'array':
        return new CompileError(`${describeSlot(slot)} cannot back a scalar future`)
    }
  }
  return null
}
