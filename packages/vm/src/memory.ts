/**
 * Classical memory and the virtual qubit table.
 *
 * Every access is bounds-checked; nothing outside an allocated array or the
 * register file is ever read or written.
 */

import { AddressError, ExecutionError } from '@netq/core'
import { EPR_RESULT_FIELDS, REGISTER_CONFIG, registerName } from '@netq/isa'
import type {
  ArrayMemory,
  ArrayValue,
  HeldPair,
  HeldPairs,
  QubitHandle,
  QubitTable,
  Register,
  RegisterBank,
  RegisterStore,
} from '@netq/types'
import { VM_CONFIG } from './config'

/** Four banks of 32-bit registers; stores wrap to int32 */
export class RegisterFile implements RegisterStore {
  private readonly banks: Record<RegisterBank, Int32Array>

  constructor(private readonly perBank: number = REGISTER_CONFIG.PER_BANK) {
    this.banks = {
      R: new Int32Array(perBank),
      C: new Int32Array(perBank),
      Q: new Int32Array(perBank),
      M: new Int32Array(perBank),
    }
  }

  private check(register: Register): Int32Array {
    if (
      !Number.isInteger(register.index) ||
      register.index < 0 ||
      register.index >= this.perBank
    ) {
      throw new AddressError(`Register ${registerName(register)} does not exist`)
    }
    return this.banks[register.bank]
  }

  get(register: Register): number {
    return this.check(register)[register.index] ?? 0
  }

  set(register: Register, value: number): void {
    this.check(register)[register.index] = value
  }

  snapshot(): Map<string, number> {
    const values = new Map<string, number>()
    for (const bank of REGISTER_CONFIG.BANKS) {
      this.banks[bank].forEach((value, index) => {
        values.set(`${bank}${index}`, value)
      })
    }
    return values
  }
}

export class ArrayStore implements ArrayMemory {
  private readonly arrays = new Map<number, ArrayValue[]>()

  constructor(
    private readonly maxAddress: number,
    private readonly maxLength: number = VM_CONFIG.MAX_ARRAY_LENGTH,
  ) {}

  private array(address: number): ArrayValue[] {
    const array = this.arrays.get(address)
    if (!array) throw new AddressError(`No array at address @${address}`)
    return array
  }

  private checkIndex(address: number, index: number): ArrayValue[] {
    const array = this.array(address)
    if (!Number.isInteger(index) || index < 0 || index >= array.length) {
      throw new AddressError(
        `Index ${index} is outside array @${address} of length ${array.length}`,
      )
    }
    return array
  }

  init(address: number, length: number): void {
    if (!Number.isInteger(address) || address < 0 || address > this.maxAddress) {
      throw new AddressError(`Array address @${address} outside 0..${this.maxAddress}`)
    }
    if (!Number.isInteger(length) || length < 0 || length > this.maxLength) {
      throw new ExecutionError(`Array length ${length} outside 0..${this.maxLength}`)
    }
    this.arrays.set(address, new Array<ArrayValue>(length).fill(undefined))
  }

  has(address: number): boolean {
    return this.arrays.has(address)
  }

  length(address: number): number {
    return this.array(address).length
  }

  get(address: number, index: number): ArrayValue {
    return this.checkIndex(address, index)[index]
  }

  set(address: number, index: number, value: ArrayValue): void {
    this.checkIndex(address, index)[index] = value
  }

  slice(address: number, start: number, stop: number): ArrayValue[] {
    const array = this.array(address)
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(stop) ||
      start < 0 ||
      stop < start ||
      stop > array.length
    ) {
      throw new AddressError(
        `Slice [${start}, ${stop}) is outside array @${address} of length ${array.length}`,
      )
    }
    return array.slice(start, stop)
  }

  snapshot(): Map<number, ArrayValue[]> {
    return new Map(
      Array.from(this.arrays, ([address, values]) => [address, values.slice()]),
    )
  }
}

/** Virtual qubit id → processor handle; outlives single subroutines */
export class QubitRegistry implements QubitTable {
  private readonly handles = new Map<number, QubitHandle>()

  constructor(readonly capacity: number = VM_CONFIG.DEFAULT_QUBIT_CAPACITY) {}

  private checkRange(virtualId: number): void {
    if (!Number.isInteger(virtualId) || virtualId < 0 || virtualId >= this.capacity) {
      throw new AddressError(
        `Virtual qubit ${virtualId} outside 0..${this.capacity - 1}`,
      )
    }
  }

  assertFree(virtualId: number): void {
    this.checkRange(virtualId)
    if (this.handles.has(virtualId)) {
      throw new ExecutionError(`Virtual qubit ${virtualId} is already allocated`)
    }
  }

  bind(virtualId: number, handle: QubitHandle): void {
    this.assertFree(virtualId)
    this.handles.set(virtualId, handle)
  }

  resolve(virtualId: number): QubitHandle {
    this.checkRange(virtualId)
    const handle = this.handles.get(virtualId)
    if (handle === undefined) {
      throw new AddressError(`Virtual qubit ${virtualId} is not allocated`)
    }
    return handle
  }

  release(virtualId: number): QubitHandle {
    const handle = this.resolve(virtualId)
    this.handles.delete(virtualId)
    return handle
  }

  isBound(virtualId: number): boolean {
    return this.handles.has(virtualId)
  }

  get size(): number {
    return this.handles.size
  }

  clear(): void {
    this.handles.clear()
  }
}

/** Held pairs per result array, in request order */
export class PairQueue implements HeldPairs {
  private readonly held = new Map<number, HeldPair[]>()

  hold(resultArray: number, pairs: readonly HeldPair[]): void {
    if (this.held.has(resultArray)) {
      throw new ExecutionError(`Pairs of an earlier request into @${resultArray} are still held`)
    }
    this.held.set(resultArray, [...pairs])
  }

  take(resultArray: number, stop: number): HeldPair[] {
    const queue = this.held.get(resultArray) ?? []
    const cut = queue.findIndex((held) => held.index * EPR_RESULT_FIELDS >= stop)
    const due = cut < 0 ? queue : queue.slice(0, cut)
    const rest = cut < 0 ? [] : queue.slice(cut)
    if (rest.length > 0) this.held.set(resultArray, rest)
    else this.held.delete(resultArray)
    return due
  }

  drain(): HeldPair[] {
    const all = [...this.held.values()].flat()
    this.held.clear()
    return all
  }
}
