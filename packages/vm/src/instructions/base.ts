/**
 * Base Instruction System
 *
 * Handlers read their operands through the helpers below, which turn a
 * malformed operand or an out-of-range access into an execution fault.
 */

import { ExecutionError } from '@netq/core'
import type {
  InstructionContext,
  InstructionResult,
  Mnemonic,
  Operand,
  QubitHandle,
  Register,
} from '@netq/types'

export interface InstructionHandler {
  readonly name: Mnemonic

  /**
   * Execute the instruction (mutates context in place)
   * @returns resultCode (null = continue, otherwise halt)
   */
  execute(context: InstructionContext): InstructionResult | Promise<InstructionResult>
}

export interface ResolvedSlice {
  address: number
  start: number
  stop: number
}

export abstract class BaseInstruction implements InstructionHandler {
  abstract readonly name: Mnemonic

  abstract execute(
    context: InstructionContext,
  ): InstructionResult | Promise<InstructionResult>

  protected continue(): InstructionResult {
    return { resultCode: null }
  }

  protected operand(context: InstructionContext, slot: number): Operand {
    const operand = context.instruction.operands[slot]
    if (operand === undefined) {
      throw new ExecutionError(`${this.name}: missing operand ${slot}`)
    }
    return operand
  }

  protected register(context: InstructionContext, slot: number): Register {
    const operand = this.operand(context, slot)
    if (operand.kind !== 'register') {
      throw new ExecutionError(`${this.name}: operand ${slot} is not a register`)
    }
    return operand.register
  }

  protected readRegister(context: InstructionContext, slot: number): number {
    return context.registers.get(this.register(context, slot))
  }

  protected writeRegister(context: InstructionContext, slot: number, value: number): void {
    context.registers.set(this.register(context, slot), value)
  }

  protected immediate(context: InstructionContext, slot: number): number {
    const operand = this.operand(context, slot)
    if (operand.kind !== 'immediate') {
      throw new ExecutionError(`${this.name}: operand ${slot} is not an immediate`)
    }
    return operand.value
  }

  protected address(context: InstructionContext, slot: number): number {
    const operand = this.operand(context, slot)
    if (operand.kind !== 'address') {
      throw new ExecutionError(`${this.name}: operand ${slot} is not an array address`)
    }
    return operand.address
  }

  /** Array address and index of an `@a[Rx]` operand */
  protected entry(
    context: InstructionContext,
    slot: number,
  ): { address: number; index: number } {
    const operand = this.operand(context, slot)
    if (operand.kind !== 'entry') {
      throw new ExecutionError(`${this.name}: operand ${slot} is not an array entry`)
    }
    return { address: operand.address, index: context.registers.get(operand.index) }
  }

  protected slice(context: InstructionContext, slot: number): ResolvedSlice {
    const operand = this.operand(context, slot)
    if (operand.kind !== 'slice') {
      throw new ExecutionError(`${this.name}: operand ${slot} is not an array slice`)
    }
    return {
      address: operand.address,
      start: context.registers.get(operand.start),
      stop: context.registers.get(operand.stop),
    }
  }

  /** Processor handle of the virtual qubit whose id a Q register holds */
  protected qubit(context: InstructionContext, slot: number): QubitHandle {
    return context.qubits.resolve(this.readRegister(context, slot))
  }

  /** Defined array entry, or an execution fault naming what was missing */
  protected definedEntry(
    context: InstructionContext,
    address: number,
    index: number,
    what: string,
  ): number {
    const value = context.arrays.get(address, index)
    if (value === undefined) {
      throw new ExecutionError(`${this.name}: ${what} at @${address}[${index}] is undefined`)
    }
    return value
  }
}
