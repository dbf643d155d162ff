/**
 * Register Instructions
 *
 * set, mov and the 32-bit arithmetic family. Results wrap to int32 when
 * stored; division and remainder round towards negative infinity.
 */

import { ExecutionError } from '@netq/core'
import type { InstructionContext, InstructionResult } from '@netq/types'
import { BaseInstruction } from './base'

export class SetInstruction extends BaseInstruction {
  readonly name = 'set'

  execute(context: InstructionContext): InstructionResult {
    this.writeRegister(context, 0, this.immediate(context, 1))
    return this.continue()
  }
}

export class MovInstruction extends BaseInstruction {
  readonly name = 'mov'

  execute(context: InstructionContext): InstructionResult {
    this.writeRegister(context, 0, this.readRegister(context, 1))
    return this.continue()
  }
}

type BinaryMnemonic = 'add' | 'sub' | 'mul' | 'div' | 'rem'

function floorDiv(a: number, b: number): number {
  if (b === 0) throw new ExecutionError(`Division of ${a} by zero`)
  return Math.floor(a / b)
}

function floorMod(a: number, b: number): number {
  if (b === 0) throw new ExecutionError(`Remainder of ${a} by zero`)
  return ((a % b) + b) % b
}

const BINARY_OPERATIONS: Readonly<Record<BinaryMnemonic, (a: number, b: number) => number>> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => Math.imul(a, b),
  div: floorDiv,
  rem: floorMod,
}

/** `op Rout Ra Rb` */
export class BinaryInstruction extends BaseInstruction {
  constructor(readonly name: BinaryMnemonic) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const a = this.readRegister(context, 1)
    const b = this.readRegister(context, 2)
    const value = BINARY_OPERATIONS[this.name](a, b)
    context.log(`${a} ${this.name} ${b} = ${value}`)
    this.writeRegister(context, 0, value)
    return this.continue()
  }
}

/** `addm|subm Rout Ra Rb Rmod`, result in [0, mod) */
export class ModularInstruction extends BaseInstruction {
  constructor(readonly name: 'addm' | 'subm') {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const a = this.readRegister(context, 1)
    const b = this.readRegister(context, 2)
    const modulus = this.readRegister(context, 3)
    if (modulus < 1) {
      throw new ExecutionError(`Modulus must be at least 1, got ${modulus}`)
    }
    const value = floorMod(this.name === 'addm' ? a + b : a - b, modulus)
    this.writeRegister(context, 0, value)
    return this.continue()
  }
}
