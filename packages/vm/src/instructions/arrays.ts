/**
 * Array Instructions
 */

import { ExecutionError } from '@netq/core'
import type { InstructionContext, InstructionResult } from '@netq/types'
import { BaseInstruction } from './base'

/** `array Rlen @a` creates (or replaces) an all-undefined array */
export class ArrayInstruction extends BaseInstruction {
  readonly name = 'array'

  execute(context: InstructionContext): InstructionResult {
    const length = this.readRegister(context, 0)
    const address = this.address(context, 1)
    context.arrays.init(address, length)
    context.log(`Initialized array @${address} of length ${length}`)
    return this.continue()
  }
}

export class StoreInstruction extends BaseInstruction {
  readonly name = 'store'

  execute(context: InstructionContext): InstructionResult {
    const { address, index } = this.entry(context, 1)
    context.arrays.set(address, index, this.readRegister(context, 0))
    return this.continue()
  }
}

export class LoadInstruction extends BaseInstruction {
  readonly name = 'load'

  execute(context: InstructionContext): InstructionResult {
    const { address, index } = this.entry(context, 1)
    const value = context.arrays.get(address, index)
    if (value === undefined) {
      throw new ExecutionError(`Array entry @${address}[${index}] is undefined`)
    }
    this.writeRegister(context, 0, value)
    return this.continue()
  }
}

export class UndefInstruction extends BaseInstruction {
  readonly name = 'undef'

  execute(context: InstructionContext): InstructionResult {
    const { address, index } = this.entry(context, 0)
    context.arrays.set(address, index, undefined)
    return this.continue()
  }
}

/** `lea R @a` loads the address itself */
export class LeaInstruction extends BaseInstruction {
  readonly name = 'lea'

  execute(context: InstructionContext): InstructionResult {
    this.writeRegister(context, 0, this.address(context, 1))
    return this.continue()
  }
}
