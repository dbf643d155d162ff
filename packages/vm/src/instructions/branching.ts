/**
 * Branching Instructions
 *
 * On a taken branch the handler moves the program counter to the target;
 * otherwise it leaves it alone and the engine advances by one.
 */

import type { BranchMnemonic, InstructionContext, InstructionResult } from '@netq/types'
import { BaseInstruction } from './base'

type UnaryBranch = 'bez' | 'bnz'
type BinaryBranch = 'beq' | 'bne' | 'blt' | 'bge'

const UNARY_CONDITIONS: Readonly<Record<UnaryBranch, (a: number) => boolean>> = {
  bez: (a) => a === 0,
  bnz: (a) => a !== 0,
}

const BINARY_CONDITIONS: Readonly<Record<BinaryBranch, (a: number, b: number) => boolean>> = {
  beq: (a, b) => a === b,
  bne: (a, b) => a !== b,
  blt: (a, b) => a < b,
  bge: (a, b) => a >= b,
}

abstract class BranchInstruction extends BaseInstruction {
  abstract override readonly name: BranchMnemonic

  protected branch(context: InstructionContext, taken: boolean, targetSlot: number): InstructionResult {
    if (taken) {
      const target = this.immediate(context, targetSlot)
      context.log(`Branching to ${target}`)
      context.pc = target
    }
    return this.continue()
  }
}

export class JumpInstruction extends BranchInstruction {
  readonly name = 'jmp'

  execute(context: InstructionContext): InstructionResult {
    return this.branch(context, true, 0)
  }
}

export class UnaryBranchInstruction extends BranchInstruction {
  constructor(readonly name: UnaryBranch) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const a = this.readRegister(context, 0)
    return this.branch(context, UNARY_CONDITIONS[this.name](a), 1)
  }
}

export class BinaryBranchInstruction extends BranchInstruction {
  constructor(readonly name: BinaryBranch) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const a = this.readRegister(context, 0)
    const b = this.readRegister(context, 1)
    return this.branch(context, BINARY_CONDITIONS[this.name](a, b), 2)
  }
}
