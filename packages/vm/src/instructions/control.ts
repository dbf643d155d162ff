/**
 * Return and Breakpoint Instructions
 */

import { ExecutionError } from '@netq/core'
import { BREAKPOINT_ACTIONS, BREAKPOINT_ROLES, registerName } from '@netq/isa'
import {
  type InstructionContext,
  type InstructionResult,
  RESULT_CODES,
} from '@netq/types'
import { BaseInstruction } from './base'

const ACTIONS: ReadonlySet<number> = new Set(Object.values(BREAKPOINT_ACTIONS))
const ROLES: ReadonlySet<number> = new Set(Object.values(BREAKPOINT_ROLES))

/** `ret_reg R` publishes the register's value */
export class RetRegInstruction extends BaseInstruction {
  readonly name = 'ret_reg'

  execute(context: InstructionContext): InstructionResult {
    const register = this.register(context, 0)
    context.returnedRegisters.set(registerName(register), context.registers.get(register))
    return this.continue()
  }
}

/** `ret_arr @a` publishes a copy of the array, undefined entries included */
export class RetArrInstruction extends BaseInstruction {
  readonly name = 'ret_arr'

  execute(context: InstructionContext): InstructionResult {
    const address = this.address(context, 0)
    const values = context.arrays.slice(address, 0, context.arrays.length(address))
    context.returnedArrays.set(address, values)
    return this.continue()
  }
}

export class RetInstruction extends BaseInstruction {
  readonly name = 'ret'

  execute(): InstructionResult {
    return { resultCode: RESULT_CODES.HALT }
  }
}

/** `breakpoint action role` hands a state snapshot to the processor */
export class BreakpointInstruction extends BaseInstruction {
  readonly name = 'breakpoint'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const action = this.immediate(context, 0)
    const role = this.immediate(context, 1)
    if (!ACTIONS.has(action) || !ROLES.has(role)) {
      throw new ExecutionError(`breakpoint: unknown action ${action} or role ${role}`)
    }
    if (action === BREAKPOINT_ACTIONS.NOP) return this.continue()

    await context.processor.recordBreakpoint({
      action,
      role,
      instructionIndex: context.index,
      registers: context.registers.snapshot(),
      arrays: context.arrays.snapshot(),
    })
    return this.continue()
  }
}
