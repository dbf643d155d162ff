/**
 * Compiler
 *
 * Operation program → finalized subroutine: lowering, liveness, register
 * allocation, then label resolution and flavour validation through the
 * subroutine builder.
 */

import { LayoutError, NetqError, logger, toError } from '@netq/core'
import { SubroutineBuilder, entry, reg, slice } from '@netq/isa'
import type {
  Flavour,
  Instruction,
  Operand,
  OperationProgram,
  Register,
  Safe,
  Subroutine,
} from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { allocateRegisters, computeIntervals, findOverlap, fixedRegisters } from './allocator'
import { type LoweredInstruction, type VirtualSlot, lowerProgram } from './lower'

export interface CompileOptions {
  id?: number
  appId?: number
}

export interface CompiledSubroutine {
  readonly subroutine: Subroutine
  /** Builder variable → register it was given */
  readonly registers: ReadonlyMap<number, Register>
}

function resolveInstruction(
  instruction: LoweredInstruction,
  assignment: ReadonlyMap<number, Register>,
): Instruction {
  const resolve = (slot: VirtualSlot): Register => {
    if (slot.kind === 'fixed') return slot.register
    const assigned = assignment.get(slot.id)
    if (!assigned) throw new LayoutError(`Virtual register v${slot.id} has no register`)
    return assigned
  }

  return {
    mnemonic: instruction.mnemonic,
    operands: instruction.operands.map((operand): Operand => {
      switch (operand.kind) {
        case 'register': {
          const target = resolve(operand.slot)
          return reg(target.bank, target.index)
        }
        case 'entry':
          return entry(operand.address, resolve(operand.index))
        case 'slice':
          return slice(operand.address, resolve(operand.start), resolve(operand.stop))
        default:
          return operand
      }
    }),
  }
}

/**
 * Compile one flushed program for `flavour`.
 */
export function compile(
  program: OperationProgram,
  flavour: Flavour,
  options: CompileOptions = {},
): Safe<CompiledSubroutine, NetqError> {
  try {
    const lowered = lowerProgram(program, flavour)
    const intervals = computeIntervals(lowered.commands, lowered.pinned)
    const assignment = allocateRegisters(
      intervals,
      flavour.registersPerBank,
      fixedRegisters(lowered.commands),
    )
    const overlap = findOverlap(intervals, assignment)
    if (overlap) return safeError(overlap)

    const builder = new SubroutineBuilder({ id: options.id, appId: options.appId })
    for (const command of lowered.commands) {
      if (command.type === 'label') builder.label(command.name)
      else builder.add(resolveInstruction(command.instruction, assignment), command.hostLine)
    }
    const [error, subroutine] = builder.finalize(flavour)
    if (error) return safeError(error)

    const registers = new Map<number, Register>()
    for (const [variable, id] of lowered.variables) {
      const assigned = assignment.get(id)
      if (assigned) registers.set(variable, assigned)
    }

    logger.debug('Compiled subroutine', {
      epoch: program.epoch,
      id: subroutine.id,
      instructions: subroutine.instructions.length,
      registers: new Set([...assignment.values()].map((value) => value.index)).size,
    })
    return safeResult({ subroutine, registers })
  } catch (error) {
    if (error instanceof NetqError) return safeError(error)
    throw toError(error)
  }
}
