/**
 * Subroutine Model
 *
 * Instructions are accumulated in program order together with label markers;
 * finalize() resolves labels to instruction indices and validates the result
 * against a flavour.
 */

import {
  EncodingError,
  LayoutError,
  UnsupportedOperationError,
} from '@netq/core'
import type {
  Command,
  Flavour,
  Instruction,
  Safe,
  Subroutine,
  SubroutineMetadata,
} from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { NETQASM_VERSION } from './config'
import { imm, instructionRegisters, operandAddress, registerName } from './operands'
import { checkShape, targetSlot } from './shape'

export const LABEL_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

export interface SubroutineBuilderOptions {
  id?: number
  appId?: number
  netqasmVersion?: readonly [number, number]
}

export type SubroutineValidationError =
  | EncodingError
  | LayoutError
  | UnsupportedOperationError

export class SubroutineBuilder {
  private readonly commands: Command[] = []
  private instructionCount = 0

  constructor(private readonly options: SubroutineBuilderOptions = {}) {}

  get length(): number {
    return this.instructionCount
  }

  add(instruction: Instruction, hostLine?: number): this {
    this.commands.push({ type: 'instruction', instruction, hostLine })
    this.instructionCount++
    return this
  }

  label(name: string): this {
    this.commands.push({ type: 'label', name })
    return this
  }

  /**
   * Resolve labels and validate.
   * Duplicate or malformed labels and dangling branch targets are layout errors.
   */
  finalize(flavour: Flavour): Safe<Subroutine, SubroutineValidationError> {
    const labels = new Map<string, number>()
    const pending: Instruction[] = []
    const debugLines = new Map<number, number>()

    for (const command of this.commands) {
      if (command.type === 'label') {
        if (!LABEL_PATTERN.test(command.name)) {
          return safeError(new LayoutError(`Invalid label name: ${command.name}`))
        }
        if (labels.has(command.name)) {
          return safeError(new LayoutError(`Duplicate label: ${command.name}`))
        }
        labels.set(command.name, pending.length)
        continue
      }
      if (command.hostLine !== undefined) {
        debugLines.set(pending.length, command.hostLine)
      }
      pending.push(command.instruction)
    }

    const instructions: Instruction[] = []
    for (const instruction of pending) {
      const shapeError = checkShape(instruction, true)
      if (shapeError) return safeError(shapeError)

      const slot = targetSlot(instruction)
      const target = slot >= 0 ? instruction.operands[slot] : undefined
      if (target?.kind !== 'label') {
        instructions.push(instruction)
        continue
      }
      const index = labels.get(target.name)
      if (index === undefined) {
        return safeError(
          new LayoutError(`Branch target ${target.name} does not name a label`),
        )
      }
      instructions.push({
        mnemonic: instruction.mnemonic,
        operands: instruction.operands.map((operand, i) =>
          i === slot ? imm(index) : operand,
        ),
      })
    }

    const subroutine: Subroutine = {
      id: this.options.id ?? 0,
      metadata: createMetadata(this.options.appId ?? 0, this.options.netqasmVersion),
      instructions,
      labels,
      debugLines,
    }

    const error = validateSubroutine(subroutine, flavour)
    if (error) return safeError(error)
    return safeResult(subroutine)
  }
}

/**
 * Check a resolved subroutine against a flavour's opcode set and limits.
 * Returns the first violation, or null.
 */
export function validateSubroutine(
  subroutine: Subroutine,
  flavour: Flavour,
): SubroutineValidationError | null {
  const count = subroutine.instructions.length

  for (const [index, instruction] of subroutine.instructions.entries()) {
    const where = `instruction ${index} (${instruction.mnemonic})`

    if (!flavour.opcodes.has(instruction.mnemonic)) {
      return new UnsupportedOperationError(
        `${where} is not part of the ${flavour.name} flavour`,
      )
    }

    const shapeError = checkShape(instruction)
    if (shapeError) return shapeError

    for (const register of instructionRegisters(instruction)) {
      if (
        !Number.isInteger(register.index) ||
        register.index < 0 ||
        register.index >= flavour.registersPerBank
      ) {
        return new LayoutError(
          `${where}: register ${registerName(register)} exceeds ${flavour.registersPerBank} registers per bank`,
        )
      }
    }

    for (const operand of instruction.operands) {
      const address = operandAddress(operand)
      if (address !== null && (address < 0 || address > flavour.maxArrayAddress)) {
        return new LayoutError(
          `${where}: array address ${address} outside 0..${flavour.maxArrayAddress}`,
        )
      }
    }

    const slot = targetSlot(instruction)
    const target = slot >= 0 ? instruction.operands[slot] : undefined
    if (target?.kind === 'immediate' && (target.value < 0 || target.value > count)) {
      return new LayoutError(`${where}: branch target ${target.value} outside 0..${count}`)
    }
  }

  for (const [name, index] of subroutine.labels) {
    if (index < 0 || index > count) {
      return new LayoutError(`Label ${name} points outside the subroutine`)
    }
  }

  return null
}

export function createMetadata(
  appId: number,
  netqasmVersion: readonly [number, number] = NETQASM_VERSION,
): SubroutineMetadata {
  return { appId, netqasmVersion }
}
