import { EncodingError } from '@netq/core'
import type { Instruction, Operand, OperandShape } from '@netq/types'
import { ENCODING_CONFIG, OPERAND_SHAPES } from './config'

function isInt32(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= ENCODING_CONFIG.INT32_MIN &&
    value <= ENCODING_CONFIG.INT32_MAX
  )
}

function isUint8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= ENCODING_CONFIG.UINT8_MAX
}

function fits(shape: OperandShape, operand: Operand, allowLabels: boolean): boolean {
  switch (shape) {
    case 'reg':
      return operand.kind === 'register'
    case 'imm':
      return operand.kind === 'immediate' && isInt32(operand.value)
    case 'imm8':
      return operand.kind === 'immediate' && isUint8(operand.value)
    case 'addr':
      return operand.kind === 'address' && isInt32(operand.address)
    case 'entry':
      return operand.kind === 'entry' && isInt32(operand.address)
    case 'slice':
      return operand.kind === 'slice' && isInt32(operand.address)
    case 'target':
      if (operand.kind === 'label') return allowLabels
      return operand.kind === 'immediate' && isInt32(operand.value)
  }
}

/**
 * Check operand count and kinds against the mnemonic's shape.
 * Labels are accepted in target slots only while `allowLabels` is set.
 */
export function checkShape(
  instruction: Instruction,
  allowLabels = false,
): EncodingError | null {
  const shape = OPERAND_SHAPES[instruction.mnemonic]
  if (instruction.operands.length !== shape.length) {
    return new EncodingError(
      `${instruction.mnemonic} takes ${shape.length} operands, got ${instruction.operands.length}`,
    )
  }
  for (const [i, slot] of shape.entries()) {
    const operand = instruction.operands[i]
    if (operand === undefined || !fits(slot, operand, allowLabels)) {
      return new EncodingError(
        `${instruction.mnemonic}: operand ${i} must be ${slot}, got ${operand?.kind ?? 'nothing'}`,
      )
    }
  }
  return null
}

/** Position of the branch target operand, or -1 for non-branches */
export function targetSlot(instruction: Instruction): number {
  return OPERAND_SHAPES[instruction.mnemonic].indexOf('target')
}

/** Resolved branch target index, or null when unresolved / not a branch */
export function branchTarget(instruction: Instruction): number | null {
  const slot = targetSlot(instruction)
  if (slot < 0) return null
  const operand = instruction.operands[slot]
  return operand?.kind === 'immediate' ? operand.value : null
}

/** Copy of `instruction` with its target slot replaced */
export function withTarget(instruction: Instruction, target: Operand): Instruction {
  const slot = targetSlot(instruction)
  if (slot < 0) return instruction
  return {
    mnemonic: instruction.mnemonic,
    operands: instruction.operands.map((operand, i) => (i === slot ? target : operand)),
  }
}
