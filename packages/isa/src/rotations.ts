import type { AngleSpec, Flavour, Instruction } from '@netq/types'
import { canonicalAngle } from './angle'
import { imm } from './operands'

const ROTATION_MNEMONICS: ReadonlySet<string> = new Set([
  'rot_x',
  'rot_y',
  'rot_z',
  'crot_x',
  'crot_y',
])

export function isRotation(instruction: Instruction): boolean {
  return ROTATION_MNEMONICS.has(instruction.mnemonic)
}

/** The (n, d) pair of a rotation: its last two operands */
export function rotationAngle(instruction: Instruction): AngleSpec | null {
  if (!isRotation(instruction)) return null
  const n = instruction.operands.at(-2)
  const d = instruction.operands.at(-1)
  if (n?.kind !== 'immediate' || d?.kind !== 'immediate') return null
  return { n: n.value, d: d.value }
}

export function withAngle(instruction: Instruction, angle: AngleSpec): Instruction {
  const count = instruction.operands.length
  return {
    mnemonic: instruction.mnemonic,
    operands: [...instruction.operands.slice(0, count - 2), imm(angle.n), imm(angle.d)],
  }
}

/** Rotation angles rewritten to the flavour's canonical form */
export function canonicalizeInstruction(
  instruction: Instruction,
  flavour: Flavour,
): Instruction {
  const angle = rotationAngle(instruction)
  if (!angle || !Number.isInteger(angle.n) || !Number.isInteger(angle.d) || angle.d < 0) {
    return instruction
  }
  return withAngle(instruction, canonicalAngle(angle, flavour))
}
