/**
 * Gate Transpilation
 *
 * Rewrites gates a flavour does not execute natively into its decomposition
 * table, and puts every rotation angle into the flavour's canonical form.
 * Branch targets, labels and debug lines follow the instructions they point
 * at.
 */

import { UnsupportedOperationError } from '@netq/core'
import {
  branchTarget,
  canonicalAngle,
  canonicalizeInstruction,
  imm,
  instr,
  reg,
  registerName,
  validateSubroutine,
  withTarget,
  type SubroutineValidationError,
} from '@netq/isa'
import {
  type AngleSpec,
  type Flavour,
  GATE_NAMES,
  type GateName,
  type Instruction,
  type Mnemonic,
  type Register,
  type Safe,
  type Subroutine,
  safeError,
  safeResult,
} from '@netq/types'

const GATES: ReadonlySet<string> = new Set(GATE_NAMES)

export function isGateMnemonic(mnemonic: Mnemonic): mnemonic is GateName {
  return GATES.has(mnemonic)
}

export function isRotationGate(gate: GateName): boolean {
  return gate.startsWith('rot_') || gate.startsWith('crot_')
}

function gateInstruction(
  gate: GateName,
  registers: readonly Register[],
  angle: AngleSpec | undefined,
  flavour: Flavour,
): Instruction {
  const operands = registers.map((register) => reg(register.bank, register.index))
  if (!isRotationGate(gate)) return instr(gate, ...operands)
  const canonical = canonicalAngle(angle ?? { n: 0, d: 0 }, flavour)
  return instr(gate, ...operands, imm(canonical.n), imm(canonical.d))
}

/**
 * Instructions realising `gate` on `registers` for the flavour: the gate
 * itself when native, its decomposition otherwise, null when neither exists.
 */
export function gateInstructions(
  gate: GateName,
  registers: readonly Register[],
  angle: AngleSpec | undefined,
  flavour: Flavour,
): Instruction[] | null {
  if (flavour.nativeGates.has(gate)) {
    return [gateInstruction(gate, registers, angle, flavour)]
  }
  const steps = flavour.decompositions.get(gate)
  if (!steps) return null

  const instructions: Instruction[] = []
  for (const step of steps) {
    const stepRegisters: Register[] = []
    for (const qubit of step.qubits) {
      const register = registers[qubit]
      if (!register) return null
      stepRegisters.push(register)
    }
    const stepAngle =
      step.n !== undefined && step.d !== undefined ? { n: step.n, d: step.d } : undefined
    instructions.push(gateInstruction(step.gate, stepRegisters, stepAngle, flavour))
  }
  return instructions
}

function expand(
  instruction: Instruction,
  flavour: Flavour,
): Instruction[] | UnsupportedOperationError {
  const { mnemonic } = instruction
  if (!isGateMnemonic(mnemonic) || flavour.nativeGates.has(mnemonic)) {
    return [canonicalizeInstruction(instruction, flavour)]
  }
  const registers: Register[] = []
  for (const operand of instruction.operands) {
    if (operand.kind === 'register') registers.push(operand.register)
  }
  const replaced = isRotationGate(mnemonic)
    ? null
    : gateInstructions(mnemonic, registers, undefined, flavour)
  if (!replaced) {
    return new UnsupportedOperationError(
      `${mnemonic} ${registers.map(registerName).join(' ')} has no ${flavour.name} realisation`,
    )
  }
  return replaced
}

/**
 * Rewrite a finalized subroutine for `flavour`.
 * Fails with UnsupportedOperationError on a gate the flavour can neither
 * run nor decompose.
 */
export function transpileSubroutine(
  subroutine: Subroutine,
  flavour: Flavour,
): Safe<Subroutine, UnsupportedOperationError | SubroutineValidationError> {
  const expanded: Instruction[][] = []
  // old index → index of its first replacement; the end maps to the new end
  const indexMap: number[] = []
  let next = 0
  for (const instruction of subroutine.instructions) {
    const replacement = expand(instruction, flavour)
    if (replacement instanceof UnsupportedOperationError) return safeError(replacement)
    indexMap.push(next)
    expanded.push(replacement)
    next += replacement.length
  }
  indexMap.push(next)

  const relocate = (index: number): number => indexMap[index] ?? index
  const instructions: Instruction[] = []
  const debugLines = new Map<number, number>()
  for (const [index, replacement] of expanded.entries()) {
    const hostLine = subroutine.debugLines.get(index)
    for (const instruction of replacement) {
      if (hostLine !== undefined) debugLines.set(instructions.length, hostLine)
      const target = branchTarget(instruction)
      instructions.push(
        target === null ? instruction : withTarget(instruction, imm(relocate(target))),
      )
    }
  }

  const labels = new Map<string, number>()
  for (const [name, index] of subroutine.labels) labels.set(name, relocate(index))

  const transpiled: Subroutine = {
    id: subroutine.id,
    metadata: subroutine.metadata,
    instructions,
    labels,
    debugLines,
  }
  const error = validateSubroutine(transpiled, flavour)
  if (error) return safeError(error)
  return safeResult(transpiled)
}
