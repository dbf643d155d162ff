import {
  type DecompositionStep,
  type Flavour,
  type FlavourName,
  GATE_NAMES,
  type GateName,
  type Mnemonic,
} from '@netq/types'
import { MNEMONICS, REGISTER_CONFIG } from '../config'

export interface FlavourDefinition {
  name: FlavourName
  opcodes: Partial<Record<Mnemonic, number>>
  nativeGates: readonly GateName[]
  decompositions: Partial<Record<GateName, readonly DecompositionStep[]>>
  maxArrayAddress: number
  angleExponent: number | null
  maxAngleExponent: number
}

/** Freeze a table-style definition into a Flavour value */
export function defineFlavour(definition: FlavourDefinition): Flavour {
  const opcodes = new Map<Mnemonic, number>()
  for (const mnemonic of MNEMONICS) {
    const id = definition.opcodes[mnemonic]
    if (id !== undefined) opcodes.set(mnemonic, id)
  }

  const decompositions = new Map<GateName, readonly DecompositionStep[]>()
  for (const gate of GATE_NAMES) {
    const steps = definition.decompositions[gate]
    if (steps) decompositions.set(gate, steps)
  }

  return Object.freeze({
    name: definition.name,
    opcodes,
    nativeGates: new Set(definition.nativeGates),
    decompositions,
    registersPerBank: REGISTER_CONFIG.PER_BANK,
    maxArrayAddress: definition.maxArrayAddress,
    angleExponent: definition.angleExponent,
    maxAngleExponent: definition.maxAngleExponent,
  })
}

/** Binary opcode id → mnemonic, for decoding */
export function opcodeTable(flavour: Flavour): Map<number, Mnemonic> {
  const table = new Map<number, Mnemonic>()
  for (const [mnemonic, id] of flavour.opcodes) table.set(id, mnemonic)
  return table
}
