import type { DecompositionStep } from '@netq/types'
import { CORE_OPCODES, NV_GATE_OPCODES } from '../config'
import { defineFlavour } from './define'

const rx = (n: number, qubit = 0): DecompositionStep => ({ gate: 'rot_x', qubits: [qubit], n, d: 4 })
const ry = (n: number, qubit = 0): DecompositionStep => ({ gate: 'rot_y', qubits: [qubit], n, d: 4 })
const rz = (n: number, qubit = 0): DecompositionStep => ({ gate: 'rot_z', qubits: [qubit], n, d: 4 })
const crx = (n: number): DecompositionStep => ({ gate: 'crot_x', qubits: [0, 1], n, d: 4 })

/**
 * Nitrogen-vacancy-centre-like target: rotations and controlled rotations
 * only, with every angle a multiple of π/16. Steps run first to last.
 */
export const NV_DECOMPOSITIONS = {
  x: [rx(16)],
  y: [ry(16)],
  z: [rx(24), ry(16), rx(8)],
  h: [ry(8), rx(16)],
  k: [rx(24), ry(16)],
  s: [rx(24), ry(8), rx(8)],
  t: [rx(24), ry(4), rx(8)],
  cnot: [crx(8), rz(24, 0), rx(24, 1)],
  cphase: [ry(8, 1), crx(8), rz(24, 0), rx(24, 1), ry(24, 1)],
} as const satisfies Record<string, readonly DecompositionStep[]>

export const NV_FLAVOUR = defineFlavour({
  name: 'nv',
  opcodes: { ...CORE_OPCODES, ...NV_GATE_OPCODES },
  nativeGates: ['rot_x', 'rot_y', 'rot_z', 'crot_x', 'crot_y'],
  decompositions: NV_DECOMPOSITIONS,
  maxArrayAddress: 255,
  angleExponent: 4,
  maxAngleExponent: 4,
})
