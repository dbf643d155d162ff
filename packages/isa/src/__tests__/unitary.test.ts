import type { GateName } from '@netq/types'
import { describe, expect, it } from 'vitest'
import {
  type Complex,
  NV_FLAVOUR,
  VANILLA_FLAVOUR,
  apply,
  c,
  defineFlavour,
  equalUpToPhase,
  gateMatrix,
  invalidDecompositions,
  sequenceUnitary,
} from '../../index'

const R = Math.SQRT1_2

const ONE_QUBIT_STATES: Complex[][] = [
  [c(1), c(0)],
  [c(0), c(1)],
  [c(R), c(R)],
  [c(R), c(0, R)],
]

const TWO_QUBIT_STATES: Complex[][] = [
  [c(1), c(0), c(0), c(0)],
  [c(0), c(1), c(0), c(0)],
  [c(0), c(0), c(1), c(0)],
  [c(0), c(0), c(0), c(1)],
  [c(0.5), c(0.5), c(0.5), c(0.5)],
  [c(0.5), c(0, 0.5), c(-0.5), c(0, -0.5)],
]

/** |⟨b|a⟩| for unit vectors: 1 exactly when they differ by a phase */
function overlap(a: readonly Complex[], b: readonly Complex[]): number {
  let re = 0
  let im = 0
  for (const [i, x] of a.entries()) {
    const y = b[i] ?? c(0)
    re += y.re * x.re + y.im * x.im
    im += y.re * x.im - y.im * x.re
  }
  return Math.hypot(re, im)
}

const gates: Array<[GateName, number]> = [
  ['x', 1],
  ['y', 1],
  ['z', 1],
  ['h', 1],
  ['k', 1],
  ['s', 1],
  ['t', 1],
  ['cnot', 2],
  ['cphase', 2],
]

describe('nv decompositions', () => {
  it('should all match their gate up to a global phase', () => {
    expect(invalidDecompositions(NV_FLAVOUR)).toEqual([])
    expect(invalidDecompositions(VANILLA_FLAVOUR)).toEqual([])
  })

  it.each(gates)('should send reference states where %s sends them', (gate, qubitCount) => {
    const decomposed = sequenceUnitary(NV_FLAVOUR.decompositions.get(gate) ?? [], qubitCount)
    const expected = gateMatrix(gate)
    const states = qubitCount === 1 ? ONE_QUBIT_STATES : TWO_QUBIT_STATES

    for (const state of states) {
      expect(overlap(apply(decomposed, state), apply(expected, state))).toBeCloseTo(1, 9)
    }
  })

  it('should flag a table entry that realises a different gate', () => {
    const broken = defineFlavour({
      name: 'nv',
      opcodes: {},
      nativeGates: ['rot_x'],
      decompositions: { x: [{ gate: 'rot_x', qubits: [0], n: 8, d: 4 }] },
      maxArrayAddress: 255,
      angleExponent: 4,
      maxAngleExponent: 4,
    })
    expect(invalidDecompositions(broken)).toEqual(['x'])
  })
})

describe('gateMatrix', () => {
  it('should turn controlled rotations the opposite way for control |1⟩', () => {
    const crot = gateMatrix('crot_x', { n: 1, d: 0 })
    // Rx(π)|0⟩ = -i|1⟩, Rx(-π)|0⟩ = i|1⟩
    expect(apply(crot, [c(1), c(0), c(0), c(0)])[1]?.im).toBeCloseTo(-1, 12)
    expect(apply(crot, [c(0), c(0), c(1), c(0)])[3]?.im).toBeCloseTo(1, 12)
  })

  it('should compare matrices up to a global phase only', () => {
    const x = gateMatrix('x')
    const minusIx = x.map((row) => row.map((value) => c(value.im, -value.re)))
    expect(equalUpToPhase(minusIx, x)).toBe(true)
    expect(equalUpToPhase(gateMatrix('z'), x)).toBe(false)
  })
})
