/**
 * Small dense complex-matrix helpers for checking gate decompositions.
 * Qubit 0 is the most significant tensor factor.
 */

import type { AngleSpec, DecompositionStep, Flavour, GateName } from '@netq/types'
import { angleToRadians } from './angle'

export interface Complex {
  re: number
  im: number
}

export type Matrix = Complex[][]

export const c = (re: number, im = 0): Complex => ({ re, im })

const mul = (a: Complex, b: Complex): Complex =>
  c(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re)
const add = (a: Complex, b: Complex): Complex => c(a.re + b.re, a.im + b.im)
const abs = (a: Complex): number => Math.hypot(a.re, a.im)
const expI = (phi: number): Complex => c(Math.cos(phi), Math.sin(phi))

export function identity(size: number): Matrix {
  return Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => c(i === j ? 1 : 0)),
  )
}

function at(matrix: Matrix, i: number, j: number): Complex {
  return matrix[i]?.[j] ?? c(0)
}

export function multiply(a: Matrix, b: Matrix): Matrix {
  const size = a.length
  return Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => {
      let sum = c(0)
      for (let k = 0; k < size; k++) sum = add(sum, mul(at(a, i, k), at(b, k, j)))
      return sum
    }),
  )
}

export function kron(a: Matrix, b: Matrix): Matrix {
  const size = a.length * b.length
  return Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) =>
      mul(
        at(a, Math.floor(i / b.length), Math.floor(j / b.length)),
        at(b, i % b.length, j % b.length),
      ),
    ),
  )
}

function sum(a: Matrix, b: Matrix): Matrix {
  return a.map((row, i) => row.map((value, j) => add(value, at(b, i, j))))
}

export function apply(matrix: Matrix, state: readonly Complex[]): Complex[] {
  return matrix.map((row) =>
    row.reduce((acc, value, j) => add(acc, mul(value, state[j] ?? c(0))), c(0)),
  )
}

function rotation(axis: 'x' | 'y' | 'z', theta: number): Matrix {
  const cos = Math.cos(theta / 2)
  const sin = Math.sin(theta / 2)
  switch (axis) {
    case 'x':
      return [
        [c(cos), c(0, -sin)],
        [c(0, -sin), c(cos)],
      ]
    case 'y':
      return [
        [c(cos), c(-sin)],
        [c(sin), c(cos)],
      ]
    case 'z':
      return [
        [expI(-theta / 2), c(0)],
        [c(0), expI(theta / 2)],
      ]
  }
}

const PROJECT_0: Matrix = [
  [c(1), c(0)],
  [c(0), c(0)],
]
const PROJECT_1: Matrix = [
  [c(0), c(0)],
  [c(0), c(1)],
]

// Controlled rotations turn by θ when the control is |0⟩ and by −θ when |1⟩
function controlledRotation(axis: 'x' | 'y', theta: number): Matrix {
  return sum(
    kron(PROJECT_0, rotation(axis, theta)),
    kron(PROJECT_1, rotation(axis, -theta)),
  )
}

const R = Math.SQRT1_2

const FIXED_GATES: Partial<Record<GateName, Matrix>> = {
  x: [
    [c(0), c(1)],
    [c(1), c(0)],
  ],
  y: [
    [c(0), c(0, -1)],
    [c(0, 1), c(0)],
  ],
  z: [
    [c(1), c(0)],
    [c(0), c(-1)],
  ],
  h: [
    [c(R), c(R)],
    [c(R), c(-R)],
  ],
  k: [
    [c(R), c(0, -R)],
    [c(0, R), c(-R)],
  ],
  s: [
    [c(1), c(0)],
    [c(0), c(0, 1)],
  ],
  t: [
    [c(1), c(0)],
    [c(0), expI(Math.PI / 4)],
  ],
  cnot: [
    [c(1), c(0), c(0), c(0)],
    [c(0), c(1), c(0), c(0)],
    [c(0), c(0), c(0), c(1)],
    [c(0), c(0), c(1), c(0)],
  ],
  cphase: [
    [c(1), c(0), c(0), c(0)],
    [c(0), c(1), c(0), c(0)],
    [c(0), c(0), c(1), c(0)],
    [c(0), c(0), c(0), c(-1)],
  ],
}

/** Matrix of a gate on its own qubits (2x2 or 4x4) */
export function gateMatrix(gate: GateName, angle?: AngleSpec): Matrix {
  const fixed = FIXED_GATES[gate]
  if (fixed) return fixed

  const theta = angle ? angleToRadians(angle) : 0
  switch (gate) {
    case 'rot_x':
      return rotation('x', theta)
    case 'rot_y':
      return rotation('y', theta)
    case 'rot_z':
      return rotation('z', theta)
    case 'crot_x':
      return controlledRotation('x', theta)
    case 'crot_y':
      return controlledRotation('y', theta)
    default:
      throw new Error(`No matrix for gate ${gate}`)
  }
}

export function isTwoQubitGate(gate: GateName): boolean {
  return gate === 'cnot' || gate === 'cphase' || gate === 'crot_x' || gate === 'crot_y'
}

/** Lift a step acting on `qubits` to an operator on `qubitCount` (1 or 2) qubits */
function embed(matrix: Matrix, qubits: readonly number[], qubitCount: number): Matrix {
  if (qubitCount === 1 || qubits.length === 2) {
    return qubits[0] === 1 && qubits[1] === 0 ? swapped(matrix) : matrix
  }
  return qubits[0] === 0
    ? kron(matrix, identity(2))
    : kron(identity(2), matrix)
}

const SWAP: Matrix = [
  [c(1), c(0), c(0), c(0)],
  [c(0), c(0), c(1), c(0)],
  [c(0), c(1), c(0), c(0)],
  [c(0), c(0), c(0), c(1)],
]

function swapped(matrix: Matrix): Matrix {
  return multiply(SWAP, multiply(matrix, SWAP))
}

/** Combined operator of steps applied first to last */
export function sequenceUnitary(
  steps: readonly DecompositionStep[],
  qubitCount: number,
): Matrix {
  let result = identity(2 ** qubitCount)
  for (const step of steps) {
    const angle =
      step.n !== undefined && step.d !== undefined ? { n: step.n, d: step.d } : undefined
    const matrix = embed(gateMatrix(step.gate, angle), step.qubits, qubitCount)
    result = multiply(matrix, result)
  }
  return result
}

/** Equality up to a global phase factor */
export function equalUpToPhase(a: Matrix, b: Matrix, tolerance = 1e-9): boolean {
  if (a.length !== b.length) return false
  let phase: Complex | null = null
  for (let i = 0; i < a.length && phase === null; i++) {
    for (let j = 0; j < a.length; j++) {
      const target = at(b, i, j)
      if (abs(target) > tolerance) {
        const value = at(a, i, j)
        const norm = target.re * target.re + target.im * target.im
        // value / target
        phase = c(
          (value.re * target.re + value.im * target.im) / norm,
          (value.im * target.re - value.re * target.im) / norm,
        )
        break
      }
    }
  }
  if (phase === null || Math.abs(abs(phase) - 1) > tolerance) return false
  const factor = phase
  return a.every((row, i) =>
    row.every((value, j) => {
      const expected = mul(factor, at(b, i, j))
      return abs(c(value.re - expected.re, value.im - expected.im)) <= tolerance
    }),
  )
}

/** Gates whose decomposition table entry differs from the gate's unitary */
export function invalidDecompositions(flavour: Flavour): GateName[] {
  const invalid: GateName[] = []
  for (const [gate, steps] of flavour.decompositions) {
    const qubitCount = isTwoQubitGate(gate) ? 2 : 1
    if (!equalUpToPhase(sequenceUnitary(steps, qubitCount), gateMatrix(gate))) {
      invalid.push(gate)
    }
  }
  return invalid
}
