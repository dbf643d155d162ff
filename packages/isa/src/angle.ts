/**
 * Rotation angles as rational multiples of π: angle = n·π/2^d.
 *
 * Rounding to the discrete grid is round-half-even throughout, so identical
 * inputs always produce identical instructions.
 */

import type { AngleSpec, Flavour } from '@netq/types'

export const ANGLE_TOLERANCE = 1e-9

const TWO_PI = 2 * Math.PI

export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const diff = value - floor
  if (diff > 0.5) return floor + 1
  if (diff < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

function modulo(value: number, period: number): number {
  return ((value % period) + period) % period
}

export function angleToRadians(angle: AngleSpec): number {
  return (angle.n * Math.PI) / 2 ** angle.d
}

/** Lowest terms: n in [0, 2^(d+1)), n odd unless n = 0, and then d = 0 */
export function reduceAngle(angle: AngleSpec): AngleSpec {
  let d = angle.d
  let n = modulo(angle.n, 2 ** (d + 1))
  if (n === 0) return { n: 0, d: 0 }
  while (d > 0 && n % 2 === 0) {
    n /= 2
    d -= 1
  }
  return { n, d }
}

/** Same angle on the grid of exponent `exponent`, rounding when it gets coarser */
export function reexpressAngle(angle: AngleSpec, exponent: number): AngleSpec {
  const n =
    angle.d <= exponent
      ? angle.n * 2 ** (exponent - angle.d)
      : roundHalfEven(angle.n / 2 ** (angle.d - exponent))
  return { n: modulo(n, 2 ** (exponent + 1)), d: exponent }
}

/** Nearest angle on the grid of a fixed exponent */
export function angleAtExponent(radians: number, exponent: number): AngleSpec {
  const theta = modulo(radians, TWO_PI)
  const n = roundHalfEven((theta * 2 ** exponent) / Math.PI)
  return { n: modulo(n, 2 ** (exponent + 1)), d: exponent }
}

/**
 * Smallest exponent (≤ maxExponent) whose grid holds `radians` within
 * `tolerance`; the nearest point of the finest grid otherwise.
 */
export function simplifyAngle(
  radians: number,
  maxExponent: number,
  tolerance = ANGLE_TOLERANCE,
): AngleSpec {
  const theta = modulo(radians, TWO_PI)
  for (let d = 0; d <= maxExponent; d++) {
    const n = roundHalfEven((theta * 2 ** d) / Math.PI)
    if (Math.abs((n * Math.PI) / 2 ** d - theta) <= tolerance) {
      return reduceAngle({ n, d })
    }
  }
  return reduceAngle(angleAtExponent(theta, maxExponent))
}

/** Canonical encoding of an angle for a flavour */
export function canonicalAngle(angle: AngleSpec, flavour: Flavour): AngleSpec {
  return flavour.angleExponent === null
    ? reduceAngle(angle)
    : reexpressAngle(angle, flavour.angleExponent)
}

export function angleFromRadians(radians: number, flavour: Flavour): AngleSpec {
  return flavour.angleExponent === null
    ? simplifyAngle(radians, flavour.maxAngleExponent)
    : angleAtExponent(radians, flavour.angleExponent)
}

export function isCanonicalAngle(angle: AngleSpec, flavour: Flavour): boolean {
  const canonical = canonicalAngle(angle, flavour)
  return canonical.n === angle.n && canonical.d === angle.d
}
