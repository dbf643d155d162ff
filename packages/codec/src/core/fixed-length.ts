/**
 * Fixed-Length Integer Serialization
 *
 * Little-endian, least significant byte first. Signed values use two's
 * complement. Example: encodeFixedLength(-2, 4, true) = [0xfe, 0xff, 0xff, 0xff]
 */

import { EncodingError } from '@netq/core'
import type { DecodingResult, FixedLengthSize, Safe } from '@netq/types'
import { safeError, safeResult } from '@netq/types'

function bounds(length: FixedLengthSize, signed: boolean): [number, number] {
  const bits = 8 * length
  return signed ? [-(2 ** (bits - 1)), 2 ** (bits - 1) - 1] : [0, 2 ** bits - 1]
}

export function encodeFixedLength(
  value: number,
  length: FixedLengthSize,
  signed = false,
): Safe<Uint8Array, EncodingError> {
  const [min, max] = bounds(length, signed)
  if (!Number.isInteger(value) || value < min || value > max) {
    return safeError(
      new EncodingError(
        `Value ${value} does not fit a ${signed ? 'signed' : 'unsigned'} ${length}-byte integer`,
      ),
    )
  }

  const result = new Uint8Array(length)
  let unsigned = value < 0 ? value + 2 ** (8 * length) : value
  for (let i = 0; i < length; i++) {
    result[i] = unsigned % 256
    unsigned = Math.floor(unsigned / 256)
  }
  return safeResult(result)
}

export function decodeFixedLength(
  data: Uint8Array,
  length: FixedLengthSize,
  signed = false,
): Safe<DecodingResult<number>, EncodingError> {
  if (data.length < length) {
    return safeError(
      new EncodingError(`Need ${length} bytes, got ${data.length}`),
    )
  }

  let value = 0
  for (let i = length - 1; i >= 0; i--) {
    value = value * 256 + (data[i] ?? 0)
  }
  if (signed && value >= 2 ** (8 * length - 1)) {
    value -= 2 ** (8 * length)
  }

  return safeResult({
    value,
    remaining: data.slice(length),
    consumed: length,
  })
}
