import { EncodingError } from '@netq/core'
import { REGISTER_BANK_CODES, REGISTER_CONFIG } from '@netq/isa'
import type {
  DecodingResult,
  Operand,
  OperandShape,
  Register,
  RegisterBank,
  Safe,
} from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { decodeFixedLength, encodeFixedLength } from '../core/fixed-length'

const BANK_BY_CODE: readonly RegisterBank[] = REGISTER_CONFIG.BANKS
const INDEX_LIMIT = 2 ** REGISTER_CONFIG.INDEX_BITS

/** One byte: bank in bits 0-1, index in bits 2-5, bits 6-7 zero */
export function encodeRegister(register: Register): Safe<Uint8Array, EncodingError> {
  if (!Number.isInteger(register.index) || register.index < 0 || register.index >= INDEX_LIMIT) {
    return safeError(
      new EncodingError(`Register index ${register.index} does not fit ${REGISTER_CONFIG.INDEX_BITS} bits`),
    )
  }
  const code = REGISTER_BANK_CODES[register.bank]
  return safeResult(Uint8Array.of(code | (register.index << REGISTER_CONFIG.BANK_BITS)))
}

export function decodeRegister(data: Uint8Array): Safe<DecodingResult<Register>, EncodingError> {
  const byte = data[0]
  if (byte === undefined) {
    return safeError(new EncodingError('Missing register byte'))
  }
  if (byte >> (REGISTER_CONFIG.BANK_BITS + REGISTER_CONFIG.INDEX_BITS) !== 0) {
    return safeError(new EncodingError(`Malformed register byte 0x${byte.toString(16)}`))
  }
  const bank = BANK_BY_CODE[byte & 0b11]
  if (bank === undefined) {
    return safeError(new EncodingError(`Unknown register bank in byte ${byte}`))
  }
  return safeResult({
    value: { bank, index: byte >> REGISTER_CONFIG.BANK_BITS },
    remaining: data.slice(1),
    consumed: 1,
  })
}

function concat(parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((total, part) => total + part.length, 0))
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

function collect(results: Safe<Uint8Array, EncodingError>[]): Safe<Uint8Array, EncodingError> {
  const parts: Uint8Array[] = []
  for (const [error, part] of results) {
    if (error) return safeError(error)
    parts.push(part)
  }
  return safeResult(concat(parts))
}

function mismatch(shape: OperandShape, operand: Operand): EncodingError {
  return new EncodingError(`Cannot encode ${operand.kind} operand as ${shape}`)
}

export function encodeOperand(
  shape: OperandShape,
  operand: Operand,
): Safe<Uint8Array, EncodingError> {
  switch (shape) {
    case 'reg':
      if (operand.kind !== 'register') return safeError(mismatch(shape, operand))
      return encodeRegister(operand.register)
    case 'imm':
    case 'target':
      if (operand.kind !== 'immediate') return safeError(mismatch(shape, operand))
      return encodeFixedLength(operand.value, 4, true)
    case 'imm8':
      if (operand.kind !== 'immediate') return safeError(mismatch(shape, operand))
      return encodeFixedLength(operand.value, 1)
    case 'addr':
      if (operand.kind !== 'address') return safeError(mismatch(shape, operand))
      return encodeFixedLength(operand.address, 4, true)
    case 'entry':
      if (operand.kind !== 'entry') return safeError(mismatch(shape, operand))
      return collect([
        encodeFixedLength(operand.address, 4, true),
        encodeRegister(operand.index),
      ])
    case 'slice':
      if (operand.kind !== 'slice') return safeError(mismatch(shape, operand))
      return collect([
        encodeFixedLength(operand.address, 4, true),
        encodeRegister(operand.start),
        encodeRegister(operand.stop),
      ])
  }
}

export function decodeOperand(
  shape: OperandShape,
  data: Uint8Array,
): Safe<DecodingResult<Operand>, EncodingError> {
  switch (shape) {
    case 'reg': {
      const [error, result] = decodeRegister(data)
      if (error) return safeError(error)
      const value: Operand = { kind: 'register', register: result.value }
      return safeResult({ ...result, value })
    }
    case 'imm':
    case 'target':
    case 'imm8': {
      const [error, result] =
        shape === 'imm8' ? decodeFixedLength(data, 1) : decodeFixedLength(data, 4, true)
      if (error) return safeError(error)
      const value: Operand = { kind: 'immediate', value: result.value }
      return safeResult({ ...result, value })
    }
    case 'addr': {
      const [error, result] = decodeFixedLength(data, 4, true)
      if (error) return safeError(error)
      const value: Operand = { kind: 'address', address: result.value }
      return safeResult({ ...result, value })
    }
    case 'entry': {
      const [addressError, address] = decodeFixedLength(data, 4, true)
      if (addressError) return safeError(addressError)
      const [indexError, index] = decodeRegister(address.remaining)
      if (indexError) return safeError(indexError)
      const value: Operand = { kind: 'entry', address: address.value, index: index.value }
      return safeResult({
        value,
        remaining: index.remaining,
        consumed: address.consumed + index.consumed,
      })
    }
    case 'slice': {
      const [addressError, address] = decodeFixedLength(data, 4, true)
      if (addressError) return safeError(addressError)
      const [startError, start] = decodeRegister(address.remaining)
      if (startError) return safeError(startError)
      const [stopError, stop] = decodeRegister(start.remaining)
      if (stopError) return safeError(stopError)
      const value: Operand = {
        kind: 'slice',
        address: address.value,
        start: start.value,
        stop: stop.value,
      }
      return safeResult({
        value,
        remaining: stop.remaining,
        consumed: address.consumed + start.consumed + stop.consumed,
      })
    }
  }
}
