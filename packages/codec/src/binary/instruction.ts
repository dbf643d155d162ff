/**
 * Instruction Encoding
 *
 * Every instruction occupies COMMAND_BYTES bytes: the flavour's opcode id,
 * the operands in shape order, then zero padding.
 */

import { EncodingError, UnsupportedOperationError } from '@netq/core'
import {
  canonicalizeInstruction,
  checkShape,
  ENCODING_CONFIG,
  OPERAND_SHAPES,
  opcodeTable,
} from '@netq/isa'
import type {
  DecodingResult,
  Flavour,
  Instruction,
  Mnemonic,
  Operand,
  Safe,
} from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { decodeOperand, encodeOperand } from './operand'

type InstructionCodecError = EncodingError | UnsupportedOperationError

const tables = new WeakMap<Flavour, Map<number, Mnemonic>>()

function lookupMnemonic(flavour: Flavour, id: number): Mnemonic | undefined {
  let table = tables.get(flavour)
  if (!table) {
    table = opcodeTable(flavour)
    tables.set(flavour, table)
  }
  return table.get(id)
}

export function encodeInstruction(
  instruction: Instruction,
  flavour: Flavour,
): Safe<Uint8Array, InstructionCodecError> {
  const id = flavour.opcodes.get(instruction.mnemonic)
  if (id === undefined) {
    return safeError(
      new UnsupportedOperationError(
        `${instruction.mnemonic} is not part of the ${flavour.name} flavour`,
      ),
    )
  }

  const canonical = canonicalizeInstruction(instruction, flavour)
  const shapeError = checkShape(canonical)
  if (shapeError) return safeError(shapeError)

  const bytes = new Uint8Array(ENCODING_CONFIG.COMMAND_BYTES)
  bytes[0] = id
  let offset = 1
  const shape = OPERAND_SHAPES[canonical.mnemonic]
  for (const [i, slot] of shape.entries()) {
    const operand = canonical.operands[i]
    if (operand === undefined) {
      return safeError(new EncodingError(`${canonical.mnemonic}: missing operand ${i}`))
    }
    const [error, encoded] = encodeOperand(slot, operand)
    if (error) return safeError(error)
    bytes.set(encoded, offset)
    offset += encoded.length
  }
  return safeResult(bytes)
}

export function decodeInstruction(
  data: Uint8Array,
  flavour: Flavour,
): Safe<DecodingResult<Instruction>, EncodingError> {
  const size = ENCODING_CONFIG.COMMAND_BYTES
  if (data.length < size) {
    return safeError(
      new EncodingError(`Truncated instruction: ${data.length} of ${size} bytes`),
    )
  }

  const id = data[0] ?? 0
  const mnemonic = lookupMnemonic(flavour, id)
  if (mnemonic === undefined) {
    return safeError(
      new EncodingError(`Unknown opcode ${id} for the ${flavour.name} flavour`),
    )
  }

  let rest = data.subarray(1, size)
  const operands: Operand[] = []
  for (const slot of OPERAND_SHAPES[mnemonic]) {
    const [error, result] = decodeOperand(slot, rest)
    if (error) return safeError(error)
    operands.push(result.value)
    rest = result.remaining
  }
  if (rest.some((byte) => byte !== 0)) {
    return safeError(
      new EncodingError(`${mnemonic}: unexpected bytes after ${operands.length} operands`),
    )
  }

  return safeResult({
    value: { mnemonic, operands },
    remaining: data.slice(size),
    consumed: size,
  })
}
