import { EncodingError, fromHex, type Hex, toHex, UnsupportedOperationError } from '@netq/core'
import { ENCODING_CONFIG } from '@netq/isa'
import type { Flavour, Instruction, Safe, Subroutine, SubroutineMetadata } from '@netq/types'
import { safeError, safeResult } from '@netq/types'
import { decodeFixedLength, encodeFixedLength } from '../core/fixed-length'
import { decodeInstruction, encodeInstruction } from './instruction'

/**
 * Metadata prefix: protocol version (major, minor) as two uint8 followed by
 * the application id as uint16
 */
export function encodeMetadata(
  metadata: SubroutineMetadata,
): Safe<Uint8Array, EncodingError> {
  const [major, minor] = metadata.netqasmVersion
  const bytes = new Uint8Array(ENCODING_CONFIG.METADATA_BYTES)
  const parts = [
    encodeFixedLength(major, 1),
    encodeFixedLength(minor, 1),
    encodeFixedLength(metadata.appId, 2),
  ]
  let offset = 0
  for (const [error, part] of parts) {
    if (error) return safeError(error)
    bytes.set(part, offset)
    offset += part.length
  }
  return safeResult(bytes)
}

export function decodeMetadata(data: Uint8Array): Safe<SubroutineMetadata, EncodingError> {
  if (data.length < ENCODING_CONFIG.METADATA_BYTES) {
    return safeError(new EncodingError('Truncated subroutine metadata'))
  }
  const [error, appId] = decodeFixedLength(data.subarray(2), 2)
  if (error) return safeError(error)
  const metadata: SubroutineMetadata = {
    netqasmVersion: [data[0] ?? 0, data[1] ?? 0],
    appId: appId.value,
  }
  return safeResult(metadata)
}

export function encodeSubroutine(
  subroutine: Subroutine,
  flavour: Flavour,
): Safe<Uint8Array, EncodingError | UnsupportedOperationError> {
  const [metadataError, metadata] = encodeMetadata(subroutine.metadata)
  if (metadataError) return safeError(metadataError)

  const size = ENCODING_CONFIG.COMMAND_BYTES
  const bytes = new Uint8Array(metadata.length + size * subroutine.instructions.length)
  bytes.set(metadata, 0)
  for (const [i, instruction] of subroutine.instructions.entries()) {
    const [error, encoded] = encodeInstruction(instruction, flavour)
    if (error) return safeError(error)
    bytes.set(encoded, metadata.length + i * size)
  }
  return safeResult(bytes)
}

/**
 * Decode a binary subroutine. Labels and the debug map do not travel in the
 * binary form and come back empty.
 */
export function decodeSubroutine(
  data: Uint8Array,
  flavour: Flavour,
  id = 0,
): Safe<Subroutine, EncodingError> {
  const size = ENCODING_CONFIG.COMMAND_BYTES
  const body = data.length - ENCODING_CONFIG.METADATA_BYTES
  if (body < 0 || body % size !== 0) {
    return safeError(
      new EncodingError(
        `Subroutine of ${data.length} bytes is not metadata plus whole ${size}-byte instructions`,
      ),
    )
  }

  const [metadataError, metadata] = decodeMetadata(data)
  if (metadataError) return safeError(metadataError)

  const instructions: Instruction[] = []
  let rest = data.subarray(ENCODING_CONFIG.METADATA_BYTES)
  while (rest.length > 0) {
    const [error, result] = decodeInstruction(rest, flavour)
    if (error) {
      return safeError(
        new EncodingError(`Instruction ${instructions.length}: ${error.message}`, {
          cause: error,
        }),
      )
    }
    instructions.push(result.value)
    rest = result.remaining
  }

  const subroutine: Subroutine = {
    id,
    metadata,
    instructions,
    labels: new Map(),
    debugLines: new Map(),
  }
  return safeResult(subroutine)
}

export function encodeSubroutineHex(
  subroutine: Subroutine,
  flavour: Flavour,
): Safe<Hex, EncodingError | UnsupportedOperationError> {
  const [error, bytes] = encodeSubroutine(subroutine, flavour)
  if (error) return safeError(error)
  return safeResult(toHex(bytes))
}

export function decodeSubroutineHex(
  hex: string,
  flavour: Flavour,
  id = 0,
): Safe<Subroutine, EncodingError> {
  let bytes: Uint8Array
  try {
    bytes = fromHex(hex)
  } catch (error) {
    if (error instanceof EncodingError) return safeError(error)
    throw error
  }
  return decodeSubroutine(bytes, flavour, id)
}
