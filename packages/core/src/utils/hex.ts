import { bytesToHex, type Hex, hexToBytes, isHex } from 'viem'
import { EncodingError } from '../errors'

export type { Hex }

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}

export function fromHex(value: string): Uint8Array {
  if (!isHex(value, { strict: true }) || value.length % 2 !== 0) {
    throw new EncodingError(`Not an even-length 0x-prefixed hex string: ${value}`)
  }
  return hexToBytes(value)
}
