/** Result of decoding a prefix of a byte sequence */
export interface DecodingResult<T> {
  value: T
  remaining: Uint8Array
  consumed: number
}

export type FixedLengthSize = 1 | 2 | 4
