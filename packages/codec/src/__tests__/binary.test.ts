/**
 * Binary Codec Tests
 */

import {
  EncodingError,
  LayoutError,
  logger,
  UnsupportedOperationError,
} from '@netq/core'
import {
  addr,
  entry,
  imm,
  instr,
  instructionsEqual,
  label,
  NV_FLAVOUR,
  reg,
  register,
  SubroutineBuilder,
  slice,
  VANILLA_FLAVOUR,
} from '@netq/isa'
import { beforeAll, describe, expect, it } from 'vitest'
import {
  decodeFixedLength,
  decodeInstruction,
  decodeSubroutine,
  decodeSubroutineHex,
  encodeFixedLength,
  encodeInstruction,
  encodeSubroutine,
  encodeSubroutineHex,
} from '../../index'

beforeAll(() => {
  logger.init()
})

describe('Fixed-length integers', () => {
  it('should encode signed values in two\'s complement little-endian', () => {
    const [error, bytes] = encodeFixedLength(-2, 4, true)
    expect(error).toBeUndefined()
    expect(Array.from(bytes ?? [])).toEqual([0xfe, 0xff, 0xff, 0xff])
  })

  it('should decode what it encodes', () => {
    const [, bytes] = encodeFixedLength(0x1234, 2)
    const [error, result] = decodeFixedLength(bytes ?? new Uint8Array(), 2)
    expect(error).toBeUndefined()
    expect(result?.value).toBe(0x1234)
    expect(result?.consumed).toBe(2)
  })

  it('should reject values that do not fit', () => {
    const [error] = encodeFixedLength(256, 1)
    expect(error).toBeInstanceOf(EncodingError)
  })
})

describe('Instruction encoding', () => {
  it('should lay out set R3 -2 as opcode, register byte, int32 and padding', () => {
    const [error, bytes] = encodeInstruction(
      instr('set', reg('R', 3), imm(-2)),
      VANILLA_FLAVOUR,
    )
    expect(error).toBeUndefined()
    expect(Array.from(bytes ?? [])).toEqual([4, 12, 0xfe, 0xff, 0xff, 0xff, 0])
  })

  it('should reduce rotation angles to lowest terms in the vanilla flavour', () => {
    const [, bytes] = encodeInstruction(
      instr('rot_x', reg('Q', 0), imm(2), imm(3)),
      VANILLA_FLAVOUR,
    )
    expect(Array.from(bytes ?? [])).toEqual([27, 2, 1, 2, 0, 0, 0])
  })

  it('should re-express rotation angles over 2^4 in the nv flavour', () => {
    const [, bytes] = encodeInstruction(
      instr('rot_x', reg('Q', 0), imm(1), imm(1)),
      NV_FLAVOUR,
    )
    expect(Array.from(bytes ?? [])).toEqual([27, 2, 8, 4, 0, 0, 0])
  })

  it('should round-trip every operand shape', () => {
    const instructions = [
      instr('array', reg('R', 1), addr(7)),
      instr('store', reg('R', 15), entry(3, register('R', 2))),
      instr('wait_all', slice(4, register('R', 0), register('R', 1))),
      instr('addm', reg('R', 0), reg('R', 1), reg('R', 2), reg('R', 3)),
      instr('bge', reg('R', 0), reg('M', 5), imm(9)),
      instr('meas', reg('Q', 2), reg('M', 0)),
      instr('breakpoint', imm(1), imm(0)),
      instr('ret'),
    ]
    for (const instruction of instructions) {
      const [encodeError, bytes] = encodeInstruction(instruction, VANILLA_FLAVOUR)
      expect(encodeError).toBeUndefined()
      const [decodeError, decoded] = decodeInstruction(
        bytes ?? new Uint8Array(),
        VANILLA_FLAVOUR,
      )
      expect(decodeError).toBeUndefined()
      expect(decoded && instructionsEqual(decoded.value, instruction)).toBe(true)
    }
  })

  it('should refuse gates outside the flavour', () => {
    const [error] = encodeInstruction(instr('cnot', reg('Q', 0), reg('Q', 1)), NV_FLAVOUR)
    expect(error).toBeInstanceOf(UnsupportedOperationError)
  })

  it('should refuse operands of the wrong kind', () => {
    const [error] = encodeInstruction(instr('set', imm(1), imm(2)), VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(EncodingError)
  })

  it('should reject unknown opcodes', () => {
    const [error] = decodeInstruction(Uint8Array.of(99, 0, 0, 0, 0, 0, 0), VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(EncodingError)
  })

  it('should reject non-zero padding', () => {
    const [error] = decodeInstruction(
      Uint8Array.of(4, 12, 0xfe, 0xff, 0xff, 0xff, 1),
      VANILLA_FLAVOUR,
    )
    expect(error).toBeInstanceOf(EncodingError)
  })

  it('should decode opcode 30 as cnot or crot_x depending on the flavour', () => {
    const bytes = Uint8Array.of(30, 2, 6, 8, 4, 0, 0)
    const [, vanilla] = decodeInstruction(bytes, VANILLA_FLAVOUR)
    const [, nv] = decodeInstruction(bytes, NV_FLAVOUR)
    expect(nv?.value.mnemonic).toBe('crot_x')
    // cnot takes two register bytes; the angle bytes are unexpected padding
    expect(vanilla).toBeUndefined()
  })
})

describe('Subroutine encoding', () => {
  function buildLoop() {
    return new SubroutineBuilder({ id: 4, appId: 5 })
      .add(instr('set', reg('R', 0), imm(0)))
      .add(instr('set', reg('R', 1), imm(3)))
      .label('LOOP')
      .add(instr('beq', reg('R', 0), reg('R', 1), label('EXIT')))
      .add(instr('set', reg('R', 2), imm(1)))
      .add(instr('add', reg('R', 0), reg('R', 0), reg('R', 2)))
      .add(instr('jmp', label('LOOP')))
      .label('EXIT')
      .add(instr('ret'))
      .finalize(VANILLA_FLAVOUR)
  }

  it('should round-trip instructions and metadata', () => {
    const [buildError, subroutine] = buildLoop()
    expect(buildError).toBeUndefined()
    if (!subroutine) return

    const [encodeError, bytes] = encodeSubroutine(subroutine, VANILLA_FLAVOUR)
    expect(encodeError).toBeUndefined()
    expect(bytes?.length).toBe(4 + 7 * 7)
    expect(Array.from(bytes?.subarray(0, 4) ?? [])).toEqual([1, 0, 5, 0])

    const [decodeError, decoded] = decodeSubroutine(bytes ?? new Uint8Array(), VANILLA_FLAVOUR, 4)
    expect(decodeError).toBeUndefined()
    expect(decoded?.metadata).toEqual({ netqasmVersion: [1, 0], appId: 5 })
    expect(decoded?.instructions.length).toBe(7)
    decoded?.instructions.forEach((instruction, i) => {
      const original = subroutine.instructions[i]
      expect(original && instructionsEqual(instruction, original)).toBe(true)
    })
    expect(decoded?.instructions[2]?.operands[2]).toEqual(imm(6))
    expect(decoded?.instructions[5]?.operands[0]).toEqual(imm(2))
  })

  it('should reject a body that is not whole instructions', () => {
    const [error] = decodeSubroutine(new Uint8Array(4 + 6), VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(EncodingError)
  })

  it('should report the failing instruction index', () => {
    const bytes = Uint8Array.of(1, 0, 0, 0, 44, 0, 0, 0, 0, 0, 0, 250, 0, 0, 0, 0, 0, 0)
    const [error] = decodeSubroutine(bytes, VANILLA_FLAVOUR)
    expect(error?.message).toBe('Instruction 1: Unknown opcode 250 for the vanilla flavour')
  })

  it('should encode to and from hex', () => {
    const [, subroutine] = new SubroutineBuilder({ appId: 5 })
      .add(instr('ret'))
      .finalize(VANILLA_FLAVOUR)
    if (!subroutine) throw new Error('build failed')

    const [error, hex] = encodeSubroutineHex(subroutine, VANILLA_FLAVOUR)
    expect(error).toBeUndefined()
    expect(hex).toBe('0x010005002c000000000000')

    const [decodeError, decoded] = decodeSubroutineHex(hex ?? '0x', VANILLA_FLAVOUR)
    expect(decodeError).toBeUndefined()
    expect(decoded?.instructions).toEqual([instr('ret')])
  })

  it('should reject malformed hex', () => {
    const [error] = decodeSubroutineHex('0x123', VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(EncodingError)
  })
})

describe('Subroutine validation', () => {
  it('should reject dangling labels', () => {
    const [error] = new SubroutineBuilder()
      .add(instr('jmp', label('NOWHERE')))
      .finalize(VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(LayoutError)
  })

  it('should reject array addresses beyond the flavour limit', () => {
    const [error] = new SubroutineBuilder()
      .add(instr('array', reg('R', 0), addr(256)))
      .finalize(NV_FLAVOUR)
    expect(error).toBeInstanceOf(LayoutError)
  })
})
