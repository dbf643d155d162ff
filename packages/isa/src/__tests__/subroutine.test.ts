import { EncodingError, LayoutError, UnsupportedOperationError } from '@netq/core'
import { describe, expect, it } from 'vitest'
import {
  NV_FLAVOUR,
  SubroutineBuilder,
  VANILLA_FLAVOUR,
  addr,
  imm,
  instr,
  label,
  parseRegisterName,
  reg,
} from '../../index'

describe('SubroutineBuilder', () => {
  it('should resolve labels to instruction indices and keep host lines', () => {
    const [error, subroutine] = new SubroutineBuilder({ id: 3, appId: 2 })
      .add(instr('set', reg('R', 0), imm(1)), 10)
      .add(instr('jmp', label('END')))
      .add(instr('x', reg('Q', 0)), 12)
      .label('END')
      .add(instr('ret'))
      .finalize(VANILLA_FLAVOUR)

    expect(error).toBeUndefined()
    expect(subroutine?.id).toBe(3)
    expect(subroutine?.metadata).toEqual({ netqasmVersion: [1, 0], appId: 2 })
    expect(subroutine?.instructions[1]).toEqual(instr('jmp', imm(3)))
    expect(subroutine?.labels).toEqual(new Map([['END', 3]]))
    expect(subroutine?.debugLines).toEqual(
      new Map([
        [0, 10],
        [2, 12],
      ]),
    )
  })

  it('should stamp an explicit language version into the metadata', () => {
    const [error, subroutine] = new SubroutineBuilder({ netqasmVersion: [0, 9] })
      .add(instr('ret'))
      .finalize(VANILLA_FLAVOUR)

    expect(error).toBeUndefined()
    expect(subroutine?.metadata).toEqual({ netqasmVersion: [0, 9], appId: 0 })
  })

  it('should accept a label after the last instruction', () => {
    const [error, subroutine] = new SubroutineBuilder()
      .add(instr('jmp', label('DONE')))
      .label('DONE')
      .finalize(VANILLA_FLAVOUR)

    expect(error).toBeUndefined()
    expect(subroutine?.instructions).toEqual([instr('jmp', imm(1))])
  })

  it('should reject duplicate, malformed and dangling labels', () => {
    const [duplicate] = new SubroutineBuilder()
      .label('A')
      .add(instr('ret'))
      .label('A')
      .finalize(VANILLA_FLAVOUR)
    expect(duplicate).toEqual(new LayoutError('Duplicate label: A'))

    const [malformed] = new SubroutineBuilder().label('1abc').finalize(VANILLA_FLAVOUR)
    expect(malformed).toEqual(new LayoutError('Invalid label name: 1abc'))

    const [dangling] = new SubroutineBuilder()
      .add(instr('jmp', label('NOPE')))
      .finalize(VANILLA_FLAVOUR)
    expect(dangling).toEqual(new LayoutError('Branch target NOPE does not name a label'))
  })

  it('should reject operands that do not fit the shape', () => {
    const [error] = new SubroutineBuilder()
      .add(instr('set', reg('R', 0)))
      .finalize(VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(EncodingError)
    expect(error?.message).toBe('set takes 2 operands, got 1')

    const [wide] = new SubroutineBuilder()
      .add(instr('rot_x', reg('Q', 0), imm(256), imm(1)))
      .finalize(VANILLA_FLAVOUR)
    expect(wide?.message).toBe('rot_x: operand 1 must be imm8, got immediate')
  })

  it('should check instructions against the flavour', () => {
    const [unsupported] = new SubroutineBuilder()
      .add(instr('crot_x', reg('Q', 0), reg('Q', 1), imm(1), imm(1)))
      .finalize(VANILLA_FLAVOUR)
    expect(unsupported).toBeInstanceOf(UnsupportedOperationError)
    expect(unsupported?.message).toBe('instruction 0 (crot_x) is not part of the vanilla flavour')

    const [gate] = new SubroutineBuilder().add(instr('h', reg('Q', 0))).finalize(NV_FLAVOUR)
    expect(gate?.message).toBe('instruction 0 (h) is not part of the nv flavour')
  })

  it('should enforce register, array and branch limits', () => {
    const [register] = new SubroutineBuilder()
      .add(instr('set', reg('R', 16), imm(1)))
      .finalize(VANILLA_FLAVOUR)
    expect(register).toEqual(
      new LayoutError('instruction 0 (set): register R16 exceeds 16 registers per bank'),
    )

    const array = (address: number) =>
      new SubroutineBuilder()
        .add(instr('set', reg('R', 0), imm(3)))
        .add(instr('array', reg('R', 0), addr(address)))
    expect(array(1024).finalize(VANILLA_FLAVOUR)[0]?.message).toBe(
      'instruction 1 (array): array address 1024 outside 0..1023',
    )
    expect(array(256).finalize(NV_FLAVOUR)[0]?.message).toBe(
      'instruction 1 (array): array address 256 outside 0..255',
    )
    expect(array(255).finalize(NV_FLAVOUR)[0]).toBeUndefined()

    const [branch] = new SubroutineBuilder()
      .add(instr('jmp', imm(5)))
      .add(instr('ret'))
      .finalize(VANILLA_FLAVOUR)
    expect(branch?.message).toBe('instruction 0 (jmp): branch target 5 outside 0..2')
  })
})

describe('parseRegisterName', () => {
  it('should parse bank and index', () => {
    expect(parseRegisterName('R3')).toEqual({ bank: 'R', index: 3 })
    expect(parseRegisterName('M15')).toEqual({ bank: 'M', index: 15 })
    expect(parseRegisterName('X1')).toBeNull()
    expect(parseRegisterName('R123')).toBeNull()
  })
})
