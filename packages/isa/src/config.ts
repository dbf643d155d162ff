/**
 * Instruction Set Configuration
 *
 * Opcode ids, operand shapes and binary layout constants.
 */

import type { Mnemonic, OperandShape, RegisterBank } from '@netq/types'

export const NETQASM_VERSION = [1, 0] as const

export const REGISTER_CONFIG = {
  BANKS: ['R', 'C', 'Q', 'M'],
  PER_BANK: 16,
  BANK_BITS: 2,
  INDEX_BITS: 4,
} as const

/** 2-bit bank code in the binary register byte */
export const REGISTER_BANK_CODES: Readonly<Record<RegisterBank, number>> = {
  R: 0,
  C: 1,
  Q: 2,
  M: 3,
}

export const ENCODING_CONFIG = {
  /** Opcode byte plus the widest operand list, zero padded */
  COMMAND_BYTES: 7,
  METADATA_BYTES: 4,
  INT32_MIN: -0x80000000,
  INT32_MAX: 0x7fffffff,
  UINT16_MAX: 0xffff,
  UINT8_MAX: 0xff,
} as const

export const SHAPE_BYTES: Readonly<Record<OperandShape, number>> = {
  reg: 1,
  imm: 4,
  imm8: 1,
  addr: 4,
  entry: 5,
  slice: 6,
  target: 4,
}

// Opcode ids shared by every flavour
export const CORE_OPCODES = {
  qalloc: 1,
  init: 2,
  array: 3,
  set: 4,
  store: 5,
  load: 6,
  undef: 7,
  lea: 8,
  jmp: 9,
  bez: 10,
  bnz: 11,
  beq: 12,
  bne: 13,
  blt: 14,
  bge: 15,
  add: 16,
  sub: 17,
  addm: 18,
  subm: 19,
  rot_x: 27,
  rot_y: 28,
  rot_z: 29,
  meas: 32,
  create_epr: 33,
  recv_epr: 34,
  wait_all: 35,
  wait_any: 36,
  wait_single: 37,
  qfree: 38,
  ret_reg: 39,
  ret_arr: 40,
  mov: 41,
  send: 42,
  recv: 43,
  ret: 44,
  breakpoint: 100,
  mul: 200,
  div: 201,
  rem: 202,
} as const satisfies Partial<Record<Mnemonic, number>>

export const VANILLA_GATE_OPCODES = {
  x: 20,
  y: 21,
  z: 22,
  h: 23,
  s: 24,
  k: 25,
  t: 26,
  cnot: 30,
  cphase: 31,
} as const satisfies Partial<Record<Mnemonic, number>>

// The nv flavour reuses 30 and 31 for its controlled rotations
export const NV_GATE_OPCODES = {
  crot_x: 30,
  crot_y: 31,
} as const satisfies Partial<Record<Mnemonic, number>>

export const OPERAND_SHAPES: Readonly<Record<Mnemonic, readonly OperandShape[]>> = {
  qalloc: ['reg'],
  init: ['reg'],
  array: ['reg', 'addr'],
  set: ['reg', 'imm'],
  store: ['reg', 'entry'],
  load: ['reg', 'entry'],
  undef: ['entry'],
  lea: ['reg', 'addr'],
  jmp: ['target'],
  bez: ['reg', 'target'],
  bnz: ['reg', 'target'],
  beq: ['reg', 'reg', 'target'],
  bne: ['reg', 'reg', 'target'],
  blt: ['reg', 'reg', 'target'],
  bge: ['reg', 'reg', 'target'],
  add: ['reg', 'reg', 'reg'],
  sub: ['reg', 'reg', 'reg'],
  mul: ['reg', 'reg', 'reg'],
  div: ['reg', 'reg', 'reg'],
  rem: ['reg', 'reg', 'reg'],
  addm: ['reg', 'reg', 'reg', 'reg'],
  subm: ['reg', 'reg', 'reg', 'reg'],
  x: ['reg'],
  y: ['reg'],
  z: ['reg'],
  h: ['reg'],
  s: ['reg'],
  k: ['reg'],
  t: ['reg'],
  rot_x: ['reg', 'imm8', 'imm8'],
  rot_y: ['reg', 'imm8', 'imm8'],
  rot_z: ['reg', 'imm8', 'imm8'],
  crot_x: ['reg', 'reg', 'imm8', 'imm8'],
  crot_y: ['reg', 'reg', 'imm8', 'imm8'],
  cnot: ['reg', 'reg'],
  cphase: ['reg', 'reg'],
  meas: ['reg', 'reg'],
  create_epr: ['reg', 'reg', 'reg', 'reg', 'reg'],
  recv_epr: ['reg', 'reg', 'reg', 'reg'],
  wait_all: ['slice'],
  wait_any: ['slice'],
  wait_single: ['entry'],
  qfree: ['reg'],
  ret_reg: ['reg'],
  ret_arr: ['addr'],
  mov: ['reg', 'reg'],
  send: ['reg', 'addr'],
  recv: ['reg', 'addr'],
  ret: [],
  breakpoint: ['imm8', 'imm8'],
}

export const MNEMONICS = Object.keys(OPERAND_SHAPES).filter(isMnemonic)

export function isMnemonic(value: string): value is Mnemonic {
  return Object.prototype.hasOwnProperty.call(OPERAND_SHAPES, value)
}

/**
 * Layout of the create_epr argument array. The remote node id and the EPR
 * socket id travel in registers and are not part of it.
 */
export const EPR_CREATE_FIELDS = [
  'type',
  'number',
  'randomBasisLocal',
  'randomBasisRemote',
  'minimumFidelity',
  'timeUnit',
  'maxTime',
  'priority',
  'atomic',
  'consecutive',
  'probabilityDistLocal1',
  'probabilityDistLocal2',
  'probabilityDistRemote1',
  'probabilityDistRemote2',
  'rotationXLocal1',
  'rotationYLocal',
  'rotationXLocal2',
  'rotationXRemote1',
  'rotationYRemote',
  'rotationXRemote2',
] as const

export type EprCreateField = (typeof EPR_CREATE_FIELDS)[number]

/** Entries written per generated pair into the result array */
export const EPR_RESULT_FIELDS = 10

export const BREAKPOINT_ACTIONS = {
  NOP: 0,
  DUMP_LOCAL_STATE: 1,
  DUMP_GLOBAL_STATE: 2,
} as const

export const BREAKPOINT_ROLES = {
  CREATE: 0,
  RECEIVE: 1,
} as const
