import type {
  AddressOperand,
  ArrayEntryOperand,
  ArraySliceOperand,
  ImmediateOperand,
  Instruction,
  LabelOperand,
  Mnemonic,
  Operand,
  Register,
  RegisterBank,
  RegisterOperand,
} from '@netq/types'
import { REGISTER_CONFIG } from './config'

export function register(bank: RegisterBank, index: number): Register {
  return { bank, index }
}

export function reg(bank: RegisterBank, index: number): RegisterOperand {
  return { kind: 'register', register: { bank, index } }
}

export function imm(value: number): ImmediateOperand {
  return { kind: 'immediate', value }
}

export function addr(address: number): AddressOperand {
  return { kind: 'address', address }
}

export function entry(address: number, index: Register): ArrayEntryOperand {
  return { kind: 'entry', address, index }
}

export function slice(
  address: number,
  start: Register,
  stop: Register,
): ArraySliceOperand {
  return { kind: 'slice', address, start, stop }
}

export function label(name: string): LabelOperand {
  return { kind: 'label', name }
}

export function instr(mnemonic: Mnemonic, ...operands: Operand[]): Instruction {
  return { mnemonic, operands }
}

export function registerName(value: Register): string {
  return `${value.bank}${value.index}`
}

const REGISTER_PATTERN = /^([RCQM])(\d{1,2})$/

function isBank(value: string): value is RegisterBank {
  return (REGISTER_CONFIG.BANKS as readonly string[]).includes(value)
}

/** Parse `R3`, `Q0`, ... ; returns null for anything else */
export function parseRegisterName(text: string): Register | null {
  const match = REGISTER_PATTERN.exec(text)
  if (!match) return null
  const [, bank, index] = match
  if (bank === undefined || index === undefined || !isBank(bank)) return null
  return { bank, index: Number(index) }
}

export function registersEqual(a: Register, b: Register): boolean {
  return a.bank === b.bank && a.index === b.index
}

/** Registers an operand reads or writes, in operand order */
export function operandRegisters(operand: Operand): Register[] {
  switch (operand.kind) {
    case 'register':
      return [operand.register]
    case 'entry':
      return [operand.index]
    case 'slice':
      return [operand.start, operand.stop]
    default:
      return []
  }
}

export function instructionRegisters(instruction: Instruction): Register[] {
  return instruction.operands.flatMap(operandRegisters)
}

/** Array address an operand refers to, if any */
export function operandAddress(operand: Operand): number | null {
  switch (operand.kind) {
    case 'address':
    case 'entry':
    case 'slice':
      return operand.address
    default:
      return null
  }
}

export function operandsEqual(a: Operand, b: Operand): boolean {
  switch (a.kind) {
    case 'register':
      return b.kind === 'register' && registersEqual(a.register, b.register)
    case 'immediate':
      return b.kind === 'immediate' && a.value === b.value
    case 'address':
      return b.kind === 'address' && a.address === b.address
    case 'entry':
      return (
        b.kind === 'entry' &&
        a.address === b.address &&
        registersEqual(a.index, b.index)
      )
    case 'slice':
      return (
        b.kind === 'slice' &&
        a.address === b.address &&
        registersEqual(a.start, b.start) &&
        registersEqual(a.stop, b.stop)
      )
    case 'label':
      return b.kind === 'label' && a.name === b.name
  }
}

export function instructionsEqual(a: Instruction, b: Instruction): boolean {
  return (
    a.mnemonic === b.mnemonic &&
    a.operands.length === b.operands.length &&
    a.operands.every((operand, i) => {
      const other = b.operands[i]
      return other !== undefined && operandsEqual(operand, other)
    })
  )
}
