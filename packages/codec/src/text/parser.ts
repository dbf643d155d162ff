/**
 * Text Subroutine Parser
 *
 * Line-oriented assembly:
 *
 *   # NETQASM 1.0
 *   # APPID 0
 *   # DEFINE q Q0
 *   set R1 4
 *   array(R1) @0       // parenthesised leading operands
 *   LOOP:
 *   h $q
 *   beq R0 R1 LOOP
 *
 * Macros are substituted textually (`$q`) before labels are resolved.
 */

import { EncodingError } from '@netq/core'
import {
  imm,
  isMnemonic,
  LABEL_PATTERN,
  NETQASM_VERSION,
  OPERAND_SHAPES,
  parseRegisterName,
  reg,
  SubroutineBuilder,
  type SubroutineValidationError,
  targetSlot,
} from '@netq/isa'
import type {
  Flavour,
  Instruction,
  Operand,
  Register,
  Safe,
  Subroutine,
} from '@netq/types'
import { safeError } from '@netq/types'

export interface ParseOptions {
  id?: number
  /**
   * Load integers found in register slots into a free R register with an
   * inserted `set`, instead of rejecting them
   */
  replaceConstants?: boolean
}

interface Preamble {
  netqasmVersion: readonly [number, number] | null
  appId: number | null
  macros: Map<string, string>
}

type ParsedLine =
  | { type: 'label'; name: string }
  | { type: 'instruction'; mnemonic: string; tokens: string[]; line: number }

class TextParseError extends EncodingError {
  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`)
  }
}

const INTEGER = /^-?\d+$/
const ADDRESS = /^@(\d+)$/
const ENTRY = /^@(\d+)\[([^\]:]+)\]$/
const SLICE = /^@(\d+)\[([^\]:]+):([^\]:]+)\]$/
const INSTRUCTION = /^([a-z_]+)(?:\(([^)]*)\))?(?:\s+(.*))?$/
const MACRO_USE = /\$([A-Za-z_][A-Za-z0-9_]*)/g

function stripBlockComments(text: string): string {
  const stripped = text.replace(/\/\*[\s\S]*?\*\//g, (comment) =>
    comment.replace(/[^\n]/g, ''),
  )
  if (stripped.includes('/*')) {
    throw new EncodingError('Unterminated block comment')
  }
  return stripped
}

function parsePreambleLine(content: string, line: number, preamble: Preamble): void {
  const [key, ...rest] = content.slice(1).trim().split(/\s+/)
  switch (key) {
    case 'NETQASM': {
      const match = /^(\d+)\.(\d+)$/.exec(rest.join(' '))
      if (!match || preamble.netqasmVersion) {
        throw new TextParseError(line, `Invalid or repeated NETQASM line: ${content}`)
      }
      preamble.netqasmVersion = [Number(match[1]), Number(match[2])]
      return
    }
    case 'APPID': {
      const value = rest.join(' ')
      if (!INTEGER.test(value) || preamble.appId !== null) {
        throw new TextParseError(line, `Invalid or repeated APPID line: ${content}`)
      }
      preamble.appId = Number(value)
      return
    }
    case 'DEFINE': {
      const [name, ...valueParts] = rest
      if (name === undefined || !LABEL_PATTERN.test(name) || valueParts.length === 0) {
        throw new TextParseError(line, `Invalid DEFINE line: ${content}`)
      }
      if (preamble.macros.has(name)) {
        throw new TextParseError(line, `Macro ${name} defined twice`)
      }
      const value = valueParts.join(' ')
      const braced = /^\{(.*)\}$/.exec(value)
      preamble.macros.set(name, braced?.[1]?.trim() ?? value)
      return
    }
    default:
      throw new TextParseError(line, `Unknown preamble key ${key ?? ''}`)
  }
}

function expandMacros(content: string, line: number, macros: Map<string, string>): string {
  return content.replace(MACRO_USE, (_, name: string) => {
    const value = macros.get(name)
    if (value === undefined) throw new TextParseError(line, `Undefined macro $${name}`)
    return value
  })
}

function parseLines(text: string): { preamble: Preamble; lines: ParsedLine[] } {
  const preamble: Preamble = { netqasmVersion: null, appId: null, macros: new Map() }
  const lines: ParsedLine[] = []
  let inBody = false

  for (const [i, raw] of stripBlockComments(text).split('\n').entries()) {
    const line = i + 1
    const content = (raw.split('//')[0] ?? '').trim()
    if (content === '') continue

    if (content.startsWith('#')) {
      if (inBody) throw new TextParseError(line, 'Preamble line after the first instruction')
      parsePreambleLine(content, line, preamble)
      continue
    }
    inBody = true

    const expanded = expandMacros(content, line, preamble.macros)
    if (expanded.endsWith(':')) {
      const name = expanded.slice(0, -1).trim()
      if (!LABEL_PATTERN.test(name)) throw new TextParseError(line, `Invalid label ${name}`)
      lines.push({ type: 'label', name })
      continue
    }

    const match = INSTRUCTION.exec(expanded)
    if (!match) throw new TextParseError(line, `Cannot parse instruction: ${expanded}`)
    const [, mnemonic = '', args, operands] = match
    const tokens = [
      ...(args ?? '').split(',').map((token) => token.trim()).filter(Boolean),
      ...(operands ?? '').trim().split(/\s+/).filter(Boolean),
    ]
    lines.push({ type: 'instruction', mnemonic, tokens, line })
  }

  return { preamble, lines }
}

function parseRegisterToken(token: string, line: number): Register {
  const register = parseRegisterName(token)
  if (!register) throw new TextParseError(line, `Expected a register, got ${token}`)
  return register
}

function parseOperand(token: string, isTarget: boolean, line: number): Operand {
  if (INTEGER.test(token)) return imm(Number(token))

  const register = parseRegisterName(token)
  if (register) return { kind: 'register', register }

  const address = ADDRESS.exec(token)
  if (address) return { kind: 'address', address: Number(address[1]) }

  const slice = SLICE.exec(token)
  if (slice) {
    return {
      kind: 'slice',
      address: Number(slice[1]),
      start: parseRegisterToken(slice[2] ?? '', line),
      stop: parseRegisterToken(slice[3] ?? '', line),
    }
  }

  const entry = ENTRY.exec(token)
  if (entry) {
    return {
      kind: 'entry',
      address: Number(entry[1]),
      index: parseRegisterToken(entry[2] ?? '', line),
    }
  }

  if (isTarget && LABEL_PATTERN.test(token)) return { kind: 'label', name: token }
  throw new TextParseError(line, `Cannot parse operand ${token}`)
}

/** R registers the text never mentions, lowest first */
function unusedRegisters(lines: ParsedLine[]): number[] {
  const used = new Set<number>()
  for (const parsed of lines) {
    if (parsed.type !== 'instruction') continue
    for (const token of parsed.tokens) {
      for (const match of token.matchAll(/R(\d{1,2})/g)) used.add(Number(match[1]))
    }
  }
  return Array.from({ length: 16 }, (_, i) => i).filter((i) => !used.has(i))
}

interface Lowered {
  commands: Array<
    | { type: 'label'; name: string }
    | { type: 'instruction'; instruction: Instruction; line: number }
  >
  /** original instruction index → index after inserted loads */
  indexMap: number[]
}

function buildInstructions(lines: ParsedLine[], replaceConstants: boolean): Lowered {
  const free = replaceConstants ? unusedRegisters(lines) : []
  const commands: Lowered['commands'] = []
  const indexMap: number[] = []
  let emitted = 0

  for (const parsed of lines) {
    if (parsed.type === 'label') {
      commands.push(parsed)
      continue
    }
    const { mnemonic, tokens, line } = parsed
    if (!isMnemonic(mnemonic)) throw new TextParseError(line, `Unknown instruction ${mnemonic}`)

    const shape = OPERAND_SHAPES[mnemonic]
    const target = targetSlot({ mnemonic, operands: [] })
    const loads: Instruction[] = []
    const operands = tokens.map((token, i) => {
      const operand = parseOperand(token, i === target, line)
      if (replaceConstants && shape[i] === 'reg' && operand.kind === 'immediate') {
        const index = free[loads.length]
        if (index === undefined) {
          throw new TextParseError(line, 'No free R register to load a constant into')
        }
        loads.push({ mnemonic: 'set', operands: [reg('R', index), operand] })
        return reg('R', index)
      }
      return operand
    })

    indexMap.push(emitted)
    for (const load of loads) commands.push({ type: 'instruction', instruction: load, line })
    commands.push({ type: 'instruction', instruction: { mnemonic, operands }, line })
    emitted += loads.length + 1
  }
  indexMap.push(emitted)
  return { commands, indexMap }
}

function remapTarget(instruction: Instruction, indexMap: number[]): Instruction {
  const slot = targetSlot(instruction)
  const target = slot >= 0 ? instruction.operands[slot] : undefined
  if (target?.kind !== 'immediate') return instruction
  const mapped = indexMap[target.value] ?? target.value
  return {
    mnemonic: instruction.mnemonic,
    operands: instruction.operands.map((operand, i) => (i === slot ? imm(mapped) : operand)),
  }
}

/**
 * Parse a text subroutine and finalize it for `flavour`. Host lines in the
 * debug map are the 1-based source lines.
 */
export function parseText(
  text: string,
  flavour: Flavour,
  options: ParseOptions = {},
): Safe<Subroutine, SubroutineValidationError> {
  let lowered: Lowered
  let preamble: Preamble
  try {
    const parsed = parseLines(text)
    preamble = parsed.preamble
    lowered = buildInstructions(parsed.lines, options.replaceConstants ?? false)
  } catch (error) {
    if (error instanceof EncodingError) return safeError(error)
    throw error
  }

  const builder = new SubroutineBuilder({
    id: options.id,
    appId: preamble.appId ?? 0,
    netqasmVersion: preamble.netqasmVersion ?? NETQASM_VERSION,
  })
  for (const command of lowered.commands) {
    if (command.type === 'label') {
      builder.label(command.name)
    } else {
      const instruction = options.replaceConstants
        ? remapTarget(command.instruction, lowered.indexMap)
        : command.instruction
      builder.add(instruction, command.line)
    }
  }
  return builder.finalize(flavour)
}
