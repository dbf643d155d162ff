import { registerName, targetSlot } from '@netq/isa'
import type { Instruction, Operand, Subroutine } from '@netq/types'

export function formatOperand(operand: Operand): string {
  switch (operand.kind) {
    case 'register':
      return registerName(operand.register)
    case 'immediate':
      return String(operand.value)
    case 'address':
      return `@${operand.address}`
    case 'entry':
      return `@${operand.address}[${registerName(operand.index)}]`
    case 'slice':
      return `@${operand.address}[${registerName(operand.start)}:${registerName(operand.stop)}]`
    case 'label':
      return operand.name
  }
}

/**
 * `mnemonic op op ...`; a resolved branch target is printed as a label name
 * when `labelAt` knows one for that index.
 */
export function formatInstruction(
  instruction: Instruction,
  labelAt: (index: number) => string | undefined = () => undefined,
): string {
  const slot = targetSlot(instruction)
  const operands = instruction.operands.map((operand, i) => {
    if (i === slot && operand.kind === 'immediate') {
      return labelAt(operand.value) ?? formatOperand(operand)
    }
    return formatOperand(operand)
  })
  return [instruction.mnemonic, ...operands].join(' ')
}

export interface PrintOptions {
  preamble?: boolean
}

export function printSubroutine(subroutine: Subroutine, options: PrintOptions = {}): string {
  const labelsByIndex = new Map<number, string[]>()
  for (const [name, index] of subroutine.labels) {
    labelsByIndex.set(index, [...(labelsByIndex.get(index) ?? []), name])
  }
  const labelAt = (index: number) => labelsByIndex.get(index)?.[0]

  const lines: string[] = []
  if (options.preamble ?? true) {
    const [major, minor] = subroutine.metadata.netqasmVersion
    lines.push(`# NETQASM ${major}.${minor}`, `# APPID ${subroutine.metadata.appId}`)
  }
  const count = subroutine.instructions.length
  for (let index = 0; index <= count; index++) {
    for (const name of labelsByIndex.get(index) ?? []) lines.push(`${name}:`)
    const instruction = subroutine.instructions[index]
    if (instruction) lines.push(formatInstruction(instruction, labelAt))
  }
  return `${lines.join('\n')}\n`
}
