/**
 * Register Allocation
 *
 * Live intervals over instruction indices, then a linear scan handing each
 * virtual register the smallest free R index.
 */

import { LayoutError } from '@netq/core'
import { register, registerName } from '@netq/isa'
import type { Mnemonic, Register } from '@netq/types'
import type { LoweredCommand, LoweredOperand, VirtualSlot } from './lower'

export interface LiveInterval {
  readonly id: number
  /** First instruction index where the value is held */
  start: number
  /** Last instruction index where the value is still needed */
  end: number
}

function slotsOf(operand: LoweredOperand): VirtualSlot[] {
  switch (operand.kind) {
    case 'register':
      return [operand.slot]
    case 'entry':
      return [operand.index]
    case 'slice':
      return [operand.start, operand.stop]
    default:
      return []
  }
}

/** Mnemonics whose first operand receives the result */
const WRITES_FIRST: ReadonlySet<Mnemonic> = new Set<Mnemonic>([
  'set',
  'load',
  'lea',
  'mov',
  'add',
  'sub',
  'mul',
  'div',
  'rem',
  'addm',
  'subm',
])

function writtenSlot(mnemonic: Mnemonic): number {
  if (WRITES_FIRST.has(mnemonic)) return 0
  return mnemonic === 'meas' ? 1 : -1
}

interface Flattened {
  /** Virtual ids read per instruction */
  reads: Array<Set<number>>
  /** Virtual ids written per instruction */
  writes: Array<Set<number>>
  /** Indices control may reach next, per instruction */
  successors: number[][]
  /** R registers named directly */
  fixed: Set<number>
}

function flatten(commands: readonly LoweredCommand[]): Flattened {
  const reads: Array<Set<number>> = []
  const writes: Array<Set<number>> = []
  const labels = new Map<string, number>()
  const targets: Array<{ index: number; name: string; fallsThrough: boolean }> = []
  const stops: number[] = []
  const fixed = new Set<number>()

  for (const command of commands) {
    if (command.type === 'label') {
      labels.set(command.name, reads.length)
      continue
    }
    const { mnemonic, operands } = command.instruction
    const index = reads.length
    const written = writtenSlot(mnemonic)
    const read = new Set<number>()
    const write = new Set<number>()
    for (const [position, operand] of operands.entries()) {
      if (operand.kind === 'label') {
        targets.push({ index, name: operand.name, fallsThrough: mnemonic !== 'jmp' })
      }
      for (const slot of slotsOf(operand)) {
        if (slot.kind === 'fixed') {
          if (slot.register.bank === 'R') fixed.add(slot.register.index)
        } else if (position === written && operand.kind === 'register') {
          write.add(slot.id)
        } else {
          read.add(slot.id)
        }
      }
    }
    if (mnemonic === 'ret') stops.push(index)
    reads.push(read)
    writes.push(write)
  }

  const successors = reads.map((_, index) => (index + 1 < reads.length ? [index + 1] : []))
  for (const index of stops) successors[index] = []
  for (const { index, name, fallsThrough } of targets) {
    const target = labels.get(name)
    const next = fallsThrough ? (successors[index] ?? []) : []
    successors[index] = target === undefined || target >= reads.length ? next : [...next, target]
  }
  return { reads, writes, successors, fixed }
}

/**
 * Live interval of every virtual register: the hull of the instructions
 * where its value may still be read. Ids in `pinned` are live wherever the
 * routine ends. A value written on some paths only is live from the first
 * instruction, where registers still hold zero.
 */
export function computeIntervals(
  commands: readonly LoweredCommand[],
  pinned: ReadonlySet<number> = new Set(),
): LiveInterval[] {
  const { reads, writes, successors } = flatten(commands)
  const mentioned = new Set<number>()
  for (const [index, read] of reads.entries()) {
    for (const id of read) mentioned.add(id)
    for (const id of writes[index] ?? []) mentioned.add(id)
  }
  const exitLive = [...pinned].filter((id) => mentioned.has(id))

  const liveIn = reads.map(() => new Set<number>())
  const liveOut = reads.map(() => new Set<number>())
  let changed = true
  while (changed) {
    changed = false
    for (let index = reads.length - 1; index >= 0; index--) {
      const next = successors[index] ?? []
      const out = liveOut[index] ?? new Set<number>()
      const incoming = next.length === 0 ? exitLive : next.flatMap((s) => [...(liveIn[s] ?? [])])
      for (const id of incoming) out.add(id)

      const live = liveIn[index] ?? new Set<number>()
      const before = live.size
      for (const id of reads[index] ?? []) live.add(id)
      for (const id of out) if (!writes[index]?.has(id)) live.add(id)
      if (live.size !== before) changed = true
      liveOut[index] = out
      liveIn[index] = live
    }
  }

  const intervals = new Map<number, LiveInterval>()
  const touch = (id: number, index: number): void => {
    const interval = intervals.get(id)
    if (!interval) intervals.set(id, { id, start: index, end: index })
    else {
      interval.start = Math.min(interval.start, index)
      interval.end = Math.max(interval.end, index)
    }
  }
  for (const [index, live] of liveIn.entries()) {
    for (const id of live) touch(id, index)
    for (const id of liveOut[index] ?? []) touch(id, index)
    for (const id of writes[index] ?? []) touch(id, index)
  }

  return [...intervals.values()].sort((a, b) => a.start - b.start || a.id - b.id)
}

/**
 * Linear scan over intervals sorted by start.
 * @throws LayoutError when more than `perBank` values are live at once
 */
export function allocateRegisters(
  intervals: readonly LiveInterval[],
  perBank: number,
  reserved: ReadonlySet<number> = new Set(),
): Map<number, Register> {
  const assignment = new Map<number, Register>()
  let active: Array<{ interval: LiveInterval; index: number }> = []

  for (const interval of intervals) {
    active = active.filter((entry) => entry.interval.end >= interval.start)
    const taken = new Set(active.map((entry) => entry.index))

    let index = 0
    while (index < perBank && (taken.has(index) || reserved.has(index))) index++
    if (index >= perBank) {
      throw new LayoutError(
        `More than ${perBank - reserved.size} values live at instruction ${interval.start}`,
      )
    }
    active.push({ interval, index })
    assignment.set(interval.id, register('R', index))
  }
  return assignment
}

/** First pair of overlapping intervals sharing a register, or null */
export function findOverlap(
  intervals: readonly LiveInterval[],
  assignment: ReadonlyMap<number, Register>,
): LayoutError | null {
  for (const [i, a] of intervals.entries()) {
    const ra = assignment.get(a.id)
    for (const b of intervals.slice(i + 1)) {
      const rb = assignment.get(b.id)
      if (!ra || !rb || ra.bank !== rb.bank || ra.index !== rb.index) continue
      if (a.start <= b.end && b.start <= a.end) {
        return new LayoutError(
          `Register ${registerName(ra)} is shared by overlapping values v${a.id} and v${b.id}`,
        )
      }
    }
  }
  return null
}

/** R registers the lowered program names directly */
export function fixedRegisters(commands: readonly LoweredCommand[]): Set<number> {
  return flatten(commands).fixed
}
