/**
 * Entanglement Instructions
 *
 * create_epr and recv_epr suspend until the processor has delivered every
 * requested pair. Pairs are then handed to the routine at once, except for
 * consecutive requests: those are held and each wait_* hands over the pairs
 * whose result entries it awaits, so one virtual id can take every pair in
 * turn.
 */

import { AbortedError, ExecutionError } from '@netq/core'
import { EPR_CREATE_FIELDS, EPR_RESULT_FIELDS, type EprCreateField } from '@netq/isa'
import {
  EPR_TYPE_CODES,
  type EntanglementPair,
  type EntanglementRequest,
  type EprType,
  type HeldPair,
  type InstructionContext,
  type InstructionResult,
  raceAbort,
  safeTry,
} from '@netq/types'
import { EPR_CREATE_DEFAULTS } from '../config'
import { BaseInstruction } from './base'

const EPR_TYPE_NAMES: readonly EprType[] = [
  'create-keep',
  'measure-directly',
  'remote-state-prep',
]

const EPR_TYPES = new Map<number, EprType>(
  EPR_TYPE_NAMES.map((type): [number, EprType] => [EPR_TYPE_CODES[type], type]),
)

abstract class EntanglementInstruction extends BaseInstruction {
  /**
   * Ask the processor for pairs, racing the abort signal. Nothing is written
   * until the processor has answered.
   */
  protected async request(
    context: InstructionContext,
    request: EntanglementRequest,
  ): Promise<EntanglementPair[]> {
    context.log(`Requesting ${request.number} pair(s)`, {
      role: request.role,
      remoteNodeId: request.remoteNodeId,
      eprSocketId: request.eprSocketId,
    })
    const pairs = await raceAbort(
      context.processor.requestEntanglement(request, context.signal),
      context.signal,
      () => new AbortedError(`${this.name} aborted while waiting for entanglement`),
    )
    if (pairs.length !== request.number) {
      await this.release(context, pairs)
      throw new ExecutionError(
        `${this.name}: processor delivered ${pairs.length} of ${request.number} pairs`,
      )
    }
    return pairs
  }

  /** Hand kept halves back to the processor */
  protected async release(
    context: InstructionContext,
    pairs: readonly EntanglementPair[],
  ): Promise<void> {
    for (const { qubit } of pairs) {
      if (qubit === null) continue
      const [error] = await safeTry(context.processor.freeQubit(qubit))
      if (error) context.log(`Could not free qubit handle ${qubit}`, { error: error.message })
    }
  }

  /** Virtual id → handle for every kept half, checked before anything is bound */
  private bindings(
    context: InstructionContext,
    held: readonly HeldPair[],
    resultArray: number,
  ): Array<[number, number]> {
    const last = Math.max(...held.map((entry) => entry.index))
    const required = (last + 1) * EPR_RESULT_FIELDS
    if (context.arrays.length(resultArray) < required) {
      throw new ExecutionError(
        `${this.name}: result array @${resultArray} needs ${required} entries`,
      )
    }
    const bindings: Array<[number, number]> = []
    const named = new Set<number>()
    for (const { index, pair, qubitArray } of held) {
      if (pair.info.length !== EPR_RESULT_FIELDS) {
        throw new ExecutionError(
          `${this.name}: pair ${index} carries ${pair.info.length} result fields`,
        )
      }
      if (pair.qubit === null) continue
      const virtualId = this.definedEntry(context, qubitArray, index, 'virtual qubit id')
      context.qubits.assertFree(virtualId)
      if (named.has(virtualId)) {
        throw new ExecutionError(
          `${this.name}: virtual qubit ${virtualId} is named for more than one pair`,
        )
      }
      named.add(virtualId)
      bindings.push([virtualId, pair.qubit])
    }
    return bindings
  }

  /**
   * Bind kept qubits to the virtual ids in their qubit array and write each
   * pair's generation info at `index * EPR_RESULT_FIELDS`. Nothing is bound
   * unless every pair checks out; on a fault the kept halves are freed.
   */
  protected async commit(
    context: InstructionContext,
    held: readonly HeldPair[],
    resultArray: number,
  ): Promise<void> {
    let bindings: Array<[number, number]>
    try {
      bindings = this.bindings(context, held, resultArray)
    } catch (error) {
      await this.release(
        context,
        held.map((entry) => entry.pair),
      )
      throw error
    }

    for (const [virtualId, handle] of bindings) context.qubits.bind(virtualId, handle)
    for (const { index, pair } of held) {
      pair.info.forEach((value, field) => {
        context.arrays.set(resultArray, index * EPR_RESULT_FIELDS + field, value)
      })
    }
  }

  /** Hold the pairs of a consecutive request until their results are awaited */
  protected async hold(
    context: InstructionContext,
    held: readonly HeldPair[],
    resultArray: number,
  ): Promise<void> {
    try {
      context.heldPairs.hold(resultArray, held)
    } catch (error) {
      await this.release(
        context,
        held.map((entry) => entry.pair),
      )
      throw error
    }
    context.log(`Holding ${held.length} pair(s) until awaited`, { resultArray })
  }

  /** Hand over held pairs of `address` with fields before `stop` */
  protected async deliverHeld(
    context: InstructionContext,
    address: number,
    stop: number,
  ): Promise<void> {
    const due = context.heldPairs.take(address, stop)
    if (due.length > 0) await this.commit(context, due, address)
  }
}

/** `create_epr Rremote Rsocket Rqarr Rargs Rresult` */
export class CreateEprInstruction extends EntanglementInstruction {
  readonly name = 'create_epr'

  private readArguments(
    context: InstructionContext,
    address: number,
  ): Record<EprCreateField, number> {
    const length = context.arrays.length(address)
    if (length !== EPR_CREATE_FIELDS.length) {
      throw new ExecutionError(
        `create_epr: argument array @${address} has ${length} entries, expected ${EPR_CREATE_FIELDS.length}`,
      )
    }
    const args = { ...EPR_CREATE_DEFAULTS }
    EPR_CREATE_FIELDS.forEach((field, i) => {
      args[field] = context.arrays.get(address, i) ?? EPR_CREATE_DEFAULTS[field]
    })
    return args
  }

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const remoteNodeId = this.readRegister(context, 0)
    const eprSocketId = this.readRegister(context, 1)
    const qubitArray = this.readRegister(context, 2)
    const args = this.readArguments(context, this.readRegister(context, 3))
    const resultArray = this.readRegister(context, 4)

    const type = EPR_TYPES.get(args.type)
    if (type === undefined) {
      throw new ExecutionError(`create_epr: unknown request type ${args.type}`)
    }
    if (args.number < 1) {
      throw new ExecutionError(`create_epr: cannot request ${args.number} pairs`)
    }
    if (type === 'create-keep' && context.arrays.length(qubitArray) < args.number) {
      throw new ExecutionError(
        `create_epr: qubit array @${qubitArray} holds fewer than ${args.number} ids`,
      )
    }

    const { type: _requestedType, number, ...params } = args
    const pairs = await this.request(context, {
      role: 'create',
      remoteNodeId,
      eprSocketId,
      type,
      number,
      params,
    })
    const held = pairs.map((pair, index): HeldPair => ({ index, pair, qubitArray }))
    if (args.consecutive !== 0) await this.hold(context, held, resultArray)
    else await this.commit(context, held, resultArray)
    return this.continue()
  }
}

/** `recv_epr Rremote Rsocket Rqarr Rresult`; pair count = result length / 10 */
export class RecvEprInstruction extends EntanglementInstruction {
  readonly name = 'recv_epr'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const remoteNodeId = this.readRegister(context, 0)
    const eprSocketId = this.readRegister(context, 1)
    const qubitArray = this.readRegister(context, 2)
    const resultArray = this.readRegister(context, 3)

    const number = Math.floor(context.arrays.length(resultArray) / EPR_RESULT_FIELDS)
    if (number < 1) {
      throw new ExecutionError(`recv_epr: result array @${resultArray} holds no pair`)
    }
    const pairs = await this.request(context, {
      role: 'receive',
      remoteNodeId,
      eprSocketId,
      type: null,
      number,
      params: null,
    })
    await this.commit(
      context,
      pairs.map((pair, index): HeldPair => ({ index, pair, qubitArray })),
      resultArray,
    )
    return this.continue()
  }
}

export class WaitAllInstruction extends EntanglementInstruction {
  readonly name = 'wait_all'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const { address, start, stop } = this.slice(context, 0)
    await this.deliverHeld(context, address, stop)
    const values = context.arrays.slice(address, start, stop)
    if (values.some((value) => value === undefined)) {
      throw new ExecutionError(`wait_all: @${address}[${start}:${stop}] is not fully defined`)
    }
    return this.continue()
  }
}

export class WaitAnyInstruction extends EntanglementInstruction {
  readonly name = 'wait_any'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const { address, start, stop } = this.slice(context, 0)
    await this.deliverHeld(context, address, stop)
    const values = context.arrays.slice(address, start, stop)
    if (values.every((value) => value === undefined)) {
      throw new ExecutionError(`wait_any: @${address}[${start}:${stop}] has no defined entry`)
    }
    return this.continue()
  }
}

export class WaitSingleInstruction extends EntanglementInstruction {
  readonly name = 'wait_single'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const { address, index } = this.entry(context, 0)
    await this.deliverHeld(context, address, index + 1)
    this.definedEntry(context, address, index, 'awaited entry')
    return this.continue()
  }
}
