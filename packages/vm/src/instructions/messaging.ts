/**
 * Classical Messaging Instructions
 *
 * Arrays travel as consecutive int32 little-endian words.
 */

import { decodeFixedLength, encodeFixedLength } from '@netq/codec'
import { AbortedError, AddressError, ExecutionError } from '@netq/core'
import { type InstructionContext, type InstructionResult, raceAbort } from '@netq/types'
import { VM_CONFIG } from '../config'
import { BaseInstruction } from './base'

const WORD = VM_CONFIG.MESSAGE_WORD_BYTES

/** `send Rpeer @a` */
export class SendInstruction extends BaseInstruction {
  readonly name = 'send'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const peer = this.readRegister(context, 0)
    const address = this.address(context, 1)
    const length = context.arrays.length(address)

    const payload = new Uint8Array(length * WORD)
    for (let i = 0; i < length; i++) {
      const value = this.definedEntry(context, address, i, 'message word')
      const [error, bytes] = encodeFixedLength(value, WORD, true)
      if (error) throw new ExecutionError(`send: ${error.message}`, { cause: error })
      payload.set(bytes, i * WORD)
    }

    await context.processor.sendMessage(peer, payload)
    context.log(`Sent ${length} word(s) to node ${peer}`)
    return this.continue()
  }
}

/** `recv Rpeer @a` writes the received words from index 0 on */
export class RecvInstruction extends BaseInstruction {
  readonly name = 'recv'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const peer = this.readRegister(context, 0)
    const address = this.address(context, 1)
    const capacity = context.arrays.length(address)

    const payload = await raceAbort(
      context.processor.receiveMessage(peer, context.signal),
      context.signal,
      () => new AbortedError(`recv aborted while waiting for node ${peer}`),
    )
    if (payload.length % WORD !== 0) {
      throw new ExecutionError(
        `recv: message of ${payload.length} bytes is not a whole number of ${WORD}-byte words`,
      )
    }
    const count = payload.length / WORD
    if (count > capacity) {
      throw new AddressError(
        `recv: ${count} word(s) do not fit array @${address} of length ${capacity}`,
      )
    }

    for (let i = 0; i < count; i++) {
      const [error, word] = decodeFixedLength(payload.subarray(i * WORD), WORD, true)
      if (error) throw new ExecutionError(`recv: ${error.message}`, { cause: error })
      context.arrays.set(address, i, word.value)
    }
    context.log(`Received ${count} word(s) from node ${peer}`)
    return this.continue()
  }
}
