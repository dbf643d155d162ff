import { parseText } from '@netq/codec'
import { AbortedError, AddressError, ExecutionError, logger } from '@netq/core'
import { VANILLA_FLAVOUR } from '@netq/isa'
import type { Subroutine } from '@netq/types'
import { RESULT_CODES } from '@netq/types'
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { NetqasmVM, RecordingProcessor } from '../../index'

beforeAll(() => {
  logger.init()
})

function parse(lines: string[]): Subroutine {
  const [error, subroutine] = parseText(lines.join('\n'), VANILLA_FLAVOUR)
  if (error) throw error
  return subroutine
}

// Receive up to three words from node 7 into @1
const RECEIVE = ['set R3 7', 'set R4 3', 'array R4 @1', 'recv R3 @1', 'ret_arr @1', 'ret']

describe('Classical messaging', () => {
  let processor: RecordingProcessor
  let vm: NetqasmVM

  beforeEach(() => {
    processor = new RecordingProcessor()
    vm = new NetqasmVM(processor, VANILLA_FLAVOUR)
  })

  it('should send array values as little-endian int32 words', async () => {
    const subroutine = parse([
      'set R0 2',
      'array R0 @0',
      'set R1 -1',
      'set R2 0',
      'store R1 @0[R2]',
      'set R1 258',
      'set R2 1',
      'store R1 @0[R2]',
      'set R3 7',
      'send R3 @0',
      'ret',
    ])

    const [error] = await vm.execute(subroutine)
    expect(error).toBeUndefined()
    expect(processor.calls).toEqual([
      { type: 'send', peer: 7, payload: Uint8Array.from([255, 255, 255, 255, 2, 1, 0, 0]) },
    ])
  })

  it('should fault when sending an undefined entry', async () => {
    const [error] = await vm.execute(parse(['set R0 1', 'array R0 @0', 'send R0 @0']))
    expect(error).toBeInstanceOf(ExecutionError)
    expect(error?.message).toBe('send: message word at @0[0] is undefined')
  })

  it('should write received words from index 0 on', async () => {
    processor.deliver(7, Uint8Array.from([5, 0, 0, 0, 0, 0, 0, 128]))

    const [error, result] = await vm.execute(parse(RECEIVE))
    expect(error).toBeUndefined()
    expect(result?.returnedArrays.get(1)).toEqual([5, -2147483648, undefined])
  })

  it('should wait for a message delivered later', async () => {
    const run = vm.execute(parse(RECEIVE))
    await vi.waitFor(() => {
      expect(processor.calls.map((call) => call.type)).toContain('receive')
    })
    processor.deliver(7, Uint8Array.from([9, 0, 0, 0]))

    const [error, result] = await run
    expect(error).toBeUndefined()
    expect(result?.returnedArrays.get(1)).toEqual([9, undefined, undefined])
  })

  it('should reject a message larger than the array', async () => {
    processor.deliver(7, new Uint8Array(16))

    const [error] = await vm.execute(parse(RECEIVE))
    expect(error).toBeInstanceOf(AddressError)
    expect(error?.message).toBe('recv: 4 word(s) do not fit array @1 of length 3')
  })

  it('should reject a message that is not whole words', async () => {
    processor.deliver(7, new Uint8Array(5))

    const [error] = await vm.execute(parse(RECEIVE))
    expect(error).toBeInstanceOf(ExecutionError)
    expect(error?.message).toBe('recv: message of 5 bytes is not a whole number of 4-byte words')
  })

  it('should abort a pending receive', async () => {
    const controller = new AbortController()
    const run = vm.execute(parse(RECEIVE), { signal: controller.signal })
    await vi.waitFor(() => {
      expect(processor.calls.map((call) => call.type)).toContain('receive')
    })
    controller.abort()

    const [error] = await run
    expect(error).toBeInstanceOf(AbortedError)
    expect(vm.getState().resultCode).toBe(RESULT_CODES.ABORTED)
    expect(vm.getState().programCounter).toBe(3)
  })
})
