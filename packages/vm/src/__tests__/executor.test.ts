import { encodeSubroutine, parseText } from '@netq/codec'
import { EncodingError, logger } from '@netq/core'
import { VANILLA_FLAVOUR } from '@netq/isa'
import { beforeAll, describe, expect, it } from 'vitest'
import { LocalExecutor, NetqasmVM, RecordingProcessor } from '../../index'

beforeAll(() => {
  logger.init()
})

function encode(source: string): Uint8Array {
  const [parseError, subroutine] = parseText(source, VANILLA_FLAVOUR)
  if (parseError) throw parseError
  const [error, bytes] = encodeSubroutine(subroutine, VANILLA_FLAVOUR)
  if (error) throw error
  return bytes
}

describe('LocalExecutor', () => {
  it('should run submitted subroutines one at a time in order', async () => {
    const processor = new RecordingProcessor({ outcomes: [1] })
    const executor = new LocalExecutor(new NetqasmVM(processor, VANILLA_FLAVOUR))

    const first = executor.execute(encode(['qalloc Q0', 'h Q0', 'ret'].join('\n')))
    const second = executor.execute(encode(['meas Q0 R0', 'qfree Q0', 'ret_reg R0', 'ret'].join('\n')))

    const [[firstError, firstResult], [secondError, secondResult]] = await Promise.all([
      first,
      second,
    ])
    expect(firstError).toBeUndefined()
    expect(secondError).toBeUndefined()
    expect(firstResult?.subroutineId).toBe(0)
    expect(secondResult?.subroutineId).toBe(1)
    expect(secondResult?.returnedRegisters.get('R0')).toBe(1)
    expect(processor.calls.map((call) => call.type)).toEqual([
      'allocate',
      'gate',
      'measure',
      'free',
    ])
  })

  it('should report undecodable payloads and keep serving', async () => {
    const executor = new LocalExecutor(new NetqasmVM(new RecordingProcessor(), VANILLA_FLAVOUR))

    const [error] = await executor.execute(Uint8Array.from([1, 0, 0]))
    expect(error).toBeInstanceOf(EncodingError)

    const [nextError, result] = await executor.execute(encode('ret'))
    expect(nextError).toBeUndefined()
    expect(result?.subroutineId).toBe(1)
  })
})
