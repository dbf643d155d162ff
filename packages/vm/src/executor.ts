/**
 * Local Executor
 *
 * Accepts encoded subroutines, decodes them for the engine's flavour and
 * runs them one at a time in submission order.
 */

import { decodeSubroutine } from '@netq/codec'
import { logger } from '@netq/core'
import type {
  ExecuteOptions,
  SafePromise,
  SubroutineExecutor,
  SubroutineResult,
} from '@netq/types'
import { safeError } from '@netq/types'
import type { NetqasmVM } from './vm'

export class LocalExecutor implements SubroutineExecutor {
  private nextId = 0
  private queue: Promise<unknown> = Promise.resolve()

  constructor(private readonly vm: NetqasmVM) {}

  execute(
    payload: Uint8Array,
    options: ExecuteOptions = {},
  ): SafePromise<SubroutineResult> {
    const id = this.nextId++
    const run = this.queue.then(() => this.run(payload, id, options))
    // A rejection reaches the caller through `run`; the queue moves on
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async run(
    payload: Uint8Array,
    id: number,
    options: ExecuteOptions,
  ): SafePromise<SubroutineResult> {
    const [error, subroutine] = decodeSubroutine(payload, this.vm.flavour, id)
    if (error) {
      logger.error('Failed to decode subroutine', error, { subroutineId: id })
      return safeError(error)
    }
    logger.debug('Executing subroutine', {
      subroutineId: id,
      instructions: subroutine.instructions.length,
    })
    return this.vm.execute(subroutine, options)
  }
}
