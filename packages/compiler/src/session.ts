/**
 * Session
 *
 * Owns a program builder for one application. Each flush compiles what was
 * built, encodes it, hands the bytes to the executor and resolves the
 * flushed futures from the result. Flushes run strictly in call order.
 */

import { encodeSubroutine } from '@netq/codec'
import { ExecutionError, type RuntimeConfig, logger } from '@netq/core'
import { getFlavour } from '@netq/isa'
import type {
  ExecuteOptions,
  Flavour,
  SafePromise,
  Subroutine,
  SubroutineExecutor,
  SubroutineResult,
} from '@netq/types'
import { safeError, safeResult, safeTry } from '@netq/types'
import { type BuiltProgram, ProgramBuilder } from './builder'
import { compile } from './compiler'
import { resolveFutures } from './futures'

export interface SessionOptions {
  /** Shown in log lines */
  name?: string
  appId: number
  flavour: Flavour
  executor: SubroutineExecutor
}

export interface FlushResult {
  readonly subroutine: Subroutine
  readonly result: SubroutineResult
}

export class Session {
  readonly builder = new ProgramBuilder()
  private nextId = 0
  private queue: Promise<unknown> = Promise.resolve()

  constructor(private readonly options: SessionOptions) {}

  get name(): string {
    return this.options.name ?? `app-${this.options.appId}`
  }

  get flavour(): Flavour {
    return this.options.flavour
  }

  /**
   * Close the operations built so far into one subroutine and run it.
   * The builder is ready for the next subroutine as soon as this returns.
   */
  flush(options: ExecuteOptions = {}): SafePromise<FlushResult> {
    const [error, built] = this.builder.flush()
    if (error) return Promise.resolve(safeError(error))

    const id = this.nextId++
    const run = this.queue.then(() => this.run(built, id, options))
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async run(
    built: BuiltProgram,
    id: number,
    options: ExecuteOptions,
  ): SafePromise<FlushResult> {
    const { flavour, appId, executor } = this.options
    const context = { session: this.name, subroutineId: id }

    const [compileError, compiled] = compile(built.program, flavour, { id, appId })
    if (compileError) {
      logger.error('Failed to compile subroutine', compileError, context)
      return safeError(compileError)
    }

    const [encodeError, payload] = encodeSubroutine(compiled.subroutine, flavour)
    if (encodeError) {
      logger.error('Failed to encode subroutine', encodeError, context)
      return safeError(encodeError)
    }

    const [rejection, outcome] = await safeTry(executor.execute(payload, options))
    if (rejection) {
      logger.error('Executor rejected the subroutine', rejection, context)
      return safeError(rejection)
    }

    const [executionError, result] = outcome
    if (executionError) {
      // Encoded subroutines carry no debug map; restore the host line here
      if (executionError instanceof ExecutionError && executionError.instructionIndex !== null) {
        const instructionIndex = executionError.instructionIndex
        executionError.locate({
          instructionIndex,
          hostLine: compiled.subroutine.debugLines.get(instructionIndex) ?? null,
        })
      }
      return safeError(executionError)
    }

    const resolveError = resolveFutures(built.futures, compiled, result)
    if (resolveError) {
      logger.error('Failed to resolve futures', resolveError, context)
      return safeError(resolveError)
    }

    logger.debug('Subroutine completed', { ...context, steps: result.steps })
    return safeResult({ subroutine: compiled.subroutine, result })
  }
}

/** Session for the flavour and app id of a loaded runtime configuration */
export function createSession(
  config: RuntimeConfig,
  executor: SubroutineExecutor,
  name?: string,
): Session {
  return new Session({
    name,
    appId: config.appId,
    flavour: getFlavour(config.flavour),
    executor,
  })
}
