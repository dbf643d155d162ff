/**
 * Subroutine Execution Engine
 *
 * Runs one subroutine at a time against an injected quantum processor:
 * fetch the instruction at the program counter, dispatch it to its handler,
 * and move on once the handler (and any processor call it made) completes.
 */

import { formatInstruction } from '@netq/codec'
import { AbortedError, ExecutionError, logger, toError } from '@netq/core'
import { validateSubroutine } from '@netq/isa'
import type {
  ArrayValue,
  ExecuteOptions,
  ExecutionLogEntry,
  Flavour,
  Instruction,
  InstructionContext,
  QuantumProcessor,
  ResultCode,
  SafePromise,
  Subroutine,
  SubroutineResult,
  VMOptions,
  VMState,
} from '@netq/types'
import { RESULT_CODES, safeError, safeResult, safeTry } from '@netq/types'
import { VM_CONFIG } from './config'
import { InstructionRegistry } from './instructions/registry'
import { ArrayStore, PairQueue, QubitRegistry, RegisterFile } from './memory'

export class NetqasmVM {
  protected readonly registry: InstructionRegistry
  protected readonly qubits: QubitRegistry
  protected readonly maxSteps: number

  protected state: VMState = {
    programCounter: 0,
    resultCode: null,
    steps: 0,
    subroutine: null,
  }
  protected registers = new RegisterFile()
  protected arrays: ArrayStore
  protected heldPairs = new PairQueue()
  protected returnedRegisters = new Map<string, number>()
  protected returnedArrays = new Map<number, ArrayValue[]>()

  /** Executed instructions of the current (or last) run */
  protected executionLogs: ExecutionLogEntry[] = []

  constructor(
    protected readonly processor: QuantumProcessor,
    readonly flavour: Flavour,
    options: VMOptions = {},
  ) {
    this.registry = new InstructionRegistry()
    this.qubits = new QubitRegistry(
      options.qubitCapacity ?? VM_CONFIG.DEFAULT_QUBIT_CAPACITY,
    )
    this.maxSteps = options.maxSteps ?? VM_CONFIG.DEFAULT_MAX_STEPS
    this.arrays = new ArrayStore(flavour.maxArrayAddress)
  }

  /**
   * Validate and run a subroutine to completion. Registers and arrays start
   * empty; allocated qubits carry over from earlier subroutines.
   *
   * Faults come back as errors: ExecutionError (or AddressError) located at
   * the faulting instruction, whose index stays in the program counter,
   * AbortedError when the signal fires, and the validation error when the
   * subroutine does not fit the flavour.
   */
  async execute(
    subroutine: Subroutine,
    options: ExecuteOptions = {},
  ): SafePromise<SubroutineResult> {
    const validationError = validateSubroutine(subroutine, this.flavour)
    if (validationError) {
      logger.error('Subroutine rejected by flavour validation', validationError, {
        subroutineId: subroutine.id,
        flavour: this.flavour.name,
      })
      return safeError(validationError)
    }

    this.startSubroutine(subroutine)
    const signal = options.signal ?? new AbortController().signal

    while (this.state.resultCode === null) {
      const error = await this.step(subroutine, signal)
      if (error) {
        await this.releaseHeldPairs(subroutine)
        return safeError(error)
      }
    }
    await this.releaseHeldPairs(subroutine)

    logger.debug('Subroutine finished', {
      subroutineId: subroutine.id,
      steps: this.state.steps,
    })
    const result: SubroutineResult = {
      subroutineId: subroutine.id,
      registers: this.registers.snapshot(),
      arrays: this.arrays.snapshot(),
      returnedRegisters: new Map(this.returnedRegisters),
      returnedArrays: new Map(this.returnedArrays),
      steps: this.state.steps,
    }
    return safeResult(result)
  }

  private startSubroutine(subroutine: Subroutine | null): void {
    this.state = {
      programCounter: 0,
      resultCode: null,
      steps: 0,
      subroutine,
    }
    this.registers = new RegisterFile(this.flavour.registersPerBank)
    this.arrays = new ArrayStore(this.flavour.maxArrayAddress)
    this.returnedRegisters = new Map()
    this.returnedArrays = new Map()
    this.heldPairs = new PairQueue()
    this.executionLogs = []
  }

  /** Free the kept halves of pairs the run never awaited */
  private async releaseHeldPairs(subroutine: Subroutine): Promise<void> {
    const held = this.heldPairs.drain()
    if (held.length === 0) return
    logger.warn('Discarding pairs whose results were never awaited', {
      subroutineId: subroutine.id,
      pairs: held.length,
    })
    for (const { pair } of held) {
      if (pair.qubit === null) continue
      const [error] = await safeTry(this.processor.freeQubit(pair.qubit))
      if (error) {
        logger.error('Could not free the kept half of a discarded pair', error, {
          subroutineId: subroutine.id,
          handle: pair.qubit,
        })
      }
    }
  }

  /**
   * Execute the instruction at the program counter.
   * Returns the fault that ended the run, or null.
   */
  protected async step(
    subroutine: Subroutine,
    signal: AbortSignal,
  ): Promise<Error | null> {
    const index = this.state.programCounter
    const instruction = subroutine.instructions[index]
    if (instruction === undefined) {
      // Running off the end is an implicit return
      this.state.resultCode = RESULT_CODES.HALT
      return null
    }

    if (signal.aborted) {
      return this.fail(
        RESULT_CODES.ABORTED,
        new AbortedError(`Subroutine ${subroutine.id} aborted before instruction ${index}`),
      )
    }
    if (this.state.steps >= this.maxSteps) {
      return this.fail(
        RESULT_CODES.FAULT,
        this.locate(
          new ExecutionError(`Step limit of ${this.maxSteps} reached`),
          subroutine,
          index,
        ),
      )
    }

    try {
      const resultCode = await this.executeInstruction(instruction, index, signal)
      if (resultCode !== null) this.state.resultCode = resultCode
      return null
    } catch (caught) {
      if (caught instanceof AbortedError) {
        return this.fail(RESULT_CODES.ABORTED, caught)
      }
      const error =
        caught instanceof ExecutionError
          ? caught
          : new ExecutionError(`${instruction.mnemonic} failed: ${toError(caught).message}`, {
              cause: caught,
            })
      return this.fail(RESULT_CODES.FAULT, this.locate(error, subroutine, index))
    }
  }

  private async executeInstruction(
    instruction: Instruction,
    index: number,
    signal: AbortSignal,
  ): Promise<ResultCode | null> {
    const handler = this.registry.getHandler(instruction.mnemonic)
    if (!handler) {
      throw new ExecutionError(`No handler for ${instruction.mnemonic}`)
    }

    this.state.steps++
    const text = formatInstruction(instruction)
    this.executionLogs.push({ step: this.state.steps, pc: index, instruction: text })

    const context: InstructionContext = {
      instruction,
      index,
      pc: index + 1,
      registers: this.registers,
      arrays: this.arrays,
      qubits: this.qubits,
      heldPairs: this.heldPairs,
      processor: this.processor,
      returnedRegisters: this.returnedRegisters,
      returnedArrays: this.returnedArrays,
      signal,
      log: (message: string, data?: Record<string, unknown>) => {
        logger.debug(`${handler.name}: ${message}`, { pc: index, ...data })
      },
    }

    const result = await handler.execute(context)
    if (result.resultCode !== null) {
      return result.resultCode
    }
    this.state.programCounter = context.pc
    return null
  }

  private locate(error: ExecutionError, subroutine: Subroutine, index: number): ExecutionError {
    return error.locate({
      instructionIndex: index,
      hostLine: subroutine.debugLines.get(index) ?? null,
    })
  }

  private fail(resultCode: ResultCode, error: Error): Error {
    this.state.resultCode = resultCode
    logger.error('Subroutine execution failed', error, {
      pc: this.state.programCounter,
      subroutineId: this.state.subroutine?.id,
    })
    return error
  }

  public getExecutionLogs(): ExecutionLogEntry[] {
    return [...this.executionLogs]
  }

  /** Virtual qubits still allocated */
  public get allocatedQubits(): number {
    return this.qubits.size
  }

  /**
   * Reset to initial state, forgetting allocated qubits
   */
  public reset(): void {
    this.startSubroutine(null)
    this.qubits.clear()
  }

  public getState(): VMState {
    return { ...this.state }
  }
}
