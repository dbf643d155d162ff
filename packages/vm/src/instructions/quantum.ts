/**
 * Quantum Instructions
 *
 * Q registers hold virtual qubit ids; the qubit table maps them to the
 * processor's handles. Every gate completes on the processor before the
 * program counter moves on.
 */

import { ExecutionError } from '@netq/core'
import type {
  ControlledRotationGate,
  InstructionContext,
  InstructionResult,
  RotationGate,
  SingleQubitGate,
  TwoQubitGate,
} from '@netq/types'
import { BaseInstruction } from './base'

/** `qalloc Q` allocates a fresh qubit in |0⟩ under the id Q holds */
export class QallocInstruction extends BaseInstruction {
  readonly name = 'qalloc'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const virtualId = this.readRegister(context, 0)
    context.qubits.assertFree(virtualId)
    const handle = await context.processor.allocateQubit(virtualId)
    context.qubits.bind(virtualId, handle)
    context.log(`Allocated virtual qubit ${virtualId}`, { handle })
    return this.continue()
  }
}

export class InitInstruction extends BaseInstruction {
  readonly name = 'init'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    await context.processor.initQubit(this.qubit(context, 0))
    return this.continue()
  }
}

export class QfreeInstruction extends BaseInstruction {
  readonly name = 'qfree'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const virtualId = this.readRegister(context, 0)
    await context.processor.freeQubit(context.qubits.resolve(virtualId))
    context.qubits.release(virtualId)
    return this.continue()
  }
}

export class SingleQubitGateInstruction extends BaseInstruction {
  constructor(readonly name: SingleQubitGate) {
    super()
  }

  async execute(context: InstructionContext): Promise<InstructionResult> {
    await context.processor.applyGate({
      gate: this.name,
      qubits: [this.qubit(context, 0)],
    })
    return this.continue()
  }
}

/** `rot_* Q n d` rotates by n·π/2^d */
export class RotationInstruction extends BaseInstruction {
  constructor(readonly name: RotationGate) {
    super()
  }

  async execute(context: InstructionContext): Promise<InstructionResult> {
    await context.processor.applyGate({
      gate: this.name,
      qubits: [this.qubit(context, 0)],
      angle: { n: this.immediate(context, 1), d: this.immediate(context, 2) },
    })
    return this.continue()
  }
}

abstract class TwoQubitInstruction extends BaseInstruction {
  protected qubitPair(context: InstructionContext): [number, number] {
    const control = this.qubit(context, 0)
    const target = this.qubit(context, 1)
    if (control === target) {
      throw new ExecutionError(`${this.name}: control and target are the same qubit`)
    }
    return [control, target]
  }
}

export class TwoQubitGateInstruction extends TwoQubitInstruction {
  constructor(readonly name: TwoQubitGate) {
    super()
  }

  async execute(context: InstructionContext): Promise<InstructionResult> {
    await context.processor.applyGate({ gate: this.name, qubits: this.qubitPair(context) })
    return this.continue()
  }
}

/** `crot_* Qc Qt n d` */
export class ControlledRotationInstruction extends TwoQubitInstruction {
  constructor(readonly name: ControlledRotationGate) {
    super()
  }

  async execute(context: InstructionContext): Promise<InstructionResult> {
    await context.processor.applyGate({
      gate: this.name,
      qubits: this.qubitPair(context),
      angle: { n: this.immediate(context, 2), d: this.immediate(context, 3) },
    })
    return this.continue()
  }
}

/** `meas Q R` writes the outcome bit into R */
export class MeasureInstruction extends BaseInstruction {
  readonly name = 'meas'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const outcome = await context.processor.measure(this.qubit(context, 0))
    this.writeRegister(context, 1, outcome)
    context.log(`Measured ${outcome}`)
    return this.continue()
  }
}
