/**
 * Instruction Registry
 *
 * Maps every mnemonic to its handler. Whether a mnemonic may run at all is
 * the flavour's decision, checked before execution starts.
 */

import {
  CONTROLLED_ROTATION_GATES,
  type Mnemonic,
  ROTATION_GATES,
  SINGLE_QUBIT_GATES,
  TWO_QUBIT_GATES,
} from '@netq/types'
import {
  ArrayInstruction,
  LeaInstruction,
  LoadInstruction,
  StoreInstruction,
  UndefInstruction,
} from './arrays'
import type { InstructionHandler } from './base'
import {
  BinaryBranchInstruction,
  JumpInstruction,
  UnaryBranchInstruction,
} from './branching'
import {
  BinaryInstruction,
  ModularInstruction,
  MovInstruction,
  SetInstruction,
} from './classical'
import {
  BreakpointInstruction,
  RetArrInstruction,
  RetInstruction,
  RetRegInstruction,
} from './control'
import {
  CreateEprInstruction,
  RecvEprInstruction,
  WaitAllInstruction,
  WaitAnyInstruction,
  WaitSingleInstruction,
} from './entanglement'
import { RecvInstruction, SendInstruction } from './messaging'
import {
  ControlledRotationInstruction,
  InitInstruction,
  MeasureInstruction,
  QallocInstruction,
  QfreeInstruction,
  RotationInstruction,
  SingleQubitGateInstruction,
  TwoQubitGateInstruction,
} from './quantum'

export class InstructionRegistry {
  private handlers: Map<Mnemonic, InstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  private registerInstructions(): void {
    // Registers and arrays
    this.register(new SetInstruction())
    this.register(new MovInstruction())
    this.register(new ArrayInstruction())
    this.register(new StoreInstruction())
    this.register(new LoadInstruction())
    this.register(new UndefInstruction())
    this.register(new LeaInstruction())

    // Arithmetic
    this.register(new BinaryInstruction('add'))
    this.register(new BinaryInstruction('sub'))
    this.register(new BinaryInstruction('mul'))
    this.register(new BinaryInstruction('div'))
    this.register(new BinaryInstruction('rem'))
    this.register(new ModularInstruction('addm'))
    this.register(new ModularInstruction('subm'))

    // Control flow
    this.register(new JumpInstruction())
    this.register(new UnaryBranchInstruction('bez'))
    this.register(new UnaryBranchInstruction('bnz'))
    this.register(new BinaryBranchInstruction('beq'))
    this.register(new BinaryBranchInstruction('bne'))
    this.register(new BinaryBranchInstruction('blt'))
    this.register(new BinaryBranchInstruction('bge'))

    // Qubits and gates
    this.register(new QallocInstruction())
    this.register(new InitInstruction())
    this.register(new QfreeInstruction())
    this.register(new MeasureInstruction())
    for (const gate of SINGLE_QUBIT_GATES) {
      this.register(new SingleQubitGateInstruction(gate))
    }
    for (const gate of ROTATION_GATES) this.register(new RotationInstruction(gate))
    for (const gate of TWO_QUBIT_GATES) this.register(new TwoQubitGateInstruction(gate))
    for (const gate of CONTROLLED_ROTATION_GATES) {
      this.register(new ControlledRotationInstruction(gate))
    }

    // Entanglement and messaging
    this.register(new CreateEprInstruction())
    this.register(new RecvEprInstruction())
    this.register(new WaitAllInstruction())
    this.register(new WaitAnyInstruction())
    this.register(new WaitSingleInstruction())
    this.register(new SendInstruction())
    this.register(new RecvInstruction())

    // Returns
    this.register(new RetRegInstruction())
    this.register(new RetArrInstruction())
    this.register(new RetInstruction())
    this.register(new BreakpointInstruction())
  }

  register(handler: InstructionHandler): void {
    this.handlers.set(handler.name, handler)
  }

  getHandler(mnemonic: Mnemonic): InstructionHandler | undefined {
    return this.handlers.get(mnemonic)
  }
}
