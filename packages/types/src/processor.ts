import type { AngleSpec, GateName } from './isa'

/** Opaque handle of a physical or simulated qubit */
export type QubitHandle = number

export type EprType = 'create-keep' | 'measure-directly' | 'remote-state-prep'

/** Wire codes of EprType inside the create argument array */
export const EPR_TYPE_CODES: Readonly<Record<EprType, number>> = {
  'create-keep': 0,
  'measure-directly': 1,
  'remote-state-prep': 2,
}

/** Optional link-layer parameters of a create request */
export interface EntanglementParams {
  readonly randomBasisLocal: number
  readonly randomBasisRemote: number
  /** Minimum fidelity in percent */
  readonly minimumFidelity: number
  readonly timeUnit: number
  readonly maxTime: number
  readonly priority: number
  readonly atomic: number
  readonly consecutive: number
  readonly probabilityDistLocal1: number
  readonly probabilityDistLocal2: number
  readonly probabilityDistRemote1: number
  readonly probabilityDistRemote2: number
  readonly rotationXLocal1: number
  readonly rotationYLocal: number
  readonly rotationXLocal2: number
  readonly rotationXRemote1: number
  readonly rotationYRemote: number
  readonly rotationXRemote2: number
}

export interface EntanglementRequest {
  readonly role: 'create' | 'receive'
  readonly remoteNodeId: number
  readonly eprSocketId: number
  /** Unknown on the receiving side until the peer's request arrives */
  readonly type: EprType | null
  readonly number: number
  readonly params: EntanglementParams | null
}

export interface EntanglementPair {
  /** Local half of the pair; present for create-keep pairs */
  readonly qubit: QubitHandle | null
  /** Generation metadata, one number per result field */
  readonly info: readonly number[]
}

export interface GateApplication {
  readonly gate: GateName
  readonly qubits: readonly QubitHandle[]
  readonly angle?: AngleSpec
}

export interface BreakpointSnapshot {
  readonly action: number
  readonly role: number
  readonly instructionIndex: number
  readonly registers: ReadonlyMap<string, number>
  readonly arrays: ReadonlyMap<number, readonly (number | undefined)[]>
}

/**
 * Quantum/network side effects, injected into the execution engine.
 * Only `requestEntanglement` and `receiveMessage` may suspend for long;
 * both receive the abort signal of the running subroutine.
 */
export interface QuantumProcessor {
  allocateQubit(virtualId: number): Promise<QubitHandle>
  initQubit(qubit: QubitHandle): Promise<void>
  freeQubit(qubit: QubitHandle): Promise<void>
  applyGate(application: GateApplication): Promise<void>
  measure(qubit: QubitHandle): Promise<0 | 1>
  requestEntanglement(
    request: EntanglementRequest,
    signal: AbortSignal,
  ): Promise<EntanglementPair[]>
  sendMessage(peer: number, payload: Uint8Array): Promise<void>
  receiveMessage(peer: number, signal: AbortSignal): Promise<Uint8Array>
  recordBreakpoint(snapshot: BreakpointSnapshot): Promise<void>
}
