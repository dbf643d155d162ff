/**
 * Recording Processor
 *
 * In-process QuantumProcessor that simulates no physics: it hands out
 * incrementing qubit handles, replays queued measurement outcomes and logs
 * every call. Used by tests and by hosts that only need the classical flow.
 */

import { AbortedError, ExecutionError } from '@netq/core'
import {
  type BreakpointSnapshot,
  EPR_TYPE_CODES,
  type EntanglementPair,
  type EntanglementRequest,
  type GateApplication,
  type QuantumProcessor,
  type QubitHandle,
} from '@netq/types'

export type ProcessorCall =
  | { type: 'allocate'; virtualId: number; handle: QubitHandle }
  | { type: 'init'; qubit: QubitHandle }
  | { type: 'free'; qubit: QubitHandle }
  | { type: 'gate'; application: GateApplication }
  | { type: 'measure'; qubit: QubitHandle; outcome: 0 | 1 }
  | { type: 'entangle'; request: EntanglementRequest }
  | { type: 'send'; peer: number; payload: Uint8Array }
  | { type: 'receive'; peer: number }
  | { type: 'breakpoint'; snapshot: BreakpointSnapshot }

export type EntanglementSource = (
  request: EntanglementRequest,
  signal: AbortSignal,
) => Promise<EntanglementPair[]>

export interface RecordingProcessorOptions {
  /** Outcomes returned by successive measurements; 0 once exhausted */
  outcomes?: Array<0 | 1>
  /** Replaces the default pair generator */
  entangle?: EntanglementSource
}

interface PendingReceive {
  resolve: (payload: Uint8Array) => void
  reject: (error: Error) => void
}

export class RecordingProcessor implements QuantumProcessor {
  readonly calls: ProcessorCall[] = []
  private readonly outcomes: Array<0 | 1>
  private readonly entangle: EntanglementSource | null
  private readonly live = new Set<QubitHandle>()
  private readonly inbox = new Map<number, Uint8Array[]>()
  private readonly receivers = new Map<number, PendingReceive[]>()
  private nextHandle = 0
  private pairCount = 0

  constructor(options: RecordingProcessorOptions = {}) {
    this.outcomes = [...(options.outcomes ?? [])]
    this.entangle = options.entangle ?? null
  }

  /** Gates applied so far, in order */
  get gates(): GateApplication[] {
    return this.calls.flatMap((call) => (call.type === 'gate' ? [call.application] : []))
  }

  get liveQubits(): number {
    return this.live.size
  }

  /** Queue further measurement outcomes */
  queueOutcomes(...outcomes: Array<0 | 1>): void {
    this.outcomes.push(...outcomes)
  }

  /** Hand a message from `peer` to a waiting or future recv */
  deliver(peer: number, payload: Uint8Array): void {
    const waiting = this.receivers.get(peer)?.shift()
    if (waiting) {
      waiting.resolve(payload)
      return
    }
    const queue = this.inbox.get(peer) ?? []
    queue.push(payload)
    this.inbox.set(peer, queue)
  }

  private checkLive(qubit: QubitHandle): void {
    if (!this.live.has(qubit)) {
      throw new ExecutionError(`Qubit handle ${qubit} is not live`)
    }
  }

  private allocateHandle(): QubitHandle {
    const handle = this.nextHandle++
    this.live.add(handle)
    return handle
  }

  async allocateQubit(virtualId: number): Promise<QubitHandle> {
    const handle = this.allocateHandle()
    this.calls.push({ type: 'allocate', virtualId, handle })
    return handle
  }

  async initQubit(qubit: QubitHandle): Promise<void> {
    this.checkLive(qubit)
    this.calls.push({ type: 'init', qubit })
  }

  async freeQubit(qubit: QubitHandle): Promise<void> {
    this.checkLive(qubit)
    this.live.delete(qubit)
    this.calls.push({ type: 'free', qubit })
  }

  async applyGate(application: GateApplication): Promise<void> {
    for (const qubit of application.qubits) this.checkLive(qubit)
    this.calls.push({ type: 'gate', application })
  }

  async measure(qubit: QubitHandle): Promise<0 | 1> {
    this.checkLive(qubit)
    const outcome = this.outcomes.shift() ?? 0
    this.calls.push({ type: 'measure', qubit, outcome })
    return outcome
  }

  async requestEntanglement(
    request: EntanglementRequest,
    signal: AbortSignal,
  ): Promise<EntanglementPair[]> {
    this.calls.push({ type: 'entangle', request })
    if (this.entangle) return this.entangle(request, signal)
    return Array.from({ length: request.number }, (_, i) => this.generatePair(request, i))
  }

  /**
   * Default pair: a kept qubit for create-keep (and for every received pair)
   * plus ten info fields: type code, sequence number, qubit handle, outcome,
   * pair index, socket, remote node, fidelity percent and two zero fields.
   */
  private generatePair(request: EntanglementRequest, index: number): EntanglementPair {
    const type = request.type ?? 'create-keep'
    const handle = type === 'create-keep' ? this.allocateHandle() : null
    const sequence = this.pairCount++
    return {
      qubit: handle,
      info: [
        EPR_TYPE_CODES[type],
        sequence,
        handle ?? 0,
        0,
        index,
        request.eprSocketId,
        request.remoteNodeId,
        100,
        0,
        0,
      ],
    }
  }

  async sendMessage(peer: number, payload: Uint8Array): Promise<void> {
    this.calls.push({ type: 'send', peer, payload: payload.slice() })
  }

  receiveMessage(peer: number, signal: AbortSignal): Promise<Uint8Array> {
    this.calls.push({ type: 'receive', peer })
    const queued = this.inbox.get(peer)?.shift()
    if (queued) return Promise.resolve(queued)
    if (signal.aborted) {
      return Promise.reject(new AbortedError(`Receive from node ${peer} aborted`))
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const pending: PendingReceive = { resolve, reject }
      const waiting = this.receivers.get(peer) ?? []
      waiting.push(pending)
      this.receivers.set(peer, waiting)
      signal.addEventListener(
        'abort',
        () => {
          const list = this.receivers.get(peer) ?? []
          this.receivers.set(
            peer,
            list.filter((entry) => entry !== pending),
          )
          reject(new AbortedError(`Receive from node ${peer} aborted`))
        },
        { once: true },
      )
    })
  }

  async recordBreakpoint(snapshot: BreakpointSnapshot): Promise<void> {
    this.calls.push({ type: 'breakpoint', snapshot })
  }
}
