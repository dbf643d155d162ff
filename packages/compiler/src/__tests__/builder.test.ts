import { CompileError, NotYetAvailableError, logger } from '@netq/core'
import { beforeAll, describe, expect, it } from 'vitest'
import { ArrayFuture, ProgramBuilder, RegisterFuture } from '../../index'

beforeAll(() => {
  logger.init()
})

describe('ProgramBuilder', () => {
  it('should nest blocks into an operation tree', () => {
    const builder = new ProgramBuilder()
    const qubit = builder.atLine(1).allocQubit()
    const value = builder.register(2)
    builder.atLine(5).beginIf(value, 'gt', 1)
    builder.atLine(6).gate('x', [qubit])
    builder.beginElse()
    const counter = builder.beginLoop({ stop: 2 })
    builder.add(value, value, counter)
    builder.end()
    builder.end()

    const [error, built] = builder.flush()
    expect(error).toBeUndefined()
    expect(built?.program.operations).toEqual([
      { type: 'alloc', qubit: 0, hostLine: 1 },
      { type: 'set', variable: 0, value: { kind: 'literal', value: 2 }, hostLine: 1 },
      {
        type: 'if',
        condition: {
          operator: 'gt',
          left: { kind: 'variable', variable: 0 },
          right: { kind: 'literal', value: 1 },
        },
        then: [{ type: 'gate', gate: 'x', qubits: [0], hostLine: 6 }],
        otherwise: [
          {
            type: 'loop',
            range: { start: 0, stop: 2, step: 1 },
            counter: 1,
            body: [
              {
                type: 'arithmetic',
                operator: 'add',
                variable: 0,
                left: { kind: 'variable', variable: 0 },
                right: { kind: 'variable', variable: 1 },
                hostLine: 6,
              },
            ],
            hostLine: 6,
          },
        ],
        hostLine: 5,
      },
    ])
    expect(built?.program.futureVariables).toEqual(new Set([0, 1]))
  })

  it('should refuse to flush with an open block', () => {
    const builder = new ProgramBuilder()
    builder.beginLoop({ stop: 1 })

    const [error] = builder.flush()
    expect(error).toBeInstanceOf(CompileError)
    expect(error?.message).toBe('1 block(s) still open at flush')
  })

  it('should reject end and else without a matching block', () => {
    const builder = new ProgramBuilder()
    expect(() => builder.end()).toThrow(new CompileError('end() without an open block'))
    expect(() => builder.beginElse()).toThrow(new CompileError('else without an open if block'))
    expect(builder.depth).toBe(0)
  })

  it('should reject loops that never reach their end', () => {
    const builder = new ProgramBuilder()
    expect(() => builder.beginLoop({ start: 0, stop: 5, step: 2 })).toThrow(CompileError)
    expect(() => builder.beginLoop({ start: 5, stop: 0 })).toThrow(CompileError)
    expect(() => builder.beginLoop({ stop: 3, step: 0 })).toThrow(CompileError)
  })

  it('should hand out the smallest free qubit id', () => {
    const builder = new ProgramBuilder()
    const first = builder.allocQubit()
    const second = builder.allocQubit()
    builder.freeQubit(first)

    expect(second.id).toBe(1)
    expect(builder.allocQubit().id).toBe(0)
    expect(builder.allocQubit().id).toBe(2)
  })

  it('should reject gates on freed, foreign or doubled qubits', () => {
    const builder = new ProgramBuilder()
    const qubit = builder.allocQubit()
    const other = builder.allocQubit()

    expect(() => builder.allocQubit(0)).toThrow(new CompileError('Qubit 0 is already allocated'))
    expect(() => builder.gate('cnot', [qubit, qubit])).toThrow(
      new CompileError('cnot applied twice to the same qubit'),
    )
    expect(() => new ProgramBuilder().gate('x', [qubit])).toThrow(
      new CompileError('Qubit 0 is not allocated'),
    )

    builder.freeQubit(other)
    expect(() => builder.measure(other)).toThrow(new CompileError('Qubit 1 is not allocated'))
  })

  it('should keep qubits allocated across flushes', () => {
    const builder = new ProgramBuilder()
    const qubit = builder.allocQubit()
    builder.flush()

    builder.gate('h', [qubit])
    const [, built] = builder.flush()
    expect(built?.program.operations).toEqual([{ type: 'gate', gate: 'h', qubits: [0] }])
  })

  it('should reject values that are not 32-bit integers', () => {
    const builder = new ProgramBuilder()
    expect(() => builder.register(2 ** 31)).toThrow(
      new CompileError('Value 2147483648 is not a 32-bit integer'),
    )
    expect(() => builder.register(0.5)).toThrow(CompileError)
  })

  it('should only write registers of the subroutine being built', () => {
    const builder = new ProgramBuilder()
    const old = builder.register(1)
    builder.flush()

    expect(() => builder.set(old, 2)).toThrow(
      new CompileError('Only registers of the subroutine being built can be written'),
    )
    builder.register(old)
    const [, built] = builder.flush()
    const [operation] = built?.program.operations ?? []
    expect(operation?.type === 'set' && operation.value.kind).toBe('future')
  })

  it('should restart variable and array numbering on every flush', () => {
    const builder = new ProgramBuilder()
    builder.register()
    builder.array(2)
    builder.flush()

    const value = builder.register()
    const array = builder.array(4)
    expect(value.state).toEqual({
      status: 'pending',
      slot: { kind: 'register', variable: 0, epoch: 1 },
    })
    expect(array.state).toEqual({
      status: 'pending',
      slot: { kind: 'array', array: 0, epoch: 1 },
    })
    expect(builder.currentEpoch).toBe(1)
  })

  it('should assign argument, qubit and result arrays to an EPR request', () => {
    const builder = new ProgramBuilder()
    const { qubits, info } = builder.createEpr({ remoteNodeId: 1, number: 2, minimumFidelity: 90 })

    expect(qubits.map((qubit) => qubit.id)).toEqual([0, 1])
    expect(info.length).toBe(20)
    const [, built] = builder.flush()
    expect(built?.program.operations).toEqual([
      {
        type: 'create_epr',
        remoteNodeId: 1,
        eprSocketId: 0,
        eprType: 'create-keep',
        number: 2,
        params: { minimumFidelity: 90 },
        qubits: [0, 1],
        argumentArray: 0,
        qubitArray: 1,
        resultArray: 2,
        postRoutine: null,
      },
    ])
  })

  it('should reuse one qubit id for every pair of a sequential request', () => {
    const builder = new ProgramBuilder()
    const { qubits, info } = builder.createEpr({
      remoteNodeId: 1,
      number: 3,
      sequential: true,
      postRoutine: ({ qubit }) => {
        if (!qubit) throw new Error('expected a kept qubit')
        builder.gate('h', [qubit])
        builder.freeQubit(qubit)
      },
    })

    expect(qubits).toEqual([])
    expect(info.length).toBe(30)
    const [, built] = builder.flush()
    expect(built?.program.operations).toEqual([
      {
        type: 'create_epr',
        remoteNodeId: 1,
        eprSocketId: 0,
        eprType: 'create-keep',
        number: 3,
        params: { consecutive: 1 },
        qubits: [0, 0, 0],
        argumentArray: 0,
        qubitArray: 1,
        resultArray: 2,
        postRoutine: {
          counter: 0,
          body: [
            { type: 'gate', gate: 'h', qubits: [0] },
            { type: 'free', qubit: 0 },
          ],
        },
      },
    ])
    expect(built?.program.futureVariables).toEqual(new Set([0]))
  })

  it('should demand a post routine that frees the qubit of a sequential request', () => {
    const builder = new ProgramBuilder()
    expect(() => builder.createEpr({ remoteNodeId: 1, number: 2, sequential: true })).toThrow(
      new CompileError('A sequential request for more than one pair needs a post routine'),
    )
    expect(() =>
      builder.createEpr({
        remoteNodeId: 1,
        number: 2,
        sequential: true,
        postRoutine: ({ qubit }) => {
          if (qubit) builder.gate('x', [qubit])
        },
      }),
    ).toThrow(new CompileError('The post routine has to free qubit 0 for the next pair'))
  })

  it('should keep a single sequential pair without a post routine', () => {
    const builder = new ProgramBuilder()
    const { qubits } = builder.createEpr({ remoteNodeId: 1, sequential: true })
    expect(qubits.map((qubit) => qubit.id)).toEqual([0])
  })

  it('should keep no qubit for measure-directly requests', () => {
    const builder = new ProgramBuilder()
    const { qubits } = builder.createEpr({ remoteNodeId: 1, type: 'measure-directly' })
    expect(qubits).toEqual([])
    expect(builder.allocQubit().id).toBe(0)
  })
})

describe('ProgramBuilder blocks', () => {
  it('should refuse to free a qubit inside an if block', () => {
    const builder = new ProgramBuilder()
    const qubit = builder.allocQubit()
    const flag = builder.register(1)
    builder.beginIf(flag, 'eq', 1)
    expect(() => builder.freeQubit(qubit)).toThrow(
      new CompileError('Qubit 0 cannot be freed inside an if block'),
    )
    builder.gate('x', [qubit])
    builder.end()
    builder.freeQubit(qubit)
    expect(builder.allocQubit().id).toBe(0)
  })

  it('should record a foreach block over an array', () => {
    const builder = new ProgramBuilder()
    const values = builder.array(2)
    const sum = builder.register(0)
    builder.foreach(values, (element) => builder.add(sum, sum, element))

    const [, built] = builder.flush()
    expect(built?.program.operations).toEqual([
      { type: 'array', array: 0, length: 2 },
      { type: 'set', variable: 0, value: { kind: 'literal', value: 0 } },
      {
        type: 'foreach',
        array: 0,
        length: 2,
        counter: 1,
        element: 2,
        body: [
          {
            type: 'arithmetic',
            operator: 'add',
            variable: 0,
            left: { kind: 'variable', variable: 0 },
            right: { kind: 'variable', variable: 2 },
          },
        ],
      },
    ])
  })

  it('should record the exit condition of a loopUntil block', () => {
    const builder = new ProgramBuilder()
    const value = builder.register(0)
    builder.loopUntil(4, () => {
      builder.add(value, value, 2)
      builder.exitWhen(value, 'ge', 5)
    })

    const [, built] = builder.flush()
    expect(built?.program.operations[1]).toEqual({
      type: 'loop_until',
      maxIterations: 4,
      counter: 1,
      exit: {
        operator: 'ge',
        left: { kind: 'variable', variable: 0 },
        right: { kind: 'literal', value: 5 },
      },
      body: [
        {
          type: 'arithmetic',
          operator: 'add',
          variable: 0,
          left: { kind: 'variable', variable: 0 },
          right: { kind: 'literal', value: 2 },
        },
      ],
    })
  })

  it('should reject loopUntil blocks without exactly one exit condition', () => {
    const builder = new ProgramBuilder()
    expect(() => builder.exitWhen(0, 'eq', 0)).toThrow(
      new CompileError('exitWhen() outside a loopUntil block'),
    )
    expect(() => builder.beginLoopUntil(0)).toThrow(
      new CompileError('Cannot loop at most 0 times'),
    )
    builder.beginLoopUntil(3)
    expect(() => builder.end()).toThrow(
      new CompileError('loopUntil block closed without an exit condition'),
    )
    builder.beginIf(1, 'eq', 1)
    builder.exitWhen(1, 'eq', 1)
    expect(() => builder.exitWhen(1, 'eq', 1)).toThrow(
      new CompileError('loopUntil block already has an exit condition'),
    )
    builder.end()
    builder.end()
    expect(builder.depth).toBe(0)
  })
})

describe('Futures', () => {
  it('should throw until resolved and resolve once', () => {
    const future = new RegisterFuture({
      status: 'pending',
      slot: { kind: 'register', variable: 3, epoch: 0 },
    })

    expect(() => future.value).toThrow(
      new NotYetAvailableError(
        'Register future v3 is not available before its subroutine completes',
      ),
    )
    future.resolve(4)
    expect(future.value).toBe(4)
    expect(() => future.resolve(5)).toThrow('Future already resolved to 4')
  })

  it('should resolve handed-out entries with their array', () => {
    const array = new ArrayFuture(
      { status: 'pending', slot: { kind: 'array', array: 2, epoch: 0 } },
      3,
    )
    const entry = array.get(1)

    expect(array.get(1)).toBe(entry)
    expect(entry.state).toEqual({
      status: 'pending',
      slot: { kind: 'entry', array: 2, index: 1, epoch: 0 },
    })
    expect(() => array.get(3)).toThrow(
      new CompileError('Index 3 is outside an array of length 3'),
    )

    array.resolve([4, 5, undefined])
    expect(entry.value).toBe(5)
    expect(array.get(2).value).toBeUndefined()
  })
})
