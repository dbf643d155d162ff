import { formatInstruction } from '@netq/codec'
import { LayoutError, UnsupportedOperationError, logger } from '@netq/core'
import { NV_FLAVOUR, VANILLA_FLAVOUR, isRotation, rotationAngle } from '@netq/isa'
import type { ConditionOperator, Flavour, Subroutine } from '@netq/types'
import { NetqasmVM, RecordingProcessor } from '@netq/vm'
import { beforeAll, describe, expect, it } from 'vitest'
import {
  type BuiltProgram,
  type CompiledSubroutine,
  ProgramBuilder,
  type RegisterFuture,
  compile,
  resolveFutures,
} from '../../index'

beforeAll(() => {
  logger.init()
})

function build(define: (builder: ProgramBuilder) => void): BuiltProgram {
  return buildWith(define).built
}

/** Build a program and keep whatever the definition returns */
function buildWith<T>(define: (builder: ProgramBuilder) => T): { built: BuiltProgram; value: T } {
  const builder = new ProgramBuilder()
  const value = define(builder)
  const [error, built] = builder.flush()
  if (error) throw error
  return { built, value }
}

function compiled(built: BuiltProgram, flavour: Flavour = VANILLA_FLAVOUR): CompiledSubroutine {
  const [error, result] = compile(built.program, flavour)
  if (error) throw error
  return result
}

function text(subroutine: Subroutine): string[] {
  return subroutine.instructions.map((instruction) => formatInstruction(instruction))
}

async function run(
  built: BuiltProgram,
  compiledSubroutine: CompiledSubroutine,
  processor: RecordingProcessor,
  flavour: Flavour = VANILLA_FLAVOUR,
): Promise<void> {
  const vm = new NetqasmVM(processor, flavour)
  const [error, result] = await vm.execute(compiledSubroutine.subroutine)
  if (error) throw error
  const resolveError = resolveFutures(built.futures, compiledSubroutine, result)
  if (resolveError) throw resolveError
}

describe('compile', () => {
  it('should compile alloc, H, measure, free into five instructions', async () => {
    const { built, value: outcome } = buildWith((builder) => {
      const qubit = builder.allocQubit()
      builder.gate('h', [qubit])
      const measured = builder.measure(qubit)
      builder.freeQubit(qubit)
      return measured
    })
    const result = compiled(built)

    expect(text(result.subroutine)).toEqual([
      'qalloc Q0',
      'h Q0',
      'meas Q0 R0',
      'qfree Q0',
      'ret',
    ])

    await run(built, result, new RecordingProcessor({ outcomes: [1] }))
    expect(outcome.value).toBe(1)
    expect(built.futures.every((future) => future.isResolved)).toBe(true)
  })

  it('should flatten if/else into a negated branch and a jump', () => {
    const built = build((builder) => {
      const qubit = builder.allocQubit()
      const value = builder.register(5)
      builder.ifThen(
        value,
        'eq',
        5,
        () => builder.gate('x', [qubit]),
        () => builder.gate('z', [qubit]),
      )
      builder.freeQubit(qubit)
    })
    const result = compiled(built)

    expect(text(result.subroutine)).toEqual([
      'qalloc Q0',
      'set R0 5',
      'set R1 5',
      'bne R0 R1 6',
      'x Q0',
      'jmp 8',
      'set Q0 0',
      'z Q0',
      'set Q0 0',
      'qfree Q0',
      'ret',
    ])
    expect(result.subroutine.labels).toEqual(
      new Map([
        ['IF_ELSE_0', 6],
        ['IF_END_0', 8],
      ]),
    )
  })

  const presets: Array<[number, string[]]> = [
    [5, ['x']],
    [4, ['z']],
    [0, ['z']],
    [-5, ['z']],
  ]

  it.each(presets)('should take exactly one branch when the register holds %i', async (preset, gates) => {
    const built = build((builder) => {
      const qubit = builder.allocQubit()
      const value = builder.register(preset)
      builder.ifThen(
        value,
        'eq',
        5,
        () => builder.gate('x', [qubit]),
        () => builder.gate('z', [qubit]),
      )
      builder.freeQubit(qubit)
    })
    const processor = new RecordingProcessor()
    await run(built, compiled(built), processor)

    expect(processor.gates.map((gate) => gate.gate)).toEqual(gates)
  })

  it('should use bez/bnz for comparisons with zero and skip an empty else', () => {
    const built = build((builder) => {
      const value = builder.register(1)
      builder.ifThen(value, 'ne', 0, () => builder.add(value, value, value))
    })

    expect(text(compiled(built).subroutine)).toEqual([
      'set R0 1',
      'bez R0 3',
      'add R0 R0 R0',
      'ret',
    ])
  })

  const comparisons: Array<[ConditionOperator, number, number, boolean]> = [
    ['lt', 2, 3, true],
    ['lt', 3, 3, false],
    ['ge', 3, 3, true],
    ['ge', 2, 3, false],
    ['gt', 4, 3, true],
    ['gt', 3, 3, false],
    ['le', 3, 3, true],
    ['le', 4, 3, false],
    ['ne', 4, 3, true],
    ['eq', 4, 3, false],
  ]

  it.each(comparisons)('should evaluate %s on %i and %i to %s', async (operator, left, right, taken) => {
    const { built, value: flag } = buildWith((builder) => {
      const result = builder.register(0)
      const value = builder.register(left)
      builder.ifThen(value, operator, right, () => builder.set(result, 1))
      return result
    })
    await run(built, compiled(built), new RecordingProcessor())

    expect(flag.value).toBe(taken ? 1 : 0)
  })

  it('should run a three-iteration loop body exactly three times', async () => {
    const { built, value } = buildWith((builder) => {
      const qubit = builder.allocQubit()
      const total = builder.register(0)
      const counter = builder.beginLoop({ stop: 3 })
      builder.add(total, total, 1)
      builder.gate('x', [qubit])
      builder.end()
      builder.freeQubit(qubit)
      return { total, counter }
    })
    const { total, counter } = value
    const result = compiled(built)

    expect(text(result.subroutine)).toEqual([
      'qalloc Q0',
      'set R0 0',
      'set R1 0',
      'set R2 3',
      'beq R1 R2 12',
      'set R2 1',
      'add R0 R0 R2',
      'set Q0 0',
      'x Q0',
      'set R2 1',
      'add R1 R1 R2',
      'jmp 3',
      'set Q0 0',
      'qfree Q0',
      'ret',
    ])

    const processor = new RecordingProcessor()
    await run(built, result, processor)
    expect(total.value).toBe(3)
    expect(counter.value).toBe(3)
    expect(processor.gates.filter((gate) => gate.gate === 'x')).toHaveLength(3)
  })

  it('should count down with a negative step', async () => {
    const { built, value: total } = buildWith((builder) => {
      const sum = builder.register(0)
      builder.loop({ start: 10, stop: 4, step: -2 }, (index) => {
        builder.add(sum, sum, index)
      })
      return sum
    })
    await run(built, compiled(built), new RecordingProcessor())

    // 10 + 8 + 6
    expect(total.value).toBe(24)
  })

  it('should store values and read entries back through array futures', async () => {
    const { built, value } = buildWith((builder) => {
      const values = builder.array(3, [7, -2])
      const sum = builder.register(0)
      builder.add(sum, values.get(0), values.get(1))
      builder.returnArray(values)
      return { values, sum }
    })
    const { values, sum } = value
    await run(built, compiled(built), new RecordingProcessor())

    expect(sum.value).toBe(5)
    expect(values.value).toEqual([7, -2, undefined])
    expect(values.get(2).value).toBeUndefined()
  })

  it('should reuse a Q register that already holds the qubit id', () => {
    const built = build((builder) => {
      const first = builder.allocQubit()
      const second = builder.allocQubit()
      builder.gate('cnot', [first, second])
      builder.gate('cnot', [second, first])
    })

    expect(text(compiled(built).subroutine)).toEqual([
      'qalloc Q0',
      'set Q1 1',
      'qalloc Q1',
      'cnot Q0 Q1',
      'cnot Q1 Q0',
      'ret',
    ])
  })

  it('should simplify radian angles for the vanilla flavour', () => {
    const built = build((builder) => {
      const qubit = builder.allocQubit()
      builder.gate('rot_x', [qubit], Math.PI / 2)
      builder.gate('rot_z', [qubit], 0.3)
      builder.gate('rot_y', [qubit], { n: 4, d: 3 })
    })

    expect(text(compiled(built).subroutine)).toEqual([
      'qalloc Q0',
      'rot_x Q0 1 1',
      'rot_z Q0 3 5',
      'rot_y Q0 1 1',
      'ret',
    ])
  })

  it('should emit every nv rotation with denominator exponent 4', async () => {
    const built = build((builder) => {
      const control = builder.allocQubit()
      const target = builder.allocQubit()
      builder.gate('h', [control])
      builder.gate('t', [control])
      builder.gate('cnot', [control, target])
      builder.gate('cphase', [target, control])
      builder.gate('rot_z', [target], 0.3)
      builder.gate('rot_x', [control], { n: 1, d: 1 })
      builder.gate('crot_y', [control, target], { n: 3, d: 2 })
      builder.measure(control)
    })
    const result = compiled(built, NV_FLAVOUR)
    const lines = text(result.subroutine)

    expect(lines.slice(3, 5)).toEqual(['rot_y Q0 8 4', 'rot_x Q0 16 4'])
    expect(lines).toContain('rot_z Q1 2 4')
    expect(lines).toContain('rot_x Q0 8 4')
    expect(lines).toContain('crot_y Q0 Q1 12 4')

    const rotations = result.subroutine.instructions.filter(isRotation)
    expect(rotations.length).toBeGreaterThan(10)
    for (const rotation of rotations) {
      expect(rotationAngle(rotation)?.d).toBe(4)
    }

    const processor = new RecordingProcessor()
    await run(built, result, processor, NV_FLAVOUR)
    expect(processor.gates.every((gate) => gate.angle?.d === 4)).toBe(true)
  })

  it('should reject a gate the flavour can neither run nor decompose', () => {
    const built = build((builder) => {
      const control = builder.allocQubit()
      const target = builder.allocQubit()
      builder.gate('crot_x', [control, target], { n: 1, d: 2 })
    })

    const [error] = compile(built.program, VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(UnsupportedOperationError)
    expect(error?.message).toBe('crot_x is not available on the vanilla flavour')
  })

  it('should fail with a layout error when more than 16 values are live', () => {
    const built = build((builder) => {
      for (let i = 0; i < 17; i++) builder.register(i)
    })

    const [error] = compile(built.program, VANILLA_FLAVOUR)
    expect(error).toBeInstanceOf(LayoutError)
    expect(error?.message).toBe('More than 16 values live at instruction 16')
  })

  it('should record host lines in the debug map', () => {
    const built = build((builder) => {
      const qubit = builder.atLine(3).allocQubit()
      builder.atLine(4).gate('x', [qubit])
      builder.atLine(undefined).freeQubit(qubit)
    })

    const { debugLines } = compiled(built).subroutine
    expect(debugLines).toEqual(
      new Map([
        [0, 3],
        [1, 4],
      ]),
    )
  })
})

describe('compile blocks', () => {
  it('should keep a value written in one iteration for the next', async () => {
    const { built, value } = buildWith((builder) => {
      const out = builder.register(0)
      const written: RegisterFuture[] = []
      builder.loop({ stop: 2 }, (counter) => {
        builder.beginIf(counter, 'lt', 1)
        written.push(builder.register(7))
        builder.end()
        const kept = written[0]
        if (!kept) throw new Error('expected the register written in the if block')
        builder.set(out, kept)
      })
      return { out, written }
    })
    await run(built, compiled(built), new RecordingProcessor())

    expect(value.out.value).toBe(7)
    expect(value.written[0]?.value).toBe(7)
  })

  it('should read zero from a register only written in a branch not taken', async () => {
    const { built, value: skipped } = buildWith((builder) => {
      const flag = builder.register(0)
      const written: RegisterFuture[] = []
      builder.ifThen(flag, 'eq', 1, () => {
        written.push(builder.register(9))
      })
      const [register] = written
      if (!register) throw new Error('expected the register written in the if block')
      builder.add(flag, flag, 1)
      return register
    })
    await run(built, compiled(built), new RecordingProcessor())

    expect(skipped.value).toBe(0)
  })

  it('should visit every array entry in a foreach block', async () => {
    const { built, value } = buildWith((builder) => {
      const values = builder.array(3, [4, -1, 6])
      const sum = builder.register(0)
      const { element, index } = builder.beginForeach(values)
      builder.add(sum, sum, element)
      builder.end()
      return { sum, element, index }
    })
    await run(built, compiled(built), new RecordingProcessor())

    expect(value.sum.value).toBe(9)
    expect(value.element.value).toBe(6)
    expect(value.index.value).toBe(3)
  })

  const untilCases: Array<[string, Array<0 | 1>, number]> = [
    ['stop once the exit condition holds', [0, 0, 1], 3],
    ['stop after the iteration limit', [], 4],
  ]

  it.each(untilCases)('should %s in a loopUntil block', async (_name, outcomes, iterations) => {
    const { built, value } = buildWith((builder) => {
      const count = builder.beginLoopUntil(4)
      const qubit = builder.allocQubit()
      builder.gate('h', [qubit])
      const outcome = builder.measure(qubit)
      builder.freeQubit(qubit)
      builder.exitWhen(outcome, 'ne', 0)
      builder.end()
      return count
    })
    const processor = new RecordingProcessor({ outcomes })
    await run(built, compiled(built), processor)

    expect(value.value).toBe(iterations)
    expect(processor.gates).toHaveLength(iterations)
    expect(processor.liveQubits).toBe(0)
  })

  it('should lower a loopUntil exit into a taken branch and a bounded jump back', () => {
    const built = build((builder) => {
      const value = builder.register(0)
      builder.loopUntil(5, () => {
        builder.add(value, value, 2)
        builder.exitWhen(value, 'ge', 3)
      })
    })

    expect(text(compiled(built).subroutine)).toEqual([
      'set R0 0',
      'set R1 0',
      'set R2 2',
      'add R0 R0 R2',
      'set R2 1',
      'add R1 R1 R2',
      'set R2 3',
      'bge R0 R2 10',
      'set R2 5',
      'blt R1 R2 2',
      'ret',
    ])
  })

  it('should run the post routine of a sequential request once per pair', async () => {
    const { built, value: total } = buildWith((builder) => {
      const sum = builder.register(0)
      builder.createEpr({
        remoteNodeId: 1,
        number: 2,
        sequential: true,
        postRoutine: ({ qubit }) => {
          if (!qubit) throw new Error('expected a kept qubit')
          const outcome = builder.measure(qubit)
          builder.add(sum, sum, outcome)
          builder.freeQubit(qubit)
        },
      })
      return sum
    })
    const processor = new RecordingProcessor({ outcomes: [1, 1] })
    await run(built, compiled(built), processor)

    expect(total.value).toBe(2)
    const measured = processor.calls.flatMap((call) => (call.type === 'measure' ? [call.qubit] : []))
    expect(measured).toEqual([0, 1])
    expect(processor.liveQubits).toBe(0)
  })
})
