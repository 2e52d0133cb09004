import { describe, expect, it } from "vitest"
import { z } from "zod"
import {
  CollaboratorFaultError,
  SeededRandom,
  createGeneratorAdapter,
  generatorConfigSchema,
} from "../src/index"
import type { SequenceGenerator } from "../src/index"
import type { CounterOp } from "./counter-domain"

const schema = generatorConfigSchema.extend({
  maxAmount: z.number().int().min(1).default(10),
})

type Config = z.output<typeof schema>

const counterGenerator: SequenceGenerator<CounterOp, null, Config> = {
  generate(seed, config) {
    const rng = new SeededRandom(seed)
    const operations: Array<CounterOp> = []
    for (let i = 0; i < config.maxOperations; i++) {
      operations.push({
        kind: `add`,
        sender: `tz1-${rng.int(1, 3)}`,
        amount: rng.int(-1, config.maxAmount),
      })
    }
    return {
      seed,
      environment: null,
      startLevel: config.startLevel,
      operations,
    }
  },
}

function faultOf(fn: () => unknown): CollaboratorFaultError | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof CollaboratorFaultError) return err
    throw err
  }
  return undefined
}

describe(`createGeneratorAdapter`, () => {
  const adapter = createGeneratorAdapter(counterGenerator, schema)

  it(`applies config defaults`, () => {
    expect(adapter.parseConfig()).toEqual({
      maxOperations: 20,
      startLevel: 0,
      maxAmount: 10,
    })
  })

  it(`is deterministic in its seed`, () => {
    const a = adapter.generate(42, { maxOperations: 8 })
    const b = adapter.generate(42, { maxOperations: 8 })
    expect(a).toEqual(b)
    expect(a.operations).toHaveLength(8)
  })

  it(`draws different sequences from different seeds`, () => {
    const a = adapter.generate(1, { maxOperations: 12 })
    const b = adapter.generate(2, { maxOperations: 12 })
    expect(a.operations).not.toEqual(b.operations)
  })

  it(`rejects invalid configs with the failing path`, () => {
    const fault = faultOf(() => adapter.generate(1, { maxOperations: -1 }))
    expect(fault?.code).toBe(`INVALID_CONFIG`)
    expect(fault?.message).toMatch(/^Invalid generator config: maxOperations: /)
  })

  it(`rejects seeds that are not safe integers`, () => {
    const fault = faultOf(() => adapter.generate(1.5))
    expect(fault?.code).toBe(`INVALID_CONFIG`)
    expect(fault?.message).toBe(`Seed must be a safe integer, got 1.5`)
  })

  it(`wraps generator errors`, () => {
    const broken = createGeneratorAdapter<CounterOp, null, Config>(
      {
        generate() {
          throw new Error(`out of ideas`)
        },
      },
      schema
    )
    const fault = faultOf(() => broken.generate(7))
    expect(fault?.code).toBe(`GENERATOR_FAILURE`)
    expect(fault?.message).toBe(`Generator failed for seed 7: out of ideas`)
  })

  it(`rejects sequences longer than maxOperations`, () => {
    const greedy = createGeneratorAdapter<CounterOp, null, Config>(
      {
        generate: (seed, config) => ({
          seed,
          environment: null,
          startLevel: 0,
          operations: Array.from({ length: config.maxOperations + 1 }, () => ({
            kind: `reject` as const,
            sender: `tz1-1`,
          })),
        }),
      },
      schema
    )
    const fault = faultOf(() => greedy.generate(1, { maxOperations: 2 }))
    expect(fault?.code).toBe(`GENERATOR_FAILURE`)
    expect(fault?.message).toBe(
      `Generator produced 3 operations, more than maxOperations (2)`
    )
  })
})

describe(`SeededRandom`, () => {
  it(`stays within bounds`, () => {
    const rng = new SeededRandom(-5)
    for (let i = 0; i < 200; i++) {
      const n = rng.int(2, 4)
      expect(n).toBeGreaterThanOrEqual(2)
      expect(n).toBeLessThanOrEqual(4)
      const b = rng.bigint(10n, 12n)
      expect(b >= 10n && b <= 12n).toBe(true)
    }
  })

  it(`refuses to pick from an empty array`, () => {
    expect(() => new SeededRandom(1).pick([])).toThrow(
      `Cannot pick from an empty array`
    )
  })
})
