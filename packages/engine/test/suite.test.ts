import { describe, expect, it } from "vitest"
import {
  CollaboratorFaultError,
  SeededRandom,
  createGeneratorAdapter,
  createSystemExecutor,
  generatorConfigSchema,
  runSeed,
  runSeeds,
  summarizeBatch,
} from "../src/index"
import {
  AUDIT,
  CounterSystem,
  counterModel,
  counterNormalizer,
  counterState,
  tracked,
} from "./counter-domain"
import type {
  DifferentialSuite,
  GeneratorConfig,
  SequenceGenerator,
} from "../src/index"
import type {
  CounterError,
  CounterOp,
  CounterSystemOptions,
} from "./counter-domain"

/** Always starts with a successful add, then draws at random */
const counterGenerator: SequenceGenerator<CounterOp, null, GeneratorConfig> = {
  generate(seed, config) {
    const rng = new SeededRandom(seed)
    const operations: Array<CounterOp> = [
      { kind: `add`, sender: `tz1-alice`, amount: 1 },
    ]
    while (operations.length < config.maxOperations) {
      operations.push(
        rng.chance(0.2)
          ? { kind: `reject`, sender: `tz1-bob` }
          : { kind: `add`, sender: `tz1-alice`, amount: rng.int(-1, 5) }
      )
    }
    return { seed, environment: null, startLevel: 0, operations }
  },
}

function counterSuite(
  options: CounterSystemOptions = {}
): DifferentialSuite<CounterOp, null, number, CounterError, GeneratorConfig> {
  return {
    name: `counter`,
    generator: createGeneratorAdapter(counterGenerator, generatorConfigSchema),
    model: counterModel,
    normalizer: counterNormalizer,
    setup: () =>
      Promise.resolve({
        initialState: counterState(),
        system: createSystemExecutor({ client: new CounterSystem(options) }),
        tracked,
      }),
  }
}

describe(`runSeed`, () => {
  it(`keeps the generated sequence for reproduction`, async () => {
    const run = await runSeed(counterSuite(), 9, {
      config: { maxOperations: 4 },
    })
    expect(run.seed).toBe(9)
    expect(run.sequence.operations).toHaveLength(4)
    expect(run.result).toMatchObject({ status: `completed`, stepsApplied: 4 })
  })
})

describe(`runSeeds`, () => {
  it(`runs every seed and returns results in seed order`, async () => {
    const batch = await runSeeds(counterSuite(), {
      count: 6,
      baseSeed: 100,
      concurrency: 2,
      config: { maxOperations: 10 },
    })
    expect(batch.total).toBe(6)
    expect(batch.completed).toBe(6)
    expect(batch.failedSeeds).toEqual([])
    expect(batch.results.map((r) => r.seed)).toEqual([
      100, 101, 102, 103, 104, 105,
    ])
  })

  it(`collects diverging seeds`, async () => {
    const batch = await runSeeds(
      counterSuite({ bug: (_op, count) => count + 1 }),
      { count: 2, baseSeed: 10, config: { maxOperations: 3 } }
    )
    expect(batch.diverged).toBe(2)
    expect(batch.failedSeeds).toEqual([10, 11])
    for (const { result } of batch.results) {
      expect(result.stepsApplied).toBe(1)
    }
  })

  it(`stops starting seeds once one raises a collaborator fault`, async () => {
    const started: Array<number> = []
    let release = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const base = counterSuite()
    const suite: typeof base = {
      ...base,
      setup: async (sequence) => {
        started.push(sequence.seed)
        if (sequence.seed === 0) {
          throw CollaboratorFaultError.missingEntity(AUDIT, `setup`)
        }
        await gate
        return base.setup(sequence)
      },
    }

    await expect(
      runSeeds(suite, {
        count: 8,
        baseSeed: 0,
        concurrency: 2,
        config: { maxOperations: 3 },
      })
    ).rejects.toMatchObject({ code: `MISSING_ENTITY` })

    release()
    await new Promise((resolve) => setTimeout(resolve, 20))
    expect(started.slice(0, 2)).toEqual([0, 1])
    expect(started.length).toBeLessThanOrEqual(3)
  })

  it(`counts cancelled runs`, async () => {
    const controller = new AbortController()
    controller.abort()
    const batch = await runSeeds(counterSuite(), {
      count: 2,
      baseSeed: 1,
      signal: controller.signal,
    })
    expect(batch.cancelled).toBe(2)
    expect(summarizeBatch(`counter`, batch).split(`\n`)).toContain(
      `  Cancelled: 2`
    )
  })
})

describe(`summarizeBatch`, () => {
  it(`summarizes a clean batch`, async () => {
    const batch = await runSeeds(counterSuite(), {
      count: 3,
      baseSeed: 1,
      config: { maxOperations: 2 },
    })
    expect(summarizeBatch(`counter`, batch)).toBe(
      [
        `Differential Test Results: counter`,
        `  Total: 3`,
        `  Completed: 3`,
        `  Diverged: 0`,
        `  Faulted: 0`,
      ].join(`\n`)
    )
  })

  it(`includes the first failing seed's report`, async () => {
    const batch = await runSeeds(
      counterSuite({ bug: (_op, count) => count + 1 }),
      { count: 2, baseSeed: 10, config: { maxOperations: 3 } }
    )
    const lines = summarizeBatch(`counter`, batch).split(`\n`)
    expect(lines).toContain(`  Failed seeds: 10, 11`)
    expect(lines).toContain(`Seed 10:`)
    expect(lines).toContain(
      `━━ Divergence at step 1: primary outcome differs ━━`
    )
  })
})
