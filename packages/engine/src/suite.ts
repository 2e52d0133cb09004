/**
 * Differential Suites
 *
 * A suite bundles everything needed to run a domain from a seed: the
 * generator, the reference model, the normalizer, and a `setup` that
 * provisions a fresh system under test and matching model state.
 *
 * Runs for different seeds may execute concurrently; each gets its own
 * system instance and model state from `setup`, so nothing is shared.
 */

import fastq from "fastq"
import { formatDivergenceReport } from "./report"
import { runDifferential } from "./orchestrator"
import type { GeneratorAdapter, GeneratorConfig } from "./generator"
import type { ReferenceModel } from "./model"
import type { ErrorNormalizer } from "./normalize"
import type { RunResult } from "./orchestrator"
import type { SystemExecutor } from "./system"
import type {
  ModelState,
  OperationEnvelope,
  Sequence,
  TrackedEntity,
} from "./types"

// =============================================================================
// Suite Definition
// =============================================================================

/**
 * Everything one run needs beyond the sequence itself.
 */
export interface RunSetup<Op extends OperationEnvelope, S> {
  initialState: ModelState<S>
  system: SystemExecutor<Op, S>
  tracked: ReadonlyArray<TrackedEntity>
}

export interface DifferentialSuite<
  Op extends OperationEnvelope,
  Env,
  S,
  E extends string,
  C extends GeneratorConfig,
> {
  name: string
  generator: GeneratorAdapter<Op, Env, C>
  model: ReferenceModel<Op, S, E>
  normalizer: ErrorNormalizer<E>
  /** Provision an independent system and model state for one run */
  setup: (sequence: Sequence<Op, Env>) => Promise<RunSetup<Op, S>>
}

// =============================================================================
// Single Seed
// =============================================================================

export interface SeedRunOptions {
  config?: unknown
  signal?: AbortSignal
  verbose?: boolean
}

export interface SeedRunResult<Op extends OperationEnvelope, Env, S> {
  seed: number
  /** The generated sequence, kept for reproduction */
  sequence: Sequence<Op, Env>
  result: RunResult<Op, S>
  durationMs: number
}

/**
 * Generate a sequence from a seed and run it.
 */
export async function runSeed<
  Op extends OperationEnvelope,
  Env,
  S,
  E extends string,
  C extends GeneratorConfig,
>(
  suite: DifferentialSuite<Op, Env, S, E, C>,
  seed: number,
  options: SeedRunOptions = {}
): Promise<SeedRunResult<Op, Env, S>> {
  const startTime = Date.now()

  const sequence = suite.generator.generate(seed, options.config)
  const { initialState, system, tracked } = await suite.setup(sequence)

  if (options.verbose) {
    console.log(
      `${suite.name} seed ${seed}: ${sequence.operations.length} operations`
    )
  }

  const result = await runDifferential({
    sequence,
    initialState,
    model: suite.model,
    system,
    normalizer: suite.normalizer,
    tracked,
    signal: options.signal,
    verbose: options.verbose,
  })

  return { seed, sequence, result, durationMs: Date.now() - startTime }
}

// =============================================================================
// Seed Batches
// =============================================================================

export interface BatchOptions extends SeedRunOptions {
  count: number
  /** Seeds are `baseSeed`, `baseSeed + 1`, ... */
  baseSeed?: number
  /**
   * Maximum runs in flight.
   * @default 4
   */
  concurrency?: number
}

export interface BatchResult<Op extends OperationEnvelope, Env, S> {
  total: number
  completed: number
  diverged: number
  faulted: number
  cancelled: number
  /** Seeds that diverged or faulted, ascending */
  failedSeeds: Array<number>
  results: Array<SeedRunResult<Op, Env, S>>
}

/**
 * Run many seeds. Results are returned in seed order.
 * @throws the first collaborator fault raised by any seed
 */
export async function runSeeds<
  Op extends OperationEnvelope,
  Env,
  S,
  E extends string,
  C extends GeneratorConfig,
>(
  suite: DifferentialSuite<Op, Env, S, E, C>,
  options: BatchOptions
): Promise<BatchResult<Op, Env, S>> {
  const { count, baseSeed = Date.now(), concurrency = 4, ...seedOptions } =
    options

  const queue = fastq.promise(
    (seed: number) => runSeed(suite, seed, seedOptions),
    Math.max(1, concurrency)
  )

  const seeds = Array.from({ length: count }, (_, i) => baseSeed + i)
  let results: Array<SeedRunResult<Op, Env, S>>
  try {
    results = await Promise.all(seeds.map((seed) => queue.push(seed)))
  } catch (error) {
    // A collaborator fault ends the batch: queued seeds never start
    queue.killAndDrain()
    throw error
  }

  let completed = 0
  let diverged = 0
  let faulted = 0
  let cancelled = 0
  const failedSeeds: Array<number> = []

  for (const { seed, result } of results) {
    switch (result.status) {
      case `completed`:
        completed++
        break
      case `cancelled`:
        cancelled++
        break
      case `aborted`:
        if (result.reason.type === `divergence`) diverged++
        else faulted++
        failedSeeds.push(seed)
        break
    }
  }

  return {
    total: count,
    completed,
    diverged,
    faulted,
    cancelled,
    failedSeeds,
    results,
  }
}

/**
 * Summarize a batch, including the report of the first failing seed.
 */
export function summarizeBatch<Op extends OperationEnvelope, Env, S>(
  name: string,
  batch: BatchResult<Op, Env, S>
): string {
  const lines = [
    `Differential Test Results: ${name}`,
    `  Total: ${batch.total}`,
    `  Completed: ${batch.completed}`,
    `  Diverged: ${batch.diverged}`,
    `  Faulted: ${batch.faulted}`,
  ]
  if (batch.cancelled > 0) {
    lines.push(`  Cancelled: ${batch.cancelled}`)
  }
  if (batch.failedSeeds.length > 0) {
    const shown = batch.failedSeeds.slice(0, 10).join(`, `)
    const more = batch.failedSeeds.length > 10 ? `...` : ``
    lines.push(`  Failed seeds: ${shown}${more}`)
  }

  const firstFailure = batch.results.find(
    (r) => r.result.status === `aborted`
  )
  if (firstFailure && firstFailure.result.status === `aborted`) {
    const reason = firstFailure.result.reason
    lines.push(``, `Seed ${firstFailure.seed}:`)
    lines.push(
      reason.type === `divergence`
        ? formatDivergenceReport(reason.report)
        : `Normalization fault at step ${reason.step}: ${reason.error.message}`
    )
  }

  return lines.join(`\n`)
}
