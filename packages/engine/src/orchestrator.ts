/**
 * Call-Loop Orchestrator
 *
 * Drives a sequence through both executors, one operation at a time:
 *
 *   Pending ──▶ Stepping ──▶ Pending      (both sides agree)
 *                   │
 *                   └──────▶ Aborted      (divergence or normalization fault)
 *
 * Completed is reached when the sequence is exhausted. No operation after
 * the first divergence reaches either side, so the model state at the
 * divergence is preserved for diagnostics. A caller may cancel between
 * steps through an AbortSignal.
 */

import { compareObservables } from "./compare"
import { NormalizationFaultError } from "./errors"
import { applyModel, observeModel } from "./model"
import { createDivergenceReport, formatDivergenceReport } from "./report"
import type { ReferenceModel } from "./model"
import type { ErrorNormalizer } from "./normalize"
import type { DivergenceReport } from "./report"
import type { SystemExecutor, SystemStep } from "./system"
import type {
  ModelState,
  ObservableSet,
  OperationEnvelope,
  Outcome,
  Sequence,
  TrackedEntity,
} from "./types"

// =============================================================================
// Run Types
// =============================================================================

export interface RunOptions<Op extends OperationEnvelope, Env, S, E extends string> {
  sequence: Sequence<Op, Env>
  initialState: ModelState<S>
  model: ReferenceModel<Op, S, E>
  system: SystemExecutor<Op, S>
  normalizer: ErrorNormalizer<E>
  /** Auxiliary entities compared after every step, in report order */
  tracked: ReadonlyArray<TrackedEntity>
  /** Checked before each step */
  signal?: AbortSignal
  /** Print one line per step */
  verbose?: boolean
  /** Called after each step both sides agree on */
  onStep?: (event: StepEvent<Op, S, E>) => void
}

export interface StepEvent<Op extends OperationEnvelope, S, E extends string> {
  /** 1-based */
  step: number
  operation: Op
  outcome: Outcome<S, E>
}

/**
 * Why a run stopped early.
 */
export type AbortReason<Op extends OperationEnvelope> =
  | { readonly type: `divergence`; readonly report: DivergenceReport<Op> }
  | {
      readonly type: `fault`
      readonly error: NormalizationFaultError
      readonly step: number
      readonly operation: Op
    }

export type RunResult<Op extends OperationEnvelope, S> =
  | {
      readonly status: `completed`
      readonly stepsApplied: number
      readonly state: ModelState<S>
    }
  | {
      readonly status: `aborted`
      readonly stepsApplied: number
      /** Model state right after the step that aborted */
      readonly state: ModelState<S>
      readonly reason: AbortReason<Op>
    }
  | { readonly status: `cancelled`; readonly stepsApplied: number }

// =============================================================================
// Call Loop
// =============================================================================

/**
 * Run a sequence against the reference model and the system under test.
 *
 * Collaborator faults (missing entities, unresolvable handles, unsupported
 * operations under the `fail` policy) reject the returned promise. A
 * transport failure outside the submission aborts the run as a fault.
 */
export async function runDifferential<
  Op extends OperationEnvelope,
  Env,
  S,
  E extends string,
>(options: RunOptions<Op, Env, S, E>): Promise<RunResult<Op, S>> {
  const { sequence, model, system, normalizer, tracked, signal, verbose } =
    options

  let state = options.initialState
  let step = 0

  for (const operation of sequence.operations) {
    if (signal?.aborted) {
      if (verbose) console.log(`  cancelled before step ${step + 1}`)
      return { status: `cancelled`, stepsApplied: step }
    }
    step++

    const modelStep = applyModel(model, state, operation)
    state = modelStep.state
    const modelObservables = observeModel(state, modelStep.outcome, tracked)

    let systemObservables: ObservableSet<S, E>
    try {
      const systemStep = await system.apply(operation, tracked)
      systemObservables = toObservables(systemStep, normalizer)
    } catch (error) {
      if (!(error instanceof NormalizationFaultError)) throw error
      if (verbose) {
        console.log(`  ✗ step ${step} ${operation.kind}: ${error.message}`)
      }
      return {
        status: `aborted`,
        stepsApplied: step,
        state,
        reason: { type: `fault`, error, step, operation },
      }
    }

    const mismatch = compareObservables(
      modelObservables,
      systemObservables,
      tracked
    )
    if (mismatch) {
      const report = createDivergenceReport(mismatch, step, operation)
      if (verbose) console.log(formatDivergenceReport(report))
      return {
        status: `aborted`,
        stepsApplied: step,
        state,
        reason: { type: `divergence`, report },
      }
    }

    if (verbose) {
      const result = modelStep.outcome.ok ? `ok` : modelStep.outcome.error
      console.log(`  ✓ step ${step} ${operation.kind} (${result})`)
    }
    options.onStep?.({ step, operation, outcome: modelStep.outcome })
  }

  return { status: `completed`, stepsApplied: step, state }
}

function toObservables<S, E extends string>(
  step: SystemStep<S>,
  normalizer: ErrorNormalizer<E>
): ObservableSet<S, E> {
  const outcome: Outcome<S, E> = step.failure
    ? { ok: false, error: normalizer.normalize(step.failure) }
    : { ok: true, storage: step.storage }
  return { outcome, balance: step.balance, entities: step.entities }
}
