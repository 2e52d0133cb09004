/**
 * Comparator
 *
 * Structural equality checks between the observable sets reported by the
 * reference model and the system under test. Each check is exported on
 * its own so tests can target one failure mode at a time;
 * `compareObservables` runs them in a fixed order and stops at the first
 * mismatch, keeping every report single-cause.
 */

import { CollaboratorFaultError } from "./errors"
import { render } from "./render"
import type {
  EntitySnapshot,
  ObservableSet,
  Outcome,
  TrackedEntity,
} from "./types"

// =============================================================================
// Mismatch Types
// =============================================================================

/**
 * Which check failed.
 */
export type CheckId =
  | { readonly type: `outcome` }
  | { readonly type: `balance` }
  | { readonly type: `entity-storage`; readonly entity: string }
  | { readonly type: `entity-balance`; readonly entity: string }

/**
 * A failed check with both sides rendered.
 */
export interface Mismatch {
  readonly check: CheckId
  /** Human-readable name of the compared field */
  readonly field: string
  readonly model: string
  readonly system: string
}

type AnyObservables = ObservableSet<unknown, string>

// =============================================================================
// Individual Checks
// =============================================================================

/**
 * Primary outcome: success storage, or the error code.
 */
export function checkOutcome(
  model: AnyObservables,
  system: AnyObservables
): Mismatch | undefined {
  return mismatch(
    { type: `outcome` },
    `primary outcome`,
    renderOutcome(model.outcome),
    renderOutcome(system.outcome)
  )
}

/**
 * Primary entity balance.
 */
export function checkBalance(
  model: AnyObservables,
  system: AnyObservables
): Mismatch | undefined {
  return mismatch(
    { type: `balance` },
    `primary balance`,
    render(model.balance),
    render(system.balance)
  )
}

/**
 * Storage of one tracked auxiliary entity.
 */
export function checkEntityStorage(
  entity: TrackedEntity,
  model: AnyObservables,
  system: AnyObservables
): Mismatch | undefined {
  return mismatch(
    { type: `entity-storage`, entity: entity.name },
    `${entity.label ?? entity.name} storage`,
    render(snapshotOf(model, entity, `model`).storage),
    render(snapshotOf(system, entity, `system`).storage)
  )
}

/**
 * Balance of one tracked auxiliary entity.
 */
export function checkEntityBalance(
  entity: TrackedEntity,
  model: AnyObservables,
  system: AnyObservables
): Mismatch | undefined {
  return mismatch(
    { type: `entity-balance`, entity: entity.name },
    `${entity.label ?? entity.name} balance`,
    render(snapshotOf(model, entity, `model`).balance),
    render(snapshotOf(system, entity, `system`).balance)
  )
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Run every check in order: primary outcome, primary balance, each tracked
 * entity's storage, each tracked entity's balance.
 * Returns the first mismatch, or `undefined` when both sides agree.
 */
export function compareObservables(
  model: AnyObservables,
  system: AnyObservables,
  tracked: ReadonlyArray<TrackedEntity>
): Mismatch | undefined {
  const checks: Array<() => Mismatch | undefined> = [
    () => checkOutcome(model, system),
    () => checkBalance(model, system),
    ...tracked.map(
      (entity) => () => checkEntityStorage(entity, model, system)
    ),
    ...tracked.map(
      (entity) => () => checkEntityBalance(entity, model, system)
    ),
  ]

  for (const check of checks) {
    const result = check()
    if (result) return result
  }
  return undefined
}

// =============================================================================
// Helpers
// =============================================================================

function mismatch(
  check: CheckId,
  field: string,
  model: string,
  system: string
): Mismatch | undefined {
  return model === system ? undefined : { check, field, model, system }
}

function renderOutcome(outcome: Outcome<unknown, string>): string {
  return outcome.ok ? render(outcome.storage) : `Error: ${outcome.error}`
}

function snapshotOf(
  observables: AnyObservables,
  entity: TrackedEntity,
  side: string
): EntitySnapshot {
  const snapshot = observables.entities.get(entity.handle)
  if (!snapshot) {
    throw CollaboratorFaultError.missingEntity(
      entity.handle,
      `${side} observables`
    )
  }
  return snapshot
}
