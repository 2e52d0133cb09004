/**
 * Reference Model Executor
 *
 * Applies one operation to the reference model's state. Pure and
 * synchronous: the model returns a new state and never performs I/O.
 */

import { CollaboratorFaultError } from "./errors"
import type {
  Balance,
  EntitySnapshot,
  EntityState,
  Handle,
  Level,
  ModelState,
  ObservableSet,
  OperationEnvelope,
  Outcome,
  TrackedEntity,
} from "./types"

/**
 * Result of the domain semantics for one operation.
 * When `error` is set the operation failed; `state` is then expected to be
 * the state it was given.
 */
export interface ModelTransition<S, E extends string> {
  readonly state: ModelState<S>
  readonly error?: E
}

/**
 * Domain semantics of the reference model.
 * Must be total: a violated precondition is an error code, never a throw.
 */
export interface ReferenceModel<Op extends OperationEnvelope, S, E extends string> {
  apply: (state: ModelState<S>, op: Op) => ModelTransition<S, E>
}

export interface ModelStep<S, E extends string> {
  readonly state: ModelState<S>
  readonly outcome: Outcome<S, E>
}

/**
 * Apply one operation. The clock advance happens before the semantics run.
 */
export function applyModel<Op extends OperationEnvelope, S, E extends string>(
  model: ReferenceModel<Op, S, E>,
  state: ModelState<S>,
  op: Op
): ModelStep<S, E> {
  const advanced =
    op.advance !== undefined && op.advance > 0
      ? { ...state, level: state.level + op.advance }
      : state

  const transition = model.apply(advanced, op)
  const outcome: Outcome<S, E> =
    transition.error === undefined
      ? { ok: true, storage: transition.state.storage }
      : { ok: false, error: transition.error }

  return { state: transition.state, outcome }
}

/**
 * Collect the model's observable set after a step.
 * @throws CollaboratorFaultError when a tracked entity is missing
 */
export function observeModel<S, E extends string>(
  state: ModelState<S>,
  outcome: Outcome<S, E>,
  tracked: ReadonlyArray<TrackedEntity>
): ObservableSet<S, E> {
  const entities = new Map<Handle, EntitySnapshot>()
  for (const entity of tracked) {
    const sub = state.entities.get(entity.handle)
    if (!sub) {
      throw CollaboratorFaultError.missingEntity(entity.handle, `model`)
    }
    entities.set(entity.handle, { storage: sub.storage, balance: sub.balance })
  }
  return { outcome, balance: state.balance, entities }
}

export interface ModelStateInit<S> {
  self: Handle
  storage: S
  balance?: Balance
  level?: Level
  entities?: Iterable<readonly [Handle, EntityState]>
}

/**
 * Build an initial model state. Balances default to zero.
 */
export function createModelState<S>(init: ModelStateInit<S>): ModelState<S> {
  return {
    self: init.self,
    storage: init.storage,
    balance: init.balance ?? 0n,
    level: init.level ?? 0,
    entities: new Map(init.entities ?? []),
  }
}

/**
 * Replace one entity's state, returning a new map.
 */
export function updateEntity(
  entities: ReadonlyMap<Handle, EntityState>,
  handle: Handle,
  update: (current: EntityState) => EntityState
): ReadonlyMap<Handle, EntityState> {
  const current = entities.get(handle)
  if (!current) {
    throw CollaboratorFaultError.missingEntity(handle, `model`)
  }
  const next = new Map(entities)
  next.set(handle, update(current))
  return next
}
