/**
 * Core Types for Differential Model-Based Testing
 *
 * This module defines the vocabulary shared by every part of the engine:
 * - Handles, levels and balances
 * - Operations and generated sequences
 * - Outcomes and observable sets
 * - Reference model state
 * - Raw failures reported by a system under test
 */

// =============================================================================
// Primitive Types
// =============================================================================

/**
 * Stable handle (address) of an entity: the DAO itself, an auxiliary
 * contract, or an account.
 */
export type Handle = string

/**
 * Logical clock value (block level / height). Never decreases.
 */
export type Level = number

/**
 * Balances are tracked in the smallest unit, so arithmetic stays exact.
 */
export type Balance = bigint

// =============================================================================
// Operations
// =============================================================================

/**
 * Fields every operation carries, whatever its domain.
 *
 * Domains define a closed union of operations discriminated on `kind`;
 * the engine only reads the envelope.
 */
export interface OperationEnvelope {
  readonly kind: string
  /** Identity submitting the operation */
  readonly sender: Handle
  /** Advance the shared clock by this many levels before execution */
  readonly advance?: number
}

/**
 * An ordered, finite list of operations plus the environment the
 * generator used to build their payloads.
 */
export interface Sequence<Op extends OperationEnvelope, Env> {
  /** Seed the sequence was drawn from */
  readonly seed: number
  /** Handles of auxiliary entities referenced by payloads */
  readonly environment: Env
  /** Clock value both systems start from */
  readonly startLevel: Level
  readonly operations: ReadonlyArray<Op>
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Result of applying one operation: the primary storage after success, or
 * a normalized error code.
 */
export type Outcome<S, E extends string> =
  | { readonly ok: true; readonly storage: S }
  | { readonly ok: false; readonly error: E }

/**
 * Storage and balance of one auxiliary entity.
 */
export interface EntitySnapshot {
  readonly storage: unknown
  readonly balance: Balance
}

/**
 * The fixed tuple of values compared after every step.
 */
export interface ObservableSet<S, E extends string> {
  readonly outcome: Outcome<S, E>
  readonly balance: Balance
  /** One snapshot per tracked entity, keyed by handle */
  readonly entities: ReadonlyMap<Handle, EntitySnapshot>
}

/**
 * An auxiliary entity whose storage and balance are compared.
 */
export interface TrackedEntity {
  /** Short name, used to identify the check */
  readonly name: string
  readonly handle: Handle
  /** Heading used in reports, defaults to the name */
  readonly label?: string
}

// =============================================================================
// Reference Model State
// =============================================================================

/**
 * Mutable state of an auxiliary entity inside the reference model.
 */
export interface EntityState {
  readonly storage: unknown
  readonly balance: Balance
}

/**
 * Full state of the reference model.
 * Replaced wholesale on every step; nothing outside the model mutates it.
 */
export interface ModelState<S> {
  /** Handle of the primary entity */
  readonly self: Handle
  readonly storage: S
  readonly balance: Balance
  readonly level: Level
  readonly entities: ReadonlyMap<Handle, EntityState>
}

// =============================================================================
// Raw Failures
// =============================================================================

/**
 * Wire-encoded expression, as returned by node RPC interfaces.
 */
export type Expression =
  | { readonly int: string }
  | { readonly string: string }
  | { readonly bytes: string }
  | {
      readonly prim: string
      readonly args?: ReadonlyArray<Expression>
    }
  | ReadonlyArray<Expression>

/**
 * Failure payload produced by a system under test, before normalization.
 */
export type RawFailure =
  /** Value raised by the system's own failure mechanism */
  | { readonly kind: `failwith`; readonly value: unknown }
  /** Failure value already encoded for the wire */
  | { readonly kind: `expression`; readonly expression: Expression }
  /** Submission threw (timeout, connection reset, ...) */
  | { readonly kind: `transport`; readonly error: unknown }

/**
 * Result of submitting one operation to a system under test.
 */
export type SubmitResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly failure: RawFailure }
