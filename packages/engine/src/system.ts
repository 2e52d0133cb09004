/**
 * System-Under-Test Executor
 *
 * Applies one operation against the real system through a transport-
 * agnostic client, then fetches the observables to compare. The
 * submission and the fetches that follow form one logical unit: each call
 * is awaited before the next starts.
 */

import { CollaboratorFaultError, NormalizationFaultError } from "./errors"
import type {
  Balance,
  EntitySnapshot,
  Handle,
  OperationEnvelope,
  RawFailure,
  SubmitResult,
  TrackedEntity,
} from "./types"

// =============================================================================
// Client Boundary
// =============================================================================

/**
 * What the engine needs from a system under test.
 * Implementations may talk RPC, HTTP, or drive an in-process emulator.
 */
export interface SystemClient<Op extends OperationEnvelope, S> {
  /** Handle of the primary entity */
  readonly self: Handle
  /** Advance the shared logical clock */
  advanceLevel: (by: number) => Promise<void>
  /** Transfer funds to an account so it can pay for its own submissions */
  fund: (recipient: Handle, amount: Balance) => Promise<void>
  /** Submit one operation as a transaction from its sender */
  submit: (op: Op) => Promise<SubmitResult>
  getStorage: () => Promise<S>
  getBalance: (handle: Handle) => Promise<Balance>
  getEntityStorage: (handle: Handle) => Promise<unknown>
}

// =============================================================================
// Custom Operations
// =============================================================================

/**
 * Returned by a custom dispatcher for operations it does not define.
 */
export const UNSUPPORTED: unique symbol = Symbol(`UNSUPPORTED`)
export type Unsupported = typeof UNSUPPORTED

/**
 * Capability that submits domain-specific custom operations.
 * Resolved once per run; variants that define no custom operations use
 * `noCustomOperations`.
 */
export interface CustomDispatch<Op extends OperationEnvelope, S> {
  /** Whether the operation is routed through this capability */
  handles: (op: Op) => boolean
  dispatch: (
    client: SystemClient<Op, S>,
    op: Op
  ) => Promise<SubmitResult | Unsupported>
}

export function noCustomOperations<
  Op extends OperationEnvelope,
  S,
>(isCustom: (op: Op) => boolean): CustomDispatch<Op, S> {
  return {
    handles: isCustom,
    dispatch: () => Promise.resolve(UNSUPPORTED),
  }
}

/**
 * What to do with a custom operation the capability does not support.
 * - `skip`: treat it as a no-op on the system
 * - `fail`: abort the run with a collaborator fault
 */
export type UnsupportedPolicy = `skip` | `fail`

// =============================================================================
// Executor
// =============================================================================

/**
 * Raw result of one system step, before error normalization.
 */
export interface SystemStep<S> {
  readonly failure?: RawFailure
  readonly storage: S
  readonly balance: Balance
  readonly entities: ReadonlyMap<Handle, EntitySnapshot>
}

export interface SystemExecutorOptions<Op extends OperationEnvelope, S> {
  client: SystemClient<Op, S>
  custom?: CustomDispatch<Op, S>
  /**
   * Policy for unsupported custom operations.
   * @default "skip"
   */
  unsupported?: UnsupportedPolicy
  /**
   * Amount sent to the sender before each submission. Zero disables it.
   * @default 1n
   */
  fundingAmount?: Balance
}

export interface SystemExecutor<Op extends OperationEnvelope, S> {
  readonly client: SystemClient<Op, S>
  /**
   * @throws NormalizationFaultError when advancing, funding or observing
   * fails in transport
   */
  apply: (op: Op, tracked: ReadonlyArray<TrackedEntity>) => Promise<SystemStep<S>>
}

/**
 * Run a call outside the submission. When it throws, there are no
 * observables to compare, so the step ends as a transport fault.
 */
async function outsideSubmission<T>(
  phase: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call()
  } catch (error) {
    if (error instanceof CollaboratorFaultError) throw error
    throw new NormalizationFaultError(
      { kind: `transport`, error },
      `transport failure during ${phase}`
    )
  }
}

export function createSystemExecutor<Op extends OperationEnvelope, S>(
  options: SystemExecutorOptions<Op, S>
): SystemExecutor<Op, S> {
  const { client, custom, unsupported = `skip`, fundingAmount = 1n } = options

  async function submit(op: Op): Promise<SubmitResult> {
    if (custom && custom.handles(op)) {
      const result = await custom.dispatch(client, op)
      if (result !== UNSUPPORTED) return result
      if (unsupported === `fail`) {
        throw new CollaboratorFaultError(
          `Custom operation ${op.kind} is not supported by this system`,
          `UNSUPPORTED_OPERATION`,
          op
        )
      }
      return { ok: true }
    }
    return client.submit(op)
  }

  return {
    client,

    async apply(op, tracked) {
      const { advance } = op
      if (advance !== undefined && advance > 0) {
        await outsideSubmission(`advance`, () => client.advanceLevel(advance))
      }

      // Pays for the call itself; the sender is never a compared entity.
      if (fundingAmount > 0n) {
        await outsideSubmission(`funding`, () =>
          client.fund(op.sender, fundingAmount)
        )
      }

      let result: SubmitResult
      try {
        result = await submit(op)
      } catch (error) {
        if (error instanceof CollaboratorFaultError) throw error
        result = { ok: false, failure: { kind: `transport`, error } }
      }

      return outsideSubmission(`observation`, async () => {
        const storage = await client.getStorage()
        const balance = await client.getBalance(client.self)

        const entities = new Map<Handle, EntitySnapshot>()
        for (const entity of tracked) {
          const entityStorage = await client.getEntityStorage(entity.handle)
          const entityBalance = await client.getBalance(entity.handle)
          entities.set(entity.handle, {
            storage: entityStorage,
            balance: entityBalance,
          })
        }

        return {
          failure: result.ok ? undefined : result.failure,
          storage,
          balance,
          entities,
        }
      })
    },
  }
}
