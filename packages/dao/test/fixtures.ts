import { applyModel } from "@lockstep/engine"
import {
  ADMIN_HANDLE,
  DAO_HANDLE,
  GOVERNANCE_TOKEN_HANDLE,
  GUARDIAN_HANDLE,
  VIEW_CONSUMER_HANDLE,
  accountHandle,
  createDaoModelState,
  daoModel,
} from "../src/index"
import type { ModelState, Outcome } from "@lockstep/engine"
import type {
  DaoEnvironment,
  DaoError,
  DaoOperation,
  DaoRunOptions,
  DaoSequence,
  DaoStorage,
  DaoVariant,
} from "../src/index"

export const ALICE = accountHandle(1)
export const BOB = accountHandle(2)

export function environment(variant: DaoVariant = `base`): DaoEnvironment {
  return {
    variant,
    config: { periodLength: 5, quorum: 3n, maxProposalSize: 10n },
    dao: DAO_HANDLE,
    admin: ADMIN_HANDLE,
    guardian: GUARDIAN_HANDLE,
    governanceToken: GOVERNANCE_TOKEN_HANDLE,
    viewConsumer: VIEW_CONSUMER_HANDLE,
    accounts: [ALICE, BOB],
  }
}

export function sequence(
  operations: Array<DaoOperation>,
  variant: DaoVariant = `base`
): DaoSequence {
  return {
    seed: 0,
    environment: environment(variant),
    startLevel: 0,
    operations,
  }
}

/** Alice and Bob start with 10 frozen tokens each */
export const GENESIS: DaoRunOptions[`genesis`] = {
  frozen: { [ALICE]: 10n, [BOB]: 10n },
}

export function initialState(
  variant: DaoVariant = `base`
): ModelState<DaoStorage> {
  return createDaoModelState(sequence([], variant), GENESIS)
}

/**
 * Apply operations to the model one by one, collecting every outcome.
 */
export function applyAll(
  state: ModelState<DaoStorage>,
  operations: Array<DaoOperation>
): {
  state: ModelState<DaoStorage>
  outcomes: Array<Outcome<DaoStorage, DaoError>>
} {
  const outcomes: Array<Outcome<DaoStorage, DaoError>> = []
  let current = state
  for (const op of operations) {
    const step = applyModel(daoModel, current, op)
    current = step.state
    outcomes.push(step.outcome)
  }
  return { state: current, outcomes }
}

export function errors(
  outcomes: Array<Outcome<DaoStorage, DaoError>>
): Array<DaoError | `ok`> {
  return outcomes.map((o) => (o.ok ? `ok` : o.error))
}
