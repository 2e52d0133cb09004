import { createErrorNormalizer, defineErrorCodes } from "@lockstep/engine"
import type { ErrorCodeOf } from "@lockstep/engine"

/**
 * Errors raised by the DAO, tagged with the number the contract fails with.
 */
export const daoErrors = defineErrorCodes({
  NOT_ADMIN: 100,
  NOT_PENDING_ADMIN: 101,
  BAD_TOKEN_AMOUNT: 102,
  NOT_ENOUGH_FROZEN_TOKENS: 110,
  NOT_PROPOSING_PERIOD: 120,
  PROPOSAL_NOT_EXIST: 121,
  VOTING_STAGE_OVER: 122,
  PROPOSAL_TOO_LARGE: 123,
  EMPTY_FLUSH: 130,
  DROP_PROPOSAL_CONDITION_NOT_MET: 131,
  FAIL_DECISION: 140,
  UNSUPPORTED_METADATA: 141,
} as const)

export type DaoError = ErrorCodeOf<typeof daoErrors>

export const daoNormalizer = createErrorNormalizer(daoErrors)
