/**
 * Reference model of the governance DAO.
 *
 * Pure functions over immutable storage: every operation either returns a
 * new state or an error code with the state it was given.
 */

import { updateEntity } from "@lockstep/engine"
import { ALLOWED_METADATA, BURN_ADDRESS } from "./types"
import type {
  EntityState,
  Handle,
  ModelState,
  ModelTransition,
  ReferenceModel,
} from "@lockstep/engine"
import type { DaoError } from "./errors"
import type {
  ConsumerStorage,
  DaoOperation,
  DaoStorage,
  Proposal,
  ProposalMetadata,
  TokenStorage,
  TokenTransfer,
} from "./types"

type DaoState = ModelState<DaoStorage>
type Transition = ModelTransition<DaoStorage, DaoError>

// =============================================================================
// Periods
// =============================================================================

/**
 * Voting period the DAO is in at a given level.
 */
export function currentPeriod(storage: DaoStorage, level: number): number {
  return Math.floor((level - storage.startLevel) / storage.config.periodLength)
}

export function isProposingPeriod(period: number): boolean {
  return period % 2 === 0
}

/**
 * A proposal can be flushed once the period it was voted in is over.
 */
export function isFlushable(proposal: Proposal, period: number): boolean {
  return period >= proposal.period + 2
}

// =============================================================================
// Ledger Helpers
// =============================================================================

function amountOf(
  ledger: Readonly<Record<Handle, bigint>>,
  handle: Handle
): bigint {
  return ledger[handle] ?? 0n
}

/**
 * Add `delta` to an entry, removing it when it reaches zero.
 */
function adjust(
  ledger: Readonly<Record<Handle, bigint>>,
  handle: Handle,
  delta: bigint
): Readonly<Record<Handle, bigint>> {
  const next = { ...ledger }
  const value = amountOf(ledger, handle) + delta
  if (value === 0n) {
    delete next[handle]
  } else {
    next[handle] = value
  }
  return next
}

export function availableTokens(storage: DaoStorage, handle: Handle): bigint {
  return amountOf(storage.frozen, handle) - amountOf(storage.staked, handle)
}

function recordTransfer(
  state: DaoState,
  transfer: TokenTransfer
): ReadonlyMap<Handle, EntityState> {
  return updateEntity(
    state.entities,
    state.storage.governanceToken,
    (token) => ({
      ...token,
      storage: [...tokenStorage(token), transfer],
    })
  )
}

function tokenStorage(entity: EntityState): TokenStorage {
  return Array.isArray(entity.storage) ? entity.storage : []
}

function consumerStorage(entity: EntityState): ConsumerStorage {
  return Array.isArray(entity.storage) ? entity.storage : []
}

function withStorage(state: DaoState, storage: DaoStorage): DaoState {
  return { ...state, storage }
}

function fail(state: DaoState, error: DaoError): Transition {
  return { state, error }
}

// =============================================================================
// Token Operations
// =============================================================================

function freeze(state: DaoState, sender: Handle, amount: bigint): Transition {
  if (amount <= 0n) return fail(state, `BAD_TOKEN_AMOUNT`)

  const storage = state.storage
  return {
    state: {
      ...withStorage(state, {
        ...storage,
        frozen: adjust(storage.frozen, sender, amount),
      }),
      entities: recordTransfer(state, {
        from: sender,
        to: state.self,
        amount,
      }),
    },
  }
}

function unfreeze(state: DaoState, sender: Handle, amount: bigint): Transition {
  if (amount <= 0n) return fail(state, `BAD_TOKEN_AMOUNT`)
  if (availableTokens(state.storage, sender) < amount) {
    return fail(state, `NOT_ENOUGH_FROZEN_TOKENS`)
  }

  const storage = state.storage
  return {
    state: {
      ...withStorage(state, {
        ...storage,
        frozen: adjust(storage.frozen, sender, -amount),
      }),
      entities: recordTransfer(state, {
        from: state.self,
        to: sender,
        amount,
      }),
    },
  }
}

// =============================================================================
// Proposals
// =============================================================================

function propose(
  state: DaoState,
  sender: Handle,
  frozenTokens: bigint,
  metadata: ProposalMetadata
): Transition {
  const storage = state.storage
  const period = currentPeriod(storage, state.level)

  if (!isProposingPeriod(period)) return fail(state, `NOT_PROPOSING_PERIOD`)
  if (!ALLOWED_METADATA[storage.variant].includes(metadata.type)) {
    return fail(state, `UNSUPPORTED_METADATA`)
  }
  if (frozenTokens <= 0n) return fail(state, `BAD_TOKEN_AMOUNT`)
  if (frozenTokens > storage.config.maxProposalSize) {
    return fail(state, `PROPOSAL_TOO_LARGE`)
  }
  if (availableTokens(storage, sender) < frozenTokens) {
    return fail(state, `NOT_ENOUGH_FROZEN_TOKENS`)
  }

  const key = `p${storage.proposalCounter}`
  const proposal: Proposal = {
    key,
    proposer: sender,
    frozenTokens,
    metadata,
    period,
    upvotes: 0n,
    downvotes: 0n,
    votes: [],
  }

  return {
    state: withStorage(state, {
      ...storage,
      staked: adjust(storage.staked, sender, frozenTokens),
      proposals: { ...storage.proposals, [key]: proposal },
      proposalQueue: [...storage.proposalQueue, key],
      proposalCounter: storage.proposalCounter + 1,
    }),
  }
}

function vote(
  state: DaoState,
  sender: Handle,
  proposalKey: string,
  upvote: boolean,
  amount: bigint
): Transition {
  const storage = state.storage
  const proposal = storage.proposals[proposalKey]

  if (!proposal) return fail(state, `PROPOSAL_NOT_EXIST`)
  if (currentPeriod(storage, state.level) !== proposal.period + 1) {
    return fail(state, `VOTING_STAGE_OVER`)
  }
  if (amount <= 0n) return fail(state, `BAD_TOKEN_AMOUNT`)
  if (availableTokens(storage, sender) < amount) {
    return fail(state, `NOT_ENOUGH_FROZEN_TOKENS`)
  }

  const updated: Proposal = {
    ...proposal,
    upvotes: upvote ? proposal.upvotes + amount : proposal.upvotes,
    downvotes: upvote ? proposal.downvotes : proposal.downvotes + amount,
    votes: [...proposal.votes, { voter: sender, upvote, amount }],
  }

  return {
    state: withStorage(state, {
      ...storage,
      staked: adjust(storage.staked, sender, amount),
      proposals: { ...storage.proposals, [proposalKey]: updated },
    }),
  }
}

/**
 * Remove a proposal, releasing the proposer's and voters' stakes.
 */
function release(storage: DaoStorage, proposal: Proposal): DaoStorage {
  let staked = adjust(storage.staked, proposal.proposer, -proposal.frozenTokens)
  for (const v of proposal.votes) {
    staked = adjust(staked, v.voter, -v.amount)
  }
  const proposals = { ...storage.proposals }
  delete proposals[proposal.key]

  return {
    ...storage,
    staked,
    proposals,
    proposalQueue: storage.proposalQueue.filter((k) => k !== proposal.key),
  }
}

export function isAccepted(proposal: Proposal, storage: DaoStorage): boolean {
  return (
    proposal.upvotes >= storage.config.quorum &&
    proposal.upvotes > proposal.downvotes
  )
}

/**
 * Run the decision of an accepted proposal.
 * Returns `undefined` when the decision cannot be carried out.
 */
function decide(
  state: DaoState,
  metadata: ProposalMetadata
): DaoState | undefined {
  switch (metadata.type) {
    case `noop`:
      return state
    case `update_registry`:
      return withStorage(state, {
        ...state.storage,
        registry: { ...state.storage.registry, [metadata.key]: metadata.value },
      })
    case `transfer_xtz`: {
      if (state.balance < metadata.amount) return undefined
      const entities = state.entities.has(metadata.recipient)
        ? updateEntity(state.entities, metadata.recipient, (e) => ({
            ...e,
            balance: e.balance + metadata.amount,
          }))
        : state.entities
      return { ...state, balance: state.balance - metadata.amount, entities }
    }
    case `transfer_tokens`:
      return {
        ...state,
        entities: recordTransfer(state, {
          from: state.self,
          to: metadata.recipient,
          amount: metadata.amount,
        }),
      }
  }
}

function flush(state: DaoState, limit: number): Transition {
  const period = currentPeriod(state.storage, state.level)
  const ready = state.storage.proposalQueue
    .map((key) => state.storage.proposals[key])
    .filter((p): p is Proposal => p !== undefined && isFlushable(p, period))
    .slice(0, Math.max(0, limit))

  if (ready.length === 0) return fail(state, `EMPTY_FLUSH`)

  let next = state
  for (const proposal of ready) {
    next = withStorage(next, release(next.storage, proposal))

    if (isAccepted(proposal, next.storage)) {
      const decided = decide(next, proposal.metadata)
      if (!decided) return fail(state, `FAIL_DECISION`)
      next = decided
      continue
    }

    const slash = proposal.frozenTokens / 2n
    if (slash > 0n) {
      next = {
        ...withStorage(next, {
          ...next.storage,
          frozen: adjust(next.storage.frozen, proposal.proposer, -slash),
        }),
        entities: recordTransfer(next, {
          from: next.self,
          to: BURN_ADDRESS,
          amount: slash,
        }),
      }
    }
  }

  return { state: next }
}

function dropProposal(
  state: DaoState,
  sender: Handle,
  proposalKey: string
): Transition {
  const storage = state.storage
  const proposal = storage.proposals[proposalKey]

  if (!proposal) return fail(state, `PROPOSAL_NOT_EXIST`)
  if (sender !== storage.guardian && sender !== proposal.proposer) {
    return fail(state, `DROP_PROPOSAL_CONDITION_NOT_MET`)
  }
  return { state: withStorage(state, release(storage, proposal)) }
}

// =============================================================================
// Model
// =============================================================================

export const daoModel: ReferenceModel<DaoOperation, DaoStorage, DaoError> = {
  apply(state, op) {
    const storage = state.storage

    switch (op.kind) {
      case `freeze`:
        return freeze(state, op.sender, op.amount)

      case `unfreeze`:
        return unfreeze(state, op.sender, op.amount)

      case `propose`:
        return propose(state, op.sender, op.frozenTokens, op.metadata)

      case `vote`:
        return vote(state, op.sender, op.proposalKey, op.upvote, op.amount)

      case `flush`:
        return flush(state, op.limit)

      case `drop_proposal`:
        return dropProposal(state, op.sender, op.proposalKey)

      case `transfer_ownership`:
        if (op.sender !== storage.admin) return fail(state, `NOT_ADMIN`)
        return {
          state: withStorage(state, { ...storage, pendingOwner: op.newOwner }),
        }

      case `accept_ownership`:
        if (storage.pendingOwner === null || op.sender !== storage.pendingOwner) {
          return fail(state, `NOT_PENDING_ADMIN`)
        }
        return {
          state: withStorage(state, {
            ...storage,
            admin: op.sender,
            pendingOwner: null,
          }),
        }

      case `default`:
        return { state: { ...state, balance: state.balance + op.amount } }

      case `custom`: {
        if (storage.variant !== `registry`) return { state }
        const { key, viewer } = op.call
        const value = storage.registry[key] ?? null
        return {
          state: {
            ...state,
            entities: updateEntity(state.entities, viewer, (consumer) => ({
              ...consumer,
              storage: [...consumerStorage(consumer), [key, value]],
            })),
          },
        }
      }
    }
  },
}
