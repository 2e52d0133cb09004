/**
 * Types for the governance DAO domain.
 *
 * A DAO holds frozen governance tokens for its members, who stake them to
 * submit and vote on proposals. Accepted proposals run a decision that
 * depends on the contract variant: none for `base`, registry updates for
 * `registry`, transfers for `treasury`.
 */

import type { Handle, Level } from "@lockstep/engine"

// =============================================================================
// Variants
// =============================================================================

export type DaoVariant = `base` | `registry` | `treasury`

// =============================================================================
// Proposals
// =============================================================================

export type ProposalMetadata =
  | { readonly type: `noop` }
  | {
      readonly type: `update_registry`
      readonly key: string
      readonly value: string
    }
  | {
      readonly type: `transfer_xtz`
      readonly recipient: Handle
      readonly amount: bigint
    }
  | {
      readonly type: `transfer_tokens`
      readonly recipient: Handle
      readonly amount: bigint
    }

export interface Vote {
  readonly voter: Handle
  readonly upvote: boolean
  readonly amount: bigint
}

export interface Proposal {
  readonly key: string
  readonly proposer: Handle
  readonly frozenTokens: bigint
  readonly metadata: ProposalMetadata
  /** Period the proposal was submitted in */
  readonly period: number
  readonly upvotes: bigint
  readonly downvotes: bigint
  readonly votes: ReadonlyArray<Vote>
}

// =============================================================================
// Storage
// =============================================================================

export interface DaoConfig {
  /** Levels per period */
  readonly periodLength: number
  /** Minimum upvotes for a proposal to pass */
  readonly quorum: bigint
  /** Largest stake a single proposal may lock */
  readonly maxProposalSize: bigint
}

/**
 * Primary storage of the DAO. Zero entries are removed from `frozen` and
 * `staked`, so equal states always have equal storage.
 */
export interface DaoStorage {
  readonly variant: DaoVariant
  readonly admin: Handle
  readonly pendingOwner: Handle | null
  readonly guardian: Handle
  readonly governanceToken: Handle
  readonly startLevel: Level
  readonly config: DaoConfig
  /** Tokens each member has frozen in the DAO */
  readonly frozen: Readonly<Record<Handle, bigint>>
  /** Portion of the frozen tokens locked by proposals and votes */
  readonly staked: Readonly<Record<Handle, bigint>>
  readonly proposals: Readonly<Record<string, Proposal>>
  /** Proposal keys in submission order */
  readonly proposalQueue: ReadonlyArray<string>
  readonly proposalCounter: number
  readonly registry: Readonly<Record<string, string>>
}

/**
 * One call recorded by the governance token contract.
 */
export interface TokenTransfer {
  readonly from: Handle
  readonly to: Handle
  readonly amount: bigint
}

/**
 * Storage of the governance token: every transfer it was asked to make.
 */
export type TokenStorage = ReadonlyArray<TokenTransfer>

/**
 * Storage of the view consumer: every registry lookup sent to it.
 */
export type ConsumerStorage = ReadonlyArray<readonly [string, string | null]>

// =============================================================================
// Operations
// =============================================================================

export interface OperationBase {
  readonly sender: Handle
  readonly advance?: number
}

export interface ProposeOperation extends OperationBase {
  readonly kind: `propose`
  readonly frozenTokens: bigint
  readonly metadata: ProposalMetadata
}

export interface VoteOperation extends OperationBase {
  readonly kind: `vote`
  readonly proposalKey: string
  readonly upvote: boolean
  readonly amount: bigint
}

export interface FreezeOperation extends OperationBase {
  readonly kind: `freeze`
  readonly amount: bigint
}

export interface UnfreezeOperation extends OperationBase {
  readonly kind: `unfreeze`
  readonly amount: bigint
}

export interface FlushOperation extends OperationBase {
  readonly kind: `flush`
  readonly limit: number
}

export interface DropProposalOperation extends OperationBase {
  readonly kind: `drop_proposal`
  readonly proposalKey: string
}

export interface TransferOwnershipOperation extends OperationBase {
  readonly kind: `transfer_ownership`
  readonly newOwner: Handle
}

export interface AcceptOwnershipOperation extends OperationBase {
  readonly kind: `accept_ownership`
}

/**
 * Plain transfer into the DAO.
 */
export interface DefaultOperation extends OperationBase {
  readonly kind: `default`
  readonly amount: bigint
}

export type CustomCall = {
  readonly entrypoint: `lookup_registry`
  readonly key: string
  /** Contract the looked-up value is sent to */
  readonly viewer: Handle
}

/**
 * Variant-specific entrypoints.
 */
export interface CustomOperation extends OperationBase {
  readonly kind: `custom`
  readonly call: CustomCall
}

export type DaoOperation =
  | ProposeOperation
  | VoteOperation
  | FreezeOperation
  | UnfreezeOperation
  | FlushOperation
  | DropProposalOperation
  | TransferOwnershipOperation
  | AcceptOwnershipOperation
  | DefaultOperation
  | CustomOperation

export type DaoOperationKind = DaoOperation[`kind`]

// =============================================================================
// Environment
// =============================================================================

/**
 * Handles and settings the generator used to build a sequence.
 */
export interface DaoEnvironment {
  readonly variant: DaoVariant
  readonly config: DaoConfig
  readonly dao: Handle
  readonly admin: Handle
  readonly guardian: Handle
  readonly governanceToken: Handle
  readonly viewConsumer: Handle
  /** Member accounts that send operations */
  readonly accounts: ReadonlyArray<Handle>
}

/**
 * Receives slashed tokens.
 */
export const BURN_ADDRESS: Handle = `tz1-burn`

/**
 * Metadata types each variant accepts.
 */
export const ALLOWED_METADATA: Readonly<
  Record<DaoVariant, ReadonlyArray<ProposalMetadata[`type`]>>
> = {
  base: [`noop`],
  registry: [`noop`, `update_registry`],
  treasury: [`noop`, `transfer_xtz`, `transfer_tokens`],
}
