/**
 * Sandbox Chain
 *
 * An in-process emulator of the chain the DAO runs on: a ledger of
 * balances, a level counter, and contracts that exchange internal
 * operations. It is the system under test for the DAO suite, written
 * independently of the reference model.
 *
 * A top-level call is atomic: if the called contract or any internal
 * operation it emits fails, every balance and contract storage is rolled
 * back to what it was before the call.
 */

import { encodeFailure } from "@lockstep/engine"
import { daoErrors } from "./errors"
import { ALLOWED_METADATA, BURN_ADDRESS } from "./types"
import type { Handle, RawFailure, SubmitResult } from "@lockstep/engine"
import type { DaoError } from "./errors"
import type {
  ConsumerStorage,
  DaoOperation,
  DaoOperationKind,
  DaoStorage,
  DaoVariant,
  Proposal,
  ProposalMetadata,
  TokenStorage,
  TokenTransfer,
  Vote,
} from "./types"

// =============================================================================
// Contract Interface
// =============================================================================

export type ContractParameter =
  | { readonly type: `dao`; readonly operation: DaoOperation }
  | {
      readonly type: `token_transfer`
      readonly transfers: ReadonlyArray<TokenTransfer>
    }
  | { readonly type: `view`; readonly value: readonly [string, string | null] }

export type InternalOperation =
  | { readonly type: `transfer`; readonly to: Handle; readonly amount: bigint }
  | {
      readonly type: `call`
      readonly target: Handle
      readonly parameter: ContractParameter
    }

export interface CallContext {
  /** Immediate caller: an account, or the contract that emitted the call */
  readonly sender: Handle
  readonly self: Handle
  /** Amount sent along with the call, already credited */
  readonly amount: bigint
  /** Balance of the called contract, including `amount` */
  readonly balance: bigint
  readonly level: number
}

export interface Contract {
  readonly handle: Handle
  storage: () => unknown
  execute: (
    ctx: CallContext,
    parameter: ContractParameter
  ) => ReadonlyArray<InternalOperation>
  /** Capture the current storage, returning a function that restores it */
  save: () => () => void
}

/**
 * Raised by a contract to fail the whole top-level call.
 */
export class ContractFailure extends Error {
  failure: RawFailure

  constructor(failure: RawFailure) {
    super(`Contract failed`)
    this.name = `ContractFailure`
    this.failure = failure
  }

  static failwith(value: unknown): ContractFailure {
    return new ContractFailure({ kind: `failwith`, value })
  }
}

// =============================================================================
// Chain
// =============================================================================

export class Sandbox {
  private currentLevel: number
  private readonly balances = new Map<Handle, bigint>()
  private readonly contracts = new Map<Handle, Contract>()

  constructor(level = 0) {
    this.currentLevel = level
  }

  get level(): number {
    return this.currentLevel
  }

  advance(by: number): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new Error(`Cannot advance the level by ${by}`)
    }
    this.currentLevel += by
  }

  /**
   * Register a contract with an initial balance.
   */
  originate<C extends Contract>(contract: C, balance = 0n): C {
    if (this.contracts.has(contract.handle)) {
      throw new Error(`Contract ${contract.handle} already exists`)
    }
    this.contracts.set(contract.handle, contract)
    this.balances.set(contract.handle, balance)
    return contract
  }

  /**
   * Mint funds for an account, outside any contract call.
   */
  credit(handle: Handle, amount: bigint): void {
    this.balances.set(handle, (this.balances.get(handle) ?? 0n) + amount)
  }

  /** Whether the handle is a contract or a funded account */
  has(handle: Handle): boolean {
    return this.balances.has(handle)
  }

  balanceOf(handle: Handle): bigint | undefined {
    return this.balances.get(handle)
  }

  contract(handle: Handle): Contract | undefined {
    return this.contracts.get(handle)
  }

  /**
   * Submit a transaction from an account to a contract.
   */
  call(
    source: Handle,
    target: Handle,
    parameter: ContractParameter,
    amount = 0n
  ): SubmitResult {
    const restore = this.checkpoint()
    try {
      this.move(source, target, amount)
      const queue: Array<{
        sender: Handle
        target: Handle
        parameter: ContractParameter
        amount: bigint
      }> = [{ sender: source, target, parameter, amount }]

      // Internal operations run breadth-first, after their emitter returns
      for (let next = queue.shift(); next; next = queue.shift()) {
        const contract = this.contracts.get(next.target)
        if (!contract) {
          throw ContractFailure.failwith(`UNKNOWN_CONTRACT`)
        }
        const emitted = contract.execute(
          {
            sender: next.sender,
            self: next.target,
            amount: next.amount,
            balance: this.balances.get(next.target) ?? 0n,
            level: this.currentLevel,
          },
          next.parameter
        )
        for (const op of emitted) {
          if (op.type === `transfer`) {
            this.move(next.target, op.to, op.amount)
          } else {
            queue.push({
              sender: next.target,
              target: op.target,
              parameter: op.parameter,
              amount: 0n,
            })
          }
        }
      }
      return { ok: true }
    } catch (error) {
      restore()
      if (error instanceof ContractFailure) {
        return { ok: false, failure: error.failure }
      }
      throw error
    }
  }

  private move(from: Handle, to: Handle, amount: bigint): void {
    if (amount === 0n) return
    const available = this.balances.get(from) ?? 0n
    if (available < amount) {
      throw ContractFailure.failwith(`BALANCE_TOO_LOW`)
    }
    this.balances.set(from, available - amount)
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount)
  }

  private checkpoint(): () => void {
    const balances = new Map(this.balances)
    const restores = [...this.contracts.values()].map((c) => c.save())
    return () => {
      this.balances.clear()
      for (const [handle, balance] of balances) {
        this.balances.set(handle, balance)
      }
      for (const restore of restores) restore()
    }
  }
}

// =============================================================================
// Auxiliary Contracts
// =============================================================================

/**
 * Governance token stand-in: records every transfer batch it is asked to
 * make, without checking balances.
 */
export class TokenContract implements Contract {
  private transfers: Array<TokenTransfer> = []

  constructor(readonly handle: Handle) {}

  storage(): TokenStorage {
    return [...this.transfers]
  }

  execute(
    _ctx: CallContext,
    parameter: ContractParameter
  ): ReadonlyArray<InternalOperation> {
    if (parameter.type !== `token_transfer`) {
      throw ContractFailure.failwith(`UNEXPECTED_PARAMETER`)
    }
    this.transfers.push(...parameter.transfers)
    return []
  }

  save(): () => void {
    const saved = [...this.transfers]
    return () => {
      this.transfers = saved
    }
  }
}

/**
 * Receives values sent by views and keeps them in arrival order.
 */
export class ConsumerContract implements Contract {
  private received: Array<readonly [string, string | null]> = []

  constructor(readonly handle: Handle) {}

  storage(): ConsumerStorage {
    return [...this.received]
  }

  execute(
    _ctx: CallContext,
    parameter: ContractParameter
  ): ReadonlyArray<InternalOperation> {
    if (parameter.type !== `view`) {
      throw ContractFailure.failwith(`UNEXPECTED_PARAMETER`)
    }
    this.received.push(parameter.value)
    return []
  }

  save(): () => void {
    const saved = [...this.received]
    return () => {
      this.received = saved
    }
  }
}

// =============================================================================
// DAO Contract
// =============================================================================

/**
 * How the DAO raises its error codes.
 * - `native`: the number, or `[number, name]` for ownership errors
 * - `expression`: the same values as wire-encoded expressions
 */
export type FailureEncoding = `native` | `expression`

export interface DaoContractOptions {
  /** @default "native" */
  encoding?: FailureEncoding
  /**
   * Rewrite the storage after a successful operation of the given kind.
   * Used by tests to plant bugs.
   */
  mutate?: (kind: DaoOperationKind, storage: DaoStorage) => DaoStorage
}

interface MutableProposal {
  key: string
  proposer: Handle
  frozenTokens: bigint
  metadata: ProposalMetadata
  period: number
  upvotes: bigint
  downvotes: bigint
  votes: Array<Vote>
}

const PAIR_ENCODED: ReadonlySet<DaoError> = new Set([
  `NOT_ADMIN`,
  `NOT_PENDING_ADMIN`,
])

export class DaoContract implements Contract {
  readonly handle: Handle
  private readonly encoding: FailureEncoding
  private readonly mutate?: DaoContractOptions[`mutate`]

  private variant: DaoVariant = `base`
  private admin: Handle = ``
  private pendingOwner: Handle | null = null
  private guardian: Handle = ``
  private governanceToken: Handle = ``
  private startLevel = 0
  private periodLength = 1
  private quorum = 0n
  private maxProposalSize = 0n
  private frozen = new Map<Handle, bigint>()
  private staked = new Map<Handle, bigint>()
  private proposals = new Map<string, MutableProposal>()
  private queue: Array<string> = []
  private counter = 0
  private registry = new Map<string, string>()

  constructor(
    handle: Handle,
    storage: DaoStorage,
    options: DaoContractOptions = {}
  ) {
    this.handle = handle
    this.encoding = options.encoding ?? `native`
    this.mutate = options.mutate
    this.load(storage)
  }

  storage(): DaoStorage {
    return {
      variant: this.variant,
      admin: this.admin,
      pendingOwner: this.pendingOwner,
      guardian: this.guardian,
      governanceToken: this.governanceToken,
      startLevel: this.startLevel,
      config: {
        periodLength: this.periodLength,
        quorum: this.quorum,
        maxProposalSize: this.maxProposalSize,
      },
      frozen: Object.fromEntries(this.frozen),
      staked: Object.fromEntries(this.staked),
      proposals: Object.fromEntries(
        [...this.proposals].map(([key, p]): [string, Proposal] => [
          key,
          { ...p, votes: [...p.votes] },
        ])
      ),
      proposalQueue: [...this.queue],
      proposalCounter: this.counter,
      registry: Object.fromEntries(this.registry),
    }
  }

  save(): () => void {
    const saved = this.storage()
    return () => this.load(saved)
  }

  execute(
    ctx: CallContext,
    parameter: ContractParameter
  ): ReadonlyArray<InternalOperation> {
    if (parameter.type !== `dao`) {
      throw ContractFailure.failwith(`UNEXPECTED_PARAMETER`)
    }
    const op = parameter.operation
    const emitted = this.dispatch(ctx, op)
    if (this.mutate) {
      this.load(this.mutate(op.kind, this.storage()))
    }
    return emitted
  }

  private load(storage: DaoStorage): void {
    this.variant = storage.variant
    this.admin = storage.admin
    this.pendingOwner = storage.pendingOwner
    this.guardian = storage.guardian
    this.governanceToken = storage.governanceToken
    this.startLevel = storage.startLevel
    this.periodLength = storage.config.periodLength
    this.quorum = storage.config.quorum
    this.maxProposalSize = storage.config.maxProposalSize
    this.frozen = new Map(Object.entries(storage.frozen))
    this.staked = new Map(Object.entries(storage.staked))
    this.proposals = new Map(
      Object.entries(storage.proposals).map(
        ([key, p]): [string, MutableProposal] => [
          key,
          { ...p, votes: [...p.votes] },
        ]
      )
    )
    this.queue = [...storage.proposalQueue]
    this.counter = storage.proposalCounter
    this.registry = new Map(Object.entries(storage.registry))
  }

  private dispatch(
    ctx: CallContext,
    op: DaoOperation
  ): ReadonlyArray<InternalOperation> {
    switch (op.kind) {
      case `freeze`: {
        this.requirePositive(op.amount)
        this.add(this.frozen, ctx.sender, op.amount)
        return [this.tokenTransfer(ctx.sender, ctx.self, op.amount)]
      }

      case `unfreeze`: {
        this.requirePositive(op.amount)
        this.requireAvailable(ctx.sender, op.amount)
        this.add(this.frozen, ctx.sender, -op.amount)
        return [this.tokenTransfer(ctx.self, ctx.sender, op.amount)]
      }

      case `propose`: {
        const period = this.period(ctx.level)
        if (period % 2 !== 0) this.fail(`NOT_PROPOSING_PERIOD`)
        if (!ALLOWED_METADATA[this.variant].includes(op.metadata.type)) {
          this.fail(`UNSUPPORTED_METADATA`)
        }
        this.requirePositive(op.frozenTokens)
        if (op.frozenTokens > this.maxProposalSize) {
          this.fail(`PROPOSAL_TOO_LARGE`)
        }
        this.requireAvailable(ctx.sender, op.frozenTokens)

        const key = `p${this.counter}`
        this.counter += 1
        this.proposals.set(key, {
          key,
          proposer: ctx.sender,
          frozenTokens: op.frozenTokens,
          metadata: op.metadata,
          period,
          upvotes: 0n,
          downvotes: 0n,
          votes: [],
        })
        this.queue.push(key)
        this.add(this.staked, ctx.sender, op.frozenTokens)
        return []
      }

      case `vote`: {
        const proposal = this.proposals.get(op.proposalKey)
        if (!proposal) return this.fail(`PROPOSAL_NOT_EXIST`)
        if (this.period(ctx.level) !== proposal.period + 1) {
          this.fail(`VOTING_STAGE_OVER`)
        }
        this.requirePositive(op.amount)
        this.requireAvailable(ctx.sender, op.amount)

        if (op.upvote) proposal.upvotes += op.amount
        else proposal.downvotes += op.amount
        proposal.votes.push({
          voter: ctx.sender,
          upvote: op.upvote,
          amount: op.amount,
        })
        this.add(this.staked, ctx.sender, op.amount)
        return []
      }

      case `flush`:
        return this.flush(ctx, op.limit)

      case `drop_proposal`: {
        const proposal = this.proposals.get(op.proposalKey)
        if (!proposal) return this.fail(`PROPOSAL_NOT_EXIST`)
        if (ctx.sender !== this.guardian && ctx.sender !== proposal.proposer) {
          this.fail(`DROP_PROPOSAL_CONDITION_NOT_MET`)
        }
        this.unstake(proposal)
        return []
      }

      case `transfer_ownership`:
        if (ctx.sender !== this.admin) this.fail(`NOT_ADMIN`)
        this.pendingOwner = op.newOwner
        return []

      case `accept_ownership`:
        if (this.pendingOwner === null || ctx.sender !== this.pendingOwner) {
          this.fail(`NOT_PENDING_ADMIN`)
        }
        this.admin = ctx.sender
        this.pendingOwner = null
        return []

      case `default`:
        return []

      case `custom`: {
        if (this.variant !== `registry`) {
          throw ContractFailure.failwith(`UNKNOWN_ENTRYPOINT`)
        }
        const { key, viewer } = op.call
        return [
          {
            type: `call`,
            target: viewer,
            parameter: {
              type: `view`,
              value: [key, this.registry.get(key) ?? null],
            },
          },
        ]
      }
    }
  }

  private flush(
    ctx: CallContext,
    limit: number
  ): ReadonlyArray<InternalOperation> {
    const period = this.period(ctx.level)
    const ready: Array<MutableProposal> = []
    for (const key of this.queue) {
      if (ready.length >= limit) break
      const proposal = this.proposals.get(key)
      if (proposal && period >= proposal.period + 2) ready.push(proposal)
    }
    if (ready.length === 0) this.fail(`EMPTY_FLUSH`)

    const emitted: Array<InternalOperation> = []
    let spendable = ctx.balance

    for (const proposal of ready) {
      this.unstake(proposal)

      const accepted =
        proposal.upvotes >= this.quorum &&
        proposal.upvotes > proposal.downvotes

      if (!accepted) {
        const slash = proposal.frozenTokens / 2n
        if (slash > 0n) {
          this.add(this.frozen, proposal.proposer, -slash)
          emitted.push(this.tokenTransfer(ctx.self, BURN_ADDRESS, slash))
        }
        continue
      }

      const metadata = proposal.metadata
      switch (metadata.type) {
        case `noop`:
          break
        case `update_registry`:
          this.registry.set(metadata.key, metadata.value)
          break
        case `transfer_xtz`:
          if (spendable < metadata.amount) this.fail(`FAIL_DECISION`)
          spendable -= metadata.amount
          emitted.push({
            type: `transfer`,
            to: metadata.recipient,
            amount: metadata.amount,
          })
          break
        case `transfer_tokens`:
          emitted.push(
            this.tokenTransfer(ctx.self, metadata.recipient, metadata.amount)
          )
          break
      }
    }
    return emitted
  }

  private period(level: number): number {
    return Math.floor((level - this.startLevel) / this.periodLength)
  }

  private unstake(proposal: MutableProposal): void {
    this.add(this.staked, proposal.proposer, -proposal.frozenTokens)
    for (const v of proposal.votes) {
      this.add(this.staked, v.voter, -v.amount)
    }
    this.proposals.delete(proposal.key)
    this.queue = this.queue.filter((key) => key !== proposal.key)
  }

  private add(ledger: Map<Handle, bigint>, handle: Handle, delta: bigint): void {
    const value = (ledger.get(handle) ?? 0n) + delta
    if (value === 0n) ledger.delete(handle)
    else ledger.set(handle, value)
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) this.fail(`BAD_TOKEN_AMOUNT`)
  }

  private requireAvailable(handle: Handle, amount: bigint): void {
    const available =
      (this.frozen.get(handle) ?? 0n) - (this.staked.get(handle) ?? 0n)
    if (available < amount) this.fail(`NOT_ENOUGH_FROZEN_TOKENS`)
  }

  private tokenTransfer(
    from: Handle,
    to: Handle,
    amount: bigint
  ): InternalOperation {
    return {
      type: `call`,
      target: this.governanceToken,
      parameter: { type: `token_transfer`, transfers: [{ from, to, amount }] },
    }
  }

  private fail(code: DaoError): never {
    const pair = PAIR_ENCODED.has(code)
    const shape =
      this.encoding === `expression`
        ? pair
          ? `expression-pair`
          : `expression`
        : pair
          ? `pair`
          : `numeric`
    throw new ContractFailure(encodeFailure(daoErrors, code, shape, code))
  }
}
