/**
 * DAO Sequence Generator
 *
 * Draws operation sequences from a seed. The generator knows nothing of
 * the DAO's rules beyond what makes a sequence interesting: it guesses
 * proposal keys from the proposals it has emitted and advances the clock
 * often enough for proposals to reach voting and flushing.
 */

import { z } from "zod"
import {
  SeededRandom,
  createGeneratorAdapter,
  generatorConfigSchema,
} from "@lockstep/engine"
import type { Handle, Sequence, SequenceGenerator } from "@lockstep/engine"
import type {
  DaoEnvironment,
  DaoOperation,
  OperationBase,
  ProposalMetadata,
} from "./types"

// =============================================================================
// Handles
// =============================================================================

export const DAO_HANDLE: Handle = `KT1-dao`
export const GOVERNANCE_TOKEN_HANDLE: Handle = `KT1-governance-token`
export const VIEW_CONSUMER_HANDLE: Handle = `KT1-view-consumer`
export const GUARDIAN_HANDLE: Handle = `tz1-guardian`
export const ADMIN_HANDLE: Handle = `tz1-admin`

export function accountHandle(index: number): Handle {
  return `tz1-account-${index}`
}

const REGISTRY_KEYS = [`alpha`, `beta`, `gamma`]

// =============================================================================
// Configuration
// =============================================================================

export const daoGeneratorConfigSchema = generatorConfigSchema.extend({
  variant: z.enum([`base`, `registry`, `treasury`]).default(`base`),
  /** Share of operations that are proposals */
  proposalWeight: z.number().min(0).max(1).default(0.2),
  periodLength: z.number().int().min(1).default(5),
  quorum: z.number().int().min(0).default(3),
  maxProposalSize: z.number().int().min(1).default(10),
  /** Member accounts sending operations */
  accounts: z.number().int().min(2).max(8).default(3),
  /** Largest clock advance attached to one operation */
  maxAdvance: z.number().int().min(0).default(6),
})

export type DaoGeneratorConfig = z.output<typeof daoGeneratorConfigSchema>

// =============================================================================
// Generator
// =============================================================================

type DaoSequence = Sequence<DaoOperation, DaoEnvironment>

export const daoSequenceGenerator: SequenceGenerator<
  DaoOperation,
  DaoEnvironment,
  DaoGeneratorConfig
> = {
  generate(seed, config): DaoSequence {
    const rng = new SeededRandom(seed)

    const accounts = Array.from({ length: config.accounts }, (_, i) =>
      accountHandle(i + 1)
    )
    const environment: DaoEnvironment = {
      variant: config.variant,
      config: {
        periodLength: config.periodLength,
        quorum: BigInt(config.quorum),
        maxProposalSize: BigInt(config.maxProposalSize),
      },
      dao: DAO_HANDLE,
      admin: ADMIN_HANDLE,
      guardian: GUARDIAN_HANDLE,
      governanceToken: GOVERNANCE_TOKEN_HANDLE,
      viewConsumer: VIEW_CONSUMER_HANDLE,
      accounts,
    }

    const draw = new OperationDraw(rng, environment, config)
    const operations: Array<DaoOperation> = []
    for (let i = 0; i < config.maxOperations; i++) {
      operations.push(draw.next())
    }

    return {
      seed,
      environment,
      startLevel: config.startLevel,
      operations,
    }
  },
}

export const daoGenerator = createGeneratorAdapter(
  daoSequenceGenerator,
  daoGeneratorConfigSchema
)

class OperationDraw {
  private proposals = 0

  constructor(
    private readonly rng: SeededRandom,
    private readonly env: DaoEnvironment,
    private readonly config: DaoGeneratorConfig
  ) {}

  next(): DaoOperation {
    const sender = this.sender()
    const advance =
      this.config.maxAdvance > 0 && this.rng.chance(0.4)
        ? this.rng.int(1, this.config.maxAdvance)
        : 0
    return this.operation(advance > 0 ? { sender, advance } : { sender })
  }

  private operation(base: OperationBase): DaoOperation {
    const rng = this.rng

    if (rng.chance(this.config.proposalWeight)) {
      this.proposals++
      return {
        ...base,
        kind: `propose`,
        frozenTokens: this.tokens(),
        metadata: this.metadata(),
      }
    }

    const roll = rng.next()
    if (roll < 0.25) {
      return { ...base, kind: `freeze`, amount: this.tokens() }
    }
    if (roll < 0.5) {
      return {
        ...base,
        kind: `vote`,
        proposalKey: this.proposalKey(),
        upvote: rng.chance(0.6),
        amount: this.tokens(),
      }
    }
    if (roll < 0.6) {
      return { ...base, kind: `unfreeze`, amount: this.tokens() }
    }
    if (roll < 0.7) {
      return { ...base, kind: `flush`, limit: rng.int(0, 3) }
    }
    if (roll < 0.76) {
      return { ...base, kind: `drop_proposal`, proposalKey: this.proposalKey() }
    }
    if (roll < 0.81) {
      return {
        ...base,
        kind: `transfer_ownership`,
        newOwner: rng.pick(this.env.accounts),
      }
    }
    if (roll < 0.86) {
      return { ...base, kind: `accept_ownership` }
    }
    if (roll < 0.93) {
      return { ...base, kind: `default`, amount: rng.bigint(0n, 50n) }
    }
    return {
      ...base,
      kind: `custom`,
      call: {
        entrypoint: `lookup_registry`,
        key: rng.pick(REGISTRY_KEYS),
        viewer: this.env.viewConsumer,
      },
    }
  }

  private sender(): Handle {
    const roll = this.rng.next()
    if (roll < 0.08) return this.env.admin
    if (roll < 0.14) return this.env.guardian
    return this.rng.pick(this.env.accounts)
  }

  /** Mostly valid amounts, sometimes zero or too large */
  private tokens(): bigint {
    return this.rng.bigint(0n, this.env.config.maxProposalSize + 2n)
  }

  /** A key that probably exists, or one past the last */
  private proposalKey(): string {
    return `p${this.rng.int(0, this.proposals)}`
  }

  private metadata(): ProposalMetadata {
    const rng = this.rng
    switch (rng.int(0, 3)) {
      case 0:
        return { type: `noop` }
      case 1:
        return {
          type: `update_registry`,
          key: rng.pick(REGISTRY_KEYS),
          value: rng.string(4),
        }
      case 2:
        return {
          type: `transfer_xtz`,
          recipient: rng.pick(this.env.accounts),
          amount: rng.bigint(0n, 600n),
        }
      default:
        return {
          type: `transfer_tokens`,
          recipient: rng.pick(this.env.accounts),
          amount: rng.bigint(1n, 20n),
        }
    }
  }
}
