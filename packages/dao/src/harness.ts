/**
 * DAO Differential Suite
 *
 * Wires the DAO's generator, reference model and normalizer to a fresh
 * sandbox per run. The sandbox gets the same auxiliary contracts the model
 * tracks: a governance token that records transfers and a consumer that
 * receives registry lookups.
 */

import {
  createModelState,
  createSystemExecutor,
  runSeed,
  runSeeds,
} from "@lockstep/engine"
import { createSandboxClient, daoCustomDispatch } from "./client"
import { daoNormalizer } from "./errors"
import { daoGenerator } from "./generator"
import { daoModel } from "./model"
import {
  ConsumerContract,
  DaoContract,
  Sandbox,
  TokenContract,
} from "./sandbox"
import type {
  BatchOptions,
  BatchResult,
  DifferentialSuite,
  ModelState,
  RunSetup,
  SeedRunOptions,
  SeedRunResult,
  Sequence,
  TrackedEntity,
  UnsupportedPolicy,
} from "@lockstep/engine"
import type { DaoError } from "./errors"
import type { DaoGeneratorConfig } from "./generator"
import type { DaoContractOptions, FailureEncoding } from "./sandbox"
import type {
  DaoEnvironment,
  DaoOperation,
  DaoStorage,
  DaoVariant,
} from "./types"

/**
 * Balance the registry and treasury DAOs are originated with.
 */
export const DAO_INITIAL_FUNDS = 500n

/**
 * Balance every account starts with, enough for plain transfers.
 */
export const ACCOUNT_BOOTSTRAP = 1_000_000n

export type DaoSequence = Sequence<DaoOperation, DaoEnvironment>

export interface DaoRunOptions {
  /** @default "skip" */
  unsupported?: UnsupportedPolicy
  /** How the sandbox DAO raises errors */
  encoding?: FailureEncoding
  /** Fault injection for the sandbox DAO */
  mutate?: DaoContractOptions[`mutate`]
  /** Funding sent to each sender before its operation */
  fundingAmount?: bigint
  /** Frozen tokens and registry entries present at origination */
  genesis?: Partial<Pick<DaoStorage, `frozen` | `registry`>>
}

export function initialFunds(variant: DaoVariant): bigint {
  return variant === `base` ? 0n : DAO_INITIAL_FUNDS
}

/**
 * Storage of a freshly originated DAO.
 */
export function createDaoStorage(
  env: DaoEnvironment,
  startLevel: number,
  genesis: DaoRunOptions[`genesis`] = {}
): DaoStorage {
  return {
    variant: env.variant,
    admin: env.admin,
    pendingOwner: null,
    guardian: env.guardian,
    governanceToken: env.governanceToken,
    startLevel,
    config: env.config,
    frozen: genesis.frozen ?? {},
    staked: {},
    proposals: {},
    proposalQueue: [],
    proposalCounter: 0,
    registry: genesis.registry ?? {},
  }
}

export function trackedEntities(env: DaoEnvironment): Array<TrackedEntity> {
  return [
    {
      name: `governance`,
      handle: env.governanceToken,
      label: `governance contract`,
    },
    { name: `view`, handle: env.viewConsumer, label: `view contract` },
  ]
}

/**
 * Model state matching a freshly set up sandbox.
 */
export function createDaoModelState(
  sequence: DaoSequence,
  genesis?: DaoRunOptions[`genesis`]
): ModelState<DaoStorage> {
  const env = sequence.environment
  return createModelState({
    self: env.dao,
    storage: createDaoStorage(env, sequence.startLevel, genesis),
    balance: initialFunds(env.variant),
    level: sequence.startLevel,
    entities: [
      [env.governanceToken, { storage: [], balance: 0n }],
      [env.viewConsumer, { storage: [], balance: 0n }],
    ],
  })
}

/**
 * Provision a sandbox and matching model state for one sequence.
 */
export function setupDaoRun(
  sequence: DaoSequence,
  options: DaoRunOptions = {}
): RunSetup<DaoOperation, DaoStorage> {
  const env = sequence.environment
  const sandbox = new Sandbox(sequence.startLevel)

  sandbox.originate(new TokenContract(env.governanceToken))
  sandbox.originate(new ConsumerContract(env.viewConsumer))
  const dao = sandbox.originate(
    new DaoContract(
      env.dao,
      createDaoStorage(env, sequence.startLevel, options.genesis),
      { encoding: options.encoding, mutate: options.mutate }
    ),
    initialFunds(env.variant)
  )
  for (const account of [env.admin, env.guardian, ...env.accounts]) {
    sandbox.credit(account, ACCOUNT_BOOTSTRAP)
  }

  return {
    initialState: createDaoModelState(sequence, options.genesis),
    system: createSystemExecutor({
      client: createSandboxClient({ sandbox, dao }),
      custom: daoCustomDispatch(env.variant),
      unsupported: options.unsupported,
      fundingAmount: options.fundingAmount,
    }),
    tracked: trackedEntities(env),
  }
}

export type DaoSuite = DifferentialSuite<
  DaoOperation,
  DaoEnvironment,
  DaoStorage,
  DaoError,
  DaoGeneratorConfig
>

export function createDaoSuite(options: DaoRunOptions = {}): DaoSuite {
  return {
    name: `dao`,
    generator: daoGenerator,
    model: daoModel,
    normalizer: daoNormalizer,
    setup: (sequence) => Promise.resolve(setupDaoRun(sequence, options)),
  }
}

export function runDaoSeed(
  seed: number,
  options: DaoRunOptions & SeedRunOptions = {}
): Promise<SeedRunResult<DaoOperation, DaoEnvironment, DaoStorage>> {
  return runSeed(createDaoSuite(options), seed, options)
}

export function runDaoSeeds(
  options: DaoRunOptions & BatchOptions
): Promise<BatchResult<DaoOperation, DaoEnvironment, DaoStorage>> {
  return runSeeds(createDaoSuite(options), options)
}
