/**
 * @lockstep/dao
 *
 * Differential testing of a governance DAO: a pure reference model, an
 * in-process sandbox chain running an independent implementation, and a
 * seeded generator of operation sequences.
 *
 * @example
 * ```typescript
 * import { runDaoSeeds } from '@lockstep/dao'
 * import { summarizeBatch } from '@lockstep/engine'
 *
 * const batch = await runDaoSeeds({ count: 50, baseSeed: 1, config: { variant: `registry` } })
 * console.log(summarizeBatch(`dao`, batch))
 * ```
 */

export type {
  AcceptOwnershipOperation,
  ConsumerStorage,
  CustomCall,
  CustomOperation,
  DaoConfig,
  DaoEnvironment,
  DaoOperation,
  DaoOperationKind,
  DaoStorage,
  DaoVariant,
  DefaultOperation,
  DropProposalOperation,
  FlushOperation,
  FreezeOperation,
  OperationBase,
  Proposal,
  ProposalMetadata,
  ProposeOperation,
  TokenStorage,
  TokenTransfer,
  TransferOwnershipOperation,
  UnfreezeOperation,
  Vote,
  VoteOperation,
} from "./types"
export { ALLOWED_METADATA, BURN_ADDRESS } from "./types"

export { daoErrors, daoNormalizer, type DaoError } from "./errors"

export {
  availableTokens,
  currentPeriod,
  daoModel,
  isAccepted,
  isFlushable,
  isProposingPeriod,
} from "./model"

export {
  ConsumerContract,
  ContractFailure,
  DaoContract,
  Sandbox,
  TokenContract,
  type CallContext,
  type Contract,
  type ContractParameter,
  type DaoContractOptions,
  type FailureEncoding,
  type InternalOperation,
} from "./sandbox"

export {
  createSandboxClient,
  daoCustomDispatch,
  type SandboxClientOptions,
} from "./client"

export {
  ADMIN_HANDLE,
  DAO_HANDLE,
  GOVERNANCE_TOKEN_HANDLE,
  GUARDIAN_HANDLE,
  VIEW_CONSUMER_HANDLE,
  accountHandle,
  daoGenerator,
  daoGeneratorConfigSchema,
  daoSequenceGenerator,
  type DaoGeneratorConfig,
} from "./generator"

export {
  daoOperationSchema,
  daoStorageSchema,
  parseDaoOperation,
  parseDaoStorage,
} from "./schemas"

export {
  ACCOUNT_BOOTSTRAP,
  DAO_INITIAL_FUNDS,
  createDaoModelState,
  createDaoStorage,
  createDaoSuite,
  initialFunds,
  runDaoSeed,
  runDaoSeeds,
  setupDaoRun,
  trackedEntities,
  type DaoRunOptions,
  type DaoSequence,
  type DaoSuite,
} from "./harness"
