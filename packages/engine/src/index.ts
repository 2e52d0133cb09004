/**
 * @lockstep/engine
 *
 * Differential model-based testing: apply a generated sequence of
 * operations to a reference model and to a real system, compare their
 * observables after every step, and stop at the first divergence with a
 * report naming the operation and the field that differ.
 *
 * This package provides:
 * - Type definitions for operations, outcomes and observables
 * - A generator adapter with zod-validated configuration
 * - Reference model and system-under-test executors
 * - An error normalizer for raw system failures
 * - A comparator and divergence reports
 * - The call loop, plus seed batches with bounded concurrency
 * - An HTTP transport for systems running in another process
 *
 * @example
 * ```typescript
 * import { runSeed, formatDivergenceReport } from '@lockstep/engine'
 *
 * const { result } = await runSeed(suite, 42)
 * if (result.status === `aborted` && result.reason.type === `divergence`) {
 *   console.log(formatDivergenceReport(result.reason.report))
 * }
 * ```
 */

// =============================================================================
// Core Types
// =============================================================================

export type {
  Balance,
  EntitySnapshot,
  EntityState,
  Expression,
  Handle,
  Level,
  ModelState,
  ObservableSet,
  OperationEnvelope,
  Outcome,
  RawFailure,
  Sequence,
  SubmitResult,
  TrackedEntity,
} from "./types"

// =============================================================================
// Errors
// =============================================================================

export {
  CollaboratorFaultError,
  NormalizationFaultError,
  TransportError,
  type CollaboratorFaultCode,
} from "./errors"

export {
  defineErrorCodes,
  type ErrorCatalog,
  type ErrorCodeOf,
} from "./error-codes"

export {
  createErrorNormalizer,
  encodeFailure,
  type ErrorNormalizer,
  type ErrorNormalizerOptions,
  type FailureShape,
} from "./normalize"

// =============================================================================
// Generation
// =============================================================================

export { SeededRandom } from "./random"

export {
  createGeneratorAdapter,
  generatorConfigSchema,
  type GeneratorAdapter,
  type GeneratorConfig,
  type SequenceGenerator,
} from "./generator"

// =============================================================================
// Executors
// =============================================================================

export {
  applyModel,
  createModelState,
  observeModel,
  updateEntity,
  type ModelStateInit,
  type ModelStep,
  type ModelTransition,
  type ReferenceModel,
} from "./model"

export {
  UNSUPPORTED,
  createSystemExecutor,
  noCustomOperations,
  type CustomDispatch,
  type SystemClient,
  type SystemExecutor,
  type SystemExecutorOptions,
  type SystemStep,
  type Unsupported,
  type UnsupportedPolicy,
} from "./system"

// =============================================================================
// Comparison
// =============================================================================

export { render, structurallyEqual } from "./render"

export {
  checkBalance,
  checkEntityBalance,
  checkEntityStorage,
  checkOutcome,
  compareObservables,
  type CheckId,
  type Mismatch,
} from "./compare"

export {
  createDivergenceReport,
  formatDivergenceReport,
  type DivergenceReport,
} from "./report"

// =============================================================================
// Running
// =============================================================================

export {
  runDifferential,
  type AbortReason,
  type RunOptions,
  type RunResult,
  type StepEvent,
} from "./orchestrator"

export {
  runSeed,
  runSeeds,
  summarizeBatch,
  type BatchOptions,
  type BatchResult,
  type DifferentialSuite,
  type RunSetup,
  type SeedRunOptions,
  type SeedRunResult,
} from "./suite"

// =============================================================================
// Transport
// =============================================================================

export { deserialize, serialize } from "./serialize"

export {
  createHttpSystemClient,
  createSystemHttpHandler,
  createSystemServer,
  type ErrorResponse,
  type HttpSystemClientOptions,
  type SystemHttpHandlerOptions,
  type SystemServerOptions,
} from "./http"
