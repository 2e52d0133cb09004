/**
 * Sequence Generator Adapter
 *
 * Wraps a domain-specific generator behind a uniform interface: validate
 * the config, draw a sequence from a seed, and check the result respects
 * the config. Generators must be deterministic in their seed so a failing
 * run can be reproduced from it.
 */

import { z } from "zod"
import { CollaboratorFaultError } from "./errors"
import type { OperationEnvelope, Sequence } from "./types"

// =============================================================================
// Configuration
// =============================================================================

/**
 * Options every generator recognizes. Domains extend this schema.
 */
export const generatorConfigSchema = z.object({
  /** Maximum number of operations in a sequence */
  maxOperations: z.number().int().min(0).default(20),
  /** Clock value both systems start from */
  startLevel: z.number().int().min(0).default(0),
})

export type GeneratorConfig = z.output<typeof generatorConfigSchema>

// =============================================================================
// Generator Contract
// =============================================================================

/**
 * A domain-specific generator.
 */
export interface SequenceGenerator<
  Op extends OperationEnvelope,
  Env,
  C extends GeneratorConfig,
> {
  generate: (seed: number, config: C) => Sequence<Op, Env>
}

export interface GeneratorAdapter<
  Op extends OperationEnvelope,
  Env,
  C extends GeneratorConfig,
> {
  /**
   * Validate a raw config, applying defaults.
   * @throws CollaboratorFaultError with code `INVALID_CONFIG`
   */
  parseConfig: (raw?: unknown) => C
  /**
   * Draw a sequence.
   * @throws CollaboratorFaultError when the config is invalid or the
   * generator fails
   */
  generate: (seed: number, config?: unknown) => Sequence<Op, Env>
}

export function createGeneratorAdapter<
  Op extends OperationEnvelope,
  Env,
  C extends GeneratorConfig,
>(
  generator: SequenceGenerator<Op, Env, C>,
  schema: z.ZodType<C, z.ZodTypeDef, unknown>
): GeneratorAdapter<Op, Env, C> {
  function parseConfig(raw: unknown = {}): C {
    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(`.`) || `config`}: ${issue.message}`)
        .join(`; `)
      throw new CollaboratorFaultError(
        `Invalid generator config: ${issues}`,
        `INVALID_CONFIG`,
        parsed.error
      )
    }
    return parsed.data
  }

  return {
    parseConfig,

    generate(seed, raw) {
      if (!Number.isSafeInteger(seed)) {
        throw new CollaboratorFaultError(
          `Seed must be a safe integer, got ${seed}`,
          `INVALID_CONFIG`
        )
      }
      const config = parseConfig(raw)

      let sequence: Sequence<Op, Env>
      try {
        sequence = generator.generate(seed, config)
      } catch (error) {
        throw new CollaboratorFaultError(
          `Generator failed for seed ${seed}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          `GENERATOR_FAILURE`,
          error
        )
      }

      if (sequence.operations.length > config.maxOperations) {
        throw new CollaboratorFaultError(
          `Generator produced ${sequence.operations.length} operations, ` +
            `more than maxOperations (${config.maxOperations})`,
          `GENERATOR_FAILURE`
        )
      }
      return sequence
    },
  }
}
