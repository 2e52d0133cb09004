/**
 * Error Normalizer
 *
 * Maps failure payloads raised by a system under test into the error
 * catalog the reference model uses, so both outcomes are comparable.
 *
 * Rules, in priority order:
 * 1. A single numeric code maps through the catalog.
 * 2. A pair maps its first element through rule 1.
 * 3. Anything else is a normalization fault, which aborts the run.
 *
 * Both rules apply to values raised directly (`failwith`) and to
 * wire-encoded expressions (`{ int }`, `{ prim: "Pair", args }`).
 */

import { NormalizationFaultError } from "./errors"
import type { ErrorCatalog } from "./error-codes"
import type { Expression, RawFailure } from "./types"

export interface ErrorNormalizer<E extends string> {
  /**
   * Normalize a raw failure.
   * @throws NormalizationFaultError when the payload has no known shape
   */
  normalize: (failure: RawFailure) => E
}

export interface ErrorNormalizerOptions<E extends string> {
  /**
   * Map a transport failure (a thrown submission, such as a timeout) to a
   * code. Returning `undefined` leaves it a normalization fault.
   */
  onTransportFailure?: (error: unknown) => E | undefined
}

/**
 * Create a normalizer for the given catalog.
 */
export function createErrorNormalizer<E extends string>(
  catalog: ErrorCatalog<E>,
  options: ErrorNormalizerOptions<E> = {}
): ErrorNormalizer<E> {
  const lookup = (value: number | bigint, failure: RawFailure): E => {
    const code = catalog.fromNumeric(value)
    if (code === undefined) {
      throw new NormalizationFaultError(failure, `unknown error code ${value}`)
    }
    return code
  }

  return {
    normalize(failure) {
      switch (failure.kind) {
        case `failwith`: {
          const numeric = numericValue(failure.value)
          if (numeric !== undefined) return lookup(numeric, failure)

          const first = pairHead(failure.value)
          const firstNumeric =
            first === undefined ? undefined : numericValue(first)
          if (firstNumeric !== undefined) return lookup(firstNumeric, failure)

          throw new NormalizationFaultError(failure, `unrecognized value`)
        }

        case `expression`: {
          const numeric = expressionInt(failure.expression)
          if (numeric !== undefined) return lookup(numeric, failure)

          const first = expressionPairHead(failure.expression)
          const firstNumeric =
            first === undefined ? undefined : expressionInt(first)
          if (firstNumeric !== undefined) return lookup(firstNumeric, failure)

          throw new NormalizationFaultError(failure, `unrecognized expression`)
        }

        case `transport`: {
          const code = options.onTransportFailure?.(failure.error)
          if (code !== undefined) return code
          throw new NormalizationFaultError(failure, `transport failure`)
        }
      }
    },
  }
}

// =============================================================================
// Shape Recognition
// =============================================================================

function numericValue(value: unknown): number | bigint | undefined {
  if (typeof value === `bigint`) return value
  if (typeof value === `number` && Number.isInteger(value)) return value
  return undefined
}

function pairHead(value: unknown): unknown {
  if (Array.isArray(value) && value.length >= 2) {
    const head: unknown = value[0]
    return head
  }
  return undefined
}

function expressionInt(expression: Expression): bigint | undefined {
  if (isArray(expression) || !(`int` in expression)) return undefined
  return /^-?\d+$/.test(expression.int) ? BigInt(expression.int) : undefined
}

function expressionPairHead(expression: Expression): Expression | undefined {
  // Right-combed sequences encode pairs too: [a, b, ...]
  if (isArray(expression)) {
    return expression.length >= 2 ? expression[0] : undefined
  }
  if (`prim` in expression && expression.prim === `Pair`) {
    const args = expression.args ?? []
    return args.length >= 2 ? args[0] : undefined
  }
  return undefined
}

function isArray(
  expression: Expression
): expression is ReadonlyArray<Expression> {
  return Array.isArray(expression)
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Shapes in which a system may raise an error code.
 */
export type FailureShape = `numeric` | `pair` | `expression` | `expression-pair`

/**
 * Encode an error code as a raw failure of the given shape.
 * Systems under test and tests use this to raise codes the normalizer reads.
 */
export function encodeFailure<E extends string>(
  catalog: ErrorCatalog<E>,
  code: E,
  shape: FailureShape,
  detail = ``
): RawFailure {
  const value = catalog.toNumeric(code)
  switch (shape) {
    case `numeric`:
      return { kind: `failwith`, value }
    case `pair`:
      return { kind: `failwith`, value: [value, detail] }
    case `expression`:
      return { kind: `expression`, expression: { int: String(value) } }
    case `expression-pair`:
      return {
        kind: `expression`,
        expression: {
          prim: `Pair`,
          args: [{ int: String(value) }, { string: detail }],
        },
      }
  }
}
