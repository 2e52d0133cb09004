/**
 * Error Catalogs
 *
 * A domain's error taxonomy is a finite set of names, each tagged with the
 * number the system under test raises for it. The numeric tag lets a code
 * round-trip through opaque wire encodings.
 *
 * @example
 * ```typescript
 * const errors = defineErrorCodes({
 *   NOT_ADMIN: 100,
 *   EMPTY_FLUSH: 130,
 * } as const)
 *
 * type DaoError = ErrorCodeOf<typeof errors> // `NOT_ADMIN` | `EMPTY_FLUSH`
 * errors.fromNumeric(130) // `EMPTY_FLUSH`
 * ```
 */

export interface ErrorCatalog<E extends string> {
  readonly codes: Readonly<Record<E, number>>
  /** Every code, in ascending numeric order */
  readonly all: ReadonlyArray<E>
  toNumeric: (code: E) => number
  /** Look up a numeric tag; `undefined` when the catalog has no such tag */
  fromNumeric: (value: number | bigint) => E | undefined
}

export type ErrorCodeOf<C> = C extends ErrorCatalog<infer E> ? E : never

export function defineErrorCodes<E extends string>(
  codes: Readonly<Record<E, number>>
): ErrorCatalog<E> {
  const byNumber = new Map<number, E>()
  const isCode = (key: string): key is E =>
    Object.prototype.hasOwnProperty.call(codes, key)

  for (const code of Object.keys(codes).filter(isCode)) {
    const value = codes[code]
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(
        `Error code ${code} must be a non-negative integer, got ${value}`
      )
    }
    const existing = byNumber.get(value)
    if (existing !== undefined) {
      throw new Error(
        `Error codes ${existing} and ${code} share the numeric tag ${value}`
      )
    }
    byNumber.set(value, code)
  }

  const all = [...byNumber.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, code]) => code)

  return {
    codes,
    all,
    toNumeric: (code) => codes[code],
    fromNumeric: (value) => {
      if (typeof value === `bigint`) {
        if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
          return undefined
        }
        return byNumber.get(Number(value))
      }
      return Number.isSafeInteger(value) ? byNumber.get(value) : undefined
    },
  }
}
