/**
 * Error catalogs and failure normalization.
 */

import { describe, expect, it } from "vitest"
import * as fc from "fast-check"
import {
  NormalizationFaultError,
  createErrorNormalizer,
  defineErrorCodes,
  encodeFailure,
} from "../src/index"
import type { FailureShape, RawFailure } from "../src/index"

const catalog = defineErrorCodes({
  EMPTY_FLUSH: 130,
  NOT_ADMIN: 100,
  BAD_TOKEN_AMOUNT: 102,
} as const)

const normalizer = createErrorNormalizer(catalog)

const SHAPES: Array<FailureShape> = [
  `numeric`,
  `pair`,
  `expression`,
  `expression-pair`,
]

function normalizeError(failure: RawFailure): unknown {
  try {
    normalizer.normalize(failure)
  } catch (err) {
    return err
  }
  return undefined
}

describe(`defineErrorCodes`, () => {
  it(`lists codes in ascending numeric order`, () => {
    expect(catalog.all).toEqual([`NOT_ADMIN`, `BAD_TOKEN_AMOUNT`, `EMPTY_FLUSH`])
  })

  it(`looks up numbers and bigints`, () => {
    expect(catalog.fromNumeric(130)).toBe(`EMPTY_FLUSH`)
    expect(catalog.fromNumeric(102n)).toBe(`BAD_TOKEN_AMOUNT`)
    expect(catalog.fromNumeric(7)).toBeUndefined()
    expect(catalog.fromNumeric(-1n)).toBeUndefined()
    expect(catalog.toNumeric(`NOT_ADMIN`)).toBe(100)
  })

  it(`rejects duplicate tags`, () => {
    expect(() => defineErrorCodes({ A: 1, B: 1 })).toThrow(
      `Error codes A and B share the numeric tag 1`
    )
  })

  it(`rejects negative and fractional tags`, () => {
    expect(() => defineErrorCodes({ A: -1 })).toThrow(
      `Error code A must be a non-negative integer, got -1`
    )
    expect(() => defineErrorCodes({ A: 1.5 })).toThrow(
      `Error code A must be a non-negative integer, got 1.5`
    )
  })
})

describe(`createErrorNormalizer`, () => {
  it(`maps every code back from every shape`, () => {
    for (const code of catalog.all) {
      for (const shape of SHAPES) {
        const failure = encodeFailure(catalog, code, shape, `detail`)
        expect(normalizer.normalize(failure)).toBe(code)
      }
    }
  })

  it(`maps any pair whose head is a known code`, () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...catalog.all),
        fc.anything(),
        (code, detail) => {
          const failure: RawFailure = {
            kind: `failwith`,
            value: [catalog.toNumeric(code), detail],
          }
          return normalizer.normalize(failure) === code
        }
      ),
      { numRuns: 100 }
    )
  })

  it(`accepts bigint codes`, () => {
    expect(normalizer.normalize({ kind: `failwith`, value: 130n })).toBe(
      `EMPTY_FLUSH`
    )
  })

  it(`accepts right-combed sequences as pairs`, () => {
    expect(
      normalizer.normalize({
        kind: `expression`,
        expression: [{ int: `100` }, { string: `x` }, { string: `y` }],
      })
    ).toBe(`NOT_ADMIN`)
  })

  it(`faults on an unknown numeric code`, () => {
    const error = normalizeError({ kind: `failwith`, value: 999 })
    expect(error).toBeInstanceOf(NormalizationFaultError)
    expect(error).toMatchObject({
      message: `Unexpected failure (unknown error code 999): failwith 999`,
    })
  })

  it(`faults on unrecognized shapes`, () => {
    const shapes: Array<RawFailure> = [
      { kind: `failwith`, value: `NOT_ADMIN` },
      { kind: `failwith`, value: [100] },
      { kind: `failwith`, value: { code: 100 } },
      { kind: `failwith`, value: 1.5 },
      { kind: `expression`, expression: { string: `100` } },
      { kind: `expression`, expression: { prim: `Unit` } },
      { kind: `expression`, expression: { prim: `Pair`, args: [{ int: `1` }] } },
    ]
    for (const failure of shapes) {
      expect(normalizeError(failure)).toBeInstanceOf(NormalizationFaultError)
    }
  })

  it(`faults on transport failures unless mapped`, () => {
    const failure: RawFailure = { kind: `transport`, error: new Error(`reset`) }
    expect(normalizeError(failure)).toMatchObject({
      message: `Unexpected failure (transport failure): transport Error: reset`,
    })

    const mapping = createErrorNormalizer(catalog, {
      onTransportFailure: () => `EMPTY_FLUSH`,
    })
    expect(mapping.normalize(failure)).toBe(`EMPTY_FLUSH`)
  })
})
