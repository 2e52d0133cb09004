/**
 * Rendering, comparison and divergence reports.
 */

import { describe, expect, it } from "vitest"
import {
  CollaboratorFaultError,
  checkBalance,
  checkOutcome,
  compareObservables,
  createDivergenceReport,
  formatDivergenceReport,
  render,
  structurallyEqual,
} from "../src/index"
import type {
  EntitySnapshot,
  Handle,
  ObservableSet,
  TrackedEntity,
} from "../src/index"

function observables(
  overrides: Partial<ObservableSet<unknown, string>> = {},
  entities: Array<[Handle, EntitySnapshot]> = [
    [`KT1-a`, { storage: [], balance: 0n }],
    [`KT1-b`, { storage: [], balance: 0n }],
  ]
): ObservableSet<unknown, string> {
  return {
    outcome: { ok: true, storage: { count: 1 } },
    balance: 10n,
    entities: new Map(entities),
    ...overrides,
  }
}

const tracked: Array<TrackedEntity> = [
  { name: `a`, handle: `KT1-a`, label: `token contract` },
  { name: `b`, handle: `KT1-b` },
]

describe(`render`, () => {
  it(`sorts object keys and omits undefined properties`, () => {
    expect(render({ b: 1, a: `x`, c: undefined })).toBe(
      `{\n  "a": "x",\n  "b": 1\n}`
    )
  })

  it(`indents nested values`, () => {
    expect(render({ a: [1, 2] })).toBe(`{\n  "a": [\n    1,\n    2\n  ]\n}`)
  })

  it(`distinguishes bigints from numbers`, () => {
    expect(render(5n)).toBe(`5n`)
    expect(render(5)).toBe(`5`)
    expect(structurallyEqual(5n, 5)).toBe(false)
  })

  it(`sorts map entries`, () => {
    const map = new Map([
      [`b`, 1],
      [`a`, 2],
    ])
    expect(render(map)).toBe(`Map {\n  "a" => 2,\n  "b" => 1\n}`)
  })

  it(`renders empty collections inline`, () => {
    expect(render([])).toBe(`[]`)
    expect(render({})).toBe(`{}`)
    expect(render(new Set())).toBe(`Set []`)
  })

  it(`renders negative zero and null`, () => {
    expect(render(-0)).toBe(`-0`)
    expect(render(null)).toBe(`null`)
  })

  it(`marks circular references`, () => {
    const node: { self?: unknown } = {}
    node.self = node
    expect(render(node)).toBe(`{\n  "self": [Circular]\n}`)
  })

  it(`treats objects with the same content as equal`, () => {
    expect(structurallyEqual({ x: [1n], y: `a` }, { y: `a`, x: [1n] })).toBe(
      true
    )
  })
})

describe(`compareObservables`, () => {
  it(`returns nothing when every field agrees`, () => {
    expect(
      compareObservables(observables(), observables(), tracked)
    ).toBeUndefined()
  })

  it(`is idempotent`, () => {
    const model = observables()
    const system = observables({ balance: 11n })
    const first = compareObservables(model, system, tracked)
    const second = compareObservables(model, system, tracked)
    expect(second).toEqual(first)
  })

  it(`reports a balance mismatch as the single cause`, () => {
    const mismatch = compareObservables(
      observables(),
      observables({ balance: 12n }),
      tracked
    )
    expect(mismatch).toEqual({
      check: { type: `balance` },
      field: `primary balance`,
      model: `10n`,
      system: `12n`,
    })
  })

  it(`checks the outcome before the balance`, () => {
    const mismatch = compareObservables(
      observables({ outcome: { ok: false, error: `NOT_ADMIN` } }),
      observables({ balance: 99n }),
      tracked
    )
    expect(mismatch?.field).toBe(`primary outcome`)
    expect(mismatch?.model).toBe(`Error: NOT_ADMIN`)
    expect(mismatch?.system).toBe(`{\n  "count": 1\n}`)
  })

  it(`checks every entity storage before any entity balance`, () => {
    const system = observables({}, [
      [`KT1-a`, { storage: [], balance: 5n }],
      [`KT1-b`, { storage: [`x`], balance: 0n }],
    ])
    const mismatch = compareObservables(observables(), system, tracked)
    expect(mismatch).toEqual({
      check: { type: `entity-storage`, entity: `b` },
      field: `b storage`,
      model: `[]`,
      system: `[\n  "x"\n]`,
    })
  })

  it(`labels entity checks with the entity label`, () => {
    const system = observables({}, [
      [`KT1-a`, { storage: [], balance: 5n }],
      [`KT1-b`, { storage: [], balance: 0n }],
    ])
    const mismatch = compareObservables(observables(), system, tracked)
    expect(mismatch?.check).toEqual({ type: `entity-balance`, entity: `a` })
    expect(mismatch?.field).toBe(`token contract balance`)
  })

  it(`exposes each check on its own`, () => {
    const model = observables({ outcome: { ok: false, error: `E` } })
    const system = observables({ balance: 1n })
    expect(checkBalance(model, system)?.field).toBe(`primary balance`)
    expect(checkOutcome(model, model)).toBeUndefined()
  })

  it(`throws a collaborator fault when an entity snapshot is missing`, () => {
    const system = observables({}, [[`KT1-a`, { storage: [], balance: 0n }]])
    let error: unknown
    try {
      compareObservables(observables(), system, tracked)
    } catch (err) {
      error = err
    }
    expect(error).toBeInstanceOf(CollaboratorFaultError)
    expect(error).toMatchObject({ code: `MISSING_ENTITY` })
  })
})

describe(`formatDivergenceReport`, () => {
  it(`names the step, the operation and both values`, () => {
    const report = createDivergenceReport(
      {
        check: { type: `balance` },
        field: `primary balance`,
        model: `10n`,
        system: `12n`,
      },
      3,
      { kind: `vote`, sender: `tz1-alice` }
    )
    expect(formatDivergenceReport(report)).toBe(
      [
        `━━ Divergence at step 3: primary balance differs ━━`,
        `* Operation:`,
        `{\n  "kind": "vote",\n  "sender": "tz1-alice"\n}`,
        `━━ Model primary balance ━━`,
        `10n`,
        `━━ System primary balance ━━`,
        `12n`,
      ].join(`\n`)
    )
  })
})
