/**
 * Sandbox chain and the DAO contract running in it.
 */

import { describe, expect, it } from "vitest"
import {
  BURN_ADDRESS,
  ContractFailure,
  DAO_HANDLE,
  DaoContract,
  GOVERNANCE_TOKEN_HANDLE,
  Sandbox,
  TokenContract,
  VIEW_CONSUMER_HANDLE,
  createSandboxClient,
  daoNormalizer,
  setupDaoRun,
} from "../src/index"
import { ALICE, BOB, GENESIS, sequence } from "./fixtures"
import type {
  CallContext,
  Contract,
  ContractParameter,
  DaoRunOptions,
  DaoVariant,
  InternalOperation,
} from "../src/index"

function deploy(
  variant: DaoVariant = `base`,
  options: Omit<DaoRunOptions, `genesis`> = {}
) {
  const setup = setupDaoRun(sequence([], variant), {
    ...options,
    genesis: GENESIS,
  })
  return setup.system.client
}

describe(`Sandbox`, () => {
  it(`rolls back every contract when an internal operation fails`, () => {
    const sandbox = new Sandbox()
    const token = sandbox.originate(new TokenContract(GOVERNANCE_TOKEN_HANDLE))

    class Forwarder implements Contract {
      readonly handle = `KT1-forwarder`
      storage(): unknown {
        return null
      }
      execute(
        _ctx: CallContext,
        parameter: ContractParameter
      ): ReadonlyArray<InternalOperation> {
        return [
          { type: `call`, target: GOVERNANCE_TOKEN_HANDLE, parameter },
          { type: `call`, target: `KT1-nowhere`, parameter },
        ]
      }
      save(): () => void {
        return () => {}
      }
    }
    sandbox.originate(new Forwarder())
    sandbox.credit(ALICE, 10n)

    const result = sandbox.call(
      ALICE,
      `KT1-forwarder`,
      {
        type: `token_transfer`,
        transfers: [{ from: ALICE, to: BOB, amount: 1n }],
      },
      4n
    )
    expect(result).toEqual({
      ok: false,
      failure: { kind: `failwith`, value: `UNKNOWN_CONTRACT` },
    })
    expect(token.storage()).toEqual([])
    expect(sandbox.balanceOf(ALICE)).toBe(10n)
    expect(sandbox.balanceOf(`KT1-forwarder`)).toBe(0n)
  })

  it(`refuses transfers beyond the sender's balance`, () => {
    const sandbox = new Sandbox()
    sandbox.originate(new TokenContract(GOVERNANCE_TOKEN_HANDLE))
    const result = sandbox.call(
      ALICE,
      GOVERNANCE_TOKEN_HANDLE,
      { type: `token_transfer`, transfers: [] },
      1n
    )
    expect(result).toEqual({
      ok: false,
      failure: { kind: `failwith`, value: `BALANCE_TOO_LOW` },
    })
  })

  it(`only moves the level forward`, () => {
    const sandbox = new Sandbox(3)
    sandbox.advance(2)
    expect(sandbox.level).toBe(5)
    expect(() => sandbox.advance(-1)).toThrow(`Cannot advance the level by -1`)
  })

  it(`reports failures from contracts`, () => {
    const failure = new ContractFailure({ kind: `failwith`, value: 1 })
    expect(failure.failure).toEqual({ kind: `failwith`, value: 1 })
    expect(failure.name).toBe(`ContractFailure`)
  })
})

describe(`DaoContract`, () => {
  it(`records token transfers made by the DAO`, async () => {
    const client = deploy()
    await client.submit({ kind: `freeze`, sender: ALICE, amount: 3n })
    expect(await client.getEntityStorage(GOVERNANCE_TOKEN_HANDLE)).toEqual([
      { from: ALICE, to: DAO_HANDLE, amount: 3n },
    ])
    expect((await client.getStorage()).frozen).toEqual({
      [ALICE]: 13n,
      [BOB]: 10n,
    })
  })

  it(`raises numeric codes, and pairs for ownership errors`, async () => {
    const client = deploy()
    expect(
      await client.submit({ kind: `freeze`, sender: ALICE, amount: 0n })
    ).toEqual({ ok: false, failure: { kind: `failwith`, value: 102 } })
    expect(
      await client.submit({
        kind: `transfer_ownership`,
        sender: ALICE,
        newOwner: BOB,
      })
    ).toEqual({
      ok: false,
      failure: { kind: `failwith`, value: [100, `NOT_ADMIN`] },
    })
  })

  it(`raises wire-encoded expressions when asked to`, async () => {
    const client = deploy(`base`, { encoding: `expression` })
    const flush = await client.submit({
      kind: `flush`,
      sender: ALICE,
      limit: 1,
    })
    expect(flush).toEqual({
      ok: false,
      failure: { kind: `expression`, expression: { int: `130` } },
    })
    const accept = await client.submit({
      kind: `accept_ownership`,
      sender: BOB,
    })
    expect(accept).toEqual({
      ok: false,
      failure: {
        kind: `expression`,
        expression: {
          prim: `Pair`,
          args: [{ int: `101` }, { string: `NOT_PENDING_ADMIN` }],
        },
      },
    })
    if (!accept.ok) {
      expect(daoNormalizer.normalize(accept.failure)).toBe(`NOT_PENDING_ADMIN`)
    }
  })

  it(`leaves storage untouched when a flush decision fails`, async () => {
    const client = deploy(`treasury`)
    await client.submit({
      kind: `propose`,
      sender: ALICE,
      frozenTokens: 3n,
      metadata: { type: `transfer_xtz`, recipient: BOB, amount: 600n },
    })
    await client.advanceLevel(5)
    await client.submit({
      kind: `vote`,
      sender: BOB,
      proposalKey: `p0`,
      upvote: true,
      amount: 3n,
    })
    await client.advanceLevel(5)
    const before = await client.getStorage()

    const result = await client.submit({
      kind: `flush`,
      sender: ALICE,
      limit: 1,
    })
    expect(result).toEqual({
      ok: false,
      failure: { kind: `failwith`, value: 140 },
    })
    expect(await client.getStorage()).toEqual(before)
    expect(await client.getBalance(DAO_HANDLE)).toBe(500n)
  })

  it(`slashes rejected proposals into the burn address`, async () => {
    const client = deploy()
    await client.submit({
      kind: `propose`,
      sender: ALICE,
      frozenTokens: 5n,
      metadata: { type: `noop` },
    })
    await client.advanceLevel(10)
    expect(
      await client.submit({ kind: `flush`, sender: BOB, limit: 2 })
    ).toEqual({ ok: true })
    expect(await client.getEntityStorage(GOVERNANCE_TOKEN_HANDLE)).toEqual([
      { from: DAO_HANDLE, to: BURN_ADDRESS, amount: 2n },
    ])
  })

  it(`applies the mutation hook after successful operations`, async () => {
    const client = deploy(`base`, {
      mutate: (kind, storage) =>
        kind === `freeze` ? { ...storage, proposalCounter: 99 } : storage,
    })
    await client.submit({ kind: `freeze`, sender: ALICE, amount: 0n })
    expect((await client.getStorage()).proposalCounter).toBe(0)
    await client.submit({ kind: `freeze`, sender: ALICE, amount: 1n })
    expect((await client.getStorage()).proposalCounter).toBe(99)
  })

  it(`sends registry lookups to the viewer`, async () => {
    const client = deploy(`registry`)
    await client.submit({
      kind: `custom`,
      sender: ALICE,
      call: {
        entrypoint: `lookup_registry`,
        key: `alpha`,
        viewer: VIEW_CONSUMER_HANDLE,
      },
    })
    expect(await client.getEntityStorage(VIEW_CONSUMER_HANDLE)).toEqual([
      [`alpha`, null],
    ])
  })
})

describe(`createSandboxClient`, () => {
  it(`rejects handles the sandbox does not know`, async () => {
    const sandbox = new Sandbox()
    const dao = setupDaoRun(sequence([])).system.client
    const client = createSandboxClient({
      sandbox,
      dao: new DaoContract(DAO_HANDLE, await dao.getStorage()),
    })
    await expect(client.getBalance(`KT1-unknown`)).rejects.toMatchObject({
      code: `UNRESOLVABLE_HANDLE`,
    })
    await expect(
      client.getEntityStorage(GOVERNANCE_TOKEN_HANDLE)
    ).rejects.toMatchObject({ code: `UNRESOLVABLE_HANDLE` })
  })
})
