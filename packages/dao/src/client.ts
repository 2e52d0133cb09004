import { CollaboratorFaultError, UNSUPPORTED } from "@lockstep/engine"
import type { CustomDispatch, SystemClient } from "@lockstep/engine"
import type { DaoContract, Sandbox } from "./sandbox"
import type { DaoOperation, DaoStorage, DaoVariant } from "./types"

export interface SandboxClientOptions {
  sandbox: Sandbox
  /** The DAO, already originated in the sandbox */
  dao: DaoContract
}

/**
 * Drive a DAO deployed in a sandbox through the engine's client interface.
 */
export function createSandboxClient(
  options: SandboxClientOptions
): SystemClient<DaoOperation, DaoStorage> {
  const { sandbox, dao } = options

  return {
    self: dao.handle,

    advanceLevel(by) {
      sandbox.advance(by)
      return Promise.resolve()
    },

    fund(recipient, amount) {
      sandbox.credit(recipient, amount)
      return Promise.resolve()
    },

    submit(op) {
      const amount = op.kind === `default` ? op.amount : 0n
      return Promise.resolve(
        sandbox.call(op.sender, dao.handle, { type: `dao`, operation: op }, amount)
      )
    },

    getStorage() {
      return Promise.resolve(dao.storage())
    },

    getBalance(handle) {
      const balance = sandbox.balanceOf(handle)
      if (balance === undefined) {
        return Promise.reject(CollaboratorFaultError.unresolvableHandle(handle))
      }
      return Promise.resolve(balance)
    },

    getEntityStorage(handle) {
      const contract = sandbox.contract(handle)
      if (!contract) {
        return Promise.reject(CollaboratorFaultError.unresolvableHandle(handle))
      }
      return Promise.resolve(contract.storage())
    },
  }
}

/**
 * Custom entrypoints per variant: only the registry DAO defines one.
 */
export function daoCustomDispatch(
  variant: DaoVariant
): CustomDispatch<DaoOperation, DaoStorage> {
  return {
    handles: (op) => op.kind === `custom`,
    dispatch: (client, op) =>
      variant === `registry` ? client.submit(op) : Promise.resolve(UNSUPPORTED),
  }
}
