/**
 * Validation of DAO values decoded from the HTTP transport.
 */

import { z } from "zod"
import type { DaoOperation, DaoStorage } from "./types"

const handle = z.string().min(1)

const metadataSchema = z.discriminatedUnion(`type`, [
  z.object({ type: z.literal(`noop`) }),
  z.object({
    type: z.literal(`update_registry`),
    key: z.string(),
    value: z.string(),
  }),
  z.object({
    type: z.literal(`transfer_xtz`),
    recipient: handle,
    amount: z.bigint(),
  }),
  z.object({
    type: z.literal(`transfer_tokens`),
    recipient: handle,
    amount: z.bigint(),
  }),
])

const envelope = {
  sender: handle,
  advance: z.number().int().min(0).optional(),
}

export const daoOperationSchema = z.discriminatedUnion(`kind`, [
  z.object({
    ...envelope,
    kind: z.literal(`propose`),
    frozenTokens: z.bigint(),
    metadata: metadataSchema,
  }),
  z.object({
    ...envelope,
    kind: z.literal(`vote`),
    proposalKey: z.string(),
    upvote: z.boolean(),
    amount: z.bigint(),
  }),
  z.object({ ...envelope, kind: z.literal(`freeze`), amount: z.bigint() }),
  z.object({ ...envelope, kind: z.literal(`unfreeze`), amount: z.bigint() }),
  z.object({
    ...envelope,
    kind: z.literal(`flush`),
    limit: z.number().int(),
  }),
  z.object({
    ...envelope,
    kind: z.literal(`drop_proposal`),
    proposalKey: z.string(),
  }),
  z.object({
    ...envelope,
    kind: z.literal(`transfer_ownership`),
    newOwner: handle,
  }),
  z.object({ ...envelope, kind: z.literal(`accept_ownership`) }),
  z.object({ ...envelope, kind: z.literal(`default`), amount: z.bigint() }),
  z.object({
    ...envelope,
    kind: z.literal(`custom`),
    call: z.object({
      entrypoint: z.literal(`lookup_registry`),
      key: z.string(),
      viewer: handle,
    }),
  }),
])

const proposalSchema = z.object({
  key: z.string(),
  proposer: handle,
  frozenTokens: z.bigint(),
  metadata: metadataSchema,
  period: z.number().int(),
  upvotes: z.bigint(),
  downvotes: z.bigint(),
  votes: z.array(
    z.object({ voter: handle, upvote: z.boolean(), amount: z.bigint() })
  ),
})

export const daoStorageSchema = z.object({
  variant: z.enum([`base`, `registry`, `treasury`]),
  admin: handle,
  pendingOwner: handle.nullable(),
  guardian: handle,
  governanceToken: handle,
  startLevel: z.number().int().min(0),
  config: z.object({
    periodLength: z.number().int().min(1),
    quorum: z.bigint(),
    maxProposalSize: z.bigint(),
  }),
  frozen: z.record(z.string(), z.bigint()),
  staked: z.record(z.string(), z.bigint()),
  proposals: z.record(z.string(), proposalSchema),
  proposalQueue: z.array(z.string()),
  proposalCounter: z.number().int().min(0),
  registry: z.record(z.string(), z.string()),
})

/**
 * @throws ZodError when the value is not a DAO operation
 */
export function parseDaoOperation(value: unknown): DaoOperation {
  return daoOperationSchema.parse(value)
}

/**
 * @throws ZodError when the value is not DAO storage
 */
export function parseDaoStorage(value: unknown): DaoStorage {
  return daoStorageSchema.parse(value)
}
