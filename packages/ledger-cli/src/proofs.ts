import { z } from 'zod'
import { isAddress, isHexString, toBeHex, toBigInt } from 'ethers'
import {
  curatorSignalSlot,
  CuratorSignalLayout,
  decodeBlockHeader,
  encodeBlockHeader,
  verifyAccountProof,
  verifyStorageProof,
} from '@stakebridge/ledger-common'
import { DisplayRow } from './command-helpers'
import { BlockFields } from './headers'

const hex = () => z.string().refine((value) => isHexString(value), { message: 'Must be hex' })
const bytes32 = () =>
  z.string().refine((value) => isHexString(value, 32), { message: 'Must be 32 bytes' })
const address = () =>
  z.string().refine((value) => isAddress(value), { message: 'Invalid address' })

/**
 * A block and an `eth_getProof` response for an account at that block.
 * `curator` with `subgraphId`, or a raw `slot`, select the storage slot to
 * verify.
 */
export const ProofFile = z
  .object({
    block: BlockFields.extend({ hash: bytes32() }),
    address: address(),
    accountProof: z.array(hex()).min(1),
    storageProof: z
      .array(
        z.object({
          key: hex(),
          value: hex().optional(),
          proof: z.array(hex()),
        }),
      )
      .default([]),
    curator: address().optional(),
    subgraphId: bytes32().optional(),
    slot: bytes32().optional(),
  })
  .refine((file) => (file.curator === undefined) === (file.subgraphId === undefined), {
    message: 'curator and subgraphId must be given together',
  })
export type ProofFile = z.infer<typeof ProofFile>

// Keys come back from nodes as quantities, not always padded to 32 bytes
const normalizeSlot = (key: string): string => toBeHex(toBigInt(key), 32)

function selectedSlot(file: ProofFile, layout: CuratorSignalLayout): string | undefined {
  if (file.curator !== undefined && file.subgraphId !== undefined) {
    return curatorSignalSlot(file.curator, file.subgraphId, layout)
  }
  return file.slot === undefined ? undefined : normalizeSlot(file.slot)
}

/** Verifies the header, the account and the selected slot, in that order */
export function verifyProofFile(file: ProofFile, layout: CuratorSignalLayout): DisplayRow {
  const header = decodeBlockHeader(encodeBlockHeader(file.block), file.block.hash)
  const account = verifyAccountProof(header.stateRoot, file.address, file.accountProof)
  const result: DisplayRow = {
    blockNumber: header.number.toString(),
    stateRoot: header.stateRoot,
    address: file.address,
    nonce: account.nonce.toString(),
    balance: account.balance.toString(),
    storageRoot: account.storageRoot,
    codeHash: account.codeHash,
  }

  const slot = selectedSlot(file, layout)
  if (slot === undefined) {
    return result
  }
  const entry = file.storageProof.find((proof) => normalizeSlot(proof.key) === slot)
  if (!entry) {
    throw new Error(`No storage proof for slot ${slot}`)
  }
  const value = verifyStorageProof(account.storageRoot, slot, entry.proof)
  return { ...result, slot, value: value.toString() }
}
