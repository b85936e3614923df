import {
  AbiCoder,
  BytesLike,
  decodeRlp,
  encodeRlp,
  getBytes,
  keccak256,
  RlpStructuredData,
  toBeHex,
  toBigInt,
} from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { Bytes32 } from '../types'
import { verifyProof } from './merkle-patricia-proof'

export interface AccountState {
  nonce: bigint
  balance: bigint
  storageRoot: Bytes32
  codeHash: Bytes32
}

/** The account and storage proofs submitted together for one storage slot */
export interface StorageSlotProof {
  accountProof: string[]
  storageProof: string[]
}

const quantity = (value: string): bigint => (getBytes(value).length === 0 ? 0n : toBigInt(value))

function asBytes(item: RlpStructuredData | undefined, what: string): string {
  if (item === undefined || Array.isArray(item)) {
    throw ledgerError(LedgerErrorCode.LE037, `${what} is not a byte string`)
  }
  return item
}

function asList(item: RlpStructuredData | undefined, what: string): RlpStructuredData[] {
  if (item === undefined || !Array.isArray(item)) {
    throw ledgerError(LedgerErrorCode.LE004, `${what} is not a list`)
  }
  return item
}

function decodeAccount(encoded: string): AccountState {
  let fields: RlpStructuredData
  try {
    fields = decodeRlp(encoded)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE037, error)
  }
  if (!Array.isArray(fields) || fields.length !== 4) {
    throw ledgerError(LedgerErrorCode.LE037, 'Account is not a list of four items')
  }
  const [nonce, balance, storageRoot, codeHash] = fields.map((field, i) =>
    asBytes(field, `Account field ${i}`),
  )
  return {
    nonce: quantity(nonce),
    balance: quantity(balance),
    storageRoot,
    codeHash,
  }
}

/** Proves the state of `address` against a state root */
export function verifyAccountProof(
  stateRoot: BytesLike,
  address: string,
  proof: BytesLike[],
): AccountState {
  return decodeAccount(verifyProof(stateRoot, keccak256(address), proof))
}

/** Proves the value of a storage `slot` against an account's storage root */
export function verifyStorageProof(storageRoot: BytesLike, slot: Bytes32, proof: BytesLike[]): bigint {
  const encoded = verifyProof(storageRoot, keccak256(slot), proof)
  let value: RlpStructuredData
  try {
    value = decodeRlp(encoded)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE037, error)
  }
  return quantity(asBytes(value, 'Storage value'))
}

/**
 * Splits a combined proof, the RLP list of the account proof nodes and the
 * storage proof nodes, into the encoded nodes of each.
 */
export function decodeStorageSlotProof(proofRlp: BytesLike): StorageSlotProof {
  let decoded: RlpStructuredData
  try {
    decoded = decodeRlp(proofRlp)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE004, error)
  }
  const parts = asList(decoded, 'Proof')
  if (parts.length !== 2) {
    throw ledgerError(LedgerErrorCode.LE004, `Proof has ${parts.length} parts, expected 2`)
  }
  const [accountNodes, storageNodes] = parts.map((part, i) =>
    // Nodes arrive decoded, hashing needs their encoding back
    asList(part, i === 0 ? 'Account proof' : 'Storage proof').map((node) => encodeRlp(node)),
  )
  return { accountProof: accountNodes, storageProof: storageNodes }
}

/** Verifies both proofs of a slot and returns the value held in it */
export function verifyStorageSlot(
  stateRoot: BytesLike,
  account: string,
  slot: Bytes32,
  proof: StorageSlotProof,
): bigint {
  const state = verifyAccountProof(stateRoot, account, proof.accountProof)
  return verifyStorageProof(state.storageRoot, slot, proof.storageProof)
}

export interface CuratorSignalLayout {
  subgraphsMappingSlot: number
  curatorSignalSlotOffset: number
}

/**
 * Storage slot of a curator's signal on a subgraph in the counterpart
 * contract: the subgraph's entry in the subgraphs mapping holds a struct
 * whose field at `curatorSignalSlotOffset` maps curators to signal.
 */
export function curatorSignalSlot(
  curator: string,
  subgraphId: Bytes32,
  layout: CuratorSignalLayout,
): Bytes32 {
  const coder = AbiCoder.defaultAbiCoder()
  const subgraphSlot = toBigInt(
    keccak256(coder.encode(['uint256', 'uint256'], [subgraphId, layout.subgraphsMappingSlot])),
  )
  const curatorMappingSlot = subgraphSlot + BigInt(layout.curatorSignalSlotOffset)
  return keccak256(coder.encode(['address', 'uint256'], [curator, toBeHex(curatorMappingSlot, 32)]))
}
