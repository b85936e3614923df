import {
  BytesLike,
  decodeRlp,
  encodeRlp,
  getBytes,
  hexlify,
  keccak256,
  RlpStructuredData,
  toBeArray,
  toBigInt,
} from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { Bytes32 } from '../types'

/** The parts of a block header needed to trust state read from it */
export interface BlockHeader {
  hash: Bytes32
  parentHash: Bytes32
  stateRoot: Bytes32
  number: bigint
  timestamp: bigint
}

/** A block as returned by `eth_getBlockByNumber`/`eth_getBlockByHash` */
export interface BlockHeaderFields {
  parentHash: string
  sha3Uncles: string
  miner: string
  stateRoot: string
  transactionsRoot: string
  receiptsRoot: string
  logsBloom: string
  difficulty: string
  number: string
  gasLimit: string
  gasUsed: string
  timestamp: string
  extraData: string
  mixHash: string
  nonce: string
  baseFeePerGas?: string
  withdrawalsRoot?: string
  blobGasUsed?: string
  excessBlobGas?: string
  parentBeaconBlockRoot?: string
}

// Fields before London; later forks append to the list
const CANONICAL_FIELD_COUNT = 15

const PARENT_HASH = 0
const STATE_ROOT = 3
const NUMBER = 8
const TIMESTAMP = 11

const quantity = (value: string): bigint => (getBytes(value).length === 0 ? 0n : toBigInt(value))

function hash32(fields: RlpStructuredData[], index: number): Bytes32 {
  const field = fields[index]
  if (Array.isArray(field) || getBytes(field).length !== 32) {
    throw ledgerError(LedgerErrorCode.LE033, `Header field ${index} is not a 32 byte hash`)
  }
  return field
}

function scalar(fields: RlpStructuredData[], index: number): bigint {
  const field = fields[index]
  if (Array.isArray(field)) {
    throw ledgerError(LedgerErrorCode.LE033, `Header field ${index} is not a scalar`)
  }
  return quantity(field)
}

/**
 * Decodes an RLP-encoded block header after checking that it hashes to
 * `expectedBlockHash`. Nothing else about the header is validated: trust in
 * it comes entirely from the expected hash.
 */
export function decodeBlockHeader(headerRlp: BytesLike, expectedBlockHash: Bytes32): BlockHeader {
  let hash: Bytes32
  try {
    hash = keccak256(headerRlp)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE033, error)
  }
  if (hash !== expectedBlockHash.toLowerCase()) {
    throw ledgerError(
      LedgerErrorCode.LE032,
      `Header hashes to ${hash}, expected ${expectedBlockHash}`,
    )
  }

  let decoded: RlpStructuredData
  try {
    decoded = decodeRlp(headerRlp)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE033, error)
  }
  if (!Array.isArray(decoded) || decoded.length < CANONICAL_FIELD_COUNT) {
    throw ledgerError(
      LedgerErrorCode.LE033,
      `Header must be a list of at least ${CANONICAL_FIELD_COUNT} fields`,
    )
  }

  return {
    hash,
    parentHash: hash32(decoded, PARENT_HASH),
    stateRoot: hash32(decoded, STATE_ROOT),
    number: scalar(decoded, NUMBER),
    timestamp: scalar(decoded, TIMESTAMP),
  }
}

const encodeQuantity = (value: string): Uint8Array => toBeArray(BigInt(value))

/** RLP-encodes a header from its JSON-RPC representation */
export function encodeBlockHeader(fields: BlockHeaderFields): string {
  const items: Array<string | Uint8Array> = [
    fields.parentHash,
    fields.sha3Uncles,
    fields.miner,
    fields.stateRoot,
    fields.transactionsRoot,
    fields.receiptsRoot,
    fields.logsBloom,
    encodeQuantity(fields.difficulty),
    encodeQuantity(fields.number),
    encodeQuantity(fields.gasLimit),
    encodeQuantity(fields.gasUsed),
    encodeQuantity(fields.timestamp),
    fields.extraData,
    fields.mixHash,
    fields.nonce,
  ]
  const optional: Array<[string | undefined, boolean]> = [
    [fields.baseFeePerGas, true],
    [fields.withdrawalsRoot, false],
    [fields.blobGasUsed, true],
    [fields.excessBlobGas, true],
    [fields.parentBeaconBlockRoot, false],
  ]
  for (const [value, isQuantity] of optional) {
    if (value === undefined) {
      break
    }
    items.push(isQuantity ? encodeQuantity(value) : value)
  }
  return encodeRlp(items.map((item) => hexlify(item)))
}

export function blockHash(headerRlp: BytesLike): Bytes32 {
  return keccak256(headerRlp)
}
