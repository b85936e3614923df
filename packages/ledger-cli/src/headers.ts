import { z } from 'zod'
import { isHexString } from 'ethers'
import {
  BlockHeader,
  blockHash,
  decodeBlockHeader,
  encodeBlockHeader,
} from '@stakebridge/ledger-common'
import { DisplayRow } from './command-helpers'

const hex = () => z.string().refine((value) => isHexString(value), { message: 'Must be hex' })

/** A block as returned by `eth_getBlockByHash`; other fields are ignored */
export const BlockFields = z.object({
  hash: hex().optional(),
  parentHash: hex(),
  sha3Uncles: hex(),
  miner: hex(),
  stateRoot: hex(),
  transactionsRoot: hex(),
  receiptsRoot: hex(),
  logsBloom: hex(),
  difficulty: hex(),
  number: hex(),
  gasLimit: hex(),
  gasUsed: hex(),
  timestamp: hex(),
  extraData: hex(),
  mixHash: hex(),
  nonce: hex(),
  baseFeePerGas: hex().optional(),
  withdrawalsRoot: hex().optional(),
  blobGasUsed: hex().optional(),
  excessBlobGas: hex().optional(),
  parentBeaconBlockRoot: hex().optional(),
})
export type BlockFields = z.infer<typeof BlockFields>

export interface HeaderInput {
  headerRlp: string
  hash?: string
}

/** Reads a header given either as RLP hex or as a JSON block */
export function parseHeaderInput(text: string): HeaderInput {
  if (isHexString(text)) {
    return { headerRlp: text }
  }
  const block = BlockFields.parse(JSON.parse(text))
  return { headerRlp: encodeBlockHeader(block), hash: block.hash }
}

/**
 * Decodes a header, checking it against `expectedHash`, else against the
 * hash in the input. Without either, the header's own hash is trusted.
 */
export function decodeHeaderInput(input: HeaderInput, expectedHash?: string): BlockHeader {
  return decodeBlockHeader(input.headerRlp, expectedHash ?? input.hash ?? blockHash(input.headerRlp))
}

export const formatHeader = (header: BlockHeader): DisplayRow => ({
  hash: header.hash,
  parentHash: header.parentHash,
  stateRoot: header.stateRoot,
  number: header.number.toString(),
  timestamp: header.timestamp.toString(),
})
