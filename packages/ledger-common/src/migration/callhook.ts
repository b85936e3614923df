import { Address, toAddress } from '@graphprotocol/common-ts'
import { AbiCoder, BytesLike, Result, toBeHex } from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { Bytes32 } from '../types'

/** What the counterpart sends along with the curated tokens of a subgraph */
export interface SubgraphMigrationMessage {
  subgraphId: Bytes32
  owner: Address
  lockBlockHash: Bytes32
  nSignal: bigint
  reserveRatio: number
  metadata: Bytes32
}

const CALLHOOK_TYPES = ['uint256', 'address', 'bytes32', 'uint256', 'uint32', 'bytes32']

export function encodeMigrationCallhook(message: SubgraphMigrationMessage): string {
  return AbiCoder.defaultAbiCoder().encode(CALLHOOK_TYPES, [
    message.subgraphId,
    message.owner,
    message.lockBlockHash,
    message.nSignal,
    message.reserveRatio,
    message.metadata,
  ])
}

export function decodeMigrationCallhook(data: BytesLike): SubgraphMigrationMessage {
  let values: Result
  try {
    values = AbiCoder.defaultAbiCoder().decode(CALLHOOK_TYPES, data)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE004, error)
  }
  const [subgraphId, owner, lockBlockHash, nSignal, reserveRatio, metadata] = values.toArray()
  return {
    subgraphId: toBeHex(BigInt(subgraphId), 32),
    owner: toAddress(String(owner)),
    lockBlockHash: String(lockBlockHash),
    nSignal: BigInt(nSignal),
    reserveRatio: Number(reserveRatio),
    metadata: String(metadata),
  }
}
