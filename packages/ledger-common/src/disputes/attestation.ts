import { Address, toAddress } from '@graphprotocol/common-ts'
import {
  BytesLike,
  concat,
  dataSlice,
  getBytes,
  hexlify,
  keccak256,
  recoverAddress,
  Signature,
  toUtf8Bytes,
} from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { Bytes32 } from '../types'
import * as eip712 from './eip712'

const RECEIPT_TYPE_HASH = keccak256(
  toUtf8Bytes('Receipt(bytes32 requestCID,bytes32 responseCID,bytes32 subgraphDeploymentID)'),
)

export interface Receipt {
  requestCID: Bytes32
  responseCID: Bytes32
  subgraphDeploymentId: Bytes32
}

export interface Attestation extends Receipt {
  r: Bytes32
  s: Bytes32
  v: number
}

// requestCID, responseCID, subgraphDeploymentId, r, s: 32 bytes each; v: 1 byte
export const ATTESTATION_SIZE_BYTES = 161

export function decodeAttestation(data: BytesLike): Attestation {
  const bytes = getBytes(data)
  if (bytes.length !== ATTESTATION_SIZE_BYTES) {
    throw ledgerError(
      LedgerErrorCode.LE040,
      `Attestation is ${bytes.length} bytes, expected ${ATTESTATION_SIZE_BYTES}`,
    )
  }
  return {
    requestCID: dataSlice(bytes, 0, 32),
    responseCID: dataSlice(bytes, 32, 64),
    subgraphDeploymentId: dataSlice(bytes, 64, 96),
    r: dataSlice(bytes, 96, 128),
    s: dataSlice(bytes, 128, 160),
    v: bytes[160],
  }
}

export function encodeAttestation(attestation: Attestation): string {
  return concat([
    attestation.requestCID,
    attestation.responseCID,
    attestation.subgraphDeploymentId,
    attestation.r,
    attestation.s,
    hexlify(new Uint8Array([attestation.v])),
  ])
}

export const encodeReceipt = (receipt: Receipt): string =>
  eip712.hashStruct(
    RECEIPT_TYPE_HASH,
    ['bytes32', 'bytes32', 'bytes32'],
    [receipt.requestCID, receipt.responseCID, receipt.subgraphDeploymentId],
  )

/** The digest an indexer signs to attest to a query response */
export const receiptDigest = (receipt: Receipt, domain: eip712.EIP712Domain): string =>
  eip712.encode(eip712.domainSeparator(domain), encodeReceipt(receipt))

export function recoverAttestationSigner(
  attestation: Attestation,
  domain: eip712.EIP712Domain,
): Address {
  let signature: Signature
  try {
    signature = Signature.from({ r: attestation.r, s: attestation.s, v: attestation.v })
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE040, error)
  }
  return toAddress(recoverAddress(receiptDigest(attestation, domain), signature))
}

/** Two responses to the same request on the same deployment that disagree */
export const areConflicting = (a: Attestation, b: Attestation): boolean =>
  a.requestCID === b.requestCID &&
  a.subgraphDeploymentId === b.subgraphDeploymentId &&
  a.responseCID !== b.responseCID
