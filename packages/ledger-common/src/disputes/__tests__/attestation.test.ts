import { toAddress } from '@graphprotocol/common-ts'
import { computeAddress, toBeHex, TypedDataEncoder } from 'ethers'
import { LedgerErrorCode } from '../../errors'
import { catchLedgerError } from '../../__tests__/util'
import {
  areConflicting,
  ATTESTATION_SIZE_BYTES,
  decodeAttestation,
  encodeAttestation,
  Receipt,
  receiptDigest,
  recoverAttestationSigner,
} from '../attestation'
import { signAttestation, testDomain } from './sign'

const domain = testDomain

const receipt: Receipt = {
  requestCID: toBeHex(1, 32),
  responseCID: toBeHex(2, 32),
  subgraphDeploymentId: toBeHex(3, 32),
}

const privateKey = '0x' + '01'.repeat(32)

describe('Attestations', () => {
  test('Digests receipts as EIP-712 typed data', () => {
    const expected = TypedDataEncoder.hash(
      domain,
      {
        Receipt: [
          { name: 'requestCID', type: 'bytes32' },
          { name: 'responseCID', type: 'bytes32' },
          { name: 'subgraphDeploymentID', type: 'bytes32' },
        ],
      },
      {
        requestCID: receipt.requestCID,
        responseCID: receipt.responseCID,
        subgraphDeploymentID: receipt.subgraphDeploymentId,
      },
    )
    expect(receiptDigest(receipt, domain)).toEqual(expected)
  })

  test('Recovers the signer', () => {
    const attestation = signAttestation(privateKey, receipt)
    expect(recoverAttestationSigner(attestation, domain)).toEqual(
      toAddress(computeAddress(privateKey)),
    )
  })

  test('A signature under another domain recovers someone else', () => {
    const attestation = signAttestation(privateKey, receipt, { ...domain, chainId: 5 })
    expect(recoverAttestationSigner(attestation, domain)).not.toEqual(
      toAddress(computeAddress(privateKey)),
    )
  })

  test('Encodes attestations to 161 bytes', () => {
    const attestation = signAttestation(privateKey, receipt)
    const encoded = encodeAttestation(attestation)
    expect(encoded).toHaveLength(2 + 2 * ATTESTATION_SIZE_BYTES)
    expect(decodeAttestation(encoded)).toEqual(attestation)
  })

  test('Rejects attestations of the wrong size', () => {
    const encoded = encodeAttestation(signAttestation(privateKey, receipt))
    expect(catchLedgerError(() => decodeAttestation(encoded.slice(0, -2))).code).toEqual(
      LedgerErrorCode.LE040,
    )
  })

  test('Rejects an invalid recovery id', () => {
    const attestation = { ...signAttestation(privateKey, receipt), v: 5 }
    expect(catchLedgerError(() => recoverAttestationSigner(attestation, domain)).code).toEqual(
      LedgerErrorCode.LE040,
    )
  })

  test('Conflicting attestations answer the same request differently', () => {
    const a = signAttestation(privateKey, receipt)
    const b = signAttestation(privateKey, { ...receipt, responseCID: toBeHex(4, 32) })
    const c = signAttestation(privateKey, { ...receipt, subgraphDeploymentId: toBeHex(5, 32) })
    expect(areConflicting(a, b)).toBe(true)
    expect(areConflicting(a, a)).toBe(false)
    expect(areConflicting(b, c)).toBe(false)
  })
})
