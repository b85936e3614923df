import { BytesLike } from 'ethers'
import {
  decodeAttestation,
  eip712,
  recoverAttestationSigner,
} from '@stakebridge/ledger-common'
import { DisplayRow } from './command-helpers'

/** The fields of an encoded attestation and, given a domain, its signer */
export function describeAttestation(data: BytesLike, domain?: eip712.EIP712Domain): DisplayRow {
  const attestation = decodeAttestation(data)
  const row: DisplayRow = {
    requestCID: attestation.requestCID,
    responseCID: attestation.responseCID,
    subgraphDeploymentId: attestation.subgraphDeploymentId,
    r: attestation.r,
    s: attestation.s,
    v: attestation.v,
  }
  if (domain) {
    row.signer = recoverAttestationSigner(attestation, domain)
  }
  return row
}
