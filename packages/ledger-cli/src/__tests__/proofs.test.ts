import { keccak256, toBeHex } from 'ethers'
import { curatorSignalSlot, StorageLayout } from '@stakebridge/ledger-common'
import { COUNTERPART, address } from '../../../ledger-common/src/__tests__/util'
import { headerFields, L1State } from '../../../ledger-common/src/migration/__tests__/l1-state'
import { ProofFile, verifyProofFile } from '../proofs'

const curator = address(0xc1)
const subgraphId = toBeHex(0x5b, 32)
const layout = StorageLayout.parse({})
const state = new L1State(COUNTERPART, [{ curator, subgraphId, signal: 1000n }], layout)
const slot = curatorSignalSlot(curator, subgraphId, layout)

const proofFile = {
  block: { ...headerFields(state.stateRoot), hash: state.blockHash },
  address: COUNTERPART,
  accountProof: state.accounts.proof(keccak256(COUNTERPART)),
  storageProof: [{ key: slot, proof: state.storage.proof(keccak256(slot)) }],
}

const account = {
  blockNumber: '16',
  stateRoot: state.stateRoot,
  address: COUNTERPART,
  nonce: '1',
  balance: '5000',
  storageRoot: state.storage.root,
  codeHash: keccak256('0x6080'),
}

describe('Proof files', () => {
  test('Verifies the account alone', () => {
    expect(verifyProofFile(ProofFile.parse(proofFile), layout)).toEqual(account)
  })

  test("Verifies a curator's signal", () => {
    const file = ProofFile.parse({ ...proofFile, curator, subgraphId })
    expect(verifyProofFile(file, layout)).toEqual({ ...account, slot, value: '1000' })
  })

  test('Verifies a raw slot', () => {
    const file = ProofFile.parse({ ...proofFile, slot })
    expect(verifyProofFile(file, layout)).toEqual({ ...account, slot, value: '1000' })
  })

  test('Fails without a storage proof for the slot', () => {
    const file = ProofFile.parse({ ...proofFile, storageProof: [], slot })
    expect(() => verifyProofFile(file, layout)).toThrow(`No storage proof for slot ${slot}`)
  })

  test('Requires curator and subgraph id together', () => {
    expect(ProofFile.safeParse({ ...proofFile, curator }).success).toBe(false)
  })
})
