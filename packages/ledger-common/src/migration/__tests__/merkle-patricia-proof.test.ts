import { decodeRlp, encodeRlp, keccak256, RlpStructuredData, toBeArray, toBeHex } from 'ethers'
import { LedgerErrorCode } from '../../errors'
import { catchLedgerError } from '../../__tests__/util'
import { decodeCompactPath, toNibbles, verifyProof } from '../merkle-patricia-proof'
import { TestTrie } from './trie'

// Short keys and values keep every node but the root embedded in its parent
const smallTrie = () =>
  new TestTrie().put('0x1234', '0x0a').put('0x1256', '0x0b').put('0x7890', '0x0c')

const largeTrie = () => {
  const trie = new TestTrie()
  for (let i = 1; i <= 32; i++) {
    trie.put(keccak256(toBeHex(i, 32)), encodeRlp(toBeArray(BigInt(i * 1000))))
  }
  return trie
}

function child(node: RlpStructuredData, index: number): RlpStructuredData {
  if (!Array.isArray(node)) {
    throw new Error('Not a list')
  }
  return node[index]
}

describe('Merkle-Patricia proofs', () => {
  test('Splits bytes into nibbles', () => {
    expect(toNibbles(new Uint8Array([0x12, 0xab]))).toEqual([1, 2, 10, 11])
  })

  test.each([
    ['0x20', [], true],
    ['0x1a', [10], false],
    ['0x3abc', [10, 11, 12], true],
    ['0x00ab', [10, 11], false],
  ])('Decodes compact path %s', (encoded, nibbles, isLeaf) => {
    expect(decodeCompactPath(encoded)).toEqual({ nibbles, isLeaf })
  })

  test.each(['0x4a', '0x0a', '0x'])('Rejects compact path %s', (encoded) => {
    expect(catchLedgerError(() => decodeCompactPath(encoded)).code).toEqual(
      LedgerErrorCode.LE037,
    )
  })

  test('Proves keys through embedded nodes', () => {
    const trie = smallTrie()
    expect(trie.proof('0x1234')).toHaveLength(1)
    expect(verifyProof(trie.root, '0x1234', trie.proof('0x1234'))).toEqual('0x0a')
    expect(verifyProof(trie.root, '0x1256', trie.proof('0x1256'))).toEqual('0x0b')
    expect(verifyProof(trie.root, '0x7890', trie.proof('0x7890'))).toEqual('0x0c')
  })

  test('Accepts embedded nodes repeated in the proof', () => {
    const trie = smallTrie()
    const [rootNode] = trie.proof('0x1234')
    const extension = child(decodeRlp(rootNode), 1)
    const branch = child(extension, 1)
    const leaf = child(branch, 3)
    const proof = [rootNode, encodeRlp(extension), encodeRlp(branch), encodeRlp(leaf)]

    expect(verifyProof(trie.root, '0x1234', proof)).toEqual('0x0a')
  })

  test('Proves keys through hashed nodes', () => {
    const trie = largeTrie()
    const key = keccak256(toBeHex(7, 32))
    const proof = trie.proof(key)

    expect(proof.length).toBeGreaterThan(1)
    expect(verifyProof(trie.root, key, proof)).toEqual(encodeRlp(toBeArray(7000n)))
  })

  test.each(['0x1299', '0x5555', '0x1234ff'])('Fails for the absent key %s', (key) => {
    const trie = smallTrie()
    expect(catchLedgerError(() => verifyProof(trie.root, key, trie.proof(key))).code).toEqual(
      LedgerErrorCode.LE036,
    )
  })

  test('Fails for an absent key in a large trie', () => {
    const trie = largeTrie()
    const key = keccak256(toBeHex(33, 32))
    expect(catchLedgerError(() => verifyProof(trie.root, key, trie.proof(key))).code).toEqual(
      LedgerErrorCode.LE036,
    )
  })

  test('Fails against another root', () => {
    const trie = smallTrie()
    const other = new TestTrie().put('0x1234', '0x0a')
    expect(
      catchLedgerError(() => verifyProof(other.root, '0x1234', trie.proof('0x1234'))).code,
    ).toEqual(LedgerErrorCode.LE034)
  })

  test('Fails on a tampered inner node', () => {
    const trie = largeTrie()
    const key = keccak256(toBeHex(7, 32))
    const proof = trie.proof(key)
    const node = proof[1]
    proof[1] = node.slice(0, -2) + (node.endsWith('00') ? '01' : '00')

    expect(catchLedgerError(() => verifyProof(trie.root, key, proof)).code).toEqual(
      LedgerErrorCode.LE035,
    )
  })

  test('Fails on nodes left over after the leaf', () => {
    const trie = smallTrie()
    const proof = [...trie.proof('0x1234'), '0xc0']
    expect(catchLedgerError(() => verifyProof(trie.root, '0x1234', proof)).code).toEqual(
      LedgerErrorCode.LE037,
    )
  })

  test('Fails on a node that is not a list', () => {
    expect(catchLedgerError(() => verifyProof(keccak256('0x05'), '0x12', ['0x05'])).code).toEqual(
      LedgerErrorCode.LE037,
    )
  })

  test('Fails on a proof that ends early', () => {
    const trie = largeTrie()
    const key = keccak256(toBeHex(7, 32))
    const proof = trie.proof(key).slice(0, 1)
    expect(catchLedgerError(() => verifyProof(trie.root, key, proof)).code).toEqual(
      LedgerErrorCode.LE036,
    )
  })
})
