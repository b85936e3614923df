import { BytesLike, decodeRlp, encodeRlp, getBytes, hexlify, keccak256, RlpStructuredData } from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'

/**
 * Merkle-Patricia trie inclusion proofs.
 *
 * A proof is the list of RLP-encoded nodes on the path from the root to the
 * leaf holding the key. Nodes are referenced by their keccak256 hash, except
 * children whose encoding is shorter than 32 bytes, which are embedded in
 * their parent. Only membership is proven: any proof of absence fails.
 */

type NodeRef = { hash: string } | { node: RlpStructuredData }

const BRANCH_NODE_LENGTH = 17
const SHORT_NODE_LENGTH = 2

export function toNibbles(bytes: Uint8Array): number[] {
  const nibbles: number[] = []
  for (const byte of bytes) {
    nibbles.push(byte >> 4, byte & 0x0f)
  }
  return nibbles
}

/**
 * Decodes the hex-prefix encoded path of an extension or leaf node. The
 * high nibble of the first byte flags a leaf (2) and an odd length (1).
 */
export function decodeCompactPath(encoded: string): { nibbles: number[]; isLeaf: boolean } {
  const nibbles = toNibbles(getBytes(encoded))
  if (nibbles.length === 0) {
    throw ledgerError(LedgerErrorCode.LE037, 'Empty node path')
  }
  const flag = nibbles[0]
  if (flag > 3) {
    throw ledgerError(LedgerErrorCode.LE037, `Invalid node path prefix ${flag}`)
  }
  const odd = (flag & 1) === 1
  if (!odd && nibbles[1] !== 0) {
    throw ledgerError(LedgerErrorCode.LE037, 'Invalid node path padding')
  }
  return { nibbles: nibbles.slice(odd ? 1 : 2), isLeaf: (flag & 2) === 2 }
}

function decodeNode(raw: string): RlpStructuredData {
  try {
    return decodeRlp(raw)
  } catch (error) {
    throw ledgerError(LedgerErrorCode.LE037, error)
  }
}

function childRef(child: RlpStructuredData): NodeRef {
  if (Array.isArray(child)) {
    return { node: child }
  }
  const length = getBytes(child).length
  if (length === 0) {
    throw ledgerError(LedgerErrorCode.LE036, 'Empty child reference')
  }
  if (length !== 32) {
    throw ledgerError(LedgerErrorCode.LE037, `Child reference of ${length} bytes`)
  }
  return { hash: child }
}

function leafValue(value: RlpStructuredData): string {
  if (Array.isArray(value)) {
    throw ledgerError(LedgerErrorCode.LE037, 'Node value is not a byte string')
  }
  if (getBytes(value).length === 0) {
    throw ledgerError(LedgerErrorCode.LE036, 'Empty node value')
  }
  return value
}

/**
 * Returns the value stored at `key` in the trie with root `rootHash`, as hex.
 * `key` is used as given; callers hash it first where the trie is secure.
 */
export function verifyProof(rootHash: BytesLike, key: BytesLike, proof: BytesLike[]): string {
  const root = hexlify(rootHash).toLowerCase()
  const path = toNibbles(getBytes(key))
  const nodes = proof.map((node) => hexlify(node))

  let ref: NodeRef = { hash: root }
  let position = 0
  let index = 0

  for (;;) {
    let node: RlpStructuredData
    if ('hash' in ref) {
      if (index >= nodes.length) {
        throw ledgerError(LedgerErrorCode.LE036, 'Proof ended before reaching the key')
      }
      const raw = nodes[index]
      if (keccak256(raw) !== ref.hash.toLowerCase()) {
        throw ledgerError(
          index === 0 ? LedgerErrorCode.LE034 : LedgerErrorCode.LE035,
          `Node ${index} does not hash to ${ref.hash}`,
        )
      }
      node = decodeNode(raw)
      index += 1
    } else {
      node = ref.node
      // Some proofs repeat embedded nodes as separate elements
      if (index < nodes.length && nodes[index] === encodeRlp(node)) {
        index += 1
      }
    }

    if (!Array.isArray(node)) {
      throw ledgerError(LedgerErrorCode.LE037, 'Trie node is not a list')
    }

    let value: string | undefined
    if (node.length === BRANCH_NODE_LENGTH) {
      if (position === path.length) {
        value = leafValue(node[16])
      } else {
        ref = childRef(node[path[position]])
        position += 1
      }
    } else if (node.length === SHORT_NODE_LENGTH) {
      const encodedPath = node[0]
      if (Array.isArray(encodedPath)) {
        throw ledgerError(LedgerErrorCode.LE037, 'Node path is not a byte string')
      }
      const { nibbles, isLeaf } = decodeCompactPath(encodedPath)
      const segment = path.slice(position, position + nibbles.length)
      if (segment.length !== nibbles.length || segment.some((n, i) => n !== nibbles[i])) {
        throw ledgerError(LedgerErrorCode.LE036, 'Key diverges from the proof path')
      }
      position += nibbles.length
      if (isLeaf) {
        if (position !== path.length) {
          throw ledgerError(LedgerErrorCode.LE036, 'Leaf path is shorter than the key')
        }
        value = leafValue(node[1])
      } else {
        ref = childRef(node[1])
      }
    } else {
      throw ledgerError(LedgerErrorCode.LE037, `Trie node with ${node.length} items`)
    }

    if (value !== undefined) {
      if (index < nodes.length) {
        throw ledgerError(
          LedgerErrorCode.LE037,
          `${nodes.length - index} unused nodes after the leaf`,
        )
      }
      return value
    }
  }
}
