import { Address } from '@graphprotocol/common-ts'
import { AbiCoder, concat, keccak256, solidityPackedKeccak256, toUtf8Bytes } from 'ethers'

export const EIP712_DOMAIN_TYPE_HASH = keccak256(
  toUtf8Bytes(
    'EIP712Domain(string name,string version,uint256 chainId,address verifyingContract,bytes32 salt)',
  ),
)

export interface EIP712Domain {
  name: string
  version: string
  chainId: number
  verifyingContract: Address
  salt: string
}

const encodeData = (types: string[], data: unknown[]): string =>
  AbiCoder.defaultAbiCoder().encode(types, data)

export const hashStruct = (typeHash: string, types: string[], data: unknown[]): string =>
  solidityPackedKeccak256(['bytes32', 'bytes'], [typeHash, encodeData(types, data)])

// Strings are hashed before encoding, as EIP-712 requires for dynamic types
export const domainSeparator = (domain: EIP712Domain): string =>
  hashStruct(
    EIP712_DOMAIN_TYPE_HASH,
    ['bytes32', 'bytes32', 'uint256', 'address', 'bytes32'],
    [
      keccak256(toUtf8Bytes(domain.name)),
      keccak256(toUtf8Bytes(domain.version)),
      domain.chainId,
      domain.verifyingContract,
      domain.salt,
    ],
  )

/** The digest that is signed for `message` under `domainSeparator` */
export const encode = (domainSeparator: string, message: string): string =>
  keccak256(concat(['0x1901', domainSeparator, message]))
