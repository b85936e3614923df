import { Address } from '@graphprotocol/common-ts'

/** 0x-prefixed, lowercase, 32 byte hex string */
export type Bytes32 = string

export const ZERO_BYTES32: Bytes32 = '0x' + '00'.repeat(32)

export enum ThawRequestType {
  Provision = 'provision',
  Delegation = 'delegation',
}

export interface ServiceProvider {
  tokensStaked: bigint
  tokensProvisioned: bigint

  // Deprecated global-lock withdrawal mode
  tokensLocked: bigint
  tokensLockedUntil: bigint
}

/** The sub-ledger tracking tokens that are thawing out of a provision or pool */
export interface ThawingPool {
  tokensThawing: bigint
  sharesThawing: bigint
  thawingNonce: bigint
}

export interface Provision extends ThawingPool {
  tokens: bigint
  maxVerifierCut: bigint
  thawingPeriod: bigint
  createdAt: bigint
  maxVerifierCutPending: bigint
  thawingPeriodPending: bigint
}

export interface Delegation {
  shares: bigint
}

export interface DelegationPool extends ThawingPool {
  tokens: bigint
  shares: bigint
  delegators: Map<Address, Delegation>
}

export interface ThawRequest {
  shares: bigint
  thawingUntil: bigint
  next: Bytes32 | null
  thawingNonce: bigint
}

export interface ThawRequestList {
  head: Bytes32 | null
  tail: Bytes32 | null
  count: number
  nonce: bigint
}

export interface ThawListKey {
  type: ThawRequestType
  serviceProvider: Address
  verifier: Address
  owner: Address
}

export enum DisputeType {
  QueryDispute = 'QueryDispute',
  IndexingDispute = 'IndexingDispute',
}

export enum DisputeStatus {
  Null = 'Null',
  Pending = 'Pending',
  Accepted = 'Accepted',
  Rejected = 'Rejected',
  Drawn = 'Drawn',
  Cancelled = 'Cancelled',
}

export interface Dispute {
  id: Bytes32
  type: DisputeType
  indexer: Address
  fisherman: Address
  deposit: bigint
  relatedDisputeId: Bytes32 | null
  status: DisputeStatus
  createdAt: bigint
}

export interface MigrationRecord {
  tokens: bigint
  lockedAtBlockHash: Bytes32
  l1Done: boolean
  l2Done: boolean
  deprecated: boolean
  claimedSignal: bigint
}

export interface Subgraph {
  id: Bytes32
  owner: Address
  nSignal: bigint
  vSignal: bigint
  deploymentId: Bytes32
  reserveRatio: number
  disabled: boolean
  withdrawableTokens: bigint
  metadata: Bytes32
  curatorSignal: Map<Address, bigint>
}
