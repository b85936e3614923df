import { Address } from '@graphprotocol/common-ts'
import {
  Bytes32,
  DelegationPool,
  Dispute,
  MigrationRecord,
  Provision,
  ServiceProvider,
  Subgraph,
  ThawListKey,
  ThawRequest,
  ThawRequestList,
} from './types'

const pairKey = (a: string, b: string): string => `${a}/${b}`

export const emptyServiceProvider = (): ServiceProvider => ({
  tokensStaked: 0n,
  tokensProvisioned: 0n,
  tokensLocked: 0n,
  tokensLockedUntil: 0n,
})

export const thawListKey = (key: ThawListKey): string =>
  [key.type, key.serviceProvider, key.verifier, key.owner].join('/')

/**
 * All mutable ledger state. Components receive the store explicitly and are
 * the only code that writes to it.
 */
export class LedgerStore {
  serviceProviders = new Map<Address, ServiceProvider>()
  provisions = new Map<string, Provision>()
  delegationPools = new Map<string, DelegationPool>()
  thawRequestLists = new Map<string, ThawRequestList>()
  thawRequests = new Map<Bytes32, ThawRequest>()

  // Operator authorizations, keyed by provider/verifier and provider
  operators = new Map<string, Set<Address>>()
  globalOperators = new Map<Address, Set<Address>>()

  // Providers that moved their stake to the other chain, and where to
  migratedServiceProviders = new Map<Address, Address>()

  disputes = new Map<Bytes32, Dispute>()

  subgraphs = new Map<Bytes32, Subgraph>()
  migrations = new Map<Bytes32, MigrationRecord>()
  curatorClaims = new Map<string, boolean>()
  subgraphNonces = new Map<Address, bigint>()

  findServiceProvider(address: Address): ServiceProvider | undefined {
    return this.serviceProviders.get(address)
  }

  serviceProvider(address: Address): ServiceProvider {
    let sp = this.serviceProviders.get(address)
    if (!sp) {
      sp = emptyServiceProvider()
      this.serviceProviders.set(address, sp)
    }
    return sp
  }

  provision(serviceProvider: Address, verifier: Address): Provision | undefined {
    return this.provisions.get(pairKey(serviceProvider, verifier))
  }

  setProvision(serviceProvider: Address, verifier: Address, provision: Provision): void {
    this.provisions.set(pairKey(serviceProvider, verifier), provision)
  }

  findDelegationPool(serviceProvider: Address, verifier: Address): DelegationPool | undefined {
    return this.delegationPools.get(pairKey(serviceProvider, verifier))
  }

  delegationPool(serviceProvider: Address, verifier: Address): DelegationPool {
    const key = pairKey(serviceProvider, verifier)
    let pool = this.delegationPools.get(key)
    if (!pool) {
      pool = {
        tokens: 0n,
        shares: 0n,
        tokensThawing: 0n,
        sharesThawing: 0n,
        thawingNonce: 0n,
        delegators: new Map(),
      }
      this.delegationPools.set(key, pool)
    }
    return pool
  }

  findThawRequestList(key: ThawListKey): ThawRequestList | undefined {
    return this.thawRequestLists.get(thawListKey(key))
  }

  thawRequestList(key: ThawListKey): ThawRequestList {
    const id = thawListKey(key)
    let list = this.thawRequestLists.get(id)
    if (!list) {
      list = { head: null, tail: null, count: 0, nonce: 0n }
      this.thawRequestLists.set(id, list)
    }
    return list
  }

  operatorsFor(serviceProvider: Address, verifier: Address): Set<Address> {
    const key = pairKey(serviceProvider, verifier)
    let operators = this.operators.get(key)
    if (!operators) {
      operators = new Set()
      this.operators.set(key, operators)
    }
    return operators
  }

  globalOperatorsFor(serviceProvider: Address): Set<Address> {
    let operators = this.globalOperators.get(serviceProvider)
    if (!operators) {
      operators = new Set()
      this.globalOperators.set(serviceProvider, operators)
    }
    return operators
  }

  isCuratorClaimed(subgraphId: Bytes32, curator: Address): boolean {
    return this.curatorClaims.get(pairKey(subgraphId, curator)) === true
  }

  markCuratorClaimed(subgraphId: Bytes32, curator: Address): void {
    this.curatorClaims.set(pairKey(subgraphId, curator), true)
  }
}
