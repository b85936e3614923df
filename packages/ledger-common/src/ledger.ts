import { Logger } from '@graphprotocol/common-ts'
import { Authorizer } from './authorization'
import { Clock, systemClock } from './clock'
import {
  AllocationResolver,
  attestationDomain,
  DisputeManager,
} from './disputes/dispute-manager'
import { BridgeAuthenticator } from './migration/bridge'
import { CrossChainMigrationCoordinator } from './migration/coordinator'
import { CurationCollaborator, InMemoryCuration } from './migration/curation'
import { ProtocolSpecification } from './specification'
import { DelegationManager } from './staking/delegation'
import { LegacyOperationsExtension } from './staking/legacy-extension'
import { ProvisionManager } from './staking/provisions'
import { ServiceProviderLedger } from './staking/service-providers'
import { ThawQueue } from './staking/thaw-queue'
import { LedgerStore } from './store'
import { InMemoryTokens, TokenCollaborator } from './tokens'

export interface ProtocolLedgerOptions {
  logger: Logger
  specification: ProtocolSpecification
  clock?: Clock
  store?: LedgerStore
  tokens?: TokenCollaborator
  curation?: CurationCollaborator
  resolveAllocation?: AllocationResolver
}

export interface ProtocolLedger {
  store: LedgerStore
  clock: Clock
  tokens: TokenCollaborator
  curation: CurationCollaborator
  authorizer: Authorizer
  thawQueue: ThawQueue
  serviceProviders: ServiceProviderLedger
  provisions: ProvisionManager
  delegation: DelegationManager
  disputes: DisputeManager
  bridge: BridgeAuthenticator
  migration: CrossChainMigrationCoordinator
}

/** Wires every component of the ledger around a single store */
export function createProtocolLedger(options: ProtocolLedgerOptions): ProtocolLedger {
  const { logger, specification } = options
  const { staking, curation: curationOptions, migration, disputes } = specification

  const store = options.store ?? new LedgerStore()
  const clock = options.clock ?? systemClock
  const tokens = options.tokens ?? new InMemoryTokens()
  const curation = options.curation ?? new InMemoryCuration(curationOptions, logger)
  // Without a resolver every allocation is taken to be its own indexer
  const resolveAllocation: AllocationResolver =
    options.resolveAllocation ?? ((allocationId) => allocationId)

  const authorizer = new Authorizer(store, logger)
  const thawQueue = new ThawQueue(
    store,
    clock,
    { maxThawRequests: staking.maxThawRequests },
    logger,
  )
  const legacy =
    staking.legacyThawingPeriod > 0n
      ? new LegacyOperationsExtension(store, clock, tokens, staking.legacyThawingPeriod, logger)
      : undefined
  const serviceProviders = new ServiceProviderLedger(
    store,
    tokens,
    {
      minimumProvisionTokens: staking.minimumProvisionTokens,
      bridgeEscrow: migration.gatewayAddress,
    },
    logger,
    legacy,
  )
  const provisions = new ProvisionManager(
    store,
    clock,
    authorizer,
    thawQueue,
    serviceProviders,
    tokens,
    {
      minimumProvisionTokens: staking.minimumProvisionTokens,
      maxThawingPeriod: staking.maxThawingPeriod,
      delegationSlashingEnabled: staking.delegationSlashingEnabled,
    },
    logger,
  )
  const delegation = new DelegationManager(
    store,
    clock,
    thawQueue,
    tokens,
    { minimumDelegation: staking.minimumDelegation },
    logger,
  )
  const disputeManager = new DisputeManager(
    store,
    clock,
    provisions,
    tokens,
    resolveAllocation,
    {
      arbitratorAddress: disputes.arbitratorAddress,
      disputeManagerAddress: disputes.disputeManagerAddress,
      minimumDeposit: disputes.minimumDeposit,
      fishermanRewardCut: disputes.fishermanRewardCut,
      maxSlashingCut: disputes.maxSlashingCut,
      disputePeriod: disputes.disputePeriod,
      domain: attestationDomain(disputes),
    },
    logger,
  )
  const bridge = new BridgeAuthenticator(migration, logger)
  const coordinator = new CrossChainMigrationCoordinator(
    store,
    bridge,
    curation,
    tokens,
    migration.storageLayout,
    logger,
  )

  return {
    store,
    clock,
    tokens,
    curation,
    authorizer,
    thawQueue,
    serviceProviders,
    provisions,
    delegation,
    disputes: disputeManager,
    bridge,
    migration: coordinator,
  }
}
