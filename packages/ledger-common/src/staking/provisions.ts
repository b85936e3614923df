import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { Authorizer } from '../authorization'
import { Clock } from '../clock'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, min, mulDiv, mulPPM, sub } from '../math'
import { MAX_MAX_VERIFIER_CUT } from '../specification'
import { LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'
import { Bytes32, Provision, ThawingPool, ThawListKey, ThawRequestType } from '../types'
import { ServiceProviderLedger } from './service-providers'
import { ThawQueue } from './thaw-queue'

export interface ProvisionManagerOptions {
  minimumProvisionTokens: bigint
  maxThawingPeriod: bigint
  delegationSlashingEnabled: boolean
}

export interface SlashResult {
  providerTokensSlashed: bigint
  delegationTokensSlashed: bigint
  verifierCut: bigint
  tokensBurned: bigint
  // Set when part of the slash should have come from delegators but
  // delegation slashing is disabled
  delegationSlashingSkipped: boolean
}

const provisionThawKey = (serviceProvider: Address, verifier: Address): ThawListKey => ({
  type: ThawRequestType.Provision,
  serviceProvider,
  verifier,
  owner: serviceProvider,
})

// Removes `slashed` tokens from a pool holding `tokens`, shrinking what is
// thawing by the same ratio. A thawing sub-pool that loses all its tokens
// while shares remain is reset, voiding the requests against it.
function slashThawingPool(pool: ThawingPool, tokens: bigint, slashed: bigint): void {
  pool.tokensThawing = mulDiv(pool.tokensThawing, tokens - slashed, tokens)
  if (pool.tokensThawing === 0n && pool.sharesThawing > 0n) {
    pool.sharesThawing = 0n
    pool.thawingNonce += 1n
  }
}

/**
 * Tokens a provider commits to a verifier: creating and growing provisions,
 * thawing and removing tokens from them, and slashing.
 */
export class ProvisionManager {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private clock: Clock,
    private authorizer: Authorizer,
    private queue: ThawQueue,
    private serviceProviders: ServiceProviderLedger,
    private tokens: TokenCollaborator,
    private options: ProvisionManagerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ProvisionManager' })
  }

  getProvision(serviceProvider: Address, verifier: Address): Provision | undefined {
    const provision = this.store.provision(serviceProvider, verifier)
    return provision && { ...provision }
  }

  provision(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
    maxVerifierCut: bigint,
    thawingPeriod: bigint,
  ): void {
    this.logger.debug('Execute provision()', {
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
      maxVerifierCut: maxVerifierCut.toString(),
      thawingPeriod: thawingPeriod.toString(),
    })
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    if (tokens < this.options.minimumProvisionTokens) {
      throw ledgerError(
        LedgerErrorCode.LE011,
        `${tokens} is below ${this.options.minimumProvisionTokens}`,
      )
    }
    this.validateParameters(maxVerifierCut, thawingPeriod)
    if (this.store.provision(serviceProvider, verifier)) {
      throw ledgerError(LedgerErrorCode.LE015, `${serviceProvider}/${verifier}`)
    }
    this.assertIdleStake(serviceProvider, tokens)

    this.store.setProvision(serviceProvider, verifier, {
      tokens,
      tokensThawing: 0n,
      sharesThawing: 0n,
      thawingNonce: 0n,
      maxVerifierCut,
      thawingPeriod,
      createdAt: this.clock.now(),
      maxVerifierCutPending: maxVerifierCut,
      thawingPeriodPending: thawingPeriod,
    })
    const sp = this.store.serviceProvider(serviceProvider)
    sp.tokensProvisioned = add(sp.tokensProvisioned, tokens)

    this.logger.info('Successfully created provision', {
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
    })
  }

  addToProvision(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
  ): void {
    this.logger.debug('Execute addToProvision()', {
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
    })
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    this.requireProvision(serviceProvider, verifier)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    this.assertIdleStake(serviceProvider, tokens)
    this.applyAddToProvision(serviceProvider, verifier, tokens)
  }

  /** Stakes tokens from the caller and adds them to an existing provision */
  stakeToProvision(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
  ): void {
    this.logger.debug('Execute stakeToProvision()', {
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
    })
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    this.requireProvision(serviceProvider, verifier)
    this.serviceProviders.validateStake(caller, serviceProvider, tokens)

    this.serviceProviders.applyStake(caller, serviceProvider, tokens)
    this.applyAddToProvision(serviceProvider, verifier, tokens)
  }

  /** Starts thawing `tokens` of the provision, returning the thaw request id */
  thaw(caller: Address, serviceProvider: Address, verifier: Address, tokens: bigint): Bytes32 {
    this.logger.debug('Execute thaw()', { serviceProvider, verifier, tokens: tokens.toString() })
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    const provision = this.requireProvision(serviceProvider, verifier)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const available = provision.tokens - provision.tokensThawing
    if (tokens > available) {
      throw ledgerError(LedgerErrorCode.LE008, `Available ${available}, requested ${tokens}`)
    }

    const id = this.queue.enqueue(
      provision,
      provisionThawKey(serviceProvider, verifier),
      tokens,
      provision.thawingPeriod,
    )
    this.logger.info('Provision tokens thawing', {
      serviceProvider,
      verifier,
      thawRequestId: id,
      amountGRT: formatGRT(tokens),
    })
    return id
  }

  /** Returns thawed tokens of the provision to the provider's idle stake */
  deprovision(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
  ): void {
    this.logger.debug('Execute deprovision()', {
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
    })
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    const provision = this.requireProvision(serviceProvider, verifier)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const plan = this.queue.planFulfillment(
      provision,
      provisionThawKey(serviceProvider, verifier),
      tokens,
    )

    this.queue.applyPlan(provision, plan)
    provision.tokens = sub(provision.tokens, tokens)
    const sp = this.store.serviceProvider(serviceProvider)
    sp.tokensProvisioned = sub(sp.tokensProvisioned, tokens)

    this.logger.info('Successfully deprovisioned', {
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
    })
  }

  /** Moves thawed tokens from one provision into another of the same provider */
  reprovision(
    caller: Address,
    serviceProvider: Address,
    oldVerifier: Address,
    newVerifier: Address,
    tokens: bigint,
  ): void {
    this.logger.debug('Execute reprovision()', {
      serviceProvider,
      oldVerifier,
      newVerifier,
      tokens: tokens.toString(),
    })
    this.authorizer.assertAuthorized(caller, serviceProvider, oldVerifier)
    this.authorizer.assertAuthorized(caller, serviceProvider, newVerifier)
    const from = this.requireProvision(serviceProvider, oldVerifier)
    const to = this.requireProvision(serviceProvider, newVerifier)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const plan = this.queue.planFulfillment(
      from,
      provisionThawKey(serviceProvider, oldVerifier),
      tokens,
    )

    this.queue.applyPlan(from, plan)
    from.tokens = sub(from.tokens, tokens)
    to.tokens = add(to.tokens, tokens)

    this.logger.info('Successfully reprovisioned', {
      serviceProvider,
      oldVerifier,
      newVerifier,
      amountGRT: formatGRT(tokens),
    })
  }

  /** Stages new parameters; they take effect once the verifier accepts them */
  setProvisionParameters(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    maxVerifierCut: bigint,
    thawingPeriod: bigint,
  ): void {
    this.authorizer.assertAuthorized(caller, serviceProvider, verifier)
    const provision = this.requireProvision(serviceProvider, verifier)
    this.validateParameters(maxVerifierCut, thawingPeriod)

    provision.maxVerifierCutPending = maxVerifierCut
    provision.thawingPeriodPending = thawingPeriod
    this.logger.info('Provision parameters staged', {
      serviceProvider,
      verifier,
      maxVerifierCut: maxVerifierCut.toString(),
      thawingPeriod: thawingPeriod.toString(),
    })
  }

  /** Called by the verifier of the provision */
  acceptProvisionParameters(caller: Address, serviceProvider: Address): void {
    const provision = this.requireProvision(serviceProvider, caller)
    provision.maxVerifierCut = provision.maxVerifierCutPending
    provision.thawingPeriod = provision.thawingPeriodPending
    this.logger.info('Provision parameters accepted', {
      serviceProvider,
      verifier: caller,
      maxVerifierCut: provision.maxVerifierCut.toString(),
      thawingPeriod: provision.thawingPeriod.toString(),
    })
  }

  /**
   * Slashes `tokens` from the provision the caller verifies. The provider's
   * tokens go first and the delegation pool covers the rest. Of what is
   * taken from the provider, `verifierCutAmount` goes to
   * `verifierCutDestination` and everything else is burned.
   */
  slash(
    caller: Address,
    serviceProvider: Address,
    tokens: bigint,
    verifierCutAmount: bigint,
    verifierCutDestination: Address,
  ): SlashResult {
    const verifier = caller
    this.logger.debug('Execute slash()', {
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
      verifierCutAmount: verifierCutAmount.toString(),
    })
    const provision = this.requireProvision(serviceProvider, verifier)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    const slashable = provision.tokens + (pool?.tokens ?? 0n)
    if (tokens > slashable) {
      throw ledgerError(LedgerErrorCode.LE051, `Slashable ${slashable}, requested ${tokens}`)
    }

    const maxVerifierCut = mulPPM(tokens, provision.maxVerifierCut)
    if (verifierCutAmount > maxVerifierCut) {
      throw ledgerError(
        LedgerErrorCode.LE016,
        `Cut ${verifierCutAmount} exceeds ${maxVerifierCut} allowed by the provision`,
      )
    }
    const providerTokensSlashed = min(provision.tokens, tokens)
    if (verifierCutAmount > providerTokensSlashed) {
      throw ledgerError(
        LedgerErrorCode.LE016,
        `Cut ${verifierCutAmount} exceeds the ${providerTokensSlashed} tokens slashed from the provider`,
      )
    }

    const result: SlashResult = {
      providerTokensSlashed,
      delegationTokensSlashed: 0n,
      verifierCut: verifierCutAmount,
      tokensBurned: providerTokensSlashed - verifierCutAmount,
      delegationSlashingSkipped: false,
    }

    if (providerTokensSlashed > 0n) {
      slashThawingPool(provision, provision.tokens, providerTokensSlashed)
      provision.tokens -= providerTokensSlashed

      const sp = this.store.serviceProvider(serviceProvider)
      sp.tokensProvisioned = sub(sp.tokensProvisioned, providerTokensSlashed)
      sp.tokensStaked = sub(sp.tokensStaked, providerTokensSlashed)

      if (verifierCutAmount > 0n) {
        this.tokens.push(verifierCutDestination, verifierCutAmount)
      }
      if (result.tokensBurned > 0n) {
        this.tokens.burn(result.tokensBurned)
      }
    }

    const remainder = tokens - providerTokensSlashed
    if (pool && remainder > 0n) {
      if (this.options.delegationSlashingEnabled) {
        slashThawingPool(pool, pool.tokens, remainder)
        pool.tokens -= remainder
        this.tokens.burn(remainder)
        result.delegationTokensSlashed = remainder
        result.tokensBurned += remainder
      } else {
        result.delegationSlashingSkipped = true
        this.logger.warn('Delegation slashing is disabled, skipped slashing delegators', {
          serviceProvider,
          verifier,
          skippedGRT: formatGRT(remainder),
        })
      }
    }

    this.logger.info('Provision slashed', {
      serviceProvider,
      verifier,
      providerGRT: formatGRT(result.providerTokensSlashed),
      delegationGRT: formatGRT(result.delegationTokensSlashed),
      verifierCutGRT: formatGRT(result.verifierCut),
      verifierCutDestination,
    })
    return result
  }

  /**
   * Tokens backing the provision that are not thawing, counting delegated
   * tokens up to `delegationRatio` times the provider's own.
   */
  getTokensAvailable(
    serviceProvider: Address,
    verifier: Address,
    delegationRatio: bigint,
  ): bigint {
    const provision = this.store.provision(serviceProvider, verifier)
    if (!provision) {
      return 0n
    }
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    const providerTokens = provision.tokens - provision.tokensThawing
    const delegatedTokens = pool ? pool.tokens - pool.tokensThawing : 0n
    return providerTokens + min(delegatedTokens, providerTokens * delegationRatio)
  }

  getThawedTokens(serviceProvider: Address, verifier: Address): bigint {
    const provision = this.store.provision(serviceProvider, verifier)
    if (!provision) {
      return 0n
    }
    return this.queue.thawedTokens(provision, provisionThawKey(serviceProvider, verifier))
  }

  getThawRequests(serviceProvider: Address, verifier: Address) {
    return this.queue.requests(provisionThawKey(serviceProvider, verifier))
  }

  private applyAddToProvision(serviceProvider: Address, verifier: Address, tokens: bigint): void {
    const provision = this.requireProvision(serviceProvider, verifier)
    provision.tokens = add(provision.tokens, tokens)
    const sp = this.store.serviceProvider(serviceProvider)
    sp.tokensProvisioned = add(sp.tokensProvisioned, tokens)
    this.logger.info('Successfully added to provision', {
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
      provisionGRT: formatGRT(provision.tokens),
    })
  }

  private requireProvision(serviceProvider: Address, verifier: Address): Provision {
    const provision = this.store.provision(serviceProvider, verifier)
    if (!provision) {
      throw ledgerError(LedgerErrorCode.LE014, `${serviceProvider}/${verifier}`)
    }
    return provision
  }

  private validateParameters(maxVerifierCut: bigint, thawingPeriod: bigint): void {
    if (maxVerifierCut > MAX_MAX_VERIFIER_CUT) {
      throw ledgerError(
        LedgerErrorCode.LE012,
        `${maxVerifierCut} exceeds ${MAX_MAX_VERIFIER_CUT}`,
      )
    }
    if (thawingPeriod > this.options.maxThawingPeriod) {
      throw ledgerError(
        LedgerErrorCode.LE013,
        `${thawingPeriod} exceeds ${this.options.maxThawingPeriod}`,
      )
    }
  }

  private assertIdleStake(serviceProvider: Address, tokens: bigint): void {
    const idle = this.serviceProviders.getIdleStake(serviceProvider)
    if (idle < tokens) {
      throw ledgerError(LedgerErrorCode.LE007, `Idle stake ${idle}, requested ${tokens}`)
    }
  }
}
