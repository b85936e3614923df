import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { Clock } from '../clock'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, sub } from '../math'
import { LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'
import { Bytes32, DelegationPool, ThawListKey, ThawRequestType } from '../types'
import { issueShares, redeemShares } from './share-ledger'
import { ThawQueue } from './thaw-queue'

export interface DelegationManagerOptions {
  minimumDelegation: bigint
}

export interface RedelegationTarget {
  serviceProvider: Address
  verifier: Address
  minSharesOut?: bigint
}

export interface WithdrawDelegatedResult {
  tokens: bigint
  // Shares received in the target pool when redelegating
  shares: bigint
}

const delegationThawKey = (
  serviceProvider: Address,
  verifier: Address,
  delegator: Address,
): ThawListKey => ({
  type: ThawRequestType.Delegation,
  serviceProvider,
  verifier,
  owner: delegator,
})

// Shares are outstanding but nothing backs them anymore, usually after the
// pool was slashed completely. Nobody can enter such a pool at a fair price.
const isInvalidPool = (pool: DelegationPool): boolean =>
  pool.shares > 0n && pool.tokens - pool.tokensThawing === 0n

/**
 * Delegated tokens backing a provider's provision. Delegators hold shares of
 * the pool and leave through their own thaw list against the pool's thawing
 * sub-ledger.
 */
export class DelegationManager {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private clock: Clock,
    private queue: ThawQueue,
    private tokens: TokenCollaborator,
    private options: DelegationManagerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'DelegationManager' })
  }

  getDelegationPool(serviceProvider: Address, verifier: Address): DelegationPool | undefined {
    return this.store.findDelegationPool(serviceProvider, verifier)
  }

  getDelegatedShares(serviceProvider: Address, verifier: Address, delegator: Address): bigint {
    return (
      this.store.findDelegationPool(serviceProvider, verifier)?.delegators.get(delegator)
        ?.shares ?? 0n
    )
  }

  getThawRequests(serviceProvider: Address, verifier: Address, delegator: Address) {
    return this.queue.requests(delegationThawKey(serviceProvider, verifier, delegator))
  }

  /** Deposits tokens from the caller into the pool, returning the shares issued */
  delegate(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
    minSharesOut = 0n,
  ): bigint {
    this.logger.debug('Execute delegate()', {
      delegator: caller,
      serviceProvider,
      verifier,
      tokens: tokens.toString(),
    })
    const shares = this.validateDelegation(serviceProvider, verifier, tokens, minSharesOut)
    const balance = this.tokens.balanceOf(caller)
    if (balance < tokens) {
      throw ledgerError(LedgerErrorCode.LE048, `${caller} holds ${balance}, needs ${tokens}`)
    }

    this.tokens.pull(caller, tokens)
    this.applyDelegation(caller, serviceProvider, verifier, tokens, shares)
    return shares
  }

  /**
   * Redeems `shares` of the caller and starts thawing the tokens they are
   * worth, using the thawing period of the provision.
   */
  undelegate(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    shares: bigint,
  ): Bytes32 {
    this.logger.debug('Execute undelegate()', {
      delegator: caller,
      serviceProvider,
      verifier,
      shares: shares.toString(),
    })
    if (shares === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const provision = this.store.provision(serviceProvider, verifier)
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    const delegation = pool?.delegators.get(caller)
    if (!provision || !pool || !delegation || delegation.shares < shares) {
      throw ledgerError(
        LedgerErrorCode.LE018,
        `${caller} holds ${delegation?.shares ?? 0n} shares, requested ${shares}`,
      )
    }
    const tokens = redeemShares(pool, shares)
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE006, `${shares} shares redeem to zero tokens`)
    }
    const plan = this.queue.planEnqueue(
      pool,
      delegationThawKey(serviceProvider, verifier, caller),
      tokens,
      provision.thawingPeriod,
    )

    pool.shares = sub(pool.shares, shares)
    delegation.shares = sub(delegation.shares, shares)
    const id = this.queue.applyEnqueue(pool, plan)

    this.logger.info('Successfully undelegated', {
      delegator: caller,
      serviceProvider,
      verifier,
      thawRequestId: id,
      amountGRT: formatGRT(tokens),
    })
    return id
  }

  /**
   * Releases the caller's thawed requests. The tokens are paid out, or
   * delegated again to `redelegateTo` without leaving the ledger.
   */
  withdrawDelegated(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    redelegateTo?: RedelegationTarget,
    maxRequests = 0,
  ): WithdrawDelegatedResult {
    this.logger.debug('Execute withdrawDelegated()', {
      delegator: caller,
      serviceProvider,
      verifier,
      redelegateTo,
    })
    const key = delegationThawKey(serviceProvider, verifier, caller)
    const list = this.store.findThawRequestList(key)
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    if (!list || list.count === 0 || !pool) {
      throw ledgerError(LedgerErrorCode.LE020, `${caller} has no thaw requests`)
    }
    const plan = this.queue.planCollection(pool, key, maxRequests)
    const tokens = plan.tokens

    let shares = 0n
    if (redelegateTo && tokens > 0n) {
      shares = this.validateDelegation(
        redelegateTo.serviceProvider,
        redelegateTo.verifier,
        tokens,
        redelegateTo.minSharesOut ?? 0n,
      )
    }

    this.queue.applyPlan(pool, plan)
    pool.tokens = sub(pool.tokens, tokens)

    if (tokens > 0n) {
      if (redelegateTo) {
        this.applyDelegation(
          caller,
          redelegateTo.serviceProvider,
          redelegateTo.verifier,
          tokens,
          shares,
        )
      } else {
        this.tokens.push(caller, tokens)
      }
    }

    this.logger.info('Successfully withdrew delegated tokens', {
      delegator: caller,
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
      redelegated: redelegateTo !== undefined,
    })
    return { tokens, shares }
  }

  /** Adds tokens to the pool without issuing shares, raising the share price */
  addToDelegationPool(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
  ): void {
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    if (!this.store.provision(serviceProvider, verifier)) {
      throw ledgerError(LedgerErrorCode.LE014, `${serviceProvider}/${verifier}`)
    }
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    if (!pool || pool.shares === 0n) {
      throw ledgerError(LedgerErrorCode.LE019, 'Pool has no delegators')
    }
    const balance = this.tokens.balanceOf(caller)
    if (balance < tokens) {
      throw ledgerError(LedgerErrorCode.LE048, `${caller} holds ${balance}, needs ${tokens}`)
    }

    this.tokens.pull(caller, tokens)
    pool.tokens = add(pool.tokens, tokens)
    this.logger.info('Tokens added to delegation pool', {
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
    })
  }

  /**
   * Makes every pending request of the caller releasable right away once the
   * provider moved its stake to the other chain and has none left here.
   * Returns the number of requests unlocked.
   */
  unlockDelegationToMigratedProvider(
    caller: Address,
    serviceProvider: Address,
    verifier: Address,
  ): number {
    if (!this.store.migratedServiceProviders.has(serviceProvider)) {
      throw ledgerError(LedgerErrorCode.LE022, serviceProvider)
    }
    const staked = this.store.serviceProviders.get(serviceProvider)?.tokensStaked ?? 0n
    if (staked > 0n) {
      throw ledgerError(LedgerErrorCode.LE022, `${serviceProvider} still has ${staked} staked`)
    }
    const key = delegationThawKey(serviceProvider, verifier, caller)
    const requests = this.queue.requests(key)
    if (requests.length === 0) {
      throw ledgerError(LedgerErrorCode.LE020, `${caller} has no thaw requests`)
    }

    const now = this.clock.now()
    for (const { id } of requests) {
      const request = this.store.thawRequests.get(id)
      if (request && request.thawingUntil > now) {
        request.thawingUntil = now
      }
    }
    this.logger.info('Unlocked delegation to migrated provider', {
      delegator: caller,
      serviceProvider,
      verifier,
      requests: requests.length,
    })
    return requests.length
  }

  private validateDelegation(
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
    minSharesOut: bigint,
  ): bigint {
    if (tokens < this.options.minimumDelegation || tokens === 0n) {
      throw ledgerError(
        LedgerErrorCode.LE017,
        `${tokens} is below ${this.options.minimumDelegation}`,
      )
    }
    if (!this.store.provision(serviceProvider, verifier)) {
      throw ledgerError(LedgerErrorCode.LE014, `${serviceProvider}/${verifier}`)
    }
    const pool = this.store.findDelegationPool(serviceProvider, verifier)
    if (pool && isInvalidPool(pool)) {
      throw ledgerError(LedgerErrorCode.LE019, `${serviceProvider}/${verifier}`)
    }
    const shares = pool ? issueShares(pool, tokens) : tokens
    if (shares < minSharesOut) {
      throw ledgerError(LedgerErrorCode.LE021, `Issued ${shares}, expected ${minSharesOut}`)
    }
    return shares
  }

  private applyDelegation(
    delegator: Address,
    serviceProvider: Address,
    verifier: Address,
    tokens: bigint,
    shares: bigint,
  ): void {
    const pool = this.store.delegationPool(serviceProvider, verifier)
    let delegation = pool.delegators.get(delegator)
    if (!delegation) {
      delegation = { shares: 0n }
      pool.delegators.set(delegator, delegation)
    }
    pool.tokens = add(pool.tokens, tokens)
    pool.shares = add(pool.shares, shares)
    delegation.shares = add(delegation.shares, shares)

    this.logger.info('Successfully delegated', {
      delegator,
      serviceProvider,
      verifier,
      amountGRT: formatGRT(tokens),
      shares: shares.toString(),
    })
  }
}
