import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { Clock } from '../clock'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, diffOrZero, sub, weightedAverageRoundingUp } from '../math'
import { LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'

/**
 * The deprecated withdrawal path where unstaked tokens sit under a single
 * global lock per provider before they can be withdrawn.
 */
export interface LegacyOperations {
  lock(serviceProvider: Address, tokens: bigint): void
  withdraw(serviceProvider: Address): bigint
}

export class LegacyOperationsExtension implements LegacyOperations {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private clock: Clock,
    private tokens: TokenCollaborator,
    private thawingPeriod: bigint,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'LegacyOperationsExtension' })
  }

  /**
   * Locks `tokens` of idle stake. Tokens already locked are withdrawn first if
   * their lock expired, otherwise the lock period becomes the token-weighted
   * average of what is left of the old lock and a fresh one.
   */
  lock(serviceProvider: Address, tokens: bigint): void {
    const sp = this.store.serviceProvider(serviceProvider)
    const now = this.clock.now()

    if (sp.tokensLocked > 0n && sp.tokensLockedUntil <= now) {
      this.withdraw(serviceProvider)
    }

    let lockingPeriod = this.thawingPeriod
    if (sp.tokensLocked > 0n) {
      lockingPeriod = weightedAverageRoundingUp(
        diffOrZero(sp.tokensLockedUntil, now),
        sp.tokensLocked,
        this.thawingPeriod,
        tokens,
      )
    }

    sp.tokensLocked = add(sp.tokensLocked, tokens)
    sp.tokensLockedUntil = add(now, lockingPeriod)

    this.logger.info('Stake locked', {
      serviceProvider,
      lockedGRT: formatGRT(sp.tokensLocked),
      lockedUntil: sp.tokensLockedUntil.toString(),
    })
  }

  withdraw(serviceProvider: Address): bigint {
    const sp = this.store.serviceProvider(serviceProvider)
    const tokens = sp.tokensLocked
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE024, serviceProvider)
    }
    if (this.clock.now() < sp.tokensLockedUntil) {
      throw ledgerError(
        LedgerErrorCode.LE023,
        `Locked until ${sp.tokensLockedUntil}, now ${this.clock.now()}`,
      )
    }

    sp.tokensStaked = sub(sp.tokensStaked, tokens)
    sp.tokensLocked = 0n
    sp.tokensLockedUntil = 0n
    this.tokens.push(serviceProvider, tokens)

    this.logger.info('Successfully withdrew locked stake', {
      serviceProvider,
      amountGRT: formatGRT(tokens),
    })
    return tokens
  }
}
