import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { ZeroAddress } from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, diffOrZero, sub } from '../math'
import { emptyServiceProvider, LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'
import { ServiceProvider } from '../types'
import { LegacyOperations } from './legacy-extension'

export interface ServiceProviderLedgerOptions {
  minimumProvisionTokens: bigint
  // Receives stake that is transferred to the other chain
  bridgeEscrow: Address
}

/** Stake deposits, withdrawals and the transfer of stake to the other chain */
export class ServiceProviderLedger {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private tokens: TokenCollaborator,
    private options: ServiceProviderLedgerOptions,
    logger: Logger,
    // Only set when the deprecated global-lock withdrawal mode is enabled
    private legacy?: LegacyOperations,
  ) {
    this.logger = logger.child({ component: 'ServiceProviderLedger' })
  }

  getServiceProvider(serviceProvider: Address): ServiceProvider {
    return { ...(this.store.findServiceProvider(serviceProvider) ?? emptyServiceProvider()) }
  }

  getIdleStake(serviceProvider: Address): bigint {
    const sp = this.store.findServiceProvider(serviceProvider)
    if (!sp) {
      return 0n
    }
    return diffOrZero(sp.tokensStaked, sp.tokensProvisioned + sp.tokensLocked)
  }

  stake(caller: Address, tokens: bigint): void {
    this.stakeTo(caller, caller, tokens)
  }

  /** Deposits `tokens` from the caller as stake of `serviceProvider` */
  stakeTo(caller: Address, serviceProvider: Address, tokens: bigint): void {
    this.validateStake(caller, serviceProvider, tokens)
    this.applyStake(caller, serviceProvider, tokens)
  }

  validateStake(caller: Address, serviceProvider: Address, tokens: bigint): void {
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    if (serviceProvider === ZeroAddress) {
      throw ledgerError(LedgerErrorCode.LE003)
    }
    const balance = this.tokens.balanceOf(caller)
    if (balance < tokens) {
      throw ledgerError(LedgerErrorCode.LE048, `${caller} holds ${balance}, needs ${tokens}`)
    }
  }

  applyStake(caller: Address, serviceProvider: Address, tokens: bigint): void {
    const sp = this.store.serviceProvider(serviceProvider)
    this.tokens.pull(caller, tokens)
    sp.tokensStaked = add(sp.tokensStaked, tokens)
    this.logger.info('Successfully staked', {
      serviceProvider,
      amountGRT: formatGRT(tokens),
      stakedGRT: formatGRT(sp.tokensStaked),
    })
  }

  /**
   * Removes idle stake. Without the legacy lock the tokens are paid out right
   * away, with it they are locked and have to be withdrawn later.
   */
  unstake(caller: Address, tokens: bigint): void {
    this.logger.debug('Execute unstake()', { serviceProvider: caller, tokens: tokens.toString() })
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const idle = this.getIdleStake(caller)
    if (tokens > idle) {
      throw ledgerError(LedgerErrorCode.LE007, `Idle stake ${idle}, requested ${tokens}`)
    }

    if (this.legacy) {
      this.legacy.lock(caller, tokens)
      return
    }

    const sp = this.store.serviceProvider(caller)
    sp.tokensStaked = sub(sp.tokensStaked, tokens)
    this.tokens.push(caller, tokens)
    this.logger.info('Successfully unstaked', {
      serviceProvider: caller,
      amountGRT: formatGRT(tokens),
    })
  }

  withdrawLocked(caller: Address): bigint {
    if (!this.legacy) {
      throw ledgerError(LedgerErrorCode.LE024, 'Legacy withdrawals are not enabled')
    }
    return this.legacy.withdraw(caller)
  }

  /**
   * Sends idle stake to `l2Beneficiary` on the other chain and marks the
   * provider as migrated. What stays behind must be nothing or enough for a
   * provision.
   */
  transferStakeToOtherChain(caller: Address, l2Beneficiary: Address, tokens: bigint): void {
    this.logger.debug('Execute transferStakeToOtherChain()', {
      serviceProvider: caller,
      l2Beneficiary,
      tokens: tokens.toString(),
    })
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    if (l2Beneficiary === ZeroAddress) {
      throw ledgerError(LedgerErrorCode.LE003)
    }
    const idle = this.getIdleStake(caller)
    if (tokens > idle) {
      throw ledgerError(LedgerErrorCode.LE007, `Idle stake ${idle}, requested ${tokens}`)
    }
    const sp = this.store.serviceProvider(caller)
    const remaining = sp.tokensStaked - tokens
    if (remaining !== 0n && remaining < this.options.minimumProvisionTokens) {
      throw ledgerError(
        LedgerErrorCode.LE025,
        `Remaining stake ${remaining} is below ${this.options.minimumProvisionTokens}`,
      )
    }

    sp.tokensStaked = remaining
    this.tokens.push(this.options.bridgeEscrow, tokens)
    this.store.migratedServiceProviders.set(caller, l2Beneficiary)

    this.logger.info('Successfully transferred stake to the other chain', {
      serviceProvider: caller,
      l2Beneficiary,
      amountGRT: formatGRT(tokens),
      remainingGRT: formatGRT(remaining),
    })
  }
}
