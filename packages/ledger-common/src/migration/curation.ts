import { formatGRT, Logger } from '@graphprotocol/common-ts'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, mulDiv, mulPPM, sub } from '../math'
import { Bytes32 } from '../types'

/** Signal minted against subgraph deployments */
export interface CurationCollaborator {
  isCurated(deploymentId: Bytes32): boolean
  getCurationPoolTokens(deploymentId: Bytes32): bigint
  getCurationPoolSignal(deploymentId: Bytes32): bigint
  tokensToSignalNoTax(deploymentId: Bytes32, tokens: bigint): bigint
  tokensToSignal(deploymentId: Bytes32, tokens: bigint): { signal: bigint; tax: bigint }
  mintTaxFree(deploymentId: Bytes32, tokens: bigint): bigint
  mint(deploymentId: Bytes32, tokens: bigint): { signal: bigint; tax: bigint }
}

export interface CurationPoolOptions {
  minimumCurationDeposit: bigint
  curationTaxPercentage: bigint
}

interface CurationPool {
  tokens: bigint
  signal: bigint
}

const SIGNAL_PER_MINIMUM_DEPOSIT = 10n ** 18n

/**
 * Curation pools with a linear price: the first deposit sets the price at one
 * signal per minimum deposit, later deposits mint at the pool's current ratio.
 */
export class InMemoryCuration implements CurationCollaborator {
  private pools = new Map<Bytes32, CurationPool>()
  private logger: Logger

  constructor(private options: CurationPoolOptions, logger: Logger) {
    this.logger = logger.child({ component: 'Curation' })
  }

  isCurated(deploymentId: Bytes32): boolean {
    return this.getCurationPoolTokens(deploymentId) > 0n
  }

  getCurationPoolTokens(deploymentId: Bytes32): bigint {
    return this.pools.get(deploymentId)?.tokens ?? 0n
  }

  getCurationPoolSignal(deploymentId: Bytes32): bigint {
    return this.pools.get(deploymentId)?.signal ?? 0n
  }

  tokensToSignalNoTax(deploymentId: Bytes32, tokens: bigint): bigint {
    const pool = this.pools.get(deploymentId)
    if (!pool || pool.tokens === 0n) {
      if (tokens < this.options.minimumCurationDeposit) {
        throw ledgerError(
          LedgerErrorCode.LE052,
          `${tokens} is below ${this.options.minimumCurationDeposit}`,
        )
      }
      return mulDiv(tokens, SIGNAL_PER_MINIMUM_DEPOSIT, this.options.minimumCurationDeposit)
    }
    return mulDiv(pool.signal, tokens, pool.tokens)
  }

  mintTaxFree(deploymentId: Bytes32, tokens: bigint): bigint {
    const signal = this.tokensToSignalNoTax(deploymentId, tokens)
    this.deposit(deploymentId, tokens, signal)
    return signal
  }

  tokensToSignal(deploymentId: Bytes32, tokens: bigint): { signal: bigint; tax: bigint } {
    const tax = mulPPM(tokens, this.options.curationTaxPercentage)
    return { signal: this.tokensToSignalNoTax(deploymentId, sub(tokens, tax)), tax }
  }

  /** Mints for `tokens` minus the curation tax, which the caller burns */
  mint(deploymentId: Bytes32, tokens: bigint): { signal: bigint; tax: bigint } {
    const { signal, tax } = this.tokensToSignal(deploymentId, tokens)
    this.deposit(deploymentId, tokens - tax, signal)
    return { signal, tax }
  }

  private deposit(deploymentId: Bytes32, tokens: bigint, signal: bigint): void {
    const pool = this.pools.get(deploymentId) ?? { tokens: 0n, signal: 0n }
    pool.tokens = add(pool.tokens, tokens)
    pool.signal = add(pool.signal, signal)
    this.pools.set(deploymentId, pool)
    this.logger.debug('Signal minted', {
      deploymentId,
      amountGRT: formatGRT(tokens),
      signal: signal.toString(),
    })
  }
}
