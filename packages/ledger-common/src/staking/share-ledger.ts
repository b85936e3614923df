import { ledgerError, LedgerErrorCode } from '../errors'
import { mulDiv, sub } from '../math'

/** The fields of a pool that determine its share price */
export interface SharePool {
  tokens: bigint
  shares: bigint
  tokensThawing: bigint
}

// Tokens backing the pool's outstanding shares. Thawing tokens were already
// redeemed and no longer back anything.
const backingTokens = (pool: SharePool): bigint => sub(pool.tokens, pool.tokensThawing)

/**
 * Shares issued for depositing `tokens` into the pool. The first deposit into
 * an empty pool is issued 1:1, later ones at the current share price,
 * truncating toward the pool.
 */
export function issueShares(pool: SharePool, tokens: bigint): bigint {
  const shares = pool.shares === 0n ? tokens : mulDiv(tokens, pool.shares, backingTokens(pool))
  if (shares === 0n) {
    throw ledgerError(LedgerErrorCode.LE006, `Depositing ${tokens} tokens issues no shares`)
  }
  return shares
}

/** Tokens owed for redeeming `shares` of the pool, truncating toward the pool */
export function redeemShares(pool: SharePool, shares: bigint): bigint {
  if (shares === 0n || pool.shares === 0n) {
    return 0n
  }
  return mulDiv(shares, backingTokens(pool), pool.shares)
}
