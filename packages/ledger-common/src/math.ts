import { ledgerError, LedgerErrorCode } from './errors'

export const MAX_UINT256 = (1n << 256n) - 1n

/** Parts per million, the unit used for cuts and percentages */
export const MAX_PPM = 1_000_000n

// Token amounts are unsigned 256-bit integers; bigint itself never
// overflows so the bounds are enforced here.
export function uint256(value: bigint): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw ledgerError(LedgerErrorCode.LE005, `Value out of uint256 range: ${value}`)
  }
  return value
}

export function add(a: bigint, b: bigint): bigint {
  return uint256(a + b)
}

export function sub(a: bigint, b: bigint): bigint {
  return uint256(a - b)
}

export function mul(a: bigint, b: bigint): bigint {
  return uint256(a * b)
}

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw ledgerError(LedgerErrorCode.LE005, 'Division by zero')
  }
  return mul(a, b) / denominator
}

export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw ledgerError(LedgerErrorCode.LE005, 'Division by zero')
  }
  const product = mul(a, b)
  return product === 0n ? 0n : (product - 1n) / denominator + 1n
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b
}

export function isValidPPM(value: bigint): boolean {
  return value >= 0n && value <= MAX_PPM
}

export function mulPPM(value: bigint, ppm: bigint): bigint {
  return mulDiv(value, ppm, MAX_PPM)
}

/**
 * Weighted average of two values, rounding up. Used to merge the remaining
 * lock period of already locked tokens with the period of newly locked ones.
 */
export function weightedAverageRoundingUp(
  valueA: bigint,
  weightA: bigint,
  valueB: bigint,
  weightB: bigint,
): bigint {
  const totalWeight = add(weightA, weightB)
  return add(add(mul(valueA, weightA), mul(valueB, weightB)), totalWeight - 1n) / totalWeight
}

export function diffOrZero(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n
}
