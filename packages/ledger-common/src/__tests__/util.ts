import { Address, createLogger, Logger, parseGRT, toAddress } from '@graphprotocol/common-ts'
import { toBeHex } from 'ethers'
import { ManualClock } from '../clock'
import { LedgerError } from '../errors'
import { createProtocolLedger, ProtocolLedger, ProtocolLedgerOptions } from '../ledger'
import { ProtocolSpecification } from '../specification'
import { InMemoryTokens } from '../tokens'

export const GRT = (tokens: number | string): bigint => parseGRT(String(tokens)).toBigInt()

export const address = (n: number): Address => toAddress(toBeHex(n, 20))

export const testLogger = (): Logger =>
  createLogger({ name: 'ledger tests', async: false, level: 'error' })

export const GATEWAY = address(0x6a7e)
export const COUNTERPART = address(0xc0de)
export const GOVERNOR = address(0x90)
export const ARBITRATOR = address(0xa4)
export const DISPUTE_MANAGER = address(0xd1)

interface SpecificationOverrides {
  staking?: Record<string, unknown>
  curation?: Record<string, unknown>
  disputes?: Record<string, unknown>
}

export function testSpecification(overrides: SpecificationOverrides = {}): ProtocolSpecification {
  return ProtocolSpecification.parse({
    staking: overrides.staking ?? {},
    curation: overrides.curation ?? {},
    migration: {
      counterpartAddress: COUNTERPART,
      gatewayAddress: GATEWAY,
      governorAddress: GOVERNOR,
    },
    disputes: {
      arbitratorAddress: ARBITRATOR,
      disputeManagerAddress: DISPUTE_MANAGER,
      ...overrides.disputes,
    },
  })
}

export interface TestLedger extends ProtocolLedger {
  clock: ManualClock
  tokens: InMemoryTokens
}

export function createTestLedger(
  overrides: SpecificationOverrides = {},
  options: Partial<Pick<ProtocolLedgerOptions, 'resolveAllocation'>> = {},
): TestLedger {
  const clock = new ManualClock(0n)
  const tokens = new InMemoryTokens()
  const ledger = createProtocolLedger({
    logger: testLogger(),
    specification: testSpecification(overrides),
    clock,
    tokens,
    ...options,
  })
  return { ...ledger, clock, tokens }
}

/** Mints tokens to `serviceProvider` and stakes them */
export function stake(ledger: TestLedger, serviceProvider: Address, tokens: bigint): void {
  ledger.tokens.mint(serviceProvider, tokens)
  ledger.serviceProviders.stake(serviceProvider, tokens)
}

export function catchLedgerError(fn: () => unknown): LedgerError {
  try {
    fn()
  } catch (error) {
    if (error instanceof LedgerError) {
      return error
    }
    throw error
  }
  throw new Error('Expected a LedgerError to be thrown')
}
