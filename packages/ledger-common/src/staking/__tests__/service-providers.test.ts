import { toAddress } from '@graphprotocol/common-ts'
import { ZeroAddress } from 'ethers'
import { LedgerErrorCode } from '../../errors'
import {
  address,
  catchLedgerError,
  createTestLedger,
  GATEWAY,
  GRT,
  stake,
  TestLedger,
} from '../../__tests__/util'

const serviceProvider = address(0x51)
const verifier = address(0x7e)
const beneficiary = address(0x12)

let ledger: TestLedger

describe('Service providers', () => {
  beforeEach(() => {
    ledger = createTestLedger()
  })

  test('Reading an unknown provider leaves the store untouched', () => {
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider)).toEqual({
      tokensStaked: 0n,
      tokensProvisioned: 0n,
      tokensLocked: 0n,
      tokensLockedUntil: 0n,
    })
    expect(ledger.serviceProviders.getIdleStake(serviceProvider)).toEqual(0n)
    expect(ledger.store.serviceProviders.has(serviceProvider)).toBe(false)
  })

  test('Stakes on behalf of another provider', () => {
    ledger.tokens.mint(beneficiary, GRT(10))
    ledger.serviceProviders.stakeTo(beneficiary, serviceProvider, GRT(10))
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider).tokensStaked).toEqual(
      GRT(10),
    )
    expect(ledger.tokens.balanceOf(beneficiary)).toEqual(0n)
    expect(ledger.tokens.custody).toEqual(GRT(10))
  })

  test.each([
    ['nothing', serviceProvider, 0n, LedgerErrorCode.LE002],
    ['to the zero address', toAddress(ZeroAddress), GRT(1), LedgerErrorCode.LE003],
    ['more than the balance', serviceProvider, GRT(11), LedgerErrorCode.LE048],
  ])('Rejects staking %s', (_, to, tokens, code) => {
    ledger.tokens.mint(beneficiary, GRT(10))
    expect(
      catchLedgerError(() => ledger.serviceProviders.stakeTo(beneficiary, to, tokens)).code,
    ).toEqual(code)
  })

  test('Unstakes idle stake right away', () => {
    stake(ledger, serviceProvider, GRT(100))
    ledger.provisions.provision(serviceProvider, serviceProvider, verifier, GRT(60), 0n, 0n)

    expect(
      catchLedgerError(() => ledger.serviceProviders.unstake(serviceProvider, GRT(41))).code,
    ).toEqual(LedgerErrorCode.LE007)

    ledger.serviceProviders.unstake(serviceProvider, GRT(40))
    expect(ledger.tokens.balanceOf(serviceProvider)).toEqual(GRT(40))
    expect(ledger.serviceProviders.getIdleStake(serviceProvider)).toEqual(0n)
    expect(
      catchLedgerError(() => ledger.serviceProviders.withdrawLocked(serviceProvider)).code,
    ).toEqual(LedgerErrorCode.LE024)
  })

  test('Transfers stake to the other chain', () => {
    stake(ledger, serviceProvider, GRT(100))
    ledger.serviceProviders.transferStakeToOtherChain(serviceProvider, beneficiary, GRT(30))

    expect(ledger.serviceProviders.getServiceProvider(serviceProvider).tokensStaked).toEqual(
      GRT(70),
    )
    expect(ledger.tokens.balanceOf(GATEWAY)).toEqual(GRT(30))
    expect(ledger.store.migratedServiceProviders.get(serviceProvider)).toEqual(beneficiary)
  })

  test('Does not leave less than a provision behind', () => {
    stake(ledger, serviceProvider, GRT('1.5'))
    expect(
      catchLedgerError(() =>
        ledger.serviceProviders.transferStakeToOtherChain(serviceProvider, beneficiary, GRT(1)),
      ).code,
    ).toEqual(LedgerErrorCode.LE025)
    expect(ledger.store.migratedServiceProviders.has(serviceProvider)).toBe(false)
  })
})

describe('Legacy locked withdrawals', () => {
  beforeEach(() => {
    ledger = createTestLedger({ staking: { legacyThawingPeriod: 100 } })
    stake(ledger, serviceProvider, GRT(200))
  })

  test('Unstaked tokens are locked for the thawing period', () => {
    ledger.serviceProviders.unstake(serviceProvider, GRT(40))
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider)).toEqual({
      tokensStaked: GRT(200),
      tokensProvisioned: 0n,
      tokensLocked: GRT(40),
      tokensLockedUntil: 100n,
    })
    expect(ledger.serviceProviders.getIdleStake(serviceProvider)).toEqual(GRT(160))

    ledger.clock.set(99n)
    expect(
      catchLedgerError(() => ledger.serviceProviders.withdrawLocked(serviceProvider)).code,
    ).toEqual(LedgerErrorCode.LE023)

    ledger.clock.set(100n)
    expect(ledger.serviceProviders.withdrawLocked(serviceProvider)).toEqual(GRT(40))
    expect(ledger.tokens.balanceOf(serviceProvider)).toEqual(GRT(40))
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider).tokensStaked).toEqual(
      GRT(160),
    )
  })

  test('Merges lock periods weighted by tokens', () => {
    ledger.serviceProviders.unstake(serviceProvider, GRT(40))
    ledger.clock.set(50n)
    ledger.serviceProviders.unstake(serviceProvider, GRT(60))

    // (50 * 40 + 100 * 60) / 100, rounded up
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider)).toMatchObject({
      tokensLocked: GRT(100),
      tokensLockedUntil: 130n,
    })
  })

  test('An expired lock is withdrawn before locking again', () => {
    ledger.serviceProviders.unstake(serviceProvider, GRT(10))
    ledger.clock.set(200n)
    ledger.serviceProviders.unstake(serviceProvider, GRT(20))

    expect(ledger.tokens.balanceOf(serviceProvider)).toEqual(GRT(10))
    expect(ledger.serviceProviders.getServiceProvider(serviceProvider)).toEqual({
      tokensStaked: GRT(190),
      tokensProvisioned: 0n,
      tokensLocked: GRT(20),
      tokensLockedUntil: 300n,
    })
  })

  test('Nothing to withdraw without locked tokens', () => {
    expect(
      catchLedgerError(() => ledger.serviceProviders.withdrawLocked(serviceProvider)).code,
    ).toEqual(LedgerErrorCode.LE024)
  })
})
