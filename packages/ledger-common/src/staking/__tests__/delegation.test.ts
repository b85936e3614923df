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
const otherServiceProvider = address(0x52)
const verifier = address(0x7e)
const alice = address(0xa1)
const bob = address(0xb0)

let ledger: TestLedger

const delegate = (delegator: typeof alice, tokens: bigint, to = serviceProvider) => {
  ledger.tokens.mint(delegator, tokens)
  return ledger.delegation.delegate(delegator, to, verifier, tokens)
}

describe('Delegation', () => {
  beforeEach(() => {
    ledger = createTestLedger()
    stake(ledger, serviceProvider, GRT(1000))
    ledger.provisions.provision(serviceProvider, serviceProvider, verifier, GRT(100), 0n, 100n)
  })

  test('Issues shares for delegated tokens', () => {
    expect(delegate(alice, GRT(100))).toEqual(GRT(100))
    expect(delegate(bob, GRT(50))).toEqual(GRT(50))

    const pool = ledger.delegation.getDelegationPool(serviceProvider, verifier)
    expect(pool?.tokens).toEqual(GRT(150))
    expect(pool?.shares).toEqual(GRT(150))
    expect(ledger.delegation.getDelegatedShares(serviceProvider, verifier, bob)).toEqual(GRT(50))
    expect(ledger.tokens.balanceOf(alice)).toEqual(0n)
  })

  test('Rejects delegations below the minimum or without a provision', () => {
    ledger.tokens.mint(alice, GRT(10))
    expect(
      catchLedgerError(() =>
        ledger.delegation.delegate(alice, serviceProvider, verifier, GRT('0.5')),
      ).code,
    ).toEqual(LedgerErrorCode.LE017)
    expect(
      catchLedgerError(() =>
        ledger.delegation.delegate(alice, otherServiceProvider, verifier, GRT(10)),
      ).code,
    ).toEqual(LedgerErrorCode.LE014)
    expect(
      catchLedgerError(() =>
        ledger.delegation.delegate(alice, serviceProvider, verifier, GRT(11)),
      ).code,
    ).toEqual(LedgerErrorCode.LE048)
    expect(ledger.delegation.getDelegationPool(serviceProvider, verifier)).toBeUndefined()
  })

  test('Honors the minimum shares expected by the delegator', () => {
    ledger.tokens.mint(alice, GRT(10))
    const error = catchLedgerError(() =>
      ledger.delegation.delegate(alice, serviceProvider, verifier, GRT(10), GRT(11)),
    )
    expect(error.code).toEqual(LedgerErrorCode.LE021)
    expect(ledger.tokens.balanceOf(alice)).toEqual(GRT(10))
  })

  test('Undelegated tokens thaw for the provision thawing period', () => {
    delegate(alice, GRT(100))
    delegate(bob, GRT(50))

    expect(
      catchLedgerError(() =>
        ledger.delegation.undelegate(bob, serviceProvider, verifier, GRT(51)),
      ).code,
    ).toEqual(LedgerErrorCode.LE018)

    ledger.delegation.undelegate(alice, serviceProvider, verifier, GRT(40))
    expect(ledger.delegation.getDelegatedShares(serviceProvider, verifier, alice)).toEqual(
      GRT(60),
    )
    expect(ledger.delegation.getDelegationPool(serviceProvider, verifier)).toMatchObject({
      tokens: GRT(150),
      shares: GRT(110),
      tokensThawing: GRT(40),
      sharesThawing: GRT(40),
    })
    expect(ledger.delegation.getThawRequests(serviceProvider, verifier, alice)).toMatchObject([
      { shares: GRT(40), thawingUntil: 100n },
    ])

    ledger.clock.set(99n)
    expect(ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier)).toEqual({
      tokens: 0n,
      shares: 0n,
    })
    expect(ledger.delegation.getThawRequests(serviceProvider, verifier, alice)).toHaveLength(1)

    ledger.clock.set(100n)
    expect(ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier)).toEqual({
      tokens: GRT(40),
      shares: 0n,
    })
    expect(ledger.tokens.balanceOf(alice)).toEqual(GRT(40))
    expect(ledger.delegation.getDelegationPool(serviceProvider, verifier)).toMatchObject({
      tokens: GRT(110),
      shares: GRT(110),
      tokensThawing: 0n,
      sharesThawing: 0n,
    })
  })

  test('Withdrawing without thaw requests fails', () => {
    delegate(alice, GRT(100))
    expect(
      catchLedgerError(() => ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier))
        .code,
    ).toEqual(LedgerErrorCode.LE020)
  })

  test('Tokens added to the pool raise the share price', () => {
    ledger.tokens.mint(bob, GRT(100))
    expect(
      catchLedgerError(() =>
        ledger.delegation.addToDelegationPool(bob, serviceProvider, verifier, GRT(100)),
      ).code,
    ).toEqual(LedgerErrorCode.LE019)

    delegate(alice, GRT(100))
    ledger.delegation.addToDelegationPool(bob, serviceProvider, verifier, GRT(100))
    ledger.delegation.undelegate(alice, serviceProvider, verifier, GRT(50))

    expect(ledger.delegation.getDelegationPool(serviceProvider, verifier)?.tokensThawing).toEqual(
      GRT(100),
    )
  })

  test('Redelegates thawed tokens to another provider', () => {
    stake(ledger, otherServiceProvider, GRT(100))
    ledger.provisions.provision(
      otherServiceProvider,
      otherServiceProvider,
      verifier,
      GRT(100),
      0n,
      0n,
    )
    delegate(alice, GRT(100))
    ledger.delegation.undelegate(alice, serviceProvider, verifier, GRT(100))
    ledger.clock.set(100n)

    expect(
      catchLedgerError(() =>
        ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier, {
          serviceProvider: otherServiceProvider,
          verifier,
          minSharesOut: GRT(101),
        }),
      ).code,
    ).toEqual(LedgerErrorCode.LE021)
    expect(ledger.delegation.getThawRequests(serviceProvider, verifier, alice)).toHaveLength(1)

    expect(
      ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier, {
        serviceProvider: otherServiceProvider,
        verifier,
      }),
    ).toEqual({ tokens: GRT(100), shares: GRT(100) })
    expect(
      ledger.delegation.getDelegatedShares(otherServiceProvider, verifier, alice),
    ).toEqual(GRT(100))
    expect(ledger.delegation.getDelegationPool(serviceProvider, verifier)?.tokens).toEqual(0n)
    expect(ledger.tokens.balanceOf(alice)).toEqual(0n)
  })
})

describe('Delegation to a migrated provider', () => {
  beforeEach(() => {
    ledger = createTestLedger()
    stake(ledger, serviceProvider, GRT(100))
    ledger.provisions.provision(serviceProvider, serviceProvider, verifier, GRT(100), 0n, 1000n)
    delegate(alice, GRT(50))
    ledger.delegation.undelegate(alice, serviceProvider, verifier, GRT(50))

    // Shorten the provider's own thawing period and leave the provision
    ledger.provisions.setProvisionParameters(serviceProvider, serviceProvider, verifier, 0n, 0n)
    ledger.provisions.acceptProvisionParameters(verifier, serviceProvider)
    ledger.provisions.thaw(serviceProvider, serviceProvider, verifier, GRT(100))
    ledger.provisions.deprovision(serviceProvider, serviceProvider, verifier, GRT(100))
  })

  test('Cannot unlock before the provider transferred its stake', () => {
    expect(
      catchLedgerError(() =>
        ledger.delegation.unlockDelegationToMigratedProvider(alice, serviceProvider, verifier),
      ).code,
    ).toEqual(LedgerErrorCode.LE022)
  })

  test('Unlocks pending requests once the provider left', () => {
    ledger.serviceProviders.transferStakeToOtherChain(serviceProvider, address(0x12), GRT(100))
    expect(ledger.tokens.balanceOf(GATEWAY)).toEqual(GRT(100))
    expect(ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier).tokens).toEqual(
      0n,
    )

    expect(
      ledger.delegation.unlockDelegationToMigratedProvider(alice, serviceProvider, verifier),
    ).toEqual(1)
    expect(ledger.delegation.withdrawDelegated(alice, serviceProvider, verifier).tokens).toEqual(
      GRT(50),
    )
    expect(ledger.tokens.balanceOf(alice)).toEqual(GRT(50))

    expect(
      catchLedgerError(() =>
        ledger.delegation.unlockDelegationToMigratedProvider(alice, serviceProvider, verifier),
      ).code,
    ).toEqual(LedgerErrorCode.LE020)
  })
})
