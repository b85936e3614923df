import { Address } from '@graphprotocol/common-ts'
import { ledgerError, LedgerErrorCode } from './errors'
import { add, sub } from './math'

/**
 * Moves tokens between accounts and the ledger's custody. Only balances
 * matter to the ledger; how a transfer settles is up to the implementation.
 */
export interface TokenCollaborator {
  pull(from: Address, amount: bigint): void
  push(to: Address, amount: bigint): void
  burn(amount: bigint): void
  balanceOf(account: Address): bigint
}

export class InMemoryTokens implements TokenCollaborator {
  private balances = new Map<Address, bigint>()
  custody = 0n
  burned = 0n

  mint(to: Address, amount: bigint): void {
    this.balances.set(to, add(this.balanceOf(to), amount))
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n
  }

  // Callers validate first, so these only fail on a broken invariant
  pull(from: Address, amount: bigint): void {
    const balance = this.balanceOf(from)
    if (balance < amount) {
      throw ledgerError(LedgerErrorCode.LE048, `${from} holds ${balance}, needs ${amount}`)
    }
    this.balances.set(from, balance - amount)
    this.custody = add(this.custody, amount)
  }

  push(to: Address, amount: bigint): void {
    this.custody = sub(this.custody, amount)
    this.balances.set(to, add(this.balanceOf(to), amount))
  }

  burn(amount: bigint): void {
    this.custody = sub(this.custody, amount)
    this.burned = add(this.burned, amount)
  }
}
