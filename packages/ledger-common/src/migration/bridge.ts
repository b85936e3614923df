import { Address, Logger, toAddress } from '@graphprotocol/common-ts'
import { toBeHex, ZeroAddress } from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'

const ALIAS_OFFSET = 0x1111000000000000000000000000000000001111n
const ADDRESS_SPACE = 1n << 160n

/**
 * The address a contract on the base chain appears as when it sends a
 * message to the scaling chain.
 */
export function applyL1ToL2Alias(address: Address): Address {
  return toAddress(toBeHex((BigInt(address) + ALIAS_OFFSET) % ADDRESS_SPACE, 20))
}

export interface BridgeAuthenticatorOptions {
  gatewayAddress: Address
  counterpartAddress: Address
  governorAddress: Address
}

/** Checks that messages come from the trusted gateway and counterpart */
export class BridgeAuthenticator {
  private logger: Logger
  private gateway: Address
  private counterpart: Address
  private governor: Address

  constructor(options: BridgeAuthenticatorOptions, logger: Logger) {
    this.logger = logger.child({ component: 'BridgeAuthenticator' })
    this.gateway = options.gatewayAddress
    this.counterpart = options.counterpartAddress
    this.governor = options.governorAddress
  }

  get counterpartAddress(): Address {
    return this.counterpart
  }

  /** A token transfer relayed by the gateway, sent by the counterpart */
  assertGatewayMessage(caller: Address, from: Address): void {
    if (caller !== this.gateway) {
      throw ledgerError(LedgerErrorCode.LE038, caller)
    }
    if (from !== this.counterpart) {
      throw ledgerError(LedgerErrorCode.LE039, from)
    }
  }

  /** A message sent directly by the counterpart through the bridge */
  assertCounterpartMessage(caller: Address): void {
    const alias = applyL1ToL2Alias(this.counterpart)
    if (caller !== alias) {
      throw ledgerError(LedgerErrorCode.LE039, `${caller} is not ${alias}`)
    }
  }

  setCounterpartAddress(caller: Address, counterpart: Address): void {
    if (caller !== this.governor) {
      throw ledgerError(LedgerErrorCode.LE001, `${caller} is not the governor`)
    }
    if (counterpart === ZeroAddress) {
      throw ledgerError(LedgerErrorCode.LE003)
    }
    this.counterpart = counterpart
    this.logger.info('Counterpart address set', { counterpart })
  }
}
