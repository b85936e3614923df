import { Address, Logger } from '@graphprotocol/common-ts'
import { ledgerError, LedgerErrorCode } from './errors'
import { LedgerStore } from './store'

/**
 * Decides whether a caller may act on behalf of a service provider.
 *
 * A provider is always authorized for itself. Other callers need to be set
 * as an operator by the provider, either for a single verifier or globally.
 */
export class Authorizer {
  private logger: Logger

  constructor(private store: LedgerStore, logger: Logger) {
    this.logger = logger.child({ component: 'Authorizer' })
  }

  isAuthorized(caller: Address, serviceProvider: Address, verifier: Address): boolean {
    return (
      caller === serviceProvider ||
      this.store.operatorsFor(serviceProvider, verifier).has(caller) ||
      this.store.globalOperatorsFor(serviceProvider).has(caller)
    )
  }

  assertAuthorized(caller: Address, serviceProvider: Address, verifier: Address): void {
    if (!this.isAuthorized(caller, serviceProvider, verifier)) {
      throw ledgerError(
        LedgerErrorCode.LE001,
        `${caller} is not authorized for provider ${serviceProvider} and verifier ${verifier}`,
      )
    }
  }

  setOperator(caller: Address, verifier: Address, operator: Address, allowed: boolean): void {
    if (operator === caller) {
      throw ledgerError(LedgerErrorCode.LE001, 'Cannot set self as operator')
    }
    const operators = this.store.operatorsFor(caller, verifier)
    if (allowed) {
      operators.add(operator)
    } else {
      operators.delete(operator)
    }
    this.logger.info('Operator set', { serviceProvider: caller, verifier, operator, allowed })
  }

  setGlobalOperator(caller: Address, operator: Address, allowed: boolean): void {
    if (operator === caller) {
      throw ledgerError(LedgerErrorCode.LE001, 'Cannot set self as operator')
    }
    const operators = this.store.globalOperatorsFor(caller)
    if (allowed) {
      operators.add(operator)
    } else {
      operators.delete(operator)
    }
    this.logger.info('Global operator set', { serviceProvider: caller, operator, allowed })
  }
}
