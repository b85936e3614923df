import { CustomError } from 'ts-custom-error'
import { Metrics } from '@graphprotocol/common-ts'

interface LedgerErrorMetrics {
  error: InstanceType<Metrics['client']['Counter']>
}

let ledgerErrorMetrics: LedgerErrorMetrics | undefined

const ERROR_DOCS_PATH = `docs/errors.md`

export enum LedgerErrorCategory {
  Authorization = 'Authorization',
  InvalidInput = 'InvalidInput',
  StateConflict = 'StateConflict',
  ProofVerificationFailure = 'ProofVerificationFailure',
  ArithmeticFailure = 'ArithmeticFailure',
  CapacityExceeded = 'CapacityExceeded',
}

export enum LedgerErrorCode {
  LE001 = 'LE001',
  LE002 = 'LE002',
  LE003 = 'LE003',
  LE004 = 'LE004',
  LE005 = 'LE005',
  LE006 = 'LE006',
  LE007 = 'LE007',
  LE008 = 'LE008',
  LE009 = 'LE009',
  LE010 = 'LE010',
  LE011 = 'LE011',
  LE012 = 'LE012',
  LE013 = 'LE013',
  LE014 = 'LE014',
  LE015 = 'LE015',
  LE016 = 'LE016',
  LE017 = 'LE017',
  LE018 = 'LE018',
  LE019 = 'LE019',
  LE020 = 'LE020',
  LE021 = 'LE021',
  LE022 = 'LE022',
  LE023 = 'LE023',
  LE024 = 'LE024',
  LE025 = 'LE025',
  LE026 = 'LE026',
  LE027 = 'LE027',
  LE028 = 'LE028',
  LE029 = 'LE029',
  LE030 = 'LE030',
  LE031 = 'LE031',
  LE032 = 'LE032',
  LE033 = 'LE033',
  LE034 = 'LE034',
  LE035 = 'LE035',
  LE036 = 'LE036',
  LE037 = 'LE037',
  LE038 = 'LE038',
  LE039 = 'LE039',
  LE040 = 'LE040',
  LE041 = 'LE041',
  LE042 = 'LE042',
  LE043 = 'LE043',
  LE044 = 'LE044',
  LE045 = 'LE045',
  LE046 = 'LE046',
  LE047 = 'LE047',
  LE048 = 'LE048',
  LE049 = 'LE049',
  LE050 = 'LE050',
  LE051 = 'LE051',
  LE052 = 'LE052',
  LE053 = 'LE053',
  LE054 = 'LE054',
}

export const LEDGER_ERROR_MESSAGES: Record<LedgerErrorCode, string> = {
  LE001: 'Caller is not authorized for this operation',
  LE002: 'Amount must not be zero',
  LE003: 'Address must not be the zero address',
  LE004: 'Malformed input bytes',
  LE005: 'Arithmetic overflow',
  LE006: 'Operation would issue zero shares',
  LE007: 'Insufficient idle stake',
  LE008: 'Insufficient tokens available',
  LE009: 'Insufficient thawed tokens',
  LE010: 'Too many thaw requests',
  LE011: 'Provision is below the minimum provision size',
  LE012: 'Max verifier cut exceeds the allowed maximum',
  LE013: 'Thawing period exceeds the allowed maximum',
  LE014: 'Provision not found',
  LE015: 'Provision already exists',
  LE016: 'Verifier cut is too high',
  LE017: 'Delegation is below the minimum delegation',
  LE018: 'Insufficient delegation shares',
  LE019: 'Delegation pool is in an invalid state',
  LE020: 'Nothing is thawing',
  LE021: 'Fewer shares issued than the requested minimum',
  LE022: 'Service provider has not transferred its stake to the other chain',
  LE023: 'Legacy locked tokens are still locked',
  LE024: 'No legacy locked tokens to withdraw',
  LE025: 'Remaining stake would be below the minimum provision size',
  LE026: 'Subgraph was not migrated',
  LE027: 'Subgraph migration already finalized',
  LE028: 'Subgraph already exists',
  LE029: 'Subgraph deployment ID must not be zero',
  LE030: 'Subgraph deployment is pre-curated',
  LE031: 'Curator balance already claimed',
  LE032: 'Block header does not match the expected block hash',
  LE033: 'Invalid block header',
  LE034: 'MPT: invalid root hash',
  LE035: 'MPT: invalid node hash',
  LE036: 'MPT: key not found',
  LE037: 'MPT: invalid proof node',
  LE038: 'Only the gateway can relay messages',
  LE039: 'Only the counterpart contract can send this message',
  LE040: 'Invalid attestation',
  LE041: 'No indexer found for the attestation signer',
  LE042: 'Attestations are not conflicting',
  LE043: 'Dispute deposit is below the minimum deposit',
  LE044: 'Dispute already created',
  LE045: 'Dispute not found',
  LE046: 'Dispute is not pending',
  LE047: 'Dispute period has not finished',
  LE048: 'Insufficient token balance',
  LE049: 'Subgraph is disabled',
  LE050: 'Subgraph not found',
  LE051: 'Slash amount exceeds the provision and its delegation pool',
  LE052: 'Curation deposit is below the minimum curation deposit',
  LE053: 'Slash amount exceeds the maximum slashable amount',
  LE054: 'Dispute is in conflict with another dispute',
}

export const LEDGER_ERROR_CATEGORIES: Record<LedgerErrorCode, LedgerErrorCategory> = {
  LE001: LedgerErrorCategory.Authorization,
  LE002: LedgerErrorCategory.InvalidInput,
  LE003: LedgerErrorCategory.InvalidInput,
  LE004: LedgerErrorCategory.InvalidInput,
  LE005: LedgerErrorCategory.ArithmeticFailure,
  LE006: LedgerErrorCategory.ArithmeticFailure,
  LE007: LedgerErrorCategory.ArithmeticFailure,
  LE008: LedgerErrorCategory.ArithmeticFailure,
  LE009: LedgerErrorCategory.ArithmeticFailure,
  LE010: LedgerErrorCategory.CapacityExceeded,
  LE011: LedgerErrorCategory.InvalidInput,
  LE012: LedgerErrorCategory.InvalidInput,
  LE013: LedgerErrorCategory.InvalidInput,
  LE014: LedgerErrorCategory.StateConflict,
  LE015: LedgerErrorCategory.StateConflict,
  LE016: LedgerErrorCategory.InvalidInput,
  LE017: LedgerErrorCategory.InvalidInput,
  LE018: LedgerErrorCategory.ArithmeticFailure,
  LE019: LedgerErrorCategory.StateConflict,
  LE020: LedgerErrorCategory.StateConflict,
  LE021: LedgerErrorCategory.ArithmeticFailure,
  LE022: LedgerErrorCategory.StateConflict,
  LE023: LedgerErrorCategory.StateConflict,
  LE024: LedgerErrorCategory.StateConflict,
  LE025: LedgerErrorCategory.InvalidInput,
  LE026: LedgerErrorCategory.StateConflict,
  LE027: LedgerErrorCategory.StateConflict,
  LE028: LedgerErrorCategory.StateConflict,
  LE029: LedgerErrorCategory.InvalidInput,
  LE030: LedgerErrorCategory.StateConflict,
  LE031: LedgerErrorCategory.StateConflict,
  LE032: LedgerErrorCategory.ProofVerificationFailure,
  LE033: LedgerErrorCategory.InvalidInput,
  LE034: LedgerErrorCategory.ProofVerificationFailure,
  LE035: LedgerErrorCategory.ProofVerificationFailure,
  LE036: LedgerErrorCategory.ProofVerificationFailure,
  LE037: LedgerErrorCategory.ProofVerificationFailure,
  LE038: LedgerErrorCategory.Authorization,
  LE039: LedgerErrorCategory.Authorization,
  LE040: LedgerErrorCategory.InvalidInput,
  LE041: LedgerErrorCategory.StateConflict,
  LE042: LedgerErrorCategory.InvalidInput,
  LE043: LedgerErrorCategory.InvalidInput,
  LE044: LedgerErrorCategory.StateConflict,
  LE045: LedgerErrorCategory.StateConflict,
  LE046: LedgerErrorCategory.StateConflict,
  LE047: LedgerErrorCategory.StateConflict,
  LE048: LedgerErrorCategory.ArithmeticFailure,
  LE049: LedgerErrorCategory.StateConflict,
  LE050: LedgerErrorCategory.StateConflict,
  LE051: LedgerErrorCategory.ArithmeticFailure,
  LE052: LedgerErrorCategory.InvalidInput,
  LE053: LedgerErrorCategory.InvalidInput,
  LE054: LedgerErrorCategory.StateConflict,
}

export type LedgerErrorCause = unknown

export class LedgerError extends CustomError {
  public code: LedgerErrorCode
  public category: LedgerErrorCategory
  public explanation: string
  public cause?: LedgerErrorCause

  constructor(code: LedgerErrorCode, cause?: LedgerErrorCause) {
    super(LEDGER_ERROR_MESSAGES[code])
    this.code = code
    this.category = LEDGER_ERROR_CATEGORIES[code]
    this.explanation = `${ERROR_DOCS_PATH}#${code.toLowerCase()}`
    this.cause = cause

    if (ledgerErrorMetrics) {
      ledgerErrorMetrics.error.inc({ code: this.code })
    }
  }
}

export function ledgerError(code: LedgerErrorCode, cause?: LedgerErrorCause): LedgerError {
  return new LedgerError(code, cause)
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code)
}

export function registerLedgerErrorMetrics(metrics: Metrics): void {
  ledgerErrorMetrics = {
    error: new metrics.client.Counter({
      name: 'ledger_error',
      help: 'Ledger errors observed over time',
      labelNames: ['code'],
      registers: [metrics.registry],
    }),
  }
}
