import { readFileSync } from 'fs'
import { toAddress, parseGRT } from '@graphprotocol/common-ts'
import { isAddress } from 'ethers'
import { z, ZodError } from 'zod'
import { fromZodError, FromZodErrorOptions, ValidationError } from 'zod-validation-error'
import YAML from 'yaml'

export const MAX_MAX_VERIFIER_CUT = 500_000n

function positiveInteger(): z.ZodNumber {
  return z.number().int().positive().finite()
}

function seconds(): z.ZodEffects<z.ZodNumber, bigint, number> {
  return z
    .number()
    .int()
    .nonnegative()
    .finite()
    .transform((x) => BigInt(x))
}

function PPM(max = 1_000_000): z.ZodEffects<z.ZodNumber, bigint, number> {
  return z
    .number()
    .int()
    .nonnegative()
    .max(max)
    .transform((x) => BigInt(x))
}

function GRT(): z.ZodEffects<z.ZodNumber, bigint, number> {
  return z
    .number()
    .nonnegative()
    .finite()
    .transform((x) => parseGRT(x.toString()).toBigInt())
}

function address() {
  return z
    .string()
    .refine((val) => isAddress(val), {
      message: 'Invalid contract address',
    })
    .transform(toAddress)
}

// Staking, provisioning and delegation parameters
export const StakingOptions = z
  .object({
    minimumProvisionTokens: GRT().default(1),
    maxThawingPeriod: seconds().default(28 * 24 * 60 * 60),
    maxThawRequests: positiveInteger().default(100),
    minimumDelegation: GRT().default(1),
    delegationSlashingEnabled: z.boolean().default(false),
    // A non-zero value enables the deprecated global-lock withdrawal mode
    legacyThawingPeriod: seconds().default(0),
  })
  .strict()
  .default({})
export type StakingOptions = z.infer<typeof StakingOptions>

export const CurationOptions = z
  .object({
    minimumCurationDeposit: GRT()
      .refine((x) => x > 0n, { message: 'Must be greater than 0' })
      .default(1),
    curationTaxPercentage: PPM().default(10_000),
  })
  .strict()
  .default({})
export type CurationOptions = z.infer<typeof CurationOptions>

// Where the counterpart contract on L1 keeps curator signal
export const StorageLayout = z
  .object({
    subgraphsMappingSlot: z.number().int().nonnegative().default(18),
    curatorSignalSlotOffset: z.number().int().nonnegative().default(2),
  })
  .strict()
  .default({})
export type StorageLayout = z.infer<typeof StorageLayout>

export const MigrationOptions = z
  .object({
    counterpartAddress: address(),
    gatewayAddress: address(),
    governorAddress: address(),
    storageLayout: StorageLayout,
  })
  .strict()
export type MigrationOptions = z.infer<typeof MigrationOptions>

export const DisputeOptions = z
  .object({
    arbitratorAddress: address(),
    disputeManagerAddress: address(),
    chainId: positiveInteger().default(1),
    minimumDeposit: GRT().default(10_000),
    fishermanRewardCut: PPM(Number(MAX_MAX_VERIFIER_CUT)).default(500_000),
    maxSlashingCut: PPM().default(25_000),
    disputePeriod: seconds().default(7 * 24 * 60 * 60),
    // EIP-712 domain attestations are signed under
    domainName: z.string().min(1).default('Indexing Protocol'),
    domainVersion: z.string().min(1).default('0'),
    domainSalt: z
      .string()
      .regex(/^0x[0-9a-fA-F]{64}$/, { message: 'Must be a 32 byte hex string' })
      .default('0xa070ffb1cd7409649bf77822cce74495468e06dbfaef09556838bf188679b9c2'),
  })
  .strict()
export type DisputeOptions = z.infer<typeof DisputeOptions>

// All parameters of a ledger instance
export const ProtocolSpecification = z
  .object({
    staking: StakingOptions,
    curation: CurationOptions,
    migration: MigrationOptions,
    disputes: DisputeOptions,
  })
  .strict()
export type ProtocolSpecification = z.infer<typeof ProtocolSpecification>

export function loadProtocolSpecification(filePath: string): ProtocolSpecification {
  const text = readFileSync(filePath, 'utf8')
  return ProtocolSpecification.parse(YAML.parse(text))
}

type ErrorFormatOptions = Pick<
  Required<FromZodErrorOptions>,
  'issueSeparator' | 'prefix' | 'prefixSeparator'
>

const errorFormatOptions: ErrorFormatOptions = {
  // Arbitrary character sequence that is unlikely to appear as part of a validation
  // message. It is used for splitting the concatenated error message into individual
  // issues.
  issueSeparator: '@#validation-error#@',
  prefixSeparator: ':',
  prefix: 'Ledger Configuration Error(s)',
}

function formatError(error: ValidationError, filePath?: string): string {
  const prefix = errorFormatOptions.prefix + errorFormatOptions.prefixSeparator
  const issues = error
    .toString()
    .substring(prefix.length)
    .split(errorFormatOptions.issueSeparator)
    .map((issue) => issue.trim())
    .map((issue) => `- ${issue}`)
    .join('\n')
  const file = filePath ? `  [ file: ${filePath} ]` : ''
  return `${prefix}${file}\n${issues}`
}

// Turns a ZodError into one human-friendly line per validation issue
export function formatZodParsingError(error: ZodError, filePath?: string): string {
  return formatError(fromZodError(error, errorFormatOptions), filePath)
}
