import * as path from 'path'
import { ZodError } from 'zod'
import {
  CurationOptions,
  formatZodParsingError,
  loadProtocolSpecification,
  ProtocolSpecification,
  StakingOptions,
} from '../specification'
import { ARBITRATOR, COUNTERPART, GRT } from './util'

const specificationFile = (name: string): string =>
  path.join(__dirname, 'specification-files', name)

function loadError(name: string): ZodError {
  try {
    loadProtocolSpecification(specificationFile(name))
  } catch (error) {
    if (error instanceof ZodError) {
      return error
    }
    throw error
  }
  throw new Error(`Expected ${name} to fail validation`)
}

describe('Protocol specification deserialization', () => {
  test('Valid specification file', () => {
    const specification = loadProtocolSpecification(specificationFile('valid.yml'))
    expect(specification.staking).toStrictEqual({
      minimumProvisionTokens: GRT(10),
      maxThawingPeriod: 604_800n,
      maxThawRequests: 50,
      minimumDelegation: GRT('0.5'),
      delegationSlashingEnabled: true,
      legacyThawingPeriod: 0n,
    })
    expect(specification.curation.curationTaxPercentage).toEqual(25_000n)
    expect(specification.migration.counterpartAddress).toEqual(COUNTERPART)
    expect(specification.migration.storageLayout).toStrictEqual({
      subgraphsMappingSlot: 21,
      curatorSignalSlotOffset: 3,
    })
    expect(specification.disputes).toMatchObject({
      arbitratorAddress: ARBITRATOR,
      chainId: 42161,
      minimumDeposit: GRT(100),
      fishermanRewardCut: 250_000n,
      maxSlashingCut: 50_000n,
      disputePeriod: 86_400n,
    })
  })

  test('Missing sections take their defaults', () => {
    const specification = loadProtocolSpecification(specificationFile('valid-missing.yml'))
    const expectedStaking = StakingOptions.parse({})
    expect(expectedStaking).not.toEqual({})
    expect(specification.staking).toStrictEqual(expectedStaking)
    expect(specification.staking).toStrictEqual({
      minimumProvisionTokens: GRT(1),
      maxThawingPeriod: 2_419_200n,
      maxThawRequests: 100,
      minimumDelegation: GRT(1),
      delegationSlashingEnabled: false,
      legacyThawingPeriod: 0n,
    })
    expect(specification.curation).toStrictEqual(CurationOptions.parse({}))
    expect(specification.migration.storageLayout).toStrictEqual({
      subgraphsMappingSlot: 18,
      curatorSignalSlotOffset: 2,
    })
    expect(specification.disputes).toMatchObject({
      chainId: 1,
      minimumDeposit: GRT(10_000),
      fishermanRewardCut: 500_000n,
      maxSlashingCut: 25_000n,
      disputePeriod: 604_800n,
      domainName: 'Indexing Protocol',
      domainVersion: '0',
    })
  })
})

interface FailedDeserializationTest {
  file: string
  path: string[]
  message: string
}

describe('Failed deserialization', () => {
  const failedTests: FailedDeserializationTest[] = [
    {
      file: 'invalid-missing-field.yml',
      path: ['migration', 'governorAddress'],
      message: 'Required',
    },
    {
      file: 'invalid-extra-field.yml',
      path: ['staking'],
      message: "Unrecognized key(s) in object: 'unknownOption'",
    },
    {
      file: 'invalid-address.yml',
      path: ['disputes', 'arbitratorAddress'],
      message: 'Invalid contract address',
    },
    {
      file: 'invalid-reward-cut.yml',
      path: ['disputes', 'fishermanRewardCut'],
      message: 'Number must be less than or equal to 500000',
    },
    {
      file: 'invalid-domain-salt.yml',
      path: ['disputes', 'domainSalt'],
      message: 'Must be a 32 byte hex string',
    },
  ]

  test.each(failedTests)(
    'Validation should fail for $file',
    (t: FailedDeserializationTest) => {
      const error = loadError(t.file)
      const issue = error.issues[0]
      expect(issue.path).toStrictEqual(t.path)
      expect(issue.message).toStrictEqual(t.message)
    },
  )

  test('Formats validation errors one issue per line', () => {
    const file = specificationFile('invalid-address.yml')
    const lines = formatZodParsingError(loadError('invalid-address.yml'), file).split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toEqual(`Ledger Configuration Error(s):  [ file: ${file} ]`)
    expect(lines[1]).toMatch(/^- Invalid contract address/)
    expect(lines[1]).toContain('disputes.arbitratorAddress')
  })

  test('Rejects a curation tax above 100%', () => {
    const result = ProtocolSpecification.shape.curation.safeParse({
      curationTaxPercentage: 1_000_001,
    })
    expect(result.success).toBe(false)
  })
})
