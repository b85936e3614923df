export * from './authorization'
export * from './clock'
export * from './errors'
export * from './ledger'
export * from './math'
export * from './specification'
export * from './store'
export * from './tokens'
export * from './types'
export * from './staking/share-ledger'
export * from './staking/thaw-queue'
export * from './staking/service-providers'
export * from './staking/legacy-extension'
export * from './staking/provisions'
export * from './staking/delegation'
export * as eip712 from './disputes/eip712'
export * from './disputes/attestation'
export * from './disputes/dispute-manager'
export * from './migration/merkle-patricia-proof'
export * from './migration/state-proof'
export * from './migration/block-header'
export * from './migration/callhook'
export * from './migration/bridge'
export * from './migration/curation'
export * from './migration/coordinator'
