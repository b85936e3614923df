import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { BytesLike, solidityPackedKeccak256 } from 'ethers'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, mulDiv } from '../math'
import { LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'
import { Bytes32, MigrationRecord, Subgraph, ZERO_BYTES32 } from '../types'
import { decodeBlockHeader } from './block-header'
import { BridgeAuthenticator } from './bridge'
import { decodeMigrationCallhook } from './callhook'
import { CurationCollaborator } from './curation'
import {
  curatorSignalSlot,
  CuratorSignalLayout,
  decodeStorageSlotProof,
  verifyStorageSlot,
} from './state-proof'

// Ids arrive as hex in any case; records are keyed by the lowercase form
const subgraphKey = (subgraphId: Bytes32): Bytes32 => subgraphId.toLowerCase()

export enum MigrationStatus {
  NotMigrated = 'NotMigrated',
  PendingFinalization = 'PendingFinalization',
  Finalized = 'Finalized',
}

/**
 * Receives subgraphs migrated from the base chain and lets their curators
 * claim the signal they held there, either by proving their balance against
 * the block the subgraph was locked at or through a message from the
 * counterpart contract.
 */
export class CrossChainMigrationCoordinator {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private bridge: BridgeAuthenticator,
    private curation: CurationCollaborator,
    private tokens: TokenCollaborator,
    private layout: CuratorSignalLayout,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'CrossChainMigrationCoordinator' })
  }

  getSubgraph(subgraphId: Bytes32): Subgraph | undefined {
    return this.store.subgraphs.get(subgraphKey(subgraphId))
  }

  getMigration(subgraphId: Bytes32): MigrationRecord | undefined {
    return this.store.migrations.get(subgraphKey(subgraphId))
  }

  getMigrationStatus(subgraphId: Bytes32): MigrationStatus {
    const record = this.store.migrations.get(subgraphKey(subgraphId))
    if (!record) {
      return MigrationStatus.NotMigrated
    }
    return record.l2Done ? MigrationStatus.Finalized : MigrationStatus.PendingFinalization
  }

  getCuratorSignal(subgraphId: Bytes32, curator: Address): bigint {
    return this.store.subgraphs.get(subgraphKey(subgraphId))?.curatorSignal.get(curator) ?? 0n
  }

  isCuratorClaimed(subgraphId: Bytes32, curator: Address): boolean {
    return this.store.isCuratorClaimed(subgraphKey(subgraphId), curator)
  }

  /**
   * Bridge callback for the curated tokens of a subgraph. The subgraph is
   * recorded disabled until its owner finishes the migration.
   */
  onTokenTransfer(caller: Address, from: Address, amount: bigint, callhookData: BytesLike): void {
    this.bridge.assertGatewayMessage(caller, from)
    const message = decodeMigrationCallhook(callhookData)
    const subgraphId = subgraphKey(message.subgraphId)
    this.logger.debug('Execute onTokenTransfer()', {
      subgraphId,
      owner: message.owner,
      amount: amount.toString(),
    })

    const record = this.store.migrations.get(subgraphId)
    if (record?.l2Done) {
      throw ledgerError(LedgerErrorCode.LE027, subgraphId)
    }
    if (!record && this.store.subgraphs.has(subgraphId)) {
      throw ledgerError(LedgerErrorCode.LE028, subgraphId)
    }

    this.store.subgraphs.set(subgraphId, {
      id: subgraphId,
      owner: message.owner,
      nSignal: message.nSignal,
      vSignal: 0n,
      deploymentId: ZERO_BYTES32,
      reserveRatio: message.reserveRatio,
      disabled: true,
      withdrawableTokens: 0n,
      metadata: message.metadata,
      curatorSignal: new Map(),
    })
    this.store.migrations.set(subgraphId, {
      tokens: amount,
      lockedAtBlockHash: message.lockBlockHash,
      l1Done: true,
      l2Done: false,
      deprecated: false,
      claimedSignal: 0n,
    })

    this.logger.info('Subgraph received from the other chain', {
      subgraphId,
      owner: message.owner,
      amountGRT: formatGRT(amount),
      lockBlockHash: message.lockBlockHash,
    })
  }

  /**
   * Publishes the deployment of a received subgraph and mints its signal
   * without curation tax. Returns the signal minted.
   */
  finishMigration(
    caller: Address,
    subgraphId: Bytes32,
    deploymentId: Bytes32,
    metadata: Bytes32,
  ): bigint {
    subgraphId = subgraphKey(subgraphId)
    this.logger.debug('Execute finishMigration()', { subgraphId, deploymentId })
    const record = this.store.migrations.get(subgraphId)
    const subgraph = this.store.subgraphs.get(subgraphId)
    if (!record || !subgraph || record.l2Done) {
      throw ledgerError(LedgerErrorCode.LE026, subgraphId)
    }
    if (caller !== subgraph.owner) {
      throw ledgerError(LedgerErrorCode.LE001, `${caller} does not own ${subgraphId}`)
    }
    if (deploymentId === ZERO_BYTES32) {
      throw ledgerError(LedgerErrorCode.LE029)
    }
    if (this.curation.isCurated(deploymentId)) {
      throw ledgerError(LedgerErrorCode.LE030, deploymentId)
    }

    const vSignal = record.tokens > 0n ? this.curation.mintTaxFree(deploymentId, record.tokens) : 0n
    subgraph.vSignal = vSignal
    subgraph.deploymentId = deploymentId
    subgraph.metadata = metadata
    subgraph.disabled = false
    record.l2Done = true

    this.logger.info('Successfully finished subgraph migration', {
      subgraphId,
      deploymentId,
      amountGRT: formatGRT(record.tokens),
      vSignal: vSignal.toString(),
    })
    return vSignal
  }

  /**
   * Credits the caller with the signal they held on the base chain, proven
   * against the state at the block the subgraph was locked. Returns the
   * signal credited.
   */
  claimCuratorBalance(
    caller: Address,
    subgraphId: Bytes32,
    blockHeaderRlp: BytesLike,
    proofRlp: BytesLike,
  ): bigint {
    subgraphId = subgraphKey(subgraphId)
    this.logger.debug('Execute claimCuratorBalance()', { subgraphId, curator: caller })
    const { record, subgraph } = this.requireFinalized(subgraphId)
    if (this.store.isCuratorClaimed(subgraphId, caller)) {
      throw ledgerError(LedgerErrorCode.LE031, `${caller} on ${subgraphId}`)
    }

    const header = decodeBlockHeader(blockHeaderRlp, record.lockedAtBlockHash)
    const proof = decodeStorageSlotProof(proofRlp)
    const slot = curatorSignalSlot(caller, subgraphId, this.layout)
    const signal = verifyStorageSlot(header.stateRoot, this.bridge.counterpartAddress, slot, proof)

    this.credit(subgraphId, record, subgraph, caller, caller, signal)
    return signal
  }

  /** Credits signal the counterpart already validated, sent through the bridge */
  claimCuratorBalanceToBeneficiary(
    caller: Address,
    subgraphId: Bytes32,
    l1Curator: Address,
    amount: bigint,
    beneficiary: Address,
  ): void {
    subgraphId = subgraphKey(subgraphId)
    this.logger.debug('Execute claimCuratorBalanceToBeneficiary()', {
      subgraphId,
      l1Curator,
      beneficiary,
    })
    this.bridge.assertCounterpartMessage(caller)
    const { record, subgraph } = this.requireFinalized(subgraphId)
    if (this.store.isCuratorClaimed(subgraphId, l1Curator)) {
      throw ledgerError(LedgerErrorCode.LE031, `${l1Curator} on ${subgraphId}`)
    }
    this.credit(subgraphId, record, subgraph, l1Curator, beneficiary, amount)
  }

  setCounterpartAddress(caller: Address, counterpart: Address): void {
    this.bridge.setCounterpartAddress(caller, counterpart)
  }

  /** Publishes a subgraph created on this chain, returning its id */
  publishSubgraph(
    caller: Address,
    deploymentId: Bytes32,
    reserveRatio: number,
    metadata: Bytes32,
  ): Bytes32 {
    if (deploymentId === ZERO_BYTES32) {
      throw ledgerError(LedgerErrorCode.LE029)
    }
    const nonce = this.store.subgraphNonces.get(caller) ?? 0n
    const subgraphId = solidityPackedKeccak256(['address', 'uint256'], [caller, nonce])
    if (this.store.subgraphs.has(subgraphId)) {
      throw ledgerError(LedgerErrorCode.LE028, subgraphId)
    }

    this.store.subgraphNonces.set(caller, nonce + 1n)
    this.store.subgraphs.set(subgraphId, {
      id: subgraphId,
      owner: caller,
      nSignal: 0n,
      vSignal: 0n,
      deploymentId,
      reserveRatio,
      disabled: false,
      withdrawableTokens: 0n,
      metadata,
      curatorSignal: new Map(),
    })
    this.logger.info('Subgraph published', { subgraphId, owner: caller, deploymentId })
    return subgraphId
  }

  /** Curates an enabled subgraph with tokens of the caller, returning the signal minted */
  mintSignal(caller: Address, subgraphId: Bytes32, tokens: bigint): bigint {
    subgraphId = subgraphKey(subgraphId)
    this.logger.debug('Execute mintSignal()', { subgraphId, curator: caller })
    const subgraph = this.store.subgraphs.get(subgraphId)
    if (!subgraph) {
      throw ledgerError(LedgerErrorCode.LE050, subgraphId)
    }
    if (subgraph.disabled) {
      throw ledgerError(LedgerErrorCode.LE049, subgraphId)
    }
    if (tokens === 0n) {
      throw ledgerError(LedgerErrorCode.LE002)
    }
    const balance = this.tokens.balanceOf(caller)
    if (balance < tokens) {
      throw ledgerError(LedgerErrorCode.LE048, `${caller} holds ${balance}, needs ${tokens}`)
    }
    // Validate against the curve before anything moves
    this.curation.tokensToSignal(subgraph.deploymentId, tokens)

    this.tokens.pull(caller, tokens)
    const { signal: vSignal, tax } = this.curation.mint(subgraph.deploymentId, tokens)
    if (tax > 0n) {
      this.tokens.burn(tax)
    }
    const nSignal =
      subgraph.vSignal === 0n ? vSignal : mulDiv(vSignal, subgraph.nSignal, subgraph.vSignal)
    subgraph.vSignal = add(subgraph.vSignal, vSignal)
    subgraph.nSignal = add(subgraph.nSignal, nSignal)
    subgraph.curatorSignal.set(caller, add(subgraph.curatorSignal.get(caller) ?? 0n, nSignal))

    this.logger.info('Successfully minted signal', {
      subgraphId,
      curator: caller,
      amountGRT: formatGRT(tokens),
      nSignal: nSignal.toString(),
    })
    return nSignal
  }

  private requireFinalized(subgraphId: Bytes32): { record: MigrationRecord; subgraph: Subgraph } {
    const record = this.store.migrations.get(subgraphId)
    const subgraph = this.store.subgraphs.get(subgraphId)
    if (!record || !subgraph || !record.l2Done) {
      throw ledgerError(LedgerErrorCode.LE026, subgraphId)
    }
    return { record, subgraph }
  }

  private credit(
    subgraphId: Bytes32,
    record: MigrationRecord,
    subgraph: Subgraph,
    l1Curator: Address,
    beneficiary: Address,
    signal: bigint,
  ): void {
    subgraph.curatorSignal.set(
      beneficiary,
      add(subgraph.curatorSignal.get(beneficiary) ?? 0n, signal),
    )
    record.claimedSignal = add(record.claimedSignal, signal)
    this.store.markCuratorClaimed(subgraphId, l1Curator)

    this.logger.info('Curator balance claimed', {
      subgraphId,
      l1Curator,
      beneficiary,
      signal: signal.toString(),
    })
  }
}
