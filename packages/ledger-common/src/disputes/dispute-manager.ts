import { Address, formatGRT, Logger } from '@graphprotocol/common-ts'
import { BytesLike, solidityPackedKeccak256 } from 'ethers'
import { Clock } from '../clock'
import { DisputeOptions } from '../specification'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, min, mulPPM } from '../math'
import { ProvisionManager } from '../staking/provisions'
import { LedgerStore } from '../store'
import { TokenCollaborator } from '../tokens'
import { Bytes32, Dispute, DisputeStatus, DisputeType } from '../types'
import {
  areConflicting,
  Attestation,
  decodeAttestation,
  recoverAttestationSigner,
} from './attestation'
import { EIP712Domain } from './eip712'

/** Finds the indexer behind an allocation, which also signs its attestations */
export type AllocationResolver = (allocationId: Address) => Address | undefined

export interface DisputeManagerOptions {
  arbitratorAddress: Address
  disputeManagerAddress: Address
  minimumDeposit: bigint
  fishermanRewardCut: bigint
  maxSlashingCut: bigint
  disputePeriod: bigint
  domain: EIP712Domain
}

/** The EIP-712 domain indexers sign attestations under */
export const attestationDomain = (disputes: DisputeOptions): EIP712Domain => ({
  name: disputes.domainName,
  version: disputes.domainVersion,
  chainId: disputes.chainId,
  verifyingContract: disputes.disputeManagerAddress,
  salt: disputes.domainSalt,
})

const queryDisputeId = (attestation: Attestation, indexer: Address, fisherman: Address): Bytes32 =>
  solidityPackedKeccak256(
    ['bytes32', 'bytes32', 'bytes32', 'address', 'address'],
    [
      attestation.requestCID,
      attestation.responseCID,
      attestation.subgraphDeploymentId,
      indexer,
      fisherman,
    ],
  )

const indexingDisputeId = (allocationId: Address): Bytes32 =>
  solidityPackedKeccak256(['address'], [allocationId])

/**
 * Disputes raised by fishermen against indexers and resolved by the
 * arbitrator. Accepting a dispute slashes the indexer's provision to the
 * dispute manager and rewards the fisherman with a cut of the slash.
 */
export class DisputeManager {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private clock: Clock,
    private provisions: ProvisionManager,
    private tokens: TokenCollaborator,
    private resolveAllocation: AllocationResolver,
    private options: DisputeManagerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'DisputeManager' })
  }

  getDispute(disputeId: Bytes32): Dispute | undefined {
    return this.store.disputes.get(disputeId)
  }

  isDisputeCreated(disputeId: Bytes32): boolean {
    const dispute = this.store.disputes.get(disputeId)
    return dispute !== undefined && dispute.status !== DisputeStatus.Null
  }

  /** Disputes a single query response, backed by the caller's deposit */
  createQueryDispute(caller: Address, attestationData: BytesLike, deposit: bigint): Bytes32 {
    this.logger.debug('Execute createQueryDispute()', {
      fisherman: caller,
      deposit: deposit.toString(),
    })
    this.assertDeposit(caller, deposit)
    const attestation = decodeAttestation(attestationData)
    const indexer = this.attestationIndexer(attestation)
    const id = queryDisputeId(attestation, indexer, caller)
    this.assertNotCreated(id)

    this.tokens.pull(caller, deposit)
    this.create(id, DisputeType.QueryDispute, indexer, caller, deposit, null)
    return id
  }

  /**
   * Disputes two conflicting responses to the same query. One dispute is
   * created per indexer, linked to each other, without a deposit.
   */
  createQueryDisputeConflict(
    caller: Address,
    attestationData1: BytesLike,
    attestationData2: BytesLike,
  ): [Bytes32, Bytes32] {
    this.logger.debug('Execute createQueryDisputeConflict()', { fisherman: caller })
    const attestation1 = decodeAttestation(attestationData1)
    const attestation2 = decodeAttestation(attestationData2)
    if (!areConflicting(attestation1, attestation2)) {
      throw ledgerError(LedgerErrorCode.LE042)
    }
    const indexer1 = this.attestationIndexer(attestation1)
    const indexer2 = this.attestationIndexer(attestation2)
    const id1 = queryDisputeId(attestation1, indexer1, caller)
    const id2 = queryDisputeId(attestation2, indexer2, caller)
    this.assertNotCreated(id1)
    this.assertNotCreated(id2)

    this.create(id1, DisputeType.QueryDispute, indexer1, caller, 0n, id2)
    this.create(id2, DisputeType.QueryDispute, indexer2, caller, 0n, id1)
    return [id1, id2]
  }

  /** Disputes the indexing work behind an allocation */
  createIndexingDispute(caller: Address, allocationId: Address, deposit: bigint): Bytes32 {
    this.logger.debug('Execute createIndexingDispute()', {
      fisherman: caller,
      allocationId,
      deposit: deposit.toString(),
    })
    this.assertDeposit(caller, deposit)
    const indexer = this.resolveAllocation(allocationId)
    if (!indexer) {
      throw ledgerError(LedgerErrorCode.LE041, allocationId)
    }
    this.assertProvisioned(indexer)
    const id = indexingDisputeId(allocationId)
    this.assertNotCreated(id)

    this.tokens.pull(caller, deposit)
    this.create(id, DisputeType.IndexingDispute, indexer, caller, deposit, null)
    return id
  }

  /**
   * Slashes the indexer by `tokensSlash` and returns the deposit to the
   * fisherman. A conflicting dispute linked to this one is rejected.
   */
  acceptDispute(caller: Address, disputeId: Bytes32, tokensSlash: bigint): void {
    this.logger.debug('Execute acceptDispute()', {
      disputeId,
      tokensSlash: tokensSlash.toString(),
    })
    this.assertArbitrator(caller)
    const dispute = this.requirePending(disputeId)
    const provision = this.provisions.getProvision(
      dispute.indexer,
      this.options.disputeManagerAddress,
    )
    const maxSlashable = mulPPM(provision?.tokens ?? 0n, this.options.maxSlashingCut)
    if (tokensSlash === 0n || tokensSlash > maxSlashable) {
      throw ledgerError(
        LedgerErrorCode.LE053,
        `Requested ${tokensSlash}, at most ${maxSlashable} can be slashed`,
      )
    }
    // The provision bounds what the verifier may keep
    const rewardCut = min(this.options.fishermanRewardCut, provision?.maxVerifierCut ?? 0n)
    const reward = mulPPM(tokensSlash, rewardCut)

    this.provisions.slash(
      this.options.disputeManagerAddress,
      dispute.indexer,
      tokensSlash,
      reward,
      dispute.fisherman,
    )
    this.resolve(dispute, DisputeStatus.Accepted)
    const related = this.pendingRelated(dispute)
    if (related) {
      this.resolve(related, DisputeStatus.Rejected)
    }

    this.logger.info('Dispute accepted', {
      disputeId,
      indexer: dispute.indexer,
      fisherman: dispute.fisherman,
      slashedGRT: formatGRT(tokensSlash),
      rewardGRT: formatGRT(reward),
    })
  }

  /** Burns the fisherman's deposit. Disputes in conflict cannot be rejected. */
  rejectDispute(caller: Address, disputeId: Bytes32): void {
    this.assertArbitrator(caller)
    const dispute = this.requirePending(disputeId)
    if (dispute.relatedDisputeId !== null) {
      throw ledgerError(LedgerErrorCode.LE054, disputeId)
    }
    this.resolve(dispute, DisputeStatus.Rejected)
    this.logger.info('Dispute rejected', { disputeId, indexer: dispute.indexer })
  }

  /** Returns the deposit; a linked dispute is drawn as well */
  drawDispute(caller: Address, disputeId: Bytes32): void {
    this.assertArbitrator(caller)
    const dispute = this.requirePending(disputeId)
    this.resolve(dispute, DisputeStatus.Drawn)
    const related = this.pendingRelated(dispute)
    if (related) {
      this.resolve(related, DisputeStatus.Drawn)
    }
    this.logger.info('Dispute drawn', { disputeId, indexer: dispute.indexer })
  }

  /**
   * Lets the fisherman withdraw a dispute the arbitrator did not resolve
   * within the dispute period. A linked dispute is cancelled as well.
   */
  cancelDispute(caller: Address, disputeId: Bytes32): void {
    const dispute = this.requirePending(disputeId)
    if (caller !== dispute.fisherman) {
      throw ledgerError(LedgerErrorCode.LE001, `${caller} did not create ${disputeId}`)
    }
    const periodEnd = add(dispute.createdAt, this.options.disputePeriod)
    if (this.clock.now() < periodEnd) {
      throw ledgerError(LedgerErrorCode.LE047, `Dispute period ends at ${periodEnd}`)
    }
    this.resolve(dispute, DisputeStatus.Cancelled)
    const related = this.pendingRelated(dispute)
    if (related) {
      this.resolve(related, DisputeStatus.Cancelled)
    }
    this.logger.info('Dispute cancelled', { disputeId, indexer: dispute.indexer })
  }

  private create(
    id: Bytes32,
    type: DisputeType,
    indexer: Address,
    fisherman: Address,
    deposit: bigint,
    relatedDisputeId: Bytes32 | null,
  ): void {
    this.store.disputes.set(id, {
      id,
      type,
      indexer,
      fisherman,
      deposit,
      relatedDisputeId,
      status: DisputeStatus.Pending,
      createdAt: this.clock.now(),
    })
    this.logger.info('Dispute created', {
      disputeId: id,
      type,
      indexer,
      fisherman,
      depositGRT: formatGRT(deposit),
      relatedDisputeId,
    })
  }

  // Deposits go back to the fisherman unless the dispute was rejected
  private resolve(dispute: Dispute, status: DisputeStatus): void {
    dispute.status = status
    if (dispute.deposit === 0n) {
      return
    }
    if (status === DisputeStatus.Rejected) {
      this.tokens.burn(dispute.deposit)
    } else {
      this.tokens.push(dispute.fisherman, dispute.deposit)
    }
  }

  private pendingRelated(dispute: Dispute): Dispute | undefined {
    if (dispute.relatedDisputeId === null) {
      return undefined
    }
    const related = this.store.disputes.get(dispute.relatedDisputeId)
    return related?.status === DisputeStatus.Pending ? related : undefined
  }

  private attestationIndexer(attestation: Attestation): Address {
    const signer = recoverAttestationSigner(attestation, this.options.domain)
    const indexer = this.resolveAllocation(signer)
    if (!indexer) {
      throw ledgerError(LedgerErrorCode.LE041, signer)
    }
    this.assertProvisioned(indexer)
    return indexer
  }

  private assertProvisioned(indexer: Address): void {
    const provision = this.provisions.getProvision(indexer, this.options.disputeManagerAddress)
    if (!provision || provision.tokens === 0n) {
      throw ledgerError(
        LedgerErrorCode.LE014,
        `${indexer} has no provision for ${this.options.disputeManagerAddress}`,
      )
    }
  }

  private assertDeposit(caller: Address, deposit: bigint): void {
    if (deposit < this.options.minimumDeposit) {
      throw ledgerError(
        LedgerErrorCode.LE043,
        `${deposit} is below ${this.options.minimumDeposit}`,
      )
    }
    const balance = this.tokens.balanceOf(caller)
    if (balance < deposit) {
      throw ledgerError(LedgerErrorCode.LE048, `${caller} holds ${balance}, needs ${deposit}`)
    }
  }

  private assertNotCreated(disputeId: Bytes32): void {
    if (this.isDisputeCreated(disputeId)) {
      throw ledgerError(LedgerErrorCode.LE044, disputeId)
    }
  }

  private assertArbitrator(caller: Address): void {
    if (caller !== this.options.arbitratorAddress) {
      throw ledgerError(LedgerErrorCode.LE001, `${caller} is not the arbitrator`)
    }
  }

  private requirePending(disputeId: Bytes32): Dispute {
    const dispute = this.store.disputes.get(disputeId)
    if (!dispute) {
      throw ledgerError(LedgerErrorCode.LE045, disputeId)
    }
    if (dispute.status !== DisputeStatus.Pending) {
      throw ledgerError(LedgerErrorCode.LE046, `${disputeId} is ${dispute.status}`)
    }
    return dispute
  }
}
