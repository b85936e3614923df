import { Logger } from '@graphprotocol/common-ts'
import { solidityPackedKeccak256 } from 'ethers'
import { Clock } from '../clock'
import { ledgerError, LedgerErrorCode } from '../errors'
import { add, mulDiv, mulDivUp, sub } from '../math'
import { LedgerStore } from '../store'
import { Bytes32, ThawingPool, ThawListKey, ThawRequest, ThawRequestType } from '../types'

export interface ThawQueueOptions {
  maxThawRequests: number
}

/** A step of a plan: what happens to one thaw request */
interface ThawPlanStep {
  id: Bytes32
  request: ThawRequest
  tokens: bigint
  // Shares burned from a request that stays at the head of the list
  splitShares: bigint
  dequeue: boolean
}

/**
 * The effect of consuming thaw requests, computed without touching the
 * store. Applying a plan cannot fail.
 */
export interface ThawPlan {
  key: ThawListKey
  tokens: bigint
  steps: ThawPlanStep[]
  tokensThawing: bigint
  sharesThawing: bigint
}

export interface EnqueuePlan {
  key: ThawListKey
  id: Bytes32
  shares: bigint
  tokens: bigint
  thawingUntil: bigint
}

const requestTypeIndex = (type: ThawRequestType): number =>
  type === ThawRequestType.Provision ? 0 : 1

export const thawRequestId = (key: ThawListKey, nonce: bigint): Bytes32 =>
  solidityPackedKeccak256(
    ['uint8', 'address', 'address', 'address', 'uint256'],
    [requestTypeIndex(key.type), key.serviceProvider, key.verifier, key.owner, nonce],
  )

/**
 * FIFO lists of time-locked withdrawals against a thawing pool.
 *
 * Requests hold shares of the pool's thawing sub-ledger, so slashing the pool
 * reduces what every pending request is worth. Requests become releasable once
 * `thawingUntil` has passed, but are only ever consumed from the head: a
 * matured request queued behind one still thawing has to wait for it.
 */
export class ThawQueue {
  private logger: Logger

  constructor(
    private store: LedgerStore,
    private clock: Clock,
    private options: ThawQueueOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'ThawQueue' })
  }

  planEnqueue(
    pool: ThawingPool,
    key: ThawListKey,
    tokens: bigint,
    thawingPeriod: bigint,
  ): EnqueuePlan {
    const list = this.store.findThawRequestList(key)
    const count = list?.count ?? 0
    if (count >= this.options.maxThawRequests) {
      throw ledgerError(
        LedgerErrorCode.LE010,
        `Thaw request list is full (${count} of ${this.options.maxThawRequests})`,
      )
    }
    const shares =
      pool.sharesThawing === 0n
        ? tokens
        : mulDiv(tokens, pool.sharesThawing, pool.tokensThawing)
    if (shares === 0n) {
      throw ledgerError(LedgerErrorCode.LE006, `Thawing ${tokens} tokens issues no shares`)
    }
    return {
      key,
      id: thawRequestId(key, list?.nonce ?? 0n),
      shares,
      tokens,
      thawingUntil: add(this.clock.now(), thawingPeriod),
    }
  }

  applyEnqueue(pool: ThawingPool, plan: EnqueuePlan): Bytes32 {
    const list = this.store.thawRequestList(plan.key)
    this.store.thawRequests.set(plan.id, {
      shares: plan.shares,
      thawingUntil: plan.thawingUntil,
      next: null,
      thawingNonce: pool.thawingNonce,
    })

    const tail = list.tail ? this.store.thawRequests.get(list.tail) : undefined
    if (tail) {
      tail.next = plan.id
    } else {
      list.head = plan.id
    }
    list.tail = plan.id
    list.count += 1
    list.nonce += 1n

    pool.tokensThawing = add(pool.tokensThawing, plan.tokens)
    pool.sharesThawing = add(pool.sharesThawing, plan.shares)

    this.logger.trace('Thaw request enqueued', {
      id: plan.id,
      owner: plan.key.owner,
      shares: plan.shares.toString(),
      thawingUntil: plan.thawingUntil.toString(),
    })
    return plan.id
  }

  /** Appends a request for `tokens` that matures after `thawingPeriod` */
  enqueue(pool: ThawingPool, key: ThawListKey, tokens: bigint, thawingPeriod: bigint): Bytes32 {
    return this.applyEnqueue(pool, this.planEnqueue(pool, key, tokens, thawingPeriod))
  }

  /**
   * Plans consuming exactly `tokens` from matured requests, starting at the
   * head. The last request consumed may be split.
   */
  planFulfillment(pool: ThawingPool, key: ThawListKey, tokens: bigint): ThawPlan {
    const plan = this.walk(pool, key, tokens, 0)
    if (plan.tokens < tokens) {
      throw ledgerError(
        LedgerErrorCode.LE009,
        `Requested ${tokens} tokens but only ${plan.tokens} have thawed`,
      )
    }
    return plan
  }

  /** Plans releasing every matured request at the head, up to `maxRequests` when non-zero */
  planCollection(pool: ThawingPool, key: ThawListKey, maxRequests = 0): ThawPlan {
    return this.walk(pool, key, null, maxRequests)
  }

  applyPlan(pool: ThawingPool, plan: ThawPlan): bigint {
    const list = this.store.thawRequestList(plan.key)
    for (const step of plan.steps) {
      if (step.dequeue) {
        this.store.thawRequests.delete(step.id)
        list.head = step.request.next
        list.count -= 1
      } else {
        step.request.shares = sub(step.request.shares, step.splitShares)
      }
    }
    if (list.head === null) {
      list.tail = null
    }
    pool.tokensThawing = plan.tokensThawing
    pool.sharesThawing = plan.sharesThawing
    return plan.tokens
  }

  fulfillUpTo(pool: ThawingPool, key: ThawListKey, tokens: bigint): bigint {
    return this.applyPlan(pool, this.planFulfillment(pool, key, tokens))
  }

  collectReleasable(pool: ThawingPool, key: ThawListKey, maxRequests = 0): bigint {
    return this.applyPlan(pool, this.planCollection(pool, key, maxRequests))
  }

  /** Tokens that could be collected right now, without changing anything */
  thawedTokens(pool: ThawingPool, key: ThawListKey): bigint {
    return this.planCollection(pool, key).tokens
  }

  /** The pending requests of a list, head first */
  requests(key: ThawListKey): Array<ThawRequest & { id: Bytes32 }> {
    const result: Array<ThawRequest & { id: Bytes32 }> = []
    let id = this.store.findThawRequestList(key)?.head ?? null
    while (id !== null) {
      const request = this.store.thawRequests.get(id)
      if (!request) {
        break
      }
      result.push({ id, ...request })
      id = request.next
    }
    return result
  }

  /** Tokens a request is currently worth, zero once its thawing pool was reset */
  requestValue(pool: ThawingPool, request: ThawRequest): bigint {
    if (request.thawingNonce !== pool.thawingNonce || pool.sharesThawing === 0n) {
      return 0n
    }
    return mulDiv(request.shares, pool.tokensThawing, pool.sharesThawing)
  }

  // Walks matured requests from the head. With a token target the walk stops
  // once the target is met, splitting the request that crosses it.
  private walk(
    pool: ThawingPool,
    key: ThawListKey,
    target: bigint | null,
    maxRequests: number,
  ): ThawPlan {
    const now = this.clock.now()
    const plan: ThawPlan = {
      key,
      tokens: 0n,
      steps: [],
      tokensThawing: pool.tokensThawing,
      sharesThawing: pool.sharesThawing,
    }

    let id = this.store.findThawRequestList(key)?.head ?? null
    while (id !== null) {
      if (target !== null && plan.tokens >= target) {
        break
      }
      if (maxRequests > 0 && plan.steps.length >= maxRequests) {
        break
      }
      const request = this.store.thawRequests.get(id)
      if (!request || request.thawingUntil > now) {
        break
      }

      // Requests from before a pool reset carry nothing
      if (request.thawingNonce !== pool.thawingNonce) {
        plan.steps.push({ id, request, tokens: 0n, splitShares: 0n, dequeue: true })
        id = request.next
        continue
      }

      const value =
        plan.sharesThawing === 0n
          ? 0n
          : mulDiv(request.shares, plan.tokensThawing, plan.sharesThawing)
      const remaining = target === null ? value : target - plan.tokens

      if (value <= remaining) {
        plan.tokens += value
        plan.tokensThawing = sub(plan.tokensThawing, value)
        plan.sharesThawing = sub(plan.sharesThawing, request.shares)
        plan.steps.push({ id, request, tokens: value, splitShares: 0n, dequeue: true })
        id = request.next
      } else {
        // Burning shares rounded up keeps the split in the pool's favour
        const splitShares = mulDivUp(remaining, plan.sharesThawing, plan.tokensThawing)
        plan.tokens += remaining
        if (splitShares >= request.shares) {
          // Rounding took the whole request: what it was worth beyond the
          // target stops thawing and stays with the pool owner
          plan.tokensThawing = sub(plan.tokensThawing, value)
          plan.sharesThawing = sub(plan.sharesThawing, request.shares)
          plan.steps.push({ id, request, tokens: remaining, splitShares: 0n, dequeue: true })
        } else {
          plan.tokensThawing = sub(plan.tokensThawing, remaining)
          plan.sharesThawing = sub(plan.sharesThawing, splitShares)
          plan.steps.push({ id, request, tokens: remaining, splitShares, dequeue: false })
        }
        break
      }
    }
    return plan
  }
}
