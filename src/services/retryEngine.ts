import cron, { type ScheduledTask } from 'node-cron'
import pino from 'pino'
import type { AccountDirectory, OperatorAlert, OperatorAlerter, WebhookSender } from '../core/interfaces.js'
import type { AttemptOutcome, Clock, DeliveryTransition, WebhookDelivery } from '../core/types.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { ConflictError, InvalidTransitionError, NotFoundError, ValidationError } from '../utils/errors.js'
import { mapWithConcurrency } from '../utils/keyedQueue.js'

export interface RetryPolicy {
  // Delay after the n-th consecutive failure, n = 1..length
  backoffSeconds: number[]
  // Fixed delay once the backoff schedule is used up
  extendedIntervalSeconds: number
  // Time from the start of the retry window until a failure goes to the DLQ
  maxRetryWindowSeconds: number
  attemptTimeoutMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  backoffSeconds: [1, 2, 4, 8, 16],
  extendedIntervalSeconds: 60 * 60,
  maxRetryWindowSeconds: 24 * 60 * 60,
  attemptTimeoutMs: 5000
}

export interface RetryEngineOptions {
  store: StatusStore
  accounts: AccountDirectory
  sender: WebhookSender
  alerter: OperatorAlerter
  policy?: Partial<RetryPolicy>
  clock?: Clock
  concurrency?: number
  batchSize?: number
}

export interface TickSummary {
  skipped: boolean
  attempted: number
  delivered: number
  retrying: number
  deadLettered: number
  failedAuth: number
}

type AttemptResult = 'delivered' | 'retrying' | 'dlq' | 'failed_auth' | 'skipped'

/**
 * Owns every WebhookDelivery until it reaches a terminal status.
 *
 * `tick()` picks due deliveries, groups them per account, and attempts each
 * account's deliveries in creation order while accounts run side by side.
 */
export class RetryEngine {
  private readonly logger = pino({ name: 'retry-engine', level: process.env.LOG_LEVEL || 'info' })
  private readonly store: StatusStore
  private readonly accounts: AccountDirectory
  private readonly sender: WebhookSender
  private readonly alerter: OperatorAlerter
  private readonly policy: RetryPolicy
  private readonly clock: Clock
  private readonly concurrency: number
  private readonly batchSize: number
  private task: ScheduledTask | null = null
  private running: Promise<TickSummary> | null = null

  constructor(options: RetryEngineOptions) {
    this.store = options.store
    this.accounts = options.accounts
    this.sender = options.sender
    this.alerter = options.alerter
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy }
    this.clock = options.clock ?? (() => new Date())
    this.concurrency = options.concurrency ?? 4
    this.batchSize = options.batchSize ?? 100
  }

  /**
   * Hands a delivery to the engine. With `lastAttempt` the delivery has
   * already been tried once (the relay's immediate attempt) and that outcome
   * decides the first schedule step; otherwise it is due right away.
   */
  async enqueue(delivery: WebhookDelivery, lastAttempt?: AttemptOutcome): Promise<WebhookDelivery> {
    if (delivery.status !== 'pending') {
      throw new ValidationError(`Only pending deliveries can be enqueued (got ${delivery.status})`, 'invalid_status')
    }
    if (!lastAttempt) {
      if (delivery.nextRetryAt) return delivery
      return this.store.updateDelivery(delivery.id, {
        status: 'pending',
        patch: { nextRetryAt: this.clock().toISOString() }
      })
    }
    if (lastAttempt.ok) {
      throw new ValidationError('A delivered attempt does not need the retry engine', 'already_delivered')
    }
    const { delivery: updated } = await this.recordFailure(delivery, lastAttempt, this.clock())
    return updated
  }

  /**
   * When a delivery whose first attempt failed at `failedAt` is due again.
   */
  firstRetryAt(failedAt: Date): string {
    const seconds = this.policy.backoffSeconds[0] ?? this.policy.extendedIntervalSeconds
    return new Date(failedAt.getTime() + seconds * 1000).toISOString()
  }

  async tick(): Promise<TickSummary> {
    if (this.running) {
      return { skipped: true, attempted: 0, delivered: 0, retrying: 0, deadLettered: 0, failedAuth: 0 }
    }
    this.running = this.runTick()
    try {
      return await this.running
    } finally {
      this.running = null
    }
  }

  start(expression = '* * * * * *'): void {
    if (this.task) return
    if (!cron.validate(expression)) throw new Error(`Invalid cron expression: ${expression}`)
    this.task = cron.schedule(expression, () => {
      this.tick().catch((err) => this.logger.error({ err }, 'Retry tick failed'))
    })
    this.task.start()
    this.logger.info({ expression }, 'Retry engine started')
  }

  async stop(): Promise<void> {
    this.task?.stop()
    this.task = null
    if (this.running) {
      await this.running.catch(() => undefined)
    }
  }

  async listDlq(accountId?: string): Promise<WebhookDelivery[]> {
    return this.store.listDeliveries({ status: 'dlq', accountId })
  }

  /**
   * Manual re-enqueue of a dead-lettered or auth-failed delivery. The retry
   * counter and the retry window start over.
   */
  async requeue(id: string): Promise<WebhookDelivery> {
    const delivery = await this.store.getDelivery(id)
    if (!delivery) throw new NotFoundError(`Delivery ${id} not found`)
    if (delivery.status !== 'dlq' && delivery.status !== 'failed_auth') {
      throw new ValidationError(`Delivery ${id} is ${delivery.status}; only dlq or failed_auth can be requeued`, 'not_requeueable')
    }
    const now = this.clock().toISOString()
    const requeued = await this.store.updateDelivery(id, {
      status: 'pending',
      patch: { retryCount: 0, nextRetryAt: now, retryWindowStartedAt: now, lastError: null },
      reason: 'manual_requeue'
    })
    this.logger.info({ deliveryId: id, accountId: delivery.accountId, from: delivery.status }, 'Delivery requeued')
    return requeued
  }

  /**
   * Deliveries left in `delivering` by a crash go back to `retrying`, due now.
   */
  async recoverStale(): Promise<number> {
    const stale = await this.store.listDeliveries({ status: 'delivering' })
    for (const delivery of stale) {
      await this.store.updateDelivery(delivery.id, {
        status: 'retrying',
        patch: { nextRetryAt: this.clock().toISOString() },
        reason: 'recovered_after_restart'
      })
    }
    if (stale.length > 0) {
      this.logger.warn({ count: stale.length }, 'Recovered deliveries interrupted mid-attempt')
    }
    return stale.length
  }

  private async runTick(): Promise<TickSummary> {
    const due = await this.store.listDueDeliveries(this.clock(), this.batchSize)
    const summary: TickSummary = { skipped: false, attempted: 0, delivered: 0, retrying: 0, deadLettered: 0, failedAuth: 0 }
    if (due.length === 0) return summary

    const byAccount = new Map<string, WebhookDelivery[]>()
    for (const delivery of due) {
      const queue = byAccount.get(delivery.accountId) ?? []
      queue.push(delivery)
      byAccount.set(delivery.accountId, queue)
    }

    const results = await mapWithConcurrency([...byAccount.values()], this.concurrency, async (queue) => {
      const outcomes: AttemptResult[] = []
      for (const delivery of queue) {
        outcomes.push(await this.attemptSafely(delivery))
      }
      return outcomes
    })

    for (const result of results.flat()) {
      if (result === 'skipped') continue
      summary.attempted++
      if (result === 'delivered') summary.delivered++
      else if (result === 'retrying') summary.retrying++
      else if (result === 'dlq') summary.deadLettered++
      else summary.failedAuth++
    }
    this.logger.debug({ ...summary, due: due.length }, 'Retry tick finished')
    return summary
  }

  private async attemptSafely(delivery: WebhookDelivery): Promise<AttemptResult> {
    try {
      return await this.attempt(delivery)
    } catch (err) {
      this.logger.error({ err, deliveryId: delivery.id, accountId: delivery.accountId }, 'Delivery attempt failed unexpectedly')
      return 'skipped'
    }
  }

  private async attempt(delivery: WebhookDelivery): Promise<AttemptResult> {
    const account = await this.accounts.get(delivery.accountId)
    if (!account || account.status !== 'active') {
      const reason = account ? 'account_inactive' : 'account_not_found'
      await this.store.updateDelivery(delivery.id, {
        status: 'dlq',
        patch: { lastError: reason },
        reason
      })
      this.logger.warn({ deliveryId: delivery.id, accountId: delivery.accountId, reason }, 'Stopped retrying delivery')
      return 'dlq'
    }

    let claimed: WebhookDelivery
    try {
      claimed = await this.store.updateDelivery(delivery.id, {
        status: 'delivering',
        patch: { lastAttemptAt: this.clock().toISOString() }
      })
    } catch (err) {
      if (err instanceof InvalidTransitionError || err instanceof ConflictError) {
        // Another worker got there first
        return 'skipped'
      }
      throw err
    }

    const outcome = await this.sender.post({
      url: claimed.targetUrl,
      body: claimed.payload,
      secret: account.webhookSecret,
      eventType: claimed.eventType,
      deliveryId: claimed.id,
      timeoutMs: this.policy.attemptTimeoutMs
    })
    const now = this.clock()

    if (outcome.ok) {
      await this.store.updateDelivery(claimed.id, {
        status: 'delivered',
        patch: { deliveredAt: now.toISOString(), lastResponseStatus: outcome.statusCode, lastError: null }
      })
      this.logger.info(
        { deliveryId: claimed.id, accountId: claimed.accountId, eventType: claimed.eventType, retryCount: claimed.retryCount },
        'Webhook delivered'
      )
      return 'delivered'
    }

    const { result } = await this.recordFailure(claimed, outcome, now)
    return result
  }

  private failureTransition(
    delivery: WebhookDelivery,
    outcome: Exclude<AttemptOutcome, { ok: true }>,
    now: Date
  ): { transition: DeliveryTransition; result: AttemptResult } {
    const base = { lastResponseStatus: outcome.statusCode, lastError: outcome.error }

    if (outcome.kind === 'auth') {
      this.logger.error(
        { deliveryId: delivery.id, accountId: delivery.accountId, status: outcome.statusCode },
        'CRM rejected webhook credentials, delivery stopped'
      )
      return { transition: { status: 'failed_auth', patch: base, reason: `http_${outcome.statusCode}` }, result: 'failed_auth' }
    }

    const retryCount = delivery.retryCount + 1
    const nextRetryAt = this.nextAttemptAt(delivery, retryCount, now)
    if (!nextRetryAt) {
      this.logger.error(
        { deliveryId: delivery.id, accountId: delivery.accountId, retryCount, error: outcome.error },
        'Retry window exhausted, delivery moved to DLQ'
      )
      return {
        transition: { status: 'dlq', patch: { ...base, retryCount }, reason: 'retry_window_exhausted' },
        result: 'dlq'
      }
    }

    this.logger.warn(
      { deliveryId: delivery.id, accountId: delivery.accountId, retryCount, nextRetryAt, error: outcome.error },
      'Webhook attempt failed, retry scheduled'
    )
    return {
      transition: { status: 'retrying', patch: { ...base, retryCount, nextRetryAt }, reason: outcome.error },
      result: 'retrying'
    }
  }

  private async recordFailure(
    delivery: WebhookDelivery,
    outcome: Exclude<AttemptOutcome, { ok: true }>,
    now: Date
  ): Promise<{ delivery: WebhookDelivery; result: AttemptResult }> {
    const { transition, result } = this.failureTransition(delivery, outcome, now)
    const updated = await this.store.updateDelivery(delivery.id, transition)
    if (result === 'failed_auth') {
      await this.alert({
        severity: 'critical',
        code: 'webhook_auth_failed',
        message: `CRM webhook rejected delivery ${delivery.id} with HTTP ${outcome.statusCode}`,
        accountId: delivery.accountId,
        deliveryId: delivery.id,
        context: { targetUrl: delivery.targetUrl, eventType: delivery.eventType }
      })
    } else if (result === 'dlq') {
      await this.alert({
        severity: 'warning',
        code: 'delivery_dead_lettered',
        message: `Delivery ${delivery.id} moved to the dead-letter queue after ${updated.retryCount} failed attempts`,
        accountId: delivery.accountId,
        deliveryId: delivery.id,
        context: { targetUrl: delivery.targetUrl, eventType: delivery.eventType, lastError: outcome.error }
      })
    }
    return { delivery: updated, result }
  }

  private async alert(alert: OperatorAlert): Promise<void> {
    await this.alerter
      .raise(alert)
      .catch((err) => this.logger.error({ err, deliveryId: alert.deliveryId, code: alert.code }, 'Failed to raise operator alert'))
  }

  /**
   * Next attempt time after the `retryCount`-th failure, or null once the
   * retry window has run out.
   */
  private nextAttemptAt(delivery: WebhookDelivery, retryCount: number, now: Date): string | null {
    const backoff = this.policy.backoffSeconds[retryCount - 1]
    if (backoff !== undefined) {
      return new Date(now.getTime() + backoff * 1000).toISOString()
    }
    const windowEnd = Date.parse(delivery.retryWindowStartedAt) + this.policy.maxRetryWindowSeconds * 1000
    if (now.getTime() >= windowEnd) return null
    const next = Math.min(now.getTime() + this.policy.extendedIntervalSeconds * 1000, windowEnd)
    return new Date(next).toISOString()
  }
}
