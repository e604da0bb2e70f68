import { EventEmitter } from 'eventemitter3'
import pino from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { AccountDirectory } from '../core/interfaces.js'
import type { Clock, Message, MessageStatus, WebhookEventType } from '../core/types.js'
import type { MessageStatusPayload } from '../dto/webhooks.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { KeyedSerialQueue } from '../utils/keyedQueue.js'
import type { RetryEngine } from './retryEngine.js'

export type RelayedStatus = Extract<MessageStatus, 'sent' | 'delivered' | 'read' | 'failed'>

const RELAYED_STATUSES: readonly MessageStatus[] = ['sent', 'delivered', 'read', 'failed']

export function isRelayedStatus(status: MessageStatus): status is RelayedStatus {
  return RELAYED_STATUSES.includes(status)
}

export interface StatusEvent {
  message: Message
  status: RelayedStatus
  at: string
}

interface StatusEventMap {
  status: (event: StatusEvent) => void
}

/**
 * In-process bus for outbound message status changes.
 */
export class StatusEventBus extends EventEmitter<StatusEventMap> {
  publish(event: StatusEvent): void {
    this.emit('status', event)
  }
}

export function buildStatusPayload(message: Message, status: RelayedStatus, at: string): MessageStatusPayload {
  return {
    event: `message.${status}`,
    message_id: message.id,
    account_id: message.accountId,
    recipient_id: message.recipientId,
    status,
    timestamp: at,
    platform_message_id: message.platformMessageId,
    error: message.error
      ? { code: message.error.code, message: message.error.message, retryable: message.error.retryable }
      : null
  }
}

export interface StatusWebhookPublisherOptions {
  bus: StatusEventBus
  store: StatusStore
  accounts: AccountDirectory
  engine: RetryEngine
  clock?: Clock
}

/**
 * Turns status events into `message.<status>` webhook deliveries owned by the
 * retry engine. Events of one account are persisted in the order they fire.
 */
export class StatusWebhookPublisher {
  private readonly logger = pino({ name: 'status-publisher', level: process.env.LOG_LEVEL || 'info' })
  private readonly queue = new KeyedSerialQueue()
  private readonly pending = new Set<Promise<void>>()
  private readonly store: StatusStore
  private readonly accounts: AccountDirectory
  private readonly engine: RetryEngine
  private readonly clock: Clock
  private readonly listener = (event: StatusEvent) => this.track(event)

  constructor(private readonly options: StatusWebhookPublisherOptions) {
    this.store = options.store
    this.accounts = options.accounts
    this.engine = options.engine
    this.clock = options.clock ?? (() => new Date())
    options.bus.on('status', this.listener)
  }

  /**
   * Resolves once every event seen so far has been handed to the engine.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  close(): void {
    this.options.bus.off('status', this.listener)
  }

  private track(event: StatusEvent): void {
    const job = this.queue
      .run(event.message.accountId, () => this.publish(event))
      .catch((err) => {
        this.logger.error(
          { err, messageId: event.message.id, accountId: event.message.accountId, status: event.status },
          'Failed to queue status webhook'
        )
      })
    this.pending.add(job)
    void job.finally(() => this.pending.delete(job))
  }

  private async publish(event: StatusEvent): Promise<void> {
    const { message, status, at } = event
    const account = await this.accounts.get(message.accountId)
    if (!account) {
      this.logger.warn({ messageId: message.id, accountId: message.accountId, status }, 'Unknown account, status not relayed')
      return
    }
    if (account.status !== 'active') {
      this.logger.info({ messageId: message.id, accountId: message.accountId, status }, 'Inactive account, status not relayed')
      return
    }

    const eventType: WebhookEventType = `message.${status}`
    const now = this.clock().toISOString()
    const delivery = await this.store.createDelivery({
      id: uuidv4(),
      accountId: message.accountId,
      messageId: message.id,
      eventType,
      payload: JSON.stringify(buildStatusPayload(message, status, at)),
      targetUrl: account.webhookUrl,
      status: 'pending',
      retryCount: 0,
      lastAttemptAt: null,
      nextRetryAt: now,
      deliveredAt: null,
      createdAt: now,
      updatedAt: now,
      retryWindowStartedAt: now,
      lastResponseStatus: null,
      lastError: null
    })
    await this.engine.enqueue(delivery)
    this.logger.debug({ deliveryId: delivery.id, messageId: message.id, eventType }, 'Status webhook queued')
  }
}
