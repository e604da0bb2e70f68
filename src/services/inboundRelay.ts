import pino from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { AccountDirectory, WebhookSender } from '../core/interfaces.js'
import type { Clock, Message } from '../core/types.js'
import type { InboundMessageEvent, MessageReceivedPayload } from '../dto/webhooks.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { NotFoundError, ValidationError } from '../utils/errors.js'
import { KeyedSerialQueue } from '../utils/keyedQueue.js'
import type { RetryEngine } from './retryEngine.js'

export interface ForwardResult {
  message: Message
  duplicate: boolean
  delivered: boolean
  deliveryId: string | null
}

export interface InboundRelayOptions {
  store: StatusStore
  accounts: AccountDirectory
  sender: WebhookSender
  engine: RetryEngine
  immediateTimeoutMs?: number
  clock?: Clock
}

export function conversationIdFor(senderId: string, recipientId: string): string {
  return `conv_${senderId}_${recipientId}`
}

export function buildReceivedPayload(message: Message): MessageReceivedPayload {
  return {
    event: 'message.received',
    message_id: message.id,
    account_id: message.accountId,
    sender_id: message.senderId,
    message: message.text,
    message_type: message.messageType,
    timestamp: message.createdAt,
    platform_message_id: message.platformMessageId ?? '',
    conversation_id: message.conversationId
  }
}

/**
 * Relays inbound platform messages to the account's CRM webhook.
 *
 * The message is stored before anything leaves the process. One immediate
 * attempt is made and its result is kept as a WebhookDelivery: `delivered` on
 * success, otherwise a pending row handed to the retry engine. A message with
 * no delivery row has never been relayed.
 */
export class InboundRelay {
  private readonly logger = pino({ name: 'inbound-relay', level: process.env.LOG_LEVEL || 'info' })
  private readonly queue = new KeyedSerialQueue()
  private readonly store: StatusStore
  private readonly accounts: AccountDirectory
  private readonly sender: WebhookSender
  private readonly engine: RetryEngine
  private readonly immediateTimeoutMs: number
  private readonly clock: Clock

  constructor(options: InboundRelayOptions) {
    this.store = options.store
    this.accounts = options.accounts
    this.sender = options.sender
    this.engine = options.engine
    this.immediateTimeoutMs = options.immediateTimeoutMs ?? 2000
    this.clock = options.clock ?? (() => new Date())
  }

  /**
   * Events of one account are handled strictly in call order.
   */
  forward(accountId: string, event: InboundMessageEvent): Promise<ForwardResult> {
    return this.queue.run(accountId, () => this.process(accountId, event))
  }

  private async process(accountId: string, event: InboundMessageEvent): Promise<ForwardResult> {
    if (!event.platformMessageId) {
      throw new ValidationError('Inbound event has no platform message id', 'invalid_event')
    }
    const account = await this.accounts.get(accountId)
    if (!account) {
      throw new NotFoundError(`Account ${accountId} not found`, 'account_not_found')
    }

    const now = this.clock().toISOString()
    const { message, isNew } = await this.store.recordInbound({
      id: uuidv4(),
      accountId,
      idempotencyKey: null,
      direction: 'inbound',
      senderId: event.senderId,
      recipientId: event.recipientId,
      text: event.text,
      messageType: event.messageType,
      conversationId: conversationIdFor(event.senderId, event.recipientId),
      platformMessageId: event.platformMessageId,
      status: 'received',
      retryCount: 0,
      error: null,
      createdAt: event.timestamp || now,
      updatedAt: now,
      sentAt: null,
      deliveredAt: null,
      readAt: null,
      version: 1
    })

    if (!isNew) {
      // A redelivered event whose message has no delivery row yet was stored
      // by an attempt that failed before the hand-off; relay it now.
      const relayed = (await this.store.listDeliveriesForMessage(message.id)).length > 0
      if (relayed || account.status !== 'active') {
        this.logger.info({ messageId: message.id, accountId, platformMessageId: event.platformMessageId }, 'Duplicate inbound event ignored')
        return { message, duplicate: true, delivered: false, deliveryId: null }
      }
      this.logger.warn({ messageId: message.id, accountId }, 'Stored inbound message was never relayed, relaying now')
    } else if (account.status !== 'active') {
      this.logger.info({ messageId: message.id, accountId }, 'Inactive account, inbound message stored without relay')
      return { message, duplicate: false, delivered: false, deliveryId: null }
    }

    const payload = JSON.stringify(buildReceivedPayload(message))
    const outcome = await this.sender.post({
      url: account.webhookUrl,
      body: payload,
      secret: account.webhookSecret,
      eventType: 'message.received',
      timeoutMs: this.immediateTimeoutMs
    })
    const attemptedAt = this.clock()
    const at = attemptedAt.toISOString()
    const base = {
      id: uuidv4(),
      accountId,
      messageId: message.id,
      eventType: 'message.received' as const,
      payload,
      targetUrl: account.webhookUrl,
      lastAttemptAt: at,
      createdAt: at,
      updatedAt: at,
      retryWindowStartedAt: at,
      lastResponseStatus: outcome.statusCode
    }

    if (outcome.ok) {
      // Kept as the record that this message reached the CRM
      const delivered = await this.store.createDelivery({
        ...base,
        status: 'delivered',
        retryCount: 0,
        nextRetryAt: null,
        deliveredAt: at,
        lastError: null
      })
      this.logger.info({ messageId: message.id, accountId, deliveryId: delivered.id }, 'Inbound message relayed')
      return { message, duplicate: false, delivered: true, deliveryId: delivered.id }
    }

    // Due on its own even if the hand-off below never happens
    const delivery = await this.store.createDelivery({
      ...base,
      status: 'pending',
      retryCount: 0,
      nextRetryAt: this.engine.firstRetryAt(attemptedAt),
      deliveredAt: null,
      lastError: outcome.error
    })
    const queued = await this.engine.enqueue(delivery, outcome)
    this.logger.warn(
      { messageId: message.id, accountId, deliveryId: delivery.id, status: queued.status, error: outcome.error },
      'Immediate relay failed, handed to retry engine'
    )
    return { message, duplicate: false, delivered: false, deliveryId: delivery.id }
  }
}
