import type {
  Clock,
  DeliveryHistoryEntry,
  DeliveryStatus,
  DeliveryTransition,
  Message,
  MessageHistoryEntry,
  MessageTransition,
  WebhookDelivery
} from '../core/types.js'
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js'
import { applyDeliveryTransition, applyMessageTransition, historyEntry, isDue } from './transitions.js'
import type { DeliveryQuery, DeliveryStats, MessageQuery, NewDelivery, ReserveResult, StatusStore } from './StatusStore.js'

/**
 * In-process store. Each operation runs to completion without yielding, which
 * makes check-and-insert atomic. Used for local runs without REDIS_URL and as
 * the stand-in for Redis in tests.
 */
export class MemoryStatusStore implements StatusStore {
  private readonly messages = new Map<string, Message>()
  private readonly messageHistories = new Map<string, MessageHistoryEntry[]>()
  private readonly idempotencyIndex = new Map<string, string>()
  private readonly platformIndex = new Map<string, string>()
  private readonly deliveries = new Map<string, WebhookDelivery>()
  private readonly deliveryHistories = new Map<string, DeliveryHistoryEntry[]>()
  private sequence = 0

  constructor(private readonly clock: Clock = () => new Date()) {}

  async reserveOutbound(draft: Message): Promise<ReserveResult> {
    if (!draft.idempotencyKey) {
      throw new ValidationError('Outbound message requires an idempotency key')
    }
    const indexKey = `${draft.accountId}\u0000${draft.idempotencyKey}`
    const existingId = this.idempotencyIndex.get(indexKey)
    if (existingId) {
      return { message: this.requireMessage(existingId), isNew: false }
    }
    this.idempotencyIndex.set(indexKey, draft.id)
    this.insertMessage(draft)
    return { message: structuredClone(draft), isNew: true }
  }

  async recordInbound(draft: Message): Promise<ReserveResult> {
    if (!draft.platformMessageId) {
      throw new ValidationError('Inbound message requires a platform message id')
    }
    const existingId = this.platformIndex.get(draft.platformMessageId)
    if (existingId) {
      return { message: this.requireMessage(existingId), isNew: false }
    }
    this.insertMessage(draft)
    return { message: structuredClone(draft), isNew: true }
  }

  async getMessage(id: string): Promise<Message | null> {
    const message = this.messages.get(id)
    return message ? structuredClone(message) : null
  }

  async findMessageByPlatformId(platformMessageId: string): Promise<Message | null> {
    const id = this.platformIndex.get(platformMessageId)
    return id ? this.getMessage(id) : null
  }

  async updateMessage(id: string, transition: MessageTransition): Promise<Message> {
    const current = this.messages.get(id)
    if (!current) throw new NotFoundError(`Message ${id} not found`)

    const { next, entry } = applyMessageTransition(current, transition, this.clock())
    if (next.platformMessageId && next.platformMessageId !== current.platformMessageId) {
      const owner = this.platformIndex.get(next.platformMessageId)
      if (owner && owner !== id) {
        throw new ConflictError(`Platform message id ${next.platformMessageId} already belongs to ${owner}`)
      }
      this.platformIndex.set(next.platformMessageId, id)
    }
    this.messages.set(id, next)
    this.messageHistories.get(id)?.push(entry)
    return structuredClone(next)
  }

  async messageHistory(id: string): Promise<MessageHistoryEntry[]> {
    return structuredClone(this.messageHistories.get(id) ?? [])
  }

  async listMessages(query: MessageQuery): Promise<Message[]> {
    const cutoff = query.updatedBefore?.getTime()
    const matches = [...this.messages.values()]
      .filter((message) => message.status === query.status)
      .filter((message) => !query.direction || message.direction === query.direction)
      .filter((message) => cutoff === undefined || Date.parse(message.updatedAt) < cutoff)
      .sort((a, b) => Date.parse(a.updatedAt) - Date.parse(b.updatedAt))
    return (query.limit ? matches.slice(0, query.limit) : matches).map((message) => structuredClone(message))
  }

  async createDelivery(delivery: NewDelivery): Promise<WebhookDelivery> {
    if (this.deliveries.has(delivery.id)) {
      throw new ConflictError(`Delivery ${delivery.id} already exists`)
    }
    this.sequence += 1
    const stored: WebhookDelivery = { ...structuredClone(delivery), sequence: this.sequence, version: 1 }
    this.deliveries.set(stored.id, stored)
    this.deliveryHistories.set(stored.id, [historyEntry(stored.status, stored.createdAt, stored.retryCount)])
    return structuredClone(stored)
  }

  async getDelivery(id: string): Promise<WebhookDelivery | null> {
    const delivery = this.deliveries.get(id)
    return delivery ? structuredClone(delivery) : null
  }

  async updateDelivery(id: string, transition: DeliveryTransition): Promise<WebhookDelivery> {
    const current = this.deliveries.get(id)
    if (!current) throw new NotFoundError(`Delivery ${id} not found`)

    const { next, entry } = applyDeliveryTransition(current, transition, this.clock())
    this.deliveries.set(id, next)
    this.deliveryHistories.get(id)?.push(entry)
    return structuredClone(next)
  }

  async deliveryHistory(id: string): Promise<DeliveryHistoryEntry[]> {
    return structuredClone(this.deliveryHistories.get(id) ?? [])
  }

  async listDueDeliveries(now: Date, limit: number): Promise<WebhookDelivery[]> {
    return [...this.deliveries.values()]
      .filter((delivery) => isDue(delivery, now))
      .sort((a, b) => a.sequence - b.sequence)
      .slice(0, limit)
      .map((delivery) => structuredClone(delivery))
  }

  async listDeliveries(query: DeliveryQuery): Promise<WebhookDelivery[]> {
    const matches = [...this.deliveries.values()]
      .filter((delivery) => delivery.status === query.status)
      .filter((delivery) => !query.accountId || delivery.accountId === query.accountId)
      .sort((a, b) => a.sequence - b.sequence)
    return (query.limit ? matches.slice(0, query.limit) : matches).map((delivery) => structuredClone(delivery))
  }

  async listDeliveriesForMessage(messageId: string): Promise<WebhookDelivery[]> {
    return [...this.deliveries.values()]
      .filter((delivery) => delivery.messageId === messageId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((delivery) => structuredClone(delivery))
  }

  async deliveryStats(now: Date): Promise<DeliveryStats> {
    const byStatus: Record<DeliveryStatus, number> = {
      pending: 0,
      delivering: 0,
      delivered: 0,
      retrying: 0,
      dlq: 0,
      failed_auth: 0
    }
    let due = 0
    for (const delivery of this.deliveries.values()) {
      byStatus[delivery.status]++
      if (isDue(delivery, now)) due++
    }
    return { due, byStatus }
  }

  async isHealthy(): Promise<boolean> {
    return true
  }

  getBackendType(): string {
    return 'memory'
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private insertMessage(message: Message): void {
    this.messages.set(message.id, structuredClone(message))
    this.messageHistories.set(message.id, [historyEntry(message.status, message.createdAt, message.retryCount)])
    if (message.platformMessageId) {
      this.platformIndex.set(message.platformMessageId, message.id)
    }
  }

  private requireMessage(id: string): Message {
    const message = this.messages.get(id)
    if (!message) throw new NotFoundError(`Message ${id} not found`)
    return structuredClone(message)
  }
}
