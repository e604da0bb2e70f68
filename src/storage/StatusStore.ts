/**
 * Status Store contract.
 *
 * Durable record of messages and webhook deliveries. Every update validates
 * the transition, bumps `version`, writes the row and appends exactly one
 * history entry as a single atomic step. History is never edited.
 */

import type {
  DeliveryHistoryEntry,
  DeliveryStatus,
  DeliveryTransition,
  Message,
  MessageDirection,
  MessageHistoryEntry,
  MessageStatus,
  MessageTransition,
  WebhookDelivery
} from '../core/types.js'

export interface ReserveResult {
  message: Message
  isNew: boolean
}

export type NewDelivery = Omit<WebhookDelivery, 'sequence' | 'version'>

export interface DeliveryQuery {
  status: DeliveryStatus
  accountId?: string
  limit?: number
}

export interface MessageQuery {
  status: MessageStatus
  direction?: MessageDirection
  // Only rows whose last update is strictly older than this
  updatedBefore?: Date
  limit?: number
}

export interface DeliveryStats {
  // Pending or retrying deliveries whose next attempt is due now
  due: number
  byStatus: Record<DeliveryStatus, number>
}

export interface StatusStore {
  /**
   * Inserts an outbound message unless (accountId, idempotencyKey) already
   * exists, in which case the stored message comes back with `isNew: false`.
   */
  reserveOutbound(draft: Message): Promise<ReserveResult>

  /**
   * Inserts an inbound message unless its platform message id is already
   * stored.
   */
  recordInbound(draft: Message): Promise<ReserveResult>

  getMessage(id: string): Promise<Message | null>
  findMessageByPlatformId(platformMessageId: string): Promise<Message | null>
  updateMessage(id: string, transition: MessageTransition): Promise<Message>
  messageHistory(id: string): Promise<MessageHistoryEntry[]>
  listMessages(query: MessageQuery): Promise<Message[]>

  createDelivery(delivery: NewDelivery): Promise<WebhookDelivery>
  getDelivery(id: string): Promise<WebhookDelivery | null>
  updateDelivery(id: string, transition: DeliveryTransition): Promise<WebhookDelivery>
  deliveryHistory(id: string): Promise<DeliveryHistoryEntry[]>

  /**
   * Pending or retrying deliveries with `nextRetryAt <= now`, oldest
   * `sequence` first.
   */
  listDueDeliveries(now: Date, limit: number): Promise<WebhookDelivery[]>
  listDeliveries(query: DeliveryQuery): Promise<WebhookDelivery[]>
  /**
   * Every delivery created for one message, oldest `sequence` first.
   */
  listDeliveriesForMessage(messageId: string): Promise<WebhookDelivery[]>
  deliveryStats(now: Date): Promise<DeliveryStats>

  isHealthy(): Promise<boolean>
  getBackendType(): string
  close(): Promise<void>
}
