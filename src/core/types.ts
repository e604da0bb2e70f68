/**
 * Core types for message dispatch and webhook relay
 */

export type MessageDirection = 'inbound' | 'outbound'

export type MessageStatus =
  | 'pending'
  | 'sending'
  | 'sent'
  | 'delivered'
  | 'read'
  | 'failed'
  | 'received'

export type MessageErrorKind = 'transient' | 'permanent'

export interface MessageError {
  kind: MessageErrorKind
  code: string
  message: string
  retryable: boolean
}

export interface Message {
  id: string
  accountId: string
  idempotencyKey: string | null
  direction: MessageDirection
  senderId: string
  recipientId: string
  text: string
  messageType: string
  conversationId: string
  platformMessageId: string | null
  status: MessageStatus
  retryCount: number
  error: MessageError | null
  createdAt: string
  updatedAt: string
  sentAt: string | null
  deliveredAt: string | null
  readAt: string | null
  version: number
}

export type WebhookEventType =
  | 'message.received'
  | 'message.sent'
  | 'message.delivered'
  | 'message.read'
  | 'message.failed'

export type DeliveryStatus =
  | 'pending'
  | 'delivering'
  | 'delivered'
  | 'retrying'
  | 'dlq'
  | 'failed_auth'

export interface WebhookDelivery {
  id: string
  accountId: string
  messageId: string
  eventType: WebhookEventType
  // Raw JSON body; these exact bytes are signed on every attempt.
  payload: string
  targetUrl: string
  status: DeliveryStatus
  retryCount: number
  lastAttemptAt: string | null
  nextRetryAt: string | null
  deliveredAt: string | null
  createdAt: string
  updatedAt: string
  retryWindowStartedAt: string
  sequence: number
  lastResponseStatus: number | null
  lastError: string | null
  version: number
}

export interface HistoryEntry<S extends string> {
  status: S
  at: string
  retryCount: number
  reason?: string
}

export type MessageHistoryEntry = HistoryEntry<MessageStatus>
export type DeliveryHistoryEntry = HistoryEntry<DeliveryStatus>

/**
 * A requested change to a stored row. `patch` carries the fields that change
 * together with the status; `reason` is kept in the history entry only.
 */
export interface Transition<S extends string, T> {
  status: S
  patch?: Partial<T>
  reason?: string
  // Refuse the update with ConflictError unless the row is still at this version
  expectedVersion?: number
}

type ImmutableMessageFields = 'id' | 'accountId' | 'idempotencyKey' | 'direction' | 'createdAt' | 'version' | 'status'
type ImmutableDeliveryFields = 'id' | 'accountId' | 'messageId' | 'eventType' | 'payload' | 'createdAt' | 'sequence' | 'version' | 'status'

export type MessageTransition = Transition<MessageStatus, Omit<Message, ImmutableMessageFields>>
export type DeliveryTransition = Transition<DeliveryStatus, Omit<WebhookDelivery, ImmutableDeliveryFields>>

export type AccountStatus = 'active' | 'inactive'

export interface Account {
  id: string
  channelId?: string
  webhookUrl: string
  webhookSecret: string
  platformAccessToken?: string
  status: AccountStatus
}

/**
 * Result of one signed POST to a CRM webhook
 */
export type AttemptOutcome =
  | { ok: true; statusCode: number }
  | { ok: false; kind: 'auth'; statusCode: number; error: string }
  | { ok: false; kind: 'retryable'; statusCode: number | null; error: string }

export type Clock = () => Date
