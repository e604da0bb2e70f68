import { z } from 'zod'
import type { DeliveryHistoryEntry, Message, MessageHistoryEntry, WebhookDelivery } from '../core/types.js'

// Rows read back from Redis are validated before they re-enter the domain.

const messageStatusSchema = z.enum(['pending', 'sending', 'sent', 'delivered', 'read', 'failed', 'received'])
const deliveryStatusSchema = z.enum(['pending', 'delivering', 'delivered', 'retrying', 'dlq', 'failed_auth'])
const eventTypeSchema = z.enum(['message.received', 'message.sent', 'message.delivered', 'message.read', 'message.failed'])

export const messageSchema: z.ZodType<Message> = z.object({
  id: z.string(),
  accountId: z.string(),
  idempotencyKey: z.string().nullable(),
  direction: z.enum(['inbound', 'outbound']),
  senderId: z.string(),
  recipientId: z.string(),
  text: z.string(),
  messageType: z.string(),
  conversationId: z.string(),
  platformMessageId: z.string().nullable(),
  status: messageStatusSchema,
  retryCount: z.number().int(),
  error: z
    .object({
      kind: z.enum(['transient', 'permanent']),
      code: z.string(),
      message: z.string(),
      retryable: z.boolean()
    })
    .nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  sentAt: z.string().nullable(),
  deliveredAt: z.string().nullable(),
  readAt: z.string().nullable(),
  version: z.number().int()
})

export const deliverySchema: z.ZodType<WebhookDelivery> = z.object({
  id: z.string(),
  accountId: z.string(),
  messageId: z.string(),
  eventType: eventTypeSchema,
  payload: z.string(),
  targetUrl: z.string(),
  status: deliveryStatusSchema,
  retryCount: z.number().int(),
  lastAttemptAt: z.string().nullable(),
  nextRetryAt: z.string().nullable(),
  deliveredAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  retryWindowStartedAt: z.string(),
  sequence: z.number().int(),
  lastResponseStatus: z.number().int().nullable(),
  lastError: z.string().nullable(),
  version: z.number().int()
})

export const messageHistoryEntrySchema: z.ZodType<MessageHistoryEntry> = z.object({
  status: messageStatusSchema,
  at: z.string(),
  retryCount: z.number().int(),
  reason: z.string().optional()
})

export const deliveryHistoryEntrySchema: z.ZodType<DeliveryHistoryEntry> = z.object({
  status: deliveryStatusSchema,
  at: z.string(),
  retryCount: z.number().int(),
  reason: z.string().optional()
})

export function parseRow<T>(schema: z.ZodType<T>, raw: string | null | undefined): T | null {
  if (raw === null || raw === undefined) return null
  return schema.parse(JSON.parse(raw))
}
