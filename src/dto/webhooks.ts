import type { WebhookEventType } from '../core/types.js'

export interface InboundMessageEvent {
  platformMessageId: string
  senderId: string
  recipientId: string
  text: string
  messageType: string
  timestamp: string
}

export interface PlatformStatusEvent {
  kind: 'delivery' | 'read'
  platformMessageIds: string[]
  at: string
}

/**
 * Normalized entry from a platform webhook call. `channelId` is the
 * platform-side id of the business account the event was addressed to.
 */
export type PlatformEvent =
  | ({ kind: 'message'; channelId: string } & InboundMessageEvent)
  | ({ channelId: string } & PlatformStatusEvent)

export interface MessageReceivedPayload {
  event: 'message.received'
  message_id: string
  account_id: string
  sender_id: string
  message: string
  message_type: string
  timestamp: string
  platform_message_id: string
  conversation_id: string
}

export interface StatusPayloadError {
  code: string
  message: string
  retryable: boolean
}

export interface MessageStatusPayload {
  event: Exclude<WebhookEventType, 'message.received'>
  message_id: string
  account_id: string
  recipient_id: string
  status: string
  timestamp: string
  platform_message_id: string | null
  error: StatusPayloadError | null
}

export type CrmWebhookPayload = MessageReceivedPayload | MessageStatusPayload
