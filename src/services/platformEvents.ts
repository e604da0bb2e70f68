import { z } from 'zod'
import type { PlatformEvent } from '../dto/webhooks.js'

export const UNSUPPORTED_MESSAGE_TEXT = '[Unsupported message type]'

const participantSchema = z.object({ id: z.string().min(1) })

const messagingEventSchema = z.object({
  sender: participantSchema.optional(),
  recipient: participantSchema.optional(),
  timestamp: z.number().optional(),
  message: z
    .object({
      mid: z.string().optional(),
      text: z.string().optional(),
      is_echo: z.boolean().optional(),
      attachments: z.array(z.object({ type: z.string().optional() }).passthrough()).optional()
    })
    .passthrough()
    .optional(),
  delivery: z.object({ mids: z.array(z.string()).optional(), watermark: z.number().optional() }).passthrough().optional(),
  read: z.object({ mid: z.string().optional(), watermark: z.number().optional() }).passthrough().optional()
})

const webhookBodySchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        id: z.string().min(1),
        time: z.number().optional(),
        messaging: z.array(z.unknown()).default([])
      })
    )
    .default([])
})

export type PlatformWebhookBody = z.infer<typeof webhookBodySchema>

export interface ParseResult {
  events: PlatformEvent[]
  // Messaging entries that were neither a usable message nor a receipt
  skipped: number
}

function toIso(timestampMs: number | undefined, fallback: Date): string {
  return timestampMs !== undefined ? new Date(timestampMs).toISOString() : fallback.toISOString()
}

/**
 * Normalizes a platform webhook body (`entry[].messaging[]`) into message,
 * delivery and read events. Echoes of our own sends are skipped, as are
 * entries missing the ids needed to route them.
 */
export function parsePlatformWebhook(body: unknown, now: Date = new Date()): ParseResult {
  const parsed = webhookBodySchema.safeParse(body)
  if (!parsed.success) return { events: [], skipped: 0 }

  const events: PlatformEvent[] = []
  let skipped = 0
  for (const entry of parsed.data.entry) {
    for (const raw of entry.messaging) {
      const item = messagingEventSchema.safeParse(raw)
      if (!item.success) {
        skipped++
        continue
      }
      const { sender, recipient, timestamp, message, delivery, read } = item.data
      const at = toIso(timestamp, now)

      if (message) {
        if (message.is_echo || !message.mid || !sender || !recipient) {
          skipped++
          continue
        }
        const attachmentType = message.attachments?.[0]?.type
        events.push({
          kind: 'message',
          channelId: entry.id,
          platformMessageId: message.mid,
          senderId: sender.id,
          recipientId: recipient.id,
          text: message.text || UNSUPPORTED_MESSAGE_TEXT,
          messageType: message.text ? 'text' : attachmentType ?? 'unknown',
          timestamp: at
        })
      } else if (delivery?.mids && delivery.mids.length > 0) {
        events.push({ kind: 'delivery', channelId: entry.id, platformMessageIds: delivery.mids, at })
      } else if (read?.mid) {
        events.push({ kind: 'read', channelId: entry.id, platformMessageIds: [read.mid], at })
      } else {
        skipped++
      }
    }
  }
  return { events, skipped }
}
