import { Router } from 'express'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import type { Message } from '../core/types.js'
import { asyncHandler } from '../middleware/errorHandler.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { NotFoundError } from '../utils/errors.js'
import type { OutboundDispatcher } from '../services/outboundDispatcher.js'

const sendBodySchema = z.object({
  account_id: z.string().min(1),
  recipient_id: z.string().min(1),
  message: z.string(),
  idempotency_key: z.string().optional(),
  message_type: z.string().min(1).optional()
})

export function serializeMessage(message: Message) {
  return {
    message_id: message.id,
    account_id: message.accountId,
    direction: message.direction,
    status: message.status,
    sender_id: message.senderId,
    recipient_id: message.recipientId,
    conversation_id: message.conversationId,
    platform_message_id: message.platformMessageId,
    retry_count: message.retryCount,
    created_at: message.createdAt,
    updated_at: message.updatedAt,
    sent_at: message.sentAt,
    delivered_at: message.deliveredAt,
    read_at: message.readAt,
    error: message.error ? { code: message.error.code, message: message.error.message, retryable: message.error.retryable } : null
  }
}

export function createMessagesRouter(deps: { dispatcher: OutboundDispatcher; store: StatusStore }): Router {
  const router = Router()

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = sendBodySchema.parse(req.body)
      // Header wins over body so retries through proxies keep their key
      const idempotencyKey = req.header('idempotency-key') ?? body.idempotency_key ?? uuidv4()
      const result = await deps.dispatcher.send({
        accountId: body.account_id,
        recipientId: body.recipient_id,
        text: body.message,
        idempotencyKey,
        messageType: body.message_type
      })
      res.status(202).json({
        success: true,
        message_id: result.messageId,
        status: result.status,
        duplicate: result.duplicate,
        idempotency_key: idempotencyKey.trim()
      })
    })
  )

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const message = await deps.store.getMessage(req.params.id ?? '')
      if (!message) throw new NotFoundError(`Message ${req.params.id} not found`)
      res.json({ success: true, message: serializeMessage(message) })
    })
  )

  router.get(
    '/:id/history',
    asyncHandler(async (req, res) => {
      const id = req.params.id ?? ''
      const message = await deps.store.getMessage(id)
      if (!message) throw new NotFoundError(`Message ${id} not found`)
      res.json({ success: true, message_id: id, history: await deps.store.messageHistory(id) })
    })
  )

  return router
}
