import { Router } from 'express'
import { z } from 'zod'
import type { WebhookDelivery } from '../core/types.js'
import { asyncHandler } from '../middleware/errorHandler.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { NotFoundError } from '../utils/errors.js'
import type { RetryEngine } from '../services/retryEngine.js'

const dlqQuerySchema = z.object({
  account_id: z.string().min(1).optional()
})

// The signed payload is returned as stored; secrets never live in it.
export function serializeDelivery(delivery: WebhookDelivery) {
  return {
    delivery_id: delivery.id,
    account_id: delivery.accountId,
    message_id: delivery.messageId,
    event_type: delivery.eventType,
    status: delivery.status,
    target_url: delivery.targetUrl,
    retry_count: delivery.retryCount,
    sequence: delivery.sequence,
    last_attempt_at: delivery.lastAttemptAt,
    next_retry_at: delivery.nextRetryAt,
    delivered_at: delivery.deliveredAt,
    retry_window_started_at: delivery.retryWindowStartedAt,
    last_response_status: delivery.lastResponseStatus,
    last_error: delivery.lastError,
    created_at: delivery.createdAt,
    updated_at: delivery.updatedAt,
    payload: delivery.payload
  }
}

export function createDeliveriesRouter(deps: { store: StatusStore }): Router {
  const router = Router()

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const delivery = await deps.store.getDelivery(req.params.id ?? '')
      if (!delivery) throw new NotFoundError(`Delivery ${req.params.id} not found`)
      res.json({ success: true, delivery: serializeDelivery(delivery) })
    })
  )

  router.get(
    '/:id/history',
    asyncHandler(async (req, res) => {
      const id = req.params.id ?? ''
      const delivery = await deps.store.getDelivery(id)
      if (!delivery) throw new NotFoundError(`Delivery ${id} not found`)
      res.json({ success: true, delivery_id: id, history: await deps.store.deliveryHistory(id) })
    })
  )

  return router
}

/**
 * Dead-letter queue inspection and manual requeue.
 */
export function createAdminRouter(deps: { engine: RetryEngine }): Router {
  const router = Router()

  router.get(
    '/dlq',
    asyncHandler(async (req, res) => {
      const query = dlqQuerySchema.parse(req.query)
      const deliveries = await deps.engine.listDlq(query.account_id)
      res.json({ success: true, count: deliveries.length, deliveries: deliveries.map(serializeDelivery) })
    })
  )

  router.post(
    '/deliveries/:id/requeue',
    asyncHandler(async (req, res) => {
      const delivery = await deps.engine.requeue(req.params.id ?? '')
      res.json({ success: true, delivery: serializeDelivery(delivery) })
    })
  )

  return router
}
