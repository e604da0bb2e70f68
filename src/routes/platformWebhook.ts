import express, { Router } from 'express'
import pino from 'pino'
import type { AccountDirectory } from '../core/interfaces.js'
import { asyncHandler } from '../middleware/errorHandler.js'
import type { InboundRelay } from '../services/inboundRelay.js'
import type { OutboundDispatcher } from '../services/outboundDispatcher.js'
import { parsePlatformWebhook } from '../services/platformEvents.js'
import { AuthError, ValidationError } from '../utils/errors.js'
import { SIGNATURE_HEADER, verify } from '../utils/signature.js'

export interface PlatformWebhookDeps {
  relay: InboundRelay
  dispatcher: OutboundDispatcher
  accounts: AccountDirectory
  appSecret: string
  verifyToken: string
}

/**
 * Receives platform webhooks. Mounted ahead of the JSON parser: the signature
 * is checked over the raw bytes.
 */
export function createPlatformWebhookRouter(deps: PlatformWebhookDeps): Router {
  const router = Router()
  const logger = pino({ name: 'platform-webhook', level: process.env.LOG_LEVEL || 'info' })

  router.get('/', (req, res) => {
    const mode = req.query['hub.mode']
    const token = req.query['hub.verify_token']
    const challenge = req.query['hub.challenge']
    if (mode === 'subscribe' && deps.verifyToken && token === deps.verifyToken && typeof challenge === 'string') {
      logger.info('Platform webhook subscription verified')
      res.status(200).type('text/plain').send(challenge)
      return
    }
    logger.warn({ mode }, 'Platform webhook verification rejected')
    res.status(403).json({ success: false, error: 'Verification failed', code: 'forbidden' })
  })

  router.post(
    '/',
    express.raw({ type: '*/*', limit: '1mb' }),
    asyncHandler(async (req, res) => {
      const raw: unknown = req.body
      const payload = Buffer.isBuffer(raw) ? raw : Buffer.alloc(0)
      if (!deps.appSecret || !verify(payload, deps.appSecret, req.header(SIGNATURE_HEADER))) {
        logger.warn({ length: payload.length }, 'Platform webhook signature rejected')
        throw new AuthError('Invalid signature', 'invalid_signature')
      }

      let body: unknown
      try {
        body = JSON.parse(payload.toString('utf8'))
      } catch {
        throw new ValidationError('Webhook body is not valid JSON', 'invalid_json')
      }

      const { events, skipped } = parsePlatformWebhook(body)
      let relayed = 0
      let statusUpdates = 0
      let unrouted = 0
      for (const event of events) {
        const account = await deps.accounts.findByChannelId(event.channelId)
        if (!account) {
          unrouted++
          logger.warn({ channelId: event.channelId, kind: event.kind }, 'No account bound to channel, event dropped')
          continue
        }
        if (event.kind === 'message') {
          const result = await deps.relay.forward(account.id, event)
          if (!result.duplicate) relayed++
        } else {
          const updated = await deps.dispatcher.applyPlatformStatus(account.id, event)
          statusUpdates += updated.length
        }
      }

      logger.debug({ events: events.length, skipped, relayed, statusUpdates, unrouted }, 'Platform webhook processed')
      res.status(200).json({ success: true, received: events.length, relayed, status_updates: statusUpdates })
    })
  )

  return router
}
