import express, { type Express } from 'express'
import type { AccountDirectory } from './core/interfaces.js'
import { apiKeyAuth } from './middleware/auth.js'
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js'
import { createAdminRouter, createDeliveriesRouter } from './routes/deliveries.js'
import { createHealthRouter } from './routes/health.js'
import { createMessagesRouter } from './routes/messages.js'
import { createPlatformWebhookRouter } from './routes/platformWebhook.js'
import type { InboundRelay } from './services/inboundRelay.js'
import type { OutboundDispatcher } from './services/outboundDispatcher.js'
import type { RetryEngine } from './services/retryEngine.js'
import type { StatusStore } from './storage/StatusStore.js'

export interface AppDeps {
  store: StatusStore
  accounts: AccountDirectory
  dispatcher: OutboundDispatcher
  relay: InboundRelay
  engine: RetryEngine
  apiTokens: readonly string[]
  platform: { appSecret: string; verifyToken: string }
}

export function createApp(deps: AppDeps): Express {
  const app = express()
  app.disable('x-powered-by')

  // Raw body route: must see the bytes before any JSON parser touches them
  app.use(
    '/webhooks/platform',
    createPlatformWebhookRouter({
      relay: deps.relay,
      dispatcher: deps.dispatcher,
      accounts: deps.accounts,
      appSecret: deps.platform.appSecret,
      verifyToken: deps.platform.verifyToken
    })
  )

  app.use(express.json({ limit: '256kb' }))
  app.use(apiKeyAuth(deps.apiTokens))

  app.use('/health', createHealthRouter({ store: deps.store }))

  app.use('/api/v1/messages', createMessagesRouter({ dispatcher: deps.dispatcher, store: deps.store }))
  app.use('/api/v1/deliveries', createDeliveriesRouter({ store: deps.store }))
  app.use('/api/v1/admin', createAdminRouter({ engine: deps.engine }))

  app.use(notFoundHandler)
  app.use(errorHandler)
  return app
}
