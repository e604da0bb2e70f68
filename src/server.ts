import dotenv from 'dotenv'
import cron from 'node-cron'
import pino from 'pino'
import path from 'path'
import type { Server } from 'http'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createRedisClient } from './infra/redis.js'
import { FileAccountDirectory } from './services/accountDirectory.js'
import { IdempotencyLedger } from './services/idempotencyLedger.js'
import { InboundRelay } from './services/inboundRelay.js'
import { LogAlerter } from './services/operatorAlerts.js'
import { OutboundDispatcher } from './services/outboundDispatcher.js'
import { GraphPlatformClient } from './services/platformClient.js'
import { RetryEngine } from './services/retryEngine.js'
import { StatusEventBus, StatusWebhookPublisher } from './services/statusEvents.js'
import { HttpWebhookSender } from './services/webhookSender.js'
import { MemoryStatusStore } from './storage/MemoryStatusStore.js'
import { RedisStatusStore } from './storage/RedisStatusStore.js'
import type { StatusStore } from './storage/StatusStore.js'
import { Logger } from './utils/Logger.js'

dotenv.config({ path: process.env.ENV_PATH || '.env' })

const config = loadConfig()
const logger = pino({ level: config.logLevel })

async function main(): Promise<void> {
  const redis = config.redis.url ? createRedisClient(config.redis.url) : undefined
  let store: StatusStore
  if (redis) {
    await redis.connect()
    store = new RedisStatusStore(redis, { keyPrefix: config.redis.keyPrefix })
  } else {
    logger.warn('REDIS_URL not set, using the in-memory status store; state is lost on restart')
    store = new MemoryStatusStore()
  }

  const accounts = new FileAccountDirectory(path.resolve(process.cwd(), config.accounts.file))
  const alerter = new LogAlerter(new Logger('CrmMessageRelayAlerts', { file: config.alertsLogFile }))
  const sender = new HttpWebhookSender(config.retry.attemptTimeoutMs)
  const engine = new RetryEngine({
    store,
    accounts,
    sender,
    alerter,
    policy: {
      backoffSeconds: config.retry.backoffSeconds,
      extendedIntervalSeconds: config.retry.extendedIntervalSeconds,
      maxRetryWindowSeconds: config.retry.maxRetryWindowSeconds,
      attemptTimeoutMs: config.retry.attemptTimeoutMs
    },
    concurrency: config.retry.concurrency,
    batchSize: config.retry.batchSize
  })

  const events = new StatusEventBus()
  const publisher = new StatusWebhookPublisher({ bus: events, store, accounts, engine })
  const dispatcher = new OutboundDispatcher({
    store,
    ledger: new IdempotencyLedger(store),
    accounts,
    platform: new GraphPlatformClient({ baseUrl: config.platform.baseUrl, timeoutMs: config.platform.timeoutMs }),
    events,
    maxLocalRetries: config.dispatch.maxLocalRetries,
    backoffMs: config.dispatch.backoffMs,
    staleAfterMs: config.dispatch.staleAfterMs
  })
  const relay = new InboundRelay({ store, accounts, sender, engine, immediateTimeoutMs: config.relay.immediateTimeoutMs })

  const app = createApp({
    store,
    accounts,
    dispatcher,
    relay,
    engine,
    apiTokens: config.apiTokens,
    platform: { appSecret: config.platform.appSecret, verifyToken: config.platform.verifyToken }
  })

  if (config.apiTokens.length === 0) {
    logger.warn('API_TOKENS is empty; every /api request will be rejected')
  }
  if (!config.platform.appSecret) {
    logger.warn('PLATFORM_APP_SECRET is empty; every platform webhook will be rejected')
  }

  await engine.recoverStale()
  await dispatcher.recoverStale()
  engine.start(config.retry.tickCron)
  const reloadTask = cron.schedule(config.accounts.reloadCron, () => {
    accounts.reload()
  })
  const recoveryTask = cron.schedule(config.dispatch.recoveryCron, () => {
    dispatcher.recoverStale().catch((err) => {
      logger.error({ err }, 'Outbound message recovery failed')
    })
  })

  const server: Server = app.listen(config.port, () => {
    logger.info({ port: config.port, store: store.getBackendType() }, 'Server listening')
  })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ signal }, 'Shutting down')
    reloadTask.stop()
    recoveryTask.stop()
    await new Promise<void>((resolve) => server.close(() => resolve()))
    await engine.stop()
    await dispatcher.drain()
    await publisher.drain()
    publisher.close()
    await store.close()
    logger.info('Shutdown complete')
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Shutdown failed')
          process.exit(1)
        })
    })
  }
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start')
  process.exit(1)
})
