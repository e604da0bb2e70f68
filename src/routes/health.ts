import { Router } from 'express'
import type { Clock } from '../core/types.js'
import { asyncHandler } from '../middleware/errorHandler.js'
import type { StatusStore } from '../storage/StatusStore.js'

export function createHealthRouter(deps: { store: StatusStore; clock?: Clock }): Router {
  const router = Router()
  const clock = deps.clock ?? (() => new Date())

  router.get('/', async (_req, res) => {
    const storeHealthy = await deps.store.isHealthy().catch(() => false)
    res.status(storeHealthy ? 200 : 503).json({
      status: storeHealthy ? 'ok' : 'degraded',
      store: deps.store.getBackendType(),
      timestamp: clock().toISOString()
    })
  })

  // Queue depth as the retry engine sees it
  router.get(
    '/deliveries',
    asyncHandler(async (_req, res) => {
      const now = clock()
      const stats = await deps.store.deliveryStats(now)
      res.json({
        store: deps.store.getBackendType(),
        due: stats.due,
        dead_lettered: stats.byStatus.dlq,
        failed_auth: stats.byStatus.failed_auth,
        in_flight: stats.byStatus.delivering,
        by_status: stats.byStatus,
        timestamp: now.toISOString()
      })
    })
  )

  return router
}
