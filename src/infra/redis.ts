import IORedis, { type RedisOptions } from 'ioredis'

export function validateRedisUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return ['redis:', 'rediss:'].includes(parsed.protocol)
  } catch {
    return false
  }
}

/**
 * Client for the Status Store. Commands fail fast while disconnected rather
 * than piling up in the offline queue.
 */
export function createRedisClient(url: string, overrides: RedisOptions = {}): IORedis {
  if (!validateRedisUrl(url)) {
    throw new Error(`REDIS_URL is not a redis:// or rediss:// URL`)
  }
  const options: RedisOptions = {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => Math.min(times * 1000, 5000),
    ...overrides
  }
  return new IORedis(url, options)
}
