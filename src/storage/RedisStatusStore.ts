/**
 * Redis-backed Status Store.
 *
 * Layout (all keys under the configured prefix):
 *   msg:<id>                      message row (JSON)
 *   msg:<id>:history              transition history (list of JSON)
 *   msg:<id>:deliveries           zset of the message's deliveries scored by sequence
 *   msg:status:<status>           zset of messages per status scored by updatedAt (ms)
 *   idem:<len(account)>:<account>:<key>
 *                                 idempotency index -> message id
 *   pmid:<platform id>            platform message id -> message id
 *   dlv:<id>                      delivery row (JSON)
 *   dlv:<id>:history              transition history
 *   dlv:seq                       creation counter
 *   dlv:due                       zset of retryable deliveries scored by next attempt (ms)
 *   dlv:status:<status>           zset of deliveries per status scored by sequence
 *
 * Inserts and updates run as Lua scripts so the row, its index entries and
 * its history entry change together. Updates compare-and-set on `version`.
 */

import pino from 'pino'
import type {
  Clock,
  DeliveryHistoryEntry,
  DeliveryStatus,
  DeliveryTransition,
  Message,
  MessageHistoryEntry,
  MessageStatus,
  MessageTransition,
  WebhookDelivery
} from '../core/types.js'
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js'
import { applyDeliveryTransition, applyMessageTransition, historyEntry } from './transitions.js'
import {
  deliveryHistoryEntrySchema,
  deliverySchema,
  messageHistoryEntrySchema,
  messageSchema,
  parseRow
} from './schemas.js'
import type { DeliveryQuery, DeliveryStats, MessageQuery, NewDelivery, ReserveResult, StatusStore } from './StatusStore.js'

export const MAX_CAS_ATTEMPTS = 5

// KEYS: index, row, history, status set. ARGV: id, row, history entry, row key prefix, updatedAt score
export const RESERVE_SCRIPT = `
if redis.call('SET', KEYS[1], ARGV[1], 'NX') then
  redis.call('SET', KEYS[2], ARGV[2])
  redis.call('RPUSH', KEYS[3], ARGV[3])
  redis.call('ZADD', KEYS[4], ARGV[5], ARGV[1])
  return {1, ARGV[2]}
end
local existing = redis.call('GET', KEYS[1])
return {0, redis.call('GET', ARGV[4] .. existing)}
`

// KEYS: row, history, old status set, new status set[, platform index]
// ARGV: expected version, row, history entry, id, updatedAt score
export const UPDATE_MESSAGE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
if tonumber(cjson.decode(current)['version']) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('RPUSH', KEYS[2], ARGV[3])
redis.call('ZREM', KEYS[3], ARGV[4])
redis.call('ZADD', KEYS[4], ARGV[5], ARGV[4])
if #KEYS == 5 then redis.call('SET', KEYS[5], ARGV[4]) end
return 1
`

// KEYS: row, history, due, status set, message deliveries
// ARGV: row, history entry, id, due score or '', sequence
export const CREATE_DELIVERY_SCRIPT = `
if not redis.call('SET', KEYS[1], ARGV[1], 'NX') then return 0 end
redis.call('RPUSH', KEYS[2], ARGV[2])
if ARGV[4] ~= '' then redis.call('ZADD', KEYS[3], ARGV[4], ARGV[3]) end
redis.call('ZADD', KEYS[4], ARGV[5], ARGV[3])
redis.call('ZADD', KEYS[5], ARGV[5], ARGV[3])
return 1
`

// KEYS: row, history, due, old status set, new status set
// ARGV: expected version, row, history entry, id, due score or '', sequence
export const UPDATE_DELIVERY_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
if tonumber(cjson.decode(current)['version']) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('RPUSH', KEYS[2], ARGV[3])
if ARGV[5] ~= '' then
  redis.call('ZADD', KEYS[3], ARGV[5], ARGV[4])
else
  redis.call('ZREM', KEYS[3], ARGV[4])
end
redis.call('ZREM', KEYS[4], ARGV[4])
redis.call('ZADD', KEYS[5], ARGV[6], ARGV[4])
return 1
`

const DELIVERY_STATUSES: readonly DeliveryStatus[] = ['pending', 'delivering', 'delivered', 'retrying', 'dlq', 'failed_auth']

/**
 * The commands the store issues. An ioredis client satisfies it.
 */
export interface RedisCommands {
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>
  get(key: string): Promise<string | null>
  mget(...keys: string[]): Promise<Array<string | null>>
  lrange(key: string, start: number, stop: number): Promise<string[]>
  incr(key: string): Promise<number>
  zrange(key: string, start: number, stop: number): Promise<string[]>
  zrangebyscore(key: string, min: string | number, max: string | number, limit: 'LIMIT', offset: number, count: number): Promise<string[]>
  zcount(key: string, min: string | number, max: string | number): Promise<number>
  zcard(key: string): Promise<number>
  ping(): Promise<string>
  quit(): Promise<string>
}

export interface RedisStatusStoreOptions {
  keyPrefix?: string
  clock?: Clock
}

export class RedisStatusStore implements StatusStore {
  private readonly logger = pino({ name: 'redis-status-store', level: process.env.LOG_LEVEL || 'info' })
  private readonly prefix: string
  private readonly clock: Clock

  constructor(
    private readonly redis: RedisCommands,
    options: RedisStatusStoreOptions = {}
  ) {
    this.prefix = options.keyPrefix ?? 'crm-relay:'
    this.clock = options.clock ?? (() => new Date())
  }

  async reserveOutbound(draft: Message): Promise<ReserveResult> {
    if (!draft.idempotencyKey) {
      throw new ValidationError('Outbound message requires an idempotency key')
    }
    return this.reserve(this.idempotencyKey(draft.accountId, draft.idempotencyKey), draft)
  }

  async recordInbound(draft: Message): Promise<ReserveResult> {
    if (!draft.platformMessageId) {
      throw new ValidationError('Inbound message requires a platform message id')
    }
    return this.reserve(this.key(`pmid:${draft.platformMessageId}`), draft)
  }

  async getMessage(id: string): Promise<Message | null> {
    return parseRow(messageSchema, await this.redis.get(this.key(`msg:${id}`)))
  }

  async findMessageByPlatformId(platformMessageId: string): Promise<Message | null> {
    const id = await this.redis.get(this.key(`pmid:${platformMessageId}`))
    return id ? this.getMessage(id) : null
  }

  async updateMessage(id: string, transition: MessageTransition): Promise<Message> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.getMessage(id)
      if (!current) throw new NotFoundError(`Message ${id} not found`)

      const { next, entry } = applyMessageTransition(current, transition, this.clock())
      const keys = [
        this.key(`msg:${id}`),
        this.key(`msg:${id}:history`),
        this.messageStatusKey(current.status),
        this.messageStatusKey(next.status)
      ]
      if (next.platformMessageId && next.platformMessageId !== current.platformMessageId) {
        keys.push(this.key(`pmid:${next.platformMessageId}`))
      }

      const result = await this.redis.eval(
        UPDATE_MESSAGE_SCRIPT,
        keys.length,
        ...keys,
        String(current.version),
        JSON.stringify(next),
        JSON.stringify(entry),
        id,
        String(Date.parse(next.updatedAt))
      )
      if (result === 1) return next
      if (result === -1) throw new NotFoundError(`Message ${id} not found`)
      this.logger.debug({ messageId: id, attempt }, 'Message version moved, retrying update')
    }
    throw new ConflictError(`Message ${id} is being updated concurrently`, { messageId: id })
  }

  async messageHistory(id: string): Promise<MessageHistoryEntry[]> {
    const raw = await this.redis.lrange(this.key(`msg:${id}:history`), 0, -1)
    return raw.map((item) => messageHistoryEntrySchema.parse(JSON.parse(item)))
  }

  async listMessages(query: MessageQuery): Promise<Message[]> {
    const max = query.updatedBefore ? `(${query.updatedBefore.getTime()}` : '+inf'
    const ids = await this.redis.zrangebyscore(this.messageStatusKey(query.status), '-inf', max, 'LIMIT', 0, -1)
    if (ids.length === 0) return []
    const rows = await this.redis.mget(...ids.map((id) => this.key(`msg:${id}`)))
    const messages: Message[] = []
    for (const row of rows) {
      const message = parseRow(messageSchema, row)
      if (message && message.status === query.status && (!query.direction || message.direction === query.direction)) {
        messages.push(message)
      }
    }
    return query.limit ? messages.slice(0, query.limit) : messages
  }

  async createDelivery(delivery: NewDelivery): Promise<WebhookDelivery> {
    const sequence = await this.redis.incr(this.key('dlv:seq'))
    const stored: WebhookDelivery = { ...delivery, sequence, version: 1 }
    const entry = historyEntry(stored.status, stored.createdAt, stored.retryCount)

    const result = await this.redis.eval(
      CREATE_DELIVERY_SCRIPT,
      5,
      this.key(`dlv:${stored.id}`),
      this.key(`dlv:${stored.id}:history`),
      this.key('dlv:due'),
      this.statusSetKey(stored.status),
      this.key(`msg:${stored.messageId}:deliveries`),
      JSON.stringify(stored),
      JSON.stringify(entry),
      stored.id,
      this.dueScore(stored),
      String(sequence)
    )
    if (result !== 1) {
      throw new ConflictError(`Delivery ${stored.id} already exists`)
    }
    return stored
  }

  async getDelivery(id: string): Promise<WebhookDelivery | null> {
    return parseRow(deliverySchema, await this.redis.get(this.key(`dlv:${id}`)))
  }

  async updateDelivery(id: string, transition: DeliveryTransition): Promise<WebhookDelivery> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.getDelivery(id)
      if (!current) throw new NotFoundError(`Delivery ${id} not found`)

      const { next, entry } = applyDeliveryTransition(current, transition, this.clock())
      const result = await this.redis.eval(
        UPDATE_DELIVERY_SCRIPT,
        5,
        this.key(`dlv:${id}`),
        this.key(`dlv:${id}:history`),
        this.key('dlv:due'),
        this.statusSetKey(current.status),
        this.statusSetKey(next.status),
        String(current.version),
        JSON.stringify(next),
        JSON.stringify(entry),
        id,
        this.dueScore(next),
        String(next.sequence)
      )
      if (result === 1) return next
      if (result === -1) throw new NotFoundError(`Delivery ${id} not found`)
      this.logger.debug({ deliveryId: id, attempt }, 'Delivery version moved, retrying update')
    }
    throw new ConflictError(`Delivery ${id} is being updated concurrently`, { deliveryId: id })
  }

  async deliveryHistory(id: string): Promise<DeliveryHistoryEntry[]> {
    const raw = await this.redis.lrange(this.key(`dlv:${id}:history`), 0, -1)
    return raw.map((item) => deliveryHistoryEntrySchema.parse(JSON.parse(item)))
  }

  async listDueDeliveries(now: Date, limit: number): Promise<WebhookDelivery[]> {
    const ids = await this.redis.zrangebyscore(this.key('dlv:due'), '-inf', now.getTime(), 'LIMIT', 0, limit)
    const deliveries = await this.loadDeliveries(ids)
    return deliveries.sort((a, b) => a.sequence - b.sequence)
  }

  async listDeliveries(query: DeliveryQuery): Promise<WebhookDelivery[]> {
    const ids = await this.redis.zrange(this.statusSetKey(query.status), 0, -1)
    const deliveries = (await this.loadDeliveries(ids)).filter(
      (delivery) => delivery.status === query.status && (!query.accountId || delivery.accountId === query.accountId)
    )
    return query.limit ? deliveries.slice(0, query.limit) : deliveries
  }

  async listDeliveriesForMessage(messageId: string): Promise<WebhookDelivery[]> {
    const ids = await this.redis.zrange(this.key(`msg:${messageId}:deliveries`), 0, -1)
    const deliveries = await this.loadDeliveries(ids)
    return deliveries.sort((a, b) => a.sequence - b.sequence)
  }

  async deliveryStats(now: Date): Promise<DeliveryStats> {
    const [due, ...counts] = await Promise.all([
      this.redis.zcount(this.key('dlv:due'), '-inf', now.getTime()),
      ...DELIVERY_STATUSES.map((status) => this.redis.zcard(this.statusSetKey(status)))
    ])
    const byStatus: Record<DeliveryStatus, number> = {
      pending: 0,
      delivering: 0,
      delivered: 0,
      retrying: 0,
      dlq: 0,
      failed_auth: 0
    }
    DELIVERY_STATUSES.forEach((status, index) => {
      byStatus[status] = counts[index] ?? 0
    })
    return { due, byStatus }
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.redis.ping()
      return true
    } catch {
      return false
    }
  }

  getBackendType(): string {
    return 'redis'
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit()
    } catch (err) {
      this.logger.warn({ err }, 'Error during Redis connection cleanup')
    }
  }

  private async reserve(indexKey: string, draft: Message): Promise<ReserveResult> {
    const entry = historyEntry(draft.status, draft.createdAt, draft.retryCount)
    const result = await this.redis.eval(
      RESERVE_SCRIPT,
      4,
      indexKey,
      this.key(`msg:${draft.id}`),
      this.key(`msg:${draft.id}:history`),
      this.messageStatusKey(draft.status),
      draft.id,
      JSON.stringify(draft),
      JSON.stringify(entry),
      this.key('msg:'),
      String(Date.parse(draft.updatedAt))
    )
    if (!Array.isArray(result) || typeof result[1] !== 'string') {
      throw new ConflictError('Reservation returned no message row', { messageId: draft.id })
    }
    const message = messageSchema.parse(JSON.parse(result[1]))
    return { message, isNew: result[0] === 1 }
  }

  private async loadDeliveries(ids: string[]): Promise<WebhookDelivery[]> {
    if (ids.length === 0) return []
    const rows = await this.redis.mget(...ids.map((id) => this.key(`dlv:${id}`)))
    const deliveries: WebhookDelivery[] = []
    for (const row of rows) {
      const delivery = parseRow(deliverySchema, row)
      if (delivery) deliveries.push(delivery)
    }
    return deliveries
  }

  private dueScore(delivery: WebhookDelivery): string {
    const retryable: DeliveryStatus[] = ['pending', 'retrying']
    if (!retryable.includes(delivery.status) || !delivery.nextRetryAt) return ''
    return String(Date.parse(delivery.nextRetryAt))
  }

  // Length-prefixing the account keeps ("a", "b:c") and ("a:b", "c") apart
  private idempotencyKey(accountId: string, key: string): string {
    return this.key(`idem:${accountId.length}:${accountId}:${key}`)
  }

  private messageStatusKey(status: MessageStatus): string {
    return this.key(`msg:status:${status}`)
  }

  private statusSetKey(status: DeliveryStatus): string {
    return this.key(`dlv:status:${status}`)
  }

  private key(suffix: string): string {
    return `${this.prefix}${suffix}`
  }
}
