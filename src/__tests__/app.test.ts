import { describe, it, expect, beforeEach } from '@jest/globals'
import type { Express } from 'express'
import request from 'supertest'
import { createApp } from '../app.js'
import { StaticAccountDirectory } from '../services/accountDirectory.js'
import { IdempotencyLedger } from '../services/idempotencyLedger.js'
import { InboundRelay } from '../services/inboundRelay.js'
import { OutboundDispatcher } from '../services/outboundDispatcher.js'
import { RetryEngine } from '../services/retryEngine.js'
import { StatusEventBus } from '../services/statusEvents.js'
import { MemoryStatusStore } from '../storage/MemoryStatusStore.js'
import { signatureHeader } from '../utils/signature.js'
import {
  RecordingAlerter,
  ScriptedPlatformClient,
  ScriptedWebhookSender,
  createTestClock,
  makeAccount,
  seedDelivery
} from '../testing/fakes.js'

const API_KEY = 'test-api-key'
const APP_SECRET = 'test-secret'

function platformBody(messaging: unknown[]): string {
  return JSON.stringify({ object: 'instagram', entry: [{ id: 'page-1', time: 1767225600000, messaging }] })
}

describe('HTTP API', () => {
  let store: MemoryStatusStore
  let sender: ScriptedWebhookSender
  let app: Express

  beforeEach(() => {
    const time = createTestClock()
    store = new MemoryStatusStore(time.clock)
    const accounts = new StaticAccountDirectory([makeAccount()])
    sender = new ScriptedWebhookSender()
    const engine = new RetryEngine({ store, accounts, sender, alerter: new RecordingAlerter(), clock: time.clock })
    const dispatcher = new OutboundDispatcher({
      store,
      ledger: new IdempotencyLedger(store, time.clock),
      accounts,
      platform: new ScriptedPlatformClient(),
      events: new StatusEventBus(),
      sleep: async () => undefined,
      clock: time.clock
    })
    const relay = new InboundRelay({ store, accounts, sender, engine, clock: time.clock })
    app = createApp({
      store,
      accounts,
      dispatcher,
      relay,
      engine,
      apiTokens: [API_KEY],
      platform: { appSecret: APP_SECRET, verifyToken: 'test-verify-token' }
    })
  })

  describe('health', () => {
    it('reports the store backend without an API key', async () => {
      const response = await request(app).get('/health').expect(200)

      expect(response.body).toMatchObject({ status: 'ok', store: 'memory' })
    })

    it('reports delivery queue depth without an API key', async () => {
      await seedDelivery(store, { nextRetryAt: '2020-01-01T00:00:00.000Z' })
      await seedDelivery(store, { status: 'dlq', nextRetryAt: null })

      const response = await request(app).get('/health/deliveries').expect(200)

      expect(response.body).toMatchObject({
        store: 'memory',
        due: 1,
        dead_lettered: 1,
        failed_auth: 0,
        in_flight: 0,
        by_status: { pending: 1, delivering: 0, delivered: 0, retrying: 0, dlq: 1, failed_auth: 0 }
      })
    })
  })

  describe('messages', () => {
    const body = { account_id: 'acc_1', recipient_id: 'user-42', message: 'Your order shipped' }

    it('rejects requests without a valid API key', async () => {
      await request(app).post('/api/v1/messages').send(body).expect(401)
      const response = await request(app).post('/api/v1/messages').set('x-api-key', 'wrong-key').send(body).expect(401)

      expect(response.body).toMatchObject({ success: false, code: 'unauthorized' })
    })

    it('accepts a message and returns the same id for a repeated idempotency key', async () => {
      const first = await request(app)
        .post('/api/v1/messages')
        .set('x-api-key', API_KEY)
        .set('Idempotency-Key', 'order-1001')
        .send(body)
        .expect(202)
      const second = await request(app)
        .post('/api/v1/messages')
        .set('Authorization', `Bearer ${API_KEY}`)
        .set('Idempotency-Key', 'order-1001')
        .send(body)
        .expect(202)

      expect(first.body).toMatchObject({ success: true, status: 'sent', duplicate: false, idempotency_key: 'order-1001' })
      expect(second.body).toMatchObject({ message_id: first.body.message_id, duplicate: true })

      const fetched = await request(app).get(`/api/v1/messages/${first.body.message_id}`).set('x-api-key', API_KEY).expect(200)
      expect(fetched.body.message).toMatchObject({ status: 'sent', platform_message_id: 'pm_1', conversation_id: 'conv_acc_1_user-42' })

      const history = await request(app)
        .get(`/api/v1/messages/${first.body.message_id}/history`)
        .set('x-api-key', API_KEY)
        .expect(200)
      expect(history.body.history.map((entry: { status: string }) => entry.status)).toEqual(['pending', 'sending', 'sent'])
    })

    it('rejects a body missing required fields', async () => {
      const response = await request(app)
        .post('/api/v1/messages')
        .set('x-api-key', API_KEY)
        .send({ account_id: 'acc_1' })
        .expect(400)

      expect(response.body).toMatchObject({ success: false, code: 'validation_error' })
    })

    it('rejects text longer than 1000 characters', async () => {
      const response = await request(app)
        .post('/api/v1/messages')
        .set('x-api-key', API_KEY)
        .send({ ...body, message: 'x'.repeat(1001) })
        .expect(400)

      expect(response.body).toMatchObject({ success: false, code: 'invalid_request' })
    })

    it('answers 404 for an unknown account or message', async () => {
      await request(app).post('/api/v1/messages').set('x-api-key', API_KEY).send({ ...body, account_id: 'acc_x' }).expect(404)
      await request(app).get('/api/v1/messages/msg_missing').set('x-api-key', API_KEY).expect(404)
    })
  })

  describe('platform webhook', () => {
    const inbound = platformBody([
      { sender: { id: 'user-7' }, recipient: { id: 'page-1' }, timestamp: 1767225600000, message: { mid: 'mid.1', text: 'hi' } }
    ])

    it('answers the subscription challenge only for the right verify token', async () => {
      const ok = await request(app)
        .get('/webhooks/platform')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '12345' })
        .expect(200)
      expect(ok.text).toBe('12345')

      await request(app)
        .get('/webhooks/platform')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '12345' })
        .expect(403)
    })

    it('rejects a body with a bad signature', async () => {
      const response = await request(app)
        .post('/webhooks/platform')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', signatureHeader(inbound, 'other-secret'))
        .send(inbound)
        .expect(401)

      expect(response.body).toMatchObject({ success: false, code: 'invalid_signature' })
      expect(sender.requests).toHaveLength(0)
    })

    it('relays a signed inbound message to the CRM once', async () => {
      const post = () =>
        request(app)
          .post('/webhooks/platform')
          .set('Content-Type', 'application/json')
          .set('X-Hub-Signature-256', signatureHeader(inbound, APP_SECRET))
          .send(inbound)

      const first = await post().expect(200)
      const replay = await post().expect(200)

      expect(first.body).toEqual({ success: true, received: 1, relayed: 1, status_updates: 0 })
      expect(replay.body).toEqual({ success: true, received: 1, relayed: 0, status_updates: 0 })
      expect(sender.requests).toHaveLength(1)
      expect(sender.requests[0]?.url).toBe('https://crm.example.test/webhooks/relay')
    })

    it('applies delivery receipts to outbound messages', async () => {
      const sent = await request(app)
        .post('/api/v1/messages')
        .set('x-api-key', API_KEY)
        .send({ account_id: 'acc_1', recipient_id: 'user-7', message: 'hello' })
        .expect(202)
      const receipt = platformBody([
        { sender: { id: 'user-7' }, recipient: { id: 'page-1' }, timestamp: 1767225601000, delivery: { mids: ['pm_1'] } }
      ])

      const response = await request(app)
        .post('/webhooks/platform')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', signatureHeader(receipt, APP_SECRET))
        .send(receipt)
        .expect(200)

      expect(response.body).toEqual({ success: true, received: 1, relayed: 0, status_updates: 1 })
      expect((await store.getMessage(sent.body.message_id))?.status).toBe('delivered')
    })
  })

  describe('admin', () => {
    it('lists dead-lettered deliveries and requeues one', async () => {
      const dead = await seedDelivery(store, { status: 'dlq', nextRetryAt: null, retryCount: 9 })

      const list = await request(app).get('/api/v1/admin/dlq').query({ account_id: 'acc_1' }).set('x-api-key', API_KEY).expect(200)
      expect(list.body).toMatchObject({ success: true, count: 1 })
      expect(list.body.deliveries[0]).toMatchObject({ delivery_id: dead.id, status: 'dlq', retry_count: 9 })

      const requeued = await request(app)
        .post(`/api/v1/admin/deliveries/${dead.id}/requeue`)
        .set('x-api-key', API_KEY)
        .expect(200)
      expect(requeued.body.delivery).toMatchObject({ status: 'pending', retry_count: 0, last_error: null })

      const again = await request(app).get('/api/v1/admin/dlq').set('x-api-key', API_KEY).expect(200)
      expect(again.body.count).toBe(0)
    })

    it('refuses to requeue a delivery that is not dead-lettered', async () => {
      const pending = await seedDelivery(store)

      const response = await request(app)
        .post(`/api/v1/admin/deliveries/${pending.id}/requeue`)
        .set('x-api-key', API_KEY)
        .expect(400)

      expect(response.body).toMatchObject({ success: false, code: 'not_requeueable' })
    })
  })
})
