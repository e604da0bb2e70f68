import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { MemoryStatusStore } from '../../storage/MemoryStatusStore.js'
import { StaticAccountDirectory } from '../accountDirectory.js'
import { IdempotencyLedger } from '../idempotencyLedger.js'
import { OutboundDispatcher } from '../outboundDispatcher.js'
import { RetryEngine } from '../retryEngine.js'
import { StatusEventBus, StatusWebhookPublisher, buildStatusPayload } from '../statusEvents.js'
import { PermanentDeliveryError } from '../../utils/errors.js'
import {
  RecordingAlerter,
  ScriptedPlatformClient,
  ScriptedWebhookSender,
  T0,
  createTestClock,
  makeAccount,
  type TestClock
} from '../../testing/fakes.js'

describe('StatusWebhookPublisher', () => {
  let time: TestClock
  let store: MemoryStatusStore
  let accounts: StaticAccountDirectory
  let sender: ScriptedWebhookSender
  let engine: RetryEngine
  let bus: StatusEventBus
  let publisher: StatusWebhookPublisher

  function dispatcherWith(platform: ScriptedPlatformClient) {
    return new OutboundDispatcher({
      store,
      ledger: new IdempotencyLedger(store, time.clock),
      accounts,
      platform,
      events: bus,
      sleep: async () => undefined,
      clock: time.clock
    })
  }

  beforeEach(() => {
    time = createTestClock()
    store = new MemoryStatusStore(time.clock)
    accounts = new StaticAccountDirectory([makeAccount()])
    sender = new ScriptedWebhookSender()
    engine = new RetryEngine({ store, accounts, sender, alerter: new RecordingAlerter(), clock: time.clock })
    bus = new StatusEventBus()
    publisher = new StatusWebhookPublisher({ bus, store, accounts, engine, clock: time.clock })
  })

  afterEach(() => {
    publisher.close()
  })

  it('queues a message.sent delivery that the engine then relays', async () => {
    const dispatcher = dispatcherWith(new ScriptedPlatformClient([{ platformMessageId: 'pm_1' }]))
    const { messageId } = await dispatcher.send({
      accountId: 'acc_1',
      recipientId: 'user-42',
      text: 'Your order shipped',
      idempotencyKey: 'ship-1'
    })
    await publisher.drain()

    const pending = await store.listDeliveries({ status: 'pending' })
    expect(pending).toHaveLength(1)
    expect(pending[0]).toMatchObject({ eventType: 'message.sent', messageId, nextRetryAt: T0, retryWindowStartedAt: T0 })
    expect(JSON.parse(pending[0]?.payload ?? '{}')).toEqual({
      event: 'message.sent',
      message_id: messageId,
      account_id: 'acc_1',
      recipient_id: 'user-42',
      status: 'sent',
      timestamp: T0,
      platform_message_id: 'pm_1',
      error: null
    })

    await engine.tick()

    expect(sender.requests.map((request) => request.eventType)).toEqual(['message.sent'])
    expect(await store.listDeliveries({ status: 'delivered' })).toHaveLength(1)
  })

  it('includes the error in message.failed payloads', async () => {
    const dispatcher = dispatcherWith(new ScriptedPlatformClient([new PermanentDeliveryError('Invalid OAuth access token', 'invalid_token')]))
    await dispatcher.send({ accountId: 'acc_1', recipientId: 'user-42', text: 'hi', idempotencyKey: 'k-1' })
    await publisher.drain()

    const [delivery] = await store.listDeliveries({ status: 'pending' })
    expect(delivery?.eventType).toBe('message.failed')
    expect(JSON.parse(delivery?.payload ?? '{}')).toMatchObject({
      status: 'failed',
      platform_message_id: null,
      error: { code: 'invalid_token', message: 'Invalid OAuth access token', retryable: false }
    })
  })

  it('keeps the order of status events per account', async () => {
    const dispatcher = dispatcherWith(new ScriptedPlatformClient([{ platformMessageId: 'pm_1' }]))
    await dispatcher.send({ accountId: 'acc_1', recipientId: 'user-42', text: 'hi', idempotencyKey: 'k-1' })
    await dispatcher.applyPlatformStatus('acc_1', { kind: 'delivery', platformMessageIds: ['pm_1'], at: '2026-01-01T00:00:01.000Z' })
    await dispatcher.applyPlatformStatus('acc_1', { kind: 'read', platformMessageIds: ['pm_1'], at: '2026-01-01T00:00:02.000Z' })
    await publisher.drain()

    const queued = await store.listDeliveries({ status: 'pending' })
    expect(queued.map((delivery) => delivery.eventType)).toEqual(['message.sent', 'message.delivered', 'message.read'])
  })

  it('does not relay status for inactive accounts', async () => {
    const dispatcher = dispatcherWith(new ScriptedPlatformClient([{ platformMessageId: 'pm_1' }]))
    await dispatcher.send({ accountId: 'acc_1', recipientId: 'user-42', text: 'hi', idempotencyKey: 'k-1' })
    await publisher.drain()
    accounts.replace([makeAccount({ status: 'inactive' })])
    await dispatcher.applyPlatformStatus('acc_1', { kind: 'delivery', platformMessageIds: ['pm_1'], at: T0 })
    await publisher.drain()

    const queued = await store.listDeliveries({ status: 'pending' })
    expect(queued.map((delivery) => delivery.eventType)).toEqual(['message.sent'])
  })
})

describe('buildStatusPayload', () => {
  it('uses the status as the event suffix', () => {
    const payload = buildStatusPayload(
      {
        id: 'msg_1',
        accountId: 'acc_1',
        idempotencyKey: 'k',
        direction: 'outbound',
        senderId: 'acc_1',
        recipientId: 'user-1',
        text: 'hi',
        messageType: 'text',
        conversationId: 'conv_acc_1_user-1',
        platformMessageId: 'pm_9',
        status: 'delivered',
        retryCount: 0,
        error: null,
        createdAt: T0,
        updatedAt: T0,
        sentAt: T0,
        deliveredAt: T0,
        readAt: null,
        version: 4
      },
      'delivered',
      '2026-01-01T00:00:03.000Z'
    )

    expect(payload).toEqual({
      event: 'message.delivered',
      message_id: 'msg_1',
      account_id: 'acc_1',
      recipient_id: 'user-1',
      status: 'delivered',
      timestamp: '2026-01-01T00:00:03.000Z',
      platform_message_id: 'pm_9',
      error: null
    })
  })
})
