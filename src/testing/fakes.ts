import type {
  OperatorAlert,
  OperatorAlerter,
  PlatformClient,
  PlatformSendRequest,
  PlatformSendResult,
  WebhookRequest,
  WebhookSender
} from '../core/interfaces.js'
import type { Account, AttemptOutcome, Clock, WebhookDelivery } from '../core/types.js'
import type { NewDelivery, StatusStore } from '../storage/StatusStore.js'

export const T0 = '2026-01-01T00:00:00.000Z'

export interface TestClock {
  clock: Clock
  now(): Date
  advance(ms: number): void
  set(iso: string): void
}

export function createTestClock(start = T0): TestClock {
  let current = Date.parse(start)
  return {
    clock: () => new Date(current),
    now: () => new Date(current),
    advance: (ms) => {
      current += ms
    },
    set: (iso) => {
      current = Date.parse(iso)
    }
  }
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'acc_1',
    channelId: 'page-1',
    webhookUrl: 'https://crm.example.test/webhooks/relay',
    webhookSecret: 'test-secret',
    platformAccessToken: 'test-token',
    status: 'active',
    ...overrides
  }
}

export const OK: AttemptOutcome = { ok: true, statusCode: 200 }
export const SERVER_ERROR: AttemptOutcome = { ok: false, kind: 'retryable', statusCode: 500, error: 'HTTP 500' }
export const UNAVAILABLE: AttemptOutcome = { ok: false, kind: 'retryable', statusCode: 503, error: 'HTTP 503' }
export const UNAUTHORIZED: AttemptOutcome = { ok: false, kind: 'auth', statusCode: 401, error: 'HTTP 401' }

/**
 * Webhook sender that records every request and answers from a script,
 * falling back to `fallback` once the script runs out.
 */
export class ScriptedWebhookSender implements WebhookSender {
  readonly requests: WebhookRequest[] = []
  private readonly script: AttemptOutcome[]

  constructor(
    script: AttemptOutcome[] = [],
    public fallback: AttemptOutcome = OK
  ) {
    this.script = [...script]
  }

  async post(request: WebhookRequest): Promise<AttemptOutcome> {
    this.requests.push(request)
    return this.script.shift() ?? this.fallback
  }
}

/**
 * Platform client answering from a script of results or errors to throw.
 * Once the script is used up it returns `pm_<call number>`.
 */
export class ScriptedPlatformClient implements PlatformClient {
  readonly calls: PlatformSendRequest[] = []
  private readonly script: Array<PlatformSendResult | Error>

  constructor(script: Array<PlatformSendResult | Error> = []) {
    this.script = [...script]
  }

  async send(request: PlatformSendRequest): Promise<PlatformSendResult> {
    this.calls.push(request)
    const next = this.script.shift()
    if (next instanceof Error) throw next
    return next ?? { platformMessageId: `pm_${this.calls.length}` }
  }
}

export class RecordingAlerter implements OperatorAlerter {
  readonly alerts: OperatorAlert[] = []

  async raise(alert: OperatorAlert): Promise<void> {
    this.alerts.push(alert)
  }
}

let deliveryCounter = 0

export function newDelivery(overrides: Partial<NewDelivery> = {}, at = T0): NewDelivery {
  deliveryCounter += 1
  return {
    id: `dlv_${deliveryCounter}`,
    accountId: 'acc_1',
    messageId: `msg_${deliveryCounter}`,
    eventType: 'message.received',
    payload: JSON.stringify({ event: 'message.received', message_id: `msg_${deliveryCounter}` }),
    targetUrl: 'https://crm.example.test/webhooks/relay',
    status: 'pending',
    retryCount: 0,
    lastAttemptAt: null,
    nextRetryAt: at,
    deliveredAt: null,
    createdAt: at,
    updatedAt: at,
    retryWindowStartedAt: at,
    lastResponseStatus: null,
    lastError: null,
    ...overrides
  }
}

export async function seedDelivery(store: StatusStore, overrides: Partial<NewDelivery> = {}, at = T0): Promise<WebhookDelivery> {
  return store.createDelivery(newDelivery(overrides, at))
}

export async function requireDelivery(store: StatusStore, id: string): Promise<WebhookDelivery> {
  const delivery = await store.getDelivery(id)
  if (!delivery) throw new Error(`delivery ${id} missing`)
  return delivery
}
