import pino from 'pino'
import type { WebhookRequest, WebhookSender } from '../core/interfaces.js'
import type { AttemptOutcome } from '../core/types.js'
import { SIGNATURE_HEADER, signatureHeader } from '../utils/signature.js'

const USER_AGENT = 'crm-message-relay/1.0'

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

/**
 * Signs and POSTs webhook bodies to CRM endpoints.
 * 2xx is success, 401/403 is an auth failure, everything else is retryable.
 */
export class HttpWebhookSender implements WebhookSender {
  private readonly logger = pino({ name: 'webhook-sender', level: process.env.LOG_LEVEL || 'info' })

  constructor(
    private readonly defaultTimeoutMs = 5000,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async post(request: WebhookRequest): Promise<AttemptOutcome> {
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs
    const startTime = Date.now()
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      [SIGNATURE_HEADER]: signatureHeader(request.body, request.secret),
      'X-Webhook-Event': request.eventType
    }
    if (request.deliveryId) {
      headers['X-Webhook-Delivery'] = request.deliveryId
    }

    try {
      const response = await this.fetchImpl(request.url, {
        method: 'POST',
        headers,
        body: request.body,
        signal: AbortSignal.timeout(timeoutMs)
      })
      const duration = Date.now() - startTime
      // Drain the body so the connection can be reused
      await response.arrayBuffer().catch(() => undefined)

      if (response.ok) {
        this.logger.debug({ url: request.url, status: response.status, duration }, 'Webhook delivered')
        return { ok: true, statusCode: response.status }
      }
      if (response.status === 401 || response.status === 403) {
        this.logger.warn({ url: request.url, status: response.status, duration }, 'Webhook rejected credentials')
        return { ok: false, kind: 'auth', statusCode: response.status, error: `HTTP ${response.status}` }
      }
      this.logger.warn({ url: request.url, status: response.status, duration }, 'Webhook returned non-2xx status')
      return { ok: false, kind: 'retryable', statusCode: response.status, error: `HTTP ${response.status}` }
    } catch (err) {
      const duration = Date.now() - startTime
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
      const error = timedOut ? `Timeout after ${timeoutMs}ms` : err instanceof Error ? err.message : 'Unknown error'
      this.logger.warn({ url: request.url, duration, error }, 'Webhook request failed')
      return { ok: false, kind: 'retryable', statusCode: null, error }
    }
  }
}
