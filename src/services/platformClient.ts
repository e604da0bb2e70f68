import pino from 'pino'
import { z } from 'zod'
import type { PlatformClient, PlatformSendRequest, PlatformSendResult } from '../core/interfaces.js'
import { PermanentDeliveryError, TransientError } from '../utils/errors.js'
import type { FetchLike } from './webhookSender.js'

// Graph API error codes that mean "slow down" rather than "never"
const RATE_LIMIT_CODES = new Set([4, 17, 32, 613])
const INVALID_TOKEN_CODE = 190
const USER_UNAVAILABLE_CODE = 551
const NO_MATCHING_USER_SUBCODE = 2018001

const errorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      code: z.number().optional(),
      error_subcode: z.number().optional()
    })
    .optional()
})

const successBodySchema = z.object({
  message_id: z.string().min(1),
  recipient_id: z.string().optional()
})

export interface GraphPlatformClientOptions {
  baseUrl: string
  timeoutMs?: number
  fetchImpl?: FetchLike
}

/**
 * Sends text messages through the platform's Graph-style `/me/messages`
 * endpoint and sorts failures into transient and permanent ones.
 */
export class GraphPlatformClient implements PlatformClient {
  private readonly logger = pino({ name: 'platform-client', level: process.env.LOG_LEVEL || 'info' })
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(options: GraphPlatformClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 5000
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async send({ account, recipientId, text }: PlatformSendRequest): Promise<PlatformSendResult> {
    if (!account.platformAccessToken) {
      throw new PermanentDeliveryError('Platform access token not configured for this account', 'missing_token')
    }

    const url = `${this.baseUrl}/me/messages?access_token=${encodeURIComponent(account.platformAccessToken)}`
    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ recipient: { id: recipientId }, message: { text } }),
        signal: AbortSignal.timeout(this.timeoutMs)
      })
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new TransientError(`Platform request timed out after ${this.timeoutMs}ms`, 'timeout')
      }
      throw new TransientError(`Platform request failed: ${err instanceof Error ? err.message : 'Unknown error'}`, 'network_error')
    }

    const body: unknown = await response.json().catch(() => ({}))

    if (response.ok) {
      const parsed = successBodySchema.safeParse(body)
      if (!parsed.success) {
        throw new PermanentDeliveryError('Invalid platform response: missing message_id', 'invalid_response')
      }
      this.logger.info({ accountId: account.id, platformMessageId: parsed.data.message_id }, 'Message accepted by platform')
      return { platformMessageId: parsed.data.message_id }
    }

    const details = errorBodySchema.safeParse(body)
    const platformError = details.success ? details.data.error : undefined
    const code = platformError?.code
    const message = platformError?.message ?? `HTTP ${response.status}`

    this.logger.warn(
      { accountId: account.id, status: response.status, code, subcode: platformError?.error_subcode },
      'Platform rejected message'
    )

    if (response.status === 429 || (code !== undefined && RATE_LIMIT_CODES.has(code))) {
      throw new TransientError(message, 'rate_limited', { status: response.status, code })
    }
    if (response.status >= 500) {
      throw new TransientError(message, 'platform_unavailable', { status: response.status, code })
    }
    if (code === INVALID_TOKEN_CODE) {
      throw new PermanentDeliveryError(message, 'invalid_token', { status: response.status, code })
    }
    if (code === USER_UNAVAILABLE_CODE) {
      throw new PermanentDeliveryError(message, 'recipient_unavailable', { status: response.status, code })
    }
    if (platformError?.error_subcode === NO_MATCHING_USER_SUBCODE) {
      throw new PermanentDeliveryError(message, 'invalid_recipient', { status: response.status, code })
    }
    throw new PermanentDeliveryError(message, 'platform_rejected', { status: response.status, code })
  }
}
