import pino from 'pino'
import { z } from 'zod'
import type { AccountDirectory, PlatformClient } from '../core/interfaces.js'
import type { Account, Clock, Message, MessageError, MessageStatus } from '../core/types.js'
import type { PlatformStatusEvent } from '../dto/webhooks.js'
import type { StatusStore } from '../storage/StatusStore.js'
import { canTransitionMessage } from '../storage/transitions.js'
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  PermanentDeliveryError,
  TransientError,
  ValidationError,
  errorMessage
} from '../utils/errors.js'
import type { IdempotencyLedger } from './idempotencyLedger.js'
import { isRelayedStatus, type StatusEventBus } from './statusEvents.js'

export const MAX_TEXT_LENGTH = 1000

export const sendRequestSchema = z.object({
  accountId: z.string().trim().min(1, 'accountId is required'),
  recipientId: z.string().trim().min(1, 'recipientId is required'),
  text: z
    .string()
    .refine((text) => text.trim().length > 0, 'text is required')
    .refine((text) => text.length <= MAX_TEXT_LENGTH, `text exceeds ${MAX_TEXT_LENGTH} characters`),
  idempotencyKey: z.string(),
  messageType: z.string().min(1).optional()
})

export type SendRequest = z.infer<typeof sendRequestSchema>

export interface SendResult {
  messageId: string
  status: MessageStatus
  duplicate: boolean
}

export type Sleep = (ms: number) => Promise<void>

export interface OutboundDispatcherOptions {
  store: StatusStore
  ledger: IdempotencyLedger
  accounts: AccountDirectory
  platform: PlatformClient
  events: StatusEventBus
  // Retries after the first attempt
  maxLocalRetries?: number
  // Delay before local retry n (1-based); the last value repeats
  backoffMs?: number[]
  sleep?: Sleep
  clock?: Clock
  // Age after which a pending or sending row counts as abandoned
  staleAfterMs?: number
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Sends CRM messages through the platform API and tracks their status.
 *
 * The first platform call happens inside `send()`. Transient failures are
 * retried in the background with a short local backoff; the caller gets the
 * provisional `sending` status and observes the outcome through the store or
 * the status webhooks.
 */
export class OutboundDispatcher {
  private readonly logger = pino({ name: 'outbound-dispatcher', level: process.env.LOG_LEVEL || 'info' })
  private readonly store: StatusStore
  private readonly ledger: IdempotencyLedger
  private readonly accounts: AccountDirectory
  private readonly platform: PlatformClient
  private readonly events: StatusEventBus
  private readonly maxLocalRetries: number
  private readonly backoffMs: number[]
  private readonly sleep: Sleep
  private readonly clock: Clock
  private readonly staleAfterMs: number
  private readonly inFlight = new Set<Promise<void>>()

  constructor(options: OutboundDispatcherOptions) {
    this.store = options.store
    this.ledger = options.ledger
    this.accounts = options.accounts
    this.platform = options.platform
    this.events = options.events
    this.maxLocalRetries = options.maxLocalRetries ?? 3
    this.backoffMs = options.backoffMs && options.backoffMs.length > 0 ? options.backoffMs : [1000, 2000, 4000]
    this.sleep = options.sleep ?? defaultSleep
    this.clock = options.clock ?? (() => new Date())
    this.staleAfterMs = options.staleAfterMs ?? 60_000
  }

  async send(input: SendRequest): Promise<SendResult> {
    const parsed = sendRequestSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new ValidationError(issue?.message ?? 'Invalid send request', 'invalid_request', {
        field: issue?.path.join('.')
      })
    }
    const request = parsed.data

    const account = await this.accounts.get(request.accountId)
    if (!account) {
      throw new NotFoundError(`Account ${request.accountId} not found`, 'account_not_found')
    }
    if (account.status !== 'active') {
      throw new ValidationError(`Account ${request.accountId} is inactive`, 'account_inactive')
    }

    const { message, isNew } = await this.ledger.reserve(account.id, request.idempotencyKey, {
      recipientId: request.recipientId,
      text: request.text,
      messageType: request.messageType
    })
    if (message.status !== 'pending') {
      this.logger.info({ messageId: message.id, accountId: account.id, status: message.status }, 'Duplicate send resolved to existing message')
      return { messageId: message.id, status: message.status, duplicate: true }
    }

    // A duplicate can find the row still pending when the first caller
    // failed before claiming it; whoever claims it sends it.
    const sending = await this.claim(message)
    if (!sending) {
      const current = await this.store.getMessage(message.id)
      return { messageId: message.id, status: current?.status ?? message.status, duplicate: !isNew }
    }
    if (!isNew) {
      this.logger.warn({ messageId: message.id, accountId: account.id }, 'Resuming a message that was reserved but never sent')
    }
    const result = await this.attempt(sending, account)
    return { messageId: result.id, status: result.status, duplicate: !isNew }
  }

  /**
   * Fails outbound messages stuck in `pending` or `sending` for longer than
   * `staleAfterMs`, which happens when a process dies mid-send. They are
   * marked retryable: the platform may or may not have the message, and a
   * resend needs a new idempotency key.
   */
  async recoverStale(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - this.staleAfterMs)
    let recovered = 0
    for (const status of ['pending', 'sending'] as const) {
      const stale = await this.store.listMessages({ status, direction: 'outbound', updatedBefore: cutoff })
      for (const message of stale) {
        let failed: Message
        try {
          failed = await this.store.updateMessage(message.id, {
            status: 'failed',
            patch: {
              error: {
                kind: 'transient',
                code: 'send_interrupted',
                message: `Send interrupted while ${status}`,
                retryable: true
              }
            },
            reason: 'send_interrupted',
            expectedVersion: message.version
          })
        } catch (err) {
          if (err instanceof ConflictError || err instanceof InvalidTransitionError) continue
          throw err
        }
        recovered++
        this.emit(failed, failed.updatedAt)
      }
    }
    if (recovered > 0) {
      this.logger.warn({ count: recovered, staleAfterMs: this.staleAfterMs }, 'Failed outbound messages abandoned mid-send')
    }
    return recovered
  }

  /**
   * Applies platform delivery/read callbacks to outbound messages. Callbacks
   * that would move a message backwards are ignored.
   */
  async applyPlatformStatus(accountId: string, event: PlatformStatusEvent): Promise<Message[]> {
    const target: MessageStatus = event.kind === 'delivery' ? 'delivered' : 'read'
    const updated: Message[] = []

    for (const platformMessageId of event.platformMessageIds) {
      const message = await this.store.findMessageByPlatformId(platformMessageId)
      if (!message || message.direction !== 'outbound' || message.accountId !== accountId) {
        this.logger.debug({ platformMessageId, accountId, kind: event.kind }, 'Status callback for unknown message')
        continue
      }
      if (!canTransitionMessage(message.status, target)) {
        this.logger.debug({ messageId: message.id, from: message.status, to: target }, 'Stale status callback ignored')
        continue
      }

      const patch =
        target === 'delivered'
          ? { deliveredAt: event.at }
          : { readAt: event.at, deliveredAt: message.deliveredAt ?? event.at }
      try {
        const next = await this.store.updateMessage(message.id, { status: target, patch })
        updated.push(next)
        this.emit(next, event.at)
      } catch (err) {
        if (err instanceof InvalidTransitionError || err instanceof ConflictError) {
          this.logger.debug({ messageId: message.id, to: target }, 'Status callback lost a race, ignored')
          continue
        }
        throw err
      }
    }
    return updated
  }

  /**
   * Waits for background retries, including ones scheduled while waiting.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  get pendingRetries(): number {
    return this.inFlight.size
  }

  private async claim(message: Message): Promise<Message | null> {
    try {
      return await this.store.updateMessage(message.id, { status: 'sending', expectedVersion: message.version })
    } catch (err) {
      if (err instanceof ConflictError || err instanceof InvalidTransitionError) return null
      throw err
    }
  }

  private async attempt(message: Message, account: Account): Promise<Message> {
    let platformMessageId: string
    try {
      const result = await this.platform.send({ account, recipientId: message.recipientId, text: message.text })
      platformMessageId = result.platformMessageId
    } catch (err) {
      return this.handleFailure(message, account, toMessageError(err))
    }

    const at = this.clock().toISOString()
    const sent = await this.store.updateMessage(message.id, {
      status: 'sent',
      patch: { platformMessageId, sentAt: at, error: null }
    })
    this.logger.info({ messageId: sent.id, accountId: sent.accountId, platformMessageId, retryCount: sent.retryCount }, 'Message sent')
    this.emit(sent, at)
    return sent
  }

  private async handleFailure(message: Message, account: Account, error: MessageError): Promise<Message> {
    const retryCount = message.retryCount + 1

    if (error.kind === 'transient' && retryCount <= this.maxLocalRetries) {
      const retrying = await this.store.updateMessage(message.id, {
        status: 'sending',
        patch: { retryCount, error },
        reason: error.code
      })
      const delayMs = this.backoffMs[Math.min(retryCount, this.backoffMs.length) - 1] ?? 0
      this.logger.warn(
        { messageId: message.id, accountId: message.accountId, retryCount, delayMs, code: error.code },
        'Platform send failed, retrying'
      )
      this.scheduleRetry(message.id, account, delayMs)
      return retrying
    }

    const failed = await this.store.updateMessage(message.id, {
      status: 'failed',
      patch: error.kind === 'transient' ? { retryCount, error } : { error },
      reason: error.kind === 'transient' ? 'retries_exhausted' : error.code
    })
    this.logger.error(
      { messageId: message.id, accountId: message.accountId, retryCount: failed.retryCount, code: error.code, retryable: error.retryable },
      'Message failed'
    )
    this.emit(failed, failed.updatedAt)
    return failed
  }

  private scheduleRetry(messageId: string, account: Account, delayMs: number): void {
    const job = (async () => {
      await this.sleep(delayMs)
      const current = await this.store.getMessage(messageId)
      if (!current || current.status !== 'sending') return
      // Deactivation does not stop a message already being sent; a token
      // refresh in the directory is picked up though.
      const latest = (await this.accounts.get(account.id)) ?? account
      await this.attempt(current, latest)
    })().catch((err) => {
      this.logger.error({ err, messageId, accountId: account.id }, 'Background send retry failed')
    })
    this.inFlight.add(job)
    void job.finally(() => this.inFlight.delete(job))
  }

  private emit(message: Message, at: string): void {
    if (!isRelayedStatus(message.status)) return
    this.events.publish({ message, status: message.status, at })
  }
}

export function toMessageError(err: unknown): MessageError {
  if (err instanceof PermanentDeliveryError) {
    return { kind: 'permanent', code: err.errorCode, message: err.message, retryable: false }
  }
  if (err instanceof TransientError) {
    return { kind: 'transient', code: err.errorCode, message: err.message, retryable: true }
  }
  return { kind: 'transient', code: 'unexpected_error', message: errorMessage(err), retryable: true }
}
