import { v4 as uuidv4 } from 'uuid'
import type { Clock, Message } from '../core/types.js'
import type { ReserveResult, StatusStore } from '../storage/StatusStore.js'
import { ValidationError } from '../utils/errors.js'

export const MAX_IDEMPOTENCY_KEY_LENGTH = 255

export interface OutboundDraft {
  recipientId: string
  text: string
  messageType?: string
  conversationId?: string
}

/**
 * Guarantees at most one outbound send per (account, idempotency key).
 */
export class IdempotencyLedger {
  constructor(
    private readonly store: StatusStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Inserts a `pending` outbound message, or returns the one already stored
   * under the same key with `isNew: false`. Collisions are not errors.
   */
  async reserve(accountId: string, idempotencyKey: string, draft: OutboundDraft): Promise<ReserveResult> {
    if (!accountId.trim()) {
      throw new ValidationError('accountId is required', 'invalid_account_id')
    }
    const key = idempotencyKey.trim()
    if (!key) {
      throw new ValidationError('Idempotency key is required', 'invalid_idempotency_key')
    }
    if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new ValidationError(
        `Idempotency key exceeds ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
        'invalid_idempotency_key'
      )
    }

    const now = this.clock().toISOString()
    const message: Message = {
      id: uuidv4(),
      accountId,
      idempotencyKey: key,
      direction: 'outbound',
      senderId: accountId,
      recipientId: draft.recipientId,
      text: draft.text,
      messageType: draft.messageType ?? 'text',
      conversationId: draft.conversationId ?? `conv_${accountId}_${draft.recipientId}`,
      platformMessageId: null,
      status: 'pending',
      retryCount: 0,
      error: null,
      createdAt: now,
      updatedAt: now,
      sentAt: null,
      deliveredAt: null,
      readAt: null,
      version: 1
    }
    return this.store.reserveOutbound(message)
  }
}
