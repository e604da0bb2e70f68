import type {
  DeliveryHistoryEntry,
  DeliveryStatus,
  DeliveryTransition,
  Message,
  MessageHistoryEntry,
  MessageStatus,
  MessageTransition,
  WebhookDelivery
} from '../core/types.js'
import { ConflictError, InvalidTransitionError } from '../utils/errors.js'

// Message status only moves forward. `sending -> sending` is one local retry step.
const MESSAGE_TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: ['sending', 'failed'],
  sending: ['sending', 'sent', 'failed'],
  sent: ['delivered', 'read'],
  delivered: ['read'],
  read: [],
  failed: [],
  received: []
}

// dlq/failed_auth -> pending is reserved for manual requeue. pending -> pending
// only reschedules a delivery that has not been attempted yet.
const DELIVERY_TRANSITIONS: Record<DeliveryStatus, readonly DeliveryStatus[]> = {
  pending: ['pending', 'delivering', 'retrying', 'failed_auth', 'dlq'],
  delivering: ['delivered', 'retrying', 'failed_auth', 'dlq'],
  retrying: ['delivering', 'dlq'],
  delivered: [],
  dlq: ['pending'],
  failed_auth: ['pending']
}

export const TERMINAL_DELIVERY_STATUSES: readonly DeliveryStatus[] = ['delivered', 'dlq', 'failed_auth']

export function canTransitionMessage(from: MessageStatus, to: MessageStatus): boolean {
  return MESSAGE_TRANSITIONS[from].includes(to)
}

export function canTransitionDelivery(from: DeliveryStatus, to: DeliveryStatus): boolean {
  return DELIVERY_TRANSITIONS[from].includes(to)
}

export function isDue(delivery: WebhookDelivery, now: Date): boolean {
  if (delivery.status !== 'pending' && delivery.status !== 'retrying') return false
  return delivery.nextRetryAt !== null && Date.parse(delivery.nextRetryAt) <= now.getTime()
}

export function applyMessageTransition(
  current: Message,
  transition: MessageTransition,
  now: Date
): { next: Message; entry: MessageHistoryEntry } {
  assertVersion('message', current, transition)
  if (!canTransitionMessage(current.status, transition.status)) {
    throw new InvalidTransitionError('message', current.status, transition.status)
  }
  const at = now.toISOString()
  const next: Message = {
    ...current,
    ...transition.patch,
    status: transition.status,
    updatedAt: at,
    version: current.version + 1
  }
  return { next, entry: historyEntry(next.status, at, next.retryCount, transition.reason) }
}

export function applyDeliveryTransition(
  current: WebhookDelivery,
  transition: DeliveryTransition,
  now: Date
): { next: WebhookDelivery; entry: DeliveryHistoryEntry } {
  assertVersion('delivery', current, transition)
  if (!canTransitionDelivery(current.status, transition.status)) {
    throw new InvalidTransitionError('delivery', current.status, transition.status)
  }
  const at = now.toISOString()
  const next: WebhookDelivery = {
    ...current,
    ...transition.patch,
    status: transition.status,
    updatedAt: at,
    version: current.version + 1
  }
  if (next.status !== 'pending' && next.status !== 'retrying') {
    next.nextRetryAt = null
  }
  return { next, entry: historyEntry(next.status, at, next.retryCount, transition.reason) }
}

function assertVersion(entity: string, current: { id: string; version: number }, transition: { expectedVersion?: number }): void {
  if (transition.expectedVersion !== undefined && transition.expectedVersion !== current.version) {
    throw new ConflictError(`${entity} ${current.id} is at version ${current.version}, expected ${transition.expectedVersion}`, {
      id: current.id,
      version: current.version,
      expectedVersion: transition.expectedVersion
    })
  }
}

export function historyEntry<S extends string>(status: S, at: string, retryCount: number, reason?: string) {
  const entry: { status: S; at: string; retryCount: number; reason?: string } = { status, at, retryCount }
  if (reason) entry.reason = reason
  return entry
}
