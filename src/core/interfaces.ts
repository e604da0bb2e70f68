/**
 * Collaborator interfaces consumed by the dispatch and relay services
 */

import type { Account, AttemptOutcome } from './types.js'

export interface PlatformSendRequest {
  account: Account
  recipientId: string
  text: string
}

export interface PlatformSendResult {
  platformMessageId: string
}

/**
 * Messaging platform send API. Implementations throw `TransientError` for
 * failures worth retrying and `PermanentDeliveryError` for the rest.
 */
export interface PlatformClient {
  send(request: PlatformSendRequest): Promise<PlatformSendResult>
}

export interface AccountDirectory {
  get(accountId: string): Promise<Account | null>
  findByChannelId(channelId: string): Promise<Account | null>
}

export interface WebhookRequest {
  url: string
  body: string
  secret: string
  eventType: string
  deliveryId?: string
  timeoutMs?: number
}

/**
 * Performs one signed POST to a CRM webhook. Never throws; every failure is
 * reported through the outcome.
 */
export interface WebhookSender {
  post(request: WebhookRequest): Promise<AttemptOutcome>
}

export type AlertSeverity = 'warning' | 'critical'

export interface OperatorAlert {
  severity: AlertSeverity
  code: string
  message: string
  accountId?: string
  deliveryId?: string
  context?: Record<string, unknown>
}

export interface OperatorAlerter {
  raise(alert: OperatorAlert): Promise<void>
}
