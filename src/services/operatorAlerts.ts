import type { OperatorAlert, OperatorAlerter } from '../core/interfaces.js'
import type { Logger } from '../utils/Logger.js'

type AlertLog = Pick<Logger, 'error' | 'warn'>

/**
 * Writes operator alerts to the dedicated alert log.
 */
export class LogAlerter implements OperatorAlerter {
  constructor(private readonly log: AlertLog) {}

  async raise(alert: OperatorAlert): Promise<void> {
    const meta = {
      code: alert.code,
      accountId: alert.accountId,
      deliveryId: alert.deliveryId,
      ...alert.context
    }
    if (alert.severity === 'critical') {
      this.log.error(alert.message, meta)
    } else {
      this.log.warn(alert.message, meta)
    }
  }
}
