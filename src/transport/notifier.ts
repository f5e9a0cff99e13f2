import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { type RetryOptions, sleep, withRetry } from './retry.js'
import type { ChatTransport, OperatorAlerts } from './types.js'

/**
 * Delivers bot output with retries. Runs outside the command queue, so a slow
 * transport never holds up ledger writes. Delivery failures are logged and
 * reported as `false`; they never fail the command that caused them.
 */
export class Notifier {
    constructor(
        private transport: ChatTransport,
        private alerts: OperatorAlerts,
        private logger: Logger,
        private retry: RetryOptions,
        private wait: (ms: number) => Promise<void> = sleep
    ) {}

    async post(target: string, text: string): Promise<boolean> {
        try {
            await withRetry(() => this.transport.post(target, text), this.retry, this.wait)
            return true
        } catch (error) {
            this.logger.error({ target, error: errorMessage(error) }, 'notify:post-failed')
            return false
        }
    }

    async alert(adminHandle: string, text: string): Promise<boolean> {
        if (!adminHandle) {
            this.logger.warn({ text }, 'notify:no-admin-configured')
            return false
        }
        try {
            await withRetry(() => this.alerts.notify(adminHandle, text), this.retry, this.wait)
            return true
        } catch (error) {
            this.logger.error({ adminHandle, error: errorMessage(error) }, 'notify:alert-failed')
            return false
        }
    }
}
