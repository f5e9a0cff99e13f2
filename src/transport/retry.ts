import { classifyError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 500,
    maxDelay: 10000,
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export async function withRetry<T>(
    fn: () => Promise<T>,
    opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
    wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await fn()
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            const jitter = delay * 0.1 * Math.random()
            await wait(delay + jitter)
        }
    }
}
