import { describe, expect, it, vi } from 'vitest'
import { PermanentError, ShopError } from '../../../src/core/errors.js'
import { withRetry } from '../../../src/transport/retry.js'
import { noWait } from '../../helpers/fixtures.js'

const opts = { maxRetries: 3, baseDelay: 10, maxDelay: 25 }

describe('withRetry', () => {
    it('returns on first success', async () => {
        const fn = vi.fn(() => Promise.resolve('ok'))
        expect(await withRetry(fn, opts, noWait)).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on transient error', async () => {
        const fn = vi.fn().mockRejectedValueOnce(new ShopError('timeout', 'transient')).mockResolvedValueOnce('recovered')

        expect(await withRetry(fn, opts, noWait)).toBe('recovered')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('throws immediately on permanent error', async () => {
        const fn = vi.fn(() => Promise.reject(new PermanentError('bad target')))
        await expect(withRetry(fn, opts, noWait)).rejects.toThrow('bad target')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('throws after max retries with capped exponential delays', async () => {
        const delays: number[] = []
        const wait = async (ms: number) => {
            delays.push(ms)
        }
        const fn = vi.fn(() => Promise.reject(new ShopError('timeout', 'transient')))

        await expect(withRetry(fn, opts, wait)).rejects.toThrow('timeout')
        expect(fn).toHaveBeenCalledTimes(4)
        expect(delays).toHaveLength(3)
        expect(delays[0]).toBeGreaterThanOrEqual(10)
        expect(delays[0]).toBeLessThan(11)
        expect(delays[1]).toBeGreaterThanOrEqual(20)
        expect(delays[1]).toBeLessThan(22)
        expect(delays[2]).toBeGreaterThanOrEqual(25)
        expect(delays[2]).toBeLessThan(27.5)
    })
})
