import { describe, expect, it } from 'vitest'
import { SerialQueue } from '../../../src/core/serial-queue.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => {}
    const promise = new Promise<void>((r) => {
        resolve = () => r()
    })
    return { promise, resolve }
}

describe('SerialQueue', () => {
    it('runs tasks one at a time in submission order', async () => {
        const queue = new SerialQueue()
        const order: string[] = []
        const gate = deferred()

        const first = queue.run(async () => {
            order.push('first:start')
            await gate.promise
            order.push('first:end')
            return 1
        })
        const second = queue.run(async () => {
            order.push('second')
            return 2
        })

        expect(queue.size).toBe(2)
        gate.resolve()
        expect(await Promise.all([first, second])).toEqual([1, 2])
        expect(order).toEqual(['first:start', 'first:end', 'second'])
    })

    it('keeps going after a task rejects', async () => {
        const queue = new SerialQueue()
        const failing = queue.run(async () => {
            throw new Error('boom')
        })
        const next = queue.run(async () => 'ok')

        await expect(failing).rejects.toThrow('boom')
        expect(await next).toBe('ok')
    })

    it('drain waits for queued work', async () => {
        const queue = new SerialQueue()
        let done = false
        void queue.run(async () => {
            await new Promise((resolve) => setTimeout(resolve, 5))
            done = true
        })

        await queue.drain()
        expect(done).toBe(true)
        expect(queue.size).toBe(0)
    })
})
