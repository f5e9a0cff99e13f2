import { describe, expect, it, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

const at = new Date('2026-10-19T08:00:00Z')

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('presence:check-in', handler)
        emitter.emit('presence:check-in', { member: 'Alice', cardId: 'A1', at })

        expect(handler).toHaveBeenCalledWith({ member: 'Alice', cardId: 'A1', at })
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('shop:opened', h1)
        emitter.on('shop:opened', h2)
        emitter.emit('shop:opened', { member: 'Alice', at })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('shop:closed', handler)
        emitter.off('shop:closed', handler)
        emitter.emit('shop:closed', { member: 'Alice', at })

        expect(handler).not.toHaveBeenCalled()
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('presence:healed', handler)
        emitter.removeAll()
        emitter.emit('presence:healed', { member: 'Bob' })

        expect(handler).not.toHaveBeenCalled()
    })

    it('reports listener exceptions and keeps delivering', () => {
        const emitter = new TypedEventEmitter()
        const failures: unknown[] = []
        emitter.onListenerError = (event, error) => failures.push([event, error])
        const boom = new Error('boom')
        const goodHandler = vi.fn()

        emitter.on('session:removed', () => {
            throw boom
        })
        emitter.on('session:removed', goodHandler)
        emitter.emit('session:removed', { member: 'Bob', approver: '@alice' })

        expect(goodHandler).toHaveBeenCalledTimes(1)
        expect(failures).toEqual([['session:removed', boom]])
    })
})
