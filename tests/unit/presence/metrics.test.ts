import { describe, expect, it } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { AttendanceMetrics } from '../../../src/presence/metrics.js'

const at = new Date('2026-10-19T08:00:00Z')

describe('AttendanceMetrics', () => {
    it('starts empty', () => {
        const metrics = new AttendanceMetrics(new TypedEventEmitter())
        expect(metrics.getCounters()).toEqual({ opened: 0, closed: 0, healed: 0, approved: 0, removed: 0, quarantined: 0 })
        expect(metrics.formatStatus([])).toBe(
            ['Present: nobody', 'Shop opened 0x, closed 0x', 'Sessions approved: 0, removed: 0'].join('\n')
        )
    })

    it('counts presence and approval events', () => {
        const eventBus = new TypedEventEmitter()
        const metrics = new AttendanceMetrics(eventBus)

        eventBus.emit('shop:opened', { member: 'Bob', at })
        eventBus.emit('presence:check-in', { member: 'Bob', cardId: 'B2', at })
        eventBus.emit('presence:check-out', { member: 'Bob', cardId: 'B2', at, durationHours: 1.1 })
        eventBus.emit('presence:check-in', { member: 'Bob', cardId: 'B2', at })
        eventBus.emit('presence:check-out', { member: 'Bob', cardId: 'B2', at, durationHours: 2.2 })
        eventBus.emit('shop:closed', { member: 'Bob', at })
        eventBus.emit('session:approved', { member: 'Bob', count: 2, approver: '@alice' })
        eventBus.emit('session:removed', { member: 'Bob', approver: '@alice' })
        eventBus.emit('presence:healed', { member: 'Carol' })
        eventBus.emit('ledger:quarantined', { path: '/shop/attendance.quarantine.csv', rows: 3 })

        expect(metrics.getMemberMetrics().get('Bob')).toEqual({ checkIns: 2, checkOuts: 2, hours: 3.3 })
        expect(metrics.formatStatus(['Alice'])).toBe(
            [
                'Present: Alice',
                'Shop opened 1x, closed 1x',
                'Sessions approved: 2, removed: 1',
                'Presence repairs: 1',
                'Quarantined ledger rows: 3',
                'Members:',
                '  Bob: 2 in, 2 out, 3.3h',
            ].join('\n')
        )
    })

    it('stops counting after dispose', () => {
        const eventBus = new TypedEventEmitter()
        const metrics = new AttendanceMetrics(eventBus)
        metrics.dispose()

        eventBus.emit('shop:opened', { member: 'Bob', at })
        expect(metrics.getCounters().opened).toBe(0)
    })
})
