import { describe, expect, it } from 'vitest'
import { findLastOpenByCard, findLastOpenByName, pendingFor } from '../../../src/ledger/queries.js'
import { session } from '../../helpers/fixtures.js'

const t = (hour: number) => new Date(Date.UTC(2026, 9, 19, hour))

const ledger = [
    session({ cardId: 'b2', memberName: 'Bob', checkIn: t(6), checkOut: t(7), durationHours: 1 }),
    session({ cardId: 'A1', memberName: 'Alice', checkIn: t(7), checkOut: t(8), durationHours: 1, approval: 'approved' }),
    session({ cardId: 'B2', memberName: 'Bob', checkIn: t(8) }),
    session({ cardId: 'OLD', memberName: ' bob ', checkIn: t(9) }),
    session({ cardId: 'A1', memberName: 'Alice', checkIn: t(9), checkOut: t(10), durationHours: 1 }),
]

describe('ledger queries', () => {
    it('finds the latest open session by normalized card', () => {
        expect(findLastOpenByCard(ledger, ' b2 ')).toBe(2)
        expect(findLastOpenByCard(ledger, 'A1')).toBe(-1)
        expect(findLastOpenByCard(ledger, '')).toBe(-1)
    })

    it('finds the latest open session by name, ignoring case and padding', () => {
        expect(findLastOpenByName(ledger, 'BOB')).toBe(3)
        expect(findLastOpenByName(ledger, 'Alice')).toBe(-1)
    })

    it('numbers pending sessions from 1 in ledger order', () => {
        expect(pendingFor(ledger, 'bob').map(({ index, position }) => ({ index, position }))).toEqual([
            { index: 1, position: 0 },
            { index: 2, position: 2 },
            { index: 3, position: 3 },
        ])
        expect(pendingFor(ledger, 'Alice').map((entry) => entry.position)).toEqual([4])
        expect(pendingFor(ledger, 'Nobody')).toEqual([])
    })
})
