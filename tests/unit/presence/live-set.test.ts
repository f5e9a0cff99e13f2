import { describe, expect, it } from 'vitest'
import { LivePresenceSet } from '../../../src/presence/live-set.js'

describe('LivePresenceSet', () => {
    it('keys members by normalized name and keeps the display name', () => {
        const presence = new LivePresenceSet(['  Bob '])
        presence.add('alice')
        presence.add('ALICE')

        expect(presence.has('bob')).toBe(true)
        expect(presence.size).toBe(2)
        expect(presence.names()).toEqual(['ALICE', 'Bob'])
    })

    it('remove reports whether the member was present', () => {
        const presence = new LivePresenceSet(['Bob'])
        expect(presence.remove('BOB')).toBe(true)
        expect(presence.remove('Bob')).toBe(false)
        expect(presence.isEmpty()).toBe(true)
    })
})
