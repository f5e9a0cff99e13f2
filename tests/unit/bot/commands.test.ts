import { describe, expect, it } from 'vitest'
import { parseCommand, parseDirectCommand, parsePublicCommand } from '../../../src/bot/commands.js'

describe('parseDirectCommand', () => {
    it('recognizes check in and check out anywhere in the text', () => {
        expect(parseDirectCommand('Check In please')).toEqual({ kind: 'check-in' })
        expect(parseDirectCommand('ok, check out')).toEqual({ kind: 'check-out' })
    })

    it('parses the approval commands', () => {
        expect(parseDirectCommand('approve pending Erin')).toEqual({ kind: 'pending', target: 'Erin' })
        expect(parseDirectCommand('approve all Mary Jane')).toEqual({ kind: 'approve-all', target: 'Mary Jane' })
        expect(parseDirectCommand('approve Mary Jane 2')).toEqual({
            kind: 'decide',
            decision: 'approve',
            target: 'Mary Jane',
            index: 2,
        })
        expect(parseDirectCommand('Disapprove Erin 0')).toEqual({
            kind: 'decide',
            decision: 'disapprove',
            target: 'Erin',
            index: 0,
        })
    })

    it('falls back to usage for incomplete approval commands', () => {
        expect(parseDirectCommand('approve Erin')).toEqual({ kind: 'approval-usage' })
        expect(parseDirectCommand('approve Erin two')).toEqual({ kind: 'approval-usage' })
        expect(parseDirectCommand('disapprove all Erin')).toEqual({ kind: 'approval-usage' })
    })

    it('parses the admin and status commands', () => {
        expect(parseDirectCommand('Announcement Formal')).toEqual({ kind: 'announcement', mode: 'formal' })
        expect(parseDirectCommand('announcement casual')).toEqual({ kind: 'announcement', mode: 'casual' })
        expect(parseDirectCommand('is the shop open?')).toEqual({ kind: 'shop-status' })
        expect(parseDirectCommand("who's in")).toEqual({ kind: 'who-is-in' })
    })

    it('answers anything else with help', () => {
        expect(parseDirectCommand('hello')).toEqual({ kind: 'help' })
        expect(parseDirectCommand('')).toEqual({ kind: 'help' })
    })
})

describe('parsePublicCommand', () => {
    it('answers only shop questions', () => {
        expect(parsePublicCommand("Who's in the shop?")).toEqual({ kind: 'who-is-in' })
        expect(parsePublicCommand('is shop open')).toEqual({ kind: 'shop-status' })
        expect(parsePublicCommand('check in')).toBeNull()
        expect(parsePublicCommand('who is in')).toBeNull()
    })

    it('is chosen by channel kind', () => {
        expect(parseCommand('check in', 'public')).toBeNull()
        expect(parseCommand('check in', 'direct')).toEqual({ kind: 'check-in' })
    })
})
