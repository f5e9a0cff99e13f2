import { describe, expect, it } from 'vitest'
import { runDoctorChecks } from '../../../src/cli/commands/doctor.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { HEADER, LEDGER, MEMBERS, testConfig } from '../../helpers/fixtures.js'

const now = new Date('2026-10-19T20:00:00Z')

describe('runDoctorChecks', () => {
    it('flags missing files', async () => {
        const checks = await runDoctorChecks(testConfig({ adminHandle: '' }), new MockFileSystem(), now)
        const byName = new Map(checks.map((c) => [c.name, c.status]))

        expect(byName.get('Ledger')).toBe('warn')
        expect(byName.get('Members')).toBe('error')
        expect(byName.get('Admin')).toBe('warn')
    })

    it('reports open, stale and malformed sessions', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            LEDGER,
            [
                HEADER,
                'B2,Bob,2026-10-19T19:00:00Z,,0,False',
                'C3,Carol,2026-10-19T00:00:00Z,,0,False',
                'X9,Zed,someday,,0,False',
            ].join('\n')
        )
        fs.setFile(MEMBERS, 'card_uid,member_name,handle,seniority,lead_handle\nB2,Bob,@bob,2,\n')

        const checks = await runDoctorChecks(testConfig(), fs, now)

        expect(checks.slice(1)).toEqual([
            { name: 'Ledger', status: 'ok', message: '2 session(s)' },
            { name: 'Malformed rows', status: 'warn', message: 'line(s) 4, quarantined on next write' },
            { name: 'Open sessions', status: 'ok', message: 'Bob' },
            { name: 'Stale session', status: 'warn', message: 'Carol, open for 20h 00m' },
            { name: 'Members', status: 'ok', message: '1 member(s)' },
            { name: 'Admin', status: 'ok', message: '@admin' },
        ])
        expect(fs.getFiles().size).toBe(2)
    })
})
