import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { loadConfig } from '../../../src/config/loader.js'
import { PermanentError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const projectDir = '/work/shop'

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir, env: {} })

        expect(config.ledgerPath).toBe('/work/shop/attendance.csv')
        expect(config.membersPath).toBe('/work/shop/members.csv')
        expect(config.adminHandle).toBe('')
        expect(config.announceChannel).toBe('#shop-status')
        expect(config.staleAfterHours).toBe(12)
        expect(config.lookbackHours).toBe(24)
        expect(config.announcementMode).toBe('casual')
        expect(config.logLevel).toBe('info')
        expect(config.notifyRetry).toEqual({ maxRetries: 3, baseDelay: 500, maxDelay: 10000 })
        expect(config.projectDir).toBe(projectDir)
    })

    it('layers global, local, env and CLI flags in that order', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            GLOBAL_CONFIG_FILE,
            JSON.stringify({ adminHandle: '@global', staleAfterHours: 8, announceChannel: '#global' })
        )
        fs.setFile(
            path.join(projectDir, LOCAL_CONFIG_FILE),
            JSON.stringify({ adminHandle: '@local', ledgerPath: 'data/ledger.csv', notifyRetry: { maxRetries: 5 } })
        )

        const config = await loadConfig({
            fs,
            projectDir,
            env: { SHOP_PRESENCE_ADMIN: '@env', SHOP_PRESENCE_LOG_LEVEL: 'warn' },
            cliFlags: { logLevel: 'debug', membersPath: undefined },
        })

        expect(config.staleAfterHours).toBe(8)
        expect(config.announceChannel).toBe('#global')
        expect(config.ledgerPath).toBe('/work/shop/data/ledger.csv')
        expect(config.adminHandle).toBe('@env')
        expect(config.logLevel).toBe('debug')
        expect(config.membersPath).toBe('/work/shop/members.csv')
        expect(config.notifyRetry).toEqual({ maxRetries: 5, baseDelay: 500, maxDelay: 10000 })
    })

    it('keeps absolute paths as given', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir, env: { SHOP_PRESENCE_LEDGER: '/var/shop/ledger.csv' } })
        expect(config.ledgerPath).toBe('/var/shop/ledger.csv')
    })

    it('ignores an unknown log level in the environment', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir, env: { SHOP_PRESENCE_LOG_LEVEL: 'loud' } })
        expect(config.logLevel).toBe('info')
    })

    it('rejects an invalid config file with its path', async () => {
        const fs = new MockFileSystem()
        const file = path.join(projectDir, LOCAL_CONFIG_FILE)
        fs.setFile(file, JSON.stringify({ staleAfterHours: -1 }))

        const load = loadConfig({ fs, projectDir, env: {} })
        await expect(load).rejects.toBeInstanceOf(PermanentError)
        await expect(load).rejects.toThrow(`Invalid config file ${file}`)
    })

    it('rejects unknown keys', async () => {
        const fs = new MockFileSystem()
        fs.setFile(path.join(projectDir, LOCAL_CONFIG_FILE), JSON.stringify({ ledger: 'typo.csv' }))
        await expect(loadConfig({ fs, projectDir, env: {} })).rejects.toThrow('Invalid config file')
    })
})
