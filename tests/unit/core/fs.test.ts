import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('reads and writes text', async () => {
        const fs = new MockFileSystem()
        await fs.writeText('/test.txt', 'hello')
        expect(await fs.readText('/test.txt')).toBe('hello')
    })

    it('reads and writes JSON', async () => {
        const fs = new MockFileSystem()
        await fs.writeJSON('/test.json', { key: 'value' })
        expect(await fs.readJSON('/test.json')).toEqual({ key: 'value' })
    })

    it('throws on missing file', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/missing.txt')).rejects.toThrow('ENOENT')
    })

    it('renames over an existing file', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/a.tmp', 'new')
        fs.setFile('/a', 'old')
        await fs.rename('/a.tmp', '/a')
        expect(fs.getFiles()).toEqual(new Map([['/a', 'new']]))
    })

    it('rename of a missing source fails', async () => {
        const fs = new MockFileSystem()
        await expect(fs.rename('/nope', '/a')).rejects.toThrow('ENOENT')
    })

    it('injects failures for matching paths only', async () => {
        const fs = new MockFileSystem()
        fs.failOn('writeText', (path) => path.endsWith('.tmp'))

        await expect(fs.writeText('/x.tmp', 'data')).rejects.toThrow('EIO')
        await fs.writeText('/x.csv', 'data')
        expect(await fs.exists('/x.tmp')).toBe(false)
        expect(await fs.exists('/x.csv')).toBe(true)

        fs.clearFaults()
        await fs.writeText('/x.tmp', 'data')
        expect(await fs.exists('/x.tmp')).toBe(true)
    })

    it('removes files', async () => {
        const fs = new MockFileSystem()
        await fs.writeText('/temp.txt', 'data')
        await fs.remove('/temp.txt')
        expect(await fs.exists('/temp.txt')).toBe(false)
    })
})
