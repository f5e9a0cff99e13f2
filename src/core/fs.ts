import { mkdir, open, readFile, rename, rm, stat } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON(path: string): Promise<unknown>
    /** Writes and flushes to stable storage before resolving. */
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    exists(path: string): Promise<boolean>
    mkdir(path: string): Promise<void>
    /** Replaces `to` with `from` in a single step. */
    rename(from: string, to: string): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf8')
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        const handle = await open(path, 'w')
        try {
            await handle.writeFile(content, 'utf8')
            await handle.sync()
        } finally {
            await handle.close()
        }
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        await this.writeText(path, JSON.stringify(data, null, 2))
    }

    async exists(path: string): Promise<boolean> {
        try {
            await stat(path)
            return true
        } catch (error) {
            if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
                return false
            }
            throw error
        }
    }

    async mkdir(path: string): Promise<void> {
        await mkdir(path, { recursive: true })
    }

    async rename(from: string, to: string): Promise<void> {
        await rename(from, to)
    }

    async remove(path: string): Promise<void> {
        await rm(path, { recursive: true, force: true })
    }
}

type FaultyOperation = 'writeText' | 'rename'

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private faults = new Map<FaultyOperation, (path: string) => boolean>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) throw new Error(`ENOENT: ${path}`)
        return content
    }

    async readJSON(path: string): Promise<unknown> {
        return JSON.parse(await this.readText(path))
    }

    async writeText(path: string, content: string): Promise<void> {
        this.checkFault('writeText', path)
        this.files.set(path, content)
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        await this.writeText(path, JSON.stringify(data, null, 2))
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path)
    }

    async mkdir(_path: string): Promise<void> {}

    async rename(from: string, to: string): Promise<void> {
        this.checkFault('rename', to)
        const content = this.files.get(from)
        if (content === undefined) throw new Error(`ENOENT: ${from}`)
        this.files.set(to, content)
        this.files.delete(from)
    }

    async remove(path: string): Promise<void> {
        this.files.delete(path)
    }

    setFile(path: string, content: string): void {
        this.files.set(path, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }

    /** Makes every later `operation` on a matching path reject with EIO. */
    failOn(operation: FaultyOperation, matches: (path: string) => boolean = () => true): void {
        this.faults.set(operation, matches)
    }

    clearFaults(): void {
        this.faults.clear()
    }

    private checkFault(operation: FaultyOperation, path: string): void {
        const matches = this.faults.get(operation)
        if (matches?.(path)) {
            throw Object.assign(new Error(`EIO: simulated ${operation} failure on ${path}`), { code: 'EIO' })
        }
    }
}
