import { randomUUID } from 'node:crypto'
import path from 'node:path'
import { AttendanceError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { Session } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { type ParsedLedger, parseLedger, serializeLedger, serializeRows } from './codec.js'

/**
 * Durable, ordered sequence of sessions. `write` and `append` either replace
 * the whole sequence or leave it untouched; callers serialize mutations.
 */
export interface LedgerStore {
    read(): Promise<Session[]>
    write(sessions: readonly Session[]): Promise<void>
    append(session: Session): Promise<void>
}

export function quarantinePathFor(ledgerPath: string): string {
    const parsed = path.parse(ledgerPath)
    return path.join(parsed.dir, `${parsed.name}.quarantine${parsed.ext || '.csv'}`)
}

export class CsvLedgerStore implements LedgerStore {
    readonly quarantinePath: string
    private rejected: ParsedLedger['rejected'] = []

    constructor(
        readonly ledgerPath: string,
        private fs: FileSystem,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {
        this.quarantinePath = quarantinePathFor(ledgerPath)
    }

    /** Creates an empty ledger with the canonical header if none exists. */
    async initialize(): Promise<void> {
        if (await this.exists()) return
        await this.fs.mkdir(path.dirname(this.ledgerPath))
        await this.replace(this.ledgerPath, serializeLedger([]))
        this.logger.info({ path: this.ledgerPath }, 'ledger:created')
    }

    async read(): Promise<Session[]> {
        await this.initialize()

        let text: string
        try {
            text = await this.fs.readText(this.ledgerPath)
        } catch (error) {
            this.logger.error({ path: this.ledgerPath, error: errorMessage(error) }, 'ledger:read-failed')
            throw new AttendanceError('IO_FAILURE', `Failed to read ledger ${this.ledgerPath}`, { path: this.ledgerPath }, { cause: error })
        }

        const { sessions, rejected } = parseLedger(text)
        for (const row of rejected) {
            this.logger.warn({ line: row.line, reason: row.reason, code: 'MALFORMED_TIMESTAMP' }, 'ledger:row-rejected')
        }
        this.rejected = rejected
        return sessions
    }

    async write(sessions: readonly Session[]): Promise<void> {
        await this.flushQuarantine()
        await this.replace(this.ledgerPath, serializeLedger(sessions))
        this.rejected = []
        this.logger.debug({ sessions: sessions.length }, 'ledger:written')
    }

    async append(session: Session): Promise<void> {
        const sessions = await this.read()
        await this.write([...sessions, session])
    }

    private async exists(): Promise<boolean> {
        try {
            return await this.fs.exists(this.ledgerPath)
        } catch (error) {
            throw new AttendanceError('IO_FAILURE', `Failed to stat ledger ${this.ledgerPath}`, { path: this.ledgerPath }, { cause: error })
        }
    }

    /**
     * Moves rows rejected by the last read into the quarantine file before they
     * disappear from the ledger. Lines the quarantine already holds are skipped.
     */
    private async flushQuarantine(): Promise<void> {
        if (this.rejected.length === 0) return

        let existing = ''
        if (await this.fs.exists(this.quarantinePath)) {
            existing = await this.fs.readText(this.quarantinePath)
        }
        const held = new Set(existing.split('\n'))
        const rows = this.rejected.map((row) => row.raw).filter((raw) => !held.has(serializeRows([raw], { header: false }).trimEnd()))
        if (rows.length === 0) return

        const content = existing ? existing + serializeRows(rows, { header: false }) : serializeRows(rows)

        await this.replace(this.quarantinePath, content)
        this.logger.warn({ path: this.quarantinePath, rows: rows.length }, 'ledger:rows-quarantined')
        this.eventBus?.emit('ledger:quarantined', { path: this.quarantinePath, rows: rows.length })
    }

    private async replace(target: string, content: string): Promise<void> {
        const scratch = `${target}.${process.pid}.${randomUUID()}.tmp`
        try {
            await this.fs.writeText(scratch, content)
            await this.fs.rename(scratch, target)
        } catch (error) {
            await this.discard(scratch)
            this.logger.error({ path: target, error: errorMessage(error) }, 'ledger:write-failed')
            throw new AttendanceError('IO_FAILURE', `Failed to write ${target}`, { path: target }, { cause: error })
        }
    }

    private async discard(scratch: string): Promise<void> {
        try {
            await this.fs.remove(scratch)
        } catch (error) {
            this.logger.warn({ path: scratch, error: errorMessage(error) }, 'ledger:scratch-cleanup-failed')
        }
    }
}
