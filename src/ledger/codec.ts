import Papa from 'papaparse'
import { z } from 'zod'
import type { Session } from '../core/types.js'

export const LEDGER_COLUMNS = ['card_uid', 'member_name', 'check_in', 'check_out', 'hours', 'approved'] as const

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number]

export type RawLedgerRow = Record<LedgerColumn, string>

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/

/** Drops sub-second precision; ledger timestamps are whole seconds. */
export function truncateToSecond(date: Date): Date {
    return new Date(Math.floor(date.getTime() / 1000) * 1000)
}

export function formatTimestamp(date: Date): string {
    return `${truncateToSecond(date).toISOString().slice(0, 19)}Z`
}

/**
 * Parses an ISO-8601 date-time. Values without an offset are read as local
 * time. Returns null for anything else.
 */
export function parseTimestamp(text: string): Date | null {
    const trimmed = text.trim()
    if (!ISO_DATE_TIME.test(trimmed)) return null
    const date = new Date(trimmed.replace(' ', 'T'))
    return Number.isNaN(date.getTime()) ? null : date
}

/** Hours between two instants, whole seconds, rounded half-up to 2 decimals. */
export function elapsedHours(from: Date, to: Date): number {
    const seconds = Math.floor(to.getTime() / 1000) - Math.floor(from.getTime() / 1000)
    return Math.round(seconds / 36) / 100
}

const cell = z
    .string()
    .optional()
    .transform((value) => (value ?? '').trim())

const RawRowSchema = z.object({
    card_uid: cell,
    member_name: cell,
    check_in: cell,
    check_out: cell,
    hours: cell,
    approved: cell,
})

export type DecodedRow = { ok: true; session: Session } | { ok: false; raw: RawLedgerRow; reason: string }

export function decodeRow(input: unknown): DecodedRow {
    const raw: RawLedgerRow = RawRowSchema.parse(input ?? {})

    if (!raw.member_name) return { ok: false, raw, reason: 'missing member_name' }

    const checkIn = parseTimestamp(raw.check_in)
    if (!checkIn) return { ok: false, raw, reason: `malformed check_in "${raw.check_in}"` }

    let checkOut: Date | null = null
    if (raw.check_out) {
        checkOut = parseTimestamp(raw.check_out)
        if (!checkOut) return { ok: false, raw, reason: `malformed check_out "${raw.check_out}"` }
    }

    const hours = Number(raw.hours)

    return {
        ok: true,
        session: {
            cardId: raw.card_uid,
            memberName: raw.member_name,
            checkIn,
            checkOut,
            durationHours: raw.hours && Number.isFinite(hours) ? hours : 0,
            approval: raw.approved.toLowerCase() === 'true' ? 'approved' : 'pending',
        },
    }
}

export function encodeRow(session: Session): RawLedgerRow {
    return {
        card_uid: session.cardId,
        member_name: session.memberName,
        check_in: formatTimestamp(session.checkIn),
        check_out: session.checkOut ? formatTimestamp(session.checkOut) : '',
        hours: String(session.durationHours),
        approved: session.approval === 'approved' ? 'True' : 'False',
    }
}

export interface ParsedLedger {
    sessions: Session[]
    rejected: Array<{ raw: RawLedgerRow; reason: string; line: number }>
}

export function parseLedger(text: string): ParsedLedger {
    const parsed = Papa.parse<Record<string, string>>(text, {
        header: true,
        skipEmptyLines: 'greedy',
        transformHeader: (header) => header.trim(),
    })

    const sessions: Session[] = []
    const rejected: ParsedLedger['rejected'] = []
    parsed.data.forEach((row, index) => {
        const decoded = decodeRow(row)
        if (decoded.ok) {
            sessions.push(decoded.session)
        } else {
            // +2: one for the header, one for 1-based lines
            rejected.push({ raw: decoded.raw, reason: decoded.reason, line: index + 2 })
        }
    })
    return { sessions, rejected }
}

export function serializeRows(rows: readonly RawLedgerRow[], options: { header?: boolean } = {}): string {
    const header = options.header ?? true
    if (!header && rows.length === 0) return ''
    const csv = Papa.unparse(
        {
            fields: [...LEDGER_COLUMNS],
            data: rows.map((row) => LEDGER_COLUMNS.map((column) => row[column])),
        },
        { newline: '\n', header }
    )
    return `${csv}\n`
}

export function serializeLedger(sessions: readonly Session[]): string {
    return serializeRows(sessions.map(encodeRow))
}
