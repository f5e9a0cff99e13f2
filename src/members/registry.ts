import Papa from 'papaparse'
import { z } from 'zod'
import { AttendanceError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import {
    type Member,
    SENIORITY_LEAST_SENIOR,
    SENIORITY_MOST_SENIOR,
    normalizeCardId,
    normalizeName,
} from '../core/types.js'
import type { Logger } from '../logger/index.js'

export const MEMBER_COLUMNS = ['card_uid', 'member_name', 'handle', 'seniority', 'lead_handle'] as const

/** Ranks outside 1..5, or anything that is not an integer, count as least senior. */
export function parseSeniority(value: string | number | undefined): number {
    const rank = typeof value === 'number' ? value : Number((value ?? '').trim())
    if (!Number.isInteger(rank) || rank < SENIORITY_MOST_SENIOR || rank > SENIORITY_LEAST_SENIOR) {
        return SENIORITY_LEAST_SENIOR
    }
    return rank
}

const text = z
    .string()
    .optional()
    .transform((value) => (value ?? '').trim())

const MemberRowSchema = z.object({
    card_uid: text,
    member_name: text,
    handle: text,
    seniority: text,
    lead_handle: text,
})

/** Read-only snapshot of the registry, taken once per command. */
export class MemberDirectory {
    private handles = new Map<string, Member>()
    private cards = new Map<string, Member>()
    private names = new Map<string, Member>()

    constructor(private members: readonly Member[]) {
        for (const member of members) {
            this.handles.set(member.handle, member)
            if (member.cardId) this.cards.set(normalizeCardId(member.cardId), member)
            this.names.set(normalizeName(member.name), member)
        }
    }

    byHandle(handle: string): Member | undefined {
        return this.handles.get(handle.trim())
    }

    byCard(cardId: string): Member | undefined {
        return this.cards.get(normalizeCardId(cardId))
    }

    byName(name: string): Member | undefined {
        return this.names.get(normalizeName(name))
    }

    all(): Member[] {
        return [...this.members]
    }

    get size(): number {
        return this.members.length
    }
}

export interface MemberRegistry {
    load(): Promise<MemberDirectory>
}

export function parseMembers(csv: string, logger?: Logger): Member[] {
    const parsed = Papa.parse<Record<string, string>>(csv, {
        header: true,
        skipEmptyLines: 'greedy',
        transformHeader: (header) => header.trim(),
    })

    const members: Member[] = []
    for (const row of parsed.data) {
        const fields = MemberRowSchema.parse(row)
        if (!fields.handle || !fields.member_name) {
            logger?.warn({ row: fields }, 'members:row-skipped')
            continue
        }
        members.push({
            handle: fields.handle,
            name: fields.member_name,
            cardId: normalizeCardId(fields.card_uid),
            seniority: parseSeniority(fields.seniority),
            lead: fields.lead_handle || null,
        })
    }
    return members
}

export class CsvMemberRegistry implements MemberRegistry {
    constructor(
        readonly membersPath: string,
        private fs: FileSystem,
        private logger: Logger
    ) {}

    async load(): Promise<MemberDirectory> {
        if (!(await this.fs.exists(this.membersPath))) {
            this.logger.warn({ path: this.membersPath }, 'members:file-missing')
            return new MemberDirectory([])
        }
        try {
            const csv = await this.fs.readText(this.membersPath)
            return new MemberDirectory(parseMembers(csv, this.logger))
        } catch (error) {
            this.logger.error({ path: this.membersPath, error: errorMessage(error) }, 'members:read-failed')
            throw new AttendanceError('IO_FAILURE', `Failed to read members ${this.membersPath}`, { path: this.membersPath }, { cause: error })
        }
    }
}
