import { errorMessage } from '../core/errors.js'
import { type Member, type Session, mostSenior, sameName } from '../core/types.js'
import type { LedgerStore } from '../ledger/store.js'
import type { Logger } from '../logger/index.js'
import type { MemberDirectory } from '../members/registry.js'
import type { PresenceView } from '../presence/live-set.js'

export type EscalationReason = 'present-senior' | 'co-present-senior' | 'lead' | 'admin'

export interface NotificationTarget {
    handle: string
    reason: EscalationReason
}

export interface EscalationResolverOptions {
    store: LedgerStore
    presence: PresenceView
    logger: Logger
    adminHandle: string
    lookbackMs: number
}

function isValidDate(date: Date | null): boolean {
    return date === null || !Number.isNaN(date.getTime())
}

/**
 * Picks the one person to notify when a member checks out:
 * most senior member still present, else most senior member whose session
 * overlapped the departing one, else the member's lead, else the admin.
 */
export class EscalationResolver {
    constructor(private options: EscalationResolverOptions) {}

    async resolve(
        session: Session,
        checkoutTime: Date,
        departing: Member,
        directory: MemberDirectory
    ): Promise<NotificationTarget | null> {
        const present = this.presentSenior(departing, directory)
        if (present) return { handle: present.handle, reason: 'present-senior' }

        const coPresent = await this.coPresentSenior(session, checkoutTime, departing, directory)
        if (coPresent) return { handle: coPresent.handle, reason: 'co-present-senior' }

        if (departing.lead) {
            this.options.logger.info({ member: departing.name, lead: departing.lead }, 'escalation:lead-fallback')
            return { handle: departing.lead, reason: 'lead' }
        }

        if (this.options.adminHandle) {
            this.options.logger.info({ member: departing.name }, 'escalation:admin-fallback')
            return { handle: this.options.adminHandle, reason: 'admin' }
        }

        this.options.logger.warn({ member: departing.name }, 'escalation:no-recipient')
        return null
    }

    private presentSenior(departing: Member, directory: MemberDirectory): Member | null {
        const candidates = this.options.presence
            .names()
            .filter((name) => !sameName(name, departing.name))
            .map((name) => directory.byName(name))
            .filter((member): member is Member => member !== undefined)
        return mostSenior(candidates)
    }

    private async coPresentSenior(
        session: Session,
        checkoutTime: Date,
        departing: Member,
        directory: MemberDirectory
    ): Promise<Member | null> {
        if (!isValidDate(session.checkIn) || !isValidDate(checkoutTime)) {
            this.options.logger.warn({ member: departing.name, code: 'MALFORMED_TIMESTAMP' }, 'escalation:bad-session-times')
            return null
        }

        const windowStart = checkoutTime.getTime() - this.options.lookbackMs
        const start = session.checkIn.getTime()
        const end = checkoutTime.getTime()
        const candidates: Member[] = []

        let sessions: Session[]
        try {
            sessions = await this.options.store.read()
        } catch (error) {
            this.options.logger.error({ member: departing.name, error: errorMessage(error) }, 'escalation:ledger-unreadable')
            return null
        }

        for (const other of sessions) {
            if (sameName(other.memberName, departing.name)) continue
            if (!isValidDate(other.checkIn) || !isValidDate(other.checkOut)) {
                this.options.logger.warn({ member: other.memberName, code: 'MALFORMED_TIMESTAMP' }, 'escalation:row-skipped')
                continue
            }

            const otherIn = other.checkIn.getTime()
            if (otherIn < windowStart) continue

            const overlaps = other.checkOut === null ? otherIn < end : otherIn < end && other.checkOut.getTime() > start
            if (!overlaps) continue

            const member = directory.byName(other.memberName)
            if (member) candidates.push(member)
        }

        return mostSenior(candidates)
    }
}
