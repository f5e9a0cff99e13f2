import { AttendanceError, errorMessage, isAttendanceError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { type Result, err, ok } from '../core/result.js'
import type { SerialQueue } from '../core/serial-queue.js'
import { type Clock, type Member, type Session, systemClock } from '../core/types.js'
import { elapsedHours, formatTimestamp, truncateToSecond } from '../ledger/codec.js'
import { findLastOpenByCard, findLastOpenByName } from '../ledger/queries.js'
import type { LedgerStore } from '../ledger/store.js'
import type { Logger } from '../logger/index.js'
import type { LivePresenceSet, PresenceView } from '../presence/live-set.js'

export interface CheckInOutcome {
    action: 'check-in'
    session: Session
    /** The shop went from empty to occupied. */
    shopOpened: boolean
}

export interface CheckOutOutcome {
    action: 'check-out'
    session: Session
    /** Last person out. */
    shopClosed: boolean
    matchedBy: 'card' | 'name'
}

export type ScanOutcome = CheckInOutcome | CheckOutOutcome

export interface SessionEngineOptions {
    store: LedgerStore
    presence: LivePresenceSet
    queue: SerialQueue
    logger: Logger
    eventBus?: TypedEventEmitter
    clock?: Clock
}

export class SessionEngine {
    private store: LedgerStore
    private live: LivePresenceSet
    private queue: SerialQueue
    private logger: Logger
    private eventBus?: TypedEventEmitter
    private clock: Clock

    constructor(options: SessionEngineOptions) {
        this.store = options.store
        this.live = options.presence
        this.queue = options.queue
        this.logger = options.logger
        this.eventBus = options.eventBus
        this.clock = options.clock ?? systemClock
    }

    get presence(): PresenceView {
        return this.live
    }

    checkIn(member: Member): Promise<Result<CheckInOutcome, AttendanceError>> {
        return this.queue.run(() => this.guard('check-in', member, () => this.openSession(member)))
    }

    checkOut(member: Member): Promise<Result<CheckOutOutcome, AttendanceError>> {
        return this.queue.run(() => this.guard('check-out', member, () => this.closeSession(member)))
    }

    /** Card-reader toggle: checks the member out if they are in, otherwise in. */
    scan(member: Member): Promise<Result<ScanOutcome, AttendanceError>> {
        return this.queue.run(() =>
            this.guard('scan', member, async (): Promise<Result<ScanOutcome, AttendanceError>> => {
                const sessions = await this.store.read()
                const isIn = this.live.has(member.name) || findLastOpenByCard(sessions, member.cardId) >= 0
                return isIn ? this.closeSession(member, sessions) : this.openSession(member, sessions)
            })
        )
    }

    private async openSession(member: Member, snapshot?: Session[]): Promise<Result<CheckInOutcome, AttendanceError>> {
        const sessions = snapshot ?? (await this.store.read())
        const existing = sessions[findLastOpenByCard(sessions, member.cardId)]

        if (existing || this.live.has(member.name)) {
            return err(
                new AttendanceError('ALREADY_CHECKED_IN', `${member.name} is already checked in`, {
                    since: existing?.checkIn ?? null,
                })
            )
        }

        const wasEmpty = this.live.isEmpty()
        const now = truncateToSecond(this.clock())
        const session: Session = {
            cardId: member.cardId,
            memberName: member.name,
            checkIn: now,
            checkOut: null,
            durationHours: 0,
            approval: 'pending',
        }

        await this.store.write([...sessions, session])
        this.live.add(member.name)

        this.logger.info({ member: member.name, cardId: member.cardId, at: formatTimestamp(now) }, 'presence:check-in')
        this.eventBus?.emit('presence:check-in', { member: member.name, cardId: member.cardId, at: now })
        if (wasEmpty) this.eventBus?.emit('shop:opened', { member: member.name, at: now })

        return ok({ action: 'check-in', session, shopOpened: wasEmpty })
    }

    private async closeSession(member: Member, snapshot?: Session[]): Promise<Result<CheckOutOutcome, AttendanceError>> {
        const sessions = snapshot ?? (await this.store.read())

        let matchedBy: CheckOutOutcome['matchedBy'] = 'card'
        let position = findLastOpenByCard(sessions, member.cardId)
        if (position < 0) {
            // registry edits can leave card ids and ledger rows out of step
            matchedBy = 'name'
            position = findLastOpenByName(sessions, member.name)
        }
        const open = sessions[position]

        if (!open) {
            if (this.live.remove(member.name)) {
                this.logger.warn({ member: member.name, code: 'INCONSISTENT_STATE' }, 'presence:healed')
                this.eventBus?.emit('presence:healed', { member: member.name })
                return err(
                    new AttendanceError(
                        'INCONSISTENT_STATE',
                        `${member.name} was marked present but has no open session`
                    )
                )
            }
            return err(new AttendanceError('NOT_CHECKED_IN', `${member.name} is not checked in`))
        }

        const now = truncateToSecond(this.clock())
        const closed: Session = {
            ...open,
            checkOut: now,
            durationHours: Math.max(0, elapsedHours(open.checkIn, now)),
            approval: 'pending',
        }
        const next = sessions.map((session, i) => (i === position ? closed : session))

        await this.store.write(next)
        this.live.remove(member.name)
        const shopClosed = this.live.isEmpty()

        this.logger.info(
            { member: member.name, cardId: member.cardId, hours: closed.durationHours, matchedBy },
            'presence:check-out'
        )
        this.eventBus?.emit('presence:check-out', {
            member: member.name,
            cardId: member.cardId,
            at: now,
            durationHours: closed.durationHours,
        })
        if (shopClosed) this.eventBus?.emit('shop:closed', { member: member.name, at: now })

        return ok({ action: 'check-out', session: closed, shopClosed, matchedBy })
    }

    private async guard<T>(
        operation: string,
        member: Member,
        fn: () => Promise<Result<T, AttendanceError>>
    ): Promise<Result<T, AttendanceError>> {
        try {
            return await fn()
        } catch (error) {
            if (isAttendanceError(error)) return err(error)
            this.logger.error({ operation, member: member.name, error: errorMessage(error) }, 'session:io-failure')
            return err(new AttendanceError('IO_FAILURE', `Failed to ${operation} ${member.name}`, {}, { cause: error }))
        }
    }
}
