import { AttendanceError, errorMessage, isAttendanceError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { type Result, err, ok } from '../core/result.js'
import type { SerialQueue } from '../core/serial-queue.js'
import { type Session, isOpen } from '../core/types.js'
import { type PendingEntry, pendingFor } from '../ledger/queries.js'
import type { LedgerStore } from '../ledger/store.js'
import type { Logger } from '../logger/index.js'
import type { MemberDirectory } from '../members/registry.js'

export interface ApprovalAuthorityOptions {
    store: LedgerStore
    queue: SerialQueue
    logger: Logger
    eventBus?: TypedEventEmitter
}

type Decision = 'approve' | 'disapprove'

export class ApprovalAuthority {
    constructor(private options: ApprovalAuthorityOptions) {}

    /** More senior than the target, or the target's lead. Unknown on either side is a no. */
    isAuthorized(directory: MemberDirectory, approverHandle: string, targetName: string): boolean {
        const approver = directory.byHandle(approverHandle)
        const target = directory.byName(targetName)
        if (!approver || !target) return false
        return approver.seniority < target.seniority || target.lead === approver.handle
    }

    async listPending(targetName: string): Promise<PendingEntry[]> {
        return pendingFor(await this.options.store.read(), targetName)
    }

    approve(
        directory: MemberDirectory,
        approverHandle: string,
        targetName: string,
        index: number
    ): Promise<Result<Session, AttendanceError>> {
        return this.decide('approve', directory, approverHandle, targetName, index)
    }

    disapprove(
        directory: MemberDirectory,
        approverHandle: string,
        targetName: string,
        index: number
    ): Promise<Result<Session, AttendanceError>> {
        return this.decide('disapprove', directory, approverHandle, targetName, index)
    }

    async approveAll(
        directory: MemberDirectory,
        approverHandle: string,
        targetName: string
    ): Promise<Result<number, AttendanceError>> {
        const denied = this.authorize(directory, approverHandle, targetName)
        if (denied) return err(denied)

        return this.options.queue.run(() =>
            this.guard('approve-all', targetName, async (): Promise<Result<number, AttendanceError>> => {
                const sessions = await this.options.store.read()
                const positions = new Set(
                    pendingFor(sessions, targetName)
                        .filter((entry) => !isOpen(entry.session))
                        .map((entry) => entry.position)
                )
                if (positions.size === 0) return ok(0)

                const next = sessions.map((session, i): Session =>
                    positions.has(i) ? { ...session, approval: 'approved' } : session
                )
                await this.options.store.write(next)

                this.options.logger.info({ member: targetName, approver: approverHandle, count: positions.size }, 'approval:approve-all')
                this.options.eventBus?.emit('session:approved', {
                    member: targetName,
                    count: positions.size,
                    approver: approverHandle,
                })
                return ok(positions.size)
            })
        )
    }

    private async decide(
        decision: Decision,
        directory: MemberDirectory,
        approverHandle: string,
        targetName: string,
        index: number
    ): Promise<Result<Session, AttendanceError>> {
        const denied = this.authorize(directory, approverHandle, targetName)
        if (denied) return err(denied)

        return this.options.queue.run(() =>
            this.guard(decision, targetName, async (): Promise<Result<Session, AttendanceError>> => {
                const sessions = await this.options.store.read()
                const pending = pendingFor(sessions, targetName)
                const entry = pending[index - 1]
                if (!Number.isInteger(index) || index < 1 || !entry) {
                    return err(
                        new AttendanceError('INVALID_INDEX', `${targetName} has ${pending.length} pending session(s)`, {
                            index,
                            pending: pending.length,
                        })
                    )
                }
                // open sessions are listed but only reviewable once closed
                if (isOpen(entry.session)) {
                    return err(
                        new AttendanceError('SESSION_OPEN', `Session #${index} for ${targetName} is still open`, {
                            index,
                        })
                    )
                }

                if (decision === 'approve') {
                    const approved: Session = { ...entry.session, approval: 'approved' }
                    await this.options.store.write(sessions.map((s, i) => (i === entry.position ? approved : s)))
                    this.options.eventBus?.emit('session:approved', { member: targetName, count: 1, approver: approverHandle })
                    this.options.logger.info({ member: targetName, approver: approverHandle, index }, 'approval:approved')
                    return ok(approved)
                }

                await this.options.store.write(sessions.filter((_, i) => i !== entry.position))
                this.options.eventBus?.emit('session:removed', { member: targetName, approver: approverHandle })
                this.options.logger.info({ member: targetName, approver: approverHandle, index }, 'approval:removed')
                return ok(entry.session)
            })
        )
    }

    private authorize(directory: MemberDirectory, approverHandle: string, targetName: string): AttendanceError | null {
        if (this.isAuthorized(directory, approverHandle, targetName)) return null
        this.options.logger.warn({ approver: approverHandle, member: targetName, code: 'UNAUTHORIZED' }, 'approval:denied')
        return new AttendanceError('UNAUTHORIZED', `${approverHandle} may not review sessions of ${targetName}`)
    }

    private async guard<T>(
        operation: string,
        targetName: string,
        fn: () => Promise<Result<T, AttendanceError>>
    ): Promise<Result<T, AttendanceError>> {
        try {
            return await fn()
        } catch (error) {
            if (isAttendanceError(error)) return err(error)
            this.options.logger.error({ operation, member: targetName, error: errorMessage(error) }, 'approval:io-failure')
            return err(new AttendanceError('IO_FAILURE', `Failed to ${operation} for ${targetName}`, {}, { cause: error }))
        }
    }
}
