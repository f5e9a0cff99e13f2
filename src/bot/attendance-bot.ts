import type { ApprovalAuthority } from '../approvals/authority.js'
import { type AttendanceError, errorMessage } from '../core/errors.js'
import type { InboundMessage, Member } from '../core/types.js'
import type { EscalationResolver } from '../escalation/resolver.js'
import type { PendingEntry } from '../ledger/queries.js'
import type { Logger } from '../logger/index.js'
import type { MemberDirectory, MemberRegistry } from '../members/registry.js'
import type { CheckInOutcome, CheckOutOutcome, SessionEngine } from '../sessions/engine.js'
import type { Notifier } from '../transport/notifier.js'
import type { Announcer } from './announcer.js'
import { type BotCommand, type Decision, parseCommand } from './commands.js'
import {
    APPROVAL_USAGE,
    HELP_TEXT,
    checkoutNotice,
    pendingList,
    replies,
    shopClosedNotice,
    shopStatus,
    whoIsIn,
    whoIsInShop,
} from './messages.js'

export interface AttendanceBotOptions {
    engine: SessionEngine
    authority: ApprovalAuthority
    resolver: EscalationResolver
    registry: MemberRegistry
    notifier: Notifier
    announcer: Announcer
    logger: Logger
    adminHandle: string
    announceChannel: string
}

/** What a card scan shows on the reader's display. */
export type ScanDisplay = { kind: 'unknown-card' } | { kind: 'welcome' | 'goodbye' | 'error'; text: string }

/**
 * Turns chat messages and card scans into engine and authority calls, and
 * posts the replies, announcements and approval notices that follow.
 */
export class AttendanceBot {
    constructor(private options: AttendanceBotOptions) {}

    async handleMessage(message: InboundMessage): Promise<void> {
        const command = parseCommand(message.text, message.channelKind)
        if (!command) return

        if (message.channelKind === 'public') {
            await this.answerPublic(message, command)
            return
        }

        // registry edits take effect on the next command
        const directory = await this.loadDirectory('command')
        if (!directory) {
            await this.reply(message, replies.membersUnavailable)
            return
        }
        const member = directory.byHandle(message.sender)
        if (!member) {
            this.options.logger.info({ sender: message.sender, code: 'NOT_FOUND' }, 'command:unregistered-sender')
            await this.reply(message, replies.notRegistered)
            return
        }

        await this.dispatch(message, command, member, directory)
    }

    async handleScan(cardId: string): Promise<ScanDisplay> {
        const directory = await this.loadDirectory('scan')
        if (!directory) return { kind: 'error', text: 'Member list unavailable' }
        const member = directory.byCard(cardId)
        if (!member) {
            this.options.logger.warn({ cardId, code: 'NOT_FOUND' }, 'scan:unknown-card')
            return { kind: 'unknown-card' }
        }

        const result = await this.options.engine.scan(member)
        if (!result.ok) {
            this.logFailure('scan', member, result.error)
            return { kind: 'error', text: `${member.name}: ${result.error.message}` }
        }

        if (result.value.action === 'check-in') {
            await this.afterCheckIn(member, result.value)
            return { kind: 'welcome', text: `Welcome ${member.name}` }
        }
        await this.afterCheckOut(member, result.value, directory)
        return { kind: 'goodbye', text: `Goodbye ${member.name}` }
    }

    private async loadDirectory(operation: string): Promise<MemberDirectory | null> {
        try {
            return await this.options.registry.load()
        } catch (error) {
            this.options.logger.error({ operation, code: 'IO_FAILURE', error: errorMessage(error) }, 'registry:load-failed')
            return null
        }
    }

    private async answerPublic(message: InboundMessage, command: BotCommand): Promise<void> {
        const present = this.options.engine.presence.names()
        if (command.kind === 'who-is-in') await this.reply(message, whoIsInShop(present))
        else if (command.kind === 'shop-status') await this.reply(message, shopStatus(present))
    }

    private async dispatch(
        message: InboundMessage,
        command: BotCommand,
        member: Member,
        directory: MemberDirectory
    ): Promise<void> {
        switch (command.kind) {
            case 'check-in':
                return this.checkIn(message, member)
            case 'check-out':
                return this.checkOut(message, member, directory)
            case 'pending':
                return this.showPending(message, directory, command.target)
            case 'approve-all':
                return this.approveAll(message, directory, command.target)
            case 'decide':
                return this.decide(message, directory, command.decision, command.target, command.index)
            case 'approval-usage':
                return this.reply(message, APPROVAL_USAGE)
            case 'announcement':
                return this.setAnnouncementMode(message, command.mode)
            case 'shop-status':
                return this.reply(message, shopStatus(this.options.engine.presence.names()))
            case 'who-is-in':
                return this.reply(message, whoIsIn(this.options.engine.presence.names()))
            case 'help':
                return this.reply(message, HELP_TEXT)
        }
    }

    private async checkIn(message: InboundMessage, member: Member): Promise<void> {
        const result = await this.options.engine.checkIn(member)
        if (!result.ok) {
            this.logFailure('check-in', member, result.error)
            if (result.error.code === 'ALREADY_CHECKED_IN') {
                const since = result.error.details.since
                await this.reply(message, replies.alreadyCheckedIn(since instanceof Date ? since : null))
            } else {
                await this.reply(message, replies.checkInFailed)
            }
            return
        }

        await this.reply(message, replies.checkedIn(result.value.session.checkIn))
        await this.afterCheckIn(member, result.value)
    }

    private async checkOut(message: InboundMessage, member: Member, directory: MemberDirectory): Promise<void> {
        const result = await this.options.engine.checkOut(member)
        if (!result.ok) {
            this.logFailure('check-out', member, result.error)
            const code = result.error.code
            const text =
                code === 'INCONSISTENT_STATE'
                    ? replies.inconsistent
                    : code === 'NOT_CHECKED_IN'
                      ? replies.notCheckedIn
                      : replies.checkOutFailed
            await this.reply(message, text)
            return
        }

        const { session } = result.value
        await this.reply(message, replies.checkedOut(session.checkOut ?? session.checkIn))
        await this.afterCheckOut(member, result.value, directory)
    }

    private async afterCheckIn(member: Member, outcome: CheckInOutcome): Promise<void> {
        if (!outcome.shopOpened) return
        await this.options.notifier.post(this.options.announceChannel, this.options.announcer.shopOpened(member.name))
    }

    private async afterCheckOut(member: Member, outcome: CheckOutOutcome, directory: MemberDirectory): Promise<void> {
        const { session } = outcome
        const checkoutTime = session.checkOut ?? session.checkIn
        const target = await this.options.resolver.resolve(session, checkoutTime, member, directory)

        if (target) {
            this.options.logger.info({ member: member.name, target: target.handle, reason: target.reason }, 'escalation:resolved')
            await this.options.notifier.post(target.handle, checkoutNotice(member.name, session.durationHours))
        }
        if (outcome.shopClosed) {
            await this.options.notifier.post(this.options.announceChannel, shopClosedNotice(member.name))
        }
    }

    private async showPending(message: InboundMessage, directory: MemberDirectory, target: string): Promise<void> {
        if (!this.options.authority.isAuthorized(directory, message.sender, target)) {
            await this.reply(message, replies.notAuthorizedPending)
            return
        }

        let pending: PendingEntry[]
        try {
            pending = await this.options.authority.listPending(target)
        } catch (error) {
            this.options.logger.error({ member: target, error: errorMessage(error) }, 'approval:list-failed')
            await this.reply(message, replies.pendingFailed)
            return
        }

        await this.reply(message, pending.length === 0 ? replies.noPending(target) : pendingList(target, pending))
    }

    private async approveAll(message: InboundMessage, directory: MemberDirectory, target: string): Promise<void> {
        const result = await this.options.authority.approveAll(directory, message.sender, target)
        if (result.ok) {
            await this.reply(message, replies.approvedAll(result.value, target))
        } else if (result.error.code === 'UNAUTHORIZED') {
            await this.reply(message, replies.notAuthorizedApproveAll)
        } else {
            await this.reply(message, replies.approveAllFailed(target))
        }
    }

    private async decide(
        message: InboundMessage,
        directory: MemberDirectory,
        decision: Decision,
        target: string,
        index: number
    ): Promise<void> {
        if (index <= 0) {
            await this.reply(message, replies.sessionNumberTooLow)
            return
        }

        const result =
            decision === 'approve'
                ? await this.options.authority.approve(directory, message.sender, target, index)
                : await this.options.authority.disapprove(directory, message.sender, target, index)

        if (result.ok) {
            await this.reply(message, decision === 'approve' ? replies.approved(index, target) : replies.removed(index, target))
            return
        }

        const { error } = result
        if (error.code === 'UNAUTHORIZED') {
            await this.reply(message, replies.notAuthorizedDecide)
        } else if (error.code === 'INVALID_INDEX') {
            const pending = error.details.pending
            await this.reply(message, replies.invalidIndex(target, typeof pending === 'number' ? pending : 0))
        } else if (error.code === 'SESSION_OPEN') {
            await this.reply(message, replies.sessionStillOpen(index, target))
        } else {
            await this.reply(message, replies.decisionFailed(decision, index))
        }
    }

    private async setAnnouncementMode(message: InboundMessage, mode: 'formal' | 'casual'): Promise<void> {
        if (!this.options.adminHandle || message.sender !== this.options.adminHandle) {
            await this.reply(message, replies.notAuthorizedAdmin)
            return
        }
        this.options.announcer.setMode(mode)
        this.options.logger.info({ mode }, 'announcement:mode-changed')
        await this.reply(message, mode === 'formal' ? replies.formalMode : replies.casualMode)
    }

    private async reply(message: InboundMessage, text: string): Promise<void> {
        await this.options.notifier.post(message.channel, text)
    }

    private logFailure(operation: string, member: Member, error: AttendanceError): void {
        const fields = { operation, member: member.name, code: error.code }
        if (error.code === 'IO_FAILURE') {
            this.options.logger.error({ ...fields, error: errorMessage(error.cause ?? error) }, 'command:failed')
        } else {
            this.options.logger.info(fields, 'command:rejected')
        }
    }
}
