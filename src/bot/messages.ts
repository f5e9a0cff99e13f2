import type { Session } from '../core/types.js'
import type { PendingEntry } from '../ledger/queries.js'

function pad(value: number): string {
    return String(value).padStart(2, '0')
}

/** Local wall-clock time, `HH:MM:SS`. */
export function formatClock(date: Date): string {
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

/** Local date and time, `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${formatClock(date)}`
}

export const FORMAL_OPEN_MESSAGE = 'The shop is now open.'

export const HELP_TEXT = [
    'Available commands:',
    '- `check in` / `check out`',
    '- `who is in` / `is shop open`',
    '- `approve pending <name>`',
    '- `approve <name> <number>`',
    '- `approve all <name>`',
    '- `disapprove <name> <number>`',
    '- `announcement formal` / `announcement casual` (admin only)',
].join('\n')

export const APPROVAL_USAGE = [
    'Usage:',
    '- `approve pending <name>`',
    '- `approve <name> <number>`',
    '- `approve all <name>`',
    '- `disapprove <name> <number>`',
].join('\n')

export const replies = {
    notRegistered: 'You are not registered in the member list.',
    membersUnavailable: 'Failed to read the member list. Please try again or contact an admin.',
    checkedIn: (at: Date) => `Checked in at ${formatClock(at)}.`,
    alreadyCheckedIn: (since: Date | null) =>
        since
            ? `You are already checked in since ${formatDateTime(since)}. Please \`check out\` first.`
            : 'You are already checked in. Please `check out` first.',
    checkInFailed: 'Failed to record check-in. Please try again or contact an admin.',
    checkedOut: (at: Date) => `Checked out at ${formatClock(at)}.`,
    notCheckedIn: "You're not currently checked in.",
    inconsistent:
        'Inconsistency detected: you were marked as checked in but no open session was found in the ledger. ' +
        'Your live state has been cleared - please check in again.',
    checkOutFailed: 'Failed to record check-out. Please try again or contact an admin.',
    notAuthorizedPending: "You're not authorized to view pending sessions for that member.",
    notAuthorizedApproveAll: "You're not authorized to approve hours for that member.",
    notAuthorizedDecide: "You're not authorized to approve/disapprove sessions for that member.",
    notAuthorizedAdmin: "You're not authorized to use this command.",
    noPending: (name: string) => `No pending sessions for ${name}.`,
    pendingFailed: 'Failed to read the ledger. Please try again or contact an admin.',
    approvedAll: (count: number, name: string) => `Approved ${count} session(s) for ${name}.`,
    approveAllFailed: (name: string) => `Failed to approve sessions for ${name}.`,
    sessionNumberTooLow: 'Session number must be 1 or greater.',
    invalidIndex: (name: string, pending: number) =>
        `Invalid session number - ${name} has ${pending} pending session(s).`,
    sessionStillOpen: (index: number, name: string) =>
        `Session #${index} for ${name} is still open - it can be reviewed after check-out.`,
    approved: (index: number, name: string) => `Approved session #${index} for ${name}.`,
    removed: (index: number, name: string) => `Removed session #${index} for ${name}.`,
    decisionFailed: (decision: 'approve' | 'disapprove', index: number) =>
        `Failed to ${decision === 'approve' ? 'approve' : 'remove'} session #${index}.`,
    formalMode: `Formal mode enabled. All future shop-open announcements will use:\n"${FORMAL_OPEN_MESSAGE}"`,
    casualMode: 'Casual mode restored. Shop-open announcements will use random messages again.',
}

export function shopStatus(present: readonly string[]): string {
    if (present.length === 0) return 'No, the shop is currently closed.'
    return `Yes, the shop is open. Currently checked in:\n- ${present.join('\n- ')}`
}

export function whoIsIn(present: readonly string[]): string {
    if (present.length === 0) return 'No one is currently checked in.'
    return `Currently checked in:\n- ${present.join('\n- ')}`
}

export function whoIsInShop(present: readonly string[]): string {
    if (present.length === 0) return 'The shop is currently empty.'
    return `Currently in shop: ${present.join(', ')}`
}

export function checkoutNotice(name: string, hours: number): string {
    return [
        `${name} checked out. Hours worked: ${hours}`,
        `- \`approve pending ${name}\` to view pending sessions`,
        `- \`approve ${name} <number>\` to approve a specific session`,
        `- \`disapprove ${name} <number>\` to remove a specific session`,
    ].join('\n')
}

export function shopClosedNotice(name: string): string {
    return `Shop closed. Last person out: ${name}`
}

function describeSession(session: Session): string {
    const checkOut = session.checkOut ? formatDateTime(session.checkOut) : '(open)'
    return `check_in: ${formatDateTime(session.checkIn)}  check_out: ${checkOut}  hours: ${session.durationHours}`
}

export function pendingList(name: string, entries: readonly PendingEntry[]): string {
    const lines = [`Pending sessions for ${name}:`]
    for (const entry of entries) lines.push(`${entry.index}. ${describeSession(entry.session)}`)
    lines.push('', `- \`approve ${name} <number>\` to approve`, `- \`disapprove ${name} <number>\` to remove`)
    return lines.join('\n')
}

export function staleSessionAlert(name: string, checkIn: Date, age: string): string {
    return (
        `Stale open session: ${name} checked in at ${formatDateTime(checkIn)} (${age} ago). ` +
        'They were not restored as present; close or remove the session in the ledger.'
    )
}

export function recoveredAlert(names: readonly string[]): string {
    return `Restored presence after restart: ${names.join(', ')}`
}
