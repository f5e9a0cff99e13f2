import type { ChannelKind } from '../core/types.js'

export type Decision = 'approve' | 'disapprove'

export type BotCommand =
    | { kind: 'check-in' }
    | { kind: 'check-out' }
    | { kind: 'pending'; target: string }
    | { kind: 'approve-all'; target: string }
    | { kind: 'decide'; decision: Decision; target: string; index: number }
    | { kind: 'approval-usage' }
    | { kind: 'announcement'; mode: 'formal' | 'casual' }
    | { kind: 'shop-status' }
    | { kind: 'who-is-in' }
    | { kind: 'help' }

const WHO_IN_SHOP = ["who is in shop", "who's in shop", 'who is in the shop', "who's in the shop"]
const IS_SHOP_OPEN = ['is shop open', 'is the shop open']
const WHO_IS_IN = ['who is in', "who's in"]

function includesAny(text: string, phrases: readonly string[]): boolean {
    return phrases.some((phrase) => text.includes(phrase))
}

function parseApproval(text: string): BotCommand {
    const parts = text.split(/\s+/)
    const verb = (parts[0] ?? '').toLowerCase()
    const decision: Decision = verb === 'disapprove' ? 'disapprove' : 'approve'
    const second = (parts[1] ?? '').toLowerCase()

    if (parts.length >= 3 && second === 'pending') {
        return { kind: 'pending', target: parts.slice(2).join(' ') }
    }
    if (decision === 'approve' && parts.length >= 3 && second === 'all') {
        return { kind: 'approve-all', target: parts.slice(2).join(' ') }
    }
    const last = parts[parts.length - 1] ?? ''
    if (parts.length >= 3 && /^\d+$/.test(last)) {
        return { kind: 'decide', decision, target: parts.slice(1, -1).join(' '), index: Number(last) }
    }
    return { kind: 'approval-usage' }
}

/** Commands in public channels; everything else there is ignored. */
export function parsePublicCommand(text: string): BotCommand | null {
    const lower = text.trim().toLowerCase()
    if (includesAny(lower, WHO_IN_SHOP)) return { kind: 'who-is-in' }
    if (includesAny(lower, IS_SHOP_OPEN)) return { kind: 'shop-status' }
    return null
}

export function parseDirectCommand(text: string): BotCommand {
    const trimmed = text.trim()
    const lower = trimmed.toLowerCase()

    if (lower.includes('check in')) return { kind: 'check-in' }
    if (lower.includes('check out')) return { kind: 'check-out' }
    if (lower.startsWith('approve ') || lower.startsWith('disapprove ')) return parseApproval(trimmed)
    if (lower === 'announcement formal') return { kind: 'announcement', mode: 'formal' }
    if (lower === 'announcement casual') return { kind: 'announcement', mode: 'casual' }
    if (includesAny(lower, IS_SHOP_OPEN)) return { kind: 'shop-status' }
    if (includesAny(lower, WHO_IS_IN)) return { kind: 'who-is-in' }
    return { kind: 'help' }
}

export function parseCommand(text: string, channelKind: ChannelKind): BotCommand | null {
    return channelKind === 'public' ? parsePublicCommand(text) : parseDirectCommand(text)
}
