export type ApprovalState = 'pending' | 'approved'

export const SENIORITY_MOST_SENIOR = 1
export const SENIORITY_LEAST_SENIOR = 5

export interface Member {
    handle: string
    name: string
    cardId: string
    /** 1 (most senior) to 5 (least senior). */
    seniority: number
    lead: string | null
}

export interface Session {
    cardId: string
    memberName: string
    checkIn: Date
    /** `null` while the session is open. */
    checkOut: Date | null
    durationHours: number
    approval: ApprovalState
}

export type ChannelKind = 'direct' | 'public'

export interface InboundMessage {
    sender: string
    channel: string
    channelKind: ChannelKind
    text: string
}

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export function isOpen(session: Session): boolean {
    return session.checkOut === null
}

export function normalizeName(name: string): string {
    return name.trim().toLowerCase()
}

export function sameName(a: string, b: string): boolean {
    return normalizeName(a) === normalizeName(b)
}

export function normalizeCardId(cardId: string): string {
    return cardId.trim().toUpperCase()
}

/** Orders members most senior first, then by name. */
export function compareSeniority(a: Member, b: Member): number {
    if (a.seniority !== b.seniority) return a.seniority - b.seniority
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}

export function mostSenior(members: Iterable<Member>): Member | null {
    let best: Member | null = null
    for (const member of members) {
        if (best === null || compareSeniority(member, best) < 0) best = member
    }
    return best
}
