import { type Session, isOpen, normalizeName } from '../core/types.js'
import { LivePresenceSet } from './live-set.js'

export interface RecoveredMember {
    memberName: string
    cardId: string
    checkIn: Date
}

export interface StaleMember extends RecoveredMember {
    ageMs: number
}

export interface ReconcileReport {
    presence: LivePresenceSet
    recovered: RecoveredMember[]
    stale: StaleMember[]
}

export interface ReconcileOptions {
    now: Date
    staleAfterMs: number
}

/**
 * Rebuilds live presence from the ledger. Only each member's most recent open
 * session counts; one older than `staleAfterMs` is reported and left open in
 * the ledger instead of marking the member present.
 */
export function reconcilePresence(sessions: readonly Session[], options: ReconcileOptions): ReconcileReport {
    const latestOpen = new Map<string, Session>()
    for (const session of sessions) {
        // later rows overwrite earlier ones
        if (isOpen(session)) latestOpen.set(normalizeName(session.memberName), session)
    }

    const presence = new LivePresenceSet()
    const recovered: RecoveredMember[] = []
    const stale: StaleMember[] = []

    for (const session of latestOpen.values()) {
        const entry = { memberName: session.memberName, cardId: session.cardId, checkIn: session.checkIn }
        const ageMs = options.now.getTime() - session.checkIn.getTime()
        if (ageMs > options.staleAfterMs) {
            stale.push({ ...entry, ageMs })
        } else {
            presence.add(session.memberName)
            recovered.push(entry)
        }
    }

    return { presence, recovered, stale }
}

export function formatAge(ageMs: number): string {
    const totalMinutes = Math.floor(ageMs / 60000)
    const hours = Math.floor(totalMinutes / 60)
    const minutes = totalMinutes % 60
    return `${hours}h ${String(minutes).padStart(2, '0')}m`
}
