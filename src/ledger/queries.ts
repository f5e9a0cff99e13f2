import { type Session, isOpen, normalizeCardId, sameName } from '../core/types.js'

/** Index of the last session matching `predicate`, scanning from the end; -1 if none. */
export function findLastIndex(sessions: readonly Session[], predicate: (session: Session) => boolean): number {
    for (let i = sessions.length - 1; i >= 0; i--) {
        const session = sessions[i]
        if (session && predicate(session)) return i
    }
    return -1
}

export function findLastOpenByCard(sessions: readonly Session[], cardId: string): number {
    const card = normalizeCardId(cardId)
    if (!card) return -1
    return findLastIndex(sessions, (s) => isOpen(s) && normalizeCardId(s.cardId) === card)
}

export function findLastOpenByName(sessions: readonly Session[], memberName: string): number {
    return findLastIndex(sessions, (s) => isOpen(s) && sameName(s.memberName, memberName))
}

export interface PendingEntry {
    /** 1-based number shown to people. */
    index: number
    /** Position in the ledger sequence. */
    position: number
    session: Session
}

export function pendingFor(sessions: readonly Session[], memberName: string): PendingEntry[] {
    const entries: PendingEntry[] = []
    sessions.forEach((session, position) => {
        if (session.approval === 'pending' && sameName(session.memberName, memberName)) {
            entries.push({ index: entries.length + 1, position, session })
        }
    })
    return entries
}
