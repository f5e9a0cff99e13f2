import { normalizeName } from '../core/types.js'

/**
 * Who is in the shop right now, keyed by member name. Never persisted: it is
 * rebuilt from the ledger by `reconcilePresence` and mutated only by the
 * session engine.
 */
export class LivePresenceSet {
    private members = new Map<string, string>()

    constructor(names: Iterable<string> = []) {
        for (const name of names) this.add(name)
    }

    has(name: string): boolean {
        return this.members.has(normalizeName(name))
    }

    add(name: string): void {
        this.members.set(normalizeName(name), name.trim())
    }

    /** Returns whether the member was present. */
    remove(name: string): boolean {
        return this.members.delete(normalizeName(name))
    }

    get size(): number {
        return this.members.size
    }

    isEmpty(): boolean {
        return this.members.size === 0
    }

    /** Display names, sorted. */
    names(): string[] {
        return [...this.members.values()].sort((a, b) => a.localeCompare(b))
    }
}

/** What code outside the session engine may see of the presence set. */
export type PresenceView = Pick<LivePresenceSet, 'has' | 'size' | 'isEmpty' | 'names'>
