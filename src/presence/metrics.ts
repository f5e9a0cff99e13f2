import type { EventMap, TypedEventEmitter } from '../core/events.js'

interface MemberMetrics {
    checkIns: number
    checkOuts: number
    hours: number
}

interface ShopCounters {
    opened: number
    closed: number
    healed: number
    approved: number
    removed: number
    quarantined: number
}

/** Counts what happened since startup, for `/status`. */
export class AttendanceMetrics {
    private members = new Map<string, MemberMetrics>()
    private counters: ShopCounters = { opened: 0, closed: 0, healed: 0, approved: 0, removed: 0, quarantined: 0 }
    private cleanups: Array<() => void> = []

    constructor(private eventBus: TypedEventEmitter) {
        this.subscribe('presence:check-in', ({ member }) => {
            this.memberMetrics(member).checkIns++
        })
        this.subscribe('presence:check-out', ({ member, durationHours }) => {
            const m = this.memberMetrics(member)
            m.checkOuts++
            m.hours = Math.round((m.hours + durationHours) * 100) / 100
        })
        this.subscribe('presence:healed', () => {
            this.counters.healed++
        })
        this.subscribe('shop:opened', () => {
            this.counters.opened++
        })
        this.subscribe('shop:closed', () => {
            this.counters.closed++
        })
        this.subscribe('session:approved', ({ count }) => {
            this.counters.approved += count
        })
        this.subscribe('session:removed', () => {
            this.counters.removed++
        })
        this.subscribe('ledger:quarantined', ({ rows }) => {
            this.counters.quarantined += rows
        })
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    getCounters(): ShopCounters {
        return { ...this.counters }
    }

    getMemberMetrics(): Map<string, MemberMetrics> {
        return new Map(this.members)
    }

    formatStatus(present: readonly string[]): string {
        const c = this.counters
        const lines: string[] = []
        lines.push(`Present: ${present.length === 0 ? 'nobody' : present.join(', ')}`)
        lines.push(`Shop opened ${c.opened}x, closed ${c.closed}x`)
        lines.push(`Sessions approved: ${c.approved}, removed: ${c.removed}`)
        if (c.healed > 0) lines.push(`Presence repairs: ${c.healed}`)
        if (c.quarantined > 0) lines.push(`Quarantined ledger rows: ${c.quarantined}`)

        if (this.members.size > 0) {
            lines.push('Members:')
            for (const [name, m] of this.members) {
                lines.push(`  ${name}: ${m.checkIns} in, ${m.checkOuts} out, ${m.hours}h`)
            }
        }

        return lines.join('\n')
    }

    private subscribe<K extends keyof EventMap>(event: K, handler: (data: EventMap[K]) => void): void {
        this.eventBus.on(event, handler)
        this.cleanups.push(() => this.eventBus.off(event, handler))
    }

    private memberMetrics(name: string): MemberMetrics {
        let m = this.members.get(name)
        if (!m) {
            m = { checkIns: 0, checkOuts: 0, hours: 0 }
            this.members.set(name, m)
        }
        return m
    }
}
