import pino from 'pino'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import type { Member, Session } from '../../src/core/types.js'
import type { Logger } from '../../src/logger/index.js'
import { MemberDirectory, type MemberRegistry } from '../../src/members/registry.js'
import type { ChatTransport, OperatorAlerts } from '../../src/transport/types.js'

export const LEDGER = '/shop/attendance.csv'
export const MEMBERS = '/shop/members.csv'
export const HEADER = 'card_uid,member_name,check_in,check_out,hours,approved'

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}

/** A clock tests move by hand. */
export class ManualClock {
    private current: Date

    constructor(start: string | Date) {
        this.current = new Date(start)
    }

    readonly now = (): Date => new Date(this.current)

    set(time: string | Date): void {
        this.current = new Date(time)
    }

    advanceMinutes(minutes: number): void {
        this.current = new Date(this.current.getTime() + minutes * 60_000)
    }
}

export function member(overrides: Partial<Member> & Pick<Member, 'handle' | 'name'>): Member {
    return { cardId: '', seniority: 5, lead: null, ...overrides }
}

export function session(overrides: Partial<Session> & Pick<Session, 'memberName' | 'checkIn'>): Session {
    return { cardId: '', checkOut: null, durationHours: 0, approval: 'pending', ...overrides }
}

export const alice = member({ handle: '@alice', name: 'Alice', cardId: 'A1', seniority: 1 })
export const bob = member({ handle: '@bob', name: 'Bob', cardId: 'B2', seniority: 2, lead: '@alice' })
export const carol = member({ handle: '@carol', name: 'Carol', cardId: 'C3', seniority: 3, lead: '@dave' })
export const dave = member({ handle: '@dave', name: 'Dave', cardId: 'D4', seniority: 3 })
export const erin = member({ handle: '@erin', name: 'Erin', cardId: 'E5', seniority: 4 })

export class InMemoryRegistry implements MemberRegistry {
    loads = 0

    constructor(public members: Member[] = [alice, bob, carol, dave, erin]) {}

    async load(): Promise<MemberDirectory> {
        this.loads++
        return new MemberDirectory(this.members)
    }
}

export function directoryOf(...members: Member[]): MemberDirectory {
    return new MemberDirectory(members.length > 0 ? members : [alice, bob, carol, dave, erin])
}

export interface Posted {
    target: string
    text: string
}

export class RecordingTransport implements ChatTransport {
    posted: Posted[] = []
    failuresLeft = 0
    failure: Error = new Error('transport down')

    async post(target: string, text: string): Promise<void> {
        if (this.failuresLeft > 0) {
            this.failuresLeft--
            throw this.failure
        }
        this.posted.push({ target, text })
    }

    to(target: string): string[] {
        return this.posted.filter((p) => p.target === target).map((p) => p.text)
    }

    clear(): void {
        this.posted = []
    }
}

export class RecordingAlerts implements OperatorAlerts {
    alerts: Posted[] = []

    async notify(adminHandle: string, text: string): Promise<void> {
        this.alerts.push({ target: adminHandle, text })
    }
}

export function testConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        ...DEFAULT_CONFIG,
        ledgerPath: LEDGER,
        membersPath: MEMBERS,
        adminHandle: '@admin',
        logLevel: 'silent',
        notifyRetry: { maxRetries: 2, baseDelay: 1, maxDelay: 1 },
        projectDir: '/shop',
        configDir: '/home/test/.config/shop-presence',
        ...overrides,
    }
}

export const noWait = async (_ms: number): Promise<void> => {}
