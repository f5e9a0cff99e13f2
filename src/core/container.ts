import { fileURLToPath } from 'node:url'
import { ApprovalAuthority } from '../approvals/authority.js'
import { Announcer, loadShopOpenMessages } from '../bot/announcer.js'
import { AttendanceBot } from '../bot/attendance-bot.js'
import { recoveredAlert, staleSessionAlert } from '../bot/messages.js'
import type { ResolvedConfig } from '../config/schema.js'
import { EscalationResolver } from '../escalation/resolver.js'
import { CsvLedgerStore } from '../ledger/store.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { CsvMemberRegistry, type MemberRegistry } from '../members/registry.js'
import { AttendanceMetrics } from '../presence/metrics.js'
import { type ReconcileReport, formatAge, reconcilePresence } from '../presence/reconcile.js'
import { SessionEngine } from '../sessions/engine.js'
import { ConsoleChatTransport, ConsoleOperatorAlerts } from '../transport/console.js'
import { Notifier } from '../transport/notifier.js'
import { sleep } from '../transport/retry.js'
import type { ChatTransport, OperatorAlerts } from '../transport/types.js'
import { type EventMap, TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'
import { SerialQueue } from './serial-queue.js'
import { type Clock, systemClock } from './types.js'

const SHOP_OPEN_MESSAGES = fileURLToPath(new URL('../../data/shop-open-messages.json', import.meta.url))

const HOUR_MS = 60 * 60 * 1000

const LOGGED_EVENTS: Array<keyof EventMap> = [
    'presence:check-in',
    'presence:check-out',
    'presence:healed',
    'shop:opened',
    'shop:closed',
    'session:approved',
    'session:removed',
    'ledger:quarantined',
]

/** Replaceable collaborators; tests swap in mocks, the CLI takes the defaults. */
export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    transport?: ChatTransport
    alerts?: OperatorAlerts
    registry?: MemberRegistry
    clock?: Clock
    random?: () => number
    wait?: (ms: number) => Promise<void>
    shopOpenMessages?: string[]
}

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    queue: SerialQueue
    store: CsvLedgerStore
    registry: MemberRegistry
    engine: SessionEngine
    resolver: EscalationResolver
    authority: ApprovalAuthority
    notifier: Notifier
    announcer: Announcer
    bot: AttendanceBot
    metrics: AttendanceMetrics
    /** What reconciliation found when the container was built. */
    startupReport: ReconcileReport
    shutdown(): Promise<void>
}

function attachEventLogger(eventBus: TypedEventEmitter, logger: Logger): () => void {
    const cleanups = LOGGED_EVENTS.map((event) => {
        const handler = (data: EventMap[typeof event]) => logger.debug({ event, ...data }, 'event')
        eventBus.on(event, handler)
        return () => eventBus.off(event, handler)
    })
    return () => {
        for (const cleanup of cleanups) cleanup()
    }
}

/**
 * Wires the application and rebuilds presence from the ledger. Resolves only
 * after reconciliation, so no command can run against an empty presence set.
 */
export async function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Promise<Container> {
    const logger = overrides.logger ?? createLogger(config)
    const fs = overrides.fs ?? new NodeFileSystem()
    const clock = overrides.clock ?? systemClock
    const eventBus = new TypedEventEmitter()
    eventBus.onListenerError = (event, error) => {
        logger.warn({ event, error: error instanceof Error ? error.message : String(error) }, 'event:listener-failed')
    }
    const detachEventLogger = attachEventLogger(eventBus, logger)

    const queue = new SerialQueue()
    const store = new CsvLedgerStore(config.ledgerPath, fs, logger, eventBus)
    const registry = overrides.registry ?? new CsvMemberRegistry(config.membersPath, fs, logger)
    const notifier = new Notifier(
        overrides.transport ?? new ConsoleChatTransport(),
        overrides.alerts ?? new ConsoleOperatorAlerts(),
        logger,
        config.notifyRetry,
        overrides.wait ?? sleep
    )
    const casualLines = overrides.shopOpenMessages ?? (await loadShopOpenMessages(fs, SHOP_OPEN_MESSAGES))
    const announcer = new Announcer(casualLines, config.announcementMode, overrides.random)

    const startupReport = reconcilePresence(await store.read(), {
        now: clock(),
        staleAfterMs: config.staleAfterHours * HOUR_MS,
    })
    const presence = startupReport.presence
    logger.info(
        { recovered: startupReport.recovered.map((m) => m.memberName), stale: startupReport.stale.length },
        'presence:reconciled'
    )
    if (startupReport.recovered.length > 0) {
        await notifier.alert(config.adminHandle, recoveredAlert(startupReport.recovered.map((m) => m.memberName)))
    }
    for (const stale of startupReport.stale) {
        logger.warn({ member: stale.memberName, cardId: stale.cardId, ageMs: stale.ageMs }, 'presence:stale-session')
        await notifier.alert(config.adminHandle, staleSessionAlert(stale.memberName, stale.checkIn, formatAge(stale.ageMs)))
    }

    const engine = new SessionEngine({ store, presence, queue, logger, eventBus, clock })
    const resolver = new EscalationResolver({
        store,
        presence: engine.presence,
        logger,
        adminHandle: config.adminHandle,
        lookbackMs: config.lookbackHours * HOUR_MS,
    })
    const authority = new ApprovalAuthority({ store, queue, logger, eventBus })
    const bot = new AttendanceBot({
        engine,
        authority,
        resolver,
        registry,
        notifier,
        announcer,
        logger,
        adminHandle: config.adminHandle,
        announceChannel: config.announceChannel,
    })
    const metrics = new AttendanceMetrics(eventBus)

    return {
        config,
        logger,
        eventBus,
        fs,
        queue,
        store,
        registry,
        engine,
        resolver,
        authority,
        notifier,
        announcer,
        bot,
        metrics,
        startupReport,

        async shutdown() {
            await queue.drain()
            metrics.dispose()
            detachEventLogger()
            eventBus.removeAll()
        },
    }
}
