export type EventMap = {
    'presence:check-in': { member: string; cardId: string; at: Date }
    'presence:check-out': { member: string; cardId: string; at: Date; durationHours: number }
    'presence:healed': { member: string }
    'shop:opened': { member: string; at: Date }
    'shop:closed': { member: string; at: Date }
    'session:approved': { member: string; count: number; approver: string }
    'session:removed': { member: string; approver: string }
    'ledger:quarantined': { path: string; rows: number }
}

type EventHandler<T> = (data: T) => void

type HandlerRegistry = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerRegistry = {}

    /** Listener failures are reported here and never reach the emitter. */
    onListenerError?: (event: keyof EventMap, error: unknown) => void

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlersFor(event).add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlersFor(event).delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        for (const handler of this.handlersFor(event)) {
            try {
                handler(data)
            } catch (error) {
                this.onListenerError?.(event, error)
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }

    private handlersFor<K extends keyof EventMap>(event: K): Set<EventHandler<EventMap[K]>> {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        const existing = handlers[event]
        if (existing) return existing
        const created = new Set<EventHandler<EventMap[K]>>()
        handlers[event] = created
        return created
    }
}
