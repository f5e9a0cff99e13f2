import type { ScanDisplay } from '../bot/attendance-bot.js'
import type { Container } from '../core/container.js'
import { colors } from './ui.js'

/** Mutable state of one console session. */
export interface ConsoleSession {
    container: Container
    /** Handle the next plain-text line is sent from. */
    sender: string
    /** Channel `/say` posts into. */
    publicChannel: string
}

interface SlashCommand {
    name: string
    usage?: string
    description: string
    handler: (session: ConsoleSession, args: string) => Promise<string | null>
}

const commands: SlashCommand[] = [
    {
        name: '/help',
        description: 'Show console commands',
        handler: async () => {
            const lines = commands.map((c) => `  ${colors.bold((c.usage ?? c.name).padEnd(16))} ${c.description}`)
            return `Console commands:\n${lines.join('\n')}\n\nAnything else is sent as a direct message from the current sender.`
        },
    },
    {
        name: '/as',
        usage: '/as <handle>',
        description: 'Switch the member you are typing as',
        handler: async (session, args) => {
            const handle = args.trim()
            if (!handle) return `Currently typing as ${colors.member(session.sender || '(nobody)')}`
            const directory = await session.container.registry.load()
            const member = directory.byHandle(handle)
            session.sender = handle
            return member
                ? `Now typing as ${colors.member(member.name)} (${handle})`
                : colors.warn(`Now typing as ${handle}, who is not in the member list`)
        },
    },
    {
        name: '/say',
        usage: '/say <text>',
        description: 'Post in the public channel',
        handler: async (session, args) => {
            const text = args.trim()
            if (!text) return colors.warn('Usage: /say <text>')
            await session.container.bot.handleMessage({
                sender: session.sender,
                channel: session.publicChannel,
                channelKind: 'public',
                text,
            })
            return null
        },
    },
    {
        name: '/scan',
        usage: '/scan <card>',
        description: 'Simulate a card scan',
        handler: async (session, args) => {
            const cardId = args.trim()
            if (!cardId) return colors.warn('Usage: /scan <card>')
            return formatScan(await session.container.bot.handleScan(cardId))
        },
    },
    {
        name: '/who',
        description: 'List members in the shop',
        handler: async (session) => {
            const names = session.container.engine.presence.names()
            return names.length === 0 ? colors.dim('Nobody is in the shop.') : names.map((n) => `  ${colors.member(n)}`).join('\n')
        },
    },
    {
        name: '/status',
        description: 'Show presence and activity since startup',
        handler: async (session) => {
            const { container } = session
            const parts: string[] = []
            parts.push(`Ledger: ${container.config.ledgerPath}`)
            parts.push(`Announcements: ${container.announcer.getMode()}`)
            parts.push('')
            parts.push(container.metrics.formatStatus(container.engine.presence.names()))
            return parts.join('\n')
        },
    },
    {
        name: '/exit',
        description: 'Quit',
        handler: async () => null,
    },
]

function formatScan(display: ScanDisplay): string {
    switch (display.kind) {
        case 'unknown-card':
            return colors.warn('Unknown card')
        case 'welcome':
        case 'goodbye':
            return colors.success(display.text)
        case 'error':
            return colors.error(display.text)
    }
}

export function getSlashCommands(): ReadonlyArray<{ name: string; description: string }> {
    return commands
}

/** Readline completer: slash commands starting with what has been typed so far. */
export function completeSlashCommand(line: string): [string[], string] {
    if (!line.startsWith('/') || line.includes(' ')) return [[], line]
    const prefix = line.toLowerCase()
    const names = getSlashCommands().map((c) => c.name)
    const hits = names.filter((name) => name.startsWith(prefix))
    return [hits.length > 0 ? hits : names, line]
}

/** Returns the command output, `null` for silent commands, or `undefined` when the command is unknown. */
export async function handleSlashCommand(input: string, session: ConsoleSession): Promise<string | null | undefined> {
    const spaceIndex = input.indexOf(' ')
    const name = (spaceIndex === -1 ? input : input.slice(0, spaceIndex)).toLowerCase()
    const args = spaceIndex === -1 ? '' : input.slice(spaceIndex + 1)

    const command = commands.find((c) => c.name === name)
    if (!command) return undefined
    return command.handler(session, args)
}
