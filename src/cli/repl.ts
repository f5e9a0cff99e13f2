import { createInterface } from 'node:readline'
import * as clack from '@clack/prompts'
import type { ScanDisplay } from '../bot/attendance-bot.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import type { CardReader } from '../transport/types.js'
import { type ConsoleSession, completeSlashCommand, handleSlashCommand } from './slash-commands.js'
import { banner, colors, formatError } from './ui.js'

export interface ReplOptions {
    version: string
    /** Initial sender; defaults to the admin handle. */
    sender?: string
    cardReader?: CardReader
}

async function pumpCardReader(reader: CardReader, container: Container): Promise<void> {
    for await (const cardId of reader.scans()) {
        let display: ScanDisplay
        try {
            display = await container.bot.handleScan(cardId)
        } catch (error) {
            container.logger.error({ cardId, error: errorMessage(error) }, 'card-reader:scan-failed')
            console.log(colors.error(`[reader] Scan failed for ${cardId}`))
            continue
        }
        if (display.kind === 'unknown-card') console.log(colors.warn(`[reader] Unknown card ${cardId}`))
        else console.log(`${colors.dim('[reader]')} ${display.text}`)
    }
}

export async function startREPL(container: Container, options: ReplOptions): Promise<void> {
    const session: ConsoleSession = {
        container,
        sender: options.sender ?? container.config.adminHandle,
        publicChannel: container.config.announceChannel,
    }

    clack.intro(banner(options.version))
    const present = container.engine.presence.names()
    console.log(colors.dim(`Ledger: ${container.config.ledgerPath}`))
    console.log(colors.dim(`In the shop: ${present.length === 0 ? 'nobody' : present.join(', ')}`))
    console.log(colors.dim('Type /help for commands, /exit to quit\n'))

    if (options.cardReader) {
        pumpCardReader(options.cardReader, container).catch((error: unknown) => {
            container.logger.error({ error: errorMessage(error) }, 'card-reader:stopped')
        })
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout, completer: completeSlashCommand })
    const prompt = () => {
        rl.setPrompt(`${colors.member(session.sender || '?')} > `)
        rl.prompt()
    }

    prompt()
    for await (const line of rl) {
        const text = line.trim()
        if (!text) {
            prompt()
            continue
        }
        if (text === '/exit') break

        try {
            if (text.startsWith('/')) {
                const result = await handleSlashCommand(text, session)
                if (result === undefined) console.log(formatError(`Unknown command: ${text.split(' ')[0] ?? text}`))
                else if (result !== null) console.log(result)
            } else if (!session.sender) {
                console.log(colors.warn('Pick a sender first: /as <handle>'))
            } else {
                await container.bot.handleMessage({
                    sender: session.sender,
                    channel: session.sender,
                    channelKind: 'direct',
                    text,
                })
            }
        } catch (error) {
            console.log(formatError(errorMessage(error)))
        }
        prompt()
    }

    rl.close()
    clack.outro(colors.dim('Goodbye!'))
}
