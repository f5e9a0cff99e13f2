import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { PermanentError, errorMessage } from '../core/errors.js'
import { type FileSystem, NodeFileSystem } from '../core/fs.js'
import { createLogger } from '../logger/index.js'
import { CsvMemberRegistry } from '../members/registry.js'
import { LineCardReader } from '../transport/console.js'
import { doctorCommand } from './commands/doctor.js'
import { membersCommand } from './commands/members-cmd.js'
import { startREPL } from './repl.js'
import { formatError } from './ui.js'

const VERSION = '0.1.0'

interface GlobalOptions {
    ledger?: string
    members?: string
    admin?: string
    debug?: boolean
}

interface RunOptions {
    as?: string
    cardReader?: string
}

function toConfigFlags(options: GlobalOptions): Partial<Config> {
    return {
        ledgerPath: options.ledger,
        membersPath: options.members,
        adminHandle: options.admin,
        logLevel: options.debug ? 'debug' : undefined,
    }
}

async function withConfig(
    options: GlobalOptions,
    run: (config: ResolvedConfig, fs: FileSystem) => Promise<void>
): Promise<void> {
    try {
        const fs = new NodeFileSystem()
        const config = await loadConfig({ fs, cliFlags: toConfigFlags(options) })
        await run(config, fs)
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exit(1)
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('shop-presence')
        .description('Shop attendance ledger with live presence and session approvals')
        .version(VERSION)
        .option('-l, --ledger <path>', 'Attendance ledger CSV')
        .option('-m, --members <path>', 'Member registry CSV')
        .option('-a, --admin <handle>', 'Admin handle for operator alerts')
        .option('--debug', 'Enable debug logging')
        .option('--as <handle>', 'Member the console types as')
        .option('--card-reader <path>', 'Read card ids line by line from a file or device')
        .action(async (options: GlobalOptions & RunOptions) => {
            await withConfig(options, async (config) => {
                if (options.cardReader === '-') {
                    throw new PermanentError('The console already reads stdin; give the card reader a file or device path')
                }
                const container = await createContainer(config)
                const cardReader = options.cardReader ? LineCardReader.fromPath(options.cardReader) : undefined
                try {
                    await startREPL(container, { version: VERSION, sender: options.as, cardReader })
                } finally {
                    await container.shutdown()
                }
                process.exit(0)
            })
        })

    program
        .command('doctor')
        .description('Check the ledger and member files')
        .action(async () => {
            await withConfig(program.opts<GlobalOptions>(), (config, fs) => doctorCommand(config, fs))
        })

    program
        .command('members')
        .description('Print the member registry')
        .action(async () => {
            await withConfig(program.opts<GlobalOptions>(), (config, fs) =>
                membersCommand(new CsvMemberRegistry(config.membersPath, fs, createLogger({ logLevel: 'warn' })))
            )
        })

    return program
}
