import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import { colors } from '../cli/ui.js'
import type { CardReader, ChatTransport, OperatorAlerts } from './types.js'

type Writer = (line: string) => void

/** Prints outbound chat to the terminal. */
export class ConsoleChatTransport implements ChatTransport {
    constructor(private write: Writer = (line) => console.log(line)) {}

    async post(target: string, text: string): Promise<void> {
        const [first = '', ...rest] = text.split('\n')
        this.write(`${colors.target(target)} ${first}`)
        for (const line of rest) this.write(`${' '.repeat(target.length + 3)}${line}`)
    }
}

export class ConsoleOperatorAlerts implements OperatorAlerts {
    constructor(private write: Writer = (line) => console.error(line)) {}

    async notify(adminHandle: string, text: string): Promise<void> {
        this.write(`${colors.warn('[operator]')} ${colors.target(adminHandle)} ${text}`)
    }
}

/**
 * Keyboard-wedge readers type the card id followed by Enter; this reads one id
 * per line from a stream (stdin, a FIFO or a device file).
 */
export class LineCardReader implements CardReader {
    constructor(private input: Readable) {}

    static fromPath(path: string): LineCardReader {
        return new LineCardReader(path === '-' ? process.stdin : createReadStream(path, { encoding: 'utf8' }))
    }

    async *scans(): AsyncIterable<string> {
        const lines = createInterface({ input: this.input, crlfDelay: Infinity })
        for await (const line of lines) {
            const cardId = line.trim()
            if (cardId) yield cardId
        }
    }
}
