import { z } from 'zod'
import type { AnnouncementMode } from '../config/schema.js'
import type { FileSystem } from '../core/fs.js'
import { FORMAL_OPEN_MESSAGE } from './messages.js'

const OpenMessagesSchema = z.array(z.string().min(1)).min(1)

export async function loadShopOpenMessages(fs: FileSystem, path: string): Promise<string[]> {
    return OpenMessagesSchema.parse(await fs.readJSON(path))
}

/** Picks the line that opens the shop: a random casual one or the formal one. */
export class Announcer {
    constructor(
        private casualLines: readonly string[],
        private mode: AnnouncementMode = 'casual',
        private random: () => number = Math.random
    ) {}

    getMode(): AnnouncementMode {
        return this.mode
    }

    setMode(mode: AnnouncementMode): void {
        this.mode = mode
    }

    openingLine(): string {
        if (this.mode === 'formal' || this.casualLines.length === 0) return FORMAL_OPEN_MESSAGE
        const index = Math.min(Math.floor(this.random() * this.casualLines.length), this.casualLines.length - 1)
        const line = this.casualLines[index] ?? FORMAL_OPEN_MESSAGE
        return /[.!?]$/.test(line) ? line : `${line}.`
    }

    shopOpened(name: string): string {
        return `${this.openingLine()} ${name} checked in.`
    }
}
