import type { Member } from '../../core/types.js'
import type { MemberRegistry } from '../../members/registry.js'
import { colors } from '../ui.js'

const HEADERS = ['Handle', 'Name', 'Card', 'Rank', 'Lead'] as const

export function formatMemberTable(members: readonly Member[]): string {
    const rows = [...members]
        .sort((a, b) => a.seniority - b.seniority || a.name.localeCompare(b.name))
        .map((m) => [m.handle, m.name, m.cardId, String(m.seniority), m.lead ?? '-'])

    const widths = HEADERS.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)))
    const line = (cells: readonly string[]) =>
        cells
            .map((cell, i) => cell.padEnd(widths[i] ?? 0))
            .join('  ')
            .trimEnd()

    return [line(HEADERS), ...rows.map(line)].join('\n')
}

export async function membersCommand(registry: MemberRegistry): Promise<void> {
    const directory = await registry.load()
    if (directory.size === 0) {
        console.log(colors.warn('No members registered.'))
        return
    }
    const [header = '', ...rows] = formatMemberTable(directory.all()).split('\n')
    console.log(colors.bold(header))
    for (const row of rows) console.log(row)
}
