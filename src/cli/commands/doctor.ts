import type { ResolvedConfig } from '../../config/schema.js'
import { errorMessage } from '../../core/errors.js'
import type { FileSystem } from '../../core/fs.js'
import { parseLedger } from '../../ledger/codec.js'
import { quarantinePathFor } from '../../ledger/store.js'
import { parseMembers } from '../../members/registry.js'
import { formatAge, reconcilePresence } from '../../presence/reconcile.js'
import { colors } from '../ui.js'

export interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

const HOUR_MS = 60 * 60 * 1000

async function checkLedger(config: ResolvedConfig, fs: FileSystem, now: Date): Promise<Check[]> {
    if (!(await fs.exists(config.ledgerPath))) {
        return [{ name: 'Ledger', status: 'warn', message: `Not found, created on first start (${config.ledgerPath})` }]
    }

    let text: string
    try {
        text = await fs.readText(config.ledgerPath)
    } catch (error) {
        return [{ name: 'Ledger', status: 'error', message: errorMessage(error) }]
    }

    const checks: Check[] = []
    const { sessions, rejected } = parseLedger(text)
    checks.push({ name: 'Ledger', status: 'ok', message: `${sessions.length} session(s)` })
    if (rejected.length > 0) {
        const lines = rejected.map((row) => row.line).join(', ')
        checks.push({ name: 'Malformed rows', status: 'warn', message: `line(s) ${lines}, quarantined on next write` })
    }

    const { recovered, stale } = reconcilePresence(sessions, { now, staleAfterMs: config.staleAfterHours * HOUR_MS })
    checks.push({
        name: 'Open sessions',
        status: 'ok',
        message: recovered.length === 0 ? 'none' : recovered.map((m) => m.memberName).join(', '),
    })
    for (const member of stale) {
        checks.push({ name: 'Stale session', status: 'warn', message: `${member.memberName}, open for ${formatAge(member.ageMs)}` })
    }

    if (await fs.exists(quarantinePathFor(config.ledgerPath))) {
        checks.push({ name: 'Quarantine', status: 'warn', message: `Review ${quarantinePathFor(config.ledgerPath)}` })
    }
    return checks
}

async function checkMembers(config: ResolvedConfig, fs: FileSystem): Promise<Check> {
    if (!(await fs.exists(config.membersPath))) {
        return { name: 'Members', status: 'error', message: `Not found (${config.membersPath})` }
    }
    try {
        const members = parseMembers(await fs.readText(config.membersPath))
        if (members.length === 0) return { name: 'Members', status: 'warn', message: 'No members listed' }
        return { name: 'Members', status: 'ok', message: `${members.length} member(s)` }
    } catch (error) {
        return { name: 'Members', status: 'error', message: errorMessage(error) }
    }
}

export async function runDoctorChecks(config: ResolvedConfig, fs: FileSystem, now: Date = new Date()): Promise<Check[]> {
    const checks: Check[] = []

    const [major = 0] = process.versions.node.split('.').map(Number)
    checks.push({
        name: 'Node.js',
        status: major >= 20 ? 'ok' : 'error',
        message: `v${process.versions.node}`,
    })

    checks.push(...(await checkLedger(config, fs, now)))
    checks.push(await checkMembers(config, fs))

    checks.push(
        config.adminHandle
            ? { name: 'Admin', status: 'ok', message: config.adminHandle }
            : { name: 'Admin', status: 'warn', message: 'Not configured, operator alerts are dropped' }
    )
    return checks
}

export async function doctorCommand(config: ResolvedConfig, fs: FileSystem): Promise<void> {
    console.log(colors.brand('shop-presence doctor\n'))

    const checks = await runDoctorChecks(config, fs)
    for (const check of checks) {
        const icon =
            check.status === 'ok' ? colors.success('✓') : check.status === 'warn' ? colors.warn('!') : colors.error('✗')
        console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`)
    }

    const errors = checks.filter((c) => c.status === 'error')
    console.log('')
    if (errors.length === 0) {
        console.log(colors.success('All good!'))
    } else {
        console.log(colors.warn(`${errors.length} problem(s) found.`))
        process.exitCode = 1
    }
}
