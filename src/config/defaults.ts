import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    ledgerPath: 'attendance.csv',
    membersPath: 'members.csv',
    adminHandle: '',
    announceChannel: '#shop-status',
    staleAfterHours: 12,
    lookbackHours: 24,
    announcementMode: 'casual',
    logLevel: 'info',
    notifyRetry: { maxRetries: 3, baseDelay: 500, maxDelay: 10000 },
}

export const CONFIG_DIR = path.join(process.env.HOME ?? '~', '.config', 'shop-presence')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.shop-presence'
export const LOCAL_CONFIG_FILE = path.join(LOCAL_CONFIG_DIR, 'config.json')

export const ENV_PREFIX = 'SHOP_PRESENCE_'
