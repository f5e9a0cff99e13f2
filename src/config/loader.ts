import path from 'node:path'
import { PermanentError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, ENV_PREFIX, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    try {
        const raw = await fs.readJSON(filePath)
        return ConfigSchema.parse(raw)
    } catch (error) {
        throw new PermanentError(`Invalid config file ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
}

function readEnvConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    const ledger = env[`${ENV_PREFIX}LEDGER`]
    const members = env[`${ENV_PREFIX}MEMBERS`]
    const admin = env[`${ENV_PREFIX}ADMIN`]
    const channel = env[`${ENV_PREFIX}ANNOUNCE_CHANNEL`]
    const logLevel = LogLevelSchema.safeParse(env[`${ENV_PREFIX}LOG_LEVEL`])

    if (ledger) config.ledgerPath = ledger
    if (members) config.membersPath = members
    if (admin) config.adminHandle = admin
    if (channel) config.announceChannel = channel
    if (logLevel.success) config.logLevel = logLevel.data
    return config
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        const defined = Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined))
        Object.assign(merged, defined)
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnvConfig(env), ConfigSchema.parse(cliFlags))

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        ledgerPath: path.resolve(projectDir, merged.ledgerPath ?? DEFAULT_CONFIG.ledgerPath),
        membersPath: path.resolve(projectDir, merged.membersPath ?? DEFAULT_CONFIG.membersPath),
        notifyRetry: {
            ...DEFAULT_CONFIG.notifyRetry,
            ...merged.notifyRetry,
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
