import pino from 'pino'
import type { LogLevel } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: { logLevel: LogLevel }): Logger {
    return pino({
        name: 'shop-presence',
        level: config.logLevel,
        transport: config.logLevel === 'debug' || config.logLevel === 'trace'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
    })
}
