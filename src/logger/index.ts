import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const verbose = config.logLevel === 'debug' || config.logLevel === 'trace'
    return pino({
        name: 'recourse',
        level: config.logLevel,
        transport: verbose ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    })
}
