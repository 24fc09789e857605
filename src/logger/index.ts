import { pino } from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: 'tally',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'tally', level: config.logLevel }, pino.destination(2))
}
