import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

// stdout carries command output and --json envelopes, so logs go to stderr.
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const pretty = config.logLevel === 'debug' || config.logLevel === 'trace'
    if (pretty) {
        return pino({
            name: 'term-agent',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'term-agent', level: config.logLevel }, pino.destination(2))
}
