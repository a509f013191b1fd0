// packages/logging/src/types.ts
import type { Logger } from 'pino'

export enum LogChannel {
    host = 'host',
    app = 'app',
    request = 'request',
    serial = 'serial',
    session = 'session',
    sync = 'sync',
    device = 'device',
    simulator = 'simulator',
    dispatcher = 'dispatcher',
    message_bus = 'message-bus',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    /** Newest `n` entries, oldest first, optionally from one channel. */
    getLatest: (n: number, channel?: LogChannel) => ClientLog[]
    readonly size: number
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: Logger
    channel: (ch: LogChannel) => ChannelLogger
}
