import { pino, type Logger, type LoggerOptions, type LogFn } from 'pino'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    type LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, isLogChannel } from './channels.js'

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    let base: Logger

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } },
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: Parameters<LogFn>, method: LogFn): void {
                let ch: LogChannel | undefined

                const first: unknown = args[0]
                if (typeof first === 'object' && first !== null && 'channel' in first) {
                    const maybe = first.channel
                    if (typeof maybe === 'string' && isLogChannel(maybe)) ch = maybe
                }

                if (ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    }
                }

                Reflect.apply(method, base, args)
            }
        },
        // pino-pretty runs as a transport target; keep these fields out of the output
        transport: PRETTY
            ? {
                target: 'pino-pretty',
                options: {
                    translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
                    colorize: true,
                    singleLine: false,
                    ignore: 'pid,hostname,service,channel'
                }
            }
            : undefined
    }

    base = pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => {
            base.debug(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'debug', msg)
        },
        info: (msg: string, extra?: Record<string, unknown>): void => {
            base.info(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'info', msg)
        },
        warn: (msg: string, extra?: Record<string, unknown>): void => {
            base.warn(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'warn', msg)
        },
        error: (msg: string, extra?: Record<string, unknown>): void => {
            base.error(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'error', msg)
        },
        fatal: (msg: string, extra?: Record<string, unknown>): void => {
            base.fatal(extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, 'fatal', msg)
        }
    })

    return { base, channel }
}
