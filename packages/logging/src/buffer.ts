import { type ClientLog, type ClientLogBuffer, type LogChannel } from './types.js'

const DEFAULT_LIMIT = 500

/** Bounded in-memory tail of channel logs, served to HTTP clients. */
export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)): ClientLogBuffer {
    const cap = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_LIMIT
    const entries: ClientLog[] = []

    return {
        push(log: ClientLog): void {
            entries.push(log)
            if (entries.length > cap) entries.splice(0, entries.length - cap)
        },

        getLatest(n: number, channel?: LogChannel): ClientLog[] {
            if (n <= 0) return []
            const source = channel ? entries.filter((e) => e.channel === channel) : entries
            return source.slice(-n)
        },

        get size(): number {
            return entries.length
        },
    }
}
