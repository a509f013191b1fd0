import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    isLogChannel,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@deckline/logging'

import deckPlugin, { type DeckPluginOptions } from './plugins/deck.js'
import deckRoutes from './routes/deck.js'
import { getSnapshot } from './core/state.js'

interface LogsQuery {
    n?: string
    channel?: string
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    deck?: DeckPluginOptions
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_LOG_HEADERS =
    String(process.env.REQUEST_LOG_HEADERS ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

const LOGS_DEFAULT = 200

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('deck-host', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    const sampledIds = new Set<string>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    // CORS
    void app.register(cors, { origin: true })

    // Deck session + routes
    void app.register(deckPlugin, opts.deck ?? {})
    void app.register(deckRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        sampledIds.add(req.id)
        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            const detail: Record<string, unknown> = { id: req.id, ip: req.ip }
            if (REQUEST_LOG_HEADERS) {
                const { host, 'user-agent': ua, accept, referer } = req.headers
                detail.headers = { host, 'user-agent': ua, accept, referer }
            }
            logReq.debug('request detail', detail)
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        if (!sampledIds.has(req.id)) return
        sampledIds.delete(req.id)

        const start = startedAt.get(req.id)
        if (start !== undefined) startedAt.delete(req.id)
        const ms = start !== undefined ? Date.now() - start : undefined

        logReq.info(`${req.method} ${req.url} → ${reply.statusCode}${ms !== undefined ? ` (${ms} ms)` : ''}`)

        if (REQUEST_VERBOSE) {
            const outLen = reply.getHeader('content-length') ?? null
            logReq.debug('response detail', { id: req.id, bytesOut: outLen, ms })
        }
    })
    // ---------------------------------------------------

    // Client log buffer
    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req, reply) => {
        const n = Number(req.query.n ?? LOGS_DEFAULT)
        const count = Number.isFinite(n) && n > 0 ? Math.floor(n) : LOGS_DEFAULT
        const { channel } = req.query
        if (channel === undefined) return { ok: true, logs: clientBuf.getLatest(count) }
        if (!isLogChannel(channel)) {
            reply.code(400)
            return { ok: false, error: `unknown log channel ${channel}` }
        }
        return { ok: true, logs: clientBuf.getLatest(count, channel) }
    })

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async (_req, reply) => {
        const phase = app.deck.session.currentPhase
        const ready = phase === 'ready'
        if (!ready) reply.code(503)
        return { ready, phase }
    })

    app.get('/version', async () => ({ name: 'deckline-host', version: '0.1.0' }))

    app.get('/api/state', async () => getSnapshot())

    logApp.info('deck host app built')
    return app
}
