import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import {
    createLogger,
    LogChannel
} from '@deckline/logging'
import { buildDeckServiceConfigFromEnv } from './devices/deck/utils.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function start() {
    const { channel } = createLogger('deck-host')
    const logHost = channel(LogChannel.host)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        const config = buildDeckServiceConfigFromEnv(process.env)
        app = buildApp({ deck: { config } })
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logHost.info(`listening host=${HOST} port=${PORT} env=${env}`)
        logHost.info(
            `deck config path=${config.path ?? 'auto'} baud=${config.baudRate} simulator=${config.simulator.enabled} ` +
            `ackMode=${config.session.ack.mode} ackTimeoutMs=${config.session.ack.timeoutMs} ` +
            `ackRetries=${config.session.ack.maxRetries} pingIntervalMs=${config.session.keepalive.intervalMs}`
        )

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals) => {
            if (!app) process.exit(0)
            try {
                logHost.info(`received ${signal}, shutting down`)
                await app.close()
                logHost.info('deck host closed')
                process.exit(0)
            } catch (err) {
                logHost.error('error during shutdown', { err: err instanceof Error ? err.message : String(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logHost.error(`failed to start err="${err instanceof Error ? err.message : String(err)}"`)
        try {
            await app?.close()
        } catch (closeErr) {
            logHost.warn(`close after failed start err="${closeErr instanceof Error ? closeErr.message : String(closeErr)}"`)
        }
        process.exit(1)
    }
}

void start()
