import { describe, expect, it } from 'vitest'

import {
    buildDeckServiceConfigFromEnv,
    buildDeckSessionConfigFromEnv,
    clampInt,
    computeReconnectDelay,
    joinApps,
    resolveDeckSessionConfig,
    splitApps,
    truncateCodePoints,
} from './utils.js'

describe('session config from env', () => {
    it('uses defaults for an empty environment', () => {
        const cfg = buildDeckSessionConfigFromEnv({})
        expect(cfg).toEqual({
            readyTimeoutMs: 5_000,
            readyProbe: false,
            ack: { mode: 'strict', timeoutMs: 2_000, maxRetries: 3 },
            keepalive: { intervalMs: 5_000 },
            queue: { maxDepth: 100 },
            reconnect: { enabled: true, baseDelayMs: 1_000, maxDelayMs: 10_000, maxAttempts: 0 },
        })
    })

    it('parses, clamps and ignores garbage', () => {
        const cfg = buildDeckSessionConfigFromEnv({
            DECK_READY_TIMEOUT_MS: '5',
            DECK_ACK_MODE: ' Relaxed ',
            DECK_ACK_RETRIES: 'lots',
            DECK_READY_PROBE: 'yes',
            DECK_RECONNECT_ENABLED: 'off',
            DECK_QUEUE_MAX_DEPTH: '0',
        })
        expect(cfg.readyTimeoutMs).toBe(100)
        expect(cfg.ack.mode).toBe('relaxed')
        expect(cfg.ack.maxRetries).toBe(3)
        expect(cfg.readyProbe).toBe(true)
        expect(cfg.reconnect.enabled).toBe(false)
        expect(cfg.queue.maxDepth).toBe(1)
    })
})

describe('service config from env', () => {
    it('reads port selection and simulator settings', () => {
        const cfg = buildDeckServiceConfigFromEnv({
            DECK_PORT: ' /dev/ttyACM0 ',
            DECK_BAUD: '115200',
            DECK_VENDOR_ID: '2341',
            DECK_DEFAULT_MODES: '20',
            DECK_SIMULATOR: 'true',
        })
        expect(cfg.path).toBe('/dev/ttyACM0')
        expect(cfg.baudRate).toBe(115_200)
        expect(cfg.match).toEqual({ vendorId: '2341', productId: undefined, pathRegex: undefined })
        expect(cfg.defaultModes).toBe(10)
        expect(cfg.autoConnect).toBe(true)
        expect(cfg.simulator).toEqual({ enabled: true, firmwareVersion: 'sim-1.0' })
        expect(cfg.sliderMaxRaw).toBe(1023)
    })

    it('treats a blank port as unset', () => {
        expect(buildDeckServiceConfigFromEnv({ DECK_PORT: '  ' }).path).toBeNull()
    })
})

describe('resolveDeckSessionConfig', () => {
    it('merges partial overrides over the library defaults', () => {
        const cfg = resolveDeckSessionConfig({ ack: { timeoutMs: 50 }, reconnect: { enabled: true } })
        expect(cfg.ack).toEqual({ mode: 'strict', timeoutMs: 50, maxRetries: 3 })
        expect(cfg.reconnect).toEqual({ enabled: true, baseDelayMs: 1_000, maxDelayMs: 10_000, maxAttempts: 0 })
    })
})

describe('helpers', () => {
    it('doubles the reconnect delay up to the cap', () => {
        const rc = { enabled: true, baseDelayMs: 1_000, maxDelayMs: 10_000, maxAttempts: 0 }
        expect([1, 2, 3, 4, 5].map((n) => computeReconnectDelay(rc, n))).toEqual([1_000, 2_000, 4_000, 8_000, 10_000])
        expect(computeReconnectDelay(rc, 0)).toBe(1_000)
    })

    it('clamps integers', () => {
        expect(clampInt(7.9, 0, 10)).toBe(7)
        expect(clampInt(Number.NaN, 3, 10)).toBe(3)
        expect(clampInt(-4, 0, 10)).toBe(0)
    })

    it('splits and joins application lists', () => {
        expect(splitApps(' spotify , ,vlc ')).toEqual(['spotify', 'vlc'])
        expect(joinApps(['spotify ', '', ' vlc'])).toBe('spotify,vlc')
        expect(splitApps('')).toEqual([])
    })

    it('truncates by code point', () => {
        expect(truncateCodePoints('🎵🎵🎵', 2)).toBe('🎵🎵')
        expect(truncateCodePoints('abc', 5)).toBe('abc')
    })
})
