// services/deck-host/src/devices/deck/utils.ts

import {
    DECK_LIMITS,
    type AckMode,
    type DeckReconnectConfig,
    type DeckServiceConfig,
    type DeckSessionConfig,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers                                                        */
/* -------------------------------------------------------------------------- */

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const v = env[name]
    if (v == null) return undefined
    const t = String(v).trim()
    return t.length === 0 ? undefined : t
}

function parseIntSafe(v: string | undefined, def: number): number {
    if (v == null || v.trim() === '') return def
    const n = Number.parseInt(v, 10)
    return Number.isFinite(n) ? n : def
}

function parseBoolSafe(v: string | undefined, def: boolean): boolean {
    if (v == null || v.trim() === '') return def
    const t = v.trim().toLowerCase()
    if (t === '1' || t === 'true' || t === 'yes' || t === 'on') return true
    if (t === '0' || t === 'false' || t === 'no' || t === 'off') return false
    return def
}

export function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    return Math.max(min, Math.min(max, Math.floor(n)))
}

function parseAckMode(v: string | undefined): AckMode {
    return v?.trim().toLowerCase() === 'relaxed' ? 'relaxed' : 'strict'
}

/* -------------------------------------------------------------------------- */
/*  Session config                                                             */
/* -------------------------------------------------------------------------- */

export const DEFAULT_DECK_SESSION_CONFIG: DeckSessionConfig = {
    readyTimeoutMs: 5_000,
    readyProbe: false,
    ack: { mode: 'strict', timeoutMs: 2_000, maxRetries: 3 },
    keepalive: { intervalMs: 5_000 },
    queue: { maxDepth: 100 },
    reconnect: { enabled: false, baseDelayMs: 1_000, maxDelayMs: 10_000, maxAttempts: 0 },
}

export type DeckSessionConfigOverrides = {
    readyTimeoutMs?: number
    readyProbe?: boolean
    ack?: Partial<DeckSessionConfig['ack']>
    keepalive?: Partial<DeckSessionConfig['keepalive']>
    queue?: Partial<DeckSessionConfig['queue']>
    reconnect?: Partial<DeckReconnectConfig>
}

export function resolveDeckSessionConfig(overrides: DeckSessionConfigOverrides = {}): DeckSessionConfig {
    const d = DEFAULT_DECK_SESSION_CONFIG
    return {
        readyTimeoutMs: overrides.readyTimeoutMs ?? d.readyTimeoutMs,
        readyProbe: overrides.readyProbe ?? d.readyProbe,
        ack: { ...d.ack, ...overrides.ack },
        keepalive: { ...d.keepalive, ...overrides.keepalive },
        queue: { ...d.queue, ...overrides.queue },
        reconnect: { ...d.reconnect, ...overrides.reconnect },
    }
}

export function buildDeckSessionConfigFromEnv(env: NodeJS.ProcessEnv): DeckSessionConfig {
    const d = DEFAULT_DECK_SESSION_CONFIG

    return {
        readyTimeoutMs: clampInt(parseIntSafe(env.DECK_READY_TIMEOUT_MS, d.readyTimeoutMs), 100, 120_000),
        readyProbe: parseBoolSafe(env.DECK_READY_PROBE, d.readyProbe),
        ack: {
            mode: parseAckMode(env.DECK_ACK_MODE),
            timeoutMs: clampInt(parseIntSafe(env.DECK_ACK_TIMEOUT_MS, d.ack.timeoutMs), 10, 60_000),
            maxRetries: clampInt(parseIntSafe(env.DECK_ACK_RETRIES, d.ack.maxRetries), 0, 20),
        },
        keepalive: {
            intervalMs: clampInt(parseIntSafe(env.DECK_PING_INTERVAL_MS, d.keepalive.intervalMs), 0, 600_000),
        },
        queue: {
            maxDepth: clampInt(parseIntSafe(env.DECK_QUEUE_MAX_DEPTH, d.queue.maxDepth), 1, 10_000),
        },
        reconnect: {
            // the host service reconnects by default; the library does not
            enabled: parseBoolSafe(env.DECK_RECONNECT_ENABLED, true),
            baseDelayMs: clampInt(parseIntSafe(env.DECK_RECONNECT_BASE_DELAY_MS, d.reconnect.baseDelayMs), 0, 60_000),
            maxDelayMs: clampInt(parseIntSafe(env.DECK_RECONNECT_MAX_DELAY_MS, d.reconnect.maxDelayMs), 0, 300_000),
            maxAttempts: clampInt(parseIntSafe(env.DECK_RECONNECT_MAX_ATTEMPTS, d.reconnect.maxAttempts), 0, 1_000_000),
        },
    }
}

/* -------------------------------------------------------------------------- */
/*  Service config                                                             */
/* -------------------------------------------------------------------------- */

export function buildDeckServiceConfigFromEnv(env: NodeJS.ProcessEnv): DeckServiceConfig {
    return {
        path: envString(env, 'DECK_PORT') ?? null,
        baudRate: clampInt(parseIntSafe(env.DECK_BAUD, 9600), 300, 2_000_000),
        match: {
            vendorId: envString(env, 'DECK_VENDOR_ID'),
            productId: envString(env, 'DECK_PRODUCT_ID'),
            pathRegex: envString(env, 'DECK_PATH_REGEX'),
        },
        autoConnect: parseBoolSafe(env.DECK_AUTOCONNECT, true),
        sliderMaxRaw: clampInt(parseIntSafe(env.DECK_SLIDER_MAX_RAW, DECK_LIMITS.sliderRawMax), 1, 65_535),
        defaultModes: clampInt(parseIntSafe(env.DECK_DEFAULT_MODES, 4), DECK_LIMITS.minModes, DECK_LIMITS.maxModes),
        simulator: {
            enabled: parseBoolSafe(env.DECK_SIMULATOR, false),
            firmwareVersion: envString(env, 'DECK_SIMULATOR_VERSION') ?? 'sim-1.0',
        },
        session: buildDeckSessionConfigFromEnv(env),
    }
}

/* -------------------------------------------------------------------------- */
/*  Misc helpers used by the session                                           */
/* -------------------------------------------------------------------------- */

export function computeReconnectDelay(cfg: DeckReconnectConfig, attempt: number): number {
    const n = Math.max(1, attempt)
    return Math.min(cfg.baseDelayMs * 2 ** (n - 1), cfg.maxDelayMs)
}

export function sleep(ms: number): Promise<void> {
    const n = Number.isFinite(ms) ? ms : 0
    return new Promise((resolve) => setTimeout(resolve, Math.max(0, n)))
}

export function now(): number {
    return Date.now()
}

export function makeOpId(prefix: string): string {
    const ts = Date.now()
    const rand = Math.floor(Math.random() * 1_000_000)
        .toString(16)
        .padStart(5, '0')
    return `${prefix}-${ts}-${rand}`
}

/** Length in code points, not UTF-16 units. */
export function codePointLength(s: string): number {
    return Array.from(s).length
}

export function truncateCodePoints(s: string, max: number): string {
    const chars = Array.from(s)
    return chars.length <= max ? s : chars.slice(0, max).join('')
}

export function splitApps(raw: string): string[] {
    return raw
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
}

export function joinApps(apps: readonly string[]): string {
    return apps.map((s) => s.trim()).filter(Boolean).join(',')
}

export function defaultModeName(index: number): string {
    return `Mode ${index + 1}`
}
