// services/deck-host/src/devices/deck/types.ts

import type { DeckErrorShape } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Deck bounds                                                               */
/* -------------------------------------------------------------------------- */

export const DECK_LIMITS = {
    maxModes: 10,
    minModes: 1,
    buttonsPerMode: 9,
    sliders: 3,
    modeNameMaxChars: 20,
    sliderRawMax: 1023,
} as const

export const FIELD_SEPARATOR = ':'
export const LINE_TERMINATOR = '\n'

/* -------------------------------------------------------------------------- */
/*  Data model                                                                */
/* -------------------------------------------------------------------------- */

export interface ButtonConfig {
    configured: boolean
    hotkey: string
    label: string
}

export interface ModeConfig {
    index: number
    name: string
    /** Always 9 slots. */
    buttons: ButtonConfig[]
}

export interface SliderAssignment {
    slider: number
    /** Raw wire value; may hold a comma-separated list of applications. */
    app: string
}

export interface DeviceState {
    numModes: number
    currentMode: number
    inSync: boolean
    modes: ModeConfig[]
    sliders: SliderAssignment[]
}

/**
 * Host-side source of truth handed to the session for a bulk sync.
 * A null button slot means "not configured".
 */
export interface DeckSnapshot {
    numModes: number
    currentMode: number
    modes: Array<{
        index: number
        name: string
        buttons: Array<{ hotkey: string; label: string } | null>
    }>
    sliders: Array<{ slider: number; apps: string[] }>
}

/* -------------------------------------------------------------------------- */
/*  Wire messages                                                              */
/* -------------------------------------------------------------------------- */

/** Untyped parse result: verb plus ordered string parameters. */
export interface Command {
    verb: string
    params: string[]
}

export type HostVerb =
    | 'BTN'
    | 'MODE'
    | 'MODE_COUNT'
    | 'MODE_NAME'
    | 'SLIDER'
    | 'CLEAR'
    | 'SYNC_START'
    | 'SYNC_END'
    | 'PING'
    | 'RESET'

export type DeviceVerb =
    | 'READY'
    | 'BTN_PRESS'
    | 'SLIDER_CHANGE'
    | 'MODE_CHANGE'
    | 'ACK'
    | 'ERROR'
    | 'PONG'

export type HostCommand =
    | { verb: 'BTN'; mode: number; button: number; hotkey: string; label: string }
    | { verb: 'MODE'; mode: number }
    | { verb: 'MODE_COUNT'; count: number }
    | { verb: 'MODE_NAME'; mode: number; name: string }
    | { verb: 'SLIDER'; slider: number; app: string }
    | { verb: 'CLEAR'; mode: number; button: number }
    | { verb: 'SYNC_START' }
    | { verb: 'SYNC_END' }
    | { verb: 'PING' }
    | { verb: 'RESET' }

/** Commands the device buffers during a sync transaction. */
export type MutatingCommand = Extract<
    HostCommand,
    { verb: 'BTN' | 'MODE' | 'MODE_COUNT' | 'MODE_NAME' | 'SLIDER' | 'CLEAR' }
>

export type DeviceMessage =
    | { verb: 'READY'; version?: string }
    | { verb: 'BTN_PRESS'; mode: number; button: number }
    | { verb: 'SLIDER_CHANGE'; slider: number; value: number }
    | { verb: 'MODE_CHANGE'; mode: number }
    | { verb: 'ACK'; token: string; params: string[] }
    | { verb: 'ERROR'; code: number; message: string }
    | { verb: 'PONG' }

/** Unsolicited runtime events; these never touch the pending-ACK slot. */
export type DeviceEventMessage = Extract<DeviceMessage, { verb: 'BTN_PRESS' | 'SLIDER_CHANGE' | 'MODE_CHANGE' }>

export const DEVICE_ERROR = {
    invalidIndex: 1,
    unknownCommand: 2,
    malformed: 3,
    notReady: 4,
    notSyncing: 5,
} as const

export type DeviceErrorCode = (typeof DEVICE_ERROR)[keyof typeof DEVICE_ERROR]

/* -------------------------------------------------------------------------- */
/*  Session model                                                              */
/* -------------------------------------------------------------------------- */

export type DeckSessionPhase =
    | 'disconnected'
    | 'awaiting-ready'
    | 'syncing'
    | 'ready'

export type DisconnectReason =
    | 'explicit-close'
    | 'io-error'
    | 'ready-timeout'
    | 'sync-failed'
    | 'keepalive-timeout'
    | 'device-reset'

export type AckMode = 'strict' | 'relaxed'

export interface PendingAck {
    verb: HostVerb
    params: string[]
    sentAt: number
    retryCount: number
    /** Ack token required to settle this slot (e.g. SYNC_COMPLETE). */
    expect?: string
}

export interface DeckSessionStats {
    connects: number
    disconnects: number
    syncs: number
    commandsSent: number
    acksReceived: number
    deviceErrors: number
    retries: number
    /** Retries spent by the most recent command exchange. */
    lastRetryCount: number
    droppedLines: number
    eventsReceived: number
}

export interface DeckSessionStatus {
    phase: DeckSessionPhase
    path: string | null
    firmwareVersion: string | null
    pending: PendingAck | null
    queueDepth: number
    stats: DeckSessionStats
    lastError: string | null
}

/* -------------------------------------------------------------------------- */
/*  Runtime command model                                                      */
/* -------------------------------------------------------------------------- */

export type DeckCommandStatus = 'completed' | 'failed'

export interface DeckCommandResult {
    id: string
    verb: HostVerb
    status: DeckCommandStatus
    startedAt: number
    endedAt: number
    retries: number
    ack?: { token: string; params: string[] }
    error?: DeckErrorShape
}

export interface DeckCommandHandle {
    id: string
    verb: HostVerb
    createdAt: number
    done: Promise<DeckCommandResult>
}

/* -------------------------------------------------------------------------- */
/*  Env-driven config                                                         */
/* -------------------------------------------------------------------------- */

export interface DeckReconnectConfig {
    enabled: boolean
    baseDelayMs: number
    maxDelayMs: number
    /** 0 = unlimited attempts */
    maxAttempts: number
}

export interface DeckSessionConfig {
    readyTimeoutMs: number
    /** Send PING after opening and accept PONG as readiness of an already-booted device. */
    readyProbe: boolean
    ack: {
        mode: AckMode
        timeoutMs: number
        maxRetries: number
    }
    keepalive: {
        /** 0 disables the periodic PING. */
        intervalMs: number
    }
    queue: {
        maxDepth: number
    }
    reconnect: DeckReconnectConfig
}

/* -------------------------------------------------------------------------- */
/*  Service -> plugin observability events                                     */
/* -------------------------------------------------------------------------- */

export interface DeckSessionEventSink {
    publish(evt: DeckSessionEvent): void
}

export type DeckSessionEvent =
    | { kind: 'deck-phase-changed'; at: number; from: DeckSessionPhase; to: DeckSessionPhase }
    | { kind: 'deck-connected'; at: number; path: string }
    | { kind: 'deck-ready-received'; at: number; version: string | null; via: 'ready' | 'pong' }
    | { kind: 'deck-sync-started'; at: number; commands: number }
    | { kind: 'deck-sync-completed'; at: number; commands: number; durationMs: number }
    | { kind: 'deck-sync-failed'; at: number; error: string }
    | { kind: 'deck-sync-superseded'; at: number; revision: number }
    | { kind: 'deck-command-sent'; at: number; line: string; attempt: number }
    | { kind: 'deck-ack-timeout'; at: number; verb: HostVerb; attempt: number; maxRetries: number }
    | { kind: 'deck-command-completed'; at: number; result: DeckCommandResult }
    | { kind: 'deck-command-failed'; at: number; result: DeckCommandResult }
    | { kind: 'deck-stray-reply'; at: number; line: string }
    | { kind: 'deck-protocol-error'; at: number; line: string; error: string }
    | { kind: 'deck-event'; at: number; event: DeviceEventMessage }
    | { kind: 'deck-disconnected'; at: number; path: string; reason: DisconnectReason; error?: string }
    | { kind: 'deck-reconnect-scheduled'; at: number; attempt: number; delayMs: number }
    | { kind: 'recoverable-error'; at: number; error: string }
    | { kind: 'fatal-error'; at: number; error: string }

/** Process-level settings read by the host plugin. */
export interface DeckServiceConfig {
    /** Explicit serial path; null = pick the first enumerated match. */
    path: string | null
    baudRate: number
    match: {
        vendorId?: string
        productId?: string
        pathRegex?: string
    }
    autoConnect: boolean
    sliderMaxRaw: number
    defaultModes: number
    simulator: {
        enabled: boolean
        firmwareVersion: string
    }
    session: DeckSessionConfig
}
