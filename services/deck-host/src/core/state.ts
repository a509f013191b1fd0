// services/deck-host/src/core/state.ts
import type { DeckSessionPhase, DeckSessionStats } from '../devices/deck/types.js'

/* -------------------------------------------------------------------------- */
/*  Deck snapshot                                                              */
/* -------------------------------------------------------------------------- */

export type DeckCommandSummary = {
    id: string
    verb: string
    status: 'completed' | 'failed'
    retries: number
    endedAt: number
    error: string | null
}

export type DeckStateSnapshot = {
    phase: DeckSessionPhase
    path: string | null
    firmwareVersion: string | null

    currentMode: number
    modeName: string | null

    lastSync: {
        at: number
        commands: number
        durationMs: number
    } | null

    lastDisconnect: {
        at: number
        reason: string
        error: string | null
    } | null

    stats: DeckSessionStats

    recentCommands: DeckCommandSummary[]

    lastError: string | null
    errorHistory: Array<{ at: number; message: string }>

    updatedAt: number
}

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'starting' | 'ready' }
    deck: DeckStateSnapshot
}

const startedAt = new Date().toISOString()

export const initialDeck: DeckStateSnapshot = {
    phase: 'disconnected',
    path: null,
    firmwareVersion: null,
    currentMode: 0,
    modeName: null,
    lastSync: null,
    lastDisconnect: null,
    stats: {
        connects: 0,
        disconnects: 0,
        syncs: 0,
        commandsSent: 0,
        acksReceived: 0,
        deviceErrors: 0,
        retries: 0,
        lastRetryCount: 0,
        droppedLines: 0,
        eventsReceived: 0,
    },
    recentCommands: [],
    lastError: null,
    errorHistory: [],
    updatedAt: Date.now(),
}

let state: AppState = {
    version: 1,
    meta: { startedAt, status: 'starting' },
    deck: clone(initialDeck),
}

function clone<T>(v: T): T {
    return structuredClone(v)
}

function commit(next: AppState): void {
    state = next
}

/* -------------------------------------------------------------------------- */
/*  Public state update wrappers                                               */
/* -------------------------------------------------------------------------- */

export function getSnapshot(): AppState {
    return clone(state)
}

export function setStatus(status: AppState['meta']['status']): void {
    commit({ ...state, meta: { ...state.meta, status }, version: state.version + 1 })
}

export function setDeckSnapshot(next: DeckStateSnapshot): void {
    commit({ ...state, deck: clone(next), version: state.version + 1 })
}

export function updateDeckSnapshot(partial: Partial<DeckStateSnapshot>): void {
    setDeckSnapshot({ ...state.deck, ...partial, updatedAt: Date.now() })
}
