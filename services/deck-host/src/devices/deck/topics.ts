// services/deck-host/src/devices/deck/topics.ts

import type { MessageBus } from '../../core/events/MessageBus.js'

export const DECK_TOPICS = {
    hotkeyTrigger: 'deck.hotkey.trigger',
    volumeUpdate: 'deck.volume.update',
    uiRefresh: 'deck.ui.refresh',
} as const

export const DECK_SCHEMA_VERSION = 1

/** Patterns the bus drops unless the payload validates. */
export const DECK_SAFETY_CRITICAL_TOPICS = ['deck.hotkey.*']

export interface HotkeyTriggerPayload {
    mode: number
    button: number
    hotkey: string
    label: string
}

export interface VolumeUpdatePayload {
    slider: number
    raw: number
    /** raw / max, clamped to [0, 1] */
    volume: number
    apps: string[]
}

export type UiRefreshReason = 'mode-change' | 'sync-complete' | 'config-replaced'

export interface UiRefreshPayload {
    reason: UiRefreshReason
    mode: number
    modeName: string
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isIndex(v: unknown): v is number {
    return typeof v === 'number' && Number.isInteger(v) && v >= 0
}

export function isHotkeyTriggerPayload(v: unknown): v is HotkeyTriggerPayload {
    return (
        isRecord(v) &&
        isIndex(v.mode) &&
        isIndex(v.button) &&
        typeof v.hotkey === 'string' &&
        v.hotkey.length > 0 &&
        typeof v.label === 'string'
    )
}

export function isVolumeUpdatePayload(v: unknown): v is VolumeUpdatePayload {
    return (
        isRecord(v) &&
        isIndex(v.slider) &&
        typeof v.raw === 'number' &&
        typeof v.volume === 'number' &&
        v.volume >= 0 &&
        v.volume <= 1 &&
        Array.isArray(v.apps) &&
        v.apps.every((a) => typeof a === 'string')
    )
}

export function isUiRefreshPayload(v: unknown): v is UiRefreshPayload {
    return (
        isRecord(v) &&
        (v.reason === 'mode-change' || v.reason === 'sync-complete' || v.reason === 'config-replaced') &&
        isIndex(v.mode) &&
        typeof v.modeName === 'string'
    )
}

export function registerDeckSchemas(bus: MessageBus): void {
    bus.registerSchema(DECK_TOPICS.hotkeyTrigger, DECK_SCHEMA_VERSION, isHotkeyTriggerPayload)
    bus.registerSchema(DECK_TOPICS.volumeUpdate, DECK_SCHEMA_VERSION, isVolumeUpdatePayload)
    bus.registerSchema(DECK_TOPICS.uiRefresh, DECK_SCHEMA_VERSION, isUiRefreshPayload)
}
