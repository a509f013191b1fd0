// services/deck-host/src/devices/deck/DeckEventDispatcher.ts

import type { ChannelLogger } from '@deckline/logging'

import type { BusPublisher } from '../../core/events/types.js'
import type { DeckConfigStore } from './DeckConfigStore.js'
import {
    DECK_SCHEMA_VERSION,
    DECK_TOPICS,
    type HotkeyTriggerPayload,
    type UiRefreshPayload,
    type UiRefreshReason,
    type VolumeUpdatePayload,
} from './topics.js'
import { DECK_LIMITS, type DeviceEventMessage } from './types.js'

export type DeckConfigView = Pick<
    DeckConfigStore,
    'currentMode' | 'getButton' | 'getModeName' | 'getSliderApps' | 'setCurrentMode'
>

export type DispatchOutcome =
    | 'published'
    | 'stale-mode'
    | 'unconfigured'
    | 'unassigned'
    | 'invalid-mode'

export interface DeckEventDispatcherDeps {
    bus: BusPublisher
    config: DeckConfigView
    /** Raw slider reading that maps to full volume. */
    sliderMaxRaw?: number
    source?: string
    log?: ChannelLogger
}

/**
 * Routes unsolicited device events onto the bus.
 * Never writes to the device and never touches the pending-ACK slot.
 */
export class DeckEventDispatcher {
    private readonly bus: BusPublisher
    private readonly config: DeckConfigView
    private readonly sliderMaxRaw: number
    private readonly source: string
    private readonly log?: ChannelLogger

    constructor(deps: DeckEventDispatcherDeps) {
        this.bus = deps.bus
        this.config = deps.config
        this.sliderMaxRaw = deps.sliderMaxRaw && deps.sliderMaxRaw > 0 ? deps.sliderMaxRaw : DECK_LIMITS.sliderRawMax
        this.source = deps.source ?? 'deck-dispatcher'
        this.log = deps.log
    }

    dispatch(evt: DeviceEventMessage): DispatchOutcome {
        switch (evt.verb) {
            case 'BTN_PRESS':
                return this.onButtonPress(evt.mode, evt.button)
            case 'SLIDER_CHANGE':
                return this.onSliderChange(evt.slider, evt.value)
            case 'MODE_CHANGE':
                return this.onModeChange(evt.mode)
        }
    }

    /** Publishes a UI refresh for the current mode. */
    refresh(reason: UiRefreshReason): void {
        const mode = this.config.currentMode
        this.publish<UiRefreshPayload>(DECK_TOPICS.uiRefresh, {
            reason,
            mode,
            modeName: this.config.getModeName(mode) ?? '',
        })
    }

    private onButtonPress(mode: number, button: number): DispatchOutcome {
        if (mode !== this.config.currentMode) {
            this.log?.debug(`stale button press mode=${mode} button=${button} current=${this.config.currentMode}`)
            return 'stale-mode'
        }

        const cfg = this.config.getButton(mode, button)
        if (!cfg) {
            this.log?.debug(`unconfigured button press mode=${mode} button=${button}`)
            return 'unconfigured'
        }

        this.publish<HotkeyTriggerPayload>(DECK_TOPICS.hotkeyTrigger, {
            mode,
            button,
            hotkey: cfg.hotkey,
            label: cfg.label,
        })
        return 'published'
    }

    private onSliderChange(slider: number, raw: number): DispatchOutcome {
        const apps = this.config.getSliderApps(slider)
        if (apps.length === 0) return 'unassigned'

        const volume = Math.max(0, Math.min(1, raw / this.sliderMaxRaw))
        this.publish<VolumeUpdatePayload>(DECK_TOPICS.volumeUpdate, { slider, raw, volume, apps })
        return 'published'
    }

    private onModeChange(mode: number): DispatchOutcome {
        if (!this.config.setCurrentMode(mode)) {
            this.log?.warn(`mode change out of range mode=${mode}`)
            return 'invalid-mode'
        }
        this.refresh('mode-change')
        return 'published'
    }

    private publish<T>(topic: string, payload: T): void {
        this.bus.publish({ topic, source: this.source, schemaVersion: DECK_SCHEMA_VERSION, payload })
    }
}
