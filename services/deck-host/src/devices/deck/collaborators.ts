// services/deck-host/src/devices/deck/collaborators.ts

import type { ChannelLogger } from '@deckline/logging'

import type { MessageBus } from '../../core/events/MessageBus.js'
import type { Subscription } from '../../core/events/types.js'
import {
    DECK_TOPICS,
    isHotkeyTriggerPayload,
    isUiRefreshPayload,
    isVolumeUpdatePayload,
    type UiRefreshPayload,
} from './topics.js'

/** Sends a key combination to the OS. */
export interface HotkeyTrigger {
    trigger(hotkey: string, label: string): void | Promise<void>
}

/** Sets an application's volume; `volume` is in [0, 1]. */
export interface VolumeController {
    setVolume(app: string, volume: number): void | Promise<void>
}

export interface UiRefreshListener {
    refresh(payload: UiRefreshPayload): void | Promise<void>
}

export interface DeckCollaborators {
    hotkeys?: HotkeyTrigger
    volume?: VolumeController
    ui?: UiRefreshListener
}

export function attachCollaborators(bus: MessageBus, c: DeckCollaborators): Subscription[] {
    const subs: Subscription[] = []

    const hotkeys = c.hotkeys
    if (hotkeys) {
        subs.push(
            bus.subscribePayload(
                DECK_TOPICS.hotkeyTrigger,
                isHotkeyTriggerPayload,
                (p) => hotkeys.trigger(p.hotkey, p.label),
                { name: 'hotkey-trigger' }
            )
        )
    }

    const volume = c.volume
    if (volume) {
        subs.push(
            bus.subscribePayload(
                DECK_TOPICS.volumeUpdate,
                isVolumeUpdatePayload,
                async (p) => {
                    for (const app of p.apps) await volume.setVolume(app, p.volume)
                },
                { name: 'volume-controller' }
            )
        )
    }

    const ui = c.ui
    if (ui) {
        subs.push(
            bus.subscribePayload(DECK_TOPICS.uiRefresh, isUiRefreshPayload, (p) => ui.refresh(p), {
                name: 'ui-refresh',
            })
        )
    }

    return subs
}

/* -------------------------------------------------------------------------- */
/*  Log-only implementations used by the host service                          */
/* -------------------------------------------------------------------------- */

export class LoggingHotkeyTrigger implements HotkeyTrigger {
    constructor(private readonly log: ChannelLogger) {}

    trigger(hotkey: string, label: string): void {
        this.log.info(`hotkey trigger hotkey=${JSON.stringify(hotkey)} label=${JSON.stringify(label)}`)
    }
}

export class LoggingVolumeController implements VolumeController {
    constructor(private readonly log: ChannelLogger) {}

    setVolume(app: string, volume: number): void {
        this.log.info(`volume app=${JSON.stringify(app)} level=${volume.toFixed(3)}`)
    }
}
