import { describe, expect, it } from 'vitest'

import { MessageBus } from '../../core/events/MessageBus.js'
import type { BusEvent, BusPublisher } from '../../core/events/types.js'
import { attachCollaborators } from './collaborators.js'
import { DeckConfigStore, emptySnapshot } from './DeckConfigStore.js'
import { DeckEventDispatcher } from './DeckEventDispatcher.js'
import { DECK_SAFETY_CRITICAL_TOPICS, registerDeckSchemas, type UiRefreshPayload } from './topics.js'

class RecordingBus implements BusPublisher {
    readonly events: BusEvent[] = []

    publish<TPayload>(event: BusEvent<TPayload>): void {
        this.events.push(event)
    }
}

function configuredStore(): DeckConfigStore {
    const s = emptySnapshot(2)
    s.modes[1] = { index: 1, name: 'Media', buttons: [...(s.modes[1]?.buttons ?? [])] }
    s.modes[0]?.buttons.splice(2, 1, { hotkey: 'ctrl+s', label: 'Save' })
    s.modes[1]?.buttons.splice(2, 1, { hotkey: 'f5', label: 'Play' })
    s.sliders = [{ slider: 1, apps: ['spotify', 'vlc'] }]
    return new DeckConfigStore(s)
}

describe('DeckEventDispatcher', () => {
    it('publishes a hotkey for a configured button in the current mode', () => {
        const bus = new RecordingBus()
        const d = new DeckEventDispatcher({ bus, config: configuredStore() })

        expect(d.dispatch({ verb: 'BTN_PRESS', mode: 0, button: 2 })).toBe('published')
        expect(bus.events).toEqual([
            {
                topic: 'deck.hotkey.trigger',
                source: 'deck-dispatcher',
                schemaVersion: 1,
                payload: { mode: 0, button: 2, hotkey: 'ctrl+s', label: 'Save' },
            },
        ])
    })

    it('drops presses from another mode and unconfigured buttons', () => {
        const bus = new RecordingBus()
        const d = new DeckEventDispatcher({ bus, config: configuredStore() })

        expect(d.dispatch({ verb: 'BTN_PRESS', mode: 1, button: 2 })).toBe('stale-mode')
        expect(d.dispatch({ verb: 'BTN_PRESS', mode: 0, button: 3 })).toBe('unconfigured')
        expect(bus.events).toEqual([])
    })

    it('scales slider readings and skips unassigned sliders', () => {
        const bus = new RecordingBus()
        const d = new DeckEventDispatcher({ bus, config: configuredStore(), source: 'test' })

        expect(d.dispatch({ verb: 'SLIDER_CHANGE', slider: 0, value: 100 })).toBe('unassigned')
        expect(d.dispatch({ verb: 'SLIDER_CHANGE', slider: 1, value: 1023 })).toBe('published')
        expect(d.dispatch({ verb: 'SLIDER_CHANGE', slider: 1, value: 5000 })).toBe('published')

        expect(bus.events.map((e) => e.payload)).toEqual([
            { slider: 1, raw: 1023, volume: 1, apps: ['spotify', 'vlc'] },
            { slider: 1, raw: 5000, volume: 1, apps: ['spotify', 'vlc'] },
        ])
    })

    it('honours a custom slider range', () => {
        const bus = new RecordingBus()
        const d = new DeckEventDispatcher({ bus, config: configuredStore(), sliderMaxRaw: 200 })
        d.dispatch({ verb: 'SLIDER_CHANGE', slider: 1, value: 50 })
        expect(bus.events[0]?.payload).toEqual({ slider: 1, raw: 50, volume: 0.25, apps: ['spotify', 'vlc'] })
    })

    it('tracks mode changes and requests a UI refresh', () => {
        const bus = new RecordingBus()
        const store = configuredStore()
        const d = new DeckEventDispatcher({ bus, config: store })

        expect(d.dispatch({ verb: 'MODE_CHANGE', mode: 1 })).toBe('published')
        expect(store.currentMode).toBe(1)
        expect(bus.events[0]?.topic).toBe('deck.ui.refresh')
        expect(bus.events[0]?.payload).toEqual({ reason: 'mode-change', mode: 1, modeName: 'Media' })

        expect(d.dispatch({ verb: 'BTN_PRESS', mode: 1, button: 2 })).toBe('published')
        expect(bus.events[1]?.payload).toEqual({ mode: 1, button: 2, hotkey: 'f5', label: 'Play' })
    })

    it('ignores a mode change outside the configured range', () => {
        const bus = new RecordingBus()
        const store = configuredStore()
        const d = new DeckEventDispatcher({ bus, config: store })

        expect(d.dispatch({ verb: 'MODE_CHANGE', mode: 5 })).toBe('invalid-mode')
        expect(store.currentMode).toBe(0)
        expect(bus.events).toEqual([])
    })
})

describe('attachCollaborators', () => {
    it('routes bus events to the hotkey, volume and UI collaborators', async () => {
        const bus = new MessageBus({ defaultQueueCapacity: 16, safetyCriticalTopicPatterns: DECK_SAFETY_CRITICAL_TOPICS })
        registerDeckSchemas(bus)

        const hotkeys: string[] = []
        const volumes: Array<[string, number]> = []
        const refreshes: UiRefreshPayload[] = []
        const subs = attachCollaborators(bus, {
            hotkeys: { trigger: (hotkey, label) => void hotkeys.push(`${hotkey}|${label}`) },
            volume: { setVolume: (app, volume) => void volumes.push([app, volume]) },
            ui: { refresh: (p) => void refreshes.push(p) },
        })
        expect(subs).toHaveLength(3)

        const d = new DeckEventDispatcher({ bus, config: configuredStore(), sliderMaxRaw: 100 })
        d.dispatch({ verb: 'BTN_PRESS', mode: 0, button: 2 })
        d.dispatch({ verb: 'SLIDER_CHANGE', slider: 1, value: 40 })
        d.dispatch({ verb: 'MODE_CHANGE', mode: 1 })
        await bus.idle()

        expect(hotkeys).toEqual(['ctrl+s|Save'])
        expect(volumes).toEqual([
            ['spotify', 0.4],
            ['vlc', 0.4],
        ])
        expect(refreshes).toEqual([{ reason: 'mode-change', mode: 1, modeName: 'Media' }])
    })

    it('only subscribes the collaborators it is given', () => {
        const bus = new MessageBus({ defaultQueueCapacity: 4, safetyCriticalTopicPatterns: [] })
        expect(attachCollaborators(bus, {})).toEqual([])
    })
})
