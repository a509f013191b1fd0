import { afterEach, describe, expect, it, vi } from 'vitest'

import { createMemoryChannelPair } from '../../core/serial/channels.js'
import { DeckConfigStore, emptySnapshot } from './DeckConfigStore.js'
import { DeckSessionService } from './DeckSessionService.js'
import { DeckSimulator, type DeckSimulatorOptions } from './DeckSimulator.js'
import type { DeckSessionEvent, DeckSnapshot, DeviceEventMessage } from './types.js'
import { resolveDeckSessionConfig, type DeckSessionConfigOverrides } from './utils.js'

type EventOf<K extends DeckSessionEvent['kind']> = Extract<DeckSessionEvent, { kind: K }>

function ofKind<K extends DeckSessionEvent['kind']>(events: DeckSessionEvent[], kind: K): Array<EventOf<K>> {
    return events.filter((e): e is EventOf<K> => e.kind === kind)
}

interface Rig {
    session: DeckSessionService
    sim: DeckSimulator
    store: DeckConfigStore
    events: DeckSessionEvent[]
    deviceEvents: DeviceEventMessage[]
    writeRaw(line: string): void
}

const rigs: Rig[] = []

function gamingWorkSnapshot(): DeckSnapshot {
    const snap = emptySnapshot(2)
    snap.modes = [
        { index: 0, name: 'Gaming', buttons: [{ hotkey: 'ctrl+m', label: 'Mute' }, null, null, null, null, null, null, null, null] },
        { index: 1, name: 'Work', buttons: Array.from({ length: 9 }, () => null) },
    ]
    snap.sliders = [{ slider: 0, apps: ['Discord.exe'] }]
    return snap
}

function setup(simOpts: DeckSimulatorOptions = {}, overrides: DeckSessionConfigOverrides = {}): Rig {
    const pair = createMemoryChannelPair()
    const sim = new DeckSimulator(pair.device, { firmwareVersion: 'fw-test', ...simOpts })
    const store = new DeckConfigStore(2)
    const events: DeckSessionEvent[] = []
    const deviceEvents: DeviceEventMessage[] = []

    const session = new DeckSessionService(
        resolveDeckSessionConfig({
            readyTimeoutMs: 1_000,
            keepalive: { intervalMs: 0 },
            ...overrides,
            ack: { timeoutMs: 200, maxRetries: 3, ...overrides.ack },
        }),
        {
            opener: async () => {
                sim.start()
                return pair.host
            },
            config: store,
            events: { publish: (e) => events.push(e) },
            onDeviceEvent: (e) => deviceEvents.push(e),
        }
    )

    const rig: Rig = {
        session,
        sim,
        store,
        events,
        deviceEvents,
        writeRaw: (line) => pair.device.stream.write(`${line}\n`),
    }
    rigs.push(rig)
    return rig
}

afterEach(async () => {
    for (const rig of rigs.splice(0)) {
        await rig.session.stop()
        await rig.sim.stop()
    }
})

describe('DeckSessionService', () => {
    describe('connect', () => {
        it('waits for READY, pushes the configuration and becomes ready', async () => {
            const { session, sim, events } = setup()

            await session.connect()

            expect(session.currentPhase).toBe('ready')
            expect(sim.received).toEqual(['SYNC_START', 'MODE_COUNT:2', 'MODE_NAME:0:Mode 1', 'MODE_NAME:1:Mode 2', 'SYNC_END'])
            expect(sim.getState().numModes).toBe(2)
            expect(sim.getState().modes[1]?.name).toBe('Mode 2')

            expect(ofKind(events, 'deck-phase-changed').map((e) => e.to)).toEqual(['awaiting-ready', 'syncing', 'ready'])
            expect(ofKind(events, 'deck-ready-received')[0]).toMatchObject({ version: 'fw-test', via: 'ready' })
            expect(ofKind(events, 'deck-sync-completed')[0]?.commands).toBe(5)

            const status = session.getStatus()
            expect(status.firmwareVersion).toBe('fw-test')
            expect(status.path).toBe('memory://deck')
            expect(status.pending).toBeNull()
            expect(status.stats.syncs).toBe(1)
            expect(status.stats.acksReceived).toBe(5)
        })

        it('pushes a full configuration to a freshly booted device', async () => {
            const { session, sim, store, events } = setup({ firmwareVersion: '1.0.0' })
            store.replace(gamingWorkSnapshot())

            await session.connect()

            const wire = [
                'SYNC_START',
                'MODE_COUNT:2',
                'MODE_NAME:0:Gaming',
                'MODE_NAME:1:Work',
                'BTN:0:0:ctrl+m:Mute',
                'SLIDER:0:Discord.exe',
                'SYNC_END',
            ]
            expect(sim.received).toEqual(wire)
            expect(ofKind(events, 'deck-command-sent').map((e) => e.line)).toEqual(wire)
            expect(ofKind(events, 'deck-ready-received')[0]?.version).toBe('1.0.0')
            expect(session.currentPhase).toBe('ready')

            const s = sim.getState()
            expect(s.numModes).toBe(2)
            expect(s.modes[0]?.name).toBe('Gaming')
            expect(s.modes[0]?.buttons[0]).toEqual({ configured: true, hotkey: 'ctrl+m', label: 'Mute' })
            expect(s.modes[1]?.name).toBe('Work')
            expect(s.modes[1]?.buttons.some((b) => b.configured)).toBe(false)
            expect(s.sliders[0]).toEqual({ slider: 0, app: 'Discord.exe' })

            const cleared = await session.clearButton(0, 0).done
            expect(cleared.status).toBe('completed')
            expect(sim.received.at(-1)).toBe('CLEAR:0:0')
            const after = sim.getState()
            expect(after.modes[0]?.buttons[0]?.configured).toBe(false)
            expect(after.modes[1]).toEqual(s.modes[1])
            expect(after.sliders).toEqual(s.sliders)
        })

        it('is a no-op once connected', async () => {
            const { session, events } = setup()
            await Promise.all([session.connect(), session.connect()])
            await session.connect()
            expect(ofKind(events, 'deck-connected')).toHaveLength(1)
        })

        it('fails with a timeout when READY never arrives', async () => {
            const { session, events } = setup({ autoBoot: false }, { readyTimeoutMs: 50 })

            await expect(session.connect()).rejects.toMatchObject({ code: 'TIMEOUT', message: 'no READY within 50 ms' })
            expect(session.currentPhase).toBe('disconnected')
            expect(ofKind(events, 'deck-disconnected').map((e) => e.reason)).toEqual(['ready-timeout'])
        })

        it('accepts PONG as readiness when probing an already running device', async () => {
            const { session, sim, events } = setup({ autoBoot: false }, { readyProbe: true })

            // a booting device answers PING but rejects the sync
            await expect(session.connect()).rejects.toMatchObject({
                code: 'DEVICE',
                message: 'device error 4: not ready (SYNC_START)',
            })
            expect(sim.received.slice(0, 2)).toEqual(['PING', 'SYNC_START'])
            expect(ofKind(events, 'deck-ready-received')[0]).toMatchObject({ version: null, via: 'pong' })
            expect(ofKind(events, 'deck-sync-failed')[0]?.error).toBe('device error 4: not ready (SYNC_START)')
            expect(ofKind(events, 'deck-disconnected').map((e) => e.reason)).toEqual(['sync-failed'])
        })

        it('retries an unacknowledged SYNC_START, then disconnects once', async () => {
            const { session, sim, events } = setup(
                { dropReply: (line) => line === 'SYNC_START' },
                { ack: { timeoutMs: 20, maxRetries: 3 } }
            )

            await expect(session.connect()).rejects.toMatchObject({
                code: 'TIMEOUT',
                retries: 3,
                message: 'no SYNC_START for SYNC_START after 4 attempt(s)',
            })
            expect(sim.received).toEqual(['SYNC_START', 'SYNC_START', 'SYNC_START', 'SYNC_START'])
            expect(ofKind(events, 'deck-ack-timeout').map((e) => e.attempt)).toEqual([1, 2, 3, 4])
            expect(ofKind(events, 'deck-disconnected').map((e) => e.reason)).toEqual(['sync-failed'])
            expect(session.getStatus().stats.retries).toBe(3)
        })
    })

    describe('runtime commands', () => {
        it('sends a command, waits for its ACK and records it', async () => {
            const { session, sim, store } = setup()
            await session.connect()

            const result = await session.setButton(1, 4, 'ctrl+c', 'Copy').done
            expect(result).toMatchObject({ verb: 'BTN', status: 'completed', retries: 0, ack: { token: 'BTN', params: ['1', '4'] } })
            expect(store.getButton(1, 4)).toEqual({ hotkey: 'ctrl+c', label: 'Copy' })
            expect(sim.getState().modes[1]?.buttons[4]).toEqual({ configured: true, hotkey: 'ctrl+c', label: 'Copy' })

            await session.setSlider(0, ['spotify', 'vlc']).done
            expect(sim.received.at(-1)).toBe('SLIDER:0:spotify,vlc')
            expect(store.getSliderApps(0)).toEqual(['spotify', 'vlc'])

            await session.setMode(1).done
            expect(store.currentMode).toBe(1)

            await session.clearButton(1, 4).done
            expect(store.getButton(1, 4)).toBeNull()
            expect(sim.getState().modes[1]?.buttons[4]?.configured).toBe(false)
        })

        it('reports a device ERROR as a failed command and stays ready', async () => {
            const { session, store } = setup()
            await session.connect()

            // host now believes in three modes; the device still has two
            store.replace(emptySnapshot(3))
            const result = await session.setMode(2).done

            expect(result.status).toBe('failed')
            expect(result.error).toEqual({
                code: 'DEVICE',
                message: 'device error 1: mode 2 out of range (MODE:2)',
                retryable: false,
            })
            expect(session.currentPhase).toBe('ready')
            expect(store.currentMode).toBe(0)
        })

        it('gives up after the retry bound without tearing the session down', async () => {
            const { session, sim, events } = setup(
                { dropReply: (line) => line === 'MODE:1' },
                { ack: { timeoutMs: 20, maxRetries: 2 } }
            )
            await session.connect()

            const result = await session.setMode(1).done
            expect(result.status).toBe('failed')
            expect(result.retries).toBe(2)
            expect(result.error?.code).toBe('TIMEOUT')
            expect(sim.received.filter((l) => l === 'MODE:1')).toHaveLength(3)
            expect(session.currentPhase).toBe('ready')
            expect(ofKind(events, 'deck-disconnected')).toEqual([])

            const next = await session.clearButton(0, 0).done
            expect(next.status).toBe('completed')
        })

        it('fails fast on invalid commands and a non-ready session', async () => {
            const { session } = setup()

            const early = await session.setMode(0).done
            expect(early.error).toEqual({ code: 'STATE', message: 'session is disconnected', retryable: false })

            await session.connect()

            const range = await session.setMode(7).done
            expect(range.error).toEqual({ code: 'VALIDATION', message: 'mode 7 out of range [0, 2)', retryable: false })

            const ping = await session.sendCommand({ verb: 'PING' }).done
            expect(ping.error?.message).toBe('PING is not a runtime command')
        })

        it('rejects commands beyond the queue bound', async () => {
            const { session } = setup({}, { queue: { maxDepth: 1 } })
            await session.connect()

            const first = session.setMode(1)
            const second = session.setMode(0)
            const third = session.setMode(1)

            const results = await Promise.all([first.done, second.done, third.done])
            expect(results.map((r) => r.status)).toEqual(['completed', 'completed', 'failed'])
            expect(results[2]?.error?.message).toBe('queue full (maxDepth=1)')
        })

        it('does not wait for acknowledgments in relaxed mode', async () => {
            const { session, store, events } = setup({}, { ack: { mode: 'relaxed' } })
            await session.connect()

            const result = await session.setMode(1).done
            expect(result.status).toBe('completed')
            expect(result.ack).toBeUndefined()
            expect(store.currentMode).toBe(1)

            await vi.waitFor(() => {
                expect(ofKind(events, 'deck-stray-reply').map((e) => e.line)).toContain('ACK:MODE:1')
            })
        })
    })

    describe('device input', () => {
        it('hands unsolicited events to the dispatcher', async () => {
            const { session, sim, deviceEvents } = setup()
            await session.connect()

            await sim.pressButton(3)
            await sim.moveSlider(2, 700)

            await vi.waitFor(() => expect(deviceEvents).toHaveLength(2))
            expect(deviceEvents).toEqual([
                { verb: 'BTN_PRESS', mode: 0, button: 3 },
                { verb: 'SLIDER_CHANGE', slider: 2, value: 700 },
            ])
            expect(session.getStatus().stats.eventsReceived).toBe(2)
        })

        it('ignores an acknowledgment that echoes other indices', async () => {
            const { session, sim, writeRaw, events } = setup(
                { dropReply: (line) => line.startsWith('BTN:1:4:') },
                { ack: { timeoutMs: 2_000, maxRetries: 0 } }
            )
            await session.connect()

            const handle = session.setButton(1, 4, 'ctrl+c', 'Copy')
            await vi.waitFor(() => expect(sim.received.at(-1)).toBe('BTN:1:4:ctrl+c:Copy'))

            writeRaw('ACK:BTN:0:0')
            await vi.waitFor(() => expect(ofKind(events, 'deck-stray-reply')).toHaveLength(1))
            expect(ofKind(events, 'deck-stray-reply')[0]?.line).toBe('ACK:BTN:0:0')
            expect(session.getStatus().pending?.verb).toBe('BTN')

            writeRaw('ACK:BTN:1:4')
            const result = await handle.done
            expect(result).toMatchObject({ status: 'completed', ack: { token: 'BTN', params: ['1', '4'] } })
        })

        it('drops malformed lines and stray acknowledgments', async () => {
            const { session, writeRaw, events } = setup()
            await session.connect()

            writeRaw('GARBAGE:1')
            writeRaw('ACK:MODE:1')

            await vi.waitFor(() => expect(ofKind(events, 'deck-stray-reply')).toHaveLength(1))
            expect(ofKind(events, 'deck-protocol-error')[0]).toMatchObject({
                line: 'GARBAGE:1',
                error: 'unknown device verb GARBAGE',
            })
            expect(ofKind(events, 'deck-stray-reply')[0]?.line).toBe('ACK:MODE:1')
            expect(session.getStatus().stats.droppedLines).toBe(1)
            expect(session.currentPhase).toBe('ready')
        })

        it('disconnects when the device reboots unexpectedly', async () => {
            const { session, sim, events } = setup()
            await session.connect()

            await sim.powerCycle()

            await vi.waitFor(() => expect(session.currentPhase).toBe('disconnected'))
            expect(ofKind(events, 'deck-disconnected')[0]).toMatchObject({
                reason: 'device-reset',
                error: 'device rebooted (unexpected READY)',
            })
            const late = await session.setMode(0).done
            expect(late.error?.code).toBe('STATE')
        })
    })

    describe('reset and resync', () => {
        it('resets the device and pushes the configuration again', async () => {
            const { session, sim } = setup()
            await session.connect()
            await session.setMode(1).done

            const result = await session.resetDevice().done
            expect(result.status).toBe('completed')
            expect(session.currentPhase).toBe('ready')
            expect(sim.received.slice(-6)).toEqual([
                'RESET',
                'SYNC_START',
                'MODE_COUNT:2',
                'MODE_NAME:0:Mode 1',
                'MODE_NAME:1:Mode 2',
                'SYNC_END',
            ])
            expect(session.getStatus().stats.syncs).toBe(2)
        })

        it('resyncs a replaced configuration', async () => {
            const { session, sim, store } = setup()
            await session.connect()

            const next = emptySnapshot(3)
            next.modes[2] = { index: 2, name: 'Games', buttons: [...(next.modes[2]?.buttons ?? [])] }
            store.replace(next)

            const result = await session.resync().done
            expect(result.status).toBe('completed')
            expect(sim.getState().numModes).toBe(3)
            expect(sim.getState().modes[2]?.name).toBe('Games')
        })
    })

    describe('configuration changes during a sync', () => {
        it('leaves the device in the same state after repeated syncs', async () => {
            const { session, sim, store } = setup()
            store.replace(gamingWorkSnapshot())
            await session.connect()
            const first = sim.getState()

            // drift the device away from the host's configuration
            sim.machine.receive('BTN:1:2:f9:Extra')
            sim.machine.receive('SLIDER:2:vlc')
            expect(sim.getState()).not.toEqual(first)

            expect((await session.resync().done).status).toBe('completed')
            expect(sim.getState()).toEqual(first)

            expect((await session.resync().done).status).toBe('completed')
            expect(sim.getState()).toEqual(first)
            expect(session.getStatus().stats.syncs).toBe(3)
        })

        it('pushes a configuration replaced while the sync was running', async () => {
            const { session, sim, store, events } = setup({ replyDelayMs: 30 })

            const connecting = session.connect()
            await vi.waitFor(() => expect(session.currentPhase).toBe('syncing'), { interval: 5 })

            const next = emptySnapshot(3)
            next.modes[2] = { index: 2, name: 'Games', buttons: [...(next.modes[2]?.buttons ?? [])] }
            store.replace(next)

            await connecting

            expect(session.currentPhase).toBe('ready')
            expect(sim.getState().numModes).toBe(3)
            expect(sim.getState().modes[2]?.name).toBe('Games')
            expect(ofKind(events, 'deck-sync-superseded')).toHaveLength(1)
            expect(ofKind(events, 'deck-sync-completed')).toHaveLength(2)
            expect(sim.received.slice(-6)).toEqual([
                'SYNC_START',
                'MODE_COUNT:3',
                'MODE_NAME:0:Mode 1',
                'MODE_NAME:1:Mode 2',
                'MODE_NAME:2:Games',
                'SYNC_END',
            ])
        })
    })

    describe('keepalive', () => {
        it('pings an idle session', async () => {
            const { session, sim } = setup({}, { keepalive: { intervalMs: 20 } })
            await session.connect()

            await vi.waitFor(() => expect(sim.received).toContain('PING'))
            expect(session.currentPhase).toBe('ready')
        })

        it('disconnects when a PING goes unanswered', async () => {
            const { session, events } = setup(
                { dropReply: (line) => line === 'PING' },
                { keepalive: { intervalMs: 20 }, ack: { timeoutMs: 20, maxRetries: 0 } }
            )
            await session.connect()

            await vi.waitFor(() => expect(session.currentPhase).toBe('disconnected'))
            expect(ofKind(events, 'deck-disconnected').map((e) => e.reason)).toEqual(['keepalive-timeout'])
        })
    })

    it('disconnect closes the link and fails later commands', async () => {
        const { session, events } = setup()
        await session.connect()

        await session.disconnect()
        await session.disconnect()

        expect(session.currentPhase).toBe('disconnected')
        expect(ofKind(events, 'deck-disconnected').map((e) => e.reason)).toEqual(['explicit-close'])
        expect((await session.resync().done).error?.message).toBe('session is disconnected')
    })
})

describe('DeckSessionService auto-reconnect', () => {
    it('re-establishes and resyncs after the device reboots', async () => {
        const sims: DeckSimulator[] = []
        const events: DeckSessionEvent[] = []
        const session = new DeckSessionService(
            resolveDeckSessionConfig({
                keepalive: { intervalMs: 0 },
                reconnect: { enabled: true, baseDelayMs: 10, maxDelayMs: 10 },
            }),
            {
                opener: async () => {
                    const pair = createMemoryChannelPair()
                    const sim = new DeckSimulator(pair.device)
                    sim.start()
                    sims.push(sim)
                    return pair.host
                },
                config: new DeckConfigStore(1),
                events: { publish: (e) => events.push(e) },
            }
        )

        try {
            await session.connect()
            await sims[0]?.powerCycle()

            await vi.waitFor(() => {
                expect(sims).toHaveLength(2)
                expect(session.currentPhase).toBe('ready')
            })
            expect(ofKind(events, 'deck-reconnect-scheduled')).toMatchObject([{ attempt: 1, delayMs: 10 }])
            expect(sims[1]?.received).toEqual(['SYNC_START', 'MODE_COUNT:1', 'MODE_NAME:0:Mode 1', 'SYNC_END'])
            expect(session.getStatus().stats.connects).toBe(2)
        } finally {
            await session.stop()
            for (const sim of sims) await sim.stop()
        }
    })

    it('gives up after the configured number of attempts', async () => {
        const events: DeckSessionEvent[] = []
        let opens = 0
        const session = new DeckSessionService(
            resolveDeckSessionConfig({ reconnect: { enabled: true, baseDelayMs: 5, maxDelayMs: 5, maxAttempts: 2 } }),
            {
                opener: async () => {
                    opens += 1
                    throw new Error('no device')
                },
                config: new DeckConfigStore(1),
                events: { publish: (e) => events.push(e) },
            }
        )

        try {
            await expect(session.connect()).rejects.toThrow('no device')
            await vi.waitFor(() => expect(ofKind(events, 'fatal-error')).toHaveLength(1))
            expect(opens).toBe(3)
            expect(ofKind(events, 'deck-reconnect-scheduled').map((e) => e.attempt)).toEqual([1, 2])
            expect(ofKind(events, 'fatal-error')[0]?.error).toBe('reconnect attempts exhausted')
        } finally {
            await session.stop()
        }
    })

    it('does not reconnect after an explicit disconnect', async () => {
        let opens = 0
        const session = new DeckSessionService(
            resolveDeckSessionConfig({ keepalive: { intervalMs: 0 }, reconnect: { enabled: true, baseDelayMs: 5 } }),
            {
                opener: async () => {
                    opens += 1
                    const pair = createMemoryChannelPair()
                    new DeckSimulator(pair.device).start()
                    return pair.host
                },
                config: new DeckConfigStore(1),
            }
        )

        await session.connect()
        await session.disconnect()
        await new Promise((resolve) => setTimeout(resolve, 30))
        expect(opens).toBe(1)
        expect(session.currentPhase).toBe('disconnected')
    })
})
