// services/deck-host/src/devices/deck/DeckDeviceMachine.ts

import { ProtocolError } from './errors.js'
import { decodeHostCommand, formatDeviceMessage, isHostVerb, parse } from './protocol.js'
import {
    DECK_LIMITS,
    DEVICE_ERROR,
    type ButtonConfig,
    type Command,
    type DeviceErrorCode,
    type DeviceState,
    type HostCommand,
    type ModeConfig,
    type MutatingCommand,
} from './types.js'
import { defaultModeName, truncateCodePoints } from './utils.js'

export type DeckDevicePhase = 'booting' | 'idle' | 'sync-buffering' | 'faulted'

export interface DeckDeviceMachineOptions {
    firmwareVersion?: string
}

function emptyButton(): ButtonConfig {
    return { configured: false, hotkey: '', label: '' }
}

function emptyMode(index: number): ModeConfig {
    return {
        index,
        name: defaultModeName(index),
        buttons: Array.from({ length: DECK_LIMITS.buttonsPerMode }, emptyButton),
    }
}

function clearedState(): DeviceState {
    return {
        numModes: 1,
        currentMode: 0,
        inSync: false,
        modes: [emptyMode(0)],
        sliders: Array.from({ length: DECK_LIMITS.sliders }, (_, slider) => ({ slider, app: '' })),
    }
}

function errorLine(code: DeviceErrorCode, message: string): string {
    return formatDeviceMessage({ verb: 'ERROR', code, message })
}

function ackLine(token: string, ...params: number[]): string {
    return formatDeviceMessage({ verb: 'ACK', token, params: params.map(String) })
}

function ackFor(cmd: MutatingCommand): string {
    switch (cmd.verb) {
        case 'BTN':
        case 'CLEAR':
            return ackLine(cmd.verb, cmd.mode, cmd.button)
        case 'MODE':
        case 'MODE_NAME':
            return ackLine(cmd.verb, cmd.mode)
        case 'MODE_COUNT':
            return ackLine(cmd.verb, cmd.count)
        case 'SLIDER':
            return ackLine(cmd.verb, cmd.slider)
    }
}

function isMutating(cmd: HostCommand): cmd is MutatingCommand {
    return cmd.verb !== 'SYNC_START' && cmd.verb !== 'SYNC_END' && cmd.verb !== 'PING' && cmd.verb !== 'RESET'
}

function inRange(n: number, maxExclusive: number): boolean {
    return Number.isInteger(n) && n >= 0 && n < maxExclusive
}

/**
 * Returns a description of the first out-of-range index, or null.
 * Bounds are the given mode count and the fixed button/slider counts.
 */
function findInvalidIndex(cmd: MutatingCommand, numModes: number): string | null {
    switch (cmd.verb) {
        case 'MODE_COUNT':
            return cmd.count >= DECK_LIMITS.minModes && cmd.count <= DECK_LIMITS.maxModes
                ? null
                : `mode count ${cmd.count} out of range`
        case 'MODE':
        case 'MODE_NAME':
            return inRange(cmd.mode, numModes) ? null : `mode ${cmd.mode} out of range`
        case 'BTN':
        case 'CLEAR':
            if (!inRange(cmd.mode, numModes)) return `mode ${cmd.mode} out of range`
            return inRange(cmd.button, DECK_LIMITS.buttonsPerMode) ? null : `button ${cmd.button} out of range`
        case 'SLIDER':
            return inRange(cmd.slider, DECK_LIMITS.sliders) ? null : `slider ${cmd.slider} out of range`
    }
}

/**
 * In-memory model of the deck firmware.
 *
 * Synchronous and transport-free: every input returns the lines the
 * device would write, in order. State lives only here and is rebuilt
 * from nothing on boot and on RESET.
 */
export class DeckDeviceMachine {
    private readonly firmwareVersion: string | undefined
    private phase: DeckDevicePhase = 'booting'
    private state: DeviceState = clearedState()
    private buffer: MutatingCommand[] = []

    constructor(opts: DeckDeviceMachineOptions = {}) {
        this.firmwareVersion = opts.firmwareVersion
    }

    get currentPhase(): DeckDevicePhase {
        return this.phase
    }

    /** Power-on: clear everything, announce READY, accept commands. */
    boot(): string[] {
        this.state = clearedState()
        this.buffer = []
        this.phase = 'idle'
        return [formatDeviceMessage(this.firmwareVersion ? { verb: 'READY', version: this.firmwareVersion } : { verb: 'READY' })]
    }

    receive(line: string): string[] {
        let raw: Command
        try {
            raw = parse(line)
        } catch (err) {
            return [errorLine(DEVICE_ERROR.malformed, err instanceof Error ? err.message : String(err))]
        }

        if (raw.verb === 'PING') {
            return [formatDeviceMessage({ verb: 'PONG' })]
        }

        if (raw.verb === 'RESET') {
            this.state = clearedState()
            this.buffer = []
            this.phase = 'booting'
            return [ackLine('RESET')]
        }

        if (this.phase === 'booting') {
            return [errorLine(DEVICE_ERROR.notReady, 'not ready')]
        }
        if (this.phase === 'faulted') {
            return [errorLine(DEVICE_ERROR.notReady, 'reset required')]
        }

        if (!isHostVerb(raw.verb)) {
            return [errorLine(DEVICE_ERROR.unknownCommand, `unknown command ${raw.verb}`)]
        }

        let cmd: HostCommand
        try {
            cmd = decodeHostCommand(raw)
        } catch (err) {
            if (err instanceof ProtocolError) return [errorLine(DEVICE_ERROR.malformed, err.message)]
            throw err
        }

        return this.phase === 'sync-buffering' ? this.receiveBuffering(cmd) : this.receiveIdle(cmd)
    }

    /* ---------------------------------------------------------------------- */
    /*  Runtime triggers (physical input)                                      */
    /* ---------------------------------------------------------------------- */

    pressButton(button: number): string[] {
        if (this.phase !== 'idle' || !inRange(button, DECK_LIMITS.buttonsPerMode)) return []
        return [formatDeviceMessage({ verb: 'BTN_PRESS', mode: this.state.currentMode, button })]
    }

    moveSlider(slider: number, value: number): string[] {
        if (this.phase !== 'idle' || !inRange(slider, DECK_LIMITS.sliders)) return []
        const raw = Math.max(0, Math.min(DECK_LIMITS.sliderRawMax, Math.round(value)))
        return [formatDeviceMessage({ verb: 'SLIDER_CHANGE', slider, value: raw })]
    }

    changeMode(mode: number): string[] {
        if (this.phase !== 'idle' || !inRange(mode, this.state.numModes)) return []
        this.state.currentMode = mode
        return [formatDeviceMessage({ verb: 'MODE_CHANGE', mode })]
    }

    getState(): DeviceState {
        const s = this.state
        return {
            numModes: s.numModes,
            currentMode: s.currentMode,
            inSync: s.inSync,
            modes: s.modes.map((m) => ({ index: m.index, name: m.name, buttons: m.buttons.map((b) => ({ ...b })) })),
            sliders: s.sliders.map((sl) => ({ ...sl })),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Phase handlers                                                         */
    /* ---------------------------------------------------------------------- */

    private receiveIdle(cmd: HostCommand): string[] {
        if (cmd.verb === 'SYNC_START') return this.startSync()
        if (cmd.verb === 'SYNC_END') return [errorLine(DEVICE_ERROR.notSyncing, 'not syncing')]
        if (!isMutating(cmd)) return []

        const invalid = findInvalidIndex(cmd, this.state.numModes)
        if (invalid) return [errorLine(DEVICE_ERROR.invalidIndex, invalid)]

        this.apply(cmd)
        return [ackFor(cmd)]
    }

    private receiveBuffering(cmd: HostCommand): string[] {
        if (cmd.verb === 'SYNC_START') return this.startSync()
        if (cmd.verb === 'SYNC_END') return this.commitSync()
        if (!isMutating(cmd)) return []

        this.buffer.push(cmd)
        return [ackFor(cmd)]
    }

    private startSync(): string[] {
        this.state = clearedState()
        this.state.inSync = true
        this.buffer = []
        this.phase = 'sync-buffering'
        return [ackLine('SYNC_START')]
    }

    private commitSync(): string[] {
        const buffered = this.buffer
        this.buffer = []

        let finalCount = 1
        for (const cmd of buffered) {
            if (cmd.verb === 'MODE_COUNT') finalCount = cmd.count
        }

        for (const cmd of buffered) {
            const invalid = findInvalidIndex(cmd, finalCount)
            if (invalid) {
                this.state.inSync = false
                this.phase = 'faulted'
                return [errorLine(DEVICE_ERROR.invalidIndex, invalid)]
            }
        }

        this.resizeModes(finalCount)
        for (const cmd of buffered) {
            if (cmd.verb !== 'MODE_COUNT') this.apply(cmd)
        }

        this.state.inSync = false
        this.phase = 'idle'
        return [ackLine('SYNC_COMPLETE')]
    }

    private resizeModes(count: number): void {
        const s = this.state
        const modes: ModeConfig[] = []
        for (let i = 0; i < count; i++) {
            modes.push(s.modes[i] ?? emptyMode(i))
        }
        s.modes = modes
        s.numModes = count
        if (s.currentMode >= count) s.currentMode = 0
    }

    /** Caller has validated indices against the current bounds. */
    private apply(cmd: MutatingCommand): void {
        const s = this.state
        switch (cmd.verb) {
            case 'MODE_COUNT':
                this.resizeModes(cmd.count)
                return
            case 'MODE':
                s.currentMode = cmd.mode
                return
            case 'MODE_NAME': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.name = truncateCodePoints(cmd.name, DECK_LIMITS.modeNameMaxChars)
                return
            }
            case 'BTN': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.buttons[cmd.button] = { configured: true, hotkey: cmd.hotkey, label: cmd.label }
                return
            }
            case 'CLEAR': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.buttons[cmd.button] = emptyButton()
                return
            }
            case 'SLIDER': {
                const slider = s.sliders[cmd.slider]
                if (slider) slider.app = cmd.app
                return
            }
        }
    }
}
