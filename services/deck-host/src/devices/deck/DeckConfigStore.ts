// services/deck-host/src/devices/deck/DeckConfigStore.ts

import { ValidationError } from './errors.js'
import {
    DECK_LIMITS,
    FIELD_SEPARATOR,
    type DeckSnapshot,
    type HostCommand,
} from './types.js'
import { codePointLength, defaultModeName, joinApps, splitApps } from './utils.js'

type ButtonSlot = DeckSnapshot['modes'][number]['buttons'][number]
type ModeEntry = DeckSnapshot['modes'][number]

/** What the session needs from the host's configuration. */
export interface DeckConfigProvider {
    /** Bumped whenever the whole configuration is replaced. */
    readonly revision: number
    getSnapshot(): DeckSnapshot
    applyConfirmed(cmd: HostCommand): void
    setCurrentMode(mode: number): boolean
    validateCommand(cmd: HostCommand): void
}

function emptyMode(index: number): ModeEntry {
    return {
        index,
        name: defaultModeName(index),
        buttons: Array.from({ length: DECK_LIMITS.buttonsPerMode }, (): ButtonSlot => null),
    }
}

export function emptySnapshot(numModes = 1): DeckSnapshot {
    return {
        numModes,
        currentMode: 0,
        modes: Array.from({ length: numModes }, (_, i) => emptyMode(i)),
        sliders: Array.from({ length: DECK_LIMITS.sliders }, (_, slider) => ({ slider, apps: [] })),
    }
}

function cloneSnapshot(s: DeckSnapshot): DeckSnapshot {
    return {
        numModes: s.numModes,
        currentMode: s.currentMode,
        modes: s.modes.map((m) => ({
            index: m.index,
            name: m.name,
            buttons: m.buttons.map((b) => (b ? { hotkey: b.hotkey, label: b.label } : null)),
        })),
        sliders: s.sliders.map((sl) => ({ slider: sl.slider, apps: [...sl.apps] })),
    }
}

/* -------------------------------------------------------------------------- */
/*  Field checks shared by snapshot and command validation                     */
/* -------------------------------------------------------------------------- */

function checkIndex(what: string, n: number, maxExclusive: number): void {
    if (!Number.isInteger(n) || n < 0 || n >= maxExclusive) {
        throw new ValidationError(`${what} ${n} out of range [0, ${maxExclusive})`)
    }
}

function checkModeCount(n: number): void {
    if (!Number.isInteger(n) || n < DECK_LIMITS.minModes || n > DECK_LIMITS.maxModes) {
        throw new ValidationError(`mode count ${n} out of range [${DECK_LIMITS.minModes}, ${DECK_LIMITS.maxModes}]`)
    }
}

function checkSingleLine(what: string, v: string): void {
    if (/[\r\n]/.test(v)) throw new ValidationError(`${what} must not contain line breaks`)
}

/** Fixed (non-trailing) fields must not carry the separator. */
function checkFixedField(what: string, v: string): void {
    checkSingleLine(what, v)
    if (v.includes(FIELD_SEPARATOR)) throw new ValidationError(`${what} must not contain '${FIELD_SEPARATOR}'`)
}

function checkModeName(name: string): void {
    checkSingleLine('mode name', name)
    if (codePointLength(name) > DECK_LIMITS.modeNameMaxChars) {
        throw new ValidationError(`mode name longer than ${DECK_LIMITS.modeNameMaxChars} characters`)
    }
}

function checkApps(apps: readonly string[]): void {
    for (const app of apps) {
        checkSingleLine('slider app', app)
        if (app.includes(',')) throw new ValidationError(`slider app ${JSON.stringify(app)} must not contain ','`)
    }
}

/* -------------------------------------------------------------------------- */
/*  Sync plan                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Body of a bulk sync, in wire order: MODE_COUNT, every MODE_NAME,
 * every configured BTN (modes then buttons ascending), every assigned
 * SLIDER. SYNC_START / SYNC_END are added by the session.
 */
export function buildSyncPlan(snapshot: DeckSnapshot): HostCommand[] {
    const plan: HostCommand[] = [{ verb: 'MODE_COUNT', count: snapshot.numModes }]

    const modes = [...snapshot.modes].sort((a, b) => a.index - b.index)
    for (const m of modes) {
        plan.push({ verb: 'MODE_NAME', mode: m.index, name: m.name })
    }
    for (const m of modes) {
        m.buttons.forEach((b, button) => {
            if (b) plan.push({ verb: 'BTN', mode: m.index, button, hotkey: b.hotkey, label: b.label })
        })
    }

    const sliders = [...snapshot.sliders].sort((a, b) => a.slider - b.slider)
    for (const sl of sliders) {
        const app = joinApps(sl.apps)
        if (app) plan.push({ verb: 'SLIDER', slider: sl.slider, app })
    }

    return plan
}

/* -------------------------------------------------------------------------- */
/*  Store                                                                      */
/* -------------------------------------------------------------------------- */

export class DeckConfigStore implements DeckConfigProvider {
    private snap: DeckSnapshot
    private rev = 0

    constructor(initial: DeckSnapshot | number = 1) {
        if (typeof initial === 'number') {
            checkModeCount(initial)
            this.snap = emptySnapshot(initial)
        } else {
            DeckConfigStore.validateSnapshot(initial)
            this.snap = DeckConfigStore.normalize(initial)
        }
    }

    get numModes(): number {
        return this.snap.numModes
    }

    get currentMode(): number {
        return this.snap.currentMode
    }

    get revision(): number {
        return this.rev
    }

    getSnapshot(): DeckSnapshot {
        return cloneSnapshot(this.snap)
    }

    replace(snapshot: DeckSnapshot): void {
        DeckConfigStore.validateSnapshot(snapshot)
        this.snap = DeckConfigStore.normalize(snapshot)
        this.rev += 1
    }

    setCurrentMode(mode: number): boolean {
        if (!Number.isInteger(mode) || mode < 0 || mode >= this.snap.numModes) return false
        this.snap.currentMode = mode
        return true
    }

    getButton(mode: number, button: number): { hotkey: string; label: string } | null {
        const slot = this.snap.modes[mode]?.buttons[button]
        return slot ? { hotkey: slot.hotkey, label: slot.label } : null
    }

    getModeName(mode: number): string | null {
        return this.snap.modes[mode]?.name ?? null
    }

    getSliderApps(slider: number): string[] {
        return [...(this.snap.sliders.find((s) => s.slider === slider)?.apps ?? [])]
    }

    /** Host-side checks run before a runtime command goes on the wire. */
    validateCommand(cmd: HostCommand): void {
        switch (cmd.verb) {
            case 'MODE':
                checkIndex('mode', cmd.mode, this.snap.numModes)
                return
            case 'MODE_COUNT':
                checkModeCount(cmd.count)
                return
            case 'MODE_NAME':
                checkIndex('mode', cmd.mode, this.snap.numModes)
                checkModeName(cmd.name)
                return
            case 'BTN':
                checkIndex('mode', cmd.mode, this.snap.numModes)
                checkIndex('button', cmd.button, DECK_LIMITS.buttonsPerMode)
                if (cmd.hotkey.length === 0) throw new ValidationError('hotkey is required')
                checkFixedField('hotkey', cmd.hotkey)
                checkSingleLine('label', cmd.label)
                return
            case 'CLEAR':
                checkIndex('mode', cmd.mode, this.snap.numModes)
                checkIndex('button', cmd.button, DECK_LIMITS.buttonsPerMode)
                return
            case 'SLIDER':
                checkIndex('slider', cmd.slider, DECK_LIMITS.sliders)
                checkSingleLine('slider app', cmd.app)
                return
            case 'SYNC_START':
            case 'SYNC_END':
            case 'PING':
            case 'RESET':
                return
        }
    }

    /** Records a command the device has acknowledged. */
    applyConfirmed(cmd: HostCommand): void {
        const s = this.snap
        switch (cmd.verb) {
            case 'MODE':
                this.setCurrentMode(cmd.mode)
                return
            case 'MODE_COUNT': {
                const modes: ModeEntry[] = []
                for (let i = 0; i < cmd.count; i++) modes.push(s.modes[i] ?? emptyMode(i))
                s.modes = modes
                s.numModes = cmd.count
                if (s.currentMode >= cmd.count) s.currentMode = 0
                return
            }
            case 'MODE_NAME': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.name = cmd.name
                return
            }
            case 'BTN': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.buttons[cmd.button] = { hotkey: cmd.hotkey, label: cmd.label }
                return
            }
            case 'CLEAR': {
                const mode = s.modes[cmd.mode]
                if (mode) mode.buttons[cmd.button] = null
                return
            }
            case 'SLIDER': {
                const slider = s.sliders.find((sl) => sl.slider === cmd.slider)
                if (slider) slider.apps = splitApps(cmd.app)
                return
            }
            case 'SYNC_START':
            case 'SYNC_END':
            case 'PING':
            case 'RESET':
                return
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Snapshot validation                                                    */
    /* ---------------------------------------------------------------------- */

    static validateSnapshot(s: DeckSnapshot): void {
        checkModeCount(s.numModes)
        checkIndex('current mode', s.currentMode, s.numModes)

        if (s.modes.length !== s.numModes) {
            throw new ValidationError(`expected ${s.numModes} modes, got ${s.modes.length}`)
        }

        const seenModes = new Set<number>()
        for (const m of s.modes) {
            checkIndex('mode', m.index, s.numModes)
            if (seenModes.has(m.index)) throw new ValidationError(`duplicate mode ${m.index}`)
            seenModes.add(m.index)
            checkModeName(m.name)

            if (m.buttons.length !== DECK_LIMITS.buttonsPerMode) {
                throw new ValidationError(`mode ${m.index} must have ${DECK_LIMITS.buttonsPerMode} button slots`)
            }
            for (const b of m.buttons) {
                if (!b) continue
                checkFixedField('hotkey', b.hotkey)
                checkSingleLine('label', b.label)
            }
        }

        const seenSliders = new Set<number>()
        for (const sl of s.sliders) {
            checkIndex('slider', sl.slider, DECK_LIMITS.sliders)
            if (seenSliders.has(sl.slider)) throw new ValidationError(`duplicate slider ${sl.slider}`)
            seenSliders.add(sl.slider)
            checkApps(sl.apps)
        }
    }

    /** Modes ordered by index; every slider present. */
    private static normalize(s: DeckSnapshot): DeckSnapshot {
        const copy = cloneSnapshot(s)
        copy.modes.sort((a, b) => a.index - b.index)
        const sliders = Array.from({ length: DECK_LIMITS.sliders }, (_, slider) => ({
            slider,
            apps: copy.sliders.find((sl) => sl.slider === slider)?.apps.map((a) => a.trim()).filter(Boolean) ?? [],
        }))
        copy.sliders = sliders
        return copy
    }
}
