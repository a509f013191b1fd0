// services/deck-host/src/routes/deck.ts
import type { FastifyPluginAsync, FastifyReply } from 'fastify'

import { DeckError, ValidationError, toDeckErrorShape, type DeckErrorShape } from '../devices/deck/errors.js'
import { DECK_LIMITS, type DeckCommandHandle, type DeckSnapshot } from '../devices/deck/types.js'

/* -------------------------
   Minimal validation helpers
--------------------------*/
function isObject(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

function intOrNull(v: unknown): number | null {
    if (typeof v === 'number' && Number.isInteger(v)) return v
    if (typeof v === 'string' && /^-?\d+$/.test(v.trim())) return Number(v.trim())
    return null
}

function stringList(v: unknown): string[] | null {
    if (!Array.isArray(v)) return null
    const out: string[] = []
    for (const item of v) {
        if (typeof item !== 'string') return null
        out.push(item)
    }
    return out
}

function parseButton(v: unknown): { hotkey: string; label: string } | null | undefined {
    if (v === null) return null
    if (!isObject(v) || typeof v.hotkey !== 'string') return undefined
    return { hotkey: v.hotkey, label: typeof v.label === 'string' ? v.label : '' }
}

/** Shape check only; ranges and field contents are checked by the store. */
function parseSnapshot(body: unknown): DeckSnapshot | string {
    if (!isObject(body)) return 'body must be an object'

    const numModes = intOrNull(body.numModes)
    if (numModes === null) return 'numModes (integer) required'
    const currentMode = body.currentMode === undefined ? 0 : intOrNull(body.currentMode)
    if (currentMode === null) return 'currentMode must be an integer'
    if (!Array.isArray(body.modes)) return 'modes (array) required'

    const modes: DeckSnapshot['modes'] = []
    for (const m of body.modes) {
        if (!isObject(m)) return 'every mode must be an object'
        const index = intOrNull(m.index)
        if (index === null) return 'mode index (integer) required'
        if (typeof m.name !== 'string') return `mode ${index}: name (string) required`

        const rawButtons: unknown[] = Array.isArray(m.buttons) ? m.buttons : []
        const buttons: DeckSnapshot['modes'][number]['buttons'] = []
        for (let b = 0; b < DECK_LIMITS.buttonsPerMode; b++) {
            const parsed = parseButton(rawButtons[b] ?? null)
            if (parsed === undefined) return `mode ${index} button ${b}: hotkey (string) required`
            buttons.push(parsed)
        }
        if (rawButtons.length > DECK_LIMITS.buttonsPerMode) {
            return `mode ${index}: at most ${DECK_LIMITS.buttonsPerMode} buttons`
        }
        modes.push({ index, name: m.name, buttons })
    }

    const sliders: DeckSnapshot['sliders'] = []
    if (body.sliders !== undefined) {
        if (!Array.isArray(body.sliders)) return 'sliders must be an array'
        for (const s of body.sliders) {
            if (!isObject(s)) return 'every slider must be an object'
            const slider = intOrNull(s.slider)
            const apps = stringList(s.apps)
            if (slider === null || apps === null) return 'slider (integer) and apps (string[]) required'
            sliders.push({ slider, apps })
        }
    }

    return { numModes, currentMode, modes, sliders }
}

/* -------------------------
   Reply helpers
--------------------------*/
function statusFor(error: DeckErrorShape): number {
    switch (error.code) {
        case 'VALIDATION':
            return 400
        case 'STATE':
            return 409
        case 'UNKNOWN':
            return 500
        default:
            return 502
    }
}

function fail(reply: FastifyReply, err: unknown) {
    const error = toDeckErrorShape(err)
    reply.code(statusFor(error))
    return { ok: false, error: error.message, code: error.code }
}

async function settle(reply: FastifyReply, handle: DeckCommandHandle) {
    const result = await handle.done
    if (result.status === 'completed') return { ok: true, result }
    const error: DeckErrorShape = result.error ?? { message: 'command failed', code: 'UNKNOWN', retryable: false }
    reply.code(statusFor(error))
    return { ok: false, error: error.message, code: error.code, result }
}

/* -------------------------
   Routes
--------------------------*/
const deckRoutes: FastifyPluginAsync = async (app) => {
    app.get('/api/deck/status', async () => {
        const { session, store } = app.deck
        const status = session.getStatus()
        return {
            ok: true,
            phase: status.phase,
            path: status.path,
            firmwareVersion: status.firmwareVersion,
            currentMode: store.currentMode,
            modeName: store.getModeName(store.currentMode),
            queueDepth: status.queueDepth,
            pending: status.pending,
            stats: status.stats,
            lastError: status.lastError,
        }
    })

    app.get('/api/deck/config', async () => ({ ok: true, config: app.deck.store.getSnapshot() }))

    app.put('/api/deck/config', async (req, reply) => {
        const parsed = parseSnapshot(req.body)
        if (typeof parsed === 'string') return fail(reply, new ValidationError(parsed))

        const { session, store, dispatcher } = app.deck
        try {
            store.replace(parsed)
        } catch (err) {
            return fail(reply, err)
        }

        if (session.currentPhase !== 'ready') {
            dispatcher.refresh('config-replaced')
            return { ok: true, synced: false, config: store.getSnapshot() }
        }

        const res = await settle(reply, session.resync())
        return { ...res, synced: res.ok, config: store.getSnapshot() }
    })

    app.get('/api/deck/ports', async (_req, reply) => {
        try {
            return { ok: true, ports: await app.deck.enumerator.list() }
        } catch (err) {
            reply.code(500)
            return { ok: false, error: err instanceof Error ? err.message : String(err) }
        }
    })

    app.post('/api/deck/connect', async (_req, reply) => {
        try {
            await app.deck.session.connect()
        } catch (err) {
            if (err instanceof DeckError) return fail(reply, err)
            throw err
        }
        return { ok: true, phase: app.deck.session.currentPhase }
    })

    app.post('/api/deck/disconnect', async () => {
        await app.deck.session.disconnect()
        return { ok: true, phase: app.deck.session.currentPhase }
    })

    app.post('/api/deck/reset', async (_req, reply) => settle(reply, app.deck.session.resetDevice()))

    app.post('/api/deck/mode', async (req, reply) => {
        const mode = isObject(req.body) ? intOrNull(req.body.mode) : null
        if (mode === null) return fail(reply, new ValidationError('mode (integer) required'))
        return settle(reply, app.deck.session.setMode(mode))
    })

    app.put<{ Params: { mode: string; button: string } }>('/api/deck/buttons/:mode/:button', async (req, reply) => {
        const mode = intOrNull(req.params.mode)
        const button = intOrNull(req.params.button)
        if (mode === null || button === null) return fail(reply, new ValidationError('mode and button must be integers'))

        const body = req.body
        if (!isObject(body) || typeof body.hotkey !== 'string') {
            return fail(reply, new ValidationError('hotkey (string) required'))
        }
        const label = typeof body.label === 'string' ? body.label : ''
        return settle(reply, app.deck.session.setButton(mode, button, body.hotkey, label))
    })

    app.delete<{ Params: { mode: string; button: string } }>('/api/deck/buttons/:mode/:button', async (req, reply) => {
        const mode = intOrNull(req.params.mode)
        const button = intOrNull(req.params.button)
        if (mode === null || button === null) return fail(reply, new ValidationError('mode and button must be integers'))
        return settle(reply, app.deck.session.clearButton(mode, button))
    })

    app.put<{ Params: { slider: string } }>('/api/deck/sliders/:slider', async (req, reply) => {
        const slider = intOrNull(req.params.slider)
        if (slider === null) return fail(reply, new ValidationError('slider must be an integer'))

        const apps = isObject(req.body) ? stringList(req.body.apps) : null
        if (apps === null) return fail(reply, new ValidationError('apps (string[]) required'))
        return settle(reply, app.deck.session.setSlider(slider, apps))
    })
}

export default deckRoutes
