// services/deck-host/src/devices/deck/protocol.ts

import { ProtocolError } from './errors.js'
import {
    FIELD_SEPARATOR,
    LINE_TERMINATOR,
    type Command,
    type DeviceMessage,
    type DeviceVerb,
    type HostCommand,
    type HostVerb,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Per-verb field rules                                                       */
/* -------------------------------------------------------------------------- */

interface VerbRule {
    min: number
    /** null = unbounded, every field split */
    max: number | null
    /** Last field keeps any separators it contains. */
    freeTail: boolean
}

const HOST_RULES: Record<HostVerb, VerbRule> = {
    BTN: { min: 4, max: 4, freeTail: true },
    MODE: { min: 1, max: 1, freeTail: false },
    MODE_COUNT: { min: 1, max: 1, freeTail: false },
    MODE_NAME: { min: 2, max: 2, freeTail: true },
    SLIDER: { min: 2, max: 2, freeTail: true },
    CLEAR: { min: 2, max: 2, freeTail: false },
    SYNC_START: { min: 0, max: 0, freeTail: false },
    SYNC_END: { min: 0, max: 0, freeTail: false },
    PING: { min: 0, max: 0, freeTail: false },
    RESET: { min: 0, max: 0, freeTail: false },
}

const DEVICE_RULES: Record<DeviceVerb, VerbRule> = {
    READY: { min: 0, max: 1, freeTail: true },
    BTN_PRESS: { min: 2, max: 2, freeTail: false },
    SLIDER_CHANGE: { min: 2, max: 2, freeTail: false },
    MODE_CHANGE: { min: 1, max: 1, freeTail: false },
    ACK: { min: 1, max: null, freeTail: false },
    ERROR: { min: 1, max: 2, freeTail: true },
    PONG: { min: 0, max: 0, freeTail: false },
}

export function isHostVerb(verb: string): verb is HostVerb {
    return Object.prototype.hasOwnProperty.call(HOST_RULES, verb)
}

export function isDeviceVerb(verb: string): verb is DeviceVerb {
    return Object.prototype.hasOwnProperty.call(DEVICE_RULES, verb)
}

function ruleFor(verb: string): VerbRule | null {
    if (isHostVerb(verb)) return HOST_RULES[verb]
    if (isDeviceVerb(verb)) return DEVICE_RULES[verb]
    return null
}

/* -------------------------------------------------------------------------- */
/*  Untyped parse / encode                                                     */
/* -------------------------------------------------------------------------- */

function stripTerminator(line: string): string {
    if (line.endsWith('\r\n')) return line.slice(0, -2)
    if (line.endsWith(LINE_TERMINATOR)) return line.slice(0, -1)
    return line
}

function splitLimited(rest: string, maxFields: number): string[] {
    const parts: string[] = []
    let remaining = rest
    while (parts.length < maxFields - 1) {
        const idx = remaining.indexOf(FIELD_SEPARATOR)
        if (idx < 0) break
        parts.push(remaining.slice(0, idx))
        remaining = remaining.slice(idx + 1)
    }
    parts.push(remaining)
    return parts
}

/**
 * Split a wire line into verb and fields.
 *
 * Verbs with a free-text last field keep every separator after the last
 * fixed one (`MODE_NAME:3:a:b` has name `a:b`). Unknown verbs split on
 * every separator so the receiver can reject them by verb.
 */
export function parse(line: string): Command {
    const text = stripTerminator(line)
    if (text.length === 0) {
        throw new ProtocolError('empty line', line)
    }

    const sep = text.indexOf(FIELD_SEPARATOR)
    const verb = sep < 0 ? text : text.slice(0, sep)
    if (verb.length === 0) {
        throw new ProtocolError('missing verb', line)
    }

    const rest = sep < 0 ? null : text.slice(sep + 1)
    const rule = ruleFor(verb)

    if (rest === null) {
        if (rule && rule.min > 0) {
            throw new ProtocolError(`${verb} expects at least ${rule.min} field(s), got 0`, line)
        }
        return { verb, params: [] }
    }

    if (!rule) {
        return { verb, params: rest.split(FIELD_SEPARATOR) }
    }

    const params = rule.freeTail && rule.max !== null
        ? splitLimited(rest, rule.max)
        : rest.split(FIELD_SEPARATOR)

    if (params.length < rule.min) {
        throw new ProtocolError(`${verb} expects at least ${rule.min} field(s), got ${params.length}`, line)
    }
    if (rule.max !== null && params.length > rule.max) {
        throw new ProtocolError(`${verb} expects at most ${rule.max} field(s), got ${params.length}`, line)
    }

    return { verb, params }
}

/** Join verb and params, append the terminator. Free text is never escaped. */
export function encode(verb: string, ...params: Array<string | number>): string {
    return formatCommand({ verb, params: params.map(String) }) + LINE_TERMINATOR
}

export function formatCommand(cmd: Command): string {
    return [cmd.verb, ...cmd.params].join(FIELD_SEPARATOR)
}

/* -------------------------------------------------------------------------- */
/*  Typed decoding                                                             */
/* -------------------------------------------------------------------------- */

const INTEGER_RE = /^-?\d+$/

function intField(cmd: Command, idx: number, name: string): number {
    const raw = cmd.params[idx]
    if (raw === undefined || !INTEGER_RE.test(raw)) {
        throw new ProtocolError(`${cmd.verb} field ${name} is not an integer: ${JSON.stringify(raw ?? '')}`, formatCommand(cmd))
    }
    return Number.parseInt(raw, 10)
}

function textField(cmd: Command, idx: number): string {
    return cmd.params[idx] ?? ''
}

function checkArity(cmd: Command, rule: VerbRule): void {
    const n = cmd.params.length
    if (n < rule.min || (rule.max !== null && n > rule.max)) {
        throw new ProtocolError(`${cmd.verb} has ${n} field(s)`, formatCommand(cmd))
    }
}

export function decodeHostCommand(cmd: Command): HostCommand {
    const verb = cmd.verb
    if (!isHostVerb(verb)) {
        throw new ProtocolError(`unknown host verb ${verb}`, formatCommand(cmd))
    }
    checkArity(cmd, HOST_RULES[verb])

    switch (verb) {
        case 'BTN':
            return {
                verb: 'BTN',
                mode: intField(cmd, 0, 'mode'),
                button: intField(cmd, 1, 'button'),
                hotkey: textField(cmd, 2),
                label: textField(cmd, 3),
            }
        case 'MODE':
            return { verb: 'MODE', mode: intField(cmd, 0, 'mode') }
        case 'MODE_COUNT':
            return { verb: 'MODE_COUNT', count: intField(cmd, 0, 'count') }
        case 'MODE_NAME':
            return { verb: 'MODE_NAME', mode: intField(cmd, 0, 'mode'), name: textField(cmd, 1) }
        case 'SLIDER':
            return { verb: 'SLIDER', slider: intField(cmd, 0, 'slider'), app: textField(cmd, 1) }
        case 'CLEAR':
            return { verb: 'CLEAR', mode: intField(cmd, 0, 'mode'), button: intField(cmd, 1, 'button') }
        case 'SYNC_START':
        case 'SYNC_END':
        case 'PING':
        case 'RESET':
            return { verb }
    }
}

export function decodeDeviceMessage(cmd: Command): DeviceMessage {
    const verb = cmd.verb
    if (!isDeviceVerb(verb)) {
        throw new ProtocolError(`unknown device verb ${verb}`, formatCommand(cmd))
    }
    checkArity(cmd, DEVICE_RULES[verb])

    switch (verb) {
        case 'READY': {
            const version = cmd.params[0]
            return version ? { verb: 'READY', version } : { verb: 'READY' }
        }
        case 'BTN_PRESS':
            return { verb: 'BTN_PRESS', mode: intField(cmd, 0, 'mode'), button: intField(cmd, 1, 'button') }
        case 'SLIDER_CHANGE':
            return { verb: 'SLIDER_CHANGE', slider: intField(cmd, 0, 'slider'), value: intField(cmd, 1, 'value') }
        case 'MODE_CHANGE':
            return { verb: 'MODE_CHANGE', mode: intField(cmd, 0, 'mode') }
        case 'ACK':
            return { verb: 'ACK', token: textField(cmd, 0), params: cmd.params.slice(1) }
        case 'ERROR':
            return { verb: 'ERROR', code: intField(cmd, 0, 'code'), message: textField(cmd, 1) }
        case 'PONG':
            return { verb: 'PONG' }
    }
}

/* -------------------------------------------------------------------------- */
/*  Typed formatting (no terminator)                                           */
/* -------------------------------------------------------------------------- */

export function toCommand(cmd: HostCommand): Command {
    switch (cmd.verb) {
        case 'BTN':
            return { verb: cmd.verb, params: [String(cmd.mode), String(cmd.button), cmd.hotkey, cmd.label] }
        case 'MODE':
            return { verb: cmd.verb, params: [String(cmd.mode)] }
        case 'MODE_COUNT':
            return { verb: cmd.verb, params: [String(cmd.count)] }
        case 'MODE_NAME':
            return { verb: cmd.verb, params: [String(cmd.mode), cmd.name] }
        case 'SLIDER':
            return { verb: cmd.verb, params: [String(cmd.slider), cmd.app] }
        case 'CLEAR':
            return { verb: cmd.verb, params: [String(cmd.mode), String(cmd.button)] }
        case 'SYNC_START':
        case 'SYNC_END':
        case 'PING':
        case 'RESET':
            return { verb: cmd.verb, params: [] }
    }
}

export function formatHostCommand(cmd: HostCommand): string {
    return formatCommand(toCommand(cmd))
}

export function formatDeviceMessage(msg: DeviceMessage): string {
    switch (msg.verb) {
        case 'READY':
            return msg.version ? `READY:${msg.version}` : 'READY'
        case 'BTN_PRESS':
            return `BTN_PRESS:${msg.mode}:${msg.button}`
        case 'SLIDER_CHANGE':
            return `SLIDER_CHANGE:${msg.slider}:${msg.value}`
        case 'MODE_CHANGE':
            return `MODE_CHANGE:${msg.mode}`
        case 'ACK':
            return formatCommand({ verb: 'ACK', params: [msg.token, ...msg.params] })
        case 'ERROR':
            return msg.message ? `ERROR:${msg.code}:${msg.message}` : `ERROR:${msg.code}`
        case 'PONG':
            return 'PONG'
    }
}

export function parseHostLine(line: string): HostCommand {
    return decodeHostCommand(parse(line))
}

export function parseDeviceLine(line: string): DeviceMessage {
    return decodeDeviceMessage(parse(line))
}
