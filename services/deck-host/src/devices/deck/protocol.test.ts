import { describe, expect, it } from 'vitest'

import { ProtocolError } from './errors.js'
import {
    decodeHostCommand,
    encode,
    formatDeviceMessage,
    formatHostCommand,
    parse,
    parseDeviceLine,
    parseHostLine,
    toCommand,
} from './protocol.js'
import type { DeviceMessage, HostCommand } from './types.js'

const HOST_COMMANDS: HostCommand[] = [
    { verb: 'BTN', mode: 9, button: 8, hotkey: 'ctrl+alt+ß', label: 'Ñandú: ✂️ cut  ' },
    { verb: 'BTN', mode: 0, button: 0, hotkey: 'f13', label: '' },
    { verb: 'MODE', mode: 7 },
    { verb: 'MODE_COUNT', count: 10 },
    { verb: 'MODE_NAME', mode: 3, name: '🎵 Music: Live' },
    { verb: 'SLIDER', slider: 2, app: 'C:\\Apps\\Discord.exe,Spotify.exe' },
    { verb: 'CLEAR', mode: 4, button: 6 },
    { verb: 'SYNC_START' },
    { verb: 'SYNC_END' },
    { verb: 'PING' },
    { verb: 'RESET' },
]

const DEVICE_MESSAGES: DeviceMessage[] = [
    { verb: 'READY', version: '1.0.0-β:rc1' },
    { verb: 'READY' },
    { verb: 'BTN_PRESS', mode: 2, button: 8 },
    { verb: 'SLIDER_CHANGE', slider: 1, value: 1023 },
    { verb: 'MODE_CHANGE', mode: 9 },
    { verb: 'ACK', token: 'BTN', params: ['0', '1'] },
    { verb: 'ACK', token: 'SYNC_COMPLETE', params: [] },
    { verb: 'ERROR', code: 3, message: 'bad line: BTN:x' },
    { verb: 'ERROR', code: 4, message: '' },
    { verb: 'PONG' },
]

describe('parse', () => {
    it('splits verb and fields and strips one terminator', () => {
        expect(parse('BTN_PRESS:2:7\n')).toEqual({ verb: 'BTN_PRESS', params: ['2', '7'] })
        expect(parse('PONG\r\n')).toEqual({ verb: 'PONG', params: [] })
        expect(parse('SYNC_START')).toEqual({ verb: 'SYNC_START', params: [] })
    })

    it('keeps separators inside a free-text last field', () => {
        expect(parse('MODE_NAME:3:Edit: Video')).toEqual({ verb: 'MODE_NAME', params: ['3', 'Edit: Video'] })
        expect(parse('BTN:0:4:ctrl+shift+s:Save: all')).toEqual({
            verb: 'BTN',
            params: ['0', '4', 'ctrl+shift+s', 'Save: all'],
        })
        expect(parse('ERROR:3:bad line: BTN')).toEqual({ verb: 'ERROR', params: ['3', 'bad line: BTN'] })
    })

    it('keeps empty trailing fields', () => {
        expect(parse('BTN:1:2:alt+tab:')).toEqual({ verb: 'BTN', params: ['1', '2', 'alt+tab', ''] })
        expect(parse('SLIDER:0:')).toEqual({ verb: 'SLIDER', params: ['0', ''] })
    })

    it('splits unknown verbs on every separator', () => {
        expect(parse('FOO:a:b:c')).toEqual({ verb: 'FOO', params: ['a', 'b', 'c'] })
    })

    it('rejects empty lines and missing verbs', () => {
        expect(() => parse('')).toThrow(ProtocolError)
        expect(() => parse('\n')).toThrow('empty line')
        expect(() => parse(':1:2')).toThrow('missing verb')
    })

    it('rejects wrong field counts', () => {
        expect(() => parse('MODE')).toThrow('MODE expects at least 1 field(s), got 0')
        expect(() => parse('MODE:1:2')).toThrow('MODE expects at most 1 field(s), got 2')
        expect(() => parse('BTN:1:2:ctrl+c')).toThrow('BTN expects at least 4 field(s), got 3')
        expect(() => parse('PONG:1')).toThrow('PONG expects at most 0 field(s), got 1')
    })
})

describe('encode', () => {
    it('joins fields and appends a newline', () => {
        expect(encode('BTN', 0, 1, 'ctrl+c', 'Copy')).toBe('BTN:0:1:ctrl+c:Copy\n')
        expect(encode('PING')).toBe('PING\n')
    })

    it('parses back to the same fields for free-text values', () => {
        const line = encode('MODE_NAME', 5, 'a:b:c')
        expect(parse(line)).toEqual({ verb: 'MODE_NAME', params: ['5', 'a:b:c'] })
    })

    it('round-trips every host command', () => {
        expect(new Set(HOST_COMMANDS.map((c) => c.verb)).size).toBe(10)
        for (const cmd of HOST_COMMANDS) {
            const { verb, params } = toCommand(cmd)
            expect(parseHostLine(encode(verb, ...params))).toEqual(cmd)
        }
    })

    it('round-trips every device message', () => {
        expect(new Set(DEVICE_MESSAGES.map((m) => m.verb)).size).toBe(7)
        for (const msg of DEVICE_MESSAGES) {
            expect(parseDeviceLine(`${formatDeviceMessage(msg)}\n`)).toEqual(msg)
        }
    })
})

describe('typed host commands', () => {
    it('decodes every host verb', () => {
        expect(parseHostLine('BTN:2:8:f5:Run')).toEqual({ verb: 'BTN', mode: 2, button: 8, hotkey: 'f5', label: 'Run' })
        expect(parseHostLine('MODE:4')).toEqual({ verb: 'MODE', mode: 4 })
        expect(parseHostLine('MODE_COUNT:10')).toEqual({ verb: 'MODE_COUNT', count: 10 })
        expect(parseHostLine('MODE_NAME:1:Media')).toEqual({ verb: 'MODE_NAME', mode: 1, name: 'Media' })
        expect(parseHostLine('SLIDER:2:spotify,vlc')).toEqual({ verb: 'SLIDER', slider: 2, app: 'spotify,vlc' })
        expect(parseHostLine('CLEAR:0:3')).toEqual({ verb: 'CLEAR', mode: 0, button: 3 })
        expect(parseHostLine('SYNC_END')).toEqual({ verb: 'SYNC_END' })
        expect(parseHostLine('RESET')).toEqual({ verb: 'RESET' })
    })

    it('keeps a multi-byte mode name verbatim', () => {
        expect(parse('MODE_NAME:3:🎵 Music')).toEqual({ verb: 'MODE_NAME', params: ['3', '🎵 Music'] })
        expect(parseHostLine('MODE_NAME:3:🎵 Music')).toEqual({ verb: 'MODE_NAME', mode: 3, name: '🎵 Music' })
    })

    it('rejects non-integer index fields', () => {
        expect(() => parseHostLine('MODE:x')).toThrow('MODE field mode is not an integer: "x"')
        expect(() => parseHostLine('CLEAR:1:2.5')).toThrow(ProtocolError)
    })

    it('rejects device verbs', () => {
        expect(() => decodeHostCommand({ verb: 'PONG', params: [] })).toThrow('unknown host verb PONG')
    })

    it('formats commands without a terminator', () => {
        expect(formatHostCommand({ verb: 'BTN', mode: 0, button: 0, hotkey: 'ctrl+z', label: '' })).toBe('BTN:0:0:ctrl+z:')
        expect(formatHostCommand({ verb: 'SLIDER', slider: 1, app: 'chrome' })).toBe('SLIDER:1:chrome')
        expect(formatHostCommand({ verb: 'SYNC_START' })).toBe('SYNC_START')
    })
})

describe('typed device messages', () => {
    it('decodes READY with and without a version', () => {
        expect(parseDeviceLine('READY')).toEqual({ verb: 'READY' })
        expect(parseDeviceLine('READY:')).toEqual({ verb: 'READY' })
        expect(parseDeviceLine('READY:fw-2.1')).toEqual({ verb: 'READY', version: 'fw-2.1' })
    })

    it('decodes acks with their echoed params', () => {
        expect(parseDeviceLine('ACK:BTN:1:4')).toEqual({ verb: 'ACK', token: 'BTN', params: ['1', '4'] })
        expect(parseDeviceLine('ACK:SYNC_COMPLETE')).toEqual({ verb: 'ACK', token: 'SYNC_COMPLETE', params: [] })
    })

    it('decodes errors with and without a message', () => {
        expect(parseDeviceLine('ERROR:1:mode 12 out of range')).toEqual({
            verb: 'ERROR',
            code: 1,
            message: 'mode 12 out of range',
        })
        expect(parseDeviceLine('ERROR:4')).toEqual({ verb: 'ERROR', code: 4, message: '' })
    })

    it('decodes events', () => {
        expect(parseDeviceLine('BTN_PRESS:0:5')).toEqual({ verb: 'BTN_PRESS', mode: 0, button: 5 })
        expect(parseDeviceLine('SLIDER_CHANGE:1:512')).toEqual({ verb: 'SLIDER_CHANGE', slider: 1, value: 512 })
        expect(parseDeviceLine('MODE_CHANGE:3')).toEqual({ verb: 'MODE_CHANGE', mode: 3 })
    })

    it('rejects host verbs and garbage', () => {
        expect(() => parseDeviceLine('PING')).toThrow('unknown device verb PING')
        expect(() => parseDeviceLine('SLIDER_CHANGE:1:loud')).toThrow(ProtocolError)
    })

    it('formats messages', () => {
        expect(formatDeviceMessage({ verb: 'ACK', token: 'CLEAR', params: ['2', '3'] })).toBe('ACK:CLEAR:2:3')
        expect(formatDeviceMessage({ verb: 'ERROR', code: 2, message: '' })).toBe('ERROR:2')
        expect(formatDeviceMessage({ verb: 'READY', version: '1.0' })).toBe('READY:1.0')
    })
})
