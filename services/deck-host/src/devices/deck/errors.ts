// services/deck-host/src/devices/deck/errors.ts

export type DeckErrorCode =
    | 'TRANSPORT'
    | 'TIMEOUT'
    | 'PROTOCOL'
    | 'DEVICE'
    | 'VALIDATION'
    | 'STATE'

export type DeckErrorShape = {
    message: string
    code: DeckErrorCode | 'UNKNOWN'
    retryable: boolean
}

export abstract class DeckError extends Error {
    abstract readonly code: DeckErrorCode
    abstract readonly retryable: boolean

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Channel closed or IO failure. The session cannot continue on this link. */
export class TransportError extends DeckError {
    readonly code = 'TRANSPORT'
    readonly retryable = false
}

export type TimeoutTarget = 'ready' | 'ack' | 'pong' | 'open'

export class TimeoutError extends DeckError {
    readonly code = 'TIMEOUT'
    readonly retryable = true
    readonly waitingFor: TimeoutTarget
    /** Retries spent after the first attempt. */
    readonly retries: number

    constructor(message: string, waitingFor: TimeoutTarget, retries = 0) {
        super(message)
        this.waitingFor = waitingFor
        this.retries = retries
    }
}

/** Malformed line or wrong field count. Non-fatal: the line is dropped. */
export class ProtocolError extends DeckError {
    readonly code = 'PROTOCOL'
    readonly retryable = false
    readonly line: string

    constructor(message: string, line: string) {
        super(message)
        this.line = line
    }
}

/** The device answered `ERROR:code:message`. */
export class DeviceError extends DeckError {
    readonly code = 'DEVICE'
    readonly retryable = false
    readonly deviceCode: number
    readonly deviceMessage: string

    constructor(deviceCode: number, deviceMessage: string, context?: string) {
        super(`device error ${deviceCode}${deviceMessage ? `: ${deviceMessage}` : ''}${context ? ` (${context})` : ''}`)
        this.deviceCode = deviceCode
        this.deviceMessage = deviceMessage
    }
}

export class ValidationError extends DeckError {
    readonly code = 'VALIDATION'
    readonly retryable = false
}

export class SessionStateError extends DeckError {
    readonly code = 'STATE'
    readonly retryable = false
}

export function toDeckErrorShape(err: unknown): DeckErrorShape {
    if (err instanceof DeckError) {
        return { message: err.message, code: err.code, retryable: err.retryable }
    }
    if (err instanceof Error) {
        return { message: err.message, code: 'UNKNOWN', retryable: false }
    }
    return { message: String(err), code: 'UNKNOWN', retryable: false }
}
