// services/deck-host/src/devices/deck/DeckSessionService.ts

import type { ChannelOpener } from '../../core/serial/channels.js'
import { LineTransport } from '../../core/serial/LineTransport.js'
import { buildSyncPlan, type DeckConfigProvider } from './DeckConfigStore.js'
import {
    DeviceError,
    ProtocolError,
    SessionStateError,
    TimeoutError,
    TransportError,
    ValidationError,
    toDeckErrorShape,
} from './errors.js'
import { formatHostCommand, parseDeviceLine, toCommand } from './protocol.js'
import { ReplyLatch } from './ReplyLatch.js'
import type {
    DeckCommandHandle,
    DeckCommandResult,
    DeckSessionConfig,
    DeckSessionEventSink,
    DeckSessionPhase,
    DeckSessionStats,
    DeckSessionStatus,
    DeviceEventMessage,
    DeviceMessage,
    DisconnectReason,
    HostCommand,
    HostVerb,
    PendingAck,
} from './types.js'
import { computeReconnectDelay, joinApps, makeOpId, now } from './utils.js'

type Reply = Extract<DeviceMessage, { verb: 'ACK' | 'PONG' }>

interface PendingSlot {
    info: PendingAck
    latch: ReplyLatch<Reply>
}

interface ReadySignal {
    version: string | null
    via: 'ready' | 'pong'
}

interface QueuedOp {
    id: string
    verb: HostVerb
    createdAt: number
    /** Keepalive pings: no command events, no handle for callers. */
    internal: boolean
    execute: () => Promise<Reply | null>
    resolve: (res: DeckCommandResult) => void
}

export interface DeckSessionDeps {
    opener: ChannelOpener
    config: DeckConfigProvider
    events?: DeckSessionEventSink
    /** Unsolicited device events received while ready. */
    onDeviceEvent?: (evt: DeviceEventMessage) => void
    /** Called after every successful bulk sync. */
    onSynced?: () => void
}

const NOOP_SINK: DeckSessionEventSink = { publish: () => {} }

function expectedToken(cmd: HostCommand): string {
    switch (cmd.verb) {
        case 'SYNC_END':
            return 'SYNC_COMPLETE'
        case 'PING':
            return 'PONG'
        default:
            return cmd.verb
    }
}

/** Echoed indices must match the leading parameters of the command sent. */
function echoMatches(echo: readonly string[], sent: readonly string[]): boolean {
    return echo.length <= sent.length && echo.every((p, i) => p === sent[i])
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

function emptyStats(): DeckSessionStats {
    return {
        connects: 0,
        disconnects: 0,
        syncs: 0,
        commandsSent: 0,
        acksReceived: 0,
        deviceErrors: 0,
        retries: 0,
        lastRetryCount: 0,
        droppedLines: 0,
        eventsReceived: 0,
    }
}

/**
 * Host side of the deck link.
 *
 * Owns the transport for the life of a session: waits for READY, pushes
 * the full configuration in one sync transaction, then serves runtime
 * commands one at a time. At most one command awaits acknowledgment at
 * any moment; unsolicited device events bypass that slot.
 */
export class DeckSessionService {
    private readonly cfg: DeckSessionConfig
    private readonly opener: ChannelOpener
    private readonly config: DeckConfigProvider
    private readonly events: DeckSessionEventSink
    private readonly onDeviceEvent?: (evt: DeviceEventMessage) => void
    private readonly onSynced?: () => void

    private phase: DeckSessionPhase = 'disconnected'
    private transport: LineTransport | null = null
    private path: string | null = null
    private firmwareVersion: string | null = null
    private lastError: string | null = null

    private pending: PendingSlot | null = null
    private ready: ReplyLatch<ReadySignal> | null = null

    private queue: QueuedOp[] = []
    private activeOp: QueuedOp | null = null

    private heartbeatTimer: NodeJS.Timeout | null = null
    private reconnectTimer: NodeJS.Timeout | null = null
    private reconnectAttempts = 0

    private connectInFlight: Promise<void> | null = null
    private explicitClose = false
    private stopping = false

    private readonly stats: DeckSessionStats = emptyStats()

    constructor(cfg: DeckSessionConfig, deps: DeckSessionDeps) {
        this.cfg = cfg
        this.opener = deps.opener
        this.config = deps.config
        this.events = deps.events ?? NOOP_SINK
        this.onDeviceEvent = deps.onDeviceEvent
        this.onSynced = deps.onSynced
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle (called by Fastify plugin)                                   */
    /* ---------------------------------------------------------------------- */

    public async start(): Promise<void> {
        this.stopping = false
    }

    public async stop(): Promise<void> {
        this.stopping = true
        await this.disconnect()
    }

    /** Opens the transport and runs awaiting-ready, sync, ready. No-op when already up. */
    public connect(): Promise<void> {
        if (this.connectInFlight) return this.connectInFlight
        if (this.phase !== 'disconnected') return Promise.resolve()

        this.explicitClose = false
        this.clearReconnectTimer()

        const inFlight = this.establish().finally(() => {
            if (this.connectInFlight === inFlight) this.connectInFlight = null
        })
        this.connectInFlight = inFlight
        return inFlight
    }

    public async disconnect(): Promise<void> {
        this.explicitClose = true
        this.clearReconnectTimer()
        this.reconnectAttempts = 0
        await this.teardown('explicit-close')
    }

    public get currentPhase(): DeckSessionPhase {
        return this.phase
    }

    public getStatus(): DeckSessionStatus {
        const p = this.pending
        return {
            phase: this.phase,
            path: this.path,
            firmwareVersion: this.firmwareVersion,
            pending: p ? { ...p.info, params: [...p.info.params] } : null,
            queueDepth: this.queue.length + (this.activeOp ? 1 : 0),
            stats: { ...this.stats },
            lastError: this.lastError,
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Runtime commands                                                       */
    /* ---------------------------------------------------------------------- */

    /**
     * Queues a mutating command. The handle's `done` always resolves; a
     * device ERROR or exhausted retries yield status 'failed' and leave
     * the session up.
     */
    public sendCommand(cmd: HostCommand): DeckCommandHandle {
        if (cmd.verb === 'SYNC_START' || cmd.verb === 'SYNC_END' || cmd.verb === 'PING' || cmd.verb === 'RESET') {
            return this.failFastHandle(cmd.verb, new ValidationError(`${cmd.verb} is not a runtime command`))
        }
        if (this.phase !== 'ready') {
            return this.failFastHandle(cmd.verb, new SessionStateError(`session is ${this.phase}`))
        }
        try {
            this.config.validateCommand(cmd)
        } catch (err) {
            return this.failFastHandle(cmd.verb, err)
        }

        return this.enqueue(cmd.verb, async () => {
            this.requireReady(cmd.verb)
            if (this.cfg.ack.mode === 'relaxed') {
                await this.writeOnly(cmd)
                this.config.applyConfirmed(cmd)
                return null
            }
            const reply = await this.transact(cmd)
            this.config.applyConfirmed(cmd)
            return reply
        })
    }

    public setMode(mode: number): DeckCommandHandle {
        return this.sendCommand({ verb: 'MODE', mode })
    }

    public setButton(mode: number, button: number, hotkey: string, label: string): DeckCommandHandle {
        return this.sendCommand({ verb: 'BTN', mode, button, hotkey, label })
    }

    public clearButton(mode: number, button: number): DeckCommandHandle {
        return this.sendCommand({ verb: 'CLEAR', mode, button })
    }

    public setSlider(slider: number, apps: readonly string[]): DeckCommandHandle {
        return this.sendCommand({ verb: 'SLIDER', slider, app: joinApps(apps) })
    }

    /** RESET, then awaiting-ready, sync and ready again on the same transport. */
    public resetDevice(): DeckCommandHandle {
        if (this.phase !== 'ready') {
            return this.failFastHandle('RESET', new SessionStateError(`session is ${this.phase}`))
        }

        return this.enqueue('RESET', async () => {
            this.requireReady('RESET')

            const latch = new ReplyLatch<ReadySignal>()
            this.ready = latch

            let reply: Reply
            try {
                reply = await this.transact({ verb: 'RESET' })
            } catch (err) {
                if (this.ready === latch) this.ready = null
                throw err
            }

            this.setPhase('awaiting-ready')
            try {
                await this.awaitReadyAndSync(latch)
            } catch (err) {
                await this.teardown(this.reasonFor(err), err)
                throw err
            }
            return reply
        })
    }

    /** Pushes the current configuration again in a fresh sync transaction. */
    public resync(): DeckCommandHandle {
        if (this.phase !== 'ready') {
            return this.failFastHandle('SYNC_START', new SessionStateError(`session is ${this.phase}`))
        }

        return this.enqueue('SYNC_START', async () => {
            this.requireReady('SYNC_START')
            try {
                await this.runSync()
            } catch (err) {
                await this.teardown(this.reasonFor(err), err)
                throw err
            }
            this.setPhase('ready')
            return null
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Connection establishment                                               */
    /* ---------------------------------------------------------------------- */

    private async establish(): Promise<void> {
        let transport: LineTransport
        try {
            transport = new LineTransport(await this.opener())
        } catch (err) {
            this.lastError = errorMessage(err)
            this.events.publish({ kind: 'recoverable-error', at: now(), error: `open failed: ${this.lastError}` })
            this.scheduleReconnect()
            throw err
        }

        if (this.explicitClose || this.stopping) {
            await transport.close()
            throw new SessionStateError('connect cancelled')
        }

        const latch = new ReplyLatch<ReadySignal>()
        this.transport = transport
        this.ready = latch
        this.path = transport.path
        this.firmwareVersion = null
        this.stats.connects += 1
        this.events.publish({ kind: 'deck-connected', at: now(), path: transport.path })

        void this.readLoop(transport)

        try {
            this.setPhase('awaiting-ready')
            if (this.cfg.readyProbe) await transport.writeLine(formatHostCommand({ verb: 'PING' }))
            await this.awaitReadyAndSync(latch)
        } catch (err) {
            await this.teardown(this.reasonFor(err), err)
            throw err
        }

        this.reconnectAttempts = 0
        this.startHeartbeat()
    }

    private async awaitReadyAndSync(latch: ReplyLatch<ReadySignal>): Promise<void> {
        const timeoutMs = this.cfg.readyTimeoutMs
        const signal = await latch.wait(timeoutMs, () => new TimeoutError(`no READY within ${timeoutMs} ms`, 'ready'))
        if (this.ready === latch) this.ready = null

        if (signal.version) this.firmwareVersion = signal.version
        this.events.publish({ kind: 'deck-ready-received', at: now(), version: signal.version, via: signal.via })

        await this.runSync()
        this.setPhase('ready')
    }

    private reasonFor(err: unknown): DisconnectReason {
        if (err instanceof TimeoutError && err.waitingFor === 'ready') return 'ready-timeout'
        if (err instanceof TransportError) return 'io-error'
        return 'sync-failed'
    }

    /* ---------------------------------------------------------------------- */
    /*  Bulk sync                                                              */
    /* ---------------------------------------------------------------------- */

    /** Repeats the transaction until the configuration it pushed is still current. */
    private async runSync(): Promise<void> {
        this.setPhase('syncing')

        for (;;) {
            const revision = this.config.revision
            const plan = buildSyncPlan(this.config.getSnapshot())
            const total = plan.length + 2
            const startedAt = now()
            this.events.publish({ kind: 'deck-sync-started', at: startedAt, commands: total })

            try {
                await this.transact({ verb: 'SYNC_START' })
                for (const cmd of plan) {
                    if (this.cfg.ack.mode === 'relaxed') await this.writeOnly(cmd)
                    else await this.transact(cmd)
                }
                await this.transact({ verb: 'SYNC_END' })
            } catch (err) {
                this.events.publish({ kind: 'deck-sync-failed', at: now(), error: errorMessage(err) })
                if (err instanceof DeviceError) await this.sendBestEffortReset()
                throw err
            }

            // a completed sync leaves the device on mode 0
            this.config.setCurrentMode(0)
            this.stats.syncs += 1
            this.events.publish({ kind: 'deck-sync-completed', at: now(), commands: total, durationMs: now() - startedAt })

            if (this.config.revision === revision) break
            this.events.publish({ kind: 'deck-sync-superseded', at: now(), revision: this.config.revision })
        }

        this.onSynced?.()
    }

    private async sendBestEffortReset(): Promise<void> {
        const transport = this.transport
        if (!transport) return
        try {
            await transport.writeLine(formatHostCommand({ verb: 'RESET' }))
            this.stats.commandsSent += 1
        } catch (err) {
            this.events.publish({ kind: 'recoverable-error', at: now(), error: `RESET after failed sync not sent: ${errorMessage(err)}` })
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Command exchange                                                       */
    /* ---------------------------------------------------------------------- */

    /**
     * Sends `cmd` and waits for its acknowledgment, retrying on timeout up
     * to the configured bound. A device ERROR or a transport failure ends
     * the exchange immediately.
     */
    private async transact(cmd: HostCommand): Promise<Reply> {
        const line = formatHostCommand(cmd)
        const expect = expectedToken(cmd)
        const waitingFor = cmd.verb === 'PING' ? 'pong' : 'ack'
        const { timeoutMs, maxRetries } = this.cfg.ack

        for (let attempt = 0; ; attempt++) {
            const transport = this.transport
            if (!transport) throw new TransportError(`not connected (sending ${cmd.verb})`)
            if (this.pending) {
                throw new SessionStateError(`${this.pending.info.verb} is still awaiting acknowledgment`)
            }

            const slot: PendingSlot = {
                info: { verb: cmd.verb, params: toCommand(cmd).params, sentAt: now(), retryCount: attempt, expect },
                latch: new ReplyLatch<Reply>(),
            }
            this.pending = slot

            try {
                await transport.writeLine(line)
            } catch (err) {
                if (this.pending === slot) this.pending = null
                throw err
            }
            this.stats.commandsSent += 1
            this.events.publish({ kind: 'deck-command-sent', at: now(), line, attempt: attempt + 1 })

            try {
                const reply = await slot.latch.wait(
                    timeoutMs,
                    () => new TimeoutError(`no ${expect} for ${cmd.verb} within ${timeoutMs} ms`, waitingFor, attempt)
                )
                this.stats.lastRetryCount = attempt
                return reply
            } catch (err) {
                if (this.pending === slot) this.pending = null
                this.stats.lastRetryCount = attempt
                if (!(err instanceof TimeoutError)) throw err

                this.events.publish({ kind: 'deck-ack-timeout', at: now(), verb: cmd.verb, attempt: attempt + 1, maxRetries })
                if (attempt >= maxRetries) {
                    throw new TimeoutError(`no ${expect} for ${cmd.verb} after ${attempt + 1} attempt(s)`, waitingFor, attempt)
                }
                this.stats.retries += 1
            }
        }
    }

    /** Relaxed mode: write without occupying the acknowledgment slot. */
    private async writeOnly(cmd: HostCommand): Promise<void> {
        const transport = this.transport
        if (!transport) throw new TransportError(`not connected (sending ${cmd.verb})`)
        const line = formatHostCommand(cmd)
        await transport.writeLine(line)
        this.stats.commandsSent += 1
        this.stats.lastRetryCount = 0
        this.events.publish({ kind: 'deck-command-sent', at: now(), line, attempt: 1 })
    }

    /* ---------------------------------------------------------------------- */
    /*  Inbound lines                                                          */
    /* ---------------------------------------------------------------------- */

    private async readLoop(transport: LineTransport): Promise<void> {
        for (;;) {
            let line: string
            try {
                line = await transport.readLine()
            } catch (err) {
                if (this.transport === transport) await this.teardown('io-error', err)
                return
            }
            if (this.transport !== transport) return
            this.handleLine(line)
        }
    }

    private handleLine(line: string): void {
        let msg: DeviceMessage
        try {
            msg = parseDeviceLine(line)
        } catch (err) {
            if (!(err instanceof ProtocolError)) throw err
            this.stats.droppedLines += 1
            this.events.publish({ kind: 'deck-protocol-error', at: now(), line, error: err.message })
            return
        }

        switch (msg.verb) {
            case 'READY':
                this.onReady(msg.version ?? null, line)
                return

            case 'PONG':
                if (this.pending?.info.verb === 'PING') {
                    this.settlePending(msg)
                    return
                }
                if (this.cfg.readyProbe && this.ready) {
                    this.ready.resolve({ version: null, via: 'pong' })
                    return
                }
                this.stray(line)
                return

            case 'ACK':
                if (
                    this.pending &&
                    this.pending.info.expect === msg.token &&
                    echoMatches(msg.params, this.pending.info.params)
                ) {
                    this.stats.acksReceived += 1
                    this.settlePending(msg)
                    return
                }
                this.stray(line)
                return

            case 'ERROR': {
                this.stats.deviceErrors += 1
                const pending = this.pending
                if (pending) {
                    this.pending = null
                    pending.latch.reject(new DeviceError(msg.code, msg.message, [pending.info.verb, ...pending.info.params].join(':')))
                    return
                }
                this.lastError = `unsolicited device error ${msg.code}: ${msg.message}`
                this.events.publish({ kind: 'recoverable-error', at: now(), error: this.lastError })
                return
            }

            case 'BTN_PRESS':
            case 'SLIDER_CHANGE':
            case 'MODE_CHANGE':
                this.stats.eventsReceived += 1
                this.events.publish({ kind: 'deck-event', at: now(), event: msg })
                if (this.phase === 'ready' && this.onDeviceEvent) {
                    try {
                        this.onDeviceEvent(msg)
                    } catch (err) {
                        this.events.publish({ kind: 'recoverable-error', at: now(), error: `event dispatch failed: ${errorMessage(err)}` })
                    }
                }
                return
        }
    }

    private onReady(version: string | null, line: string): void {
        if (this.ready) {
            this.ready.resolve({ version, via: 'ready' })
            return
        }
        if (this.phase === 'syncing' || this.phase === 'ready') {
            // the device rebooted and lost everything we pushed
            if (version) this.firmwareVersion = version
            void this.teardown('device-reset', new TransportError('device rebooted (unexpected READY)'))
            return
        }
        this.stray(line)
    }

    private settlePending(reply: Reply): void {
        const p = this.pending
        if (!p) return
        this.pending = null
        p.latch.resolve(reply)
    }

    private stray(line: string): void {
        this.events.publish({ kind: 'deck-stray-reply', at: now(), line })
    }

    /* ---------------------------------------------------------------------- */
    /*  Queue                                                                  */
    /* ---------------------------------------------------------------------- */

    private enqueue(
        verb: HostVerb,
        execute: () => Promise<Reply | null>,
        internal = false
    ): DeckCommandHandle {
        if (this.queue.length >= this.cfg.queue.maxDepth) {
            return this.failFastHandle(verb, new SessionStateError(`queue full (maxDepth=${this.cfg.queue.maxDepth})`))
        }

        const id = makeOpId('deck')
        const createdAt = now()
        const done = new Promise<DeckCommandResult>((resolve) => {
            this.queue.push({ id, verb, createdAt, internal, execute, resolve })
        })

        void this.processQueue()
        return { id, verb, createdAt, done }
    }

    private async processQueue(): Promise<void> {
        if (this.activeOp) return
        const op = this.queue.shift()
        if (!op) return
        this.activeOp = op

        const startedAt = now()
        try {
            const reply = await op.execute()
            const result: DeckCommandResult = {
                id: op.id,
                verb: op.verb,
                status: 'completed',
                startedAt,
                endedAt: now(),
                retries: this.stats.lastRetryCount,
                ack: reply?.verb === 'ACK' ? { token: reply.token, params: reply.params } : undefined,
            }
            op.resolve(result)
            if (!op.internal) this.events.publish({ kind: 'deck-command-completed', at: now(), result })
        } catch (err) {
            const error = toDeckErrorShape(err)
            const result: DeckCommandResult = {
                id: op.id,
                verb: op.verb,
                status: 'failed',
                startedAt,
                endedAt: now(),
                retries: err instanceof TimeoutError ? err.retries : this.stats.lastRetryCount,
                error,
            }
            this.lastError = error.message
            op.resolve(result)
            if (!op.internal) this.events.publish({ kind: 'deck-command-failed', at: now(), result })
        } finally {
            this.activeOp = null
            void this.processQueue()
        }
    }

    private failFastHandle(verb: HostVerb, err: unknown): DeckCommandHandle {
        const at = now()
        const result: DeckCommandResult = {
            id: makeOpId('deck'),
            verb,
            status: 'failed',
            startedAt: at,
            endedAt: at,
            retries: 0,
            error: toDeckErrorShape(err),
        }
        this.events.publish({ kind: 'deck-command-failed', at, result })
        return { id: result.id, verb, createdAt: at, done: Promise.resolve(result) }
    }

    private failQueued(err: Error): void {
        const ops = this.queue.splice(0, this.queue.length)
        for (const op of ops) {
            const at = now()
            const result: DeckCommandResult = {
                id: op.id,
                verb: op.verb,
                status: 'failed',
                startedAt: at,
                endedAt: at,
                retries: 0,
                error: toDeckErrorShape(err),
            }
            op.resolve(result)
            if (!op.internal) this.events.publish({ kind: 'deck-command-failed', at, result })
        }
    }

    private requireReady(verb: HostVerb): void {
        if (this.phase !== 'ready') {
            throw new SessionStateError(`cannot send ${verb} while ${this.phase}`)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Keepalive                                                              */
    /* ---------------------------------------------------------------------- */

    private startHeartbeat(): void {
        this.stopHeartbeat()
        const intervalMs = this.cfg.keepalive.intervalMs
        if (intervalMs <= 0) return
        this.heartbeatTimer = setInterval(() => this.onHeartbeat(), intervalMs)
    }

    private stopHeartbeat(): void {
        if (this.heartbeatTimer) {
            clearInterval(this.heartbeatTimer)
            this.heartbeatTimer = null
        }
    }

    private onHeartbeat(): void {
        if (this.phase !== 'ready' || this.activeOp || this.queue.length > 0) return

        void this.enqueue('PING', async () => {
            try {
                return await this.transact({ verb: 'PING' })
            } catch (err) {
                if (err instanceof TimeoutError) await this.teardown('keepalive-timeout', err)
                throw err
            }
        }, true).done
    }

    /* ---------------------------------------------------------------------- */
    /*  Teardown + reconnect                                                   */
    /* ---------------------------------------------------------------------- */

    /** Releases the transport and fails every outstanding wait. Runs once per session. */
    private async teardown(reason: DisconnectReason, err?: unknown): Promise<void> {
        const transport = this.transport
        if (!transport) return
        this.transport = null
        this.stopHeartbeat()

        const error = err === undefined ? undefined : errorMessage(err)
        if (error) this.lastError = error

        const cause = new TransportError(`session closed reason=${reason}`)
        const pending = this.pending
        this.pending = null
        pending?.latch.reject(cause)
        const ready = this.ready
        this.ready = null
        ready?.reject(cause)
        this.failQueued(cause)

        this.setPhase('disconnected')
        this.stats.disconnects += 1
        this.events.publish({ kind: 'deck-disconnected', at: now(), path: transport.path, reason, error })

        try {
            await transport.close()
        } catch (closeErr) {
            this.events.publish({ kind: 'recoverable-error', at: now(), error: `close failed: ${errorMessage(closeErr)}` })
        }

        if (reason !== 'explicit-close') this.scheduleReconnect()
    }

    private scheduleReconnect(): void {
        const rc = this.cfg.reconnect
        if (!rc.enabled || this.stopping || this.explicitClose) return

        this.clearReconnectTimer()

        if (rc.maxAttempts > 0 && this.reconnectAttempts >= rc.maxAttempts) {
            this.events.publish({ kind: 'fatal-error', at: now(), error: 'reconnect attempts exhausted' })
            return
        }

        this.reconnectAttempts += 1
        const delayMs = computeReconnectDelay(rc, this.reconnectAttempts)
        this.events.publish({ kind: 'deck-reconnect-scheduled', at: now(), attempt: this.reconnectAttempts, delayMs })

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null
            if (this.stopping || this.explicitClose) return
            this.connect().catch((err: unknown) => {
                this.events.publish({ kind: 'recoverable-error', at: now(), error: `reconnect failed: ${errorMessage(err)}` })
            })
        }, delayMs)
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = null
        }
    }

    private setPhase(to: DeckSessionPhase): void {
        const from = this.phase
        if (from === to) return
        this.phase = to
        this.events.publish({ kind: 'deck-phase-changed', at: now(), from, to })
    }
}
