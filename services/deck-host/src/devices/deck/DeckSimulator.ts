// services/deck-host/src/devices/deck/DeckSimulator.ts

import type { ChannelLogger } from '@deckline/logging'

import type { ChannelHandle } from '../../core/serial/channels.js'
import { LineTransport } from '../../core/serial/LineTransport.js'
import { DeckDeviceMachine, type DeckDevicePhase } from './DeckDeviceMachine.js'
import type { DeviceState } from './types.js'
import { sleep } from './utils.js'

export interface DeckSimulatorOptions {
    firmwareVersion?: string
    /** Delay before READY, on start and after RESET. */
    bootDelayMs?: number
    /** Delay before every reply. */
    replyDelayMs?: number
    /** Boot as soon as started (default true). */
    autoBoot?: boolean
    /** Return true to swallow the replies to a received line. */
    dropReply?: (line: string) => boolean
    log?: ChannelLogger
}

/**
 * Runs a DeckDeviceMachine on the device end of a channel.
 * Stands in for hardware in tests and in the host's loopback mode.
 */
export class DeckSimulator {
    readonly machine: DeckDeviceMachine
    /** Every line received from the host, in order. */
    readonly received: string[] = []

    private readonly transport: LineTransport
    private readonly opts: DeckSimulatorOptions
    private bootTimer: NodeJS.Timeout | null = null
    private running = false
    private loop: Promise<void> | null = null

    constructor(channel: ChannelHandle, opts: DeckSimulatorOptions = {}) {
        this.opts = opts
        this.machine = new DeckDeviceMachine({ firmwareVersion: opts.firmwareVersion })
        this.transport = new LineTransport(channel)
    }

    get phase(): DeckDevicePhase {
        return this.machine.currentPhase
    }

    getState(): DeviceState {
        return this.machine.getState()
    }

    start(): void {
        if (this.running) return
        this.running = true
        this.loop = this.readLoop()
        if (this.opts.autoBoot ?? true) this.scheduleBoot()
    }

    async stop(): Promise<void> {
        this.running = false
        this.clearBootTimer()
        await this.transport.close()
        await this.loop
    }

    /** Simulated power loss: state is wiped and READY is announced again. */
    async powerCycle(): Promise<void> {
        this.clearBootTimer()
        await this.emit(this.machine.boot())
    }

    pressButton(button: number): Promise<void> {
        return this.emit(this.machine.pressButton(button))
    }

    moveSlider(slider: number, value: number): Promise<void> {
        return this.emit(this.machine.moveSlider(slider, value))
    }

    changeMode(mode: number): Promise<void> {
        return this.emit(this.machine.changeMode(mode))
    }

    private scheduleBoot(): void {
        this.clearBootTimer()
        this.bootTimer = setTimeout(() => {
            this.bootTimer = null
            if (!this.running) return
            void this.emit(this.machine.boot())
        }, this.opts.bootDelayMs ?? 0)
    }

    private clearBootTimer(): void {
        if (this.bootTimer) {
            clearTimeout(this.bootTimer)
            this.bootTimer = null
        }
    }

    private async readLoop(): Promise<void> {
        while (this.running) {
            let line: string
            try {
                line = await this.transport.readLine()
            } catch (err) {
                this.opts.log?.debug(`simulator read loop ended reason=${err instanceof Error ? err.message : String(err)}`)
                return
            }

            this.received.push(line)
            const replies = this.machine.receive(line)

            if (this.opts.dropReply?.(line)) {
                this.opts.log?.debug(`simulator dropped replies line=${JSON.stringify(line)} replies=${replies.length}`)
                continue
            }

            if (this.opts.replyDelayMs) await sleep(this.opts.replyDelayMs)
            await this.emit(replies)

            if (replies[0] === 'ACK:RESET') this.scheduleBoot()
        }
    }

    /** Writes lines in order; a closed channel ends the simulation quietly. */
    private async emit(lines: string[]): Promise<void> {
        for (const line of lines) {
            if (!this.transport.isOpen) return
            try {
                await this.transport.writeLine(line)
                this.opts.log?.debug(`simulator tx line=${JSON.stringify(line)}`)
            } catch (err) {
                this.opts.log?.debug(`simulator write failed err=${err instanceof Error ? err.message : String(err)}`)
                return
            }
        }
    }
}
