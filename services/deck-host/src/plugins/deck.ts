// services/deck-host/src/plugins/deck.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ChannelLogger, type ClientLogBuffer } from '@deckline/logging'

import { DeckStateAdapter } from '../adapters/deck.adapter.js'
import { MessageBus } from '../core/events/MessageBus.js'
import { makeBusTelemetry } from '../core/events/telemetry.js'
import type { Subscription } from '../core/events/types.js'
import { createMemoryChannelPair, openSerialChannel, type ChannelOpener } from '../core/serial/channels.js'
import { SerialPortEnumerator, type PortLister } from '../core/serial/PortEnumerator.js'
import { setStatus, updateDeckSnapshot } from '../core/state.js'
import {
  attachCollaborators,
  LoggingHotkeyTrigger,
  LoggingVolumeController,
  type DeckCollaborators,
} from '../devices/deck/collaborators.js'
import { DeckConfigStore } from '../devices/deck/DeckConfigStore.js'
import { DeckEventDispatcher } from '../devices/deck/DeckEventDispatcher.js'
import { DeckSessionService } from '../devices/deck/DeckSessionService.js'
import { DeckSimulator } from '../devices/deck/DeckSimulator.js'
import { TransportError } from '../devices/deck/errors.js'
import { DECK_SAFETY_CRITICAL_TOPICS, DECK_TOPICS, isUiRefreshPayload, registerDeckSchemas } from '../devices/deck/topics.js'
import type { DeckServiceConfig, DeckSessionEvent, DeckSessionEventSink } from '../devices/deck/types.js'
import { buildDeckServiceConfigFromEnv } from '../devices/deck/utils.js'

// ---- Fastify decoration ----------------------------------------------------

export interface DeckRuntime {
  config: DeckServiceConfig
  session: DeckSessionService
  store: DeckConfigStore
  bus: MessageBus
  dispatcher: DeckEventDispatcher
  enumerator: SerialPortEnumerator
  /** Loopback device, present while DECK_SIMULATOR is on and a session has opened it. */
  simulator: DeckSimulator | null
}

declare module 'fastify' {
  interface FastifyInstance {
    deck: DeckRuntime
    clientBuf: ClientLogBuffer
  }
}

export interface DeckPluginOptions {
  /** Defaults to the environment. */
  config?: DeckServiceConfig
  /** Replaces serial / loopback opening. */
  opener?: ChannelOpener
  /** Replaces SerialPort.list(). */
  lister?: PortLister
  collaborators?: DeckCollaborators
}

// ---- Event sink using host logging -----------------------------------------

class DeckLoggerEventSink implements DeckSessionEventSink {
  private readonly logSession: ChannelLogger
  private readonly logSync: ChannelLogger
  private readonly logSerial: ChannelLogger
  private readonly logDevice: ChannelLogger

  constructor(channel: (ch: LogChannel) => ChannelLogger) {
    this.logSession = channel(LogChannel.session)
    this.logSync = channel(LogChannel.sync)
    this.logSerial = channel(LogChannel.serial)
    this.logDevice = channel(LogChannel.device)
  }

  publish(evt: DeckSessionEvent): void {
    switch (evt.kind) {
      case 'deck-phase-changed': {
        this.logSession.info(`kind=${evt.kind} from=${evt.from} to=${evt.to}`)
        break
      }
      case 'deck-connected': {
        this.logSession.info(`kind=${evt.kind} path=${evt.path}`)
        break
      }
      case 'deck-ready-received': {
        this.logSession.info(`kind=${evt.kind} version=${evt.version ?? 'unknown'} via=${evt.via}`)
        break
      }
      case 'deck-disconnected': {
        this.logSession.warn(
          `kind=${evt.kind} path=${evt.path} reason=${evt.reason}${evt.error ? ` error=${evt.error}` : ''}`
        )
        break
      }
      case 'deck-reconnect-scheduled': {
        this.logSession.info(`kind=${evt.kind} attempt=${evt.attempt} delayMs=${evt.delayMs}`)
        break
      }
      case 'deck-sync-started': {
        this.logSync.info(`kind=${evt.kind} commands=${evt.commands}`)
        break
      }
      case 'deck-sync-completed': {
        this.logSync.info(`kind=${evt.kind} commands=${evt.commands} durationMs=${evt.durationMs}`)
        break
      }
      case 'deck-sync-superseded': {
        this.logSync.info(`kind=${evt.kind} revision=${evt.revision}`)
        break
      }
      case 'deck-sync-failed': {
        this.logSync.error(`kind=${evt.kind} error=${evt.error}`)
        break
      }
      case 'deck-command-sent': {
        this.logSerial.debug(`kind=${evt.kind} line=${JSON.stringify(evt.line)} attempt=${evt.attempt}`)
        break
      }
      case 'deck-ack-timeout': {
        this.logSerial.warn(`kind=${evt.kind} verb=${evt.verb} attempt=${evt.attempt} maxRetries=${evt.maxRetries}`)
        break
      }
      case 'deck-stray-reply': {
        this.logSerial.warn(`kind=${evt.kind} line=${JSON.stringify(evt.line)}`)
        break
      }
      case 'deck-protocol-error': {
        this.logSerial.warn(`kind=${evt.kind} line=${JSON.stringify(evt.line)} error=${evt.error}`)
        break
      }
      case 'deck-event': {
        this.logDevice.debug(`kind=${evt.kind} verb=${evt.event.verb}`)
        break
      }
      case 'deck-command-failed': {
        this.logSession.warn(
          `kind=${evt.kind} opId=${evt.result.id} verb=${evt.result.verb} error=${evt.result.error?.message ?? 'unknown'}`
        )
        break
      }
      case 'recoverable-error': {
        this.logSession.warn(`kind=${evt.kind} error=${evt.error}`)
        break
      }
      case 'fatal-error': {
        this.logSession.error(`kind=${evt.kind} error=${evt.error}`)
        break
      }

      // Noise suppressed
      case 'deck-command-completed': {
        break
      }
    }
  }
}

class FanoutDeckEventSink implements DeckSessionEventSink {
  private readonly sinks: DeckSessionEventSink[]
  private readonly log: ChannelLogger

  constructor(log: ChannelLogger, ...sinks: DeckSessionEventSink[]) {
    this.log = log
    this.sinks = sinks
  }

  publish(evt: DeckSessionEvent): void {
    for (const sink of this.sinks) {
      try {
        sink.publish(evt)
      } catch (err) {
        this.log.warn(`event sink failed kind=${evt.kind} err=${err instanceof Error ? err.message : String(err)}`)
      }
    }
  }
}

// ---- Plugin implementation -------------------------------------------------

const deckPlugin: FastifyPluginAsync<DeckPluginOptions> = async (app: FastifyInstance, opts) => {
  const { channel } = createLogger('deck-host', app.clientBuf)
  const logPlugin = channel(LogChannel.app)

  const cfg = opts.config ?? buildDeckServiceConfigFromEnv(process.env)

  const bus = new MessageBus({
    defaultQueueCapacity: 256,
    safetyCriticalTopicPatterns: [...DECK_SAFETY_CRITICAL_TOPICS],
    telemetry: makeBusTelemetry(channel(LogChannel.message_bus)),
  })
  registerDeckSchemas(bus)

  const store = new DeckConfigStore(cfg.defaultModes)
  const logDispatcher = channel(LogChannel.dispatcher)
  const dispatcher = new DeckEventDispatcher({
    bus,
    config: store,
    sliderMaxRaw: cfg.sliderMaxRaw,
    log: logDispatcher,
  })

  const enumerator = new SerialPortEnumerator({
    matcher: {
      vendorId: cfg.match.vendorId,
      productId: cfg.match.productId,
      pathRegex: cfg.match.pathRegex ? new RegExp(cfg.match.pathRegex) : undefined,
    },
    preferredPath: cfg.path,
    lister: opts.lister,
  })

  const stateAdapter = new DeckStateAdapter()
  const subs: Subscription[] = [
    ...attachCollaborators(
      bus,
      opts.collaborators ?? {
        hotkeys: new LoggingHotkeyTrigger(logDispatcher),
        volume: new LoggingVolumeController(logDispatcher),
      }
    ),
    bus.subscribePayload(
      DECK_TOPICS.uiRefresh,
      isUiRefreshPayload,
      (p) => {
        stateAdapter.noteMode(p.mode, p.modeName)
        updateDeckSnapshot(stateAdapter.getState())
      },
      { name: 'deck-state' }
    ),
  ]

  let simulator: DeckSimulator | null = null
  const logSimulator = channel(LogChannel.simulator)
  const loopbackOpener: ChannelOpener = async () => {
    await simulator?.stop()
    const pair = createMemoryChannelPair('memory://deck-simulator')
    const sim = new DeckSimulator(pair.device, {
      firmwareVersion: cfg.simulator.firmwareVersion,
      log: logSimulator,
    })
    sim.start()
    simulator = sim
    return pair.host
  }

  const serialOpener: ChannelOpener = async () => {
    const path = await enumerator.pickPort()
    if (!path) throw new TransportError('no matching serial port found')
    return openSerialChannel(path, cfg.baudRate)
  }

  const events = new FanoutDeckEventSink(logPlugin, new DeckLoggerEventSink(channel), {
    publish(evt: DeckSessionEvent): void {
      stateAdapter.handle(evt)
      updateDeckSnapshot({ ...stateAdapter.getState(), stats: session.getStatus().stats })
    },
  })

  const session = new DeckSessionService(cfg.session, {
    opener: opts.opener ?? (cfg.simulator.enabled ? loopbackOpener : serialOpener),
    config: store,
    events,
    onDeviceEvent: (evt) => {
      dispatcher.dispatch(evt)
    },
    onSynced: () => dispatcher.refresh('sync-complete'),
  })

  const runtime: DeckRuntime = {
    config: cfg,
    session,
    store,
    bus,
    dispatcher,
    enumerator,
    get simulator() {
      return simulator
    },
  }
  app.decorate('deck', runtime)

  app.addHook('onReady', async () => {
    logPlugin.info(
      `starting deck session autoConnect=${cfg.autoConnect} simulator=${cfg.simulator.enabled} path=${cfg.path ?? 'auto'}`
    )
    await session.start()
    setStatus('ready')
    if (cfg.autoConnect) {
      session.connect().catch((err: unknown) => {
        logPlugin.warn(`initial connect failed err=${err instanceof Error ? err.message : String(err)}`)
      })
    }
  })

  app.addHook('onClose', async () => {
    logPlugin.info('stopping deck session')
    await session.stop().catch((err: unknown) => {
      logPlugin.warn('error stopping deck session', {
        err: err instanceof Error ? err.message : String(err),
      })
    })
    await simulator?.stop()
    for (const sub of subs) sub.unsubscribe()
  })
}

export default fp(deckPlugin, {
  name: 'deck-plugin',
})
