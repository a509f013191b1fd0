// services/deck-host/src/adapters/deck.adapter.ts

import type { DeckCommandSummary, DeckStateSnapshot } from '../core/state.js'
import { initialDeck } from '../core/state.js'
import type { DeckCommandResult, DeckSessionEvent } from '../devices/deck/types.js'

const MAX_ERRORS = 50
const MAX_COMMANDS = 100

/**
 * Folds session events into the deck slice of the app state.
 * Counters are taken from the session itself by the caller.
 */
export class DeckStateAdapter {
  private state: DeckStateSnapshot

  constructor() {
    this.state = structuredClone(initialDeck)
  }

  public handle(evt: DeckSessionEvent): void {
    switch (evt.kind) {
      /* ---------------- Link lifecycle ---------------------------------- */
      case 'deck-phase-changed': {
        this.state.phase = evt.to
        this.touch(evt.at)
        break
      }

      case 'deck-connected': {
        this.state.path = evt.path
        this.state.firmwareVersion = null
        this.touch(evt.at)
        break
      }

      case 'deck-ready-received': {
        if (evt.version) this.state.firmwareVersion = evt.version
        this.touch(evt.at)
        break
      }

      case 'deck-disconnected': {
        this.state.phase = 'disconnected'
        this.state.lastDisconnect = { at: evt.at, reason: evt.reason, error: evt.error ?? null }
        if (evt.error) this.pushError(evt.at, evt.error)
        this.touch(evt.at)
        break
      }

      /* ---------------- Sync -------------------------------------------- */
      case 'deck-sync-completed': {
        this.state.lastSync = { at: evt.at, commands: evt.commands, durationMs: evt.durationMs }
        this.state.currentMode = 0
        this.touch(evt.at)
        break
      }

      case 'deck-sync-failed': {
        this.pushError(evt.at, `sync failed: ${evt.error}`)
        this.touch(evt.at)
        break
      }

      /* ---------------- Runtime commands -------------------------------- */
      case 'deck-command-completed':
      case 'deck-command-failed': {
        this.pushCommand(evt.result)
        if (evt.result.error) this.pushError(evt.at, evt.result.error.message)
        this.touch(evt.at)
        break
      }

      /* ---------------- Errors ------------------------------------------ */
      case 'recoverable-error':
      case 'fatal-error': {
        this.pushError(evt.at, evt.error)
        this.touch(evt.at)
        break
      }

      // logs only
      case 'deck-sync-started':
      case 'deck-sync-superseded':
      case 'deck-command-sent':
      case 'deck-ack-timeout':
      case 'deck-stray-reply':
      case 'deck-protocol-error':
      case 'deck-event':
      case 'deck-reconnect-scheduled': {
        break
      }
    }
  }

  /** Mode shown to the user, from UI refresh notifications. */
  public noteMode(mode: number, modeName: string): void {
    this.state.currentMode = mode
    this.state.modeName = modeName
    this.touch(Date.now())
  }

  public getState(): DeckStateSnapshot {
    return structuredClone(this.state)
  }

  /* ---------------------------------------------------------------------- */
  /*  Internal helpers                                                      */
  /* ---------------------------------------------------------------------- */

  private touch(at: number): void {
    this.state.updatedAt = at
  }

  private pushError(at: number, message: string): void {
    this.state.lastError = message
    this.state.errorHistory.unshift({ at, message })
    if (this.state.errorHistory.length > MAX_ERRORS) {
      this.state.errorHistory.length = MAX_ERRORS
    }
  }

  private pushCommand(result: DeckCommandResult): void {
    const summary: DeckCommandSummary = {
      id: result.id,
      verb: result.verb,
      status: result.status,
      retries: result.retries,
      endedAt: result.endedAt,
      error: result.error?.message ?? null,
    }
    this.state.recentCommands.unshift(summary)
    if (this.state.recentCommands.length > MAX_COMMANDS) {
      this.state.recentCommands.length = MAX_COMMANDS
    }
  }
}
