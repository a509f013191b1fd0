// services/deck-host/src/core/serial/channels.ts
import { Duplex } from 'node:stream'
import { SerialPort } from 'serialport'
import { TimeoutError, TransportError } from '../../devices/deck/errors.js'

/**
 * An exclusively owned byte stream plus the means to release it.
 * Serial ports and in-process pipes both satisfy this.
 */
export interface ChannelHandle {
  readonly path: string
  readonly stream: Duplex
  close(): Promise<void>
}

export type ChannelOpener = () => Promise<ChannelHandle>

export interface SerialChannelOptions {
  openTimeoutMs?: number
}

export async function openSerialChannel(
  path: string,
  baudRate = 9600,
  opts: SerialChannelOptions = {}
): Promise<ChannelHandle> {
  const openTimeoutMs = opts.openTimeoutMs ?? 3000
  // 8N1
  const port = new SerialPort({ path, baudRate, dataBits: 8, parity: 'none', stopBits: 1, autoOpen: false })

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup()
      reject(new TimeoutError(`timeout opening ${path} @ ${baudRate}`, 'open'))
    }, openTimeoutMs)
    const onOpen = () => { cleanup(); resolve() }
    const onError = (err: Error) => {
      cleanup()
      reject(new TransportError(`failed to open ${path}: ${err.message}`, { cause: err }))
    }
    const cleanup = () => { clearTimeout(timer); port.off('open', onOpen); port.off('error', onError) }

    port.on('open', onOpen)
    port.on('error', onError)
    port.open()
  })

  return {
    path,
    stream: port,
    close: () =>
      new Promise<void>((resolve) => {
        if (!port.isOpen) { resolve(); return }
        port.close((err) => {
          if (err) port.destroy()
          resolve()
        })
      }),
  }
}

/* -------------------------------------------------------------------------- */
/*  In-process channel pair                                                    */
/* -------------------------------------------------------------------------- */

class MemoryEnd extends Duplex {
  peer: MemoryEnd | null = null

  override _read(): void {
    // data is pushed by the peer's writes
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const peer = this.peer
    if (!peer || peer.destroyed) {
      callback(new Error('peer closed'))
      return
    }
    peer.push(chunk)
    callback()
  }

  override _destroy(err: Error | null, callback: (error: Error | null) => void): void {
    const peer = this.peer
    this.peer = null
    if (peer) {
      peer.peer = null
      if (!peer.destroyed) {
        peer.push(null)
        peer.destroy()
      }
    }
    callback(err)
  }
}

function memoryHandle(end: MemoryEnd, path: string): ChannelHandle {
  return {
    path,
    stream: end,
    close: () =>
      new Promise<void>((resolve) => {
        if (end.destroyed) { resolve(); return }
        end.once('close', () => resolve())
        end.destroy()
      }),
  }
}

/** Two connected ends; closing either one closes both. */
export function createMemoryChannelPair(path = 'memory://deck'): { host: ChannelHandle; device: ChannelHandle } {
  const a = new MemoryEnd()
  const b = new MemoryEnd()
  a.peer = b
  b.peer = a
  return { host: memoryHandle(a, path), device: memoryHandle(b, `${path}#device`) }
}
