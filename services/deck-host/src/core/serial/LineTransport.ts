// services/deck-host/src/core/serial/LineTransport.ts
import { ReadlineParser } from '@serialport/parser-readline'
import { TransportError } from '../../devices/deck/errors.js'
import type { ChannelHandle, ChannelOpener } from './channels.js'

interface Reader {
  resolve: (line: string) => void
  reject: (err: Error) => void
}

/**
 * Newline framing over an owned channel.
 *
 * Lines are decoded as UTF-8 after framing on raw bytes, so a multi-byte
 * character split across reads is reassembled before decoding.
 */
export class LineTransport {
  private readonly channel: ChannelHandle
  private readonly parser: ReadlineParser
  private readonly lines: string[] = []
  private readonly readers: Reader[] = []

  private closed = false
  private closeError: TransportError | null = null
  private closing: Promise<void> | null = null

  constructor(channel: ChannelHandle) {
    this.channel = channel
    this.parser = channel.stream.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }))

    this.parser.on('data', (data: string) => this.onLine(data))
    channel.stream.once('close', () => this.markClosed(new TransportError(`channel closed path=${channel.path}`)))
    channel.stream.on('error', (err: Error) =>
      this.markClosed(new TransportError(`channel error path=${channel.path}: ${err.message}`, { cause: err }))
    )
  }

  get path(): string {
    return this.channel.path
  }

  get isOpen(): boolean {
    return !this.closed
  }

  /** Resolves with the next non-empty line; rejects once the channel is gone. */
  readLine(): Promise<string> {
    const queued = this.lines.shift()
    if (queued !== undefined) return Promise.resolve(queued)
    if (this.closed) {
      return Promise.reject(this.closeError ?? new TransportError('transport closed'))
    }
    return new Promise<string>((resolve, reject) => {
      this.readers.push({ resolve, reject })
    })
  }

  writeLine(text: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(this.closeError ?? new TransportError('transport closed'))
    }
    const stream = this.channel.stream
    return new Promise<void>((resolve, reject) => {
      stream.write(`${text}\n`, 'utf8', (err?: Error | null) => {
        if (err) {
          reject(new TransportError(`write failed path=${this.channel.path}: ${err.message}`, { cause: err }))
          return
        }
        resolve()
      })
    })
  }

  close(): Promise<void> {
    if (this.closing) return this.closing
    this.markClosed(new TransportError('transport closed'))
    this.lines.length = 0
    this.closing = (async () => {
      this.channel.stream.unpipe(this.parser)
      await this.channel.close()
    })()
    return this.closing
  }

  private onLine(data: string): void {
    if (this.closed) return
    const line = data.endsWith('\r') ? data.slice(0, -1) : data
    if (line.length === 0) return

    const reader = this.readers.shift()
    if (reader) {
      reader.resolve(line)
      return
    }
    this.lines.push(line)
  }

  private markClosed(err: TransportError): void {
    if (this.closed) return
    this.closed = true
    this.closeError = err
    const pending = this.readers.splice(0, this.readers.length)
    for (const r of pending) r.reject(err)
  }
}

/** Opens a channel, runs `fn`, and closes the transport on every exit path. */
export async function withLineTransport<T>(
  opener: ChannelOpener,
  fn: (transport: LineTransport) => Promise<T>
): Promise<T> {
  const transport = new LineTransport(await opener())
  try {
    return await fn(transport)
  } finally {
    await transport.close()
  }
}
