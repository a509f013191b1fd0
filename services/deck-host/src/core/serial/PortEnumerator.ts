// services/deck-host/src/core/serial/PortEnumerator.ts
import { SerialPort } from 'serialport'

/**
 * Static filters used to recognise the deck among enumerated ports.
 * Every field that is set must match.
 */
export interface PortMatcher {
  vendorId?: string                // hex, e.g. "2341"
  productId?: string
  serialNumber?: string            // exact device binding
  pathRegex?: RegExp
}

export interface PortInfo {
  path: string
  vendorId?: string
  productId?: string
  serialNumber?: string
  manufacturer?: string
}

export type PortLister = () => Promise<PortInfo[]>

export interface SerialPortEnumeratorOptions {
  matcher?: PortMatcher
  /** Configured path; wins over enumeration when set. */
  preferredPath?: string | null
  lister?: PortLister
}

export function normalizeHex(v?: string): string | undefined {
  if (!v) return undefined
  const t = v.trim().toLowerCase().replace(/^0x/, '')
  return t ? t.padStart(4, '0') : undefined
}

const defaultLister: PortLister = async () => {
  const ports = await SerialPort.list()
  return ports.map((p) => ({
    path: p.path,
    vendorId: p.vendorId,
    productId: p.productId,
    serialNumber: p.serialNumber,
    manufacturer: p.manufacturer,
  }))
}

export class SerialPortEnumerator {
  private readonly matcher: PortMatcher
  private readonly preferredPath: string | null
  private readonly lister: PortLister

  constructor(opts: SerialPortEnumeratorOptions = {}) {
    this.matcher = opts.matcher ?? {}
    this.preferredPath = opts.preferredPath ?? null
    this.lister = opts.lister ?? defaultLister
  }

  async list(): Promise<PortInfo[]> {
    const ports = await this.lister()
    return ports
      .map((p) => ({ ...p, vendorId: normalizeHex(p.vendorId), productId: normalizeHex(p.productId) }))
      .filter((p) => this.matches(p))
  }

  async pickPort(): Promise<string | null> {
    if (this.preferredPath) return this.preferredPath
    const [first] = await this.list()
    return first?.path ?? null
  }

  private matches(p: PortInfo): boolean {
    const m = this.matcher
    const vid = normalizeHex(m.vendorId)
    const pid = normalizeHex(m.productId)
    if (vid && p.vendorId !== vid) return false
    if (pid && p.productId !== pid) return false
    if (m.serialNumber && p.serialNumber !== m.serialNumber) return false
    if (m.pathRegex && !m.pathRegex.test(p.path)) return false
    return true
  }
}
