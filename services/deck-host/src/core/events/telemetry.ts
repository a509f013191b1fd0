import type { ChannelLogger } from '@deckline/logging';

/**
 * Bus telemetry: per-topic counters plus single-line `key=value` logging.
 * Structured extras are never passed to the logger.
 */
export interface BusTelemetry {
  published(topic: string): void;
  delivered(topic: string): void;
  rejected(topic: string, reason: string): void;
  handlerThrew(topic: string): void;
  subscriberDisabled(topic: string): void;

  error(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;

  snapshotCounters(): BusCounters;
}

export interface BusCounters {
  published: Record<string, number>;
  delivered: Record<string, number>;
  rejected: Record<string, number>;
  handlerThrew: Record<string, number>;
  subscriberDisabled: Record<string, number>;
}

function fmtValue(v: unknown): string {
  if (v === null || v === undefined) return String(v);
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  const s = typeof v === 'string' ? v : JSON.stringify(v) ?? String(v);
  return /[\s="]/.test(s) ? `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"` : s;
}

/** `msg k1=v1 k2=v2`, keys sorted. */
export function kvLine(msg: string, fields?: Record<string, unknown>): string {
  if (!fields) return msg;
  const parts = Object.keys(fields)
    .sort()
    .map((k) => `${k}=${fmtValue(fields[k])}`);
  return parts.length ? `${msg} ${parts.join(' ')}` : msg;
}

export function makeBusTelemetry(log?: ChannelLogger): BusTelemetry {
  const counters = {
    published: new Map<string, number>(),
    delivered: new Map<string, number>(),
    rejected: new Map<string, number>(),
    handlerThrew: new Map<string, number>(),
    subscriberDisabled: new Map<string, number>(),
  };
  const inc = (m: Map<string, number>, topic: string) => m.set(topic, (m.get(topic) ?? 0) + 1);
  const snap = (m: Map<string, number>) => Object.fromEntries(m.entries());

  return {
    published: (topic) => inc(counters.published, topic),
    delivered: (topic) => inc(counters.delivered, topic),
    rejected: (topic) => inc(counters.rejected, topic),
    handlerThrew: (topic) => inc(counters.handlerThrew, topic),
    subscriberDisabled: (topic) => inc(counters.subscriberDisabled, topic),

    error: (msg, fields) => log?.error(kvLine(msg, fields)),
    warn: (msg, fields) => log?.warn(kvLine(msg, fields)),

    snapshotCounters: () => ({
      published: snap(counters.published),
      delivered: snap(counters.delivered),
      rejected: snap(counters.rejected),
      handlerThrew: snap(counters.handlerThrew),
      subscriberDisabled: snap(counters.subscriberDisabled),
    }),
  };
}
