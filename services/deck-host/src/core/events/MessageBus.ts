import { randomUUID } from 'node:crypto';

import type {
  BusEvent,
  BusPublisher,
  DeliveredEvent,
  DisableReason,
  Handler,
  PayloadGuard,
  Subscription,
  SubscriptionOptions,
} from './types.js';
import { checkTopicName, checkTopicPattern, topicMatches } from './topic.js';
import { SchemaRegistry, type PayloadValidator } from './schema.js';
import { makeBusTelemetry, type BusTelemetry, type BusCounters } from './telemetry.js';

interface Subscriber {
  sid: string;
  name: string;
  segments: string[];
  handler: Handler;
  queueCapacity: number;
  onError?: SubscriptionOptions['onError'];
  onDisabled?: SubscriptionOptions['onDisabled'];
  active: boolean;
  queue: DeliveredEvent[];
  processing: boolean;
}

export interface MessageBusConfig {
  /** Default per-subscriber queue capacity. */
  defaultQueueCapacity: number;

  /**
   * Topics matching these patterns are dropped unless a validator is
   * registered for their schemaVersion and accepts the payload.
   */
  safetyCriticalTopicPatterns: string[];

  telemetry?: BusTelemetry;
}

/**
 * In-process publish/subscribe with per-subscriber bounded queues.
 *
 * Handlers run off the publisher's call stack, one event at a time per
 * subscriber. A subscriber whose queue overflows is disabled. Handler
 * failures are reported on `bus.handler.error`.
 */
export class MessageBus implements BusPublisher {
  private readonly telemetry: BusTelemetry;
  private readonly defaultQueueCapacity: number;
  private readonly schemas = new SchemaRegistry();
  private readonly safetyPatterns: string[][];

  private readonly subscribers = new Map<string, Subscriber>();
  private readonly perTopicSeq = new Map<string, number>();

  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(cfg: MessageBusConfig) {
    if (!Number.isFinite(cfg.defaultQueueCapacity) || cfg.defaultQueueCapacity <= 0) {
      throw new Error('defaultQueueCapacity must be a positive number');
    }
    this.defaultQueueCapacity = cfg.defaultQueueCapacity;
    this.telemetry = cfg.telemetry ?? makeBusTelemetry();

    this.safetyPatterns = cfg.safetyCriticalTopicPatterns.map((p) => {
      const v = checkTopicPattern(p);
      if (!v.ok) throw new Error(`invalid safety-critical pattern "${p}": ${v.reason}`);
      return v.segments;
    });
  }

  registerSchema(topicPattern: string, schemaVersion: number, validator: PayloadValidator): void {
    this.schemas.register(topicPattern, schemaVersion, validator);
  }

  counters(): BusCounters {
    return this.telemetry.snapshotCounters();
  }

  subscribe(topicPattern: string, handler: Handler, options: SubscriptionOptions = {}): Subscription {
    return this.addSubscriber(topicPattern, handler, options);
  }

  /**
   * Subscribe with a payload guard. Events whose payload fails the guard
   * are reported as handler errors instead of reaching `handler`.
   */
  subscribePayload<T>(
    topicPattern: string,
    guard: PayloadGuard<T>,
    handler: (payload: T, event: DeliveredEvent) => void | Promise<void>,
    options: SubscriptionOptions = {}
  ): Subscription {
    return this.subscribe(
      topicPattern,
      (evt) => {
        const payload = evt.payload;
        if (!guard(payload)) throw new Error(`payload rejected by guard topic=${evt.topic}`);
        return handler(payload, evt);
      },
      options
    );
  }

  publish<TPayload>(event: BusEvent<TPayload>): void {
    this.publishInternal(event, false);
  }

  /** Resolves when every queue is drained and no handler is running. */
  idle(): Promise<void> {
    if (this.isDrained()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // ---------- internals ----------

  private addSubscriber(
    topicPattern: string,
    handler: Handler,
    opts: SubscriptionOptions
  ): Subscription {
    const v = checkTopicPattern(topicPattern);
    if (!v.ok) throw new Error(`invalid subscription pattern "${topicPattern}": ${v.reason}`);

    const queueCapacity = opts.queueCapacity ?? this.defaultQueueCapacity;
    if (!Number.isFinite(queueCapacity) || queueCapacity <= 0) {
      throw new Error('queueCapacity must be a positive number');
    }

    const sid = randomUUID();
    const unsubscribe = () => {
      const s = this.subscribers.get(sid);
      if (!s) return;
      s.active = false;
      s.queue.length = 0;
      this.subscribers.delete(sid);
      this.maybeResolveIdle();
    };

    const sub: Subscriber = {
      sid,
      name: opts.name?.trim() || sid,
      segments: v.segments,
      handler,
      queueCapacity,
      onError: opts.onError,
      onDisabled: opts.onDisabled,
      active: true,
      queue: [],
      processing: false,
    };
    this.subscribers.set(sid, sub);

    return { unsubscribe, isActive: () => this.subscribers.get(sid)?.active === true };
  }

  private publishInternal<TPayload>(event: BusEvent<TPayload>, internal: boolean): void {
    const tv = checkTopicName(event.topic);
    if (!tv.ok) {
      this.telemetry.rejected(event.topic, `invalid_topic:${tv.reason}`);
      this.telemetry.error('bus rejected publish: invalid topic', { topic: event.topic, reason: tv.reason });
      return;
    }

    if (!internal && tv.segments[0] === 'bus') {
      this.telemetry.rejected(event.topic, 'reserved_namespace');
      this.telemetry.error('bus rejected publish: reserved namespace bus.*', { topic: event.topic, source: event.source });
      return;
    }

    const delivered: DeliveredEvent = Object.freeze({
      topic: event.topic,
      id: event.id ?? randomUUID(),
      seq: this.nextSeq(event.topic),
      ts: event.ts ?? Date.now(),
      source: event.source,
      schemaVersion: event.schemaVersion,
      payload: event.payload,
    });

    this.telemetry.published(event.topic);

    const rejection = this.checkPayload(delivered);
    if (rejection) {
      this.reject(delivered, rejection);
      return;
    }

    for (const sub of this.subscribers.values()) {
      if (!sub.active) continue;
      if (!topicMatches(sub.segments, delivered.topic)) continue;

      sub.queue.push(delivered);
      if (sub.queue.length > sub.queueCapacity) {
        this.disableSubscriber(sub, 'backpressure', delivered.topic);
        continue;
      }

      if (!sub.processing) {
        sub.processing = true;
        queueMicrotask(() => void this.drainSubscriber(sub));
      }
    }
  }

  /** Returns a rejection reason for safety-critical topics, else null. */
  private checkPayload(evt: DeliveredEvent): string | null {
    const validator = this.schemas.find(evt.topic, evt.schemaVersion);
    const safety = this.safetyPatterns.some((p) => topicMatches(p, evt.topic));

    if (!validator) {
      return safety ? `missing_schema_validator(version=${evt.schemaVersion})` : null;
    }

    let ok: boolean;
    try {
      ok = validator(evt.payload);
    } catch (err) {
      if (safety) return `validator_threw:${String(err)}`;
      this.telemetry.warn('bus payload validator threw (delivering anyway)', { topic: evt.topic, err: String(err) });
      return null;
    }

    if (ok) return null;
    if (safety) return `schema_validation_failed(version=${evt.schemaVersion})`;
    this.telemetry.warn('bus payload validation failed (delivering anyway)', {
      topic: evt.topic,
      schemaVersion: evt.schemaVersion,
      source: evt.source,
    });
    return null;
  }

  private nextSeq(topic: string): number {
    const next = (this.perTopicSeq.get(topic) ?? 0) + 1;
    this.perTopicSeq.set(topic, next);
    return next;
  }

  private reject(evt: DeliveredEvent, reason: string): void {
    this.telemetry.rejected(evt.topic, reason);
    this.telemetry.error('bus rejected safety-critical message', {
      topic: evt.topic,
      reason,
      source: evt.source,
      id: evt.id,
    });

    this.publishInternal(
      {
        topic: 'bus.message.rejected',
        source: 'bus',
        schemaVersion: 1,
        payload: { reason, topic: evt.topic, id: evt.id, source: evt.source },
      },
      true
    );
  }

  private disableSubscriber(sub: Subscriber, reason: DisableReason, lastTopic: string): void {
    if (!sub.active) return;
    sub.active = false;
    const queueSize = sub.queue.length;
    sub.queue.length = 0;
    this.subscribers.delete(sub.sid);

    this.telemetry.subscriberDisabled(lastTopic);
    this.telemetry.error('bus disabled subscriber', { subscriber: sub.name, reason, queueSize, lastTopic });

    try {
      sub.onDisabled?.(reason);
    } catch (err) {
      this.telemetry.error('subscriber onDisabled hook threw', { subscriber: sub.name, err: String(err) });
    }

    this.publishInternal(
      {
        topic: 'bus.subscriber.disabled',
        source: 'bus',
        schemaVersion: 1,
        payload: { subscriber: sub.name, reason, queueSize, lastTopic },
      },
      true
    );

    this.maybeResolveIdle();
  }

  private async drainSubscriber(sub: Subscriber): Promise<void> {
    for (let evt = sub.queue.shift(); evt && sub.active; evt = sub.queue.shift()) {
      this.inFlight += 1;
      try {
        await sub.handler(evt);
        this.telemetry.delivered(evt.topic);
      } catch (err) {
        this.onHandlerError(sub, evt, err);
      } finally {
        this.inFlight -= 1;
      }
    }

    sub.processing = false;
    this.maybeResolveIdle();
  }

  private onHandlerError(sub: Subscriber, evt: DeliveredEvent, err: unknown): void {
    this.telemetry.handlerThrew(evt.topic);
    this.telemetry.error('subscriber handler threw', {
      subscriber: sub.name,
      topic: evt.topic,
      id: evt.id,
      err: String(err),
    });

    try {
      sub.onError?.(err, evt);
    } catch (e2) {
      this.telemetry.error('subscriber onError hook threw', { subscriber: sub.name, err: String(e2) });
    }

    this.publishInternal(
      {
        topic: 'bus.handler.error',
        source: 'bus',
        schemaVersion: 1,
        payload: { subscriber: sub.name, topic: evt.topic, id: evt.id, error: String(err) },
      },
      true
    );
  }

  private isDrained(): boolean {
    if (this.inFlight !== 0) return false;
    for (const sub of this.subscribers.values()) {
      if (sub.processing || sub.queue.length > 0) return false;
    }
    return true;
  }

  private maybeResolveIdle(): void {
    if (this.idleWaiters.length === 0 || !this.isDrained()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
