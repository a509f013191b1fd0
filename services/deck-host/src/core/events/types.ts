export type DisableReason = 'backpressure' | 'manual';

export interface BusEvent<TPayload = unknown> {
  /** Dot-separated topic name. */
  topic: string;

  /** Bus assigns one when absent. */
  id?: string;

  /** Publish time (ms since epoch); bus assigns when absent. */
  ts?: number;

  /** Publisher identity (module/service name). */
  source: string;

  /** Payload schema version. */
  schemaVersion: number;

  payload: TPayload;
}

/** An event as handed to subscribers. `seq` is per topic and non-durable. */
export type DeliveredEvent<TPayload = unknown> = Readonly<{
  topic: string;
  id: string;
  seq: number;
  ts: number;
  source: string;
  schemaVersion: number;
  payload: TPayload;
}>;

export type Handler = (event: DeliveredEvent) => void | Promise<void>;

export type PayloadGuard<T> = (payload: unknown) => payload is T;

export interface SubscriptionOptions {
  /** Subscriber identifier for logs. */
  name?: string;

  /** Queue capacity override (defaults to bus config). */
  queueCapacity?: number;

  /** Handler threw or rejected. */
  onError?: (err: unknown, event: DeliveredEvent) => void;

  /** Bus disabled this subscriber. */
  onDisabled?: (reason: DisableReason) => void;
}

export interface Subscription {
  unsubscribe(): void;
  isActive(): boolean;
}

/** Publish side only; what producers such as the event dispatcher need. */
export interface BusPublisher {
  publish<TPayload>(event: BusEvent<TPayload>): void;
}
