import {
  ConfigurationError,
  SCOREBOARD_KEY,
  epochSeconds,
  isSubscriptionTransport,
} from '../domain/index.js';
import type {
  EventRecord,
  Logger,
  RawRecord,
  SubscriptionRequest,
  SubscriptionTransport,
  TelemetryHook,
  TelemetryOutcome,
  TransportSubscription,
} from '../domain/index.js';
import { EventBuffer, DEFAULT_MAX_EVENTS } from './event-buffer.js';

export const SCOREBOARD_OPERATION = 'ScoreboardFeed';
export const SUBSCRIPTION_CLIENT = 'graphql_subscription';
export const DEFAULT_EVENT_LIMIT = 10;

export const SCOREBOARD_QUERY = `
  subscription ScoreboardFeed {
    scoreboard {
      gameId
      season
      week
      homeTeam
      awayTeam
      homePoints
      awayPoints
      status
      startDate
    }
  }
`;

export interface SubscriptionManagerOptions {
  /** `null`/`undefined` when no transport could be built in this environment. */
  transport: SubscriptionTransport | null | undefined;
  log: Logger;
  telemetryHook?: TelemetryHook | undefined;
  maxEvents?: number | undefined;
  clock?: (() => number) | undefined;
}

export interface FeedStatus {
  active: boolean;
  buffered: number;
  capacity: number;
  lastReceivedAt: number | null;
}

/** Lifecycle token for one open transport subscription. */
export class SubscriptionHandle {
  constructor(private readonly subscription: TransportSubscription) {}

  stop(): void {
    this.subscription.stop();
  }
}

/**
 * Owns the single scoreboard subscription and a rolling cache of the
 * records it delivers.
 *
 * Only construction can fail (missing transport). Delivery errors are
 * forwarded to the telemetry hook and never raised; the manager performs
 * no retry or reconnect of its own.
 */
export class CfbdSubscriptionManager {
  private readonly transport: SubscriptionTransport;
  private readonly log: Logger;
  private readonly telemetryHook: TelemetryHook | undefined;
  private readonly clock: () => number;
  private readonly events: EventBuffer<EventRecord>;
  private handle: SubscriptionHandle | null = null;

  constructor(options: SubscriptionManagerOptions) {
    if (!isSubscriptionTransport(options.transport)) {
      throw new ConfigurationError('GraphQL subscription transport is not available in this environment');
    }

    this.transport = options.transport;
    this.log = options.log;
    this.telemetryHook = options.telemetryHook;
    this.clock = options.clock ?? epochSeconds;
    this.events = new EventBuffer<EventRecord>(options.maxEvents ?? DEFAULT_MAX_EVENTS);
  }

  get active(): boolean {
    return this.handle !== null;
  }

  /**
   * Opens the scoreboard subscription. No-op while one is already open.
   *
   * A transport that throws while subscribing is reported through the
   * error path, leaving the manager without a handle.
   */
  startFeed(): void {
    if (this.handle !== null) return;

    const request: SubscriptionRequest = {
      query: SCOREBOARD_QUERY,
      operationName: SCOREBOARD_OPERATION,
    };

    try {
      const subscription = this.transport.subscribe(
        request,
        this.handleEvent,
        this.handleError,
        SCOREBOARD_OPERATION,
      );
      this.handle = new SubscriptionHandle(subscription);
      this.log.info({ operation: SCOREBOARD_OPERATION }, 'Scoreboard feed started');
    } catch (err: unknown) {
      this.handleError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /** Stops the open subscription, if any. Buffered events are kept. */
  stop(): void {
    const handle = this.handle;
    if (handle === null) return;

    this.handle = null;
    try {
      handle.stop();
      this.log.info({ operation: SCOREBOARD_OPERATION }, 'Scoreboard feed stopped');
    } catch (err: unknown) {
      this.log.warn({ err, operation: SCOREBOARD_OPERATION }, 'Transport failed to stop subscription');
    }
  }

  /** Up to `limit` most recent records, oldest first. */
  latestEvents(limit: number = DEFAULT_EVENT_LIMIT): EventRecord[] {
    return this.events.tail(limit);
  }

  status(): FeedStatus {
    return {
      active: this.active,
      buffered: this.events.size,
      capacity: this.events.capacity,
      lastReceivedAt: this.events.last()?.received_at ?? null,
    };
  }

  private readonly handleEvent = (payload: unknown): void => {
    const entries = extractScoreboard(payload);
    if (entries.length === 0) {
      this.log.debug('No scoreboard records in payload');
      return;
    }

    const timestamp = this.clock();
    for (const entry of entries) {
      this.events.append({ ...entry, received_at: timestamp });
    }

    this.emit('subscription_event', timestamp, `${entries.length} scoreboard record(s)`);
  };

  private readonly handleError = (error: Error): void => {
    if (this.telemetryHook === undefined) {
      this.log.debug({ err: error }, 'Subscription error dropped (no telemetry hook)');
      return;
    }
    this.emit('subscription_error', this.clock(), error.message);
  };

  private emit(outcome: TelemetryOutcome, timestamp: number, detail: string): void {
    if (this.telemetryHook === undefined) return;

    try {
      this.telemetryHook({
        timestamp,
        client: SUBSCRIPTION_CLIENT,
        operation: SCOREBOARD_OPERATION,
        outcome,
        detail,
      });
    } catch (err: unknown) {
      this.log.warn({ err, outcome }, 'Telemetry hook failed');
    }
  }
}

/**
 * Pulls scoreboard entries out of a payload. A single object counts as a
 * one-element list; any other shape, and any non-object entry, yields nothing.
 */
function extractScoreboard(payload: unknown): RawRecord[] {
  if (!isRecord(payload)) return [];

  const scoreboard = payload[SCOREBOARD_KEY];
  if (Array.isArray(scoreboard)) {
    return scoreboard.filter(isRecord);
  }
  return isRecord(scoreboard) ? [scoreboard] : [];
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
