import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  ErrorCallback,
  EventCallback,
  SubscriptionRequest,
  SubscriptionTransport,
  TransportSubscription,
} from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/**
 * In-process transport that records calls and lets tests drive the
 * delivery callbacks directly.
 */
export class FakeTransport implements SubscriptionTransport {
  subscribeCalls = 0;
  stopCalls = 0;
  requests: SubscriptionRequest[] = [];
  operationNames: string[] = [];
  private onEvent: EventCallback | null = null;
  private onError: ErrorCallback | null = null;

  subscribe(
    request: SubscriptionRequest,
    onEvent: EventCallback,
    onError: ErrorCallback,
    operationName: string,
  ): TransportSubscription {
    this.subscribeCalls++;
    this.requests.push(request);
    this.operationNames.push(operationName);
    this.onEvent = onEvent;
    this.onError = onError;
    return {
      stop: () => {
        this.stopCalls++;
      },
    };
  }

  deliver(payload: unknown): void {
    this.onEvent?.(payload);
  }

  fail(error: Error): void {
    this.onError?.(error);
  }
}

let counter = 0;

/** Scoreboard record factory; override any field via the partial parameter. */
export function makeGame(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  counter++;
  return {
    gameId: counter,
    season: 2025,
    week: 12,
    homeTeam: 'Home U',
    awayTeam: 'Away State',
    homePoints: 0,
    awayPoints: 0,
    status: 'in_progress',
    ...overrides,
  };
}
