import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * We mock graphql-ws so no socket is ever opened.
 */
vi.mock('graphql-ws', () => ({
  createClient: vi.fn(),
}));

import { createClient } from 'graphql-ws';
import type { Client } from 'graphql-ws';
import WebSocket from 'ws';
import {
  GraphQLSubscriptionTransport,
  createGraphQLTransport,
  resolveGraphQLTransport,
  retryDelay,
  toError,
} from '../../src/infrastructure/graphql/graphql-transport.js';
import type { GraphQLClient } from '../../src/infrastructure/graphql/graphql-transport.js';
import { fakeLogger } from '../helpers.js';

const mockCreateClient = vi.mocked(createClient);

interface CapturedSink {
  next(value: { data?: unknown; errors?: readonly { message: string }[] }): void;
  error(err: unknown): void;
  complete(): void;
}

/** graphql-ws client stand-in that captures the subscribe sink. */
function fakeClient() {
  const captured: { payload: unknown; sink: CapturedSink | null } = { payload: null, sink: null };
  const unsubscribe = vi.fn();
  const client = {
    subscribe: vi.fn((payload: unknown, sink: CapturedSink) => {
      captured.payload = payload;
      captured.sink = sink;
      return unsubscribe;
    }),
    dispose: vi.fn(),
  };
  return { client, captured, unsubscribe };
}

const request = { query: 'subscription ScoreboardFeed { scoreboard { gameId } }', operationName: 'ScoreboardFeed' };

beforeEach(() => {
  vi.clearAllMocks();
});

// ── GraphQLSubscriptionTransport ─────────────────────────

describe('GraphQLSubscriptionTransport', () => {
  function setup() {
    const fake = fakeClient();
    const transport = new GraphQLSubscriptionTransport(fake.client as unknown as GraphQLClient, fakeLogger());
    const onEvent = vi.fn();
    const onError = vi.fn();
    const subscription = transport.subscribe(request, onEvent, onError, 'ScoreboardFeed');
    return { ...fake, transport, onEvent, onError, subscription };
  }

  it('subscribes with the query and operation name', () => {
    const { captured, client } = setup();

    expect(client.subscribe).toHaveBeenCalledTimes(1);
    expect(captured.payload).toEqual({
      query: request.query,
      operationName: 'ScoreboardFeed',
      variables: null,
    });
  });

  it('passes result data to onEvent', () => {
    const { captured, onEvent, onError } = setup();

    captured.sink?.next({ data: { scoreboard: [{ gameId: 1 }] } });

    expect(onEvent).toHaveBeenCalledWith({ scoreboard: [{ gameId: 1 }] });
    expect(onError).not.toHaveBeenCalled();
  });

  it('turns GraphQL errors in a result into one Error', () => {
    const { captured, onEvent, onError } = setup();

    captured.sink?.next({ errors: [{ message: 'field not found' }, { message: 'bad week' }], data: null });

    expect(onEvent).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledWith(new Error('field not found; bad week'));
  });

  it('forwards both errors and data of a partial result', () => {
    const { captured, onEvent, onError } = setup();

    captured.sink?.next({ errors: [{ message: 'partial' }], data: { scoreboard: [] } });

    expect(onError).toHaveBeenCalledWith(new Error('partial'));
    expect(onEvent).toHaveBeenCalledWith({ scoreboard: [] });
  });

  it('passes sink errors to onError as Error', () => {
    const { captured, onError } = setup();

    captured.sink?.error({ code: 4403, reason: 'Forbidden' });

    expect(onError).toHaveBeenCalledWith(new Error('Socket closed with code 4403: Forbidden'));
  });

  it('does not report completion as an error', () => {
    const { captured, onError } = setup();

    captured.sink?.complete();

    expect(onError).not.toHaveBeenCalled();
  });

  it('stop unsubscribes exactly once', () => {
    const { subscription, unsubscribe } = setup();

    subscription.stop();
    subscription.stop();

    expect(unsubscribe).toHaveBeenCalledTimes(1);
  });

  it('close disposes the client', async () => {
    const { transport, client } = setup();

    await transport.close();

    expect(client.dispose).toHaveBeenCalledTimes(1);
  });
});

// ── createGraphQLTransport / resolveGraphQLTransport ─────

describe('createGraphQLTransport', () => {
  it('builds a lazy ws client for the production host', () => {
    mockCreateClient.mockReturnValueOnce(fakeClient().client as unknown as Client);

    const transport = createGraphQLTransport({ apiKey: 'test-secret', graphqlHost: 'production' }, fakeLogger());

    expect(transport).toBeInstanceOf(GraphQLSubscriptionTransport);
    expect(mockCreateClient).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'wss://graphql.collegefootballdata.com/v1/graphql',
        webSocketImpl: WebSocket,
        lazy: true,
        retryAttempts: 5,
        connectionParams: { headers: { Authorization: 'Bearer test-secret' } },
      }),
    );
  });

  it('uses the next host when configured', () => {
    mockCreateClient.mockReturnValueOnce(fakeClient().client as unknown as Client);

    createGraphQLTransport({ apiKey: 'test-secret', graphqlHost: 'next' }, fakeLogger());

    expect(mockCreateClient).toHaveBeenCalledWith(
      expect.objectContaining({ url: 'wss://apinext.collegefootballdata.com/v1/graphql' }),
    );
  });
});

describe('resolveGraphQLTransport', () => {
  it('returns null without an API key', () => {
    const log = fakeLogger();

    expect(resolveGraphQLTransport({ apiKey: undefined, graphqlHost: 'production' }, log)).toBeNull();
    expect(mockCreateClient).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith('CFBD_API_KEY missing, GraphQL subscriptions unavailable');
  });

  it('builds the transport with an API key', () => {
    mockCreateClient.mockReturnValueOnce(fakeClient().client as unknown as Client);

    const transport = resolveGraphQLTransport({ apiKey: 'test-secret', graphqlHost: 'production' }, fakeLogger());

    expect(transport).toBeInstanceOf(GraphQLSubscriptionTransport);
  });
});

// ── helpers ──────────────────────────────────────────────

describe('retryDelay', () => {
  it('doubles from 1s and caps at 8s', () => {
    expect([0, 1, 2, 3, 4, 5].map(retryDelay)).toEqual([1000, 2000, 4000, 8000, 8000, 8000]);
  });
});

describe('toError', () => {
  it('passes Error instances through', () => {
    const err = new Error('boom');
    expect(toError(err)).toBe(err);
  });

  it('joins GraphQL error lists', () => {
    expect(toError([{ message: 'a' }, { message: 'b' }]).message).toBe('a; b');
  });

  it('describes close events without a reason', () => {
    expect(toError({ code: 1006, reason: '' }).message).toBe('Socket closed with code 1006');
  });

  it('stringifies anything else', () => {
    expect(toError('timeout').message).toBe('timeout');
  });
});
