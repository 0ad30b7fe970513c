import { createClient } from 'graphql-ws';
import type { Client } from 'graphql-ws';
import WebSocket from 'ws';
import type { Logger } from 'pino';
import type {
  ErrorCallback,
  EventCallback,
  SubscriptionRequest,
  SubscriptionTransport,
  TransportSubscription,
} from '../../domain/index.js';
import type { GraphQLHost } from '../config.js';

export const GRAPHQL_ENDPOINTS: Record<GraphQLHost, string> = {
  production: 'wss://graphql.collegefootballdata.com/v1/graphql',
  next: 'wss://apinext.collegefootballdata.com/v1/graphql',
};

const RETRY_ATTEMPTS = 5;
const RETRY_BASE_MS = 1000;
const RETRY_MAX_MS = 8000;

export interface GraphQLTransportConfig {
  apiKey: string | undefined;
  graphqlHost: GraphQLHost;
}

/** The part of a graphql-ws client the transport drives. */
export type GraphQLClient = Pick<Client, 'subscribe' | 'dispose'>;

/**
 * SubscriptionTransport over a graphql-ws client.
 *
 * Reconnection belongs here (graphql-ws retries with exponential backoff),
 * never to the subscription manager.
 */
export class GraphQLSubscriptionTransport implements SubscriptionTransport {
  constructor(
    private readonly client: GraphQLClient,
    private readonly log: Logger,
  ) {}

  subscribe(
    request: SubscriptionRequest,
    onEvent: EventCallback,
    onError: ErrorCallback,
    operationName: string,
  ): TransportSubscription {
    const unsubscribe = this.client.subscribe(
      {
        query: request.query,
        operationName,
        variables: request.variables ?? null,
      },
      {
        next: (result) => {
          if (result.errors !== undefined && result.errors.length > 0) {
            onError(new Error(result.errors.map((e) => e.message).join('; ')));
          }
          if (result.data !== undefined && result.data !== null) {
            onEvent(result.data);
          }
        },
        error: (err: unknown) => {
          onError(toError(err));
        },
        complete: () => {
          this.log.info({ operation: operationName }, 'Subscription completed by server');
        },
      },
    );

    let stopped = false;
    return {
      stop: () => {
        if (stopped) return;
        stopped = true;
        unsubscribe();
      },
    };
  }

  async close(): Promise<void> {
    await this.client.dispose();
  }
}

/**
 * Builds the graphql-ws client for the configured CFBD host.
 *
 * The socket opens lazily on the first subscription and is closed again
 * once the last one stops.
 */
export function createGraphQLTransport(
  config: GraphQLTransportConfig & { apiKey: string },
  log: Logger,
): GraphQLSubscriptionTransport {
  const url = GRAPHQL_ENDPOINTS[config.graphqlHost];

  const client = createClient({
    url,
    webSocketImpl: WebSocket,
    lazy: true,
    connectionParams: {
      headers: { Authorization: `Bearer ${config.apiKey}` },
    },
    retryAttempts: RETRY_ATTEMPTS,
    shouldRetry: () => true,
    retryWait: async (retries) => {
      const delay = retryDelay(retries);
      log.warn({ retries, delay }, 'GraphQL socket lost, reconnecting');
      await new Promise((resolve) => setTimeout(resolve, delay));
    },
    on: {
      connected: () => log.info({ url }, 'GraphQL socket connected'),
      closed: () => log.info({ url }, 'GraphQL socket closed'),
    },
  });

  return new GraphQLSubscriptionTransport(client, log);
}

/**
 * Returns the transport, or `null` when the environment cannot provide one
 * (no API key). The manager turns `null` into a ConfigurationError.
 */
export function resolveGraphQLTransport(
  config: GraphQLTransportConfig,
  log: Logger,
): GraphQLSubscriptionTransport | null {
  if (config.apiKey === undefined) {
    log.warn('CFBD_API_KEY missing, GraphQL subscriptions unavailable');
    return null;
  }
  return createGraphQLTransport({ ...config, apiKey: config.apiKey }, log);
}

/** 1s, 2s, 4s, then capped at 8s. */
export function retryDelay(retries: number): number {
  return Math.min(RETRY_BASE_MS * 2 ** retries, RETRY_MAX_MS);
}

/**
 * Normalizes what graphql-ws hands to `sink.error`: an Error, a list of
 * GraphQL errors, or a socket CloseEvent.
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;

  if (Array.isArray(err)) {
    return new Error(err.map(describe).join('; '));
  }

  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    const reason = 'reason' in err && typeof err.reason === 'string' ? err.reason : '';
    return new Error(
      reason === '' ? `Socket closed with code ${err.code}` : `Socket closed with code ${err.code}: ${reason}`,
    );
  }

  return new Error(describe(err));
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message;
  }
  return String(value);
}
