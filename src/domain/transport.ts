/**
 * Push-subscription capability consumed by the subscription manager.
 *
 * The manager depends only on this port; the graphql-ws adapter lives in
 * infrastructure and tests inject in-process fakes.
 */

export interface SubscriptionRequest {
  readonly query: string;
  readonly operationName: string;
  readonly variables?: Record<string, unknown>;
}

export type EventCallback = (payload: unknown) => void;
export type ErrorCallback = (error: Error) => void;

/** One live subscription opened by a transport. */
export interface TransportSubscription {
  stop(): void;
}

export interface SubscriptionTransport {
  subscribe(
    request: SubscriptionRequest,
    onEvent: EventCallback,
    onError: ErrorCallback,
    operationName: string,
  ): TransportSubscription;
}

/** Runtime check for values that come from loaders returning `unknown`. */
export function isSubscriptionTransport(value: unknown): value is SubscriptionTransport {
  return (
    typeof value === 'object'
    && value !== null
    && 'subscribe' in value
    && typeof value.subscribe === 'function'
  );
}
