export {
  GraphQLSubscriptionTransport,
  createGraphQLTransport,
  resolveGraphQLTransport,
  retryDelay,
  toError,
  GRAPHQL_ENDPOINTS,
} from './graphql-transport.js';
export type { GraphQLTransportConfig, GraphQLClient } from './graphql-transport.js';
