export { loadFeedConfig, DEFAULT_TELEMETRY_LOG_FILE } from './config.js';
export type { FeedConfig, GraphQLHost } from './config.js';
export { feedPlugin } from './feed/index.js';
export type { FeedPluginOptions } from './feed/index.js';
export {
  GraphQLSubscriptionTransport,
  createGraphQLTransport,
  resolveGraphQLTransport,
  GRAPHQL_ENDPOINTS,
} from './graphql/index.js';
export type { GraphQLTransportConfig, GraphQLClient } from './graphql/index.js';
export { createJsonlTelemetrySink, tailLogFile } from './telemetry/index.js';
export type { TailOptions } from './telemetry/index.js';
