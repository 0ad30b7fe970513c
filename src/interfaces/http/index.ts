export { default as feedRoutes } from './feed-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export type { MetricsRoutesOptions } from './metrics-routes.js';
