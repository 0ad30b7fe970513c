export { default as feedPlugin } from './feed-plugin.js';
export type { FeedPluginOptions } from './feed-plugin.js';
