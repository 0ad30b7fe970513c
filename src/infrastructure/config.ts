import { z } from 'zod';
import { ConfigurationError } from '../domain/index.js';

export const DEFAULT_TELEMETRY_LOG_FILE = 'logs/cfbd_events.jsonl';

export type GraphQLHost = 'production' | 'next';

/**
 * Runtime configuration of the feed service.
 */
export interface FeedConfig {
  apiKey: string | undefined;
  graphqlHost: GraphQLHost;
  maxEvents: number;
  telemetryLogFile: string;
  host: string;
  port: number;
  logLevel: string;
}

/** Empty environment variables count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const feedEnvSchema = z.object({
  CFBD_API_KEY: optionalString,
  CFBD_GRAPHQL_HOST: z.enum(['production', 'next']).default('production'),
  CFBD_MAX_EVENTS: z.coerce.number().int().positive().default(100),
  TELEMETRY_LOG_FILE: z.string().min(1).default(DEFAULT_TELEMETRY_LOG_FILE),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Loads feed configuration from environment variables.
 *
 * Missing values get defaults; invalid ones raise a ConfigurationError
 * naming every offending variable.
 */
export function loadFeedConfig(env: NodeJS.ProcessEnv = process.env): FeedConfig {
  const result = feedEnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid feed configuration', issues);
  }

  const parsed = result.data;
  return {
    apiKey: parsed.CFBD_API_KEY,
    graphqlHost: parsed.CFBD_GRAPHQL_HOST,
    maxEvents: parsed.CFBD_MAX_EVENTS,
    telemetryLogFile: parsed.TELEMETRY_LOG_FILE,
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
