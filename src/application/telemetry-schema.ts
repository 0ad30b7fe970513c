import { z } from 'zod';

/** Fallback for lines that do not name a client or an outcome. */
export const UNKNOWN_LABEL = 'unknown';

/**
 * Zod schema for one telemetry log line.
 *
 * Fields with the wrong type fall back to their default (labels) or are
 * treated as absent (numbers); only a non-object line fails the parse.
 */
export const telemetryLineSchema = z.object({
  client: z.string().min(1).catch(UNKNOWN_LABEL),
  outcome: z.string().min(1).catch(UNKNOWN_LABEL),
  latency_ms: z.number().finite().optional().catch(undefined),
  retry_count: z.number().finite().optional().catch(undefined),
});

export type TelemetryLine = z.infer<typeof telemetryLineSchema>;

/**
 * Parses a raw log line. Returns `null` for blank, non-JSON and
 * non-object lines.
 */
export function parseTelemetryLine(line: string): TelemetryLine | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = telemetryLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}
