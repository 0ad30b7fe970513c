import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { TelemetryHook } from '../../domain/index.js';

/**
 * Telemetry hook that appends each record as one JSON line.
 *
 * The parent directory is created up front. Append failures are logged
 * and never reach the caller; the feed must keep running without its log.
 */
export function createJsonlTelemetrySink(filePath: string, log: Logger): TelemetryHook {
  mkdirSync(dirname(filePath), { recursive: true });

  return (record) => {
    try {
      appendFileSync(filePath, `${JSON.stringify(record)}\n`, 'utf-8');
    } catch (err: unknown) {
      log.warn({ err, filePath, outcome: record.outcome }, 'Failed to append telemetry record');
    }
  };
}
