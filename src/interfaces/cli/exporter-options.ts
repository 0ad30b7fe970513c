import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_TELEMETRY_LOG_FILE } from '../../infrastructure/index.js';

export const DEFAULT_EXPORTER_PORT = 9107;
export const DEFAULT_POLL_SECONDS = 1.0;

export interface ExporterOptions {
  logFile: string;
  port: number;
  pollSeconds: number;
}

interface CliOptions {
  logFile: string;
  port: number;
  poll: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parsePoll(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Poll interval must be a positive number of seconds.');
  }
  return seconds;
}

export function buildExporterCommand(): Command {
  return new Command()
    .name('cfbd-telemetry-exporter')
    .description('Tail the CFBD telemetry log and expose it as Prometheus metrics')
    .option('--log-file <path>', 'JSON-lines telemetry log to tail', DEFAULT_TELEMETRY_LOG_FILE)
    .option('--port <number>', 'HTTP port for the /metrics endpoint', parsePort, DEFAULT_EXPORTER_PORT)
    .option('--poll <seconds>', 'Delay between reads at end of file', parsePoll, DEFAULT_POLL_SECONDS);
}

/**
 * Parses user arguments (no node/script prefix).
 * Invalid values make commander report the error and exit, unless the
 * command was built with `exitOverride()`.
 */
export function parseExporterOptions(
  argv: readonly string[],
  command: Command = buildExporterCommand(),
): ExporterOptions {
  command.parse([...argv], { from: 'user' });
  const opts = command.opts<CliOptions>();

  return {
    logFile: opts.logFile,
    port: opts.port,
    pollSeconds: opts.poll,
  };
}
