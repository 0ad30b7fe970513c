import { mkdir, open } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { Logger } from 'pino';

const READ_CHUNK_BYTES = 64 * 1024;

export interface TailOptions {
  path: string;
  pollMs: number;
  signal: AbortSignal;
  onLine: (line: string) => void;
  log: Logger;
}

/**
 * Follows a growing line-oriented file, like `tail -f`.
 *
 * Starts at the current end of file, so existing content is never
 * replayed. A file that shrinks is read again from its start. The file (and its directory) is created when absent. A
 * trailing partial line is held back until its newline arrives.
 *
 * Resolves once `signal` aborts; otherwise runs indefinitely.
 */
export async function tailLogFile(options: TailOptions): Promise<void> {
  const { path, pollMs, signal, onLine, log } = options;

  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, 'a+');

  try {
    let position = (await handle.stat()).size;
    let decoder = new StringDecoder('utf8');
    const chunk = Buffer.alloc(READ_CHUNK_BYTES);
    let pending = '';

    log.info({ path, position, pollMs }, 'Tailing telemetry log');

    while (!signal.aborted) {
      const { bytesRead } = await handle.read(chunk, 0, chunk.length, position);

      if (bytesRead === 0) {
        // Truncated or rotated by copy-truncate: restart from the top.
        const { size } = await handle.stat();
        if (size < position) {
          log.info({ path, size, position }, 'Telemetry log truncated, reading from start');
          position = 0;
          decoder = new StringDecoder('utf8');
          pending = '';
          continue;
        }
        await sleep(pollMs, signal);
        continue;
      }

      position += bytesRead;
      pending += decoder.write(chunk.subarray(0, bytesRead));

      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        onLine(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    }
  } finally {
    await handle.close();
  }

  log.info({ path }, 'Stopped tailing telemetry log');
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
