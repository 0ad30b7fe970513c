export { createJsonlTelemetrySink } from './jsonl-sink.js';
export { tailLogFile } from './log-tailer.js';
export type { TailOptions } from './log-tailer.js';
