// ── Diagnostics (stderr) ──

import { DEBUG } from "./types.js";

const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export function createLogger(
  scope: string,
  sink: LogSink = process.stderr,
  debugEnabled: boolean = DEBUG
): Logger {
  return {
    debug(message) {
      if (debugEnabled) sink.write(dim(`[${scope}] ${message}`) + "\n");
    },
    warn(message) {
      sink.write(yellow(`[${scope}] ${message}`) + "\n");
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
