/**
 * User-visible error messages and error classes.
 *
 * Every message the client can surface through its `error` event is listed
 * in {@link ErrorMessages}; the UI shows them verbatim.
 *
 * @module errors
 */

import { DAEMON_NAME } from "./types.js";

export const ErrorMessages = {
  notConnected: `Not connected to daemon. Is ${DAEMON_NAME} running?`,
  sendFailed: "Failed to send request to daemon",
  socketNotFound: `Daemon socket not found. Start ${DAEMON_NAME} first.`,
  connectionRefused: `Connection refused. Is ${DAEMON_NAME} running?`,
  permissionDenied: "Permission denied accessing daemon socket",
  resourceError: "System resource error communicating with daemon",
  timeout: "Daemon connection timeout",
  malformedResponse: "Received malformed response from daemon",
  unknownDaemonError: "Unknown daemon error",
  frameTooLarge: "Response from daemon exceeded the frame size limit",
  disconnected: "Disconnected from daemon",
} as const;

const RESOURCE_CODES = new Set(["EMFILE", "ENFILE", "ENOBUFS", "ENOMEM", "EAGAIN"]);

function errnoCode(err: Error): string | undefined {
  if (!("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Map a socket error raised by `node:net` to the message shown to the user.
 */
export function classifySocketError(err: Error): string {
  const code = errnoCode(err);

  switch (code) {
    case "ENOENT":
      return ErrorMessages.socketNotFound;
    case "ECONNREFUSED":
      return ErrorMessages.connectionRefused;
    case "EACCES":
    case "EPERM":
      return ErrorMessages.permissionDenied;
    case "ETIMEDOUT":
      return ErrorMessages.timeout;
  }

  if (code && RESOURCE_CODES.has(code)) {
    return ErrorMessages.resourceError;
  }

  return `Socket error: ${err.message}`;
}

/**
 * Connection-level failure (not connected, dropped, timed out).
 */
export class ConnectionError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "ConnectionError";
    this.code = code;

    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * A request answered by an `error` event, either from the daemon
 * (`ok: false`) or from the transport.
 */
export class DaemonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DaemonError";

    Object.setPrototypeOf(this, DaemonError.prototype);
  }
}
