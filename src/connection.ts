// ── Daemon Connection (transport) ──

import { EventEmitter } from "node:events";
import { createConnection } from "node:net";
import { ErrorMessages, classifySocketError } from "./errors.js";
import { type Logger, silentLogger } from "./log.js";
import {
  type ConnectionState,
  DEFAULT_CONNECT_TIMEOUT,
  resolveSocketPath,
} from "./types.js";

/**
 * The part of `net.Socket` the transport uses.
 */
export interface DaemonSocket {
  write(data: string, callback: (err?: Error | null) => void): boolean;
  end(): void;
  destroy(): void;
  on(event: "connect", listener: () => void): this;
  on(event: "data", listener: (chunk: Buffer) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "close", listener: (hadError: boolean) => void): this;
}

export type SocketConnector = (path: string) => DaemonSocket;

export const connectUnixSocket: SocketConnector = (path) => createConnection(path);

export interface TransportEvents {
  connected: [];
  disconnected: [];
  data: [chunk: Buffer];
  error: [message: string];
}

export interface DaemonConnectionOptions {
  logger?: Logger;
  socketPath?: () => string;
  connector?: SocketConnector;
  connectTimeoutMs?: number;
}

export class DaemonConnection extends EventEmitter<TransportEvents> {
  private state: ConnectionState = "disconnected";
  private socket: DaemonSocket | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly logger: Logger;
  private readonly socketPath: () => string;
  private readonly connector: SocketConnector;
  private readonly connectTimeoutMs: number;

  constructor(options: DaemonConnectionOptions = {}) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.socketPath = options.socketPath ?? (() => resolveSocketPath());
    this.connector = options.connector ?? connectUnixSocket;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  connect(): void {
    if (this.state === "connecting" || this.state === "connected") {
      this.logger.debug(`connect() ignored while ${this.state}`);
      return;
    }

    const path = this.socketPath();
    this.logger.debug(`Connecting to daemon at: ${path}`);

    this.state = "connecting";
    const socket = this.connector(path);
    this.socket = socket;
    this.attach(socket);

    if (this.connectTimeoutMs > 0) {
      this.connectTimer = setTimeout(() => {
        this.connectTimer = null;
        if (this.socket !== socket || this.state !== "connecting") return;
        this.logger.warn(`Connect to ${path} timed out after ${this.connectTimeoutMs}ms`);
        this.fail(ErrorMessages.timeout);
        this.release(socket);
        socket.destroy();
      }, this.connectTimeoutMs);
    }
  }

  send(line: string): void {
    const socket = this.socket;

    if (!socket || this.state !== "connected") {
      this.fail(ErrorMessages.notConnected);
      return;
    }

    socket.write(line, (err) => {
      if (err) {
        this.logger.warn(`Write failed: ${err.message}`);
        this.fail(ErrorMessages.sendFailed);
      }
    });
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) return;

    const wasConnected = this.state === "connected";
    this.release(socket);

    if (wasConnected) {
      socket.end();
      this.logger.debug("Disconnected from daemon");
      this.emit("disconnected");
    } else {
      socket.destroy();
    }
  }

  // ── Socket handlers ──

  // Events from a socket this connection has let go of are ignored
  private attach(socket: DaemonSocket): void {
    const current = () => this.socket === socket;
    let established = false;

    socket.on("connect", () => {
      if (!current()) return;
      this.clearTimer();
      established = true;
      this.state = "connected";
      this.logger.debug("Connected to daemon");
      this.emit("connected");
    });

    socket.on("data", (chunk) => {
      if (current()) this.emit("data", chunk);
    });

    socket.on("error", (err) => {
      if (!current()) {
        this.logger.debug(`Error on released socket: ${err.message}`);
        return;
      }
      this.clearTimer();
      const message = classifySocketError(err);
      this.logger.warn(`Socket error: ${err.message} - ${message}`);
      if (this.state === "connected" || this.state === "connecting") {
        this.state = "erroring";
      }
      this.fail(message);
    });

    socket.on("close", () => {
      if (!current()) return;
      this.release(socket);
      if (established) {
        this.logger.debug("Disconnected from daemon");
        this.emit("disconnected");
      }
    });
  }

  private release(socket: DaemonSocket): void {
    if (this.socket === socket) {
      this.socket = null;
    }
    this.clearTimer();
    this.state = "disconnected";
  }

  private clearTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  // 'error' throws on an EventEmitter without listeners
  private fail(message: string): void {
    if (this.listenerCount("error") > 0) {
      this.emit("error", message);
    } else {
      this.logger.warn(message);
    }
  }
}
