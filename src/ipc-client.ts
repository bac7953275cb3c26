/**
 * IpcClient - the UI's single connection to memoria-daemon
 *
 * Request methods return immediately; answers arrive later as typed
 * events. Wiring, leaves first: DaemonConnection (socket) → LineFramer
 * (newline framing) → ResponseDispatcher (pending slot and marker keys).
 *
 * @example
 * const client = new IpcClient();
 * client.on("connected", () => client.list(20));
 * client.on("listResponse", (items) => render(items));
 * client.on("error", (message) => showBanner(message));
 * client.connect();
 *
 * @module ipc-client
 */

import { EventEmitter } from "node:events";
import { DaemonConnection, type SocketConnector } from "./connection.js";
import { ResponseDispatcher } from "./dispatcher.js";
import { ErrorMessages } from "./errors.js";
import { type Logger, createLogger } from "./log.js";
import { type DaemonRequest, FrameOverflowError, LineFramer, serialize } from "./protocol.js";
import {
  type ClientEvent,
  type ConnectionState,
  type IpcClientEvents,
  type ItemId,
  type PendingSlot,
  DEFAULT_LIMIT,
  DEFAULT_MAX_FRAME_BYTES,
} from "./types.js";

export interface IpcClientOptions {
  logger?: Logger;
  /** Overrides `$XDG_RUNTIME_DIR/memoria.sock` resolution. */
  socketPath?: () => string;
  connector?: SocketConnector;
  /** 0 disables the timeout. */
  connectTimeoutMs?: number;
  maxFrameBytes?: number;
}

type Listener<K extends keyof IpcClientEvents> = (...args: IpcClientEvents[K]) => void;

/** Anything an id list from the UI may hold; coerced element-wise. */
export type LooseItemId = number | bigint | string | boolean | null | undefined;

function roundAwayFromZero(value: number): number {
  const magnitude = Math.round(Math.abs(value));
  return value < 0 && magnitude > 0 ? -magnitude : magnitude;
}

/**
 * Coerce one id to an integer: numbers round half away from zero, numeric
 * strings parse, booleans read as 1/0, anything else is 0.
 */
export function toItemId(value: LooseItemId): ItemId {
  switch (typeof value) {
    case "number":
      return Number.isFinite(value) ? roundAwayFromZero(value) : 0;
    case "bigint":
      return Number(value);
    case "boolean":
      return value ? 1 : 0;
    case "string": {
      const trimmed = value.trim();
      return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : 0;
    }
    default:
      return 0;
  }
}

export class IpcClient {
  private readonly events = new EventEmitter();
  private readonly connection: DaemonConnection;
  private readonly framer: LineFramer;
  private readonly dispatcher: ResponseDispatcher;
  private readonly logger: Logger;

  constructor(options: IpcClientOptions = {}) {
    this.logger = options.logger ?? createLogger("ipc");
    this.connection = new DaemonConnection({
      logger: this.logger,
      socketPath: options.socketPath,
      connector: options.connector,
      connectTimeoutMs: options.connectTimeoutMs,
    });
    this.framer = new LineFramer(options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
    this.dispatcher = new ResponseDispatcher(this.logger);

    this.connection.on("connected", () => {
      this.framer.reset();
      this.emit("connected");
    });
    // A request still waiting when the socket drops will never be answered
    this.connection.on("disconnected", () => {
      this.dispatcher.reset();
      this.emit("disconnected");
    });
    this.connection.on("error", (message) => this.emit("error", message));
    this.connection.on("data", (chunk) => this.onData(chunk));
  }

  // ── Subscriptions ──

  on<K extends keyof IpcClientEvents>(event: K, listener: Listener<K>): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends keyof IpcClientEvents>(event: K, listener: Listener<K>): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends keyof IpcClientEvents>(event: K, listener: Listener<K>): this {
    this.events.off(event, listener);
    return this;
  }

  // ── State ──

  getState(): ConnectionState {
    return this.connection.getState();
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  get pending(): PendingSlot {
    return this.dispatcher.pending;
  }

  // ── Lifecycle ──

  connect(): void {
    this.connection.connect();
  }

  disconnect(): void {
    this.connection.disconnect();
  }

  dispose(): void {
    if (this.connection.isConnected()) {
      this.connection.disconnect();
    }
    this.framer.reset();
    this.dispatcher.reset();
    this.events.removeAllListeners();
  }

  // ── Requests ──

  list(limit: number = DEFAULT_LIMIT, starredOnly = false): void {
    this.dispatcher.expect("list");
    this.send({ cmd: "list", args: { limit, starred_only: starredOnly } });
  }

  search(query: string, limit: number = DEFAULT_LIMIT): void {
    this.dispatcher.expect("search");
    this.send({ cmd: "search", args: { query, limit } });
  }

  gallery(limit: number = DEFAULT_LIMIT): void {
    this.dispatcher.expect("gallery");
    this.send({ cmd: "gallery", args: { limit } });
  }

  star(id: ItemId, value: boolean): void {
    this.send({ cmd: "star", args: { id, value } });
  }

  copy(id: ItemId): void {
    this.send({ cmd: "copy", args: { id } });
  }

  deleteItems(ids: readonly LooseItemId[]): void {
    this.send({ cmd: "delete_items", args: { ids: ids.map(toItemId) } });
  }

  deleteAllExceptStarred(): void {
    this.dispatcher.expect("delete-all-except-starred");
    this.send({ cmd: "delete_all_except_starred" });
  }

  getSettings(): void {
    this.dispatcher.expect("get-settings");
    this.send({ cmd: "get_settings" });
  }

  // ── Internals ──

  private send(request: DaemonRequest): void {
    this.logger.debug(`→ ${request.cmd}`);
    this.connection.send(serialize(request));
  }

  private onData(chunk: Buffer): void {
    let lines: string[];
    try {
      lines = this.framer.push(chunk);
    } catch (err) {
      if (!(err instanceof FrameOverflowError)) throw err;
      this.logger.warn(err.message);
      this.deliver(err.lines);
      this.emit("error", ErrorMessages.frameTooLarge);
      this.connection.disconnect();
      return;
    }
    this.deliver(lines);
  }

  private deliver(lines: string[]): void {
    for (const line of lines) {
      for (const event of this.dispatcher.dispatch(line)) {
        this.publish(event);
      }
    }
  }

  private publish(event: ClientEvent): void {
    switch (event.type) {
      case "error":
        return this.emit("error", event.message);
      case "listResponse":
      case "searchResponse":
      case "galleryResponse":
        return this.emit(event.type, event.items);
      case "starResponse":
      case "copyResponse":
        return this.emit(event.type, event.success);
      case "requestClose":
        return this.emit("requestClose");
      case "deleteResponse":
        return this.emit("deleteResponse", event.count);
      case "deleteAllExceptStarredResponse":
        return this.emit("deleteAllExceptStarredResponse", event.items, event.images);
      case "settingsReceived":
        return this.emit("settingsReceived", event.settings);
    }
  }

  // 'error' throws on an EventEmitter without listeners
  private emit<K extends keyof IpcClientEvents>(event: K, ...args: IpcClientEvents[K]): void {
    if (event === "error" && this.events.listenerCount("error") === 0) {
      this.logger.warn(args.join(" "));
      return;
    }
    this.events.emit(event, ...args);
  }
}
