export { IpcClient, toItemId, type IpcClientOptions, type LooseItemId } from "./ipc-client.js";
export {
  DaemonConnection,
  connectUnixSocket,
  type DaemonConnectionOptions,
  type DaemonSocket,
  type SocketConnector,
  type TransportEvents,
} from "./connection.js";
export { ResponseDispatcher, normalizeItems, readCount } from "./dispatcher.js";
export {
  LineFramer,
  FrameOverflowError,
  serialize,
  deserialize,
  type DaemonRequest,
  type DaemonResponse,
  type DaemonCommand,
} from "./protocol.js";
export { ErrorMessages, ConnectionError, DaemonError, classifySocketError } from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogSink } from "./log.js";
export {
  resolveSocketPath,
  isJsonObject,
  SOCKET_FILE,
  DAEMON_NAME,
  type ClientEvent,
  type ConnectionState,
  type DaemonSettings,
  type IpcClientEvents,
  type ItemEntry,
  type ItemId,
  type JsonObject,
  type JsonValue,
  type PendingSlot,
} from "./types.js";
