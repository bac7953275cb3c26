// ── Shared Types ──

import { homedir, userInfo } from "node:os";
import { join } from "node:path";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type ItemId = number;

/** One element of a list/search/gallery array after `id` → `itemId`. */
export type ItemEntry = JsonValue;

/** Settings object as returned by `get_settings` (ui/grid/behavior). */
export type DaemonSettings = JsonObject;

export type ConnectionState = "disconnected" | "connecting" | "connected" | "erroring";

export type PendingSlot =
  | "none"
  | "list"
  | "search"
  | "gallery"
  | "delete-all-except-starred"
  | "get-settings";

// ── Events delivered to the UI layer ──

export type ClientEvent =
  | { type: "error"; message: string }
  | { type: "listResponse"; items: ItemEntry[] }
  | { type: "searchResponse"; items: ItemEntry[] }
  | { type: "galleryResponse"; items: ItemEntry[] }
  | { type: "starResponse"; success: boolean }
  | { type: "copyResponse"; success: boolean }
  | { type: "requestClose" }
  | { type: "deleteResponse"; count: number }
  | { type: "deleteAllExceptStarredResponse"; items: number; images: number }
  | { type: "settingsReceived"; settings: DaemonSettings };

export interface IpcClientEvents {
  connected: [];
  disconnected: [];
  error: [message: string];
  listResponse: [items: ItemEntry[]];
  searchResponse: [items: ItemEntry[]];
  galleryResponse: [items: ItemEntry[]];
  starResponse: [success: boolean];
  copyResponse: [success: boolean];
  deleteResponse: [count: number];
  deleteAllExceptStarredResponse: [items: number, images: number];
  settingsReceived: [settings: DaemonSettings];
  requestClose: [];
}

// ── Paths & config ──

export const DAEMON_NAME = "memoria-daemon";
export const SOCKET_FILE = "memoria.sock";

export const CONFIG_DIR =
  process.env.MEMORIA_CONFIG_DIR ||
  `${homedir()}/.config/memoria`;

export const LANG_PATH = `${CONFIG_DIR}/lang`;

export const DEBUG = Boolean(process.env.MEMORIA_DEBUG);

export const DEFAULT_LIMIT = 50;
export const DEFAULT_CONNECT_TIMEOUT = 5000;
export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;

function effectiveUid(): number {
  return process.geteuid ? process.geteuid() : userInfo().uid;
}

// Resolved on every connect; an empty XDG_RUNTIME_DIR counts as unset
export function resolveSocketPath(
  env: NodeJS.ProcessEnv = process.env,
  uid: number = effectiveUid()
): string {
  const runtimeDir = env.XDG_RUNTIME_DIR || `/run/user/${uid}`;
  return join(runtimeDir, SOCKET_FILE);
}
