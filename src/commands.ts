// ── Front-end commands shared by the one-shot CLI and the shell ──

import { ConnectionError, DaemonError, ErrorMessages } from "./errors.js";
import { t } from "./i18n.js";
import { type IpcClient } from "./ipc-client.js";
import {
  type DaemonSettings,
  type IpcClientEvents,
  type ItemEntry,
  type ItemId,
  DEFAULT_LIMIT,
} from "./types.js";

export type Command =
  | { kind: "list"; limit: number; starredOnly: boolean }
  | { kind: "search"; query: string; limit: number }
  | { kind: "gallery"; limit: number }
  | { kind: "star"; id: ItemId; value: boolean }
  | { kind: "copy"; id: ItemId }
  | { kind: "delete"; ids: ItemId[] }
  | { kind: "purge" }
  | { kind: "settings" };

export type CommandResult =
  | { kind: "items"; items: ItemEntry[] }
  | { kind: "starred"; success: boolean }
  | { kind: "copied"; success: boolean }
  | { kind: "deleted"; count: number }
  | { kind: "purged"; items: number; images: number }
  | { kind: "settings"; settings: DaemonSettings };

export const COMMAND_NAMES = [
  "list",
  "starred",
  "search",
  "gallery",
  "star",
  "unstar",
  "copy",
  "delete",
  "purge",
  "settings",
] as const;

export type CommandName = typeof COMMAND_NAMES[number];

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";

    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

// ── Parsing ──

function parseLimit(arg: string | undefined): number {
  if (arg === undefined) return DEFAULT_LIMIT;
  const limit = /^\d+$/.test(arg) ? parseInt(arg, 10) : 0;
  if (limit <= 0) throw new UsageError(`${t("usage_expected_limit")}: ${arg}`);
  return limit;
}

function parseId(arg: string | undefined): ItemId {
  if (arg === undefined || !/^\d+$/.test(arg)) {
    throw new UsageError(arg === undefined ? t("usage_expected_id") : `${t("usage_expected_id")}: ${arg}`);
  }
  return Number(arg);
}

export function parseCommand(name: string, args: string[]): Command {
  if (!isCommandName(name)) {
    throw new UsageError(`${t("shell_unknown_command")}: ${name}`);
  }

  switch (name) {
    case "list":
      return { kind: "list", limit: parseLimit(args[0]), starredOnly: false };
    case "starred":
      return { kind: "list", limit: parseLimit(args[0]), starredOnly: true };
    case "search": {
      const query = args.join(" ").trim();
      if (!query) throw new UsageError(t("usage_expected_query"));
      return { kind: "search", query, limit: DEFAULT_LIMIT };
    }
    case "gallery":
      return { kind: "gallery", limit: parseLimit(args[0]) };
    case "star":
    case "unstar":
      return { kind: "star", id: parseId(args[0]), value: name === "star" };
    case "copy":
      return { kind: "copy", id: parseId(args[0]) };
    case "delete":
      if (args.length === 0) throw new UsageError(t("usage_expected_id"));
      return { kind: "delete", ids: args.map(parseId) };
    case "purge":
      return { kind: "purge" };
    case "settings":
      return { kind: "settings" };
  }
}

// ── Execution ──

type ResponseEvent = Exclude<keyof IpcClientEvents, "connected" | "disconnected" | "error" | "requestClose">;

/**
 * Resolve with the next `event`; an `error` event or a disconnect rejects.
 * Subscribe before sending: a request made while disconnected reports its
 * error synchronously.
 */
export function waitFor<K extends ResponseEvent>(
  client: IpcClient,
  event: K
): Promise<IpcClientEvents[K]> {
  return new Promise((resolve, reject) => {
    const onEvent = (...args: IpcClientEvents[K]) => {
      cleanup();
      resolve(args);
    };
    const onError = (message: string) => {
      cleanup();
      reject(new DaemonError(message));
    };
    const onDisconnect = () => {
      cleanup();
      reject(new ConnectionError("ECONNRESET", ErrorMessages.disconnected));
    };
    const cleanup = () => {
      client.off(event, onEvent);
      client.off("error", onError);
      client.off("disconnected", onDisconnect);
    };

    client.on(event, onEvent);
    client.on("error", onError);
    client.on("disconnected", onDisconnect);
  });
}

/**
 * Send one command and wait for its answer. Callers run these one at a
 * time, which keeps the client's pending slot unambiguous.
 */
export async function executeCommand(client: IpcClient, command: Command): Promise<CommandResult> {
  switch (command.kind) {
    case "list": {
      const response = waitFor(client, "listResponse");
      client.list(command.limit, command.starredOnly);
      const [items] = await response;
      return { kind: "items", items };
    }
    case "search": {
      const response = waitFor(client, "searchResponse");
      client.search(command.query, command.limit);
      const [items] = await response;
      return { kind: "items", items };
    }
    case "gallery": {
      const response = waitFor(client, "galleryResponse");
      client.gallery(command.limit);
      const [items] = await response;
      return { kind: "items", items };
    }
    case "star": {
      const response = waitFor(client, "starResponse");
      client.star(command.id, command.value);
      const [success] = await response;
      return { kind: "starred", success };
    }
    case "copy": {
      const response = waitFor(client, "copyResponse");
      client.copy(command.id);
      const [success] = await response;
      return { kind: "copied", success };
    }
    case "delete": {
      const response = waitFor(client, "deleteResponse");
      client.deleteItems(command.ids);
      const [count] = await response;
      return { kind: "deleted", count };
    }
    case "purge": {
      const response = waitFor(client, "deleteAllExceptStarredResponse");
      client.deleteAllExceptStarred();
      const [items, images] = await response;
      return { kind: "purged", items, images };
    }
    case "settings": {
      const response = waitFor(client, "settingsReceived");
      client.getSettings();
      const [settings] = await response;
      return { kind: "settings", settings };
    }
  }
}

/**
 * Connect and resolve once the daemon accepts; the first error rejects.
 * The client reports only the classified message, so the rejection carries
 * the generic `ECONNECT` code whatever the socket failure was.
 */
export function openConnection(client: IpcClient): Promise<void> {
  return new Promise((resolve, reject) => {
    const onConnected = () => {
      cleanup();
      resolve();
    };
    const onError = (message: string) => {
      cleanup();
      reject(new ConnectionError("ECONNECT", message));
    };
    const cleanup = () => {
      client.off("connected", onConnected);
      client.off("error", onError);
    };

    client.on("connected", onConnected);
    client.on("error", onError);
    client.connect();
  });
}
