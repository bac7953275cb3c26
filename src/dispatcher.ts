/**
 * Response dispatch: one framed line in, zero or more client events out.
 *
 * Array responses carry no kind of their own, so list/search/gallery are
 * told apart by the pending slot set when the request went out. Object
 * responses are recognised by their marker keys, checked in a fixed order.
 *
 * The slot holds one value. A second list/search/gallery sent before the
 * first is answered overwrites it and the first answer is routed as the
 * second kind; callers send at most one array-shaped request at a time.
 *
 * @module dispatcher
 */

import { deserialize } from "./protocol.js";
import { ErrorMessages } from "./errors.js";
import { type Logger, silentLogger } from "./log.js";
import {
  type ClientEvent,
  type ItemEntry,
  type JsonObject,
  type JsonValue,
  type PendingSlot,
  isJsonObject,
} from "./types.js";

/**
 * Rename `id` to `itemId` on every object element; other elements pass
 * through unchanged.
 */
export function normalizeItems(items: JsonValue[]): ItemEntry[] {
  return items.map((item) => {
    if (!isJsonObject(item) || !Object.hasOwn(item, "id")) {
      return item;
    }
    const { id, ...rest } = item;
    return { ...rest, itemId: id };
  });
}

// Numbers arrive as doubles; truncate toward zero, anything else reads as 0
export function readCount(data: JsonObject, key: string): number {
  const value = data[key];
  if (typeof value !== "number" || !Number.isFinite(value)) return 0;
  return Math.trunc(value);
}

const has = (data: JsonObject, key: string) => Object.hasOwn(data, key);

export class ResponseDispatcher {
  private slot: PendingSlot = "none";

  constructor(private readonly logger: Logger = silentLogger) {}

  get pending(): PendingSlot {
    return this.slot;
  }

  /** Set before a correlated request is written; the previous value is not checked. */
  expect(slot: PendingSlot): void {
    this.slot = slot;
  }

  reset(): void {
    this.slot = "none";
  }

  dispatch(line: string): ClientEvent[] {
    const response = deserialize(line);

    if (!response) {
      this.logger.warn(`Invalid JSON response: ${line}`);
      return [{ type: "error", message: ErrorMessages.malformedResponse }];
    }

    // A failed request leaves the slot as it was
    if (response.ok !== true) {
      const message =
        typeof response.error === "string" ? response.error : ErrorMessages.unknownDaemonError;
      this.logger.warn(`Daemon error: ${message}`);
      return [{ type: "error", message }];
    }

    const data = response.data;

    if (Array.isArray(data)) {
      return this.dispatchItems(normalizeItems(data));
    }

    if (isJsonObject(data)) {
      return this.dispatchObject(data);
    }

    return [];
  }

  private dispatchItems(items: ItemEntry[]): ClientEvent[] {
    const slot = this.slot;
    this.slot = "none";

    switch (slot) {
      case "list":
        return [{ type: "listResponse", items }];
      case "search":
        return [{ type: "searchResponse", items }];
      case "gallery":
        return [{ type: "galleryResponse", items }];
      default:
        this.logger.debug(`Dropped item array with pending slot "${slot}"`);
        return [];
    }
  }

  private dispatchObject(data: JsonObject): ClientEvent[] {
    if (has(data, "updated")) {
      return [{ type: "starResponse", success: true }];
    }

    if (has(data, "copied")) {
      return [{ type: "copyResponse", success: true }, { type: "requestClose" }];
    }

    if (has(data, "deleted")) {
      this.slot = "none";
      return [{ type: "deleteResponse", count: readCount(data, "deleted") }];
    }

    if (has(data, "deleted_items") || has(data, "deleted_images")) {
      return [{
        type: "deleteAllExceptStarredResponse",
        items: readCount(data, "deleted_items"),
        images: readCount(data, "deleted_images"),
      }];
    }

    if (has(data, "deleted_count")) {
      return [{ type: "deleteResponse", count: readCount(data, "deleted_count") }];
    }

    if (has(data, "ui") || has(data, "grid")) {
      return [{ type: "settingsReceived", settings: data }];
    }

    return [];
  }
}
