// ── IPC Protocol: UI client ↔ memoria-daemon ──

import { type ItemId, type JsonObject, type JsonValue, isJsonObject } from "./types.js";

export type DaemonRequest =
  | { cmd: "list"; args: { limit: number; starred_only: boolean } }
  | { cmd: "search"; args: { query: string; limit: number } }
  | { cmd: "gallery"; args: { limit: number } }
  | { cmd: "star"; args: { id: ItemId; value: boolean } }
  | { cmd: "copy"; args: { id: ItemId } }
  | { cmd: "delete_items"; args: { ids: ItemId[] } }
  | { cmd: "delete_all_except_starred" }
  | { cmd: "get_settings" };

export type DaemonCommand = DaemonRequest["cmd"];

// `data` is an item array for list/search/gallery, a marker-keyed object otherwise
export interface DaemonResponse {
  ok: boolean;
  data?: JsonValue;
  error?: string;
}

// Newline-delimited compact JSON over a Unix socket
export function serialize(request: DaemonRequest): string {
  return JSON.stringify(request) + "\n";
}

// Returns null when the line is not JSON or its top value is not an object
export function deserialize(line: string): JsonObject | null {
  let value: JsonValue;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  return isJsonObject(value) ? value : null;
}

// ── Framing ──

const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

export class FrameOverflowError extends Error {
  /** Complete lines framed from the same chunk before the limit was hit. */
  readonly lines: string[];

  constructor(size: number, limit: number, lines: string[]) {
    super(`Unterminated frame of ${size} bytes exceeds limit of ${limit} bytes`);
    this.name = "FrameOverflowError";
    this.lines = lines;

    Object.setPrototypeOf(this, FrameOverflowError.prototype);
  }
}

/**
 * Splits an inbound byte stream into trimmed, non-empty lines.
 *
 * Works on raw bytes so a multi-byte UTF-8 character split across two
 * chunks decodes correctly: 0x0A never occurs inside a UTF-8 sequence.
 * At most one unterminated suffix is kept between calls.
 */
export class LineFramer {
  private buffer: Buffer = EMPTY;

  constructor(private readonly maxFrameBytes: number = Number.POSITIVE_INFINITY) {}

  /** Bytes buffered without a terminator yet. */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array | string): string[] {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.buffer = this.buffer.length === 0 ? Buffer.from(bytes) : Buffer.concat([this.buffer, bytes]);

    const lines: string[] = [];
    let newlineIdx: number;

    while ((newlineIdx = this.buffer.indexOf(NEWLINE)) !== -1) {
      const line = this.buffer.subarray(0, newlineIdx).toString("utf8").trim();
      this.buffer = this.buffer.subarray(newlineIdx + 1);

      if (line) {
        lines.push(line);
      }
    }

    if (this.buffer.length > this.maxFrameBytes) {
      const size = this.buffer.length;
      this.buffer = EMPTY;
      throw new FrameOverflowError(size, this.maxFrameBytes, lines);
    }

    return lines;
  }

  reset(): void {
    this.buffer = EMPTY;
  }
}
