// ── Terminal rendering ──

import { t } from "./i18n.js";
import type { CommandResult } from "./commands.js";
import { type DaemonSettings, type ItemEntry, type JsonObject, isJsonObject } from "./types.js";

// ── ANSI colors ──
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
export const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
export const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;

const PREVIEW_CHARS = 72;

export function preview(text: string, max: number = PREVIEW_CHARS): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? flat.slice(0, max - 1) + "…" : flat;
}

function readString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function formatItem(entry: ItemEntry): string {
  if (!isJsonObject(entry)) {
    return dim(JSON.stringify(entry));
  }

  const id = typeof entry.itemId === "number" ? String(entry.itemId) : "?";
  const star = entry.starred === true ? yellow("★") : " ";
  const body = readString(entry, "body");
  const title = readString(entry, "title");

  const text = entry.has_image === true
    ? `${cyan(t("result_image"))} ${preview(title ?? "")}`.trimEnd()
    : preview(body ?? title ?? t("result_untitled"));

  return `${dim(("#" + id).padStart(6))} ${star} ${text}`;
}

export function formatItems(items: ItemEntry[]): string[] {
  if (items.length === 0) return [dim(t("result_no_items"))];
  return items.map(formatItem);
}

// ── Settings ──

export interface ResolvedSettings {
  ui: { width: number; height: number; anchor: string; opacity: number; blur: number };
  grid: { thumbSize: number; columns: number };
  behavior: { dedupe: boolean };
}

// Daemon-side defaults for any field the response leaves out
export const DEFAULT_SETTINGS: ResolvedSettings = {
  ui: { width: 480, height: 640, anchor: "top-right", opacity: 0.92, blur: 12 },
  grid: { thumbSize: 104, columns: 3 },
  behavior: { dedupe: true },
};

function section(settings: DaemonSettings, key: string): JsonObject {
  const value = settings[key];
  return isJsonObject(value) ? value : {};
}

function num(obj: JsonObject, key: string, fallback: number): number {
  const value = obj[key];
  return typeof value === "number" ? value : fallback;
}

export function resolveSettings(settings: DaemonSettings): ResolvedSettings {
  const ui = section(settings, "ui");
  const grid = section(settings, "grid");
  const behavior = section(settings, "behavior");
  const d = DEFAULT_SETTINGS;

  return {
    ui: {
      width: num(ui, "width", d.ui.width),
      height: num(ui, "height", d.ui.height),
      anchor: readString(ui, "anchor") ?? d.ui.anchor,
      opacity: num(ui, "opacity", d.ui.opacity),
      blur: num(ui, "blur", d.ui.blur),
    },
    grid: {
      thumbSize: num(grid, "thumb_size", d.grid.thumbSize),
      columns: num(grid, "columns", d.grid.columns),
    },
    behavior: {
      dedupe: typeof behavior.dedupe === "boolean" ? behavior.dedupe : d.behavior.dedupe,
    },
  };
}

export function formatSettings(settings: DaemonSettings): string[] {
  const s = resolveSettings(settings);
  return [
    bold(t("settings_header")),
    `UI: ${cyan(`${s.ui.width}×${s.ui.height}`)} | anchor ${cyan(s.ui.anchor)} | ` +
      `opacity ${cyan(String(s.ui.opacity))} | blur ${cyan(String(s.ui.blur))}`,
    `Grid: ${cyan(String(s.grid.columns))} columns | thumb ${cyan(String(s.grid.thumbSize))}px`,
    `Dedupe: ${s.behavior.dedupe ? green("on") : dim("off")}`,
  ];
}

export function formatResult(result: CommandResult): string[] {
  switch (result.kind) {
    case "items":
      return formatItems(result.items);
    case "starred":
      return [green("✓ ") + t("result_starred")];
    case "copied":
      return [green("✓ ") + t("result_copied")];
    case "deleted":
      return [green("✓ ") + `${t("result_deleted")}: ${result.count} ${t("result_items_unit")}`];
    case "purged":
      return [
        green("✓ ") +
          `${t("result_deleted")}: ${result.items} ${t("result_items_unit")}, ` +
          `${result.images} ${t("result_images_unit")}`,
      ];
    case "settings":
      return formatSettings(result.settings);
  }
}
