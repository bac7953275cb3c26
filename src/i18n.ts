// ── Front-end strings (protocol error messages stay in English) ──

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { en, ko, type Translations, type Lang, SUPPORTED_LANGS, isLang } from "./locales/index.js";
import { createLogger } from "./log.js";
import { LANG_PATH } from "./types.js";

const log = createLogger("i18n");

const LOCALES: Record<Lang, Translations> = { en, ko };
let current: Translations = en;
let currentLanguage: Lang = "en";

function use(lang: Lang): void {
  currentLanguage = lang;
  current = LOCALES[lang];
}

// Unreadable or unknown preference → stay on English
export function loadLang(path: string = LANG_PATH): void {
  if (!existsSync(path)) return;
  try {
    const raw = readFileSync(path, "utf-8").trim();
    if (isLang(raw)) use(raw);
  } catch (err) {
    log.debug(`Could not read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function setLang(lang: string, path: string = LANG_PATH): { ok: boolean; message: string } {
  if (!isLang(lang)) {
    return {
      ok: false,
      message: `${current.lang_unknown}: ${lang}. ${current.lang_available}: ${SUPPORTED_LANGS.join(", ")}`,
    };
  }
  use(lang);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, lang, "utf-8");
  } catch (err) {
    return {
      ok: false,
      message: `${current.lang_save_failed}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return { ok: true, message: `${current.lang_set_to} ${lang}` };
}

export function t(key: keyof Translations): string {
  return current[key];
}

export function currentLang(): Lang {
  return currentLanguage;
}
