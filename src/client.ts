#!/usr/bin/env node

import {
  type Command,
  UsageError,
  executeCommand,
  isCommandName,
  openConnection,
  parseCommand,
} from "./commands.js";
import { isEntryPoint } from "./entry.js";
import { t, loadLang, setLang } from "./i18n.js";
import { IpcClient } from "./ipc-client.js";
import { bold, cyan, green, red, formatResult } from "./render.js";

// ── Parse CLI ──
export type CliAction =
  | { action: "shell" }
  | { action: "help" }
  | { action: "lang"; lang: string }
  | { action: "command"; command: Command };

export function parseArgs(argv: string[]): CliAction {
  const args = argv.slice(2);

  if (args.length === 0) {
    return { action: "shell" };
  }

  const [first, ...rest] = args;

  if (first === "--help" || first === "-h") {
    return { action: "help" };
  }

  if (first === "--lang") {
    if (!rest[0]) throw new UsageError(`${t("lang_available")}: en, ko`);
    return { action: "lang", lang: rest[0] };
  }

  const name = first.startsWith("--") ? first.slice(2) : first;
  if (!isCommandName(name)) {
    throw new UsageError(`${t("shell_unknown_command")}: ${first}`);
  }

  return { action: "command", command: parseCommand(name, rest) };
}

// ── Run one command against the daemon ──
export async function runCommand(
  command: Command,
  client: IpcClient,
  out: (line: string) => void = console.log
): Promise<void> {
  try {
    await openConnection(client);
    const result = await executeCommand(client, command);
    formatResult(result).forEach((line) => out(line));
  } finally {
    client.dispose();
  }
}

function printHelp(): void {
  console.log(bold(t("client_help_title")));
  console.log("");
  console.log(t("client_help_usage"));
  console.log(`  ${cyan("memoria-ui")}                    ${t("client_interactive")}`);
  console.log(`  ${cyan("memoria-ui --list [n]")}         ${t("cmd_list")}`);
  console.log(`  ${cyan("memoria-ui --starred [n]")}      ${t("cmd_starred")}`);
  console.log(`  ${cyan('memoria-ui --search "text"')}    ${t("cmd_search")}`);
  console.log(`  ${cyan("memoria-ui --gallery [n]")}      ${t("cmd_gallery")}`);
  console.log(`  ${cyan("memoria-ui --star <id>")}        ${t("cmd_star")}`);
  console.log(`  ${cyan("memoria-ui --unstar <id>")}      ${t("cmd_unstar")}`);
  console.log(`  ${cyan("memoria-ui --copy <id>")}        ${t("cmd_copy")}`);
  console.log(`  ${cyan("memoria-ui --delete <id...>")}   ${t("cmd_delete")}`);
  console.log(`  ${cyan("memoria-ui --purge")}            ${t("cmd_purge")}`);
  console.log(`  ${cyan("memoria-ui --settings")}         ${t("cmd_settings")}`);
  console.log(`  ${cyan("memoria-ui --lang <en|ko>")}     ${t("client_lang")}`);
}

// ── Main ──
async function main(): Promise<void> {
  loadLang();

  let parsed: CliAction;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(red("✗"), err.message);
    printHelp();
    process.exitCode = 1;
    return;
  }

  switch (parsed.action) {
    case "help":
      printHelp();
      return;

    case "lang": {
      const result = setLang(parsed.lang);
      if (result.ok) {
        console.log(green("✓ ") + result.message);
      } else {
        console.error(red("✗"), result.message);
        process.exitCode = 1;
      }
      return;
    }

    case "shell": {
      const { MemoriaShell } = await import("./shell.js");
      await new MemoriaShell().start();
      return;
    }

    case "command":
      try {
        await runCommand(parsed.command, new IpcClient());
      } catch (err) {
        console.error(red("✗"), err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
      return;
  }
}

if (isEntryPoint(import.meta.url)) {
  main().catch((err) => {
    console.error(red("✗ Fatal:"), err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
