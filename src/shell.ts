#!/usr/bin/env node

// ── Interactive Shell: browse clipboard history over one daemon connection ──

import * as readline from "node:readline";
import { executeCommand, openConnection, parseCommand } from "./commands.js";
import { isEntryPoint } from "./entry.js";
import { t, loadLang, setLang } from "./i18n.js";
import { IpcClient } from "./ipc-client.js";
import { bold, cyan, dim, green, red, yellow, formatResult } from "./render.js";

// ── MemoriaShell Class ──
export class MemoriaShell {
  private rl: readline.Interface | null = null;
  private cmdQueue: Array<() => Promise<void>> = [];
  private isProcessing = false;
  private isClosing = false;
  private pendingInputResolve: ((s: string) => void) | null = null;

  constructor(
    private readonly client: IpcClient = new IpcClient(),
    private readonly exit: (code: number) => void = (code) => process.exit(code)
  ) {}

  async start(): Promise<void> {
    loadLang();
    this.printWelcome();
    this.subscribe();

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: this.buildPrompt(),
      terminal: true,
    });
    this.rl = rl;

    // Ctrl+C clears the current line
    rl.on("SIGINT", () => {
      process.stdout.write("\n");
      rl.prompt();
    });

    rl.on("line", (line) => {
      const input = line.trim();

      // A confirmation prompt is waiting for this line
      if (this.pendingInputResolve) {
        const resolve = this.pendingInputResolve;
        this.pendingInputResolve = null;
        resolve(input);
        return;
      }

      if (!input) {
        if (!this.isProcessing) rl.prompt();
        return;
      }

      this.enqueue(() => this.dispatch(input));
    });

    rl.on("close", () => {
      // End of input answers a waiting confirmation with nothing
      if (this.pendingInputResolve) {
        const resolve = this.pendingInputResolve;
        this.pendingInputResolve = null;
        resolve("");
      }
      if (this.isClosing) return;
      this.isClosing = true;
      if (!this.isProcessing) this.finish();
      // Otherwise processQueue finishes once the queue drains
    });

    this.enqueue(() => this.connect());
  }

  // ── Daemon events ──
  private subscribe(): void {
    this.client.on("connected", () => this.notify(green("● ") + t("shell_connected")));
    this.client.on("disconnected", () => this.notify(yellow("○ ") + t("shell_disconnected")));

    // Errors during a command are reported by the command itself
    this.client.on("error", (message) => {
      if (!this.isProcessing) this.notify(red("✗ ") + message);
    });

    // The daemon put an item on the clipboard: dismiss, like the window does
    this.client.on("requestClose", () => this.rl?.close());
  }

  private notify(line: string): void {
    process.stdout.write(`\r${line}\n`);
    if (this.rl && !this.isProcessing && !this.isClosing) {
      this.rl.setPrompt(this.buildPrompt());
      this.rl.prompt(true);
    }
  }

  // ── Command Queue (one request in flight at a time) ──
  private enqueue(fn: () => Promise<void>): void {
    this.cmdQueue.push(async () => {
      try {
        await fn();
      } catch (err) {
        console.error(red("✗"), err instanceof Error ? err.message : String(err));
      }
    });
    if (!this.isProcessing) {
      this.processQueue().catch((err) => {
        console.error(red("✗ Fatal:"), err instanceof Error ? err.message : String(err));
        this.exit(1);
      });
    }
  }

  private async processQueue(): Promise<void> {
    this.isProcessing = true;
    let next: (() => Promise<void>) | undefined;
    while ((next = this.cmdQueue.shift()) !== undefined) {
      await next();
      if (!this.isClosing && this.rl) {
        this.rl.setPrompt(this.buildPrompt());
        this.rl.prompt();
      }
    }
    this.isProcessing = false;
    if (this.isClosing) this.finish();
  }

  private finish(): void {
    this.client.dispose();
    process.stdout.write(dim("\nBye.\n"));
    this.exit(0);
  }

  // ── Command Dispatch ──
  private async dispatch(input: string): Promise<void> {
    const [name, ...args] = input.split(/\s+/);

    switch (name) {
      case "exit":
      case "quit":
        this.isClosing = true;
        this.rl?.close();
        return;
      case "help":
        this.printHelp();
        return;
      case "connect":
        return this.connect();
      case "lang": {
        const result = setLang(args[0] ?? "");
        console.log(result.ok ? green("✓ ") + result.message : red("✗ ") + result.message);
        return;
      }
    }

    const command = parseCommand(name, args);

    if (!this.client.isConnected()) {
      console.log(yellow(t("shell_not_connected")));
      return;
    }

    if (command.kind === "purge") {
      const answer = await this.promptLine(t("shell_confirm_purge"));
      if (answer.toLowerCase() !== "y") {
        console.log(dim(t("shell_cancelled")));
        return;
      }
    }

    const result = await executeCommand(this.client, command);
    formatResult(result).forEach((line) => console.log(line));
  }

  private async connect(): Promise<void> {
    if (this.client.isConnected()) return;
    await openConnection(this.client);
  }

  // Prompt for a single line within the queue (safe alternative to rl.question)
  private async promptLine(question: string): Promise<string> {
    if (this.isClosing) return "";
    return new Promise((resolve) => {
      this.pendingInputResolve = resolve;
      process.stdout.write(question);
    });
  }

  // ── Prompt ──
  private buildPrompt(): string {
    const dot = this.client.isConnected() ? green("●") : red("○");
    return `${cyan("memoria")} ${dot} ${dim("›")} `;
  }

  // ── Welcome ──
  private printWelcome(): void {
    console.log(bold("memoria") + dim(t("welcome_subtitle")));
    console.log(dim(t("welcome_hint")));
    console.log("");
  }

  // ── Help ──
  private printHelp(): void {
    console.log(bold(t("help_header")));
    console.log("");
    console.log(`  ${cyan("list [n]")}               ${t("cmd_list")}`);
    console.log(`  ${cyan("starred [n]")}            ${t("cmd_starred")}`);
    console.log(`  ${cyan("search <text>")}          ${t("cmd_search")}`);
    console.log(`  ${cyan("gallery [n]")}            ${t("cmd_gallery")}`);
    console.log(`  ${cyan("star <id>")}              ${t("cmd_star")}`);
    console.log(`  ${cyan("unstar <id>")}            ${t("cmd_unstar")}`);
    console.log(`  ${cyan("copy <id>")}              ${t("cmd_copy")}`);
    console.log(`  ${cyan("delete <id...>")}         ${t("cmd_delete")}`);
    console.log(`  ${cyan("purge")}                  ${t("cmd_purge")}`);
    console.log(`  ${cyan("settings")}               ${t("cmd_settings")}`);
    console.log("");
    console.log(`  ${cyan("connect")}                ${t("help_connect")}`);
    console.log(`  ${cyan("lang <en|ko>")}           ${t("help_lang")}`);
    console.log(`  ${cyan("exit")}                   ${t("help_exit")}`);
  }
}

// ── Direct execution (memoria-shell bin entry point) ──
if (isEntryPoint(import.meta.url)) {
  new MemoriaShell().start().catch((err) => {
    console.error(red("✗ Fatal:"), err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
