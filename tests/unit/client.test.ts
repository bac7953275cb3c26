import { describe, it, expect, vi } from "vitest";
import { parseArgs, runCommand } from "../../src/client.js";
import { UsageError } from "../../src/commands.js";
import { IpcClient } from "../../src/ipc-client.js";
import { silentLogger } from "../../src/log.js";
import { fakeConnector } from "../helpers/fake-socket.js";

const argv = (...args: string[]) => ["node", "memoria-ui", ...args];

function createClient() {
  const fake = fakeConnector();
  const client = new IpcClient({
    connector: fake.connector,
    socketPath: () => "/tmp/memoria-test/memoria.sock",
    logger: silentLogger,
    connectTimeoutMs: 0,
  });
  return { client, fake };
}

describe("parseArgs", () => {
  it("opens the shell without arguments", () => {
    expect(parseArgs(argv())).toEqual({ action: "shell" });
  });

  it("recognizes help", () => {
    expect(parseArgs(argv("--help"))).toEqual({ action: "help" });
    expect(parseArgs(argv("-h"))).toEqual({ action: "help" });
  });

  it("recognizes --lang", () => {
    expect(parseArgs(argv("--lang", "ko"))).toEqual({ action: "lang", lang: "ko" });
    expect(() => parseArgs(argv("--lang"))).toThrow("Available: en, ko");
  });

  it("parses flag and bare command names", () => {
    expect(parseArgs(argv("--star", "5"))).toEqual({
      action: "command",
      command: { kind: "star", id: 5, value: true },
    });
    expect(parseArgs(argv("list", "10"))).toEqual({
      action: "command",
      command: { kind: "list", limit: 10, starredOnly: false },
    });
    expect(parseArgs(argv("--search", "foo", "bar"))).toEqual({
      action: "command",
      command: { kind: "search", query: "foo bar", limit: 50 },
    });
  });

  it("rejects unknown flags", () => {
    expect(() => parseArgs(argv("--bogus"))).toThrow(UsageError);
    expect(() => parseArgs(argv("--bogus"))).toThrow("Unknown command: --bogus");
  });
});

describe("runCommand", () => {
  it("connects, prints the result and closes the connection", async () => {
    const { client, fake } = createClient();
    const out: string[] = [];

    const done = runCommand({ kind: "star", id: 5, value: true }, client, (line) => out.push(line));
    const socket = fake.last();
    socket.simulateConnect();

    await vi.waitFor(() => expect(socket.written).toHaveLength(1));
    expect(socket.written[0]).toBe('{"cmd":"star","args":{"id":5,"value":true}}\n');
    socket.simulateData('{"ok":true,"data":{"updated":1}}\n');
    await done;

    expect(out).toEqual(["\x1b[32m✓ \x1b[0mStar updated."]);
    expect(socket.ended).toBe(true);
  });

  it("rejects when the daemon is not running", async () => {
    const { client, fake } = createClient();

    const done = runCommand({ kind: "settings" }, client, () => {});
    fake.last().simulateError("ECONNREFUSED");

    await expect(done).rejects.toThrow("Connection refused. Is memoria-daemon running?");
    expect(client.isConnected()).toBe(false);
  });

  it("rejects with the daemon's error and still closes", async () => {
    const { client, fake } = createClient();

    const done = runCommand({ kind: "copy", id: 1 }, client, () => {});
    const socket = fake.last();
    socket.simulateConnect();
    await vi.waitFor(() => expect(socket.written).toHaveLength(1));
    socket.simulateData('{"ok":false,"error":"item not found"}\n');

    await expect(done).rejects.toThrow("item not found");
    expect(socket.ended).toBe(true);
  });
});
