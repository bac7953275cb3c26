import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { t } from "../../src/i18n.js";
import { IpcClient } from "../../src/ipc-client.js";
import { silentLogger } from "../../src/log.js";
import { MemoriaShell } from "../../src/shell.js";
import { fakeConnector } from "../helpers/fake-socket.js";
import { FakeReadline } from "../helpers/fake-readline.js";

vi.mock("node:readline", async () => {
  const { FakeReadline } = await import("../helpers/fake-readline.js");
  return { createInterface: () => FakeReadline.create() };
});

async function startConnectedShell() {
  const fake = fakeConnector();
  const client = new IpcClient({
    connector: fake.connector,
    socketPath: () => "/tmp/memoria-test/memoria.sock",
    logger: silentLogger,
    connectTimeoutMs: 0,
  });
  const exit = vi.fn();
  const shell = new MemoriaShell(client, exit);

  await shell.start();
  const socket = fake.last();
  socket.simulateConnect();
  const rl = FakeReadline.last();
  // The connect step is done once the shell prompts again
  await vi.waitFor(() => expect(rl.prompts).toBeGreaterThan(0));

  return { rl, socket, exit };
}

describe("MemoriaShell", () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits when input ends during the purge confirmation", async () => {
    const { rl, socket, exit } = await startConnectedShell();

    rl.type("purge");
    await vi.waitFor(() => expect(process.stdout.write).toHaveBeenCalledWith(t("shell_confirm_purge")));
    rl.close();

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(socket.written).toEqual([]);
    expect(socket.ended).toBe(true);
  });

  it("sends nothing when the purge is declined", async () => {
    const { rl, socket, exit } = await startConnectedShell();

    rl.type("purge");
    await vi.waitFor(() => expect(process.stdout.write).toHaveBeenCalledWith(t("shell_confirm_purge")));
    rl.type("n");
    await vi.waitFor(() => expect(console.log).toHaveBeenCalledWith(expect.stringContaining(t("shell_cancelled"))));
    rl.close();

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));
    expect(socket.written).toEqual([]);
  });

  it("sends the purge once confirmed", async () => {
    const { rl, socket } = await startConnectedShell();

    rl.type("purge");
    await vi.waitFor(() => expect(process.stdout.write).toHaveBeenCalledWith(t("shell_confirm_purge")));
    rl.type("y");

    await vi.waitFor(() => expect(socket.written).toEqual(['{"cmd":"delete_all_except_starred"}\n']));
    socket.simulateData('{"ok":true,"data":{"deleted_items":4,"deleted_images":1}}\n');
    await vi.waitFor(() =>
      expect(console.log).toHaveBeenCalledWith(
        "\x1b[32m✓ \x1b[0m" + `${t("result_deleted")}: 4 ${t("result_items_unit")}, 1 ${t("result_images_unit")}`
      )
    );
  });
});
