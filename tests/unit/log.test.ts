import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/log.js";

function collect() {
  const lines: string[] = [];
  return { lines, sink: { write: (chunk: string) => lines.push(chunk) } };
}

describe("createLogger", () => {
  it("writes warnings with the scope", () => {
    const { lines, sink } = collect();

    createLogger("ipc", sink, false).warn("boom");

    expect(lines).toEqual(["\x1b[33m[ipc] boom\x1b[0m\n"]);
  });

  it("drops debug output unless enabled", () => {
    const quiet = collect();
    createLogger("ipc", quiet.sink, false).debug("hidden");
    expect(quiet.lines).toEqual([]);

    const verbose = collect();
    createLogger("ipc", verbose.sink, true).debug("→ list");
    expect(verbose.lines).toEqual(["\x1b[2m[ipc] → list\x1b[0m\n"]);
  });
});
