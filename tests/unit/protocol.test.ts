import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  FrameOverflowError,
  LineFramer,
  deserialize,
  serialize,
  type DaemonRequest,
} from "../../src/protocol.js";

describe("serialize", () => {
  it("writes compact JSON with one trailing newline", () => {
    expect(serialize({ cmd: "list", args: { limit: 2, starred_only: false } })).toBe(
      '{"cmd":"list","args":{"limit":2,"starred_only":false}}\n'
    );
  });

  it("omits args for argument-less commands", () => {
    expect(serialize({ cmd: "get_settings" })).toBe('{"cmd":"get_settings"}\n');
    expect(serialize({ cmd: "delete_all_except_starred" })).toBe(
      '{"cmd":"delete_all_except_starred"}\n'
    );
  });

  it("keeps ids exact up to 2^53", () => {
    const line = serialize({ cmd: "copy", args: { id: Number.MAX_SAFE_INTEGER } });
    expect(line).toBe('{"cmd":"copy","args":{"id":9007199254740991}}\n');
  });

  it("round-trips any request and never embeds a raw newline", () => {
    const request: fc.Arbitrary<DaemonRequest> = fc.oneof(
      fc.record({ limit: fc.nat(), starred_only: fc.boolean() }).map((args) => ({ cmd: "list" as const, args })),
      fc.record({ query: fc.string(), limit: fc.nat() }).map((args) => ({ cmd: "search" as const, args })),
      fc.record({ id: fc.maxSafeNat(), value: fc.boolean() }).map((args) => ({ cmd: "star" as const, args })),
      fc.array(fc.maxSafeNat()).map((ids) => ({ cmd: "delete_items" as const, args: { ids } })),
      fc.constant({ cmd: "get_settings" as const })
    );

    fc.assert(
      fc.property(request, (req) => {
        const line = serialize(req);
        expect(line.indexOf("\n")).toBe(line.length - 1);
        expect(JSON.parse(line)).toEqual(req);
      })
    );
  });
});

describe("deserialize", () => {
  it("returns the object for a JSON object line", () => {
    expect(deserialize('{"ok":true}')).toEqual({ ok: true });
  });

  it.each(["not json", "[1,2]", "null", "42", '"text"', '{"ok":'])("rejects %s", (line) => {
    expect(deserialize(line)).toBeNull();
  });
});

describe("LineFramer", () => {
  it("holds a partial document until its terminator arrives", () => {
    const framer = new LineFramer();

    expect(framer.push('{"ok":true,"data":{"upd')).toEqual([]);
    expect(framer.pending).toBe(23);
    expect(framer.push('ated":1}}\n')).toEqual(['{"ok":true,"data":{"updated":1}}']);
    expect(framer.pending).toBe(0);
  });

  it("splits several documents out of one chunk in order", () => {
    const framer = new LineFramer();

    expect(framer.push('{"a":1}\n{"b":2}\n{"c"')).toEqual(['{"a":1}', '{"b":2}']);
    expect(framer.push(":3}\n")).toEqual(['{"c":3}']);
  });

  it("drops empty lines and trims surrounding whitespace", () => {
    const framer = new LineFramer();

    expect(framer.push('\n   \n  {"a":1}\r\n\t\n')).toEqual(['{"a":1}']);
  });

  it("decodes a multi-byte character split across chunks", () => {
    const framer = new LineFramer();
    const bytes = Buffer.from('{"text":"café"}\n', "utf8");
    const cut = bytes.indexOf(0xa9);

    expect(framer.push(bytes.subarray(0, cut))).toEqual([]);
    expect(framer.push(bytes.subarray(cut))).toEqual(['{"text":"café"}']);
  });

  it("delivers every document exactly once whatever the chunk boundaries", () => {
    fc.assert(
      fc.property(fc.array(fc.json(), { minLength: 1, maxLength: 8 }), fc.array(fc.nat()), (docs, cutSeeds) => {
        const stream = Buffer.from(docs.map((doc) => doc + "\n").join(""), "utf8");
        const cuts = [...new Set(cutSeeds.map((seed) => seed % (stream.length + 1)))].sort((a, b) => a - b);

        const framer = new LineFramer();
        const lines: string[] = [];
        let start = 0;
        for (const cut of [...cuts, stream.length]) {
          lines.push(...framer.push(stream.subarray(start, cut)));
          start = cut;
        }

        expect(lines).toEqual(docs);
        expect(framer.pending).toBe(0);
      })
    );
  });

  it("throws once the unterminated suffix exceeds the limit, keeping complete lines", () => {
    const framer = new LineFramer(8);

    let caught: unknown;
    try {
      framer.push('{"a":1}\n{"b":"0123456789"');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(FrameOverflowError);
    if (!(caught instanceof FrameOverflowError)) return;
    expect(caught.lines).toEqual(['{"a":1}']);
    expect(caught.message).toBe("Unterminated frame of 17 bytes exceeds limit of 8 bytes");
    expect(framer.pending).toBe(0);
  });

  it("reset discards the buffered suffix", () => {
    const framer = new LineFramer();
    framer.push('{"ok":tr');
    framer.reset();

    expect(framer.push('{"ok":true}\n')).toEqual(['{"ok":true}']);
  });
});
