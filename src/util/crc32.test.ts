import assert from "node:assert";
import { describe, it } from "node:test";
import { computeCrc32 } from "./crc32.js";

describe("util/crc32", () => {
  describe("computeCrc32()", () => {
    it("returns 0 for zero-length input", () => {
      assert.strictEqual(computeCrc32(new Uint8Array(0)), 0);
    });

    it("returns an unsigned value", () => {
      const output = computeCrc32(new TextEncoder().encode("hello world"));
      assert.strictEqual(output, 222957957);
    });

    it("continues from a seed", () => {
      const encoder = new TextEncoder();
      const first = computeCrc32(encoder.encode("hello "));
      const output = computeCrc32(encoder.encode("world"), first);

      assert.strictEqual(output, 222957957);
    });

    it("only reads the bytes of a sub view", () => {
      const base = new Uint8Array([
        0xff, 0xff, 0xff, 0x12, 0x34, 0x56, 0x78, 0x90, 0xff, 0xff, 0xff,
      ]);
      const input = new Uint8Array(base.buffer, 3, 5);

      assert.strictEqual(computeCrc32(input), 3700649649);
    });
  });
});
