import assert from "node:assert";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, it } from "node:test";
import { CompressionMethod } from "../core/constants.js";
import { ZipFormatError } from "../core/errors.js";
import { FileAttributes } from "../core/file-attributes.js";
import { getTemporaryOutputDirectory } from "../test-util/fixtures.js";
import { ZipReader } from "./reader.js";
import { BufferSink } from "./sink.js";
import { ZipWriter } from "./writer.js";

async function makeZip(
  build: (writer: ZipWriter) => Promise<void>,
): Promise<Buffer> {
  const sink = new BufferSink();
  const writer = new ZipWriter({ sink });
  await build(writer);
  await writer.finalize("archive comment");
  return sink.toBuffer();
}

describe("node/reader", () => {
  describe("class ZipReader", () => {
    describe("fromBuffer()", () => {
      it("lists the entries in directory order", async () => {
        const buffer = await makeZip(async (writer) => {
          await writer.addFile({ path: "dir/" });
          await writer.addFile({ path: "dir/a.txt" }, "alpha");
          await writer.addFile(
            { path: "b.bin", compressionMethod: CompressionMethod.Stored },
            new Uint8Array([1, 2, 3]),
          );
        });

        const reader = ZipReader.fromBuffer(buffer);

        assert.strictEqual(reader.comment, "archive comment");
        assert.strictEqual(reader.entryCount, 3);
        assert.deepStrictEqual(
          reader.entries().map((entry) => [entry.path, entry.isDirectory]),
          [
            ["dir/", true],
            ["dir/a.txt", false],
            ["b.bin", false],
          ],
        );
      });

      it("reads back metadata and content", async () => {
        const buffer = await makeZip(async (writer) => {
          await writer.addFile(
            {
              path: "script.sh",
              lastModified: new Date("2020-02-29T10:20:30Z"),
              attributes: FileAttributes.fromMode(0o100755),
              comment: "runs things",
            },
            "#!/bin/sh\necho hi\n",
          );
        });

        const entry = ZipReader.fromBuffer(buffer).getEntry("script.sh");

        assert(entry);
        assert.strictEqual(entry.compressionMethod, CompressionMethod.Deflate);
        assert.strictEqual(
          entry.lastModified.toISOString(),
          "2020-02-29T10:20:30.000Z",
        );
        assert.strictEqual(entry.attributes.permissions, 0o755);
        assert.strictEqual(entry.comment, "runs things");
        assert.strictEqual(entry.uncompressedSize, 18);
        assert.strictEqual(await entry.toText(), "#!/bin/sh\necho hi\n");
      });

      it("detects corrupted data", async () => {
        const buffer = await makeZip(async (writer) => {
          await writer.addFile(
            { path: "a.txt", compressionMethod: CompressionMethod.Stored },
            "some text",
          );
        });
        // flip a byte of the stored content ("a.txt" header is 35 bytes)
        buffer[35] = "S".charCodeAt(0);

        const entry = ZipReader.fromBuffer(buffer).getEntry("a.txt");

        assert(entry);
        await assert.rejects(entry.toBuffer(), /crc32 mismatch for "a.txt"/);
      });

      it("throws for data that is not a zip", () => {
        assert.throws(
          () => ZipReader.fromBuffer(Buffer.from("definitely not a zip file")),
          ZipFormatError,
        );
      });
    });

    describe("open()", () => {
      it("reads a zip from disk", async (t) => {
        const directory = await getTemporaryOutputDirectory(t);
        const path = join(directory, "test.zip");

        const writer = await ZipWriter.open(path);
        await writer.addFile({ path: "data.txt" }, "on disk");
        await writer.finalize();

        const reader = await ZipReader.open(path);
        const entry = reader.getEntry("data.txt");

        assert(entry);
        assert.strictEqual(await entry.toText(), "on disk");
      });
    });

    describe("extractAll()", () => {
      it("recreates directories and files", async (t) => {
        const directory = await getTemporaryOutputDirectory(t);
        const buffer = await makeZip(async (writer) => {
          await writer.addFile({ path: "dir/" });
          await writer.addFile({ path: "dir/nested/deep.txt" }, "deep");
          await writer.addFile({ path: "top.txt" }, "top");
        });

        await ZipReader.fromBuffer(buffer).extractAll(directory);

        assert.deepStrictEqual((await readdir(directory)).sort(), [
          "dir",
          "top.txt",
        ]);
        assert.strictEqual(
          await readFile(join(directory, "dir", "nested", "deep.txt"), "utf8"),
          "deep",
        );
        assert.strictEqual(
          await readFile(join(directory, "top.txt"), "utf8"),
          "top",
        );
      });

      it("refuses entries that escape the output directory", async (t) => {
        const directory = await getTemporaryOutputDirectory(t);
        const outside = join(directory, "outside.txt");
        await writeFile(outside, "original");

        const buffer = await makeZip(async (writer) => {
          await writer.addFile({ path: "fine.txt" }, "fine");
          await writer.addFile({ path: "../outside.txt" }, "overwritten");
        });

        await assert.rejects(
          ZipReader.fromBuffer(buffer).extractAll(join(directory, "out")),
          ZipFormatError,
        );
        assert.strictEqual(await readFile(outside, "utf8"), "original");
      });
    });
  });
});
