import assert from "node:assert";
import { describe, it } from "node:test";
import {
  CompressionMethod,
  ZipPlatform,
  ZipVersion,
} from "../core/constants.js";
import { DuplicateEntryError, ZipError } from "../core/errors.js";
import { FileAttributes } from "../core/file-attributes.js";
import { GeneralPurposeFlags } from "../core/flags.js";
import { assertBufferEqual } from "../test-util/assert.js";
import {
  crc32,
  data,
  dosDate,
  longUint,
  shortUint,
  tinyUint,
  utf8,
  utf8length,
  utf8length32,
} from "../test-util/data.js";
import { BufferSink } from "./sink.js";
import { ZipWriter } from "./writer.js";

describe("node/writer", () => {
  describe("class ZipWriter", () => {
    describe("addFile()", () => {
      it("writes a stored entry and the central directory", async () => {
        const sink = new BufferSink();
        const writer = new ZipWriter({ sink });

        await writer.addFile(
          {
            path: "hello.txt",
            lastModified: new Date("2005-03-09T12:55:14Z"),
            compressionMethod: CompressionMethod.Stored,
          },
          "hello world",
        );
        await writer.finalize();

        const expected = data(
          //## +0000 LOCAL ENTRY 1 HEADER (30+9 = 39 bytes)
          longUint(0x04034b50), // local header signature
          shortUint(ZipVersion.Deflate), // version needed
          shortUint(GeneralPurposeFlags.HasUtf8Strings), // flags
          shortUint(CompressionMethod.Stored), // compression method
          dosDate`2005-03-09T12:55:14Z`, // last modified
          crc32`hello world`, // crc32
          utf8length32`hello world`, // compressed size
          utf8length32`hello world`, // uncompressed size
          utf8length`hello.txt`, // file name length
          shortUint(0), // extra field length
          utf8`hello.txt`, // file name

          //## +0039 LOCAL ENTRY 1 CONTENT (11 bytes)
          utf8`hello world`,

          //## +0050 DIRECTORY ENTRY 1 (46+9 = 55 bytes)
          longUint(0x02014b50), // central directory header signature
          tinyUint(ZipVersion.Deflate), // version made by
          tinyUint(ZipPlatform.UNIX), // platform made by
          shortUint(ZipVersion.Deflate), // version needed
          shortUint(GeneralPurposeFlags.HasUtf8Strings), // flags
          shortUint(CompressionMethod.Stored), // compression method
          dosDate`2005-03-09T12:55:14Z`, // last modified
          crc32`hello world`, // crc32
          utf8length32`hello world`, // compressed size
          utf8length32`hello world`, // uncompressed size
          utf8length`hello.txt`, // file name length
          shortUint(0), // extra field length
          shortUint(0), // file comment length
          shortUint(0), // disk number start
          shortUint(0), // internal file attributes
          longUint((0o100600 << 16) >>> 0), // external file attributes
          longUint(0), // relative offset of local header
          utf8`hello.txt`, // file name

          //## +0105 End of Central Directory Record
          longUint(0x06054b50), // EOCDR signature
          shortUint(0), // number of this disk
          shortUint(0), // central directory start disk
          shortUint(1), // total entries this disk
          shortUint(1), // total entries all disks
          longUint(105 - 50), // size of the central directory
          longUint(50), // central directory offset
          shortUint(0), // .ZIP file comment length
        );

        assertBufferEqual(sink.toBuffer(), expected);
      });

      it("deflates non-empty content with the given compressors", async (t) => {
        const compressor = t.mock.fn(async (input: Uint8Array) => {
          assertBufferEqual(input, Buffer.from("hello world"));
          return Buffer.from("COMPRESSED!");
        });

        const sink = new BufferSink();
        const writer = new ZipWriter({
          sink,
          compressors: { [CompressionMethod.Deflate]: compressor },
        });

        await writer.addFile(
          {
            path: "hello.txt",
            lastModified: new Date("2005-03-09T12:55:14Z"),
            attributes: FileAttributes.fromMode(0o100644),
          },
          "hello world",
        );
        await writer.finalize();

        assert.strictEqual(compressor.mock.callCount(), 1);

        const output = sink.toBuffer();
        const localHeader = data(
          longUint(0x04034b50), // local header signature
          shortUint(ZipVersion.Deflate), // version needed
          shortUint(GeneralPurposeFlags.HasUtf8Strings), // flags
          shortUint(CompressionMethod.Deflate), // compression method
          dosDate`2005-03-09T12:55:14Z`, // last modified
          crc32`hello world`, // crc32
          utf8length32`COMPRESSED!`, // compressed size
          utf8length32`hello world`, // uncompressed size
          utf8length`hello.txt`, // file name length
          shortUint(0), // extra field length
          utf8`hello.txt`, // file name
          utf8`COMPRESSED!`, // content
        );

        assertBufferEqual(output.subarray(0, localHeader.byteLength), localHeader);
        // external attributes of the first directory entry
        assert.strictEqual(
          output.readUInt32LE(localHeader.byteLength + 38),
          (0o100644 << 16) >>> 0,
        );
      });

      it("writes directories as empty stored entries", async () => {
        const sink = new BufferSink();
        const writer = new ZipWriter({ sink });

        await writer.addFile({
          path: "dir/",
          lastModified: new Date("1980-01-01T00:00:00Z"),
        });
        await writer.finalize();

        const output = sink.toBuffer();
        assertBufferEqual(
          output.subarray(0, 34),
          data(
            longUint(0x04034b50), // local header signature
            shortUint(ZipVersion.Deflate), // version needed
            shortUint(GeneralPurposeFlags.HasUtf8Strings), // flags
            shortUint(CompressionMethod.Stored), // compression method
            longUint(0x0021_0000), // last modified
            longUint(0), // crc32
            longUint(0), // compressed size
            longUint(0), // uncompressed size
            shortUint(4), // file name length
            shortUint(0), // extra field length
            utf8`dir/`, // file name
          ),
        );
        // external attributes of the directory entry
        assert.strictEqual(
          output.readUInt32LE(34 + 38),
          ((0o040775 << 16) | 0x10) >>> 0,
        );
      });

      it("throws for a duplicate path", async () => {
        const writer = new ZipWriter({ sink: new BufferSink() });
        await writer.addFile({ path: "a.txt" }, "one");

        await assert.rejects(
          writer.addFile({ path: "a.txt" }, "two"),
          (error) =>
            error instanceof DuplicateEntryError &&
            error.code === "E_ZIP_DUPLICATE" &&
            error.path === "a.txt",
        );
        assert.strictEqual(writer.entryCount, 1);
      });

      it("throws for a directory with content", async () => {
        const writer = new ZipWriter({ sink: new BufferSink() });

        await assert.rejects(
          writer.addFile({ path: "dir/" }, "content"),
          (error) =>
            error instanceof ZipError &&
            error.code === "E_ZIP_DIRECTORY_CONTENT",
        );
      });

      it("throws for an unknown compression method", async () => {
        const writer = new ZipWriter({ sink: new BufferSink() });
        const unknownMethod: number = 99;

        await assert.rejects(
          writer.addFile({ path: "a.txt", compressionMethod: unknownMethod }, "x"),
          (error) =>
            error instanceof ZipError && error.code === "E_ZIP_COMPRESSION",
        );
      });

      it("leaves the output untouched when compression fails", async () => {
        const sink = new BufferSink();
        const writer = new ZipWriter({
          sink,
          compressors: {
            [CompressionMethod.Deflate]: async () => {
              throw new Error("compressor failed");
            },
          },
        });

        await assert.rejects(
          writer.addFile({ path: "a.txt" }, "content"),
          /compressor failed/,
        );
        await writer.addFile({ path: "empty.txt" });
        await writer.finalize();

        // the second entry is written at offset zero
        const output = sink.toBuffer();
        assert.strictEqual(output.readUInt32LE(0), 0x04034b50);
        assert.strictEqual(output.subarray(30, 39).toString(), "empty.txt");
        assert.strictEqual(writer.entryCount, 1);
      });

      it("throws after finalize()", async () => {
        const writer = new ZipWriter({ sink: new BufferSink() });
        await writer.finalize();

        await assert.rejects(
          writer.addFile({ path: "late.txt" }, "x"),
          (error) => error instanceof ZipError && error.code === "E_ZIP_FINALIZED",
        );
      });
    });

    describe("finalize()", () => {
      it("closes the sink", async () => {
        const sink = new BufferSink();
        const writer = new ZipWriter({ sink });

        await writer.finalize("comment");

        assert.strictEqual(sink.isClosed, true);
        assertBufferEqual(
          sink.toBuffer(),
          data(
            longUint(0x06054b50), // EOCDR signature
            shortUint(0), // number of this disk
            shortUint(0), // central directory start disk
            shortUint(0), // total entries this disk
            shortUint(0), // total entries all disks
            longUint(0), // size of the central directory
            longUint(0), // central directory offset
            utf8length`comment`, // .ZIP file comment length
            utf8`comment`, // .ZIP file comment
          ),
        );
      });

      it("can only be called once", async () => {
        const writer = new ZipWriter({ sink: new BufferSink() });
        await writer.finalize();

        await assert.rejects(writer.finalize(), /multiple calls to finalize/);
      });
    });
  });
});
