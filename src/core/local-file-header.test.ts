import assert from "node:assert";
import { describe, it } from "node:test";
import { assertBufferEqual } from "../test-util/assert.js";
import {
  crc32,
  data,
  dosDate,
  longUint,
  shortUint,
  utf8,
  utf8length,
  utf8length32,
} from "../test-util/data.js";
import { CompressionMethod, ZipVersion } from "./constants.js";
import { ZipSignatureError } from "./errors.js";
import { GeneralPurposeFlags } from "./flags.js";
import { LocalFileHeader } from "./local-file-header.js";

describe("core/local-file-header", () => {
  describe("class LocalFileHeader", () => {
    const encoded = data(
      longUint(0x04034b50), // local header signature
      shortUint(ZipVersion.Deflate), // version needed
      shortUint(GeneralPurposeFlags.HasUtf8Strings), // flags
      shortUint(CompressionMethod.Stored), // compression method
      dosDate`1999-12-31T23:59:58Z`, // last modified
      crc32`file content`, // crc32
      utf8length32`file content`, // compressed size
      utf8length32`file content`, // uncompressed size
      utf8length`dir/ƒile.txt`, // file name length
      shortUint(0), // extra field length
      utf8`dir/ƒile.txt`, // file name
    );

    describe("serialize()", () => {
      it("writes all the fields", () => {
        const header = new LocalFileHeader({
          compressedSize: 12,
          compressionMethod: CompressionMethod.Stored,
          crc32: encoded.readUInt32LE(14),
          flags: new GeneralPurposeFlags(GeneralPurposeFlags.HasUtf8Strings),
          lastModified: new Date("1999-12-31T23:59:58Z"),
          path: "dir/ƒile.txt",
          uncompressedSize: 12,
          versionNeeded: ZipVersion.Deflate,
        });

        assertBufferEqual(header.serialize(), encoded);
      });
    });

    describe("deserialize()", () => {
      it("reads all the fields", () => {
        const header = LocalFileHeader.deserialize(encoded);

        assert.strictEqual(header.versionNeeded, ZipVersion.Deflate);
        assert.strictEqual(header.flags.hasUtf8Strings, true);
        assert.strictEqual(header.compressionMethod, CompressionMethod.Stored);
        assert.strictEqual(
          header.lastModified.toISOString(),
          "1999-12-31T23:59:58.000Z",
        );
        assert.strictEqual(header.compressedSize, 12);
        assert.strictEqual(header.uncompressedSize, 12);
        assert.strictEqual(header.path, "dir/ƒile.txt");
        assert.strictEqual(header.extraField.byteLength, 0);
      });

      it("throws for a bad signature", () => {
        const corrupt = Buffer.from(encoded);
        corrupt.writeUInt32LE(0x02014b50, 0);

        assert.throws(
          () => LocalFileHeader.deserialize(corrupt),
          ZipSignatureError,
        );
      });
    });

    describe("readTotalSize()", () => {
      it("includes the file name and extra field", () => {
        const withExtra = data(encoded, "cafe");
        withExtra.set(shortUint(2), 28);

        // "dir/ƒile.txt" is 13 bytes in utf-8
        assert.strictEqual(LocalFileHeader.readTotalSize(withExtra), 30 + 13 + 2);
      });
    });
  });
});
