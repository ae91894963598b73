import { BufferView, type BufferLike } from "../util/binary.js";
import { DosDate } from "../util/dos-date.js";
import type { Serializable } from "../util/serialization.js";
import {
  CentralHeaderSignature,
  CompressionMethod,
  ZipPlatform,
  ZipVersion,
} from "./constants.js";
import { ZipFormatError, ZipSignatureError } from "./errors.js";
import { FileAttributes } from "./file-attributes.js";
import { GeneralPurposeFlags } from "./flags.js";

export type CentralDirectoryHeaderInit = {
  attributes: FileAttributes;
  comment?: string;
  compressedSize: number;
  compressionMethod: CompressionMethod;
  crc32: number;
  extraField?: Uint8Array;
  flags: GeneralPurposeFlags;
  lastModified: Date;
  localHeaderOffset: number;
  path: string;
  platformMadeBy: ZipPlatform;
  uncompressedSize: number;
  versionMadeBy: ZipVersion;
  versionNeeded: ZipVersion;
};

export class CentralDirectoryHeader implements Serializable {
  // Central Directory Header (4.3.12)
  //
  // | offset | field                           | size |
  // | ------ | ------------------------------- | ---- |
  // | 0      | signature (0x02014b50)          | 4    |
  // | 4      | version made by                 | 2    |
  // | 6      | version needed to extract       | 2    |
  // | 8      | general purpose bit flag        | 2    |
  // | 10     | compression method              | 2    |
  // | 12     | last mod file time              | 2    |
  // | 14     | last mod file date              | 2    |
  // | 16     | crc-32                          | 4    |
  // | 20     | compressed size                 | 4    |
  // | 24     | uncompressed size               | 4    |
  // | 28     | file name length                | 2    |
  // | 30     | extra field length              | 2    |
  // | 32     | file comment length             | 2    |
  // | 34     | disk number start               | 2    |
  // | 36     | internal file attributes        | 2    |
  // | 38     | external file attributes        | 4    |
  // | 42     | relative offset of local header | 4    |
  // | 46     | file name (variable size)       |      |
  // |        | extra field (variable size)     |      |
  // |        | file comment (variable size)    |      |

  public static readonly FixedSize = 46;

  public static deserialize(
    buffer: BufferLike,
    byteOffset?: number,
    byteLength?: number,
  ): CentralDirectoryHeader {
    const view = new BufferView(buffer, byteOffset, byteLength);
    const signature = view.readUint32LE(0);

    if (signature !== CentralHeaderSignature) {
      throw new ZipSignatureError("central directory header", signature);
    }

    const platformMadeBy = view.getUint8(5);
    const pathLength = view.readUint16LE(28);
    const extraFieldLength = view.readUint16LE(30);
    const commentLength = view.readUint16LE(32);
    const diskNumberStart = view.readUint16LE(34);

    if (diskNumberStart !== 0) {
      throw new ZipFormatError(`multi-disk zips not supported`);
    }

    const pathOffset = CentralDirectoryHeader.FixedSize;
    const extraFieldOffset = pathOffset + pathLength;
    const commentOffset = extraFieldOffset + extraFieldLength;

    return new this({
      versionMadeBy: view.getUint8(4),
      platformMadeBy,
      versionNeeded: view.readUint16LE(6),
      flags: new GeneralPurposeFlags(view.readUint16LE(8)),
      compressionMethod: view.readUint16LE(10),
      lastModified: DosDate.fromDosUint32(view.readUint32LE(12)),
      crc32: view.readUint32LE(16),
      compressedSize: view.readUint32LE(20),
      uncompressedSize: view.readUint32LE(24),
      attributes: FileAttributes.fromRaw(
        platformMadeBy,
        view.readUint32LE(38),
      ),
      localHeaderOffset: view.readUint32LE(42),
      path: view.readString(pathOffset, pathLength),
      extraField: view.getOriginalBytes(extraFieldOffset, extraFieldLength),
      comment: view.readString(commentOffset, commentLength),
    });
  }

  /**
   * Read the size of the header including its variable-length fields.
   */
  public static readTotalSize(buffer: BufferLike, byteOffset?: number): number {
    const view = new BufferView(buffer, byteOffset, this.FixedSize);
    const signature = view.readUint32LE(0);

    if (signature !== CentralHeaderSignature) {
      throw new ZipSignatureError("central directory header", signature);
    }

    return (
      this.FixedSize +
      view.readUint16LE(28) +
      view.readUint16LE(30) +
      view.readUint16LE(32)
    );
  }

  public attributes: FileAttributes;
  public comment: string;
  public compressedSize: number;
  public compressionMethod: CompressionMethod;
  public crc32: number;
  public extraField: Uint8Array;
  public flags: GeneralPurposeFlags;
  public lastModified: Date;
  public localHeaderOffset: number;
  public path: string;
  public platformMadeBy: ZipPlatform;
  public uncompressedSize: number;
  public versionMadeBy: ZipVersion;
  public versionNeeded: ZipVersion;

  public constructor(init: CentralDirectoryHeaderInit) {
    this.attributes = init.attributes;
    this.comment = init.comment ?? "";
    this.compressedSize = init.compressedSize;
    this.compressionMethod = init.compressionMethod;
    this.crc32 = init.crc32;
    this.extraField = init.extraField ?? new Uint8Array(0);
    this.flags = init.flags;
    this.lastModified = init.lastModified;
    this.localHeaderOffset = init.localHeaderOffset;
    this.path = init.path;
    this.platformMadeBy = init.platformMadeBy;
    this.uncompressedSize = init.uncompressedSize;
    this.versionMadeBy = init.versionMadeBy;
    this.versionNeeded = init.versionNeeded;
  }

  public serialize(): Uint8Array {
    const encoder = new TextEncoder();
    const path = encoder.encode(this.path);
    const comment = encoder.encode(this.comment);

    const view = BufferView.alloc(
      CentralDirectoryHeader.FixedSize +
        path.byteLength +
        this.extraField.byteLength +
        comment.byteLength,
    );

    view.writeUint32LE(CentralHeaderSignature, 0);
    view.writeUint8(this.versionMadeBy, 4);
    view.writeUint8(this.platformMadeBy, 5);
    view.writeUint16LE(this.versionNeeded, 6);
    view.writeUint16LE(this.flags.value, 8);
    view.writeUint16LE(this.compressionMethod, 10);
    view.writeUint32LE(DosDate.clamp(this.lastModified).getDosDateTime(), 12);
    view.writeUint32LE(this.crc32, 16);
    view.writeUint32LE(this.compressedSize, 20);
    view.writeUint32LE(this.uncompressedSize, 24);
    view.writeUint16LE(path.byteLength, 28);
    view.writeUint16LE(this.extraField.byteLength, 30);
    view.writeUint16LE(comment.byteLength, 32);
    view.writeUint16LE(0, 34); // disk number start
    view.writeUint16LE(0, 36); // internal file attributes
    view.writeUint32LE(this.attributes.rawValue, 38);
    view.writeUint32LE(this.localHeaderOffset, 42);

    let offset = CentralDirectoryHeader.FixedSize;
    view.setBytes(offset, path);
    offset += path.byteLength;
    view.setBytes(offset, this.extraField);
    offset += this.extraField.byteLength;
    view.setBytes(offset, comment);

    return view.getOriginalBytes();
  }
}
