import { BufferView, type BufferLike } from "../util/binary.js";
import { DosDate } from "../util/dos-date.js";
import type { Serializable } from "../util/serialization.js";
import {
  CompressionMethod,
  LocalHeaderSignature,
  ZipVersion,
} from "./constants.js";
import { ZipSignatureError } from "./errors.js";
import { GeneralPurposeFlags } from "./flags.js";

export type LocalFileHeaderInit = {
  compressedSize: number;
  compressionMethod: CompressionMethod;
  crc32: number;
  extraField?: Uint8Array;
  flags: GeneralPurposeFlags;
  lastModified: Date;
  path: string;
  uncompressedSize: number;
  versionNeeded: ZipVersion;
};

export class LocalFileHeader implements Serializable {
  // Local File Header (4.3.7)
  //
  // | offset | field                     | size |
  // | ------ | ------------------------- | ---- |
  // | 0      | signature (0x04034b50)    | 4    |
  // | 4      | version needed to extract | 2    |
  // | 6      | general purpose bit flag  | 2    |
  // | 8      | compression method        | 2    |
  // | 10     | last mod file time        | 2    |
  // | 12     | last mod file date        | 2    |
  // | 14     | crc-32                    | 4    |
  // | 18     | compressed size           | 4    |
  // | 22     | uncompressed size         | 4    |
  // | 26     | file name length          | 2    |
  // | 28     | extra field length        | 2    |
  // | 30     | file name                 | ...  |
  // | ...    | extra field               | ...  |

  public static readonly FixedSize = 30;

  public static deserialize(
    buffer: BufferLike,
    byteOffset?: number,
    byteLength?: number,
  ): LocalFileHeader {
    const view = new BufferView(buffer, byteOffset, byteLength);
    const signature = view.readUint32LE(0);

    if (signature !== LocalHeaderSignature) {
      throw new ZipSignatureError("local file header", signature);
    }

    const pathLength = view.readUint16LE(26);
    const extraFieldLength = view.readUint16LE(28);

    return new this({
      versionNeeded: view.readUint16LE(4),
      flags: new GeneralPurposeFlags(view.readUint16LE(6)),
      compressionMethod: view.readUint16LE(8),
      lastModified: DosDate.fromDosUint32(view.readUint32LE(10)),
      crc32: view.readUint32LE(14),
      compressedSize: view.readUint32LE(18),
      uncompressedSize: view.readUint32LE(22),
      path: view.readString(30, pathLength),
      extraField: view.getOriginalBytes(30 + pathLength, extraFieldLength),
    });
  }

  /**
   * Read just enough of the header to find where the file data starts.
   */
  public static readTotalSize(
    buffer: BufferLike,
    byteOffset?: number,
  ): number {
    const view = new BufferView(buffer, byteOffset, this.FixedSize);
    const signature = view.readUint32LE(0);

    if (signature !== LocalHeaderSignature) {
      throw new ZipSignatureError("local file header", signature);
    }

    return this.FixedSize + view.readUint16LE(26) + view.readUint16LE(28);
  }

  public compressedSize: number;
  public compressionMethod: CompressionMethod;
  public crc32: number;
  public extraField: Uint8Array;
  public flags: GeneralPurposeFlags;
  public lastModified: Date;
  public path: string;
  public uncompressedSize: number;
  public versionNeeded: ZipVersion;

  public constructor(init: LocalFileHeaderInit) {
    this.compressedSize = init.compressedSize;
    this.compressionMethod = init.compressionMethod;
    this.crc32 = init.crc32;
    this.extraField = init.extraField ?? new Uint8Array(0);
    this.flags = init.flags;
    this.lastModified = init.lastModified;
    this.path = init.path;
    this.uncompressedSize = init.uncompressedSize;
    this.versionNeeded = init.versionNeeded;
  }

  public serialize(): Uint8Array {
    const path = new TextEncoder().encode(this.path);

    const view = BufferView.alloc(
      LocalFileHeader.FixedSize + path.byteLength + this.extraField.byteLength,
    );

    view.writeUint32LE(LocalHeaderSignature, 0);
    view.writeUint16LE(this.versionNeeded, 4);
    view.writeUint16LE(this.flags.value, 6);
    view.writeUint16LE(this.compressionMethod, 8);
    view.writeUint32LE(DosDate.clamp(this.lastModified).getDosDateTime(), 10);
    view.writeUint32LE(this.crc32, 14);
    view.writeUint32LE(this.compressedSize, 18);
    view.writeUint32LE(this.uncompressedSize, 22);
    view.writeUint16LE(path.byteLength, 26);
    view.writeUint16LE(this.extraField.byteLength, 28);
    view.setBytes(30, path);
    view.setBytes(30 + path.byteLength, this.extraField);

    return view.getOriginalBytes();
  }
}
