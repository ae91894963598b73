import { BufferView, type BufferLike } from "../util/binary.js";
import type { Serializable } from "../util/serialization.js";
import { EndOfCentralDirectorySignature } from "./constants.js";
import { ZipFormatError, ZipSignatureError } from "./errors.js";

export type EocdrFields = {
  comment: string;
  count: number;
  offset: number;
  size: number;
};

/**
 * End of Central Directory Record.
 */
export class Eocdr implements EocdrFields, Serializable {
  // | offset | field                         | size |
  // | ------ | ----------------------------- | ---- |
  // | 0      | signature (0x06054b50)        | 4    |
  // | 4      | number of this disk           | 2    |
  // | 6      | central directory start disk  | 2    |
  // | 8      | total entries this disk       | 2    |
  // | 10     | total entries on all disks    | 2    |
  // | 12     | size of the central directory | 4    |
  // | 16     | central directory offset      | 4    |
  // | 20     | .ZIP file comment length      | 2    |
  // | 22     | (end)                         |      |

  public static readonly FixedSize = 22;

  public static deserialize(
    buffer: BufferLike,
    byteOffset?: number,
    byteLength?: number,
  ): Eocdr {
    const view = new BufferView(buffer, byteOffset, byteLength);
    const signature = view.readUint32LE(0);

    if (signature !== EndOfCentralDirectorySignature) {
      throw new ZipSignatureError("end of central directory record", signature);
    }

    const diskNumber = view.readUint16LE(4);
    const startDisk = view.readUint16LE(6);
    const count = view.readUint16LE(8);
    const totalEntriesAllDisks = view.readUint16LE(10);
    const size = view.readUint32LE(12);
    const offset = view.readUint32LE(16);
    const commentLength = view.readUint16LE(20);

    if (diskNumber !== 0 || startDisk !== 0 || totalEntriesAllDisks !== count) {
      throw new ZipFormatError(`multi-disk zips not supported`);
    }
    if (count === 0xffff || size === 0xffff_ffff || offset === 0xffff_ffff) {
      throw new ZipFormatError(`zip64 archives are not supported`);
    }

    return new this({
      comment: view.readString(22, commentLength),
      count,
      offset,
      size,
    });
  }

  /**
   * Find the offset of the record by scanning backwards from the end of the
   * buffer.
   */
  public static findOffset(buffer: BufferLike): number {
    const view = new BufferView(buffer);

    // max comment length is 0xffff
    const maxLength = Math.min(view.byteLength, this.FixedSize + 0xffff);
    const lastOffset = view.byteLength - this.FixedSize;
    const firstOffset = view.byteLength - maxLength;

    for (let offset = lastOffset; offset >= firstOffset; --offset) {
      if (view.readUint32LE(offset) === EndOfCentralDirectorySignature) {
        return offset;
      }
    }
    throw new ZipFormatError(`unable to find end of central directory record`);
  }

  public comment: string;
  public count: number;
  public offset: number;
  public size: number;

  public constructor(fields: EocdrFields) {
    this.comment = fields.comment;
    this.count = fields.count;
    this.offset = fields.offset;
    this.size = fields.size;
  }

  public serialize(): Uint8Array {
    const comment = new TextEncoder().encode(this.comment);
    const view = BufferView.alloc(Eocdr.FixedSize + comment.byteLength);

    view.writeUint32LE(EndOfCentralDirectorySignature, 0);
    view.writeUint16LE(0, 4); // number of this disk
    view.writeUint16LE(0, 6); // central directory start disk
    view.writeUint16LE(this.count, 8);
    view.writeUint16LE(this.count, 10);
    view.writeUint32LE(this.size, 12);
    view.writeUint32LE(this.offset, 16);
    view.writeUint16LE(comment.byteLength, 20);
    view.setBytes(22, comment);

    return view.getOriginalBytes();
  }
}
