import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { CentralDirectoryHeader } from "../core/central-directory-header.js";
import { CompressionMethod } from "../core/constants.js";
import { ZipFormatError } from "../core/errors.js";
import type { FileAttributes } from "../core/file-attributes.js";
import { LocalFileHeader } from "../core/local-file-header.js";
import { isDirectoryPath } from "../core/zip-entry.js";
import { Eocdr } from "../core/zip-trailer.js";
import { BufferView } from "../util/binary.js";
import { computeCrc32 } from "../util/crc32.js";
import {
  defaultDecompressors,
  getAlgorithm,
  type CompressionAlgorithms,
} from "./compression.js";

export type ZipReaderOptions = {
  decompressors?: CompressionAlgorithms;
};

/**
 * An entry in a zip read by {@link ZipReader}.
 */
export class ZipReaderEntry {
  public readonly attributes: FileAttributes;
  public readonly comment: string;
  public readonly compressedSize: number;
  public readonly compressionMethod: CompressionMethod;
  public readonly crc32: number;
  public readonly lastModified: Date;
  public readonly path: string;
  public readonly uncompressedSize: number;

  private readonly localHeaderOffset: number;

  public constructor(
    header: CentralDirectoryHeader,
    private readonly archive: BufferView,
    private readonly decompressors: CompressionAlgorithms,
  ) {
    this.attributes = header.attributes;
    this.comment = header.comment;
    this.compressedSize = header.compressedSize;
    this.compressionMethod = header.compressionMethod;
    this.crc32 = header.crc32;
    this.lastModified = header.lastModified;
    this.localHeaderOffset = header.localHeaderOffset;
    this.path = header.path;
    this.uncompressedSize = header.uncompressedSize;

    if (header.flags.isEncrypted) {
      throw new ZipFormatError(`encrypted entries are not supported`);
    }
  }

  public get isDirectory(): boolean {
    return isDirectoryPath(this.path) || this.attributes.isDirectory;
  }

  public get isFile(): boolean {
    return !this.isDirectory;
  }

  /**
   * Decompress the entry and check it against the stored CRC-32.
   */
  public async toBuffer(): Promise<Uint8Array> {
    const dataOffset =
      this.localHeaderOffset +
      LocalFileHeader.readTotalSize(this.archive, this.localHeaderOffset);

    if (dataOffset + this.compressedSize > this.archive.byteLength) {
      throw new ZipFormatError(`data for "${this.path}" is out of bounds`);
    }

    const decompressor = getAlgorithm(
      this.decompressors,
      this.compressionMethod,
    );
    if (!decompressor) {
      throw new ZipFormatError(
        `unknown compression method ${this.compressionMethod}`,
      );
    }

    const data = await decompressor(
      this.archive.getOriginalBytes(dataOffset, this.compressedSize),
    );

    if (data.byteLength !== this.uncompressedSize) {
      throw new ZipFormatError(`size mismatch for "${this.path}"`);
    }
    if (computeCrc32(data) !== this.crc32) {
      throw new ZipFormatError(`crc32 mismatch for "${this.path}"`);
    }
    return data;
  }

  public async toText(): Promise<string> {
    return new TextDecoder().decode(await this.toBuffer());
  }
}

/**
 * Reads a zip held in memory. Zip64 and multi-disk archives are rejected.
 */
export class ZipReader implements Iterable<ZipReaderEntry> {
  public static async open(
    path: string,
    options?: ZipReaderOptions,
  ): Promise<ZipReader> {
    return this.fromBuffer(await readFile(path), options);
  }

  public static fromBuffer(
    buffer: Uint8Array,
    options: ZipReaderOptions = {},
  ): ZipReader {
    const view = new BufferView(buffer);
    const eocdr = Eocdr.deserialize(view, Eocdr.findOffset(view));

    if (eocdr.offset + eocdr.size > view.byteLength) {
      throw new ZipFormatError(`central directory is out of bounds`);
    }

    const decompressors = options.decompressors ?? defaultDecompressors;
    const entries: ZipReaderEntry[] = [];
    let offset = eocdr.offset;

    for (let index = 0; index < eocdr.count; ++index) {
      const length = CentralDirectoryHeader.readTotalSize(view, offset);
      const header = CentralDirectoryHeader.deserialize(view, offset, length);
      entries.push(new ZipReaderEntry(header, view, decompressors));
      offset += length;
    }

    return new ZipReader(eocdr.comment, entries);
  }

  private constructor(
    public readonly comment: string,
    private readonly entryList: readonly ZipReaderEntry[],
  ) {}

  public get entryCount(): number {
    return this.entryList.length;
  }

  public [Symbol.iterator](): Iterator<ZipReaderEntry> {
    return this.entryList[Symbol.iterator]();
  }

  public entries(): ZipReaderEntry[] {
    return [...this.entryList];
  }

  public getEntry(path: string): ZipReaderEntry | undefined {
    return this.entryList.find((entry) => entry.path === path);
  }

  /**
   * Recreate every entry under `outputDirectory`. Entries whose names would
   * land outside it are rejected before anything is written.
   */
  public async extractAll(outputDirectory: string): Promise<void> {
    const root = resolve(outputDirectory);

    const targets = this.entryList.map((entry) => {
      const target = resolve(root, entry.path);
      const relativePath = relative(root, target);
      if (
        relativePath === ".." ||
        relativePath.startsWith(`..${sep}`) ||
        isAbsolute(relativePath) ||
        (relativePath === "" && !entry.isDirectory)
      ) {
        throw new ZipFormatError(
          `entry "${entry.path}" would be extracted outside of the target`,
        );
      }
      return { entry, target };
    });

    for (const { entry, target } of targets) {
      if (entry.isDirectory) {
        await mkdir(target, { recursive: true });
      } else {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, await entry.toBuffer());
      }
    }
  }
}
