import { CentralDirectoryHeader } from "../core/central-directory-header.js";
import {
  CompressionMethod,
  ZipPlatform,
  ZipVersion,
} from "../core/constants.js";
import { DuplicateEntryError, ZipError } from "../core/errors.js";
import { FileAttributes } from "../core/file-attributes.js";
import { GeneralPurposeFlags } from "../core/flags.js";
import { LocalFileHeader } from "../core/local-file-header.js";
import {
  isDirectoryPath,
  type ZipEntryData,
  type ZipEntryInfo,
} from "../core/zip-entry.js";
import { Eocdr } from "../core/zip-trailer.js";
import { computeCrc32 } from "../util/crc32.js";
import { debug } from "../util/debug.js";
import { Mutex } from "../util/mutex.js";
import {
  defaultCompressors,
  getAlgorithm,
  type CompressionAlgorithms,
} from "./compression.js";
import { FileSink, type ByteSink } from "./sink.js";

export type ZipWriterOptionsBase = {
  compressors?: CompressionAlgorithms;
};

export type ZipWriterOptions = ZipWriterOptionsBase & {
  sink: ByteSink;
};

// without zip64, sizes and offsets must fit in 32 bits
const MaxUint32 = 0xffff_ffff;
const MaxEntries = 0xffff;

/**
 * Writes a zip archive to a {@link ByteSink}, one entry at a time.
 *
 * Sizes and CRC-32 are computed before the local header is written, so the
 * output never contains data descriptors. Calls are serialized: an entry is
 * fully written before the next one starts.
 */
export class ZipWriter {
  public static async open(
    path: string,
    options?: ZipWriterOptionsBase,
  ): Promise<ZipWriter> {
    return new ZipWriter({ ...options, sink: await FileSink.open(path) });
  }

  private readonly compressors: CompressionAlgorithms;
  private readonly directory: CentralDirectoryHeader[] = [];
  private readonly paths = new Set<string>();
  private readonly sink: ByteSink;
  private readonly writeLock = new Mutex();

  private isFinalized = false;
  private writtenBytes = 0;

  public constructor(options: ZipWriterOptions) {
    this.compressors = options.compressors ?? defaultCompressors;
    this.sink = options.sink;
  }

  public get entryCount(): number {
    return this.directory.length;
  }

  /**
   * Add a file or directory to the zip.
   */
  public readonly addFile = this.writeLock.synchronize(
    async (file: ZipEntryInfo, content?: ZipEntryData) => {
      if (this.isFinalized) {
        throw new ZipError(
          `can't add more files after calling finalize()`,
          "E_ZIP_FINALIZED",
        );
      }
      await this.writeFileEntry(file, content);
    },
  );

  /**
   * Write the central directory with an optional comment, then close the
   * sink.
   */
  public readonly finalize = this.writeLock.synchronize(
    async (fileComment?: string) => {
      if (this.isFinalized) {
        throw new ZipError(`multiple calls to finalize()`, "E_ZIP_FINALIZED");
      }
      this.isFinalized = true;
      try {
        await this.writeCentralDirectory(fileComment ?? "");
      } finally {
        await this.sink.close();
      }
    },
  );

  private async write(chunk: Uint8Array): Promise<void> {
    await this.sink.write(chunk);
    this.writtenBytes += chunk.byteLength;
  }

  private async writeFileEntry(
    file: ZipEntryInfo,
    content: ZipEntryData = "",
  ): Promise<void> {
    if (!file.path) {
      throw new ZipError(`entry path must not be empty`, "E_ZIP_INVALID_NAME");
    }
    if (this.paths.has(file.path)) {
      throw new DuplicateEntryError(file.path);
    }
    if (this.directory.length >= MaxEntries) {
      throw new ZipError(`too many entries for a zip`, "E_ZIP_TOO_LARGE");
    }

    const isDirectory = isDirectoryPath(file.path);
    const data =
      typeof content === "string" ? new TextEncoder().encode(content) : content;

    if (isDirectory && data.byteLength > 0) {
      throw new ZipError(
        `directory entry "${file.path}" can't have content`,
        "E_ZIP_DIRECTORY_CONTENT",
      );
    }

    const compressionMethod =
      file.compressionMethod ??
      (data.byteLength === 0
        ? CompressionMethod.Stored
        : CompressionMethod.Deflate);

    const compressor = getAlgorithm(this.compressors, compressionMethod);
    if (!compressor) {
      throw new ZipError(
        `unknown compression method ${compressionMethod}`,
        "E_ZIP_COMPRESSION",
      );
    }

    // compress before writing anything so that a failure leaves the output
    // as it was
    const compressedData = await compressor(data);
    const crc32 = computeCrc32(data);
    const localHeaderOffset = this.writtenBytes;

    if (
      data.byteLength > MaxUint32 ||
      compressedData.byteLength > MaxUint32 ||
      localHeaderOffset > MaxUint32
    ) {
      throw new ZipError(`entry too large without zip64`, "E_ZIP_TOO_LARGE");
    }

    const flags = new GeneralPurposeFlags();
    flags.hasUtf8Strings = true;

    const lastModified = file.lastModified ?? new Date();
    const attributes =
      file.attributes ??
      FileAttributes.fromMode(
        isDirectory
          ? FileAttributes.DefaultDirectoryMode
          : FileAttributes.DefaultFileMode,
      );

    const localHeader = new LocalFileHeader({
      compressedSize: compressedData.byteLength,
      compressionMethod,
      crc32,
      flags,
      lastModified,
      path: file.path,
      uncompressedSize: data.byteLength,
      versionNeeded: ZipVersion.Deflate,
    });

    await this.write(localHeader.serialize());
    await this.write(compressedData);

    this.paths.add(file.path);
    this.directory.push(
      new CentralDirectoryHeader({
        attributes,
        comment: file.comment,
        compressedSize: compressedData.byteLength,
        compressionMethod,
        crc32,
        flags,
        lastModified,
        localHeaderOffset,
        path: file.path,
        platformMadeBy: ZipPlatform.UNIX,
        uncompressedSize: data.byteLength,
        versionMadeBy: ZipVersion.Deflate,
        versionNeeded: ZipVersion.Deflate,
      }),
    );

    debug(
      "wrote %s (%d bytes, method %d) at offset %d",
      file.path,
      data.byteLength,
      compressionMethod,
      localHeaderOffset,
    );
  }

  private async writeCentralDirectory(fileComment: string): Promise<void> {
    const directoryOffset = this.writtenBytes;

    for (const header of this.directory) {
      await this.write(header.serialize());
    }

    const trailerOffset = this.writtenBytes;
    if (trailerOffset > MaxUint32) {
      throw new ZipError(`archive too large without zip64`, "E_ZIP_TOO_LARGE");
    }

    const eocdr = new Eocdr({
      comment: fileComment,
      count: this.directory.length,
      offset: directoryOffset,
      size: trailerOffset - directoryOffset,
    });

    await this.write(eocdr.serialize());
  }
}
