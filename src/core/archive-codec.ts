import type { CompressionMethod } from "./constants.js";
import type { FileAttributes } from "./file-attributes.js";

/**
 * An entry ready for encoding. Everything but `lastModified` is taken from
 * the source unchanged.
 */
export type ArchiveEntry = {
  path: string;
  lastModified: Date;
  attributes: FileAttributes;
  compressionMethod?: CompressionMethod;
  comment?: string;
};

/**
 * An archive open for writing.
 */
export type ArchiveHandle = {
  put: (entry: ArchiveEntry, content?: Uint8Array) => Promise<void>;
  /** Write the central directory, flush and release the file. */
  close: () => Promise<void>;
};

/**
 * Something that can encode archives.
 */
export type ArchiveCodec = {
  open: (path: string) => Promise<ArchiveHandle>;
};
