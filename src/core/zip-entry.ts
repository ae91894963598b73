import type { CompressionMethod } from "./constants.js";
import type { FileAttributes } from "./file-attributes.js";

/**
 * The metadata of an entry to add to a zip. Entries whose path ends with `/`
 * are directories.
 */
export type ZipEntryInfo = {
  path: string;
  /** Defaults to the current time. */
  lastModified?: Date;
  /** Defaults to a regular file or directory with the default mode. */
  attributes?: FileAttributes;
  /** Defaults to Deflate for non-empty content, otherwise Stored. */
  compressionMethod?: CompressionMethod;
  comment?: string;
};

export type ZipEntryData = Uint8Array | string;

export function isDirectoryPath(path: string): boolean {
  return path.endsWith("/");
}
