import type { Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ArchiveHandle, ArchiveCodec } from "../core/archive-codec.js";
import type { CompressionMethod } from "../core/constants.js";
import { ZipError } from "../core/errors.js";
import { FileAttributes } from "../core/file-attributes.js";
import { isDirectoryPath, type ZipEntryData } from "../core/zip-entry.js";
import { zipCodec } from "../node/codec.js";
import { debug } from "../util/debug.js";
import {
  deriveEntryName,
  deriveEntryPrefix,
  normalizeEntryName,
} from "./entry-name.js";
import { resolveCanonicalTimestamp, type Environment } from "./source-date.js";

export type ReproducibleZipWriterOptions = {
  /**
   * Where to look for `SOURCE_DATE_EPOCH`. Read again for every call that
   * adds entries. Defaults to `process.env`.
   */
  env?: Environment;
  /** Defaults to {@link zipCodec}. */
  codec?: ArchiveCodec;
  /**
   * Compression for file entries. Left to the codec when not given.
   */
  compressionMethod?: CompressionMethod;
};

export type AddBytesOptions = {
  /** Permission bits. Defaults to `0o600`, or `0o775` for directories. */
  mode?: number;
  compressionMethod?: CompressionMethod;
  comment?: string;
};

const DefaultBytesFileMode = 0o600;
const DefaultBytesDirectoryMode = 0o775;

/**
 * Adds entries to an archive with every modification time replaced by the
 * canonical timestamp (see {@link resolveCanonicalTimestamp}). Everything
 * else about an entry is passed to the codec unchanged.
 */
export class ReproducibleZipWriter {
  /**
   * Create the archive at `path` using the configured codec.
   */
  public static async open(
    path: string | URL,
    options: ReproducibleZipWriterOptions = {},
  ): Promise<ReproducibleZipWriter> {
    const codec = options.codec ?? zipCodec;
    return new ReproducibleZipWriter(await codec.open(toPath(path)), options);
  }

  private readonly compressionMethod: CompressionMethod | undefined;
  private readonly env: Environment;
  private closing: Promise<void> | undefined;

  public constructor(
    private readonly handle: ArchiveHandle,
    options: Omit<ReproducibleZipWriterOptions, "codec"> = {},
  ) {
    this.compressionMethod = options.compressionMethod;
    this.env = options.env ?? process.env;
  }

  public get isClosed(): boolean {
    return this.closing !== undefined;
  }

  /**
   * Add a file or directory from disk. Symbolic links are followed.
   */
  public async addPath(path: string | URL, arcname?: string): Promise<void> {
    this.assertOpen();
    const lastModified = resolveCanonicalTimestamp(this.env);
    const sourcePath = toPath(path);
    const stats = await stat(sourcePath);
    const isDirectory = stats.isDirectory();

    const name =
      arcname === undefined
        ? deriveEntryName(sourcePath, isDirectory)
        : normalizeEntryName(arcname, isDirectory);

    await this.putPath(sourcePath, stats, name, lastModified);
  }

  /**
   * Add an entry from memory. A name ending in `/` adds a directory.
   */
  public async addBytes(
    name: string,
    data: ZipEntryData,
    options: AddBytesOptions = {},
  ): Promise<void> {
    this.assertOpen();
    const lastModified = resolveCanonicalTimestamp(this.env);
    const isDirectory = isDirectoryPath(name);

    const permissions =
      (options.mode ??
        (isDirectory ? DefaultBytesDirectoryMode : DefaultBytesFileMode)) &
      FileAttributes.PermissionsMask;

    const path = normalizeEntryName(name, isDirectory);
    const content =
      typeof data === "string" ? new TextEncoder().encode(data) : data;
    debug("adding %d bytes as %s", content.byteLength, path);

    await this.handle.put(
      {
        path,
        lastModified,
        attributes: FileAttributes.fromMode(
          (isDirectory ? FileAttributes.Directory : FileAttributes.File) |
            permissions,
        ),
        compressionMethod: isDirectory
          ? undefined
          : (options.compressionMethod ?? this.compressionMethod),
        comment: options.comment,
      },
      content,
    );
  }

  /**
   * Add everything under the directory `root`, in name order, but not `root`
   * itself. Entry names start with `arcname`, which may be empty. Links to
   * directories are added as directory entries without adding their contents.
   */
  public async addTree(root: string | URL, arcname?: string): Promise<void> {
    this.assertOpen();
    const lastModified = resolveCanonicalTimestamp(this.env);
    const rootPath = toPath(root);

    const stats = await stat(rootPath);
    if (!stats.isDirectory()) {
      throw new ZipError(
        `"${rootPath}" is not a directory`,
        "E_ZIP_UNSUPPORTED_SOURCE",
      );
    }

    const prefix = deriveEntryPrefix(arcname ?? rootPath);

    await this.putChildren(rootPath, prefix, lastModified);
  }

  /**
   * Finish the archive. Later calls return the result of the first.
   */
  public async close(): Promise<void> {
    this.closing ??= this.handle.close();
    await this.closing;
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new ZipError(
        `can't add entries to a closed archive`,
        "E_ZIP_FINALIZED",
      );
    }
  }

  private async putChildren(
    directory: string,
    prefix: string,
    lastModified: Date,
  ): Promise<void> {
    const children = await readdir(directory, { withFileTypes: true });
    // code unit order, independent of locale
    children.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const child of children) {
      const childPath = join(directory, child.name);
      const kind = await this.putPath(
        childPath,
        await stat(childPath),
        prefix + child.name,
        lastModified,
      );
      // a link to a directory is added as an entry but not descended into
      if (kind === "directory" && !child.isSymbolicLink()) {
        await this.putChildren(
          childPath,
          `${prefix}${child.name}/`,
          lastModified,
        );
      }
    }
  }

  private async putPath(
    sourcePath: string,
    stats: Stats,
    name: string,
    lastModified: Date,
  ): Promise<"directory" | "file"> {
    const attributes = FileAttributes.fromMode(stats.mode);

    if (stats.isDirectory()) {
      const path = normalizeEntryName(name, true);
      debug("adding directory %s as %s", sourcePath, path);
      await this.handle.put({ path, lastModified, attributes });
      return "directory";
    }

    if (stats.isFile()) {
      const path = normalizeEntryName(name, false);
      debug("adding file %s as %s", sourcePath, path);
      await this.handle.put(
        {
          path,
          lastModified,
          attributes,
          compressionMethod: this.compressionMethod,
        },
        await readFile(sourcePath),
      );
      return "file";
    }

    throw new ZipError(
      `"${sourcePath}" is not a regular file or directory`,
      "E_ZIP_UNSUPPORTED_SOURCE",
    );
  }
}

function toPath(path: string | URL): string {
  return typeof path === "string" ? path : fileURLToPath(path);
}
