import { ZipPlatform } from "./constants.js";

/**
 * External file attributes for an entry made by a Unix host: the upper 16
 * bits hold `st_mode`, and the lowest byte holds the MS-DOS attribute flags
 * so that DOS-oriented readers still see directories.
 */
export class FileAttributes {
  public static readonly DosDirectory = 0x10;

  public static readonly TypeMask = 0o170000;
  public static readonly Directory = 0o040000;
  public static readonly File = 0o100000;
  public static readonly SymbolicLink = 0o120000;
  public static readonly PermissionsMask = 0o7777;

  public static readonly DefaultFileMode = 0o100600;
  public static readonly DefaultDirectoryMode = 0o040775;

  /**
   * Create attributes from a Unix mode, as returned in `Stats.mode`. A mode
   * without a file type is treated as a regular file.
   */
  public static fromMode(mode: number): FileAttributes {
    let value = mode & 0xffff;
    if ((value & FileAttributes.TypeMask) === 0) {
      value |= FileAttributes.File;
    }
    return new FileAttributes(value);
  }

  /**
   * Decode the external attributes field of a central directory header.
   */
  public static fromRaw(platform: number, rawValue: number): FileAttributes {
    const mode = rawValue >>> 16;

    if (platform === ZipPlatform.UNIX && mode !== 0) {
      return new FileAttributes(mode);
    }

    // no unix mode to go on: take the type from the DOS flags
    return new FileAttributes(
      rawValue & FileAttributes.DosDirectory
        ? FileAttributes.DefaultDirectoryMode
        : FileAttributes.DefaultFileMode,
    );
  }

  private constructor(public readonly mode: number) {}

  public get isDirectory(): boolean {
    return (this.mode & FileAttributes.TypeMask) === FileAttributes.Directory;
  }

  public get isFile(): boolean {
    return (this.mode & FileAttributes.TypeMask) === FileAttributes.File;
  }

  public get isSymbolicLink(): boolean {
    return (
      (this.mode & FileAttributes.TypeMask) === FileAttributes.SymbolicLink
    );
  }

  public get permissions(): number {
    return this.mode & FileAttributes.PermissionsMask;
  }

  public get rawValue(): number {
    const dosFlags = this.isDirectory ? FileAttributes.DosDirectory : 0;
    return ((this.mode << 16) | dosFlags) >>> 0;
  }
}
