export enum ZipPlatform {
  // 4.4.2.2 The current mappings are:
  //   0 - MS-DOS and OS/2 (FAT / VFAT / FAT32 file systems)
  //   3 - UNIX
  //  (others are not written by this package)
  DOS = 0,
  UNIX = 3,
}

export enum ZipVersion {
  Deflate = 20,
}

export enum CompressionMethod {
  Stored = 0,
  Deflate = 8,
}

export const LocalHeaderSignature = 0x04034b50;
export const CentralHeaderSignature = 0x02014b50;
export const EndOfCentralDirectorySignature = 0x06054b50;
