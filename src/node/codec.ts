import type { ArchiveCodec } from "../core/archive-codec.js";
import { ZipWriter, type ZipWriterOptionsBase } from "./writer.js";

/**
 * Make an {@link ArchiveCodec} that writes zip files with {@link ZipWriter}.
 */
export function createZipCodec(options?: ZipWriterOptionsBase): ArchiveCodec {
  return {
    open: async (path) => {
      const writer = await ZipWriter.open(path, options);
      return {
        put: async (entry, content) => {
          await writer.addFile(entry, content);
        },
        close: async () => {
          await writer.finalize();
        },
      };
    },
  };
}

/**
 * The default codec, using zlib for Deflate.
 */
export const zipCodec: ArchiveCodec = createZipCodec();
