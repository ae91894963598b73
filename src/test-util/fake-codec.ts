/* c8 ignore start */
import type {
  ArchiveCodec,
  ArchiveEntry,
  ArchiveHandle,
} from "../core/archive-codec.js";

export type RecordedEntry = {
  entry: ArchiveEntry;
  content: Uint8Array | undefined;
};

/**
 * An {@link ArchiveCodec} that records what it is given instead of writing
 * anything.
 */
export class FakeArchiveCodec implements ArchiveCodec {
  public readonly entries: RecordedEntry[] = [];
  public readonly openedPaths: string[] = [];
  public closeCount = 0;
  public closeError: Error | undefined;

  public async open(path: string): Promise<ArchiveHandle> {
    this.openedPaths.push(path);
    return {
      put: async (entry, content) => {
        this.entries.push({ entry, content });
      },
      close: async () => {
        ++this.closeCount;
        if (this.closeError) {
          throw this.closeError;
        }
      },
    };
  }

  public get paths(): string[] {
    return this.entries.map(({ entry }) => entry.path);
  }
}
