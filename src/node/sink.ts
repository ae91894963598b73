import { open, type FileHandle } from "node:fs/promises";

/**
 * Somewhere to write the bytes of an archive.
 */
export type ByteSink = {
  write: (chunk: Uint8Array) => Promise<void>;
  close: () => Promise<void>;
};

/**
 * A sink that writes to a file, truncating it first.
 */
export class FileSink implements ByteSink {
  public static async open(path: string): Promise<FileSink> {
    return new FileSink(await open(path, "w"));
  }

  private constructor(private readonly handle: FileHandle) {}

  public async write(chunk: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < chunk.byteLength) {
      const { bytesWritten } = await this.handle.write(
        chunk,
        offset,
        chunk.byteLength - offset,
      );
      offset += bytesWritten;
    }
  }

  public async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * A sink that keeps everything in memory.
 */
export class BufferSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private closed = false;

  public get isClosed(): boolean {
    return this.closed;
  }

  public async write(chunk: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error(`write after close`);
    }
    // the caller may reuse its buffer
    this.chunks.push(Uint8Array.from(chunk));
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
