import {
  ReproducibleZipWriter,
  type ReproducibleZipWriterOptions,
} from "./writer.js";

/**
 * Create an archive at `path`, run `action` to fill it, and close it however
 * `action` ends.
 *
 * If `action` throws, its error is rethrown once the archive is closed. If
 * closing fails too, both errors are thrown in an {@link AggregateError}.
 */
export async function withReproducibleZip<Result>(
  path: string | URL,
  action: (writer: ReproducibleZipWriter) => PromiseLike<Result> | Result,
  options?: ReproducibleZipWriterOptions,
): Promise<Result> {
  const writer = await ReproducibleZipWriter.open(path, options);

  let result: Result;
  try {
    result = await action(writer);
  } catch (error) {
    try {
      await writer.close();
    } catch (closeError) {
      throw new AggregateError(
        [error, closeError],
        `failed to write archive and then to close it`,
      );
    }
    throw error;
  }

  await writer.close();
  return result;
}
