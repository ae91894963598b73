/* c8 ignore start */
import { createHash, randomUUID } from "node:crypto";
import { mkdtemp, readFile, rm, utimes } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TestContext } from "node:test";

/**
 * Create an empty directory that is removed when the test finishes.
 */
export async function getTemporaryOutputDirectory(
  t: TestContext,
): Promise<string> {
  const path = await mkdtemp(join(tmpdir(), "zipstamp-"));
  t.after(async () => {
    await rm(path, { force: true, recursive: true });
  });
  return path;
}

/**
 * Random text content for a test file.
 */
export function makeContent(): string {
  return randomUUID();
}

export async function hashFile(path: string): Promise<string> {
  return createHash("sha256")
    .update(await readFile(path))
    .digest("hex");
}

/**
 * Move the modification time of `path` to `offsetSeconds` from now.
 */
export async function touch(path: string, offsetSeconds: number): Promise<void> {
  const time = Date.now() / 1000 + offsetSeconds;
  await utimes(path, time, time);
}

/**
 * Make `path` the working directory until the test finishes.
 */
export function changeDirectory(t: TestContext, path: string): void {
  const previous = process.cwd();
  process.chdir(path);
  t.after(() => {
    process.chdir(previous);
  });
}
