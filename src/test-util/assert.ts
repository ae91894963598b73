/* c8 ignore start */
import { AssertionError } from "node:assert";

function hexLines(bytes: Uint8Array): string {
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.byteLength; offset += 16) {
    const row = Buffer.from(bytes.subarray(offset, offset + 16)).toString("hex");
    lines.push(
      `${offset.toString(16).padStart(6, "0")}  ${row.replaceAll(/(..)(?!$)/g, "$1 ")}`,
    );
  }
  return lines.join("\n");
}

export function assertBufferEqual(
  actual: Uint8Array | Iterable<Uint8Array>,
  expected: Uint8Array | Iterable<Uint8Array>,
  message = "Expected buffers to be byte-equal",
): void {
  const actualBuffer =
    actual instanceof Uint8Array ? actual : Buffer.concat(Array.from(actual));

  const expectedBuffer =
    expected instanceof Uint8Array
      ? expected
      : Buffer.concat(Array.from(expected));

  if (Buffer.compare(actualBuffer, expectedBuffer) !== 0) {
    throw new AssertionError({
      message: `${message}\n\nactual:\n${hexLines(actualBuffer)}\n\nexpected:\n${hexLines(expectedBuffer)}`,
      actual: actualBuffer,
      expected: expectedBuffer,
      operator: "bufferEqual",
      stackStartFn: assertBufferEqual,
    });
  }
}
