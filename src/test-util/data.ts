/* c8 ignore start */
import assert from "node:assert";
import { deflateRawSync } from "node:zlib";
import { computeCrc32 } from "../util/crc32.js";
import { DosDate } from "../util/dos-date.js";

export function crc32(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return longUint(computeCrc32(utf8(literals, ...values)));
}

export function data(...values: (string | Uint8Array)[]): Buffer {
  return Buffer.concat(
    values.map((value) => (typeof value === "string" ? fromHex(value) : value)),
  );
}

export function deflate(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return deflateRawSync(utf8(literals, ...values));
}

export function deflateLength32(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return longUint(deflate(literals, ...values).byteLength);
}

export function dosDate(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  const dateString = baseTemplate(literals, ...values);
  assert(
    /^\d{4}-\d\d-\d\dT\d\d:\d\d:\d\dZ$/.test(dateString),
    "must be a valid ISO timestamp with second precision",
  );
  return longUint(DosDate.clamp(new Date(dateString)).getDosDateTime());
}

export function fromHex(value: string): Buffer {
  const noWhitespace = value.replaceAll(/\s/g, "");
  assert(/^[\da-f]*$/.test(noWhitespace), `not a hex string: ${value}`);
  return Buffer.from(noWhitespace, "hex");
}

export function longUint(value: number): Uint8Array {
  const buffer = Buffer.alloc(4);
  buffer.writeUint32LE(value);
  return buffer;
}

export function shortUint(value: number): Uint8Array {
  const buffer = Buffer.alloc(2);
  buffer.writeUint16LE(value);
  return buffer;
}

export function tinyUint(value: number): Uint8Array {
  const buffer = Buffer.alloc(1);
  buffer.writeUint8(value);
  return buffer;
}

export function utf8(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return Buffer.from(baseTemplate(literals, ...values));
}

export function utf8length(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return shortUint(utf8(literals, ...values).byteLength);
}

export function utf8length32(
  literals: TemplateStringsArray,
  ...values: unknown[]
): Uint8Array {
  return longUint(utf8(literals, ...values).byteLength);
}

function baseTemplate(
  literals: TemplateStringsArray,
  ...values: unknown[]
): string {
  let text = "";

  for (const [index, literal] of literals.entries()) {
    text += literal;
    if (index < values.length) {
      text += String(values[index]);
    }
  }

  return text;
}
