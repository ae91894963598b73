import crc32 from "crc-32";

export function computeCrc32(data: Uint8Array, seed?: number): number {
  const result = crc32.buf(data, seed);

  // crc-32 returns a signed 32 bit value
  return result >>> 0;
}
