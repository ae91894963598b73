import { promisify } from "node:util";
import { deflateRaw, inflateRaw } from "node:zlib";
import { CompressionMethod } from "../core/constants.js";

export type CompressionAlgorithm = (input: Uint8Array) => Promise<Uint8Array>;

export type CompressionAlgorithms = Partial<
  Record<CompressionMethod, CompressionAlgorithm>
>;

const deflateRawAsync = promisify(deflateRaw);
const inflateRawAsync = promisify(inflateRaw);

/**
 * Default Node.js (zlib) compression methods.
 */
export const defaultCompressors = {
  [CompressionMethod.Deflate]: (input) => deflateRawAsync(input),
} satisfies CompressionAlgorithms;

/**
 * Default Node.js (zlib) decompression methods.
 */
export const defaultDecompressors = {
  [CompressionMethod.Deflate]: (input) => inflateRawAsync(input),
} satisfies CompressionAlgorithms;

/**
 * Look up the algorithm for `method`; Stored needs none.
 */
export function getAlgorithm(
  algorithms: CompressionAlgorithms,
  method: CompressionMethod,
): CompressionAlgorithm | undefined {
  if (method === CompressionMethod.Stored) {
    return async (input) => input;
  }
  return algorithms[method];
}
