export * from "./core/archive-codec.js";
export * from "./core/constants.js";
export * from "./core/errors.js";
export * from "./core/file-attributes.js";
export * from "./core/zip-entry.js";
export { type CompressionAlgorithms } from "./node/compression.js";
export { createZipCodec, zipCodec } from "./node/codec.js";
export * from "./node/reader.js";
export * from "./node/sink.js";
export * from "./node/writer.js";
export * from "./reproducible/entry-name.js";
export * from "./reproducible/session.js";
export * from "./reproducible/source-date.js";
export * from "./reproducible/writer.js";
export { DosDate } from "./util/dos-date.js";
