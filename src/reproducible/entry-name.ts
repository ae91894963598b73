import { posix, sep } from "node:path";
import { fileURLToPath } from "node:url";
import { ZipError } from "../core/errors.js";

function cleanName(name: string): string {
  let result = posix.normalize(name.split(sep).join("/"));

  result = result.replace(/^[A-Za-z]:/, "");
  result = result.replace(/^\/+/, "");
  while (result === ".." || result.startsWith("../")) {
    result = result.slice(3);
  }
  result = result.replace(/\/+$/, "");
  return result === "." ? "" : result;
}

/**
 * Clean up a name for use inside an archive: `/` separators, `.` and `..`
 * segments collapsed, no drive letter, no leading `/` or `../`. Directory
 * names end with `/`.
 */
export function normalizeEntryName(name: string, isDirectory: boolean): string {
  const result = cleanName(name);

  if (!result) {
    throw new ZipError(
      `can't make an entry name from ${JSON.stringify(name)}`,
      "E_ZIP_INVALID_NAME",
    );
  }
  return isDirectory ? `${result}/` : result;
}

/**
 * Get the archive name for a file or directory on disk when no explicit name
 * is given.
 */
export function deriveEntryName(
  path: string | URL,
  isDirectory: boolean,
): string {
  return normalizeEntryName(toNamePath(path), isDirectory);
}

/**
 * Get the prefix for the names of entries under a directory. A directory
 * that maps to no name at all, such as `.`, gives an empty prefix.
 */
export function deriveEntryPrefix(path: string | URL): string {
  const result = cleanName(toNamePath(path));
  return result ? `${result}/` : "";
}

function toNamePath(path: string | URL): string {
  return typeof path === "string" ? path : fileURLToPath(path);
}
