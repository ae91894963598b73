import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { debug } from "../util/debug.js";
import { DosDate } from "../util/dos-date.js";

/**
 * The environment variable that overrides the timestamp of every entry.
 */
export const SourceDateEpochVariable = "SOURCE_DATE_EPOCH";

/**
 * A read-only view of environment variables, such as `process.env`.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Seconds since the Unix epoch, as a base-10 integer.
 */
export const SourceDateEpochSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "expected an integer number of seconds")
  .transform(Number);

/**
 * Get the timestamp to give every entry added now.
 *
 * With `SOURCE_DATE_EPOCH` set and non-empty, that instant is used (clamped to what a zip
 * can hold). Otherwise the result is 1980-01-01T00:00:00Z, the earliest
 * representable value. Nothing is read from the filesystem.
 */
export function resolveCanonicalTimestamp(
  env: Environment = process.env,
): DosDate {
  const value = env[SourceDateEpochVariable];

  if (value === undefined || value === "") {
    const timestamp = new DosDate(DosDate.MinValue);
    debug("no %s, using %s", SourceDateEpochVariable, timestamp.toISOString());
    return timestamp;
  }

  const result = SourceDateEpochSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      SourceDateEpochVariable,
      value,
      result.error.issues[0]?.message ?? "invalid value",
    );
  }

  const timestamp = DosDate.fromUnixSeconds(result.data);
  debug(
    "%s=%s, using %s",
    SourceDateEpochVariable,
    value,
    timestamp.toISOString(),
  );
  return timestamp;
}
