export class ZipError extends Error {
  public constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ZipError";
  }
}

export class ZipFormatError extends ZipError {
  public constructor(message: string) {
    super(message, "E_ZIP_FORMAT");
    this.name = "ZipFormatError";
  }
}

export class ZipSignatureError extends ZipFormatError {
  public constructor(recordName: string, actual: number) {
    super(`invalid signature for ${recordName} (${actual.toString(16)})`);
    this.name = "ZipSignatureError";
  }
}

export class DuplicateEntryError extends ZipError {
  public constructor(public readonly path: string) {
    super(`duplicate entry name "${path}"`, "E_ZIP_DUPLICATE");
    this.name = "DuplicateEntryError";
  }
}

/**
 * Thrown when a configuration value (such as `SOURCE_DATE_EPOCH`) is present
 * but cannot be used.
 */
export class ConfigurationError extends ZipError {
  public constructor(
    public readonly variable: string,
    public readonly value: string,
    reason: string,
  ) {
    super(`invalid ${variable} ${JSON.stringify(value)}: ${reason}`, "E_ZIP_CONFIG");
    this.name = "ConfigurationError";
  }
}
