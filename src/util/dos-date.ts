/**
 * An extension to the {@link Date} class to support DOS-encoded values.
 *
 * DOS date/time fields carry no time zone. This class reads and writes them
 * as UTC, so the encoded value of an instant is the same on every host.
 */
export class DosDate extends Date {
  /**
   * The earliest representable value, 1980-01-01T00:00:00Z.
   */
  public static readonly MinValue = Date.UTC(1980, 0, 1, 0, 0, 0);

  /**
   * The latest representable value, 2107-12-31T23:59:58Z.
   */
  public static readonly MaxValue = Date.UTC(2107, 11, 31, 23, 59, 58);

  /**
   * Create a new instance from the given date and time values. Each value
   * should be a 16-bit integer.
   */
  public static fromDosDateTime(dateValue: number, timeValue: number): DosDate {
    assertUint16(dateValue, "date");
    assertUint16(timeValue, "time");

    return new DosDate(
      Date.UTC(
        ((dateValue >>> 9) & 127) + 1980, // 0-127, 1980-2107
        ((dateValue >>> 5) & 15) - 1, // 1-12
        dateValue & 31, // 1-31
        (timeValue >>> 11) & 31, // 0-23
        (timeValue >>> 5) & 63, // 0-59
        (timeValue & 31) * 2, // 0-29, 0-58 (even numbers)
      ),
    );
  }

  /**
   * Create a new instance from the given date/time value. The value is a 32-bit
   * integer with the time in the lower 16 bits and date in the upper 16 bits.
   */
  public static fromDosUint32(dateTime: number): DosDate {
    if (!Number.isInteger(dateTime) || dateTime < 0 || dateTime > 0xffff_ffff) {
      throw new RangeError(`invalid value for dos date/time ${dateTime}`);
    }
    return this.fromDosDateTime(dateTime >>> 16, dateTime & 0xffff);
  }

  /**
   * Create a new instance from a count of seconds since the Unix epoch,
   * clamped to the representable range.
   */
  public static fromUnixSeconds(seconds: number): DosDate {
    return this.clamp(seconds * 1000);
  }

  /**
   * Return the nearest representable value to the given time: within
   * {@link DosDate.MinValue} and {@link DosDate.MaxValue}, rounded down to an
   * even number of seconds.
   */
  public static clamp(time: number | Date): DosDate {
    const value = typeof time === "number" ? time : time.getTime();
    if (Number.isNaN(value)) {
      throw new RangeError(`invalid time value`);
    }
    const clamped = Math.min(Math.max(value, this.MinValue), this.MaxValue);
    return new DosDate(clamped - (clamped % 2000));
  }

  /**
   * Get the date represented as a DOS-formatted value. The value is a 32-bit
   * integer with the time in the lower 16 bits and date in the upper 16 bits.
   */
  public getDosDateTime(): number {
    return ((this.getDosDate() << 16) | this.getDosTime()) >>> 0;
  }

  /**
   * Get the DOS-formatted date.
   */
  public getDosDate(): number {
    const date = DosDate.clamp(this);
    const day = date.getUTCDate();
    const month = date.getUTCMonth() + 1;
    const year = date.getUTCFullYear() - 1980;
    return (day | (month << 5) | (year << 9)) >>> 0;
  }

  /**
   * Get the DOS-formatted time.
   */
  public getDosTime(): number {
    const date = DosDate.clamp(this);
    const second = Math.floor(date.getUTCSeconds() / 2);
    const minute = date.getUTCMinutes();
    const hour = date.getUTCHours();
    return (second | (minute << 5) | (hour << 11)) >>> 0;
  }
}

function assertUint16(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`invalid value for dos ${name} ${value}`);
  }
}
