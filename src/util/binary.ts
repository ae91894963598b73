function getUintUpperBound(bytes: 1 | 2 | 4): number {
  switch (bytes) {
    case 1:
      return 0xff;
    case 2:
      return 0xffff;
    case 4:
      return 0xffff_ffff;
  }
}

function outOfBounds(value: number, bytes: 1 | 2 | 4): boolean {
  return (
    !Number.isInteger(value) || value < 0 || value > getUintUpperBound(bytes)
  );
}

class UintBoundsError extends RangeError {
  public constructor(value: number, bytes: number) {
    super(`${value} is outside the range for ${bytes} byte unsigned integer`);
  }
}

export type BufferLike = ArrayBuffer | ArrayBufferView;

export function normalizeBufferRange(
  source: BufferLike,
  byteOffset = 0,
  byteLength = source.byteLength - byteOffset,
): [ArrayBufferLike, number, number] {
  if (byteOffset < 0 || byteOffset + byteLength > source.byteLength) {
    throw new RangeError(
      `offset + length must be less than the source buffer length`,
    );
  }
  if (ArrayBuffer.isView(source)) {
    return [source.buffer, source.byteOffset + byteOffset, byteLength];
  }
  return [source, byteOffset, byteLength];
}

/**
 * Extension of {@link DataView} with a little-endian API like Node's
 * {@link Buffer}. Writes are range-checked.
 */
export class BufferView extends DataView {
  public static alloc(byteLength: number): BufferView {
    return new BufferView(new ArrayBuffer(byteLength));
  }

  public constructor(buffer: BufferLike, byteOffset = 0, byteLength?: number) {
    super(...normalizeBufferRange(buffer, byteOffset, byteLength));
  }

  /**
   * Get a Uint8Array that points to the ArrayBuffer that backs this instance.
   */
  public getOriginalBytes(byteOffset = 0, byteLength?: number): Uint8Array {
    return new Uint8Array(
      ...normalizeBufferRange(this, byteOffset, byteLength),
    );
  }

  public setBytes(byteOffset: number, value: Uint8Array): void {
    this.getOriginalBytes(byteOffset, value.byteLength).set(value);
  }

  public readString(byteOffset: number, byteLength?: number): string {
    return new TextDecoder().decode(
      this.getOriginalBytes(byteOffset, byteLength),
    );
  }

  public readUint16LE(byteOffset: number): number {
    return this.getUint16(byteOffset, true);
  }
  public readUint32LE(byteOffset: number): number {
    return this.getUint32(byteOffset, true);
  }

  public writeUint8(value: number, byteOffset: number): void {
    if (outOfBounds(value, 1)) {
      throw new UintBoundsError(value, 1);
    }
    this.setUint8(byteOffset, value);
  }
  public writeUint16LE(value: number, byteOffset: number): void {
    if (outOfBounds(value, 2)) {
      throw new UintBoundsError(value, 2);
    }
    this.setUint16(byteOffset, value, true);
  }
  public writeUint32LE(value: number, byteOffset: number): void {
    if (outOfBounds(value, 4)) {
      throw new UintBoundsError(value, 4);
    }
    this.setUint32(byteOffset, value, true);
  }
}

export class BitField {
  public static flag(bit: number, width = 32): number {
    if (!Number.isInteger(bit)) {
      throw new TypeError(`bit must be an integer`);
    }
    if (bit < 0 || bit >= width) {
      throw new RangeError(`can't index bit ${bit} of ${width} bit field`);
    }
    return (1 << bit) >>> 0;
  }

  private valueInternal = 0;

  public get value(): number {
    return this.valueInternal;
  }
  public set value(value: number) {
    if (!Number.isInteger(value)) {
      throw new TypeError(`value must be an integer`);
    }
    if (value < 0 || value >= 2 ** this.width) {
      throw new RangeError(`value must be within width`);
    }
    this.valueInternal = value;
  }

  public constructor(
    public readonly width = 16,
    value = 0,
  ) {
    if (!Number.isInteger(width) || width < 1 || width > 32) {
      throw new RangeError(`BitFields must be between 1 and 32 bits`);
    }
    this.value = value;
  }

  public getBit(bit: number): boolean {
    return (this.value & BitField.flag(bit, this.width)) !== 0;
  }

  public setBit(bit: number, value: boolean): void {
    const bitMask = BitField.flag(bit, this.width);
    if (value) {
      this.value = (this.value | bitMask) >>> 0;
    } else {
      this.value = (this.value & ~bitMask) >>> 0;
    }
  }
}
