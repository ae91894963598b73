import { BitField } from "../util/binary.js";

export class GeneralPurposeFlags extends BitField {
  public static readonly HasUtf8Strings = BitField.flag(11);

  public constructor(value = 0) {
    super(16, value);
  }

  public get hasUtf8Strings(): boolean {
    return this.getBit(11);
  }
  public set hasUtf8Strings(value: boolean) {
    this.setBit(11, value);
  }

  public get isEncrypted(): boolean {
    return this.getBit(0);
  }
}
