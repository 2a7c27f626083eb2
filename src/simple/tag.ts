import { TLVError, TLVErrorCode } from "../common/errors.js";

/**
 * SIMPLE-TLV tag: a single byte encoding a tag number from 1 to 254.
 * `0x00` and `0xFF` are invalid.
 */
export class SimpleTag {
  private constructor(private readonly raw: number) {}

  public static fromNumber(value: number): SimpleTag {
    if (!Number.isInteger(value) || value <= 0x00 || value >= 0xff) {
      throw new TLVError(
        TLVErrorCode.InvalidInput,
        `SIMPLE-TLV tag must be in 0x01..0xfe; got ${value}`,
      );
    }
    return new SimpleTag(value);
  }

  public static fromHex(hex: string): SimpleTag {
    if (!/^[0-9a-fA-F]{1,2}$/.test(hex)) {
      throw new TLVError(TLVErrorCode.ParseIntError, `'${hex}' is not a byte`);
    }
    return SimpleTag.fromNumber(parseInt(hex, 16));
  }

  public toNumber(): number {
    return this.raw;
  }

  public equals(other: SimpleTag): boolean {
    return this.raw === other.raw;
  }

  public toString(): string {
    return `SimpleTag ${this.raw.toString(16).padStart(2, "0")}`;
  }
}
