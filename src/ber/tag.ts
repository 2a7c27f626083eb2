import { encodeUnsigned, toHex, toUint8Array } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import type { ByteReader } from "../common/reader.js";
import {
  TagClass,
  tagClassName,
  type ByteSource,
  type TagLike,
} from "../common/types.js";

const CLASS_MASK = 0xc0;
const CONSTRUCTED_MASK = 0x20;
const NUMBER_MASK = 0x1f;
const MORE_BYTES_MASK = 0x80;

/** ISO/IEC 7816-4 supports tag fields of one, two and three bytes. */
export const MAX_TAG_BYTES = 3;

// u64 in hex
const MAX_HEX_DIGITS = 16;

/**
 * BER-TLV tag as defined in ISO/IEC 7816-4.
 *
 * Instances always hold a canonical 1–3 byte encoding:
 * - one byte whose low 5 bits are not all set, or
 * - a first byte with low 5 bits `0x1F` followed by one or two continuation
 *   bytes, every one but the last with bit 8 set.
 */
export class Tag implements TagLike {
  private readonly raw: Uint8Array;

  private constructor(raw: Uint8Array) {
    this.raw = raw;
  }

  public static from(input: number | string | ByteSource): Tag {
    if (typeof input === "number") return Tag.fromNumber(input);
    if (typeof input === "string") return Tag.fromHex(input);
    return Tag.fromBytes(input);
  }

  public static fromNumber(value: number): Tag {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new TLVError(
        TLVErrorCode.InvalidTag,
        `expected a non-negative integer, got ${value}`,
      );
    }
    return Tag.fromBytes(encodeUnsigned(value));
  }

  public static fromHex(hex: string): Tag {
    if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length > MAX_HEX_DIGITS) {
      throw new TLVError(TLVErrorCode.ParseIntError, `'${hex}' is not a tag`);
    }
    const padded = hex.length % 2 === 0 ? hex : `0${hex}`;
    const bytes: number[] = [];
    for (let i = 0; i < padded.length; i += 2) {
      bytes.push(parseInt(padded.slice(i, i + 2), 16));
    }
    return Tag.fromBytes(bytes);
  }

  /**
   * Validate a big-endian tag encoding. Leading zero bytes are ignored.
   */
  public static fromBytes(input: ByteSource): Tag {
    const all = toUint8Array(input);
    let start = 0;
    while (start < all.length && all[start] === 0) start++;
    const bytes = all.slice(start);

    switch (bytes.length) {
      case 0:
        throw new TLVError(TLVErrorCode.InvalidTag, "tag is zero");
      case 1:
        if ((bytes[0] & NUMBER_MASK) === NUMBER_MASK) {
          throw new TLVError(
            TLVErrorCode.InvalidTag,
            `${toHex(bytes)} announces continuation bytes`,
          );
        }
        break;
      case 2:
        if (
          (bytes[0] & NUMBER_MASK) !== NUMBER_MASK ||
          (bytes[1] & MORE_BYTES_MASK) !== 0
        ) {
          throw new TLVError(TLVErrorCode.InvalidTag, toHex(bytes));
        }
        break;
      case 3:
        if (
          (bytes[0] & NUMBER_MASK) !== NUMBER_MASK ||
          (bytes[1] & MORE_BYTES_MASK) === 0 ||
          (bytes[2] & MORE_BYTES_MASK) !== 0
        ) {
          throw new TLVError(TLVErrorCode.InvalidTag, toHex(bytes));
        }
        break;
      default:
        throw new TLVError(
          TLVErrorCode.TagIsRFU,
          `${toHex(bytes)} needs ${bytes.length} bytes`,
        );
    }
    return new Tag(bytes);
  }

  /**
   * Read a tag field from the cursor.
   */
  public static read(reader: ByteReader): Tag {
    const start = reader.position;
    const first = reader.readByte();
    const bytes = [first];
    if ((first & NUMBER_MASK) === NUMBER_MASK) {
      let b: number;
      do {
        b = reader.readByte();
        bytes.push(b);
        if (bytes.length > MAX_TAG_BYTES) {
          throw new TLVError(
            TLVErrorCode.TagIsRFU,
            `tag longer than ${MAX_TAG_BYTES} bytes`,
            start,
          );
        }
      } while (b & MORE_BYTES_MASK);
    }
    try {
      return Tag.fromBytes(bytes);
    } catch (err) {
      if (err instanceof TLVError) {
        throw new TLVError(err.code, toHex(Uint8Array.from(bytes)), start);
      }
      throw err;
    }
  }

  public toBytes(): Uint8Array {
    return this.raw.slice();
  }

  public get byteLength(): number {
    return this.raw.length;
  }

  /**
   * Bit 6 of the first byte: 0 = primitive, 1 = constructed encoding.
   */
  public isConstructed(): boolean {
    return (this.raw[0] & CONSTRUCTED_MASK) !== 0;
  }

  public get tagClass(): TagClass {
    switch ((this.raw[0] & CLASS_MASK) >> 6) {
      case 0:
        return TagClass.Universal;
      case 1:
        return TagClass.Application;
      case 2:
        return TagClass.ContextSpecific;
      default:
        return TagClass.Private;
    }
  }

  public get tagNumber(): number {
    if (this.raw.length === 1) return this.raw[0] & NUMBER_MASK;
    let n = 0;
    for (let i = 1; i < this.raw.length; i++) {
      n = (n << 7) | (this.raw[i] & 0x7f);
    }
    return n;
  }

  public toNumber(): number {
    return this.raw.reduce((n, b) => n * 256 + b, 0);
  }

  public toHex(): string {
    return toHex(this.raw);
  }

  public equals(other: TagLike): boolean {
    const bytes = other.toBytes();
    return (
      bytes.length === this.raw.length &&
      bytes.every((b, i) => b === this.raw[i])
    );
  }

  public toString(): string {
    const kind = this.isConstructed() ? "constructed" : "primitive";
    return `Tag ${this.toHex()} (${tagClassName(this.tagClass)}, ${kind})`;
  }
}
