import { toUint8Array } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import type { ByteSource } from "../common/types.js";
import type { SimpleTag } from "./tag.js";

/** Largest value field the three-byte length form can describe. */
export const SIMPLE_MAX_LENGTH = 0xffff;

/**
 * SIMPLE-TLV data object: one tag byte, a one- or three-byte length and an
 * opaque value of up to 65 535 bytes. There is no nesting.
 */
export class SimpleTlv {
  private constructor(
    public readonly tag: SimpleTag,
    private readonly bytes: Uint8Array,
  ) {}

  public static create(tag: SimpleTag, value: ByteSource = []): SimpleTlv {
    const bytes = toUint8Array(value);
    if (bytes.byteLength > SIMPLE_MAX_LENGTH) {
      throw new TLVError(
        TLVErrorCode.InvalidLength,
        `${bytes.byteLength} bytes exceeds ${SIMPLE_MAX_LENGTH}`,
      );
    }
    return new SimpleTlv(tag, bytes.slice());
  }

  public get length(): number {
    return this.bytes.byteLength;
  }

  public get value(): Uint8Array {
    return this.bytes.slice();
  }

  /** Tag byte + length field + value. */
  public get byteLength(): number {
    return 1 + (this.length < 0xff ? 1 : 3) + this.length;
  }

  public equals(other: SimpleTlv): boolean {
    const theirs = other.bytes;
    return (
      this.tag.equals(other.tag) &&
      theirs.byteLength === this.bytes.byteLength &&
      theirs.every((b, i) => b === this.bytes[i])
    );
  }
}
