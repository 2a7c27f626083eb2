import { Tag } from "../../src/ber/tag.js";
import type { ByteReader } from "../../src/common/reader.js";
import type { TagLike } from "../../src/common/types.js";

/**
 * PIV data objects use tag 0x34 for a primitive value even though bit 6 of
 * the byte is set. Everything else follows ISO/IEC 7816-4.
 */
export class PivTag implements TagLike {
  public constructor(public readonly inner: Tag) {}

  public static read(reader: ByteReader): PivTag {
    return new PivTag(Tag.read(reader));
  }

  public static from(value: number | string): PivTag {
    return new PivTag(Tag.from(value));
  }

  public toBytes(): Uint8Array {
    return this.inner.toBytes();
  }

  public get byteLength(): number {
    return this.inner.byteLength;
  }

  public isConstructed(): boolean {
    if (this.inner.toNumber() === 0x34) return false;
    return this.inner.isConstructed();
  }
}
