import { encodeLength } from "../ber/length.js";
import type { Tlv } from "../ber/tlv.js";
import { concatBytes } from "../common/codecs.js";
import type { TagLike } from "../common/types.js";

/**
 * Serializes BER-TLV data objects back into bytes.
 */
export class BerTLVBuilder {
  /**
   * Encode a data object and, recursively, its children.
   * @returns Tag bytes, the shortest length field, then the value field.
   */
  public static build<T extends TagLike>(tlv: Tlv<T>): Uint8Array {
    const out = new Uint8Array(tlv.byteLength);
    this.writeTlv(tlv, out, 0);
    return out;
  }

  /**
   * Encode several data objects back to back.
   */
  public static buildAll<T extends TagLike>(tlvs: readonly Tlv<T>[]): Uint8Array {
    return concatBytes(tlvs.map((tlv) => this.build(tlv)));
  }

  protected static writeTlv<T extends TagLike>(
    tlv: Tlv<T>,
    out: Uint8Array,
    offset: number,
  ): number {
    // 1. Tag, exactly as the tag type serializes itself
    const tagBytes = tlv.tag.toBytes();
    out.set(tagBytes, offset);
    offset += tagBytes.length;

    // 2. Length
    const lengthBytes = encodeLength(tlv.valueLength);
    out.set(lengthBytes, offset);
    offset += lengthBytes.length;

    // 3. Value
    const value = tlv.value;
    switch (value.kind) {
      case "primitive":
        out.set(value.bytes, offset);
        return offset + value.bytes.byteLength;
      case "constructed":
        for (const child of value.children) {
          offset = this.writeTlv(child, out, offset);
        }
        return offset;
    }
  }
}
