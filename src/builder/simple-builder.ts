import { concatBytes } from "../common/codecs.js";
import type { SimpleTlv } from "../simple/tlv.js";

export class SimpleTLVBuilder {
  /**
   * Encode a SIMPLE-TLV data object. Lengths below 255 take one byte;
   * longer values are announced by `0xFF` and two big-endian bytes.
   */
  public static build(tlv: SimpleTlv): Uint8Array {
    const len = tlv.length;
    const header =
      len < 0xff
        ? [tlv.tag.toNumber(), len]
        : [tlv.tag.toNumber(), 0xff, len >> 8, len & 0xff];
    const out = new Uint8Array(header.length + len);
    out.set(header, 0);
    out.set(tlv.value, header.length);
    return out;
  }

  public static buildAll(tlvs: readonly SimpleTlv[]): Uint8Array {
    return concatBytes(tlvs.map((tlv) => this.build(tlv)));
  }
}
