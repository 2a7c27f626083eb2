import { toUint8Array } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import { ByteReader } from "../common/reader.js";
import type { ByteSource } from "../common/types.js";
import { SimpleTag } from "../simple/tag.js";
import { SimpleTlv } from "../simple/tlv.js";

export interface SimpleParseResult {
  tlv: SimpleTlv;
  remaining: Uint8Array;
  endOffset: number;
}

const THREE_BYTE_LENGTH = 0xff;

export class SimpleTLVParser {
  /**
   * Parse one SIMPLE-TLV data object and return the bytes after it.
   */
  public static parse(buffer: ByteSource): SimpleParseResult {
    const reader = new ByteReader(toUint8Array(buffer));
    const tlv = this.read(reader);
    const endOffset = reader.position;
    return { tlv, remaining: reader.readToEnd(), endOffset };
  }

  /**
   * Parse a buffer that must hold exactly one SIMPLE-TLV data object.
   */
  public static parseExact(buffer: ByteSource): SimpleTlv {
    const reader = new ByteReader(toUint8Array(buffer));
    const tlv = this.read(reader);
    if (!reader.atEnd()) {
      throw new TLVError(
        TLVErrorCode.InvalidInput,
        `${reader.remaining} trailing bytes after the data object`,
        reader.position,
      );
    }
    return tlv;
  }

  public static parseAll(buffer: ByteSource): SimpleTlv[] {
    const reader = new ByteReader(toUint8Array(buffer));
    const out: SimpleTlv[] = [];
    while (!reader.atEnd()) out.push(this.read(reader));
    return out;
  }

  public static read(reader: ByteReader): SimpleTlv {
    const start = reader.position;
    const tagByte = reader.readByte();
    let tag: SimpleTag;
    try {
      tag = SimpleTag.fromNumber(tagByte);
    } catch (err) {
      if (err instanceof TLVError) {
        throw new TLVError(err.code, `tag byte ${tagByte}`, start);
      }
      throw err;
    }
    const length = this.readLength(reader);
    return SimpleTlv.create(tag, reader.readBytes(length));
  }

  protected static readLength(reader: ByteReader): number {
    const first = reader.readByte();
    if (first !== THREE_BYTE_LENGTH) return first;
    return (reader.readByte() << 8) | reader.readByte();
  }
}
