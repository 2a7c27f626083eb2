import { describe, expect, it } from "vitest";
import * as cardtlv from "../../src/index.js";
import { BerTLVBuilder, SimpleTLVBuilder } from "../../src/builder/index.js";
import { TagClass, toHex } from "../../src/common/index.js";
import { BerTLVParser, SimpleTLVParser } from "../../src/parser/index.js";

describe("Package entry points", () => {
  it("exposes the BER-TLV engine from the root", () => {
    const tlv = cardtlv.Tlv.create(
      cardtlv.Tag.fromHex("7f22"),
      cardtlv.Value.constructed([
        cardtlv.Tlv.create(cardtlv.Tag.fromNumber(0x01), cardtlv.Value.primitive([0])),
      ]),
    );
    const bytes = cardtlv.BerTLVBuilder.build(tlv);
    expect(cardtlv.toHex(bytes)).toBe("7f2203010100");
    expect(cardtlv.BerTLVParser.parseExact(bytes).equals(tlv)).toBe(true);
    expect(cardtlv.DEFAULT_MAX_DEPTH).toBe(100);
  });

  it("exposes parser, builder and common subpaths", () => {
    const tlv = BerTLVParser.parseExact([0xc1, 0x01, 0xaa]);
    expect(tlv.tag.tagClass).toBe(TagClass.Private);
    expect(toHex(BerTLVBuilder.build(tlv))).toBe("c101aa");

    const simple = SimpleTLVParser.parseExact([0x84, 0x01, 0x2c]);
    expect(toHex(SimpleTLVBuilder.build(simple))).toBe("84012c");
  });

  it("exports the error taxonomy", () => {
    expect(Object.values(cardtlv.TLVErrorCode).sort()).toEqual([
      "DEPTH_EXCEEDED",
      "INCONSISTENT",
      "INVALID_INPUT",
      "INVALID_LENGTH",
      "INVALID_TAG",
      "PARSE_INT_ERROR",
      "TAG_IS_RFU",
      "TRUNCATED_INPUT",
    ]);
  });
});
