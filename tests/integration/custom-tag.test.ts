import { describe, expect, it } from "vitest";
import assert from "assert";
import { Tag } from "../../src/ber/tag.js";
import { Tlv } from "../../src/ber/tlv.js";
import { Value } from "../../src/ber/value.js";
import { BerTLVBuilder } from "../../src/builder/ber-builder.js";
import { toHex } from "../../src/common/codecs.js";
import { TLVErrorCode } from "../../src/common/errors.js";
import { BerTLVParser } from "../../src/parser/ber-parser.js";
import { PivTag } from "../fixtures/piv-tag.js";
import { expectTLVError, fromHexString } from "../helpers/utils.js";

describe("Custom tag types", () => {
  it("overrides only the constructed flag", () => {
    const piv = PivTag.from(0x34);
    assert.strictEqual(piv.isConstructed(), false);
    assert.strictEqual(piv.inner.isConstructed(), true);
    assert.strictEqual(toHex(piv.toBytes()), "34");
    assert.strictEqual(piv.byteLength, 1);
  });

  it("decodes tag 0x34 as primitive with the custom tag type", () => {
    const tlv = BerTLVParser.parseExact(fromHexString("34020102"), {
      tagType: PivTag,
    });
    assert.ok(tlv.tag instanceof PivTag);
    assert.strictEqual(tlv.isConstructed(), false);
    expect(tlv.value).toEqual(Value.primitive([0x01, 0x02]));
  });

  it("decodes the same bytes as constructed with the default tag type", () => {
    expectTLVError(
      () => BerTLVParser.parseExact(fromHexString("34020102")),
      TLVErrorCode.TruncatedInput,
    );
    const tlv = BerTLVParser.parseExact(fromHexString("3403010100"));
    assert.strictEqual(tlv.children.length, 1);
  });

  it("treats a nested 0x34 as primitive too", () => {
    const tlv = BerTLVParser.parseExact(fromHexString("7f2208 3403010100 840100"), {
      tagType: PivTag,
    });
    expect(tlv.children.map((c) => c.isConstructed())).toEqual([false, false]);
    expect(tlv.children[0].value).toEqual(Value.primitive([0x01, 0x01, 0x00]));
    assert.ok(tlv.children[1].tag instanceof PivTag);
  });

  it("applies the override in Tlv.create", () => {
    const tlv = Tlv.create(PivTag.from(0x34), Value.primitive([0x01, 0x02]));
    assert.strictEqual(tlv.byteLength, 4);
    expectTLVError(
      () => Tlv.create(PivTag.from(0x34), Value.constructed<PivTag>()),
      TLVErrorCode.Inconsistent,
    );
    expectTLVError(
      () => Tlv.create(Tag.fromNumber(0x34), Value.primitive([0x01, 0x02])),
      TLVErrorCode.Inconsistent,
    );
  });

  it("never changes the encoded tag bytes", () => {
    const tlv = Tlv.create(
      PivTag.from(0x7f22),
      Value.constructed([Tlv.create(PivTag.from(0x34), Value.primitive([0xaa]))]),
    );
    const encoded = BerTLVBuilder.build(tlv);
    expect(toHex(encoded)).toBe("7f2203" + "3401aa");
    const decoded = BerTLVParser.parseExact(encoded, { tagType: PivTag });
    assert.ok(decoded.equals(tlv));
  });

  it("combines with the depth limit", () => {
    expectTLVError(
      () =>
        BerTLVParser.parseExact(fromHexString("3004 3002 3000"), {
          tagType: PivTag,
          maxDepth: 2,
        }),
      TLVErrorCode.DepthExceeded,
    );
  });

  it("reads custom tags from parseAll and parse", () => {
    const all = BerTLVParser.parseAll(fromHexString("3401aa 3400"), {
      tagType: PivTag,
    });
    expect(all.map((t) => t.valueLength)).toEqual([1, 0]);
    const { tlv, remaining } = BerTLVParser.parse(fromHexString("3401aaff"), {
      tagType: PivTag,
    });
    assert.ok(tlv.tag instanceof PivTag);
    expect(Array.from(remaining)).toEqual([0xff]);
  });
});
