import { bytesEqual, toHex } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import type { TagLike } from "../common/types.js";
import { encodedLengthSize } from "./length.js";
import type { Tag } from "./tag.js";
import { Value } from "./value.js";

/**
 * BER-TLV data object: a tag field, a length field and a (possibly empty)
 * value field. The value is constructed exactly when the tag says so.
 */
export class Tlv<T extends TagLike = Tag> {
  private constructor(
    public readonly tag: T,
    public readonly value: Value<T>,
  ) {}

  /**
   * Bind a tag to a value.
   * @throws TLVError `INCONSISTENT` when the tag's constructed flag does not
   * match the kind of value.
   */
  public static create<T extends TagLike>(tag: T, value: Value<T>): Tlv<T> {
    const tagConstructed = tag.isConstructed();
    if (tagConstructed !== Value.isConstructed(value)) {
      throw new TLVError(
        TLVErrorCode.Inconsistent,
        `tag ${toHex(tag.toBytes())} is ${tagConstructed ? "constructed" : "primitive"} but the value is ${value.kind}`,
      );
    }
    return new Tlv(tag, value);
  }

  public isConstructed(): boolean {
    return Value.isConstructed(this.value);
  }

  /** Size of the value field. */
  public get valueLength(): number {
    return Value.byteLength(this.value);
  }

  /** Size of the whole encoded data object. */
  public get byteLength(): number {
    const inner = this.valueLength;
    return this.tag.byteLength + encodedLengthSize(inner) + inner;
  }

  public get children(): readonly Tlv<T>[] {
    return Value.isConstructed(this.value) ? this.value.children : [];
  }

  // Depth-first, this object first.
  public find(tag: TagLike): Tlv<T> | undefined {
    if (bytesEqual(this.tag.toBytes(), tag.toBytes())) return this;
    for (const child of this.children) {
      const found = child.find(tag);
      if (found) return found;
    }
    return undefined;
  }

  public findAll(tag: TagLike): Tlv<T>[] {
    const out: Tlv<T>[] = [];
    if (bytesEqual(this.tag.toBytes(), tag.toBytes())) out.push(this);
    for (const child of this.children) out.push(...child.findAll(tag));
    return out;
  }

  public equals(other: Tlv<TagLike>): boolean {
    if (!bytesEqual(this.tag.toBytes(), other.tag.toBytes())) return false;
    const a = this.value;
    const b = other.value;
    switch (a.kind) {
      case "primitive":
        return b.kind === "primitive" && bytesEqual(a.bytes, b.bytes);
      case "constructed":
        return (
          b.kind === "constructed" &&
          a.children.length === b.children.length &&
          a.children.every((child, i) => child.equals(b.children[i]))
        );
    }
  }

  public toString(): string {
    return this.describe(0);
  }

  private describe(indent: number): string {
    const pad = " ".repeat(indent);
    const head = `${pad}${toHex(this.tag.toBytes())} len=${this.valueLength}`;
    switch (this.value.kind) {
      case "primitive":
        return `${head} value=${toHex(this.value.bytes)}`;
      case "constructed":
        return [head, ...this.value.children.map((c) => c.describe(indent + 2))].join("\n");
    }
  }
}
