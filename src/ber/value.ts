import { toUint8Array } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import type { ByteSource, TagLike } from "../common/types.js";
import type { Tag } from "./tag.js";
import type { Tlv } from "./tlv.js";

/** Value field that is not itself BER-TLV encoded (may be empty). */
export interface PrimitiveValue {
  readonly kind: "primitive";
  readonly bytes: Uint8Array;
}

/** Value field made of nested BER-TLV data objects, in order. */
export interface ConstructedValue<T extends TagLike = Tag> {
  readonly kind: "constructed";
  readonly children: Tlv<T>[];
}

export type Value<T extends TagLike = Tag> = PrimitiveValue | ConstructedValue<T>;

export const Value = {
  primitive(bytes: ByteSource = []): PrimitiveValue {
    return { kind: "primitive", bytes: toUint8Array(bytes).slice() };
  },

  constructed<T extends TagLike = Tag>(
    children: readonly Tlv<T>[] = [],
  ): ConstructedValue<T> {
    return { kind: "constructed", children: [...children] };
  },

  isConstructed<T extends TagLike>(
    value: Value<T>,
  ): value is ConstructedValue<T> {
    return value.kind === "constructed";
  },

  /**
   * Length of the value field once serialized: the payload size, or the sum
   * of every child's full tag + length + value size.
   */
  byteLength<T extends TagLike>(value: Value<T>): number {
    switch (value.kind) {
      case "primitive":
        return value.bytes.byteLength;
      case "constructed":
        return value.children.reduce((sum, child) => sum + child.byteLength, 0);
    }
  },

  append<T extends TagLike>(value: Value<T>, tlv: Tlv<T>): void {
    switch (value.kind) {
      case "primitive":
        throw new TLVError(
          TLVErrorCode.Inconsistent,
          "cannot append a data object to a primitive value",
        );
      case "constructed":
        value.children.push(tlv);
        return;
    }
  },
};
