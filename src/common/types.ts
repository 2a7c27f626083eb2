import type { ByteReader } from "./reader.js";

export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

const TAG_CLASS_NAMES: Record<TagClass, string> = {
  [TagClass.Universal]: "Universal",
  [TagClass.Application]: "Application",
  [TagClass.ContextSpecific]: "ContextSpecific",
  [TagClass.Private]: "Private",
};

export function tagClassName(tagClass: TagClass): string {
  return TAG_CLASS_NAMES[tagClass];
}

/**
 * Anything the BER-TLV engine can use as a tag.
 *
 * The engine only ever asks a tag for its bytes, their count and whether the
 * value it labels is constructed. Wrappers may answer `isConstructed()`
 * differently from the bit in the first byte; the bytes they emit must stay
 * the wrapped tag's bytes.
 */
export interface TagLike {
  toBytes(): Uint8Array;
  readonly byteLength: number;
  isConstructed(): boolean;
}

/**
 * Static side of a tag implementation: how to read one from a cursor.
 */
export interface TagType<T extends TagLike> {
  read(reader: ByteReader): T;
}

export type ByteSource = ArrayBuffer | Uint8Array | readonly number[];
