import { readLength } from "../ber/length.js";
import { Tag } from "../ber/tag.js";
import { Tlv } from "../ber/tlv.js";
import { Value } from "../ber/value.js";
import { toUint8Array } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import { ByteReader } from "../common/reader.js";
import type { ByteSource, TagLike, TagType } from "../common/types.js";

export const DEFAULT_MAX_DEPTH = 100;

export interface BerParseOptions {
  /** Deepest nesting accepted; the outermost data object is depth 1. */
  readonly maxDepth?: number;
}

export interface BerTagOptions<T extends TagLike> extends BerParseOptions {
  /** Tag implementation used for every data object in the tree. */
  readonly tagType: TagType<T>;
}

export interface BerParseResult<T extends TagLike> {
  tlv: Tlv<T>;
  /** Bytes following the data object, untouched. */
  remaining: Uint8Array;
  endOffset: number;
}

interface ReadContext<T extends TagLike> {
  readonly tagType: TagType<T>;
  readonly maxDepth: number;
}

export class BerTLVParser {
  /**
   * Parse one BER-TLV data object from the start of the buffer.
   * Bytes after it are returned as `remaining`.
   */
  public static parse(
    buffer: ByteSource,
    options?: BerParseOptions,
  ): BerParseResult<Tag>;
  public static parse<T extends TagLike>(
    buffer: ByteSource,
    options: BerTagOptions<T>,
  ): BerParseResult<T>;
  public static parse<T extends TagLike>(
    buffer: ByteSource,
    options?: BerParseOptions | BerTagOptions<T>,
  ): BerParseResult<T> | BerParseResult<Tag> {
    const reader = new ByteReader(toUint8Array(buffer));
    if (options && "tagType" in options) {
      return this.readWithRemainder(
        reader,
        this.context(options.tagType, options),
      );
    }
    return this.readWithRemainder(reader, this.context(Tag, options));
  }

  /**
   * Parse a buffer that must hold exactly one BER-TLV data object.
   * @throws TLVError `INVALID_INPUT` when bytes are left over.
   */
  public static parseExact(buffer: ByteSource, options?: BerParseOptions): Tlv<Tag>;
  public static parseExact<T extends TagLike>(
    buffer: ByteSource,
    options: BerTagOptions<T>,
  ): Tlv<T>;
  public static parseExact<T extends TagLike>(
    buffer: ByteSource,
    options?: BerParseOptions | BerTagOptions<T>,
  ): Tlv<T> | Tlv<Tag> {
    const reader = new ByteReader(toUint8Array(buffer));
    const tlv =
      options && "tagType" in options
        ? this.readTlv(reader, this.context(options.tagType, options), 1)
        : this.readTlv(reader, this.context(Tag, options), 1);
    this.ensureConsumed(reader);
    return tlv;
  }

  /**
   * Parse consecutive top-level data objects until the buffer is exhausted.
   * The first malformed object aborts the whole call.
   */
  public static parseAll(buffer: ByteSource, options?: BerParseOptions): Tlv<Tag>[];
  public static parseAll<T extends TagLike>(
    buffer: ByteSource,
    options: BerTagOptions<T>,
  ): Tlv<T>[];
  public static parseAll<T extends TagLike>(
    buffer: ByteSource,
    options?: BerParseOptions | BerTagOptions<T>,
  ): Tlv<T>[] | Tlv<Tag>[] {
    const reader = new ByteReader(toUint8Array(buffer));
    if (options && "tagType" in options) {
      return this.readEach(reader, this.context(options.tagType, options));
    }
    return this.readEach(reader, this.context(Tag, options));
  }

  /**
   * Read one data object from a caller-owned cursor, leaving it positioned
   * right after the object.
   */
  public static read(reader: ByteReader, options?: BerParseOptions): Tlv<Tag>;
  public static read<T extends TagLike>(
    reader: ByteReader,
    options: BerTagOptions<T>,
  ): Tlv<T>;
  public static read<T extends TagLike>(
    reader: ByteReader,
    options?: BerParseOptions | BerTagOptions<T>,
  ): Tlv<T> | Tlv<Tag> {
    if (options && "tagType" in options) {
      return this.readTlv(reader, this.context(options.tagType, options), 1);
    }
    return this.readTlv(reader, this.context(Tag, options), 1);
  }

  protected static context<T extends TagLike>(
    tagType: TagType<T>,
    options?: BerParseOptions,
  ): ReadContext<T> {
    const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer; got ${maxDepth}`);
    }
    return { tagType, maxDepth };
  }

  protected static readWithRemainder<T extends TagLike>(
    reader: ByteReader,
    ctx: ReadContext<T>,
  ): BerParseResult<T> {
    const tlv = this.readTlv(reader, ctx, 1);
    const endOffset = reader.position;
    return { tlv, remaining: reader.readToEnd(), endOffset };
  }

  protected static readEach<T extends TagLike>(
    reader: ByteReader,
    ctx: ReadContext<T>,
  ): Tlv<T>[] {
    const out: Tlv<T>[] = [];
    while (!reader.atEnd()) {
      out.push(this.readTlv(reader, ctx, 1));
    }
    return out;
  }

  /**
   * Read tag, length and value of one data object, recursing into
   * constructed values.
   * @param depth - Nesting depth of the object about to be read.
   */
  protected static readTlv<T extends TagLike>(
    reader: ByteReader,
    ctx: ReadContext<T>,
    depth = 1,
  ): Tlv<T> {
    const start = reader.position;
    if (depth > ctx.maxDepth) {
      throw new TLVError(
        TLVErrorCode.DepthExceeded,
        `limit is ${ctx.maxDepth}`,
        start,
      );
    }

    const tag = ctx.tagType.read(reader);
    const length = readLength(reader);

    const value = tag.isConstructed()
      ? this.readConstructedValue(reader, ctx, depth, length)
      : Value.primitive(this.readPrimitiveValue(reader, length));

    const tlv = Tlv.create(tag, value);
    if (tlv.valueLength !== length) {
      throw new TLVError(
        TLVErrorCode.Inconsistent,
        `value is ${tlv.valueLength} bytes, length field says ${length}`,
        start,
      );
    }
    return tlv;
  }

  /**
   * Read child data objects until the bytes they occupy add up to `length`.
   * Children are counted as read, not as re-encoded, so a non-minimal
   * child length cannot pull the parent past its own value field.
   */
  protected static readConstructedValue<T extends TagLike>(
    reader: ByteReader,
    ctx: ReadContext<T>,
    depth: number,
    length: number,
  ): Value<T> {
    const value = Value.constructed<T>();
    let consumed = 0;
    while (consumed < length) {
      const childStart = reader.position;
      const child = this.readTlv(reader, ctx, depth + 1);
      consumed += reader.position - childStart;
      if (consumed > length) {
        throw new TLVError(
          TLVErrorCode.Inconsistent,
          `children overrun the declared length ${length}`,
          childStart,
        );
      }
      Value.append(value, child);
    }
    return value;
  }

  protected static readPrimitiveValue(
    reader: ByteReader,
    length: number,
  ): Uint8Array {
    return reader.readBytes(length);
  }

  protected static ensureConsumed(reader: ByteReader): void {
    if (!reader.atEnd()) {
      throw new TLVError(
        TLVErrorCode.InvalidInput,
        `${reader.remaining} trailing bytes after the data object`,
        reader.position,
      );
    }
  }
}
