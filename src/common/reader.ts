import { TLVError, TLVErrorCode } from "./errors.js";

/**
 * Read-only cursor over a byte buffer. Every read that would run past the end
 * throws `TRUNCATED_INPUT` and leaves the position untouched.
 */
export class ByteReader {
  private offset = 0;

  public constructor(private readonly bytes: Uint8Array) {}

  public get position(): number {
    return this.offset;
  }

  public get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  public atEnd(): boolean {
    return this.offset >= this.bytes.byteLength;
  }

  public readByte(): number {
    if (this.atEnd()) {
      throw new TLVError(
        TLVErrorCode.TruncatedInput,
        "expected 1 more byte",
        this.offset,
      );
    }
    return this.bytes[this.offset++];
  }

  public readBytes(count: number): Uint8Array {
    if (count > this.remaining) {
      throw new TLVError(
        TLVErrorCode.TruncatedInput,
        `expected ${count} bytes, ${this.remaining} available`,
        this.offset,
      );
    }
    const out = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  public readToEnd(): Uint8Array {
    return this.readBytes(this.remaining);
  }
}
