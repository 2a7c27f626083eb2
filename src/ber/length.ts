import { encodeUnsigned } from "../common/codecs.js";
import { TLVError, TLVErrorCode } from "../common/errors.js";
import type { ByteReader } from "../common/reader.js";

/** Long-form lengths carry at most this many big-endian bytes. */
export const MAX_LENGTH_BYTES = 4;
export const MAX_LENGTH = 0xffffffff;

const LONG_FORM = 0x80;

function assertEncodable(length: number): void {
  if (!Number.isInteger(length) || length < 0 || length > MAX_LENGTH) {
    throw new TLVError(
      TLVErrorCode.InvalidLength,
      `${length} is outside 0..${MAX_LENGTH}`,
    );
  }
}

/**
 * Number of bytes the length field for `length` occupies.
 */
export function encodedLengthSize(length: number): number {
  assertEncodable(length);
  if (length < LONG_FORM) return 1;
  return 1 + encodeUnsigned(length).length;
}

/**
 * Encode a length in the shortest BER form: one byte up to 127, otherwise
 * `0x80 | k` followed by `k` big-endian bytes.
 */
export function encodeLength(length: number): Uint8Array {
  assertEncodable(length);
  if (length < LONG_FORM) return Uint8Array.of(length);
  const digits = encodeUnsigned(length);
  return Uint8Array.from([LONG_FORM | digits.length, ...digits]);
}

export function readLength(reader: ByteReader): number {
  const start = reader.position;
  const first = reader.readByte();
  if ((first & LONG_FORM) === 0) return first;

  const count = first & 0x7f;
  if (count === 0) {
    throw new TLVError(
      TLVErrorCode.InvalidLength,
      "indefinite length form is not supported",
      start,
    );
  }
  if (count > MAX_LENGTH_BYTES) {
    throw new TLVError(
      TLVErrorCode.InvalidLength,
      `${count} length bytes, at most ${MAX_LENGTH_BYTES} supported`,
      start,
    );
  }
  let length = 0;
  for (let i = 0; i < count; i++) {
    length = length * 256 + reader.readByte();
  }
  return length;
}
