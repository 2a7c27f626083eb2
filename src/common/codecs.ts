/**
 * Byte helpers shared by the BER-TLV and SIMPLE-TLV codecs
 */
import { TLVError, TLVErrorCode } from "./errors.js";
import type { ByteSource } from "./types.js";

/**
 * @throws TLVError `INVALID_INPUT` when a plain array holds anything but
 * integers in 0..255.
 */
export function toUint8Array(input: ByteSource): Uint8Array {
  if (input instanceof Uint8Array) return input;
  if (input instanceof ArrayBuffer) return new Uint8Array(input);
  const index = input.findIndex((b) => !Number.isInteger(b) || b < 0 || b > 0xff);
  if (index !== -1) {
    throw new TLVError(
      TLVErrorCode.InvalidInput,
      `element ${index} (${input[index]}) is not a byte`,
      index,
    );
  }
  return Uint8Array.from(input);
}

export function toHex(input: ArrayBuffer | Uint8Array): string {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// Minimal big-endian bytes of a non-negative safe integer; 0 gives no bytes.
export function encodeUnsigned(n: number): number[] {
  const out: number[] = [];
  let temp = n;
  while (temp > 0) {
    out.unshift(temp % 256);
    temp = Math.floor(temp / 256);
  }
  return out;
}
