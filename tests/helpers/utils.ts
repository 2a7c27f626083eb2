import { expect } from "vitest";
import { TLVError, type TLVErrorCode } from "../../src/common/errors.js";

export function fromHexString(hexString: string): Uint8Array {
  const clean = hexString.replace(/\s+/g, "");
  if (clean.length % 2 !== 0) {
    throw new Error("Invalid hex string");
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function filled(size: number, byte = 0): Uint8Array {
  return new Uint8Array(size).fill(byte);
}

/**
 * Run `fn` and return the TLVError it throws, failing the test otherwise.
 */
export function catchTLVError(fn: () => unknown): TLVError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TLVError) return err;
    throw err;
  }
  throw new Error("expected a TLVError to be thrown");
}

export function expectTLVError(fn: () => unknown, code: TLVErrorCode): TLVError {
  const err = catchTLVError(fn);
  expect(err.code).toBe(code);
  return err;
}
