import { endianness } from "node:os";
import { ParseError } from "../errors.js";
import type { Width } from "./width.js";

export type Endian = "big" | "little" | "native";

function isBigEndian(endian: Endian): boolean {
  if (endian === "native") return endianness() === "BE";
  return endian === "big";
}

/**
 * Two's complement bytes of `ticks` in the given order.
 */
export function ticksToBytes(ticks: bigint, width: Width, endian: Endian): Uint8Array {
  const out = new Uint8Array(width.bytes);
  let bits = BigInt.asUintN(width.bits, ticks);
  for (let i = 0; i < width.bytes; i++) {
    out[i] = Number(bits & 0xffn);
    bits >>= 8n;
  }
  return isBigEndian(endian) ? out.reverse() : out;
}

/**
 * Reads `width.bytes` bytes at `offset`. Every bit pattern is a valid value.
 */
export function ticksFromBytes(bytes: Uint8Array, offset: number, width: Width, endian: Endian): bigint {
  if (offset < 0 || offset + width.bytes > bytes.length) {
    throw new ParseError(
      `Expected ${width.bytes} bytes for a ${width.name} at offset ${offset}, got ${bytes.length - offset}`
    );
  }
  const big = isBigEndian(endian);
  let bits = 0n;
  for (let i = 0; i < width.bytes; i++) {
    const byte = bytes[offset + (big ? i : width.bytes - 1 - i)];
    bits = (bits << 8n) | BigInt(byte);
  }
  return BigInt.asIntN(width.bits, bits);
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
