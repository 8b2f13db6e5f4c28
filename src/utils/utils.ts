// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Builds a Uint8Array from byte values, keeping the low 8 bits of each.
 */
export function fromBytes(...bytes: number[]): Uint8Array {
  return Uint8Array.from(bytes, b => b & 0xff);
}

/**
 * Wraps a Buffer (or any Uint8Array subclass) as a plain Uint8Array over the same memory.
 */
export function asUint8Array(data: Uint8Array): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Converts a Uint8Array to a hex string (optimized with lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Inserted between bytes, e.g. ' '
 * @returns A hex string representation of the input Uint8Array.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  let hex = '';
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i];
    if (i > 0) hex += separator;
    hex += HEX_TABLE[(b >> 4) & 0xf] + HEX_TABLE[b & 0xf];
  }
  return hex;
}

/**
 * Parses a hex string such as "a5 10 00" or "a51000" into bytes.
 * @throws Error on odd length or non-hex characters
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/[\s:]/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-f]/i.test(clean)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
