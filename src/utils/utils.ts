// src/utils/utils.ts

import forge from 'node-forge';

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view of a slice of the input array.
 * @param arr - The input Uint8Array to slice.
 * @param start - The starting index of the slice.
 * @param end - The ending index of the slice.
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string.
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf);
  }
  return hex;
}

/**
 * One byte per character. Frames are ASCII, payload bytes above 0x7f pass through untouched.
 */
export function asciiToBytes(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    out[i] = text.charCodeAt(i) & 0xff;
  }
  return out;
}

export function bytesToAscii(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/** Payload text travels as UTF-8 */
export function utf8ToBytes(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, 'utf8'));
}

export function bytesToUtf8(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
}

/**
 * Right-aligns `value` in a field of `width` characters, cutting anything past the width.
 */
export function padField(value: string, width: number): string {
  return value.padStart(width, ' ').slice(0, width);
}

/**
 * Parses a hex string; an odd digit count is read as if it had a leading zero.
 */
export function hexToBytes(hex: string): Uint8Array {
  const even = hex.length % 2 === 1 ? `0${hex}` : hex;
  const out = new Uint8Array(even.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(even.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Cryptographically random bytes from the forge PRNG.
 */
export function randomBytes(length: number): Uint8Array {
  return asciiToBytes(forge.random.getBytesSync(length));
}

/**
 * Random string of uppercase letters A-Z.
 */
export function randomLetters(length: number): string {
  let out = '';
  while (out.length < length) {
    for (const b of randomBytes(length - out.length)) {
      // 234 = 9 * 26; higher bytes would favour A-V
      if (b >= 234) continue;
      out += String.fromCharCode(65 + (b % 26));
    }
  }
  return out;
}
