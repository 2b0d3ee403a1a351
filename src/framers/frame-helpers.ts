// src/framers/frame-helpers.ts

import {
  NbeFieldOverflowError,
  NbeFrameDecodeError,
  NbeMarkerError,
  NbeShortFrameError,
} from '../errors.js';
import { bytesToAscii, sliceUint8Array } from '../utils/utils.js';

const SIGNED_INTEGER = /^[+-]?\d+$/;

/**
 * Zero-padded decimal field. Negative values keep their sign in the first
 * column (`-1` in two digits is `-1`).
 */
export function formatAsciiInt(value: number, digits: number, field: string): string {
  const body = String(Math.abs(Math.trunc(value)));
  const text = value < 0 ? `-${body.padStart(digits - 1, '0')}` : body.padStart(digits, '0');
  if (text.length > digits) {
    throw new NbeFieldOverflowError(field, value, digits);
  }
  return text;
}

/**
 * Strict decimal parse; null when the text is not an integer.
 */
export function parseAsciiInt(text: string): number | null {
  return SIGNED_INTEGER.test(text) ? Number(text) : null;
}

/**
 * Sequential reader over one datagram. Every read names its field so a short
 * frame reports what was missing.
 */
export class FrameReader {
  private offset: number = 0;

  constructor(private readonly data: Uint8Array) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  readBytes(length: number, field: string): Uint8Array {
    if (length > this.remaining) {
      throw new NbeShortFrameError(field, Math.max(this.remaining, 0), length);
    }
    const out = sliceUint8Array(this.data, this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  readString(length: number, field: string): string {
    return bytesToAscii(this.readBytes(length, field));
  }

  readByte(field: string): number {
    const [b = 0] = this.readBytes(1, field);
    return b;
  }

  /**
   * Reads a decimal field; surrounding spaces are ignored.
   */
  readInt(length: number, field: string): number {
    const text = this.readString(length, field);
    const value = parseAsciiInt(text.trim());
    if (value === null) {
      throw new NbeFrameDecodeError(`Failed to parse ${field} as integer: "${text}"`);
    }
    return value;
  }

  /**
   * Like {@link readInt}, but an unparseable field yields `fallback`.
   */
  readIntOr(length: number, field: string, fallback: number): number {
    const value = parseAsciiInt(this.readString(length, field).trim());
    return value ?? fallback;
  }

  expectMarker(expected: number, field: string): void {
    const marker = this.readByte(field);
    if (marker !== expected) {
      throw new NbeMarkerError(field, expected, marker);
    }
  }

  rest(): Uint8Array {
    return this.readBytes(this.remaining, 'remainder');
  }
}
