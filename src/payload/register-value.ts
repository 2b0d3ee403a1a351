// src/payload/register-value.ts

import type {
  FloatValue,
  IntegerValue,
  RegisterValue,
  ScalarValue,
  TextValue,
} from '../types/nbe-types.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_FLOAT_PATTERN = /^([+-]?)0x([0-9a-f]*)(?:\.([0-9a-f]*))?p([+-]?\d+)$/i;
// infinities take a sign, NaN does not
const SPECIAL_FLOAT_PATTERN = /^(?:[+-]?inf(?:inity)?|nan)$/i;

export function integerValue(value: number): IntegerValue {
  return { kind: 'integer', value };
}

/** Float register; the value is stored at 32-bit precision */
export function floatValue(value: number): FloatValue {
  return { kind: 'float', value: Math.fround(value) };
}

export function textValue(value: string): TextValue {
  return { kind: 'text', value };
}

function parseSpecialFloat(raw: string): number {
  const lower = raw.toLowerCase();
  if (lower === 'nan') return NaN;
  return lower.startsWith('-') ? -Infinity : Infinity;
}

/** `0x1.8p3` style literal; null when it is not one */
function parseHexFloat(raw: string): number | null {
  const match = HEX_FLOAT_PATTERN.exec(raw);
  if (!match) return null;
  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  if (whole === '' && fraction === '') return null;

  let mantissa = 0;
  for (const digit of whole + fraction) {
    mantissa = mantissa * 16 + parseInt(digit, 16);
  }
  const value = mantissa * 2 ** (Number(exponent) - 4 * fraction.length);
  return sign === '-' ? -value : value;
}

/**
 * Classifies one raw register value: int32, then float32, then text.
 */
export function parseValue(raw: string): ScalarValue {
  if (INTEGER_PATTERN.test(raw)) {
    const n = Number(raw);
    if (n >= INT32_MIN && n <= INT32_MAX) return integerValue(n);
  }

  if (SPECIAL_FLOAT_PATTERN.test(raw)) {
    return floatValue(parseSpecialFloat(raw));
  }

  const literal = FLOAT_PATTERN.test(raw) ? Number(raw) : parseHexFloat(raw);
  if (literal !== null) {
    const f = Math.fround(literal);
    // out of float32 range
    if (Number.isFinite(f)) return { kind: 'float', value: f };
  }

  return textValue(raw);
}

/**
 * Two-decimal rendering of a float32 value. Exact ties on the third decimal
 * round to the even neighbour; everything else rounds to nearest.
 */
export function formatRoundedFloat(value: number): string {
  const v = Math.fround(value);
  if (Number.isNaN(v)) return 'NaN';
  if (v === Infinity) return '+Inf';
  if (v === -Infinity) return '-Inf';

  const sign = v < 0 || Object.is(v, -0) ? '-' : '';
  const abs = Math.abs(v);

  if (abs >= 1e21) {
    return `${sign}${BigInt(abs).toString()}.00`;
  }

  // a float32 sits exactly on a .xx5 boundary only when it is an odd multiple of 1/8
  const isTie = Number.isInteger(abs * 8) && !Number.isInteger(abs * 4);
  if (!isTie) {
    return `${sign}${abs.toFixed(2)}`;
  }

  let hundredths = Math.floor(abs * 100);
  if (hundredths % 2 === 1) hundredths += 1;
  const whole = Math.floor(hundredths / 100);
  const fraction = String(hundredths % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function formatScalar(value: ScalarValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'float':
      return formatRoundedFloat(value.value);
    case 'text':
      return value.value;
  }
}

/**
 * Wire form of a value, as used in `key=value` payloads.
 */
export function formatValue(value: RegisterValue): string {
  if (value.kind === 'range') {
    return [value.min, value.max, value.default, value.decimals].map(formatScalar).join(',');
  }
  return formatScalar(value);
}

function scalarsEqual(a: ScalarValue, b: ScalarValue): boolean {
  return a.kind === b.kind && formatScalar(a) === formatScalar(b);
}

/**
 * Equality used for change detection: same kind and same textual form.
 */
export function valuesEqual(a: RegisterValue | undefined, b: RegisterValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (a.kind === 'range' || b.kind === 'range') {
    if (a.kind !== 'range' || b.kind !== 'range') return false;
    return (
      scalarsEqual(a.min, b.min) &&
      scalarsEqual(a.max, b.max) &&
      scalarsEqual(a.default, b.default) &&
      scalarsEqual(a.decimals, b.decimals)
    );
  }
  return scalarsEqual(a, b);
}

/**
 * JSON form published to MQTT: numbers stay numbers, floats keep two decimals.
 */
export function toJson(value: RegisterValue): string {
  switch (value.kind) {
    case 'integer':
      return String(value.value);
    case 'float':
      return Number.isFinite(value.value)
        ? formatRoundedFloat(value.value)
        : JSON.stringify(formatRoundedFloat(value.value));
    case 'text':
      return JSON.stringify(value.value);
    case 'range':
      return `{"min":${toJson(value.min)},"max":${toJson(value.max)},"default":${toJson(
        value.default
      )},"decimals":${toJson(value.decimals)}}`;
  }
}
