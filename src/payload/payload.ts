// src/payload/payload.ts

import { NbeFunction } from '../constants/constants.js';
import type { RegisterMap, RegisterValue, ResponsePayload } from '../types/nbe-types.js';
import { formatValue, parseValue } from './register-value.js';

/**
 * Parses the text of a response payload.
 *
 * Unknown functions keep the whole text as an error message. Otherwise the
 * text is a `;`-separated list of `key=value` pairs; parts without `=` are
 * skipped and keys are lower-cased. GET_SETUP_RANGE values are
 * `min,max,default,decimals` and are skipped when a component is missing.
 */
export function parsePayload(text: string, fn: NbeFunction): ResponsePayload {
  if (fn === NbeFunction.UNKNOWN) {
    return { kind: 'error', error: text };
  }

  const values: RegisterMap = new Map();
  for (const part of text.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) continue;
    const key = part.slice(0, eq).toLowerCase();
    const raw = part.slice(eq + 1);

    if (fn === NbeFunction.GET_SETUP_RANGE) {
      const [min, max, def, decimals] = raw.split(',');
      if (min === undefined || max === undefined || def === undefined || decimals === undefined) {
        continue;
      }
      values.set(key, {
        kind: 'range',
        min: parseValue(min),
        max: parseValue(max),
        default: parseValue(def),
        decimals: parseValue(decimals),
      });
    } else {
      values.set(key, parseValue(raw));
    }
  }
  return { kind: 'registers', values };
}

/**
 * Renders `key=value;key2=value2` in map order.
 */
export function serializePayload(values: Iterable<[string, RegisterValue]>): string {
  const parts: string[] = [];
  for (const [key, value] of values) {
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(';');
}

/**
 * Looks up a register in a response payload; error payloads have none.
 */
export function getRegister(payload: ResponsePayload, key: string): RegisterValue | undefined {
  return payload.kind === 'registers' ? payload.values.get(key) : undefined;
}

/**
 * Text of an error payload, the `error` register, or the whole payload.
 */
export function describePayload(payload: ResponsePayload): string {
  if (payload.kind === 'error') return payload.error;
  const error = payload.values.get('error');
  return error ? formatValue(error) : serializePayload(payload.values);
}
