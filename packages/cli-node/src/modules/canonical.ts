/**
 * Structural helpers: order-independent serialization for equality checks,
 * and deep freezing of loaded definitions and returned results.
 */

import { isRecord } from '../types.js';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      if (value[key] !== undefined) {
        sorted[key] = canonicalize(value[key]);
      }
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted; keys holding `undefined` are dropped */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'undefined';
}

export function structurallyEqual(a: unknown, b: unknown): boolean {
  return stableStringify(a) === stableStringify(b);
}

/**
 * Freeze a plain data value and everything reachable from it. Frozen
 * subtrees are not walked again.
 */
export function deepFreeze<T>(value: T): T {
  if (Object.isFrozen(value)) return value;
  if (Array.isArray(value)) {
    Object.freeze(value);
    for (const item of value) deepFreeze(item);
  } else if (isRecord(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}
