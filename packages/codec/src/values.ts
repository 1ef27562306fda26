import { bytesEqual } from "@bytecraft/helpers";
import type { IntegerValue } from "./types";

export function isIntegerValue(value: unknown): value is IntegerValue {
  return typeof value === "bigint" || (typeof value === "number" && Number.isSafeInteger(value));
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

interface Comparable {
  equals(other: unknown): boolean;
}

function isComparable(value: unknown): value is Comparable {
  return typeof value === "object" && value !== null && "equals" in value && typeof value.equals === "function";
}

/** Structural equality; integers compare numerically whether number or bigint. */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (isIntegerValue(a) && isIntegerValue(b)) return BigInt(a) === BigInt(b);
  if (typeof a === "number" && typeof b === "number") return Object.is(a, b) || a === b;
  if (a instanceof Uint8Array && b instanceof Uint8Array) return bytesEqual(a, b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (isComparable(a)) return a.equals(b);
  if (isComparable(b)) return b.equals(a);
  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }
  return a === b;
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Uint8Array) return `bytes(${value.length})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Date) return "Date";
  return typeof value;
}
