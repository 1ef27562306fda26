export type SentinelTag = "undefined" | "not-present" | "default";

/**
 * Marker values that can never collide with decoded data. The three instances
 * below are the only ones that exist.
 */
export class Sentinel<T extends SentinelTag = SentinelTag> {
  private constructor(readonly tag: T) {
    Object.freeze(this);
  }

  toString(): string {
    return `<${this.tag}>`;
  }

  static readonly UNDEFINED = new Sentinel("undefined");
  static readonly NOT_PRESENT = new Sentinel("not-present");
  static readonly DEFAULT = new Sentinel("default");
}

/** Slot of a record that has never been assigned. */
export const UNDEFINED: Sentinel<"undefined"> = Sentinel.UNDEFINED;
/** Field whose presence predicate was false; nothing was read or is written. */
export const NOT_PRESENT: Sentinel<"not-present"> = Sentinel.NOT_PRESENT;
/** Use the field's own default, or all zero bytes when given as a null representation. */
export const DEFAULT: Sentinel<"default"> = Sentinel.DEFAULT;

export function isSentinel(value: unknown): value is Sentinel {
  return value instanceof Sentinel;
}

export function isUndefined(value: unknown): value is Sentinel<"undefined"> {
  return value === UNDEFINED;
}

export function isNotPresent(value: unknown): value is Sentinel<"not-present"> {
  return value === NOT_PRESENT;
}

export function isDefault(value: unknown): value is Sentinel<"default"> {
  return value === DEFAULT;
}
